/**
 * Contract between the survey engine and whatever drives the browser.
 * The engine only ever talks to these interfaces; Playwright is one
 * implementation, the test suite ships an in-process one.
 */

/**
 * How `findAll` interprets its selector.
 *
 * - `css`       descendants of the scope (or the document) matching a CSS selector
 * - `ancestor`  the nearest strict ancestor of the scope matching a CSS selector
 * - `preceding` the nearest element before the scope in document order
 *               (ancestors excluded) matching a CSS selector
 * - `id`        the element whose id equals the selector
 */
export type QueryKind = 'css' | 'ancestor' | 'preceding' | 'id';

export type SyntheticEventType = 'mouseover' | 'mousemove' | 'mousedown' | 'mouseup' | 'click';

/** Opaque handle to an element of the page a session is showing. */
export interface PageElement {
  readonly sessionId: string;
}

export interface SessionConfig {
  /** Persistent browser profile directory; cookies survive restarts. */
  profileDir: string;
  headless: boolean;
  executablePath?: string;
  channel?: string;
  viewport: { width: number; height: number };
  /** Upper bound for a single element action. */
  actionTimeoutMs: number;
  navigationTimeoutMs: number;
}

export interface BrowserSession {
  readonly id: string;

  navigate(url: string): Promise<void>;
  currentUrl(): string;
  /** Serialized HTML of the current document. */
  content(): Promise<string>;

  findAll(scope: PageElement | null, kind: QueryKind, selector: string): Promise<PageElement[]>;
  getAttribute(element: PageElement, name: string): Promise<string | null>;
  getText(element: PageElement): Promise<string>;
  /** Live value of an input, textarea or editable element. */
  getValue(element: PageElement): Promise<string>;
  /** Checked state of radios/checkboxes (native or ARIA) and selected state of options. */
  isSelected(element: PageElement): Promise<boolean>;
  isMultiple(element: PageElement): Promise<boolean>;
  /** CSS path from the document root, stable while the page does not change. */
  structuralPath(element: PageElement): Promise<string>;

  click(element: PageElement): Promise<void>;
  /** Moves the pointer onto the element, then clicks at that position. */
  pointerClick(element: PageElement): Promise<void>;
  typeText(element: PageElement, text: string): Promise<void>;
  clear(element: PageElement): Promise<void>;
  scrollIntoView(element: PageElement): Promise<void>;
  dispatchSyntheticEvents(element: PageElement, events: readonly SyntheticEventType[]): Promise<void>;
  /** Selects an option of a select; adds to the selection when the select is multiple. */
  selectOption(select: PageElement, option: PageElement): Promise<void>;

  close(): Promise<void>;
}

export interface BrowserDriver {
  openSession(config: SessionConfig): Promise<BrowserSession>;
}
