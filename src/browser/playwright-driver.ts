/**
 * Playwright implementation of the browser collaborator.
 *
 * One persistent Chromium context per session, so cookies and logins in
 * the profile directory survive restarts. Every query failure surfaces as
 * InspectionError and every action failure as InteractionError.
 */

import { mkdir } from 'node:fs/promises';
import { chromium, type BrowserContext, type ElementHandle, type Page } from 'playwright';
import type { Logger } from 'pino';
import { getLogger } from '../shared/logger.js';
import {
  AppError,
  InspectionError,
  InteractionError,
  SessionStartError,
  errorMessage,
} from '../shared/errors.js';
import { generateId } from '../shared/crypto.js';
import type {
  BrowserDriver,
  BrowserSession,
  PageElement,
  QueryKind,
  SessionConfig,
  SyntheticEventType,
} from '../types/index.js';

const LAUNCH_ARGS = ['--no-sandbox', '--disable-dev-shm-usage', '--disable-gpu'];

/** Steps of the straight pointer path used by `pointerClick`. */
const POINTER_STEPS = 8;

// ---------------------------------------------------------------------------
// Element handle
// ---------------------------------------------------------------------------

class PlaywrightElement implements PageElement {
  constructor(
    readonly sessionId: string,
    readonly handle: ElementHandle,
  ) {}
}

// ---------------------------------------------------------------------------
// Session
// ---------------------------------------------------------------------------

class PlaywrightSession implements BrowserSession {
  readonly id = generateId();
  private readonly logger: Logger;

  constructor(
    private readonly context: BrowserContext,
    private readonly page: Page,
    private readonly config: SessionConfig,
    logger: Logger,
  ) {
    this.logger = logger.child({ sessionId: this.id });
  }

  async navigate(url: string): Promise<void> {
    await this.act('navigate', async () => {
      await this.page.goto(url, { waitUntil: 'domcontentloaded', timeout: this.config.navigationTimeoutMs });
    });
    this.logger.info({ url }, 'Navigated');
  }

  currentUrl(): string {
    return this.page.url();
  }

  async content(): Promise<string> {
    return this.inspect('content', () => this.page.content());
  }

  async findAll(scope: PageElement | null, kind: QueryKind, selector: string): Promise<PageElement[]> {
    return this.inspect(`${kind}:${selector}`, async () => {
      const root = scope ? this.unwrap(scope) : null;
      switch (kind) {
        case 'css':
          return this.wrap(root ? await root.$$(selector) : await this.page.$$(selector));

        case 'ancestor': {
          if (!root) {
            return [];
          }
          const found = await root.evaluateHandle(
            (node, sel) => (node instanceof Element ? node.parentElement?.closest(sel) ?? null : null),
            selector,
          );
          return this.wrapOne(found.asElement());
        }

        case 'preceding': {
          if (!root) {
            return [];
          }
          const found = await root.evaluateHandle((node, sel) => {
            let nearest: Element | null = null;
            for (const candidate of Array.from(document.querySelectorAll(sel))) {
              const position = candidate.compareDocumentPosition(node);
              const before = (position & Node.DOCUMENT_POSITION_FOLLOWING) !== 0;
              const contains = (position & Node.DOCUMENT_POSITION_CONTAINED_BY) !== 0;
              if (before && !contains) {
                nearest = candidate;
              }
            }
            return nearest;
          }, selector);
          return this.wrapOne(found.asElement());
        }

        case 'id': {
          const found = await this.page.evaluateHandle((id) => document.getElementById(id), selector);
          return this.wrapOne(found.asElement());
        }
      }
    });
  }

  async getAttribute(element: PageElement, name: string): Promise<string | null> {
    return this.inspect(`attribute:${name}`, () => this.unwrap(element).getAttribute(name));
  }

  async getText(element: PageElement): Promise<string> {
    return this.inspect('text', () =>
      this.unwrap(element).evaluate((node) =>
        node instanceof HTMLElement ? node.innerText : (node.textContent ?? ''),
      ),
    );
  }

  async getValue(element: PageElement): Promise<string> {
    return this.inspect('value', () =>
      this.unwrap(element).evaluate((node) =>
        node instanceof HTMLInputElement || node instanceof HTMLTextAreaElement || node instanceof HTMLSelectElement
          ? node.value
          : (node.textContent ?? ''),
      ),
    );
  }

  async isSelected(element: PageElement): Promise<boolean> {
    return this.inspect('selected', () =>
      this.unwrap(element).evaluate((node) => {
        if (node instanceof HTMLInputElement) {
          return node.checked;
        }
        if (node instanceof HTMLOptionElement) {
          return node.selected;
        }
        if (node instanceof Element) {
          const state = node.getAttribute('aria-checked') ?? node.getAttribute('aria-selected');
          return state === 'true';
        }
        return false;
      }),
    );
  }

  async isMultiple(element: PageElement): Promise<boolean> {
    return this.inspect('multiple', () =>
      this.unwrap(element).evaluate((node) => node instanceof HTMLSelectElement && node.multiple),
    );
  }

  async structuralPath(element: PageElement): Promise<string> {
    return this.inspect('path', () =>
      this.unwrap(element).evaluate((node) => {
        const parts: string[] = [];
        let current: Element | null = node instanceof Element ? node : null;
        while (current && current !== document.documentElement) {
          const tag = current.tagName.toLowerCase();
          const parent: Element | null = current.parentElement;
          if (!parent) {
            parts.unshift(tag);
            break;
          }
          const siblings = Array.from(parent.children).filter((c) => c.tagName === current?.tagName);
          parts.unshift(`${tag}:nth-of-type(${siblings.indexOf(current) + 1})`);
          current = parent;
        }
        return ['html', ...parts].join(' > ');
      }),
    );
  }

  async click(element: PageElement): Promise<void> {
    await this.act('click', () => this.unwrap(element).click({ timeout: this.config.actionTimeoutMs }));
  }

  async pointerClick(element: PageElement): Promise<void> {
    await this.act('pointer-click', async () => {
      const box = await this.unwrap(element).boundingBox();
      if (!box) {
        throw new InteractionError('Element has no bounding box', 'pointer-click');
      }
      const x = box.x + box.width / 2;
      const y = box.y + box.height / 2;
      await this.page.mouse.move(x, y, { steps: POINTER_STEPS });
      await this.page.mouse.click(x, y);
    });
  }

  async typeText(element: PageElement, text: string): Promise<void> {
    await this.act('type', async () => {
      await this.unwrap(element).focus();
      await this.page.keyboard.type(text);
    });
  }

  async clear(element: PageElement): Promise<void> {
    await this.act('clear', () => this.unwrap(element).fill('', { timeout: this.config.actionTimeoutMs }));
  }

  async scrollIntoView(element: PageElement): Promise<void> {
    await this.act('scroll', () =>
      this.unwrap(element).scrollIntoViewIfNeeded({ timeout: this.config.actionTimeoutMs }),
    );
  }

  async dispatchSyntheticEvents(element: PageElement, events: readonly SyntheticEventType[]): Promise<void> {
    await this.act('dispatch', () =>
      this.unwrap(element).evaluate((node, types) => {
        for (const type of types) {
          node.dispatchEvent(new MouseEvent(type, { bubbles: true, cancelable: true, view: window }));
        }
      }, [...events]),
    );
  }

  async selectOption(select: PageElement, option: PageElement): Promise<void> {
    await this.act('select', async () => {
      const selectHandle = this.unwrap(select);
      const targets: ElementHandle[] = [this.unwrap(option)];

      const multiple = await selectHandle.evaluate((node) => node instanceof HTMLSelectElement && node.multiple);
      if (multiple) {
        for (const existing of await selectHandle.$$('option')) {
          if (await existing.evaluate((node) => node instanceof HTMLOptionElement && node.selected)) {
            targets.push(existing);
          }
        }
      }

      await selectHandle.selectOption(targets, { timeout: this.config.actionTimeoutMs });
    });
  }

  async close(): Promise<void> {
    await this.act('close', () => this.context.close());
    this.logger.info('Browser closed');
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  private unwrap(element: PageElement): ElementHandle {
    if (element instanceof PlaywrightElement && element.sessionId === this.id) {
      return element.handle;
    }
    throw new InspectionError('Element does not belong to this browser session', 'unwrap');
  }

  private wrap(handles: readonly ElementHandle[]): PageElement[] {
    return handles.map((handle) => new PlaywrightElement(this.id, handle));
  }

  private wrapOne(handle: ElementHandle | null): PageElement[] {
    return handle ? [new PlaywrightElement(this.id, handle)] : [];
  }

  private async inspect<T>(query: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      if (error instanceof AppError) {
        throw error;
      }
      throw new InspectionError(`Query ${query} failed: ${errorMessage(error)}`, query);
    }
  }

  private async act(action: string, fn: () => Promise<void>): Promise<void> {
    try {
      await fn();
    } catch (error) {
      if (error instanceof AppError) {
        throw error;
      }
      throw new InteractionError(`${action} failed: ${errorMessage(error)}`, action);
    }
  }
}

// ---------------------------------------------------------------------------
// Driver
// ---------------------------------------------------------------------------

export class PlaywrightDriver implements BrowserDriver {
  private readonly logger: Logger;

  constructor(logger: Logger = getLogger('browser', { component: 'playwright-driver' })) {
    this.logger = logger;
  }

  /**
   * Launches Chromium on the persistent profile directory.
   * @throws SessionStartError when the browser cannot be started
   */
  async openSession(config: SessionConfig): Promise<BrowserSession> {
    try {
      await mkdir(config.profileDir, { recursive: true });
      const context = await chromium.launchPersistentContext(config.profileDir, {
        headless: config.headless,
        executablePath: config.executablePath,
        channel: config.channel,
        viewport: config.viewport,
        args: LAUNCH_ARGS,
      });
      context.setDefaultTimeout(config.actionTimeoutMs);
      context.setDefaultNavigationTimeout(config.navigationTimeoutMs);

      const page = context.pages()[0] ?? (await context.newPage());
      const session = new PlaywrightSession(context, page, config, this.logger);
      this.logger.info({ profileDir: config.profileDir, headless: config.headless }, 'Browser started (persistent profile)');
      return session;
    } catch (error) {
      this.logger.error({ profileDir: config.profileDir, error: errorMessage(error) }, 'Failed to start browser');
      throw new SessionStartError(`Failed to start browser: ${errorMessage(error)}`, config.profileDir);
    }
  }
}
