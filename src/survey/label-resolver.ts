/**
 * Finds the human-readable label of a form control and the question text
 * of a group of controls.
 *
 * Every lookup is independent: a failing query is logged at debug level and
 * the next lookup runs. Nothing here throws for page inspection failures.
 */

import type { Logger } from 'pino';
import { getLogger } from '../shared/logger.js';
import { SELECTORS } from '../shared/constants.js';
import { errorMessage } from '../shared/errors.js';
import { normalizeWhitespace } from '../shared/utils.js';
import type { BrowserSession, PageElement } from '../types/index.js';

type Lookup = () => Promise<string>;

/** Escapes a value for use inside a double-quoted CSS attribute selector. */
function quoteAttributeValue(value: string): string {
  return `"${value.replace(/["\\]/g, '\\$&')}"`;
}

export class LabelResolver {
  private readonly session: BrowserSession;
  private readonly logger: Logger;

  constructor(session: BrowserSession, logger: Logger = getLogger('survey', { component: 'label-resolver' })) {
    this.session = session;
    this.logger = logger;
  }

  /**
   * Label of a single control. Tries, first non-empty wins: enclosing
   * `<label>`, `label[for=id]`, the nearest preceding `<label>`,
   * `aria-label`, then the text of the `aria-labelledby` targets.
   * Returns an empty string when nothing matches.
   */
  async resolve(element: PageElement): Promise<string> {
    return this.firstNonEmpty('label', [
      () => this.firstText(element, 'ancestor', SELECTORS.LABEL),
      () => this.forLabel(element),
      () => this.firstText(element, 'preceding', SELECTORS.LABEL),
      () => this.attribute(element, 'aria-label'),
      () => this.labelledBy(element),
    ]);
  }

  /**
   * Question text of a group: the enclosing fieldset legend, the
   * container's own ARIA label, a question heading inside the container,
   * then the first control's label. Falls back to `placeholder`.
   */
  async questionFor(container: PageElement | null, firstControl: PageElement, placeholder: string): Promise<string> {
    const lookups: Lookup[] = [() => this.legend(firstControl)];
    if (container) {
      lookups.push(
        () => this.attribute(container, 'aria-label'),
        () => this.labelledBy(container),
        () => this.firstText(container, 'css', SELECTORS.QUESTION_HEADING),
      );
    }
    lookups.push(() => this.resolve(firstControl));

    const text = await this.firstNonEmpty('question', lookups);
    return text || placeholder;
  }

  // -------------------------------------------------------------------------
  // Lookups
  // -------------------------------------------------------------------------

  private async firstNonEmpty(kind: string, lookups: readonly Lookup[]): Promise<string> {
    for (const lookup of lookups) {
      try {
        const text = normalizeWhitespace(await lookup());
        if (text) {
          return text;
        }
      } catch (error) {
        this.logger.debug({ kind, error: errorMessage(error) }, 'Label lookup failed');
      }
    }
    return '';
  }

  private async firstText(
    scope: PageElement,
    kind: 'css' | 'ancestor' | 'preceding',
    selector: string,
  ): Promise<string> {
    const found = await this.session.findAll(scope, kind, selector);
    for (const element of found) {
      const text = normalizeWhitespace(await this.session.getText(element));
      if (text) {
        return text;
      }
    }
    return '';
  }

  private async forLabel(element: PageElement): Promise<string> {
    const id = await this.session.getAttribute(element, 'id');
    if (!id) {
      return '';
    }
    const labels = await this.session.findAll(null, 'css', `label[for=${quoteAttributeValue(id)}]`);
    const first = labels[0];
    return first ? this.session.getText(first) : '';
  }

  private async attribute(element: PageElement, name: string): Promise<string> {
    return (await this.session.getAttribute(element, name)) ?? '';
  }

  private async labelledBy(element: PageElement): Promise<string> {
    const ids = ((await this.session.getAttribute(element, 'aria-labelledby')) ?? '').split(/\s+/).filter(Boolean);
    const parts: string[] = [];
    for (const id of ids) {
      const [target] = await this.session.findAll(null, 'id', id);
      if (target) {
        parts.push(await this.session.getText(target));
      }
    }
    return parts.join(' ');
  }

  private async legend(element: PageElement): Promise<string> {
    const [fieldset] = await this.session.findAll(element, 'ancestor', SELECTORS.FIELDSET);
    if (!fieldset) {
      return '';
    }
    const [legend] = await this.session.findAll(fieldset, 'css', SELECTORS.LEGEND);
    return legend ? this.session.getText(legend) : '';
  }
}
