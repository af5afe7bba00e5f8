/**
 * Finds and clicks the control that moves the survey forward.
 *
 * Three stages run in order, each trying the progression words in
 * vocabulary order:
 *   1. buttons and `role="button"` elements whose text contains the word
 *   2. submit inputs whose value contains the word
 *   3. buttons inside forms whose text contains the word anywhere
 * Stages 1 and 2 match whole words; stage 3 matches substrings, so it also
 * catches labels such as "Next»" or "Submitting".
 */

import type { Logger } from 'pino';
import type { RobustClicker } from '../browser/robust-clicker.js';
import { getLogger } from '../shared/logger.js';
import { PROGRESSION_WORDS, SELECTORS } from '../shared/constants.js';
import { errorMessage } from '../shared/errors.js';
import { eventBus, type TypedEventEmitter } from '../shared/events.js';
import { containsWord, normalizeWhitespace } from '../shared/utils.js';
import type { BrowserSession, PageElement } from '../types/index.js';

export type AdvanceStage = 'button' | 'submit-input' | 'form-button';

interface Candidate {
  element: PageElement;
  /** Lower-cased, whitespace-normalised label. */
  label: string;
}

export interface PageAdvancerOptions {
  clicker: RobustClicker;
  words?: readonly string[];
  events?: TypedEventEmitter;
  logger?: Logger;
}

export class PageAdvancer {
  private readonly session: BrowserSession;
  private readonly clicker: RobustClicker;
  private readonly words: readonly string[];
  private readonly events: TypedEventEmitter;
  private readonly logger: Logger;

  constructor(session: BrowserSession, options: PageAdvancerOptions) {
    this.session = session;
    this.clicker = options.clicker;
    this.words = options.words ?? PROGRESSION_WORDS;
    this.events = options.events ?? eventBus;
    this.logger = options.logger ?? getLogger('survey', { component: 'page-advancer' });
  }

  /**
   * Clicks the first matching control that accepts the click.
   * Returns false when nothing matched or every match refused the click.
   */
  async advance(): Promise<boolean> {
    const stages: [AdvanceStage, () => Promise<Candidate[]>, (label: string, word: string) => boolean][] = [
      ['button', () => this.labelled(null, SELECTORS.CLICKABLE, 'text'), containsWord],
      ['submit-input', () => this.labelled(null, SELECTORS.SUBMIT_INPUT, 'value'), containsWord],
      ['form-button', () => this.formButtons(), (label, word) => label.includes(word)],
    ];

    for (const [stage, collect, matches] of stages) {
      let candidates: Candidate[];
      try {
        candidates = await collect();
      } catch (error) {
        this.logger.warn({ stage, error: errorMessage(error) }, 'Next button search error');
        continue;
      }

      for (const word of this.words) {
        for (const candidate of candidates) {
          if (!matches(candidate.label, word)) {
            continue;
          }
          if (await this.clicker.click(candidate.element)) {
            this.logger.info({ stage, word }, `Clicked ${describeStage(stage)}`);
            this.events.emit('run:advanced', { stage, label: candidate.label });
            return true;
          }
        }
      }
    }

    return false;
  }

  private async labelled(
    scope: PageElement | null,
    selector: string,
    source: 'text' | 'value',
  ): Promise<Candidate[]> {
    const elements = await this.session.findAll(scope, 'css', selector);
    const candidates: Candidate[] = [];
    for (const element of elements) {
      const raw =
        source === 'text'
          ? await this.session.getText(element)
          : ((await this.session.getAttribute(element, 'value')) ?? '');
      const label = normalizeWhitespace(raw).toLowerCase();
      if (label) {
        candidates.push({ element, label });
      }
    }
    return candidates;
  }

  private async formButtons(): Promise<Candidate[]> {
    const forms = await this.session.findAll(null, 'css', SELECTORS.FORM);
    const candidates: Candidate[] = [];
    for (const form of forms) {
      candidates.push(...(await this.labelled(form, SELECTORS.FORM_BUTTON, 'text')));
    }
    return candidates;
  }
}

function describeStage(stage: AdvanceStage): string {
  switch (stage) {
    case 'button':
      return 'Next/Submit';
    case 'submit-input':
      return 'Submit';
    case 'form-button':
      return 'Next (form button)';
  }
}
