import { PLACEHOLDERS, SELECTORS } from '../../shared/constants.js';
import { InspectionError, InteractionError, errorMessage } from '../../shared/errors.js';
import { normalizeWhitespace, pickRandom, sampleWithoutReplacement } from '../../shared/utils.js';
import type { PageElement } from '../../types/index.js';
import type { HandlerContext } from '../types.js';
import { BaseControlHandler, multiChoiceCount, type HandlerTally } from './base.handler.js';

interface SelectCandidate {
  element: PageElement;
  /** Visible text, or the value when the option has no text. */
  label: string;
  value: string;
}

/**
 * Dropdowns and multi-selects. A single select gets the synthesized answer
 * (or a random option); a multi-select gets a random subset. A failure on
 * one select is logged and the next select is tried.
 */
export class SelectHandler extends BaseControlHandler {
  readonly control = 'select' as const;
  protected readonly tag = 'Select';

  constructor(context: HandlerContext) {
    super(context, 'select-handler');
  }

  protected async handle(tally: HandlerTally): Promise<void> {
    const selects = await this.findControls(SELECTORS.SELECT);

    for (const select of selects) {
      if (!this.stillRunning(tally)) {
        return;
      }

      let committed: boolean;
      try {
        committed = await this.answer(select, tally);
      } catch (error) {
        if (error instanceof InteractionError || error instanceof InspectionError) {
          this.logger.warn({ error: errorMessage(error) }, 'Select error');
          continue;
        }
        throw error;
      }
      if (tally.interrupted) {
        return;
      }
      if (committed && !(await this.pace(tally))) {
        return;
      }
    }
  }

  /** Returns true when at least one option was committed. */
  private async answer(select: PageElement, tally: HandlerTally): Promise<boolean> {
    const candidates = await this.candidates(select);
    if (candidates.length === 0) {
      return false;
    }

    if (await this.ctx.session.isMultiple(select)) {
      return this.answerMultiple(select, candidates, tally);
    }

    const question = (await this.ctx.labels.resolve(select)) || PLACEHOLDERS.SELECT;
    const { value } = this.ctx.synthesizer.answerFor(
      question,
      candidates.map((c) => c.label),
      this.ctx.profile(),
    );
    const target = value.toLowerCase();
    const chosen =
      candidates.find((c) => c.label.toLowerCase() === target || c.value.toLowerCase() === target) ??
      pickRandom(candidates, this.ctx.random);

    await this.ctx.session.selectOption(select, chosen.element);
    this.recordAnswer(tally, chosen.label);
    return true;
  }

  private async answerMultiple(
    select: PageElement,
    candidates: readonly SelectCandidate[],
    tally: HandlerTally,
  ): Promise<boolean> {
    const count = multiChoiceCount(candidates.length, this.ctx.random);
    const picks = sampleWithoutReplacement(candidates, count, this.ctx.random);
    let committed = false;

    for (const [index, pick] of picks.entries()) {
      if (index > 0 && !(await this.pace(tally))) {
        return committed;
      }
      if (!this.stillRunning(tally)) {
        return committed;
      }
      await this.ctx.session.selectOption(select, pick.element);
      this.recordAnswer(tally, pick.label, undefined, 'Multi-Select');
      committed = true;
    }
    return committed;
  }

  /** Options whose value or text is non-empty. */
  private async candidates(select: PageElement): Promise<SelectCandidate[]> {
    const { session } = this.ctx;
    const options = await session.findAll(select, 'css', SELECTORS.OPTION);
    const candidates: SelectCandidate[] = [];

    for (const element of options) {
      const value = ((await session.getAttribute(element, 'value')) ?? '').trim();
      const text = normalizeWhitespace(await session.getText(element));
      const label = text || value;
      if (label) {
        candidates.push({ element, label, value });
      }
    }
    return candidates;
  }
}
