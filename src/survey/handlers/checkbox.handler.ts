import { PLACEHOLDERS, SELECTORS } from '../../shared/constants.js';
import { sampleWithoutReplacement } from '../../shared/utils.js';
import type { PageElement } from '../../types/index.js';
import type { HandlerContext } from '../types.js';
import { BaseControlHandler, multiChoiceCount, type HandlerTally } from './base.handler.js';

/**
 * Multi-choice questions. Ticks a random subset of the unticked boxes of
 * each group and never unticks anything, so a fully ticked group is left
 * alone on the next pass.
 */
export class CheckboxHandler extends BaseControlHandler {
  readonly control = 'checkbox' as const;
  protected readonly tag = 'Checkbox';

  constructor(context: HandlerContext) {
    super(context, 'checkbox-handler');
  }

  protected async handle(tally: HandlerTally): Promise<void> {
    const groups = await this.groupControls(await this.findControls(SELECTORS.CHECKBOX));

    for (const group of groups) {
      if (!this.stillRunning(tally)) {
        return;
      }

      const candidates: PageElement[] = [];
      for (const member of group.members) {
        if (!(await this.isSelected(member))) {
          candidates.push(member);
        }
      }
      if (candidates.length === 0) {
        continue;
      }

      const count = multiChoiceCount(candidates.length, this.ctx.random);
      const picks = sampleWithoutReplacement(candidates, count, this.ctx.random);
      this.logger.debug({ groupId: group.groupId, candidates: candidates.length, count }, 'Ticking checkboxes');

      for (const pick of picks) {
        if (!this.stillRunning(tally)) {
          return;
        }
        if (await this.ctx.clicker.click(pick)) {
          this.recordAnswer(tally, await this.optionLabel(pick, PLACEHOLDERS.CHECKBOX), group.groupId);
        }
        if (!(await this.pace(tally))) {
          return;
        }
      }
    }
  }
}
