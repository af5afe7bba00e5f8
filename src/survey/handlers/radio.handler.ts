import { PLACEHOLDERS, SELECTORS } from '../../shared/constants.js';
import { pickRandom } from '../../shared/utils.js';
import type { PageElement, QuestionGroup, QuestionOption } from '../../types/index.js';
import { detectTopicHints } from '../question-classifier.js';
import type { HandlerContext } from '../types.js';
import { BaseControlHandler, type ControlGroup, type HandlerTally } from './base.handler.js';

/**
 * Single-choice questions: native radios and `role="radio"` widgets.
 * One option per unanswered group, matched against the synthesized answer
 * by label, or a random option when nothing matches.
 */
export class RadioHandler extends BaseControlHandler {
  readonly control = 'radio' as const;
  protected readonly tag = 'Radio';

  constructor(context: HandlerContext) {
    super(context, 'radio-handler');
  }

  protected async handle(tally: HandlerTally): Promise<void> {
    const groups = await this.groupControls(await this.findControls(SELECTORS.RADIO));

    for (const group of groups) {
      if (!this.stillRunning(tally)) {
        return;
      }
      const [first] = group.members;
      if (!first) {
        continue;
      }
      if (await this.anySelected(group.members)) {
        this.logger.debug({ groupId: group.groupId }, 'Group already answered');
        continue;
      }

      const question = await this.describe(group, first);
      const labels = question.options.map((o) => o.label);
      const { strategy, value } = this.ctx.synthesizer.answerFor(question.questionText, labels, this.ctx.profile());
      const target = value.toLowerCase();
      const chosen =
        question.options.find((o) => o.label.toLowerCase() === target) ??
        pickRandom(question.options, this.ctx.random);

      this.logger.debug(
        { groupId: group.groupId, question: question.questionText, strategy, hints: detectTopicHints(question.questionText) },
        'Answering single-choice question',
      );

      if (await this.ctx.clicker.click(chosen.element)) {
        this.recordAnswer(tally, chosen.label, group.groupId);
      }
      if (!(await this.pace(tally))) {
        return;
      }
    }
  }

  private async describe(group: ControlGroup, first: PageElement): Promise<QuestionGroup> {
    const options: QuestionOption[] = [];
    for (const element of group.members) {
      options.push({ element, label: await this.optionLabel(element, PLACEHOLDERS.OPTION) });
    }
    const questionText = await this.ctx.labels.questionFor(group.container, first, PLACEHOLDERS.QUESTION);
    return { groupId: group.groupId, questionText, options };
  }
}
