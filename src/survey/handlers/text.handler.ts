import { PLACEHOLDERS, SELECTORS } from '../../shared/constants.js';
import { errorMessage } from '../../shared/errors.js';
import type { PageElement } from '../../types/index.js';
import type { HandlerContext } from '../types.js';
import { BaseControlHandler, type HandlerTally } from './base.handler.js';

/**
 * Shared logic of the free-text handlers: fill every empty field with an
 * answer synthesized from its label. Fields that already hold text are
 * never overwritten.
 */
abstract class FreeTextHandler extends BaseControlHandler {
  protected abstract readonly selector: string;
  protected abstract readonly placeholder: string;

  protected async handle(tally: HandlerTally): Promise<void> {
    const fields = await this.findControls(this.selector);

    for (const field of fields) {
      if (!this.stillRunning(tally)) {
        return;
      }
      if (!(await this.isEmpty(field))) {
        continue;
      }

      const question = (await this.ctx.labels.resolve(field)) || this.placeholder;
      const { value } = this.ctx.synthesizer.answerFor(question, [], this.ctx.profile());

      try {
        await this.ctx.session.clear(field);
      } catch (error) {
        this.logger.debug({ error: errorMessage(error) }, 'Clearing field failed');
      }

      try {
        await this.ctx.session.typeText(field, value);
        this.recordAnswer(tally, value);
      } catch (error) {
        this.logger.warn({ question, error: errorMessage(error) }, `${this.tag} fill error`);
      }

      if (!(await this.pace(tally))) {
        return;
      }
    }
  }

  /** An unreadable field counts as filled so it is left alone. */
  private async isEmpty(field: PageElement): Promise<boolean> {
    try {
      return (await this.ctx.session.getValue(field)).trim() === '';
    } catch (error) {
      this.logger.debug({ error: errorMessage(error) }, 'Field value unreadable');
      return false;
    }
  }
}

export class TextInputHandler extends FreeTextHandler {
  readonly control = 'text' as const;
  protected readonly tag = 'Text';
  protected readonly selector = SELECTORS.TEXT_INPUT;
  protected readonly placeholder = PLACEHOLDERS.TEXT;

  constructor(context: HandlerContext) {
    super(context, 'text-handler');
  }
}

export class TextAreaHandler extends FreeTextHandler {
  readonly control = 'textarea' as const;
  protected readonly tag = 'Textarea';
  protected readonly selector = SELECTORS.TEXTAREA;
  protected readonly placeholder = PLACEHOLDERS.TEXTAREA;

  constructor(context: HandlerContext) {
    super(context, 'textarea-handler');
  }
}
