/**
 * Shared plumbing for the control handlers: control discovery, grouping
 * into questions, selection checks, answer bookkeeping and pacing.
 */

import type { Logger } from 'pino';
import { ANSWER_DEFAULTS, GROUP_ID_ATTRIBUTES, SELECTORS } from '../../shared/constants.js';
import { errorMessage } from '../../shared/errors.js';
import { randomInt, type RandomSource } from '../../shared/timing.js';
import type { ControlKind, HandlerResult, PageElement } from '../../types/index.js';
import { deriveGroupId } from '../group-id.js';
import type { ControlHandler, HandlerContext } from '../types.js';

export interface ControlGroup {
  groupId: string;
  /**
   * Nearest fieldset or ARIA group around the first member, else its
   * nearest `div`; null when it has neither.
   */
  container: PageElement | null;
  /** In document order; never empty. */
  members: PageElement[];
}

/** Group under construction, with the key that decides membership. */
interface PendingGroup extends ControlGroup {
  name: string | null;
}

/** Mutable progress of one handler run. */
export interface HandlerTally {
  committed: number;
  interrupted: boolean;
}

/**
 * How many answers a multi-choice question gets: uniform in
 * [min(2, n), min(5, n)] for n candidates.
 */
export function multiChoiceCount(candidates: number, random: RandomSource = Math.random): number {
  if (candidates <= 0) {
    return 0;
  }
  const lo = Math.min(ANSWER_DEFAULTS.MULTI_CHOICE_MIN, candidates);
  const hi = Math.min(ANSWER_DEFAULTS.MULTI_CHOICE_MAX, candidates);
  return randomInt(lo, hi, random);
}

export abstract class BaseControlHandler implements ControlHandler {
  abstract readonly control: ControlKind;
  /** Prefix of the per-answer log line, e.g. "Radio". */
  protected abstract readonly tag: string;

  protected readonly ctx: HandlerContext;
  protected readonly logger: Logger;

  constructor(context: HandlerContext, component: string) {
    this.ctx = context;
    this.logger = context.logger.child({ component });
  }

  async run(): Promise<HandlerResult> {
    const tally: HandlerTally = { committed: 0, interrupted: false };
    await this.handle(tally);
    return { control: this.control, committed: tally.committed, interrupted: tally.interrupted };
  }

  protected abstract handle(tally: HandlerTally): Promise<void>;

  // -------------------------------------------------------------------------
  // Discovery
  // -------------------------------------------------------------------------

  /** All controls matching `selector` on the page; empty when the query fails. */
  protected async findControls(selector: string): Promise<PageElement[]> {
    try {
      return await this.ctx.session.findAll(null, 'css', selector);
    } catch (error) {
      this.logger.warn({ selector, error: errorMessage(error) }, 'Control query failed');
      return [];
    }
  }

  /**
   * Splits `controls` into questions, in order of first appearance.
   *
   * Native controls sharing a `name` form one question wherever they sit.
   * Unnamed controls (ARIA widgets, stray inputs) are grouped by their
   * container. Two questions that share a container get the name appended
   * to the container's id so every group id of the pass is distinct.
   */
  protected async groupControls(controls: readonly PageElement[]): Promise<ControlGroup[]> {
    const groups: PendingGroup[] = [];
    const byKey = new Map<string, PendingGroup>();

    for (const control of controls) {
      const name = await this.controlName(control);
      const container = await this.nearestContainer(control);
      const scopeId = await this.identify(container ?? control);
      const key = name !== null ? `name:${name}` : `scope:${scopeId}`;

      const existing = byKey.get(key);
      if (existing) {
        existing.members.push(control);
        continue;
      }
      const group: PendingGroup = { groupId: scopeId, container, members: [control], name };
      byKey.set(key, group);
      groups.push(group);
    }

    const perScope = new Map<string, number>();
    for (const group of groups) {
      perScope.set(group.groupId, (perScope.get(group.groupId) ?? 0) + 1);
    }

    return groups.map(({ groupId, container, members, name }) => ({
      groupId: (perScope.get(groupId) ?? 0) > 1 && name !== null ? `${groupId}/${name}` : groupId,
      container,
      members,
    }));
  }

  protected async isSelected(element: PageElement): Promise<boolean> {
    try {
      return await this.ctx.session.isSelected(element);
    } catch (error) {
      this.logger.debug({ error: errorMessage(error) }, 'Selection state unreadable');
      return false;
    }
  }

  protected async anySelected(elements: readonly PageElement[]): Promise<boolean> {
    for (const element of elements) {
      if (await this.isSelected(element)) {
        return true;
      }
    }
    return false;
  }

  /** Label of an option: resolved label, then its value, then `placeholder`. */
  protected async optionLabel(element: PageElement, placeholder: string): Promise<string> {
    const label = await this.ctx.labels.resolve(element);
    if (label) {
      return label;
    }
    try {
      const value = (await this.ctx.session.getAttribute(element, 'value'))?.trim();
      if (value) {
        return value;
      }
    } catch (error) {
      this.logger.debug({ error: errorMessage(error) }, 'Option value unreadable');
    }
    return placeholder;
  }

  // -------------------------------------------------------------------------
  // Progress
  // -------------------------------------------------------------------------

  /**
   * True while the run is running; marks the tally interrupted otherwise.
   */
  protected stillRunning(tally: HandlerTally): boolean {
    if (!this.ctx.isRunning()) {
      tally.interrupted = true;
      return false;
    }
    return true;
  }

  /** Paces before the next commit. False means stop handling. */
  protected async pace(tally: HandlerTally): Promise<boolean> {
    const completed = await this.ctx.pacing.pace();
    if (!completed) {
      tally.interrupted = true;
    }
    return completed;
  }

  protected recordAnswer(tally: HandlerTally, answer: string, groupId?: string, tag = this.tag): void {
    tally.committed += 1;
    this.logger.info({ control: this.control, groupId }, `[${tag}] → ${answer}`);
    this.ctx.events.emit('run:answer', { control: this.control, answer, groupId });
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  private async controlName(control: PageElement): Promise<string | null> {
    try {
      return (await this.ctx.session.getAttribute(control, 'name'))?.trim() || null;
    } catch (error) {
      this.logger.debug({ error: errorMessage(error) }, 'Control name unreadable');
      return null;
    }
  }

  private async nearestContainer(control: PageElement): Promise<PageElement | null> {
    for (const selector of [SELECTORS.GROUP_SCOPE, SELECTORS.GROUP_CONTAINER]) {
      try {
        const [container] = await this.ctx.session.findAll(control, 'ancestor', selector);
        if (container) {
          return container;
        }
      } catch (error) {
        this.logger.debug({ selector, error: errorMessage(error) }, 'Container query failed');
      }
    }
    return null;
  }

  private async identify(element: PageElement): Promise<string> {
    const { session } = this.ctx;

    let explicitId: string | null = null;
    for (const attribute of GROUP_ID_ATTRIBUTES) {
      try {
        explicitId = (await session.getAttribute(element, attribute))?.trim() || null;
      } catch (error) {
        this.logger.debug({ attribute, error: errorMessage(error) }, 'Identifier attribute unreadable');
      }
      if (explicitId) {
        break;
      }
    }

    let structuralPath: string | null = null;
    let content = '';
    if (!explicitId) {
      try {
        structuralPath = await session.structuralPath(element);
      } catch (error) {
        this.logger.debug({ error: errorMessage(error) }, 'Structural path unavailable');
      }
      if (!structuralPath) {
        try {
          content = await session.getText(element);
        } catch (error) {
          this.logger.debug({ error: errorMessage(error) }, 'Group content unreadable');
        }
      }
    }

    return deriveGroupId({ explicitId, structuralPath, content });
  }
}
