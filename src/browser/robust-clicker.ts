/**
 * Click with escalation.
 *
 * Some survey frameworks ignore a plain element click and only react to a
 * real pointer path or to the full native mouse-event sequence. The ladder
 * tries the cheap option first and stops at the first stage that does not
 * raise.
 */

import type { Logger } from 'pino';
import { getLogger } from '../shared/logger.js';
import { TIMING } from '../shared/constants.js';
import { errorMessage } from '../shared/errors.js';
import { sleep, type Sleeper } from '../shared/timing.js';
import type { BrowserSession, PageElement, SyntheticEventType } from '../types/index.js';

const SYNTHETIC_SEQUENCE: readonly SyntheticEventType[] = [
  'mouseover',
  'mousemove',
  'mousedown',
  'mouseup',
  'click',
];

export type ClickStage = 'direct' | 'pointer' | 'synthetic';

export interface RobustClickerOptions {
  logger?: Logger;
  sleep?: Sleeper;
  scrollSettleMs?: number;
}

export class RobustClicker {
  private readonly session: BrowserSession;
  private readonly logger: Logger;
  private readonly sleep: Sleeper;
  private readonly scrollSettleMs: number;

  constructor(session: BrowserSession, options: RobustClickerOptions = {}) {
    this.session = session;
    this.logger = options.logger ?? getLogger('browser', { component: 'robust-clicker' });
    this.sleep = options.sleep ?? sleep;
    this.scrollSettleMs = options.scrollSettleMs ?? TIMING.SCROLL_SETTLE_MS;
  }

  /**
   * Returns true when any stage succeeded. Never throws.
   */
  async click(element: PageElement): Promise<boolean> {
    return (await this.clickWithStage(element)) !== null;
  }

  /**
   * Same as `click`, but reports which stage landed (null when none did).
   */
  async clickWithStage(element: PageElement): Promise<ClickStage | null> {
    try {
      await this.session.click(element);
      return 'direct';
    } catch (error) {
      this.logger.debug({ error: errorMessage(error) }, 'Direct click failed, trying pointer');
    }

    try {
      await this.session.pointerClick(element);
      return 'pointer';
    } catch (error) {
      this.logger.debug({ error: errorMessage(error) }, 'Pointer click failed, dispatching events');
    }

    try {
      await this.session.scrollIntoView(element);
      await this.sleep(this.scrollSettleMs);
    } catch (error) {
      this.logger.debug({ error: errorMessage(error) }, 'Scroll into view failed');
    }

    try {
      await this.session.dispatchSyntheticEvents(element, SYNTHETIC_SEQUENCE);
      return 'synthetic';
    } catch (error) {
      this.logger.warn({ error: errorMessage(error) }, 'Click failed');
      return null;
    }
  }
}
