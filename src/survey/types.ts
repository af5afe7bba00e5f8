/**
 * Type definitions for the survey answering module: the collaborators a
 * control handler works with and the contract every handler fulfils.
 */

import type { Logger } from 'pino';
import type { RobustClicker } from '../browser/robust-clicker.js';
import type { PacingController } from '../runner/pacing-controller.js';
import type { TypedEventEmitter } from '../shared/events.js';
import type { RandomSource } from '../shared/timing.js';
import type {
  BrowserSession,
  ControlKind,
  HandlerResult,
  ResponseProfile,
} from '../types/index.js';
import type { AnswerSynthesizer } from './answer-synthesizer.js';
import type { LabelResolver } from './label-resolver.js';

// ---------------------------------------------------------------------------
// Handler context
// ---------------------------------------------------------------------------

/**
 * Everything a handler needs for one pass. Built by the traversal loop for
 * each browser session.
 */
export interface HandlerContext {
  session: BrowserSession;
  labels: LabelResolver;
  clicker: RobustClicker;
  synthesizer: AnswerSynthesizer;
  pacing: PacingController;
  /** Current value of the run's running flag. */
  isRunning: () => boolean;
  /** Profile of the current configuration snapshot. */
  profile: () => ResponseProfile;
  events: TypedEventEmitter;
  logger: Logger;
  random: RandomSource;
}

// ---------------------------------------------------------------------------
// Handler contract
// ---------------------------------------------------------------------------

export interface ControlHandler {
  readonly control: ControlKind;
  /**
   * Answers every unanswered control of this kind on the current page.
   * Returns early, without error, when the run stops running.
   */
  run(): Promise<HandlerResult>;
}

export type ControlHandlerFactory = (context: HandlerContext) => ControlHandler;
