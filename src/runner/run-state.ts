import type { Logger } from 'pino';
import { getLogger } from '../shared/logger.js';
import { RunStateError } from '../shared/errors.js';
import { eventBus, type TypedEventEmitter } from '../shared/events.js';
import type { RunState, RunStatus } from '../types/index.js';

const ALLOWED: Record<RunStatus, readonly RunStatus[]> = {
  idle: ['running', 'stopped'],
  running: ['paused', 'stopped'],
  paused: ['running', 'stopped'],
  stopped: ['running'],
};

/**
 * Run status with its derived flags. Transitions are synchronous, so a
 * reader never sees `alive` and `running` out of step.
 *
 *   idle ──start──▶ running ──pause──▶ paused ──start──▶ running
 *     any ──stop──▶ stopped ──start──▶ running (fresh session)
 */
export class RunStateMachine {
  private current: RunStatus = 'idle';
  private readonly events: TypedEventEmitter;
  private readonly logger: Logger;

  constructor(events: TypedEventEmitter = eventBus, logger: Logger = getLogger('runner', { component: 'run-state' })) {
    this.events = events;
    this.logger = logger;
  }

  get status(): RunStatus {
    return this.current;
  }

  /** False once stopped; a stopped run needs a fresh start. */
  get alive(): boolean {
    return this.current === 'running' || this.current === 'paused';
  }

  get running(): boolean {
    return this.current === 'running';
  }

  flags(): RunState {
    return { alive: this.alive, running: this.running };
  }

  canTransition(to: RunStatus): boolean {
    return ALLOWED[this.current].includes(to);
  }

  /**
   * Moves to `to`. Returns false for a transition to the current status.
   * @throws RunStateError when the transition is not allowed
   */
  transition(to: RunStatus, reason?: string): boolean {
    const from = this.current;
    if (from === to) {
      return false;
    }
    if (!this.canTransition(to)) {
      throw new RunStateError(`Cannot go from ${from} to ${to}`, from);
    }

    this.current = to;
    this.logger.debug({ from, to, reason }, 'Run status changed');
    this.events.emit('run:status', { from, to, reason });
    return true;
  }
}
