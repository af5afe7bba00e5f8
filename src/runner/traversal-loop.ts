/**
 * Top-level state machine of a survey run.
 *
 * Owns the run status, the browser session and a single async worker. The
 * worker is the only code that touches the page; the control operations
 * (`start`, `pause`, `stop`, `openUrl`, `configure`) only flip state and
 * manage the session, and the ones that await are serialised by a mutex.
 */

import type { Logger } from 'pino';
import { logger as rootLogger } from '../shared/logger.js';
import { TIMING } from '../shared/constants.js';
import { RunStateError, ValidationError, errorMessage } from '../shared/errors.js';
import { eventBus, type TypedEventEmitter } from '../shared/events.js';
import { sleep, type RandomSource, type Sleeper } from '../shared/timing.js';
import { RobustClicker } from '../browser/robust-clicker.js';
import { ChallengeDetector } from '../captcha/index.js';
import type { RunConfigPatch, RunConfigStore } from '../profile/index.js';
import {
  AnswerSynthesizer,
  LabelResolver,
  PageAdvancer,
  createDefaultHandlers,
  type ControlHandler,
  type HandlerContext,
} from '../survey/index.js';
import type {
  BrowserDriver,
  BrowserSession,
  RunSnapshot,
  SessionConfig,
} from '../types/index.js';
import { PacingController } from './pacing-controller.js';
import { RunStateMachine } from './run-state.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface TraversalLoopOptions {
  driver: BrowserDriver;
  sessionConfig: SessionConfig;
  config: RunConfigStore;
  events?: TypedEventEmitter;
  /** Base logger; components log through children of it. */
  logger?: Logger;
  random?: RandomSource;
  sleep?: Sleeper;
  /** Probability of "Yes" for yes/no questions. */
  yesBias?: number;
  /** How often an idle (paused) worker rechecks its flags. */
  idlePollMs?: number;
  /** Settling time after a progression click. */
  afterAdvanceMs?: number;
  /** Upper bound on the wait for the worker in `stop`. */
  joinTimeoutMs?: number;
  /** Builds the handlers of one pass, in the order they run. */
  handlers?: (context: HandlerContext) => ControlHandler[];
}

/** Per-session collaborators of the worker. */
interface PassContext {
  generation: number;
  isRunning: () => boolean;
  detector: ChallengeDetector;
  handlers: ControlHandler[];
  advancer: PageAdvancer;
}

interface RunCounters {
  passes: number;
  pagesAdvanced: number;
  answersCommitted: number;
}

// ---------------------------------------------------------------------------
// Loop
// ---------------------------------------------------------------------------

export class TraversalLoop {
  private readonly driver: BrowserDriver;
  private readonly sessionConfig: SessionConfig;
  private readonly configStore: RunConfigStore;
  private readonly events: TypedEventEmitter;
  private readonly baseLogger: Logger;
  private readonly logger: Logger;
  private readonly random: RandomSource;
  private readonly sleep: Sleeper;
  private readonly synthesizer: AnswerSynthesizer;
  private readonly idlePollMs: number;
  private readonly afterAdvanceMs: number;
  private readonly joinTimeoutMs: number;
  private readonly buildHandlers: (context: HandlerContext) => ControlHandler[];

  private readonly state: RunStateMachine;
  private session: BrowserSession | null = null;
  private worker: Promise<void> | null = null;
  /** Bumped on every spawn and stop; a worker from an older generation exits. */
  private generation = 0;
  private mutex: Promise<void> = Promise.resolve();
  private counters: RunCounters = { passes: 0, pagesAdvanced: 0, answersCommitted: 0 };

  constructor(options: TraversalLoopOptions) {
    this.driver = options.driver;
    this.sessionConfig = options.sessionConfig;
    this.configStore = options.config;
    this.events = options.events ?? eventBus;
    this.baseLogger = options.logger ?? rootLogger;
    this.logger = this.baseLogger.child({ module: 'runner', component: 'traversal-loop' });
    this.random = options.random ?? Math.random;
    this.sleep = options.sleep ?? sleep;
    this.synthesizer = new AnswerSynthesizer({ yesBias: options.yesBias, random: this.random });
    this.idlePollMs = options.idlePollMs ?? TIMING.IDLE_POLL_MS;
    this.afterAdvanceMs = options.afterAdvanceMs ?? TIMING.AFTER_ADVANCE_MS;
    this.joinTimeoutMs = options.joinTimeoutMs ?? TIMING.STOP_JOIN_TIMEOUT_MS;
    this.buildHandlers = options.handlers ?? createDefaultHandlers;
    this.state = new RunStateMachine(this.events, this.baseLogger.child({ module: 'runner', component: 'run-state' }));
  }

  // -------------------------------------------------------------------------
  // Control operations
  // -------------------------------------------------------------------------

  /**
   * Applies `request` to the run configuration, then starts or resumes.
   *
   * From idle or stopped a URL is needed (in the request, the stored
   * configuration, or a page already opened with `openUrl`); a session is
   * opened and the worker spawned. From paused the run resumes on the page
   * it is showing. From running only the configuration changes.
   *
   * @throws ValidationError | EmptyAnswerPoolError for a bad configuration
   * @throws SessionStartError when the browser cannot be started
   */
  async start(request: RunConfigPatch = {}): Promise<RunSnapshot> {
    return this.exclusive(async () => {
      const config = this.configStore.update(request);

      switch (this.state.status) {
        case 'running':
          return this.snapshot();

        case 'paused':
          this.state.transition('running', 'resumed');
          this.logger.info('Automation resumed');
          return this.snapshot();

        case 'idle':
        case 'stopped': {
          const hadSession = this.session !== null;
          if (!config.url && !hadSession) {
            throw new ValidationError('A survey URL is required to start', 'url');
          }

          const session = await this.ensureSession();
          if (config.url && (!hadSession || request.url !== undefined)) {
            await this.navigateQuietly(session, config.url);
          }

          this.counters = { passes: 0, pagesAdvanced: 0, answersCommitted: 0 };
          this.state.transition('running', 'started');
          this.spawnWorker(session);
          this.logger.info({ profile: config.profile.name }, 'Automation started');
          return this.snapshot();
        }
      }
    });
  }

  /**
   * Pauses a running run. The session stays open and the page untouched.
   * @throws RunStateError when the run was never started or is stopped
   */
  pause(reason = 'operator'): RunSnapshot {
    if (this.state.status === 'paused') {
      return this.snapshot();
    }
    if (this.state.status !== 'running') {
      throw new RunStateError(`Cannot pause a run that is ${this.state.status}`, this.state.status);
    }
    this.state.transition('paused', reason);
    this.logger.info('Paused');
    return this.snapshot();
  }

  /**
   * Stops the worker (waiting at most `joinTimeoutMs`) and closes the
   * browser session. Safe to call in any status.
   */
  async stop(): Promise<RunSnapshot> {
    return this.exclusive(async () => {
      this.generation += 1;
      if (this.state.status !== 'stopped') {
        this.state.transition('stopped', 'operator');
      }

      const worker = this.worker;
      this.worker = null;
      if (worker && !(await this.join(worker))) {
        this.logger.warn({ timeoutMs: this.joinTimeoutMs }, 'Worker did not stop in time');
      }

      const session = this.session;
      this.session = null;
      if (session) {
        try {
          await session.close();
          this.logger.info('Driver closed');
        } catch (error) {
          this.logger.error({ error: errorMessage(error) }, 'Error closing driver');
        }
      }
      return this.snapshot();
    });
  }

  /**
   * Opens `url` in the session (starting the browser if needed) without
   * starting the run, so the operator can log in or look around first.
   * @throws RunStateError while running
   */
  async openUrl(url: string): Promise<RunSnapshot> {
    return this.exclusive(async () => {
      if (this.state.running) {
        throw new RunStateError('Pause the run before opening another page', this.state.status);
      }
      const config = this.configStore.update({ url });
      const session = await this.ensureSession();
      if (config.url) {
        await session.navigate(config.url);
      }
      return this.snapshot();
    });
  }

  /** Swaps delay window and/or profile; takes effect at the worker's next read. */
  configure(patch: Omit<RunConfigPatch, 'url'>): RunSnapshot {
    this.configStore.update(patch);
    return this.snapshot();
  }

  snapshot(): RunSnapshot {
    const config = this.configStore.current();
    return {
      status: this.state.status,
      ...this.state.flags(),
      url: config.url ?? null,
      profile: config.profile.name,
      delay: { min: config.delay.min, max: config.delay.max },
      ...this.counters,
    };
  }

  // -------------------------------------------------------------------------
  // Worker
  // -------------------------------------------------------------------------

  private spawnWorker(session: BrowserSession): void {
    this.generation += 1;
    const pass = this.buildPass(session, this.generation);
    this.worker = this.work(pass);
  }

  private buildPass(session: BrowserSession, generation: number): PassContext {
    const isRunning = (): boolean => this.state.running && this.generation === generation;
    const child = (module: string, component: string): Logger => this.baseLogger.child({ module, component });

    const clicker = new RobustClicker(session, { logger: child('browser', 'robust-clicker'), sleep: this.sleep });
    const pacing = new PacingController({
      delay: () => this.configStore.current().delay,
      isRunning,
      random: this.random,
      sleep: this.sleep,
    });

    const context: HandlerContext = {
      session,
      labels: new LabelResolver(session, child('survey', 'label-resolver')),
      clicker,
      synthesizer: this.synthesizer,
      pacing,
      isRunning,
      profile: () => this.configStore.current().profile,
      events: this.events,
      logger: this.baseLogger.child({ module: 'survey' }),
      random: this.random,
    };

    return {
      generation,
      isRunning,
      detector: new ChallengeDetector(session, child('captcha', 'challenge-detector')),
      handlers: this.buildHandlers(context),
      advancer: new PageAdvancer(session, {
        clicker,
        events: this.events,
        logger: child('survey', 'page-advancer'),
      }),
    };
  }

  /** Never rejects: every failure inside a pass pauses the run instead. */
  private async work(pass: PassContext): Promise<void> {
    this.logger.debug({ generation: pass.generation }, 'Worker ready');

    while (this.state.alive && this.generation === pass.generation) {
      if (!pass.isRunning()) {
        await this.sleep(this.idlePollMs);
        continue;
      }

      try {
        await this.runPass(pass);
      } catch (error) {
        const message = errorMessage(error);
        this.logger.error({ error: message }, 'Automation loop error');
        this.events.emit('run:error', { error: message });
        this.pauseFromWorker(pass, 'error');
      }
    }

    this.logger.debug({ generation: pass.generation }, 'Worker stopped');
  }

  private async runPass(pass: PassContext): Promise<void> {
    this.counters.passes += 1;

    const challenge = await pass.detector.detect();
    if (challenge) {
      this.logger.warn({ kind: challenge.kind, marker: challenge.marker }, 'Captcha detected, solve it in the browser. Automation paused');
      this.events.emit('run:challenge', { kind: challenge.kind, marker: challenge.marker });
      this.pauseFromWorker(pass, 'challenge');
      return;
    }

    for (const handler of pass.handlers) {
      if (!pass.isRunning()) {
        return;
      }
      const result = await handler.run();
      this.counters.answersCommitted += result.committed;
      if (result.interrupted) {
        return;
      }
    }
    if (!pass.isRunning()) {
      return;
    }

    if (!(await pass.advancer.advance())) {
      this.logger.warn('No next/submit control, pausing');
      this.pauseFromWorker(pass, 'dead-end');
      return;
    }

    this.counters.pagesAdvanced += 1;
    await this.settle(pass);
  }

  /** Waits for the next page, in idle-poll slices so a pause cuts it short. */
  private async settle(pass: PassContext): Promise<void> {
    let waited = 0;
    while (waited < this.afterAdvanceMs && pass.isRunning()) {
      const slice = Math.min(this.idlePollMs, this.afterAdvanceMs - waited);
      await this.sleep(slice);
      waited += slice;
    }
  }

  private pauseFromWorker(pass: PassContext, reason: string): void {
    if (this.generation === pass.generation && this.state.running) {
      this.state.transition('paused', reason);
    }
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  private async ensureSession(): Promise<BrowserSession> {
    if (!this.session) {
      this.session = await this.driver.openSession(this.sessionConfig);
    }
    return this.session;
  }

  private async navigateQuietly(session: BrowserSession, url: string): Promise<void> {
    try {
      await session.navigate(url);
    } catch (error) {
      this.logger.error({ url, error: errorMessage(error) }, 'Navigation failed, starting on the current page');
    }
  }

  /** Resolves true when the worker finished within the join timeout. */
  private async join(worker: Promise<void>): Promise<boolean> {
    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<boolean>((resolve) => {
      timer = setTimeout(() => resolve(false), this.joinTimeoutMs);
    });
    try {
      return await Promise.race([worker.then(() => true), timeout]);
    } finally {
      clearTimeout(timer);
    }
  }

  private exclusive<T>(operation: () => Promise<T>): Promise<T> {
    const result = this.mutex.then(operation, operation);
    this.mutex = result.then(
      () => undefined,
      () => undefined,
    );
    return result;
  }
}
