import { TIMING } from '../shared/constants.js';
import { randomBetween, sleep, type RandomSource, type Sleeper } from '../shared/timing.js';
import type { DelayWindow } from '../types/index.js';

export interface PacingControllerOptions {
  /** Read on every call so a swapped delay window applies to the next pause. */
  delay: () => DelayWindow;
  isRunning: () => boolean;
  random?: RandomSource;
  sleep?: Sleeper;
  sliceMs?: number;
  jitterSeconds?: number;
}

/**
 * Randomised, interruptible pauses between actions.
 *
 * The pause is slept in fixed slices and the running flag is checked before
 * each one, so a pause or stop takes effect within one slice.
 */
export class PacingController {
  private readonly delay: () => DelayWindow;
  private readonly isRunning: () => boolean;
  private readonly random: RandomSource;
  private readonly sleep: Sleeper;
  private readonly sliceMs: number;
  private readonly jitterSeconds: number;

  constructor(options: PacingControllerOptions) {
    this.delay = options.delay;
    this.isRunning = options.isRunning;
    this.random = options.random ?? Math.random;
    this.sleep = options.sleep ?? sleep;
    this.sliceMs = options.sliceMs ?? TIMING.PACE_SLICE_MS;
    this.jitterSeconds = options.jitterSeconds ?? TIMING.PACE_JITTER_SECONDS;
  }

  /** Draws the next pause length: uniform(min, max) + uniform(0, jitter) seconds. */
  nextDurationMs(): number {
    const window = this.delay();
    const seconds =
      randomBetween(window.min, window.max, this.random) +
      randomBetween(0, this.jitterSeconds, this.random);
    return seconds * 1000;
  }

  /**
   * Resolves true once the whole pause elapsed, false as soon as the run
   * is no longer running.
   */
  async pace(): Promise<boolean> {
    const totalMs = this.nextDurationMs();
    let slept = 0;
    while (slept < totalMs) {
      if (!this.isRunning()) {
        return false;
      }
      await this.sleep(Math.min(this.sliceMs, totalMs - slept));
      slept += this.sliceMs;
    }
    return true;
  }
}
