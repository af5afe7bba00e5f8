/**
 * Timing helpers shared by the pacing controller and the runner.
 */

/**
 * Returns a promise that resolves after `ms` milliseconds.
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, Math.max(0, ms)));
}

export type Sleeper = (ms: number) => Promise<void>;

/** Source of uniform values in [0, 1). `Math.random` in production. */
export type RandomSource = () => number;

/**
 * Returns a random number uniformly distributed in [min, max].
 */
export function randomBetween(min: number, max: number, random: RandomSource = Math.random): number {
  return min + random() * (max - min);
}

/**
 * Returns a random integer uniformly distributed in [min, max] (both inclusive).
 */
export function randomInt(min: number, max: number, random: RandomSource = Math.random): number {
  const lo = Math.ceil(min);
  const hi = Math.floor(max);
  return lo + Math.floor(random() * (hi - lo + 1));
}

/**
 * Wall-clock time of day as HH:MM:SS (local time).
 */
export function formatClock(date: Date): string {
  const pad = (n: number): string => String(n).padStart(2, '0');
  return `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}
