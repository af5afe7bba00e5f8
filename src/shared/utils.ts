/**
 * General-purpose utility functions used across every module.
 * All functions are pure (no side effects, no I/O) unless noted.
 */

import type { RandomSource } from './timing.js';

// ---------------------------------------------------------------------------
// String utilities
// ---------------------------------------------------------------------------

/**
 * Collapses runs of whitespace into single spaces and trims the ends.
 */
export function normalizeWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Truncates text to `maxLen` characters, appending an ellipsis if shortened.
 */
export function truncate(text: string, maxLen: number): string {
  if (text.length <= maxLen) {
    return text;
  }
  return text.slice(0, maxLen - 1) + '…'; // unicode ellipsis
}

/**
 * True when `word` occurs in `text` as a whole word (case-insensitive).
 */
export function containsWord(text: string, word: string): boolean {
  const escaped = word.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
  return new RegExp(`(^|[^a-z0-9])${escaped}($|[^a-z0-9])`, 'i').test(text);
}

// ---------------------------------------------------------------------------
// Array utilities
// ---------------------------------------------------------------------------

/**
 * Returns a random element from the array.
 * Throws if the array is empty.
 */
export function pickRandom<T>(arr: readonly T[], random: RandomSource = Math.random): T {
  const picked = arr[Math.floor(random() * arr.length)];
  if (picked === undefined) {
    throw new Error('Cannot pick from an empty array');
  }
  return picked;
}

/**
 * Returns `count` distinct elements drawn uniformly without replacement
 * (partial Fisher-Yates). Does NOT mutate the original array.
 */
export function sampleWithoutReplacement<T>(
  arr: readonly T[],
  count: number,
  random: RandomSource = Math.random,
): T[] {
  const pool = [...arr];
  const take = Math.max(0, Math.min(count, pool.length));
  const picked: T[] = [];
  for (let i = 0; i < take; i++) {
    const j = i + Math.floor(random() * (pool.length - i));
    const chosen = pool[j];
    const displaced = pool[i];
    if (chosen === undefined || displaced === undefined) {
      break;
    }
    pool[j] = displaced;
    picked.push(chosen);
  }
  return picked;
}
