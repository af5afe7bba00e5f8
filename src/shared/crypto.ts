import { createHash, randomUUID } from 'node:crypto';

/**
 * Short, stable SHA-1 digest of arbitrary text. Used where the page offers
 * no identifier to key on.
 */
export function contentHash(text: string, length = 16): string {
  return createHash('sha1').update(text, 'utf8').digest('hex').slice(0, length);
}

/**
 * Generates a unique identifier for sessions and runs.
 */
export function generateId(): string {
  return randomUUID();
}
