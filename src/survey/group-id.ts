import { contentHash } from '../shared/crypto.js';

export interface GroupIdentityInput {
  /** Value of the first identifier attribute the container carries. */
  explicitId?: string | null;
  /** Structural position of the container in the document. */
  structuralPath?: string | null;
  /** Text content of the container, hashed when nothing better exists. */
  content: string;
}

/**
 * Stable identity of a question group within one pass.
 *
 * Precedence: explicit identifier attribute, then structural position,
 * then a content hash. The prefix records which source won so ids from
 * different sources never collide.
 */
export function deriveGroupId(input: GroupIdentityInput): string {
  const explicitId = input.explicitId?.trim();
  if (explicitId) {
    return `id:${explicitId}`;
  }

  const path = input.structuralPath?.trim();
  if (path) {
    return `path:${path}`;
  }

  return `hash:${contentHash(input.content)}`;
}
