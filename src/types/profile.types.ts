/**
 * A named bundle of free-text answers representing a persona.
 * Frozen once loaded; switching profiles replaces the whole value.
 */
export interface ResponseProfile {
  readonly name: string;
  /** Single words or short phrases. */
  readonly shortAnswers: readonly string[];
  /** Multi-sentence answers for open questions. */
  readonly longAnswers: readonly string[];
  readonly description: string;
}

/** Pause bounds between actions, in seconds. */
export interface DelayWindow {
  readonly min: number;
  readonly max: number;
}

/**
 * Everything the worker reads while running. Replaced as a whole; the
 * worker never observes a mix of old and new fields.
 */
export interface RunConfig {
  readonly url?: string;
  readonly delay: DelayWindow;
  readonly profile: ResponseProfile;
}
