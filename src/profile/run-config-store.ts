import type { Logger } from 'pino';
import { getLogger } from '../shared/logger.js';
import { DEFAULT_DELAY_WINDOW } from '../shared/constants.js';
import type { DelayWindow, ResponseProfile, RunConfig } from '../types/index.js';
import type { ProfileCatalog } from './profile-catalog.js';
import { toDelayWindow, toResponseProfile, toSurveyUrl } from './profile-schema.js';

/** Partial update accepted from the control surface. */
export interface RunConfigPatch {
  url?: string;
  delayMin?: number;
  delayMax?: number;
  /** A catalog name or a full profile definition. */
  profile?: string | ResponseProfile;
}

export interface RunConfigStoreOptions {
  catalog: ProfileCatalog;
  initialProfile?: string;
  initialDelay?: DelayWindow;
  logger?: Logger;
}

/**
 * Holds the current run configuration as one frozen snapshot.
 *
 * Every update validates the merged result first and then replaces the
 * reference in a single assignment, so a reader holding `current()` sees
 * either the old snapshot or the new one, never a mix. A rejected update
 * leaves the previous snapshot in place.
 */
export class RunConfigStore {
  private snapshot: RunConfig;
  private readonly catalog: ProfileCatalog;
  private readonly logger: Logger;

  constructor(options: RunConfigStoreOptions) {
    this.catalog = options.catalog;
    this.logger = options.logger ?? getLogger('profile', { component: 'run-config' });

    const profile = this.catalog.get(options.initialProfile ?? 'Default');
    const delay = toDelayWindow(options.initialDelay ?? DEFAULT_DELAY_WINDOW);
    this.snapshot = Object.freeze({ delay, profile });
  }

  current(): RunConfig {
    return this.snapshot;
  }

  /**
   * Validates `patch` against the current snapshot and swaps it in.
   * @throws ValidationError | EmptyAnswerPoolError, leaving the snapshot untouched
   */
  update(patch: RunConfigPatch): RunConfig {
    const previous = this.snapshot;

    const url = patch.url !== undefined ? toSurveyUrl(patch.url) : previous.url;
    const delay =
      patch.delayMin !== undefined || patch.delayMax !== undefined
        ? toDelayWindow({
            min: patch.delayMin ?? previous.delay.min,
            max: patch.delayMax ?? previous.delay.max,
          })
        : previous.delay;
    const profile = this.resolveProfile(patch.profile) ?? previous.profile;

    const next: RunConfig = Object.freeze(url !== undefined ? { url, delay, profile } : { delay, profile });
    this.snapshot = next;

    if (next.profile !== previous.profile) {
      this.logger.info({ profile: next.profile.name }, `Profile set to ${next.profile.name}`);
    }
    if (next.delay !== previous.delay) {
      this.logger.info({ min: next.delay.min, max: next.delay.max }, 'Delay window updated');
    }
    return next;
  }

  private resolveProfile(profile: RunConfigPatch['profile']): ResponseProfile | undefined {
    if (profile === undefined) {
      return undefined;
    }
    if (typeof profile === 'string') {
      return this.catalog.get(profile);
    }
    return toResponseProfile(profile);
  }
}
