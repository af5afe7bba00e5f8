/**
 * Named response profiles available to a run.
 *
 * Profiles are read once from a JSON file (`config/profiles.json` by
 * default) and validated; each one is frozen. A missing file leaves the
 * catalog with the built-in Default profile only.
 */

import { readFileSync } from 'node:fs';
import type { Logger } from 'pino';
import { getLogger } from '../shared/logger.js';
import { ValidationError, errorMessage } from '../shared/errors.js';
import type { ResponseProfile } from '../types/index.js';
import { DEFAULT_PROFILE } from './presets.js';
import { profileFileSchema, toResponseProfile } from './profile-schema.js';

export class ProfileCatalog {
  private readonly profiles = new Map<string, ResponseProfile>();

  constructor(profiles: readonly ResponseProfile[] = [DEFAULT_PROFILE]) {
    for (const profile of profiles) {
      this.profiles.set(profile.name, profile);
    }
    if (this.profiles.size === 0) {
      this.profiles.set(DEFAULT_PROFILE.name, DEFAULT_PROFILE);
    }
  }

  /**
   * Loads the catalog from a JSON file of the form `{ "profiles": [...] }`.
   * Throws ValidationError (or EmptyAnswerPoolError) when the file exists
   * but does not hold valid profiles.
   */
  static fromFile(path: string, logger: Logger = getLogger('profile', { component: 'profile-catalog' })): ProfileCatalog {
    let raw: string;
    try {
      raw = readFileSync(path, 'utf8');
    } catch (error) {
      logger.warn({ path, error: errorMessage(error) }, 'Profile file not readable, using built-in Default profile');
      return new ProfileCatalog();
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      throw new ValidationError(`Profile file is not valid JSON: ${errorMessage(error)}`, 'profiles', path);
    }

    const parsed = profileFileSchema.safeParse(json);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new ValidationError(
        `Profile file is invalid: ${issue?.message ?? 'unknown issue'}`,
        issue ? issue.path.join('.') : 'profiles',
        path,
      );
    }

    const profiles = parsed.data.profiles.map((p) => toResponseProfile(p));
    logger.info({ path, count: profiles.length }, 'Response profiles loaded');
    return new ProfileCatalog(profiles);
  }

  has(name: string): boolean {
    return this.profiles.has(name);
  }

  /**
   * @throws ValidationError when no profile carries that name.
   */
  get(name: string): ResponseProfile {
    const profile = this.profiles.get(name);
    if (!profile) {
      throw new ValidationError(`Unknown response profile "${name}"`, 'profile', name);
    }
    return profile;
  }

  list(): ResponseProfile[] {
    return [...this.profiles.values()];
  }
}
