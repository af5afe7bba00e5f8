import type { ResponseProfile } from '../types/index.js';

/**
 * Profile of last resort. Used when the profile file is missing and as
 * the initial profile of every run configuration.
 */
export const DEFAULT_PROFILE: ResponseProfile = Object.freeze({
  name: 'Default',
  description: 'Balanced responses. Risk: Low.',
  shortAnswers: Object.freeze(['Yes', 'No', 'Maybe', 'Sure', 'I agree']),
  longAnswers: Object.freeze([
    "I think that's reasonable and I'd consider it.",
    'No additional comments.',
    "I don't have a strong preference.",
    'This seems okay to me.',
  ]),
});
