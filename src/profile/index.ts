/**
 * Profile module public API.
 *
 * Response profiles (named answer pools), their validation and the
 * run-configuration store that swaps url, delay window and profile as
 * one value.
 */

export { DEFAULT_PROFILE } from './presets.js';

export { ProfileCatalog } from './profile-catalog.js';

export {
  responseProfileSchema,
  profileFileSchema,
  delayWindowSchema,
  surveyUrlSchema,
  toResponseProfile,
  toDelayWindow,
  toSurveyUrl,
  type ResponseProfileInput,
} from './profile-schema.js';

export {
  RunConfigStore,
  type RunConfigPatch,
  type RunConfigStoreOptions,
} from './run-config-store.js';
