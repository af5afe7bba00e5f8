import { config } from 'dotenv';
import { z } from 'zod';
import { DEFAULT_DELAY_WINDOW, PATHS, TIMING, ANSWER_DEFAULTS } from './shared/constants.js';

// Load .env file before validation
config();

const booleanFlag = (fallback: 'true' | 'false') =>
  z
    .enum(['true', 'false'])
    .default(fallback)
    .transform((v) => v === 'true');

/**
 * Schema for all environment variables consumed by the pilot.
 * Everything has a default so a bare checkout starts; malformed values
 * fail hard at startup.
 */
const envSchema = z
  .object({
    // ---------- General ----------
    NODE_ENV: z
      .enum(['development', 'production', 'test'])
      .default('development'),
    LOG_LEVEL: z
      .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
      .default('info'),
    HOST: z.string().default('127.0.0.1'),
    PORT: z.coerce.number().int().positive().default(3000),

    // ---------- Browser ----------
    /** Headed by default: the operator watches the page and clears challenges by hand. */
    BROWSER_HEADLESS: booleanFlag('false'),
    BROWSER_PROFILE_DIR: z.string().min(1).default(PATHS.BROWSER_PROFILE),
    BROWSER_EXECUTABLE_PATH: z.string().min(1).optional(),
    /** Installed browser channel, e.g. "chrome" or "msedge". */
    BROWSER_CHANNEL: z.string().min(1).optional(),
    VIEWPORT_WIDTH: z.coerce.number().int().positive().default(1200),
    VIEWPORT_HEIGHT: z.coerce.number().int().positive().default(900),
    ACTION_TIMEOUT_MS: z.coerce.number().int().positive().default(TIMING.ACTION_TIMEOUT_MS),
    NAVIGATION_TIMEOUT_MS: z.coerce.number().int().positive().default(TIMING.NAVIGATION_TIMEOUT_MS),

    // ---------- Run defaults ----------
    DELAY_MIN_SECONDS: z.coerce.number().nonnegative().default(DEFAULT_DELAY_WINDOW.min),
    DELAY_MAX_SECONDS: z.coerce.number().nonnegative().default(DEFAULT_DELAY_WINDOW.max),
    DEFAULT_PROFILE: z.string().min(1).default('Default'),
    PROFILES_PATH: z.string().min(1).default(PATHS.PROFILES),
    YES_BIAS: z.coerce.number().min(0).max(1).default(ANSWER_DEFAULTS.YES_BIAS),
    STOP_JOIN_TIMEOUT_MS: z.coerce.number().int().nonnegative().default(TIMING.STOP_JOIN_TIMEOUT_MS),

    // ---------- Log channel ----------
    LOG_BUFFER_SIZE: z.coerce.number().int().positive().default(500),
  })
  .refine((v) => v.DELAY_MIN_SECONDS <= v.DELAY_MAX_SECONDS, {
    message: 'DELAY_MIN_SECONDS must not exceed DELAY_MAX_SECONDS',
    path: ['DELAY_MIN_SECONDS'],
  });

export type Env = z.infer<typeof envSchema>;

function validateEnv(): Env {
  const result = envSchema.safeParse(process.env);

  if (!result.success) {
    const formatted = result.error.issues
      .map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`)
      .join('\n');

    // eslint-disable-next-line no-console
    console.error(
      `\n[env] Invalid environment variables:\n${formatted}\n`,
    );
    throw new Error('Environment validation failed. See above for details.');
  }

  return result.data;
}

/**
 * Typed, validated environment variables.
 * Importing this module will eagerly parse process.env and throw
 * at startup if a variable is malformed.
 */
export const env: Env = validateEnv();
