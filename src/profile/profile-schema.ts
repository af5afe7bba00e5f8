/**
 * Zod schemas for response profiles and run configuration, plus the
 * converters that turn validated input into frozen domain values.
 */

import { z } from 'zod';
import { EmptyAnswerPoolError, ValidationError } from '../shared/errors.js';
import type { DelayWindow, ResponseProfile } from '../types/index.js';

// ---------------------------------------------------------------------------
// Schemas
// ---------------------------------------------------------------------------

const answerSchema = z.string().trim().min(1, 'Answers must not be blank');

export const responseProfileSchema = z.object({
  name: z.string().trim().min(1, 'Profile name is required').max(64),
  description: z.string().trim().max(500).default(''),
  shortAnswers: z.array(answerSchema),
  longAnswers: z.array(answerSchema),
});

export type ResponseProfileInput = z.input<typeof responseProfileSchema>;

export const profileFileSchema = z.object({
  profiles: z.array(responseProfileSchema).min(1, 'At least one profile is required'),
});

export const delayWindowSchema = z
  .object({
    min: z.number().finite().nonnegative(),
    max: z.number().finite().nonnegative(),
  })
  .refine((w) => w.min <= w.max, {
    message: 'Minimum delay must not exceed maximum delay',
    path: ['min'],
  });

export const surveyUrlSchema = z
  .string()
  .trim()
  .url('Must be an absolute URL')
  .refine((u) => /^https?:|^file:/i.test(u), 'Only http, https and file URLs can be opened');

// ---------------------------------------------------------------------------
// Converters
// ---------------------------------------------------------------------------

function toValidationError(error: z.ZodError, fallbackField: string, value: unknown): ValidationError {
  const issue = error.issues[0];
  const field =
    issue && issue.path.length > 0 ? `${fallbackField}.${issue.path.join('.')}` : fallbackField;
  return new ValidationError(issue?.message ?? 'Invalid value', field, value);
}

/**
 * Validates raw profile data and returns a deeply frozen profile.
 * Empty answer pools are rejected here so synthesis never meets one.
 */
export function toResponseProfile(input: unknown): ResponseProfile {
  const parsed = responseProfileSchema.safeParse(input);
  if (!parsed.success) {
    throw toValidationError(parsed.error, 'profile', input);
  }

  const { name, description, shortAnswers, longAnswers } = parsed.data;
  if (shortAnswers.length === 0) {
    throw new EmptyAnswerPoolError(`Profile "${name}" has no short answers`, 'shortAnswers', name);
  }
  if (longAnswers.length === 0) {
    throw new EmptyAnswerPoolError(`Profile "${name}" has no long answers`, 'longAnswers', name);
  }

  return Object.freeze({
    name,
    description,
    shortAnswers: Object.freeze([...shortAnswers]),
    longAnswers: Object.freeze([...longAnswers]),
  });
}

export function toDelayWindow(input: { min: number; max: number }): DelayWindow {
  const parsed = delayWindowSchema.safeParse(input);
  if (!parsed.success) {
    throw toValidationError(parsed.error, 'delay', input);
  }
  return Object.freeze({ min: parsed.data.min, max: parsed.data.max });
}

export function toSurveyUrl(input: string): string {
  const parsed = surveyUrlSchema.safeParse(input);
  if (!parsed.success) {
    throw toValidationError(parsed.error, 'url', input);
  }
  return parsed.data;
}
