// ═══════════════════════════════════════════════════════════════════════════════
// RETRY OPTION SCHEMAS — Validation for Literal and Stored Options
// ═══════════════════════════════════════════════════════════════════════════════

import { z } from 'zod';
import {
  ConfigurationError,
  type AfterHook,
  type ErrorClass,
  type ErrorValuePredicate,
  type RetryEvent,
  type RetryOptions,
} from './types.js';

function isFunction(value: unknown): boolean {
  return typeof value === 'function';
}

// ─────────────────────────────────────────────────────────────────────────────────
// ENTRIES
// ─────────────────────────────────────────────────────────────────────────────────

function isConstructor(value: unknown): boolean {
  return typeof value === 'function' && typeof value.prototype === 'object';
}

export const ErrorClassSchema = z.custom<ErrorClass>(isConstructor, {
  message: 'Expected an error class',
});

export const FailureKindSchema = z.union([
  z.string().min(1, 'Error name must not be empty'),
  ErrorClassSchema,
]);

export const ErrorValueSelectorSchema = z
  .object({
    error: z.custom<ErrorValuePredicate>(isFunction, {
      message: 'Expected a predicate function',
    }),
  })
  .strict();

export const OnEntrySchema = z.union([
  z.literal('error'),
  FailureKindSchema,
  ErrorValueSelectorSchema,
]);

export const MessageMatcherSchema = z.union([z.string(), z.instanceof(RegExp)]);

// ─────────────────────────────────────────────────────────────────────────────────
// OPTIONS
// ─────────────────────────────────────────────────────────────────────────────────

export const TriesSchema = z
  .number()
  .int('tries must be an integer')
  .nonnegative('tries must not be negative');

export const SleepSchema = z.union([
  z.number().finite().nonnegative('sleep must not be negative'),
  z.custom<(attempt: number) => number>(isFunction, {
    message: 'Expected seconds or a function of the retry index',
  }),
]);

/**
 * Schema for a retry option mapping. Unknown keys are rejected so that a
 * misspelt option does not silently fall back to its default.
 */
export const RetryOptionsSchema = z
  .object({
    on: z.union([OnEntrySchema, z.array(OnEntrySchema)]).optional(),
    message: z.union([MessageMatcherSchema, z.array(MessageMatcherSchema)]).optional(),
    tries: TriesSchema.optional(),
    sleep: SleepSchema.optional(),
    after: z.custom<AfterHook>(isFunction, { message: 'Expected a function' }).optional(),
    onRetry: z
      .custom<(event: RetryEvent) => void>(isFunction, { message: 'Expected a function' })
      .optional(),
  })
  .strict();

export const ConfigNameSchema = z.string().trim().min(1, 'Configuration name must not be empty');

// ─────────────────────────────────────────────────────────────────────────────────
// PARSING
// ─────────────────────────────────────────────────────────────────────────────────

export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${path}: ${issue.message}`;
  });
}

/**
 * Validate an option mapping.
 *
 * @param source - Where the mapping came from, for the error message
 */
export function parseRetryOptions(input: unknown, source: string): RetryOptions {
  const result = RetryOptionsSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigurationError(`Invalid retry options (${source})`, formatIssues(result.error));
  }
  return result.data;
}

export function parseConfigName(input: string): string {
  const result = ConfigNameSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigurationError('Invalid retry configuration name', formatIssues(result.error));
  }
  return result.data;
}
