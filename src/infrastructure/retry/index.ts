// ═══════════════════════════════════════════════════════════════════════════════
// RETRY MODULE INDEX — Retry Exports
// ═══════════════════════════════════════════════════════════════════════════════

// ─────────────────────────────────────────────────────────────────────────────────
// TYPES
// ─────────────────────────────────────────────────────────────────────────────────

export {
  // Matchers
  type ErrorClass,
  type FailureKind,
  type MessageMatcher,
  type ErrorValuePredicate,
  type ErrorValueSelector,
  type OnEntry,
  type SleepSpec,
  type AfterHook,
  type Work,

  // Options & policy
  type RetryOptions,
  type KindFilter,
  type RetryPolicy,

  // Outcomes
  type Outcome,
  type RetryReason,
  type GiveUpReason,
  type RetryDecision,
  type RetryEvent,

  // Errors
  ConfigurationError,
} from './types.js';

// ─────────────────────────────────────────────────────────────────────────────────
// RESOLUTION
// ─────────────────────────────────────────────────────────────────────────────────

export { RetryOptionsSchema, parseRetryOptions } from './schema.js';

export {
  BUILTIN_RETRY_DEFAULTS,
  normalizeOn,
  normalizeMessage,
  normalizeOptions,
  resolvePolicy,
} from './resolver.js';

// ─────────────────────────────────────────────────────────────────────────────────
// MATCHING & BACKOFF
// ─────────────────────────────────────────────────────────────────────────────────

export {
  ERROR_SENTINEL,
  failureMessage,
  failureName,
  isErrorValue,
  matchesKind,
  matchesMessage,
} from './matchers.js';

export {
  type Sleeper,
  sleep,
  timerSleeper,
  secondsToMs,
  computeDelayMs,
  formatDelay,
} from './backoff.js';

// ─────────────────────────────────────────────────────────────────────────────────
// ENGINE & ENTRY POINT
// ─────────────────────────────────────────────────────────────────────────────────

export { type RetryEngineDeps, RetryEngine, attemptOnce, decide } from './engine.js';

export {
  type RetryableDeps,
  type Retryable,
  createRetryable,
  configureRetry,
  resetRetry,
  retryable,
} from './retryable.js';
