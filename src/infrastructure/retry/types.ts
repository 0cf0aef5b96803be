// ═══════════════════════════════════════════════════════════════════════════════
// RETRY TYPES — Options, Policy, Outcomes and Errors
// ═══════════════════════════════════════════════════════════════════════════════

// ─────────────────────────────────────────────────────────────────────────────────
// MATCHERS
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Class of errors that may be retried. Matched with `instanceof`.
 */
export type ErrorClass = abstract new (...args: never[]) => unknown;

/**
 * Kind of thrown failure: an error class, or an error name compared
 * against `error.name`.
 */
export type FailureKind = ErrorClass | string;

/**
 * Message matcher: a substring, or a pattern tested anywhere in the message.
 */
export type MessageMatcher = string | RegExp;

/**
 * Decides whether a returned value is really a failure that should be retried.
 */
export type ErrorValuePredicate = (value: unknown) => boolean;

/**
 * `on` entry pairing the error sentinel with a custom predicate.
 *
 * @example
 * ```typescript
 * retryable({ on: { error: (res) => res === null } }, () => cache.get(key));
 * ```
 */
export interface ErrorValueSelector {
  readonly error: ErrorValuePredicate;
}

/**
 * One entry of the `on` option. The literal `'error'` selects the default
 * error-value predicate; it is never treated as an error name.
 */
export type OnEntry = FailureKind | 'error' | ErrorValueSelector;

/**
 * Seconds to sleep before a retry, or a function of the zero-based retry index.
 */
export type SleepSpec = number | ((attempt: number) => number);

/**
 * Hook run exactly once per call, after the whole retry sequence settles.
 */
export type AfterHook = () => unknown;

/**
 * Zero-argument unit of work. May throw, reject, or resolve.
 */
export type Work<T> = () => T | PromiseLike<T>;

// ─────────────────────────────────────────────────────────────────────────────────
// OPTIONS
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Literal retry options, as passed by callers or stored in a provider.
 */
export interface RetryOptions {
  /** Failure kinds and/or `'error'` to retry on. Default: every thrown failure */
  readonly on?: OnEntry | readonly OnEntry[];

  /** Only retry failures whose message matches one of these. Default: any */
  readonly message?: MessageMatcher | readonly MessageMatcher[];

  /** Retries allowed after the first attempt. Default: 1 */
  readonly tries?: number;

  /** Seconds between attempts, or a function of the retry index. Default: 1 */
  readonly sleep?: SleepSpec;

  /** Runs exactly once, after the last attempt */
  readonly after?: AfterHook;

  /** Called before each sleep */
  readonly onRetry?: (event: RetryEvent) => void;
}

// ─────────────────────────────────────────────────────────────────────────────────
// POLICY
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Thrown-failure filter. `'any'` matches every kind; a list matches its
 * members only.
 */
export type KindFilter = 'any' | readonly [FailureKind, ...FailureKind[]];

/**
 * Canonical, frozen policy for a single call.
 */
export interface RetryPolicy {
  readonly tries: number;
  readonly on: KindFilter;
  readonly message: readonly MessageMatcher[];
  readonly errorPredicate?: ErrorValuePredicate;
  readonly sleep: SleepSpec;
  readonly after: AfterHook;
  readonly onRetry?: (event: RetryEvent) => void;
}

// ─────────────────────────────────────────────────────────────────────────────────
// OUTCOMES & DECISIONS
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * What one attempt produced.
 */
export type Outcome<T> =
  | { readonly kind: 'returned'; readonly value: T }
  | { readonly kind: 'thrown'; readonly error: unknown };

export type RetryReason = 'thrown' | 'error_value';

export type GiveUpReason = 'exhausted' | 'kind_mismatch' | 'message_mismatch';

/**
 * What the engine does after an attempt.
 */
export type RetryDecision<T> =
  | { readonly action: 'return'; readonly value: T; readonly exhausted: boolean }
  | { readonly action: 'throw'; readonly error: unknown; readonly reason: GiveUpReason }
  | { readonly action: 'retry'; readonly reason: RetryReason };

// ─────────────────────────────────────────────────────────────────────────────────
// EVENTS
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Passed to `onRetry` before each sleep.
 */
export interface RetryEvent {
  /** Zero-based retry index (0 before the second attempt) */
  readonly attempt: number;

  /** Retries allowed by the policy */
  readonly tries: number;

  /** Delay about to be slept, in ms */
  readonly delayMs: number;

  readonly reason: RetryReason;

  /** Failure that was thrown, when reason is 'thrown' */
  readonly error?: unknown;

  /** Value that was returned, when reason is 'error_value' */
  readonly value?: unknown;
}

// ─────────────────────────────────────────────────────────────────────────────────
// ERRORS
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Thrown when retry options cannot be turned into a policy.
 */
export class ConfigurationError extends Error {
  readonly name = 'ConfigurationError';
  readonly issues: readonly string[];

  constructor(message: string, issues: readonly string[] = [], options?: { cause?: unknown }) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message, options);
    this.issues = issues;
  }
}
