// ═══════════════════════════════════════════════════════════════════════════════
// RESULT PATTERN — Tagged Success/Failure Values
// ═══════════════════════════════════════════════════════════════════════════════
//
// Work that reports failure by returning instead of throwing can return a
// Result. With `on: 'error'` the retry engine treats an Err as a retryable
// failure and an Ok as success.
//
// ═══════════════════════════════════════════════════════════════════════════════

// ─────────────────────────────────────────────────────────────────────────────────
// CORE RESULT TYPE
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Success variant of Result.
 */
export interface Ok<T> {
  readonly ok: true;
  readonly value: T;
  readonly error?: never;
}

/**
 * Failure variant of Result.
 */
export interface Err<E> {
  readonly ok: false;
  readonly error: E;
  readonly value?: never;
}

/**
 * Result type representing either success (Ok) or failure (Err).
 *
 * @example
 * ```typescript
 * const user = await retryable({ on: 'error', tries: 3 }, async () => {
 *   const res = await fetch(url);
 *   return res.ok ? ok(await res.json()) : err(res.status);
 * });
 * ```
 */
export type Result<T, E = Error> = Ok<T> | Err<E>;

// ─────────────────────────────────────────────────────────────────────────────────
// CONSTRUCTORS
// ─────────────────────────────────────────────────────────────────────────────────

export function ok<T>(value: T): Ok<T> {
  return { ok: true, value };
}

export function err<E>(error: E): Err<E> {
  return { ok: false, error };
}

// ─────────────────────────────────────────────────────────────────────────────────
// TYPE GUARDS
// ─────────────────────────────────────────────────────────────────────────────────

export function isOk<T, E>(result: Result<T, E>): result is Ok<T> {
  return result.ok === true;
}

export function isErr<T, E>(result: Result<T, E>): result is Err<E> {
  return result.ok === false;
}

/**
 * Check whether an arbitrary value has the shape of an Err.
 *
 * Used on values whose type is not known to be a Result (the return value
 * of caller-supplied work).
 */
export function isErrShaped(value: unknown): value is Err<unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    'ok' in value &&
    value.ok === false &&
    'error' in value
  );
}

// ─────────────────────────────────────────────────────────────────────────────────
// EXTRACTORS
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Unwrap the value, throwing the error (wrapped if it is not an Error) on Err.
 */
export function unwrap<T, E>(result: Result<T, E>): T {
  if (result.ok) {
    return result.value;
  }
  if (result.error instanceof Error) {
    throw result.error;
  }
  throw new Error(`Called unwrap on Err: ${String(result.error)}`, { cause: result.error });
}

export function unwrapOr<T, E>(result: Result<T, E>, defaultValue: T): T {
  return result.ok ? result.value : defaultValue;
}
