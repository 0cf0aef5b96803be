// ═══════════════════════════════════════════════════════════════════════════════
// RETRY MATCHERS — Failure Kind, Message and Error-Value Predicates
// ═══════════════════════════════════════════════════════════════════════════════

import { isErrShaped } from '../../types/result.js';
import type { KindFilter, MessageMatcher } from './types.js';

// ─────────────────────────────────────────────────────────────────────────────────
// FAILURE SHAPE
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Name of a thrown value: `error.name` for errors and error-like objects.
 */
export function failureName(error: unknown): string | undefined {
  if (error instanceof Error) {
    return error.name;
  }
  if (typeof error === 'object' && error !== null && 'name' in error && typeof error.name === 'string') {
    return error.name;
  }
  return undefined;
}

/**
 * Message of a thrown value. Non-errors are stringified.
 */
export function failureMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
    return error.message;
  }
  return String(error);
}

// ─────────────────────────────────────────────────────────────────────────────────
// MATCHERS
// ─────────────────────────────────────────────────────────────────────────────────

export function matchesKind(filter: KindFilter, error: unknown): boolean {
  if (filter === 'any') {
    return true;
  }
  return filter.some((kind) =>
    typeof kind === 'string' ? failureName(error) === kind : error instanceof kind
  );
}

/**
 * True when the message contains a string matcher or matches a pattern.
 * An empty matcher list matches every message.
 */
export function matchesMessage(matchers: readonly MessageMatcher[], message: string): boolean {
  if (matchers.length === 0) {
    return true;
  }
  return matchers.some((matcher) =>
    typeof matcher === 'string' ? message.includes(matcher) : message.search(unstick(matcher)) !== -1
  );
}

// search() ignores lastIndex but still anchors sticky patterns at index 0
function unstick(pattern: RegExp): RegExp {
  return pattern.sticky ? new RegExp(pattern.source, pattern.flags.replace('y', '')) : pattern;
}

// ─────────────────────────────────────────────────────────────────────────────────
// ERROR VALUES
// ─────────────────────────────────────────────────────────────────────────────────

/** Sentinel value work can return to signal a retryable failure */
export const ERROR_SENTINEL = 'error';

/**
 * Default predicate behind `on: 'error'`.
 *
 * Recognizes the bare `'error'` sentinel, a tagged tuple whose first element
 * is `'error'` (`['error', reason, ...]`), and an Err result (`{ ok: false, error }`).
 */
export function isErrorValue(value: unknown): boolean {
  if (value === ERROR_SENTINEL) {
    return true;
  }
  if (Array.isArray(value)) {
    return value.length > 0 && value[0] === ERROR_SENTINEL;
  }
  return isErrShaped(value);
}
