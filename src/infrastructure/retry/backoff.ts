// ═══════════════════════════════════════════════════════════════════════════════
// BACKOFF — Sleep Durations and the Sleep Service
// ═══════════════════════════════════════════════════════════════════════════════
//
// Sleep is configured in seconds (fractions allowed), either as a constant or
// as a function of the zero-based retry index. The sleeper works in whole
// milliseconds.
//
// ═══════════════════════════════════════════════════════════════════════════════

import { ConfigurationError, type SleepSpec } from './types.js';

// ─────────────────────────────────────────────────────────────────────────────────
// SLEEP SERVICE
// ─────────────────────────────────────────────────────────────────────────────────

export interface Sleeper {
  /** Resolve after `ms` milliseconds (a non-negative integer) */
  sleep(ms: number): Promise<void>;
}

/**
 * Sleep for a given duration.
 */
export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Default sleeper, backed by timers.
 */
export const timerSleeper: Sleeper = { sleep };

// ─────────────────────────────────────────────────────────────────────────────────
// DELAY CALCULATION
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Convert seconds to whole milliseconds, rounding to the nearest.
 * Negative durations become 0.
 */
export function secondsToMs(seconds: number): number {
  return Math.max(0, Math.round(seconds * 1000));
}

/**
 * Delay before the retry with index `attempt`.
 *
 * @param cause - Failure being retried, attached when the sleep function
 *   returns something that is not a finite number
 */
export function computeDelayMs(spec: SleepSpec, attempt: number, cause?: unknown): number {
  const seconds = typeof spec === 'function' ? spec(attempt) : spec;

  if (typeof seconds !== 'number' || !Number.isFinite(seconds)) {
    throw new ConfigurationError(
      `sleep returned ${String(seconds)} for retry ${attempt}; expected a finite number of seconds`,
      [],
      { cause }
    );
  }

  return secondsToMs(seconds);
}

/**
 * Format delay for logging.
 */
export function formatDelay(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  } else if (ms < 60000) {
    return `${(ms / 1000).toFixed(1)}s`;
  } else {
    return `${(ms / 60000).toFixed(1)}m`;
  }
}
