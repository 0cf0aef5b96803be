// ═══════════════════════════════════════════════════════════════════════════════
// RETRY ENGINE — Attempt Loop, Match Decisions and the After Hook
// ═══════════════════════════════════════════════════════════════════════════════
//
// Runs work under a resolved policy:
// - returned values are retried only when the policy's error predicate says so
// - thrown failures are retried when kind and message both match
// - exhausted failures are rethrown unchanged, exhausted error values returned
// - the after hook runs once, when the whole sequence has settled
//
// ═══════════════════════════════════════════════════════════════════════════════

import { getLogger, type ILogger } from '../../observability/logging/index.js';
import { computeDelayMs, formatDelay, timerSleeper, type Sleeper } from './backoff.js';
import { failureMessage, matchesKind, matchesMessage } from './matchers.js';
import type {
  Outcome,
  RetryDecision,
  RetryEvent,
  RetryPolicy,
  RetryReason,
  Work,
} from './types.js';

// ─────────────────────────────────────────────────────────────────────────────────
// DECISION
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Decide what to do after the attempt with retry index `attempt`.
 *
 * Exhaustion is `attempt === policy.tries`; it is checked before the matchers
 * for thrown failures.
 */
export function decide<T>(policy: RetryPolicy, outcome: Outcome<T>, attempt: number): RetryDecision<T> {
  if (outcome.kind === 'returned') {
    const { value } = outcome;
    if (!policy.errorPredicate || !policy.errorPredicate(value)) {
      return { action: 'return', value, exhausted: false };
    }
    if (attempt === policy.tries) {
      return { action: 'return', value, exhausted: true };
    }
    return { action: 'retry', reason: 'error_value' };
  }

  const { error } = outcome;

  if (attempt === policy.tries) {
    return { action: 'throw', error, reason: 'exhausted' };
  }
  if (!matchesKind(policy.on, error)) {
    return { action: 'throw', error, reason: 'kind_mismatch' };
  }
  if (!matchesMessage(policy.message, failureMessage(error))) {
    return { action: 'throw', error, reason: 'message_mismatch' };
  }
  return { action: 'retry', reason: 'thrown' };
}

/**
 * Run one attempt. Synchronous throws and rejections are both failures.
 */
export async function attemptOnce<T>(work: Work<T>): Promise<Outcome<Awaited<T>>> {
  try {
    return { kind: 'returned', value: await work() };
  } catch (error) {
    return { kind: 'thrown', error };
  }
}

// ─────────────────────────────────────────────────────────────────────────────────
// ENGINE
// ─────────────────────────────────────────────────────────────────────────────────

export interface RetryEngineDeps {
  sleeper?: Sleeper;
  logger?: ILogger;
}

export class RetryEngine {
  private readonly sleeper: Sleeper;
  private readonly logger: ILogger;

  constructor(deps: RetryEngineDeps = {}) {
    this.sleeper = deps.sleeper ?? timerSleeper;
    this.logger = deps.logger ?? getLogger({ component: 'retry' });
  }

  /**
   * Execute work under a policy.
   *
   * Resolves with the final returned value (which may be a still-failing
   * error value once retries are exhausted) or rejects with the original
   * thrown failure.
   */
  async execute<T>(policy: RetryPolicy, work: Work<T>): Promise<Awaited<T>> {
    let failure: { error: unknown } | undefined;

    try {
      return await this.run(policy, work);
    } catch (error) {
      failure = { error };
      throw error;
    } finally {
      await this.runAfter(policy, failure);
    }
  }

  private async run<T>(policy: RetryPolicy, work: Work<T>): Promise<Awaited<T>> {
    for (let attempt = 0; ; attempt++) {
      const outcome = await attemptOnce(work);
      const decision = decide(policy, outcome, attempt);

      switch (decision.action) {
        case 'return':
          if (decision.exhausted) {
            this.logger.warn('Retry exhausted, returning error value', {
              attempts: attempt + 1,
              tries: policy.tries,
            });
          } else if (attempt > 0) {
            this.logger.debug('Retry succeeded', { attempts: attempt + 1 });
          }
          return decision.value;

        case 'throw':
          this.logger.warn('Giving up', {
            reason: decision.reason,
            attempts: attempt + 1,
            tries: policy.tries,
            error: failureMessage(decision.error),
          });
          throw decision.error;

        case 'retry':
          await this.backoff(policy, outcome, attempt, decision.reason);
          break;
      }
    }
  }

  private async backoff<T>(
    policy: RetryPolicy,
    outcome: Outcome<T>,
    attempt: number,
    reason: RetryReason
  ): Promise<void> {
    const failure = outcome.kind === 'thrown' ? outcome.error : outcome.value;
    const delayMs = computeDelayMs(policy.sleep, attempt, failure);

    const event: RetryEvent = {
      attempt,
      tries: policy.tries,
      delayMs,
      reason,
      ...(outcome.kind === 'thrown' ? { error: outcome.error } : { value: outcome.value }),
    };

    this.logger.debug('Retrying', {
      attempt: attempt + 1,
      tries: policy.tries,
      reason,
      delay: formatDelay(delayMs),
      ...(outcome.kind === 'thrown' ? { error: failureMessage(outcome.error) } : {}),
    });

    try {
      policy.onRetry?.(event);
    } catch (hookError) {
      this.logger.error('onRetry hook threw while retrying', failure, { attempt: attempt + 1, reason });
      throw hookError;
    }

    await this.sleeper.sleep(delayMs);
  }

  private async runAfter(policy: RetryPolicy, failure: { error: unknown } | undefined): Promise<void> {
    try {
      await policy.after();
    } catch (hookError) {
      if (failure) {
        this.logger.error('Retry sequence failed before the after hook threw', failure.error);
      }
      throw hookError;
    }
  }
}
