// ═══════════════════════════════════════════════════════════════════════════════
// RETRYABLE — Public Entry Point
// ═══════════════════════════════════════════════════════════════════════════════
//
// Usage:
//   await retryable({ on: TimeoutError, tries: 5, sleep: 2 }, () => api.call());
//   await retryable('aws', () => s3.putObject(params));
//   await retryable(() => flaky());
//
// ═══════════════════════════════════════════════════════════════════════════════

import { EnvConfigProvider, type ConfigProvider } from '../../config/provider.js';
import { getLogger, type ILogger } from '../../observability/logging/index.js';
import type { Sleeper } from './backoff.js';
import { RetryEngine } from './engine.js';
import { resolvePolicy } from './resolver.js';
import { ConfigurationError, type RetryOptions, type Work } from './types.js';

// ─────────────────────────────────────────────────────────────────────────────────
// TYPES
// ─────────────────────────────────────────────────────────────────────────────────

export interface RetryableDeps {
  /** Source of `defaults` and named configurations */
  provider?: ConfigProvider;
  sleeper?: Sleeper;
  logger?: ILogger;
}

/**
 * Retry entry point bound to a provider, sleeper and logger.
 */
export interface Retryable {
  <T>(work: Work<T>): Promise<Awaited<T>>;
  <T>(optionsOrName: RetryOptions | string, work: Work<T>): Promise<Awaited<T>>;
}

interface RetryContext {
  readonly provider: ConfigProvider;
  readonly engine: RetryEngine;
}

// ─────────────────────────────────────────────────────────────────────────────────
// IMPLEMENTATION
// ─────────────────────────────────────────────────────────────────────────────────

function isWork<T>(value: RetryOptions | string | Work<T>): value is Work<T> {
  return typeof value === 'function';
}

function createContext(deps: RetryableDeps): RetryContext {
  return {
    provider: deps.provider ?? new EnvConfigProvider(),
    engine: new RetryEngine({
      sleeper: deps.sleeper,
      logger: deps.logger ?? getLogger({ component: 'retry' }),
    }),
  };
}

async function runRetryable<T>(
  context: RetryContext,
  optionsOrWork: RetryOptions | string | Work<T>,
  maybeWork?: Work<T>
): Promise<Awaited<T>> {
  if (isWork(optionsOrWork)) {
    return context.engine.execute(resolvePolicy({}, context.provider), optionsOrWork);
  }
  if (typeof maybeWork !== 'function') {
    throw new ConfigurationError('retryable needs a work function');
  }
  return context.engine.execute(resolvePolicy(optionsOrWork, context.provider), maybeWork);
}

/**
 * Create a retry entry point with its own provider, sleeper and logger.
 *
 * @example
 * ```typescript
 * const retry = createRetryable({
 *   provider: new InMemoryConfigProvider({ retry: { db: { on: 'ECONNRESET', tries: 3 } } }),
 * });
 * const rows = await retry('db', () => pool.query(sql));
 * ```
 */
export function createRetryable(deps: RetryableDeps = {}): Retryable {
  const context = createContext(deps);
  return <T>(optionsOrWork: RetryOptions | string | Work<T>, maybeWork?: Work<T>) =>
    runRetryable(context, optionsOrWork, maybeWork);
}

// ─────────────────────────────────────────────────────────────────────────────────
// PROCESS-WIDE DEFAULT
// ─────────────────────────────────────────────────────────────────────────────────

let defaultDeps: RetryableDeps = {};
let defaultContext: RetryContext | null = null;

function getDefaultContext(): RetryContext {
  if (!defaultContext) {
    defaultContext = createContext(defaultDeps);
  }
  return defaultContext;
}

/**
 * Configure the provider, sleeper and logger used by `retryable`.
 */
export function configureRetry(deps: RetryableDeps): void {
  defaultDeps = { ...defaultDeps, ...deps };
  defaultContext = null;
}

/**
 * Reset `retryable` to its initial collaborators (for testing).
 */
export function resetRetry(): void {
  defaultDeps = {};
  defaultContext = null;
}

/**
 * Maybe retry some work.
 *
 * Resolves with the value of the last attempt. Options:
 * - `on`: error classes, error names, `'error'` or `{ error: predicate }`. Default: any thrown failure
 * - `message`: substrings or patterns the failure message must match. Default: any
 * - `tries`: retries after the first attempt. Default: 1
 * - `sleep`: seconds between attempts, or a function of the retry index. Default: 1
 * - `after`: runs exactly once, however many attempts were made
 *
 * A string looks up a named configuration; an unknown name means defaults only.
 */
export function retryable<T>(work: Work<T>): Promise<Awaited<T>>;
export function retryable<T>(optionsOrName: RetryOptions | string, work: Work<T>): Promise<Awaited<T>>;
export function retryable<T>(
  optionsOrWork: RetryOptions | string | Work<T>,
  maybeWork?: Work<T>
): Promise<Awaited<T>> {
  return runRetryable(getDefaultContext(), optionsOrWork, maybeWork);
}
