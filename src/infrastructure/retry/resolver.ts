// ═══════════════════════════════════════════════════════════════════════════════
// OPTION RESOLVER — Options or Name → Canonical Policy
// ═══════════════════════════════════════════════════════════════════════════════
//
// Layers, later wins key by key:
//   1. built-in defaults
//   2. provider `defaults`
//   3. the named configuration, or the literal options
//
// Named lookup is permissive: a name the provider does not know resolves to
// the defaults alone.
//
// ═══════════════════════════════════════════════════════════════════════════════

import {
  DEFAULTS_NAME,
  RETRY_CONFIG_SCOPE,
  type ConfigProvider,
} from '../../config/provider.js';
import { isErrorValue } from './matchers.js';
import { parseConfigName, parseRetryOptions } from './schema.js';
import {
  ConfigurationError,
  type ErrorValuePredicate,
  type FailureKind,
  type KindFilter,
  type MessageMatcher,
  type OnEntry,
  type RetryOptions,
  type RetryPolicy,
} from './types.js';

// ─────────────────────────────────────────────────────────────────────────────────
// DEFAULTS
// ─────────────────────────────────────────────────────────────────────────────────

export const BUILTIN_RETRY_DEFAULTS = {
  on: [],
  message: [],
  tries: 1,
  sleep: 1,
} as const satisfies RetryOptions;

const noop = (): void => {};

// ─────────────────────────────────────────────────────────────────────────────────
// HELPERS
// ─────────────────────────────────────────────────────────────────────────────────

function isList<T>(value: T | readonly T[]): value is readonly T[] {
  return Array.isArray(value);
}

function wrap<T>(value: T | readonly T[] | undefined): readonly T[] {
  if (value === undefined) return [];
  return isList(value) ? value : [value];
}

function mergeLayers(...layers: RetryOptions[]): RetryOptions {
  const merged: Record<string, unknown> = {};
  for (const layer of layers) {
    for (const [key, value] of Object.entries(layer)) {
      if (value !== undefined) {
        merged[key] = value;
      }
    }
  }
  return parseRetryOptions(merged, 'merged');
}

function messageKey(matcher: MessageMatcher): string {
  return typeof matcher === 'string' ? `s:${matcher}` : `r:/${matcher.source}/${matcher.flags}`;
}

// ─────────────────────────────────────────────────────────────────────────────────
// NORMALIZATION
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Split `on` into thrown-failure kinds and an optional error-value predicate.
 *
 * When no kinds are listed every thrown failure matches, whether or not an
 * error-value predicate was selected.
 */
export function normalizeOn(on: OnEntry | readonly OnEntry[] | undefined): {
  on: KindFilter;
  errorPredicate?: ErrorValuePredicate;
} {
  const kinds = new Set<FailureKind>();
  const predicates = new Set<ErrorValuePredicate>();
  let sentinel = false;

  for (const entry of wrap<OnEntry>(on)) {
    if (entry === 'error') {
      sentinel = true;
    } else if (typeof entry === 'object') {
      predicates.add(entry.error);
    } else {
      kinds.add(entry);
    }
  }

  if (predicates.size > 1) {
    throw new ConfigurationError('Invalid retry options', [
      `on: at most one error-value predicate may be given, got ${predicates.size}`,
    ]);
  }

  // An explicit predicate wins over the bare sentinel.
  const explicit = [...predicates][0];
  const errorPredicate = explicit ?? (sentinel ? isErrorValue : undefined);

  const [first, ...rest] = [...kinds];
  if (first === undefined) {
    return { on: 'any', errorPredicate };
  }
  const listed: readonly [FailureKind, ...FailureKind[]] = [first, ...rest];
  return { on: Object.freeze(listed), errorPredicate };
}

export function normalizeMessage(
  message: MessageMatcher | readonly MessageMatcher[] | undefined
): readonly MessageMatcher[] {
  const unique = new Map<string, MessageMatcher>();
  for (const matcher of wrap<MessageMatcher>(message)) {
    const key = messageKey(matcher);
    if (!unique.has(key)) {
      unique.set(key, matcher);
    }
  }
  return Object.freeze([...unique.values()]);
}

/**
 * Build the frozen policy from merged options.
 */
export function normalizeOptions(options: RetryOptions): RetryPolicy {
  const { on, errorPredicate } = normalizeOn(options.on);

  const policy: RetryPolicy = {
    tries: options.tries ?? BUILTIN_RETRY_DEFAULTS.tries,
    on,
    message: normalizeMessage(options.message),
    ...(errorPredicate ? { errorPredicate } : {}),
    sleep: options.sleep ?? BUILTIN_RETRY_DEFAULTS.sleep,
    after: options.after ?? noop,
    ...(options.onRetry ? { onRetry: options.onRetry } : {}),
  };

  return Object.freeze(policy);
}

// ─────────────────────────────────────────────────────────────────────────────────
// RESOLUTION
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Resolve literal options or a configuration name into a policy.
 *
 * @throws ConfigurationError when any layer fails validation
 */
export function resolvePolicy(
  optionsOrName: RetryOptions | string,
  provider: ConfigProvider
): RetryPolicy {
  let overrides: RetryOptions;

  if (typeof optionsOrName === 'string') {
    const name = parseConfigName(optionsOrName);
    overrides = parseRetryOptions(
      provider.get(RETRY_CONFIG_SCOPE, name),
      `${RETRY_CONFIG_SCOPE}.${name}`
    );
  } else {
    overrides = parseRetryOptions(optionsOrName, 'options');
  }

  const defaults = parseRetryOptions(
    provider.get(RETRY_CONFIG_SCOPE, DEFAULTS_NAME),
    `${RETRY_CONFIG_SCOPE}.${DEFAULTS_NAME}`
  );

  return normalizeOptions(mergeLayers(BUILTIN_RETRY_DEFAULTS, defaults, overrides));
}
