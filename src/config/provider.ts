// ═══════════════════════════════════════════════════════════════════════════════
// CONFIG PROVIDER — Named and Default Retry Configurations
// ═══════════════════════════════════════════════════════════════════════════════
//
// The retry resolver reads option mappings through this port. Lookup is
// permissive: an unknown name yields an empty mapping, never an error.
//
// ═══════════════════════════════════════════════════════════════════════════════

import { envFloat, envList, envNumber, type Env } from './env.js';

// ─────────────────────────────────────────────────────────────────────────────────
// TYPES
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Raw option mapping as stored by a provider. Validated by the resolver.
 */
export type ConfigMapping = Readonly<Record<string, unknown>>;

export interface ConfigProvider {
  /** Mapping stored under `name` in `scope`, or `{}` when unset */
  get(scope: string, name: string): ConfigMapping;
}

/** Scope the retry resolver reads from */
export const RETRY_CONFIG_SCOPE = 'retry';

/** Name holding the defaults every call is merged over */
export const DEFAULTS_NAME = 'defaults';

const EMPTY: ConfigMapping = Object.freeze({});

// ─────────────────────────────────────────────────────────────────────────────────
// IN-MEMORY PROVIDER
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Provider backed by plain data.
 *
 * @example
 * ```typescript
 * const provider = new InMemoryConfigProvider({
 *   retry: {
 *     defaults: { sleep: 0.5 },
 *     aws: { message: ['timeout', /throttling/i], tries: 5, sleep: 2 },
 *   },
 * });
 * ```
 */
export class InMemoryConfigProvider implements ConfigProvider {
  private readonly scopes = new Map<string, Map<string, ConfigMapping>>();

  constructor(initial: Readonly<Record<string, Readonly<Record<string, ConfigMapping>>>> = {}) {
    for (const [scope, entries] of Object.entries(initial)) {
      for (const [name, mapping] of Object.entries(entries)) {
        this.set(scope, name, mapping);
      }
    }
  }

  get(scope: string, name: string): ConfigMapping {
    return this.scopes.get(scope)?.get(name) ?? EMPTY;
  }

  set(scope: string, name: string, mapping: ConfigMapping): this {
    let entries = this.scopes.get(scope);
    if (!entries) {
      entries = new Map();
      this.scopes.set(scope, entries);
    }
    entries.set(name, Object.freeze({ ...mapping }));
    return this;
  }

  delete(scope: string, name: string): boolean {
    return this.scopes.get(scope)?.delete(name) ?? false;
  }
}

// ─────────────────────────────────────────────────────────────────────────────────
// ENVIRONMENT PROVIDER
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Read retry defaults from the environment.
 *
 * - RETRY_DEFAULT_TRIES: integer
 * - RETRY_DEFAULT_SLEEP: seconds, fractions allowed
 * - RETRY_DEFAULT_MESSAGE: comma-separated substrings
 *
 * Unset or unparsable variables are left out.
 */
export function loadRetryDefaultsFromEnv(env: Env = process.env): ConfigMapping {
  const tries = envNumber('RETRY_DEFAULT_TRIES', env);
  const sleep = envFloat('RETRY_DEFAULT_SLEEP', env);
  const message = envList('RETRY_DEFAULT_MESSAGE', env);

  return {
    ...(tries !== undefined ? { tries } : {}),
    ...(sleep !== undefined ? { sleep } : {}),
    ...(message !== undefined ? { message } : {}),
  };
}

/**
 * Provider that layers environment defaults over another provider.
 *
 * Only the `defaults` entry of the retry scope is affected; named
 * configurations come from the wrapped provider unchanged.
 */
export class EnvConfigProvider implements ConfigProvider {
  private readonly envDefaults: ConfigMapping;

  constructor(
    private readonly fallback: ConfigProvider = new InMemoryConfigProvider(),
    env: Env = process.env
  ) {
    this.envDefaults = loadRetryDefaultsFromEnv(env);
  }

  get(scope: string, name: string): ConfigMapping {
    const base = this.fallback.get(scope, name);
    if (scope === RETRY_CONFIG_SCOPE && name === DEFAULTS_NAME) {
      return { ...base, ...this.envDefaults };
    }
    return base;
  }
}
