// ═══════════════════════════════════════════════════════════════════════════════
// CONFIG PROVIDER TESTS — In-Memory Store and Environment Defaults
// ═══════════════════════════════════════════════════════════════════════════════

import { describe, it, expect } from 'vitest';
import { envFloat, envList, envNumber } from '../env.js';
import {
  EnvConfigProvider,
  InMemoryConfigProvider,
  loadRetryDefaultsFromEnv,
} from '../provider.js';

// ─────────────────────────────────────────────────────────────────────────────────
// ENV HELPERS
// ─────────────────────────────────────────────────────────────────────────────────

describe('env helpers', () => {
  it('should parse integers', () => {
    expect(envNumber('N', { N: '12' })).toBe(12);
    expect(envNumber('N', { N: '' })).toBeUndefined();
    expect(envNumber('N', { N: 'abc' })).toBeUndefined();
    expect(envNumber('N', {})).toBeUndefined();
  });

  it('should keep fractions in floats', () => {
    expect(envFloat('S', { S: '0.25' })).toBe(0.25);
    expect(envFloat('S', { S: 'soon' })).toBeUndefined();
  });

  it('should split lists and drop blanks', () => {
    expect(envList('L', { L: ' a, ,b ' })).toEqual(['a', 'b']);
    expect(envList('L', { L: ' , ' })).toBeUndefined();
  });
});

// ─────────────────────────────────────────────────────────────────────────────────
// IN-MEMORY PROVIDER
// ─────────────────────────────────────────────────────────────────────────────────

describe('InMemoryConfigProvider', () => {
  it('should return an empty mapping for unknown scopes and names', () => {
    const provider = new InMemoryConfigProvider({ retry: { db: { tries: 3 } } });

    expect(provider.get('retry', 'cache')).toEqual({});
    expect(provider.get('other', 'db')).toEqual({});
    expect(provider.get('retry', 'db')).toEqual({ tries: 3 });
  });

  it('should store frozen copies', () => {
    const mapping: Record<string, unknown> = { tries: 3 };
    const provider = new InMemoryConfigProvider().set('retry', 'db', mapping);

    mapping.tries = 9;

    expect(provider.get('retry', 'db')).toEqual({ tries: 3 });
    expect(Object.isFrozen(provider.get('retry', 'db'))).toBe(true);
  });

  it('should delete entries', () => {
    const provider = new InMemoryConfigProvider({ retry: { db: { tries: 3 } } });

    expect(provider.delete('retry', 'db')).toBe(true);
    expect(provider.delete('retry', 'db')).toBe(false);
    expect(provider.get('retry', 'db')).toEqual({});
  });
});

// ─────────────────────────────────────────────────────────────────────────────────
// ENVIRONMENT PROVIDER
// ─────────────────────────────────────────────────────────────────────────────────

describe('EnvConfigProvider', () => {
  const env = {
    RETRY_DEFAULT_TRIES: '3',
    RETRY_DEFAULT_SLEEP: '0.25',
    RETRY_DEFAULT_MESSAGE: 'timeout, reset',
  };

  it('should read retry defaults from the environment', () => {
    expect(loadRetryDefaultsFromEnv(env)).toEqual({
      tries: 3,
      sleep: 0.25,
      message: ['timeout', 'reset'],
    });
    expect(loadRetryDefaultsFromEnv({ RETRY_DEFAULT_TRIES: 'many' })).toEqual({});
  });

  it('should layer environment defaults over the wrapped defaults', () => {
    const fallback = new InMemoryConfigProvider({ retry: { defaults: { tries: 1, on: 'error' } } });

    expect(new EnvConfigProvider(fallback, env).get('retry', 'defaults')).toEqual({
      tries: 3,
      on: 'error',
      sleep: 0.25,
      message: ['timeout', 'reset'],
    });
  });

  it('should leave named configurations alone', () => {
    const fallback = new InMemoryConfigProvider({ retry: { db: { tries: 7 } } });

    expect(new EnvConfigProvider(fallback, env).get('retry', 'db')).toEqual({ tries: 7 });
  });
});
