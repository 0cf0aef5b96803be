// ═══════════════════════════════════════════════════════════════════════════════
// OPTION RESOLVER TESTS — Layering, Normalization and Validation
// ═══════════════════════════════════════════════════════════════════════════════

import { describe, it, expect } from 'vitest';
import { InMemoryConfigProvider } from '../../../config/provider.js';
import { isErrorValue } from '../matchers.js';
import {
  BUILTIN_RETRY_DEFAULTS,
  normalizeMessage,
  normalizeOn,
  normalizeOptions,
  resolvePolicy,
} from '../resolver.js';
import { parseRetryOptions } from '../schema.js';
import { ConfigurationError, type RetryOptions } from '../types.js';

const empty = new InMemoryConfigProvider();

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('Expected function to throw');
}

// ─────────────────────────────────────────────────────────────────────────────────
// LAYERING
// ─────────────────────────────────────────────────────────────────────────────────

describe('resolvePolicy', () => {
  it('should fall back to the built-in defaults', () => {
    const policy = resolvePolicy({}, empty);

    expect(policy.tries).toBe(BUILTIN_RETRY_DEFAULTS.tries);
    expect(policy.sleep).toBe(1);
    expect(policy.on).toBe('any');
    expect(policy.message).toEqual([]);
    expect(policy.errorPredicate).toBeUndefined();
    expect(policy.after()).toBeUndefined();
  });

  it('should layer a named configuration over provider defaults', () => {
    const provider = new InMemoryConfigProvider({
      retry: {
        defaults: { sleep: 0.5, tries: 2 },
        aws: { message: ['timeout', /throttl/i], tries: 5 },
      },
    });

    const policy = resolvePolicy('aws', provider);

    expect(policy.tries).toBe(5);
    expect(policy.sleep).toBe(0.5);
    expect(policy.message).toEqual(['timeout', /throttl/i]);
  });

  it('should resolve an unknown name to the defaults alone', () => {
    const provider = new InMemoryConfigProvider({ retry: { defaults: { tries: 4 } } });

    const policy = resolvePolicy('missing', provider);

    expect(policy.tries).toBe(4);
    expect(policy.sleep).toBe(1);
  });

  it('should let literal options override provider defaults', () => {
    const provider = new InMemoryConfigProvider({ retry: { defaults: { tries: 4, sleep: 3 } } });

    const policy = resolvePolicy({ tries: 2 }, provider);

    expect(policy.tries).toBe(2);
    expect(policy.sleep).toBe(3);
  });

  it('should ignore options explicitly set to undefined', () => {
    const provider = new InMemoryConfigProvider({ retry: { defaults: { tries: 4 } } });

    expect(resolvePolicy({ tries: undefined }, provider).tries).toBe(4);
  });

  it('should trim configuration names', () => {
    const provider = new InMemoryConfigProvider({ retry: { db: { tries: 7 } } });

    expect(resolvePolicy(' db ', provider).tries).toBe(7);
  });

  it('should return a frozen policy', () => {
    const policy = resolvePolicy({ on: TypeError, message: 'x' }, empty);

    expect(Object.isFrozen(policy)).toBe(true);
    expect(Object.isFrozen(policy.on)).toBe(true);
    expect(Object.isFrozen(policy.message)).toBe(true);
  });
});

// ─────────────────────────────────────────────────────────────────────────────────
// VALIDATION
// ─────────────────────────────────────────────────────────────────────────────────

describe('resolvePolicy validation', () => {
  it('should reject negative tries', () => {
    const error = captureError(() => resolvePolicy({ tries: -1 }, empty));

    expect(error).toBeInstanceOf(ConfigurationError);
    expect(error).toMatchObject({
      message: 'Invalid retry options (options): tries: tries must not be negative',
      issues: ['tries: tries must not be negative'],
    });
  });

  it('should reject fractional tries', () => {
    expect(() => resolvePolicy({ tries: 1.5 }, empty)).toThrow('tries: tries must be an integer');
  });

  it('should reject unknown keys', () => {
    const options: Record<string, unknown> = { retries: 3 };

    expect(() => parseRetryOptions(options, 'options')).toThrow(/Unrecognized key/);
  });

  it('should name the configuration that failed validation', () => {
    const provider = new InMemoryConfigProvider({ retry: { bad: { tries: '3' } } });

    const error = captureError(() => resolvePolicy('bad', provider));

    expect(error).toBeInstanceOf(ConfigurationError);
    expect(error).toMatchObject({ issues: ['tries: Expected number, received string'] });
    expect(error instanceof Error && error.message).toContain('Invalid retry options (retry.bad)');
  });

  it('should validate provider defaults', () => {
    const provider = new InMemoryConfigProvider({ retry: { defaults: { sleep: 'soon' } } });

    expect(() => resolvePolicy({}, provider)).toThrow('Invalid retry options (retry.defaults)');
  });

  it('should reject empty names and empty error names', () => {
    expect(() => resolvePolicy('  ', empty)).toThrow('Invalid retry configuration name');
    expect(() => resolvePolicy({ on: '' }, empty)).toThrow(ConfigurationError);
  });

  it('should reject a stored function that is not an error class', () => {
    const provider = new InMemoryConfigProvider({
      retry: { nulls: { on: (value: unknown) => value === null } },
    });

    const error = captureError(() => resolvePolicy('nulls', provider));

    expect(error).toBeInstanceOf(ConfigurationError);
    expect(error).toMatchObject({ issues: [expect.stringMatching(/^on: /)] });
  });

  it('should accept function constructors as error classes', () => {
    function LegacyError(this: { message: string }, message: string) {
      this.message = message;
    }
    const provider = new InMemoryConfigProvider({ retry: { legacy: { on: LegacyError } } });

    expect(resolvePolicy('legacy', provider).on).toEqual([LegacyError]);
  });

  it('should reject negative sleep', () => {
    expect(() => resolvePolicy({ sleep: -1 }, empty)).toThrow(ConfigurationError);
  });
});

// ─────────────────────────────────────────────────────────────────────────────────
// NORMALIZATION
// ─────────────────────────────────────────────────────────────────────────────────

describe('normalizeOn', () => {
  it('should match any thrown failure when nothing is listed', () => {
    expect(normalizeOn(undefined)).toEqual({ on: 'any', errorPredicate: undefined });
    expect(normalizeOn([])).toEqual({ on: 'any', errorPredicate: undefined });
  });

  it('should wrap a single kind', () => {
    expect(normalizeOn(TypeError).on).toEqual([TypeError]);
  });

  it('should dedupe kinds', () => {
    expect(normalizeOn([TypeError, 'Timeout', TypeError, 'Timeout']).on).toEqual([
      TypeError,
      'Timeout',
    ]);
  });

  it('should select the default predicate for the error sentinel', () => {
    const result = normalizeOn('error');

    expect(result.on).toBe('any');
    expect(result.errorPredicate).toBe(isErrorValue);
  });

  it('should keep kinds listed next to the error sentinel', () => {
    const result = normalizeOn(['error', RangeError]);

    expect(result.on).toEqual([RangeError]);
    expect(result.errorPredicate).toBe(isErrorValue);
  });

  it('should prefer an explicit predicate over the sentinel', () => {
    const predicate = (value: unknown): boolean => value === null;

    expect(normalizeOn(['error', { error: predicate }]).errorPredicate).toBe(predicate);
  });

  it('should reject more than one explicit predicate', () => {
    const options: RetryOptions = {
      on: [{ error: (v) => v === null }, { error: (v) => v === undefined }],
    };

    expect(() => normalizeOptions(options)).toThrow(
      'on: at most one error-value predicate may be given, got 2'
    );
  });
});

describe('normalizeMessage', () => {
  it('should wrap and dedupe matchers', () => {
    expect(normalizeMessage(undefined)).toEqual([]);
    expect(normalizeMessage('timeout')).toEqual(['timeout']);
    expect(normalizeMessage(['a', 'a', /x/i, /x/i, /x/])).toEqual(['a', /x/i, /x/]);
  });
});
