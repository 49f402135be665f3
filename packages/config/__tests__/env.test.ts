import { afterEach, describe, expect, it, vi } from 'vitest';

import { getEnvVar, getSecretEnv, isPlaceholder, parseIntEnv, requireEnv } from '../env';

describe('env helpers', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('getEnvVar trims and treats blank as unset', () => {
    vi.stubEnv('FANOUT_TEST_VALUE', '  abc  ');
    expect(getEnvVar('FANOUT_TEST_VALUE')).toBe('abc');

    vi.stubEnv('FANOUT_TEST_VALUE', '   ');
    expect(getEnvVar('FANOUT_TEST_VALUE')).toBeUndefined();
  });

  it('detects template placeholders', () => {
    expect(isPlaceholder('your_page_token')).toBe(true);
    expect(isPlaceholder('placeholder')).toBe(true);
    expect(isPlaceholder('changeme')).toBe(true);
    expect(isPlaceholder(undefined)).toBe(true);
    expect(isPlaceholder('test-token')).toBe(false);
  });

  it('getSecretEnv drops placeholder secrets', () => {
    vi.stubEnv('FANOUT_TEST_SECRET', 'your_api_key_here');
    expect(getSecretEnv('FANOUT_TEST_SECRET')).toBeUndefined();

    vi.stubEnv('FANOUT_TEST_SECRET', 'test-secret');
    expect(getSecretEnv('FANOUT_TEST_SECRET')).toBe('test-secret');
  });

  describe('parseIntEnv', () => {
    it('returns the default when unset', () => {
      expect(parseIntEnv('FANOUT_TEST_UNSET', 7)).toBe(7);
    });

    it('parses integers within bounds', () => {
      vi.stubEnv('FANOUT_TEST_INT', '42');
      expect(parseIntEnv('FANOUT_TEST_INT', 7, { min: 1, max: 100 })).toBe(42);
    });

    it('falls back on non-integers and out-of-range values', () => {
      vi.stubEnv('FANOUT_TEST_INT', '4.5');
      expect(parseIntEnv('FANOUT_TEST_INT', 7)).toBe(7);

      vi.stubEnv('FANOUT_TEST_INT', '500');
      expect(parseIntEnv('FANOUT_TEST_INT', 7, { max: 100 })).toBe(7);
    });
  });

  it('requireEnv throws for a missing variable', () => {
    expect(() => requireEnv('FANOUT_TEST_MISSING')).toThrow(
      'Required environment variable FANOUT_TEST_MISSING is not set'
    );
  });
});
