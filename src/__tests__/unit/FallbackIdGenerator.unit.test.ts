/**
 * Unit Tests — Fallback ID Generator
 *
 * Fallback IDs end up in historical data and joins, so determinism, salt
 * sensitivity, fixed length and the absence of collisions are checked
 * directly.
 */
import {
  FALLBACK_ID_LENGTH,
  FallbackIdGenerator,
  fallbackIdForNormalized,
  generateFallbackId,
  isFallbackId,
  resolveSalt,
} from '@domain/services/FallbackIdGenerator';
import { DEV_ONLY_DEFAULT_SALT, EMPTY_NAME_SENTINEL } from '@shared/constants';

import { TEST_SALT, silentLogger } from '../helpers/fixtures';

describe('generateFallbackId', () => {
  it('should return the same ID for the same name and salt', () => {
    expect(generateFallbackId('ABC集团', TEST_SALT)).toBe(generateFallbackId('ABC集团', TEST_SALT));
  });

  it('should give every spelling of one company the same ID', () => {
    const ids = ['  ABC集团  ', 'abc集团', 'ABC集团(已终止)'].map((name) => generateFallbackId(name, TEST_SALT));

    expect(new Set(ids).size).toBe(1);
    expect(ids[0]).toBe(fallbackIdForNormalized('abc集团', TEST_SALT));
  });

  it('should change with the salt', () => {
    expect(generateFallbackId('ABC集团', TEST_SALT)).not.toBe(generateFallbackId('ABC集团', 'other-test-secret'));
  });

  it('should produce an 18-character IN-prefixed base32 ID whatever the input length', () => {
    for (const name of ['A', 'ABC集团', 'X'.repeat(5000), '']) {
      const id = generateFallbackId(name, TEST_SALT);

      expect(id).toHaveLength(FALLBACK_ID_LENGTH);
      expect(id).toMatch(/^IN[A-Z2-7]{16}$/);
    }
    expect(FALLBACK_ID_LENGTH).toBe(18);
  });

  it('should hash empty input through the sentinel', () => {
    expect(generateFallbackId('', TEST_SALT)).toBe(fallbackIdForNormalized(EMPTY_NAME_SENTINEL, TEST_SALT));
    expect(generateFallbackId(null, TEST_SALT)).toBe(fallbackIdForNormalized(EMPTY_NAME_SENTINEL, TEST_SALT));
  });

  it('should not collide across 10,000 distinct names', () => {
    const ids = new Set<string>();
    for (let i = 0; i < 10_000; i++) {
      ids.add(generateFallbackId(`company${i}`, TEST_SALT));
    }

    expect(ids.size).toBe(10_000);
  });
});

describe('isFallbackId', () => {
  it('should accept generated IDs', () => {
    expect(isFallbackId(generateFallbackId('ABC集团', TEST_SALT))).toBe(true);
  });

  it.each([['C100'], ['IN123'], ['in' + 'A'.repeat(16)], ['IN' + 'A'.repeat(17)], ['IN' + '1'.repeat(16)]])(
    'should reject %j',
    (value) => {
      expect(isFallbackId(value)).toBe(false);
    },
  );
});

describe('FallbackIdGenerator', () => {
  it('should match the function form for raw and normalized names', () => {
    const generator = new FallbackIdGenerator(TEST_SALT);

    expect(generator.generate('ABC集团')).toBe(generateFallbackId('ABC集团', TEST_SALT));
    expect(generator.forNormalized('abc集团')).toBe(fallbackIdForNormalized('abc集团', TEST_SALT));
  });
});

describe('resolveSalt', () => {
  it('should return the configured salt without logging', () => {
    const logger = silentLogger();
    const warn = jest.spyOn(logger, 'warn');

    expect(resolveSalt(TEST_SALT, 'production', logger)).toBe(TEST_SALT);
    expect(warn).not.toHaveBeenCalled();
  });

  it('should warn and use the development-only salt when unset outside development', () => {
    const logger = silentLogger();
    const warn = jest.spyOn(logger, 'warn');

    expect(resolveSalt(undefined, 'production', logger)).toBe(DEV_ONLY_DEFAULT_SALT);
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it('should use the development-only salt quietly in development', () => {
    const logger = silentLogger();
    const warn = jest.spyOn(logger, 'warn');

    expect(resolveSalt(undefined, 'development', logger)).toBe(DEV_ONLY_DEFAULT_SALT);
    expect(warn).not.toHaveBeenCalled();
  });
});
