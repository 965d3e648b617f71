/**
 * Fallback ID Generator
 * Layer: Domain
 *
 * Deterministic, non-reversible company IDs for names no tier could resolve:
 *
 *   "IN" + base32( HMAC-SHA1(salt, normalize(name))[0..10] )
 *
 * 10 digest bytes encode to exactly 16 unpadded base32 characters, so every
 * ID is 18 characters of [A-Z2-7] behind the prefix. Same name and salt give
 * the same ID on any machine; different salts give unrelated IDs. The salt is
 * held privately and never logged.
 */
import { createHmac } from 'node:crypto';
import { base32 } from 'rfc4648';

import type { Logger } from '@core/logger';
import { normalizeCompanyName } from '@domain/services/CompanyNameNormalizer';
import { DEV_ONLY_DEFAULT_SALT, FALLBACK_ID_DIGEST_BYTES, FALLBACK_ID_PREFIX } from '@shared/constants';

const FALLBACK_ID_PATTERN = new RegExp(`^${FALLBACK_ID_PREFIX}[A-Z2-7]{16}$`);

export const FALLBACK_ID_LENGTH = FALLBACK_ID_PREFIX.length + 16;

export function generateFallbackId(rawName: string | null | undefined, salt: string): string {
  return fallbackIdForNormalized(normalizeCompanyName(rawName), salt);
}

/** For callers that already hold the normalized name. */
export function fallbackIdForNormalized(normalizedName: string, salt: string): string {
  const digest = createHmac('sha1', salt).update(normalizedName, 'utf8').digest();
  return FALLBACK_ID_PREFIX + base32.stringify(digest.subarray(0, FALLBACK_ID_DIGEST_BYTES), { pad: false });
}

export function isFallbackId(value: string): boolean {
  return FALLBACK_ID_PATTERN.test(value);
}

/**
 * Picks the salt for this process. A missing salt only passes quietly in
 * development; anywhere else it is a warning, since the resulting IDs are
 * guessable by anyone who reads this file.
 */
export function resolveSalt(configured: string | undefined, nodeEnv: string, logger: Logger): string {
  if (configured) return configured;

  if (nodeEnv !== 'development') {
    logger.warn('COMPANY_ID_SALT is not set; fallback IDs use the development-only default salt');
  } else {
    logger.debug('COMPANY_ID_SALT is not set; using the development-only default salt');
  }
  return DEV_ONLY_DEFAULT_SALT;
}

export class FallbackIdGenerator {
  readonly #salt: string;

  constructor(salt: string) {
    this.#salt = salt;
  }

  generate(rawName: string | null | undefined): string {
    return generateFallbackId(rawName, this.#salt);
  }

  forNormalized(normalizedName: string): string {
    return fallbackIdForNormalized(normalizedName, this.#salt);
  }
}
