/** Normalized form of an empty / placeholder company name. Never hashed as zero-length input. */
export const EMPTY_NAME_SENTINEL = '__empty__';

/** Tag prepended to every generated fallback ID. */
export const FALLBACK_ID_PREFIX = 'IN';

/** Bytes of the HMAC digest kept for a fallback ID (80 bits → 16 base32 chars). */
export const FALLBACK_ID_DIGEST_BYTES = 10;

/** Used only when COMPANY_ID_SALT is missing. The name says what it is. */
export const DEV_ONLY_DEFAULT_SALT = 'dev-only-insecure-company-id-salt';

/**
 * Values found in an existing company-ID column that mean "no ID".
 * Compared after trimming and upper-casing.
 */
export const PASSTHROUGH_ID_PLACEHOLDERS: ReadonlySet<string> = new Set([
  'N',
  'NA',
  'N/A',
  'NONE',
  'NULL',
  'NAN',
]);

/** Backfill queue statuses that participate in the partial uniqueness rule. */
export const ACTIVE_REQUEST_STATUSES = ['pending', 'processing'] as const;

export const TABLES = {
  companyMappings: 'company_mappings',
  enrichmentRequests: 'enrichment_requests',
} as const;
