/**
 * Resolution types — strategy, per-row outcome, per-run statistics
 * Layer: Domain
 *
 * ResolutionStrategy is immutable per run and validated with Zod: a bad
 * strategy is a configuration problem, not a data problem.
 *
 * Each row ends in exactly one RowResolution. `resolved` carries the tier
 * that produced the ID; the orchestrator stops trying tiers for a row once it
 * has one, so "first success wins" is a property of the type rather than of
 * nested conditionals.
 */
import { z } from 'zod';

import { ConfigurationError } from '@shared/errors/AppError';

export const resolutionStrategySchema = z
  .object({
    planCodeColumn: z.string().min(1).default('plan_code'),
    customerNameColumn: z.string().min(1).default('customer_name'),
    accountNameColumn: z.string().min(1).default('account_name'),
    accountNumberColumn: z.string().min(1).default('account_number'),
    companyIdColumn: z.string().min(1).default('company_code'),
    outputColumn: z.string().min(1).default('company_id'),
    useEnrichmentService: z.boolean().default(false),
    syncLookupBudget: z.number().int().min(0).default(0),
    generateFallbackIds: z.boolean().default(true),
    enableBackflow: z.boolean().default(true),
    enableAsyncQueue: z.boolean().default(true),
  })
  .strict();

export type ResolutionStrategy = Readonly<z.infer<typeof resolutionStrategySchema>>;
export type ResolutionStrategyInput = z.input<typeof resolutionStrategySchema>;

export function parseResolutionStrategy(input: ResolutionStrategyInput = {}): ResolutionStrategy {
  const result = resolutionStrategySchema.safeParse(input);
  if (!result.success) {
    const messages = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid resolution strategy: ${messages}`);
  }
  return Object.freeze(result.data);
}

/** Tiers in strict priority order. */
export type ResolutionTier = 'override' | 'cache' | 'passthrough' | 'external' | 'fallback';

export type RowResolution =
  | { kind: 'resolved'; tier: ResolutionTier; companyId: string; overrideTier?: string }
  | { kind: 'unresolved' };

/** A row of the upstream tabular batch. Column names come from the strategy. */
export type InputRow = Readonly<Record<string, unknown>>;

export type OutputRow = Record<string, unknown>;

export interface ResolutionStatistics {
  totalRows: number;
  /** Hits per override tier name, in tier order. */
  overrideHits: Record<string, number>;
  cacheHits: number;
  passthroughHits: number;
  externalHits: number;
  fallbackIdsGenerated: number;
  unresolved: number;
  /** Store failures turned into tier misses (cache read, backflow write). */
  storeErrors: number;
  externalAttempts: number;
  externalFailures: number;
  budgetConsumed: number;
  budgetRemaining: number;
  backflow: { written: number; skipped: number; failed: number };
  queue: { queued: number; skipped: number; failed: boolean };
}

export function createStatistics(totalRows: number, budget: number): ResolutionStatistics {
  return {
    totalRows,
    overrideHits: {},
    cacheHits: 0,
    passthroughHits: 0,
    externalHits: 0,
    fallbackIdsGenerated: 0,
    unresolved: 0,
    storeErrors: 0,
    externalAttempts: 0,
    externalFailures: 0,
    budgetConsumed: 0,
    budgetRemaining: budget,
    backflow: { written: 0, skipped: 0, failed: 0 },
    queue: { queued: 0, skipped: 0, failed: false },
  };
}

export interface ResolutionResult {
  rows: OutputRow[];
  resolutions: RowResolution[];
  statistics: ResolutionStatistics;
}
