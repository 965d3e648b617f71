/**
 * MappingEntry — a cached normalized-name → company-ID association
 * Layer: Domain
 *
 *   MappingEntry: camelCase, used by services.
 *   MappingEntryRow: snake_case, mirrors the `company_mappings` columns.
 *
 * `sourceTier` records where the mapping came from. Write-through only
 * replaces a stored mapping when the incoming tier ranks equal or higher
 * (see SOURCE_TIER_PRIORITY); timestamps never decide.
 */
export type SourceTier = 'override' | 'backflow' | 'external';

export const SOURCE_TIER_PRIORITY: Readonly<Record<SourceTier, number>> = {
  override: 3,
  backflow: 2,
  external: 1,
};

export const DEFAULT_TIER_CONFIDENCE: Readonly<Record<SourceTier, number>> = {
  override: 1.0,
  backflow: 0.9,
  external: 0.8,
};

export interface MappingEntry {
  normalizedName: string;
  companyId: string;
  sourceTier: SourceTier;
  confidence: number;
  createdAt: Date;
}

export interface MappingEntryRow {
  normalized_name: string;
  company_id: string;
  source_tier: SourceTier;
  tier_priority: number;
  confidence: number;
}

/** Input to write-through: what a caller knows before the row exists. */
export interface MappingWrite {
  normalizedName: string;
  companyId: string;
  sourceTier: SourceTier;
  confidence?: number;
}

export interface WriteThroughResult {
  /** Rows inserted or overwritten. */
  written: number;
  /** Rows left alone because a higher-priority tier already owns the name. */
  skipped: number;
}

export function isSourceTier(value: unknown): value is SourceTier {
  return value === 'override' || value === 'backflow' || value === 'external';
}

export function outranksOrTies(incoming: SourceTier, stored: SourceTier): boolean {
  return SOURCE_TIER_PRIORITY[incoming] >= SOURCE_TIER_PRIORITY[stored];
}

/**
 * One write per name: the highest-ranked tier wins, later writes win ties.
 * A single upsert statement may not touch the same row twice.
 */
export function collapseWrites(writes: readonly MappingWrite[]): MappingWrite[] {
  const byName = new Map<string, MappingWrite>();
  for (const write of writes) {
    const existing = byName.get(write.normalizedName);
    if (!existing || outranksOrTies(write.sourceTier, existing.sourceTier)) {
      byName.set(write.normalizedName, write);
    }
  }
  return [...byName.values()];
}
