/**
 * Mapping Store
 * Layer: Application
 *
 * Answers "do we already know this company?" from two sources:
 *
 *   - the static OverrideSet it was constructed with (in-memory, ordered,
 *     first match wins), and
 *   - the persistent cache behind IMappingRepository.
 *
 * Write-through goes to the cache only, one upsert per batch, under the tier
 * rule: a stored mapping is replaced only by an equal- or higher-ranked tier.
 * Fallback IDs and the empty-name sentinel are never cached.
 *
 * Store failures leave here as StoreUnavailableError. The resolver decides
 * what a failure means (a tier miss); this class never hides one.
 */
import type { Logger } from '@core/logger';
import { TOKENS } from '@core/types';
import {
  collapseWrites,
  type MappingEntry,
  type MappingWrite,
  type SourceTier,
  type WriteThroughResult,
} from '@domain/entities/MappingEntry';
import { NAME_KEYED_MATCHES, type OverrideLookupKeys, type OverrideSet } from '@domain/entities/Override';
import type { IMappingRepository } from '@domain/interfaces/IMappingRepository';
import { isEmptyName, normalizeCompanyName } from '@domain/services/CompanyNameNormalizer';
import { isFallbackId } from '@domain/services/FallbackIdGenerator';
import { StoreUnavailableError } from '@shared/errors/AppError';
import { inject, injectable } from 'tsyringe';

export interface StaticMatch {
  companyId: string;
  /** Name of the override tier that matched. */
  overrideTier: string;
}

@injectable()
export class MappingStore {
  constructor(
    @inject(TOKENS.OverrideSet) private overrides: OverrideSet,
    @inject(TOKENS.MappingRepository) private repo: IMappingRepository,
    @inject(TOKENS.Logger) private log: Logger,
  ) {}

  /**
   * Walks the override tiers in priority order. Code keys are compared
   * trimmed, name keys normalized; absent or blank keys never match.
   */
  lookupStatic(keys: OverrideLookupKeys): StaticMatch | null {
    for (const tier of this.overrides) {
      const raw = keys[tier.matchOn];
      if (raw === undefined) continue;

      const key = NAME_KEYED_MATCHES.has(tier.matchOn) ? normalizeCompanyName(raw) : raw.trim();
      if (key.length === 0 || isEmptyName(key)) continue;

      const companyId = tier.entries.get(key);
      if (companyId !== undefined) return { companyId, overrideTier: tier.name };
    }
    return null;
  }

  async lookupCached(normalizedName: string): Promise<MappingEntry | null> {
    if (isEmptyName(normalizedName)) return null;
    return this.guard('cache lookup', () => this.repo.findByName(normalizedName));
  }

  /** One round-trip regardless of batch size. Duplicates and the sentinel are dropped first. */
  async batchLookupCached(normalizedNames: readonly string[]): Promise<Map<string, MappingEntry>> {
    const unique = [...new Set(normalizedNames)].filter((name) => !isEmptyName(name));
    if (unique.length === 0) return new Map();
    return this.guard('cache lookup', () => this.repo.findByNames(unique));
  }

  async writeThrough(
    normalizedName: string,
    companyId: string,
    sourceTier: SourceTier,
    confidence?: number,
  ): Promise<WriteThroughResult> {
    return this.writeThroughBatch([{ normalizedName, companyId, sourceTier, confidence }]);
  }

  /**
   * Ineligible writes (sentinel name, blank or fallback ID) count as skipped
   * and never reach the repository.
   */
  async writeThroughBatch(writes: readonly MappingWrite[]): Promise<WriteThroughResult> {
    const cacheable = writes.filter(isCacheable);
    const eligible = collapseWrites(cacheable);
    const ineligible = writes.length - cacheable.length;
    if (eligible.length === 0) return { written: 0, skipped: ineligible };

    const result = await this.guard('write-through', () => this.repo.upsertMany(eligible));
    const merged = { written: result.written, skipped: result.skipped + ineligible };
    this.log.debug({ ...merged, duplicates: cacheable.length - eligible.length }, 'Write-through complete');
    return merged;
  }

  /** Removes cached mappings for the given raw names, optionally only one tier's. */
  async invalidate(rawNames: readonly string[], sourceTier?: SourceTier): Promise<number> {
    const names = [...new Set(rawNames.map((name) => normalizeCompanyName(name)))].filter(
      (name) => !isEmptyName(name),
    );
    if (names.length === 0) return 0;

    const removed = await this.guard('invalidate', () => this.repo.deleteByNames(names, sourceTier));
    this.log.info({ requested: names.length, removed }, 'Cache entries invalidated');
    return removed;
  }

  /**
   * Copies name-keyed override entries into the cache as `override` mappings,
   * so that consumers reading the cache table directly see them too. Higher
   * tiers win when two tiers map the same name.
   */
  async publishOverrides(): Promise<WriteThroughResult> {
    const writes = [...this.nameKeyedOverrides()].map(([normalizedName, companyId]) => ({
      normalizedName,
      companyId,
      sourceTier: 'override' as const,
    }));
    const result = await this.writeThroughBatch(writes);
    this.log.info(result, 'Overrides published to cache');
    return result;
  }

  /** Drops cached `override` rows whose name no longer appears in any override tier. */
  async purgeOrphanedOverrides(): Promise<number> {
    const keep = [...this.nameKeyedOverrides().keys()];
    const removed = await this.guard('purge', () => this.repo.deleteTierExcept('override', keep));
    this.log.info({ removed }, 'Orphaned override mappings purged');
    return removed;
  }

  private nameKeyedOverrides(): Map<string, string> {
    const merged = new Map<string, string>();
    for (const tier of this.overrides) {
      if (!NAME_KEYED_MATCHES.has(tier.matchOn)) continue;
      for (const [name, companyId] of tier.entries) {
        if (!merged.has(name)) merged.set(name, companyId);
      }
    }
    return merged;
  }

  private async guard<T>(operation: string, work: () => Promise<T>): Promise<T> {
    try {
      return await work();
    } catch (err) {
      if (err instanceof StoreUnavailableError) throw err;
      throw new StoreUnavailableError(operation, { cause: err });
    }
  }
}

function isCacheable(write: MappingWrite): boolean {
  const companyId = write.companyId.trim();
  return !isEmptyName(write.normalizedName) && companyId.length > 0 && !isFallbackId(companyId);
}
