/**
 * PostgreSQL Mapping Repository — persistent name cache
 * Layer: Infrastructure
 * Pattern: Repository Pattern (implements IMappingRepository)
 *
 * Backs the cache tier with the `company_mappings` table. Reads go out as one
 * `= ANY(?)` query per batch; writes as one INSERT ... ON CONFLICT upsert whose
 * update branch only fires when the stored tier ranks at or below the incoming
 * one. Rows the database declined to update are not RETURNed, which is how
 * `skipped` is counted. Every driver failure surfaces as StoreUnavailableError.
 */
import type { Logger } from '@core/logger';
import { TOKENS } from '@core/types';
import {
  DEFAULT_TIER_CONFIDENCE,
  SOURCE_TIER_PRIORITY,
  collapseWrites,
  isSourceTier,
  type MappingEntry,
  type MappingEntryRow,
  type MappingWrite,
  type SourceTier,
  type WriteThroughResult,
} from '@domain/entities/MappingEntry';
import type { IMappingRepository } from '@domain/interfaces/IMappingRepository';
import { TABLES } from '@shared/constants';
import { StoreUnavailableError } from '@shared/errors/AppError';
import type { Knex } from 'knex';
import { inject, injectable } from 'tsyringe';

/** As read back: pg hands DECIMAL over as a string. */
interface StoredMappingRow extends Omit<MappingEntryRow, 'confidence'> {
  confidence: string | number;
  created_at: Date | string;
}

const MERGED_COLUMNS = ['company_id', 'source_tier', 'tier_priority', 'confidence', 'updated_at'];

/** 7 bind parameters per row; 1000 rows keeps each statement well under PostgreSQL's 65,535. */
const MAX_ROWS_PER_UPSERT = 1000;

@injectable()
export class PostgresMappingRepository implements IMappingRepository {
  constructor(
    @inject(TOKENS.Knex) private db: Knex,
    @inject(TOKENS.Logger) private log: Logger,
  ) {}

  async findByName(normalizedName: string): Promise<MappingEntry | null> {
    const found = await this.findByNames([normalizedName]);
    return found.get(normalizedName) ?? null;
  }

  async findByNames(normalizedNames: string[]): Promise<Map<string, MappingEntry>> {
    if (normalizedNames.length === 0) return new Map();

    let rows: StoredMappingRow[];
    try {
      rows = await this.db(TABLES.companyMappings)
        .select('normalized_name', 'company_id', 'source_tier', 'tier_priority', 'confidence', 'created_at')
        .whereRaw('normalized_name = ANY(?::text[])', [normalizedNames]);
    } catch (err) {
      throw new StoreUnavailableError('cache lookup', { cause: err });
    }

    const entries = new Map<string, MappingEntry>();
    for (const row of rows) {
      const entry = this.toDomain(row);
      if (entry) entries.set(entry.normalizedName, entry);
    }
    return entries;
  }

  async upsertMany(writes: MappingWrite[]): Promise<WriteThroughResult> {
    const unique = collapseWrites(writes);
    if (unique.length === 0) return { written: 0, skipped: 0 };

    const now = new Date();
    let written = 0;
    for (let i = 0; i < unique.length; i += MAX_ROWS_PER_UPSERT) {
      const chunk = unique.slice(i, i + MAX_ROWS_PER_UPSERT);
      let returned: Pick<MappingEntryRow, 'normalized_name'>[];
      try {
        returned = await this.buildUpsertQuery(chunk, now);
      } catch (err) {
        throw new StoreUnavailableError('write-through', { cause: err });
      }
      written += returned.length;
    }

    const result = { written, skipped: unique.length - written };
    this.log.debug(result, 'upsertMany complete');
    return result;
  }

  async deleteByNames(normalizedNames: string[], sourceTier?: SourceTier): Promise<number> {
    if (normalizedNames.length === 0) return 0;
    try {
      const qb = this.db(TABLES.companyMappings).whereRaw('normalized_name = ANY(?::text[])', [normalizedNames]);
      if (sourceTier) qb.where('source_tier', sourceTier);
      return await qb.del();
    } catch (err) {
      throw new StoreUnavailableError('invalidate', { cause: err });
    }
  }

  async deleteTierExcept(sourceTier: SourceTier, keepNames: string[]): Promise<number> {
    try {
      const qb = this.db(TABLES.companyMappings).where('source_tier', sourceTier);
      if (keepNames.length > 0) qb.whereRaw('NOT (normalized_name = ANY(?::text[]))', [keepNames]);
      return await qb.del();
    } catch (err) {
      throw new StoreUnavailableError('purge', { cause: err });
    }
  }

  /**
   * The write-through statement. Public so its SQL can be inspected without a
   * database (`.toSQL()`).
   */
  buildUpsertQuery(writes: MappingWrite[], now: Date) {
    const rows = writes.map((write) => ({
      normalized_name: write.normalizedName,
      company_id: write.companyId,
      source_tier: write.sourceTier,
      tier_priority: SOURCE_TIER_PRIORITY[write.sourceTier],
      confidence: write.confidence ?? DEFAULT_TIER_CONFIDENCE[write.sourceTier],
      created_at: now,
      updated_at: now,
    }));

    return this.db(TABLES.companyMappings)
      .insert(rows)
      .onConflict('normalized_name')
      .merge(MERGED_COLUMNS)
      .whereRaw(`${TABLES.companyMappings}.tier_priority <= excluded.tier_priority`)
      .returning('normalized_name');
  }

  /** Rows with an unknown tier are ignored rather than trusted. */
  private toDomain(row: StoredMappingRow): MappingEntry | null {
    if (!isSourceTier(row.source_tier)) {
      this.log.warn({ sourceTier: row.source_tier }, 'Ignoring cache row with unknown source tier');
      return null;
    }
    return {
      normalizedName: row.normalized_name,
      companyId: row.company_id,
      sourceTier: row.source_tier,
      confidence: Number(row.confidence),
      createdAt: new Date(row.created_at),
    };
  }
}
