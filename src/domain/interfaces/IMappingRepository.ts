/**
 * Mapping Repository Interface — persistent normalized-name cache
 * Layer: Domain
 * Pattern: Repository Pattern
 *
 * The domain states what the cache must do; PostgresMappingRepository does it
 * with an INSERT ... ON CONFLICT upsert so concurrent pipeline runs need no
 * application-level lock. Implementations throw StoreUnavailableError when the
 * store cannot be reached.
 */
import type {
  MappingEntry,
  MappingWrite,
  SourceTier,
  WriteThroughResult,
} from '@domain/entities/MappingEntry';

export interface IMappingRepository {
  /** Single-row read by normalized name. */
  findByName(normalizedName: string): Promise<MappingEntry | null>;

  /** One round-trip for many names. Missing names are absent from the map. */
  findByNames(normalizedNames: string[]): Promise<Map<string, MappingEntry>>;

  /**
   * Upsert in one statement. An existing row is overwritten only when the
   * incoming tier ranks equal or higher than the stored one.
   */
  upsertMany(writes: MappingWrite[]): Promise<WriteThroughResult>;

  /** Delete entries by name, optionally only those of one source tier. */
  deleteByNames(normalizedNames: string[], sourceTier?: SourceTier): Promise<number>;

  /** Delete every entry of `sourceTier` whose name is not in `keepNames`. */
  deleteTierExcept(sourceTier: SourceTier, keepNames: string[]): Promise<number>;
}
