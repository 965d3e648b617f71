/**
 * Backfill Queue Interface — deduplicated re-enrichment work list
 * Layer: Domain
 * Pattern: Repository Pattern
 *
 * `enqueueBatch` must be one insert-if-absent statement over the active
 * subset (pending/processing), never N inserts: that is what keeps duplicate
 * active rows out under concurrent runs. The drain operations move rows
 * pending → processing → done/failed.
 */
import type {
  EnqueueRequest,
  EnqueueResult,
  EnrichmentRequest,
  QueueStatusCounts,
} from '@domain/entities/EnrichmentRequest';

export interface IBackfillQueue {
  enqueueBatch(requests: EnqueueRequest[]): Promise<EnqueueResult>;

  /** Atomically move up to `limit` oldest pending rows to processing. */
  claimPending(limit: number): Promise<EnrichmentRequest[]>;

  markDone(id: number): Promise<boolean>;

  markFailed(id: number, reason: string): Promise<boolean>;

  /** Hand processing rows untouched for `olderThanMs` back to pending. */
  releaseStale(olderThanMs: number): Promise<number>;

  countByStatus(): Promise<QueueStatusCounts>;
}
