/**
 * PostgreSQL Backfill Queue
 * Layer: Infrastructure
 * Pattern: Repository Pattern (implements IBackfillQueue)
 *
 * `enqueueBatch` is a single INSERT ... SELECT FROM unnest(...) whose
 * ON CONFLICT target repeats the partial unique index predicate from
 * migration 002, so a name with an active row is dropped by the database and
 * nothing is checked in application code first. Any number of resolver
 * processes may enqueue the same name at once; exactly one active row results.
 *
 * Drain operations use `FOR UPDATE SKIP LOCKED` so several drainers can share
 * the queue. Status transitions are guarded on the current status so a row
 * released as stale cannot be completed by the drainer that lost it.
 */
import type { Logger } from '@core/logger';
import { TOKENS } from '@core/types';
import type {
  EnqueueRequest,
  EnqueueResult,
  EnrichmentRequest,
  EnrichmentRequestRow,
  EnrichmentRequestStatus,
  QueueStatusCounts,
} from '@domain/entities/EnrichmentRequest';
import type { IBackfillQueue } from '@domain/interfaces/IBackfillQueue';
import { TABLES } from '@shared/constants';
import { QueueEnqueueError, StoreUnavailableError } from '@shared/errors/AppError';
import type { Knex } from 'knex';
import { inject, injectable } from 'tsyringe';

const ENQUEUE_SQL = `
  INSERT INTO ${TABLES.enrichmentRequests} (raw_name, normalized_name, fallback_id, status)
  SELECT t.raw_name, t.normalized_name, t.fallback_id, 'pending'
  FROM unnest(?::text[], ?::text[], ?::text[]) AS t(raw_name, normalized_name, fallback_id)
  ON CONFLICT (normalized_name) WHERE status IN ('pending', 'processing') DO NOTHING
  RETURNING id
`;

const CLAIM_SQL = `
  UPDATE ${TABLES.enrichmentRequests} AS r
  SET status = 'processing', attempts = r.attempts + 1, updated_at = now()
  FROM (
    SELECT id FROM ${TABLES.enrichmentRequests}
    WHERE status = 'pending'
    ORDER BY created_at, id
    LIMIT ?
    FOR UPDATE SKIP LOCKED
  ) AS next
  WHERE r.id = next.id
  RETURNING r.*
`;

const COUNT_SQL = `SELECT status, count(*) AS count FROM ${TABLES.enrichmentRequests} GROUP BY status`;

@injectable()
export class PostgresBackfillQueue implements IBackfillQueue {
  constructor(
    @inject(TOKENS.Knex) private db: Knex,
    @inject(TOKENS.Logger) private log: Logger,
  ) {}

  async enqueueBatch(requests: EnqueueRequest[]): Promise<EnqueueResult> {
    if (requests.length === 0) return { queued: 0, skipped: 0 };

    let result: { rows: { id: number }[] };
    try {
      result = await this.buildEnqueueQuery(requests);
    } catch (err) {
      throw new QueueEnqueueError(requests.length, { cause: err });
    }

    const queued = result.rows.length;
    this.log.debug({ queued, requested: requests.length }, 'enqueueBatch complete');
    return { queued, skipped: requests.length - queued };
  }

  async claimPending(limit: number): Promise<EnrichmentRequest[]> {
    if (limit <= 0) return [];
    try {
      const result: { rows: EnrichmentRequestRow[] } = await this.db.raw(CLAIM_SQL, [limit]);
      return result.rows.map((row) => this.toDomain(row));
    } catch (err) {
      throw new StoreUnavailableError('queue claim', { cause: err });
    }
  }

  async markDone(id: number): Promise<boolean> {
    return this.finish(id, 'done', null);
  }

  async markFailed(id: number, reason: string): Promise<boolean> {
    return this.finish(id, 'failed', reason);
  }

  async releaseStale(olderThanMs: number): Promise<number> {
    try {
      return await this.db(TABLES.enrichmentRequests)
        .where('status', 'processing')
        .whereRaw("updated_at < now() - (? * interval '1 millisecond')", [olderThanMs])
        .update({ status: 'pending', updated_at: this.db.fn.now() });
    } catch (err) {
      throw new StoreUnavailableError('queue release', { cause: err });
    }
  }

  async countByStatus(): Promise<QueueStatusCounts> {
    let result: { rows: { status: string; count: string }[] };
    try {
      result = await this.db.raw(COUNT_SQL);
    } catch (err) {
      throw new StoreUnavailableError('queue count', { cause: err });
    }

    const counts: QueueStatusCounts = { pending: 0, processing: 0, done: 0, failed: 0 };
    for (const row of result.rows) {
      if (isStatus(row.status)) counts[row.status] = Number(row.count);
    }
    return counts;
  }

  /**
   * The insert-if-absent statement. Duplicate names inside one batch are
   * collapsed first, keeping the first occurrence. Public so the SQL can be
   * inspected without a database.
   */
  buildEnqueueQuery(requests: EnqueueRequest[]): Knex.Raw {
    const seen = new Set<string>();
    const rawNames: string[] = [];
    const normalizedNames: string[] = [];
    const fallbackIds: string[] = [];

    for (const request of requests) {
      if (seen.has(request.normalizedName)) continue;
      seen.add(request.normalizedName);
      rawNames.push(request.rawName);
      normalizedNames.push(request.normalizedName);
      fallbackIds.push(request.fallbackId);
    }

    return this.db.raw(ENQUEUE_SQL, [rawNames, normalizedNames, fallbackIds]);
  }

  private async finish(id: number, status: 'done' | 'failed', lastError: string | null): Promise<boolean> {
    try {
      const updated = await this.db(TABLES.enrichmentRequests)
        .where({ id, status: 'processing' })
        .update({ status, last_error: lastError, updated_at: this.db.fn.now() });
      return updated > 0;
    } catch (err) {
      throw new StoreUnavailableError(`queue mark ${status}`, { cause: err });
    }
  }

  private toDomain(row: EnrichmentRequestRow): EnrichmentRequest {
    return {
      id: row.id,
      rawName: row.raw_name,
      normalizedName: row.normalized_name,
      fallbackId: row.fallback_id,
      status: row.status,
      attempts: row.attempts,
      lastError: row.last_error,
      createdAt: new Date(row.created_at),
      updatedAt: new Date(row.updated_at),
    };
  }
}

function isStatus(value: string): value is EnrichmentRequestStatus {
  return value === 'pending' || value === 'processing' || value === 'done' || value === 'failed';
}
