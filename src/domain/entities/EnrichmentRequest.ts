/**
 * EnrichmentRequest — one row of the backfill queue
 * Layer: Domain
 *
 * Created when a row falls through to a fallback ID. At most one request per
 * normalized name may be active (`pending` or `processing`); finished rows
 * (`done` / `failed`) stay behind for audit and may share a name with a newer
 * active row. The resolver only ever inserts; the drain process moves status
 * forward. Nothing here is deleted by the resolver.
 */
export type EnrichmentRequestStatus = 'pending' | 'processing' | 'done' | 'failed';

export interface EnrichmentRequest {
  id: number;
  rawName: string;
  normalizedName: string;
  fallbackId: string;
  status: EnrichmentRequestStatus;
  attempts: number;
  lastError: string | null;
  createdAt: Date;
  updatedAt: Date;
}

export interface EnrichmentRequestRow {
  id: number;
  raw_name: string;
  normalized_name: string;
  fallback_id: string;
  status: EnrichmentRequestStatus;
  attempts: number;
  last_error: string | null;
  created_at: Date | string;
  updated_at: Date | string;
}

/** What the resolver hands to the queue. */
export interface EnqueueRequest {
  rawName: string;
  normalizedName: string;
  fallbackId: string;
}

export interface EnqueueResult {
  /** Newly inserted pending rows. */
  queued: number;
  /** Requests dropped because the name already had an active row. */
  skipped: number;
}

export type QueueStatusCounts = Record<EnrichmentRequestStatus, number>;
