/**
 * Backfill Drain Service
 * Layer: Application
 *
 * Works the backfill queue from the other end: hands stale claims back,
 * claims a slice of pending requests and retries each through the budgeted
 * external resolver. A hit is written through to the cache by the resolver
 * itself, so the next resolver run picks the real ID up from tier 2 and the
 * fallback ID converges. The request is marked done only once the ID is in
 * the cache. A miss, or a hit whose write-through failed, is marked failed
 * with its error label and stays behind for audit; the name can be queued
 * again by the next resolver run.
 */
import { BudgetedExternalResolver } from '@application/services/BudgetedExternalResolver';
import type { Logger } from '@core/logger';
import { TOKENS } from '@core/types';
import type { IBackfillQueue } from '@domain/interfaces/IBackfillQueue';
import { inject, injectable } from 'tsyringe';

export interface DrainOptions {
  batchSize: number;
  /** External calls allowed for this drain. */
  budget: number;
  staleAfterMs: number;
}

export interface DrainResult {
  claimed: number;
  resolved: number;
  failed: number;
  released: number;
}

@injectable()
export class BackfillDrainService {
  constructor(
    @inject(TOKENS.BackfillQueue) private queue: IBackfillQueue,
    @inject(TOKENS.ExternalResolver) private external: BudgetedExternalResolver,
    @inject(TOKENS.Logger) private log: Logger,
  ) {}

  async drain(options: DrainOptions): Promise<DrainResult> {
    const released = await this.queue.releaseStale(options.staleAfterMs);
    const claimed = await this.queue.claimPending(Math.min(options.batchSize, options.budget));

    let remaining = options.budget;
    let resolved = 0;
    let failed = 0;

    for (const request of claimed) {
      const attempt = await this.external.tryResolve(request.normalizedName, remaining);
      if (attempt.consumed) remaining--;

      if (attempt.companyId !== null && attempt.cached) {
        await this.queue.markDone(request.id);
        resolved++;
      } else {
        await this.queue.markFailed(request.id, attempt.error ?? 'no match');
        failed++;
      }
    }

    const result = { claimed: claimed.length, resolved, failed, released };
    this.log.info(result, 'Backfill drain complete');
    return result;
  }
}
