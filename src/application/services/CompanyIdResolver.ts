/**
 * Company ID Resolver — The Orchestrator
 * Layer: Application
 *
 * Takes one batch of upstream rows and gives every row a company ID, trying
 * five tiers in strict order and stopping at the first that answers:
 *
 *   1. override: static override tiers (plan code, account number, names)
 *   2. cache: persistent mapping cache, one batched read for the batch
 *   3. passthrough: an ID the row already carries; optionally backflowed
 *   4. external: budgeted external lookup, one attempt per unique name
 *   5. fallback: deterministic generated ID (always succeeds)
 *
 * Each tier only looks at rows still unresolved, so a row's outcome is fixed
 * the moment a tier assigns it. Rows that ended on a fallback ID are enqueued
 * for background re-enrichment in a single call after classification.
 *
 * A strategy without `syncLookupBudget` gets the configured default budget
 * (ENRICHMENT_SYNC_BUDGET).
 *
 * Runtime failures (store down, provider timing out, queue insert failing)
 * become tier misses and counters in ResolutionStatistics. Only an invalid
 * strategy throws. Logs carry counts, never names.
 */
import { BudgetedExternalResolver } from '@application/services/BudgetedExternalResolver';
import { MappingStore } from '@application/services/MappingStore';
import type { Logger } from '@core/logger';
import { TOKENS } from '@core/types';
import type { EnqueueRequest } from '@domain/entities/EnrichmentRequest';
import type { MappingEntry, MappingWrite } from '@domain/entities/MappingEntry';
import type { OverrideLookupKeys } from '@domain/entities/Override';
import {
  createStatistics,
  parseResolutionStrategy,
  type InputRow,
  type OutputRow,
  type ResolutionResult,
  type ResolutionStatistics,
  type ResolutionStrategy,
  type ResolutionStrategyInput,
  type RowResolution,
} from '@domain/entities/Resolution';
import type { IBackfillQueue } from '@domain/interfaces/IBackfillQueue';
import { isEmptyName, normalizeCompanyName } from '@domain/services/CompanyNameNormalizer';
import { FallbackIdGenerator, isFallbackId } from '@domain/services/FallbackIdGenerator';
import { PASSTHROUGH_ID_PLACEHOLDERS } from '@shared/constants';
import { errorLabel } from '@shared/errors/AppError';
import { inject, injectable } from 'tsyringe';

interface PreparedRow {
  rawName: string;
  normalizedName: string;
  keys: OverrideLookupKeys;
  existingId: string | null;
}

type Slot = RowResolution | null;

@injectable()
export class CompanyIdResolver {
  constructor(
    @inject(TOKENS.MappingStore) private store: MappingStore,
    @inject(TOKENS.ExternalResolver) private external: BudgetedExternalResolver,
    @inject(TOKENS.BackfillQueue) private queue: IBackfillQueue,
    @inject(TOKENS.FallbackIdGenerator) private fallbackIds: FallbackIdGenerator,
    @inject(TOKENS.SyncLookupBudget) private defaultBudget: number,
    @inject(TOKENS.Logger) private log: Logger,
  ) {}

  async resolveBatch(rows: readonly InputRow[], strategyInput: ResolutionStrategyInput = {}): Promise<ResolutionResult> {
    const strategy = parseResolutionStrategy({
      ...strategyInput,
      syncLookupBudget: strategyInput.syncLookupBudget ?? this.defaultBudget,
    });
    const stats = createStatistics(rows.length, strategy.syncLookupBudget);
    const prepared = rows.map((row) => prepareRow(row, strategy));
    const slots: Slot[] = prepared.map(() => null);

    this.applyOverrides(prepared, slots, stats);
    await this.applyCache(prepared, slots, stats);
    await this.applyPassthrough(prepared, slots, stats, strategy);
    if (strategy.useEnrichmentService) {
      await this.applyExternal(prepared, slots, stats);
    }
    const requests = this.applyFallback(prepared, slots, stats, strategy);

    if (strategy.enableAsyncQueue && requests.length > 0) {
      await this.enqueue(requests, stats);
    }

    const resolutions = slots.map((slot): RowResolution => slot ?? { kind: 'unresolved' });
    const output = rows.map(
      (row, i): OutputRow => ({ ...row, [strategy.outputColumn]: companyIdOf(resolutions[i]) }),
    );

    this.log.info({ stats }, 'Company ID batch resolved');
    return { rows: output, resolutions, statistics: stats };
  }

  private applyOverrides(prepared: PreparedRow[], slots: Slot[], stats: ResolutionStatistics): void {
    prepared.forEach((row, i) => {
      const match = this.store.lookupStatic(row.keys);
      if (!match) return;
      slots[i] = { kind: 'resolved', tier: 'override', companyId: match.companyId, overrideTier: match.overrideTier };
      stats.overrideHits[match.overrideTier] = (stats.overrideHits[match.overrideTier] ?? 0) + 1;
    });
  }

  private async applyCache(prepared: PreparedRow[], slots: Slot[], stats: ResolutionStatistics): Promise<void> {
    const names = unresolvedIndexes(slots)
      .map((i) => prepared[i].normalizedName)
      .filter((name) => !isEmptyName(name));
    if (names.length === 0) return;

    let cached: Map<string, MappingEntry>;
    try {
      cached = await this.store.batchLookupCached(names);
    } catch (err) {
      stats.storeErrors++;
      this.log.warn({ names: names.length, code: errorLabel(err) }, 'Cache lookup failed; treating batch as cache miss');
      return;
    }

    for (const i of unresolvedIndexes(slots)) {
      const entry = cached.get(prepared[i].normalizedName);
      if (!entry) continue;
      slots[i] = { kind: 'resolved', tier: 'cache', companyId: entry.companyId };
      stats.cacheHits++;
    }
  }

  private async applyPassthrough(
    prepared: PreparedRow[],
    slots: Slot[],
    stats: ResolutionStatistics,
    strategy: ResolutionStrategy,
  ): Promise<void> {
    const backflow: MappingWrite[] = [];

    for (const i of unresolvedIndexes(slots)) {
      const { existingId, normalizedName } = prepared[i];
      if (existingId === null) continue;
      slots[i] = { kind: 'resolved', tier: 'passthrough', companyId: existingId };
      stats.passthroughHits++;

      if (strategy.enableBackflow && !isEmptyName(normalizedName) && !isFallbackId(existingId)) {
        backflow.push({ normalizedName, companyId: existingId, sourceTier: 'backflow' });
      }
    }

    if (backflow.length === 0) return;
    try {
      const result = await this.store.writeThroughBatch(backflow);
      stats.backflow.written += result.written;
      stats.backflow.skipped += result.skipped;
    } catch (err) {
      stats.storeErrors++;
      stats.backflow.failed += backflow.length;
      this.log.warn({ writes: backflow.length, code: errorLabel(err) }, 'Backflow write-through failed');
    }
  }

  /** One budget unit per unique name; a hit resolves every row sharing it. */
  private async applyExternal(prepared: PreparedRow[], slots: Slot[], stats: ResolutionStatistics): Promise<void> {
    const groups = new Map<string, number[]>();
    for (const i of unresolvedIndexes(slots)) {
      const name = prepared[i].normalizedName;
      if (isEmptyName(name)) continue;
      const group = groups.get(name);
      if (group) group.push(i);
      else groups.set(name, [i]);
    }

    for (const [name, indexes] of groups) {
      if (stats.budgetRemaining <= 0) break;

      const attempt = await this.external.tryResolve(name, stats.budgetRemaining);
      if (attempt.consumed) {
        stats.budgetRemaining--;
        stats.budgetConsumed++;
        stats.externalAttempts++;
      }

      if (attempt.companyId === null) {
        if (attempt.consumed) stats.externalFailures++;
        continue;
      }
      for (const i of indexes) {
        slots[i] = { kind: 'resolved', tier: 'external', companyId: attempt.companyId };
        stats.externalHits++;
      }
    }
  }

  /** Returns the queue requests for rows that ended on a fallback ID, one per name. */
  private applyFallback(
    prepared: PreparedRow[],
    slots: Slot[],
    stats: ResolutionStatistics,
    strategy: ResolutionStrategy,
  ): EnqueueRequest[] {
    const requests = new Map<string, EnqueueRequest>();

    for (const i of unresolvedIndexes(slots)) {
      if (!strategy.generateFallbackIds) {
        slots[i] = { kind: 'unresolved' };
        stats.unresolved++;
        continue;
      }

      const { rawName, normalizedName } = prepared[i];
      const fallbackId = this.fallbackIds.forNormalized(normalizedName);
      slots[i] = { kind: 'resolved', tier: 'fallback', companyId: fallbackId };
      stats.fallbackIdsGenerated++;

      if (!isEmptyName(normalizedName) && !requests.has(normalizedName)) {
        requests.set(normalizedName, { rawName, normalizedName, fallbackId });
      }
    }
    return [...requests.values()];
  }

  private async enqueue(requests: EnqueueRequest[], stats: ResolutionStatistics): Promise<void> {
    try {
      const result = await this.queue.enqueueBatch(requests);
      stats.queue.queued = result.queued;
      stats.queue.skipped = result.skipped;
    } catch (err) {
      stats.queue.failed = true;
      this.log.warn({ requests: requests.length, code: errorLabel(err) }, 'Backfill enqueue failed; fallback IDs kept');
    }
  }
}

function unresolvedIndexes(slots: Slot[]): number[] {
  const indexes: number[] = [];
  slots.forEach((slot, i) => {
    if (slot === null) indexes.push(i);
  });
  return indexes;
}

function cellText(value: unknown): string | undefined {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  if (typeof value === 'bigint') return value.toString();
  return undefined;
}

/** Blank cells and placeholder values such as "N/A" or "NULL" carry no ID. */
function existingIdOf(value: unknown): string | null {
  const text = cellText(value)?.trim();
  if (!text || PASSTHROUGH_ID_PLACEHOLDERS.has(text.toUpperCase())) return null;
  return text;
}

function prepareRow(row: InputRow, strategy: ResolutionStrategy): PreparedRow {
  const rawName = cellText(row[strategy.customerNameColumn])?.trim() ?? '';
  return {
    rawName,
    normalizedName: normalizeCompanyName(rawName),
    keys: {
      planCode: cellText(row[strategy.planCodeColumn]),
      accountNumber: cellText(row[strategy.accountNumberColumn]),
      customerName: cellText(row[strategy.customerNameColumn]),
      accountName: cellText(row[strategy.accountNameColumn]),
    },
    existingId: existingIdOf(row[strategy.companyIdColumn]),
  };
}

function companyIdOf(resolution: RowResolution): string | null {
  return resolution.kind === 'resolved' ? resolution.companyId : null;
}
