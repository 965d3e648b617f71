/**
 * Test Fixtures — shared data and wiring
 * Layer: Test Helpers
 *
 * Company IDs and names here are made up. `buildResolver` wires the real
 * services over the in-memory stores, the way container.ts wires them over
 * Postgres.
 */
import pino from 'pino';

import { BudgetedExternalResolver } from '@application/services/BudgetedExternalResolver';
import { CompanyIdResolver } from '@application/services/CompanyIdResolver';
import { MappingStore } from '@application/services/MappingStore';
import type { Logger } from '@core/logger';
import { createOverrideSet, type OverrideSet } from '@domain/entities/Override';
import type { ExternalCompanyMatch, IExternalLookupProvider } from '@domain/interfaces/IExternalLookupProvider';
import { FallbackIdGenerator } from '@domain/services/FallbackIdGenerator';

import { InMemoryBackfillQueue, InMemoryMappingRepository } from './inMemoryStores';

export const TEST_SALT = 'test-secret';

export function silentLogger(): Logger {
  return pino({ level: 'silent' });
}

/** Plan "PLAN-001" and the customer name "示例科技有限公司" are overridden. */
export const sampleOverrides: OverrideSet = createOverrideSet([
  { name: 'plan', matchOn: 'planCode', entries: new Map([['PLAN-001', 'C100']]) },
  { name: 'customer_name', matchOn: 'customerName', entries: new Map([['示例科技有限公司', 'C200']]) },
]);

type Answer = ExternalCompanyMatch | null | Error;

/**
 * External provider driven by a lookup table keyed by normalized name.
 * Unknown names get `defaultAnswer`. Every call is recorded.
 */
export class ScriptedLookupProvider implements IExternalLookupProvider {
  readonly calls: string[] = [];

  constructor(
    private answers: Record<string, Answer> = {},
    private defaultAnswer: Answer = null,
  ) {}

  async lookup(normalizedName: string, _signal: AbortSignal): Promise<ExternalCompanyMatch | null> {
    this.calls.push(normalizedName);
    const answer = normalizedName in this.answers ? this.answers[normalizedName] : this.defaultAnswer;
    if (answer instanceof Error) throw answer;
    return answer;
  }
}

/** Provider that never answers until aborted. */
export class HangingLookupProvider implements IExternalLookupProvider {
  aborted = false;

  lookup(_normalizedName: string, signal: AbortSignal): Promise<ExternalCompanyMatch | null> {
    return new Promise((_resolve, reject) => {
      signal.addEventListener('abort', () => {
        this.aborted = true;
        reject(new Error('aborted'));
      });
    });
  }
}

export interface ResolverHarness {
  resolver: CompanyIdResolver;
  store: MappingStore;
  repo: InMemoryMappingRepository;
  queue: InMemoryBackfillQueue;
  provider: IExternalLookupProvider;
  fallbackIds: FallbackIdGenerator;
}

export function buildResolver(
  options: { provider?: IExternalLookupProvider; overrides?: OverrideSet; timeoutMs?: number; defaultBudget?: number } = {},
): ResolverHarness {
  const logger = silentLogger();
  const repo = new InMemoryMappingRepository();
  const queue = new InMemoryBackfillQueue();
  const provider = options.provider ?? new ScriptedLookupProvider();
  const fallbackIds = new FallbackIdGenerator(TEST_SALT);
  const store = new MappingStore(options.overrides ?? sampleOverrides, repo, logger);
  const external = new BudgetedExternalResolver(provider, store, options.timeoutMs ?? 1000, logger);
  const resolver = new CompanyIdResolver(store, external, queue, fallbackIds, options.defaultBudget ?? 0, logger);
  return { resolver, store, repo, queue, provider, fallbackIds };
}
