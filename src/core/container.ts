/**
 * Dependency Injection Container
 * Layer: Core
 *
 * The single place where tokens are bound to implementations. Nothing else
 * constructs a repository or service by hand.
 *
 *   - `reflect-metadata` is imported first so the @injectable / @inject
 *     decorators can record constructor parameters.
 *   - `useValue` registers objects built here at startup: the logger, the
 *     knex pool, the override set and the fallback-ID generator.
 *   - `useClass` lets tsyringe build the class and inject its own
 *     dependencies.
 *
 * Building the container loads the override files, so a malformed one throws
 * ConfigurationError here, at startup, before any batch runs.
 */
import 'reflect-metadata';
import { container } from 'tsyringe';

import { config } from './config';
import { logger } from './logger';
import { TOKENS } from './types';

import { BackfillDrainService } from '@application/services/BackfillDrainService';
import { BudgetedExternalResolver } from '@application/services/BudgetedExternalResolver';
import { CompanyIdResolver } from '@application/services/CompanyIdResolver';
import { MappingStore } from '@application/services/MappingStore';
import { FallbackIdGenerator, resolveSalt } from '@domain/services/FallbackIdGenerator';
import { getDbConnection } from '@infrastructure/database/connection';
import { UnconfiguredLookupProvider } from '@infrastructure/external/UnconfiguredLookupProvider';
import { loadOverrideFiles } from '@infrastructure/overrides/OverrideLoader';
import { PostgresBackfillQueue } from '@infrastructure/repositories/PostgresBackfillQueue';
import { PostgresMappingRepository } from '@infrastructure/repositories/PostgresMappingRepository';

const overrides = loadOverrideFiles(config.identity.overrideFiles);
logger.info({ tiers: overrides.map((tier) => ({ name: tier.name, entries: tier.entries.size })) }, 'Override tiers loaded');

container.register(TOKENS.Logger, { useValue: logger });
container.register(TOKENS.Knex, { useValue: getDbConnection() });
container.register(TOKENS.OverrideSet, { useValue: overrides });
container.register(TOKENS.FallbackIdGenerator, {
  useValue: new FallbackIdGenerator(resolveSalt(config.identity.salt, config.nodeEnv, logger)),
});
container.register(TOKENS.ExternalLookupTimeoutMs, { useValue: config.enrichment.lookupTimeoutMs });
container.register(TOKENS.SyncLookupBudget, { useValue: config.enrichment.syncBudget });
container.register(TOKENS.ExternalLookupProvider, { useClass: UnconfiguredLookupProvider });

container.registerSingleton(TOKENS.MappingRepository, PostgresMappingRepository);
container.registerSingleton(TOKENS.BackfillQueue, PostgresBackfillQueue);
container.registerSingleton(TOKENS.MappingStore, MappingStore);
container.registerSingleton(TOKENS.ExternalResolver, BudgetedExternalResolver);
container.registerSingleton(TOKENS.CompanyIdResolver, CompanyIdResolver);
container.registerSingleton(TOKENS.BackfillDrainService, BackfillDrainService);

export { container };
