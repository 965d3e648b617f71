/**
 * Dependency Injection Tokens
 * Layer: Core
 *
 * Every injectable dependency that is consumed through an interface gets a
 * Symbol token here. Grouped by architectural layer so a new repository or
 * service is registered in one obvious place.
 */
export const TOKENS = {
  // Infrastructure
  Knex: Symbol.for('Knex'),
  Logger: Symbol.for('Logger'),

  // Repositories and providers: persistence / out-of-process contracts
  MappingRepository: Symbol.for('MappingRepository'),
  BackfillQueue: Symbol.for('BackfillQueue'),
  ExternalLookupProvider: Symbol.for('ExternalLookupProvider'),

  // Static configuration loaded at startup
  OverrideSet: Symbol.for('OverrideSet'),
  FallbackIdGenerator: Symbol.for('FallbackIdGenerator'),
  ExternalLookupTimeoutMs: Symbol.for('ExternalLookupTimeoutMs'),
  SyncLookupBudget: Symbol.for('SyncLookupBudget'),

  // Services: application-level orchestrators
  MappingStore: Symbol.for('MappingStore'),
  ExternalResolver: Symbol.for('ExternalResolver'),
  CompanyIdResolver: Symbol.for('CompanyIdResolver'),
  BackfillDrainService: Symbol.for('BackfillDrainService'),
} as const;
