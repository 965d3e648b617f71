/**
 * Unit Tests — BudgetedExternalResolver
 *
 * Budget is checked before any call, every call costs one unit whatever the
 * outcome, hits are cached as `external`, and nothing ever throws.
 */
import { BudgetedExternalResolver } from '@application/services/BudgetedExternalResolver';
import { MappingStore } from '@application/services/MappingStore';
import type { IExternalLookupProvider } from '@domain/interfaces/IExternalLookupProvider';
import { generateFallbackId } from '@domain/services/FallbackIdGenerator';
import { UnconfiguredLookupProvider } from '@infrastructure/external/UnconfiguredLookupProvider';
import { EMPTY_NAME_SENTINEL } from '@shared/constants';
import { ExternalLookupError } from '@shared/errors/AppError';

import { HangingLookupProvider, ScriptedLookupProvider, TEST_SALT, sampleOverrides, silentLogger } from '../helpers/fixtures';
import { InMemoryMappingRepository } from '../helpers/inMemoryStores';

describe('BudgetedExternalResolver', () => {
  let repo: InMemoryMappingRepository;
  let store: MappingStore;

  const build = (provider: IExternalLookupProvider, timeoutMs = 1000) =>
    new BudgetedExternalResolver(provider, store, timeoutMs, silentLogger());

  beforeEach(() => {
    repo = new InMemoryMappingRepository();
    store = new MappingStore(sampleOverrides, repo, silentLogger());
  });

  it('should not call the provider when no budget remains', async () => {
    const provider = new ScriptedLookupProvider({}, { companyId: 'C500' });

    const attempt = await build(provider).tryResolve('abc集团', 0);

    expect(attempt).toEqual({ companyId: null, consumed: false, cached: false });
    expect(provider.calls).toEqual([]);
  });

  it('should not call the provider for the empty sentinel', async () => {
    const provider = new ScriptedLookupProvider({}, { companyId: 'C500' });

    const attempt = await build(provider).tryResolve(EMPTY_NAME_SENTINEL, 5);

    expect(attempt).toEqual({ companyId: null, consumed: false, cached: false });
    expect(provider.calls).toEqual([]);
  });

  it('should return the answer and write it through as external', async () => {
    const provider = new ScriptedLookupProvider({ abc集团: { companyId: ' C500 ', confidence: 0.95 } });

    const attempt = await build(provider).tryResolve('abc集团', 3);

    expect(attempt).toEqual({ companyId: 'C500', consumed: true, cached: true });
    expect(repo.entries.get('abc集团')).toMatchObject({ companyId: 'C500', sourceTier: 'external', confidence: 0.95 });
  });

  it('should consume budget on a no-match answer', async () => {
    const attempt = await build(new ScriptedLookupProvider()).tryResolve('abc集团', 1);

    expect(attempt).toEqual({ companyId: null, consumed: true, cached: false });
  });

  it('should consume budget and report the error code when the provider throws', async () => {
    const provider = new ScriptedLookupProvider({}, new ExternalLookupError('HTTP 503'));

    const attempt = await build(provider).tryResolve('abc集团', 1);

    expect(attempt).toEqual({ companyId: null, consumed: true, cached: false, error: 'EXTERNAL_LOOKUP_FAILED' });
    expect(repo.entries.size).toBe(0);
  });

  it('should report only the error class when the provider message quotes the name', async () => {
    const provider = new ScriptedLookupProvider({}, new TypeError('no company matches "abc集团"'));

    const attempt = await build(provider).tryResolve('abc集团', 1);

    expect(attempt.error).toBe('TypeError');
  });

  it.each([
    ['a blank ID', { companyId: '  ' }],
    ['an ID with spaces', { companyId: 'C 500' }],
    ['a fallback ID', { companyId: generateFallbackId('abc集团', TEST_SALT) }],
  ])('should treat %s as a failed attempt', async (_label, answer) => {
    const attempt = await build(new ScriptedLookupProvider({}, answer)).tryResolve('abc集团', 1);

    expect(attempt).toEqual({ companyId: null, consumed: true, cached: false, error: 'EXTERNAL_MATCH_INVALID' });
  });

  it('should time out a hung call, abort it and consume budget', async () => {
    const provider = new HangingLookupProvider();

    const attempt = await build(provider, 20).tryResolve('abc集团', 1);

    expect(attempt).toEqual({ companyId: null, consumed: true, cached: false, error: 'EXTERNAL_LOOKUP_TIMEOUT' });
    expect(provider.aborted).toBe(true);
  });

  it('should still return the ID when caching it fails, flagged as not cached', async () => {
    repo.failNext(new Error('connection reset'));

    const attempt = await build(new ScriptedLookupProvider({}, { companyId: 'C500' })).tryResolve('abc集团', 1);

    expect(attempt).toEqual({ companyId: 'C500', consumed: true, cached: false, error: 'STORE_UNAVAILABLE' });
    expect(repo.entries.size).toBe(0);
  });

  it('should count the default unconfigured provider as a failed attempt', async () => {
    const attempt = await build(new UnconfiguredLookupProvider()).tryResolve('abc集团', 1);

    expect(attempt).toEqual({ companyId: null, consumed: true, cached: false, error: 'EXTERNAL_LOOKUP_FAILED' });
  });
});
