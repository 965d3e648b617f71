/**
 * Budgeted External Resolver
 * Layer: Application
 *
 * Wraps the external lookup provider so that a batch spends at most its
 * budget on network calls. Each attempt costs one unit whatever the outcome;
 * with no budget left the provider is not called and nothing is consumed.
 *
 * A successful answer is written through to the cache as an `external`
 * mapping. If that write fails the ID is still returned with `cached: false`,
 * so a caller that relies on the cache (the backfill drain) can tell.
 *
 * No error escapes `tryResolve`. Timeouts, provider errors and malformed
 * answers all come back as a consumed attempt with `companyId: null`.
 * Failure reasons are error codes or class names, never provider messages.
 */
import { MappingStore } from '@application/services/MappingStore';
import type { Logger } from '@core/logger';
import { TOKENS } from '@core/types';
import type { ExternalCompanyMatch, IExternalLookupProvider } from '@domain/interfaces/IExternalLookupProvider';
import { isEmptyName } from '@domain/services/CompanyNameNormalizer';
import { isFallbackId } from '@domain/services/FallbackIdGenerator';
import { ExternalLookupTimeoutError, InvalidExternalMatchError, errorLabel } from '@shared/errors/AppError';
import { inject, injectable } from 'tsyringe';

export interface ExternalAttempt {
  companyId: string | null;
  /** Whether one unit of budget was spent. */
  consumed: boolean;
  /** Whether the ID was written through to the cache. */
  cached: boolean;
  /** Error label when the provider was called and did not produce a cached ID. */
  error?: string;
}

@injectable()
export class BudgetedExternalResolver {
  constructor(
    @inject(TOKENS.ExternalLookupProvider) private provider: IExternalLookupProvider,
    @inject(TOKENS.MappingStore) private store: MappingStore,
    @inject(TOKENS.ExternalLookupTimeoutMs) private timeoutMs: number,
    @inject(TOKENS.Logger) private log: Logger,
  ) {}

  async tryResolve(normalizedName: string, remainingBudget: number): Promise<ExternalAttempt> {
    if (remainingBudget <= 0 || isEmptyName(normalizedName)) {
      return { companyId: null, consumed: false, cached: false };
    }

    let companyId: string;
    let confidence: number | undefined;
    try {
      const match = await this.lookupWithTimeout(normalizedName);
      if (match === null) return { companyId: null, consumed: true, cached: false };
      companyId = validateMatch(match);
      confidence = match.confidence;
    } catch (err) {
      const code = errorLabel(err);
      this.log.debug({ code }, 'External lookup attempt failed');
      return { companyId: null, consumed: true, cached: false, error: code };
    }

    try {
      await this.store.writeThrough(normalizedName, companyId, 'external', confidence);
    } catch (err) {
      const code = errorLabel(err);
      this.log.warn({ code }, 'External match not cached; write-through failed');
      return { companyId, consumed: true, cached: false, error: code };
    }
    return { companyId, consumed: true, cached: true };
  }

  private async lookupWithTimeout(normalizedName: string): Promise<ExternalCompanyMatch | null> {
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;

    const timeout = new Promise<never>((_resolve, reject) => {
      timer = setTimeout(() => {
        reject(new ExternalLookupTimeoutError(this.timeoutMs));
        controller.abort();
      }, this.timeoutMs);
    });

    try {
      return await Promise.race([this.provider.lookup(normalizedName, controller.signal), timeout]);
    } finally {
      clearTimeout(timer);
    }
  }
}

function validateMatch(match: ExternalCompanyMatch): string {
  const companyId = typeof match.companyId === 'string' ? match.companyId.trim() : '';
  if (companyId.length === 0 || /\s/.test(companyId)) {
    throw new InvalidExternalMatchError('malformed company ID');
  }
  if (isFallbackId(companyId)) {
    throw new InvalidExternalMatchError('response carried a fallback ID');
  }
  return companyId;
}
