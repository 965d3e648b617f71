/**
 * Default external lookup provider.
 * Layer: Infrastructure
 *
 * The real authority's wire protocol is deployment-specific and registered in
 * its place. Until then every call fails fast, which the budgeted resolver
 * counts as a consumed, failed attempt.
 */
import type { ExternalCompanyMatch, IExternalLookupProvider } from '@domain/interfaces/IExternalLookupProvider';
import { ExternalLookupError } from '@shared/errors/AppError';

export class UnconfiguredLookupProvider implements IExternalLookupProvider {
  async lookup(_normalizedName: string, _signal: AbortSignal): Promise<ExternalCompanyMatch | null> {
    throw new ExternalLookupError('no external lookup provider is configured');
  }
}
