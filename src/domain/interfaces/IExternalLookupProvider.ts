/**
 * External Lookup Provider Interface
 * Layer: Domain
 *
 * The out-of-process authority that can turn a normalized company name into
 * a real company ID. Its wire protocol and auth live behind this interface.
 * `null` means "no match"; any thrown error counts as a failed call. The
 * signal is aborted when the caller's timeout fires.
 */
export interface ExternalCompanyMatch {
  companyId: string;
  confidence?: number;
}

export interface IExternalLookupProvider {
  lookup(normalizedName: string, signal: AbortSignal): Promise<ExternalCompanyMatch | null>;
}
