/**
 * Static override tiers
 * Layer: Domain
 *
 * Human-curated mappings loaded once at startup from ordered files. An
 * OverrideSet is immutable and ordered highest priority first; first match
 * wins. Each tier matches on exactly one key kind:
 *
 *   planCode: trimmed raw plan code
 *   accountNumber: trimmed raw account number
 *   customerName: normalized customer name
 *   accountName: normalized account name
 *
 * The set is passed to the MappingStore at construction, so two stores with
 * different overrides can coexist in one process.
 */
export type OverrideMatchKey = 'planCode' | 'accountNumber' | 'customerName' | 'accountName';

export interface OverrideTier {
  readonly name: string;
  readonly matchOn: OverrideMatchKey;
  readonly entries: ReadonlyMap<string, string>;
}

export type OverrideSet = readonly OverrideTier[];

/** Per-row keys available for static matching. Absent keys never match. */
export type OverrideLookupKeys = Partial<Record<OverrideMatchKey, string>>;

export const NAME_KEYED_MATCHES: ReadonlySet<OverrideMatchKey> = new Set([
  'customerName',
  'accountName',
]);

export function createOverrideSet(tiers: OverrideTier[]): OverrideSet {
  return Object.freeze(
    tiers.map((tier) =>
      Object.freeze({ name: tier.name, matchOn: tier.matchOn, entries: new Map(tier.entries) }),
    ),
  );
}
