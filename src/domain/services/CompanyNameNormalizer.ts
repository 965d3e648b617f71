/**
 * Company Name Normalizer
 * Layer: Domain
 *
 * Turns a raw, messy company name into the canonical key used for cache
 * lookups, queue deduplication and fallback-ID hashing. Pure and total: every
 * input, `null` included, yields a non-empty string, and nothing throws.
 *
 * One pass applies, in order:
 *   1. remove all whitespace (full-width spaces included)
 *   2. remove decorative quotes, bracketed leading annotations, group-scope
 *      suffixes, status markers ("已转出", "(已终止)", ...) and trailing
 *      bracketed suffixes that are not a legal form ("(普通合伙)" stays)
 *   3. fold full-width ASCII to half-width
 *   4. unify bracket styles to ASCII parentheses
 *   5. trim trailing punctuation and empty brackets
 *   6. lower-case
 *
 * Passes repeat until the value stops changing. Removing one marker can
 * expose another ("X-终止." only shows "-终止" once the period is gone), and
 * iterating to a fixpoint is what makes normalize(normalize(s)) == normalize(s).
 *
 * Marker catalogs are data, kept in normalizationRules.json.
 */
import rules from '@domain/data/normalizationRules.json';
import { EMPTY_NAME_SENTINEL } from '@shared/constants';

const escapeRegExp = (value: string): string => value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

const byLengthDesc = (a: string, b: string): number => b.length - a.length;

const PLACEHOLDERS: ReadonlySet<string> = new Set(rules.invalidPlaceholders.map((p) => p.toLowerCase()));
const PROTECTED_NAMES: ReadonlySet<string> = new Set(rules.protectedNames.map((n) => n.toLowerCase()));
const LEGAL_FORM_MARKERS = [...rules.legalFormMarkers].sort(byLengthDesc);
const SCOPE_SUFFIXES = [...rules.scopeSuffixes].sort(byLengthDesc);
const DECORATIVE = new RegExp(`[${escapeRegExp(rules.decorativeCharacters)}]`, 'g');

const OPEN = '[(（]';
const CLOSE = '[)）]';
const SEPARATOR = '[-—]';

interface MarkerPatterns {
  leading: RegExp;
  trailing: RegExp;
}

// Longest first so "已终止" is removed whole before "终止" gets a chance.
const MARKER_PATTERNS: MarkerPatterns[] = [...rules.statusMarkers].sort(byLengthDesc).map((marker) => {
  const m = escapeRegExp(marker);
  return {
    leading: new RegExp(`^(?:${OPEN}${m}${CLOSE}${SEPARATOR}?|${m}${SEPARATOR})`),
    trailing: new RegExp(`(?:${SEPARATOR}|${OPEN})${m}${CLOSE}?$`),
  };
});

const LEADING_ANNOTATION = /^[(（][^()（）]*[)）]/;
const TRAILING_BRACKETED = /[(（]([^()（）]+)[)）]$/;
const FULL_WIDTH_ASCII = /[！-～]/g;
const FULL_WIDTH_OFFSET = 0xfee0;
const OPENING_BRACKETS = /[[【〔〖｛{]/g;
const CLOSING_BRACKETS = /[\]】〕〗｝}]/g;
const TRAILING_PUNCTUATION = /(?:[-—–.,;:!?。，；：、！？·]|\(\))+$/;

function removeWhitespace(value: string): string {
  return value.replace(/\s+/g, '');
}

function removeMarkers(value: string): string {
  let result = value.replace(DECORATIVE, '').replace(LEADING_ANNOTATION, '');

  for (const suffix of SCOPE_SUFFIXES) {
    if (result.endsWith(suffix)) result = result.slice(0, -suffix.length);
  }

  for (const { leading, trailing } of MARKER_PATTERNS) {
    result = result.replace(leading, '').replace(trailing, '');
  }

  const bracketed = TRAILING_BRACKETED.exec(result);
  if (bracketed && !LEGAL_FORM_MARKERS.some((form) => bracketed[1].includes(form))) {
    result = result.slice(0, bracketed.index);
  }
  return result;
}

function foldFullWidth(value: string): string {
  return value.replace(FULL_WIDTH_ASCII, (ch) => String.fromCharCode(ch.charCodeAt(0) - FULL_WIDTH_OFFSET));
}

function unifyBrackets(value: string): string {
  return value.replace(/（/g, '(').replace(/）/g, ')').replace(OPENING_BRACKETS, '(').replace(CLOSING_BRACKETS, ')');
}

function trimTrailingPunctuation(value: string): string {
  return value.replace(TRAILING_PUNCTUATION, '');
}

function normalizeOnce(value: string): string {
  const cleaned = trimTrailingPunctuation(unifyBrackets(foldFullWidth(removeMarkers(removeWhitespace(value)))));
  return cleaned.toLowerCase();
}

export function normalizeCompanyName(raw: string | null | undefined): string {
  if (raw == null) return EMPTY_NAME_SENTINEL;

  let current = removeWhitespace(raw);
  if (PLACEHOLDERS.has(current.toLowerCase())) return EMPTY_NAME_SENTINEL;

  for (;;) {
    if (PROTECTED_NAMES.has(current.toLowerCase())) return current.toLowerCase();
    const next = normalizeOnce(current);
    if (next === current) break;
    current = next;
  }

  if (current.length === 0 || PLACEHOLDERS.has(current)) return EMPTY_NAME_SENTINEL;
  return current;
}

export function isEmptyName(normalized: string): boolean {
  return normalized === EMPTY_NAME_SENTINEL;
}
