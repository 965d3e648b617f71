/**
 * Override Loader — static mapping files → OverrideSet
 * Layer: Infrastructure
 *
 * Reads the ordered list of override files once at startup. Each file is one
 * tier:
 *
 *   { "tier": "plan", "matchOn": "planCode", "mappings": { "P0001": "614810477" } }
 *
 * File order is priority order. Keys of name-matched tiers are normalized on
 * load so lookups compare like with like; code-matched keys are trimmed only.
 *
 * Anything wrong (unreadable file, bad JSON, schema violation, a key that
 * normalizes to nothing, one key mapped to two IDs, a repeated tier name)
 * throws ConfigurationError. Running with half-loaded overrides would produce
 * systematically wrong IDs, so there is no partial load.
 */
import { readFileSync } from 'node:fs';
import path from 'node:path';
import { z } from 'zod';

import {
  NAME_KEYED_MATCHES,
  createOverrideSet,
  type OverrideSet,
  type OverrideTier,
} from '@domain/entities/Override';
import { isEmptyName, normalizeCompanyName } from '@domain/services/CompanyNameNormalizer';
import { ConfigurationError, describeError } from '@shared/errors/AppError';

/** Tier names become keys of the per-run statistics object. */
const RESERVED_TIER_NAMES = new Set(['__proto__', 'constructor', 'prototype']);

export const overrideFileSchema = z
  .object({
    tier: z
      .string()
      .trim()
      .min(1)
      .refine((name) => !RESERVED_TIER_NAMES.has(name), 'tier name is reserved'),
    matchOn: z.enum(['planCode', 'accountNumber', 'customerName', 'accountName']),
    mappings: z.record(
      z.string(),
      z
        .string()
        .trim()
        .min(1)
        .regex(/^\S+$/, 'company IDs may not contain whitespace'),
    ),
  })
  .strict();

export type OverrideFile = z.infer<typeof overrideFileSchema>;

/** Validates one parsed file. `source` only labels error messages. */
export function parseOverrideFile(content: unknown, source: string): OverrideTier {
  const result = overrideFileSchema.safeParse(content);
  if (!result.success) {
    const messages = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid override file ${source}: ${messages}`);
  }

  const { tier, matchOn, mappings } = result.data;
  const byName = NAME_KEYED_MATCHES.has(matchOn);
  const entries = new Map<string, string>();

  for (const [rawKey, companyId] of Object.entries(mappings)) {
    const key = byName ? normalizeCompanyName(rawKey) : rawKey.trim();
    if (key.length === 0 || (byName && isEmptyName(key))) {
      throw new ConfigurationError(`Invalid override file ${source}: key "${rawKey}" is empty after normalization`);
    }

    const existing = entries.get(key);
    if (existing !== undefined && existing !== companyId) {
      throw new ConfigurationError(
        `Invalid override file ${source}: key "${rawKey}" maps to both ${existing} and ${companyId}`,
      );
    }
    entries.set(key, companyId);
  }

  return { name: tier, matchOn, entries };
}

function readJson(filePath: string): unknown {
  let text: string;
  try {
    text = readFileSync(filePath, 'utf8');
  } catch (err) {
    throw new ConfigurationError(`Cannot read override file ${filePath}: ${describeError(err)}`, { cause: err });
  }

  try {
    return JSON.parse(text);
  } catch (err) {
    throw new ConfigurationError(`Override file ${filePath} is not valid JSON: ${describeError(err)}`, {
      cause: err,
    });
  }
}

/** Loads every file, highest priority first. Relative paths resolve against `baseDir`. */
export function loadOverrideFiles(files: readonly string[], baseDir: string = process.cwd()): OverrideSet {
  const tiers: OverrideTier[] = [];
  const seen = new Set<string>();

  for (const file of files) {
    const filePath = path.resolve(baseDir, file);
    const tier = parseOverrideFile(readJson(filePath), filePath);
    if (seen.has(tier.name)) {
      throw new ConfigurationError(`Override tier "${tier.name}" is defined more than once`);
    }
    seen.add(tier.name);
    tiers.push(tier);
  }

  return createOverrideSet(tiers);
}
