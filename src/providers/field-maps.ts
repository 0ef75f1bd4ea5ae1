import { z } from 'zod';
import { readFileSync, existsSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { DataParseError } from '../core/errors.js';
import {
  BALANCE_FIELDS,
  INCOME_FIELDS,
  type BalanceField,
  type IncomeField,
  type ProviderName,
} from '../core/types.js';

/**
 * Per-provider field dictionaries.
 *
 * Each canonical field maps to provider-native names in priority order
 * (try first = highest priority). The tables live in data/field-maps.json,
 * are validated on load and frozen before being handed to an adapter.
 */

export interface ProviderFieldMap {
  readonly income: Readonly<Partial<Record<IncomeField, readonly string[]>>>;
  readonly balance: Readonly<Partial<Record<BalanceField, readonly string[]>>>;
}

const nativeNames = z.array(z.string().min(1)).min(1);

const providerMapSchema = z.object({
  income: z.record(z.enum(INCOME_FIELDS), nativeNames),
  balance: z.record(z.enum(BALANCE_FIELDS), nativeNames),
});

const fieldMapsSchema = z.object({
  polygon: providerMapSchema,
  yahoo: providerMapSchema,
  alphavantage: providerMapSchema,
});

export type FieldMaps = Readonly<Record<ProviderName, ProviderFieldMap>>;

export function parseFieldMaps(input: unknown, source: string = 'field-maps.json'): FieldMaps {
  const parsed = fieldMapsSchema.safeParse(input);
  if (!parsed.success) {
    throw new DataParseError(
      `Invalid field map: ${parsed.error.issues.map(i => `${i.path.join('.')} ${i.message}`).join('; ')}`,
      source
    );
  }

  return Object.freeze({
    polygon: freezeProviderMap(parsed.data.polygon),
    yahoo: freezeProviderMap(parsed.data.yahoo),
    alphavantage: freezeProviderMap(parsed.data.alphavantage),
  });
}

function freezeProviderMap(map: z.infer<typeof providerMapSchema>): ProviderFieldMap {
  return Object.freeze({
    income: freezeTable(map.income),
    balance: freezeTable(map.balance),
  });
}

function freezeTable<F extends string>(table: Partial<Record<F, string[]>>): Readonly<Partial<Record<F, readonly string[]>>> {
  for (const names of Object.values(table)) {
    if (Array.isArray(names)) Object.freeze(names);
  }
  return Object.freeze(table);
}

// src/providers → ../../data in development, dist/src/providers → ../../../data after build
function locateFieldMaps(): string {
  const here = dirname(fileURLToPath(import.meta.url));
  const candidates = [
    join(here, '..', '..', 'data', 'field-maps.json'),
    join(here, '..', '..', '..', 'data', 'field-maps.json'),
  ];
  const found = candidates.find(p => existsSync(p));
  if (!found) {
    throw new DataParseError('field-maps.json not found', candidates.join(', '));
  }
  return found;
}

let loaded: FieldMaps | null = null;

/** Load the bundled field maps once per process */
export function loadFieldMaps(): FieldMaps {
  if (loaded) return loaded;
  const path = locateFieldMaps();
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (err) {
    throw new DataParseError(
      `Failed to read field maps: ${err instanceof Error ? err.message : String(err)}`,
      path
    );
  }
  loaded = parseFieldMaps(raw, path);
  return loaded;
}
