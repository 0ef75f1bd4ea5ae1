import type {
  BalanceField,
  BalanceFields,
  CanonicalPeriod,
  IncomeField,
  IncomeFields,
  ProviderName,
  RawPeriod,
  TickerReference,
  Timeframe,
} from '../core/types.js';
import { BALANCE_FIELDS, INCOME_FIELDS } from '../core/types.js';

/**
 * Contract every upstream data source implements.
 *
 * `fetchPeriods` and `fetchReference` talk to the network and throw the
 * errors in core/errors.ts. The two normalizers are pure and total: they
 * never throw, whatever the raw record contains.
 */
export interface ProviderAdapter {
  readonly name: ProviderName;
  /** False when the provider needs a credential that is not configured */
  isConfigured(): boolean;
  fetchPeriods(ticker: string, timeframe: Timeframe, limit: number): Promise<RawPeriod[]>;
  fetchReference(ticker: string): Promise<TickerReference>;
  normalizeIncome(raw: RawPeriod): IncomeFields;
  normalizeBalance(raw: RawPeriod): BalanceFields;
}

/** Reads one provider-native value; returns undefined when absent */
export type ValueReader = (record: Record<string, unknown>, nativeName: string) => number | undefined;

/**
 * Coerce a provider value to a finite number.
 * null, undefined, NaN, Infinity, '', 'None' and non-numeric strings are absent.
 */
export function safeNumber(value: unknown): number | undefined {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : undefined;
  }
  if (typeof value === 'string') {
    const trimmed = value.trim();
    if (trimmed === '' || trimmed === 'None') return undefined;
    const num = Number(trimmed);
    return Number.isFinite(num) ? num : undefined;
  }
  return undefined;
}

export const readPlain: ValueReader = (record, nativeName) => safeNumber(record[nativeName]);

/** Take the first present value in priority order. Never averages or merges. */
export function pickFirst(
  record: Record<string, unknown>,
  nativeNames: readonly string[],
  read: ValueReader = readPlain
): number | undefined {
  for (const name of nativeNames) {
    const value = read(record, name);
    if (value !== undefined) return value;
  }
  return undefined;
}

export function mapFields<F extends string>(
  record: Record<string, unknown>,
  fields: readonly F[],
  table: Readonly<Partial<Record<F, readonly string[]>>>,
  read: ValueReader = readPlain
): Partial<Record<F, number>> {
  const out: Partial<Record<F, number>> = {};
  for (const field of fields) {
    const nativeNames = table[field];
    if (!nativeNames) continue;
    const value = pickFirst(record, nativeNames, read);
    if (value !== undefined) out[field] = value;
  }
  return out;
}

export function mapIncome(
  record: Record<string, unknown>,
  table: Readonly<Partial<Record<IncomeField, readonly string[]>>>,
  read?: ValueReader
): IncomeFields {
  return mapFields(record, INCOME_FIELDS, table, read);
}

export function mapBalance(
  record: Record<string, unknown>,
  table: Readonly<Partial<Record<BalanceField, readonly string[]>>>,
  read?: ValueReader
): BalanceFields {
  return mapFields(record, BALANCE_FIELDS, table, read);
}

/** Combine identity with both normalized statements into a frozen canonical record */
export function toCanonicalPeriod(ticker: string, raw: RawPeriod, adapter: ProviderAdapter): CanonicalPeriod {
  return Object.freeze({
    ...adapter.normalizeIncome(raw),
    ...adapter.normalizeBalance(raw),
    ticker: ticker.toUpperCase(),
    end_date: raw.end_date,
    fiscal_period: raw.fiscal_period,
    fiscal_year: raw.fiscal_year,
  });
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Quarter label by position within the returned sequence */
export function fiscalPeriodFor(timeframe: Timeframe, index: number): RawPeriod['fiscal_period'] {
  if (timeframe === 'annual') return 'FY';
  const quarters = ['Q1', 'Q2', 'Q3', 'Q4'] as const;
  return quarters[index % 4];
}
