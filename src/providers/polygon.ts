import { z } from 'zod';
import { AuthError, NotFoundError, TransientError } from '../core/errors.js';
import { fetchJson } from '../core/http-client.js';
import type { RawPeriod, TickerReference, Timeframe } from '../core/types.js';
import { CachedAdapter, type AdapterOptions } from './base-adapter.js';
import type { ProviderFieldMap } from './field-maps.js';
import { fiscalPeriodFor, isRecord, safeNumber, type ValueReader } from './provider.js';

/**
 * Polygon.io adapter.
 *
 * Uses:
 * - /vX/reference/financials for income statement and balance sheet
 * - /v3/reference/tickers/{ticker} for market cap and share counts
 *
 * Requires an API key. Polygon wraps every statement value as
 * `{ value, unit, label }`.
 */

const DEFAULT_BASE_URL = 'https://api.polygon.io';

const statementSchema = z.record(z.unknown());

const financialsSchema = z.object({
  results: z.array(z.object({
    end_date: z.string().optional(),
    fiscal_period: z.string().optional(),
    fiscal_year: z.union([z.string(), z.number()]).optional(),
    financials: z.object({
      income_statement: statementSchema.optional(),
      balance_sheet: statementSchema.optional(),
    }).passthrough().optional(),
  }).passthrough()).optional(),
}).passthrough();

const tickerDetailsSchema = z.object({
  results: z.record(z.unknown()).optional(),
}).passthrough();

const FISCAL_PERIODS = ['FY', 'Q1', 'Q2', 'Q3', 'Q4'] as const;

export const readPolygonValue: ValueReader = (record, nativeName) => {
  const entry = record[nativeName];
  return isRecord(entry) ? safeNumber(entry.value) : safeNumber(entry);
};

export interface PolygonOptions extends AdapterOptions {
  apiKey?: string;
}

export class PolygonAdapter extends CachedAdapter {
  readonly name = 'polygon' as const;
  protected readonly readValue = readPolygonValue;

  private readonly apiKey: string | undefined;
  private readonly baseUrl: string;

  constructor(fieldMap: ProviderFieldMap, options: PolygonOptions = {}) {
    super(fieldMap, options);
    this.apiKey = options.apiKey;
    this.baseUrl = options.baseUrl ?? DEFAULT_BASE_URL;
  }

  isConfigured(): boolean {
    return this.apiKey !== undefined && this.apiKey.trim().length > 0;
  }

  protected async loadPeriods(ticker: string, timeframe: Timeframe, limit: number): Promise<RawPeriod[]> {
    const apiKey = this.requireKey();
    const params = new URLSearchParams({
      ticker,
      timeframe,
      limit: String(limit),
      apiKey,
    });
    const url = `${this.baseUrl}/vX/reference/financials?${params}`;
    const parsed = financialsSchema.safeParse(await fetchJson(url, { provider: 'polygon', subject: ticker }));
    if (!parsed.success) {
      throw new TransientError('polygon', `Unexpected Polygon financials payload for ${ticker}`);
    }

    const results = parsed.data.results ?? [];
    if (results.length === 0) {
      throw new NotFoundError('polygon', `No financial data available for ticker ${ticker} from Polygon`);
    }

    return results.slice(0, limit).map((r, i): RawPeriod => ({
      end_date: r.end_date ?? '',
      fiscal_period: FISCAL_PERIODS.find(p => p === r.fiscal_period) ?? fiscalPeriodFor(timeframe, i),
      fiscal_year: r.fiscal_year !== undefined ? String(r.fiscal_year) : (r.end_date ?? '').slice(0, 4),
      income_statement: r.financials?.income_statement ?? {},
      balance_sheet: r.financials?.balance_sheet ?? {},
    }));
  }

  protected async loadReference(ticker: string): Promise<TickerReference> {
    const apiKey = this.requireKey();
    const url = `${this.baseUrl}/v3/reference/tickers/${encodeURIComponent(ticker)}?${new URLSearchParams({ apiKey })}`;
    const parsed = tickerDetailsSchema.safeParse(await fetchJson(url, { provider: 'polygon', subject: ticker }));
    if (!parsed.success) {
      throw new TransientError('polygon', `Unexpected Polygon ticker payload for ${ticker}`);
    }

    const details = parsed.data.results;
    if (!details || Object.keys(details).length === 0) {
      throw new NotFoundError('polygon', `No ticker details found for ${ticker} in Polygon`);
    }

    return {
      ticker,
      market_cap: safeNumber(details.market_cap),
      share_class_shares_outstanding: safeNumber(details.share_class_shares_outstanding),
      weighted_shares_outstanding: safeNumber(details.weighted_shares_outstanding),
    };
  }

  private requireKey(): string {
    if (!this.apiKey || this.apiKey.trim().length === 0) {
      throw new AuthError('polygon', 'Polygon API key is not configured (POLYGON_API_KEY)');
    }
    return this.apiKey;
  }
}
