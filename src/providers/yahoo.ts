import { z } from 'zod';
import { NotFoundError, ProviderError, TransientError } from '../core/errors.js';
import { fetchJson } from '../core/http-client.js';
import { RequestThrottle } from '../core/rate-limiter.js';
import type { RawPeriod, TickerReference, Timeframe } from '../core/types.js';
import { CachedAdapter, type AdapterOptions } from './base-adapter.js';
import type { ProviderFieldMap } from './field-maps.js';
import { fiscalPeriodFor, isRecord, safeNumber } from './provider.js';

/**
 * Yahoo Finance adapter.
 *
 * Keyless and the fallback of last resort. Statements come from the
 * fundamentals-timeseries endpoint, which returns one series per line item
 * (e.g. `annualTotalRevenue`); series are regrouped into periods by their
 * `asOfDate`. The series requested are exactly the native names in the
 * injected field map.
 */

const DEFAULT_BASE_URL = 'https://query2.finance.yahoo.com';
const CHART_BASE_URL = 'https://query1.finance.yahoo.com';
// 1985-08-23, the earliest period1 Yahoo accepts for fundamentals
const SERIES_START = 493590046;
const MIN_REQUEST_INTERVAL_MS = 500;

const REFERENCE_SERIES = ['trailingMarketCap', 'quarterlyOrdinarySharesNumber', 'quarterlyShareIssued'] as const;

const timeseriesSchema = z.object({
  timeseries: z.object({
    result: z.array(z.record(z.unknown())).nullable().optional(),
  }).passthrough(),
}).passthrough();

const chartSchema = z.object({
  chart: z.object({
    result: z.array(z.object({
      meta: z.object({ regularMarketPrice: z.unknown().optional() }).passthrough(),
    }).passthrough()).nullable().optional(),
  }).passthrough(),
}).passthrough();

export interface SeriesPoint {
  type: string;
  asOfDate: string;
  value: number;
}

export interface YahooOptions extends AdapterOptions {
  chartBaseUrl?: string;
  throttle?: RequestThrottle;
}

export class YahooAdapter extends CachedAdapter {
  readonly name = 'yahoo' as const;

  private readonly baseUrl: string;
  private readonly chartBaseUrl: string;
  private readonly throttle: RequestThrottle;

  constructor(fieldMap: ProviderFieldMap, options: YahooOptions = {}) {
    super(fieldMap, options);
    this.baseUrl = options.baseUrl ?? DEFAULT_BASE_URL;
    this.chartBaseUrl = options.chartBaseUrl ?? CHART_BASE_URL;
    this.throttle = options.throttle ?? new RequestThrottle('yahoo', { minIntervalMs: MIN_REQUEST_INTERVAL_MS });
  }

  protected async loadPeriods(ticker: string, timeframe: Timeframe, limit: number): Promise<RawPeriod[]> {
    const incomeNames = nativeNamesOf(this.fieldMap.income);
    const balanceNames = nativeNamesOf(this.fieldMap.balance);
    const prefix = timeframe === 'annual' ? 'annual' : 'quarterly';

    const types = [...incomeNames, ...balanceNames].map(n => prefix + n);
    const points = await this.fetchSeries(ticker, types);

    const byDate = new Map<string, { income: Record<string, unknown>; balance: Record<string, unknown> }>();
    for (const point of points) {
      const nativeName = point.type.slice(prefix.length);
      let period = byDate.get(point.asOfDate);
      if (!period) {
        period = { income: {}, balance: {} };
        byDate.set(point.asOfDate, period);
      }
      if (incomeNames.has(nativeName)) period.income[nativeName] = point.value;
      if (balanceNames.has(nativeName)) period.balance[nativeName] = point.value;
    }

    return [...byDate.entries()]
      .sort(([a], [b]) => b.localeCompare(a))
      .slice(0, limit)
      .map(([endDate, statements], i) => ({
        end_date: endDate,
        fiscal_period: fiscalPeriodFor(timeframe, i),
        fiscal_year: endDate.slice(0, 4),
        income_statement: statements.income,
        balance_sheet: statements.balance,
      }));
  }

  protected async loadReference(ticker: string): Promise<TickerReference> {
    const points = await this.fetchSeries(ticker, [...REFERENCE_SERIES]);

    let marketCap = latest(points, 'trailingMarketCap');
    const shares = latest(points, 'quarterlyOrdinarySharesNumber') ?? latest(points, 'quarterlyShareIssued');

    // Derive market cap from price x shares when Yahoo has no market cap series
    if (marketCap === undefined && shares !== undefined) {
      const price = await this.fetchPrice(ticker).catch((err: unknown) => {
        // No price only means no derived market cap; the share count still stands
        if (err instanceof ProviderError) return undefined;
        throw err;
      });
      if (price !== undefined) marketCap = price * shares;
    }

    if (marketCap === undefined && shares === undefined) {
      throw new NotFoundError('yahoo', `No market data found for ${ticker} on Yahoo Finance`);
    }

    return {
      ticker,
      market_cap: marketCap,
      share_class_shares_outstanding: shares,
      weighted_shares_outstanding: shares,
    };
  }

  private async fetchSeries(ticker: string, types: string[]): Promise<SeriesPoint[]> {
    const params = new URLSearchParams({
      symbol: ticker,
      type: types.join(','),
      period1: String(SERIES_START),
      period2: String(Math.floor(Date.now() / 1000)),
    });
    const url = `${this.baseUrl}/ws/fundamentals-timeseries/v1/finance/timeseries/${encodeURIComponent(ticker)}?${params}`;

    await this.throttle.acquire();
    const parsed = timeseriesSchema.safeParse(await fetchJson(url, { provider: 'yahoo', subject: ticker }));
    if (!parsed.success) {
      throw new TransientError('yahoo', `Unexpected Yahoo timeseries payload for ${ticker}`);
    }

    return flattenSeries(parsed.data.timeseries.result ?? []);
  }

  private async fetchPrice(ticker: string): Promise<number | undefined> {
    const url = `${this.chartBaseUrl}/v8/finance/chart/${encodeURIComponent(ticker)}?range=1d&interval=1d`;
    await this.throttle.acquire();
    const parsed = chartSchema.safeParse(await fetchJson(url, { provider: 'yahoo', subject: ticker }));
    if (!parsed.success) return undefined;
    return safeNumber(parsed.data.chart.result?.[0]?.meta.regularMarketPrice);
  }
}

/**
 * Turn Yahoo's one-object-per-series layout into flat points.
 * Each series object carries `meta.type[0]` and an array under that same key;
 * null entries and entries without a usable reported value are skipped.
 */
export function flattenSeries(results: Array<Record<string, unknown>>): SeriesPoint[] {
  const points: SeriesPoint[] = [];
  for (const series of results) {
    const meta = series.meta;
    if (!isRecord(meta) || !Array.isArray(meta.type)) continue;
    const type = meta.type[0];
    if (typeof type !== 'string') continue;

    const entries = series[type];
    if (!Array.isArray(entries)) continue;

    for (const entry of entries) {
      if (!isRecord(entry) || typeof entry.asOfDate !== 'string') continue;
      const reported = entry.reportedValue;
      const value = isRecord(reported) ? safeNumber(reported.raw) : undefined;
      if (value === undefined) continue;
      points.push({ type, asOfDate: entry.asOfDate, value });
    }
  }
  return points;
}

function nativeNamesOf(table: Readonly<Partial<Record<string, readonly string[]>>>): Set<string> {
  const names = new Set<string>();
  for (const list of Object.values(table)) {
    for (const name of list ?? []) names.add(name);
  }
  return names;
}

function latest(points: SeriesPoint[], type: string): number | undefined {
  let best: SeriesPoint | undefined;
  for (const p of points) {
    if (p.type === type && (!best || p.asOfDate > best.asOfDate)) best = p;
  }
  return best?.value;
}
