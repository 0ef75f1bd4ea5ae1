import { z } from 'zod';
import { AuthError, NotFoundError, RateLimitError, TransientError } from '../core/errors.js';
import { fetchJson } from '../core/http-client.js';
import { RequestThrottle } from '../core/rate-limiter.js';
import type { RawPeriod, TickerReference, Timeframe } from '../core/types.js';
import { CachedAdapter, type AdapterOptions } from './base-adapter.js';
import type { ProviderFieldMap } from './field-maps.js';
import { fiscalPeriodFor, safeNumber } from './provider.js';

/**
 * Alpha Vantage adapter.
 *
 * Free tier: 5 requests/minute and 25 requests/day. The throttle spaces
 * calls 12s apart and refuses, before touching the network, any call that
 * would go past the daily quota. A statements fetch costs two requests
 * (income statement + balance sheet).
 *
 * Alpha Vantage reports every number as a string and uses "None" for
 * missing values.
 */

const DEFAULT_BASE_URL = 'https://www.alphavantage.co';
export const ALPHA_VANTAGE_MIN_INTERVAL_MS = 12_000;
export const ALPHA_VANTAGE_DAILY_LIMIT = 25;

const reportSchema = z.record(z.unknown());

const statementSchema = z.object({
  annualReports: z.array(reportSchema).optional(),
  quarterlyReports: z.array(reportSchema).optional(),
}).passthrough();

export interface AlphaVantageOptions extends AdapterOptions {
  apiKey?: string;
  throttle?: RequestThrottle;
}

export class AlphaVantageAdapter extends CachedAdapter {
  readonly name = 'alphavantage' as const;

  private readonly apiKey: string | undefined;
  private readonly baseUrl: string;
  private readonly throttle: RequestThrottle;

  constructor(fieldMap: ProviderFieldMap, options: AlphaVantageOptions = {}) {
    super(fieldMap, options);
    this.apiKey = options.apiKey;
    this.baseUrl = options.baseUrl ?? DEFAULT_BASE_URL;
    this.throttle = options.throttle ?? new RequestThrottle('alphavantage', {
      minIntervalMs: ALPHA_VANTAGE_MIN_INTERVAL_MS,
      dailyLimit: ALPHA_VANTAGE_DAILY_LIMIT,
    });
  }

  isConfigured(): boolean {
    return this.apiKey !== undefined && this.apiKey.trim().length > 0;
  }

  /** Requests left in today's quota */
  remainingQuota(): number | null {
    return this.throttle.remaining();
  }

  protected async loadPeriods(ticker: string, timeframe: Timeframe, limit: number): Promise<RawPeriod[]> {
    this.requireKey();
    await this.throttle.acquire(2);

    const income = await this.query('INCOME_STATEMENT', ticker);
    const balance = await this.query('BALANCE_SHEET', ticker);

    const incomeReports = reportsFor(income, timeframe);
    const balanceReports = reportsFor(balance, timeframe);
    if (incomeReports.length === 0 || balanceReports.length === 0) {
      return [];
    }

    // Rows are periods, most recent first; the two statements are paired by position
    const count = Math.min(limit, incomeReports.length, balanceReports.length);
    const periods: RawPeriod[] = [];
    for (let i = 0; i < count; i++) {
      const ending = incomeReports[i].fiscalDateEnding;
      const fiscalDate = typeof ending === 'string' ? ending : '';
      periods.push({
        end_date: fiscalDate,
        fiscal_period: fiscalPeriodFor(timeframe, i),
        fiscal_year: fiscalDate.split('-')[0],
        income_statement: incomeReports[i],
        balance_sheet: balanceReports[i],
      });
    }
    return periods;
  }

  protected async loadReference(ticker: string): Promise<TickerReference> {
    this.requireKey();
    await this.throttle.acquire(1);

    const overview = await this.query('OVERVIEW', ticker);
    const parsed = reportSchema.safeParse(overview);
    if (!parsed.success || Object.keys(parsed.data).length === 0) {
      throw new NotFoundError('alphavantage', `No company overview for ${ticker} from Alpha Vantage`);
    }

    const shares = safeNumber(parsed.data.SharesOutstanding);
    return {
      ticker,
      market_cap: safeNumber(parsed.data.MarketCapitalization),
      share_class_shares_outstanding: shares,
      weighted_shares_outstanding: shares,
    };
  }

  /** Call one Alpha Vantage function and surface its in-body error conventions */
  private async query(fn: 'INCOME_STATEMENT' | 'BALANCE_SHEET' | 'OVERVIEW', ticker: string): Promise<unknown> {
    const params = new URLSearchParams({ function: fn, symbol: ticker, apikey: this.requireKey() });
    const body = await fetchJson(`${this.baseUrl}/query?${params}`, { provider: 'alphavantage', subject: ticker });
    const parsed = reportSchema.safeParse(body);
    if (!parsed.success) {
      throw new TransientError('alphavantage', `Unexpected Alpha Vantage ${fn} payload for ${ticker}`);
    }

    const payload = parsed.data;
    const info = typeof payload.Information === 'string' ? payload.Information : undefined;
    const note = typeof payload.Note === 'string' ? payload.Note : undefined;

    if (info && /api ?key/i.test(info) && !/rate limit/i.test(info)) {
      throw new AuthError('alphavantage', `Alpha Vantage rejected the API key: ${info}`);
    }
    if (note || info) {
      throw new RateLimitError('alphavantage', `Alpha Vantage rate limit: ${note ?? info}`);
    }
    if (typeof payload['Error Message'] === 'string') {
      throw new NotFoundError('alphavantage', `${ticker} (alphavantage)`);
    }
    return payload;
  }

  private requireKey(): string {
    if (!this.apiKey || this.apiKey.trim().length === 0) {
      throw new AuthError('alphavantage', 'Alpha Vantage API key is not configured (ALPHA_VANTAGE_API_KEY)');
    }
    return this.apiKey;
  }
}

function reportsFor(payload: unknown, timeframe: Timeframe): Array<Record<string, unknown>> {
  const parsed = statementSchema.safeParse(payload);
  if (!parsed.success) return [];
  return (timeframe === 'annual' ? parsed.data.annualReports : parsed.data.quarterlyReports) ?? [];
}
