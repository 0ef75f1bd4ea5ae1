/**
 * Multi-provider aggregation with a single fallback step.
 *
 * Resolves which provider serves a request, normalizes what it returns into
 * canonical periods and, when the chosen provider fails or comes back empty,
 * retries once against the always-available fallback provider. Provider
 * errors never escape: callers get either data tagged with the provider that
 * actually served it, or a not-found result listing every attempt.
 *
 * Returns structured data and never prints to console. Diagnostics go to the
 * injected observer.
 */

import { DataParseError, ProviderError, type ProviderErrorKind } from './errors.js';
import type {
  CanonicalPeriod,
  MetricsResult,
  ProviderName,
  TickerReference,
  Timeframe,
} from './types.js';
import { toCanonicalPeriod, type ProviderAdapter } from '../providers/provider.js';
import { computeMetrics } from '../processing/metrics.js';

/** Provider B > provider C > provider A */
export const PROVIDER_PRIORITY: readonly ProviderName[] = ['yahoo', 'alphavantage', 'polygon'];

/** Keyless and assumed always available */
export const FALLBACK_PROVIDER: ProviderName = 'yahoo';

export const MAX_PERIODS = 10;

export type Operation = 'financials' | 'reference';

export type AttemptOutcome = 'ok' | 'empty' | ProviderErrorKind | 'unknown';

export interface ProviderAttempt {
  provider: ProviderName;
  outcome: AttemptOutcome;
  message?: string;
}

export interface ProviderFailureEvent {
  provider: ProviderName;
  operation: Operation;
  ticker: string;
  outcome: AttemptOutcome;
  error?: unknown;
}

export interface FallbackEvent {
  from: ProviderName;
  to: ProviderName;
  operation: Operation;
  ticker: string;
  reason: AttemptOutcome;
}

/** Receives diagnostics that would otherwise be interleaved prints */
export interface AggregatorObserver {
  onProviderFailure?(event: ProviderFailureEvent): void;
  onFallback?(event: FallbackEvent): void;
}

export interface NotFoundResult {
  success: false;
  error: {
    type: 'not_found';
    message: string;
    attempts: ProviderAttempt[];
  };
}

export type AggregateResult<T> =
  | { success: true; data: T; provider: ProviderName; attempts: ProviderAttempt[] }
  | NotFoundResult;

export type AnalysisResult =
  | {
      success: true;
      period: CanonicalPeriod;
      reference?: TickerReference;
      metrics: MetricsResult;
      provider: ProviderName;
      referenceProvider?: ProviderName;
    }
  | NotFoundResult;

export interface AggregatorOptions {
  defaultProvider?: ProviderName;
  enableFallback?: boolean;
  observer?: AggregatorObserver;
}

export class FinancialDataAggregator {
  private readonly defaultProvider: ProviderName | undefined;
  private readonly enableFallback: boolean;
  private readonly observer: AggregatorObserver;

  constructor(
    private readonly providers: Readonly<Record<ProviderName, ProviderAdapter>>,
    options: AggregatorOptions = {}
  ) {
    this.defaultProvider = options.defaultProvider;
    this.enableFallback = options.enableFallback ?? true;
    this.observer = options.observer ?? {};
  }

  /** Explicit override, else configured default, else first configured provider by priority */
  resolveProvider(override?: ProviderName): ProviderName {
    if (override) return override;
    if (this.defaultProvider) return this.defaultProvider;
    return PROVIDER_PRIORITY.find(p => this.providers[p].isConfigured()) ?? FALLBACK_PROVIDER;
  }

  async getFinancials(
    ticker: string,
    timeframe: Timeframe = 'annual',
    limit: number = 1,
    provider?: ProviderName
  ): Promise<AggregateResult<CanonicalPeriod[]>> {
    if (!Number.isInteger(limit) || limit < 1 || limit > MAX_PERIODS) {
      throw new RangeError(`limit must be an integer between 1 and ${MAX_PERIODS}, got ${limit}`);
    }
    const symbol = normalizeTicker(ticker);

    return this.withFallback(
      'financials',
      symbol,
      this.resolveProvider(provider),
      async adapter => {
        const raw = await adapter.fetchPeriods(symbol, timeframe, limit);
        return raw.map(r => toCanonicalPeriod(symbol, r, adapter));
      },
      periods => periods.length === 0
    );
  }

  async getReference(ticker: string, provider?: ProviderName): Promise<AggregateResult<TickerReference>> {
    const symbol = normalizeTicker(ticker);
    return this.withFallback(
      'reference',
      symbol,
      this.resolveProvider(provider),
      adapter => adapter.fetchReference(symbol),
      ref => ref.market_cap === undefined
        && ref.weighted_shares_outstanding === undefined
        && ref.share_class_shares_outstanding === undefined
    );
  }

  /**
   * Latest period plus market reference data, with metrics computed.
   * Missing reference data is not an error; it only leaves the
   * market-dependent metrics undefined.
   */
  async analyzeTicker(ticker: string, timeframe: Timeframe = 'annual', provider?: ProviderName): Promise<AnalysisResult> {
    const financials = await this.getFinancials(ticker, timeframe, 1, provider);
    if (!financials.success) return financials;

    const period = financials.data[0];
    const reference = await this.getReference(ticker, provider);

    return {
      success: true,
      period,
      reference: reference.success ? reference.data : undefined,
      metrics: computeMetrics(period, reference.success ? reference.data : undefined, timeframe),
      provider: financials.provider,
      referenceProvider: reference.success ? reference.provider : undefined,
    };
  }

  private async withFallback<T>(
    operation: Operation,
    ticker: string,
    primary: ProviderName,
    call: (adapter: ProviderAdapter) => Promise<T>,
    isEmpty: (data: T) => boolean
  ): Promise<AggregateResult<T>> {
    const attempts: ProviderAttempt[] = [];

    const first = await this.attempt(operation, ticker, primary, call, isEmpty, attempts);
    if (first !== undefined) {
      return { success: true, data: first, provider: primary, attempts };
    }

    if (this.enableFallback && primary !== FALLBACK_PROVIDER) {
      this.observer.onFallback?.({
        from: primary,
        to: FALLBACK_PROVIDER,
        operation,
        ticker,
        reason: attempts[attempts.length - 1].outcome,
      });
      const second = await this.attempt(operation, ticker, FALLBACK_PROVIDER, call, isEmpty, attempts);
      if (second !== undefined) {
        return { success: true, data: second, provider: FALLBACK_PROVIDER, attempts };
      }
    }

    const what = operation === 'financials' ? 'financial data' : 'market data';
    return {
      success: false,
      error: {
        type: 'not_found',
        message: `No ${what} found for ticker ${ticker}. Verify the ticker symbol.`,
        attempts,
      },
    };
  }

  /** One provider call; records the outcome and returns undefined on failure or empty data */
  private async attempt<T>(
    operation: Operation,
    ticker: string,
    provider: ProviderName,
    call: (adapter: ProviderAdapter) => Promise<T>,
    isEmpty: (data: T) => boolean,
    attempts: ProviderAttempt[]
  ): Promise<T | undefined> {
    try {
      const data = await call(this.providers[provider]);
      if (!isEmpty(data)) {
        attempts.push({ provider, outcome: 'ok' });
        return data;
      }
      attempts.push({ provider, outcome: 'empty' });
      this.observer.onProviderFailure?.({ provider, operation, ticker, outcome: 'empty' });
    } catch (err) {
      const outcome = classifyError(err);
      attempts.push({ provider, outcome, message: err instanceof Error ? err.message : String(err) });
      this.observer.onProviderFailure?.({ provider, operation, ticker, outcome, error: err });
    }
    return undefined;
  }
}

export function classifyError(err: unknown): Exclude<AttemptOutcome, 'ok' | 'empty'> {
  if (err instanceof ProviderError) return err.kind;
  if (err instanceof DataParseError) return 'transient';
  return 'unknown';
}

export function normalizeTicker(ticker: string): string {
  return ticker.trim().toUpperCase();
}
