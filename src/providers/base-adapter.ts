import { MemoCache, memoKey, type MemoCacheOptions } from '../core/cache.js';
import type {
  BalanceFields,
  IncomeFields,
  ProviderName,
  RawPeriod,
  TickerReference,
  Timeframe,
} from '../core/types.js';
import type { ProviderFieldMap } from './field-maps.js';
import { mapBalance, mapIncome, readPlain, type ProviderAdapter, type ValueReader } from './provider.js';

export interface AdapterOptions {
  cache?: MemoCacheOptions;
  baseUrl?: string;
}

/**
 * Shared plumbing for the concrete adapters: memoization of successful
 * fetches and table-driven normalization. Subclasses supply the network
 * calls and, where a provider wraps its values, a value reader.
 */
export abstract class CachedAdapter implements ProviderAdapter {
  abstract readonly name: ProviderName;

  private readonly periodsCache: MemoCache<RawPeriod[]>;
  private readonly referenceCache: MemoCache<TickerReference>;
  // Lookups in flight, so concurrent identical requests share one upstream call
  private readonly pendingPeriods = new Map<string, Promise<RawPeriod[]>>();
  private readonly pendingReferences = new Map<string, Promise<TickerReference>>();

  constructor(
    protected readonly fieldMap: ProviderFieldMap,
    options: AdapterOptions = {}
  ) {
    this.periodsCache = new MemoCache(options.cache);
    this.referenceCache = new MemoCache(options.cache);
  }

  protected abstract loadPeriods(ticker: string, timeframe: Timeframe, limit: number): Promise<RawPeriod[]>;
  protected abstract loadReference(ticker: string): Promise<TickerReference>;

  /** How a single provider-native value is read out of a statement record */
  protected readonly readValue: ValueReader = readPlain;

  isConfigured(): boolean {
    return true;
  }

  async fetchPeriods(ticker: string, timeframe: Timeframe, limit: number): Promise<RawPeriod[]> {
    const symbol = ticker.toUpperCase();
    const key = memoKey(symbol, timeframe, limit);
    const cached = this.periodsCache.get(key);
    if (cached) return cached;

    return share(this.pendingPeriods, key, async () => {
      const periods = await this.loadPeriods(symbol, timeframe, limit);
      if (periods.length > 0) {
        this.periodsCache.set(key, periods);
      }
      return periods;
    });
  }

  async fetchReference(ticker: string): Promise<TickerReference> {
    const symbol = ticker.toUpperCase();
    const cached = this.referenceCache.get(symbol);
    if (cached) return cached;

    return share(this.pendingReferences, symbol, async () => {
      const reference = await this.loadReference(symbol);
      this.referenceCache.set(symbol, reference);
      return reference;
    });
  }

  normalizeIncome(raw: RawPeriod): IncomeFields {
    return mapIncome(raw.income_statement, this.fieldMap.income, this.readValue);
  }

  normalizeBalance(raw: RawPeriod): BalanceFields {
    return mapBalance(raw.balance_sheet, this.fieldMap.balance, this.readValue);
  }

  clearCache(): void {
    this.periodsCache.clear();
    this.referenceCache.clear();
  }
}

/** Join a pending load for `key`, or start one that is forgotten once it settles */
function share<T>(pending: Map<string, Promise<T>>, key: string, load: () => Promise<T>): Promise<T> {
  const inFlight = pending.get(key);
  if (inFlight) return inFlight;

  const promise = load().finally(() => pending.delete(key));
  pending.set(key, promise);
  return promise;
}
