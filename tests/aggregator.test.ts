import { describe, it, expect, vi } from 'vitest';
import {
  FinancialDataAggregator,
  classifyError,
  type AggregatorObserver,
} from '../src/core/aggregator.js';
import { AuthError, DataParseError, NotFoundError, RateLimitError, TransientError } from '../src/core/errors.js';
import type { ProviderName } from '../src/core/types.js';
import { fakeProviders, rawPeriod } from './fake-adapter.js';

function setup(options: { defaultProvider?: ProviderName; enableFallback?: boolean; configured?: Partial<Record<ProviderName, boolean>> } = {}) {
  const providers = fakeProviders(options.configured);
  const observer = {
    onProviderFailure: vi.fn<NonNullable<AggregatorObserver['onProviderFailure']>>(),
    onFallback: vi.fn<NonNullable<AggregatorObserver['onFallback']>>(),
  };
  const aggregator = new FinancialDataAggregator(providers, {
    defaultProvider: options.defaultProvider,
    enableFallback: options.enableFallback,
    observer,
  });
  return { providers, observer, aggregator };
}

describe('FinancialDataAggregator.resolveProvider', () => {
  it('uses an explicit override first', () => {
    const { aggregator } = setup({ defaultProvider: 'alphavantage' });
    expect(aggregator.resolveProvider('polygon')).toBe('polygon');
  });

  it('uses the configured default next', () => {
    const { aggregator } = setup({ defaultProvider: 'alphavantage' });
    expect(aggregator.resolveProvider()).toBe('alphavantage');
  });

  it('otherwise picks the first configured provider by priority', () => {
    expect(setup().aggregator.resolveProvider()).toBe('yahoo');
    expect(setup({ configured: { yahoo: false } }).aggregator.resolveProvider()).toBe('alphavantage');
    expect(setup({ configured: { yahoo: false, alphavantage: false } }).aggregator.resolveProvider()).toBe('polygon');
  });

  it('falls back to yahoo when nothing reports as configured', () => {
    const { aggregator } = setup({ configured: { yahoo: false, alphavantage: false, polygon: false } });
    expect(aggregator.resolveProvider()).toBe('yahoo');
  });
});

describe('FinancialDataAggregator.getFinancials', () => {
  it('returns canonical periods tagged with the provider used', async () => {
    const { providers, aggregator, observer } = setup();
    providers.yahoo.fetchPeriods.mockResolvedValue([rawPeriod(100)]);

    const result = await aggregator.getFinancials(' aapl ');

    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.provider).toBe('yahoo');
    expect(result.data).toHaveLength(1);
    expect(result.data[0].ticker).toBe('AAPL');
    expect(result.data[0].operating_income).toBe(100);
    expect(result.data[0].total_assets).toBe(1000);
    expect(result.attempts).toEqual([{ provider: 'yahoo', outcome: 'ok' }]);
    expect(providers.yahoo.fetchPeriods).toHaveBeenCalledWith('AAPL', 'annual', 1);
    expect(observer.onProviderFailure).not.toHaveBeenCalled();
  });

  it('falls back to yahoo when the primary provider fails', async () => {
    const { providers, aggregator, observer } = setup({ defaultProvider: 'polygon' });
    providers.polygon.fetchPeriods.mockRejectedValue(new AuthError('polygon', 'Polygon API key is not configured (POLYGON_API_KEY)'));
    providers.yahoo.fetchPeriods.mockResolvedValue([rawPeriod(100)]);

    const result = await aggregator.getFinancials('AAPL', 'annual', 1);

    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.provider).toBe('yahoo');
    expect(result.attempts).toEqual([
      { provider: 'polygon', outcome: 'auth', message: 'Polygon API key is not configured (POLYGON_API_KEY)' },
      { provider: 'yahoo', outcome: 'ok' },
    ]);
    expect(observer.onFallback).toHaveBeenCalledWith({
      from: 'polygon',
      to: 'yahoo',
      operation: 'financials',
      ticker: 'AAPL',
      reason: 'auth',
    });
  });

  it('falls back when the primary provider returns nothing', async () => {
    const { providers, aggregator, observer } = setup();
    providers.yahoo.fetchPeriods.mockResolvedValue([rawPeriod(100)]);

    const result = await aggregator.getFinancials('AAPL', 'quarterly', 4, 'alphavantage');

    expect(result.success && result.provider).toBe('yahoo');
    expect(providers.alphavantage.fetchPeriods).toHaveBeenCalledWith('AAPL', 'quarterly', 4);
    expect(providers.yahoo.fetchPeriods).toHaveBeenCalledWith('AAPL', 'quarterly', 4);
    expect(observer.onProviderFailure).toHaveBeenCalledWith({
      provider: 'alphavantage',
      operation: 'financials',
      ticker: 'AAPL',
      outcome: 'empty',
    });
  });

  it('swallows the fallback error and reports not found', async () => {
    const { providers, aggregator } = setup({ defaultProvider: 'polygon' });
    providers.polygon.fetchPeriods.mockRejectedValue(new RateLimitError('polygon', 'polygon rate limit exceeded.'));
    providers.yahoo.fetchPeriods.mockRejectedValue(new TransientError('yahoo', 'Request to yahoo timed out'));

    const result = await aggregator.getFinancials('AAPL');

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.type).toBe('not_found');
    expect(result.error.message).toBe('No financial data found for ticker AAPL. Verify the ticker symbol.');
    expect(result.error.attempts.map(a => [a.provider, a.outcome])).toEqual([
      ['polygon', 'rate_limited'],
      ['yahoo', 'transient'],
    ]);
  });

  it('does not fall back when fallback is disabled', async () => {
    const { providers, aggregator, observer } = setup({ defaultProvider: 'alphavantage', enableFallback: false });
    providers.alphavantage.fetchPeriods.mockRejectedValue(new NotFoundError('alphavantage', 'ZZZZ (alphavantage)'));

    const result = await aggregator.getFinancials('ZZZZ');

    expect(result.success).toBe(false);
    expect(providers.yahoo.fetchPeriods).not.toHaveBeenCalled();
    expect(observer.onFallback).not.toHaveBeenCalled();
  });

  it('tries yahoo only once when it is already the primary provider', async () => {
    const { providers, aggregator } = setup();
    providers.yahoo.fetchPeriods.mockRejectedValue(new NotFoundError('yahoo', 'ZZZZ (yahoo)'));

    const result = await aggregator.getFinancials('ZZZZ');

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.attempts).toHaveLength(1);
    expect(providers.yahoo.fetchPeriods).toHaveBeenCalledTimes(1);
  });

  it('never lets a non-provider error escape', async () => {
    const { providers, aggregator } = setup({ defaultProvider: 'polygon' });
    providers.polygon.fetchPeriods.mockRejectedValue(new Error('unexpected'));
    providers.yahoo.fetchPeriods.mockRejectedValue(new TypeError('cannot read properties of undefined'));

    const result = await aggregator.getFinancials('AAPL');

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.attempts.map(a => a.outcome)).toEqual(['unknown', 'unknown']);
  });

  it('normalizes sentinel values to absent fields', async () => {
    const { providers, aggregator } = setup();
    providers.yahoo.fetchPeriods.mockResolvedValue([rawPeriod('None', null, 'n/a')]);

    const result = await aggregator.getFinancials('AAPL');

    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.data[0].operating_income).toBeUndefined();
    expect(result.data[0].total_assets).toBeUndefined();
    expect(result.data[0].current_liabilities).toBeUndefined();
  });

  it('rejects a limit outside 1..10', async () => {
    const { aggregator } = setup();
    await expect(aggregator.getFinancials('AAPL', 'annual', 0)).rejects.toBeInstanceOf(RangeError);
    await expect(aggregator.getFinancials('AAPL', 'annual', 11)).rejects.toBeInstanceOf(RangeError);
  });
});

describe('FinancialDataAggregator.getReference', () => {
  it('treats a reference without market data as empty and falls back', async () => {
    const { providers, aggregator } = setup({ defaultProvider: 'polygon' });
    providers.polygon.fetchReference.mockResolvedValue({ ticker: 'AAPL' });
    providers.yahoo.fetchReference.mockResolvedValue({ ticker: 'AAPL', market_cap: 2000 });

    const result = await aggregator.getReference('AAPL');

    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.provider).toBe('yahoo');
    expect(result.data.market_cap).toBe(2000);
    expect(result.attempts.map(a => a.outcome)).toEqual(['empty', 'ok']);
  });

  it('reports market data not found', async () => {
    const { providers, aggregator } = setup();
    providers.yahoo.fetchReference.mockRejectedValue(new NotFoundError('yahoo', 'ZZZZ (yahoo)'));

    const result = await aggregator.getReference('zzzz');

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.message).toBe('No market data found for ticker ZZZZ. Verify the ticker symbol.');
  });
});

describe('FinancialDataAggregator.analyzeTicker', () => {
  it('computes metrics from the latest period and market data', async () => {
    const { providers, aggregator } = setup();
    providers.yahoo.fetchPeriods.mockResolvedValue([rawPeriod(100)]);
    providers.yahoo.fetchReference.mockResolvedValue({ ticker: 'AAPL', market_cap: 2000 });

    const result = await aggregator.analyzeTicker('AAPL');

    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.provider).toBe('yahoo');
    expect(result.referenceProvider).toBe('yahoo');
    expect(result.metrics.roce_percent).toBe('12.50%');
    expect(result.metrics.enterprise_value).toBe(2000);
    expect(result.metrics.earnings_yield).toBe(0.05);
  });

  it('still returns metrics when market data is unavailable', async () => {
    const { providers, aggregator } = setup();
    providers.yahoo.fetchPeriods.mockResolvedValue([rawPeriod(100)]);
    providers.yahoo.fetchReference.mockRejectedValue(new TransientError('yahoo', 'Connection error to yahoo'));

    const result = await aggregator.analyzeTicker('AAPL');

    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.reference).toBeUndefined();
    expect(result.referenceProvider).toBeUndefined();
    expect(result.metrics.roce).toBe(0.125);
    expect(result.metrics.enterprise_value).toBeUndefined();
    expect(result.metrics.notes).toContain('Enterprise value not available - cannot calculate earnings yield');
  });

  it('returns not found when no financials exist', async () => {
    const { aggregator } = setup();
    const result = await aggregator.analyzeTicker('ZZZZ');
    expect(result.success).toBe(false);
  });
});

describe('classifyError', () => {
  it('maps provider errors to their kind', () => {
    expect(classifyError(new RateLimitError('alphavantage', 'limit'))).toBe('rate_limited');
    expect(classifyError(new AuthError('polygon', 'no key'))).toBe('auth');
  });

  it('treats parse errors as transient and anything else as unknown', () => {
    expect(classifyError(new DataParseError('bad', 'yahoo'))).toBe('transient');
    expect(classifyError('boom')).toBe('unknown');
  });
});
