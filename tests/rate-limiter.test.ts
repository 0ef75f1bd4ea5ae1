import { describe, it, expect, afterEach, vi } from 'vitest';
import { RateLimitError } from '../src/core/errors.js';
import { RequestThrottle } from '../src/core/rate-limiter.js';

describe('RequestThrottle', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('allows immediate acquisition for the first request', async () => {
    const throttle = new RequestThrottle('yahoo', { minIntervalMs: 10_000 });
    const start = Date.now();
    await throttle.acquire();
    expect(Date.now() - start).toBeLessThan(50);
  });

  it('spaces consecutive requests by the minimum interval', async () => {
    vi.useFakeTimers();
    const throttle = new RequestThrottle('alphavantage', { minIntervalMs: 12_000 });
    const times: number[] = [];

    const first = throttle.acquire().then(() => times.push(Date.now()));
    const second = throttle.acquire().then(() => times.push(Date.now()));

    await vi.advanceTimersByTimeAsync(12_000);
    await Promise.all([first, second]);

    expect(times).toHaveLength(2);
    expect(times[1] - times[0]).toBe(12_000);
  });

  it('rejects without waiting once the daily quota is spent', async () => {
    const throttle = new RequestThrottle('alphavantage', { minIntervalMs: 0, dailyLimit: 3 });
    await throttle.acquire();
    await throttle.acquire();
    await throttle.acquire();

    await expect(throttle.acquire()).rejects.toBeInstanceOf(RateLimitError);
    await expect(throttle.acquire()).rejects.toThrow(
      'alphavantage daily limit of 3 requests reached. Try again tomorrow.'
    );
    expect(throttle.remaining()).toBe(0);
  });

  it('charges multi-request reservations up front', async () => {
    const throttle = new RequestThrottle('alphavantage', { minIntervalMs: 0, dailyLimit: 25 });
    await throttle.acquire(2);
    expect(throttle.remaining()).toBe(23);
  });

  it('does not charge a reservation that would exceed the quota', async () => {
    const throttle = new RequestThrottle('alphavantage', { minIntervalMs: 0, dailyLimit: 3 });
    await throttle.acquire(2);

    await expect(throttle.acquire(2)).rejects.toBeInstanceOf(RateLimitError);
    expect(throttle.remaining()).toBe(1);
    await throttle.acquire(1);
    expect(throttle.remaining()).toBe(0);
  });

  it('resets the quota at local midnight', async () => {
    let now = new Date(2024, 0, 15, 23, 59).getTime();
    const throttle = new RequestThrottle('alphavantage', { minIntervalMs: 0, dailyLimit: 1, now: () => now });

    await throttle.acquire();
    await expect(throttle.acquire()).rejects.toBeInstanceOf(RateLimitError);

    now = new Date(2024, 0, 16, 0, 1).getTime();
    expect(throttle.remaining()).toBe(1);
    await expect(throttle.acquire()).resolves.toBeUndefined();
  });

  it('counts concurrent reservations exactly once each', async () => {
    const throttle = new RequestThrottle('alphavantage', { minIntervalMs: 0, dailyLimit: 5 });
    const results = await Promise.allSettled(Array.from({ length: 8 }, () => throttle.acquire()));

    expect(results.filter(r => r.status === 'fulfilled')).toHaveLength(5);
    expect(results.filter(r => r.status === 'rejected')).toHaveLength(3);
    expect(throttle.remaining()).toBe(0);
  });

  it('reports no quota for providers without a daily limit', () => {
    const throttle = new RequestThrottle('yahoo', { minIntervalMs: 500 });
    expect(throttle.remaining()).toBeNull();
  });
});
