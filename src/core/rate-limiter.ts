import { RateLimitError } from './errors.js';
import type { ProviderName } from './types.js';

/**
 * Per-provider request throttle.
 *
 * Enforces a minimum spacing between requests and, optionally, a daily quota
 * that resets at local midnight. Reservations run one at a time through a
 * promise chain, so the quota check-then-increment and the spacing timestamp
 * stay consistent when several requests hit the same adapter concurrently.
 */

export interface ThrottleOptions {
  minIntervalMs: number;
  dailyLimit?: number;
  now?: () => number;
}

export class RequestThrottle {
  private readonly minIntervalMs: number;
  private readonly dailyLimit: number | undefined;
  private readonly now: () => number;
  private lastRequest = Number.NEGATIVE_INFINITY;
  private dailyCount = 0;
  private quotaDay: string | null = null;
  private tail: Promise<void> = Promise.resolve();

  constructor(private readonly provider: ProviderName, options: ThrottleOptions) {
    this.minIntervalMs = options.minIntervalMs;
    this.dailyLimit = options.dailyLimit;
    this.now = options.now ?? Date.now;
  }

  /**
   * Reserve `cost` requests. Rejects with RateLimitError, without waiting,
   * when the reservation would exceed the daily quota.
   */
  acquire(cost: number = 1): Promise<void> {
    const reservation = this.tail.then(() => this.reserve(cost));
    // Later callers queue behind this one whether it succeeds or not
    this.tail = reservation.then(
      () => undefined,
      () => undefined
    );
    return reservation;
  }

  /** Requests left today, or null when no quota applies */
  remaining(): number | null {
    if (this.dailyLimit === undefined) return null;
    this.rollQuotaDay();
    return Math.max(0, this.dailyLimit - this.dailyCount);
  }

  private async reserve(cost: number): Promise<void> {
    this.rollQuotaDay();

    if (this.dailyLimit !== undefined && this.dailyCount + cost > this.dailyLimit) {
      throw new RateLimitError(
        this.provider,
        `${this.provider} daily limit of ${this.dailyLimit} requests reached. Try again tomorrow.`
      );
    }
    this.dailyCount += cost;

    const waitMs = this.lastRequest + this.minIntervalMs - this.now();
    if (waitMs > 0) {
      await sleep(waitMs);
    }
    this.lastRequest = this.now();
  }

  private rollQuotaDay(): void {
    const today = localDayKey(this.now());
    if (this.quotaDay !== today) {
      this.quotaDay = today;
      this.dailyCount = 0;
    }
  }
}

function localDayKey(ms: number): string {
  const d = new Date(ms);
  return `${d.getFullYear()}-${d.getMonth() + 1}-${d.getDate()}`;
}

export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}
