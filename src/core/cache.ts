/**
 * In-memory memo for provider responses.
 *
 * Each adapter owns one instance, keyed by request shape, so repeated
 * lookups within a process don't spend upstream quota. Entries expire after
 * a TTL and the oldest entry is evicted once the cache is full.
 */

export interface MemoCacheOptions {
  maxEntries?: number;
  ttlMs?: number;
  now?: () => number;
}

export const DEFAULT_MEMO_MAX_ENTRIES = 100;
export const DEFAULT_MEMO_TTL_MS = 15 * 60 * 1000;

export class MemoCache<T> {
  private readonly entries = new Map<string, { value: T; expiresAt: number }>();
  private readonly maxEntries: number;
  private readonly ttlMs: number;
  private readonly now: () => number;

  constructor(options: MemoCacheOptions = {}) {
    this.maxEntries = options.maxEntries ?? DEFAULT_MEMO_MAX_ENTRIES;
    this.ttlMs = options.ttlMs ?? DEFAULT_MEMO_TTL_MS;
    this.now = options.now ?? Date.now;
  }

  get(key: string): T | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;
    if (entry.expiresAt <= this.now()) {
      this.entries.delete(key);
      return undefined;
    }
    return entry.value;
  }

  set(key: string, value: T): void {
    // Re-inserting moves the key to the back of the eviction order
    this.entries.delete(key);
    if (this.entries.size >= this.maxEntries) {
      const oldest = this.entries.keys().next().value;
      if (oldest !== undefined) this.entries.delete(oldest);
    }
    this.entries.set(key, { value, expiresAt: this.now() + this.ttlMs });
  }

  clear(): void {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }
}

export function memoKey(...parts: Array<string | number>): string {
  return parts.map(p => String(p)).join(':');
}
