import type { CacheBackendKind, ExpiringCache } from './types.js';

interface CacheEntry<T> {
  value: T;
  expiresAt: number;
}

export interface MemoryCacheOptions {
  defaultTtlSeconds?: number;
  maxSize?: number;
  now?: () => number;
}

/**
 * In-process cache. Every operation runs to completion inside a single
 * event-loop turn, so concurrent requests never observe a half-applied
 * mutation.
 *
 * When the store is full and a new key arrives, the entry closest to
 * expiring is evicted (not the oldest insert, not the least recently read).
 */
export class MemoryCache<T> implements ExpiringCache<T> {
  readonly backend: CacheBackendKind = 'memory';

  private readonly store = new Map<string, CacheEntry<T>>();
  private readonly defaultTtlSeconds: number;
  private readonly maxSize: number;
  private readonly now: () => number;

  constructor(options: MemoryCacheOptions = {}) {
    this.defaultTtlSeconds = options.defaultTtlSeconds ?? 3600;
    this.maxSize = options.maxSize ?? 1000;
    this.now = options.now ?? (() => Date.now());
  }

  async get(key: string): Promise<T | undefined> {
    return this.read(key);
  }

  async set(key: string, value: T, ttlSeconds?: number): Promise<void> {
    const expiresAt = this.now() + (ttlSeconds ?? this.defaultTtlSeconds) * 1000;

    if (this.store.size >= this.maxSize && !this.store.has(key)) {
      this.evictSoonestExpiring();
    }
    this.store.set(key, { value, expiresAt });
  }

  async delete(key: string): Promise<void> {
    this.store.delete(key);
  }

  async clear(): Promise<void> {
    this.store.clear();
  }

  /** Live entries only; expired ones are dropped on the way. */
  async size(): Promise<number> {
    const now = this.now();
    for (const [key, entry] of this.store) {
      if (now > entry.expiresAt) this.store.delete(key);
    }
    return this.store.size;
  }

  private read(key: string): T | undefined {
    const entry = this.store.get(key);
    if (!entry) return undefined;

    if (this.now() > entry.expiresAt) {
      this.store.delete(key);
      return undefined;
    }
    return entry.value;
  }

  private evictSoonestExpiring(): void {
    let victim: string | undefined;
    let soonest = Infinity;

    for (const [key, entry] of this.store) {
      if (entry.expiresAt < soonest) {
        soonest = entry.expiresAt;
        victim = key;
      }
    }

    if (victim !== undefined) {
      this.store.delete(victim);
    }
  }
}
