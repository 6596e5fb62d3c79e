export type CacheBackendKind = 'memory' | 'postgres';

/**
 * Key/value store with a time-to-live per entry. Both backends share this
 * contract so callers never know which one they were handed.
 */
export interface ExpiringCache<T> {
  readonly backend: CacheBackendKind;
  /** Resolves `undefined` for a missing or expired key. Expired entries are removed. */
  get(key: string): Promise<T | undefined>;
  set(key: string, value: T, ttlSeconds?: number): Promise<void>;
  delete(key: string): Promise<void>;
  clear(): Promise<void>;
  /** Live entries. Approximate for the postgres backend. */
  size(): Promise<number>;
}

export type ValueGuard<T> = (value: unknown) => value is T;

export interface CacheOptions<T> {
  namespace: string;
  defaultTtlSeconds: number;
  /** Upper bound on entries. Only the memory backend enforces it. */
  maxSize: number;
  validate: ValueGuard<T>;
}
