import type { SqlClient } from '../shared/database.js';
import type { Logger } from '../shared/logger.js';
import { createLogger } from '../shared/logger.js';
import { PG_CACHE_QUERIES } from './pg-cache.queries.js';
import type { CacheBackendKind, ExpiringCache, ValueGuard } from './types.js';

export interface PgCacheOptions<T> {
  /** Prefix applied to every key, so several logical caches share one table. */
  keyPrefix: string;
  defaultTtlSeconds?: number;
  validate: ValueGuard<T>;
  logger?: Logger;
}

/**
 * Cache backed by the shared `cache_entries` table. Values are stored as
 * JSON, so only JSON-representable data survives the round trip.
 */
export class PgCache<T> implements ExpiringCache<T> {
  readonly backend: CacheBackendKind = 'postgres';

  private readonly keyPrefix: string;
  private readonly defaultTtlSeconds: number;
  private readonly validate: ValueGuard<T>;
  private readonly logger: Logger;

  constructor(
    private readonly client: SqlClient,
    options: PgCacheOptions<T>,
  ) {
    this.keyPrefix = options.keyPrefix;
    this.defaultTtlSeconds = options.defaultTtlSeconds ?? 3600;
    this.validate = options.validate;
    this.logger = options.logger ?? createLogger('pg-cache');
  }

  async get(key: string): Promise<T | undefined> {
    const { rows } = await this.client.query(PG_CACHE_QUERIES.GET, [this.prefixed(key)]);
    if (rows.length === 0) return undefined;

    const row = rows[0];
    if (row.live !== true) {
      await this.delete(key);
      return undefined;
    }

    const value = row.value;
    if (!this.validate(value)) {
      this.logger.warn({ key: this.prefixed(key) }, 'Corrupt cache value, deleting');
      await this.delete(key);
      return undefined;
    }
    return value;
  }

  async set(key: string, value: T, ttlSeconds?: number): Promise<void> {
    await this.client.query(PG_CACHE_QUERIES.UPSERT, [
      this.prefixed(key),
      JSON.stringify(value),
      ttlSeconds ?? this.defaultTtlSeconds,
    ]);
  }

  async delete(key: string): Promise<void> {
    await this.client.query(PG_CACHE_QUERIES.DELETE, [this.prefixed(key)]);
  }

  async clear(): Promise<void> {
    await this.client.query(PG_CACHE_QUERIES.CLEAR_NAMESPACE, [this.keyPrefix]);
  }

  async size(): Promise<number> {
    const { rows } = await this.client.query(PG_CACHE_QUERIES.COUNT_LIVE, [this.keyPrefix]);
    return Number(rows[0]?.count ?? 0);
  }

  private prefixed(key: string): string {
    return `${this.keyPrefix}${key}`;
  }
}
