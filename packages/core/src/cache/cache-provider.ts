import type { SqlClient } from '../shared/database.js';
import { errorMessage } from '../shared/errors.js';
import type { Logger } from '../shared/logger.js';
import { createLogger } from '../shared/logger.js';
import { MemoryCache } from './memory-cache.js';
import { PgCache } from './pg-cache.js';
import { PG_CACHE_QUERIES } from './pg-cache.queries.js';
import type { CacheBackendKind, CacheOptions, ExpiringCache } from './types.js';

export type CacheMode = 'auto' | 'memory';

export interface BackendSelectionOptions {
  mode: CacheMode;
  probeTimeoutMs?: number;
  logger?: Logger;
}

/**
 * Decides once, at startup, where cached data lives. In `auto` mode the
 * shared table is probed; any failure (no client, unreachable server,
 * missing table, timeout) selects the in-process backend.
 */
export async function selectCacheBackend(
  client: SqlClient | undefined,
  options: BackendSelectionOptions,
): Promise<CacheBackendKind> {
  const logger = options.logger ?? createLogger('cache');

  if (options.mode === 'memory' || !client) {
    logger.info({ backend: 'memory' }, 'Cache: using in-process backend');
    return 'memory';
  }

  const timeoutMs = options.probeTimeoutMs ?? 2000;
  let timer: NodeJS.Timeout | undefined;
  try {
    const timeout = new Promise<never>((_resolve, reject) => {
      timer = setTimeout(() => reject(new Error(`probe timed out after ${timeoutMs}ms`)), timeoutMs);
    });
    await Promise.race([client.query(PG_CACHE_QUERIES.PROBE), timeout]);
    logger.info({ backend: 'postgres' }, 'Cache: using postgres backend');
    return 'postgres';
  } catch (error) {
    logger.info(
      { backend: 'memory', reason: errorMessage(error) },
      'Cache: postgres unavailable, using in-process backend',
    );
    return 'memory';
  } finally {
    clearTimeout(timer);
  }
}

export interface CacheProviderOptions extends BackendSelectionOptions {
  client?: SqlClient;
}

/**
 * Hands out caches on whichever backend was selected. The selection runs at
 * most once per provider; `reset()` forgets it so a test can select again.
 */
export class CacheProvider {
  private selection?: Promise<CacheBackendKind>;
  private readonly logger: Logger;

  constructor(private readonly options: CacheProviderOptions) {
    this.logger = options.logger ?? createLogger('cache');
  }

  backendKind(): Promise<CacheBackendKind> {
    if (!this.selection) {
      this.selection = selectCacheBackend(this.options.client, {
        mode: this.options.mode,
        probeTimeoutMs: this.options.probeTimeoutMs,
        logger: this.logger,
      });
    }
    return this.selection;
  }

  async createCache<T>(options: CacheOptions<T>): Promise<ExpiringCache<T>> {
    const kind = await this.backendKind();

    if (kind === 'postgres' && this.options.client) {
      return new PgCache<T>(this.options.client, {
        keyPrefix: `${options.namespace}:`,
        defaultTtlSeconds: options.defaultTtlSeconds,
        validate: options.validate,
        logger: this.logger.child({ namespace: options.namespace }),
      });
    }

    return new MemoryCache<T>({
      defaultTtlSeconds: options.defaultTtlSeconds,
      maxSize: options.maxSize,
    });
  }

  reset(): void {
    this.selection = undefined;
  }
}
