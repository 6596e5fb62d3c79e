export { MemoryCache } from './memory-cache.js';
export type { MemoryCacheOptions } from './memory-cache.js';
export { PgCache } from './pg-cache.js';
export type { PgCacheOptions } from './pg-cache.js';
export { PG_CACHE_QUERIES } from './pg-cache.queries.js';
export { CacheProvider, selectCacheBackend } from './cache-provider.js';
export type { CacheMode, CacheProviderOptions, BackendSelectionOptions } from './cache-provider.js';
export type { CacheBackendKind, CacheOptions, ExpiringCache, ValueGuard } from './types.js';
