// Shared
export { generateId, isRecord } from './shared/types.js';
export type { JsonValue } from './shared/types.js';
export {
  ValidationError,
  ConfigurationError,
  CapabilityInvocationError,
  errorMessage,
} from './shared/errors.js';
export { createPool, runMigrations } from './shared/database.js';
export type { DatabaseConfig, MigrationPool, SqlClient } from './shared/database.js';
export { createLogger } from './shared/logger.js';
export type { Logger } from './shared/logger.js';

// Observability
export { getTracer, startSpan, endSpan, SpanStatusCode } from './observability/tracing.js';
export type { Span } from './observability/tracing.js';

// Cache
export { MemoryCache, PgCache, PG_CACHE_QUERIES, CacheProvider, selectCacheBackend } from './cache/index.js';
export type {
  MemoryCacheOptions,
  PgCacheOptions,
  CacheMode,
  CacheProviderOptions,
  BackendSelectionOptions,
  CacheBackendKind,
  CacheOptions,
  ExpiringCache,
  ValueGuard,
} from './cache/index.js';

// Sessions
export { SessionManager, buildEnrichedQuery, parseTranscript, DEFAULT_MAX_PAIRS } from './session/index.js';
export type { ChatMessage, ChatRole, SessionManagerOptions } from './session/index.js';
