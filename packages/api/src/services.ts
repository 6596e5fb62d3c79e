import type pg from 'pg';
import {
  CacheProvider,
  SessionManager,
  createLogger,
  createPool,
  errorMessage,
  runMigrations,
} from '@switchboard/core';
import type { CacheBackendKind, ExpiringCache, Logger, SqlClient } from '@switchboard/core';
import {
  CachedCapability,
  CapabilityRegistry,
  GeneralCapability,
  HttpCapability,
  HttpIntentClassifier,
  KeywordIntentClassifier,
  Orchestrator,
  SafeIntentResolver,
  isCapabilityResponse,
} from '@switchboard/router';
import type {
  Capability,
  CapabilityName,
  CapabilityRegistryInput,
  CapabilityResponse,
  IntentClassifier,
} from '@switchboard/router';
import type { AppConfig } from './config.js';

export interface Services {
  pool?: pg.Pool;
  cacheBackend: CacheBackendKind;
  cacheProvider: CacheProvider;
  resultCache: ExpiringCache<CapabilityResponse>;
  sessions: SessionManager;
  registry: CapabilityRegistry;
  orchestrator: Orchestrator;
  close(): Promise<void>;
}

export interface ServiceOverrides {
  /** Replaces the pool-backed SQL client; no pool is created when set. */
  sqlClient?: SqlClient;
  classifier?: IntentClassifier;
  capabilities?: Partial<Record<CapabilityName, Capability | null>>;
  logger?: Logger;
  /** Applied to the pool before the cache backend is probed. */
  migrationsDir?: string;
}

const isString = (value: unknown): value is string => typeof value === 'string';

function buildCapability(
  name: CapabilityName,
  config: AppConfig,
  resultCache: ExpiringCache<CapabilityResponse>,
): Capability | null {
  const url = config.capabilityUrls[name];
  if (!url) return null;

  const remote = new HttpCapability({ name, url, timeoutMs: config.capabilityTimeoutMs });
  return new CachedCapability(remote, resultCache, config.cache.ttlSeconds);
}

/**
 * Builds every long-lived service for one process. Nothing here is global:
 * callers hold the returned object and dispose of it with `close()`.
 */
export async function createServices(
  config: AppConfig,
  overrides: ServiceOverrides = {},
): Promise<Services> {
  const logger = overrides.logger ?? createLogger('switchboard', config.logLevel);

  let pool: pg.Pool | undefined;
  let sqlClient = overrides.sqlClient;
  if (!sqlClient && config.cache.mode === 'auto') {
    pool = createPool({ ...config.database, connectionTimeoutMillis: config.cache.probeTimeoutMs });
    sqlClient = pool;

    if (overrides.migrationsDir) {
      try {
        const applied = await runMigrations(pool, overrides.migrationsDir);
        if (applied.length > 0) logger.info({ applied }, 'Migrations applied');
      } catch (error) {
        // The probe below fails too and the cache falls back to memory
        logger.warn({ err: error }, `Migrations not applied: ${errorMessage(error)}`);
      }
    }
  }

  const cacheProvider = new CacheProvider({
    mode: config.cache.mode,
    client: sqlClient,
    probeTimeoutMs: config.cache.probeTimeoutMs,
    logger: logger.child({ component: 'cache' }),
  });
  const cacheBackend = await cacheProvider.backendKind();

  const resultCache = await cacheProvider.createCache<CapabilityResponse>({
    namespace: 'result',
    defaultTtlSeconds: config.cache.ttlSeconds,
    maxSize: config.cache.maxSize,
    validate: isCapabilityResponse,
  });
  const sessionStore = await cacheProvider.createCache<string>({
    namespace: 'session',
    defaultTtlSeconds: config.session.ttlSeconds,
    maxSize: config.session.maxSize,
    validate: isString,
  });
  const sessions = new SessionManager(
    sessionStore,
    { maxPairs: config.session.maxPairs },
    logger.child({ component: 'sessions' }),
  );

  const general =
    overrides.capabilities?.general ??
    buildCapability('general', config, resultCache) ??
    new GeneralCapability();
  const input: CapabilityRegistryInput = { general };
  for (const name of ['recommendation', 'review', 'price', 'policy'] as const) {
    const override = overrides.capabilities?.[name];
    input[name] = override !== undefined ? override : buildCapability(name, config, resultCache);
  }
  const registry = new CapabilityRegistry(input);
  logger.info({ capabilities: registry.available() }, 'Capabilities registered');

  const classifier =
    overrides.classifier ??
    (config.classifierUrl
      ? new HttpIntentClassifier({ url: config.classifierUrl, timeoutMs: config.capabilityTimeoutMs })
      : new KeywordIntentClassifier());
  const resolver = new SafeIntentResolver(classifier, logger.child({ component: 'intent' }));

  const orchestrator = new Orchestrator(registry, resolver, {
    breaker: config.breaker,
    logger: logger.child({ component: 'orchestrator' }),
  });

  return {
    pool,
    cacheBackend,
    cacheProvider,
    resultCache,
    sessions,
    registry,
    orchestrator,
    async close() {
      cacheProvider.reset();
      if (pool) await pool.end();
    },
  };
}
