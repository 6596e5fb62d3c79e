import { ConfigurationError } from '@switchboard/core';
import type { CacheMode, DatabaseConfig } from '@switchboard/core';
import type { CapabilityName } from '@switchboard/router';

export interface AppConfig {
  port: number;
  host: string;
  logLevel: string;
  database: DatabaseConfig;
  cache: {
    mode: CacheMode;
    ttlSeconds: number;
    maxSize: number;
    probeTimeoutMs: number;
  };
  session: {
    ttlSeconds: number;
    maxSize: number;
    maxPairs: number;
  };
  breaker: {
    failureThreshold: number;
    recoveryTimeoutMs: number;
  };
  classifierUrl?: string;
  capabilityTimeoutMs: number;
  capabilityUrls: Partial<Record<CapabilityName, string>>;
}

type Env = Record<string, string | undefined>;

function integer(env: Env, name: string, fallback: number, min = 0): number {
  const raw = env[name];
  if (raw === undefined || raw === '') return fallback;

  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new ConfigurationError(`${name} must be an integer >= ${min}, got "${raw}"`, name);
  }
  return value;
}

function optional(env: Env, name: string): string | undefined {
  const raw = env[name]?.trim();
  return raw ? raw : undefined;
}

function cacheMode(env: Env): CacheMode {
  const raw = env.CACHE_BACKEND ?? 'auto';
  if (raw !== 'auto' && raw !== 'memory') {
    throw new ConfigurationError(`CACHE_BACKEND must be "auto" or "memory", got "${raw}"`, 'CACHE_BACKEND');
  }
  return raw;
}

export function loadConfig(env: Env = process.env): AppConfig {
  const capabilityUrls: Partial<Record<CapabilityName, string>> = {};
  const urlVars: Array<[CapabilityName, string]> = [
    ['recommendation', 'CAPABILITY_RECOMMENDATION_URL'],
    ['review', 'CAPABILITY_REVIEW_URL'],
    ['price', 'CAPABILITY_PRICE_URL'],
    ['policy', 'CAPABILITY_POLICY_URL'],
    ['general', 'CAPABILITY_GENERAL_URL'],
  ];
  for (const [name, variable] of urlVars) {
    const url = optional(env, variable);
    if (url) capabilityUrls[name] = url;
  }

  return {
    port: integer(env, 'PORT', 3000),
    host: env.HOST ?? '0.0.0.0',
    logLevel: env.LOG_LEVEL ?? 'info',
    database: {
      host: env.DB_HOST ?? 'localhost',
      port: integer(env, 'DB_PORT', 5432),
      database: env.DB_NAME ?? 'switchboard',
      user: env.DB_USER ?? 'switchboard',
      password: env.DB_PASSWORD ?? 'switchboard',
      max: integer(env, 'DB_POOL_MAX', 10, 1),
    },
    cache: {
      mode: cacheMode(env),
      ttlSeconds: integer(env, 'CACHE_TTL_SECONDS', 3600, 1),
      maxSize: integer(env, 'CACHE_MAX_SIZE', 1000, 1),
      probeTimeoutMs: integer(env, 'CACHE_PROBE_TIMEOUT_MS', 2000, 1),
    },
    session: {
      ttlSeconds: integer(env, 'SESSION_TTL_SECONDS', 1800, 1),
      maxSize: integer(env, 'SESSION_MAX_SIZE', 200, 1),
      maxPairs: integer(env, 'SESSION_MAX_PAIRS', 10, 1),
    },
    breaker: {
      failureThreshold: integer(env, 'BREAKER_FAILURE_THRESHOLD', 3, 1),
      recoveryTimeoutMs: integer(env, 'BREAKER_RECOVERY_TIMEOUT_MS', 30_000),
    },
    classifierUrl: optional(env, 'CLASSIFIER_URL'),
    capabilityTimeoutMs: integer(env, 'CAPABILITY_TIMEOUT_MS', 30_000, 1),
    capabilityUrls,
  };
}
