import { describe, it, expect } from 'vitest';
import { CacheProvider, selectCacheBackend } from './cache-provider.js';
import { FakeSqlClient } from '../testing/fake-sql-client.js';
import type { SqlClient } from '../shared/database.js';

const isString = (value: unknown): value is string => typeof value === 'string';

describe('selectCacheBackend', () => {
  it('should select memory when forced', async () => {
    const client = new FakeSqlClient();

    expect(await selectCacheBackend(client, { mode: 'memory' })).toBe('memory');
    expect(client.statements).toHaveLength(0);
  });

  it('should select memory when no client is configured', async () => {
    expect(await selectCacheBackend(undefined, { mode: 'auto' })).toBe('memory');
  });

  it('should select postgres when the probe succeeds', async () => {
    expect(await selectCacheBackend(new FakeSqlClient(), { mode: 'auto' })).toBe('postgres');
  });

  it('should fall back to memory when the probe fails', async () => {
    const client = new FakeSqlClient();
    client.failWith = new Error('connect ECONNREFUSED');

    expect(await selectCacheBackend(client, { mode: 'auto' })).toBe('memory');
  });

  it('should fall back to memory when the probe hangs past the timeout', async () => {
    const hanging: SqlClient = {
      query: () => new Promise(() => undefined),
    };

    expect(await selectCacheBackend(hanging, { mode: 'auto', probeTimeoutMs: 5 })).toBe('memory');
  });
});

describe('CacheProvider', () => {
  it('should probe once and reuse the selection', async () => {
    const client = new FakeSqlClient();
    const provider = new CacheProvider({ mode: 'auto', client });

    await provider.createCache({ namespace: 'result', defaultTtlSeconds: 60, maxSize: 10, validate: isString });
    await provider.createCache({ namespace: 'session', defaultTtlSeconds: 60, maxSize: 10, validate: isString });

    expect(client.statements).toHaveLength(1);
    expect(await provider.backendKind()).toBe('postgres');
  });

  it('should hand out postgres caches keyed by namespace', async () => {
    const client = new FakeSqlClient();
    const provider = new CacheProvider({ mode: 'auto', client });

    const cache = await provider.createCache({
      namespace: 'session',
      defaultTtlSeconds: 60,
      maxSize: 10,
      validate: isString,
    });
    await cache.set('abc', '[]');

    expect(cache.backend).toBe('postgres');
    expect(client.rows.has('session:abc')).toBe(true);
  });

  it('should hand out bounded memory caches when postgres is unreachable', async () => {
    const client = new FakeSqlClient();
    client.failWith = new Error('down');
    const provider = new CacheProvider({ mode: 'auto', client });

    const cache = await provider.createCache({
      namespace: 'result',
      defaultTtlSeconds: 60,
      maxSize: 1,
      validate: isString,
    });
    await cache.set('a', 'x');
    await cache.set('b', 'y');

    expect(cache.backend).toBe('memory');
    expect(await cache.size()).toBe(1);
  });

  it('should select again after reset', async () => {
    const client = new FakeSqlClient();
    client.failWith = new Error('down');
    const provider = new CacheProvider({ mode: 'auto', client });

    expect(await provider.backendKind()).toBe('memory');

    client.failWith = undefined;
    provider.reset();

    expect(await provider.backendKind()).toBe('postgres');
  });
});
