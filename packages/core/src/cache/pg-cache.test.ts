import { describe, it, expect } from 'vitest';
import { PgCache } from './pg-cache.js';
import { PG_CACHE_QUERIES } from './pg-cache.queries.js';
import { FakeSqlClient } from '../testing/fake-sql-client.js';

const isNumber = (value: unknown): value is number => typeof value === 'number';

describe('PgCache', () => {
  it('should namespace keys with the configured prefix', async () => {
    const client = new FakeSqlClient();
    const cache = new PgCache(client, { keyPrefix: 'result:', validate: isNumber });

    await cache.set('a', 1, 60);

    expect([...client.rows.keys()]).toEqual(['result:a']);
    expect(await cache.get('a')).toBe(1);
  });

  it('should pass the ttl in seconds and the value as JSON', async () => {
    const calls: unknown[][] = [];
    const cache = new PgCache(
      {
        query: async (_text, values = []) => {
          calls.push(values);
          return { rows: [], rowCount: 1 };
        },
      },
      { keyPrefix: 'result:', defaultTtlSeconds: 120, validate: isNumber },
    );

    await cache.set('a', 7);

    expect(calls[0]).toEqual(['result:a', '7', 120]);
  });

  it('should delete and report absent an expired row', async () => {
    let clock = 0;
    const client = new FakeSqlClient(() => clock);
    const cache = new PgCache(client, { keyPrefix: 'result:', validate: isNumber });

    await cache.set('a', 1, 1);
    clock = 2000;

    expect(await cache.get('a')).toBeUndefined();
    expect(client.rows.has('result:a')).toBe(false);
    expect(client.statements.at(-1)).toBe(PG_CACHE_QUERIES.DELETE);
  });

  it('should delete a value that fails validation', async () => {
    const client = new FakeSqlClient();
    const cache = new PgCache(client, { keyPrefix: 'result:', validate: isNumber });
    client.rows.set('result:a', { value: 'not-a-number', expiresAt: Date.now() + 60_000 });

    expect(await cache.get('a')).toBeUndefined();
    expect(client.rows.has('result:a')).toBe(false);
  });

  it('should clear and count only its own namespace', async () => {
    const client = new FakeSqlClient();
    const results = new PgCache(client, { keyPrefix: 'result:', validate: isNumber });
    const sessions = new PgCache(client, { keyPrefix: 'session:', validate: isNumber });

    await results.set('a', 1);
    await results.set('b', 2);
    await sessions.set('s', 3);

    expect(await results.size()).toBe(2);

    await results.clear();

    expect(await results.size()).toBe(0);
    expect(await sessions.size()).toBe(1);
    expect(await sessions.get('s')).toBe(3);
  });

  it('should report the postgres backend', () => {
    const cache = new PgCache(new FakeSqlClient(), { keyPrefix: 'x:', validate: isNumber });
    expect(cache.backend).toBe('postgres');
  });
});
