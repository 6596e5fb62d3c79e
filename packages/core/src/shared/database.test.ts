import { describe, it, expect, vi } from 'vitest';
import { fileURLToPath } from 'node:url';
import { runMigrations } from './database.js';
import type { MigrationPool } from './database.js';

const migrationsDir = fileURLToPath(new URL('../../../../migrations', import.meta.url));

function fakePool(options: { failMigration?: boolean } = {}) {
  const applied = new Set<string>();
  const statements: string[] = [];

  const query = async (text: string, values: unknown[] = []) => {
    statements.push(text.trim());
    if (text.startsWith('SELECT 1 FROM schema_migrations')) {
      return { rows: [], rowCount: applied.has(String(values[0])) ? 1 : 0 };
    }
    if (text.startsWith('INSERT INTO schema_migrations')) {
      applied.add(String(values[0]));
      return { rows: [], rowCount: 1 };
    }
    if (options.failMigration && text.includes('cache_entries')) {
      throw new Error('permission denied for schema public');
    }
    return { rows: [], rowCount: 0 };
  };

  const release = vi.fn();
  const pool: MigrationPool = { query, connect: async () => ({ query, release }) };
  return { pool, applied, statements, release };
}

describe('runMigrations', () => {
  it('should apply each pending file inside a transaction', async () => {
    const { pool, applied, statements, release } = fakePool();

    const result = await runMigrations(pool, migrationsDir);

    expect(result).toEqual(['001_cache_entries']);
    expect(applied.has('001_cache_entries')).toBe(true);
    const begin = statements.indexOf('BEGIN');
    expect(statements[begin + 1]).toContain('CREATE UNLOGGED TABLE IF NOT EXISTS cache_entries');
    expect(statements[begin + 3]).toBe('COMMIT');
    expect(release).toHaveBeenCalledTimes(1);
  });

  it('should skip files already recorded', async () => {
    const { pool, statements } = fakePool();
    await runMigrations(pool, migrationsDir);
    statements.length = 0;

    const result = await runMigrations(pool, migrationsDir);

    expect(result).toEqual([]);
    expect(statements).not.toContain('BEGIN');
  });

  it('should roll back and rethrow when a file fails', async () => {
    const { pool, applied, statements, release } = fakePool({ failMigration: true });

    await expect(runMigrations(pool, migrationsDir)).rejects.toThrow(
      'permission denied for schema public',
    );
    expect(statements).toContain('ROLLBACK');
    expect(applied.size).toBe(0);
    expect(release).toHaveBeenCalledTimes(1);
  });
});
