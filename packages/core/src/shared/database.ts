import pg from 'pg';
import { readdir, readFile } from 'node:fs/promises';
import { join } from 'node:path';

export interface DatabaseConfig {
  host: string;
  port: number;
  database: string;
  user: string;
  password: string;
  max?: number;
  connectionTimeoutMillis?: number;
}

/**
 * The slice of a pg pool the cache backend talks to. Tests substitute an
 * in-process fake.
 */
export interface SqlClient {
  query(
    text: string,
    values?: unknown[],
  ): Promise<{ rows: Record<string, unknown>[]; rowCount: number | null }>;
}

/** What runMigrations needs from a pool: plain queries plus one dedicated connection per file. */
export interface MigrationPool extends SqlClient {
  connect(): Promise<SqlClient & { release(): void }>;
}

export function createPool(config: DatabaseConfig): pg.Pool {
  return new pg.Pool({
    host: config.host,
    port: config.port,
    database: config.database,
    user: config.user,
    password: config.password,
    max: config.max ?? 10,
    connectionTimeoutMillis: config.connectionTimeoutMillis ?? 5000,
  });
}

export async function runMigrations(pool: MigrationPool, migrationsDir: string): Promise<string[]> {
  await pool.query(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      version TEXT PRIMARY KEY,
      applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    )
  `);

  const files = await readdir(migrationsDir);
  const pending = files.filter((f) => f.endsWith('.sql')).sort();
  const applied: string[] = [];

  for (const file of pending) {
    const version = file.replace('.sql', '');

    const { rowCount } = await pool.query(
      'SELECT 1 FROM schema_migrations WHERE version = $1',
      [version],
    );
    if (rowCount) continue;

    const sql = await readFile(join(migrationsDir, file), 'utf-8');
    const client = await pool.connect();
    try {
      await client.query('BEGIN');
      await client.query(sql);
      await client.query('INSERT INTO schema_migrations (version) VALUES ($1)', [version]);
      await client.query('COMMIT');
      applied.push(version);
    } catch (error) {
      await client.query('ROLLBACK');
      throw error;
    } finally {
      client.release();
    }
  }

  return applied;
}
