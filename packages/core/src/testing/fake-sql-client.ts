import type { SqlClient } from '../shared/database.js';
import { PG_CACHE_QUERIES } from '../cache/pg-cache.queries.js';

interface StoredRow {
  value: unknown;
  expiresAt: number;
}

/**
 * In-process stand-in for the `cache_entries` table. Understands exactly the
 * statements in PG_CACHE_QUERIES; anything else is rejected.
 */
export class FakeSqlClient implements SqlClient {
  readonly rows = new Map<string, StoredRow>();
  readonly statements: string[] = [];
  failWith?: Error;

  constructor(private readonly now: () => number = Date.now) {}

  async query(
    text: string,
    values: unknown[] = [],
  ): Promise<{ rows: Record<string, unknown>[]; rowCount: number | null }> {
    this.statements.push(text);
    if (this.failWith) throw this.failWith;

    const [first, second, third] = values;

    switch (text) {
      case PG_CACHE_QUERIES.PROBE:
        return { rows: this.rows.size > 0 ? [{ '?column?': 1 }] : [], rowCount: 0 };

      case PG_CACHE_QUERIES.GET: {
        const row = this.rows.get(String(first));
        if (!row) return { rows: [], rowCount: 0 };
        return { rows: [{ value: row.value, live: row.expiresAt > this.now() }], rowCount: 1 };
      }

      case PG_CACHE_QUERIES.UPSERT:
        this.rows.set(String(first), {
          value: JSON.parse(String(second)),
          expiresAt: this.now() + Number(third) * 1000,
        });
        return { rows: [], rowCount: 1 };

      case PG_CACHE_QUERIES.DELETE: {
        const existed = this.rows.delete(String(first));
        return { rows: [], rowCount: existed ? 1 : 0 };
      }

      case PG_CACHE_QUERIES.CLEAR_NAMESPACE: {
        let removed = 0;
        for (const key of [...this.rows.keys()]) {
          if (key.startsWith(String(first))) {
            this.rows.delete(key);
            removed++;
          }
        }
        return { rows: [], rowCount: removed };
      }

      case PG_CACHE_QUERIES.COUNT_LIVE: {
        const prefix = String(first);
        const count = [...this.rows.entries()].filter(
          ([key, row]) => key.startsWith(prefix) && row.expiresAt > this.now(),
        ).length;
        return { rows: [{ count }], rowCount: 1 };
      }

      default:
        throw new Error(`FakeSqlClient: unsupported statement ${text.trim()}`);
    }
  }
}
