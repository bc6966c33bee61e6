/**
 * Shared fixtures for migrator tests
 */

import { SqliteConnectionPool } from '../../database/adapters/SqliteAdapter';
import { DatabaseConnection, ExecuteResult, QueryResult, SqlValue } from '../../database/types';

export const A = '20200101T000000Z';
export const B = '20200201T000000Z';
export const C = '20200301T000000Z';

export interface SqliteFixture {
  pool: SqliteConnectionPool;
  connection: DatabaseConnection;
}

export async function openSqlite(): Promise<SqliteFixture> {
  const pool = new SqliteConnectionPool({ type: 'sqlite', database: ':memory:', maxConnections: 1 });
  const connection = await pool.acquire();
  return { pool, connection };
}

export async function tableNames(connection: DatabaseConnection): Promise<string[]> {
  const result = await connection.query<{ name: string }>(
    "SELECT name FROM sqlite_master WHERE type = 'table' AND name NOT LIKE 'sqlite_%' ORDER BY name"
  );
  return result.rows.map(row => row.name);
}

interface FakeRow {
  id: number;
  version: string;
  name: string;
  created_at: Date;
}

/**
 * In-process stand-in for a connection that understands the versions
 * table queries and can be told to fail at commit or rollback.
 */
export class FakeConnection implements DatabaseConnection {
  readonly dialect = 'postgresql' as const;
  rows: FakeRow[] = [];
  statements: string[] = [];
  failCommit = false;
  failRollback = false;
  commits = 0;
  rollbacks = 0;
  private snapshot: FakeRow[] | null = null;
  private nextId = 1;

  async query<T = Record<string, unknown>>(sql: string): Promise<QueryResult<T>> {
    this.statements.push(sql.trim());
    const sorted = [...this.rows].sort((left, right) => (left.version < right.version ? -1 : 1));

    let rows: unknown[] = [];
    if (sql.includes('SELECT version FROM')) {
      rows = sorted.reverse().slice(0, 1).map(row => ({ version: row.version }));
    } else if (sql.includes('SELECT id, version, name, created_at')) {
      rows = sorted;
    }

    return { rows: rows as T[], rowCount: rows.length };
  }

  async execute(sql: string, params: SqlValue[] = []): Promise<ExecuteResult> {
    this.statements.push(sql.trim());

    if (sql.includes('INSERT INTO')) {
      this.rows.push({
        id: this.nextId++,
        version: String(params[0]),
        name: String(params[1]),
        created_at: new Date('2026-01-01T00:00:00.000Z')
      });
      return { affectedRows: 1 };
    }

    if (sql.includes('DELETE FROM')) {
      const before = this.rows.length;
      this.rows = this.rows.filter(row => row.version !== params[0]);
      return { affectedRows: before - this.rows.length };
    }

    return { affectedRows: 0 };
  }

  async beginTransaction(): Promise<void> {
    this.snapshot = [...this.rows];
  }

  async commit(): Promise<void> {
    if (this.failCommit) {
      throw new Error('commit failed');
    }
    this.commits++;
    this.snapshot = null;
  }

  async rollback(): Promise<void> {
    const snapshot = this.snapshot;
    this.snapshot = null;
    if (this.failRollback) {
      throw new Error('rollback failed');
    }
    this.rollbacks++;
    if (snapshot) {
      this.rows = snapshot;
    }
  }

  isInTransaction(): boolean {
    return this.snapshot !== null;
  }

  async close(): Promise<void> {}

  isConnected(): boolean {
    return true;
  }
}
