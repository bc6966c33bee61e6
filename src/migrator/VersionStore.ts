/**
 * Bookkeeping of applied migrations in the versions table
 */

import { DatabaseConnection, DatabaseType } from '../database/types';
import { AppliedVersion } from './types';

interface VersionRow {
  id: number | string;
  version: string;
  name: string;
  created_at: Date | string;
}

const TABLE_NAME_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

const ID_COLUMN: Record<DatabaseType, string> = {
  postgresql: 'BIGSERIAL PRIMARY KEY',
  sqlite: 'INTEGER PRIMARY KEY AUTOINCREMENT'
};

function placeholder(dialect: DatabaseType, position: number): string {
  return dialect === 'postgresql' ? `$${position}` : '?';
}

/**
 * SQLite stores CURRENT_TIMESTAMP as "YYYY-MM-DD HH:MM:SS" in UTC.
 */
export function parseTimestamp(value: Date | string): Date {
  if (value instanceof Date) {
    return value;
  }
  const iso = /^\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}(\.\d+)?$/.test(value)
    ? `${value.replace(' ', 'T')}Z`
    : value;
  return new Date(iso);
}

export class VersionStore {
  constructor(private readonly tableName: string = 'versions') {
    if (!TABLE_NAME_PATTERN.test(tableName)) {
      throw new Error(`Invalid versions table name: ${tableName}`);
    }
  }

  /**
   * Create the versions table if it does not exist yet
   */
  async ensureSchema(connection: DatabaseConnection): Promise<void> {
    await connection.execute(`
      CREATE TABLE IF NOT EXISTS ${this.tableName} (
        id         ${ID_COLUMN[connection.dialect]},
        version    TEXT NOT NULL,
        name       TEXT NOT NULL,
        created_at TIMESTAMP NOT NULL DEFAULT CURRENT_TIMESTAMP
      )
    `);
  }

  async listApplied(connection: DatabaseConnection): Promise<AppliedVersion[]> {
    const result = await connection.query<VersionRow>(
      `SELECT id, version, name, created_at FROM ${this.tableName} ORDER BY version ASC`
    );

    return result.rows.map(row => ({
      id: Number(row.id),
      version: row.version,
      name: row.name,
      createdAt: parseTimestamp(row.created_at)
    }));
  }

  /**
   * Greatest applied version, or null when the table is empty
   */
  async currentVersion(connection: DatabaseConnection): Promise<string | null> {
    const result = await connection.query<Pick<VersionRow, 'version'>>(
      `SELECT version FROM ${this.tableName} ORDER BY version DESC LIMIT 1`
    );

    return result.rows.length > 0 ? result.rows[0].version : null;
  }

  async recordApplied(connection: DatabaseConnection, version: string, name: string): Promise<void> {
    const dialect = connection.dialect;
    await connection.execute(
      `INSERT INTO ${this.tableName} (version, name) VALUES (${placeholder(dialect, 1)}, ${placeholder(dialect, 2)})`,
      [version, name]
    );
  }

  async recordReverted(connection: DatabaseConnection, version: string): Promise<number> {
    const result = await connection.execute(
      `DELETE FROM ${this.tableName} WHERE version = ${placeholder(connection.dialect, 1)}`,
      [version]
    );
    return result.affectedRows;
  }
}
