/**
 * SQLite database adapter with connection pooling
 */

import * as sqlite3 from 'sqlite3';
import { mkdir } from 'fs/promises';
import * as path from 'path';
import {
  DatabaseConfig,
  DatabaseConnection,
  ConnectionPool,
  QueryResult,
  ExecuteResult,
  ConnectionError,
  QueryError,
  TransactionError,
  SqlValue
} from '../types';

export class SqliteConnection implements DatabaseConnection {
  readonly dialect = 'sqlite' as const;
  private db: sqlite3.Database;
  private inTransaction = false;
  private closed = false;

  constructor(db: sqlite3.Database) {
    this.db = db;
  }

  async query<T = Record<string, unknown>>(sql: string, params: SqlValue[] = []): Promise<QueryResult<T>> {
    return new Promise((resolve, reject) => {
      this.db.all<Record<string, unknown>>(sql, params, (err, rows) => {
        if (err) {
          reject(new QueryError(`SQLite query failed: ${err.message}`, sql, err));
          return;
        }

        resolve({
          rows: rows as T[],
          rowCount: rows.length
        });
      });
    });
  }

  async execute(sql: string, params: SqlValue[] = []): Promise<ExecuteResult> {
    return new Promise((resolve, reject) => {
      this.db.run(sql, params, function (err) {
        if (err) {
          reject(new QueryError(`SQLite execute failed: ${err.message}`, sql, err));
          return;
        }

        resolve({
          affectedRows: this.changes,
          insertId: this.lastID
        });
      });
    });
  }

  async beginTransaction(): Promise<void> {
    if (this.inTransaction) {
      throw new TransactionError('Transaction already in progress');
    }

    await this.execute('BEGIN TRANSACTION');
    this.inTransaction = true;
  }

  async commit(): Promise<void> {
    if (!this.inTransaction) {
      throw new TransactionError('No transaction in progress');
    }

    // A failed COMMIT leaves the transaction open; the caller rolls back.
    await this.execute('COMMIT');
    this.inTransaction = false;
  }

  async rollback(): Promise<void> {
    if (!this.inTransaction) {
      throw new TransactionError('No transaction in progress');
    }

    try {
      await this.execute('ROLLBACK');
    } finally {
      this.inTransaction = false;
    }
  }

  isInTransaction(): boolean {
    return this.inTransaction;
  }

  async close(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.db.close((err) => {
        if (err) {
          reject(new ConnectionError(`Failed to close SQLite connection: ${err.message}`, err));
          return;
        }
        this.closed = true;
        resolve();
      });
    });
  }

  isConnected(): boolean {
    return !this.closed;
  }
}

export class SqliteConnectionPool implements ConnectionPool {
  private config: DatabaseConfig;
  private connections: SqliteConnection[] = [];
  private availableConnections: SqliteConnection[] = [];
  private waitingClients: Array<{
    resolve: (connection: SqliteConnection) => void;
    reject: (error: Error) => void;
  }> = [];
  private maxConnections: number;
  private destroyed = false;

  constructor(config: DatabaseConfig) {
    this.config = config;
    this.maxConnections = config.maxConnections || 10;
  }

  async acquire(): Promise<DatabaseConnection> {
    if (this.destroyed) {
      throw new ConnectionError('Connection pool has been destroyed');
    }

    const available = this.availableConnections.pop();
    if (available) {
      return available;
    }

    if (this.connections.length < this.maxConnections) {
      const connection = await this.createConnection();
      this.connections.push(connection);
      return connection;
    }

    return new Promise((resolve, reject) => {
      this.waitingClients.push({ resolve, reject });
    });
  }

  async release(connection: DatabaseConnection): Promise<void> {
    if (!(connection instanceof SqliteConnection) || !this.connections.includes(connection)) {
      throw new ConnectionError('Connection does not belong to this pool');
    }

    const client = this.waitingClients.shift();
    if (client) {
      client.resolve(connection);
      return;
    }

    this.availableConnections.push(connection);
  }

  async destroy(): Promise<void> {
    this.destroyed = true;

    this.waitingClients.forEach(client => {
      client.reject(new ConnectionError('Connection pool destroyed'));
    });
    this.waitingClients = [];

    const closePromises = this.connections.map(conn => conn.close());
    await Promise.all(closePromises);

    this.connections = [];
    this.availableConnections = [];
  }

  private async createConnection(): Promise<SqliteConnection> {
    const filename = this.config.database || ':memory:';
    if (filename !== ':memory:' && !filename.startsWith('file:')) {
      await mkdir(path.dirname(path.resolve(filename)), { recursive: true });
    }

    return new Promise((resolve, reject) => {
      const db = new sqlite3.Database(filename, (err) => {
        if (err) {
          reject(new ConnectionError(`Failed to create SQLite connection: ${err.message}`, err));
          return;
        }

        db.serialize(() => {
          db.run('PRAGMA foreign_keys = ON');
        });

        resolve(new SqliteConnection(db));
      });
    });
  }
}
