/**
 * PostgreSQL database adapter with connection pooling
 */

import { Pool, PoolClient, PoolConfig } from 'pg';
import {
  DatabaseConfig,
  DatabaseConnection,
  ConnectionPool,
  QueryResult,
  ExecuteResult,
  ConnectionError,
  QueryError,
  TransactionError,
  SqlValue,
  toError
} from '../types';
import { Logger, createLogger } from '../../utils/logger';

export class PostgresConnection implements DatabaseConnection {
  readonly dialect = 'postgresql' as const;
  private client: PoolClient;
  private inTransaction = false;
  private released = false;

  constructor(client: PoolClient) {
    this.client = client;
  }

  async query<T = Record<string, unknown>>(sql: string, params: SqlValue[] = []): Promise<QueryResult<T>> {
    try {
      const result = await this.client.query(sql, params);
      return {
        rows: result.rows as T[],
        rowCount: result.rowCount ?? 0
      };
    } catch (error) {
      const cause = toError(error);
      throw new QueryError(`PostgreSQL query failed: ${cause.message}`, sql, cause);
    }
  }

  async execute(sql: string, params: SqlValue[] = []): Promise<ExecuteResult> {
    try {
      const result = await this.client.query(sql, params);
      const first: unknown = result.rows[0];
      const insertId =
        typeof first === 'object' && first !== null && 'id' in first &&
        (typeof first.id === 'number' || typeof first.id === 'string')
          ? first.id
          : undefined;

      return {
        affectedRows: result.rowCount ?? 0,
        insertId
      };
    } catch (error) {
      const cause = toError(error);
      throw new QueryError(`PostgreSQL execute failed: ${cause.message}`, sql, cause);
    }
  }

  async beginTransaction(): Promise<void> {
    if (this.inTransaction) {
      throw new TransactionError('Transaction already in progress');
    }

    await this.execute('BEGIN');
    this.inTransaction = true;
  }

  async commit(): Promise<void> {
    if (!this.inTransaction) {
      throw new TransactionError('No transaction in progress');
    }

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
    // Pooled clients go back to the pool; the pool owns their lifecycle
    if (!this.released) {
      this.released = true;
      this.client.release();
    }
  }

  isConnected(): boolean {
    return !this.released;
  }
}

export class PostgresConnectionPool implements ConnectionPool {
  private pool: Pool;
  private destroyed = false;

  constructor(config: DatabaseConfig, logger: Logger = createLogger('PostgresPool')) {
    const poolConfig: PoolConfig = {
      connectionString: config.connectionString,
      host: config.host,
      port: config.port || 5432,
      database: config.database,
      user: config.username,
      password: config.password,
      ssl: config.ssl,
      max: config.maxConnections || 20,
      idleTimeoutMillis: 30000,
      connectionTimeoutMillis: 10000
    };

    this.pool = new Pool(poolConfig);

    this.pool.on('error', (err) => {
      logger.error('PostgreSQL pool error:', err.message);
    });
  }

  async acquire(): Promise<DatabaseConnection> {
    if (this.destroyed) {
      throw new ConnectionError('Connection pool has been destroyed');
    }

    try {
      const client = await this.pool.connect();
      return new PostgresConnection(client);
    } catch (error) {
      const cause = toError(error);
      throw new ConnectionError(`Failed to acquire PostgreSQL connection: ${cause.message}`, cause);
    }
  }

  async release(connection: DatabaseConnection): Promise<void> {
    await connection.close();
  }

  async destroy(): Promise<void> {
    this.destroyed = true;
    await this.pool.end();
  }
}
