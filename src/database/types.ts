/**
 * Database configuration types and interfaces
 */

export type DatabaseType = 'sqlite' | 'postgresql';

export type SqlValue = string | number | boolean | null | Date;

export interface DatabaseConfig {
  type: DatabaseType;
  connectionString?: string;
  host?: string;
  port?: number;
  database?: string;
  username?: string;
  password?: string;
  maxConnections?: number;
  ssl?: boolean;
}

export interface ConnectionPool {
  acquire(): Promise<DatabaseConnection>;
  release(connection: DatabaseConnection): Promise<void>;
  destroy(): Promise<void>;
}

export interface DatabaseConnection {
  /** SQL dialect spoken by the connection; decides placeholder style and DDL. */
  readonly dialect: DatabaseType;
  query<T = Record<string, unknown>>(sql: string, params?: SqlValue[]): Promise<QueryResult<T>>;
  execute(sql: string, params?: SqlValue[]): Promise<ExecuteResult>;
  beginTransaction(): Promise<void>;
  commit(): Promise<void>;
  rollback(): Promise<void>;
  isInTransaction(): boolean;
  close(): Promise<void>;
  isConnected(): boolean;
}

export interface QueryResult<T = Record<string, unknown>> {
  rows: T[];
  rowCount: number;
}

export interface ExecuteResult {
  affectedRows: number;
  insertId?: number | string;
}

export class DatabaseError extends Error {
  constructor(
    message: string,
    public code?: string,
    public originalError?: Error
  ) {
    super(message);
    this.name = 'DatabaseError';
  }
}

export class ConnectionError extends DatabaseError {
  constructor(message: string, originalError?: Error) {
    super(message, 'CONNECTION_ERROR', originalError);
    this.name = 'ConnectionError';
  }
}

export class QueryError extends DatabaseError {
  constructor(message: string, public query?: string, originalError?: Error) {
    super(message, 'QUERY_ERROR', originalError);
    this.name = 'QueryError';
  }
}

export class TransactionError extends DatabaseError {
  constructor(message: string) {
    super(message, 'TRANSACTION_ERROR');
    this.name = 'TransactionError';
  }
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
