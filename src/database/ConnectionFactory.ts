/**
 * Hands out one connection pool per database config
 */

import { DatabaseConfig, ConnectionPool } from './types';
import { validateDatabaseConfig } from './config';
import { SqliteConnectionPool } from './adapters/SqliteAdapter';
import { PostgresConnectionPool } from './adapters/PostgresAdapter';

export class ConnectionFactory {
  private static instance: ConnectionFactory | undefined;
  private pools: Map<string, ConnectionPool> = new Map();

  private constructor() {}

  public static getInstance(): ConnectionFactory {
    if (!ConnectionFactory.instance) {
      ConnectionFactory.instance = new ConnectionFactory();
    }
    return ConnectionFactory.instance;
  }

  public async createPool(config: DatabaseConfig): Promise<ConnectionPool> {
    const poolKey = this.generatePoolKey(config);

    const existing = this.pools.get(poolKey);
    if (existing) {
      return existing;
    }

    const problems = validateDatabaseConfig(config);
    if (problems.length > 0) {
      throw new Error(`Invalid database config: ${problems.join('; ')}`);
    }

    let pool: ConnectionPool;

    switch (config.type) {
      case 'sqlite':
        pool = new SqliteConnectionPool(config);
        break;
      case 'postgresql':
        pool = new PostgresConnectionPool(config);
        break;
      default:
        throw new Error(`Unsupported database type: ${String(config.type)}`);
    }

    this.pools.set(poolKey, pool);
    return pool;
  }

  public async closePool(config: DatabaseConfig): Promise<void> {
    const poolKey = this.generatePoolKey(config);
    const pool = this.pools.get(poolKey);

    if (pool) {
      await pool.destroy();
      this.pools.delete(poolKey);
    }
  }

  private generatePoolKey(config: DatabaseConfig): string {
    const target = config.connectionString || config.database;
    return `${config.type}:${config.host || 'localhost'}:${config.port || 'default'}:${target}`;
  }
}

export default ConnectionFactory;
