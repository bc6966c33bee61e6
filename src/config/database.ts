/**
 * Environment-driven configuration for the migrator
 */

import { DatabaseConfig } from '../database/types';
import { LogLevel, parseLogLevel } from '../utils/logger';

export type Environment = Record<string, string | undefined>;

export const DEFAULT_SQLITE_PATH = './data/migrator.db';
export const DEFAULT_VERSIONS_TABLE = 'versions';

export interface MigratorSettings {
  database: DatabaseConfig;
  tableName: string;
  logLevel: LogLevel;
  migrationsModule?: string;
}

function parseInteger(value: string | undefined, fallback: number, variable: string): number {
  if (value === undefined || value.trim() === '') {
    return fallback;
  }

  const parsed = Number.parseInt(value, 10);
  if (Number.isNaN(parsed)) {
    throw new Error(`${variable} must be an integer, got "${value}"`);
  }
  return parsed;
}

/**
 * Get the database configuration from the environment
 */
export function getDatabaseConfig(env: Environment = process.env): DatabaseConfig {
  const dbType = env.DATABASE_TYPE || 'sqlite';

  if (dbType === 'postgresql') {
    const maxConnections = parseInteger(env.MAX_CONNECTIONS, 20, 'MAX_CONNECTIONS');
    const ssl = env.DB_SSL === 'true';

    if (env.DATABASE_URL) {
      return {
        type: 'postgresql',
        connectionString: env.DATABASE_URL,
        maxConnections,
        ssl
      };
    }

    return {
      type: 'postgresql',
      host: env.DB_HOST || 'localhost',
      port: parseInteger(env.DB_PORT, 5432, 'DB_PORT'),
      database: env.DB_NAME,
      username: env.DB_USER,
      password: env.DB_PASSWORD,
      maxConnections,
      ssl
    };
  }

  if (dbType !== 'sqlite') {
    throw new Error(`Unsupported DATABASE_TYPE: ${dbType}`);
  }

  return {
    type: 'sqlite',
    database: env.DATABASE_PATH || DEFAULT_SQLITE_PATH,
    maxConnections: parseInteger(env.MAX_CONNECTIONS, 10, 'MAX_CONNECTIONS')
  };
}

export function getMigratorSettings(env: Environment = process.env): MigratorSettings {
  return {
    database: getDatabaseConfig(env),
    tableName: env.MIGRATIONS_TABLE || DEFAULT_VERSIONS_TABLE,
    logLevel: parseLogLevel(env.LOG_LEVEL),
    migrationsModule: env.MIGRATIONS_MODULE || undefined
  };
}
