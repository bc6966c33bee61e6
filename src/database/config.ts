/**
 * Checks a database configuration before a pool is built from it
 */

import { DatabaseConfig } from './types';

/**
 * Every problem with the config; empty when it can be used
 */
export function validateDatabaseConfig(config: DatabaseConfig): string[] {
  const problems: string[] = [];

  if (config.type === 'sqlite') {
    if (!config.database) {
      problems.push('SQLite needs a database file path');
    }
  } else if (config.type === 'postgresql') {
    if (!config.connectionString && !(config.host && config.database)) {
      problems.push('PostgreSQL needs DATABASE_URL or both a host and a database name');
    }
    if (config.port !== undefined && !(Number.isInteger(config.port) && config.port >= 1 && config.port <= 65535)) {
      problems.push(`PostgreSQL port ${config.port} is outside 1-65535`);
    }
  } else {
    problems.push(`Unsupported database type: ${String(config.type)}`);
  }

  if (config.maxConnections !== undefined && config.maxConnections < 1) {
    problems.push(`maxConnections must be at least 1, got ${config.maxConnections}`);
  }

  return problems;
}
