/**
 * Tests for environment-driven configuration
 */

import { getDatabaseConfig, getMigratorSettings, DEFAULT_SQLITE_PATH } from '../database';

describe('getDatabaseConfig', () => {
  it('should default to SQLite at the default path', () => {
    expect(getDatabaseConfig({})).toEqual({
      type: 'sqlite',
      database: DEFAULT_SQLITE_PATH,
      maxConnections: 10
    });
  });

  it('should honour DATABASE_PATH', () => {
    expect(getDatabaseConfig({ DATABASE_PATH: '/tmp/app.db', MAX_CONNECTIONS: '2' })).toEqual({
      type: 'sqlite',
      database: '/tmp/app.db',
      maxConnections: 2
    });
  });

  it('should prefer DATABASE_URL for PostgreSQL', () => {
    expect(getDatabaseConfig({
      DATABASE_TYPE: 'postgresql',
      DATABASE_URL: 'postgres://migrator:test-password@db:5432/app',
      DB_HOST: 'ignored'
    })).toEqual({
      type: 'postgresql',
      connectionString: 'postgres://migrator:test-password@db:5432/app',
      maxConnections: 20,
      ssl: false
    });
  });

  it('should build PostgreSQL settings from individual variables', () => {
    expect(getDatabaseConfig({
      DATABASE_TYPE: 'postgresql',
      DB_HOST: 'db',
      DB_PORT: '6543',
      DB_NAME: 'app',
      DB_USER: 'migrator',
      DB_PASSWORD: 'test-password',
      DB_SSL: 'true'
    })).toEqual({
      type: 'postgresql',
      host: 'db',
      port: 6543,
      database: 'app',
      username: 'migrator',
      password: 'test-password',
      maxConnections: 20,
      ssl: true
    });
  });

  it('should reject unknown database types and bad numbers', () => {
    expect(() => getDatabaseConfig({ DATABASE_TYPE: 'oracle' })).toThrow('Unsupported DATABASE_TYPE: oracle');
    expect(() => getDatabaseConfig({ MAX_CONNECTIONS: 'many' })).toThrow(
      'MAX_CONNECTIONS must be an integer, got "many"'
    );
  });
});

describe('getMigratorSettings', () => {
  it('should read table name, log level and migrations module', () => {
    const settings = getMigratorSettings({
      MIGRATIONS_TABLE: 'schema_versions',
      LOG_LEVEL: 'debug',
      MIGRATIONS_MODULE: './migrations'
    });

    expect(settings.tableName).toBe('schema_versions');
    expect(settings.logLevel).toBe('DEBUG');
    expect(settings.migrationsModule).toBe('./migrations');
  });

  it('should fall back to defaults', () => {
    expect(getMigratorSettings({})).toEqual({
      database: { type: 'sqlite', database: DEFAULT_SQLITE_PATH, maxConnections: 10 },
      tableName: 'versions',
      logLevel: 'INFO',
      migrationsModule: undefined
    });
  });
});
