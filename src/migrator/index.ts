/**
 * Migrator module main exports
 */

export * from './types';
export * from './errors';
export * from './MigrationRegistry';
export * from './VersionStore';
export * from './plan';
export * from './MigrationEngine';
