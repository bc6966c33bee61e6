export * from './migrator';
export * from './database';
export * from './config/database';
export * from './utils/logger';
