// Postgres substrate: Drizzle schema, connection and repositories
export {
  createDatabase,
  DEFAULT_MAX_CONNECTIONS,
  type Database,
  type DatabaseConfig,
} from './db.js';
export * from './schema/index.js';
export * from './repositories/index.js';
