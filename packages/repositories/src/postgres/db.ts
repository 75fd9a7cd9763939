// Postgres connection for the grant store

import { drizzle } from 'drizzle-orm/postgres-js';
import postgres from 'postgres';
import * as schema from './schema/index.js';

/**
 * Connection settings, shaped like the runtime's postgres store config
 */
export type DatabaseConfig = {
  databaseUrl: string;

  /** Pool size. Defaults to 10. */
  maxConnections?: number;
};

export const DEFAULT_MAX_CONNECTIONS = 10;

/**
 * Open a postgres.js pool and wrap it in Drizzle with the grant schema.
 * Connections are opened lazily, on the first query.
 *
 * Usage:
 * ```ts
 * const { db, close } = createDatabase({ databaseUrl: process.env.DATABASE_URL });
 * const repos = createTransactionalPgRepositoryContext(db);
 * // ...
 * await close();
 * ```
 */
export function createDatabase(config: DatabaseConfig) {
  const client = postgres(config.databaseUrl, {
    max: config.maxConnections ?? DEFAULT_MAX_CONNECTIONS,
    connection: { application_name: 'pet-access' },
  });

  return {
    db: drizzle(client, { schema }),
    /** Drain the pool; in-flight queries finish first */
    close: () => client.end(),
  };
}

export type Database = ReturnType<typeof createDatabase>['db'];
