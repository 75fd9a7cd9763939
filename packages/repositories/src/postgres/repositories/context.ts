import { sql } from 'drizzle-orm';
import type { Database } from '../db.js';
import type {
  TransactionalRepositoryContext,
  TransactionFn,
  TransactionOptions,
} from '../../interfaces/index.js';
import { PgGrantRepository } from './grant-repository.js';

/**
 * Create a TransactionalRepositoryContext backed by Postgres.
 *
 * Usage:
 * ```ts
 * const { db } = createDatabase({ connectionString: process.env.DATABASE_URL });
 * const repos = createTransactionalPgRepositoryContext(db);
 *
 * // Serialize all grant work on one pet
 * const grants = await repos.transaction(
 *   (txRepos) => txRepos.grants.listByPet(petId),
 *   { lockKey: petId }
 * );
 * ```
 */
export function createTransactionalPgRepositoryContext(
  db: Database
): TransactionalRepositoryContext {
  return new TransactionalPgRepositoryContext(db);
}

/**
 * TransactionalRepositoryContext implementation for Postgres.
 *
 * A lockKey takes a transaction-scoped advisory lock, so every transaction
 * on the same key is serialized across connections and processes.
 */
class TransactionalPgRepositoryContext implements TransactionalRepositoryContext {
  readonly grants: PgGrantRepository;

  constructor(private db: Database) {
    this.grants = new PgGrantRepository(db);
  }

  async transaction<T>(fn: TransactionFn<T>, options: TransactionOptions = {}): Promise<T> {
    const { lockKey, signal } = options;
    signal?.throwIfAborted();

    return this.db.transaction(async (tx) => {
      if (lockKey !== undefined) {
        await tx.execute(sql`select pg_advisory_xact_lock(hashtext(${lockKey}))`);
      }
      signal?.throwIfAborted();

      // Cast tx to Database since Drizzle's transaction type is compatible
      const txDb = tx as unknown as Database;
      return fn({ grants: new PgGrantRepository(txDb) });
    });
  }
}
