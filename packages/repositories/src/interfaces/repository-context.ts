import type { GrantRepository } from './grant-repository.js';

/**
 * RepositoryContext bundles the repository interfaces together.
 *
 * This is the dependency injection point for the runtime: pass a
 * RepositoryContext to code that needs data access, and swap the
 * in-memory store for Postgres without touching the consumer.
 */
export interface RepositoryContext {
  readonly grants: GrantRepository;
}

/**
 * Work executed with exclusive access to the store.
 */
export type TransactionFn<T> = (repos: RepositoryContext) => Promise<T>;

/**
 * Options for a transaction
 */
export type TransactionOptions = {
  /**
   * Key of the region to serialize on (the pet id for grant work).
   * Implementations may lock more than the key, never less.
   */
  lockKey?: string;

  /** Cancellation signal, checked before the work starts */
  signal?: AbortSignal;
};

/**
 * Extended context with transaction support.
 *
 * Reads of a pet's grant set and writes to its grants performed inside one
 * transaction are mutually exclusive with any other transaction on the
 * same lockKey.
 */
export interface TransactionalRepositoryContext extends RepositoryContext {
  /**
   * Execute a function with exclusive access to the lockKey region.
   *
   * @param fn Function to execute within the transaction
   * @returns The return value of the function
   * @throws Rolls back (where the backend can) and rethrows if fn throws
   */
  transaction<T>(fn: TransactionFn<T>, options?: TransactionOptions): Promise<T>;
}
