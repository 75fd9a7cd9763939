// Repository interfaces
// These define the contracts for data access, enabling substrate independence.

export type { GrantRepository, StoreCallOptions } from './grant-repository.js';

export type {
  RepositoryContext,
  TransactionFn,
  TransactionOptions,
  TransactionalRepositoryContext,
} from './repository-context.js';
