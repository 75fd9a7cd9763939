// @pet-access/repositories
// Grant store contract and implementations.
//
// Interfaces define WHAT operations are available, not HOW they're
// implemented. The in-memory and Postgres implementations fulfill the same
// contract, including the ordering rule for duplicate active grants.

export * from './interfaces/index.js';
export { GrantAlreadyExistsError } from './errors.js';
export { compareByRecency, compareByCreation, pickMostRecent } from './ordering.js';
export {
  createInMemoryRepositoryContext,
  type InMemoryRepositoryContext,
  type InMemoryDataStore,
} from './in-memory/index.js';
export * as postgres from './postgres/index.js';
