// Postgres repository implementations
export { PgGrantRepository, rowToGrant, grantToRow } from './grant-repository.js';
export { createTransactionalPgRepositoryContext } from './context.js';
