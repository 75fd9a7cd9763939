// In-memory repository implementation for development and testing
//
// Useful for:
// - Local development without a database
// - Fast unit testing
//
// Each context owns its data and its lock, so several stores can coexist
// in one process. Data does not persist between restarts.

import type { Grant } from '@pet-access/protocol';
import type {
  RepositoryContext,
  TransactionalRepositoryContext,
  GrantRepository,
} from '../interfaces/index.js';
import { GrantAlreadyExistsError } from '../errors.js';
import { compareByCreation, compareByRecency } from '../ordering.js';
import { Mutex } from './mutex.js';

/**
 * In-memory data store that can be accessed for debugging/inspection.
 */
export interface InMemoryDataStore {
  grants: Map<string, Grant>;
}

/**
 * Extended repository context with access to underlying data and clear function.
 */
export interface InMemoryRepositoryContext extends TransactionalRepositoryContext {
  /** Direct access to underlying data stores (for debugging/testing) */
  _data: InMemoryDataStore;
  /** Clear all data */
  clear(): void;
}

function cloneGrant(grant: Grant): Grant {
  return { ...grant, scopes: [...grant.scopes] };
}

/**
 * Grant operations over a map, without locking.
 * Only the transaction body and the locked wrapper call these.
 */
function createUnlockedGrantRepository(grants: Map<string, Grant>): GrantRepository {
  return {
    async create(grant, options) {
      options?.signal?.throwIfAborted();
      if (grants.has(grant.id)) {
        throw new GrantAlreadyExistsError(grant.id);
      }
      grants.set(grant.id, cloneGrant(grant));
      return cloneGrant(grant);
    },
    async update(grant, options) {
      options?.signal?.throwIfAborted();
      const existing = grants.get(grant.id);
      if (!existing) return null;
      const updated: Grant = {
        ...existing,
        scopes: [...grant.scopes],
        status: grant.status,
        updatedAt: grant.updatedAt,
        revokedAt: grant.revokedAt,
      };
      grants.set(grant.id, updated);
      return cloneGrant(updated);
    },
    async get(id, options) {
      options?.signal?.throwIfAborted();
      const grant = grants.get(id);
      return grant ? cloneGrant(grant) : null;
    },
    async listByPet(petId, options) {
      options?.signal?.throwIfAborted();
      return Array.from(grants.values())
        .filter((g) => g.petId === petId)
        .sort(compareByCreation)
        .map(cloneGrant);
    },
    async listByGrantee(granteeId, options) {
      options?.signal?.throwIfAborted();
      return Array.from(grants.values())
        .filter((g) => g.granteeId === granteeId)
        .sort(compareByRecency)
        .map(cloneGrant);
    },
    async getActive(petId, granteeId, options) {
      options?.signal?.throwIfAborted();
      const [winner] = Array.from(grants.values())
        .filter((g) => g.petId === petId && g.granteeId === granteeId && g.status === 'active')
        .sort(compareByRecency);
      return winner ? cloneGrant(winner) : null;
    },
  };
}

/**
 * Wrap every operation so it runs under the store lock.
 */
function createLockedGrantRepository(inner: GrantRepository, mutex: Mutex): GrantRepository {
  return {
    create: (grant, options) => mutex.runExclusive(() => inner.create(grant, options)),
    update: (grant, options) => mutex.runExclusive(() => inner.update(grant, options)),
    get: (id, options) => mutex.runExclusive(() => inner.get(id, options)),
    listByPet: (petId, options) => mutex.runExclusive(() => inner.listByPet(petId, options)),
    listByGrantee: (granteeId, options) =>
      mutex.runExclusive(() => inner.listByGrantee(granteeId, options)),
    getActive: (petId, granteeId, options) =>
      mutex.runExclusive(() => inner.getActive(petId, granteeId, options)),
  };
}

/**
 * Create an in-memory repository context.
 *
 * One mutex per context serializes every operation and every transaction,
 * which covers the per-pet exclusion the engine asks for through lockKey.
 *
 * @example
 * ```typescript
 * const repos = createInMemoryRepositoryContext();
 *
 * await repos.transaction(async (tx) => {
 *   const grants = await tx.grants.listByPet('pet-1');
 *   // ...
 * }, { lockKey: 'pet-1' });
 *
 * // Access underlying data for debugging
 * console.log(repos._data.grants.size);
 * ```
 */
export function createInMemoryRepositoryContext(): InMemoryRepositoryContext {
  const grants = new Map<string, Grant>();
  const mutex = new Mutex();

  const unlocked: RepositoryContext = {
    grants: createUnlockedGrantRepository(grants),
  };

  return {
    grants: createLockedGrantRepository(unlocked.grants, mutex),
    async transaction<T>(
      fn: (repos: RepositoryContext) => Promise<T>,
      options?: { lockKey?: string; signal?: AbortSignal }
    ): Promise<T> {
      options?.signal?.throwIfAborted();
      return mutex.runExclusive(() => {
        options?.signal?.throwIfAborted();
        return fn(unlocked);
      });
    },
    _data: {
      grants,
    },
    clear() {
      grants.clear();
    },
  };
}
