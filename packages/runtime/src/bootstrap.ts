// Bootstrap - wire a store, a logger and the grant operations from config.

import type { Grant, GrantScope, Id } from '@pet-access/protocol';
import {
  createInMemoryRepositoryContext,
  postgres,
  type TransactionalRepositoryContext,
} from '@pet-access/repositories';
import type { RuntimeConfig } from './config.js';
import { createConsoleLogger, type Logger } from './logging.js';
import {
  inviteGrant,
  inviteGrantForPetOwner,
  acceptGrant,
  revokeGrant,
  getActiveGrant,
  listGrantsByPet,
  listGrantsByGrantee,
  listGrantsForPetOwner,
  listSharedPets,
  type InviteGrantInput,
  type InviteGrantResult,
  type InviteGrantForPetOwnerInput,
  type ListGrantsByGranteeOptions,
  type AcceptGrantInput,
  type AcceptGrantResult,
  type RevokeGrantInput,
} from './grants/index.js';
import {
  AccessChecker,
  authorize,
  type AccessDecision,
  type PetOwnerLookup,
} from './access/index.js';

type CallOptions = { signal?: AbortSignal };

/**
 * The grant operations bound to one store and logger.
 */
export interface GrantService {
  readonly repos: TransactionalRepositoryContext;
  readonly logger: Logger;
  readonly access: AccessChecker;

  invite(input: InviteGrantInput, options?: CallOptions): Promise<InviteGrantResult>;
  /** invite() for an authenticated caller, who must own the pet */
  inviteForPetOwner(
    input: InviteGrantForPetOwnerInput,
    options?: CallOptions
  ): Promise<InviteGrantResult>;
  accept(input: AcceptGrantInput, options?: CallOptions): Promise<AcceptGrantResult>;
  revoke(input: RevokeGrantInput, options?: CallOptions): Promise<Grant>;
  getActiveGrant(petId: Id, granteeId: Id, options?: CallOptions): Promise<Grant>;
  listByPet(petId: Id, options?: CallOptions): Promise<Grant[]>;
  listByGrantee(granteeId: Id, options?: ListGrantsByGranteeOptions): Promise<Grant[]>;
  listForPetOwner(input: { petId: Id; callerId: Id }, options?: CallOptions): Promise<Grant[]>;
  listSharedPets(granteeId: Id, options?: CallOptions): Promise<Grant[]>;
  authorize(
    input: { callerId: Id; petOwnerId: Id; petId: Id; requiredScope: GrantScope },
    options?: CallOptions
  ): Promise<AccessDecision>;

  /** Release the store's resources (database connections) */
  close(): Promise<void>;
}

export type CreateGrantServiceOptions = {
  /** Who owns which pet. Required by listForPetOwner and access checks. */
  petOwners: PetOwnerLookup;

  /** Overrides the console logger built from config */
  logger?: Logger;

  /** Overrides the store built from config */
  repos?: TransactionalRepositoryContext;

  /** Clock for timestamps */
  now?: () => Date;
};

function createStore(config: RuntimeConfig): {
  repos: TransactionalRepositoryContext;
  close: () => Promise<void>;
} {
  if (config.store.driver === 'postgres') {
    const { db, close } = postgres.createDatabase(config.store);
    return { repos: postgres.createTransactionalPgRepositoryContext(db), close };
  }

  return {
    repos: createInMemoryRepositoryContext(),
    close: async () => {},
  };
}

/**
 * Create a GrantService from runtime configuration.
 *
 * @example
 * ```typescript
 * const service = createGrantService(loadConfig(), { petOwners });
 *
 * const { grant } = await service.invite({
 *   petId: 'pet-1',
 *   ownerId: 'owner-1',
 *   granteeId: 'vet-7',
 *   scopes: ['pet:read', 'events:read', 'events:create'],
 * });
 * ```
 */
export function createGrantService(
  config: RuntimeConfig,
  options: CreateGrantServiceOptions
): GrantService {
  const logger = options.logger ?? createConsoleLogger({ level: config.logging.level });
  const store = options.repos
    ? { repos: options.repos, close: async () => {} }
    : createStore(config);
  const { repos } = store;
  const { petOwners, now } = options;

  logger.debug('Grant service started', { store: config.store.driver });

  return {
    repos,
    logger,
    access: new AccessChecker(repos, petOwners),

    invite: (input, callOptions) =>
      inviteGrant(repos, input, { logger, now, signal: callOptions?.signal }),
    inviteForPetOwner: (input, callOptions) =>
      inviteGrantForPetOwner(repos, petOwners, input, {
        logger,
        now,
        signal: callOptions?.signal,
      }),
    accept: (input, callOptions) =>
      acceptGrant(repos, input, { logger, now, signal: callOptions?.signal }),
    revoke: (input, callOptions) =>
      revokeGrant(repos, input, { logger, now, signal: callOptions?.signal }),
    getActiveGrant: (petId, granteeId, callOptions) =>
      getActiveGrant(repos, petId, granteeId, callOptions),
    listByPet: (petId, callOptions) => listGrantsByPet(repos, petId, callOptions),
    listByGrantee: (granteeId, callOptions) =>
      listGrantsByGrantee(repos, granteeId, callOptions),
    listForPetOwner: (input, callOptions) =>
      listGrantsForPetOwner(repos, petOwners, input, callOptions),
    listSharedPets: (granteeId, callOptions) => listSharedPets(repos, granteeId, callOptions),
    authorize: (input, callOptions) => authorize(repos, input, callOptions),

    async close() {
      await store.close();
      logger.debug('Grant service closed');
    },
  };
}
