// Grant Lifecycle - from invitation to revocation
//
// - inviteGrant: owner invites a grantee (or re-invites, replacing scopes)
// - inviteGrantForPetOwner: same, after checking the caller owns the pet
// - acceptGrant: grantee activates an invited grant
// - revokeGrant: owner revokes an invited or active grant
// - getActiveGrant / listGrantsByPet / listGrantsByGrantee: lookups
//
// Every mutation runs in a store transaction keyed by the pet id, and the
// accept/invite paths follow up with a repair pass so at most one grant per
// (pet, grantee) stays active.

import { randomUUID } from 'node:crypto';
import type { Grant, GrantStatus, Id } from '@pet-access/protocol';
import { resolveScopes, grantHasScope, GrantStatusFilterSchema } from '@pet-access/protocol';
import { compareByRecency, type TransactionalRepositoryContext } from '@pet-access/repositories';
import {
  InvalidInputError,
  ForbiddenError,
  GrantNotFoundError,
  InvalidGrantStateError,
  OperationCancelledError,
  PetNotFoundError,
  requireId,
} from '../errors.js';
import { silentLogger, type Logger } from '../logging.js';
import type { PetOwnerLookup } from '../access/pet-owners.js';
import { revokeDuplicates, emptyRepairOutcome, type RepairOutcome } from './repair.js';

// --- Input Types ---

/**
 * Options shared by every lifecycle operation
 */
export type GrantOperationOptions = {
  /** Defaults to silentLogger */
  logger?: Logger;

  /** Clock. Defaults to the current instant. */
  now?: () => Date;

  /** Id generator for new grants. Defaults to random UUIDs. */
  generateId?: () => Id;

  /**
   * Cancellation signal, passed to every store call of the primary
   * transition. An operation aborted before it writes leaves no trace.
   * The repair pass that follows a committed transition ignores it.
   */
  signal?: AbortSignal;
};

/**
 * Input for inviting a grantee
 */
export type InviteGrantInput = {
  petId: Id;
  ownerId: Id;
  granteeId: Id;

  /**
   * Requested scopes. Empty or omitted applies DEFAULT_GRANT_SCOPES;
   * any scope outside the catalog rejects the invitation.
   */
  scopes?: readonly string[];
};

/**
 * Result of an invitation
 */
export type InviteGrantResult = {
  grant: Grant;

  /** False when an open grant for the same (pet, owner, grantee) was reused */
  created: boolean;

  /** Stale duplicates revoked (or not) while servicing the call */
  repair: RepairOutcome;
};

/**
 * Input for accepting a grant
 */
export type AcceptGrantInput = {
  grantId: Id;

  /** The caller, who must be the grant's grantee */
  granteeId: Id;
};

/**
 * Result of accepting a grant
 */
export type AcceptGrantResult = {
  grant: Grant;
  repair: RepairOutcome;
};

/**
 * Input for revoking a grant
 */
export type RevokeGrantInput = {
  grantId: Id;

  /** The caller, who must be the grant's owner */
  ownerId: Id;
};

// --- Helpers ---

type ResolvedOptions = {
  logger: Logger;
  now: () => Date;
  generateId: () => Id;
  signal?: AbortSignal;
};

function resolveOptions(options: GrantOperationOptions): ResolvedOptions {
  return {
    logger: options.logger ?? silentLogger,
    now: options.now ?? (() => new Date()),
    generateId: options.generateId ?? randomUUID,
    signal: options.signal,
  };
}

function throwIfCancelled(signal: AbortSignal | undefined, operation: string): void {
  if (signal?.aborted) {
    throw new OperationCancelledError(operation, signal.reason);
  }
}

/**
 * Run a store step, reporting aborts as OperationCancelledError.
 */
async function cancellable<T>(
  signal: AbortSignal | undefined,
  operation: string,
  step: () => Promise<T>
): Promise<T> {
  throwIfCancelled(signal, operation);
  try {
    return await step();
  } catch (error) {
    if (signal?.aborted && !(error instanceof OperationCancelledError)) {
      throw new OperationCancelledError(operation, error);
    }
    throw error;
  }
}

// --- Lifecycle Operations ---

/**
 * Invite a grantee to a pet, or refresh an open invitation.
 *
 * If the (pet, owner, grantee) triple already has non-revoked grants, the
 * most recent one is reused: its scopes are replaced and its id returned.
 * Older open duplicates are revoked afterwards on a best-effort basis.
 * A revoked grant is never reused; inviting again starts a fresh grant.
 *
 * @throws InvalidInputError for blank ids, self-invitations or unknown scopes
 */
export async function inviteGrant(
  repos: TransactionalRepositoryContext,
  input: InviteGrantInput,
  options: GrantOperationOptions = {}
): Promise<InviteGrantResult> {
  const { logger, now, generateId, signal } = resolveOptions(options);
  const { petId, ownerId, granteeId } = input;

  requireId(petId, 'petId');
  requireId(ownerId, 'ownerId');
  requireId(granteeId, 'granteeId');
  if (ownerId === granteeId) {
    throw new InvalidInputError('ownerId and granteeId must differ', { field: 'granteeId' });
  }

  const resolution = resolveScopes(input.scopes ?? []);
  if (!resolution.valid) {
    throw new InvalidInputError(
      `Invalid scopes: ${resolution.errors.map((e) => e.message).join(', ')}`,
      { field: 'scopes', details: { errors: resolution.errors } }
    );
  }
  const { scopes } = resolution;

  const { grant, created, staleCount } = await cancellable(signal, 'invite', () =>
    repos.transaction(
      async (tx) => {
        const [current, ...stale] = (await tx.grants.listByPet(petId, { signal }))
          .filter((g) => g.ownerId === ownerId && g.granteeId === granteeId && g.status !== 'revoked')
          .sort(compareByRecency);
        const timestamp = now().toISOString();

        if (current) {
          const updated = await tx.grants.update(
            { ...current, scopes, updatedAt: timestamp },
            { signal }
          );
          if (!updated) throw new GrantNotFoundError(current.id);
          return { grant: updated, created: false, staleCount: stale.length };
        }

        const stored = await tx.grants.create(
          {
            id: generateId(),
            petId,
            ownerId,
            granteeId,
            scopes,
            status: 'invited',
            createdAt: timestamp,
            updatedAt: timestamp,
          },
          { signal }
        );
        return { grant: stored, created: true, staleCount: 0 };
      },
      { lockKey: petId, signal }
    )
  );

  logger.info(created ? 'Grant invited' : 'Grant re-invited', {
    grantId: grant.id,
    petId,
    ownerId,
    granteeId,
    scopes,
    defaultedScopes: resolution.defaulted,
  });

  const repair =
    staleCount > 0
      ? await revokeDuplicates(
          repos,
          grant,
          (g) => g.ownerId === ownerId && g.granteeId === granteeId,
          { now, logger }
        )
      : emptyRepairOutcome();

  return { grant, created, repair };
}

/**
 * Input for inviting on behalf of an authenticated caller
 */
export type InviteGrantForPetOwnerInput = Omit<InviteGrantInput, 'ownerId'> & {
  /** The caller, who must own the pet */
  callerId: Id;
};

/**
 * Invite a grantee on behalf of a caller, who must own the pet.
 * The pet's owner comes from the lookup, never from the caller.
 *
 * @throws PetNotFoundError if the pet has no known owner
 * @throws ForbiddenError if the caller is not the owner
 */
export async function inviteGrantForPetOwner(
  repos: TransactionalRepositoryContext,
  petOwners: PetOwnerLookup,
  input: InviteGrantForPetOwnerInput,
  options: GrantOperationOptions = {}
): Promise<InviteGrantResult> {
  const { petId, callerId, granteeId, scopes } = input;
  requireId(petId, 'petId');
  requireId(callerId, 'callerId');

  await requirePetOwner(petOwners, petId, callerId, 'invite grantees', options.signal);
  return inviteGrant(repos, { petId, ownerId: callerId, granteeId, scopes }, options);
}

/**
 * Accept an invitation.
 *
 * Accepting an already active grant returns it unchanged. Either way, every
 * other open grant for the same (pet, grantee) pair is then revoked on a
 * best-effort basis, so the pair ends with a single active grant.
 *
 * @throws InvalidInputError for blank ids
 * @throws GrantNotFoundError if the grant does not exist
 * @throws ForbiddenError if the caller is not the grantee
 * @throws InvalidGrantStateError if the grant is revoked
 */
export async function acceptGrant(
  repos: TransactionalRepositoryContext,
  input: AcceptGrantInput,
  options: GrantOperationOptions = {}
): Promise<AcceptGrantResult> {
  const { logger, now, signal } = resolveOptions(options);
  const { grantId, granteeId } = input;

  requireId(grantId, 'grantId');
  requireId(granteeId, 'granteeId');

  const existing = await cancellable(signal, 'accept', () =>
    repos.grants.get(grantId, { signal })
  );
  if (!existing) {
    throw new GrantNotFoundError(grantId);
  }

  const { grant, activated } = await cancellable(signal, 'accept', () =>
    repos.transaction(
      async (tx) => {
        const current = await tx.grants.get(grantId, { signal });
        if (!current) throw new GrantNotFoundError(grantId);
        if (current.granteeId !== granteeId) {
          throw new ForbiddenError(granteeId, `accept grant ${grantId}`);
        }
        if (current.status === 'revoked') {
          throw new InvalidGrantStateError(grantId, current.status, 'accept');
        }
        if (current.status === 'active') {
          return { grant: current, activated: false };
        }

        const updated = await tx.grants.update(
          { ...current, status: 'active', updatedAt: now().toISOString() },
          { signal }
        );
        if (!updated) throw new GrantNotFoundError(grantId);
        return { grant: updated, activated: true };
      },
      { lockKey: existing.petId, signal }
    )
  );

  if (activated) {
    logger.info('Grant accepted', { grantId, petId: grant.petId, granteeId });
  } else {
    logger.debug('Grant already active', { grantId, petId: grant.petId, granteeId });
  }

  const repair = await revokeDuplicates(repos, grant, (g) => g.granteeId === grant.granteeId, {
    now,
    logger,
  });

  return { grant, repair };
}

/**
 * Revoke a grant. Revoking a revoked grant returns it unchanged.
 *
 * @throws InvalidInputError for blank ids
 * @throws GrantNotFoundError if the grant does not exist
 * @throws ForbiddenError if the caller is not the owner (grantees cannot revoke)
 */
export async function revokeGrant(
  repos: TransactionalRepositoryContext,
  input: RevokeGrantInput,
  options: GrantOperationOptions = {}
): Promise<Grant> {
  const { logger, now, signal } = resolveOptions(options);
  const { grantId, ownerId } = input;

  requireId(grantId, 'grantId');
  requireId(ownerId, 'ownerId');

  const existing = await cancellable(signal, 'revoke', () =>
    repos.grants.get(grantId, { signal })
  );
  if (!existing) {
    throw new GrantNotFoundError(grantId);
  }

  const { grant, revoked } = await cancellable(signal, 'revoke', () =>
    repos.transaction(
      async (tx) => {
        const current = await tx.grants.get(grantId, { signal });
        if (!current) throw new GrantNotFoundError(grantId);
        if (current.ownerId !== ownerId) {
          throw new ForbiddenError(ownerId, `revoke grant ${grantId}`);
        }
        if (current.status === 'revoked') {
          return { grant: current, revoked: false };
        }

        const timestamp = now().toISOString();
        const updated = await tx.grants.update(
          { ...current, status: 'revoked', updatedAt: timestamp, revokedAt: timestamp },
          { signal }
        );
        if (!updated) throw new GrantNotFoundError(grantId);
        return { grant: updated, revoked: true };
      },
      { lockKey: existing.petId, signal }
    )
  );

  if (revoked) {
    logger.info('Grant revoked', { grantId, petId: grant.petId, ownerId });
  }

  return grant;
}

// --- Queries ---

/**
 * The active grant for a (pet, grantee) pair.
 *
 * @throws GrantNotFoundError if the pair has no active grant
 */
export async function getActiveGrant(
  repos: TransactionalRepositoryContext,
  petId: Id,
  granteeId: Id,
  options: Pick<GrantOperationOptions, 'signal'> = {}
): Promise<Grant> {
  const { signal } = options;
  requireId(petId, 'petId');
  requireId(granteeId, 'granteeId');

  const grant = await cancellable(signal, 'getActiveGrant', () =>
    repos.grants.getActive(petId, granteeId, { signal })
  );
  if (!grant) {
    throw new GrantNotFoundError(
      undefined,
      `No active grant for pet ${petId} and grantee ${granteeId}`
    );
  }
  return grant;
}

/**
 * All grants of a pet, any status, oldest first.
 */
export async function listGrantsByPet(
  repos: TransactionalRepositoryContext,
  petId: Id,
  options: Pick<GrantOperationOptions, 'signal'> = {}
): Promise<Grant[]> {
  const { signal } = options;
  requireId(petId, 'petId');
  return cancellable(signal, 'listGrantsByPet', () => repos.grants.listByPet(petId, { signal }));
}

/**
 * Options for listing a grantee's grants
 */
export type ListGrantsByGranteeOptions = Pick<GrantOperationOptions, 'signal'> & {
  /**
   * Keep only grants in these statuses, e.g. ['invited', 'active'].
   * Empty or omitted keeps every status.
   */
  statuses?: readonly string[];
};

/**
 * All grants held by a grantee, most recently updated first.
 *
 * @throws InvalidInputError for a blank grantee or an unknown status
 */
export async function listGrantsByGrantee(
  repos: TransactionalRepositoryContext,
  granteeId: Id,
  options: ListGrantsByGranteeOptions = {}
): Promise<Grant[]> {
  const { signal } = options;
  requireId(granteeId, 'granteeId');

  const filter = GrantStatusFilterSchema.safeParse(options.statuses ?? []);
  if (!filter.success) {
    throw new InvalidInputError(
      `Invalid statuses: ${filter.error.issues.map((issue) => issue.message).join(', ')}`,
      { field: 'statuses', details: { issues: filter.error.issues } }
    );
  }
  const allowed = new Set<GrantStatus>(filter.data);

  const grants = await cancellable(signal, 'listGrantsByGrantee', () =>
    repos.grants.listByGrantee(granteeId, { signal })
  );
  return allowed.size === 0 ? grants : grants.filter((grant) => allowed.has(grant.status));
}

async function requirePetOwner(
  petOwners: PetOwnerLookup,
  petId: Id,
  callerId: Id,
  action: string,
  signal: AbortSignal | undefined
): Promise<void> {
  const ownerId = await cancellable(signal, action, () => petOwners.ownerOf(petId, { signal }));
  if (ownerId === null) {
    throw new PetNotFoundError(petId);
  }
  if (ownerId !== callerId) {
    throw new ForbiddenError(callerId, `${action} of pet ${petId}`);
  }
}

/**
 * List a pet's grants on behalf of a caller, who must own the pet.
 *
 * @throws PetNotFoundError if the pet has no known owner
 * @throws ForbiddenError if the caller is not the owner
 */
export async function listGrantsForPetOwner(
  repos: TransactionalRepositoryContext,
  petOwners: PetOwnerLookup,
  input: { petId: Id; callerId: Id },
  options: Pick<GrantOperationOptions, 'signal'> = {}
): Promise<Grant[]> {
  const { signal } = options;
  const { petId, callerId } = input;
  requireId(petId, 'petId');
  requireId(callerId, 'callerId');

  await requirePetOwner(petOwners, petId, callerId, 'list grants', signal);
  return listGrantsByPet(repos, petId, { signal });
}

/**
 * Pets shared with a grantee: one active grant carrying pet:read per pet,
 * the most recently updated when dirty data holds several.
 */
export async function listSharedPets(
  repos: TransactionalRepositoryContext,
  granteeId: Id,
  options: Pick<GrantOperationOptions, 'signal'> = {}
): Promise<Grant[]> {
  const grants = await listGrantsByGrantee(repos, granteeId, {
    signal: options.signal,
    statuses: ['active'],
  });
  const seen = new Set<Id>();
  const shared: Grant[] = [];

  for (const grant of grants) {
    if (!grantHasScope(grant, 'pet:read')) continue;
    if (seen.has(grant.petId)) continue;
    seen.add(grant.petId);
    shared.push(grant);
  }

  return shared;
}
