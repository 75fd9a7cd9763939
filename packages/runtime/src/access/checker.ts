// Access Checker
//
// Answers "may this caller perform an action requiring this scope on this
// pet?" for every protected resource operation:
//   1. the pet owner is always allowed (owner bypass)
//   2. otherwise the caller needs an active grant on the pet
//   3. and that grant must carry the required scope
//
// Decisions are computed fresh on every call; nothing is cached, so a
// revocation applies to the very next check. A denial never says why.

import type { Id, GrantScope } from '@pet-access/protocol';
import { grantHasScope } from '@pet-access/protocol';
import type { RepositoryContext } from '@pet-access/repositories';
import { PetNotFoundError, requireId } from '../errors.js';
import type { PetOwnerLookup } from './pet-owners.js';

// --- Types ---

export type AccessDecision = 'allow' | 'deny';

/**
 * Input for the authorization predicate
 */
export type AuthorizeInput = {
  /** The identity making the request */
  callerId: Id;

  /** The owner of the target pet, as known to the resource layer */
  petOwnerId: Id;

  petId: Id;

  /** The scope the operation requires */
  requiredScope: GrantScope;
};

/**
 * Input for checking access when the owner is not known yet
 */
export type AuthorizeForPetInput = Omit<AuthorizeInput, 'petOwnerId'>;

/**
 * Result of a scope check for multiple scopes
 */
export type ScopesCheckResult = {
  /** All scopes that are granted */
  grantedScopes: GrantScope[];

  /** All scopes that are denied */
  deniedScopes: GrantScope[];

  /** Whether all requested scopes are granted */
  allGranted: boolean;
};

// --- Predicate ---

/**
 * Decide whether a caller may act on a pet with the given scope.
 *
 * @throws InvalidInputError for blank ids, so the owner bypass always
 * compares real identities
 */
export async function authorize(
  repos: RepositoryContext,
  input: AuthorizeInput,
  options: { signal?: AbortSignal } = {}
): Promise<AccessDecision> {
  const { callerId, petOwnerId, petId, requiredScope } = input;
  requireId(callerId, 'callerId');
  requireId(petOwnerId, 'petOwnerId');
  requireId(petId, 'petId');

  if (callerId === petOwnerId) {
    return 'allow';
  }

  const grant = await repos.grants.getActive(petId, callerId, { signal: options.signal });
  if (!grant) {
    return 'deny';
  }

  return grantHasScope(grant, requiredScope) ? 'allow' : 'deny';
}

/**
 * Resolve the pet's owner, then authorize.
 *
 * @throws PetNotFoundError if the pet does not exist. This is not a denial:
 * the resource layer decides how to surface a missing pet.
 */
export async function authorizeForPet(
  repos: RepositoryContext,
  petOwners: PetOwnerLookup,
  input: AuthorizeForPetInput,
  options: { signal?: AbortSignal } = {}
): Promise<AccessDecision> {
  requireId(input.petId, 'petId');
  const petOwnerId = await petOwners.ownerOf(input.petId, { signal: options.signal });
  if (petOwnerId === null) {
    throw new PetNotFoundError(input.petId);
  }
  return authorize(repos, { ...input, petOwnerId }, options);
}

// --- Access Checker Class ---

/**
 * AccessChecker binds the predicate to a store and an ownership lookup,
 * for resource handlers that check many requests.
 *
 * @example
 * ```typescript
 * const checker = new AccessChecker(repos, petOwners);
 *
 * if (!(await checker.can(callerId, petId, 'events:create'))) {
 *   // respond with a generic "forbidden"
 * }
 * ```
 */
export class AccessChecker {
  constructor(
    private repos: RepositoryContext,
    private petOwners: PetOwnerLookup
  ) {}

  /**
   * Check a single scope. Throws PetNotFoundError for unknown pets.
   */
  async check(input: AuthorizeForPetInput, options?: { signal?: AbortSignal }): Promise<AccessDecision> {
    return authorizeForPet(this.repos, this.petOwners, input, options);
  }

  /**
   * Boolean form of check().
   */
  async can(
    callerId: Id,
    petId: Id,
    requiredScope: GrantScope,
    options?: { signal?: AbortSignal }
  ): Promise<boolean> {
    return (await this.check({ callerId, petId, requiredScope }, options)) === 'allow';
  }

  /**
   * Check multiple scopes at once.
   *
   * Returns which scopes are granted and which are denied.
   */
  async checkScopes(
    callerId: Id,
    petId: Id,
    scopes: GrantScope[],
    options?: { signal?: AbortSignal }
  ): Promise<ScopesCheckResult> {
    const grantedScopes: GrantScope[] = [];
    const deniedScopes: GrantScope[] = [];

    for (const scope of scopes) {
      if (await this.can(callerId, petId, scope, options)) {
        grantedScopes.push(scope);
      } else {
        deniedScopes.push(scope);
      }
    }

    return {
      grantedScopes,
      deniedScopes,
      allGranted: deniedScopes.length === 0,
    };
  }
}

// --- Factory Function ---

/**
 * Create an AccessChecker instance.
 */
export function createAccessChecker(
  repos: RepositoryContext,
  petOwners: PetOwnerLookup
): AccessChecker {
  return new AccessChecker(repos, petOwners);
}
