// Grant types - delegated access to a single pet

import type { Id, Timestamp } from './common.js';

/**
 * The closed catalog of capabilities an owner can delegate.
 */
export const GRANT_SCOPES = [
  'pet:read', // View the pet profile
  'pet:edit_profile', // Edit the pet profile
  'events:read', // View the clinical timeline
  'events:create', // Record new clinical events
  'events:void', // Void existing clinical events
  'attachments:add', // Attach files to the timeline
] as const;

/**
 * A single atomic capability held by a grant.
 */
export type GrantScope = (typeof GRANT_SCOPES)[number];

/**
 * Scopes applied when an owner invites without naming any.
 * Smallest set that lets a delegate view the shared pet.
 */
export const DEFAULT_GRANT_SCOPES: readonly GrantScope[] = ['pet:read', 'events:read'];

export const GRANT_STATUSES = ['invited', 'active', 'revoked'] as const;

/**
 * Grant status lifecycle: invited -> active -> revoked, or invited -> revoked.
 * 'revoked' is terminal.
 */
export type GrantStatus = (typeof GRANT_STATUSES)[number];

/**
 * A Grant delegates a set of scopes over one pet, from its owner to a grantee.
 * Grants are never deleted; revocation is a status change.
 */
export type Grant = {
  id: Id;

  /**
   * The pet being shared
   */
  petId: Id;

  /**
   * Who shares access (the pet owner at invite time)
   */
  ownerId: Id;

  /**
   * Who receives access. Never equal to ownerId.
   */
  granteeId: Id;

  /**
   * Delegated capabilities. Non-empty, unique, order irrelevant.
   */
  scopes: GrantScope[];

  status: GrantStatus;

  createdAt: Timestamp;

  updatedAt: Timestamp;

  /**
   * Set if and only if status is 'revoked'
   */
  revokedAt?: Timestamp;
};

/**
 * Check if a string belongs to the scope catalog.
 */
export function isValidScope(scope: string): scope is GrantScope {
  return GRANT_SCOPES.some((candidate) => candidate === scope);
}

/**
 * Check if a grant carries a scope.
 */
export function grantHasScope(grant: Pick<Grant, 'scopes'>, scope: GrantScope): boolean {
  return grant.scopes.includes(scope);
}
