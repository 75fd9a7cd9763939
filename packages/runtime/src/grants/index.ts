// Grant lifecycle module
// Invite / accept / revoke state machine and grant lookups.

export {
  inviteGrant,
  inviteGrantForPetOwner,
  acceptGrant,
  revokeGrant,
  getActiveGrant,
  listGrantsByPet,
  listGrantsByGrantee,
  listGrantsForPetOwner,
  listSharedPets,
  type GrantOperationOptions,
  type InviteGrantInput,
  type InviteGrantResult,
  type InviteGrantForPetOwnerInput,
  type ListGrantsByGranteeOptions,
  type AcceptGrantInput,
  type AcceptGrantResult,
  type RevokeGrantInput,
} from './lifecycle.js';

export {
  revokeDuplicates,
  type RepairOutcome,
  type RepairFailure,
} from './repair.js';
