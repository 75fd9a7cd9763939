// Pet ownership lookup
//
// Supplied by the pet-management collaborator. The runtime only needs to
// know who owns a pet.

import type { Id } from '@pet-access/protocol';

export interface PetOwnerLookup {
  /**
   * The owner of a pet.
   * @returns the owner's id, or null if the pet does not exist
   */
  ownerOf(petId: Id, options?: { signal?: AbortSignal }): Promise<Id | null>;
}

/**
 * PetOwnerLookup over a fixed map, for development and tests.
 */
export function createStaticPetOwnerLookup(
  owners: Record<Id, Id> | Map<Id, Id>
): PetOwnerLookup & { set(petId: Id, ownerId: Id): void } {
  const byPet = new Map<Id, Id>(owners instanceof Map ? owners : Object.entries(owners));

  return {
    async ownerOf(petId, options) {
      options?.signal?.throwIfAborted();
      return byPet.get(petId) ?? null;
    },
    set(petId, ownerId) {
      byPet.set(petId, ownerId);
    },
  };
}
