import type { Id, Grant } from '@pet-access/protocol';

/**
 * Options accepted by every store call.
 */
export type StoreCallOptions = {
  /**
   * Cancellation signal. A call that observes an aborted signal
   * before writing leaves the store untouched.
   */
  signal?: AbortSignal;
};

/**
 * Repository interface for Grant storage.
 *
 * The store owns grant records; callers hold no long-lived references and
 * work through calls keyed by grant id, pet id or grantee id. Records are
 * never deleted: revocation is an update.
 *
 * Every implementation must order multiple active grants for the same
 * (pet, grantee) pair with compareByRecency, so getActive picks the same
 * winner regardless of the backend.
 */
export interface GrantRepository {
  /**
   * Store a new Grant.
   * @throws GrantAlreadyExistsError if a grant with the same id exists
   */
  create(grant: Grant, options?: StoreCallOptions): Promise<Grant>;

  /**
   * Replace the mutable fields (scopes, status, timestamps) of a stored Grant.
   * @returns the stored Grant, or null if no grant has that id
   */
  update(grant: Grant, options?: StoreCallOptions): Promise<Grant | null>;

  /**
   * Get a Grant by ID
   * @returns Grant or null if not found
   */
  get(id: Id, options?: StoreCallOptions): Promise<Grant | null>;

  /**
   * All grants for a pet, any status, oldest first.
   */
  listByPet(petId: Id, options?: StoreCallOptions): Promise<Grant[]>;

  /**
   * All grants held by a grantee, any status, most recently updated first.
   */
  listByGrantee(granteeId: Id, options?: StoreCallOptions): Promise<Grant[]>;

  /**
   * The active grant for a (pet, grantee) pair.
   * If dirty data holds several, returns the first under compareByRecency.
   * @returns Grant or null if the pair has no active grant
   */
  getActive(petId: Id, granteeId: Id, options?: StoreCallOptions): Promise<Grant | null>;
}
