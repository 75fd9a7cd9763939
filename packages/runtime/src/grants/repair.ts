// Duplicate repair pass
//
// Revokes redundant non-revoked grants that share a pet with a kept grant.
// Runs after the primary transition has committed; its outcome is reported
// to the caller but never fails the primary operation.

import type { Grant, Id } from '@pet-access/protocol';
import type { TransactionalRepositoryContext } from '@pet-access/repositories';
import { GrantNotFoundError } from '../errors.js';
import type { Logger } from '../logging.js';

/**
 * A duplicate the pass could not revoke.
 * grantId is null when the pass failed before reaching any duplicate.
 */
export type RepairFailure = {
  grantId: Id | null;
  error: Error;
};

/**
 * What a repair pass did
 */
export type RepairOutcome = {
  /** Grants revoked by this pass */
  revoked: Id[];
  /** Duplicates left in place because their revocation failed */
  failures: RepairFailure[];
};

/**
 * The pass runs after the primary transition has committed and is not
 * cancellable: stopping halfway would leave duplicates behind.
 */
export type RepairContext = {
  now: () => Date;
  logger: Logger;
};

export function emptyRepairOutcome(): RepairOutcome {
  return { revoked: [], failures: [] };
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Revoke every non-revoked grant of keeper's pet that satisfies isDuplicate.
 *
 * Each revocation is its own transaction on the pet lock and re-checks, under
 * the lock, that the keeper is still live and the duplicate still open. Two
 * racing passes therefore cannot revoke each other's keeper: whichever runs
 * first wins and the other finds its keeper revoked and stops.
 */
export async function revokeDuplicates(
  repos: TransactionalRepositoryContext,
  keeper: Grant,
  isDuplicate: (grant: Grant) => boolean,
  ctx: RepairContext
): Promise<RepairOutcome> {
  const { now, logger } = ctx;
  const outcome = emptyRepairOutcome();

  let candidates: Grant[];
  try {
    candidates = (await repos.grants.listByPet(keeper.petId)).filter(
      (g) => g.id !== keeper.id && g.status !== 'revoked' && isDuplicate(g)
    );
  } catch (error) {
    const failure = { grantId: null, error: toError(error) };
    outcome.failures.push(failure);
    logger.warn('Duplicate repair could not list grants', {
      petId: keeper.petId,
      keptGrantId: keeper.id,
      error: failure.error.message,
    });
    return outcome;
  }

  for (const candidate of candidates) {
    try {
      const revoked = await repos.transaction(
        async (tx) => {
          const kept = await tx.grants.get(keeper.id);
          if (!kept || kept.status === 'revoked') return false;

          const duplicate = await tx.grants.get(candidate.id);
          if (!duplicate || duplicate.status === 'revoked') return false;

          const timestamp = now().toISOString();
          const updated = await tx.grants.update(
            { ...duplicate, status: 'revoked', updatedAt: timestamp, revokedAt: timestamp }
          );
          if (!updated) throw new GrantNotFoundError(duplicate.id);
          return true;
        },
        { lockKey: keeper.petId }
      );

      if (revoked) {
        outcome.revoked.push(candidate.id);
        logger.info('Revoked duplicate grant', {
          grantId: candidate.id,
          keptGrantId: keeper.id,
          petId: keeper.petId,
        });
      }
    } catch (error) {
      const failure = { grantId: candidate.id, error: toError(error) };
      outcome.failures.push(failure);
      logger.warn('Failed to revoke duplicate grant', {
        grantId: candidate.id,
        keptGrantId: keeper.id,
        petId: keeper.petId,
        error: failure.error.message,
      });
    }
  }

  return outcome;
}
