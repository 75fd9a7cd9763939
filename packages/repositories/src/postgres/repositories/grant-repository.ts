import { and, asc, desc, eq, sql } from 'drizzle-orm';
import type { Database } from '../db.js';
import { accessGrants } from '../schema/index.js';
import type { GrantRepository, StoreCallOptions } from '../../interfaces/index.js';
import { GrantAlreadyExistsError } from '../../errors.js';
import type { Grant, Id } from '@pet-access/protocol';

type GrantRow = typeof accessGrants.$inferSelect;
type NewGrantRow = typeof accessGrants.$inferInsert;

export function rowToGrant(row: GrantRow): Grant {
  return {
    id: row.id,
    petId: row.petId,
    ownerId: row.ownerId,
    granteeId: row.granteeId,
    scopes: row.scopes,
    status: row.status,
    createdAt: row.createdAt.toISOString(),
    updatedAt: row.updatedAt.toISOString(),
    revokedAt: row.revokedAt?.toISOString(),
  };
}

export function grantToRow(grant: Grant): NewGrantRow {
  return {
    id: grant.id,
    petId: grant.petId,
    ownerId: grant.ownerId,
    granteeId: grant.granteeId,
    scopes: grant.scopes,
    status: grant.status,
    createdAt: new Date(grant.createdAt),
    updatedAt: new Date(grant.updatedAt),
    revokedAt: grant.revokedAt ? new Date(grant.revokedAt) : null,
  };
}

// Ids compare bytewise, as compareByRecency and compareByCreation do in
// the in-memory store, whatever the database's default collation.
const idBytewise = sql`${accessGrants.id} collate "C"`;

/** Same order as compareByRecency */
export const recencyOrder = [
  desc(accessGrants.updatedAt),
  desc(accessGrants.createdAt),
  desc(idBytewise),
] as const;

/** Same order as compareByCreation */
export const creationOrder = [asc(accessGrants.createdAt), asc(idBytewise)] as const;

export class PgGrantRepository implements GrantRepository {
  constructor(private db: Database) {}

  async create(grant: Grant, options?: StoreCallOptions): Promise<Grant> {
    options?.signal?.throwIfAborted();

    const [row] = await this.db
      .insert(accessGrants)
      .values(grantToRow(grant))
      .onConflictDoNothing({ target: accessGrants.id })
      .returning();

    if (!row) {
      throw new GrantAlreadyExistsError(grant.id);
    }
    return rowToGrant(row);
  }

  async update(grant: Grant, options?: StoreCallOptions): Promise<Grant | null> {
    options?.signal?.throwIfAborted();

    const { scopes, status, updatedAt, revokedAt } = grantToRow(grant);
    const [row] = await this.db
      .update(accessGrants)
      .set({ scopes, status, updatedAt, revokedAt })
      .where(eq(accessGrants.id, grant.id))
      .returning();

    return row ? rowToGrant(row) : null;
  }

  async get(id: Id, options?: StoreCallOptions): Promise<Grant | null> {
    options?.signal?.throwIfAborted();

    const [row] = await this.db.select().from(accessGrants).where(eq(accessGrants.id, id));
    return row ? rowToGrant(row) : null;
  }

  async listByPet(petId: Id, options?: StoreCallOptions): Promise<Grant[]> {
    options?.signal?.throwIfAborted();

    const rows = await this.db
      .select()
      .from(accessGrants)
      .where(eq(accessGrants.petId, petId))
      .orderBy(...creationOrder);
    return rows.map(rowToGrant);
  }

  async listByGrantee(granteeId: Id, options?: StoreCallOptions): Promise<Grant[]> {
    options?.signal?.throwIfAborted();

    const rows = await this.db
      .select()
      .from(accessGrants)
      .where(eq(accessGrants.granteeId, granteeId))
      .orderBy(...recencyOrder);
    return rows.map(rowToGrant);
  }

  async getActive(petId: Id, granteeId: Id, options?: StoreCallOptions): Promise<Grant | null> {
    options?.signal?.throwIfAborted();

    const [row] = await this.db
      .select()
      .from(accessGrants)
      .where(
        and(
          eq(accessGrants.petId, petId),
          eq(accessGrants.granteeId, granteeId),
          eq(accessGrants.status, 'active')
        )
      )
      .orderBy(...recencyOrder)
      .limit(1);
    return row ? rowToGrant(row) : null;
  }
}
