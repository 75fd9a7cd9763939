import { pgTable, text, timestamp, index } from 'drizzle-orm/pg-core';
import { sql } from 'drizzle-orm';
import type { GrantScope, GrantStatus } from '@pet-access/protocol';

/**
 * Access grants table - delegated access to one pet.
 *
 * Rows are never deleted; revocation sets status and revoked_at.
 */
export const accessGrants = pgTable(
  'access_grants',
  {
    id: text('id').primaryKey(),
    petId: text('pet_id').notNull(),
    ownerId: text('owner_id').notNull(),
    granteeId: text('grantee_id').notNull(),
    scopes: text('scopes').array().$type<GrantScope[]>().notNull(),
    status: text('status', { enum: ['invited', 'active', 'revoked'] })
      .notNull()
      .default('invited')
      .$type<GrantStatus>(),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull(),
    revokedAt: timestamp('revoked_at', { withTimezone: true }),
  },
  (table) => [
    index('access_grants_pet_idx').on(table.petId),
    index('access_grants_grantee_idx').on(table.granteeId),
    index('access_grants_owner_idx').on(table.ownerId),
    // Fast lookup for the active grant of a (pet, grantee) pair
    index('access_grants_active_lookup_idx')
      .on(table.petId, table.granteeId, table.updatedAt.desc())
      .where(sql`${table.status} = 'active'`),
  ]
);
