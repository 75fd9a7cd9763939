// Tests for Postgres row mapping.
// Queries themselves need a database and are not exercised here.

import { describe, it, expect } from 'vitest';
import type { Grant } from '@pet-access/protocol';
import { sql, type SQL } from 'drizzle-orm';
import { PgDialect } from 'drizzle-orm/pg-core';
import { rowToGrant, grantToRow, recencyOrder, creationOrder } from './grant-repository.js';

const baseGrant: Grant = {
  id: 'grant-1',
  petId: 'pet-1',
  ownerId: 'owner-1',
  granteeId: 'grantee-1',
  scopes: ['pet:read', 'events:create'],
  status: 'active',
  createdAt: '2024-01-01T10:00:00.000Z',
  updatedAt: '2024-01-02T10:00:00.000Z',
};

describe('grantToRow', () => {
  it('should convert timestamps to dates', () => {
    const row = grantToRow(baseGrant);

    expect(row.createdAt).toEqual(new Date('2024-01-01T10:00:00.000Z'));
    expect(row.updatedAt).toEqual(new Date('2024-01-02T10:00:00.000Z'));
    expect(row.revokedAt).toBeNull();
    expect(row.scopes).toEqual(['pet:read', 'events:create']);
  });

  it('should carry revokedAt for revoked grants', () => {
    const row = grantToRow({
      ...baseGrant,
      status: 'revoked',
      revokedAt: '2024-01-03T00:00:00.000Z',
    });

    expect(row.status).toBe('revoked');
    expect(row.revokedAt).toEqual(new Date('2024-01-03T00:00:00.000Z'));
  });
});

describe('rowToGrant', () => {
  it('should convert a row back to a grant', () => {
    const grant = rowToGrant({
      id: 'grant-1',
      petId: 'pet-1',
      ownerId: 'owner-1',
      granteeId: 'grantee-1',
      scopes: ['pet:read', 'events:create'],
      status: 'active',
      createdAt: new Date('2024-01-01T10:00:00.000Z'),
      updatedAt: new Date('2024-01-02T10:00:00.000Z'),
      revokedAt: null,
    });

    expect(grant).toEqual(baseGrant);
    expect(grant.revokedAt).toBeUndefined();
  });
});

describe('grant ordering', () => {
  const dialect = new PgDialect();
  const render = (order: readonly SQL[]) =>
    dialect.sqlToQuery(sql.join([...order], sql`, `)).sql;

  it('should break recency ties on the id compared bytewise', () => {
    expect(render(recencyOrder)).toMatch(/"id" collate "C" desc$/);
  });

  it('should break creation ties on the id compared bytewise', () => {
    expect(render(creationOrder)).toMatch(/"id" collate "C" asc$/);
  });
});
