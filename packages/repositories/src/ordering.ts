// Deterministic ordering of grants.
//
// Used wherever the store has to pick one grant among several for the same
// (pet, grantee) pair: updatedAt desc, then createdAt desc, then id desc.

import type { Grant, Timestamp } from '@pet-access/protocol';

function compareTimestampsDesc(a: Timestamp, b: Timestamp): number {
  const diff = Date.parse(b) - Date.parse(a);
  return Number.isNaN(diff) ? 0 : diff;
}

/**
 * Comparator placing the most recent grant first.
 */
export function compareByRecency(a: Grant, b: Grant): number {
  return (
    compareTimestampsDesc(a.updatedAt, b.updatedAt) ||
    compareTimestampsDesc(a.createdAt, b.createdAt) ||
    (a.id < b.id ? 1 : a.id > b.id ? -1 : 0)
  );
}

/**
 * Comparator placing the oldest grant first (id breaks ties).
 */
export function compareByCreation(a: Grant, b: Grant): number {
  return (
    -compareTimestampsDesc(a.createdAt, b.createdAt) || (a.id < b.id ? -1 : a.id > b.id ? 1 : 0)
  );
}

/**
 * The most recent grant of a list, or null for an empty list.
 */
export function pickMostRecent(grants: readonly Grant[]): Grant | null {
  return [...grants].sort(compareByRecency)[0] ?? null;
}
