// Grant Validation Utilities
//
// Resolves caller-supplied scope lists against the scope catalog.
// Resolution is all-or-nothing: one unknown scope rejects the whole list.

import { z } from 'zod';
import {
  DEFAULT_GRANT_SCOPES,
  GRANT_SCOPES,
  GRANT_STATUSES,
  type GrantScope,
} from '../types/grants.js';

export const GrantScopeSchema = z.enum(GRANT_SCOPES);

export const GrantStatusSchema = z.enum(GRANT_STATUSES);

/**
 * A status filter as it arrives from a caller: entries are trimmed and
 * blanks dropped; anything left must be a known status.
 */
export const GrantStatusFilterSchema = z
  .array(z.string().trim())
  .transform((statuses) => statuses.filter((status) => status !== ''))
  .pipe(z.array(GrantStatusSchema));

/**
 * A scope list as it arrives from a caller, before normalization.
 */
export const RequestedScopesSchema = z.array(z.string()).default([]);

/**
 * A validation error with context
 */
export type ScopeValidationError = {
  path: string;
  message: string;
  code: ScopeValidationErrorCode;
};

export type ScopeValidationErrorCode = 'INVALID_TYPE' | 'UNKNOWN_SCOPE';

/**
 * Result of resolving a requested scope list
 */
export type ScopeResolution =
  | {
      valid: true;
      scopes: GrantScope[];
      /** True when the request was empty and the default set was applied */
      defaulted: boolean;
    }
  | {
      valid: false;
      errors: ScopeValidationError[];
    };

/**
 * Trim entries, drop blanks and remove duplicates, keeping first-seen order.
 */
export function normalizeScopes(input: readonly string[]): string[] {
  const seen = new Set<string>();
  const out: string[] = [];

  for (const raw of input) {
    const scope = raw.trim();
    if (scope === '' || seen.has(scope)) continue;
    seen.add(scope);
    out.push(scope);
  }

  return out;
}

/**
 * Resolve a requested scope list into the set a grant will hold.
 *
 * An empty (or all-blank) request resolves to DEFAULT_GRANT_SCOPES.
 * Any scope outside the catalog fails the resolution.
 */
export function resolveScopes(input: unknown): ScopeResolution {
  const parsed = RequestedScopesSchema.safeParse(input);
  if (!parsed.success) {
    return {
      valid: false,
      errors: parsed.error.issues.map((issue) => ({
        path: ['scopes', ...issue.path].join('.'),
        message: issue.message,
        code: 'INVALID_TYPE' as const,
      })),
    };
  }

  const normalized = normalizeScopes(parsed.data);
  if (normalized.length === 0) {
    return { valid: true, scopes: [...DEFAULT_GRANT_SCOPES], defaulted: true };
  }

  const scopes: GrantScope[] = [];
  const errors: ScopeValidationError[] = [];

  normalized.forEach((candidate, index) => {
    const result = GrantScopeSchema.safeParse(candidate);
    if (result.success) {
      scopes.push(result.data);
    } else {
      errors.push({
        path: `scopes.${index}`,
        message: `Unknown scope "${candidate}"`,
        code: 'UNKNOWN_SCOPE',
      });
    }
  });

  if (errors.length > 0) {
    return { valid: false, errors };
  }

  return { valid: true, scopes, defaulted: false };
}
