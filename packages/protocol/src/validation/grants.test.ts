// Tests for grant scope resolution

import { describe, it, expect } from 'vitest';
import { normalizeScopes, resolveScopes, GrantScopeSchema } from './grants.js';
import { isValidScope, grantHasScope, GRANT_SCOPES } from '../types/grants.js';

describe('isValidScope', () => {
  it('should accept every catalog scope', () => {
    for (const scope of GRANT_SCOPES) {
      expect(isValidScope(scope)).toBe(true);
    }
  });

  it('should reject unknown and near-miss scopes', () => {
    expect(isValidScope('events:unknown')).toBe(false);
    expect(isValidScope('PET:READ')).toBe(false);
    expect(isValidScope(' pet:read')).toBe(false);
    expect(isValidScope('')).toBe(false);
  });
});

describe('grantHasScope', () => {
  it('should check membership', () => {
    const grant = { scopes: ['events:read' as const] };
    expect(grantHasScope(grant, 'events:read')).toBe(true);
    expect(grantHasScope(grant, 'events:create')).toBe(false);
  });
});

describe('normalizeScopes', () => {
  it('should trim, drop blanks and dedupe in first-seen order', () => {
    expect(normalizeScopes([' events:read', 'pet:read', '', 'events:read ', '  '])).toEqual([
      'events:read',
      'pet:read',
    ]);
  });
});

describe('resolveScopes', () => {
  it('should apply the default set for an empty list', () => {
    const result = resolveScopes([]);
    expect(result).toEqual({ valid: true, scopes: ['pet:read', 'events:read'], defaulted: true });
  });

  it('should apply the default set when scopes are omitted', () => {
    const result = resolveScopes(undefined);
    expect(result).toEqual({ valid: true, scopes: ['pet:read', 'events:read'], defaulted: true });
  });

  it('should apply the default set when every entry is blank', () => {
    const result = resolveScopes(['', '   ']);
    expect(result.valid).toBe(true);
    if (result.valid) {
      expect(result.defaulted).toBe(true);
    }
  });

  it('should keep a valid list as given, deduplicated', () => {
    const result = resolveScopes(['events:create', 'events:read', 'events:create']);
    expect(result).toEqual({
      valid: true,
      scopes: ['events:create', 'events:read'],
      defaulted: false,
    });
  });

  it('should reject the whole list when one scope is unknown', () => {
    const result = resolveScopes(['events:read', 'events:unknown']);
    expect(result).toEqual({
      valid: false,
      errors: [
        {
          path: 'scopes.1',
          message: 'Unknown scope "events:unknown"',
          code: 'UNKNOWN_SCOPE',
        },
      ],
    });
  });

  it('should reject non-array input', () => {
    const result = resolveScopes('pet:read');
    expect(result.valid).toBe(false);
    if (!result.valid) {
      expect(result.errors).toHaveLength(1);
      expect(result.errors[0].code).toBe('INVALID_TYPE');
      expect(result.errors[0].path).toBe('scopes');
    }
  });

  it('should reject non-string entries', () => {
    const result = resolveScopes(['pet:read', 7]);
    expect(result.valid).toBe(false);
    if (!result.valid) {
      expect(result.errors[0].path).toBe('scopes.1');
    }
  });
});

describe('GrantScopeSchema', () => {
  it('should parse catalog scopes', () => {
    expect(GrantScopeSchema.parse('attachments:add')).toBe('attachments:add');
    expect(GrantScopeSchema.safeParse('attachments:remove').success).toBe(false);
  });
});
