// Tests for runtime errors

import { describe, it, expect } from 'vitest';
import {
  RuntimeError,
  ForbiddenError,
  GrantNotFoundError,
  InvalidGrantStateError,
  OperationCancelledError,
  isRuntimeError,
} from './errors.js';

describe('runtime errors', () => {
  it('should carry a code and a name', () => {
    const error = new InvalidGrantStateError('grant-1', 'revoked', 'accept');

    expect(error).toBeInstanceOf(RuntimeError);
    expect(error.name).toBe('InvalidGrantStateError');
    expect(error.code).toBe('BAD_STATE');
    expect(error.message).toBe('Cannot accept grant grant-1: current status is "revoked"');
  });

  it('should describe a missing grant', () => {
    expect(new GrantNotFoundError('grant-9').message).toBe('Grant not found: grant-9');
    expect(new GrantNotFoundError(undefined, 'No active grant').message).toBe('No active grant');
  });

  it('should keep the cause of a cancellation', () => {
    const cause = new Error('aborted');
    const error = new OperationCancelledError('accept', cause);

    expect(error.message).toBe('accept was cancelled');
    expect(error.cause).toBe(cause);
  });

  describe('isRuntimeError', () => {
    it('should narrow by code', () => {
      const error: unknown = new ForbiddenError('vet-1', 'revoke grant grant-1');

      expect(isRuntimeError(error)).toBe(true);
      expect(isRuntimeError(error, 'FORBIDDEN')).toBe(true);
      expect(isRuntimeError(error, 'NOT_FOUND')).toBe(false);
    });

    it('should reject plain errors', () => {
      expect(isRuntimeError(new Error('nope'))).toBe(false);
      expect(isRuntimeError('FORBIDDEN')).toBe(false);
    });
  });
});
