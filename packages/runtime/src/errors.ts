// Runtime error types

import type { GrantStatus } from '@pet-access/protocol';

/**
 * Error codes surfaced by the runtime.
 *
 * INVALID_INPUT - malformed, missing or disallowed caller data
 * FORBIDDEN     - caller lacks rights over this specific grant or pet
 * NOT_FOUND     - no such grant or pet
 * BAD_STATE     - valid request, invalid from the grant's current status
 * CANCELLED     - the caller's signal aborted before any mutation
 */
export type RuntimeErrorCode =
  | 'INVALID_INPUT'
  | 'FORBIDDEN'
  | 'NOT_FOUND'
  | 'BAD_STATE'
  | 'CANCELLED'
  | 'CONFIG_ERROR';

/**
 * Base class for all runtime errors.
 * Provides structured error information for debugging and logging.
 */
export class RuntimeError extends Error {
  readonly code: RuntimeErrorCode;

  constructor(code: RuntimeErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'RuntimeError';
    this.code = code;
  }
}

/**
 * Caller-supplied data is malformed, missing or disallowed.
 */
export class InvalidInputError extends RuntimeError {
  readonly field?: string;
  readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    options?: { field?: string; details?: Record<string, unknown> }
  ) {
    super('INVALID_INPUT', message);
    this.name = 'InvalidInputError';
    this.field = options?.field;
    this.details = options?.details;
  }
}

/**
 * The caller has no rights over the targeted grant or pet.
 */
export class ForbiddenError extends RuntimeError {
  readonly actorId: string;
  readonly attemptedAction: string;

  constructor(actorId: string, attemptedAction: string) {
    super('FORBIDDEN', `${actorId} may not ${attemptedAction}`);
    this.name = 'ForbiddenError';
    this.actorId = actorId;
    this.attemptedAction = attemptedAction;
  }
}

/**
 * Error when a referenced grant does not exist.
 */
export class GrantNotFoundError extends RuntimeError {
  readonly grantId?: string;

  constructor(grantId?: string, message = `Grant not found: ${grantId ?? '(none)'}`) {
    super('NOT_FOUND', message);
    this.name = 'GrantNotFoundError';
    this.grantId = grantId;
  }
}

/**
 * Error when a referenced pet does not exist.
 */
export class PetNotFoundError extends RuntimeError {
  readonly petId: string;

  constructor(petId: string) {
    super('NOT_FOUND', `Pet not found: ${petId}`);
    this.name = 'PetNotFoundError';
    this.petId = petId;
  }
}

/**
 * Error when an invalid state transition is attempted
 */
export class InvalidGrantStateError extends RuntimeError {
  readonly grantId: string;
  readonly currentStatus: GrantStatus;
  readonly attemptedAction: string;

  constructor(grantId: string, currentStatus: GrantStatus, attemptedAction: string) {
    super(
      'BAD_STATE',
      `Cannot ${attemptedAction} grant ${grantId}: current status is "${currentStatus}"`
    );
    this.name = 'InvalidGrantStateError';
    this.grantId = grantId;
    this.currentStatus = currentStatus;
    this.attemptedAction = attemptedAction;
  }
}

/**
 * The caller's signal aborted the operation before it changed anything.
 */
export class OperationCancelledError extends RuntimeError {
  constructor(operation: string, cause?: unknown) {
    super('CANCELLED', `${operation} was cancelled`, { cause });
    this.name = 'OperationCancelledError';
  }
}

/**
 * Error when configuration values fail validation.
 */
export class ConfigError extends RuntimeError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super('CONFIG_ERROR', `Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

/**
 * Narrow an unknown error to a RuntimeError, optionally of one code.
 */
export function isRuntimeError(error: unknown, code?: RuntimeErrorCode): error is RuntimeError {
  return error instanceof RuntimeError && (code === undefined || error.code === code);
}

/**
 * Assert that an id is a non-blank string.
 *
 * @throws InvalidInputError naming the field
 */
export function requireId(value: unknown, field: string): asserts value is string {
  if (typeof value !== 'string' || value.trim() === '') {
    throw new InvalidInputError(`${field} is required and must be a non-empty string`, {
      field,
    });
  }
}
