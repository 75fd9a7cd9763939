// Store error types

/**
 * Error when a grant id is already taken.
 */
export class GrantAlreadyExistsError extends Error {
  readonly code = 'ALREADY_EXISTS';
  readonly grantId: string;

  constructor(grantId: string) {
    super(`Grant already exists: ${grantId}`);
    this.name = 'GrantAlreadyExistsError';
    this.grantId = grantId;
  }
}
