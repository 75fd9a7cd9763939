// @pet-access/runtime
// Grant lifecycle engine and authorization predicate

// Error types
export {
  RuntimeError,
  InvalidInputError,
  ForbiddenError,
  GrantNotFoundError,
  PetNotFoundError,
  InvalidGrantStateError,
  OperationCancelledError,
  ConfigError,
  isRuntimeError,
  requireId,
  type RuntimeErrorCode,
} from './errors.js';

// Logging
export {
  createConsoleLogger,
  silentLogger,
  createCapturingLogger,
  LOG_LEVELS,
  type Logger,
  type LogLevel,
  type LogEntry,
} from './logging.js';

// Configuration
export { loadConfig, DEFAULTS, type RuntimeConfig } from './config.js';

// Grant lifecycle
export {
  inviteGrant,
  inviteGrantForPetOwner,
  acceptGrant,
  revokeGrant,
  getActiveGrant,
  listGrantsByPet,
  listGrantsByGrantee,
  listGrantsForPetOwner,
  listSharedPets,
  revokeDuplicates,
  type GrantOperationOptions,
  type InviteGrantInput,
  type InviteGrantResult,
  type InviteGrantForPetOwnerInput,
  type ListGrantsByGranteeOptions,
  type AcceptGrantInput,
  type AcceptGrantResult,
  type RevokeGrantInput,
  type RepairOutcome,
  type RepairFailure,
} from './grants/index.js';

// Access control
export {
  AccessChecker,
  createAccessChecker,
  authorize,
  authorizeForPet,
  createStaticPetOwnerLookup,
  type AccessDecision,
  type AuthorizeInput,
  type AuthorizeForPetInput,
  type ScopesCheckResult,
  type PetOwnerLookup,
} from './access/index.js';

// Bootstrap
export {
  createGrantService,
  type GrantService,
  type CreateGrantServiceOptions,
} from './bootstrap.js';
