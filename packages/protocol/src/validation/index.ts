export {
  GrantScopeSchema,
  GrantStatusSchema,
  GrantStatusFilterSchema,
  RequestedScopesSchema,
  normalizeScopes,
  resolveScopes,
  type ScopeResolution,
  type ScopeValidationError,
  type ScopeValidationErrorCode,
} from './grants.js';
