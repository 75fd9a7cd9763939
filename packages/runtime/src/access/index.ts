// Access Control module
// Owner bypass or active grant with the required scope.

export {
  // Main class
  AccessChecker,
  createAccessChecker,
  // Predicate
  authorize,
  authorizeForPet,
  // Types
  type AccessDecision,
  type AuthorizeInput,
  type AuthorizeForPetInput,
  type ScopesCheckResult,
} from './checker.js';

export { createStaticPetOwnerLookup, type PetOwnerLookup } from './pet-owners.js';
