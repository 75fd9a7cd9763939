// @pet-access/protocol
// Data model and scope catalog for delegated pet access.

export * from './types/index.js';
export * from './validation/index.js';
