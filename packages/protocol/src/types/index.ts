// Re-export all protocol types

export * from './common.js';
export * from './grants.js';
