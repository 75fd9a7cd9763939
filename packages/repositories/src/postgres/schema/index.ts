// Re-export all schema tables
export * from './grants.js';
