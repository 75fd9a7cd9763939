// Common types used across the protocol

/**
 * ISO 8601 timestamp string
 */
export type Timestamp = string;

/**
 * Opaque identifier (grant ids are UUIDs; pet and user ids come from collaborators)
 */
export type Id = string;
