// Common types used across the protocol

/**
 * Serial identifier assigned by the store (issues, users, tags, files)
 */
export type Id = number;

/**
 * Group identifiers are text keys (directory group names in most deployments)
 */
export type GroupId = string;

/**
 * Canonical datetime value. Every temporal column is materialized as a Date.
 */
export type Timestamp = Date;
