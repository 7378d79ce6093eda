// Re-export all protocol types

export * from './common.js';
export * from './issues.js';
export * from './tags.js';
export * from './groups.js';
export * from './users.js';
