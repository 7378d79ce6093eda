// @support-desk/protocol
// Domain types shared by the repositories and runtime packages.
//
// Every shape here uses the application key convention: lower-case words
// joined by hyphens. Rows read from the store are rewritten into this form
// before any caller sees them.

export * from './types/index.js';
