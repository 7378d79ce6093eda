// @support-desk/repositories
// Statement catalog, value codec and runners for the support desk store.
//
// This package is the only place that talks to the database. Callers name a
// statement and hand over kebab-case parameters; runners return projected
// rows with canonical values and kebab-case keys.
//
// Key concepts:
// - The statement catalog defines WHAT can run; runners decide WHERE
// - Every row passes through the codec and projector before callers see it
// - Postgres and in-memory runners fulfill the same TransactionalStatementRunner

export * from './interfaces/index.js';
export * from './codec/index.js';
export * from './statements/index.js';
export * from './errors.js';
export * from './logging.js';
export * from './config.js';
export * as postgres from './postgres/index.js';
export * as memory from './in-memory/index.js';
