// Postgres implementation
export {
  createDatabase,
  type DatabaseConfig,
  type PgClient,
  type PgSession,
  type PgResult,
  type PgColumn,
} from './db.js';
export { PgTypeCatalog } from './type-catalog.js';
export {
  PgStatementRunner,
  createPgStatementRunner,
  type PgStatementRunnerOptions,
} from './statement-runner.js';
