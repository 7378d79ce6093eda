// Operation context
//
// Every operation receives its collaborators explicitly. Inside a
// transaction the context's `db` is the transaction-scoped runner, and
// nested operations are handed that same context so they join the open
// transaction.

import {
  consoleLogger,
  createLogger,
  postgres,
  type Logger,
  type SupportDeskConfig,
  type TransactionalStatementRunner,
} from '@support-desk/repositories';

export type OperationContext = {
  /** Statement runner; transaction-scoped inside `withTransaction` */
  db: TransactionalStatementRunner;

  /** Logger for gate decisions and completed writes */
  logger: Logger;
};

/**
 * Create an operation context around a runner.
 */
export function createOperationContext(
  db: TransactionalStatementRunner,
  options: { logger?: Logger } = {}
): OperationContext {
  return {
    db,
    logger: options.logger ?? consoleLogger,
  };
}

/**
 * Run `fn` in one transaction, opening it or joining the one already open.
 */
export function withTransaction<T>(
  ctx: OperationContext,
  fn: (tx: OperationContext) => Promise<T>
): Promise<T> {
  return ctx.db.transaction((db) => fn({ ...ctx, db }));
}

/**
 * A context wired to a PostgreSQL pool.
 */
export type SupportDesk = OperationContext & {
  /** End the connection pool */
  close(): Promise<void>;
};

/**
 * Wire configuration into a ready-to-use context.
 *
 * @example
 * ```typescript
 * const desk = createSupportDesk(loadConfig());
 * const issue = await supportIssue(desk, { 'support-issue-id': 42 });
 * await desk.close();
 * ```
 */
export function createSupportDesk(
  config: SupportDeskConfig,
  options: { sink?: Logger } = {}
): SupportDesk {
  const logger = createLogger(config.logLevel, options.sink ?? consoleLogger);
  const client = postgres.createDatabase({
    connectionString: config.databaseUrl,
    maxConnections: config.maxConnections,
  });
  const db = postgres.createPgStatementRunner(client, { logger });

  return {
    db,
    logger,
    close: () => client.end(),
  };
}
