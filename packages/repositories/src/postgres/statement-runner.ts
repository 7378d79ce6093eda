import { projectMany, projectOne } from '../codec/index.js';
import { bindParameters, rowSchemas, statementCatalog } from '../statements/index.js';
import { silentLogger, type Logger } from '../logging.js';
import type {
  CommandName,
  CommandParams,
  ManyQueryName,
  OneQueryName,
  QueryParams,
  QueryRow,
  StatementName,
  TransactionalStatementRunner,
  TransactionFn,
} from '../interfaces/index.js';
import type { PgClient, PgResult, PgSession } from './db.js';
import { PgTypeCatalog } from './type-catalog.js';

export type PgStatementRunnerOptions = {
  /**
   * Logger for transaction outcomes (defaults to silent)
   */
  logger?: Logger;

  /**
   * Share a type catalog between runners on the same database
   */
  typeCatalog?: PgTypeCatalog;
};

/**
 * StatementRunner backed by PostgreSQL through postgres.js.
 *
 * A runner created from the pool runs each statement on its own; the
 * runner handed to a `transaction` callback is bound to that transaction.
 */
export class PgStatementRunner implements TransactionalStatementRunner {
  private readonly logger: Logger;
  private readonly types: PgTypeCatalog;

  private constructor(
    private readonly client: PgClient,
    private readonly session: PgSession,
    readonly inTransaction: boolean,
    options: PgStatementRunnerOptions
  ) {
    this.logger = options.logger ?? silentLogger;
    this.types = options.typeCatalog ?? new PgTypeCatalog();
  }

  static create(client: PgClient, options: PgStatementRunnerOptions = {}): PgStatementRunner {
    return new PgStatementRunner(client, client, false, options);
  }

  async one<N extends OneQueryName>(
    name: N,
    params: QueryParams<N>
  ): Promise<QueryRow<N> | null> {
    const result = await this.run(name, params);
    const columns = await this.types.describe(this.session, result.columns);
    const row = projectOne(result.rows, columns);
    return row === null ? null : rowSchemas[name].parse(row);
  }

  async many<N extends ManyQueryName>(name: N, params: QueryParams<N>): Promise<QueryRow<N>[]> {
    const result = await this.run(name, params);
    const columns = await this.types.describe(this.session, result.columns);
    const schema = rowSchemas[name];
    return projectMany(result.rows, columns).map((row) => schema.parse(row));
  }

  async execute<N extends CommandName>(name: N, params: CommandParams<N>): Promise<number> {
    const result = await this.run(name, params);
    return result.count;
  }

  async transaction<T>(fn: TransactionFn<T>): Promise<T> {
    if (this.inTransaction) {
      return fn(this);
    }

    try {
      return await this.client.begin((tx) =>
        fn(
          new PgStatementRunner(this.client, tx, true, {
            logger: this.logger,
            typeCatalog: this.types,
          })
        )
      );
    } catch (error) {
      this.logger.warn('Transaction rolled back', {
        error: error instanceof Error ? error.message : String(error),
      });
      throw error;
    }
  }

  private async run(name: StatementName, params: object): Promise<PgResult> {
    const definition = statementCatalog[name];
    const values = bindParameters(name, definition.params, params);
    const result = await this.session.unsafe(definition.sql, values);
    this.logger.debug('Statement executed', { statement: name, count: result.count });
    return result;
  }
}

/**
 * Create a Postgres-backed runner.
 *
 * Usage:
 * ```ts
 * const client = createDatabase({ connectionString: process.env.DATABASE_URL });
 * const db = createPgStatementRunner(client);
 *
 * const user = await db.one('user-by-screenname', { screenname: 'alice' });
 * ```
 */
export function createPgStatementRunner(
  client: PgClient,
  options: PgStatementRunnerOptions = {}
): PgStatementRunner {
  return PgStatementRunner.create(client, options);
}
