import type {
  CommandName,
  CommandParams,
  ManyQueryName,
  OneQueryName,
  QueryParams,
  QueryRow,
} from './statements.js';

/**
 * StatementRunner executes named statements.
 *
 * This is the only way the rest of the system reaches the store. Every row
 * it returns has been projected: column values decoded to canonical types
 * and keys rewritten to kebab-case. Implementations (Postgres, in-memory)
 * differ only in where the rows come from.
 */
export interface StatementRunner {
  /**
   * Run a statement that yields at most one row.
   * @returns The projected row, or null when the statement yields none
   */
  one<N extends OneQueryName>(name: N, params: QueryParams<N>): Promise<QueryRow<N> | null>;

  /**
   * Run a statement that yields a row-set.
   */
  many<N extends ManyQueryName>(name: N, params: QueryParams<N>): Promise<QueryRow<N>[]>;

  /**
   * Run a statement for its effect.
   * @returns Number of affected rows
   */
  execute<N extends CommandName>(name: N, params: CommandParams<N>): Promise<number>;
}

/**
 * Function run inside a transaction with a transaction-scoped runner.
 */
export type TransactionFn<T> = (tx: TransactionalStatementRunner) => Promise<T>;

/**
 * StatementRunner with transaction support.
 */
export interface TransactionalStatementRunner extends StatementRunner {
  /**
   * Execute a function within a database transaction.
   *
   * Commits when `fn` resolves; rolls back and rethrows when it rejects.
   * Calling `transaction` on a runner that is already transaction-scoped
   * joins the open transaction instead of starting another, so composed
   * operations stay one atomic unit.
   */
  transaction<T>(fn: TransactionFn<T>): Promise<T>;

  /**
   * True when this runner is bound to an open transaction.
   */
  readonly inTransaction: boolean;
}
