// In-memory statement runner for development and testing
//
// Answers every catalog statement from Maps instead of PostgreSQL. Rows come
// back in the same raw shape the driver produces (snake_case columns,
// aggregated arrays with NULL holes, composite values as record text) and go
// through the same projector and row schemas as the Postgres runner.
//
// Data does not persist between restarts.

import { projectMany, projectOne } from '../codec/index.js';
import type {
  CommandName,
  CommandParams,
  ManyQueryName,
  OneQueryName,
  QueryName,
  QueryParams,
  QueryRow,
  StatementName,
  TransactionFn,
  TransactionalStatementRunner,
} from '../interfaces/index.js';
import { rowSchemas } from '../statements/index.js';
import { columnKinds, commandHandlers, queryHandlers, type HandlerContext } from './statements.js';
import { createEmptyStore, type InMemoryDataStore } from './store.js';

export {
  InMemoryConstraintError,
  type InMemoryDataStore,
  type StoredFile,
  type StoredGroup,
  type StoredIssue,
  type StoredIssueTag,
  type StoredMembership,
  type StoredTag,
  type StoredUser,
} from './store.js';

export type InMemoryStatementRunnerOptions = {
  /** Clock used for create/update/view timestamps */
  now?: () => Date;
};

/**
 * Extended runner with access to underlying data and clear function.
 */
export interface InMemoryStatementContext extends TransactionalStatementRunner {
  /** Direct access to underlying data stores (for debugging/testing) */
  _data: InMemoryDataStore;
  /** Names of executed statements, in order (for debugging/testing) */
  _statements: StatementName[];
  /** Clear all data and the statement log */
  clear(): void;
}

type SharedState = {
  handlers: HandlerContext;
  statements: StatementName[];
  // tail of the transaction queue
  queue: Promise<void>;
};

class InMemoryStatementRunner implements TransactionalStatementRunner {
  constructor(
    private readonly state: SharedState,
    readonly inTransaction: boolean
  ) {}

  async one<N extends OneQueryName>(name: N, params: QueryParams<N>): Promise<QueryRow<N> | null> {
    const rows = this.query(name, params);
    const row = projectOne(rows, columnKinds[name] ?? []);
    return row === null ? null : rowSchemas[name].parse(row);
  }

  async many<N extends ManyQueryName>(name: N, params: QueryParams<N>): Promise<QueryRow<N>[]> {
    const rows = this.query(name, params);
    return projectMany(rows, columnKinds[name] ?? []).map((row) => rowSchemas[name].parse(row));
  }

  async execute<N extends CommandName>(name: N, params: CommandParams<N>): Promise<number> {
    this.state.statements.push(name);
    const handler = commandHandlers[name];
    return handler(params, this.state.handlers);
  }

  async transaction<T>(fn: TransactionFn<T>): Promise<T> {
    if (this.inTransaction) {
      return fn(this);
    }

    const previous = this.state.queue;
    let release = () => {};
    this.state.queue = new Promise<void>((resolve) => {
      release = resolve;
    });
    await previous;

    const data = this.state.handlers.data;
    const snapshot = structuredClone(data);
    try {
      return await fn(new InMemoryStatementRunner(this.state, true));
    } catch (error) {
      Object.assign(data, snapshot);
      throw error;
    } finally {
      release();
    }
  }

  private query<N extends QueryName>(name: N, params: QueryParams<N>) {
    this.state.statements.push(name);
    const handler = queryHandlers[name];
    return handler(params, this.state.handlers);
  }
}

/**
 * Create an in-memory statement runner.
 *
 * All data is stored in memory and will not persist between restarts.
 * Transactions run one at a time; a failed transaction restores the data
 * as it was when the transaction began.
 *
 * @example
 * ```ts
 * const db = createInMemoryStatementRunner();
 * await db.one('insert-user', { screenname: 'dana', pass: null, admin: false, 'is-active': true });
 * console.log(db._data.users.size);
 * db.clear();
 * ```
 */
export function createInMemoryStatementRunner(
  options: InMemoryStatementRunnerOptions = {}
): InMemoryStatementContext {
  const data = createEmptyStore();
  const state: SharedState = {
    handlers: { data, now: options.now ?? (() => new Date()) },
    statements: [],
    queue: Promise.resolve(),
  };
  const runner = new InMemoryStatementRunner(state, false);

  return Object.assign(runner, {
    _data: data,
    _statements: state.statements,
    clear() {
      Object.assign(data, createEmptyStore());
      state.statements.length = 0;
    },
  });
}
