// Statement contract shared by every runner implementation

export type {
  QuerySignatures,
  CommandSignatures,
  QueryName,
  CommandName,
  StatementName,
  OneQueryName,
  ManyQueryName,
  QueryParams,
  QueryRow,
  CommandParams,
  StatementParams,
} from './statements.js';

export type {
  StatementRunner,
  TransactionalStatementRunner,
  TransactionFn,
} from './statement-runner.js';
