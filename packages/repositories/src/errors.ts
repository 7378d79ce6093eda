// Repository error types

/**
 * Base class for errors raised by this package.
 * Store failures (constraint violations, connection loss) are not wrapped:
 * they reach the caller as the driver raised them.
 */
export class RepositoryError extends Error {
  readonly code: string;

  constructor(code: string, message: string) {
    super(message);
    this.name = 'RepositoryError';
    this.code = code;
  }
}

/**
 * A statement was run without one of its declared parameters.
 */
export class MissingParameterError extends RepositoryError {
  readonly statement: string;
  readonly parameter: string;

  constructor(statement: string, parameter: string) {
    super(
      'MISSING_PARAMETER',
      `Statement "${statement}" requires parameter "${parameter}"`
    );
    this.name = 'MissingParameterError';
    this.statement = statement;
    this.parameter = parameter;
  }
}

/**
 * A JSON or JSONB column held a payload that does not parse.
 */
export class JsonColumnError extends RepositoryError {
  readonly payload: string;
  readonly cause?: Error;

  constructor(payload: string, cause?: Error) {
    super('JSON_COLUMN_ERROR', `Malformed JSON column value: ${cause?.message ?? 'parse failed'}`);
    this.name = 'JsonColumnError';
    this.payload = payload;
    this.cause = cause;
  }
}

/**
 * Environment configuration is missing or invalid.
 */
export class ConfigurationError extends RepositoryError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super('CONFIGURATION_ERROR', `Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}
