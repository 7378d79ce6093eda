// Structured logging

/**
 * Structured logger interface.
 * Implementations can route to console, file, or external services.
 */
export type Logger = {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
};

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

/**
 * Default logger that writes to console
 */
export const consoleLogger: Logger = {
  debug(message: string, data?: Record<string, unknown>) {
    console.debug(`[DEBUG] ${message}`, data ?? '');
  },
  info(message: string, data?: Record<string, unknown>) {
    console.info(`[INFO] ${message}`, data ?? '');
  },
  warn(message: string, data?: Record<string, unknown>) {
    console.warn(`[WARN] ${message}`, data ?? '');
  },
  error(message: string, data?: Record<string, unknown>) {
    console.error(`[ERROR] ${message}`, data ?? '');
  },
};

/**
 * Silent logger for testing
 */
export const silentLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};

/**
 * Wrap a logger so entries below `level` are dropped.
 */
export function createLogger(level: LogLevel, sink: Logger = consoleLogger): Logger {
  const threshold = LEVEL_ORDER[level];
  const enabled = (entryLevel: Exclude<LogLevel, 'silent'>) =>
    LEVEL_ORDER[entryLevel] >= threshold;

  return {
    debug(message, data) {
      if (enabled('debug')) sink.debug(message, data);
    },
    info(message, data) {
      if (enabled('info')) sink.info(message, data);
    },
    warn(message, data) {
      if (enabled('warn')) sink.warn(message, data);
    },
    error(message, data) {
      if (enabled('error')) sink.error(message, data);
    },
  };
}

export type LogEntry = {
  level: Exclude<LogLevel, 'silent'>;
  message: string;
  data?: Record<string, unknown>;
};

/**
 * Logger that captures entries for assertions in tests.
 */
export function createCapturingLogger(): Logger & { entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  return {
    entries,
    debug(message, data) {
      entries.push({ level: 'debug', message, data });
    },
    info(message, data) {
      entries.push({ level: 'info', message, data });
    },
    warn(message, data) {
      entries.push({ level: 'warn', message, data });
    },
    error(message, data) {
      entries.push({ level: 'error', message, data });
    },
  };
}
