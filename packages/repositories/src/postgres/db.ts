import postgres from 'postgres';
import type { SqlParameter } from '../codec/index.js';

export type DatabaseConfig = {
  connectionString: string;
  maxConnections?: number;
};

/**
 * Column metadata reported by the driver for a result set.
 */
export type PgColumn = {
  name: string;
  /** Type OID */
  type: number;
};

/**
 * Result of one statement, detached from the driver's row-list type.
 */
export type PgResult = {
  rows: Record<string, unknown>[];
  columns: PgColumn[];
  /** Rows returned or affected */
  count: number;
};

/**
 * Something statements can run on: the pool or an open transaction.
 */
export interface PgSession {
  unsafe(query: string, parameters?: SqlParameter[]): Promise<PgResult>;
}

/**
 * Pool-level client: sessions plus transaction scoping and shutdown.
 */
export interface PgClient extends PgSession {
  begin<T>(fn: (tx: PgSession) => Promise<T>): Promise<T>;
  end(options?: { timeout?: number }): Promise<void>;
}

type DriverResult = Iterable<Record<string, unknown>> & {
  count: number;
  columns: ReadonlyArray<{ name: string; type: number }>;
};

function toResult(result: DriverResult): PgResult {
  return {
    rows: Array.from(result),
    columns: result.columns.map((column) => ({ name: column.name, type: column.type })),
    count: result.count,
  };
}

const keepText = (raw: string): string => raw;

/**
 * Driver type overrides: JSON and temporal columns arrive as text.
 * JSON parameters are bound as already-serialized text for both json and
 * jsonb, so their serializers pass the text through.
 */
export const textTypes = {
  jsonbText: {
    to: 3802,
    from: [3802],
    serialize: keepText,
    parse: keepText,
  },
  jsonText: {
    to: 114,
    from: [114],
    serialize: keepText,
    parse: keepText,
  },
  temporalText: {
    to: 1184,
    from: [1082, 1114, 1184],
    serialize: (value: Date | string) => (value instanceof Date ? value : new Date(value)).toISOString(),
    parse: keepText,
  },
};

/**
 * Create a postgres.js pool wrapped as a PgClient.
 *
 * JSON and temporal columns are delivered as their text form so that the
 * type codec, not the driver, decides how they are materialized. Arrays
 * are still split by the driver; their elements arrive as text.
 *
 * Usage:
 * ```ts
 * const client = createDatabase({
 *   connectionString: process.env.DATABASE_URL
 * });
 * ```
 */
export function createDatabase(config: DatabaseConfig): PgClient {
  const sql = postgres(config.connectionString, {
    max: config.maxConnections ?? 10,
    types: textTypes,
  });

  return {
    unsafe: async (query, parameters = []) => toResult(await sql.unsafe(query, parameters)),
    begin: async <T>(fn: (tx: PgSession) => Promise<T>): Promise<T> => {
      // wrapped so the driver's array-unwrapping result type stays out of T
      const { value } = await sql.begin(async (tx) => ({
        value: await fn({
          unsafe: async (query, parameters = []) =>
            toResult(await tx.unsafe(query, parameters)),
        }),
      }));
      return value;
    },
    end: (options) => sql.end(options),
  };
}
