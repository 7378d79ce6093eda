import { z } from 'zod';
import { columnKindOf, type ColumnDescriptor } from '../codec/index.js';
import type { PgColumn, PgSession } from './db.js';

// Built-in type OIDs are fixed across PostgreSQL installations.
const BUILTIN_TYPE_NAMES: ReadonlyArray<readonly [number, string]> = [
  [16, 'bool'],
  [17, 'bytea'],
  [20, 'int8'],
  [21, 'int2'],
  [23, 'int4'],
  [25, 'text'],
  [114, 'json'],
  [199, '_json'],
  [700, 'float4'],
  [701, 'float8'],
  [1000, '_bool'],
  [1007, '_int4'],
  [1009, '_text'],
  [1016, '_int8'],
  [1043, 'varchar'],
  [1082, 'date'],
  [1114, 'timestamp'],
  [1115, '_timestamp'],
  [1182, '_date'],
  [1184, 'timestamptz'],
  [1185, '_timestamptz'],
  [1700, 'numeric'],
  [2249, 'record'],
  [2287, '_record'],
  [2950, 'uuid'],
  [3802, 'jsonb'],
  [3807, '_jsonb'],
];

const UNKNOWN_TYPE = 'unknown';

const pgTypeRow = z.object({
  oid: z.number(),
  typname: z.string(),
});

/**
 * Resolves the type OIDs the driver reports for result columns to
 * PostgreSQL type names.
 *
 * Extension types such as `citext` get a different OID per database, so
 * OIDs outside the built-in set are looked up in `pg_catalog.pg_type` once
 * and cached for the life of the catalog.
 */
export class PgTypeCatalog {
  private names = new Map<number, string>(BUILTIN_TYPE_NAMES);

  async resolve(session: PgSession, oids: readonly number[]): Promise<Map<number, string>> {
    const missing = [...new Set(oids)].filter((oid) => !this.names.has(oid));

    if (missing.length > 0) {
      const result = await session.unsafe(
        'select oid::int4 as oid, typname::text as typname from pg_catalog.pg_type where oid = any($1::int4[])',
        [missing]
      );
      for (const row of result.rows) {
        const { oid, typname } = pgTypeRow.parse(row);
        this.names.set(oid, typname);
      }
      for (const oid of missing) {
        if (!this.names.has(oid)) {
          this.names.set(oid, UNKNOWN_TYPE);
        }
      }
    }

    return new Map(oids.map((oid) => [oid, this.names.get(oid) ?? UNKNOWN_TYPE]));
  }

  /**
   * Describe result columns for the projector.
   */
  async describe(session: PgSession, columns: readonly PgColumn[]): Promise<ColumnDescriptor[]> {
    const names = await this.resolve(
      session,
      columns.map((column) => column.type)
    );
    return columns.map((column) => ({
      name: column.name,
      kind: columnKindOf(names.get(column.type) ?? UNKNOWN_TYPE),
    }));
  }
}
