// ResultProjector: the single path from raw driver rows to caller rows.

import { decodeColumn, type ColumnKind } from './type-codec.js';
import { transformRecordKeys } from './key-names.js';

export type ColumnDescriptor = {
  name: string;
  kind: ColumnKind;
};

export type RawRow = Record<string, unknown>;

export type ProjectedRow = Record<string, unknown>;

/**
 * Decode every described column, then rewrite keys to kebab-case.
 * Columns without a descriptor pass through undecoded.
 */
export function projectRow(
  row: RawRow,
  columns: readonly ColumnDescriptor[]
): ProjectedRow {
  const decoded: RawRow = { ...row };
  for (const column of columns) {
    if (Object.hasOwn(row, column.name)) {
      decoded[column.name] = decodeColumn(column.kind, row[column.name]);
    }
  }
  return transformRecordKeys(decoded);
}

/**
 * Projection for statements that return at most one row.
 */
export function projectOne(
  rows: readonly RawRow[],
  columns: readonly ColumnDescriptor[]
): ProjectedRow | null {
  const [first] = rows;
  return first === undefined ? null : projectRow(first, columns);
}

/**
 * Projection for statements that return a row-set.
 */
export function projectMany(
  rows: readonly RawRow[],
  columns: readonly ColumnDescriptor[]
): ProjectedRow[] {
  return rows.map((row) => projectRow(row, columns));
}
