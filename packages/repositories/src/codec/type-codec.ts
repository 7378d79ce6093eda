// TypeCodec: column values from PostgreSQL into canonical values, and
// parameter values from callers into values the driver can bind.

import { JsonColumnError } from '../errors.js';

export type TemporalType = 'date' | 'timestamp' | 'timestamptz';

/**
 * Recognized column kinds. Anything else is `passthrough`.
 */
export type ColumnKind =
  | { kind: 'temporal'; type: TemporalType }
  | { kind: 'record' }
  | { kind: 'json' }
  | { kind: 'citext' }
  | { kind: 'array'; element: ColumnKind }
  | { kind: 'passthrough' };

/**
 * A value the driver knows how to bind.
 */
export type SqlParameter =
  | null
  | boolean
  | number
  | string
  | Date
  | Uint8Array
  | SqlParameter[];

/**
 * PostgreSQL names array types after their element type with a leading
 * underscore: `_text` is `text[]`, `_record` is `record[]`.
 */
export function isArrayTypeName(typeName: string): boolean {
  return typeName.startsWith('_');
}

/**
 * Map a PostgreSQL type name to the kind of decoding its values need.
 */
export function columnKindOf(typeName: string): ColumnKind {
  if (isArrayTypeName(typeName)) {
    return { kind: 'array', element: columnKindOf(typeName.slice(1)) };
  }
  switch (typeName) {
    case 'date':
    case 'timestamp':
    case 'timestamptz':
      return { kind: 'temporal', type: typeName };
    case 'record':
      return { kind: 'record' };
    case 'json':
    case 'jsonb':
      return { kind: 'json' };
    case 'citext':
      return { kind: 'citext' };
    default:
      return { kind: 'passthrough' };
  }
}

// --- Inbound ---

// Largest instant a JavaScript Date can hold
const MAX_EPOCH_MS = 8.64e15;

const OFFSET_WITH_SECONDS = /([+-])(\d{2}):(\d{2}):(\d{2})$/;

function temporalTextToEpoch(type: TemporalType, text: string): number {
  const trimmed = text.trim();
  if (trimmed === 'infinity') {
    return MAX_EPOCH_MS;
  }
  if (trimmed === '-infinity') {
    return -MAX_EPOCH_MS;
  }
  if (type === 'date') {
    return Date.parse(`${trimmed}T00:00:00Z`);
  }
  const iso = trimmed.replace(' ', 'T').replace(/(\.\d{3})\d+/, '$1');
  if (type === 'timestamp') {
    return Date.parse(`${iso}Z`);
  }
  // Historical zones such as LMT carry offsets down to the second
  const seconds = OFFSET_WITH_SECONDS.exec(iso);
  if (seconds) {
    const [, sign, hours, minutes, secs] = seconds;
    const offsetMs = (Number(hours) * 3600 + Number(minutes) * 60 + Number(secs)) * 1000;
    const local = Date.parse(`${iso.slice(0, seconds.index)}Z`);
    return sign === '-' ? local + offsetMs : local - offsetMs;
  }
  return Date.parse(iso.replace(/([+-]\d{2})$/, '$1:00'));
}

function decodeTemporal(type: TemporalType, value: unknown): unknown {
  if (value instanceof Date) {
    return new Date(value.getTime());
  }
  if (typeof value === 'number') {
    return new Date(value);
  }
  if (typeof value === 'string') {
    return new Date(temporalTextToEpoch(type, value));
  }
  return value;
}

/**
 * Split a record literal such as `(12,report.pdf)` into its fields.
 * Anything that is not a parenthesized literal yields `null`.
 */
export function decodeRecord(value: unknown): string[] | null {
  if (typeof value !== 'string' || value.length < 2) {
    return null;
  }
  if (!value.startsWith('(') || !value.endsWith(')')) {
    return null;
  }
  const fields = value.slice(1, -1);
  return fields === '' ? [] : fields.split(',');
}

function decodeJson(value: unknown): unknown {
  if (typeof value !== 'string') {
    // already materialized by the driver
    return value;
  }
  try {
    const parsed: unknown = JSON.parse(value);
    return parsed;
  } catch (error) {
    throw new JsonColumnError(value, error instanceof Error ? error : undefined);
  }
}

function decodeArray(element: ColumnKind, value: unknown): unknown {
  if (!Array.isArray(value)) {
    return value;
  }
  return value
    .map((item: unknown) => decodeColumn(element, item))
    .filter((item) => item !== null && item !== undefined);
}

/**
 * Convert one column value read from the store into its canonical form.
 *
 * Never throws for recognized kinds, except for a JSON payload that does
 * not parse (`JsonColumnError`). Absent values stay `null`.
 */
export function decodeColumn(kind: ColumnKind, value: unknown): unknown {
  if (value === null || value === undefined) {
    return null;
  }
  switch (kind.kind) {
    case 'temporal':
      return decodeTemporal(kind.type, value);
    case 'record':
      return decodeRecord(value);
    case 'json':
      return decodeJson(value);
    case 'citext':
      return String(value);
    case 'array':
      return decodeArray(kind.element, value);
    case 'passthrough':
      return value;
  }
}

// --- Outbound ---

/**
 * Convert a caller's value into a bindable parameter for a placeholder
 * declared as `declaredType`.
 *
 * Sequences bind as native arrays only when the declared type is an array
 * type; otherwise they bind as JSON text, as mappings always do. Statements
 * cast JSON placeholders with `::jsonb`.
 */
export function encodeParameter(value: unknown, declaredType: string): SqlParameter {
  if (value === null || value === undefined) {
    return null;
  }
  if (value instanceof Date) {
    return new Date(value.getTime());
  }
  if (Array.isArray(value)) {
    if (isArrayTypeName(declaredType)) {
      const elementType = declaredType.slice(1);
      return value.map((item: unknown) => encodeParameter(item, elementType));
    }
    return JSON.stringify(value);
  }
  if (value instanceof Uint8Array) {
    return value;
  }
  switch (typeof value) {
    case 'string':
    case 'number':
    case 'boolean':
      return value;
    case 'bigint':
      return value.toString();
    default:
      break;
  }
  if (typeof value === 'object') {
    return JSON.stringify(value);
  }
  return String(value);
}
