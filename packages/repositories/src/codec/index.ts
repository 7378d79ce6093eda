export {
  toKebabKey,
  transformKeys,
  transformRecordKeys,
  isPlainObject,
} from './key-names.js';
export {
  columnKindOf,
  decodeColumn,
  decodeRecord,
  encodeParameter,
  isArrayTypeName,
  type ColumnKind,
  type TemporalType,
  type SqlParameter,
} from './type-codec.js';
export {
  projectRow,
  projectOne,
  projectMany,
  type ColumnDescriptor,
  type RawRow,
  type ProjectedRow,
} from './projector.js';
