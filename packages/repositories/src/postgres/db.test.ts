// Tests for the driver type overrides

import { describe, it, expect } from 'vitest';
import { encodeParameter } from '../codec/index.js';
import { textTypes } from './db.js';

const JSON_OID = 114;
const JSONB_OID = 3802;

describe('textTypes', () => {
  it('reads json and jsonb columns as text', () => {
    const from = Object.values(textTypes).flatMap((type) => type.from);
    expect(from).toContain(JSON_OID);
    expect(from).toContain(JSONB_OID);
    expect(textTypes.jsonText.parse('{"a":1}')).toBe('{"a":1}');
    expect(textTypes.jsonbText.parse('{"a":1}')).toBe('{"a":1}');
  });

  it('binds json and jsonb parameters as the text they were given', () => {
    const bound = encodeParameter({ 'user-id': 1, groups: ['A'] }, 'json');
    expect(bound).toBe('{"user-id":1,"groups":["A"]}');
    if (typeof bound !== 'string') {
      throw new Error('expected JSON text');
    }

    expect(textTypes.jsonText.to).toBe(JSON_OID);
    expect(textTypes.jsonText.serialize(bound)).toBe('{"user-id":1,"groups":["A"]}');
    expect(textTypes.jsonbText.to).toBe(JSONB_OID);
    expect(textTypes.jsonbText.serialize('["A","B"]')).toBe('["A","B"]');
  });

  it('reads temporal columns as text and binds dates as ISO text', () => {
    expect(textTypes.temporalText.from).toEqual([1082, 1114, 1184]);
    expect(textTypes.temporalText.parse('2024-03-01 10:15:30+00')).toBe('2024-03-01 10:15:30+00');
    expect(textTypes.temporalText.serialize(new Date('2024-03-01T10:15:30.000Z'))).toBe(
      '2024-03-01T10:15:30.000Z',
    );
  });
});
