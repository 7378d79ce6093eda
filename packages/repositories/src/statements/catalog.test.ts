// Tests for the statement catalog

import { describe, it, expect } from 'vitest';
import { statementCatalog } from './catalog.js';
import { rowSchemas } from './rows.js';

function placeholderNumbers(sql: string): number[] {
  const numbers = new Set<number>();
  for (const match of sql.matchAll(/\$(\d+)/g)) {
    numbers.add(Number(match[1]));
  }
  return [...numbers].sort((a, b) => a - b);
}

describe('statementCatalog', () => {
  it('declares one parameter per placeholder for every statement', () => {
    for (const [name, definition] of Object.entries(statementCatalog)) {
      const expected = definition.params.map((_, index) => index + 1);
      expect({ name, placeholders: placeholderNumbers(definition.sql) }).toEqual({
        name,
        placeholders: expected,
      });
    }
  });

  it('declares list parameters with array types', () => {
    expect(statementCatalog['assoc-tags-with-issue'].params).toEqual([
      { name: 'support-issue-id', type: 'int4' },
      { name: 'tags', type: '_citext' },
    ]);
    expect(statementCatalog['add-user-to-groups'].params[1]).toEqual({
      name: 'groups',
      type: '_text',
    });
    expect(statementCatalog['remove-user-from-groups'].params[1]).toEqual({
      name: 'groups',
      type: '_text',
    });
  });

  it('binds the recording user as both creator and last updater', () => {
    expect(statementCatalog['add-issue'].sql).toContain('values ($1, $2, $3, $4, $5, $5)');
  });

  it('has a row schema for every query', () => {
    const queries = Object.keys(rowSchemas).sort();
    expect(queries).toEqual([
      'add-issue',
      'create-tag',
      'groups-for-user',
      'inc-issue-views',
      'insert-user',
      'issue-group',
      'support-issue',
      'tags',
      'update-user',
      'update-user-with-pass',
      'user-by-screenname',
    ]);
    for (const query of queries) {
      expect(Object.hasOwn(statementCatalog, query)).toBe(true);
    }
  });
});
