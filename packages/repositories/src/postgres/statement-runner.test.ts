// Tests for the Postgres statement runner against a fake postgres.js client

import { describe, it, expect, beforeEach } from 'vitest';
import { ZodError } from 'zod';
import type { SqlParameter } from '../codec/index.js';
import { MissingParameterError } from '../errors.js';
import { createCapturingLogger } from '../logging.js';
import { statementCatalog } from '../statements/index.js';
import type { PgClient, PgColumn, PgResult, PgSession } from './db.js';
import { createPgStatementRunner } from './statement-runner.js';

// --- Fake client ---

const CITEXT_OID = 16385;
const CITEXT_ARRAY_OID = 16390;

type Call = {
  session: 'pool' | 'tx';
  query: string;
  parameters: SqlParameter[] | undefined;
};

type Responder = (query: string, parameters: SqlParameter[] | undefined) => PgResult;

const emptyResult: PgResult = { rows: [], columns: [], count: 0 };

function result(rows: Record<string, unknown>[], columns: PgColumn[]): PgResult {
  return { rows, columns, count: rows.length };
}

function createFakeClient(respond: Responder) {
  const calls: Call[] = [];
  let transactions = 0;

  const session = (label: Call['session']): PgSession => ({
    async unsafe(query, parameters) {
      calls.push({ session: label, query, parameters });
      if (query.includes('pg_catalog.pg_type')) {
        return result(
          [
            { oid: CITEXT_OID, typname: 'citext' },
            { oid: CITEXT_ARRAY_OID, typname: '_citext' },
          ],
          [
            { name: 'oid', type: 23 },
            { name: 'typname', type: 25 },
          ]
        );
      }
      return respond(query, parameters);
    },
  });

  const pool = session('pool');
  const client: PgClient = {
    unsafe: (query, parameters) => pool.unsafe(query, parameters),
    async begin<T>(fn: (tx: PgSession) => Promise<T>): Promise<T> {
      transactions += 1;
      return fn(session('tx'));
    },
    async end() {},
  };

  return {
    client,
    calls,
    statementCalls: () => calls.filter((call) => !call.query.includes('pg_catalog.pg_type')),
    typeLookups: () => calls.filter((call) => call.query.includes('pg_catalog.pg_type')).length,
    transactions: () => transactions,
  };
}

// --- Fixtures ---

const userColumns: PgColumn[] = [
  { name: 'user_id', type: 23 },
  { name: 'screenname', type: CITEXT_OID },
  { name: 'pass', type: 25 },
  { name: 'admin', type: 16 },
  { name: 'is_active', type: 16 },
  { name: 'last_login', type: 1184 },
  { name: 'belongs_to', type: 1009 },
];

const issueColumns: PgColumn[] = [
  { name: 'support_issue_id', type: 23 },
  { name: 'title', type: 25 },
  { name: 'summary', type: 25 },
  { name: 'detail', type: 25 },
  { name: 'group_id', type: 25 },
  { name: 'group_name', type: 25 },
  { name: 'created_by', type: 23 },
  { name: 'created_by_screenname', type: CITEXT_OID },
  { name: 'last_updated_by', type: 23 },
  { name: 'create_date', type: 1184 },
  { name: 'update_date', type: 1184 },
  { name: 'last_viewed', type: 1184 },
  { name: 'views', type: 23 },
  { name: 'tags', type: CITEXT_ARRAY_OID },
  { name: 'files', type: 2287 },
];

const issueRow = {
  support_issue_id: 3,
  title: 'VPN drops',
  summary: 'Tunnel resets',
  detail: 'Hourly',
  group_id: 'network',
  group_name: 'Network',
  created_by: 1,
  created_by_screenname: 'dana',
  last_updated_by: 1,
  create_date: '2024-02-03 04:05:06+00',
  update_date: null,
  last_viewed: null,
  views: 0,
  tags: ['network', 'urgent'],
  files: ['(9,trace.log)', '(9,trace.log)'],
};

describe('PgStatementRunner', () => {
  let logger: ReturnType<typeof createCapturingLogger>;

  beforeEach(() => {
    logger = createCapturingLogger();
  });

  describe('one', () => {
    it('runs the catalog SQL with bound parameters and projects the row', async () => {
      const fake = createFakeClient(() =>
        result(
          [
            {
              user_id: 1,
              screenname: 'dana',
              pass: null,
              admin: false,
              is_active: true,
              last_login: '2024-01-05 09:30:00+00',
              belongs_to: ['network', 'printers'],
            },
          ],
          userColumns
        )
      );
      const db = createPgStatementRunner(fake.client, { logger });

      const user = await db.one('user-by-screenname', { screenname: 'dana' });

      expect(user).toEqual({
        'user-id': 1,
        screenname: 'dana',
        pass: null,
        admin: false,
        'is-active': true,
        'last-login': new Date('2024-01-05T09:30:00.000Z'),
        'belongs-to': ['network', 'printers'],
      });
      expect(fake.statementCalls()).toEqual([
        {
          session: 'pool',
          query: statementCatalog['user-by-screenname'].sql,
          parameters: ['dana'],
        },
      ]);
    });

    it('decodes extension, array and record columns of an issue', async () => {
      const fake = createFakeClient(() => result([issueRow], issueColumns));
      const db = createPgStatementRunner(fake.client, { logger });

      const issue = await db.one('support-issue', { 'support-issue-id': 3 });

      expect(issue).toEqual({
        'support-issue-id': 3,
        title: 'VPN drops',
        summary: 'Tunnel resets',
        detail: 'Hourly',
        'group-id': 'network',
        'group-name': 'Network',
        'created-by': 1,
        'created-by-screenname': 'dana',
        'last-updated-by': 1,
        'create-date': new Date('2024-02-03T04:05:06.000Z'),
        'update-date': null,
        'last-viewed': null,
        views: 0,
        tags: ['network', 'urgent'],
        files: [
          ['9', 'trace.log'],
          ['9', 'trace.log'],
        ],
      });
    });

    it('looks up extension type names once per catalog', async () => {
      const fake = createFakeClient(() => result([issueRow], issueColumns));
      const db = createPgStatementRunner(fake.client, { logger });

      await db.one('support-issue', { 'support-issue-id': 3 });
      await db.one('support-issue', { 'support-issue-id': 3 });

      expect(fake.typeLookups()).toBe(1);
    });

    it('returns null when the statement yields no row', async () => {
      const fake = createFakeClient(() => result([], userColumns));
      const db = createPgStatementRunner(fake.client, { logger });

      await expect(db.one('user-by-screenname', { screenname: 'nobody' })).resolves.toBeNull();
    });

    it('rejects rows that do not match the statement row schema', async () => {
      const fake = createFakeClient(() =>
        result([{ group_id: 42 }], [{ name: 'group_id', type: 23 }])
      );
      const db = createPgStatementRunner(fake.client, { logger });

      await expect(db.one('issue-group', { 'support-issue-id': 3 })).rejects.toBeInstanceOf(
        ZodError
      );
    });

    it('throws MissingParameterError without running anything', async () => {
      const fake = createFakeClient(() => emptyResult);
      const db = createPgStatementRunner(fake.client, { logger });

      const params = { screenname: 'dana', pass: null, admin: false, 'is-active': true };
      Reflect.deleteProperty(params, 'pass');

      await expect(db.one('insert-user', params)).rejects.toBeInstanceOf(MissingParameterError);
      expect(fake.calls).toEqual([]);
    });
  });

  describe('many', () => {
    it('projects every row', async () => {
      const fake = createFakeClient(() =>
        result(
          [
            { tag_id: 1, tag: 'network', create_date: '2024-01-01 00:00:00+00' },
            { tag_id: 2, tag: 'urgent', create_date: '2024-01-02 00:00:00+00' },
          ],
          [
            { name: 'tag_id', type: 23 },
            { name: 'tag', type: CITEXT_OID },
            { name: 'create_date', type: 1184 },
          ]
        )
      );
      const db = createPgStatementRunner(fake.client, { logger });

      const tags = await db.many('tags', {});

      expect(tags).toEqual([
        { 'tag-id': 1, tag: 'network', 'create-date': new Date('2024-01-01T00:00:00.000Z') },
        { 'tag-id': 2, tag: 'urgent', 'create-date': new Date('2024-01-02T00:00:00.000Z') },
      ]);
      expect(fake.statementCalls()[0]?.parameters).toEqual([]);
    });
  });

  describe('execute', () => {
    it('returns the affected row count and binds arrays natively', async () => {
      const fake = createFakeClient(() => ({ rows: [], columns: [], count: 2 }));
      const db = createPgStatementRunner(fake.client, { logger });

      const count = await db.execute('add-user-to-groups', {
        'user-id': 4,
        groups: ['network', 'printers'],
      });

      expect(count).toBe(2);
      expect(fake.statementCalls()[0]?.parameters).toEqual([4, ['network', 'printers']]);
      expect(logger.entries).toEqual([
        {
          level: 'debug',
          message: 'Statement executed',
          data: { statement: 'add-user-to-groups', count: 2 },
        },
      ]);
    });
  });

  describe('transaction', () => {
    it('runs statements on the transaction session', async () => {
      const fake = createFakeClient(() => ({ rows: [], columns: [], count: 1 }));
      const db = createPgStatementRunner(fake.client, { logger });

      const count = await db.transaction(async (tx) => {
        expect(tx.inTransaction).toBe(true);
        return tx.execute('delete-issue', { 'support-issue-id': 3 });
      });

      expect(count).toBe(1);
      expect(db.inTransaction).toBe(false);
      expect(fake.transactions()).toBe(1);
      expect(fake.statementCalls().map((call) => call.session)).toEqual(['tx']);
    });

    it('joins the open transaction when nested', async () => {
      const fake = createFakeClient(() => ({ rows: [], columns: [], count: 1 }));
      const db = createPgStatementRunner(fake.client, { logger });

      await db.transaction(async (tx) => {
        await tx.execute('delete-issue-files', { 'support-issue-id': 3 });
        await tx.transaction(async (inner) => {
          expect(inner).toBe(tx);
          await inner.execute('delete-issue', { 'support-issue-id': 3 });
        });
      });

      expect(fake.transactions()).toBe(1);
      expect(fake.statementCalls().map((call) => call.session)).toEqual(['tx', 'tx']);
    });

    it('logs the rollback and rethrows the original error', async () => {
      const failure = new Error('duplicate key value violates unique constraint "users_screenname_key"');
      const fake = createFakeClient(() => {
        throw failure;
      });
      const db = createPgStatementRunner(fake.client, { logger });

      await expect(
        db.transaction((tx) =>
          tx.one('insert-user', { screenname: 'dana', pass: null, admin: false, 'is-active': true })
        )
      ).rejects.toBe(failure);

      expect(logger.entries).toEqual([
        {
          level: 'warn',
          message: 'Transaction rolled back',
          data: { error: failure.message },
        },
      ]);
    });
  });
});
