// Tests for the access gate

import { describe, it, expect, beforeEach } from 'vitest';
import { memory } from '@support-desk/repositories';
import { userCanAccessGroup, userCanAccessIssue } from './gate.js';

const NOW = new Date('2024-06-01T12:00:00.000Z');

describe('access gate', () => {
  let db: memory.InMemoryStatementContext;

  beforeEach(async () => {
    db = memory.createInMemoryStatementRunner({ now: () => NOW });
    db._data.groups.set('network', { group_id: 'network', group_name: 'Network', create_date: NOW });
    db._data.groups.set('printers', { group_id: 'printers', group_name: 'Printers', create_date: NOW });

    // dana (1) is in network, eli (2) is in printers
    await db.one('insert-user', { screenname: 'dana', pass: null, admin: false, 'is-active': true });
    await db.one('insert-user', { screenname: 'eli', pass: null, admin: false, 'is-active': true });
    await db.execute('add-user-to-groups', { 'user-id': 1, groups: ['network'] });
    await db.execute('add-user-to-groups', { 'user-id': 2, groups: ['printers'] });

    await db.one('add-issue', {
      title: 'VPN drops',
      summary: 'Tunnel resets',
      detail: 'Hourly',
      'group-id': 'network',
      'user-id': 1,
    });
  });

  describe('userCanAccessGroup', () => {
    it('allows members', async () => {
      await expect(userCanAccessGroup(db, { 'user-id': 1, 'group-id': 'network' })).resolves.toBe(true);
    });

    it('denies non-members', async () => {
      await expect(userCanAccessGroup(db, { 'user-id': 2, 'group-id': 'network' })).resolves.toBe(false);
    });

    it('denies users without memberships', async () => {
      await expect(userCanAccessGroup(db, { 'user-id': 99, 'group-id': 'network' })).resolves.toBe(false);
    });
  });

  describe('userCanAccessIssue', () => {
    it('allows members of the owning group', async () => {
      await expect(userCanAccessIssue(db, { 'user-id': 1, 'support-issue-id': 1 })).resolves.toBe(true);
    });

    it('denies members of other groups', async () => {
      await expect(userCanAccessIssue(db, { 'user-id': 2, 'support-issue-id': 1 })).resolves.toBe(false);
    });

    it('denies access to issues that do not exist', async () => {
      db._statements.length = 0;

      await expect(userCanAccessIssue(db, { 'user-id': 1, 'support-issue-id': 42 })).resolves.toBe(false);
      expect(db._statements).toEqual(['issue-group']);
    });

    it('follows a membership change made in the same transaction', async () => {
      const allowed = await db.transaction(async (tx) => {
        await tx.execute('add-user-to-groups', { 'user-id': 2, groups: ['network'] });
        return userCanAccessIssue(tx, { 'user-id': 2, 'support-issue-id': 1 });
      });

      expect(allowed).toBe(true);
    });
  });
});
