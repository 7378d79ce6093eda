// User operations

import type {
  Id,
  User,
  UserInfo,
  UserProfile,
  UserRecord,
  UserWithGroups,
} from '@support-desk/protocol';
import { withTransaction, type OperationContext } from '../context.js';
import { difference, distinct } from './sets.js';

function userInfoOf(user: UserInfo): UserInfo {
  return {
    screenname: user.screenname,
    pass: user.pass,
    admin: user.admin,
    'is-active': user['is-active'],
  };
}

/**
 * Update the user with this screenname, or insert one when none exists.
 *
 * Updating an existing user leaves its secret as stored.
 *
 * @returns The input merged with the written row
 */
export async function updateUserInfo(
  ctx: OperationContext,
  user: UserInfo
): Promise<UserInfo & Partial<UserRecord>> {
  return withTransaction(ctx, async (tx) => {
    const existing = await tx.db.one('user-by-screenname', { screenname: user.screenname });

    const written = existing
      ? await tx.db.one('update-user', {
          'user-id': existing['user-id'],
          screenname: user.screenname,
          admin: user.admin,
          'is-active': user['is-active'],
        })
      : await tx.db.one('insert-user', userInfoOf(user));

    tx.logger.info(existing ? 'User updated' : 'User inserted', {
      userId: written?.['user-id'] ?? null,
    });
    return { ...user, ...written };
  });
}

/**
 * Insert a user and add it to every group in `belongs-to`.
 *
 * @returns The stored user with its memberships, or null when the insert
 * yields no row
 */
export async function insertUserWithGroups(
  ctx: OperationContext,
  user: UserWithGroups
): Promise<User | null> {
  return withTransaction(ctx, async (tx) => {
    const inserted = await tx.db.one('insert-user', userInfoOf(user));
    if (!inserted) {
      return null;
    }

    const groups = user['belongs-to'] ?? [];
    await tx.db.execute('add-user-to-groups', { 'user-id': inserted['user-id'], groups });

    tx.logger.info('User inserted', { userId: inserted['user-id'], groups });
    return tx.db.one('user-by-screenname', { screenname: user.screenname });
  });
}

/**
 * Upsert a user and bring its group memberships to the desired set.
 *
 * The desired set is `belongs-to` followed by `member-of`, without repeats.
 * Memberships to remove and to add are both computed from the memberships
 * read before any write; a user inserted here starts with none. Empty
 * removal or addition sets issue no statement.
 *
 * An existing user keeps its secret unless `update-password` is set.
 *
 * @returns The user's final state without its secret, or null when the
 * insert yields no row
 */
export async function reconcileUserGroups(
  ctx: OperationContext,
  user: UserWithGroups
): Promise<UserProfile | null> {
  return withTransaction(ctx, async (tx) => {
    const screenname = user.screenname;
    const desired = distinct([...(user['belongs-to'] ?? []), ...(user['member-of'] ?? [])]);

    const existing = await tx.db.one('user-by-screenname', { screenname });
    let userId: Id;
    if (existing) {
      userId = existing['user-id'];
    } else {
      const inserted = await tx.db.one('insert-user', userInfoOf(user));
      if (!inserted) {
        return null;
      }
      userId = inserted['user-id'];
    }

    const previous = existing?.['belongs-to'] ?? [];
    const groupsToRemove = difference(previous, desired);
    const groupsToAdd = difference(desired, previous);

    if (existing) {
      if (user['update-password']) {
        await tx.db.one('update-user-with-pass', { ...userInfoOf(user), 'user-id': userId });
      } else {
        await tx.db.one('update-user', {
          'user-id': userId,
          screenname,
          admin: user.admin,
          'is-active': user['is-active'],
        });
      }
    }

    if (groupsToRemove.length > 0) {
      await tx.db.execute('remove-user-from-groups', { 'user-id': userId, groups: groupsToRemove });
    }
    if (groupsToAdd.length > 0) {
      await tx.db.execute('add-user-to-groups', { 'user-id': userId, groups: groupsToAdd });
    }

    tx.logger.info('User groups reconciled', {
      userId,
      added: groupsToAdd,
      removed: groupsToRemove,
    });

    const final = await tx.db.one('user-by-screenname', { screenname });
    if (!final) {
      return null;
    }
    return {
      'user-id': final['user-id'],
      screenname: final.screenname,
      admin: final.admin,
      'is-active': final['is-active'],
      'last-login': final['last-login'],
      'belongs-to': final['belongs-to'],
    };
  });
}
