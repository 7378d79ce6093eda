// User types

import type { Id, GroupId, Timestamp } from './common.js';

/**
 * A User as stored, without group memberships.
 *
 * `pass` is an already-hashed secret. Hashing and verification happen
 * outside this layer.
 */
export type UserRecord = {
  'user-id': Id;
  screenname: string;
  pass: string | null;
  admin: boolean;
  'is-active': boolean;
  'last-login': Timestamp | null;
};

/**
 * A User with its derived group memberships.
 */
export type User = UserRecord & {
  'belongs-to': GroupId[];
};

/**
 * The fixed projection returned after membership reconciliation.
 * Never carries the secret.
 */
export type UserProfile = Omit<User, 'pass'>;

/**
 * Mutable user fields supplied by a caller.
 */
export type UserInfo = {
  screenname: string;
  pass: string | null;
  admin: boolean;
  'is-active': boolean;
};

/**
 * User fields plus the desired group memberships.
 *
 * `belongs-to` and `member-of` may overlap; the union is the desired set.
 * `update-password` selects the secret-updating path for existing users.
 */
export type UserWithGroups = UserInfo & {
  'belongs-to'?: GroupId[];
  'member-of'?: GroupId[];
  'update-password'?: boolean;
};
