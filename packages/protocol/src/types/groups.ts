// Group types

import type { GroupId, Timestamp } from './common.js';

/**
 * A Group owns support issues. Users reach issues through group membership.
 */
export type Group = {
  'group-id': GroupId;
  'group-name': string;
  'create-date': Timestamp;
};
