// Access gate
//
// Membership-based authorization predicates. Both are read-only and take
// the transaction-scoped runner of the operation they guard, so the check
// and the guarded reads or writes see the same snapshot.

import type { GroupId, Id, IssueAccess } from '@support-desk/protocol';
import type { StatementRunner } from '@support-desk/repositories';

export type GroupAccessInput = {
  'user-id': Id;
  'group-id': GroupId;
};

/**
 * True iff the user's group memberships include the group.
 */
export async function userCanAccessGroup(
  tx: StatementRunner,
  input: GroupAccessInput
): Promise<boolean> {
  const groups = await tx.many('groups-for-user', { 'user-id': input['user-id'] });
  return groups.some((group) => group['group-id'] === input['group-id']);
}

/**
 * True iff the user belongs to the group that owns the issue.
 * An issue that does not exist is not accessible.
 */
export async function userCanAccessIssue(
  tx: StatementRunner,
  input: IssueAccess
): Promise<boolean> {
  const owner = await tx.one('issue-group', { 'support-issue-id': input['support-issue-id'] });
  if (!owner) {
    return false;
  }
  return userCanAccessGroup(tx, { 'user-id': input['user-id'], 'group-id': owner['group-id'] });
}
