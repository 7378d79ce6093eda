// Support issue operations
//
// Each entry point is one atomic unit. Gated operations evaluate the access
// gate inside the same transaction as the writes or reads they guard; a
// denied gate yields null and performs no writes.

import type {
  AttachmentRef,
  Id,
  IssueAccess,
  NewSupportIssue,
  SupportIssue,
  SupportIssueUpdate,
} from '@support-desk/protocol';
import { userCanAccessGroup, userCanAccessIssue } from '../access/index.js';
import { withTransaction, type OperationContext } from '../context.js';
import { distinct } from './sets.js';
import { resetIssueTags } from './tags.js';

const attachmentKey = (file: AttachmentRef): string => JSON.stringify(file);

/**
 * Fetch an issue and count the view.
 *
 * Tags and files are de-duplicated (the aggregating join repeats them once
 * per matching row of the other side) and the incremented view count is
 * merged in.
 *
 * @returns The issue, or null when it does not exist
 */
export async function supportIssue(
  ctx: OperationContext,
  input: { 'support-issue-id': Id }
): Promise<SupportIssue | null> {
  return withTransaction(ctx, async (tx) => {
    const supportIssueId = input['support-issue-id'];
    const issue = await tx.db.one('support-issue', { 'support-issue-id': supportIssueId });
    if (!issue) {
      return null;
    }

    const views = await tx.db.one('inc-issue-views', { 'support-issue-id': supportIssueId });

    return {
      ...issue,
      tags: distinct(issue.tags),
      files: distinct(issue.files, attachmentKey),
      ...views,
    };
  });
}

/**
 * Record a new issue and its tags on behalf of a group member.
 *
 * @returns The new issue's id, or null when the user is not a member of
 * the issue's group or the insert yields no row
 *
 * @example
 * ```typescript
 * const id = await createIssueWithTags(ctx, {
 *   title: 'VPN drops',
 *   summary: 'Tunnel resets hourly',
 *   detail: 'Seen on the 3rd floor only.',
 *   'group-id': 'network',
 *   'user-id': 12,
 *   tags: ['network', 'urgent'],
 * });
 * ```
 */
export async function createIssueWithTags(
  ctx: OperationContext,
  issue: NewSupportIssue
): Promise<Id | null> {
  return withTransaction(ctx, async (tx) => {
    const userId = issue['user-id'];
    const groupId = issue['group-id'];

    if (!(await userCanAccessGroup(tx.db, { 'user-id': userId, 'group-id': groupId }))) {
      tx.logger.debug('Issue creation denied', { userId, groupId });
      return null;
    }

    const { tags, ...fields } = issue;
    const created = await tx.db.one('add-issue', fields);
    if (!created) {
      return null;
    }

    const supportIssueId = created['support-issue-id'];
    await resetIssueTags(tx, { 'user-id': userId, 'support-issue-id': supportIssueId, tags });

    tx.logger.info('Support issue created', { supportIssueId, groupId, userId });
    return supportIssueId;
  });
}

/**
 * Update an issue's fields and replace its tags.
 *
 * The gate is evaluated against the group the issue is being saved to.
 *
 * @returns Number of issue rows updated, or null when access is denied
 */
export async function updateIssueWithTags(
  ctx: OperationContext,
  issue: SupportIssueUpdate
): Promise<number | null> {
  return withTransaction(ctx, async (tx) => {
    const userId = issue['user-id'];
    const groupId = issue['group-id'];
    const supportIssueId = issue['support-issue-id'];

    if (!(await userCanAccessGroup(tx.db, { 'user-id': userId, 'group-id': groupId }))) {
      tx.logger.debug('Issue update denied', { userId, groupId, supportIssueId });
      return null;
    }

    const { tags, ...fields } = issue;
    await resetIssueTags(tx, { 'user-id': userId, 'support-issue-id': supportIssueId, tags });
    const updated = await tx.db.execute('update-issue', fields);

    tx.logger.info('Support issue updated', { supportIssueId, updated });
    return updated;
  });
}

/**
 * Delete an issue with its files and tag associations, dependents first.
 *
 * @returns Number of issue rows deleted
 */
export async function deleteIssue(
  ctx: OperationContext,
  input: { 'support-issue-id': Id }
): Promise<number> {
  return withTransaction(ctx, async (tx) => {
    const params = { 'support-issue-id': input['support-issue-id'] };

    const files = await tx.db.execute('delete-issue-files', params);
    const tags = await tx.db.execute('dissoc-tags-from-issue', params);
    const deleted = await tx.db.execute('delete-issue', params);

    tx.logger.info('Support issue deleted', {
      supportIssueId: params['support-issue-id'],
      deleted,
      files,
      tags,
    });
    return deleted;
  });
}

/**
 * Run `query` only when the user belongs to the issue's group, in the same
 * transaction as the check.
 *
 * @returns The query's result, or null when access is denied
 */
export async function runQueryIfUserCanAccessIssue<T>(
  ctx: OperationContext,
  access: IssueAccess,
  query: (tx: OperationContext) => Promise<T>
): Promise<T | null> {
  return withTransaction(ctx, async (tx) => {
    if (!(await userCanAccessIssue(tx.db, access))) {
      tx.logger.debug('Issue access denied', {
        userId: access['user-id'],
        supportIssueId: access['support-issue-id'],
      });
      return null;
    }
    return query(tx);
  });
}
