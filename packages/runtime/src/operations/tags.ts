// Tag operations

import type { Id } from '@support-desk/protocol';
import { withTransaction, type OperationContext } from '../context.js';
import { difference, distinct } from './sets.js';

export type IssueTagsInput = {
  'user-id': Id;
  'support-issue-id': Id;
  tags: string[];
};

/**
 * Insert every desired label that is not yet a known tag.
 *
 * Exactly `desired − known` is inserted, once per label; nothing is
 * inserted when every label is known.
 *
 * @returns The labels that were inserted
 */
export async function createMissingTags(
  ctx: OperationContext,
  tags: readonly string[]
): Promise<string[]> {
  return withTransaction(ctx, async (tx) => {
    const known = (await tx.db.many('tags', {})).map((row) => row.tag);
    const missing = difference(distinct(tags), known);

    const inserted: string[] = [];
    for (const tag of missing) {
      const row = await tx.db.one('create-tag', { tag });
      // null when another writer created the same label first
      if (row) {
        inserted.push(row.tag);
      }
    }
    return inserted;
  });
}

/**
 * Replace an issue's tag associations with exactly the given labels,
 * creating labels that do not exist yet.
 *
 * Dissociation and re-association happen in the caller's transaction, so
 * no reader observes the issue without tags.
 */
export async function resetIssueTags(ctx: OperationContext, input: IssueTagsInput): Promise<void> {
  await withTransaction(ctx, async (tx) => {
    const supportIssueId = input['support-issue-id'];

    await createMissingTags(tx, input.tags);
    await tx.db.execute('dissoc-tags-from-issue', { 'support-issue-id': supportIssueId });
    const associated = await tx.db.execute('assoc-tags-with-issue', {
      'support-issue-id': supportIssueId,
      tags: input.tags,
    });

    tx.logger.debug('Issue tags reset', {
      supportIssueId,
      userId: input['user-id'],
      associated,
    });
  });
}
