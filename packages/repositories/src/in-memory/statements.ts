// In-memory statement handlers. Each returns the rows (or the affected-row
// count) PostgreSQL would return for the catalog statement of the same name,
// with snake_case columns, aggregated arrays and all.

import type { GroupId } from '@support-desk/protocol';
import { columnKindOf, type ColumnDescriptor, type RawRow } from '../codec/index.js';
import type {
  CommandName,
  CommandParams,
  QueryName,
  QueryParams,
} from '../interfaces/index.js';
import {
  InMemoryConstraintError,
  type InMemoryDataStore,
  type StoredGroup,
  type StoredUser,
} from './store.js';

export type HandlerContext = {
  data: InMemoryDataStore;
  now: () => Date;
};

type QueryHandlers = {
  [N in QueryName]: (params: QueryParams<N>, ctx: HandlerContext) => RawRow[];
};

type CommandHandlers = {
  [N in CommandName]: (params: CommandParams<N>, ctx: HandlerContext) => number;
};

// citext comparisons
const fold = (text: string): string => text.toLowerCase();

/**
 * Columns whose raw form needs decoding, as the driver would report them.
 */
export const columnKinds: Partial<Record<QueryName, ColumnDescriptor[]>> = {
  'support-issue': [
    { name: 'tags', kind: columnKindOf('_citext') },
    { name: 'files', kind: columnKindOf('_record') },
  ],
};

function userRow(user: StoredUser): RawRow {
  return { ...user };
}

function assertUniqueScreenname(data: InMemoryDataStore, screenname: string, userId?: number) {
  for (const user of data.users.values()) {
    if (fold(user.screenname) === fold(screenname) && user.user_id !== userId) {
      throw new InMemoryConstraintError(
        '23505',
        'users_screenname_key',
        `duplicate key value violates unique constraint "users_screenname_key"`
      );
    }
  }
}

function assertGroupExists(data: InMemoryDataStore, groupId: GroupId) {
  if (!data.groups.has(groupId)) {
    throw new InMemoryConstraintError(
      '23503',
      'group_id_fkey',
      `insert or update violates foreign key constraint: group ${groupId} does not exist`
    );
  }
}

function assertUserExists(data: InMemoryDataStore, userId: number) {
  if (!data.users.has(userId)) {
    throw new InMemoryConstraintError(
      '23503',
      'user_id_fkey',
      `insert or update violates foreign key constraint: user ${userId} does not exist`
    );
  }
}

function assertIssueExists(data: InMemoryDataStore, supportIssueId: number) {
  if (!data.issues.has(supportIssueId)) {
    throw new InMemoryConstraintError(
      '23503',
      'support_issue_id_fkey',
      `insert or update violates foreign key constraint: issue ${supportIssueId} does not exist`
    );
  }
}

export const queryHandlers: QueryHandlers = {
  'support-issue'(params, { data }) {
    const issue = data.issues.get(params['support-issue-id']);
    if (!issue || issue.delete_date !== null) return [];

    const tagLabels: (string | null)[] = data.issueTags
      .filter((link) => link.support_issue_id === issue.support_issue_id)
      .map((link) => data.tags.get(link.tag_id)?.tag ?? null);
    const fileRecords: (string | null)[] = [...data.files.values()]
      .filter((file) => file.support_issue_id === issue.support_issue_id && file.delete_date === null)
      .map((file) => `(${file.file_id},${file.name})`);

    // left joins on tags and files: one joined row per (tag, file) pair,
    // a NULL on the side with no match
    const tagSide = tagLabels.length > 0 ? tagLabels : [null];
    const fileSide = fileRecords.length > 0 ? fileRecords : [null];
    const tags: (string | null)[] = [];
    const files: (string | null)[] = [];
    for (const tag of tagSide) {
      for (const file of fileSide) {
        tags.push(tag);
        files.push(file);
      }
    }

    const { delete_date: _deleted, ...columns } = issue;
    return [
      {
        ...columns,
        group_name: data.groups.get(issue.group_id)?.group_name ?? null,
        created_by_screenname: data.users.get(issue.created_by)?.screenname ?? null,
        tags,
        files,
      },
    ];
  },

  'inc-issue-views'(params, { data, now }) {
    const issue = data.issues.get(params['support-issue-id']);
    if (!issue) return [];
    issue.views += 1;
    issue.last_viewed = now();
    return [{ views: issue.views, last_viewed: issue.last_viewed }];
  },

  'issue-group'(params, { data }) {
    const issue = data.issues.get(params['support-issue-id']);
    if (!issue || issue.delete_date !== null) return [];
    return [{ group_id: issue.group_id }];
  },

  tags(_params, { data }) {
    return [...data.tags.values()]
      .sort((a, b) => a.tag.localeCompare(b.tag))
      .map((tag) => ({ ...tag }));
  },

  'create-tag'(params, { data, now }) {
    const exists = [...data.tags.values()].some((tag) => fold(tag.tag) === fold(params.tag));
    if (exists) return [];
    data.sequences.tag += 1;
    const tag = { tag_id: data.sequences.tag, tag: params.tag, create_date: now() };
    data.tags.set(tag.tag_id, tag);
    return [{ ...tag }];
  },

  'groups-for-user'(params, { data }) {
    return data.memberships
      .filter((membership) => membership.user_id === params['user-id'])
      .map((membership) => data.groups.get(membership.group_id))
      .filter((group): group is StoredGroup => group !== undefined)
      .sort((a, b) => a.group_id.localeCompare(b.group_id))
      .map((group) => ({ ...group }));
  },

  'add-issue'(params, { data, now }) {
    assertGroupExists(data, params['group-id']);
    assertUserExists(data, params['user-id']);
    data.sequences.issue += 1;
    const issue = {
      support_issue_id: data.sequences.issue,
      title: params.title,
      summary: params.summary,
      detail: params.detail,
      group_id: params['group-id'],
      created_by: params['user-id'],
      last_updated_by: params['user-id'],
      create_date: now(),
      update_date: null,
      last_viewed: null,
      views: 0,
      delete_date: null,
    };
    data.issues.set(issue.support_issue_id, issue);
    return [{ support_issue_id: issue.support_issue_id }];
  },

  'user-by-screenname'(params, { data }) {
    const user = [...data.users.values()].find(
      (candidate) => fold(candidate.screenname) === fold(params.screenname)
    );
    if (!user) return [];
    const belongsTo = data.memberships
      .filter((membership) => membership.user_id === user.user_id)
      .map((membership) => membership.group_id)
      .sort();
    return [{ ...userRow(user), belongs_to: belongsTo }];
  },

  'insert-user'(params, { data }) {
    assertUniqueScreenname(data, params.screenname);
    data.sequences.user += 1;
    const user: StoredUser = {
      user_id: data.sequences.user,
      screenname: params.screenname,
      pass: params.pass,
      admin: params.admin,
      is_active: params['is-active'],
      last_login: null,
    };
    data.users.set(user.user_id, user);
    return [userRow(user)];
  },

  'update-user'(params, { data }) {
    const user = data.users.get(params['user-id']);
    if (!user) return [];
    assertUniqueScreenname(data, params.screenname, user.user_id);
    user.screenname = params.screenname;
    user.admin = params.admin;
    user.is_active = params['is-active'];
    return [userRow(user)];
  },

  'update-user-with-pass'(params, { data }) {
    const user = data.users.get(params['user-id']);
    if (!user) return [];
    assertUniqueScreenname(data, params.screenname, user.user_id);
    user.screenname = params.screenname;
    user.pass = params.pass;
    user.admin = params.admin;
    user.is_active = params['is-active'];
    return [userRow(user)];
  },
};

export const commandHandlers: CommandHandlers = {
  'dissoc-tags-from-issue'(params, { data }) {
    const before = data.issueTags.length;
    data.issueTags = data.issueTags.filter(
      (link) => link.support_issue_id !== params['support-issue-id']
    );
    return before - data.issueTags.length;
  },

  'assoc-tags-with-issue'(params, { data }) {
    const wanted = new Set(params.tags.map(fold));
    let inserted = 0;
    for (const tag of data.tags.values()) {
      if (!wanted.has(fold(tag.tag))) continue;
      assertIssueExists(data, params['support-issue-id']);
      const linked = data.issueTags.some(
        (link) =>
          link.support_issue_id === params['support-issue-id'] && link.tag_id === tag.tag_id
      );
      if (linked) {
        throw new InMemoryConstraintError(
          '23505',
          'support_issues_tags_pkey',
          'duplicate key value violates unique constraint "support_issues_tags_pkey"'
        );
      }
      data.issueTags.push({ support_issue_id: params['support-issue-id'], tag_id: tag.tag_id });
      inserted += 1;
    }
    return inserted;
  },

  'update-issue'(params, { data, now }) {
    const issue = data.issues.get(params['support-issue-id']);
    if (!issue) return 0;
    assertGroupExists(data, params['group-id']);
    assertUserExists(data, params['user-id']);
    issue.title = params.title;
    issue.summary = params.summary;
    issue.detail = params.detail;
    issue.group_id = params['group-id'];
    issue.last_updated_by = params['user-id'];
    issue.update_date = now();
    return 1;
  },

  'delete-issue-files'(params, { data }) {
    let deleted = 0;
    for (const [fileId, file] of data.files) {
      if (file.support_issue_id === params['support-issue-id']) {
        data.files.delete(fileId);
        deleted += 1;
      }
    }
    return deleted;
  },

  'delete-issue'(params, { data }) {
    const issueId = params['support-issue-id'];
    if (!data.issues.has(issueId)) return 0;
    const referenced =
      data.issueTags.some((link) => link.support_issue_id === issueId) ||
      [...data.files.values()].some((file) => file.support_issue_id === issueId);
    if (referenced) {
      throw new InMemoryConstraintError(
        '23503',
        'support_issue_id_fkey',
        `update or delete on "support_issues" violates foreign key constraint: issue ${issueId} is still referenced`
      );
    }
    data.issues.delete(issueId);
    return 1;
  },

  'add-user-to-groups'(params, { data }) {
    let inserted = 0;
    for (const groupId of params.groups) {
      assertUserExists(data, params['user-id']);
      assertGroupExists(data, groupId);
      const member = data.memberships.some(
        (membership) => membership.user_id === params['user-id'] && membership.group_id === groupId
      );
      if (member) continue;
      data.memberships.push({ user_id: params['user-id'], group_id: groupId });
      inserted += 1;
    }
    return inserted;
  },

  'remove-user-from-groups'(params, { data }) {
    const removing = new Set(params.groups);
    const before = data.memberships.length;
    data.memberships = data.memberships.filter(
      (membership) =>
        membership.user_id !== params['user-id'] || !removing.has(membership.group_id)
    );
    return before - data.memberships.length;
  },
};
