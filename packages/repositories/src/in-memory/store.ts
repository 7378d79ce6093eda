// Table rows for the in-memory store, named as the PostgreSQL schema names them.

import type { GroupId, Id } from '@support-desk/protocol';

export type StoredUser = {
  user_id: Id;
  screenname: string;
  pass: string | null;
  admin: boolean;
  is_active: boolean;
  last_login: Date | null;
};

export type StoredGroup = {
  group_id: GroupId;
  group_name: string;
  create_date: Date;
};

export type StoredMembership = {
  user_id: Id;
  group_id: GroupId;
};

export type StoredTag = {
  tag_id: Id;
  tag: string;
  create_date: Date;
};

export type StoredIssue = {
  support_issue_id: Id;
  title: string;
  summary: string;
  detail: string;
  group_id: GroupId;
  created_by: Id;
  last_updated_by: Id | null;
  create_date: Date;
  update_date: Date | null;
  last_viewed: Date | null;
  views: number;
  delete_date: Date | null;
};

export type StoredIssueTag = {
  support_issue_id: Id;
  tag_id: Id;
};

export type StoredFile = {
  file_id: Id;
  support_issue_id: Id;
  name: string;
  delete_date: Date | null;
};

/**
 * In-memory data store that can be accessed for debugging/inspection.
 */
export interface InMemoryDataStore {
  users: Map<Id, StoredUser>;
  groups: Map<GroupId, StoredGroup>;
  memberships: StoredMembership[];
  tags: Map<Id, StoredTag>;
  issues: Map<Id, StoredIssue>;
  issueTags: StoredIssueTag[];
  files: Map<Id, StoredFile>;
  sequences: { user: number; tag: number; issue: number; file: number };
}

export function createEmptyStore(): InMemoryDataStore {
  return {
    users: new Map(),
    groups: new Map(),
    memberships: [],
    tags: new Map(),
    issues: new Map(),
    issueTags: [],
    files: new Map(),
    sequences: { user: 0, tag: 0, issue: 0, file: 0 },
  };
}

/**
 * Raised where PostgreSQL would reject a write with a constraint violation.
 * `code` carries the matching SQLSTATE.
 */
export class InMemoryConstraintError extends Error {
  readonly code: '23505' | '23503';
  readonly constraint: string;

  constructor(code: '23505' | '23503', constraint: string, message: string) {
    super(message);
    this.name = 'InMemoryConstraintError';
    this.code = code;
    this.constraint = constraint;
  }
}
