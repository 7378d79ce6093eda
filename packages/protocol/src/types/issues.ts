// Support issue types

import type { Id, GroupId, Timestamp } from './common.js';

/**
 * Attachment reference as read from a `(file-id, name)` record column.
 * Record fields arrive as text, so the id is a string here.
 */
export type AttachmentRef = string[];

/**
 * A SupportIssue as materialized for callers.
 *
 * `tags` and `files` have set semantics: callers never see duplicates,
 * even though the underlying join can produce them.
 */
export type SupportIssue = {
  'support-issue-id': Id;
  title: string;
  summary: string;
  detail: string;
  'group-id': GroupId;
  'group-name': string | null;
  'created-by': Id;
  'created-by-screenname': string | null;
  'last-updated-by': Id | null;
  'create-date': Timestamp;
  'update-date': Timestamp | null;
  'last-viewed': Timestamp | null;
  views: number;
  tags: string[];
  files: AttachmentRef[];
};

/**
 * Result of the atomic view-count increment.
 */
export type IssueViews = {
  views: number;
  'last-viewed': Timestamp;
};

/**
 * Fields a caller supplies when recording a new issue.
 */
export type NewSupportIssue = {
  title: string;
  summary: string;
  detail: string;
  'group-id': GroupId;
  /** The user recording the issue; also checked against the group */
  'user-id': Id;
  tags: string[];
};

/**
 * Fields a caller supplies when updating an existing issue.
 */
export type SupportIssueUpdate = NewSupportIssue & {
  'support-issue-id': Id;
};

/**
 * Reference to an issue on behalf of a user.
 */
export type IssueAccess = {
  'user-id': Id;
  'support-issue-id': Id;
};
