import type {
  Id,
  GroupId,
  Group,
  IssueViews,
  SupportIssue,
  SupportIssueUpdate,
  NewSupportIssue,
  Tag,
  User,
  UserInfo,
  UserRecord,
} from '@support-desk/protocol';

/**
 * Named statements that return rows.
 *
 * `result` is the call shape: `one` statements yield at most one row,
 * `many` statements yield a row-set. Every key, in params and rows alike,
 * uses the kebab-case convention.
 */
export interface QuerySignatures {
  'support-issue': {
    result: 'one';
    params: { 'support-issue-id': Id };
    row: SupportIssue;
  };
  'inc-issue-views': {
    result: 'one';
    params: { 'support-issue-id': Id };
    row: IssueViews;
  };
  'issue-group': {
    result: 'one';
    params: { 'support-issue-id': Id };
    row: { 'group-id': GroupId };
  };
  tags: {
    result: 'many';
    params: Record<string, never>;
    row: Tag;
  };
  'create-tag': {
    result: 'one';
    params: { tag: string };
    row: Tag;
  };
  'groups-for-user': {
    result: 'many';
    params: { 'user-id': Id };
    row: Group;
  };
  'add-issue': {
    result: 'one';
    params: Omit<NewSupportIssue, 'tags'>;
    row: { 'support-issue-id': Id };
  };
  'user-by-screenname': {
    result: 'one';
    params: { screenname: string };
    row: User;
  };
  'insert-user': {
    result: 'one';
    params: UserInfo;
    row: UserRecord;
  };
  'update-user': {
    result: 'one';
    params: Omit<UserInfo, 'pass'> & { 'user-id': Id };
    row: UserRecord;
  };
  'update-user-with-pass': {
    result: 'one';
    params: UserInfo & { 'user-id': Id };
    row: UserRecord;
  };
}

/**
 * Named statements that only report an affected-row count.
 */
export interface CommandSignatures {
  'dissoc-tags-from-issue': { params: { 'support-issue-id': Id } };
  'assoc-tags-with-issue': { params: { 'support-issue-id': Id; tags: string[] } };
  'update-issue': { params: Omit<SupportIssueUpdate, 'tags'> };
  'delete-issue-files': { params: { 'support-issue-id': Id } };
  'delete-issue': { params: { 'support-issue-id': Id } };
  'add-user-to-groups': { params: { 'user-id': Id; groups: GroupId[] } };
  'remove-user-from-groups': { params: { 'user-id': Id; groups: GroupId[] } };
}

export type QueryName = keyof QuerySignatures;
export type CommandName = keyof CommandSignatures;
export type StatementName = QueryName | CommandName;

export type OneQueryName = {
  [N in QueryName]: QuerySignatures[N]['result'] extends 'one' ? N : never;
}[QueryName];

export type ManyQueryName = {
  [N in QueryName]: QuerySignatures[N]['result'] extends 'many' ? N : never;
}[QueryName];

export type QueryParams<N extends QueryName> = QuerySignatures[N]['params'];
export type QueryRow<N extends QueryName> = QuerySignatures[N]['row'];
export type CommandParams<N extends CommandName> = CommandSignatures[N]['params'];

export type StatementParams<N extends StatementName> = N extends QueryName
  ? QueryParams<N>
  : N extends CommandName
    ? CommandParams<N>
    : never;
