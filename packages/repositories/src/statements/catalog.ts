// Statement catalog: SQL text and parameter declarations for every named
// statement. Placeholders are positional; `params[i]` binds `$${i + 1}`.

import type { StatementName, StatementParams } from '../interfaces/index.js';

/**
 * Declares one placeholder: which key of the parameter mapping it reads and
 * the PostgreSQL type the statement expects there. The codec decides from
 * `type` whether a sequence binds as a native array or as JSON.
 */
export type ParamDeclaration<K extends string = string> = {
  name: K;
  type: string;
};

export type StatementDefinition<N extends StatementName = StatementName> = {
  sql: string;
  params: readonly ParamDeclaration<keyof StatementParams<N> & string>[];
};

const USER_COLUMNS = 'user_id, screenname, pass, admin, is_active, last_login';

export const statementCatalog: { [N in StatementName]: StatementDefinition<N> } = {
  'support-issue': {
    sql: `
      select si.support_issue_id, si.title, si.summary, si.detail,
             si.group_id, g.group_name,
             si.created_by, u.screenname as created_by_screenname,
             si.last_updated_by, si.create_date, si.update_date,
             si.last_viewed, si.views,
             array_agg(t.tag) as tags,
             array_agg(case when f.file_id is null then null
                            else row(f.file_id, f.name) end) as files
        from support_issues si
        left join groups g on g.group_id = si.group_id
        left join users u on u.user_id = si.created_by
        left join support_issues_tags sit on sit.support_issue_id = si.support_issue_id
        left join tags t on t.tag_id = sit.tag_id
        left join files f on f.support_issue_id = si.support_issue_id
                         and f.delete_date is null
       where si.support_issue_id = $1
         and si.delete_date is null
       group by si.support_issue_id, g.group_name, u.screenname`,
    params: [{ name: 'support-issue-id', type: 'int4' }],
  },
  'inc-issue-views': {
    sql: `
      update support_issues
         set views = views + 1, last_viewed = now()
       where support_issue_id = $1
      returning views, last_viewed`,
    params: [{ name: 'support-issue-id', type: 'int4' }],
  },
  'issue-group': {
    sql: `
      select group_id
        from support_issues
       where support_issue_id = $1
         and delete_date is null`,
    params: [{ name: 'support-issue-id', type: 'int4' }],
  },
  tags: {
    sql: 'select tag_id, tag, create_date from tags order by tag',
    params: [],
  },
  'create-tag': {
    sql: `
      insert into tags (tag) values ($1)
      on conflict (tag) do nothing
      returning tag_id, tag, create_date`,
    params: [{ name: 'tag', type: 'citext' }],
  },
  'dissoc-tags-from-issue': {
    sql: 'delete from support_issues_tags where support_issue_id = $1',
    params: [{ name: 'support-issue-id', type: 'int4' }],
  },
  'assoc-tags-with-issue': {
    sql: `
      insert into support_issues_tags (support_issue_id, tag_id)
      select $1, tag_id from tags where tag = any($2::citext[])`,
    params: [
      { name: 'support-issue-id', type: 'int4' },
      { name: 'tags', type: '_citext' },
    ],
  },
  'groups-for-user': {
    sql: `
      select g.group_id, g.group_name, g.create_date
        from groups g
        join user_group_memberships m on m.group_id = g.group_id
       where m.user_id = $1
       order by g.group_id`,
    params: [{ name: 'user-id', type: 'int4' }],
  },
  'add-issue': {
    sql: `
      insert into support_issues
             (title, summary, detail, group_id, created_by, last_updated_by)
      values ($1, $2, $3, $4, $5, $5)
      returning support_issue_id`,
    params: [
      { name: 'title', type: 'text' },
      { name: 'summary', type: 'text' },
      { name: 'detail', type: 'text' },
      { name: 'group-id', type: 'text' },
      { name: 'user-id', type: 'int4' },
    ],
  },
  'update-issue': {
    sql: `
      update support_issues
         set title = $2, summary = $3, detail = $4, group_id = $5,
             last_updated_by = $6, update_date = now()
       where support_issue_id = $1`,
    params: [
      { name: 'support-issue-id', type: 'int4' },
      { name: 'title', type: 'text' },
      { name: 'summary', type: 'text' },
      { name: 'detail', type: 'text' },
      { name: 'group-id', type: 'text' },
      { name: 'user-id', type: 'int4' },
    ],
  },
  'delete-issue-files': {
    sql: 'delete from files where support_issue_id = $1',
    params: [{ name: 'support-issue-id', type: 'int4' }],
  },
  'delete-issue': {
    sql: 'delete from support_issues where support_issue_id = $1',
    params: [{ name: 'support-issue-id', type: 'int4' }],
  },
  'user-by-screenname': {
    sql: `
      select u.user_id, u.screenname, u.pass, u.admin, u.is_active, u.last_login,
             array(select m.group_id
                     from user_group_memberships m
                    where m.user_id = u.user_id
                    order by m.group_id) as belongs_to
        from users u
       where u.screenname = $1`,
    params: [{ name: 'screenname', type: 'citext' }],
  },
  'insert-user': {
    sql: `
      insert into users (screenname, pass, admin, is_active)
      values ($1, $2, $3, $4)
      returning ${USER_COLUMNS}`,
    params: [
      { name: 'screenname', type: 'citext' },
      { name: 'pass', type: 'text' },
      { name: 'admin', type: 'bool' },
      { name: 'is-active', type: 'bool' },
    ],
  },
  'update-user': {
    sql: `
      update users
         set screenname = $2, admin = $3, is_active = $4
       where user_id = $1
      returning ${USER_COLUMNS}`,
    params: [
      { name: 'user-id', type: 'int4' },
      { name: 'screenname', type: 'citext' },
      { name: 'admin', type: 'bool' },
      { name: 'is-active', type: 'bool' },
    ],
  },
  'update-user-with-pass': {
    sql: `
      update users
         set screenname = $2, pass = $3, admin = $4, is_active = $5
       where user_id = $1
      returning ${USER_COLUMNS}`,
    params: [
      { name: 'user-id', type: 'int4' },
      { name: 'screenname', type: 'citext' },
      { name: 'pass', type: 'text' },
      { name: 'admin', type: 'bool' },
      { name: 'is-active', type: 'bool' },
    ],
  },
  'add-user-to-groups': {
    sql: `
      insert into user_group_memberships (user_id, group_id)
      select $1, unnest($2::text[])
      on conflict do nothing`,
    params: [
      { name: 'user-id', type: 'int4' },
      { name: 'groups', type: '_text' },
    ],
  },
  'remove-user-from-groups': {
    sql: `
      delete from user_group_memberships
       where user_id = $1
         and group_id = any($2::text[])`,
    params: [
      { name: 'user-id', type: 'int4' },
      { name: 'groups', type: '_text' },
    ],
  },
};
