// Row schemas: the shape each query's projected row must have.
// Runners validate every row against these before returning it.

import { z } from 'zod';
import type { QueryName, QueryRow } from '../interfaces/index.js';

const id = z.number().int();
const timestamp = z.date();

const tagRow = z.object({
  'tag-id': id,
  tag: z.string(),
  'create-date': timestamp,
});

const groupRow = z.object({
  'group-id': z.string(),
  'group-name': z.string(),
  'create-date': timestamp,
});

const userRecordRow = z.object({
  'user-id': id,
  screenname: z.string(),
  pass: z.string().nullable(),
  admin: z.boolean(),
  'is-active': z.boolean(),
  'last-login': timestamp.nullable(),
});

const supportIssueRow = z.object({
  'support-issue-id': id,
  title: z.string(),
  summary: z.string(),
  detail: z.string(),
  'group-id': z.string(),
  'group-name': z.string().nullable(),
  'created-by': id,
  'created-by-screenname': z.string().nullable(),
  'last-updated-by': id.nullable(),
  'create-date': timestamp,
  'update-date': timestamp.nullable(),
  'last-viewed': timestamp.nullable(),
  views: z.number().int(),
  tags: z.array(z.string()),
  files: z.array(z.array(z.string())),
});

export const rowSchemas: { [N in QueryName]: z.ZodType<QueryRow<N>> } = {
  'support-issue': supportIssueRow,
  'inc-issue-views': z.object({
    views: z.number().int(),
    'last-viewed': timestamp,
  }),
  'issue-group': z.object({ 'group-id': z.string() }),
  tags: tagRow,
  'create-tag': tagRow,
  'groups-for-user': groupRow,
  'add-issue': z.object({ 'support-issue-id': id }),
  'user-by-screenname': userRecordRow.extend({
    'belongs-to': z.array(z.string()),
  }),
  'insert-user': userRecordRow,
  'update-user': userRecordRow,
  'update-user-with-pass': userRecordRow,
};
