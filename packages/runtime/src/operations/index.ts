export {
  supportIssue,
  createIssueWithTags,
  updateIssueWithTags,
  deleteIssue,
  runQueryIfUserCanAccessIssue,
} from './issues.js';
export { createMissingTags, resetIssueTags, type IssueTagsInput } from './tags.js';
export { updateUserInfo, insertUserWithGroups, reconcileUserGroups } from './users.js';
