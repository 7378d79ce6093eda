// @support-desk/runtime
// Access gate and transactional operations over the statement runner

// Context (explicit collaborators, transaction propagation, wiring)
export {
  createOperationContext,
  createSupportDesk,
  withTransaction,
  type OperationContext,
  type SupportDesk,
} from './context.js';

// Access gate
export { userCanAccessGroup, userCanAccessIssue, type GroupAccessInput } from './access/index.js';

// Operations
export {
  supportIssue,
  createIssueWithTags,
  updateIssueWithTags,
  deleteIssue,
  runQueryIfUserCanAccessIssue,
  createMissingTags,
  resetIssueTags,
  updateUserInfo,
  insertUserWithGroups,
  reconcileUserGroups,
  type IssueTagsInput,
} from './operations/index.js';
