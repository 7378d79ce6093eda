// Access control
export {
  userCanAccessGroup,
  userCanAccessIssue,
  type GroupAccessInput,
} from './gate.js';
