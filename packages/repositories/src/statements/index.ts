export {
  statementCatalog,
  type StatementDefinition,
  type ParamDeclaration,
} from './catalog.js';
export { rowSchemas } from './rows.js';
export { bindParameters } from './bind.js';
