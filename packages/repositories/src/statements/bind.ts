import { MissingParameterError } from '../errors.js';
import { encodeParameter, type SqlParameter } from '../codec/index.js';
import type { StatementName } from '../interfaces/index.js';
import type { ParamDeclaration } from './catalog.js';

/**
 * Turn a parameter mapping into positional values, in declaration order.
 *
 * Keys the statement does not declare are ignored, so callers may pass a
 * wider record than the statement reads.
 *
 * @throws MissingParameterError when a declared key is absent
 */
export function bindParameters(
  statement: StatementName,
  declarations: readonly ParamDeclaration[],
  params: object
): SqlParameter[] {
  const supplied = new Map<string, unknown>(Object.entries(params));

  return declarations.map((declaration) => {
    if (!supplied.has(declaration.name)) {
      throw new MissingParameterError(statement, declaration.name);
    }
    return encodeParameter(supplied.get(declaration.name), declaration.type);
  });
}
