import type { types } from 'estree-toolkit';
import { is } from 'estree-toolkit';
import { parse } from 'meriyah';

import type { ParseOptions } from '../options';
import { isArray, isRecord } from '../guards';

/**
 * Shallow bridge guard: an object with a string `type` discriminator, enough
 * for `estree-toolkit` guards to take over.
 */
function isNodeLike(value: unknown): value is types.Node {
  return isRecord(value) && !isArray(value) && typeof value.type === 'string';
}

/**
 * Parses view source text into an ESTree `Program`.
 *
 * Syntax errors propagate from the parser unchanged: a file that does not
 * parse has no render calls to interpret.
 *
 * @throws
 *   On syntax errors, or if the parser output is not a `Program` node.
 */
export function parseViewSource(
  code: string,
  options: ParseOptions = {}
): types.Program {
  const ast = parse(code, {
    module: options.module ?? true,
    jsx: options.jsx ?? false
  }) as unknown;

  if (!isNodeLike(ast) || !is.program(ast)) {
    throw new Error(
      '[RenderDependencies] Expected parser output to be an ESTree Program node.'
    );
  }

  return ast;
}
