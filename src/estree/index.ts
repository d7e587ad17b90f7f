import type { types } from 'estree-toolkit';

import type { CollectOptions } from '../options';
import { extractRenderDependencies } from '../extractor/index';

import { parseViewSource } from './parse';
import { locateRenderInvocations } from './render-call-locator';

export { parseViewSource } from './parse';
export { locateRenderInvocations } from './render-call-locator';
export { readStaticString, toSyntaxNode } from './to-syntax-node';

/**
 * Collects the render dependencies of a JavaScript view module.
 *
 * 1. Parse: source text -> ESTree `Program` (skipped when a program is given).
 * 2. Locate: render call sites grouped by method name.
 * 3. Extract: dependency identifiers in source order.
 *
 * @param name
 *   Source file name (e.g. `"app/views/posts/index.js"`).
 * @param source
 *   Source text, or an already parsed program.
 * @throws
 *   On syntax errors or invalid options. Unsupported render shapes never
 *   throw; they are skipped.
 */
export function collectRenderDependencies(
  name: string,
  source: string | types.Program,
  options: CollectOptions = {}
): string[] {
  const program =
    typeof source === 'string' ? parseViewSource(source, options) : source;

  const groups = locateRenderInvocations(program, options);

  return extractRenderDependencies(name, groups, options);
}
