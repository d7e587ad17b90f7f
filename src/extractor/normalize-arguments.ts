import type { MappingNode, SyntaxNode } from '../syntax/nodes';
import {
  isClassReferenceNode,
  isMappingNode,
  isSymbolNode
} from '../syntax/nodes';

import type { StageResult } from './constants';
import { RENDERABLE, accepted, rejected } from './constants';

/**
 * Option key: a symbol name parsed from a mapping literal, or the internal
 * {@link RENDERABLE} marker.
 */
export type OptionKey = string | typeof RENDERABLE;

/**
 * Canonical options of one render invocation.
 */
export type OptionsMapping = ReadonlyMap<OptionKey, SyntaxNode>;

/**
 * Converts positional shorthand into canonical options.
 *
 *   render(Card.new)        -> { RENDERABLE: Card.new }
 *   render("foo", locals)   -> { partial: "foo", locals: locals }
 *   render("foo")           -> { partial: "foo" }
 *
 * The second argument is kept as an opaque `locals` value; its contents are
 * never inspected.
 */
function normalizePositional(
  primary: SyntaxNode,
  locals: SyntaxNode | undefined
): OptionsMapping {
  if (isClassReferenceNode(primary)) {
    return new Map<OptionKey, SyntaxNode>([[RENDERABLE, primary]]);
  }

  if (locals !== undefined) {
    return new Map<OptionKey, SyntaxNode>([
      ['partial', primary],
      ['locals', locals]
    ]);
  }

  return new Map<OptionKey, SyntaxNode>([['partial', primary]]);
}

/**
 * Parses a mapping literal into options keyed by symbol name.
 *
 * POLICY: All-or-Nothing
 * A single key that is not a symbol literal (string key, variable, splat)
 * invalidates the whole call, not just that entry. Partial extraction could
 * drop a `partial:`/`collection:` key and change the meaning of the rest.
 *
 * Duplicate keys keep the last value.
 */
export function parseOptionsMapping(
  node: MappingNode
): StageResult<OptionsMapping> {
  const options = new Map<OptionKey, SyntaxNode>();

  for (const { key, value } of node.entries) {
    if (!isSymbolNode(key)) {
      return rejected('unresolvable-key');
    }
    options.set(key.name, value);
  }

  return accepted(options);
}

/**
 * Argument Normalizer.
 *
 * Accepted shapes
 * ---------------
 * 1. One or two arguments, first is not a mapping literal:
 *    positional shorthand (see {@link normalizePositional}).
 * 2. Exactly one argument that is a mapping literal:
 *    explicit options (see {@link parseOptionsMapping}).
 *
 * Every other shape is rejected with `unsupported-arguments`:
 * - `render()`
 * - `render({ partial: "a" }, extra)`
 * - `render(a, b, c)`
 *
 * @param args
 *   Positional argument nodes of the invocation.
 * @returns
 *   Canonical options, or a rejection.
 */
export function normalizeRenderArguments(
  args: readonly SyntaxNode[]
): StageResult<OptionsMapping> {
  const [first, second] = args;

  if (first === undefined || args.length > 2) {
    return rejected('unsupported-arguments');
  }

  if (!isMappingNode(first)) {
    return accepted(normalizePositional(first, second));
  }

  if (args.length === 1) {
    return parseOptionsMapping(first);
  }

  return rejected('unsupported-arguments');
}
