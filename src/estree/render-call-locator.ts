import type { NodePath, Visitors, types } from 'estree-toolkit';
import { is, traverse } from 'estree-toolkit';

import type { InvocationGroups, RenderInvocation } from '../syntax/nodes';
import { opaqueNode } from '../syntax/nodes';
import type { LocateOptions } from '../options';
import { resolveRenderMethodNames } from '../options';

import { toSyntaxNode } from './to-syntax-node';

/**
 * Returns the method name a call invokes, when it is statically visible.
 *
 *   render(...)        -> "render"
 *   view.render(...)   -> "render"
 *   this.render(...)   -> "render"
 *   view[name](...)    -> null
 */
function calleeMethodName(node: types.CallExpression): string | null {
  const callee = node.callee;

  if (is.identifier(callee)) return callee.name;

  if (
    is.memberExpression(callee) &&
    !callee.computed &&
    is.identifier(callee.property)
  ) {
    return callee.property.name;
  }

  return null;
}

function toInvocation(
  methodName: string,
  node: types.CallExpression
): RenderInvocation {
  return {
    methodName,
    // `render(...args)` cannot be matched positionally.
    arguments: node.arguments.map(argument =>
      is.spreadElement(argument)
        ? opaqueNode(argument.type)
        : toSyntaxNode(argument)
    )
  };
}

/**
 * Finds render call sites in a program and groups them by method name.
 *
 * Grouping
 * --------
 * - Keys: method names from `options.renderMethodNames`, in the order each
 *   is first seen in the source.
 * - Values: call sites in source order (depth-first, outer call before the
 *   calls nested in its arguments).
 *
 * Optional calls (`view?.render(...)`) are included; the callee shape is the
 * same.
 *
 * @throws Error if `renderMethodNames` is empty.
 */
export function locateRenderInvocations(
  program: types.Program,
  options: LocateOptions = {}
): InvocationGroups {
  const renderMethodNames = resolveRenderMethodNames(options);
  const groups = new Map<string, RenderInvocation[]>();

  const visitors: Visitors<unknown> = {
    CallExpression(path: NodePath<types.CallExpression>) {
      const node = path.node;
      if (!node) return;

      const methodName = calleeMethodName(node);
      if (methodName === null || !renderMethodNames.has(methodName)) return;

      const invocation = toInvocation(methodName, node);
      const group = groups.get(methodName);

      if (group) {
        group.push(invocation);
      } else {
        groups.set(methodName, [invocation]);
      }
    }
  };

  traverse(program, visitors);

  return groups;
}
