import type { types } from 'estree-toolkit';
import { is } from 'estree-toolkit';

import type { MappingEntry, SyntaxNode } from '../syntax/nodes';
import {
  bareCallNode,
  callNode,
  classReferenceNode,
  mappingNode,
  opaqueNode,
  stringNode,
  symbolNode,
  variableReferenceNode
} from '../syntax/nodes';

/**
 * Sigil marking instance state, so `this.post` reads like `@post`.
 */
const INSTANCE_SIGIL = '@';

/**
 * Returns the string a node evaluates to when it is a plain string:
 * - `"foo"` / `'foo'`
 * - `` `foo` `` (template literal without interpolation)
 *
 * Interpolated templates and every other node return `null`.
 */
export function readStaticString(node: types.Node): string | null {
  if (is.literal(node) && typeof node.value === 'string') {
    return node.value;
  }

  if (is.templateLiteral(node) && node.expressions.length === 0) {
    const cooked = node.quasis.at(0)?.value.cooked;
    return typeof cooked === 'string' ? cooked : null;
  }

  return null;
}

/**
 * Returns the name of a non-computed member property (`a.b` -> `"b"`).
 */
function memberPropertyName(node: types.MemberExpression): string | null {
  if (node.computed) return null;
  return is.identifier(node.property) ? node.property.name : null;
}

/**
 * Resolves an identifier or dotted member chain to its qualified name.
 *
 *   Card            -> "Card"
 *   Components.Card -> "Components.Card"
 *   cards[0]        -> null
 */
function qualifiedName(node: types.Node): string | null {
  if (is.identifier(node)) return node.name;

  if (is.memberExpression(node)) {
    const property = memberPropertyName(node);
    if (property === null) return null;

    const owner = qualifiedName(node.object);
    return owner === null ? null : `${owner}.${property}`;
  }

  return null;
}

/**
 * Maps an object property key onto a label.
 *
 * Labels (symbol nodes):
 * - `{ partial: ... }`      non-computed identifier
 * - `{ "partial": ... }`    string literal, computed or not
 * - `{ [`partial`]: ... }`  static template literal
 *
 * Any other key (`{ [name]: ... }`, `{ 1: ... }`) maps to its expression node,
 * which the extractor rejects as an unresolvable key.
 */
function propertyKeyNode(property: types.Property): SyntaxNode {
  if (!property.computed && is.identifier(property.key)) {
    return symbolNode(property.key.name);
  }

  const label = readStaticString(property.key);
  if (label !== null) {
    return symbolNode(label);
  }

  return toSyntaxNode(property.key);
}

function toMappingNode(node: types.ObjectExpression): SyntaxNode {
  const entries: MappingEntry[] = node.properties.map(property => {
    // `{ ...options }` has no static key; the opaque key rejects the mapping.
    if (is.spreadElement(property)) {
      return {
        key: opaqueNode('SpreadElement'),
        value: toSyntaxNode(property.argument)
      };
    }

    return {
      key: propertyKeyNode(property),
      value: toSyntaxNode(property.value)
    };
  });

  return mappingNode(entries);
}

/**
 * Maps a member access onto a variable reference or a method call.
 *
 *   this.post   -> variable-reference "@post"
 *   user.posts  -> call "posts"
 *   user[key]   -> opaque
 */
function toMemberNode(node: types.MemberExpression): SyntaxNode {
  const property = memberPropertyName(node);
  if (property === null) return opaqueNode(node.type);

  if (is.thisExpression(node.object)) {
    return variableReferenceNode(`${INSTANCE_SIGIL}${property}`);
  }

  return callNode(property);
}

/**
 * Maps a call onto a bare call or a method call.
 *
 *   post()         -> bare-call "post"
 *   user.posts()   -> call "posts"
 *   post(1)        -> opaque (a helper call, not a bare identifier)
 */
function toCallNode(node: types.CallExpression): SyntaxNode {
  const callee = node.callee;

  if (is.identifier(callee)) {
    return node.arguments.length === 0
      ? bareCallNode(callee.name)
      : opaqueNode(node.type);
  }

  if (is.memberExpression(callee)) {
    const method = memberPropertyName(callee);
    return method === null ? opaqueNode(node.type) : callNode(method);
  }

  return opaqueNode(node.type);
}

/**
 * Translates an ESTree node into the extractor's syntax node union.
 *
 * | ESTree                                  | SyntaxNode            |
 * | --------------------------------------- | --------------------- |
 * | string `Literal`, static template       | `string`              |
 * | `ObjectExpression`                      | `mapping`             |
 * | `new Card()`, `new UI.Card()`           | `class-reference`     |
 * | `Identifier` (except `undefined`)       | `variable-reference`  |
 * | `this.post`                             | `variable-reference`  |
 * | `post()`                                | `bare-call`           |
 * | `user.posts`, `user.posts()`            | `call`                |
 * | anything else                           | `opaque`              |
 *
 * Symbol nodes are produced only for object keys (see `propertyKeyNode`).
 */
export function toSyntaxNode(node: types.Node): SyntaxNode {
  const text = readStaticString(node);
  if (text !== null) return stringNode(text);

  if (is.objectExpression(node)) return toMappingNode(node);

  if (is.newExpression(node)) {
    const className = qualifiedName(node.callee);
    return className === null
      ? opaqueNode(node.type)
      : classReferenceNode(className);
  }

  if (is.identifier(node)) {
    return node.name === 'undefined'
      ? opaqueNode(node.type)
      : variableReferenceNode(node.name);
  }

  if (is.memberExpression(node)) return toMemberNode(node);

  if (is.callExpression(node)) return toCallNode(node);

  return opaqueNode(node.type);
}
