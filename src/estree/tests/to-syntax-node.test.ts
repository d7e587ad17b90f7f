import { describe, it, expect, test } from 'vitest';

import type { SyntaxNode } from '../../syntax/nodes';
import {
  bareCallNode,
  callNode,
  classReferenceNode,
  mappingNode,
  opaqueNode,
  stringNode,
  symbolNode,
  variableReferenceNode
} from '../../syntax/nodes';
import { readStaticString, toSyntaxNode } from '../to-syntax-node';
import { getExpressionNode } from './estree-utils';

/**
 * Test suite: ESTree -> SyntaxNode translation.
 *
 * Coverage:
 * - Literal and static template strings.
 * - Object keys (labels vs expressions) and spreads.
 * - Class references, variables, calls and member access.
 */
describe('ESTree Adapter', () => {
  const translate = (code: string): SyntaxNode =>
    toSyntaxNode(getExpressionNode(code));

  describe('Static strings', () => {
    const scenarios = [
      { id: 'Double quotes', code: '"foo"', expected: 'foo' },
      { id: 'Single quotes', code: "'shared/foo'", expected: 'shared/foo' },
      { id: 'Template', code: '`foo`', expected: 'foo' },
      { id: 'Interpolation', code: '`foo${bar}`', expected: null },
      { id: 'Number', code: '42', expected: null }
    ];

    test.for(scenarios)('[$id] $code', ({ code, expected }) => {
      expect(readStaticString(getExpressionNode(code))).toBe(expected);
    });
  });

  describe('Expressions', () => {
    const scenarios: { id: string; code: string; expected: SyntaxNode }[] = [
      { id: 'String', code: '"foo"', expected: stringNode('foo') },
      {
        id: 'Class',
        code: 'new CardComponent()',
        expected: classReferenceNode('CardComponent')
      },
      {
        id: 'Namespaced class',
        code: 'new UI.Card({ title })',
        expected: classReferenceNode('UI.Card')
      },
      {
        id: 'Computed class',
        code: 'new registry[name]()',
        expected: opaqueNode('NewExpression')
      },
      {
        id: 'Variable',
        code: 'post',
        expected: variableReferenceNode('post')
      },
      {
        id: 'Instance state',
        code: 'this.post',
        expected: variableReferenceNode('@post')
      },
      {
        id: 'undefined',
        code: 'undefined',
        expected: opaqueNode('Identifier')
      },
      { id: 'Bare call', code: 'post()', expected: bareCallNode('post') },
      {
        id: 'Helper call',
        code: 'post(1)',
        expected: opaqueNode('CallExpression')
      },
      {
        id: 'Method call',
        code: 'user.posts()',
        expected: callNode('posts')
      },
      {
        id: 'Property access',
        code: 'user.posts',
        expected: callNode('posts')
      },
      {
        id: 'Computed access',
        code: 'user[key]',
        expected: opaqueNode('MemberExpression')
      },
      { id: 'Number', code: '42', expected: opaqueNode('Literal') },
      {
        id: 'Conditional',
        code: 'a ? "x" : "y"',
        expected: opaqueNode('ConditionalExpression')
      }
    ];

    test.for(scenarios)('[$id] $code', ({ code, expected }) => {
      expect(translate(code)).toEqual(expected);
    });
  });

  describe('Object literals', () => {
    it('turns static keys into labels', () => {
      expect(
        translate(`{ partial: "row", "as": "item", ['layout']: \`boxed\` }`)
      ).toEqual(
        mappingNode([
          { key: symbolNode('partial'), value: stringNode('row') },
          { key: symbolNode('as'), value: stringNode('item') },
          { key: symbolNode('layout'), value: stringNode('boxed') }
        ])
      );
    });

    it('keeps shorthand values as variables', () => {
      expect(translate('{ collection }')).toEqual(
        mappingNode([
          {
            key: symbolNode('collection'),
            value: variableReferenceNode('collection')
          }
        ])
      );
    });

    it('maps dynamic keys to their expression', () => {
      expect(translate('{ [key]: "row" }')).toEqual(
        mappingNode([
          { key: variableReferenceNode('key'), value: stringNode('row') }
        ])
      );
    });

    it('maps spreads to an opaque key', () => {
      expect(translate('{ partial: "row", ...options }')).toEqual(
        mappingNode([
          { key: symbolNode('partial'), value: stringNode('row') },
          {
            key: opaqueNode('SpreadElement'),
            value: variableReferenceNode('options')
          }
        ])
      );
    });
  });
});
