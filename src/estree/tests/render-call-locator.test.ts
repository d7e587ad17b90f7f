import { describe, it, expect } from 'vitest';

import { opaqueNode, stringNode, symbolMapping } from '../../syntax/nodes';
import { parseViewSource } from '../parse';
import { locateRenderInvocations } from '../render-call-locator';

describe('Render Call Locator', () => {
  const locate = (code: string, renderMethodNames?: string[]) =>
    locateRenderInvocations(parseViewSource(code), { renderMethodNames });

  it('groups calls by method name in first-seen order', () => {
    const groups = locate(
      `
      render('header');
      renderToString('card');
      view.render({ partial: 'row' });
      this.render('footer');
      `,
      ['render', 'renderToString']
    );

    expect([...groups.keys()]).toEqual(['render', 'renderToString']);
    expect(groups.get('render')).toEqual([
      { methodName: 'render', arguments: [stringNode('header')] },
      {
        methodName: 'render',
        arguments: [symbolMapping({ partial: stringNode('row') })]
      },
      { methodName: 'render', arguments: [stringNode('footer')] }
    ]);
    expect(groups.get('renderToString')).toEqual([
      { methodName: 'renderToString', arguments: [stringNode('card')] }
    ]);
  });

  it('matches only "render" by default', () => {
    const groups = locate(`render('a'); renderToString('b'); paint('c');`);

    expect([...groups.keys()]).toEqual(['render']);
    expect(groups.get('render')).toHaveLength(1);
  });

  it('visits an outer call before calls nested in its arguments', () => {
    const groups = locate(`render('outer', { body: render('inner') });`);

    expect(
      groups.get('render')?.map(invocation => invocation.arguments.at(0))
    ).toEqual([stringNode('outer'), stringNode('inner')]);
  });

  it('includes optional calls', () => {
    const groups = locate(`view?.render('maybe');`);

    expect(groups.get('render')).toEqual([
      { methodName: 'render', arguments: [stringNode('maybe')] }
    ]);
  });

  it('maps spread arguments to opaque nodes', () => {
    const groups = locate(`render(...args);`);

    expect(groups.get('render')).toEqual([
      { methodName: 'render', arguments: [opaqueNode('SpreadElement')] }
    ]);
  });

  it('ignores computed callees', () => {
    expect(locate(`view[method]('a');`).size).toBe(0);
  });

  it('rejects an empty method list', () => {
    expect(() => locate(`render('a');`, [])).toThrow(
      '[RenderDependencies] Invalid renderMethodNames: The list is empty.'
    );
  });
});
