import { describe, expect, test } from 'vitest';

import type { RenderType } from '../constants';
import { toVirtualPath } from '../virtual-path';

describe('Virtual Path Builder', () => {
  const scenarios: {
    renderType: RenderType;
    path: string;
    expected: string;
  }[] = [
    {
      renderType: 'partial',
      path: 'app/views/posts/foo',
      expected: 'app/views/posts/_foo'
    },
    { renderType: 'partial', path: 'foo', expected: '_foo' },
    { renderType: 'partial', path: 'posts/post', expected: 'posts/_post' },
    { renderType: 'layout', path: 'bar', expected: '_bar' },
    {
      renderType: 'layout',
      path: 'layouts/boxed',
      expected: 'layouts/_boxed'
    },
    { renderType: 'template', path: 'posts/show', expected: 'posts/show' },
    {
      renderType: 'renderable',
      path: 'CardComponent',
      expected: 'CardComponent'
    },
    { renderType: 'partial', path: 'a\nb', expected: '_a\nb' },
    { renderType: 'partial', path: 'a/b\nc/d', expected: 'a/b\nc/_d' },
    {
      renderType: 'partial',
      path: 'app/views/posts/',
      expected: 'app/views/posts/_'
    }
  ];

  test.for(scenarios)(
    '$renderType "$path" -> "$expected"',
    ({ renderType, path, expected }) => {
      expect(toVirtualPath(renderType, path)).toBe(expected);
    }
  );
});
