import { describe, it, expect } from 'vitest';

import { describeRejection, formatRejectedInvocation } from '../report';

describe('Rejection report', () => {
  it('describes a reason', () => {
    expect(describeRejection('object-and-collection')).toBe(
      '`object` and `collection` are mutually exclusive'
    );
  });

  it('formats a rejected invocation', () => {
    expect(
      formatRejectedInvocation({
        name: 'app/views/posts/index.html',
        methodName: 'render',
        index: 2,
        reason: 'unknown-option'
      })
    ).toBe(
      'app/views/posts/index.html: render#2 skipped (options contain an unrecognised key)'
    );
  });
});
