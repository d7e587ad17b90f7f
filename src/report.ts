import type { RejectionReason } from './extractor/constants';
import type { RejectedInvocation } from './options';

const REJECTION_DESCRIPTIONS: Record<RejectionReason, string> = {
  'unsupported-arguments':
    'argument list is not `(target)`, `(target, locals)` or `(options)`',
  'unresolvable-key': 'options contain a key that is not a static label',
  'unknown-option': 'options contain an unrecognised key',
  'missing-render-type': 'options name no `partial`, `template` or `layout`',
  'unresolvable-template': 'render target cannot be resolved statically',
  'object-and-collection': '`object` and `collection` are mutually exclusive',
  'missing-partial-key':
    'object and collection renders require an explicit `partial`'
};

/**
 * One-line explanation of a rejection reason.
 */
export function describeRejection(reason: RejectionReason): string {
  return REJECTION_DESCRIPTIONS[reason];
}

/**
 * Formats a rejected invocation for logs.
 *
 * @example
 *   formatRejectedInvocation({
 *     name: 'app/views/posts/index.html',
 *     methodName: 'render',
 *     index: 2,
 *     reason: 'unknown-option'
 *   });
 *   // -> 'app/views/posts/index.html: render#2 skipped (options contain an unrecognised key)'
 */
export function formatRejectedInvocation(info: RejectedInvocation): string {
  return `${info.name}: ${info.methodName}#${info.index} skipped (${describeRejection(info.reason)})`;
}
