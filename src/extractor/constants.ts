/**
 * Reasons a render invocation is rejected.
 *
 * Every reason maps to one branch of the matcher that refuses to guess:
 *
 * - `unsupported-arguments`: argument list shape is not one of the accepted
 *   forms (0 args, 3+ args, or a mapping followed by another argument).
 * - `unresolvable-key`: a mapping literal key is not a symbol literal.
 * - `unknown-option`: an option key outside {@link KNOWN_OPTION_KEYS}.
 * - `missing-render-type`: none of {@link RENDER_TYPE_KEYS} is present.
 * - `unresolvable-template`: the render target is neither a string literal, a
 *   class reference nor a supported dynamic expression.
 * - `object-and-collection`: `object` and `collection` are both given.
 * - `missing-partial-key`: an object/collection render without `partial`.
 */
export type RejectionReason =
  | 'unsupported-arguments'
  | 'unresolvable-key'
  | 'unknown-option'
  | 'missing-render-type'
  | 'unresolvable-template'
  | 'object-and-collection'
  | 'missing-partial-key';

/**
 * Represents a stage that produced a value.
 */
export type StageSuccess<T> = {
  success: true;
  value: T;
};

/**
 * Represents a stage that refused the invocation.
 *
 * Contract:
 * - Carries no partial value; the invocation contributes nothing.
 * - Used strictly for stage rejection, never for contract violations (those
 *   throw).
 */
export type StageRejection = {
  success: false;
  reason: RejectionReason;
};

/**
 * Outcome of one extraction stage.
 *
 * Pattern:
 * - `success: true`  => `value` is available
 * - `success: false` => the invocation is rejected, `reason` says why
 */
export type StageResult<T> = StageSuccess<T> | StageRejection;

export function accepted<T>(value: T): StageSuccess<T> {
  return { success: true, value };
}

export function rejected(reason: RejectionReason): StageRejection {
  return { success: false, reason };
}

/**
 * Internal option key for class-reference targets (`render(Card.new)`).
 *
 * A registered symbol rather than a string, so no key parsed from a mapping
 * literal can ever collide with it.
 */
export const RENDERABLE = Symbol.for('render-dependencies.renderable');

/**
 * Render-type keys in priority order.
 */
export const RENDER_TYPE_KEYS = ['partial', 'template', 'layout'] as const;

export type RenderTypeKey = (typeof RENDER_TYPE_KEYS)[number];

export type RenderType = RenderTypeKey | 'renderable';

/**
 * Option keys the extractor understands. Any other key rejects the call.
 */
export const KNOWN_OPTION_KEYS: ReadonlySet<string> = new Set([
  'partial',
  'template',
  'layout',
  'formats',
  'locals',
  'object',
  'collection',
  'as',
  'status',
  'content_type',
  'location',
  'spacer_template'
]);
