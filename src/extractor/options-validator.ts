import type { RenderType, StageResult } from './constants';
import {
  KNOWN_OPTION_KEYS,
  RENDERABLE,
  RENDER_TYPE_KEYS,
  accepted,
  rejected
} from './constants';
import type { OptionsMapping } from './normalize-arguments';

/**
 * Options Validator.
 *
 * Checks, in order:
 * 1. Unknown keys
 *    Any key outside {@link KNOWN_OPTION_KEYS} signals a usage the extractor
 *    cannot reason about. Fail closed: `unknown-option`.
 * 2. Render type
 *    The first of `partial`, `template`, `layout` present wins. Lower-priority
 *    keys stay in the mapping (a `layout` next to `partial` is read later as a
 *    companion).
 *    Without any of them: `missing-render-type`. The {@link RENDERABLE}
 *    marker passes the key check but never selects a render type, so a bare
 *    class reference (`render(Card.new)`) contributes nothing.
 *
 * @returns
 *   The selected render type, or a rejection.
 */
export function validateRenderOptions(
  options: OptionsMapping
): StageResult<RenderType> {
  for (const key of options.keys()) {
    if (key !== RENDERABLE && !KNOWN_OPTION_KEYS.has(key)) {
      return rejected('unknown-option');
    }
  }

  const renderTypeKey = RENDER_TYPE_KEYS.find(key => options.has(key));
  if (renderTypeKey !== undefined) {
    return accepted(renderTypeKey);
  }

  return rejected('missing-render-type');
}
