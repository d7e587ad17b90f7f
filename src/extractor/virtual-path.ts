import type { RenderType } from './constants';

const FINAL_SEGMENT = /(\/|^)([^/]*)$/;

/**
 * Maps a resolved template path to its dependency identifier.
 *
 * Partials and layouts live in underscore-prefixed files, so the final path
 * segment gains a leading `_`:
 *
 *   toVirtualPath('partial', 'app/views/posts/form') -> 'app/views/posts/_form'
 *   toVirtualPath('layout', 'bar')                   -> '_bar'
 *   toVirtualPath('template', 'posts/show')          -> 'posts/show'
 *   toVirtualPath('renderable', 'CardComponent')     -> 'CardComponent'
 *
 * The pattern is anchored to the whole string, not to lines: in a name that
 * contains a newline the underscore goes before the segment after the last
 * `/` (`'a/b\nc/d'` -> `'a/b\nc/_d'`).
 */
export function toVirtualPath(renderType: RenderType, path: string): string {
  if (renderType === 'partial' || renderType === 'layout') {
    return path.replace(FINAL_SEGMENT, '$1_$2');
  }
  return path;
}
