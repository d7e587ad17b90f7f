import path from 'node:path';

import type { SyntaxNode } from '../syntax/nodes';
import { assertNeverNode } from '../syntax/nodes';
import type { Inflector } from '../inflector';

import type { RenderType, StageResult } from './constants';
import { RENDERABLE, accepted, rejected } from './constants';
import type { OptionKey, OptionsMapping } from './normalize-arguments';

export type ResolveContext = {
  /**
   * Directory of the source file; bare literal names resolve against it.
   */
  directory: string;
  inflector: Inflector;
};

export type ResolvedTemplate = {
  renderType: RenderType;

  /**
   * Static template path (before the partial/layout underscore convention).
   */
  template: string;

  /**
   * `true` when the target was a dynamic expression (`render(@post)`) and the
   * path was guessed through inflection.
   */
  isObjectTemplate: boolean;

  /**
   * Local variable an object/collection render exposes to the partial
   * (`as:` value, or the partial's base name). `null` for plain renders.
   */
  localName: string | null;
};

const LEADING_SIGIL = /^(?:\$|@{1,2})/;
const LOCAL_NAME_FROM_BASENAME = /^_?(.*?)(?:\.\w+)*$/;

/**
 * Returns the directory of a source file name, as used for relative
 * template lookups.
 *
 *   sourceDirectory('app/views/posts/index.html') -> 'app/views/posts'
 *   sourceDirectory('index.html')                 -> '.'
 */
export function sourceDirectory(name: string): string {
  return path.posix.dirname(name);
}

/**
 * Resolves a literal template name against the current directory.
 * Names containing a `/` are taken as given.
 */
export function resolvePathDirectory(
  templatePath: string,
  directory: string
): string {
  return templatePath.includes('/')
    ? templatePath
    : `${directory}/${templatePath}`;
}

/**
 * Derives the base name of a dynamic render target.
 *
 * | node                 | base name                 |
 * | -------------------- | ------------------------- |
 * | `variable-reference` | name without `$`/`@`/`@@` |
 * | `bare-call`          | identifier                |
 * | `call`               | method name               |
 * | anything else        | `null` (not dynamic)      |
 */
function dynamicBaseName(node: SyntaxNode): string | null {
  switch (node.kind) {
    case 'variable-reference':
      return node.name.replace(LEADING_SIGIL, '');
    case 'bare-call':
      return node.name;
    case 'call':
      return node.methodName;
    case 'string':
    case 'symbol':
    case 'mapping':
    case 'class-reference':
    case 'opaque':
      return null;
    default:
      return assertNeverNode(node);
  }
}

/**
 * Reads a string or symbol literal (`as: "item"` / `as: :item`).
 */
function literalName(node: SyntaxNode | undefined): string | null {
  if (node?.kind === 'string') return node.value;
  if (node?.kind === 'symbol') return node.name;
  return null;
}

/**
 * Computes the local variable name of an object/collection render.
 *
 * - `as` given: its string or symbol value (`null` when it is neither).
 * - Otherwise: the final path segment without a leading `_` and without
 *   trailing extensions (`posts/_post.html.erb` -> `post`).
 */
function localNameFor(
  options: OptionsMapping,
  template: string
): string | null {
  if (options.has('as')) {
    return literalName(options.get('as'));
  }

  const match = LOCAL_NAME_FROM_BASENAME.exec(path.posix.basename(template));
  return match?.[1] ?? null;
}

type TemplateTarget = {
  template: string;
  isObjectTemplate: boolean;
};

/**
 * Determines the static template path of the selected render target.
 *
 * 1. String literal:    resolved against the current directory.
 * 2. Renderable class:  the class name.
 * 3. Dynamic target:    `<plural(base)>/<singular(base)>`, flagged as an
 *                       object template.
 * 4. Anything else:     `unresolvable-template`.
 *
 * An empty literal still resolves (`""` -> `app/views/posts/`); only a
 * dynamic target whose base name is empty rejects.
 */
function resolveTarget(
  node: SyntaxNode,
  renderType: RenderType,
  context: ResolveContext
): StageResult<TemplateTarget> {
  if (node.kind === 'string') {
    return accepted({
      template: resolvePathDirectory(node.value, context.directory),
      isObjectTemplate: false
    });
  }

  if (renderType === 'renderable') {
    if (node.kind !== 'class-reference') {
      return rejected('unresolvable-template');
    }
    return accepted({ template: node.className, isObjectTemplate: false });
  }

  const dependency = dynamicBaseName(node);
  if (!dependency) {
    return rejected('unresolvable-template');
  }

  const { pluralize, singularize } = context.inflector;
  return accepted({
    template: `${pluralize(dependency)}/${singularize(dependency)}`,
    isObjectTemplate: true
  });
}

/**
 * Template Path Resolver.
 *
 * Resolves the target of the selected render type, then applies the
 * object/collection rules:
 *
 * - `object` and `collection` together: `object-and-collection`.
 * - `object`, `collection` or an object template requires an explicit
 *   `partial` key (`template:`/`layout:` cannot take an implicit object):
 *   `missing-partial-key`.
 * - When those rules apply, the local variable name is computed and exposed
 *   on the result. It does not contribute a dependency.
 *
 * @param options
 *   Validated options of the invocation.
 * @param renderType
 *   Render type selected by the validator.
 * @param context
 *   Current directory and inflector.
 */
export function resolveTemplate(
  options: OptionsMapping,
  renderType: RenderType,
  context: ResolveContext
): StageResult<ResolvedTemplate> {
  const key: OptionKey = renderType === 'renderable' ? RENDERABLE : renderType;
  const node = options.get(key);

  // The validator only selects render types whose key is present.
  if (node === undefined) {
    return rejected('missing-render-type');
  }

  const target = resolveTarget(node, renderType, context);
  if (!target.success) return target;

  const { template, isObjectTemplate } = target.value;

  const hasObject = options.has('object');
  const hasCollection = options.has('collection');

  if (!hasObject && !hasCollection && !isObjectTemplate) {
    return accepted({ renderType, template, isObjectTemplate, localName: null });
  }

  if (hasObject && hasCollection) {
    return rejected('object-and-collection');
  }

  if (!options.has('partial')) {
    return rejected('missing-partial-key');
  }

  return accepted({
    renderType,
    template,
    isObjectTemplate,
    localName: localNameFor(options, template)
  });
}
