import type { RejectionReason } from './extractor/constants';
import type { Inflector } from './inflector';
import { englishInflector } from './inflector';

/**
 * Describes an invocation the extractor refused to interpret.
 */
export type RejectedInvocation = {
  /**
   * Source file name the invocation belongs to.
   */
  name: string;

  /**
   * Invoked method name (the group key, e.g. `"render"`).
   */
  methodName: string;

  /**
   * Zero-based position of the call site within its method group.
   */
  index: number;

  reason: RejectionReason;
};

export type ExtractorOptions = {
  /**
   * Inflection used for object renders (`render(@post)` -> `posts/post`).
   * @default englishInflector
   */
  inflector?: Inflector;

  /**
   * Called once per rejected invocation, in processing order.
   *
   * Rejections never throw; this hook is the only way to observe them.
   */
  onRejectedInvocation?: (info: RejectedInvocation) => void;
};

export type ResolvedExtractorOptions = {
  inflector: Inflector;
  onRejectedInvocation: ((info: RejectedInvocation) => void) | undefined;
};

export type LocateOptions = {
  /**
   * Callee names treated as render calls, matched against plain identifiers
   * (`render(...)`) and member properties (`view.render(...)`).
   * @default ['render']
   */
  renderMethodNames?: readonly string[];
};

export type ParseOptions = {
  /**
   * Parse as an ES module (allows `import`/`export`).
   * @default true
   */
  module?: boolean;

  /**
   * Enable JSX syntax.
   * @default false
   */
  jsx?: boolean;
};

export type CollectOptions = ExtractorOptions & LocateOptions & ParseOptions;

export const DEFAULT_RENDER_METHOD_NAMES: readonly string[] = ['render'];

/**
 * Validates extractor options and fills defaults.
 *
 * @throws Error if a custom inflector lacks `pluralize` or `singularize`.
 */
export function resolveExtractorOptions(
  options: ExtractorOptions = {}
): ResolvedExtractorOptions {
  const inflector = options.inflector ?? englishInflector;

  if (
    typeof inflector.pluralize !== 'function' ||
    typeof inflector.singularize !== 'function'
  ) {
    throw new Error(
      `[RenderDependencies] Invalid inflector: Expected "pluralize" and "singularize" functions.`
    );
  }

  return {
    inflector,
    onRejectedInvocation: options.onRejectedInvocation
  };
}

/**
 * Validates the render method name list.
 *
 * @throws Error if the list is empty or contains an empty name.
 */
export function resolveRenderMethodNames(
  options: LocateOptions = {}
): ReadonlySet<string> {
  const names = options.renderMethodNames ?? DEFAULT_RENDER_METHOD_NAMES;

  if (names.length === 0) {
    throw new Error(
      `[RenderDependencies] Invalid renderMethodNames: The list is empty. ` +
        `It must name at least one render method.`
    );
  }

  if (names.some(name => name.length === 0)) {
    throw new Error(
      `[RenderDependencies] Invalid renderMethodNames: Method names must be non-empty.`
    );
  }

  return new Set(names);
}
