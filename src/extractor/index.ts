import type {
  InvocationGroups,
  RenderInvocation,
  SyntaxNode
} from '../syntax/nodes';
import type { ExtractorOptions, ResolvedExtractorOptions } from '../options';
import { resolveExtractorOptions } from '../options';

import type { StageResult } from './constants';
import { accepted } from './constants';
import type { OptionsMapping } from './normalize-arguments';
import { normalizeRenderArguments } from './normalize-arguments';
import { validateRenderOptions } from './options-validator';
import type { ResolveContext, ResolvedTemplate } from './template-resolver';
import {
  resolvePathDirectory,
  resolveTemplate,
  sourceDirectory
} from './template-resolver';
import { toVirtualPath } from './virtual-path';

/**
 * Everything the extractor learned about one accepted invocation.
 */
export type RenderAnalysis = ResolvedTemplate & {
  /**
   * Dependency identifiers in emission order: spacer, primary, layout.
   */
  dependencies: string[];
};

function stringValue(node: SyntaxNode | undefined): string | null {
  return node?.kind === 'string' ? node.value : null;
}

/**
 * Spacer partial rendered between collection items.
 * Only string literals count; it resolves against the current directory.
 */
function spacerDependency(
  options: OptionsMapping,
  directory: string
): string | null {
  const spacer = stringValue(options.get('spacer_template'));
  if (spacer === null) return null;

  return toVirtualPath('partial', resolvePathDirectory(spacer, directory));
}

/**
 * Layout wrapped around a partial or template (`render partial:, layout:`).
 *
 * Only string literals count. The literal is used as written: unlike the
 * primary target, it is not resolved against the current directory.
 */
function layoutDependency(
  options: OptionsMapping,
  resolved: ResolvedTemplate
): string | null {
  if (resolved.renderType === 'layout') return null;

  const layout = stringValue(options.get('layout'));
  if (layout === null) return null;

  return toVirtualPath('layout', layout);
}

function analyzeWithContext(
  invocation: RenderInvocation,
  context: ResolveContext
): StageResult<RenderAnalysis> {
  // 1. Normalize positional shorthand / parse the options mapping.
  const normalized = normalizeRenderArguments(invocation.arguments);
  if (!normalized.success) return normalized;
  const options = normalized.value;

  // 2. Validate keys and select the render type.
  const renderType = validateRenderOptions(options);
  if (!renderType.success) return renderType;

  // 3. Resolve the template path (+ object/collection rules).
  const resolved = resolveTemplate(options, renderType.value, context);
  if (!resolved.success) return resolved;

  // 4. Emit spacer, primary, layout.
  const dependencies: string[] = [];

  const spacer = spacerDependency(options, context.directory);
  if (spacer !== null) dependencies.push(spacer);

  dependencies.push(
    toVirtualPath(resolved.value.renderType, resolved.value.template)
  );

  const layout = layoutDependency(options, resolved.value);
  if (layout !== null) dependencies.push(layout);

  return accepted({ ...resolved.value, dependencies });
}

function createContext(
  name: string,
  options: ResolvedExtractorOptions
): ResolveContext {
  if (typeof name !== 'string') {
    throw new Error(
      `[RenderDependencies] Invalid source name: Expected a string, got ${typeof name}.`
    );
  }
  return { directory: sourceDirectory(name), inflector: options.inflector };
}

/**
 * Analyzes a single render invocation.
 *
 * Pipeline: normalize arguments -> validate options -> resolve template ->
 * build virtual paths. The first stage that rejects ends the analysis.
 *
 * @param name
 *   Source file name; its directory anchors bare template names.
 * @param invocation
 *   The call site to analyze.
 * @returns
 *   The analysis, or the first stage rejection.
 */
export function analyzeRenderInvocation(
  name: string,
  invocation: RenderInvocation,
  options: ExtractorOptions = {}
): StageResult<RenderAnalysis> {
  const context = createContext(name, resolveExtractorOptions(options));
  return analyzeWithContext(invocation, context);
}

/**
 * Invocation Aggregator.
 *
 * Runs every invocation of every method group, in order, and flattens the
 * accepted dependencies into one list.
 *
 * Contract
 * --------
 * - Order: groups in map order, invocations in list order, and within one
 *   invocation spacer -> primary -> layout.
 * - Duplicates are kept.
 * - A rejected invocation contributes nothing and is reported through
 *   `options.onRejectedInvocation`. Rejection never throws.
 * - Pure and synchronous: the same input yields the same output.
 *
 * @example
 *   extractRenderDependencies('app/views/posts/index.html', new Map([
 *     ['render', [{ methodName: 'render', arguments: [stringNode('form')] }]]
 *   ]));
 *   // -> ['app/views/posts/_form']
 */
export function extractRenderDependencies(
  name: string,
  groups: InvocationGroups,
  options: ExtractorOptions = {}
): string[] {
  const resolvedOptions = resolveExtractorOptions(options);
  const context = createContext(name, resolvedOptions);
  const dependencies: string[] = [];

  for (const [methodName, invocations] of groups) {
    for (const [index, invocation] of invocations.entries()) {
      const analysis = analyzeWithContext(invocation, context);

      if (!analysis.success) {
        resolvedOptions.onRejectedInvocation?.({
          name,
          methodName,
          index,
          reason: analysis.reason
        });
        continue;
      }

      dependencies.push(...analysis.value.dependencies);
    }
  }

  return dependencies;
}
