export {
  analyzeRenderInvocation,
  extractRenderDependencies
} from './extractor/index';
export type { RenderAnalysis } from './extractor/index';

export {
  KNOWN_OPTION_KEYS,
  RENDERABLE,
  RENDER_TYPE_KEYS
} from './extractor/constants';
export type {
  RejectionReason,
  RenderType,
  RenderTypeKey,
  StageRejection,
  StageResult,
  StageSuccess
} from './extractor/constants';

export {
  normalizeRenderArguments,
  parseOptionsMapping
} from './extractor/normalize-arguments';
export type { OptionKey, OptionsMapping } from './extractor/normalize-arguments';
export { validateRenderOptions } from './extractor/options-validator';
export {
  resolvePathDirectory,
  resolveTemplate,
  sourceDirectory
} from './extractor/template-resolver';
export type {
  ResolveContext,
  ResolvedTemplate
} from './extractor/template-resolver';
export { toVirtualPath } from './extractor/virtual-path';

export {
  collectRenderDependencies,
  locateRenderInvocations,
  parseViewSource,
  readStaticString,
  toSyntaxNode
} from './estree/index';

export { englishInflector } from './inflector';
export type { Inflector } from './inflector';

export {
  DEFAULT_RENDER_METHOD_NAMES,
  resolveExtractorOptions,
  resolveRenderMethodNames
} from './options';
export type {
  CollectOptions,
  ExtractorOptions,
  LocateOptions,
  ParseOptions,
  RejectedInvocation,
  ResolvedExtractorOptions
} from './options';

export { describeRejection, formatRejectedInvocation } from './report';

export * from './syntax/nodes';
