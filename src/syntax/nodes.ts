/**
 * Syntax node contract consumed by the render dependency extractor.
 *
 * The extractor never sees a parser's native tree. Adapters (see
 * `src/estree`) translate their nodes into this closed union, and every
 * decision point in the extractor matches on `kind`.
 *
 * Capability map
 * --------------
 * | kind                 | capability                          |
 * | -------------------- | ----------------------------------- |
 * | `string`             | string literal, `value` unwrapped   |
 * | `symbol`             | symbol literal / static label       |
 * | `mapping`            | mapping literal, ordered `entries`  |
 * | `call`               | method call, `methodName`           |
 * | `class-reference`    | renderable class, `className`       |
 * | `variable-reference` | variable, `name` (sigils kept)      |
 * | `bare-call`          | bare identifier call, `name`        |
 * | `opaque`             | anything else (no capability)       |
 */

export type StringNode = {
  kind: 'string';
  value: string;
};

export type SymbolNode = {
  kind: 'symbol';
  name: string;
};

export type MappingEntry = {
  key: SyntaxNode;
  value: SyntaxNode;
};

export type MappingNode = {
  kind: 'mapping';
  entries: readonly MappingEntry[];
};

export type CallNode = {
  kind: 'call';
  methodName: string;
};

export type ClassReferenceNode = {
  kind: 'class-reference';
  className: string;
};

export type VariableReferenceNode = {
  kind: 'variable-reference';
  /**
   * Variable name as written, including any sigil (e.g. `@post`, `$stdout`).
   */
  name: string;
};

export type BareCallNode = {
  kind: 'bare-call';
  name: string;
};

export type OpaqueNode = {
  kind: 'opaque';
  /**
   * Free-form description of the source construct (diagnostics only).
   */
  label?: string;
};

export type SyntaxNode =
  | StringNode
  | SymbolNode
  | MappingNode
  | CallNode
  | ClassReferenceNode
  | VariableReferenceNode
  | BareCallNode
  | OpaqueNode;

export type SyntaxNodeKind = SyntaxNode['kind'];

/**
 * A single render call site: the invoked method and its positional arguments.
 */
export type RenderInvocation = {
  methodName: string;
  arguments: readonly SyntaxNode[];
};

/**
 * Render call sites grouped by invoked method name.
 *
 * Map iteration order is the processing order; each list is in source order.
 */
export type InvocationGroups = ReadonlyMap<
  string,
  readonly RenderInvocation[]
>;

// Builders

export function stringNode(value: string): StringNode {
  return { kind: 'string', value };
}

export function symbolNode(name: string): SymbolNode {
  return { kind: 'symbol', name };
}

export function mappingNode(entries: readonly MappingEntry[]): MappingNode {
  return { kind: 'mapping', entries };
}

export function callNode(methodName: string): CallNode {
  return { kind: 'call', methodName };
}

export function classReferenceNode(className: string): ClassReferenceNode {
  return { kind: 'class-reference', className };
}

export function variableReferenceNode(name: string): VariableReferenceNode {
  return { kind: 'variable-reference', name };
}

export function bareCallNode(name: string): BareCallNode {
  return { kind: 'bare-call', name };
}

export function opaqueNode(label?: string): OpaqueNode {
  return label === undefined ? { kind: 'opaque' } : { kind: 'opaque', label };
}

/**
 * Builds a mapping literal whose keys are all symbol literals.
 *
 * Shorthand for the common `render(partial: ..., locals: ...)` shape.
 *
 * @example
 *   symbolMapping({ partial: stringNode('form') })
 */
export function symbolMapping(
  entries: Readonly<Record<string, SyntaxNode>>
): MappingNode {
  return mappingNode(
    Object.entries(entries).map(([key, value]) => ({
      key: symbolNode(key),
      value
    }))
  );
}

// Guards

export function isStringNode(node: SyntaxNode): node is StringNode {
  return node.kind === 'string';
}

export function isSymbolNode(node: SyntaxNode): node is SymbolNode {
  return node.kind === 'symbol';
}

export function isMappingNode(node: SyntaxNode): node is MappingNode {
  return node.kind === 'mapping';
}

export function isClassReferenceNode(
  node: SyntaxNode
): node is ClassReferenceNode {
  return node.kind === 'class-reference';
}

/**
 * Exhaustiveness guard for `switch (node.kind)`.
 *
 * Reaching it at runtime means the node provider produced a `kind` outside
 * the union, which is a defect in the provider rather than a render shape to
 * reject.
 */
export function assertNeverNode(node: never): never {
  throw new Error(
    `[RenderDependencies] Unsupported syntax node: ${JSON.stringify(node)}.`
  );
}
