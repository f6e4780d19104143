/**
 * Read-only syntax tree model the rules run against.
 *
 * The parser adapter converts tree-sitter's concrete syntax tree into this
 * shape. Only statements are modelled: expressions, comments and decorators
 * are dropped. Parents own their children and there are no back-edges, so
 * rules can also be exercised on hand-built subtrees.
 */

export type NodeKind =
  | "module"
  | "function-definition"
  | "class-definition"
  | "if-statement"
  | "for-statement"
  | "while-statement"
  | "import-statement"
  | "import-from-statement"
  | "statement";

interface BaseNode {
  readonly kind: NodeKind;
  /** 1-based line on which the construct begins */
  readonly line: number;
  readonly children: readonly SyntaxNode[];
}

export interface ModuleNode extends BaseNode {
  readonly kind: "module";
}

/**
 * How a parameter binds, in Python's terms.
 * `def f(a, /, b, *args, c, **kwargs)` declares a positional-only `a`,
 * a positional `b`, variadic `args`, keyword-only `c` and variadic-keyword `kwargs`.
 */
export type ParameterKind =
  | "positional-only"
  | "positional"
  | "variadic"
  | "keyword-only"
  | "variadic-keyword";

export interface Parameter {
  readonly name: string;
  readonly kind: ParameterKind;
}

export interface FunctionDefinitionNode extends BaseNode {
  readonly kind: "function-definition";
  readonly name: string;
  /** Last line of the body; always >= line */
  readonly endLine: number;
  readonly isAsync: boolean;
  readonly parameters: readonly Parameter[];
}

export interface ClassDefinitionNode extends BaseNode {
  readonly kind: "class-definition";
  readonly name: string;
}

export interface IfStatementNode extends BaseNode {
  readonly kind: "if-statement";
}

export interface ForStatementNode extends BaseNode {
  readonly kind: "for-statement";
  readonly isAsync: boolean;
}

export interface WhileStatementNode extends BaseNode {
  readonly kind: "while-statement";
}

export interface ImportNode extends BaseNode {
  readonly kind: "import-statement";
  /** Dotted module names in source order, aliases dropped */
  readonly modules: readonly string[];
}

export interface ImportFromNode extends BaseNode {
  readonly kind: "import-from-statement";
  /** Dotted module name without leading dots; null for `from . import x` */
  readonly module: string | null;
}

/**
 * Any other statement. `statementType` is the grammar's name for it
 * (e.g. "try_statement", "expression_statement").
 */
export interface StatementNode extends BaseNode {
  readonly kind: "statement";
  readonly statementType: string;
}

export type SyntaxNode =
  | ModuleNode
  | FunctionDefinitionNode
  | ClassDefinitionNode
  | IfStatementNode
  | ForStatementNode
  | WhileStatementNode
  | ImportNode
  | ImportFromNode
  | StatementNode;

export type NodeOfKind<K extends NodeKind> = Extract<SyntaxNode, { kind: K }>;

export interface SyntaxTree {
  readonly root: ModuleNode;
}

export function isNodeOfKind<K extends NodeKind>(
  node: SyntaxNode,
  kinds: readonly K[]
): node is NodeOfKind<K> {
  return kinds.some((kind) => kind === node.kind);
}

/**
 * Count nodes in a subtree (root included).
 */
export function countNodes(node: SyntaxNode): number {
  let total = 1;
  for (const child of node.children) {
    total += countNodes(child);
  }
  return total;
}
