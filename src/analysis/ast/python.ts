/**
 * Python parser adapter using tree-sitter.
 *
 * Tree-sitter never fails outright: it recovers from syntax errors by
 * inserting ERROR and MISSING nodes. The adapter turns any such tree, and
 * any Python 2 form the grammar still accepts, into a ParseError so rules
 * only ever see valid Python 3. It then converts the concrete syntax tree
 * into the statement-level model in ./types.
 *
 * Handles: .py
 */

import Parser from "tree-sitter";
import Python from "tree-sitter-python";

import { ParseError } from "../../errors";
import type {
  ClassDefinitionNode,
  FunctionDefinitionNode,
  ImportFromNode,
  ImportNode,
  Parameter,
  ParameterKind,
  SyntaxNode,
  SyntaxTree,
} from "./types";

// ============================================================================
// Grammar Constants
// ============================================================================

/** Node types that are statements in tree-sitter-python */
const STATEMENT_TYPES = new Set([
  "future_import_statement",
  "import_statement",
  "import_from_statement",
  "print_statement",
  "assert_statement",
  "expression_statement",
  "return_statement",
  "delete_statement",
  "raise_statement",
  "pass_statement",
  "break_statement",
  "continue_statement",
  "global_statement",
  "nonlocal_statement",
  "exec_statement",
  "type_alias_statement",
  "if_statement",
  "for_statement",
  "while_statement",
  "try_statement",
  "with_statement",
  "match_statement",
  "function_definition",
  "class_definition",
  "decorated_definition",
]);

/** Nodes whose extent ends with a nested body */
const BODY_BEARING_TYPES = new Set([
  "block",
  "if_statement",
  "elif_clause",
  "else_clause",
  "for_statement",
  "while_statement",
  "try_statement",
  "except_clause",
  "except_group_clause",
  "finally_clause",
  "with_statement",
  "match_statement",
  "case_clause",
  "function_definition",
  "class_definition",
  "decorated_definition",
]);

/** Large inputs are fed to tree-sitter in chunks of this many characters */
const INPUT_CHUNK_SIZE = 16 * 1024;

const BYTE_ORDER_MARK = "\uFEFF";

export interface ParseOptions {
  /** Abort parsing after this many milliseconds; 0 or absent means no limit */
  timeoutMs?: number;
}

// ============================================================================
// Parser Implementation
// ============================================================================

export class PythonParser {
  private parser: Parser;

  constructor() {
    this.parser = new Parser();
    this.parser.setLanguage(Python);
  }

  canParse(filePath: string): boolean {
    return filePath.toLowerCase().endsWith(".py");
  }

  /**
   * Parse Python source into a SyntaxTree.
   *
   * @throws ParseError when the source is not valid Python or parsing timed out
   */
  parse(source: string, options: ParseOptions = {}): SyntaxTree {
    const content = source.startsWith(BYTE_ORDER_MARK) ? source.slice(1) : source;

    this.parser.setTimeoutMicros(Math.max(0, options.timeoutMs ?? 0) * 1000);
    let tree: Parser.Tree | undefined;
    try {
      tree = this.parser.parse((index: number) => content.slice(index, index + INPUT_CHUNK_SIZE));
    } finally {
      // A halted parse would otherwise be resumed by the next call
      this.parser.reset();
    }

    if (!tree) {
      throw new ParseError(`Parsing timed out after ${options.timeoutMs}ms`, 1, 1);
    }

    const rootNode = tree.rootNode;
    if (rootNode.hasError) {
      const errorNode = findFirstError(rootNode) ?? rootNode;
      throw new ParseError(
        errorNode.isMissing ? `Missing "${errorNode.type}"` : "Invalid syntax",
        errorNode.startPosition.row + 1,
        errorNode.startPosition.column + 1
      );
    }

    const unsupported = findUnsupportedSyntax(tree, content);
    if (unsupported) {
      throw new ParseError(
        unsupported.message,
        unsupported.node.startPosition.row + 1,
        unsupported.node.startPosition.column + 1
      );
    }

    return {
      root: {
        kind: "module",
        line: 1,
        children: this.convertStatements(rootNode, content),
      },
    };
  }

  // ==========================================================================
  // Tree-sitter Helper Methods
  // ==========================================================================

  private getNodeText(node: Parser.SyntaxNode, content: string): string {
    return content.slice(node.startIndex, node.endIndex);
  }

  private getLineNumber(node: Parser.SyntaxNode): number {
    return node.startPosition.row + 1; // tree-sitter is 0-indexed
  }

  private hasAsyncKeyword(node: Parser.SyntaxNode): boolean {
    return node.children.some((child) => child.type === "async");
  }

  /**
   * Last line holding code that belongs to the node. Trailing comments can be
   * swallowed into a block's extent, so descend through bodies instead of
   * trusting the node's own end position.
   */
  private getEndLine(node: Parser.SyntaxNode): number {
    const children = node.namedChildren.filter((child) => child.type !== "comment");
    const last = children[children.length - 1];

    if (last && BODY_BEARING_TYPES.has(node.type)) {
      return Math.max(this.getLineNumber(node), this.getEndLine(last));
    }
    return node.endPosition.row + 1;
  }

  // ==========================================================================
  // Conversion
  // ==========================================================================

  /**
   * Collect the statements nested anywhere under a node, without crossing
   * into the statements themselves.
   */
  private convertStatements(node: Parser.SyntaxNode | null, content: string): SyntaxNode[] {
    if (!node) return [];

    const results: SyntaxNode[] = [];
    for (const child of node.namedChildren) {
      if (STATEMENT_TYPES.has(child.type)) {
        results.push(this.convertStatement(child, content));
      } else {
        results.push(...this.convertStatements(child, content));
      }
    }
    return results;
  }

  private convertStatement(node: Parser.SyntaxNode, content: string): SyntaxNode {
    const line = this.getLineNumber(node);

    switch (node.type) {
      case "decorated_definition": {
        const definition = node.childForFieldName("definition");
        if (definition) {
          return this.convertStatement(definition, content);
        }
        break;
      }

      case "function_definition":
        return this.convertFunction(node, content);

      case "class_definition":
        return this.convertClass(node, content);

      case "if_statement":
        return {
          kind: "if-statement",
          line,
          children: [
            ...this.convertStatements(node.childForFieldName("consequence"), content),
            ...this.convertAlternatives(node.childrenForFieldName("alternative"), content),
          ],
        };

      case "for_statement":
        return {
          kind: "for-statement",
          line,
          isAsync: this.hasAsyncKeyword(node),
          children: [
            ...this.convertStatements(node.childForFieldName("body"), content),
            ...this.convertStatements(node.childForFieldName("alternative"), content),
          ],
        };

      case "while_statement":
        return {
          kind: "while-statement",
          line,
          children: [
            ...this.convertStatements(node.childForFieldName("body"), content),
            ...this.convertStatements(node.childForFieldName("alternative"), content),
          ],
        };

      case "import_statement":
        return this.convertImport(node, content);

      case "import_from_statement":
      case "future_import_statement":
        return this.convertImportFrom(node, content);
    }

    return {
      kind: "statement",
      statementType: node.type,
      line,
      children: this.convertStatements(node, content),
    };
  }

  /**
   * `elif` is an `if` nested in the previous branch's else arm, and the
   * trailing `else` belongs to the last `elif`. Mirroring that keeps nesting
   * depth the same as Python's own grammar reports it.
   */
  private convertAlternatives(alternatives: Parser.SyntaxNode[], content: string): SyntaxNode[] {
    const [first, ...rest] = alternatives;
    if (!first) return [];

    if (first.type === "elif_clause") {
      return [
        {
          kind: "if-statement",
          line: this.getLineNumber(first),
          children: [
            ...this.convertStatements(first.childForFieldName("consequence"), content),
            ...this.convertAlternatives(rest, content),
          ],
        },
      ];
    }

    return this.convertStatements(first, content);
  }

  private convertFunction(node: Parser.SyntaxNode, content: string): FunctionDefinitionNode {
    const nameNode = node.childForFieldName("name");

    return {
      kind: "function-definition",
      name: nameNode ? this.getNodeText(nameNode, content) : "<anonymous>",
      line: this.getLineNumber(node),
      endLine: this.getEndLine(node),
      isAsync: this.hasAsyncKeyword(node),
      parameters: this.convertParameters(node.childForFieldName("parameters"), content),
      children: this.convertStatements(node.childForFieldName("body"), content),
    };
  }

  private convertClass(node: Parser.SyntaxNode, content: string): ClassDefinitionNode {
    const nameNode = node.childForFieldName("name");

    return {
      kind: "class-definition",
      name: nameNode ? this.getNodeText(nameNode, content) : "<anonymous>",
      line: this.getLineNumber(node),
      children: this.convertStatements(node.childForFieldName("body"), content),
    };
  }

  /**
   * Classify each parameter the way Python binds it: everything before `/`
   * is positional-only, everything after `*` or `*args` is keyword-only.
   */
  private convertParameters(node: Parser.SyntaxNode | null, content: string): Parameter[] {
    if (!node) return [];

    const declared: { name: string; kind: ParameterKind }[] = [];
    let keywordOnly = false;

    for (const child of node.namedChildren) {
      switch (child.type) {
        case "positional_separator":
          for (const param of declared) {
            if (param.kind === "positional") param.kind = "positional-only";
          }
          break;

        case "keyword_separator":
          keywordOnly = true;
          break;

        case "comment":
          break;

        default: {
          const param = this.describeParameter(child, content);
          if (!param) break;

          if (param.kind === "variadic") {
            keywordOnly = true;
          } else if (param.kind === "positional" && keywordOnly) {
            param.kind = "keyword-only";
          }
          declared.push(param);
        }
      }
    }

    return declared;
  }

  private describeParameter(
    node: Parser.SyntaxNode,
    content: string
  ): { name: string; kind: ParameterKind } | null {
    switch (node.type) {
      case "identifier":
        return { name: this.getNodeText(node, content), kind: "positional" };

      case "list_splat_pattern":
      case "dictionary_splat_pattern": {
        const inner = node.namedChildren.find((child) => child.type === "identifier");
        return {
          name: inner ? this.getNodeText(inner, content) : "",
          kind: node.type === "list_splat_pattern" ? "variadic" : "variadic-keyword",
        };
      }

      case "default_parameter":
      case "typed_default_parameter": {
        const nameNode = node.childForFieldName("name");
        return nameNode ? this.describeParameter(nameNode, content) : null;
      }

      case "typed_parameter": {
        // `x: int`, `*args: int` and `**kw: int` all land here
        const inner = node.namedChildren.find((child) => child.type !== "type");
        return inner ? this.describeParameter(inner, content) : null;
      }

      default:
        return null;
    }
  }

  private convertImport(node: Parser.SyntaxNode, content: string): ImportNode {
    const modules: string[] = [];

    for (const nameNode of node.childrenForFieldName("name")) {
      const dotted = nameNode.type === "aliased_import" ? nameNode.childForFieldName("name") : nameNode;
      if (dotted) {
        modules.push(this.dottedName(dotted, content));
      }
    }

    return {
      kind: "import-statement",
      line: this.getLineNumber(node),
      modules,
      children: [],
    };
  }

  private convertImportFrom(node: Parser.SyntaxNode, content: string): ImportFromNode {
    const line = this.getLineNumber(node);

    if (node.type === "future_import_statement") {
      return { kind: "import-from-statement", line, module: "__future__", children: [] };
    }

    const moduleNode = node.childForFieldName("module_name");
    let module: string | null = null;

    if (moduleNode?.type === "relative_import") {
      // Leading dots are dropped: `from .optparse import x` names optparse
      const dotted = moduleNode.namedChildren.find((child) => child.type === "dotted_name");
      module = dotted ? this.dottedName(dotted, content) : null;
    } else if (moduleNode) {
      module = this.dottedName(moduleNode, content);
    }

    return { kind: "import-from-statement", line, module, children: [] };
  }

  private dottedName(node: Parser.SyntaxNode, content: string): string {
    if (node.type !== "dotted_name") {
      return this.getNodeText(node, content);
    }
    return node.namedChildren
      .filter((child) => child.type === "identifier")
      .map((child) => this.getNodeText(child, content))
      .join(".");
  }
}

function findFirstError(node: Parser.SyntaxNode): Parser.SyntaxNode | null {
  if (node.type === "ERROR" || node.isMissing) {
    return node;
  }
  for (const child of node.children) {
    if (child.hasError || child.isMissing) {
      const found = findFirstError(child);
      if (found) return found;
    }
  }
  return null;
}

// ============================================================================
// Python 3 Conformance
// ============================================================================

interface UnsupportedSyntax {
  node: Parser.SyntaxNode;
  message: string;
}

/** Node types checkNode has something to say about */
const CHECKED_TYPES = new Set([
  "print_statement",
  "exec_statement",
  "except_clause",
  "<>",
  "string_start",
  "integer",
  "parameters",
  "lambda_parameters",
]);

/** Splat parameters end the run of positional parameters */
const STAR_PARAMETER_TYPES = new Set(["list_splat_pattern", "dictionary_splat_pattern", "keyword_separator"]);

/**
 * The grammar is a superset of Python 3: it still parses several Python 2
 * forms without an ERROR node. Find the first of them in document order.
 */
function findUnsupportedSyntax(tree: Parser.Tree, content: string): UnsupportedSyntax | null {
  // A cursor visits anonymous tokens too and only materializes checked nodes
  const cursor = tree.walk();

  for (;;) {
    if (CHECKED_TYPES.has(cursor.nodeType)) {
      const found = checkNode(cursor.currentNode, content);
      if (found) return found;
    }

    if (cursor.gotoFirstChild()) continue;
    while (!cursor.gotoNextSibling()) {
      if (!cursor.gotoParent()) return null;
    }
  }
}

function checkNode(node: Parser.SyntaxNode, content: string): UnsupportedSyntax | null {
  switch (node.type) {
    case "print_statement":
      // `print >>f, x` is also a valid Python 3 tuple expression
      if (node.namedChildren.some((child) => child.type === "chevron")) return null;
      return { node, message: "Python 2 print statement" };

    case "exec_statement":
      return { node, message: "Python 2 exec statement" };

    case "except_clause":
      // `except E, e:`; Python 3 needs parentheses around a tuple of types
      return node.children.some((child) => child.type === "," || child.type === "expression_list")
        ? { node, message: "Python 2 except clause" }
        : null;

    case "<>":
      return { node, message: "Python 2 inequality operator" };

    case "string_start":
      return content.slice(node.startIndex, node.endIndex).includes("`")
        ? { node, message: "Python 2 backtick expression" }
        : null;

    case "integer": {
      const text = content.slice(node.startIndex, node.endIndex);
      if (/[lL]$/.test(text)) {
        return { node, message: "Python 2 long integer literal" };
      }
      if (/^0[\d_]*$/.test(text) && /[1-9]/.test(text)) {
        return { node, message: "Leading zeros in decimal integer literal" };
      }
      return null;
    }

    case "parameters":
    case "lambda_parameters":
      return checkParameters(node);

    default:
      return null;
  }
}

function checkParameters(node: Parser.SyntaxNode): UnsupportedSyntax | null {
  let seenDefault = false;

  for (const child of node.namedChildren) {
    const inner = child.type === "typed_parameter" ? child.namedChildren[0] : child;
    const name =
      child.type === "default_parameter" || child.type === "typed_default_parameter"
        ? child.childForFieldName("name")
        : inner;

    if (name?.type === "tuple_pattern") {
      return { node: child, message: "Python 2 tuple parameter" };
    }
    if (inner && STAR_PARAMETER_TYPES.has(inner.type)) {
      return null;
    }

    switch (child.type) {
      case "default_parameter":
      case "typed_default_parameter":
        seenDefault = true;
        break;
      case "identifier":
      case "typed_parameter":
        if (seenDefault) {
          return { node: child, message: "Non-default parameter follows default parameter" };
        }
        break;
    }
  }
  return null;
}

/**
 * Create and export a singleton instance for convenience.
 */
export const pythonParser = new PythonParser();

export function parsePython(source: string, options: ParseOptions = {}): SyntaxTree {
  return pythonParser.parse(source, options);
}
