/**
 * Rule contracts.
 *
 * A tree rule never walks the tree itself. It hands the walker a visitor,
 * and the walker feeds that visitor every node in pre-order. A visitor that
 * needs per-subtree state (such as nesting depth) returns a new visitor for
 * the node's children; one without state returns itself. That lets every
 * rule for a file share a single traversal while still reading as an
 * independent recursive check.
 */

import { createDiagnostic, Diagnostic } from "../diagnostic";
import type { RuleDescriptor } from "../rules";
import type { SyntaxNode, SyntaxTree } from "../ast/types";

/**
 * Reports one finding for the rule that owns it.
 */
export type Emit = (message: string, line: number) => void;

export interface TreeVisitor {
  /**
   * Visit a node and return the visitor its children should see.
   */
  enter(node: SyntaxNode): TreeVisitor;
}

/**
 * A check that runs over a parsed syntax tree.
 *
 * Instances are created per file and keep nothing but the path they report
 * against, so they can be discarded as soon as the file is done.
 */
export abstract class TreeRule {
  abstract readonly descriptor: RuleDescriptor;

  constructor(readonly filePath: string) {}

  /**
   * Build the visitor for the tree's root node.
   */
  abstract createVisitor(emit: Emit): TreeVisitor;

  run(tree: SyntaxTree): Diagnostic[] {
    return runTreeRules([this], tree);
  }
}

/**
 * A check that only needs the file's raw text. Runs whether or not the
 * file parses.
 */
export abstract class TextRule {
  abstract readonly descriptor: RuleDescriptor;

  constructor(readonly filePath: string) {}

  abstract check(source: string): Diagnostic[];

  protected diagnostic(message: string, line: number): Diagnostic {
    return createDiagnostic({ file: this.filePath, ...ruleIdentity(this.descriptor), message, line });
  }
}

function ruleIdentity(descriptor: RuleDescriptor): Pick<Diagnostic, "ruleId" | "category" | "severity"> {
  return {
    ruleId: descriptor.ruleId,
    category: descriptor.category,
    severity: descriptor.severity,
  };
}

/**
 * Run several tree rules over one tree in a single pre-order walk.
 *
 * The result is each rule's diagnostics, in rule order, each in the order
 * its visitor emitted them. It is identical to concatenating `rule.run(tree)`
 * for every rule.
 */
export function runTreeRules(rules: readonly TreeRule[], tree: SyntaxTree): Diagnostic[] {
  const sinks: Diagnostic[][] = rules.map(() => []);

  const visitors = rules.map((rule, index) => {
    const sink = sinks[index];
    const identity = ruleIdentity(rule.descriptor);
    const emit: Emit = (message, line) => {
      sink.push(createDiagnostic({ file: rule.filePath, ...identity, message, line }));
    };
    return rule.createVisitor(emit);
  });

  walk(tree.root, visitors);

  return sinks.flat();
}

function walk(node: SyntaxNode, visitors: readonly TreeVisitor[]): void {
  const next = visitors.map((visitor) => visitor.enter(node));
  for (const child of node.children) {
    walk(child, next);
  }
}
