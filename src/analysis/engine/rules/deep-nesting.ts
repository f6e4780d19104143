import type { NodeKind, SyntaxNode } from "../../ast/types";
import { RULE_DESCRIPTORS } from "../../rules";
import { Emit, TreeRule, TreeVisitor } from "../rule";

export const MAX_NESTING_DEPTH = 3;

const NESTING_KINDS: ReadonlySet<NodeKind> = new Set(["if-statement", "for-statement", "while-statement"]);

export interface NestingStep {
  /** Depth the node's children are visited at */
  depth: number;
  /** Whether the node itself sits deeper than allowed */
  tooDeep: boolean;
}

/**
 * Nesting depth after entering `node` from a parent at `depth`.
 * Only if/for/while add a level (`async for` does not); every other node
 * passes depth through.
 */
export function enterNesting(node: SyntaxNode, depth: number, maxDepth = MAX_NESTING_DEPTH): NestingStep {
  if (!NESTING_KINDS.has(node.kind) || (node.kind === "for-statement" && node.isAsync)) {
    return { depth, tooDeep: false };
  }
  const inner = depth + 1;
  return { depth: inner, tooDeep: inner > maxDepth };
}

/**
 * SMELL_001: if/for/while nested more than three deep.
 *
 * Depth is per path, not cumulative across siblings, and it is threaded
 * through functions, classes, try and with blocks, so a fourth level inside
 * a method body is still found.
 */
export class DeepNestingRule extends TreeRule {
  readonly descriptor = RULE_DESCRIPTORS.SMELL_001;

  createVisitor(emit: Emit): TreeVisitor {
    const visitors = new Map<number, TreeVisitor>();

    const atDepth = (depth: number): TreeVisitor => {
      const existing = visitors.get(depth);
      if (existing) return existing;

      const visitor: TreeVisitor = {
        enter: (node) => {
          const step = enterNesting(node, depth);
          if (step.tooDeep) {
            emit("Deep nesting detected", node.line);
          }
          return atDepth(step.depth);
        },
      };
      visitors.set(depth, visitor);
      return visitor;
    };

    return atDepth(0);
  }
}
