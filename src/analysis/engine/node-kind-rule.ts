import { isNodeOfKind, NodeKind, NodeOfKind } from "../ast/types";
import { Emit, TreeRule, TreeVisitor } from "./rule";

/**
 * Base for rules that look at every node of some kinds, once each, in
 * pre-order, and report when a per-node predicate holds.
 */
export abstract class NodeKindRule<K extends NodeKind> extends TreeRule {
  protected abstract readonly kinds: readonly K[];

  protected abstract inspect(node: NodeOfKind<K>, emit: Emit): void;

  createVisitor(emit: Emit): TreeVisitor {
    const visitor: TreeVisitor = {
      enter: (node) => {
        if (isNodeOfKind(node, this.kinds)) {
          this.inspect(node, emit);
        }
        return visitor;
      },
    };
    return visitor;
  }
}
