import type { FunctionDefinitionNode } from "../../ast/types";
import { RULE_DESCRIPTORS } from "../../rules";
import { NodeKindRule } from "../node-kind-rule";
import type { Emit } from "../rule";

/** Longest allowed distance between a function's first and last line */
export const MAX_FUNCTION_LINES = 50;

/**
 * MAINT_001: function whose last line is more than 50 lines past its `def`.
 * Nested functions and methods are checked too; `async def` is not.
 */
export class LongFunctionRule extends NodeKindRule<"function-definition"> {
  readonly descriptor = RULE_DESCRIPTORS.MAINT_001;
  protected readonly kinds = ["function-definition"] as const;

  protected inspect(node: FunctionDefinitionNode, emit: Emit): void {
    if (node.isAsync) return;

    const length = node.endLine - node.line;
    if (length > MAX_FUNCTION_LINES) {
      emit(`Function '${node.name}' too long (${length} lines)`, node.line);
    }
  }
}
