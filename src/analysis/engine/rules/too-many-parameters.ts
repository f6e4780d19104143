import type { FunctionDefinitionNode } from "../../ast/types";
import { RULE_DESCRIPTORS } from "../../rules";
import { NodeKindRule } from "../node-kind-rule";
import type { Emit } from "../rule";

export const MAX_PARAMETERS = 5;

/**
 * MAINT_002: more than five ordinary positional parameters.
 * `self`/`cls` count; positional-only, keyword-only and star parameters don't.
 * Coroutines (`async def`) are not checked.
 */
export class TooManyParametersRule extends NodeKindRule<"function-definition"> {
  readonly descriptor = RULE_DESCRIPTORS.MAINT_002;
  protected readonly kinds = ["function-definition"] as const;

  protected inspect(node: FunctionDefinitionNode, emit: Emit): void {
    if (node.isAsync) return;

    const count = node.parameters.filter((param) => param.kind === "positional").length;
    if (count > MAX_PARAMETERS) {
      emit(`Function '${node.name}' has too many parameters (${count})`, node.line);
    }
  }
}
