import type { ImportFromNode, ImportNode } from "../../ast/types";
import { RULE_DESCRIPTORS } from "../../rules";
import { NodeKindRule } from "../node-kind-rule";
import type { Emit } from "../rule";

/** Standard-library modules removed or superseded (imp -> importlib, optparse -> argparse) */
export const DEPRECATED_MODULES: ReadonlySet<string> = new Set(["imp", "optparse"]);

/**
 * DEPR_001: import of a deprecated module.
 *
 * `import imp, optparse` reports each name; `from optparse import X` reports
 * once. Matching is on the full dotted name, so `import imp.util` is clean.
 */
export class DeprecatedImportRule extends NodeKindRule<"import-statement" | "import-from-statement"> {
  readonly descriptor = RULE_DESCRIPTORS.DEPR_001;
  protected readonly kinds = ["import-statement", "import-from-statement"] as const;

  protected inspect(node: ImportNode | ImportFromNode, emit: Emit): void {
    if (node.kind === "import-statement") {
      for (const module of node.modules) {
        if (DEPRECATED_MODULES.has(module)) {
          emit(`Deprecated module '${module}' used`, node.line);
        }
      }
      return;
    }

    if (node.module !== null && DEPRECATED_MODULES.has(node.module)) {
      emit(`Deprecated module '${node.module}' used`, node.line);
    }
  }
}
