/**
 * The value type every rule reports.
 */

import type { RuleId } from "./rules";

export type Severity = "LOW" | "MEDIUM" | "HIGH";

/**
 * One finding. Frozen once created and holds no reference into the syntax tree.
 */
export interface Diagnostic {
  readonly file: string;
  readonly ruleId: RuleId;
  readonly category: string;
  readonly severity: Severity;
  readonly message: string;
  /** 1-based line the finding points at */
  readonly line: number;
}

export function createDiagnostic(fields: Diagnostic): Diagnostic {
  if (!Number.isInteger(fields.line) || fields.line < 1) {
    throw new RangeError(`Diagnostic line must be a positive integer, got ${fields.line}`);
  }

  return Object.freeze({
    file: fields.file,
    ruleId: fields.ruleId,
    category: fields.category,
    severity: fields.severity,
    message: fields.message,
    line: fields.line,
  });
}

/**
 * Group diagnostics by file, keeping each file's internal order.
 */
export function groupByFile(diagnostics: readonly Diagnostic[]): Map<string, Diagnostic[]> {
  const byFile = new Map<string, Diagnostic[]>();
  for (const diagnostic of diagnostics) {
    const list = byFile.get(diagnostic.file) || [];
    list.push(diagnostic);
    byFile.set(diagnostic.file, list);
  }
  return byFile;
}
