/**
 * JSON report format.
 *
 * A bare array of findings with exactly these keys, in this order. No
 * envelope and no schema version: existing consumers read the array directly.
 */

import * as fs from "fs";
import * as path from "path";

import type { Diagnostic, Severity } from "../analysis/diagnostic";

export interface ReportEntry {
  file: string;
  rule_id: string;
  category: string;
  severity: Severity;
  message: string;
  line: number;
}

export function toReportEntry(diagnostic: Diagnostic): ReportEntry {
  return {
    file: diagnostic.file,
    rule_id: diagnostic.ruleId,
    category: diagnostic.category,
    severity: diagnostic.severity,
    message: diagnostic.message,
    line: diagnostic.line,
  };
}

export function serializeReport(diagnostics: readonly Diagnostic[]): string {
  return `${JSON.stringify(diagnostics.map(toReportEntry), null, 2)}\n`;
}

/**
 * Write the report, creating the parent directory if needed.
 */
export function writeReport(outputPath: string, diagnostics: readonly Diagnostic[]): void {
  fs.mkdirSync(path.dirname(path.resolve(outputPath)), { recursive: true });
  fs.writeFileSync(outputPath, serializeReport(diagnostics), "utf-8");
}
