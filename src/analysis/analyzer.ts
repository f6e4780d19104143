/**
 * File analyzer: runs every registered rule over one Python file.
 *
 * Never throws. An unreadable file yields no diagnostics, a file that does
 * not parse yields only the text-rule results, and a rule that blows up is
 * logged and dropped for that file.
 */

import * as fs from "fs";

import { logger } from "../logger";
import { ParseError } from "../errors";
import { parsePython } from "./ast/python";
import { countNodes, SyntaxTree } from "./ast/types";
import type { Diagnostic } from "./diagnostic";
import { runTreeRules } from "./engine/rule";
import { createTextRules, createTreeRules } from "./engine/registry";

export interface FileAnalysisOptions {
  /** Per-file parse budget in milliseconds; 0 or absent means no limit */
  parseTimeoutMs?: number;
}

/**
 * Result of analyzing a single file.
 */
export interface FileAnalysisResult {
  /** The file path that was analyzed */
  filePath: string;
  /** Whether parsing succeeded (tree rules only ran if it did) */
  parseSuccess: boolean;
  /** Parse error message if parsing failed */
  parseError?: string;
  /** Text-rule diagnostics first, then tree-rule diagnostics in registry order */
  diagnostics: Diagnostic[];
  /** Time taken for analysis in milliseconds */
  analysisTimeMs: number;
}

/**
 * Analyze in-memory source as if it were the file at `filePath`.
 */
export function analyzeSource(
  source: string,
  filePath: string,
  options: FileAnalysisOptions = {}
): FileAnalysisResult {
  const startTime = Date.now();
  const diagnostics: Diagnostic[] = [];

  for (const rule of createTextRules(filePath)) {
    diagnostics.push(...runGuarded(rule.descriptor.ruleId, filePath, () => rule.check(source)));
  }

  let tree: SyntaxTree;
  try {
    tree = parsePython(source, { timeoutMs: options.parseTimeoutMs });
  } catch (error) {
    // Malformed files are skipped for tree rules without a diagnostic
    if (!(error instanceof ParseError)) {
      logger.error("Unexpected parser failure", { file: filePath, error: describeError(error) });
    }
    return {
      filePath,
      parseSuccess: false,
      parseError: describeError(error),
      diagnostics,
      analysisTimeMs: Date.now() - startTime,
    };
  }

  const parsed = tree;
  const rules = createTreeRules(filePath);
  diagnostics.push(...runGuarded("tree rules", filePath, () => runTreeRules(rules, parsed)));

  logger.debug("Analyzed file", {
    file: filePath,
    nodes: countNodes(parsed.root),
    diagnostics: diagnostics.length,
  });

  return {
    filePath,
    parseSuccess: true,
    diagnostics,
    analysisTimeMs: Date.now() - startTime,
  };
}

/**
 * Read a file from disk and analyze it.
 *
 * @returns Null when the file cannot be read
 */
export function analyzeFileDetailed(filePath: string, options: FileAnalysisOptions = {}): FileAnalysisResult | null {
  let source: string;
  try {
    source = fs.readFileSync(filePath, "utf-8");
  } catch (error) {
    logger.warn("Skipping unreadable file", { file: filePath, error: describeError(error) });
    return null;
  }

  return analyzeSource(source, filePath, options);
}

/**
 * Analyze one file and return its diagnostics. Never throws.
 */
export function analyzeFile(filePath: string, options: FileAnalysisOptions = {}): Diagnostic[] {
  return analyzeFileDetailed(filePath, options)?.diagnostics ?? [];
}

function runGuarded(label: string, filePath: string, run: () => Diagnostic[]): Diagnostic[] {
  try {
    return run();
  } catch (error) {
    logger.error(`Rule failure (${label}), results dropped for this file`, {
      file: filePath,
      error: describeError(error),
    });
    return [];
  }
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
