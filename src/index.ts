/**
 * pyreview: rule-based static analysis for Python sources.
 */

// Core types
export type { Diagnostic, Severity } from "./analysis/diagnostic";
export { createDiagnostic, groupByFile } from "./analysis/diagnostic";
export type { RuleId, RuleDescriptor } from "./analysis/rules";
export { RULE_DESCRIPTORS } from "./analysis/rules";
export { ParseError, ConfigError } from "./errors";

// Parsing
export type * from "./analysis/ast/types";
export { isNodeOfKind, countNodes } from "./analysis/ast/types";
export { PythonParser, pythonParser, parsePython } from "./analysis/ast/python";
export type { ParseOptions } from "./analysis/ast/python";

// Rule engine
export { TreeRule, TextRule, runTreeRules } from "./analysis/engine/rule";
export type { Emit, TreeVisitor } from "./analysis/engine/rule";
export { NodeKindRule } from "./analysis/engine/node-kind-rule";
export * from "./analysis/engine/rules";
export { createTextRules, createTreeRules, getRuleDescriptors } from "./analysis/engine/registry";
export type { TreeRuleFactory, TextRuleFactory } from "./analysis/engine/registry";

// Analysis
export { analyzeFile, analyzeFileDetailed, analyzeSource } from "./analysis/analyzer";
export type { FileAnalysisOptions, FileAnalysisResult } from "./analysis/analyzer";
export { collectPythonFiles, isPythonFile } from "./analysis/discovery";
export type { DiscoveryOptions } from "./analysis/discovery";
export { scanPath } from "./analysis/orchestration";
export type { ScanOptions, ScanResult } from "./analysis/orchestration";

// Reporting and config
export { ReportSink } from "./report/sink";
export { serializeReport, toReportEntry, writeReport } from "./report/json";
export type { ReportEntry } from "./report/json";
export { loadConfig, loadConfigFile, loadConfigFromString, createDefaultConfig, CONFIG_FILE_NAME } from "./config/loader";
export type { LoadedConfig } from "./config/loader";
export type { PyreviewConfig } from "./config/schema";
