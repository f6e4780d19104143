/**
 * Rule registry.
 *
 * The fixed, ordered catalogue of rules run against every file. Built once
 * at module load and never mutated. Adding a rule means appending its
 * factory here; the file analyzer only knows the TreeRule/TextRule contracts.
 */

import type { RuleDescriptor } from "../rules";
import type { TextRule, TreeRule } from "./rule";
import {
  DeepNestingRule,
  DeprecatedImportRule,
  LargeFileRule,
  LongFunctionRule,
  TooManyParametersRule,
} from "./rules";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type TreeRuleFactory = (filePath: string) => TreeRule;
export type TextRuleFactory = (filePath: string) => TextRule;

// ---------------------------------------------------------------------------
// Registered rules, in report order
// ---------------------------------------------------------------------------

const TEXT_RULES: readonly TextRuleFactory[] = Object.freeze([
  (filePath: string) => new LargeFileRule(filePath),
]);

const TREE_RULES: readonly TreeRuleFactory[] = Object.freeze([
  (filePath: string) => new LongFunctionRule(filePath),
  (filePath: string) => new DeprecatedImportRule(filePath),
  (filePath: string) => new TooManyParametersRule(filePath),
  (filePath: string) => new DeepNestingRule(filePath),
]);

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Fresh instances of every text rule, bound to one file.
 */
export function createTextRules(filePath: string): TextRule[] {
  return TEXT_RULES.map((create) => create(filePath));
}

/**
 * Fresh instances of every tree rule, bound to one file.
 */
export function createTreeRules(filePath: string): TreeRule[] {
  return TREE_RULES.map((create) => create(filePath));
}

/**
 * Descriptors of every registered rule: text rules first, then tree rules,
 * which is also the order their diagnostics appear in for a file.
 */
export function getRuleDescriptors(): RuleDescriptor[] {
  return [...createTextRules(""), ...createTreeRules("")].map((rule) => rule.descriptor);
}
