/**
 * Rule identities for the reviewer.
 *
 * Each rule carries a fixed (rule id, category, severity) triple that is
 * copied verbatim onto every diagnostic it emits.
 * DO NOT rename existing IDs - reports are consumed by other tools.
 */

import type { Severity } from "./diagnostic";

export type RuleId =
  // Maintainability
  | "MAINT_001"
  | "MAINT_002"
  // Deprecated APIs
  | "DEPR_001"
  // Code smells
  | "SMELL_001"
  // Organization
  | "ORG_001";

export interface RuleDescriptor {
  readonly ruleId: RuleId;
  readonly category: string;
  readonly severity: Severity;
  /** Short human-readable summary, shown by `pyreview --list-rules` */
  readonly summary: string;
}

export const RULE_DESCRIPTORS: Readonly<Record<RuleId, RuleDescriptor>> = Object.freeze({
  MAINT_001: {
    ruleId: "MAINT_001",
    category: "Maintainability",
    severity: "MEDIUM",
    summary: "Function body spans more than 50 lines",
  },
  MAINT_002: {
    ruleId: "MAINT_002",
    category: "Maintainability",
    severity: "MEDIUM",
    summary: "Function declares more than 5 positional parameters",
  },
  DEPR_001: {
    ruleId: "DEPR_001",
    category: "Deprecated",
    severity: "HIGH",
    summary: "Import of a deprecated standard-library module (imp, optparse)",
  },
  SMELL_001: {
    ruleId: "SMELL_001",
    category: "Code Smell",
    severity: "MEDIUM",
    summary: "if/for/while nested more than 3 levels deep",
  },
  ORG_001: {
    ruleId: "ORG_001",
    category: "Organization",
    severity: "MEDIUM",
    summary: "File longer than 500 lines",
  },
} satisfies Record<RuleId, RuleDescriptor>);
