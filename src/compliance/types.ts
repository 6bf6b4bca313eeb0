// src/compliance/types.ts
// Compliance engine: type definitions
//
// Rule and pass-condition model, verdicts, section/report results, and the
// untrusted raw rule shape produced by the upstream checklist parser.

/* ============= Fact Store ============= */

/**
 * Facts extracted about one site (AI-extracted fields + crawled content).
 * Keys are either flat ("vat_number") or reached by dotted path
 * ("policies.refund.url"). Values may be any JSON-ish shape.
 */
export type FactStore = Readonly<Record<string, unknown>>;

/* ============= Pass Conditions ============= */

export type PassCondition =
  | { readonly kind: "not_empty" }
  | { readonly kind: "equals"; readonly value: string }
  | { readonly kind: "matches"; readonly pattern: string; readonly flags: string }
  | { readonly kind: "one_of"; readonly values: readonly string[] }
  | { readonly kind: "min_length"; readonly length: number }
  | { readonly kind: "boolean_true" }
  | { readonly kind: "manual" };

export type PassConditionKind = PassCondition["kind"];

/** Conditions the engine can decide from facts alone */
export type AutomatedCondition = Exclude<PassCondition, { kind: "manual" }>;

export const PASS_CONDITION_KINDS: readonly PassConditionKind[] = [
  "not_empty",
  "equals",
  "matches",
  "one_of",
  "min_length",
  "boolean_true",
  "manual",
];

/* ============= Rules ============= */

/**
 * How an unmet condition affects the report.
 * - fail: verdict "fail", no credit
 * - warning: verdict "warning", partial credit
 * - info: verdict "warning", partial credit, ignored when deciding status
 */
export type RuleSeverity = "fail" | "warning" | "info";

export interface Rule {
  /** Unique within a compiled checklist */
  readonly ruleId: string;
  readonly section: string;
  /** Short human label, e.g. "VAT number" */
  readonly item: string;
  readonly description: string;
  /** Key or dotted path into the Fact Store */
  readonly extractionKey: string;
  readonly passCondition: PassCondition;
  readonly severity: RuleSeverity;
  /** Relative weight inside its section (>= 0) */
  readonly weight: number;
  /** Set when the compiler coerced an unusable pass condition to not_empty */
  readonly downgradeNote: string | null;
}

export interface SectionDefinition {
  readonly name: string;
  /** Share of the 100-point total */
  readonly weight: number;
}

export type ChecklistSource = "builtin" | "custom";

export interface CompiledChecklist {
  readonly source: ChecklistSource;
  readonly sections: readonly SectionDefinition[];
  readonly rules: readonly Rule[];
  readonly warnings: readonly string[];
}

/**
 * A rule as it arrives from the checklist parser. Nothing about it is trusted:
 * every field is validated and defaulted by the compiler.
 */
export interface RawRuleDict {
  rule_id?: unknown;
  section?: unknown;
  section_weight?: unknown;
  item?: unknown;
  description?: unknown;
  extraction_key?: unknown;
  /** Instruction the upstream extractor used; informational only */
  extraction_prompt?: unknown;
  pass_condition?: unknown;
  severity?: unknown;
  weight?: unknown;
}

/* ============= Verdicts & Results ============= */

export type VerdictStatus = "pass" | "fail" | "warning" | "manual_review";

export interface Verdict {
  readonly ruleId: string;
  readonly item: string;
  readonly severity: RuleSeverity;
  readonly status: VerdictStatus;
  /** Textual form of the fact that was checked, null when not found */
  readonly foundValue: string | null;
  /** Null for pass verdicts, never empty otherwise */
  readonly recommendation: string | null;
}

export interface SectionResult {
  readonly sectionName: string;
  /** Verdicts in rule-definition order */
  readonly items: readonly Verdict[];
  /** 0..sectionWeight */
  readonly sectionScore: number;
  readonly sectionWeight: number;
  /** sectionScore with info-severity verdicts counted as passing */
  readonly gatingScore: number;
}

export type ComplianceStatus = "COMPLIANT" | "NEEDS_REVIEW" | "NON_COMPLIANT";

export interface ComplianceReport {
  /** rpt_ + content hash; identical inputs give identical ids */
  readonly reportId: string;
  /** Integer 0-100 */
  readonly overallScore: number;
  readonly status: ComplianceStatus;
  readonly sections: readonly SectionResult[];
  readonly summary: string;
  readonly checklistSource: ChecklistSource;
  /** Compiler warnings for the checklist that produced this report */
  readonly warnings: readonly string[];
  /** ISO timestamp; the only field that varies between identical runs */
  readonly generatedAt: string;
}

/* ============= Engine I/O ============= */

export interface ComplianceEngineInput {
  facts: FactStore;
  /** Parsed custom checklist; omitted or empty means the built-in checklist */
  rules?: readonly unknown[];
  /** Clock for generatedAt */
  now?: () => Date;
}
