// src/compliance/index.ts
// Public surface of the compliance engine.

export type {
  AutomatedCondition,
  ChecklistSource,
  CompiledChecklist,
  ComplianceEngineInput,
  ComplianceReport,
  ComplianceStatus,
  FactStore,
  PassCondition,
  PassConditionKind,
  RawRuleDict,
  Rule,
  RuleSeverity,
  SectionDefinition,
  SectionResult,
  Verdict,
  VerdictStatus,
} from "./types";
export { PASS_CONDITION_KINDS } from "./types";

export { InvalidChecklistError } from "./errors";
export { lookupFact, factToText, isMissingFact, NOT_FOUND_SENTINEL } from "./facts";
export { checkCondition, TRUTHY_TOKENS } from "./evaluators";
export { evaluateRule, evaluateRules } from "./evaluator";
export { parsePassCondition, TOTAL_SECTION_WEIGHT } from "./normalize";
export { compileChecklist, compileCustomChecklist } from "./compiler";
export { BUILTIN_CHECKLIST, BUILTIN_FACT_KEYS } from "./builtinChecklist";
export {
  aggregateSection,
  aggregateReport,
  statusForScore,
  PARTIAL_CREDIT,
  STATUS_THRESHOLDS,
  SUMMARY_RATIO_THRESHOLD,
} from "./aggregate";
export { evaluateCompliance, type EvaluateComplianceInput } from "./engine";
export {
  computeReportId,
  toChecklistRows,
  compareReports,
  type ChecklistRow,
  type ReportDiff,
} from "./report";
