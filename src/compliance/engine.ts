// src/compliance/engine.ts
// Compliance engine orchestrator
//
// Main entry point for evaluating a site's extracted facts against a checklist.
// Synchronous and stateless: nothing is shared between calls except the frozen
// built-in checklist.
//
// Flow:
// 1. Resolve the checklist (precompiled, custom rules, or built-in)
// 2. Evaluate every rule once against the Fact Store
// 3. Aggregate verdicts per section, in section order
// 4. Aggregate sections into score, status and summary
// 5. Stamp a content-addressed report id and the generation time

import type {
  CompiledChecklist,
  ComplianceEngineInput,
  ComplianceReport,
  SectionResult,
} from "./types";
import { compileChecklist } from "./compiler";
import { evaluateRules } from "./evaluator";
import { aggregateReport, aggregateSection } from "./aggregate";
import { computeReportId } from "./report";
import { createLogger } from "../observability/logger";

const log = createLogger("compliance/engine");

export interface EvaluateComplianceInput extends ComplianceEngineInput {
  /** Already-compiled checklist; takes precedence over `rules` */
  checklist?: CompiledChecklist;
}

/**
 * Run a full compliance evaluation.
 *
 * @throws InvalidChecklistError when `rules` is given and structurally invalid
 */
export function evaluateCompliance(input: EvaluateComplianceInput): ComplianceReport {
  const checklist = input.checklist ?? compileChecklist(input.rules);
  const now = input.now ?? (() => new Date());

  if (checklist.warnings.length > 0) {
    log.warn(
      { source: checklist.source, warnings: checklist.warnings },
      "checklist compiled with warnings"
    );
  }

  const verdicts = evaluateRules(checklist.rules, input.facts);

  const sections: SectionResult[] = checklist.sections.map((section) =>
    aggregateSection(
      section.name,
      checklist.rules.filter((rule) => rule.section === section.name),
      verdicts,
      section.weight
    )
  );

  const { overallScore, status, summary } = aggregateReport(sections);

  const content = {
    overallScore,
    status,
    sections: Object.freeze(sections),
    summary,
    checklistSource: checklist.source,
    warnings: checklist.warnings,
  };

  const report: ComplianceReport = Object.freeze({
    reportId: computeReportId(content),
    ...content,
    generatedAt: now().toISOString(),
  });

  log.debug(
    {
      reportId: report.reportId,
      source: checklist.source,
      rules: checklist.rules.length,
      overallScore,
      status,
    },
    "compliance evaluation finished"
  );

  return report;
}
