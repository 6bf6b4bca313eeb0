// src/compliance/aggregate.ts
// Section and report aggregation
//
// Pure functions. Section score = sectionWeight * weighted pass credit / total
// rule weight; the report score is the rounded sum of section scores.

import type {
  ComplianceStatus,
  Rule,
  SectionResult,
  Verdict,
  VerdictStatus,
} from "./types";

/* ============= Scoring Constants ============= */

/** Credit for verdicts that are uncertain rather than proven failing */
export const PARTIAL_CREDIT = 0.5;

export const PASS_CREDIT: Readonly<Record<VerdictStatus, number>> = {
  pass: 1,
  warning: PARTIAL_CREDIT,
  manual_review: PARTIAL_CREDIT,
  fail: 0,
};

/** Fixed so scores stay comparable across runs */
export const STATUS_THRESHOLDS = Object.freeze({
  compliant: 80,
  needsReview: 50,
});

/** Sections scoring below this share of their weight are named in the summary */
export const SUMMARY_RATIO_THRESHOLD = 0.6;
export const SUMMARY_MAX_SECTIONS = 3;

export const FULL_COMPLIANCE_SUMMARY = "All checklist sections meet the compliance threshold.";

/* ============= Helpers ============= */

/** NaN clamps to min */
function clamp(value: number, min: number, max: number): number {
  if (Number.isNaN(value)) return min;
  return Math.min(max, Math.max(min, value));
}

function usableWeight(weight: number): number {
  return Number.isFinite(weight) && weight > 0 ? weight : 0;
}

/* ============= Section Aggregator ============= */

/**
 * Score one section from its rules and their verdicts.
 * Items keep rule order. A rule with no verdict earns no credit.
 * A section whose rules weigh nothing scores its full weight.
 */
export function aggregateSection(
  sectionName: string,
  rules: readonly Rule[],
  verdicts: readonly Verdict[],
  sectionWeight: number
): SectionResult {
  const weightCap = usableWeight(sectionWeight);
  const verdictsById = new Map(verdicts.map((verdict) => [verdict.ruleId, verdict]));

  const items: Verdict[] = [];
  let totalWeight = 0;
  let earned = 0;
  let gatingEarned = 0;

  for (const rule of rules) {
    const weight = usableWeight(rule.weight);
    totalWeight += weight;

    const verdict = verdictsById.get(rule.ruleId);
    if (!verdict) continue;
    items.push(verdict);

    const credit = PASS_CREDIT[verdict.status];
    earned += weight * credit;
    // info verdicts never pull the status down
    gatingEarned += weight * (verdict.severity === "info" ? 1 : credit);
  }

  const score = (credit: number) =>
    totalWeight > 0 ? clamp(weightCap * (credit / totalWeight), 0, weightCap) : weightCap;

  return Object.freeze({
    sectionName,
    items: Object.freeze(items),
    sectionScore: score(earned),
    sectionWeight: weightCap,
    gatingScore: score(gatingEarned),
  });
}

/* ============= Score Aggregator ============= */

export function statusForScore(score: number): ComplianceStatus {
  if (score >= STATUS_THRESHOLDS.compliant) return "COMPLIANT";
  if (score >= STATUS_THRESHOLDS.needsReview) return "NEEDS_REVIEW";
  return "NON_COMPLIANT";
}

function toReportScore(total: number): number {
  return clamp(Math.round(total), 0, 100);
}

/**
 * One sentence naming the weakest sections (ratio below the threshold),
 * lowest first, at most three. Zero-weight sections are not rated.
 */
export function buildSummary(sections: readonly SectionResult[]): string {
  const weakest = sections
    .map((section, index) => ({
      name: section.sectionName,
      ratio: section.sectionWeight > 0 ? section.sectionScore / section.sectionWeight : 1,
      index,
      rated: section.sectionWeight > 0,
    }))
    .filter((entry) => entry.rated && entry.ratio < SUMMARY_RATIO_THRESHOLD)
    .sort((a, b) => a.ratio - b.ratio || a.index - b.index)
    .slice(0, SUMMARY_MAX_SECTIONS);

  if (weakest.length === 0) return FULL_COMPLIANCE_SUMMARY;

  const listed = weakest.map((entry) => `${entry.name} (${Math.round(entry.ratio * 100)}%)`);
  return `Compliance gaps found in: ${listed.join(", ")}.`;
}

export interface ReportAggregate {
  overallScore: number;
  status: ComplianceStatus;
  summary: string;
}

/**
 * Combine section results into the overall 0-100 score, status and summary.
 * Status is decided on the gating score, which ignores info-severity misses.
 */
export function aggregateReport(sections: readonly SectionResult[]): ReportAggregate {
  const overallScore = toReportScore(
    sections.reduce((sum, section) => sum + section.sectionScore, 0)
  );
  const gatingScore = toReportScore(
    sections.reduce((sum, section) => sum + section.gatingScore, 0)
  );

  return {
    overallScore,
    status: statusForScore(gatingScore),
    summary: buildSummary(sections),
  };
}
