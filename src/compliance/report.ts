// src/compliance/report.ts
// Report utilities: content-addressed ids, flat checklist rows, report diffs

import { createHash } from "node:crypto";
import type {
  ComplianceReport,
  ComplianceStatus,
  RuleSeverity,
  SectionResult,
  VerdictStatus,
} from "./types";

/* ============= Report ID ============= */

const REPORT_ID_PREFIX = "rpt_";
const REPORT_ID_HASH_LENGTH = 16;

function sha256Hex(data: string): string {
  return createHash("sha256").update(data).digest("hex");
}

/**
 * Derive the report id from everything except generatedAt, so that
 * re-evaluating the same checklist and facts yields the same id.
 */
export function computeReportId(content: Omit<ComplianceReport, "reportId" | "generatedAt">): string {
  const canonical = JSON.stringify({
    checklistSource: content.checklistSource,
    overallScore: content.overallScore,
    status: content.status,
    summary: content.summary,
    warnings: content.warnings,
    sections: content.sections,
  });
  return REPORT_ID_PREFIX + sha256Hex(canonical).slice(0, REPORT_ID_HASH_LENGTH);
}

/* ============= Checklist Rows ============= */

/** One line of the flat checklist returned to API clients and the document renderer */
export interface ChecklistRow {
  section: string;
  item: string;
  ruleId: string;
  status: VerdictStatus;
  foundValue: string | null;
  recommendation: string | null;
}

export function toChecklistRows(report: ComplianceReport): ChecklistRow[] {
  return report.sections.flatMap((section) =>
    section.items.map((verdict) => ({
      section: section.sectionName,
      item: verdict.item,
      ruleId: verdict.ruleId,
      status: verdict.status,
      foundValue: verdict.foundValue,
      recommendation: verdict.recommendation,
    }))
  );
}

/* ============= Report Comparison ============= */

const STATUS_ORDER: Record<VerdictStatus, number> = {
  pass: 0,
  warning: 1,
  manual_review: 1,
  fail: 2,
};

export interface ReportIssue {
  ruleId: string;
  item: string;
  section: string;
  from: VerdictStatus | null;
  to: VerdictStatus;
  severity: RuleSeverity;
}

export interface ReportChange {
  ruleId: string;
  from: VerdictStatus | null;
  to: VerdictStatus | null;
}

export interface ReportDiff {
  scoreDelta: number;
  statusFrom: ComplianceStatus;
  statusTo: ComplianceStatus;
  sectionDelta: Array<{ sectionName: string; delta: number }>;
  /** Regressions and escalations (e.g. pass -> fail, warning -> fail) */
  newIssues: ReportIssue[];
  /** Improvements and softenings (e.g. fail -> pass, fail -> warning) */
  resolvedIssues: ReportIssue[];
  /** Same-rank moves, rules added as passing, and rules dropped from the checklist */
  changed: ReportChange[];
  counts: Record<VerdictStatus, number>;
}

interface LocatedVerdict {
  section: string;
  ruleId: string;
  item: string;
  status: VerdictStatus;
  severity: RuleSeverity;
}

function locateVerdicts(sections: readonly SectionResult[]): LocatedVerdict[] {
  return sections.flatMap((section) =>
    section.items.map((verdict) => ({
      section: section.sectionName,
      ruleId: verdict.ruleId,
      item: verdict.item,
      status: verdict.status,
      severity: verdict.severity,
    }))
  );
}

function countStatuses(verdicts: readonly LocatedVerdict[]): Record<VerdictStatus, number> {
  return verdicts.reduce(
    (acc, verdict) => {
      acc[verdict.status] += 1;
      return acc;
    },
    { pass: 0, fail: 0, warning: 0, manual_review: 0 }
  );
}

/**
 * Compare two reports for the same site. Returns null when there is no
 * previous report to compare against.
 */
export function compareReports(
  previous: ComplianceReport | null,
  current: ComplianceReport
): ReportDiff | null {
  if (!previous) return null;

  const before = locateVerdicts(previous.sections);
  const after = locateVerdicts(current.sections);
  const beforeById = new Map(before.map((verdict) => [verdict.ruleId, verdict]));
  const afterIds = new Set(after.map((verdict) => verdict.ruleId));

  const newIssues: ReportIssue[] = [];
  const resolvedIssues: ReportIssue[] = [];
  const changed: ReportChange[] = [];

  for (const verdict of after) {
    const from = beforeById.get(verdict.ruleId)?.status ?? null;
    const to = verdict.status;
    if (from === to) continue;

    const issue: ReportIssue = {
      ruleId: verdict.ruleId,
      item: verdict.item,
      section: verdict.section,
      from,
      to,
      severity: verdict.severity,
    };

    const fromRank = from === null ? STATUS_ORDER.pass : STATUS_ORDER[from];
    if (STATUS_ORDER[to] > fromRank) {
      newIssues.push(issue);
    } else if (STATUS_ORDER[to] < fromRank) {
      resolvedIssues.push(issue);
    } else {
      changed.push({ ruleId: verdict.ruleId, from, to });
    }
  }

  for (const verdict of before) {
    if (!afterIds.has(verdict.ruleId)) {
      changed.push({ ruleId: verdict.ruleId, from: verdict.status, to: null });
    }
  }

  const previousSections = new Map(
    previous.sections.map((section) => [section.sectionName, section.sectionScore])
  );

  return {
    scoreDelta: current.overallScore - previous.overallScore,
    statusFrom: previous.status,
    statusTo: current.status,
    sectionDelta: current.sections.map((section) => ({
      sectionName: section.sectionName,
      delta: section.sectionScore - (previousSections.get(section.sectionName) ?? 0),
    })),
    newIssues,
    resolvedIssues,
    changed,
    counts: countStatuses(after),
  };
}
