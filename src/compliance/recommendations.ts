// src/compliance/recommendations.ts
// Deterministic recommendation text for non-pass verdicts.

import type { Rule, VerdictStatus } from "./types";

type NonPassStatus = Exclude<VerdictStatus, "pass">;

const LEAD_IN: Record<NonPassStatus, (item: string) => string> = {
  fail: (item) => `Add or correct "${item}" on the site.`,
  warning: (item) => `Review "${item}": it could not be confirmed on the site.`,
  manual_review: (item) =>
    `Verify "${item}" manually: human verification is required because this check cannot be automated.`,
};

/**
 * Build the recommendation for a non-pass verdict from the rule's item label
 * and description. Always non-empty.
 */
export function buildRecommendation(rule: Rule, status: NonPassStatus): string {
  const item = rule.item.trim() || rule.ruleId;
  const description = rule.description.trim();
  const lead = LEAD_IN[status](item);
  return description ? `${lead} ${description}` : lead;
}
