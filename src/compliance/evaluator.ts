// src/compliance/evaluator.ts
// Rule evaluator: (Rule, FactStore) -> Verdict
//
// Pure and total. A missing fact is "not found", never an error, so
// extraction gaps surface as failed or warned rules.

import type { FactStore, Rule, RuleSeverity, Verdict, VerdictStatus } from "./types";
import { factToText, isMissingFact, lookupFact } from "./facts";
import { checkCondition } from "./evaluators";
import { buildRecommendation } from "./recommendations";

/** Verdict status for a rule whose condition was not met */
const UNMET_STATUS: Record<RuleSeverity, "fail" | "warning"> = {
  fail: "fail",
  warning: "warning",
  info: "warning",
};

function makeVerdict(rule: Rule, status: VerdictStatus, foundValue: string | null): Verdict {
  const verdict: Verdict = {
    ruleId: rule.ruleId,
    item: rule.item,
    severity: rule.severity,
    status,
    foundValue,
    recommendation: status === "pass" ? null : buildRecommendation(rule, status),
  };
  return Object.freeze(verdict);
}

export function evaluateRule(rule: Rule, facts: FactStore): Verdict {
  const value = lookupFact(facts, rule.extractionKey);
  const foundValue = isMissingFact(value) ? null : factToText(value);
  const condition = rule.passCondition;

  if (condition.kind === "manual") {
    return makeVerdict(rule, "manual_review", foundValue);
  }

  if (checkCondition(condition, value)) {
    return makeVerdict(rule, "pass", foundValue);
  }

  return makeVerdict(rule, UNMET_STATUS[rule.severity], foundValue);
}

/** Evaluate every rule in order; one verdict per rule */
export function evaluateRules(rules: readonly Rule[], facts: FactStore): Verdict[] {
  return rules.map((rule) => evaluateRule(rule, facts));
}
