// src/compliance/normalize.ts
// Checklist normalization: untrusted raw rules -> frozen Rule objects
//
// Pure functions - no logging, no I/O. Every RawRuleDict field is validated
// and defaulted one by one. Structural problems (no section, colliding ids,
// empty list) are collected and thrown together as InvalidChecklistError.
// Anything recoverable becomes a warning on the compiled checklist.

import type {
  ChecklistSource,
  CompiledChecklist,
  PassCondition,
  PassConditionKind,
  Rule,
  RuleSeverity,
  SectionDefinition,
} from "./types";
import { PASS_CONDITION_KINDS } from "./types";
import { InvalidChecklistError } from "./errors";
import { factToText } from "./facts";

/* ============= Constants ============= */

/** Total of all section weights in a compiled checklist */
export const TOTAL_SECTION_WEIGHT = 100;

/** Share of TOTAL_SECTION_WEIGHT a section may drift before a warning is recorded */
const SECTION_WEIGHT_DRIFT_TOLERANCE = 0.01;

/** Largest rule or section weight accepted; sums of these stay finite */
const MAX_WEIGHT = Number.MAX_SAFE_INTEGER;

const DEFAULT_SEVERITY: RuleSeverity = "fail";
const SEVERITIES: readonly RuleSeverity[] = ["fail", "warning", "info"];

/** Bare strings the upstream parser emits for boolean checks */
const CONDITION_ALIASES: Readonly<Record<string, PassConditionKind>> = {
  true: "boolean_true",
  boolean: "boolean_true",
};

/* ============= Field Helpers ============= */

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Strings and numbers become trimmed text; anything else is blank */
function textField(value: unknown): string {
  if (typeof value === "string") return value.trim();
  if (typeof value === "number" && Number.isFinite(value)) return String(value);
  return "";
}

/** Finite number from a number or numeric string, else null */
function numberField(value: unknown): number | null {
  if (typeof value === "number") return Number.isFinite(value) ? value : null;
  if (typeof value === "string" && value.trim().length > 0) {
    const parsed = Number(value.trim());
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

/** Weight in [0, MAX_WEIGHT], else null */
function weightField(value: unknown): number | null {
  const weight = numberField(value);
  return weight !== null && weight >= 0 && weight <= MAX_WEIGHT ? weight : null;
}

function isConditionKind(value: string): value is PassConditionKind {
  return (PASS_CONDITION_KINDS as readonly string[]).includes(value);
}

function isSeverity(value: string): value is RuleSeverity {
  return (SEVERITIES as readonly string[]).includes(value);
}

/* ============= Pass Conditions ============= */

export interface ParsedPassCondition {
  condition: PassCondition;
  /** Why the raw condition was replaced by not_empty, if it was */
  downgradeNote: string | null;
  /** True when no condition was supplied at all */
  defaulted: boolean;
}

const NOT_EMPTY: PassCondition = Object.freeze({ kind: "not_empty" });

function downgrade(reason: string): ParsedPassCondition {
  return {
    condition: NOT_EMPTY,
    downgradeNote: `${reason}; evaluated as not_empty`,
    defaulted: false,
  };
}

function accept(condition: PassCondition): ParsedPassCondition {
  return { condition: Object.freeze(condition), downgradeNote: null, defaulted: false };
}

/** Drop stateful flags; a shared RegExp must give the same answer every call */
function sanitizeFlags(flags: string): string {
  return Array.from(new Set(flags.replace(/[gy]/g, ""))).join("");
}

/**
 * Parse a raw pass condition into the closed PassCondition union.
 *
 * Accepts a bare kind string ("not_empty", "true") or an object
 * `{ kind, value }` (`pattern`/`flags` also read for matches).
 * Unknown kinds and unusable arguments are downgraded to not_empty.
 */
export function parsePassCondition(raw: unknown): ParsedPassCondition {
  if (raw === undefined || raw === null || (typeof raw === "string" && raw.trim() === "")) {
    return { condition: NOT_EMPTY, downgradeNote: null, defaulted: true };
  }

  let rawKind: unknown;
  let args: Record<string, unknown> = {};
  if (typeof raw === "string") {
    rawKind = raw;
  } else if (isRecord(raw)) {
    rawKind = raw.kind ?? raw.type;
    args = raw;
  } else {
    return downgrade("pass condition must be a string or an object");
  }

  const kindText = textField(rawKind).toLowerCase();
  const kind = isConditionKind(kindText) ? kindText : CONDITION_ALIASES[kindText];
  if (!kind) {
    return downgrade(`unrecognized pass condition kind "${textField(rawKind)}"`);
  }

  switch (kind) {
    case "not_empty":
    case "boolean_true":
    case "manual":
      return accept({ kind });

    case "equals": {
      const value = args.value;
      const text = typeof value === "boolean" ? factToText(value) : textField(value);
      if (!text) return downgrade("equals requires a non-empty value");
      return accept({ kind, value: text });
    }

    case "matches": {
      const pattern = typeof args.value === "string" ? args.value : args.pattern;
      if (typeof pattern !== "string" || pattern.length === 0) {
        return downgrade("matches requires a regex pattern");
      }
      const flags = sanitizeFlags(typeof args.flags === "string" ? args.flags : "");
      try {
        new RegExp(pattern, flags);
      } catch (err) {
        return downgrade(
          `invalid regex /${pattern}/${flags}: ${err instanceof Error ? err.message : String(err)}`
        );
      }
      return accept({ kind, pattern, flags });
    }

    case "one_of": {
      const rawValues = Array.isArray(args.value)
        ? args.value
        : typeof args.value === "string"
          ? args.value.split(",")
          : [];
      const values = rawValues.map(textField).filter((v) => v.length > 0);
      if (values.length === 0) return downgrade("one_of requires at least one allowed value");
      return accept({ kind, values: Object.freeze(values) });
    }

    case "min_length": {
      const length = numberField(args.value);
      if (length === null || length < 0) {
        return downgrade("min_length requires a non-negative number");
      }
      return accept({ kind, length });
    }
  }
}

/* ============= Section Weights ============= */

function formatWeight(weight: number): string {
  return Number.isInteger(weight) ? String(weight) : weight.toFixed(2);
}

/**
 * Resolve section weights so they total 100.
 * Explicit weights are kept, unweighted sections share the remainder,
 * and the result is scaled to 100 when it drifts.
 */
export function resolveSectionWeights(
  names: readonly string[],
  explicit: ReadonlyMap<string, number>,
  warnings: string[]
): SectionDefinition[] {
  const explicitTotal = names.reduce((sum, name) => sum + (explicit.get(name) ?? 0), 0);
  const unweighted = names.filter((name) => !explicit.has(name));
  const remainder = Math.max(0, TOTAL_SECTION_WEIGHT - explicitTotal);
  const share = unweighted.length > 0 ? remainder / unweighted.length : 0;

  if (unweighted.length > 0 && remainder === 0) {
    warnings.push(
      `explicit section weights already total ${formatWeight(explicitTotal)}; ` +
        `${unweighted.length} section(s) without section_weight carry no score`
    );
  }

  let weights = names.map((name) => explicit.get(name) ?? share);
  const total = weights.reduce((sum, w) => sum + w, 0);

  if (total <= 0) {
    warnings.push("all section weights are zero; sections share the score equally");
    weights = names.map(() => TOTAL_SECTION_WEIGHT / names.length);
  } else if (total !== TOTAL_SECTION_WEIGHT) {
    if (Math.abs(total - TOTAL_SECTION_WEIGHT) > TOTAL_SECTION_WEIGHT * SECTION_WEIGHT_DRIFT_TOLERANCE) {
      warnings.push(`section weights total ${formatWeight(total)}; scaled to ${TOTAL_SECTION_WEIGHT}`);
    }
    weights = weights.map((w) => (w * TOTAL_SECTION_WEIGHT) / total);
  }

  return names.map((name, i) => Object.freeze({ name, weight: weights[i] }));
}

/* ============= Checklist Assembly ============= */

interface RuleDraft {
  position: number;
  ruleId: string;
  section: string;
  raw: Record<string, unknown>;
}

/**
 * Validate and compile raw rules into a frozen checklist.
 *
 * @throws InvalidChecklistError on an empty list, a rule without a section,
 *   a non-object entry, or rule ids that collide after fallback generation
 */
export function buildChecklist(rawRules: unknown, source: ChecklistSource): CompiledChecklist {
  if (!Array.isArray(rawRules)) {
    throw new InvalidChecklistError(["rules must be a list"]);
  }
  if (rawRules.length === 0) {
    throw new InvalidChecklistError(["checklist contains no rules"]);
  }

  const issues: string[] = [];
  const warnings: string[] = [];
  const drafts: RuleDraft[] = [];

  rawRules.forEach((raw: unknown, index: number) => {
    const position = index + 1;
    if (!isRecord(raw)) {
      issues.push(`rule ${position}: expected an object`);
      return;
    }
    const ruleId = textField(raw.rule_id) || `GEN-${position}`;
    const section = textField(raw.section);
    if (!section) {
      issues.push(`rule ${position} (${ruleId}): section is required`);
      return;
    }
    drafts.push({ position, ruleId, section, raw });
  });

  const firstPosition = new Map<string, number>();
  for (const draft of drafts) {
    const earlier = firstPosition.get(draft.ruleId);
    if (earlier !== undefined) {
      issues.push(`duplicate rule_id "${draft.ruleId}" (rules ${earlier} and ${draft.position})`);
    } else {
      firstPosition.set(draft.ruleId, draft.position);
    }
  }

  if (issues.length > 0) {
    throw new InvalidChecklistError(issues);
  }

  // Sections in order of first appearance
  const sectionNames: string[] = [];
  const rulesPerSection = new Map<string, number>();
  const explicitSectionWeights = new Map<string, number>();

  for (const draft of drafts) {
    if (!rulesPerSection.has(draft.section)) sectionNames.push(draft.section);
    rulesPerSection.set(draft.section, (rulesPerSection.get(draft.section) ?? 0) + 1);

    if (draft.raw.section_weight === undefined) continue;
    const sectionWeight = weightField(draft.raw.section_weight);
    const existing = explicitSectionWeights.get(draft.section);
    if (sectionWeight === null) {
      warnings.push(`${draft.ruleId}: ignored invalid section_weight for "${draft.section}"`);
    } else if (existing === undefined) {
      explicitSectionWeights.set(draft.section, sectionWeight);
    } else if (existing !== sectionWeight) {
      warnings.push(
        `${draft.ruleId}: section_weight ${formatWeight(sectionWeight)} for "${draft.section}" ` +
          `conflicts with ${formatWeight(existing)}; keeping the first`
      );
    }
  }

  const rules = drafts.map((draft) =>
    buildRule(draft, TOTAL_SECTION_WEIGHT / (rulesPerSection.get(draft.section) ?? 1), warnings)
  );

  for (const name of sectionNames) {
    const total = rules
      .filter((rule) => rule.section === name)
      .reduce((sum, rule) => sum + rule.weight, 0);
    if (total === 0) {
      warnings.push(`section "${name}" has zero total rule weight; it always scores its full weight`);
    }
  }

  const sections = resolveSectionWeights(sectionNames, explicitSectionWeights, warnings);

  return Object.freeze({
    source,
    sections: Object.freeze(sections),
    rules: Object.freeze(rules),
    warnings: Object.freeze(warnings),
  });
}

function buildRule(draft: RuleDraft, defaultWeight: number, warnings: string[]): Rule {
  const { raw, ruleId } = draft;

  const parsed = parsePassCondition(raw.pass_condition);
  if (parsed.defaulted) {
    warnings.push(`${ruleId}: no pass_condition given; using not_empty`);
  }
  if (parsed.downgradeNote) {
    warnings.push(`${ruleId}: ${parsed.downgradeNote}`);
  }

  let severity = DEFAULT_SEVERITY;
  const severityText = textField(raw.severity).toLowerCase();
  if (isSeverity(severityText)) {
    severity = severityText;
  } else if (severityText) {
    warnings.push(`${ruleId}: unknown severity "${severityText}"; using ${DEFAULT_SEVERITY}`);
  }

  let weight = defaultWeight;
  if (raw.weight !== undefined && raw.weight !== null) {
    const explicitWeight = weightField(raw.weight);
    if (explicitWeight === null) {
      warnings.push(`${ruleId}: ignored invalid weight; using ${formatWeight(defaultWeight)}`);
    } else {
      weight = explicitWeight;
    }
  }

  const description = textField(raw.description);

  const rule: Rule = {
    ruleId,
    section: draft.section,
    item: textField(raw.item) || description || ruleId,
    description,
    extractionKey: textField(raw.extraction_key) || ruleId,
    passCondition: parsed.condition,
    severity,
    weight,
    downgradeNote: parsed.downgradeNote,
  };
  return Object.freeze(rule);
}
