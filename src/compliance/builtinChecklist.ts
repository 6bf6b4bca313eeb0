// src/compliance/builtinChecklist.ts
// Built-in merchant checklist
//
// 8 sections, 34 rules, loaded from checklists/builtin.json once per process
// and frozen. Receipt Information and Update Notifications are manual-only and
// carry section weight 0: they appear in every report but cannot be scored
// from crawled content.

import builtinDefinition from "./checklists/builtin.json";
import type { CompiledChecklist } from "./types";
import { buildChecklist, isRecord } from "./normalize";

/**
 * Flatten a sectioned checklist definition `{ sections: [{ name, weight, rules }] }`
 * into raw rules and compile it. Throws on a malformed definition.
 */
export function loadChecklistDefinition(definition: unknown): CompiledChecklist {
  const sections = isRecord(definition) ? definition.sections : undefined;
  if (!Array.isArray(sections)) {
    throw new Error("Checklist definition must have a sections list");
  }

  const rawRules: unknown[] = [];
  for (const section of sections) {
    const rules = isRecord(section) ? section.rules : undefined;
    if (!isRecord(section) || !Array.isArray(rules)) {
      throw new Error("Checklist section must have a rules list");
    }
    for (const rule of rules) {
      rawRules.push(
        isRecord(rule) ? { ...rule, section: section.name, section_weight: section.weight } : rule
      );
    }
  }

  return buildChecklist(rawRules, "builtin");
}

export const BUILTIN_CHECKLIST: CompiledChecklist = loadChecklistDefinition(builtinDefinition);

/** Fact Store vocabulary the built-in checklist reads, in rule order */
export const BUILTIN_FACT_KEYS: readonly string[] = Object.freeze(
  Array.from(new Set(BUILTIN_CHECKLIST.rules.map((rule) => rule.extractionKey)))
);
