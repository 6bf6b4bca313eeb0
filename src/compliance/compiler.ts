// src/compliance/compiler.ts
// Checklist compiler: assembles the active rule set for one evaluation.

import type { CompiledChecklist } from "./types";
import { BUILTIN_CHECKLIST } from "./builtinChecklist";
import { buildChecklist } from "./normalize";

/**
 * Built-in checklist when no custom rules are given (absent or empty),
 * otherwise the validated custom checklist.
 *
 * @throws InvalidChecklistError for structurally invalid custom rules
 */
export function compileChecklist(customRules?: readonly unknown[] | null): CompiledChecklist {
  if (!customRules || customRules.length === 0) {
    return BUILTIN_CHECKLIST;
  }
  return buildChecklist(customRules, "custom");
}

/**
 * Compile an uploaded checklist. Unlike compileChecklist, an empty list is an
 * error: an upload that yielded no rules must not fall back to the built-ins.
 *
 * @throws InvalidChecklistError
 */
export function compileCustomChecklist(customRules: unknown): CompiledChecklist {
  return buildChecklist(customRules, "custom");
}
