// src/compliance/evaluators/presence.ts
// Pass conditions: not_empty, boolean_true
//
// Pure functions. The dispatcher has already rejected missing facts, so these
// only see values with some non-blank textual form.

import { normalizeFactText } from "../facts";

/** Tokens accepted as "true" by boolean_true, compared after normalization */
export const TRUTHY_TOKENS: ReadonlySet<string> = new Set(["true", "yes", "1", "present"]);

export function checkNotEmpty(_text: string): boolean {
  // Presence is the whole condition
  return true;
}

export function checkBooleanTrue(text: string): boolean {
  return TRUTHY_TOKENS.has(normalizeFactText(text));
}
