// src/compliance/evaluators/textMatch.ts
// Pass conditions: equals, one_of, min_length

import { normalizeFactText } from "../facts";

/** Case-insensitive, trimmed equality */
export function checkEquals(text: string, expected: string): boolean {
  return normalizeFactText(text) === normalizeFactText(expected);
}

/** Case-insensitive, trimmed set membership */
export function checkOneOf(text: string, allowed: readonly string[]): boolean {
  const normalized = normalizeFactText(text);
  return allowed.some((candidate) => normalizeFactText(candidate) === normalized);
}

/** Length of the raw textual form, untrimmed */
export function checkMinLength(text: string, length: number): boolean {
  return text.length >= length;
}
