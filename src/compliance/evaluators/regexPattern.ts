// src/compliance/evaluators/regexPattern.ts
// Pass condition: matches
//
// Search semantics: the pattern may match anywhere in the value.
// Patterns are validated by the compiler; a pattern that still fails to
// construct here counts as unmet rather than throwing.

export function checkMatches(text: string, pattern: string, flags: string): boolean {
  let regex: RegExp;
  try {
    regex = new RegExp(pattern, flags);
  } catch {
    return false;
  }
  return regex.test(text);
}
