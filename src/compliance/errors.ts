// src/compliance/errors.ts
// Compliance engine: error types

/**
 * Thrown by the checklist compiler for structurally invalid rule sets:
 * empty list, a rule without a section, or colliding rule ids.
 * Never recovered by falling back to the built-in checklist.
 */
export class InvalidChecklistError extends Error {
  readonly statusCode = 400;
  readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    super(
      issues.length === 1
        ? `Invalid checklist: ${issues[0]}`
        : `Invalid checklist: ${issues.length} problems found`
    );
    this.name = "InvalidChecklistError";
    this.issues = issues;
  }
}
