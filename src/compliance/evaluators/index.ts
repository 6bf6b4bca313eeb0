// src/compliance/evaluators/index.ts
// Pass-condition dispatch
//
// One check per automated condition kind. The switch is exhaustive over
// AutomatedCondition: adding a kind to the union without a case here is a
// compile error.

import type { AutomatedCondition } from "../types";
import { factToText, isMissingFact } from "../facts";
import { checkBooleanTrue, checkNotEmpty } from "./presence";
import { checkEquals, checkMinLength, checkOneOf } from "./textMatch";
import { checkMatches } from "./regexPattern";

export { TRUTHY_TOKENS } from "./presence";

/**
 * Decide whether a fact value satisfies an automated pass condition.
 * Missing facts never satisfy any condition.
 */
export function checkCondition(condition: AutomatedCondition, value: unknown): boolean {
  if (isMissingFact(value)) return false;
  const text = factToText(value);

  switch (condition.kind) {
    case "not_empty":
      return checkNotEmpty(text);
    case "equals":
      return checkEquals(text, condition.value);
    case "matches":
      return checkMatches(text, condition.pattern, condition.flags);
    case "one_of":
      return checkOneOf(text, condition.values);
    case "min_length":
      return checkMinLength(text, condition.length);
    case "boolean_true":
      return checkBooleanTrue(text);
    default:
      return assertNever(condition);
  }
}

function assertNever(condition: never): never {
  throw new Error(`Unhandled pass condition: ${JSON.stringify(condition)}`);
}
