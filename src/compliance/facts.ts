// src/compliance/facts.ts
// Compliance engine: Fact Store helpers
//
// Pure functions. Lookup by exact key or dotted path, a total textual coercion
// for any value shape, and detection of the "Not found" sentinel the
// extraction layer writes for fields it could not locate.

import type { FactStore } from "./types";

/** Sentinel written by the extraction layer, compared case-insensitively */
export const NOT_FOUND_SENTINEL = "not found";

/**
 * Resolve a fact. An exact key wins, so flat stores may use dots in their
 * keys; otherwise the key is walked as a dot-notation path.
 * Returns undefined when nothing is there.
 */
export function lookupFact(facts: FactStore, key: string): unknown {
  if (Object.hasOwn(facts, key)) return facts[key];
  if (!key.includes(".")) return undefined;

  let current: unknown = facts;
  for (const part of key.split(".")) {
    current = stepInto(current, part);
    if (current === undefined) return undefined;
  }
  return current;
}

const ARRAY_INDEX = /^(0|[1-9][0-9]*)$/;

/** One path segment: an own key of a plain object, or an index into a list */
function stepInto(current: unknown, part: string): unknown {
  if (Array.isArray(current)) {
    if (!ARRAY_INDEX.test(part)) return undefined;
    const index = Number(part);
    return index < current.length ? current[index] : undefined;
  }
  if (current === null || typeof current !== "object") return undefined;
  return Object.hasOwn(current, part) ? Reflect.get(current, part) : undefined;
}

/**
 * Textual form of a fact value. Total over any input:
 * lists are joined with ", ", booleans become "true"/"false",
 * plain objects become JSON.
 */
export function factToText(value: unknown): string {
  return toText(value, new Set<object>());
}

function toText(value: unknown, seen: Set<object>): string {
  if (value === null || value === undefined) return "";

  switch (typeof value) {
    case "string":
      return value;
    case "boolean":
      return value ? "true" : "false";
    case "number":
    case "bigint":
      return String(value);
    case "symbol":
      return value.description ?? "";
    case "function":
      return "";
  }

  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? "" : value.toISOString();
  }

  if (!Array.isArray(value)) {
    try {
      return JSON.stringify(value) ?? "";
    } catch {
      // Cyclic or bigint-bearing objects have no JSON form
      return "";
    }
  }

  // Only lists on the current path count as cycles; shared entries repeat
  if (seen.has(value)) return "";
  seen.add(value);
  const text = value.map((entry) => toText(entry, seen)).join(", ");
  seen.delete(value);
  return text;
}

/** Trimmed, lower-cased text used by equals / one_of / boolean_true */
export function normalizeFactText(text: string): string {
  return text.trim().toLowerCase();
}

/**
 * A fact is missing when it is absent, blank after trimming,
 * or the "Not found" sentinel in any casing.
 */
export function isMissingFact(value: unknown): boolean {
  if (value === null || value === undefined) return true;
  const normalized = normalizeFactText(factToText(value));
  return normalized.length === 0 || normalized === NOT_FOUND_SENTINEL;
}
