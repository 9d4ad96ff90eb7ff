import { minimatch, Minimatch } from "minimatch";
import { TagExpressionError } from "../types/errors.js";
import type { RegisteredUnit } from "../types/unit.js";
import { evaluateTagExpression, normalizeTag, parseTagExpression } from "./tags.js";

export type UnitFilter = {
  /** Exact unit names. Each must exist. */
  names?: string[];
  /** Glob patterns over unit names. */
  patterns?: string[];
  /** Tag expression: `@tag`, `a and b`, `a or b`, `not a`, parentheses. */
  tags?: string;
};

export function isGlob(selector: string): boolean {
  return new Minimatch(selector, { magicalBraces: true }).hasMagic();
}

/** Split CLI selectors into exact names and glob patterns. */
export function splitSelectors(selectors: readonly string[]): { names: string[]; patterns: string[] } {
  const names: string[] = [];
  const patterns: string[] = [];
  for (const s of selectors) {
    if (isGlob(s)) patterns.push(s);
    else names.push(s);
  }
  return { names, patterns };
}

/** Parse and evaluate in one call. Throws a TagExpressionError on malformed input. */
export function matchTagExpression(tags: readonly string[], expression: string): boolean {
  return evaluateTagExpression(parseTagExpression(expression), new Set(tags.map(normalizeTag)));
}

/** The parse error for a malformed tag filter, or null when it is usable. */
export function tagExpressionError(expression: string | undefined): string | null {
  if (expression === undefined || expression.trim() === "") return null;
  try {
    parseTagExpression(expression);
    return null;
  } catch (e) {
    if (e instanceof TagExpressionError) return e.message;
    throw e;
  }
}

export function matchesFilter(unit: RegisteredUnit, filter: UnitFilter): boolean {
  const names = filter.names ?? [];
  const patterns = filter.patterns ?? [];

  if (names.length > 0 || patterns.length > 0) {
    const selected = names.includes(unit.name) || patterns.some((p) => minimatch(unit.name, p));
    if (!selected) return false;
  }

  if (filter.tags && filter.tags.trim() !== "") {
    return matchTagExpression(unit.tags, filter.tags);
  }

  return true;
}
