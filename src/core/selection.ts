import { ConfigError } from "./errors.js";

// =============================================================================
// TYPES
// =============================================================================

export type SelectableTest = {
  name: string;
  enabled: boolean;
};

export type SelectionCriteria = {
  /** Ordered patterns; repeating a pattern repeats the tests it matches. */
  tests?: string[];
  includes?: string[];
  excludes?: string[];
};

// =============================================================================
// PATTERNS
// =============================================================================

export function compilePattern(pattern: string): RegExp {
  try {
    return new RegExp(pattern);
  } catch (err) {
    throw new ConfigError(`Invalid regular expression '${pattern}'.`, err);
  }
}

export function matchesPattern(name: string, pattern: string): boolean {
  return name === pattern || compilePattern(pattern).test(name);
}

export function matchesAnyPattern(name: string, patterns: string[]): boolean {
  return patterns.some((pattern) => matchesPattern(name, pattern));
}

// =============================================================================
// SELECTION
// =============================================================================

/**
 * `tests` dictates the order and may repeat entries, `includes` keeps the
 * discovery order, `excludes` always runs last.
 */
export function selectTests<T extends SelectableTest>(all: T[], criteria: SelectionCriteria): T[] {
  const tests = criteria.tests ?? [];
  const includes = criteria.includes ?? [];
  const excludes = criteria.excludes ?? [];

  let selected: T[];
  if (tests.length > 0) {
    selected = tests.flatMap((pattern) => all.filter((test) => matchesPattern(test.name, pattern)));
    if (includes.length > 0) {
      selected = selected.filter((test) => matchesAnyPattern(test.name, includes));
    }
  } else {
    selected = all.filter((test) => test.enabled);
    if (includes.length > 0) {
      selected = selected.filter((test) => matchesAnyPattern(test.name, includes));
    }
  }

  if (excludes.length > 0) {
    selected = selected.filter((test) => !matchesAnyPattern(test.name, excludes));
  }

  return selected;
}

// =============================================================================
// FILTERS
// =============================================================================

/**
 * Every filter must match. A filter is `key:value` terms joined by `&` and
 * `|` (`&` binds tighter); `key:-value` negates the term. Values compare
 * exactly against the attribute, or any item of a list attribute.
 */
export function matchesFilters(test: object, filters: string[]): boolean {
  return filters.every((filter) => matchesFilter(test, filter));
}

export function matchesFilter(test: object, filter: string): boolean {
  return filter
    .split("|")
    .some((alternative) => alternative.split("&").every((term) => matchesTerm(test, term)));
}

function matchesTerm(test: object, rawTerm: string): boolean {
  const term = rawTerm.trim();
  const separator = term.indexOf(":");
  if (separator <= 0) {
    throw new ConfigError(`Invalid filter term '${term}', expected 'key:value'.`);
  }

  const key = term.slice(0, separator).trim();
  let expected = term.slice(separator + 1).trim();
  const negated = expected.startsWith("-");
  if (negated) {
    expected = expected.slice(1);
  }

  const found = attributeValues(test, key).includes(expected);
  return negated ? !found : found;
}

function attributeValues(test: object, key: string): string[] {
  const entry = Object.entries(test).find(([name]) => name === key);
  if (!entry) return [];

  const value: unknown = entry[1];
  if (value === null || value === undefined) return [];
  if (Array.isArray(value)) return value.map(String);
  return [String(value)];
}
