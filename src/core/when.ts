/*
Purpose: evaluate `when` rules against the plan context.
Assumptions: context dimensions map to one or more string values; a rule like
"distro == fedora-39 and arch != aarch64" is decided against every value of a
dimension, any value may satisfy it. "or" binds looser than "and".
Usage: evaluateWhen(["distro ~ ^fedora"], { distro: ["fedora-39"] }) -> true.
*/

import { ConfigError } from "./errors.js";

// =============================================================================
// TYPES
// =============================================================================

export type Context = Record<string, string[]>;

/** Undecided rules reference a dimension the context does not define. */
export type Decision = boolean | "undecided";

type Operator = "==" | "!=" | "<" | "<=" | ">" | ">=" | "~" | "!~" | "defined" | "not-defined";

type Condition = {
  dimension: string;
  operator: Operator;
  values: string[];
};

const CONDITION_PATTERN = /^([A-Za-z0-9_-]+)\s*(==|!=|<=|>=|<|>|!~|~)\s*(.+)$/;
const DEFINED_PATTERN = /^([A-Za-z0-9_-]+)\s+is\s+(not\s+)?defined$/;

// =============================================================================
// PUBLIC API
// =============================================================================

/**
 * A list of rules reads as their disjunction. Rules that cannot be decided
 * leave the phase enabled.
 */
export function evaluateWhen(rules: string | string[] | undefined, context: Context): boolean {
  if (rules === undefined) return true;
  const list = typeof rules === "string" ? [rules] : rules;
  if (list.length === 0) return true;

  let undecided = false;
  for (const rule of list) {
    const decision = decideRule(rule, context);
    if (decision === true) return true;
    if (decision === "undecided") undecided = true;
  }
  return undecided;
}

export function decideRule(rule: string, context: Context): Decision {
  const alternatives = splitKeyword(rule, "or");
  let sawUndecided = false;

  for (const alternative of alternatives) {
    const decision = decideConjunction(alternative, context);
    if (decision === true) return true;
    if (decision === "undecided") sawUndecided = true;
  }

  return sawUndecided ? "undecided" : false;
}

// =============================================================================
// INTERNALS
// =============================================================================

function decideConjunction(expression: string, context: Context): Decision {
  let sawUndecided = false;

  for (const part of splitKeyword(expression, "and")) {
    const decision = decideCondition(parseCondition(part), context);
    if (decision === false) return false;
    if (decision === "undecided") sawUndecided = true;
  }

  return sawUndecided ? "undecided" : true;
}

function splitKeyword(expression: string, keyword: "and" | "or"): string[] {
  const parts = expression
    .split(new RegExp(`(?:^|\\s+)${keyword}(?=\\s|$)\\s*`))
    .map((part) => part.trim());
  if (parts.some((part) => part.length === 0)) {
    throw new ConfigError(`Invalid when rule '${expression}'.`);
  }
  return parts;
}

function parseCondition(text: string): Condition {
  const defined = DEFINED_PATTERN.exec(text);
  if (defined) {
    return {
      dimension: defined[1],
      operator: defined[2] ? "not-defined" : "defined",
      values: [],
    };
  }

  const match = CONDITION_PATTERN.exec(text);
  if (!match) {
    throw new ConfigError(`Invalid when condition '${text}'.`);
  }

  const [, dimension, operator, rawValues] = match;
  const values = rawValues
    .split(",")
    .map((value) => value.trim())
    .filter((value) => value.length > 0);
  if (values.length === 0 || !isOperator(operator)) {
    throw new ConfigError(`Invalid when condition '${text}'.`);
  }

  return { dimension, operator, values };
}

function isOperator(value: string): value is Operator {
  return ["==", "!=", "<", "<=", ">", ">=", "~", "!~"].includes(value);
}

function decideCondition(condition: Condition, context: Context): Decision {
  const actual = context[condition.dimension];
  const isDefined = actual !== undefined && actual.length > 0;

  if (condition.operator === "defined") return isDefined;
  if (condition.operator === "not-defined") return !isDefined;
  if (!isDefined) return "undecided";

  switch (condition.operator) {
    case "==":
      return actual.some((value) => condition.values.includes(value));
    case "!=":
      return actual.every((value) => !condition.values.includes(value));
    case "~":
    case "!~": {
      const patterns = condition.values.map(compilePattern);
      return condition.operator === "~"
        ? actual.some((value) => patterns.some((re) => re.test(value)))
        : actual.every((value) => patterns.every((re) => !re.test(value)));
    }
    default:
      return decideComparison(condition, actual);
  }
}

function compilePattern(pattern: string): RegExp {
  try {
    return new RegExp(pattern);
  } catch (err) {
    throw new ConfigError(`Invalid regular expression '${pattern}' in when rule.`, err);
  }
}

function decideComparison(condition: Condition, actual: string[]): Decision {
  let comparable = false;

  for (const value of actual) {
    for (const expected of condition.values) {
      const ordering = compareVersions(value, expected);
      if (ordering === null) continue;
      comparable = true;
      if (satisfies(condition.operator, ordering)) return true;
    }
  }

  return comparable ? false : "undecided";
}

function satisfies(operator: Operator, ordering: number): boolean {
  switch (operator) {
    case "<":
      return ordering < 0;
    case "<=":
      return ordering <= 0;
    case ">":
      return ordering > 0;
    case ">=":
      return ordering >= 0;
    default:
      return false;
  }
}

/**
 * Compares "fedora-39" with "fedora-40" or "centos-stream-9.2" with
 * "centos-stream-9". Values with different names are not comparable.
 */
export function compareVersions(left: string, right: string): number | null {
  const a = splitVersion(left);
  const b = splitVersion(right);
  if (a.name !== b.name) return null;

  // compared at the shared precision: "fedora-39.1" equals "fedora-39"
  const length = Math.min(a.parts.length, b.parts.length);
  for (let index = 0; index < length; index += 1) {
    const diff = a.parts[index] - b.parts[index];
    if (diff !== 0) return Math.sign(diff);
  }
  return 0;
}

function splitVersion(value: string): { name: string; parts: number[] } {
  const match = /^(.*?)-?(\d+(?:\.\d+)*)$/.exec(value);
  if (!match) return { name: value, parts: [] };
  return { name: match[1], parts: match[2].split(".").map(Number) };
}
