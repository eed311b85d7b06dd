/*
Pure formatting helpers for console lines.
Assumes results are already interpreted.
*/

import type { ConsoleOutput } from "../../../core/console-output.js";
import type { AnsiStyle } from "../../../core/error-format.js";
import type { ResultOutcome, TestResult } from "../../../core/results.js";

const OUTCOME_STYLES: Record<ResultOutcome, AnsiStyle[]> = {
  pass: ["green"],
  fail: ["red"],
  info: ["blue"],
  warn: ["yellow"],
  error: ["magenta"],
  skip: ["dim"],
};

export function formatOutcome(outcome: ResultOutcome, output?: ConsoleOutput): string {
  const label = outcome.padEnd(5);
  return output ? output.style(label, OUTCOME_STYLES[outcome]) : label;
}

/** "pass /tests/smoke (on server) [2]" */
export function formatResultLine(
  result: Pick<TestResult, "name" | "result" | "guest" | "serialNumber">,
  opts: { showGuest?: boolean; output?: ConsoleOutput } = {},
): string {
  const guest = opts.showGuest ? ` (on ${result.guest.name})` : "";
  return `${formatOutcome(result.result, opts.output)} ${result.name}${guest} [${result.serialNumber}]`;
}
