/**
 * Result model, interpretation and aggregation.
 * Purpose: turn raw exit codes, `result:` keys and check outcomes into the
 * canonical records written to `results.yaml`, and map them to exit codes.
 * Assumptions: persisted files use kebab-case keys, in-memory records camelCase.
 */

import { z } from "zod";

import { formatIssues } from "./config-loader.js";
import { ConfigError } from "./errors.js";
import type { CheckEvent, ResultInterpretation } from "./metadata.js";
import { listed } from "./utils.js";

// =============================================================================
// OUTCOMES
// =============================================================================

export const RESULT_OUTCOMES = ["pass", "fail", "info", "warn", "error", "skip"] as const;
export const ResultOutcomeSchema = z.enum(RESULT_OUTCOMES);
export type ResultOutcome = z.infer<typeof ResultOutcomeSchema>;

const SEVERITY: Record<ResultOutcome, number> = {
  skip: 0,
  pass: 1,
  info: 2,
  warn: 3,
  fail: 4,
  error: 5,
};

export function worstOutcome(outcomes: ResultOutcome[]): ResultOutcome | null {
  let worst: ResultOutcome | null = null;
  for (const outcome of outcomes) {
    if (worst === null || SEVERITY[outcome] > SEVERITY[worst]) worst = outcome;
  }
  return worst;
}

/** 0 passes, 1 fails, anything else is an error. */
export function outcomeFromExitCode(exitCode: number): ResultOutcome {
  if (exitCode === 0) return "pass";
  if (exitCode === 1) return "fail";
  return "error";
}

// =============================================================================
// RECORDS
// =============================================================================

export type ResultGuest = {
  name: string;
  role: string | null;
};

export type CheckResult = {
  name: string;
  event: CheckEvent;
  result: ResultOutcome;
  note: string | null;
  log: string[];
};

export type SubResult = {
  name: string;
  result: ResultOutcome;
  note: string | null;
  log: string[];
  check: CheckResult[];
};

export type TestResult = {
  name: string;
  serialNumber: number;
  guest: ResultGuest;
  result: ResultOutcome;
  originalResult?: ResultOutcome;
  note: string | null;
  log: string[];
  startTime: string | null;
  endTime: string | null;
  duration: string | null;
  dataPath: string | null;
  subresult: SubResult[];
  check: CheckResult[];
};

/** Outcome of one prepare or finish phase on one guest. */
export type PhaseResult = {
  name: string;
  guest: ResultGuest;
  result: ResultOutcome;
  note: string | null;
  log: string[];
};

// =============================================================================
// INTERPRETATION
// =============================================================================

export type CheckOutcome = {
  check: CheckResult;
  interpret: "respect" | "xfail" | "info";
};

export type InterpretInput = {
  raw: ResultOutcome;
  interpret: ResultInterpretation;
  checks?: CheckOutcome[];
  notes?: string[];
};

export type Interpretation = {
  result: ResultOutcome;
  originalResult?: ResultOutcome;
  note: string | null;
  check: CheckResult[];
};

/**
 * Applies the test's `result` key, then its checks. `originalResult` is set
 * only when the final outcome differs from `raw`.
 */
export function interpretOutcome(input: InterpretInput): Interpretation {
  const notes = [...(input.notes ?? [])];
  let outcome = applyInterpretation(input.raw, input.interpret);
  const checks: CheckResult[] = [];

  for (const { check, interpret } of input.checks ?? []) {
    const checkOutcome = interpretCheck(check, interpret);
    checks.push(checkOutcome);

    if (interpret === "info") continue;
    const affected = applyCheck(outcome, checkOutcome.result);
    if (affected !== outcome) {
      notes.push(`check '${check.name}' ${checkOutcome.result === "error" ? "errored" : "failed"}`);
      outcome = affected;
    }
  }

  if (outcome === input.raw) {
    return { result: outcome, note: joinNotes(notes), check: checks };
  }

  notes.push(`original result: ${input.raw}`);
  return { result: outcome, originalResult: input.raw, note: joinNotes(notes), check: checks };
}

function applyInterpretation(raw: ResultOutcome, interpret: ResultInterpretation): ResultOutcome {
  switch (interpret) {
    case "respect":
    case "custom":
      return raw;
    case "xfail":
      return swapPassFail(raw);
    default:
      return interpret;
  }
}

function swapPassFail(outcome: ResultOutcome): ResultOutcome {
  if (outcome === "pass") return "fail";
  if (outcome === "fail") return "pass";
  return outcome;
}

function interpretCheck(check: CheckResult, interpret: CheckOutcome["interpret"]): CheckResult {
  if (interpret !== "xfail") return check;
  const swapped = swapPassFail(check.result);
  if (swapped === check.result) return check;
  return {
    ...check,
    result: swapped,
    note: joinNotes([check.note, `original result: ${check.result}`]),
  };
}

function applyCheck(outcome: ResultOutcome, checkOutcome: ResultOutcome): ResultOutcome {
  if (checkOutcome === "error" && outcome !== "error") return "error";
  if (checkOutcome === "fail" && (outcome === "pass" || outcome === "info")) return "fail";
  return outcome;
}

function joinNotes(notes: Array<string | null | undefined>): string | null {
  const present = notes.filter((note): note is string => Boolean(note));
  return present.length > 0 ? present.join(", ") : null;
}

// =============================================================================
// CUSTOM RESULTS
// =============================================================================

const CustomResultEntrySchema = z.object({
  name: z.string().min(1),
  result: ResultOutcomeSchema,
  note: z.string().nullable().default(null),
  log: z.array(z.string()).default([]),
});

const CustomResultsSchema = z.array(CustomResultEntrySchema);

/** Parse the list a test with `result: custom` writes into its data directory. */
export function parseCustomResults(doc: unknown, source: string): SubResult[] {
  const parsed = CustomResultsSchema.safeParse(doc ?? []);
  if (!parsed.success) {
    throw new ConfigError(
      `Invalid custom results in ${source}:\n${formatIssues(parsed.error.issues)}`,
      parsed.error,
    );
  }
  return parsed.data.map((entry) => ({ ...entry, check: [] }));
}

// =============================================================================
// PERSISTENCE
// =============================================================================

const GuestSchema = z.object({
  name: z.string(),
  role: z.string().nullable().default(null),
});

const CheckResultSchema = z.object({
  name: z.string(),
  event: z.enum(["before-test", "after-test"]),
  result: ResultOutcomeSchema,
  note: z.string().nullable().default(null),
  log: z.array(z.string()).default([]),
});

const SubResultSchema = z.object({
  name: z.string(),
  result: ResultOutcomeSchema,
  note: z.string().nullable().default(null),
  log: z.array(z.string()).default([]),
  check: z.array(CheckResultSchema).default([]),
});

const StoredResultSchema = z
  .object({
    name: z.string(),
    "serial-number": z.number().int().nonnegative(),
    guest: GuestSchema,
    result: ResultOutcomeSchema,
    "original-result": ResultOutcomeSchema.optional(),
    note: z.string().nullable().default(null),
    log: z.array(z.string()).default([]),
    "start-time": z.string().nullable().default(null),
    "end-time": z.string().nullable().default(null),
    duration: z.string().nullable().default(null),
    "data-path": z.string().nullable().default(null),
    subresult: z.array(SubResultSchema).default([]),
    check: z.array(CheckResultSchema).default([]),
  })
  .transform(
    (stored): TestResult => ({
      name: stored.name,
      serialNumber: stored["serial-number"],
      guest: stored.guest,
      result: stored.result,
      ...(stored["original-result"] ? { originalResult: stored["original-result"] } : {}),
      note: stored.note,
      log: stored.log,
      startTime: stored["start-time"],
      endTime: stored["end-time"],
      duration: stored.duration,
      dataPath: stored["data-path"],
      subresult: stored.subresult,
      check: stored.check,
    }),
  );

const StoredPhaseResultSchema = z.object({
  name: z.string(),
  guest: GuestSchema,
  result: ResultOutcomeSchema,
  note: z.string().nullable().default(null),
  log: z.array(z.string()).default([]),
});

export function serializeResult(result: TestResult): Record<string, unknown> {
  return {
    name: result.name,
    "serial-number": result.serialNumber,
    guest: result.guest,
    result: result.result,
    ...(result.originalResult ? { "original-result": result.originalResult } : {}),
    note: result.note,
    log: result.log,
    "start-time": result.startTime,
    "end-time": result.endTime,
    duration: result.duration,
    "data-path": result.dataPath,
    subresult: result.subresult,
    check: result.check,
  };
}

export function parseResults(doc: unknown, source: string): TestResult[] {
  const parsed = z.array(StoredResultSchema).safeParse(doc ?? []);
  if (!parsed.success) {
    throw new ConfigError(
      `Invalid results in ${source}:\n${formatIssues(parsed.error.issues)}`,
      parsed.error,
    );
  }
  return parsed.data;
}

export function parsePhaseResults(doc: unknown, source: string): PhaseResult[] {
  const parsed = z.array(StoredPhaseResultSchema).safeParse(doc ?? []);
  if (!parsed.success) {
    throw new ConfigError(
      `Invalid phase results in ${source}:\n${formatIssues(parsed.error.issues)}`,
      parsed.error,
    );
  }
  return parsed.data;
}

// =============================================================================
// AGGREGATION
// =============================================================================

export const EXIT_CODES = {
  success: 0,
  fail: 1,
  error: 2,
  noResults: 3,
  allSkipped: 4,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

export function countOutcomes(outcomes: ResultOutcome[]): Record<ResultOutcome, number> {
  const stats: Record<ResultOutcome, number> = {
    pass: 0,
    fail: 0,
    info: 0,
    warn: 0,
    error: 0,
    skip: 0,
  };
  for (const outcome of outcomes) stats[outcome] += 1;
  return stats;
}

export function resultsToExitCode(outcomes: ResultOutcome[]): ExitCode {
  const stats = countOutcomes(outcomes);
  const total = outcomes.length;

  if (total === 0) return EXIT_CODES.noResults;
  if (stats.error > 0) return EXIT_CODES.error;
  if (stats.fail + stats.warn > 0) return EXIT_CODES.fail;
  if (stats.skip === total) return EXIT_CODES.allSkipped;
  return EXIT_CODES.success;
}

/** "2 tests passed, 1 test failed and 1 error". */
export function summarizeResults(outcomes: ResultOutcome[]): string {
  const stats = countOutcomes(outcomes);
  const parts: string[] = [];

  if (stats.pass) parts.push(`${listed(stats.pass, "test")} passed`);
  if (stats.fail) parts.push(`${listed(stats.fail, "test")} failed`);
  if (stats.skip) parts.push(`${listed(stats.skip, "test")} skipped`);
  if (stats.info) parts.push(listed(stats.info, "info"));
  if (stats.warn) parts.push(listed(stats.warn, "warn"));
  if (stats.error) parts.push(listed(stats.error, "error"));

  return joinWithAnd(parts.length > 0 ? parts : ["no results found"]);
}

export function joinWithAnd(items: string[]): string {
  if (items.length <= 1) return items.join("");
  return `${items.slice(0, -1).join(", ")} and ${items[items.length - 1]}`;
}
