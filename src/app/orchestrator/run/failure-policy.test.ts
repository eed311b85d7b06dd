import { describe, expect, it } from "vitest";

import type { ResultOutcome, TestResult } from "../../../core/results.js";

import { exitCodeFor, type ExitInput } from "./failure-policy.js";

function result(outcome: ResultOutcome): TestResult {
  return {
    name: "/tests/smoke",
    serialNumber: 1,
    guest: { name: "default-0", role: null },
    result: outcome,
    note: null,
    log: [],
    startTime: null,
    endTime: null,
    duration: null,
    dataPath: null,
    subresult: [],
    check: [],
  };
}

function outcome(overrides: Partial<ExitInput> = {}): ExitInput {
  return { results: [], hasResults: true, error: null, interrupted: false, ...overrides };
}

describe("exitCodeFor", () => {
  it("maps results across plans", () => {
    expect(exitCodeFor([outcome({ results: [result("pass"), result("info")] })])).toBe(0);
    expect(exitCodeFor([outcome({ results: [result("pass")] }), outcome({ results: [result("warn")] })])).toBe(1);
    expect(exitCodeFor([outcome({ results: [result("fail"), result("error")] })])).toBe(2);
    expect(exitCodeFor([outcome({ results: [result("skip"), result("skip")] })])).toBe(4);
  });

  it("reports missing results only when execute ran", () => {
    expect(exitCodeFor([outcome()])).toBe(3);
    expect(exitCodeFor([outcome({ hasResults: false })])).toBe(0);
  });

  it("treats plan errors and interrupts as errors", () => {
    expect(exitCodeFor([outcome({ results: [result("pass")] }), outcome({ error: new Error("boom") })])).toBe(2);
    expect(exitCodeFor([outcome({ results: [result("pass")], interrupted: true })])).toBe(2);
  });
});
