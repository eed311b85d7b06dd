import { describe, expect, it } from "vitest";

import { ConfigError } from "./errors.js";
import {
  interpretOutcome,
  outcomeFromExitCode,
  parseCustomResults,
  parseResults,
  resultsToExitCode,
  serializeResult,
  summarizeResults,
  worstOutcome,
  type CheckResult,
  type TestResult,
} from "./results.js";

function check(result: CheckResult["result"], name = "dmesg"): CheckResult {
  return { name, event: "after-test", result, note: null, log: [] };
}

describe("outcomeFromExitCode", () => {
  it("maps exit codes", () => {
    expect(outcomeFromExitCode(0)).toBe("pass");
    expect(outcomeFromExitCode(1)).toBe("fail");
    expect(outcomeFromExitCode(2)).toBe("error");
    expect(outcomeFromExitCode(127)).toBe("error");
  });
});

describe("interpretOutcome", () => {
  it("leaves respected outcomes alone", () => {
    expect(interpretOutcome({ raw: "fail", interpret: "respect" })).toEqual({
      result: "fail",
      note: null,
      check: [],
    });
  });

  it("swaps pass and fail for xfail and records the original", () => {
    expect(interpretOutcome({ raw: "fail", interpret: "xfail" })).toEqual({
      result: "pass",
      originalResult: "fail",
      note: "original result: fail",
      check: [],
    });
  });

  it("keeps errors under xfail without an original result", () => {
    const interpreted = interpretOutcome({ raw: "error", interpret: "xfail" });
    expect(interpreted.result).toBe("error");
    expect(interpreted.originalResult).toBeUndefined();
  });

  it("forces fixed outcomes", () => {
    const interpreted = interpretOutcome({ raw: "fail", interpret: "info", notes: ["flaky"] });
    expect(interpreted.result).toBe("info");
    expect(interpreted.originalResult).toBe("fail");
    expect(interpreted.note).toBe("flaky, original result: fail");
  });

  it("does not record an original result when a fixed outcome matches", () => {
    const interpreted = interpretOutcome({ raw: "pass", interpret: "pass" });
    expect(interpreted).toEqual({ result: "pass", note: null, check: [] });
  });

  it("fails a passing test when a respected check fails", () => {
    const interpreted = interpretOutcome({
      raw: "pass",
      interpret: "respect",
      checks: [{ check: check("fail"), interpret: "respect" }],
    });
    expect(interpreted.result).toBe("fail");
    expect(interpreted.originalResult).toBe("pass");
    expect(interpreted.note).toBe("check 'dmesg' failed, original result: pass");
  });

  it("turns check errors into test errors", () => {
    const interpreted = interpretOutcome({
      raw: "fail",
      interpret: "respect",
      checks: [{ check: check("error", "avc"), interpret: "respect" }],
    });
    expect(interpreted.result).toBe("error");
    expect(interpreted.note).toBe("check 'avc' errored, original result: fail");
  });

  it("ignores informational checks", () => {
    const interpreted = interpretOutcome({
      raw: "pass",
      interpret: "respect",
      checks: [{ check: check("fail"), interpret: "info" }],
    });
    expect(interpreted.result).toBe("pass");
    expect(interpreted.check[0]?.result).toBe("fail");
  });

  it("inverts expected-to-fail checks", () => {
    const interpreted = interpretOutcome({
      raw: "pass",
      interpret: "respect",
      checks: [{ check: check("fail"), interpret: "xfail" }],
    });
    expect(interpreted.result).toBe("pass");
    expect(interpreted.originalResult).toBeUndefined();
    expect(interpreted.check).toEqual([
      {
        name: "dmesg",
        event: "after-test",
        result: "pass",
        note: "original result: fail",
        log: [],
      },
    ]);
  });
});

describe("worstOutcome", () => {
  it("ranks errors above failures", () => {
    expect(worstOutcome(["pass", "fail", "warn"])).toBe("fail");
    expect(worstOutcome(["skip", "pass"])).toBe("pass");
    expect(worstOutcome(["fail", "error"])).toBe("error");
    expect(worstOutcome([])).toBeNull();
  });
});

describe("resultsToExitCode", () => {
  it("maps outcome sets to exit codes", () => {
    expect(resultsToExitCode([])).toBe(3);
    expect(resultsToExitCode(["pass", "error", "fail"])).toBe(2);
    expect(resultsToExitCode(["pass", "warn"])).toBe(1);
    expect(resultsToExitCode(["skip", "skip"])).toBe(4);
    expect(resultsToExitCode(["pass", "info", "skip"])).toBe(0);
  });
});

describe("summarizeResults", () => {
  it("lists counts in a fixed order", () => {
    expect(summarizeResults(["pass", "pass", "fail", "error"])).toBe(
      "2 tests passed, 1 test failed and 1 error",
    );
    expect(summarizeResults([])).toBe("no results found");
  });
});

describe("result persistence", () => {
  const result: TestResult = {
    name: "/tests/login",
    serialNumber: 3,
    guest: { name: "default-0", role: null },
    result: "pass",
    originalResult: "fail",
    note: "original result: fail",
    log: ["data/guest/default-0/tests-login-3/output.txt"],
    startTime: "2026-01-01T00:00:00.000Z",
    endTime: "2026-01-01T00:00:01.000Z",
    duration: "00:00:01",
    dataPath: "data/guest/default-0/tests-login-3/data",
    subresult: [],
    check: [],
  };

  it("writes kebab-case keys", () => {
    const stored = serializeResult(result);
    expect(stored["serial-number"]).toBe(3);
    expect(stored["original-result"]).toBe("fail");
    expect(stored["data-path"]).toBe("data/guest/default-0/tests-login-3/data");
  });

  it("omits original-result when unchanged", () => {
    const { originalResult: _dropped, ...unchanged } = result;
    expect("original-result" in serializeResult({ ...unchanged, note: null })).toBe(false);
  });

  it("reads back what it writes", () => {
    expect(parseResults([serializeResult(result)], "results.yaml")).toEqual([result]);
  });

  it("rejects unknown outcomes", () => {
    expect(() =>
      parseResults([{ ...serializeResult(result), result: "maybe" }], "results.yaml"),
    ).toThrow(ConfigError);
  });
});

describe("parseCustomResults", () => {
  it("fills defaults for partial entries", () => {
    expect(parseCustomResults([{ name: "/step-1", result: "pass" }], "results.yaml")).toEqual([
      { name: "/step-1", result: "pass", note: null, log: [], check: [] },
    ]);
  });

  it("treats an empty file as no entries", () => {
    expect(parseCustomResults(null, "results.yaml")).toEqual([]);
  });
});
