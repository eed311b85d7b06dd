import { describe, expect, it } from "vitest";

import { ConfigError } from "./errors.js";
import { formatErrorLines, normalizeAbortReason } from "./error-format.js";

describe("normalizeAbortReason", () => {
  it("reads the signal a stop handler aborted with", () => {
    expect(normalizeAbortReason({ signal: "SIGTERM" })).toBe("SIGTERM");
    expect(normalizeAbortReason("SIGINT")).toBe("SIGINT");
  });

  it("falls back to messages and strings", () => {
    expect(normalizeAbortReason(undefined)).toBeUndefined();
    expect(normalizeAbortReason(new Error("stopped"))).toBe("stopped");
    expect(normalizeAbortReason(130)).toBe("130");
  });
});

describe("formatErrorLines", () => {
  it("adds name and cause in debug mode", () => {
    const error = new ConfigError("bad phase", new Error("unknown key 'hwo'"));
    error.stack = undefined;

    expect(formatErrorLines(error, { mode: "debug" })).toEqual([
      { kind: "title", text: "Command failed." },
      { kind: "message", text: "bad phase" },
      { kind: "name", text: "ConfigError" },
      { kind: "cause", text: "unknown key 'hwo'" },
    ]);
  });
});
