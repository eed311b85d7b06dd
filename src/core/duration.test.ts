import { describe, expect, it } from "vitest";

import { ConfigError } from "./errors.js";
import { formatElapsed, parseDuration, parseDurationMs, secondsFromMs } from "./duration.js";

describe("parseDuration", () => {
  it("reads single terms with and without units", () => {
    expect(parseDuration("5m")).toBe(300);
    expect(parseDuration("90")).toBe(90);
    expect(parseDuration("2h")).toBe(7200);
    expect(parseDuration("1d")).toBe(86400);
  });

  it("sums multiple terms, spaced or not", () => {
    expect(parseDuration("1h 30m")).toBe(5400);
    expect(parseDuration("1h30m")).toBe(5400);
    expect(parseDuration("1m 5")).toBe(65);
  });

  it("applies multipliers after summing and rounds up", () => {
    expect(parseDuration("5m *2")).toBe(600);
    expect(parseDuration("10s * 1.05")).toBe(11);
    expect(parseDuration("1m *2 *1.5")).toBe(180);
  });

  it("rejects malformed values", () => {
    expect(() => parseDuration("")).toThrow(ConfigError);
    expect(() => parseDuration("5 minutes")).toThrow("Invalid duration '5 minutes'.");
    expect(() => parseDuration("m5")).toThrow(ConfigError);
  });

  it("converts to milliseconds", () => {
    expect(parseDurationMs("2s")).toBe(2000);
  });
});

describe("formatElapsed", () => {
  it("renders hours, minutes and seconds", () => {
    expect(formatElapsed(3_723_000)).toBe("01:02:03");
    expect(formatElapsed(400)).toBe("00:00:00");
    expect(formatElapsed(-5)).toBe("00:00:00");
  });
});

describe("secondsFromMs", () => {
  it("keeps millisecond precision", () => {
    expect(secondsFromMs(1234)).toBe(1.234);
    expect(secondsFromMs(61_000)).toBe(61);
  });

  it("returns zero for non-finite values", () => {
    expect(secondsFromMs(Number.NaN)).toBe(0);
  });
});
