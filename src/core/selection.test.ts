import { describe, expect, it } from "vitest";

import { ConfigError } from "./errors.js";
import { matchesFilter, selectTests } from "./selection.js";

type Sample = { name: string; enabled: boolean; order: number; tag: string[]; tier: string | null };

function sample(name: string, order: number, extra: Partial<Sample> = {}): Sample {
  return { name, enabled: true, order, tag: [], tier: null, ...extra };
}

// declared with orders 10..50
const ALL: Sample[] = [
  sample("z", 10),
  sample("a", 20),
  sample("m", 30),
  sample("b", 40),
  sample("skip", 50),
];

const names = (tests: Sample[]): string[] => tests.map((test) => test.name);

describe("selectTests", () => {
  it("keeps discovery order for include", () => {
    expect(names(selectTests(ALL, { includes: ["^m$", "^z$", "^b$"] }))).toEqual(["z", "m", "b"]);
  });

  it("follows pattern order for test", () => {
    expect(names(selectTests(ALL, { tests: ["^m$", "^z$", "^b$"] }))).toEqual(["m", "z", "b"]);
  });

  it("repeats tests named repeatedly", () => {
    expect(names(selectTests(ALL, { tests: ["^z$", "^a$", "^z$"] }))).toEqual(["z", "a", "z"]);
  });

  it("applies exclude last", () => {
    expect(names(selectTests(ALL, { tests: ["^z$", "^a$", "^z$"], excludes: ["^z$"] }))).toEqual([
      "a",
    ]);
    expect(names(selectTests(ALL, { includes: ["^[zab]$"], excludes: ["a"] }))).toEqual([
      "z",
      "b",
    ]);
  });

  it("uses include as an extra filter when test fixes the order", () => {
    expect(
      names(selectTests(ALL, { tests: ["^b$", "^a$", "^z$"], includes: ["^[ab]$"] })),
    ).toEqual(["b", "a"]);
  });

  it("returns everything enabled without criteria", () => {
    const withDisabled = [...ALL, sample("off", 60, { enabled: false })];
    expect(names(selectTests(withDisabled, {}))).toEqual(["z", "a", "m", "b", "skip"]);
  });

  it("keeps disabled tests only when named by test", () => {
    const withDisabled = [...ALL, sample("off", 60, { enabled: false })];
    expect(names(selectTests(withDisabled, { includes: ["off"] }))).toEqual([]);
    expect(names(selectTests(withDisabled, { tests: ["off"] }))).toEqual(["off"]);
  });

  it("matches names that are not valid expressions literally", () => {
    const tests = [sample("/tests/c++", 10)];
    expect(() => selectTests(tests, { tests: ["/tests/c++"] })).not.toThrow();
    expect(names(selectTests(tests, { tests: ["/tests/c++"] }))).toEqual(["/tests/c++"]);
  });

  it("reports invalid expressions", () => {
    expect(() => selectTests(ALL, { includes: ["(unclosed"] })).toThrow(ConfigError);
  });
});

describe("matchesFilter", () => {
  const test = sample("/tests/login", 10, { tag: ["smoke", "auth"], tier: "1" });

  it("matches list and scalar attributes", () => {
    expect(matchesFilter(test, "tag:smoke")).toBe(true);
    expect(matchesFilter(test, "tier:1")).toBe(true);
    expect(matchesFilter(test, "tier:2")).toBe(false);
  });

  it("supports negation and combinations", () => {
    expect(matchesFilter(test, "tag:-slow")).toBe(true);
    expect(matchesFilter(test, "tag:smoke & tier:2")).toBe(false);
    expect(matchesFilter(test, "tier:2 | tag:auth")).toBe(true);
  });

  it("rejects terms without a key", () => {
    expect(() => matchesFilter(test, "smoke")).toThrow(ConfigError);
  });
});
