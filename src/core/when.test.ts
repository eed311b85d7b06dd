import { describe, expect, it } from "vitest";

import { ConfigError } from "./errors.js";
import { compareVersions, decideRule, evaluateWhen } from "./when.js";

const context = {
  distro: ["fedora-39"],
  arch: ["x86_64"],
  initiator: ["human"],
};

describe("decideRule", () => {
  it("handles equality and inequality", () => {
    expect(decideRule("distro == fedora-39", context)).toBe(true);
    expect(decideRule("distro == fedora-38, fedora-39", context)).toBe(true);
    expect(decideRule("arch != x86_64", context)).toBe(false);
  });

  it("handles regular expressions", () => {
    expect(decideRule("distro ~ ^fedora", context)).toBe(true);
    expect(decideRule("distro !~ ^centos", context)).toBe(true);
  });

  it("compares versions of the same distro name", () => {
    expect(decideRule("distro < fedora-40", context)).toBe(true);
    expect(decideRule("distro >= fedora-40", context)).toBe(false);
    expect(decideRule("distro > centos-9", context)).toBe("undecided");
  });

  it("combines conditions with and/or", () => {
    expect(decideRule("distro == fedora-39 and arch == aarch64", context)).toBe(false);
    expect(decideRule("arch == aarch64 or initiator == human", context)).toBe(true);
  });

  it("is undecided for unknown dimensions", () => {
    expect(decideRule("component == kernel", context)).toBe("undecided");
    expect(decideRule("component is defined", context)).toBe(false);
    expect(decideRule("component is not defined", context)).toBe(true);
  });

  it("rejects malformed conditions", () => {
    expect(() => decideRule("distro fedora", context)).toThrow(ConfigError);
    expect(() => decideRule("distro == fedora and", context)).toThrow(ConfigError);
  });

  it("reports broken patterns as configuration errors", () => {
    expect(() => decideRule("distro ~ fedora-(39", context)).toThrow(ConfigError);
    expect(() => decideRule("distro !~ [", context)).toThrow(
      "Invalid regular expression '[' in when rule.",
    );
  });
});

describe("evaluateWhen", () => {
  it("enables phases without rules", () => {
    expect(evaluateWhen(undefined, context)).toBe(true);
    expect(evaluateWhen([], context)).toBe(true);
  });

  it("treats a list as alternatives", () => {
    expect(evaluateWhen(["arch == aarch64", "distro == fedora-39"], context)).toBe(true);
    expect(evaluateWhen(["arch == aarch64", "distro == fedora-38"], context)).toBe(false);
  });

  it("keeps undecidable rules enabled", () => {
    expect(evaluateWhen("component == kernel", context)).toBe(true);
  });
});

describe("compareVersions", () => {
  it("orders numeric parts", () => {
    expect(compareVersions("fedora-39", "fedora-40")).toBe(-1);
    expect(compareVersions("centos-stream-9.2", "centos-stream-9.1")).toBe(1);
    expect(compareVersions("fedora-39.1", "fedora-39")).toBe(0);
    expect(compareVersions("fedora-39", "rhel-9")).toBeNull();
  });
});
