import yaml from "js-yaml";
import { describe, expect, it } from "vitest";

import { assignSerialNumbers, parseTests, serializeTests, testsForGuest } from "./discovered.js";
import { TestNodeSchema, type TestRecord } from "./metadata.js";
import { toYaml } from "./utils.js";

function test(name: string): TestRecord {
  return { ...TestNodeSchema.parse({ test: `./${name.slice(1)}.sh` }), name };
}

describe("assignSerialNumbers", () => {
  it("numbers tests 1..N across phases, repeated names included", () => {
    const tests = assignSerialNumbers([
      { phase: "default-0", where: [], tests: [test("/a"), test("/b"), test("/a")] },
      { phase: "server-side", where: ["server"], tests: [test("/c")] },
    ]);

    expect(tests.map((entry) => [entry.name, entry.serialNumber, entry.discoverPhase])).toEqual([
      ["/a", 1, "default-0"],
      ["/b", 2, "default-0"],
      ["/a", 3, "default-0"],
      ["/c", 4, "server-side"],
    ]);
    expect(tests[3].where).toEqual(["server"]);
  });
});

describe("testsForGuest", () => {
  it("keeps tests targeting the guest by name or role, and untargeted tests", () => {
    const tests = assignSerialNumbers([
      { phase: "any", where: [], tests: [test("/everywhere")] },
      { phase: "servers", where: ["servers"], tests: [test("/server-only")] },
      { phase: "named", where: ["client"], tests: [test("/client-only")] },
    ]);

    expect(testsForGuest(tests, { name: "client", role: "clients" }).map((t) => t.name)).toEqual([
      "/everywhere",
      "/client-only",
    ]);
    expect(testsForGuest(tests, { name: "db", role: "servers" }).map((t) => t.name)).toEqual([
      "/everywhere",
      "/server-only",
    ]);
  });
});

describe("tests.yaml", () => {
  it("stores kebab-case keys and reads them back", () => {
    const tests = assignSerialNumbers([{ phase: "default-0", where: ["server"], tests: [test("/a")] }]);

    const stored = yaml.load(toYaml(serializeTests(tests)));
    expect(stored).toMatchObject([
      { name: "/a", test: "./a.sh", "serial-number": 1, "discover-phase": "default-0", where: ["server"] },
    ]);

    expect(parseTests(stored, "tests.yaml")).toEqual(tests);
  });

  it("rejects records without a serial number", () => {
    expect(() => parseTests([{ name: "/a", test: "true" }], "tests.yaml")).toThrow(
      /Invalid discovered tests in tests.yaml/,
    );
  });
});
