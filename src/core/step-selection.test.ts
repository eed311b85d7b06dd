import { describe, expect, it } from "vitest";

import { ConfigError } from "./errors.js";
import { parseStepName, selectSteps } from "./step-selection.js";

describe("selectSteps", () => {
  it("runs every step when nothing is selected", () => {
    expect(selectSteps({})).toEqual(["discover", "provision", "prepare", "execute", "report", "finish"]);
  });

  it("keeps pipeline order for steps named out of order", () => {
    expect(selectSteps({ steps: ["report", "discover"] })).toEqual(["discover", "report"]);
  });

  it("resolves ranges", () => {
    expect(selectSteps({ until: "provision" })).toEqual(["discover", "provision"]);
    expect(selectSteps({ since: "report" })).toEqual(["report", "finish"]);
    expect(selectSteps({ before: "prepare" })).toEqual(["discover", "provision"]);
    expect(selectSteps({ after: "execute" })).toEqual(["report", "finish"]);
    expect(selectSteps({ since: "provision", until: "execute" })).toEqual([
      "provision",
      "prepare",
      "execute",
    ]);
  });

  it("adds named steps to a range and removes skipped steps last", () => {
    expect(selectSteps({ until: "discover", steps: ["finish"] })).toEqual(["discover", "finish"]);
    expect(selectSteps({ all: true, skip: ["prepare", "report"] })).toEqual([
      "discover",
      "provision",
      "execute",
      "finish",
    ]);
  });

  it("rejects an empty range", () => {
    expect(() => selectSteps({ since: "report", until: "discover" })).toThrow(ConfigError);
  });
});

describe("parseStepName", () => {
  it("rejects unknown steps", () => {
    expect(parseStepName("execute", "--until")).toBe("execute");
    expect(() => parseStepName("deploy", "--until")).toThrow("Invalid step 'deploy' for --until");
  });
});
