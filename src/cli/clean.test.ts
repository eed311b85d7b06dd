import fse from "fs-extra";
import { afterEach, describe, expect, it } from "vitest";

import { ConsoleOutput } from "../core/console-output.js";
import { runDir } from "../core/paths.js";
import { runEngine } from "../app/orchestrator/run/run-engine.js";
import { FakeLab, makeTempDir, writeMetadata } from "../app/orchestrator/__tests__/fakes.js";

import { cleanCommand } from "./clean.js";
import { statusCommand } from "./status.js";

const cleanup: string[] = [];

afterEach(async () => {
  await Promise.all(cleanup.splice(0).map((dir) => fse.remove(dir)));
});

async function keptRun() {
  const tree = await writeMetadata({
    tests: { smoke: { test: "./smoke.sh" } },
    plans: { "plans/basic": { provision: { how: "local" }, execute: { how: "tmt" } } },
  });
  const workdirRoot = await makeTempDir("workdir");
  cleanup.push(tree.root, workdirRoot);

  const lab = new FakeLab();
  const quiet = new ConsoleOutput({ stream: { write: () => true }, useColor: false });
  const result = await runEngine({
    workdirRoot,
    root: tree.root,
    runId: "run-7",
    selection: {},
    keep: true,
    registry: lab.registry(),
    tree,
    output: quiet,
    env: {},
  });

  const chunks: string[] = [];
  const output = new ConsoleOutput({ stream: { write: (chunk) => chunks.push(chunk) }, useColor: false });
  return { lab, workdirRoot, result, output, printed: () => chunks.join("") };
}

describe("statusCommand", () => {
  it("prints the run and a row per plan", async () => {
    const { workdirRoot, output, printed } = await keptRun();

    const code = await statusCommand({ workdirRoot }, { output });

    expect(code).toBe(0);
    expect(printed()).toContain("Run: run-7\n");
    expect(printed()).toContain("Status: complete\n");
    expect(printed()).toContain("Plans: total=1  pending=0  running=0  complete=1  failed=0\n");
    expect(printed()).toContain("  /plans/basic  complete  0\n");
  });

  it("returns 1 for an unknown run", async () => {
    const { workdirRoot, output, printed } = await keptRun();

    const code = await statusCommand({ workdirRoot, id: "missing" }, { output });

    expect(code).toBe(1);
    expect(printed()).toContain(`Run missing not found in ${workdirRoot}.\n`);
  });
});

describe("cleanCommand", () => {
  it("removes kept guests and then the workdir", async () => {
    const { lab, workdirRoot, output } = await keptRun();
    expect(lab.removed).toEqual([]);

    const code = await cleanCommand({ workdirRoot, id: "run-7" }, { output, registry: lab.registry() });

    expect(code).toBe(0);
    expect(lab.removed).toEqual(["default-0"]);
    expect(await fse.pathExists(runDir(workdirRoot, "run-7"))).toBe(false);
  });

  it("leaves guests alone with keepGuests", async () => {
    const { lab, workdirRoot, output } = await keptRun();

    const code = await cleanCommand(
      { workdirRoot, id: "run-7", keepGuests: true },
      { output, registry: lab.registry() },
    );

    expect(code).toBe(0);
    expect(lab.removed).toEqual([]);
    expect(await fse.pathExists(runDir(workdirRoot, "run-7"))).toBe(false);
  });
});
