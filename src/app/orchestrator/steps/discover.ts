import fse from "fs-extra";

import {
  assignSerialNumbers,
  parseTests,
  serializeTests,
  type DiscoveredBatch,
  type DiscoveredTest,
} from "../../../core/discovered.js";
import { formatErrorMessage } from "../../../core/error-format.js";
import { DiscoverError, OrchestratorError } from "../../../core/errors.js";
import { logRunEvent } from "../../../core/logger.js";
import type { TestRecord } from "../../../core/metadata.js";
import { discoveredTestsPath, phaseWorkdir, stepResultsPath } from "../../../core/paths.js";
import { parseResults, type TestResult } from "../../../core/results.js";
import { writeYamlAtomic } from "../../../core/state-store.js";
import type { PhaseData } from "../../../core/step-data.js";
import { listed, readYamlFile } from "../../../core/utils.js";
import type { PlanRuntime } from "../plugins/plugin.js";
import type { PluginRegistry } from "../plugins/registry.js";

import { enabledPhases, markStepDone, saveStepData, wakeStep } from "./step-state.js";

export type DiscoverStepInput = {
  runtime: PlanRuntime;
  phases: PhaseData[];
  registry: PluginRegistry;
  force: boolean;
  testNames: string[];
};

/** Tests of a finished discover step, or null when it has not run. */
export async function loadDiscoveredTests(planWorkdir: string): Promise<DiscoveredTest[] | null> {
  const filePath = discoveredTestsPath(planWorkdir);
  if (!(await fse.pathExists(filePath))) return null;
  return parseTests(await readYamlFile(filePath), filePath);
}

export async function loadExecuteResults(planWorkdir: string): Promise<TestResult[]> {
  const filePath = stepResultsPath(planWorkdir, "execute");
  if (!(await fse.pathExists(filePath))) return [];
  return parseResults(await readYamlFile(filePath), filePath);
}

export async function runDiscoverStep(input: DiscoverStepInput): Promise<DiscoveredTest[]> {
  const { runtime, registry } = input;
  const workdir = runtime.workdir;

  // `failed-only` selects from the last execute results
  const previousResults = await loadExecuteResults(workdir);

  if ((await wakeStep(runtime, "discover", { force: input.force })) === "done") {
    return (await loadDiscoveredTests(workdir)) ?? [];
  }

  const batches: DiscoveredBatch[] = [];
  const phases = enabledPhases(runtime, "discover", input.phases);

  for (const phase of phases) {
    const plugin = registry.create("discover", phase);
    const phaseDir = phaseWorkdir(workdir, "discover", phase.name);
    await fse.ensureDir(phaseDir);

    let tests: TestRecord[];
    try {
      tests = await plugin.discover({
        runtime,
        phase,
        workdir: phaseDir,
        testNames: input.testNames,
        previousResults,
      });
    } catch (err) {
      if (err instanceof OrchestratorError) throw err;
      throw new DiscoverError(`Discover phase '${phase.name}' failed: ${formatErrorMessage(err)}`, err);
    }

    logRunEvent(runtime.logger, "discover.phase", { phase: phase.name, tests: tests.length });
    runtime.output.verbose(`discover: ${phase.name} found ${listed(tests.length, "test")}`);
    batches.push({ phase: phase.name, where: phase.where, tests });
  }

  const discovered = assignSerialNumbers(batches);
  await writeYamlAtomic(discoveredTestsPath(workdir), serializeTests(discovered));
  await saveStepData(workdir, "discover", input.phases);
  await markStepDone(workdir, "discover");

  runtime.output.info(`discover: ${listed(discovered.length, "test")} selected`);
  return discovered;
}
