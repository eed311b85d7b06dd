import { testsForGuest, type DiscoveredTest } from "../../../core/discovered.js";
import { formatErrorMessage } from "../../../core/error-format.js";
import { ConfigError } from "../../../core/errors.js";
import { logRunEvent } from "../../../core/logger.js";
import { phaseWorkdir, stepResultsPath } from "../../../core/paths.js";
import { serializeResult, type TestResult } from "../../../core/results.js";
import { writeYamlAtomic } from "../../../core/state-store.js";
import type { PhaseData } from "../../../core/step-data.js";
import { listed } from "../../../core/utils.js";
import type { Guest } from "../guests/guest.js";
import type { PlanRuntime } from "../plugins/plugin.js";
import type { PluginRegistry } from "../plugins/registry.js";
import { dispatchPhases } from "../queue/phase-queue.js";

import { loadExecuteResults } from "./discover.js";
import { pullPlanData, requireReadyGuests, syncGuests } from "./guest-phase.js";
import { enabledPhases, markStepDone, saveStepData, wakeStep } from "./step-state.js";

export type ExecuteStepInput = {
  runtime: PlanRuntime;
  phases: PhaseData[];
  registry: PluginRegistry;
  force: boolean;
  guests: Guest[];
  tests: DiscoveredTest[];
};

/**
 * Runs every test on every guest its discover phase targets. A runner that
 * fails outright turns each of that guest's tests into an `error` result.
 * Results are saved even when interrupted; the step is only marked done when
 * it ran to the end.
 */
export async function runExecuteStep(input: ExecuteStepInput): Promise<TestResult[]> {
  const { runtime, registry } = input;
  const workdir = runtime.workdir;

  if ((await wakeStep(runtime, "execute", { force: input.force })) === "done") {
    return loadExecuteResults(workdir);
  }

  const phases = enabledPhases(runtime, "execute", input.phases);
  if (phases.length > 1) {
    // a second runner would reuse the serial numbers and invocation directories
    throw new ConfigError(
      `Plan ${runtime.plan.name} defines ${phases.length} execute phases (${phases
        .map((phase) => phase.name)
        .join(", ")}); only one is supported.`,
    );
  }
  const plugins = new Map(phases.map((phase) => [phase, registry.create("execute", phase)]));
  const guests =
    phases.length > 0 && input.tests.length > 0
      ? requireReadyGuests("execute", input.guests)
      : input.guests.filter((guest) => guest.isReady());
  const envs = await syncGuests(runtime, guests);

  const outcomes = await dispatchPhases({
    step: "execute",
    phases,
    guests,
    signal: runtime.signal,
    logger: runtime.logger,
    run: async (phase, guest) => {
      const plugin = plugins.get(phase);
      if (!plugin) return [];
      return plugin.execute({
        runtime,
        phase,
        workdir: phaseWorkdir(workdir, "execute", phase.name),
        guest,
        guests,
        tests: testsForGuest(input.tests, guest),
        topologyEnv: envs.get(guest.name) ?? {},
      });
    },
  });

  const results: TestResult[] = [];
  for (const outcome of outcomes) {
    if (outcome.status === "ok") {
      results.push(...outcome.result);
    } else if (outcome.status === "error") {
      const note = formatErrorMessage(outcome.error);
      runtime.output.warn(`execute: ${outcome.phase.name} failed on ${outcome.guest.name}: ${note}`);
      for (const test of testsForGuest(input.tests, outcome.guest)) {
        results.push(runnerErrorResult(test, outcome.guest, note));
      }
    } else {
      logRunEvent(runtime.logger, "phase.skip", {
        step: "execute",
        phase: outcome.phase.name,
        guest: outcome.guest.name,
        reason: outcome.reason,
      });
    }
  }

  await writeYamlAtomic(stepResultsPath(workdir, "execute"), results.map(serializeResult));
  await pullPlanData(runtime, guests);
  if (runtime.signal?.aborted) return results;

  await saveStepData(workdir, "execute", input.phases);
  await markStepDone(workdir, "execute");
  runtime.output.info(`execute: ${listed(results.length, "test")} executed`);
  return results;
}

function runnerErrorResult(test: DiscoveredTest, guest: Guest, note: string): TestResult {
  return {
    name: test.name,
    serialNumber: test.serialNumber,
    guest: { name: guest.name, role: guest.role },
    result: "error",
    note,
    log: [],
    startTime: null,
    endTime: null,
    duration: null,
    dataPath: null,
    subresult: [],
    check: [],
  };
}
