import { formatErrorMessage } from "../../../core/error-format.js";
import { OrchestratorError, StepError } from "../../../core/errors.js";
import { phaseWorkdir } from "../../../core/paths.js";
import type { TestResult } from "../../../core/results.js";
import type { PhaseData } from "../../../core/step-data.js";
import type { PlanRuntime, ReportContext } from "../plugins/plugin.js";
import type { PluginRegistry } from "../plugins/registry.js";

import { enabledPhases, markStepDone, saveStepData, wakeStep } from "./step-state.js";

export type ReportStepInput = {
  runtime: PlanRuntime;
  phases: PhaseData[];
  registry: PluginRegistry;
  force: boolean;
  results: TestResult[];
  guests: ReportContext["guests"];
};

/** Every report phase runs even when an earlier one failed; failures are raised together. */
export async function runReportStep(input: ReportStepInput): Promise<void> {
  const { runtime, registry } = input;

  if ((await wakeStep(runtime, "report", { force: input.force })) === "done") return;

  const failures: unknown[] = [];
  for (const phase of enabledPhases(runtime, "report", input.phases)) {
    const plugin = registry.create("report", phase);
    try {
      await plugin.report({
        runtime,
        phase,
        workdir: phaseWorkdir(runtime.workdir, "report", phase.name),
        results: input.results,
        guests: input.guests,
      });
    } catch (err) {
      failures.push(
        err instanceof OrchestratorError
          ? err
          : new OrchestratorError(`Report phase '${phase.name}' failed: ${formatErrorMessage(err)}`, err),
      );
    }
  }

  if (failures.length > 0) {
    throw new StepError(failures.map((failure) => formatErrorMessage(failure)).join("; "), failures);
  }

  await saveStepData(runtime.workdir, "report", input.phases);
  await markStepDone(runtime.workdir, "report");
}
