/*
Purpose: per-step bookkeeping on disk: the `done` marker, `step.yaml`, and
wiping a step that is forced or was interrupted.
Assumptions: a step directory without a `done` marker belongs to an interrupted
invocation and holds nothing worth keeping.
Usage: if ((await wakeStep(runtime, "discover", { force })) === "done") return cached;
*/

import fse from "fs-extra";

import { logRunEvent } from "../../../core/logger.js";
import type { StepKey } from "../../../core/metadata.js";
import { stepDataPath, stepDir, stepDoneMarkerPath } from "../../../core/paths.js";
import { writeYamlAtomic } from "../../../core/state-store.js";
import { phaseToRecord, type PhaseData } from "../../../core/step-data.js";
import { isoNow, writeTextFile } from "../../../core/utils.js";
import { evaluateWhen } from "../../../core/when.js";
import type { PlanRuntime } from "../plugins/plugin.js";

export type StepWake = "done" | "fresh";

/** Only a regular file counts; anything else under that name is left over from a broken step. */
export async function isStepDone(planWorkdir: string, step: StepKey): Promise<boolean> {
  const marker = stepDoneMarkerPath(planWorkdir, step);
  if (!(await fse.pathExists(marker))) return false;
  return (await fse.stat(marker)).isFile();
}

/**
 * "done" when the step can be skipped. Otherwise the step directory is wiped,
 * so a forced step regenerates everything instead of merging with old data.
 */
export async function wakeStep(
  runtime: PlanRuntime,
  step: StepKey,
  opts: { force: boolean },
): Promise<StepWake> {
  const dir = stepDir(runtime.workdir, step);
  const done = await isStepDone(runtime.workdir, step);

  if (done && !opts.force) {
    logRunEvent(runtime.logger, "step.cached", { step });
    runtime.output.verbose(`${step}: already done`);
    return "done";
  }

  if (await fse.pathExists(dir)) {
    logRunEvent(runtime.logger, "step.reset", { step, reason: done ? "forced" : "interrupted" });
    await fse.remove(dir);
  }

  await fse.ensureDir(dir);
  return "fresh";
}

export async function saveStepData(
  planWorkdir: string,
  step: StepKey,
  phases: PhaseData[],
): Promise<void> {
  await writeYamlAtomic(stepDataPath(planWorkdir, step), phases.map(phaseToRecord));
}

export async function markStepDone(planWorkdir: string, step: StepKey): Promise<void> {
  await writeTextFile(stepDoneMarkerPath(planWorkdir, step), `${isoNow()}\n`);
}

/** Phases whose `when` rules hold for the plan context; the rest are logged and dropped. */
export function enabledPhases(runtime: PlanRuntime, step: StepKey, phases: PhaseData[]): PhaseData[] {
  return phases.filter((phase) => {
    if (evaluateWhen(phase.when, runtime.context)) return true;
    logRunEvent(runtime.logger, "phase.skip", { step, phase: phase.name, reason: "when" });
    runtime.output.verbose(`${step}: skipping phase ${phase.name} (when: ${phase.when.join(" or ")})`);
    return false;
  });
}
