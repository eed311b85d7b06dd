import path from "node:path";

import { safeName } from "./utils.js";

// =============================================================================
// TYPES
// =============================================================================

export type StepName = "discover" | "provision" | "prepare" | "execute" | "report" | "finish";

export type ResolveWorkdirRootOptions = {
  workdirRoot?: string;
  env?: NodeJS.ProcessEnv;
};

export const DEFAULT_WORKDIR_ROOT = "/var/tmp/trellis";
export const WORKDIR_ROOT_ENV = "TRELLIS_WORKDIR_ROOT";

// =============================================================================
// WORKDIR ROOT
// =============================================================================

export function resolveWorkdirRoot(opts: ResolveWorkdirRootOptions = {}): string {
  if (opts.workdirRoot) {
    return path.resolve(opts.workdirRoot);
  }

  const env = opts.env ?? process.env;
  const fromEnv = env[WORKDIR_ROOT_ENV];
  if (fromEnv) {
    return path.resolve(fromEnv);
  }

  return DEFAULT_WORKDIR_ROOT;
}

// =============================================================================
// RUN LAYOUT
// =============================================================================

export function runDir(workdirRoot: string, runId: string): string {
  return path.join(workdirRoot, runId);
}

export function runStatePath(workdirRoot: string, runId: string): string {
  return path.join(runDir(workdirRoot, runId), "run.yaml");
}

export function runLogPath(workdirRoot: string, runId: string): string {
  return path.join(runDir(workdirRoot, runId), "log.jsonl");
}

// =============================================================================
// PLAN LAYOUT
// =============================================================================

/** `/plans/smoke` lives under `<run>/plans/smoke`. */
export function planDir(runWorkdir: string, planName: string): string {
  const relative = planName.replace(/^\/+/, "");
  const segments = relative.split("/").filter((segment) => segment.length > 0).map(safeName);
  return path.join(runWorkdir, ...(segments.length > 0 ? segments : ["default"]));
}

export function planDataDir(planWorkdir: string): string {
  return path.join(planWorkdir, "data");
}

export function stepDir(planWorkdir: string, step: StepName): string {
  return path.join(planWorkdir, step);
}

export function stepDoneMarkerPath(planWorkdir: string, step: StepName): string {
  return path.join(stepDir(planWorkdir, step), "done");
}

export function stepDataPath(planWorkdir: string, step: StepName): string {
  return path.join(stepDir(planWorkdir, step), "step.yaml");
}

export function stepResultsPath(planWorkdir: string, step: StepName): string {
  return path.join(stepDir(planWorkdir, step), "results.yaml");
}

export function discoveredTestsPath(planWorkdir: string): string {
  return path.join(stepDir(planWorkdir, "discover"), "tests.yaml");
}

export function guestsPath(planWorkdir: string): string {
  return path.join(stepDir(planWorkdir, "provision"), "guests.yaml");
}

export function topologyDir(planWorkdir: string): string {
  return path.join(stepDir(planWorkdir, "provision"), "topology");
}

/**
 * `<step>/phases/<phase>`: phase names are free-form, so they get a directory
 * of their own beside the step's `done`, `step.yaml` and result files.
 */
export function phaseWorkdir(planWorkdir: string, step: StepName, phaseName: string): string {
  const name = safeName(phaseName);
  return path.join(stepDir(planWorkdir, step), "phases", name === "" || /^\.+$/.test(name) ? "default" : name);
}

/** `execute/data/guest/<guest>/<test>-<serial>`. */
export function testInvocationDir(
  planWorkdir: string,
  guestName: string,
  testName: string,
  serialNumber: number,
): string {
  return path.join(
    stepDir(planWorkdir, "execute"),
    "data",
    "guest",
    safeName(guestName),
    `${safeName(testName) || "test"}-${serialNumber}`,
  );
}
