/*
Purpose: prepare and finish, the steps that run phases on guests through the
multihost dispatcher and record one PhaseResult per (phase, guest).
Assumptions: guests come from the provision step; the plan workdir is pushed to
every ready guest before its phases run.
Usage: await runPrepareStep({ runtime, phases, registry, force, guests, tests }).
*/

import path from "node:path";

import type { DiscoveredTest } from "../../../core/discovered.js";
import { formatErrorMessage } from "../../../core/error-format.js";
import { StepError } from "../../../core/errors.js";
import { logRunEvent } from "../../../core/logger.js";
import { phaseWorkdir, stepResultsPath, topologyDir } from "../../../core/paths.js";
import { parsePhaseResults, type PhaseResult } from "../../../core/results.js";
import { writeYamlAtomic } from "../../../core/state-store.js";
import type { PhaseData } from "../../../core/step-data.js";
import { listed, pathExists, readYamlFile, safeName } from "../../../core/utils.js";
import type { Guest } from "../guests/guest.js";
import { buildTopology, saveTopology } from "../guests/topology.js";
import type { PlanRuntime } from "../plugins/plugin.js";
import type { PluginRegistry } from "../plugins/registry.js";
import { dispatchPhases, type PhaseOutcome } from "../queue/phase-queue.js";

import { saveGuests } from "./provision.js";
import { enabledPhases, markStepDone, saveStepData, wakeStep } from "./step-state.js";

// =============================================================================
// TYPES
// =============================================================================

export type GuestStepInput = {
  runtime: PlanRuntime;
  phases: PhaseData[];
  registry: PluginRegistry;
  force: boolean;
  guests: Guest[];
  tests: DiscoveredTest[];
};

export type FinishStepInput = GuestStepInput & {
  /** Leave guests running after the phases. */
  keep: boolean;
};

/** Topology variables of each ready guest, keyed by guest name. */
export type GuestEnvironments = Map<string, Record<string, string>>;

export const REQUIRES_ORDER = 70;
export const RECOMMENDS_ORDER = 75;

type GuestPhaseStep = "prepare" | "finish";

// =============================================================================
// PREPARE
// =============================================================================

export async function runPrepareStep(input: GuestStepInput): Promise<PhaseResult[]> {
  const { runtime } = input;

  if ((await wakeStep(runtime, "prepare", { force: input.force })) === "done") {
    return loadPhaseResults(runtime.workdir, "prepare");
  }

  const phases = [
    ...enabledPhases(runtime, "prepare", input.phases),
    ...requirementPhases(input.tests, input.phases),
  ];
  const results = await runGuestPhases("prepare", input, phases, runtime.signal);
  await writeYamlAtomic(stepResultsPath(runtime.workdir, "prepare"), results);

  const failed = results.filter((result) => result.result === "error");
  if (failed.length > 0) {
    throw new StepError(
      `Prepare failed for ${listed(failed.length, "phase")}: ${failed.map(describeFailure).join("; ")}`,
    );
  }
  if (runtime.signal?.aborted) return results;

  await saveStepData(runtime.workdir, "prepare", phases);
  await markStepDone(runtime.workdir, "prepare");
  runtime.output.info(`prepare: ${listed(results.length, "phase")} applied`);
  return results;
}

/**
 * Install phases for what the tests require (failures fatal) and recommend
 * (missing packages tolerated), one pair per distinct `where`.
 */
export function requirementPhases(tests: DiscoveredTest[], declared: PhaseData[]): PhaseData[] {
  const groups = new Map<string, { where: string[]; require: string[]; recommend: string[] }>();
  for (const test of tests) {
    const key = test.where.join("\0");
    const group = groups.get(key) ?? { where: test.where, require: [], recommend: [] };
    group.require.push(...test.require);
    group.recommend.push(...test.recommend);
    groups.set(key, group);
  }

  const packageManager = declared.find((phase) => phase.how === "install")?.options[
    "package-manager"
  ];
  const phases: PhaseData[] = [];
  let index = declared.length;

  for (const group of groups.values()) {
    const suffix = group.where.length > 0 ? ` (${group.where.join(", ")})` : "";
    const kinds = [
      { name: "requires", order: REQUIRES_ORDER, packages: group.require, missing: "fail" },
      { name: "recommends", order: RECOMMENDS_ORDER, packages: group.recommend, missing: "skip" },
    ];

    for (const kind of kinds) {
      const packages = [...new Set(kind.packages)];
      if (packages.length === 0) continue;

      const options: Record<string, unknown> = { package: packages, missing: kind.missing };
      if (packageManager !== undefined) options["package-manager"] = packageManager;
      phases.push({
        name: `${kind.name}${suffix}`,
        how: "install",
        order: kind.order,
        where: group.where,
        when: [],
        summary: `Install packages the tests ${kind.name === "requires" ? "require" : "recommend"}`,
        index,
        options,
      });
      index += 1;
    }
  }

  return phases;
}

// =============================================================================
// FINISH
// =============================================================================

/**
 * Runs even after earlier failures or an interrupt; phase errors are reported,
 * never thrown, so the guests are always removed unless kept.
 */
export async function runFinishStep(input: FinishStepInput): Promise<PhaseResult[]> {
  const { runtime } = input;

  if ((await wakeStep(runtime, "finish", { force: input.force })) === "done") {
    return loadPhaseResults(runtime.workdir, "finish");
  }

  const phases = enabledPhases(runtime, "finish", input.phases);
  let results: PhaseResult[] = [];
  try {
    results = await runGuestPhases("finish", input, phases);
  } catch (err) {
    runtime.output.warn(`finish: ${formatErrorMessage(err)}`);
    logRunEvent(runtime.logger, "step.error", { step: "finish", message: formatErrorMessage(err) });
  }
  await writeYamlAtomic(stepResultsPath(runtime.workdir, "finish"), results);

  for (const failed of results.filter((result) => result.result === "error")) {
    runtime.output.warn(`finish: ${describeFailure(failed)}`);
  }

  if (input.keep) {
    runtime.output.info(`finish: keeping ${listed(input.guests.length, "guest")}`);
  } else {
    await removeGuests(runtime, input.guests);
  }
  await saveGuests(runtime.workdir, input.guests);

  await saveStepData(runtime.workdir, "finish", phases);
  await markStepDone(runtime.workdir, "finish");
  return results;
}

async function removeGuests(runtime: PlanRuntime, guests: Guest[]): Promise<void> {
  for (const guest of guests) {
    if (guest.status === "removed") continue;
    try {
      await guest.remove();
      logRunEvent(runtime.logger, "guest.removed", { guest: guest.name });
    } catch (err) {
      runtime.output.warn(`Could not remove guest ${guest.name}: ${formatErrorMessage(err)}`);
    }
  }
}

// =============================================================================
// SHARED
// =============================================================================

/**
 * Writes each ready guest's topology files and pushes the plan workdir to it.
 * Guests that are not ready get no entry.
 */
export async function syncGuests(runtime: PlanRuntime, guests: Guest[]): Promise<GuestEnvironments> {
  const envs: GuestEnvironments = new Map();

  for (const guest of guests) {
    if (!guest.isReady()) continue;
    const dir = path.join(topologyDir(runtime.workdir), safeName(guest.name) || "guest");
    const env = await saveTopology(buildTopology(guests, guest), dir);
    await guest.push(runtime.workdir);
    envs.set(guest.name, { ...env });
  }

  return envs;
}

/** Brings back what each guest left under `TMT_PLAN_DATA`. */
export async function pullPlanData(runtime: PlanRuntime, guests: Guest[]): Promise<void> {
  for (const guest of guests) {
    if (!guest.isReady()) continue;
    await guest.pull(runtime.dataDir);
  }
}

/** The ready guests; with none left, a step that has work cannot run it anywhere. */
export function requireReadyGuests(step: "prepare" | "execute", guests: Guest[]): Guest[] {
  const ready = guests.filter((guest) => guest.isReady());
  if (ready.length > 0) return ready;

  const known = guests.map((guest) => `${guest.name} is ${guest.status}`).join(", ");
  throw new StepError(
    `No ready guest for ${step}${known ? ` (${known})` : ""}; run provision again with --force.`,
  );
}

export async function loadPhaseResults(
  planWorkdir: string,
  step: GuestPhaseStep,
): Promise<PhaseResult[]> {
  const filePath = stepResultsPath(planWorkdir, step);
  if (!(await pathExists(filePath))) return [];
  return parsePhaseResults(await readYamlFile(filePath), filePath);
}

async function runGuestPhases(
  step: GuestPhaseStep,
  input: GuestStepInput,
  phases: PhaseData[],
  signal?: AbortSignal,
): Promise<PhaseResult[]> {
  const { runtime, registry } = input;
  if (phases.length === 0) return [];

  // options are validated for every phase before any guest is touched
  const plugins = new Map(phases.map((phase) => [phase, registry.create(step, phase)]));
  const guests =
    step === "finish" ? input.guests.filter((guest) => guest.isReady()) : requireReadyGuests(step, input.guests);
  const envs = await syncGuests(runtime, guests);

  const outcomes = await dispatchPhases({
    step,
    phases,
    guests,
    signal,
    logger: runtime.logger,
    run: async (phase, guest) => {
      const plugin = plugins.get(phase);
      if (!plugin) throw new StepError(`No plugin for ${step} phase '${phase.name}'.`);
      return plugin.run({
        runtime,
        phase,
        workdir: phaseWorkdir(runtime.workdir, step, phase.name),
        guest,
        guests,
        tests: input.tests,
        topologyEnv: envs.get(guest.name) ?? {},
      });
    },
  });

  await pullPlanData(runtime, guests);
  return outcomes.map(toPhaseResult);
}

function toPhaseResult(outcome: PhaseOutcome<PhaseData, Guest, PhaseResult>): PhaseResult {
  const guest = { name: outcome.guest.name, role: outcome.guest.role };
  switch (outcome.status) {
    case "ok":
      return outcome.result;
    case "error":
      return {
        name: outcome.phase.name,
        guest,
        result: "error",
        note: formatErrorMessage(outcome.error),
        log: [],
      };
    case "skipped":
      return { name: outcome.phase.name, guest, result: "skip", note: outcome.reason, log: [] };
  }
}

function describeFailure(result: PhaseResult): string {
  return `${result.name} on ${result.guest.name}${result.note ? ` (${result.note})` : ""}`;
}
