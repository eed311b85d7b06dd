/**
 * PlanEngine drives one plan through its steps.
 * Purpose: run the selected steps in pipeline order, borrow whatever earlier
 * invocations left on disk for the steps that are not selected, and always
 * give finish a chance to remove the guests.
 * Assumptions: the plan owns `<run>/<plan>`; nothing else writes there.
 * Usage: const outcome = await runPlan({ plan, steps, runWorkdir, ... }).
 */

import fse from "fs-extra";

import type { ConsoleOutput } from "../../../core/console-output.js";
import type { DiscoveredTest } from "../../../core/discovered.js";
import { formatErrorMessage } from "../../../core/error-format.js";
import { OrchestratorError } from "../../../core/errors.js";
import { logRunEvent, type EventLogger } from "../../../core/logger.js";
import {
  STEP_NAMES,
  type Environment,
  type MetadataTree,
  type PlanRecord,
  type RawPhase,
  type StepKey,
} from "../../../core/metadata.js";
import { planDataDir, planDir } from "../../../core/paths.js";
import type { TestResult } from "../../../core/results.js";
import { normalizePhases, type PhaseData, type StepOverride } from "../../../core/step-data.js";
import { listed } from "../../../core/utils.js";
import type { Context } from "../../../core/when.js";
import type { Guest } from "../guests/guest.js";
import type { PlanRuntime } from "../plugins/plugin.js";
import type { PluginRegistry } from "../plugins/registry.js";
import { loadDiscoveredTests, loadExecuteResults, runDiscoverStep } from "../steps/discover.js";
import { runExecuteStep } from "../steps/execute.js";
import { runFinishStep, runPrepareStep } from "../steps/guest-phase.js";
import { loadGuestRecords, restoreGuests, runProvisionStep } from "../steps/provision.js";
import { runReportStep } from "../steps/report.js";
import { isStepDone } from "../steps/step-state.js";

// =============================================================================
// TYPES
// =============================================================================

export type PlanRunInput = {
  runId: string;
  runWorkdir: string;
  plan: PlanRecord;
  tree: MetadataTree;
  registry: PluginRegistry;
  steps: StepKey[];
  force: boolean;
  dry: boolean;
  keep: boolean;
  /** `--environment`, layered over the plan's own. */
  environment: Environment;
  /** `--context`, layered over the plan's own. */
  context: Context;
  overrides: Partial<Record<StepKey, StepOverride[]>>;
  testNames: string[];
  env: NodeJS.ProcessEnv;
  logger: EventLogger;
  output: ConsoleOutput;
  signal?: AbortSignal;
};

export type PlanOutcome = {
  name: string;
  results: TestResult[];
  /** Execute ran, or its results were read back for report. */
  hasResults: boolean;
  error: unknown;
  interrupted: boolean;
};

/** Steps that run with a default phase when the plan declares none. */
const IMPLICIT_PHASE_STEPS = new Set<StepKey>(["discover", "provision", "execute", "report"]);

// =============================================================================
// PUBLIC API
// =============================================================================

export async function runPlan(input: PlanRunInput): Promise<PlanOutcome> {
  const runtime = await createPlanRuntime(input);
  const selected = new Set(input.steps);
  const phases = resolveStepPhases(input);
  const state = new PlanState(runtime, input);

  logRunEvent(runtime.logger, "plan.start", { steps: input.steps });
  input.output.print(input.plan.name);

  let error: unknown = null;
  try {
    if (input.dry) {
      await runDry(input, runtime, phases, state);
    } else {
      await runSteps(input, runtime, phases, selected, state);
    }
  } catch (err) {
    error = err;
    logRunEvent(runtime.logger, "plan.error", { message: formatErrorMessage(err) });
  }

  if (!input.dry && selected.has("finish")) {
    try {
      await runFinishStep({
        runtime,
        phases: phases.finish,
        registry: input.registry,
        force: input.force,
        guests: await state.guestsForFinish(),
        tests: (await state.testsIfKnown()) ?? [],
        keep: input.keep,
      });
    } catch (err) {
      error ??= err;
      logRunEvent(runtime.logger, "plan.error", { step: "finish", message: formatErrorMessage(err) });
    }
  }

  const interrupted = Boolean(input.signal?.aborted);
  logRunEvent(runtime.logger, "plan.complete", {
    results: state.results.length,
    error: error === null ? null : formatErrorMessage(error),
    interrupted,
  });

  return {
    name: input.plan.name,
    results: state.results,
    hasResults: state.hasResults,
    error,
    interrupted,
  };
}

/** Normalised phases of every step, with CLI and environment overrides applied. */
export function resolveStepPhases(
  input: Pick<PlanRunInput, "plan" | "overrides" | "env">,
): Record<StepKey, PhaseData[]> {
  const phases: Record<StepKey, PhaseData[]> = {
    discover: [],
    provision: [],
    prepare: [],
    execute: [],
    report: [],
    finish: [],
  };

  for (const step of STEP_NAMES) {
    const declared: RawPhase[] = input.plan.steps[step];
    const raw = declared.length === 0 && IMPLICIT_PHASE_STEPS.has(step) ? [{}] : declared;
    phases[step] = normalizePhases(step, raw, { env: input.env, overrides: input.overrides[step] });
  }
  return phases;
}

// =============================================================================
// INTERNALS
// =============================================================================

async function createPlanRuntime(input: PlanRunInput): Promise<PlanRuntime> {
  const workdir = planDir(input.runWorkdir, input.plan.name);
  const dataDir = planDataDir(workdir);
  await fse.ensureDir(dataDir);

  const runtime: PlanRuntime = {
    runId: input.runId,
    plan: input.plan,
    workdir,
    dataDir,
    environment: { ...input.plan.environment, ...input.environment },
    context: { ...input.plan.context, ...input.context },
    tree: input.tree,
    logger: input.logger,
    output: input.output.indented(1),
    dry: input.dry,
  };
  if (input.signal) runtime.signal = input.signal;
  return runtime;
}

async function runSteps(
  input: PlanRunInput,
  runtime: PlanRuntime,
  phases: Record<StepKey, PhaseData[]>,
  selected: Set<StepKey>,
  state: PlanState,
): Promise<void> {
  const common = { runtime, registry: input.registry, force: input.force };
  if (isAborted(input)) return;

  if (selected.has("discover")) {
    state.tests = await runDiscoverStep({
      ...common,
      phases: phases.discover,
      testNames: input.testNames,
    });
  }
  if (isAborted(input)) return;

  if (selected.has("provision")) {
    state.guests = await runProvisionStep({ ...common, phases: phases.provision });
  }
  if (isAborted(input)) return;

  if (selected.has("prepare")) {
    await runPrepareStep({
      ...common,
      phases: phases.prepare,
      guests: await state.requireGuests(),
      tests: await state.requireTests(),
    });
  }
  if (isAborted(input)) return;

  if (selected.has("execute")) {
    state.results = await runExecuteStep({
      ...common,
      phases: phases.execute,
      guests: await state.requireGuests(),
      tests: await state.requireTests(),
    });
    state.hasResults = true;
  }
  if (isAborted(input)) return;

  if (selected.has("report")) {
    if (!state.hasResults) {
      state.results = await loadExecuteResults(runtime.workdir);
      state.hasResults = await isStepDone(runtime.workdir, "execute");
    }
    await runReportStep({
      ...common,
      phases: phases.report,
      results: state.results,
      guests: await state.guestIdentities(),
    });
  }
}

/** Discovers for real, then only says what the other steps would do. */
async function runDry(
  input: PlanRunInput,
  runtime: PlanRuntime,
  phases: Record<StepKey, PhaseData[]>,
  state: PlanState,
): Promise<void> {
  if (input.steps.includes("discover")) {
    state.tests = await runDiscoverStep({
      runtime,
      registry: input.registry,
      force: input.force,
      phases: phases.discover,
      testNames: input.testNames,
    });
    const listing = runtime.output.indented(1);
    for (const test of state.tests) listing.info(`${test.name} [${test.serialNumber}]`);
  }

  for (const step of input.steps) {
    if (step === "discover") continue;
    const names = phases[step].map((phase) => `${phase.name} (${phase.how})`);
    runtime.output.info(
      `${step}: would run ${listed(names.length, "phase")}${names.length > 0 ? `: ${names.join(", ")}` : ""}`,
    );
  }
}

function isAborted(input: PlanRunInput): boolean {
  return Boolean(input.signal?.aborted);
}

/** What the plan knows so far, filled in lazily from disk for unselected steps. */
class PlanState {
  tests: DiscoveredTest[] | null = null;
  guests: Guest[] | null = null;
  results: TestResult[] = [];
  hasResults = false;

  constructor(
    private readonly runtime: PlanRuntime,
    private readonly input: PlanRunInput,
  ) {}

  async testsIfKnown(): Promise<DiscoveredTest[] | null> {
    this.tests ??= await loadDiscoveredTests(this.runtime.workdir);
    return this.tests;
  }

  async requireTests(): Promise<DiscoveredTest[]> {
    const tests = await this.testsIfKnown();
    if (tests === null) {
      throw new OrchestratorError(
        `Plan ${this.runtime.plan.name} has no discovered tests; run the discover step first.`,
      );
    }
    return tests;
  }

  async requireGuests(): Promise<Guest[]> {
    this.guests ??= await restoreGuests(this.runtime, this.input.registry);
    return this.guests;
  }

  /** Known guests, or none when provision never got far enough to record any. */
  async guestsForFinish(): Promise<Guest[]> {
    if (this.guests !== null) return this.guests;
    const records = await loadGuestRecords(this.runtime.workdir);
    this.guests = records.map((record) =>
      this.input.registry.restoreGuest(record, { logger: this.runtime.logger }),
    );
    return this.guests;
  }

  async guestIdentities(): Promise<Array<{ name: string; role: string | null }>> {
    if (this.guests !== null) {
      return this.guests.map((guest) => ({ name: guest.name, role: guest.role }));
    }
    const records = await loadGuestRecords(this.runtime.workdir);
    return records.map((record) => ({ name: record.name, role: record.role }));
  }
}
