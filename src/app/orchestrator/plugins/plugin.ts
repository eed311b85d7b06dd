/**
 * Plugin contracts, one per step.
 * Purpose: the boundary between step sequencing and the work a phase does.
 * Assumptions: a plugin instance is built per phase from validated options and
 * never outlives one step; guests are owned by the provision step.
 * Usage: implement the interface for a step and register a factory for its `how`.
 */

import type { ConsoleOutput } from "../../../core/console-output.js";
import type { DiscoveredTest } from "../../../core/discovered.js";
import type { EventLogger } from "../../../core/logger.js";
import type { Environment, MetadataTree, PlanRecord, StepKey, TestRecord } from "../../../core/metadata.js";
import type { PhaseResult, TestResult } from "../../../core/results.js";
import type { PhaseData } from "../../../core/step-data.js";
import type { Context } from "../../../core/when.js";
import type { Guest } from "../guests/guest.js";

// =============================================================================
// RUNTIME
// =============================================================================

/** Everything a phase may know about the plan it runs in. */
export type PlanRuntime = {
  runId: string;
  plan: PlanRecord;
  /** `<run>/<plan>`, shared with guests at the same path. */
  workdir: string;
  /** `TMT_PLAN_DATA`. */
  dataDir: string;
  /** Plan environment overlaid with `--environment`. */
  environment: Environment;
  context: Context;
  tree: MetadataTree;
  logger: EventLogger;
  output: ConsoleOutput;
  signal?: AbortSignal;
  dry: boolean;
};

export type PhaseContext = {
  runtime: PlanRuntime;
  phase: PhaseData;
  /** `<plan>/<step>/<phase>`, created before the phase runs. */
  workdir: string;
};

// =============================================================================
// STEP CONTRACTS
// =============================================================================

export type DiscoverContext = PhaseContext & {
  /** `test --name` patterns given on the command line. */
  testNames: string[];
  /** Results of the previous execute step, for `failed-only`. */
  previousResults: TestResult[];
};

export interface DiscoverPlugin {
  /** Tests in the order they should run; the step assigns serial numbers. */
  discover(ctx: DiscoverContext): Promise<TestRecord[]>;
}

export type ProvisionContext = PhaseContext;

export interface ProvisionPlugin {
  readonly role: string | null;
  /** Bounded retries of a failed `start()`. */
  readonly retries: number;
  /** Milliseconds one provisioning attempt may take, if bounded. */
  readonly timeoutMs: number | null;
  /** Builds the guest; the step starts it. */
  createGuest(ctx: ProvisionContext): Guest;
}

export type GuestPhaseContext = PhaseContext & {
  guest: Guest;
  guests: Guest[];
  tests: DiscoveredTest[];
  /** Topology files already pushed to the guest. */
  topologyEnv: Record<string, string>;
};

/** Prepare and finish phases: work on one guest, one outcome. */
export interface GuestPhasePlugin {
  run(ctx: GuestPhaseContext): Promise<PhaseResult>;
}

export type ExecuteContext = GuestPhaseContext;

export interface ExecutePlugin {
  /** Tests already narrowed to the ones targeting `ctx.guest`. */
  execute(ctx: ExecuteContext): Promise<TestResult[]>;
}

export type ReportContext = PhaseContext & {
  results: TestResult[];
  guests: Array<{ name: string; role: string | null }>;
};

export interface ReportPlugin {
  report(ctx: ReportContext): Promise<void>;
}

export type PluginsByStep = {
  discover: DiscoverPlugin;
  provision: ProvisionPlugin;
  prepare: GuestPhasePlugin;
  execute: ExecutePlugin;
  report: ReportPlugin;
  finish: GuestPhasePlugin;
};

/** Builds a plugin for one phase, validating `phase.options`. */
export type PluginFactory<S extends StepKey> = (phase: PhaseData) => PluginsByStep[S];
