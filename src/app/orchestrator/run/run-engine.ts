/**
 * RunEngine orchestrates a run by delegating each plan to the plan engine.
 * Purpose: own the run id, `run.yaml` and `log.jsonl`, run the selected plans
 * with bounded parallelism and fold their outcomes into one exit code.
 * Assumptions: plans are independent; a failing plan never stops its siblings.
 * Usage: const { exitCode } = await runEngine({ workdirRoot, root, selection, ... }).
 */

import pLimit from "p-limit";

import { ConsoleOutput } from "../../../core/console-output.js";
import { formatErrorMessage, normalizeAbortReason } from "../../../core/error-format.js";
import { UserFacingError, USER_FACING_ERROR_CODES } from "../../../core/errors.js";
import { JsonlLogger, logRunEvent, logRunResume } from "../../../core/logger.js";
import {
  FileMetadataTree,
  type Environment,
  type MetadataTree,
  type PlanRecord,
  type StepKey,
} from "../../../core/metadata.js";
import { runDir, runLogPath } from "../../../core/paths.js";
import type { ExitCode } from "../../../core/results.js";
import {
  createRunState,
  completeRun,
  markPlanFinished,
  markPlanRunning,
  registerPlans,
  resumeRun,
  type RunState,
} from "../../../core/state.js";
import { findLatestRunId, StateStore } from "../../../core/state-store.js";
import type { StepOverride } from "../../../core/step-data.js";
import { selectSteps, type StepSelection } from "../../../core/step-selection.js";
import { defaultRunId, listed } from "../../../core/utils.js";
import type { Context } from "../../../core/when.js";
import { defaultRegistry } from "../plugins/builtins.js";
import type { PluginRegistry } from "../plugins/registry.js";

import { exitCodeFor } from "./failure-policy.js";
import { runPlan, type PlanOutcome } from "./plan-engine.js";

// =============================================================================
// PUBLIC TYPES
// =============================================================================

export type RunOptions = {
  workdirRoot: string;
  /** Metadata root; a resumed run keeps the one it started with unless given. */
  root?: string;
  runId?: string;
  last?: boolean;
  selection: StepSelection;
  force?: boolean;
  dry?: boolean;
  keep?: boolean;
  environment?: Environment;
  context?: Context;
  overrides?: Partial<Record<StepKey, StepOverride[]>>;
  planNames?: string[];
  testNames?: string[];
  maxWorkers?: number;
  env?: NodeJS.ProcessEnv;
  debug?: boolean;
  output?: ConsoleOutput;
  stopSignal?: AbortSignal;
  registry?: PluginRegistry;
  tree?: MetadataTree;
};

export type RunResult = {
  runId: string;
  workdir: string;
  exitCode: ExitCode;
  steps: StepKey[];
  plans: PlanOutcome[];
  state: RunState;
};

// =============================================================================
// RUN ENGINE
// =============================================================================

export async function runEngine(options: RunOptions): Promise<RunResult> {
  const output = options.output ?? new ConsoleOutput();
  const env = options.env ?? process.env;
  const runId = await resolveRunId(options);
  const store = new StateStore(options.workdirRoot, runId);
  const resumed = await store.exists();

  const state = resumed
    ? await store.load()
    : createRunState({
        runId,
        root: options.root ?? process.cwd(),
        environment: options.environment,
        context: options.context,
      });
  if (resumed) {
    resumeRun(state);
    if (options.root) state.root = options.root;
    state.environment = { ...state.environment, ...options.environment };
    state.context = { ...state.context, ...options.context };
  }

  const steps = selectSteps(options.selection);
  const tree = options.tree ?? new FileMetadataTree(state.root, { env });
  const plans = await selectPlans(tree, options.planNames ?? []);
  const registry = options.registry ?? defaultRegistry();

  const logger = new JsonlLogger(runLogPath(options.workdirRoot, runId), { runId }, {
    debug: options.debug,
  });
  const stopLogging = logStop(logger, options.stopSignal);

  try {
    if (resumed) {
      logRunResume(logger, { runId, plans: plans.length });
    } else {
      logRunEvent(logger, "run.start", { root: state.root, steps });
    }
    output.info(`run ${runId}: ${listed(plans.length, "plan")}, steps ${steps.join(", ")}`);

    registerPlans(state, plans.map((plan) => plan.name));
    const saveState = serializedSaver(store, state);
    await saveState();

    const limit = pLimit(Math.max(1, options.maxWorkers ?? 1));
    const outcomes = await Promise.all(
      plans.map((plan) =>
        limit(async (): Promise<PlanOutcome> => {
          if (options.stopSignal?.aborted) {
            return { name: plan.name, results: [], hasResults: false, error: null, interrupted: true };
          }
          markPlanRunning(state, plan.name);
          await saveState();

          const outcome = await runPlan({
            runId,
            runWorkdir: runDir(options.workdirRoot, runId),
            plan,
            tree,
            registry,
            steps,
            force: options.force ?? false,
            dry: options.dry ?? false,
            keep: options.keep ?? false,
            environment: state.environment,
            context: state.context,
            overrides: options.overrides ?? {},
            testNames: options.testNames ?? [],
            env,
            logger: logger.child({ plan: plan.name }),
            output,
            ...(options.stopSignal ? { signal: options.stopSignal } : {}),
          });

          if (outcome.error !== null) {
            output.error(`${plan.name}: ${formatErrorMessage(outcome.error)}`);
          }
          markPlanFinished(state, plan.name, {
            exitCode: exitCodeFor([outcome]),
            ...(outcome.error !== null ? { error: formatErrorMessage(outcome.error) } : {}),
          });
          await saveState();
          return outcome;
        }),
      ),
    );

    const interrupted = Boolean(options.stopSignal?.aborted);
    const exitCode = exitCodeFor(outcomes);
    completeRun(state, { exitCode, interrupted });
    await saveState();

    logRunEvent(logger, "run.complete", { exit_code: exitCode, status: state.status });
    return {
      runId,
      workdir: runDir(options.workdirRoot, runId),
      exitCode,
      steps,
      plans: outcomes,
      state,
    };
  } finally {
    stopLogging();
    logger.close();
  }
}

// =============================================================================
// INTERNALS
// =============================================================================

async function resolveRunId(options: RunOptions): Promise<string> {
  if (options.runId) return options.runId;
  if (!options.last) return defaultRunId();

  const latest = await findLatestRunId(options.workdirRoot);
  if (!latest) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.config,
      title: "No previous run.",
      message: `No run found under ${options.workdirRoot}.`,
      hint: "Start a new run without --last, or point --workdir-root at the right directory.",
    });
  }
  return latest;
}

async function selectPlans(tree: MetadataTree, names: string[]): Promise<PlanRecord[]> {
  const plans = (await tree.plans({ names })).filter((plan) => plan.enabled);
  if (plans.length === 0) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.config,
      title: "No plans selected.",
      message:
        names.length > 0
          ? `No enabled plan matches ${names.map((name) => `'${name}'`).join(", ")} in ${tree.root}.`
          : `No enabled plans found in ${tree.root}.`,
      hint: "A plan is a node with an `execute` key; list them with `trellis plans`.",
    });
  }
  return plans;
}

/**
 * Plans finish concurrently; saves are chained so an older state never lands
 * last. A failed save rejects only its own caller.
 */
export function serializedSaver(store: Pick<StateStore, "save">, state: RunState): () => Promise<void> {
  let pending: Promise<void> = Promise.resolve();
  return () => {
    const save = pending.catch(() => undefined).then(() => store.save(state));
    pending = save;
    return save;
  };
}

function logStop(logger: JsonlLogger, signal?: AbortSignal): () => void {
  if (!signal) return () => undefined;

  const onAbort = (): void => {
    const reason = normalizeAbortReason(signal.reason);
    logRunEvent(logger, "run.interrupted", reason ? { reason } : {});
  };

  if (signal.aborted) {
    onAbort();
    return () => undefined;
  }
  signal.addEventListener("abort", onAbort, { once: true });
  return () => signal.removeEventListener("abort", onAbort);
}
