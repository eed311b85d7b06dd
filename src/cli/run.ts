import { ConsoleOutput } from "../core/console-output.js";
import { USER_FACING_ERROR_CODES } from "../core/errors.js";
import { resolveWorkdirRoot } from "../core/paths.js";
import { parseStepName, type StepSelection } from "../core/step-selection.js";
import { runEngine, type RunResult } from "../app/orchestrator/run/run-engine.js";

import { normalizeCommandError } from "./command-errors.js";
import { parseContextPairs, parseEnvironmentPairs, parseRunSegments } from "./run-args.js";
import { createRunStopSignalHandler } from "./signal-handlers.js";

// =============================================================================
// TYPES
// =============================================================================

/** Options of `trellis run` as commander hands them over. */
export type RunCommandOptions = {
  id?: string;
  last?: boolean;
  root?: string;
  workdirRoot?: string;
  force?: boolean;
  dry?: boolean;
  keep?: boolean;
  debug?: boolean;
  verbose?: boolean;
  quiet?: boolean;
  all?: boolean;
  until?: string;
  since?: string;
  before?: string;
  after?: string;
  skip: string[];
  environment: string[];
  context: string[];
  maxWorkers?: number;
};

export type RunCommandDeps = {
  env?: NodeJS.ProcessEnv;
  output?: ConsoleOutput;
  stopSignal?: AbortSignal;
};

// =============================================================================
// COMMAND
// =============================================================================

/** Runs the selected plans and returns the exit code for the process. */
export async function runCommand(
  args: string[],
  opts: RunCommandOptions,
  deps: RunCommandDeps = {},
): Promise<number> {
  const env = deps.env ?? process.env;
  const output =
    deps.output ??
    new ConsoleOutput({ verbosity: opts.quiet ? "quiet" : opts.verbose ? "verbose" : "normal" });

  try {
    const segments = parseRunSegments(args);
    const selection = buildSelection(opts, segments.steps);
    const workdirRoot = resolveWorkdirRoot({ workdirRoot: opts.workdirRoot, env });

    const stopHandler = deps.stopSignal
      ? null
      : createRunStopSignalHandler({
          onSignal: (signal) => {
            output.warn(`Received ${signal}, stopping after the current phases; finish still runs.`);
          },
        });

    let result: RunResult;
    try {
      result = await runEngine({
        workdirRoot,
        ...(opts.root ? { root: opts.root } : {}),
        ...(opts.id ? { runId: opts.id } : {}),
        last: opts.last ?? false,
        selection,
        force: opts.force ?? false,
        dry: opts.dry ?? false,
        keep: opts.keep ?? false,
        environment: parseEnvironmentPairs(opts.environment),
        context: parseContextPairs(opts.context),
        overrides: segments.overrides,
        planNames: segments.planNames,
        testNames: segments.testNames,
        ...(opts.maxWorkers !== undefined ? { maxWorkers: opts.maxWorkers } : {}),
        env,
        debug: opts.debug ?? false,
        output,
        stopSignal: deps.stopSignal ?? stopHandler?.signal,
      });
    } finally {
      stopHandler?.cleanup();
    }

    output.info(`run ${result.runId} finished with exit code ${result.exitCode} (workdir ${result.workdir})`);
    return result.exitCode;
  } catch (error) {
    throw normalizeCommandError(error, {
      title: "Run command failed.",
      hints: {
        [USER_FACING_ERROR_CODES.config]: "Check trellis.yaml and the step options, then rerun.",
        [USER_FACING_ERROR_CODES.docker]: "Start the Docker daemon, or provision with --how local.",
      },
    });
  }
}

/** Named steps plus the range flags; see `selectSteps`. */
export function buildSelection(opts: RunCommandOptions, steps: StepSelection["steps"]): StepSelection {
  const selection: StepSelection = {
    steps,
    all: opts.all ?? false,
    skip: opts.skip.map((step) => parseStepName(step, "--skip")),
  };
  if (opts.until) selection.until = parseStepName(opts.until, "--until");
  if (opts.since) selection.since = parseStepName(opts.since, "--since");
  if (opts.before) selection.before = parseStepName(opts.before, "--before");
  if (opts.after) selection.after = parseStepName(opts.after, "--after");
  return selection;
}
