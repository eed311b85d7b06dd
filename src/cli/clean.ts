import { ConsoleOutput } from "../core/console-output.js";
import { USER_FACING_ERROR_CODES } from "../core/errors.js";
import { resolveWorkdirRoot } from "../core/paths.js";
import { loadRunStateForRoot } from "../core/state-store.js";
import { cleanRun } from "../app/orchestrator/run/clean-run.js";
import { defaultRegistry } from "../app/orchestrator/plugins/builtins.js";
import type { PluginRegistry } from "../app/orchestrator/plugins/registry.js";

import { normalizeCommandError } from "./command-errors.js";

type CleanOptions = {
  id?: string;
  last?: boolean;
  workdirRoot?: string;
  keepGuests?: boolean;
};

export type CleanCommandDeps = {
  env?: NodeJS.ProcessEnv;
  output?: ConsoleOutput;
  registry?: PluginRegistry;
};

/** Returns 0 when the run is gone, 2 when a guest could not be removed. */
export async function cleanCommand(opts: CleanOptions, deps: CleanCommandDeps = {}): Promise<number> {
  const output = deps.output ?? new ConsoleOutput();

  try {
    const workdirRoot = resolveWorkdirRoot({ workdirRoot: opts.workdirRoot, env: deps.env });
    const resolved = await loadRunStateForRoot(workdirRoot, opts.id);
    if (!resolved) {
      output.print(opts.id ? `Run ${opts.id} not found in ${workdirRoot}.` : `No runs found in ${workdirRoot}.`);
      return 0;
    }

    const result = await cleanRun({
      workdirRoot,
      state: resolved.state,
      registry: deps.registry ?? defaultRegistry(),
      keepGuests: opts.keepGuests ?? false,
    });

    for (const name of result.removedGuests) output.info(`Removed guest ${name}.`);
    for (const failure of result.failedGuests) output.warn(`Could not remove guest ${failure}`);

    if (!result.workdirRemoved) {
      output.print(`Kept run ${resolved.runId}; rerun clean once its guests can be removed.`);
      return 2;
    }
    output.print(`Removed run ${resolved.runId}.`);
    return 0;
  } catch (error) {
    throw normalizeCommandError(error, {
      title: "Clean command failed.",
      hints: {
        [USER_FACING_ERROR_CODES.config]: "Pass --keep-guests to remove the workdir without touching guests.",
      },
    });
  }
}
