import { ConsoleOutput } from "../core/console-output.js";
import { USER_FACING_ERROR_CODES } from "../core/errors.js";
import { resolveWorkdirRoot } from "../core/paths.js";
import {
  loadRunStateForRoot,
  summarizeRunState,
  type PlanStatusRow,
  type RunStatusSummary,
} from "../core/state-store.js";

import { normalizeCommandError } from "./command-errors.js";

type StatusOptions = {
  id?: string;
  last?: boolean;
  workdirRoot?: string;
};

export type StatusCommandDeps = {
  env?: NodeJS.ProcessEnv;
  output?: ConsoleOutput;
};

/** Prints the state of one run; returns 1 when there is no such run. */
export async function statusCommand(opts: StatusOptions, deps: StatusCommandDeps = {}): Promise<number> {
  const output = deps.output ?? new ConsoleOutput();

  try {
    const workdirRoot = resolveWorkdirRoot({ workdirRoot: opts.workdirRoot, env: deps.env });
    const resolved = await loadRunStateForRoot(workdirRoot, opts.id);
    if (!resolved) {
      output.print(opts.id ? `Run ${opts.id} not found in ${workdirRoot}.` : `No runs found in ${workdirRoot}.`);
      output.print("Start a run with: trellis run");
      return 1;
    }

    const summary = summarizeRunState(resolved.state);
    printRunSummary(output, summary);
    printPlanTable(output, summary.plans);
    return 0;
  } catch (error) {
    throw normalizeCommandError(error, {
      title: "Status command failed.",
      hints: {
        [USER_FACING_ERROR_CODES.config]: "Remove the run with `trellis clean --id <run>` if its run.yaml is damaged.",
      },
    });
  }
}

function printRunSummary(output: ConsoleOutput, summary: RunStatusSummary): void {
  output.print(`Run: ${summary.runId}`);
  output.print(`Status: ${summary.status}`);
  output.print(`Started: ${summary.startedAt}`);
  output.print(`Updated: ${summary.updatedAt}`);
  output.print(`Exit code: ${summary.exitCode ?? "-"}`);
  output.print("");

  const counts = summary.planCounts;
  const parts = [
    `total=${counts.total}`,
    `pending=${counts.pending}`,
    `running=${counts.running}`,
    `complete=${counts.complete}`,
    `failed=${counts.failed}`,
  ];
  output.print(`Plans: ${parts.join("  ")}`);
  output.print("");
}

export function printPlanTable(output: ConsoleOutput, rows: PlanStatusRow[]): void {
  if (rows.length === 0) {
    output.print("  (no plans tracked for this run)");
    return;
  }

  const nameWidth = Math.max("Plan".length, ...rows.map((r) => r.name.length));
  const statusWidth = Math.max("Status".length, ...rows.map((r) => r.status.length));
  const exitWidth = "Exit".length;

  output.print(`  ${pad("Plan", nameWidth)}  ${pad("Status", statusWidth)}  ${pad("Exit", exitWidth)}`);
  for (const row of rows) {
    const exit = row.exitCode === null ? "-" : `${row.exitCode}`;
    output.print(`  ${pad(row.name, nameWidth)}  ${pad(row.status, statusWidth)}  ${exit}`.trimEnd());
    if (row.lastError) {
      output.print(`    Error: ${row.lastError}`);
    }
  }
}

export function pad(value: string, width: number): string {
  return value.padEnd(width, " ");
}
