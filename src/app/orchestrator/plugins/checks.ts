/*
Purpose: run a test's `check` scripts before or after it, one outcome per check.
Assumptions: only shell checks exist; exit 0 passes, 1 fails, anything else errors.
*/

import path from "node:path";

import { ConfigError } from "../../../core/errors.js";
import type { CheckEvent, CheckSpec } from "../../../core/metadata.js";
import { outcomeFromExitCode, type CheckOutcome } from "../../../core/results.js";
import { safeName, writeTextFile } from "../../../core/utils.js";
import type { Guest } from "../guests/guest.js";

export type CheckRunOptions = {
  guest: Pick<Guest, "execute">;
  cwd: string;
  env: Record<string, string>;
  /** Check logs go to `<logDir>/checks/`. */
  logDir: string;
  /** Log paths are recorded relative to this directory. */
  relativeTo: string;
};

export function checkName(spec: CheckSpec): string {
  return spec.name ?? spec.how;
}

export async function runChecks(
  event: CheckEvent,
  specs: CheckSpec[],
  opts: CheckRunOptions,
): Promise<CheckOutcome[]> {
  const outcomes: CheckOutcome[] = [];

  for (const spec of specs) {
    if (!spec.enabled || spec.event !== event) continue;
    if (spec.how !== "shell") {
      throw new ConfigError(`Unsupported check '${spec.how}', only shell checks are available.`);
    }
    if (!spec.script) {
      throw new ConfigError(`Check '${checkName(spec)}' has no script.`);
    }

    const name = checkName(spec);
    const res = await opts.guest.execute(spec.script, { cwd: opts.cwd, env: opts.env });
    const logPath = path.join(opts.logDir, "checks", `${safeName(name) || "check"}-${event}.txt`);
    await writeTextFile(logPath, `${res.stdout}${res.stderr}`);

    outcomes.push({
      check: {
        name,
        event,
        result: outcomeFromExitCode(res.exitCode),
        note: null,
        log: [path.relative(opts.relativeTo, logPath)],
      },
      interpret: spec.result,
    });
  }

  return outcomes;
}
