/**
 * Removes a run: its guests first, then its workdir.
 * Purpose: back `trellis clean`, the only way a run workdir goes away.
 * Assumptions: guests of every plan are listed in its `guests.yaml`;
 * guests already removed by finish are skipped.
 */

import fse from "fs-extra";

import { formatErrorMessage } from "../../../core/error-format.js";
import type { EventLogger } from "../../../core/logger.js";
import { planDir, runDir } from "../../../core/paths.js";
import type { RunState } from "../../../core/state.js";
import type { PluginRegistry } from "../plugins/registry.js";
import { loadGuestRecords } from "../steps/provision.js";

export type CleanRunInput = {
  workdirRoot: string;
  state: RunState;
  registry: PluginRegistry;
  keepGuests: boolean;
  logger?: EventLogger;
};

export type CleanRunResult = {
  removedGuests: string[];
  /** `<guest>: <message>` for guests that could not be removed. */
  failedGuests: string[];
  workdirRemoved: boolean;
};

/** The workdir stays when a guest could not be removed, so the run can be cleaned again. */
export async function cleanRun(input: CleanRunInput): Promise<CleanRunResult> {
  const result: CleanRunResult = { removedGuests: [], failedGuests: [], workdirRemoved: false };
  const workdir = runDir(input.workdirRoot, input.state.run_id);

  if (!input.keepGuests) {
    for (const plan of input.state.plans) {
      const records = await loadGuestRecords(planDir(workdir, plan.name));
      for (const record of records) {
        if (record.status === "removed" || record.status === "not-provisioned") continue;
        try {
          const guest = input.registry.restoreGuest(record, input.logger ? { logger: input.logger } : {});
          await guest.remove();
          result.removedGuests.push(record.name);
        } catch (err) {
          result.failedGuests.push(`${record.name}: ${formatErrorMessage(err)}`);
        }
      }
    }
  }

  if (result.failedGuests.length === 0) {
    await fse.remove(workdir);
    result.workdirRemoved = true;
  }
  return result;
}
