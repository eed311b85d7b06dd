/*
Purpose: provision one guest per provision phase and keep them in guests.yaml,
so later invocations borrow the same guests instead of provisioning again.
Assumptions: guests of one step start concurrently; a guest that started is
recorded even when a sibling fails, so finish can still remove it.
*/

import fse from "fs-extra";
import { z } from "zod";

import { formatIssues } from "../../../core/config-loader.js";
import { formatErrorMessage } from "../../../core/error-format.js";
import { ConfigError, OrchestratorError, ProvisionError, StepError } from "../../../core/errors.js";
import { logRunEvent } from "../../../core/logger.js";
import { guestsPath, phaseWorkdir } from "../../../core/paths.js";
import { writeYamlAtomic } from "../../../core/state-store.js";
import type { PhaseData } from "../../../core/step-data.js";
import { listed, readYamlFile, withTimeout } from "../../../core/utils.js";
import type { Guest, SerializedGuest } from "../guests/guest.js";
import type { PlanRuntime, ProvisionPlugin } from "../plugins/plugin.js";
import type { PluginRegistry } from "../plugins/registry.js";

import { enabledPhases, isStepDone, markStepDone, saveStepData, wakeStep } from "./step-state.js";

export type ProvisionStepInput = {
  runtime: PlanRuntime;
  phases: PhaseData[];
  registry: PluginRegistry;
  force: boolean;
};

const SerializedGuestSchema = z.object({
  name: z.string().min(1),
  role: z.string().nullable().default(null),
  how: z.string().min(1),
  status: z.enum(["not-provisioned", "provisioning", "ready", "unreachable", "removed"]),
  hostname: z.string().nullable().default(null),
  data: z.record(z.unknown()).default({}),
});

// =============================================================================
// GUESTS.YAML
// =============================================================================

export async function loadGuestRecords(planWorkdir: string): Promise<SerializedGuest[]> {
  const filePath = guestsPath(planWorkdir);
  if (!(await fse.pathExists(filePath))) return [];

  const parsed = z.array(SerializedGuestSchema).safeParse(await readYamlFile(filePath));
  if (!parsed.success) {
    throw new ConfigError(
      `Invalid guests in ${filePath}:\n${formatIssues(parsed.error.issues)}`,
      parsed.error,
    );
  }
  return parsed.data;
}

export async function saveGuests(planWorkdir: string, guests: Guest[]): Promise<void> {
  await writeYamlAtomic(
    guestsPath(planWorkdir),
    guests.map((guest) => guest.toSerialized()),
  );
}

/** Guests recorded by an earlier provision step, or an error when there is none. */
export async function restoreGuests(
  runtime: PlanRuntime,
  registry: PluginRegistry,
): Promise<Guest[]> {
  if (!(await isStepDone(runtime.workdir, "provision"))) {
    throw new OrchestratorError(
      `Plan ${runtime.plan.name} has no provisioned guests; run the provision step first.`,
    );
  }
  const records = await loadGuestRecords(runtime.workdir);
  return records.map((record) => registry.restoreGuest(record, { logger: runtime.logger }));
}

// =============================================================================
// STEP
// =============================================================================

export async function runProvisionStep(input: ProvisionStepInput): Promise<Guest[]> {
  const { runtime, registry } = input;
  const workdir = runtime.workdir;

  // guests of an interrupted or forced attempt would otherwise be leaked
  const done = await isStepDone(workdir, "provision");
  const stale = done && !input.force ? [] : await loadGuestRecords(workdir);

  if ((await wakeStep(runtime, "provision", { force: input.force })) === "done") {
    return restoreGuests(runtime, registry);
  }
  await removeStaleGuests(runtime, registry, stale);

  const phases = enabledPhases(runtime, "provision", input.phases);
  const planned = phases.map((phase) => {
    const plugin = registry.create("provision", phase);
    const guest = plugin.createGuest({
      runtime,
      phase,
      workdir: phaseWorkdir(workdir, "provision", phase.name),
    });
    return { phase, plugin, guest };
  });

  const settled = await Promise.allSettled(
    planned.map(({ plugin, guest }) => startGuest(runtime, plugin, guest)),
  );

  const started = planned
    .filter((_, index) => settled[index].status === "fulfilled")
    .map(({ guest }) => guest);
  const pending = planned
    .filter(({ guest }) => guest.status === "provisioning")
    .map(({ guest }) => guest);
  await saveGuests(workdir, [...started, ...pending]);

  const failures: unknown[] = settled.flatMap((outcome) =>
    outcome.status === "rejected" ? [outcome.reason] : [],
  );
  if (failures.length > 0) {
    const messages = failures.map((failure) => formatErrorMessage(failure)).join("; ");
    throw new StepError(`Provisioning failed for ${listed(failures.length, "guest")}: ${messages}`, failures);
  }

  await saveStepData(workdir, "provision", input.phases);
  await markStepDone(workdir, "provision");

  const labels = started.map((guest) => guest.label).join(", ");
  runtime.output.info(`provision: ${listed(started.length, "guest")} ready${labels ? ` (${labels})` : ""}`);
  return started;
}

// =============================================================================
// INTERNALS
// =============================================================================

async function startGuest(runtime: PlanRuntime, plugin: ProvisionPlugin, guest: Guest): Promise<void> {
  const timeoutMs = plugin.timeoutMs;

  for (let attempt = 0; ; attempt += 1) {
    try {
      const starting = guest.start();
      await (timeoutMs === null
        ? starting
        : withTimeout(starting, timeoutMs, () => timeoutError(guest, timeoutMs)));
      logRunEvent(runtime.logger, "guest.provisioned", { guest: guest.name, how: guest.how });
      return;
    } catch (err) {
      const retryable = guest.status === "not-provisioned" && !runtime.signal?.aborted;
      if (attempt >= plugin.retries || !retryable) throw err;
      logRunEvent(runtime.logger, "guest.provision_retry", {
        guest: guest.name,
        attempt: attempt + 1,
        message: formatErrorMessage(err),
      });
    }
  }
}

function timeoutError(guest: Guest, timeoutMs: number): ProvisionError {
  return new ProvisionError(
    `Provisioning guest ${guest.name} did not finish within ${Math.round(timeoutMs / 1000)}s.`,
  );
}

async function removeStaleGuests(
  runtime: PlanRuntime,
  registry: PluginRegistry,
  records: SerializedGuest[],
): Promise<void> {
  for (const record of records) {
    if (record.status === "removed") continue;
    try {
      await registry.restoreGuest(record, { logger: runtime.logger }).remove();
      logRunEvent(runtime.logger, "guest.stale_removed", { guest: record.name });
    } catch (err) {
      runtime.output.warn(
        `Could not remove guest ${record.name} left by an earlier attempt: ${formatErrorMessage(err)}`,
      );
    }
  }
}
