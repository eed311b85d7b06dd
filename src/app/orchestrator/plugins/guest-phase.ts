/*
Purpose: prepare and finish plugins that run commands on one guest.
Assumptions: the plan workdir has been pushed to the guest, so it is the cwd;
any non-zero exit fails the phase on that guest.
Usage: registry.create("prepare", phase) with `how: shell` or `how: install`.
*/

import path from "node:path";

import { z } from "zod";

import { OrchestratorError } from "../../../core/errors.js";
import { StringListSchema } from "../../../core/metadata.js";
import type { PhaseResult } from "../../../core/results.js";
import type { PhaseData } from "../../../core/step-data.js";
import { safeName, writeTextFile } from "../../../core/utils.js";
import { shellQuote } from "../guests/connect-guest.js";
import type { CommandOutput } from "../guests/guest.js";

import type { GuestPhaseContext, GuestPhasePlugin } from "./plugin.js";
import { parsePhaseOptions } from "./registry.js";

// =============================================================================
// SHELL
// =============================================================================

const ShellOptionsSchema = z
  .object({
    script: StringListSchema.refine((scripts) => scripts.length > 0, "at least one script is required"),
  })
  .strict();

export class ShellPhase implements GuestPhasePlugin {
  private readonly scripts: string[];

  constructor(step: "prepare" | "finish", phase: PhaseData) {
    this.scripts = parsePhaseOptions(step, phase, ShellOptionsSchema).script;
  }

  async run(ctx: GuestPhaseContext): Promise<PhaseResult> {
    return runCommands(ctx, this.scripts);
  }
}

// =============================================================================
// INSTALL
// =============================================================================

export const PACKAGE_MANAGERS = ["dnf", "yum", "apt", "apk"] as const;
export type PackageManager = (typeof PACKAGE_MANAGERS)[number];

const InstallOptionsSchema = z
  .object({
    package: StringListSchema.default([]),
    "package-manager": z.enum(PACKAGE_MANAGERS).default("dnf"),
    missing: z.enum(["fail", "skip"]).default("fail"),
  })
  .strict();

export type InstallOptions = z.infer<typeof InstallOptionsSchema>;

export class InstallPhase implements GuestPhasePlugin {
  private readonly options: InstallOptions;

  constructor(phase: PhaseData) {
    this.options = parsePhaseOptions("prepare", phase, InstallOptionsSchema);
  }

  async run(ctx: GuestPhaseContext): Promise<PhaseResult> {
    return runCommands(ctx, installCommands(this.options));
  }
}

/**
 * One command installing everything, or with `missing: skip` one tolerant
 * command per package so a missing package does not block the rest.
 */
export function installCommands(options: InstallOptions): string[] {
  const packages = options.package.map(shellQuote);
  if (packages.length === 0) return [];

  const install = installPrefix(options["package-manager"]);
  if (options.missing === "fail") {
    return [`${install} ${packages.join(" ")}`];
  }
  return packages.map((pkg) => `${install} ${pkg} || true`);
}

function installPrefix(manager: PackageManager): string {
  switch (manager) {
    case "dnf":
    case "yum":
      return `${manager} install -y`;
    case "apt":
      return "DEBIAN_FRONTEND=noninteractive apt-get install -y";
    case "apk":
      return "apk add --no-cache";
  }
}

// =============================================================================
// INTERNALS
// =============================================================================

async function runCommands(ctx: GuestPhaseContext, commands: string[]): Promise<PhaseResult> {
  const { guest, runtime } = ctx;
  const logPath = path.join(ctx.workdir, safeName(guest.name) || "guest", "output.txt");
  const env = {
    ...runtime.environment,
    TMT_PLAN_DATA: runtime.dataDir,
    ...ctx.topologyEnv,
  };

  const transcript: string[] = [];
  try {
    for (const command of commands) {
      runtime.output.verbose(`${guest.name}: ${command}`);
      const res = await guest.execute(command, { cwd: runtime.workdir, env });
      transcript.push(formatTranscript(command, res));

      if (res.exitCode !== 0) {
        throw new OrchestratorError(
          `Command '${command}' failed on guest ${guest.name} with exit code ${res.exitCode}.`,
        );
      }
    }
  } finally {
    await writeTextFile(logPath, transcript.join("\n"));
  }

  return {
    name: ctx.phase.name,
    guest: { name: guest.name, role: guest.role },
    result: "pass",
    note: null,
    log: [path.relative(runtime.workdir, logPath)],
  };
}

function formatTranscript(command: string, res: CommandOutput): string {
  return [`$ ${command}`, res.stdout, res.stderr, `# exit code ${res.exitCode}`]
    .filter((part) => part.length > 0)
    .join("\n");
}
