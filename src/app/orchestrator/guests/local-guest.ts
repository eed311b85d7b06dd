/**
 * LocalGuest runs commands directly on the orchestrating host.
 * Purpose: the default provisioning target; no transport, so no reconnects.
 * Usage: new LocalGuest({ name: "default-0" }).execute("make test")
 */

import { execa } from "execa";
import fse from "fs-extra";

import { GuestTimeoutError, RebootError } from "../../../core/errors.js";

import { Guest, type CommandOutput, type ExecuteOptions } from "./guest.js";

export class LocalGuest extends Guest {
  readonly how = "local";

  get hostname(): string {
    return "localhost";
  }

  protected async provisionGuest(): Promise<void> {
    // Nothing to create.
  }

  protected async runCommand(command: string, opts: ExecuteOptions): Promise<CommandOutput> {
    const res = await execa("bash", ["-c", command], {
      cwd: opts.cwd,
      env: opts.env,
      extendEnv: true,
      reject: false,
      timeout: opts.timeoutMs,
      stdin: "ignore",
    });

    if (res.timedOut && opts.timeoutMs !== undefined) {
      throw new GuestTimeoutError(
        `Command timed out after ${Math.round(opts.timeoutMs / 1000)}s on ${this.name}.`,
        opts.timeoutMs,
      );
    }

    return { exitCode: res.exitCode ?? -1, stdout: res.stdout, stderr: res.stderr };
  }

  protected async pushFiles(source: string, destination: string): Promise<void> {
    if (source === destination) return;
    await fse.copy(source, destination, { overwrite: true });
  }

  protected async pullFiles(source: string, destination: string): Promise<void> {
    if (source === destination) return;
    await fse.copy(source, destination, { overwrite: true });
  }

  protected async removeGuest(): Promise<void> {
    // Nothing to tear down.
  }

  protected serializeData(): Record<string, unknown> {
    return {};
  }

  protected override async softReboot(): Promise<void> {
    throw new RebootError(`Refusing to reboot the local host (guest ${this.name}).`);
  }
}
