/**
 * ConnectGuest drives an already running machine over ssh, with rsync for files.
 * Assumptions: `ssh`, `rsync` (and `sshpass` for password logins) exist on the host;
 * pulls always copy directories.
 */

import { execa } from "execa";
import fse from "fs-extra";

import {
  ConnectionLostError,
  GuestTimeoutError,
  OrchestratorError,
  ProvisionError,
} from "../../../core/errors.js";

import { Guest, type CommandOutput, type ExecuteOptions, type GuestOptions } from "./guest.js";

// =============================================================================
// TYPES
// =============================================================================

export type ConnectGuestOptions = GuestOptions & {
  guest: string;
  user?: string;
  port?: number;
  key?: string[];
  password?: string;
  sshOptions?: string[];
};

/** ssh reports its own failures (refused, reset, auth) with this code. */
export const SSH_CONNECTION_ERROR = 255;

const RSYNC_STREAM_ERROR = 12;

const DEFAULT_SSH_OPTIONS = [
  "StrictHostKeyChecking=no",
  "UserKnownHostsFile=/dev/null",
  "LogLevel=ERROR",
  "ServerAliveInterval=5",
  "ServerAliveCountMax=60",
];

// =============================================================================
// GUEST
// =============================================================================

export class ConnectGuest extends Guest {
  readonly how = "connect";

  private readonly guest: string;
  private readonly user: string;
  private readonly port?: number;
  private readonly key: string[];
  private readonly password?: string;
  private readonly sshOptions: string[];

  constructor(opts: ConnectGuestOptions) {
    super(opts);
    this.guest = opts.guest;
    this.user = opts.user ?? "root";
    this.port = opts.port;
    this.key = opts.key ?? [];
    this.password = opts.password;
    this.sshOptions = opts.sshOptions ?? [];
  }

  get hostname(): string {
    return this.guest;
  }

  /** `ssh` argv without the trailing remote command. */
  sshCommand(): string[] {
    const argv = ["ssh"];
    for (const option of [...DEFAULT_SSH_OPTIONS, ...this.sshOptions]) {
      argv.push("-o", option);
    }
    if (this.port !== undefined) argv.push("-p", String(this.port));
    for (const key of this.key) argv.push("-i", key);
    if (this.password === undefined) argv.push("-o", "BatchMode=yes");
    argv.push(`${this.user}@${this.guest}`);

    return this.password === undefined ? argv : ["sshpass", "-p", this.password, ...argv];
  }

  protected async provisionGuest(): Promise<void> {
    const output = await this.runCommand("true", { timeoutMs: 60_000 }).catch((err: unknown) => {
      throw new ProvisionError(`Cannot connect to ${this.user}@${this.guest}.`, err);
    });
    if (output.exitCode !== 0) {
      throw new ProvisionError(
        `Cannot connect to ${this.user}@${this.guest}: ${output.stderr.trim() || `exit ${output.exitCode}`}`,
      );
    }
  }

  protected async runCommand(command: string, opts: ExecuteOptions): Promise<CommandOutput> {
    const [bin, ...args] = this.sshCommand();
    const res = await execa(bin, [...args, buildRemoteCommand(command, opts)], {
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
    if (res.exitCode === SSH_CONNECTION_ERROR) {
      throw new ConnectionLostError(
        `Connection to ${this.guest} lost: ${res.stderr.trim() || "ssh exited with 255"}`,
      );
    }

    return { exitCode: res.exitCode ?? -1, stdout: res.stdout, stderr: res.stderr };
  }

  protected async pushFiles(source: string, destination: string): Promise<void> {
    const isDirectory = (await fse.stat(source)).isDirectory();
    const target = isDirectory ? withTrailingSlash(destination) : destination;
    await this.runCommand(`mkdir -p ${shellQuote(isDirectory ? destination : parentOf(destination))}`, {});
    await this.rsync(isDirectory ? withTrailingSlash(source) : source, `${this.remotePrefix()}${target}`);
  }

  protected async pullFiles(source: string, destination: string): Promise<void> {
    await fse.ensureDir(destination);
    await this.rsync(`${this.remotePrefix()}${withTrailingSlash(source)}`, withTrailingSlash(destination));
  }

  protected async removeGuest(): Promise<void> {
    // The machine is not ours to destroy.
  }

  protected serializeData(): Record<string, unknown> {
    return {
      guest: this.guest,
      user: this.user,
      ...(this.port !== undefined ? { port: this.port } : {}),
      ...(this.key.length > 0 ? { key: this.key } : {}),
      ...(this.password !== undefined ? { password: this.password } : {}),
      ...(this.sshOptions.length > 0 ? { "ssh-option": this.sshOptions } : {}),
    };
  }

  protected override async hardReboot(): Promise<void> {
    // no power switch over ssh: reboot without a clean shutdown
    await this.softReboot("reboot --force --force");
  }

  private remotePrefix(): string {
    return `${this.user}@${this.guest}:`;
  }

  private async rsync(source: string, destination: string): Promise<void> {
    const [bin, ...args] = this.sshCommand();
    // rsync appends the remote host itself
    const transport = [bin, ...args.slice(0, -1)].map(shellQuote).join(" ");
    const res = await execa("rsync", rsyncArgs(transport, source, destination), {
      reject: false,
      stdin: "ignore",
    });

    if (res.exitCode === 0) return;
    if (res.exitCode === SSH_CONNECTION_ERROR || res.exitCode === RSYNC_STREAM_ERROR) {
      throw new ConnectionLostError(`Connection to ${this.guest} lost during rsync: ${res.stderr.trim()}`);
    }
    throw new OrchestratorError(
      `rsync ${source} -> ${destination} failed with exit ${res.exitCode ?? "unknown"}: ${res.stderr.trim()}`,
    );
  }
}

// =============================================================================
// HELPERS
// =============================================================================

export function shellQuote(value: string): string {
  if (/^[A-Za-z0-9_./:=@%+-]+$/.test(value)) return value;
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

/** Never deletes at the destination: every guest pulls into the same plan data directory. */
export function rsyncArgs(transport: string, source: string, destination: string): string[] {
  return ["-a", "-e", transport, source, destination];
}

/** Prefixes `cd` and `export` so the remote shell sees cwd and environment. */
export function buildRemoteCommand(command: string, opts: ExecuteOptions): string {
  const parts: string[] = [];
  if (opts.cwd) parts.push(`cd ${shellQuote(opts.cwd)} || exit 1`);
  const exports = Object.entries(opts.env ?? {}).map(
    ([key, value]) => `export ${key}=${shellQuote(value)}`,
  );
  parts.push(...exports);
  parts.push(command);
  return parts.join("; ");
}

function withTrailingSlash(value: string): string {
  return value.endsWith("/") ? value : `${value}/`;
}

function parentOf(value: string): string {
  const index = value.replace(/\/+$/, "").lastIndexOf("/");
  return index > 0 ? value.slice(0, index) : "/";
}
