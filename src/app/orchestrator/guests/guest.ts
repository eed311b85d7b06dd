/**
 * Guest abstraction shared by every provisioning backend.
 * Purpose: one handle per provisioned machine with a checked lifecycle,
 * bounded reconnects and reboot handling; backends only supply transport.
 * Assumptions: the provision step owns guests, later steps only borrow them.
 * Usage: subclass, implement the protected transport hooks, then call
 * start/execute/push/pull/reboot/remove.
 */

import {
  ConnectionLostError,
  GuestUnreachableError,
  OrchestratorError,
  ProvisionError,
  RebootError,
} from "../../../core/errors.js";
import { formatErrorMessage } from "../../../core/error-format.js";
import { logRunEvent, type EventLogger, type JsonObject } from "../../../core/logger.js";
import { sleep } from "../../../core/utils.js";

// =============================================================================
// TYPES
// =============================================================================

export type GuestStatus = "not-provisioned" | "provisioning" | "ready" | "unreachable" | "removed";

export type ExecuteOptions = {
  cwd?: string;
  env?: Record<string, string>;
  timeoutMs?: number;
};

export type CommandOutput = {
  exitCode: number;
  stdout: string;
  stderr: string;
};

export type RebootOptions = {
  hard?: boolean;
  /** Replaces the default in-guest reboot command for soft reboots. */
  command?: string;
  timeoutMs?: number;
};

export type GuestOptions = {
  name: string;
  role?: string | null;
  status?: GuestStatus;
  logger?: EventLogger;
  reconnectAttempts?: number;
  reconnectDelayMs?: number;
  rebootTimeoutMs?: number;
  probeIntervalMs?: number;
};

export type SerializedGuest = {
  name: string;
  role: string | null;
  how: string;
  status: GuestStatus;
  hostname: string | null;
  data: Record<string, unknown>;
};

export const DEFAULT_RECONNECT_ATTEMPTS = 3;
export const DEFAULT_RECONNECT_DELAY_MS = 5_000;
export const DEFAULT_REBOOT_TIMEOUT_MS = 10 * 60 * 1000;
export const DEFAULT_PROBE_INTERVAL_MS = 5_000;
export const DEFAULT_REBOOT_COMMAND = "reboot";

const BOOT_ID_COMMAND = "cat /proc/sys/kernel/random/boot_id";

const TRANSITIONS: Record<GuestStatus, GuestStatus[]> = {
  "not-provisioned": ["provisioning", "removed"],
  provisioning: ["ready", "not-provisioned", "removed"],
  ready: ["unreachable", "removed"],
  unreachable: ["ready", "removed"],
  removed: [],
};

// =============================================================================
// GUEST
// =============================================================================

export abstract class Guest {
  readonly name: string;
  readonly role: string | null;
  abstract readonly how: string;

  protected readonly logger?: EventLogger;
  private currentStatus: GuestStatus;
  private readonly reconnectAttempts: number;
  private readonly reconnectDelayMs: number;
  private readonly rebootTimeoutMs: number;
  private readonly probeIntervalMs: number;

  constructor(opts: GuestOptions) {
    this.name = opts.name;
    this.role = opts.role ?? null;
    this.logger = opts.logger;
    this.currentStatus = opts.status ?? "not-provisioned";
    this.reconnectAttempts = opts.reconnectAttempts ?? DEFAULT_RECONNECT_ATTEMPTS;
    this.reconnectDelayMs = opts.reconnectDelayMs ?? DEFAULT_RECONNECT_DELAY_MS;
    this.rebootTimeoutMs = opts.rebootTimeoutMs ?? DEFAULT_REBOOT_TIMEOUT_MS;
    this.probeIntervalMs = opts.probeIntervalMs ?? DEFAULT_PROBE_INTERVAL_MS;
  }

  get status(): GuestStatus {
    return this.currentStatus;
  }

  abstract get hostname(): string | null;

  isReady(): boolean {
    return this.currentStatus === "ready";
  }

  /** "server (role db)" style label for console output. */
  get label(): string {
    return this.role ? `${this.name} (${this.role})` : this.name;
  }

  // ---------------------------------------------------------------------------
  // Lifecycle
  // ---------------------------------------------------------------------------

  async start(): Promise<void> {
    if (this.currentStatus === "ready") return;

    this.transition("provisioning");
    try {
      await this.provisionGuest();
    } catch (err) {
      this.transition("not-provisioned");
      if (err instanceof ProvisionError) throw err;
      throw new ProvisionError(
        `Failed to provision guest ${this.name}: ${formatErrorMessage(err)}`,
        err,
      );
    }
    this.transition("ready");
  }

  async remove(): Promise<void> {
    if (this.currentStatus === "removed") return;
    await this.removeGuest();
    this.transition("removed");
  }

  // ---------------------------------------------------------------------------
  // Commands and files
  // ---------------------------------------------------------------------------

  /** Exit codes pass through; only transport problems and timeouts throw. */
  async execute(command: string, opts: ExecuteOptions = {}): Promise<CommandOutput> {
    return this.withReconnect("execute", () => this.runCommand(command, opts));
  }

  async push(source: string, destination: string = source): Promise<void> {
    await this.withReconnect("push", () => this.pushFiles(source, destination));
  }

  async pull(source: string, destination: string = source): Promise<void> {
    await this.withReconnect("pull", () => this.pullFiles(source, destination));
  }

  async reboot(opts: RebootOptions = {}): Promise<void> {
    this.assertUsable();
    const timeoutMs = opts.timeoutMs ?? this.rebootTimeoutMs;
    const previousBootId = await this.readBootId();

    const fields: JsonObject = { guest: this.name, hard: opts.hard ?? false };
    if (opts.command) fields.command = opts.command;
    logRunEvent(this.log, "guest.reboot", fields);

    if (opts.hard) {
      await this.hardReboot();
    } else {
      await this.softReboot(opts.command ?? DEFAULT_REBOOT_COMMAND);
    }

    await this.waitForReboot(previousBootId, timeoutMs);
  }

  toSerialized(): SerializedGuest {
    return {
      name: this.name,
      role: this.role,
      how: this.how,
      status: this.currentStatus,
      hostname: this.hostname,
      data: this.serializeData(),
    };
  }

  // ---------------------------------------------------------------------------
  // Backend hooks
  // ---------------------------------------------------------------------------

  protected abstract provisionGuest(): Promise<void>;

  /** Throws ConnectionLostError when the transport drops, GuestTimeoutError on timeout. */
  protected abstract runCommand(command: string, opts: ExecuteOptions): Promise<CommandOutput>;

  protected abstract pushFiles(source: string, destination: string): Promise<void>;

  protected abstract pullFiles(source: string, destination: string): Promise<void>;

  protected abstract removeGuest(): Promise<void>;

  protected abstract serializeData(): Record<string, unknown>;

  /** True when a trivial command gets through. */
  protected async probe(): Promise<boolean> {
    try {
      const output = await this.runCommand("true", { timeoutMs: 30_000 });
      return output.exitCode === 0;
    } catch {
      return false;
    }
  }

  /** Changes on every boot; null when the backend cannot tell. */
  protected async readBootId(): Promise<string | null> {
    try {
      const output = await this.runCommand(BOOT_ID_COMMAND, { timeoutMs: 30_000 });
      const bootId = output.stdout.trim();
      return output.exitCode === 0 && bootId.length > 0 ? bootId : null;
    } catch {
      return null;
    }
  }

  protected async softReboot(command: string): Promise<void> {
    try {
      await this.runCommand(command, {});
    } catch (err) {
      // the connection usually drops while the guest goes down
      if (err instanceof ConnectionLostError) return;
      throw new RebootError(`Failed to reboot guest ${this.name}: ${formatErrorMessage(err)}`, err);
    }
  }

  protected async hardReboot(): Promise<void> {
    throw new RebootError(`Guest ${this.name} (${this.how}) does not support hard reboot.`);
  }

  protected get log(): EventLogger {
    return this.logger ?? NOOP_LOGGER;
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  private async withReconnect<T>(action: string, fn: () => Promise<T>): Promise<T> {
    this.assertUsable();

    let lastError: ConnectionLostError | null = null;
    for (let attempt = 0; attempt <= this.reconnectAttempts; attempt += 1) {
      if (attempt > 0) {
        logRunEvent(this.log, "guest.reconnect", { guest: this.name, attempt, action });
        await sleep(this.reconnectDelayMs);
        if (!(await this.probe())) continue;
      }

      try {
        return await fn();
      } catch (err) {
        if (!(err instanceof ConnectionLostError)) throw err;
        lastError = err;
        logRunEvent(this.log, "guest.connection_lost", {
          guest: this.name,
          action,
          message: err.message,
        });
      }
    }

    this.transition("unreachable");
    throw new GuestUnreachableError(
      `Guest ${this.name} is unreachable after ${this.reconnectAttempts} reconnect attempts.`,
      this.name,
      lastError,
    );
  }

  private async waitForReboot(previousBootId: string | null, timeoutMs: number): Promise<void> {
    const deadline = Date.now() + timeoutMs;

    do {
      await sleep(this.probeIntervalMs);
      if (previousBootId === null) {
        if (await this.probe()) return this.markReachable();
      } else {
        const bootId = await this.readBootId();
        if (bootId !== null && bootId !== previousBootId) return this.markReachable();
      }
    } while (Date.now() < deadline);

    this.transition("unreachable");
    throw new RebootError(
      `Guest ${this.name} did not come back within ${Math.round(timeoutMs / 1000)}s after reboot.`,
    );
  }

  private markReachable(): void {
    if (this.currentStatus === "unreachable") this.transition("ready");
  }

  private assertUsable(): void {
    if (this.currentStatus === "ready") return;
    if (this.currentStatus === "unreachable") {
      throw new GuestUnreachableError(`Guest ${this.name} is unreachable.`, this.name);
    }
    if (this.currentStatus === "removed") {
      throw new OrchestratorError(`Guest ${this.name} has already been removed.`);
    }
    throw new ProvisionError(`Guest ${this.name} is not provisioned.`);
  }

  private transition(next: GuestStatus): void {
    const previous = this.currentStatus;
    if (previous === next) return;
    if (!TRANSITIONS[previous].includes(next)) {
      throw new OrchestratorError(`Invalid guest state change for ${this.name}: ${previous} -> ${next}`);
    }

    this.currentStatus = next;
    logRunEvent(this.log, "guest.status", { guest: this.name, from: previous, to: next });
  }
}

const NOOP_LOGGER: EventLogger = { log: () => undefined };
