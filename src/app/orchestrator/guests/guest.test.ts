import { describe, expect, it } from "vitest";

import {
  ConnectionLostError,
  GuestTimeoutError,
  GuestUnreachableError,
  ProvisionError,
  RebootError,
} from "../../../core/errors.js";
import type { LogEventInput } from "../../../core/logger.js";

import { Guest, type CommandOutput, type ExecuteOptions, type GuestOptions } from "./guest.js";

type Step = CommandOutput | Error;

class ScriptedGuest extends Guest {
  readonly how = "scripted";
  readonly commands: string[] = [];
  provisionFailure: Error | null = null;
  bootId = "boot-1";
  private readonly steps: Step[];

  constructor(opts: GuestOptions, steps: Step[] = []) {
    super({ reconnectDelayMs: 0, probeIntervalMs: 0, ...opts });
    this.steps = [...steps];
  }

  get hostname(): string {
    return "scripted.example.test";
  }

  protected async provisionGuest(): Promise<void> {
    if (this.provisionFailure) throw this.provisionFailure;
  }

  protected async runCommand(command: string, _opts: ExecuteOptions): Promise<CommandOutput> {
    if (command.includes("boot_id")) {
      return { exitCode: 0, stdout: `${this.bootId}\n`, stderr: "" };
    }
    this.commands.push(command);
    if (command === "reboot" || command === "systemctl reboot") {
      this.bootId = "boot-2";
      throw new ConnectionLostError("connection closed by remote host");
    }

    const step = this.steps.shift() ?? { exitCode: 0, stdout: "", stderr: "" };
    if (step instanceof Error) throw step;
    return step;
  }

  protected override async probe(): Promise<boolean> {
    return true;
  }

  protected async pushFiles(): Promise<void> {}

  protected async pullFiles(): Promise<void> {}

  protected async removeGuest(): Promise<void> {}

  protected serializeData(): Record<string, unknown> {
    return { answer: 42 };
  }
}

function recorder(): { events: LogEventInput[]; log: (event: LogEventInput) => void } {
  const events: LogEventInput[] = [];
  return { events, log: (event) => events.push(event) };
}

async function readyGuest(steps: Step[] = [], opts: Partial<GuestOptions> = {}): Promise<ScriptedGuest> {
  const guest = new ScriptedGuest({ name: "server", ...opts }, steps);
  await guest.start();
  return guest;
}

describe("Guest lifecycle", () => {
  it("moves through provisioning to ready and logs each change", async () => {
    const logger = recorder();
    const guest = new ScriptedGuest({ name: "server", role: "db", logger });

    expect(guest.status).toBe("not-provisioned");
    await guest.start();

    expect(guest.isReady()).toBe(true);
    expect(
      logger.events.filter((event) => event.type === "guest.status").map((event) => [event.from, event.to]),
    ).toEqual([
      ["not-provisioned", "provisioning"],
      ["provisioning", "ready"],
    ]);
  });

  it("wraps provisioning failures and stays unprovisioned", async () => {
    const guest = new ScriptedGuest({ name: "server" });
    guest.provisionFailure = new Error("no capacity");

    await expect(guest.start()).rejects.toThrow("Failed to provision guest server: no capacity");
    await expect(guest.start()).rejects.toBeInstanceOf(ProvisionError);
    expect(guest.status).toBe("not-provisioned");
  });

  it("refuses commands before provisioning", async () => {
    const guest = new ScriptedGuest({ name: "server" });
    await expect(guest.execute("true")).rejects.toThrow("Guest server is not provisioned.");
  });

  it("is removed once and then unusable", async () => {
    const guest = await readyGuest();
    await guest.remove();
    await guest.remove();

    expect(guest.status).toBe("removed");
    await expect(guest.execute("true")).rejects.toThrow("Guest server has already been removed.");
  });

  it("serialises its identity and backend data", async () => {
    const guest = await readyGuest([], { role: "db" });
    expect(guest.toSerialized()).toEqual({
      name: "server",
      role: "db",
      how: "scripted",
      status: "ready",
      hostname: "scripted.example.test",
      data: { answer: 42 },
    });
    expect(guest.label).toBe("server (db)");
  });
});

describe("Guest.execute", () => {
  it("passes exit codes through", async () => {
    const guest = await readyGuest([{ exitCode: 3, stdout: "out", stderr: "err" }]);
    await expect(guest.execute("run-test")).resolves.toEqual({ exitCode: 3, stdout: "out", stderr: "err" });
  });

  it("retries after a lost connection", async () => {
    const logger = recorder();
    const lost = new ConnectionLostError("reset");
    const guest = await readyGuest([lost, lost, { exitCode: 0, stdout: "ok", stderr: "" }], { logger });

    const output = await guest.execute("run-test");

    expect(output.stdout).toBe("ok");
    expect(guest.commands).toEqual(["run-test", "run-test", "run-test"]);
    expect(
      logger.events.filter((event) => event.type === "guest.reconnect").map((event) => event.attempt),
    ).toEqual([1, 2]);
  });

  it("marks the guest unreachable once reconnects run out", async () => {
    const lost = new ConnectionLostError("reset");
    const guest = await readyGuest([lost, lost, lost, lost, lost]);

    const error: unknown = await guest.execute("run-test").catch((err: unknown) => err);

    expect(error).toBeInstanceOf(GuestUnreachableError);
    expect(error).toHaveProperty("message", "Guest server is unreachable after 3 reconnect attempts.");
    expect(guest.commands).toHaveLength(4);
    expect(guest.status).toBe("unreachable");
    await expect(guest.execute("again")).rejects.toThrow("Guest server is unreachable.");
  });

  it("honours a custom reconnect budget", async () => {
    const lost = new ConnectionLostError("reset");
    const guest = await readyGuest([lost, lost], { reconnectAttempts: 1 });

    await expect(guest.execute("run-test")).rejects.toBeInstanceOf(GuestUnreachableError);
    expect(guest.commands).toHaveLength(2);
  });

  it("does not retry timeouts", async () => {
    const guest = await readyGuest([new GuestTimeoutError("too slow", 10)]);

    await expect(guest.execute("run-test")).rejects.toBeInstanceOf(GuestTimeoutError);
    expect(guest.commands).toEqual(["run-test"]);
    expect(guest.status).toBe("ready");
  });
});

describe("Guest.reboot", () => {
  it("soft reboots and waits for a new boot", async () => {
    const logger = recorder();
    const guest = await readyGuest([], { logger });

    await guest.reboot();

    expect(guest.commands).toEqual(["reboot"]);
    expect(guest.bootId).toBe("boot-2");
    expect(logger.events.find((event) => event.type === "guest.reboot")).toMatchObject({
      guest: "server",
      hard: false,
    });
  });

  it("runs a custom reboot command", async () => {
    const guest = await readyGuest();
    await guest.reboot({ command: "systemctl reboot" });
    expect(guest.commands).toEqual(["systemctl reboot"]);
  });

  it("fails when the guest does not come back in time", async () => {
    const guest = await readyGuest();
    // the command runs, but the boot id never changes
    await expect(guest.reboot({ command: "true", timeoutMs: 0 })).rejects.toThrow(
      new RebootError("Guest server did not come back within 0s after reboot."),
    );
    expect(guest.status).toBe("unreachable");
  });

  it("rejects hard reboots the backend cannot do", async () => {
    const guest = await readyGuest();
    await expect(guest.reboot({ hard: true })).rejects.toThrow(
      "Guest server (scripted) does not support hard reboot.",
    );
  });
});
