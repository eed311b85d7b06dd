import { describe, expect, it } from "vitest";

import { ConfigError } from "../../../core/errors.js";

import { dispatchPhases, failedOutcomes, type PhaseOutcome } from "./phase-queue.js";

type Phase = { name: string; order: number; where: string[] };
type TestGuest = { name: string; role: string | null };

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((done) => {
    resolve = done;
  });
  return { promise, resolve };
}

async function flush(): Promise<void> {
  for (let i = 0; i < 5; i += 1) await Promise.resolve();
}

const server: TestGuest = { name: "server", role: "servers" };
const client: TestGuest = { name: "client", role: "clients" };

function summary(outcomes: PhaseOutcome<Phase, TestGuest, string>[]): string[] {
  return outcomes.map((outcome) => `${outcome.phase.name}@${outcome.guest.name}:${outcome.status}`);
}

describe("dispatchPhases", () => {
  it("runs phases on disjoint guests concurrently", async () => {
    const gates = new Map([
      ["a", deferred()],
      ["b", deferred()],
    ]);
    const started: string[] = [];

    const running = dispatchPhases<Phase, TestGuest, string>({
      step: "prepare",
      phases: [
        { name: "a", order: 50, where: ["server"] },
        { name: "b", order: 50, where: ["client"] },
      ],
      guests: [server, client],
      run: async (phase, guest) => {
        started.push(`${phase.name}@${guest.name}`);
        await gates.get(phase.name)?.promise;
        return phase.name;
      },
    });

    await flush();
    expect(started).toEqual(["a@server", "b@client"]);

    gates.get("b")?.resolve();
    gates.get("a")?.resolve();
    const outcomes = await running;

    expect(summary(outcomes)).toEqual(["a@server:ok", "b@client:ok"]);
  });

  it("keeps phases sharing a guest in declared order", async () => {
    const gate = deferred();
    const started: string[] = [];

    const running = dispatchPhases<Phase, TestGuest, string>({
      step: "prepare",
      phases: [
        { name: "first", order: 50, where: [] },
        { name: "second", order: 50, where: ["server"] },
      ],
      guests: [server, client],
      run: async (phase, guest) => {
        started.push(`${phase.name}@${guest.name}`);
        if (phase.name === "first" && guest.name === "server") await gate.promise;
        return "done";
      },
    });

    await flush();
    expect(started).toEqual(["first@server", "first@client"]);

    gate.resolve();
    const outcomes = await running;

    expect(started).toEqual(["first@server", "first@client", "second@server"]);
    expect(summary(outcomes)).toEqual([
      "first@server:ok",
      "first@client:ok",
      "second@server:ok",
    ]);
  });

  it("runs waves by order, one after another", async () => {
    const started: string[] = [];

    await dispatchPhases<Phase, TestGuest, string>({
      step: "execute",
      phases: [
        { name: "client-test", order: 60, where: ["clients"] },
        { name: "server-setup", order: 40, where: ["servers"] },
      ],
      guests: [server, client],
      run: async (phase) => {
        started.push(phase.name);
        return phase.name;
      },
    });

    expect(started).toEqual(["server-setup", "client-test"]);
  });

  it("skips later work on a failed guest and stops further waves", async () => {
    const outcomes = await dispatchPhases<Phase, TestGuest, string>({
      step: "prepare",
      phases: [
        { name: "broken", order: 50, where: ["server"] },
        { name: "after", order: 50, where: [] },
        { name: "next-wave", order: 70, where: [] },
      ],
      guests: [server, client],
      run: async (phase) => {
        if (phase.name === "broken") throw new Error("script failed");
        return "ok";
      },
    });

    expect(summary(outcomes)).toEqual([
      "broken@server:error",
      "after@server:skipped",
      "after@client:ok",
      "next-wave@server:skipped",
      "next-wave@client:skipped",
    ]);
    expect(failedOutcomes(outcomes).map((outcome) => outcome.phase.name)).toEqual(["broken"]);
  });

  it("reports a selector typo before running anything", async () => {
    let calls = 0;
    await expect(
      dispatchPhases<Phase, TestGuest, string>({
        step: "prepare",
        phases: [
          { name: "ok", order: 10, where: [] },
          { name: "typo", order: 50, where: ["sever"] },
        ],
        guests: [server, client],
        run: async () => {
          calls += 1;
          return "ok";
        },
      }),
    ).rejects.toBeInstanceOf(ConfigError);
    expect(calls).toBe(0);
  });

  it("stops dispatching once aborted", async () => {
    const controller = new AbortController();

    const outcomes = await dispatchPhases<Phase, TestGuest, string>({
      step: "execute",
      phases: [
        { name: "one", order: 50, where: ["server"] },
        { name: "two", order: 50, where: ["server"] },
      ],
      guests: [server, client],
      signal: controller.signal,
      run: async () => {
        controller.abort();
        return "ok";
      },
    });

    expect(outcomes.map((outcome) => outcome.status)).toEqual(["ok", "skipped"]);
    expect(outcomes[1]).toMatchObject({ reason: "interrupted" });
  });
});
