import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, describe, expect, it, vi } from "vitest";

import { JsonlLogger, eventWithTs, logRunEvent } from "./logger.js";

afterEach(() => {
  vi.restoreAllMocks();
});

function readEvents(logPath: string): Record<string, unknown>[] {
  return fs
    .readFileSync(logPath, "utf8")
    .trim()
    .split("\n")
    .map((line) => JSON.parse(line) as Record<string, unknown>);
}

describe("JsonlLogger", () => {
  it("writes events with run and plan metadata", () => {
    const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "jsonl-logger-"));
    const logPath = path.join(tmpDir, "nested", "log.jsonl");
    const logger = new JsonlLogger(logPath, { runId: "run-1", plan: "/plans/smoke" });

    logger.log({ type: "step.start", payload: { message: "hello" } });
    logger.close();

    const events = readEvents(logPath);
    expect(events).toHaveLength(1);
    expect(events[0]?.type).toBe("step.start");
    expect(events[0]?.run_id).toBe("run-1");
    expect(events[0]?.plan).toBe("/plans/smoke");
    expect(events[0]?.payload).toEqual({ message: "hello" });
    expect(new Date(String(events[0]?.ts)).toString()).not.toBe("Invalid Date");
  });

  it("appends events without clobbering previous lines", () => {
    const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "jsonl-logger-"));
    const logPath = path.join(tmpDir, "log.jsonl");
    const logger = new JsonlLogger(logPath, { runId: "run-2" });

    logger.log({ type: "first", payload: { order: 1 } });
    logger.log({ type: "second", payload: { order: 2 } });
    logger.close();

    const events = readEvents(logPath);
    expect(events.map((e) => e.type)).toEqual(["first", "second"]);
    expect(events.map((e) => e.payload)).toEqual([{ order: 1 }, { order: 2 }]);
  });

  it("child loggers layer plan and step defaults", () => {
    const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "jsonl-logger-"));
    const logPath = path.join(tmpDir, "log.jsonl");
    const logger = new JsonlLogger(logPath, { runId: "run-3" });

    const child = logger.child({ plan: "/plans/a" }).child({ step: "prepare" });
    child.log({ type: "phase.start" });
    logger.close();

    const [event] = readEvents(logPath);
    expect(event?.run_id).toBe("run-3");
    expect(event?.plan).toBe("/plans/a");
    expect(event?.step).toBe("prepare");
  });

  it("logs run helpers with top-level fields", () => {
    const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "jsonl-logger-"));
    const logPath = path.join(tmpDir, "log.jsonl");
    const logger = new JsonlLogger(logPath, { runId: "run-4" });

    logRunEvent(logger, "wave.start", { order: 50, phases: ["default-0"], plan: "/p" });
    logger.close();

    const [event] = readEvents(logPath);
    expect(event?.type).toBe("wave.start");
    expect(event?.run_id).toBe("run-4");
    expect(event?.plan).toBe("/p");
    expect(event?.order).toBe(50);
    expect(event?.phases).toEqual(["default-0"]);
  });

  it("warns on write failures with formatted messages", () => {
    const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "jsonl-logger-"));
    const logPath = path.join(tmpDir, "log.jsonl");
    const logger = new JsonlLogger(logPath, { runId: "run-5" });

    vi.spyOn(fs, "writeSync").mockImplementation(() => {
      throw new Error("disk full");
    });
    const warnSpy = vi.spyOn(console, "warn").mockImplementation(() => undefined);

    logger.log({ type: "step.start" });
    logger.close();

    expect(warnSpy).toHaveBeenCalledTimes(1);
    expect(warnSpy.mock.calls[0]?.[0]).toBe(
      `Warning: failed to write log event to ${logPath}: disk full`,
    );
  });

  it("includes stack details when debug is enabled", () => {
    const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "jsonl-logger-"));
    const logPath = path.join(tmpDir, "log.jsonl");
    const logger = new JsonlLogger(logPath, { runId: "run-6" }, { debug: true });

    const writeError = new Error("disk full");
    vi.spyOn(fs, "writeSync").mockImplementation(() => {
      throw writeError;
    });
    const warnSpy = vi.spyOn(console, "warn").mockImplementation(() => undefined);

    logger.log({ type: "step.start" });
    logger.close();

    const message = String(warnSpy.mock.calls[0]?.[0]);
    expect(message).toContain("disk full");
    if (writeError.stack) {
      expect(message).toContain(writeError.stack);
    }
  });
});

describe("eventWithTs", () => {
  it("merges defaults and payload", () => {
    const event = eventWithTs(
      { type: "sample", payload: { key: "value" }, step: "execute" },
      { runId: "run-x" },
    );

    expect(event.run_id).toBe("run-x");
    expect(event.step).toBe("execute");
    expect(event.plan).toBeUndefined();
    expect(event.payload).toEqual({ key: "value" });
  });

  it("drops an empty payload", () => {
    const event = eventWithTs({ type: "sample", payload: {} }, { runId: "run-x" });
    expect("payload" in event).toBe(false);
  });

  it("throws when runId is missing", () => {
    expect(() => eventWithTs({ type: "missing-run" })).toThrow(/run_id is required/i);
  });
});
