import fs from "node:fs";
import path from "node:path";

import fse from "fs-extra";

import { formatErrorLines, formatErrorMessage } from "./error-format.js";
import { isoNow } from "./utils.js";

// =============================================================================
// TYPES
// =============================================================================

export type JsonValue = string | number | boolean | null | JsonArray | JsonObject;
export type JsonArray = JsonValue[];
export interface JsonObject {
  [key: string]: JsonValue;
}

export type LogEvent = JsonObject & {
  ts: string;
  type: string;
  run_id: string;
  plan?: string;
  step?: string;
  payload?: JsonObject;
};

export type LogEventInput = JsonObject & {
  type: string;
  runId?: string;
  plan?: string;
  step?: string;
  payload?: JsonObject;
  ts?: string | Date;
};

export type EventDefaults = {
  runId?: string;
  plan?: string;
  step?: string;
};

export type JsonlLoggerOptions = {
  debug?: boolean;
};

type LogFailureAction = "write" | "close";

// =============================================================================
// LOGGER
// =============================================================================

export class JsonlLogger {
  private readonly fileDescriptor: number;
  private readonly isDebugEnabled: boolean;
  private closed = false;

  constructor(
    public readonly filePath: string,
    private readonly defaults: EventDefaults = {},
    opts: JsonlLoggerOptions = {},
  ) {
    fse.ensureDirSync(path.dirname(filePath));
    this.fileDescriptor = fs.openSync(filePath, "a");
    this.isDebugEnabled = opts.debug ?? false;
  }

  log(event: LogEventInput): void {
    const normalized = eventWithTs(event, this.defaults);
    this.append(normalized);
  }

  /**
   * A logger appending to the same file with extra defaults. Closing the
   * child is a no-op; the parent owns the descriptor.
   */
  child(defaults: EventDefaults): ChildLogger {
    return new ChildLogger(this, { ...this.defaults, ...defaults });
  }

  close(): void {
    if (this.closed) return;
    try {
      fs.fsyncSync(this.fileDescriptor);
      fs.closeSync(this.fileDescriptor);
    } catch (err) {
      console.warn(formatLogFailureWarning("close", this.filePath, err, this.isDebugEnabled));
    } finally {
      this.closed = true;
    }
  }

  private append(event: LogEvent): void {
    if (this.closed) return;
    try {
      fs.writeSync(this.fileDescriptor, `${JSON.stringify(event)}\n`);
      fs.fsyncSync(this.fileDescriptor);
    } catch (err) {
      console.warn(formatLogFailureWarning("write", this.filePath, err, this.isDebugEnabled));
    }
  }
}

export class ChildLogger {
  constructor(
    private readonly parent: JsonlLogger,
    private readonly defaults: EventDefaults,
  ) {}

  log(event: LogEventInput): void {
    const merged: LogEventInput = { ...event };
    const runId = event.runId ?? this.defaults.runId;
    const plan = event.plan ?? this.defaults.plan;
    const step = event.step ?? this.defaults.step;
    if (runId) merged.runId = runId;
    if (plan) merged.plan = plan;
    if (step) merged.step = step;
    this.parent.log(merged);
  }

  child(defaults: EventDefaults): ChildLogger {
    return new ChildLogger(this.parent, { ...this.defaults, ...defaults });
  }
}

export type EventLogger = Pick<JsonlLogger, "log">;

// =============================================================================
// EVENT HELPERS
// =============================================================================

export function eventWithTs(event: LogEventInput, defaults: EventDefaults = {}): LogEvent {
  const { runId: providedRunId, plan, step, payload, ts, type, ...rest } = event;

  const runId = providedRunId ?? defaults.runId;
  if (!runId) {
    throw new Error("run_id is required for log events");
  }

  const normalizedTs =
    typeof ts === "string" ? ts : ts instanceof Date ? ts.toISOString() : isoNow();

  const result: LogEvent = {
    ...rest,
    ts: normalizedTs,
    type,
    run_id: runId,
  };

  const resolvedPlan = plan ?? defaults.plan;
  if (resolvedPlan) {
    result.plan = resolvedPlan;
  }
  const resolvedStep = step ?? defaults.step;
  if (resolvedStep) {
    result.step = resolvedStep;
  }
  if (payload && Object.keys(payload).length > 0) {
    result.payload = payload;
  }

  return result;
}

export function logRunEvent(
  logger: EventLogger,
  type: string,
  fields: JsonObject & { ts?: string | Date } = {},
): void {
  const { ts, ...rest } = fields;
  const event: LogEventInput = { type, ...rest };

  if (ts !== undefined) {
    event.ts = ts;
  }

  logger.log(event);
}

export function logRunResume(
  logger: EventLogger,
  details: { runId: string; plans: number; reason?: string },
): void {
  const payload: JsonObject = { plans: details.plans };
  if (details.reason) payload.reason = details.reason;

  logRunEvent(logger, "run.resume", { resumed_run: details.runId, payload });
}

// =============================================================================
// INTERNALS
// =============================================================================

function formatLogFailureWarning(
  action: LogFailureAction,
  filePath: string,
  error: unknown,
  isDebugEnabled: boolean,
): string {
  const summary = formatErrorMessage(error);
  const actionLabel =
    action === "write" ? `write log event to ${filePath}` : `close log file ${filePath}`;
  const message = `Warning: failed to ${actionLabel}: ${summary}`;

  if (!isDebugEnabled) {
    return message;
  }

  const stackLine = formatErrorLines(error, { mode: "debug" }).find(
    (line) => line.kind === "stack",
  );
  if (!stackLine) {
    return message;
  }

  return `${message}\n${stackLine.text}`;
}
