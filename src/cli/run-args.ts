/*
Purpose: parse the trailing `trellis run` arguments, where every step, `plan`
and `test` keyword opens a segment with options of its own.
Assumptions: run-level options come before the first keyword; commander passes
everything from there on through untouched.
Usage: const segments = parseRunSegments(["discover", "--how", "fmf", "test", "--name", "smoke"]).
*/

import { Command, CommanderError } from "commander";

import { ConfigError } from "../core/errors.js";
import { STEP_NAMES, type StepKey } from "../core/metadata.js";
import type { StepOverride } from "../core/step-data.js";
import { isStepName } from "../core/step-selection.js";

// =============================================================================
// TYPES
// =============================================================================

export type RunSegments = {
  /** Steps named on the command line, in the order given. */
  steps: StepKey[];
  overrides: Partial<Record<StepKey, StepOverride[]>>;
  planNames: string[];
  testNames: string[];
};

type SegmentKeyword = StepKey | "plan" | "test";

type CommonStepOptions = {
  how?: string;
  name?: string;
  order?: number;
  where: string[];
  insert?: boolean;
};

/** Step options and the phase key each one sets. */
type PluginFlag = {
  flags: string;
  description: string;
  key: string;
  kind: "string" | "list" | "number" | "boolean";
};

const PLUGIN_FLAGS: Record<StepKey, PluginFlag[]> = {
  discover: [
    { flags: "--test <pattern>", description: "Select tests by name, in the given order", key: "test", kind: "list" },
    { flags: "--include <pattern>", description: "Keep only matching tests", key: "include", kind: "list" },
    { flags: "--exclude <pattern>", description: "Drop matching tests", key: "exclude", kind: "list" },
    { flags: "--filter <expr>", description: "Filter tests by attributes", key: "filter", kind: "list" },
    { flags: "--failed-only", description: "Rerun tests that did not pass", key: "failed-only", kind: "boolean" },
  ],
  provision: [
    { flags: "--image <image>", description: "Container image", key: "image", kind: "string" },
    { flags: "--guest <host>", description: "Hostname or address to connect to", key: "guest", kind: "string" },
    { flags: "--user <user>", description: "Login user", key: "user", kind: "string" },
    { flags: "--key <path>", description: "Private key for ssh", key: "key", kind: "list" },
    { flags: "--port <port>", description: "ssh port", key: "port", kind: "number" },
    { flags: "--role <role>", description: "Role of the guest", key: "role", kind: "string" },
  ],
  prepare: [
    { flags: "--script <command>", description: "Shell command to run", key: "script", kind: "list" },
    { flags: "--package <name>", description: "Package to install", key: "package", kind: "list" },
  ],
  execute: [
    { flags: "--duration <duration>", description: "Override every test's duration", key: "duration", kind: "string" },
    { flags: "--exit-first", description: "Stop after the first failing test", key: "exit-first", kind: "boolean" },
  ],
  report: [],
  finish: [
    { flags: "--script <command>", description: "Shell command to run", key: "script", kind: "list" },
  ],
};

// =============================================================================
// PUBLIC API
// =============================================================================

export function parseRunSegments(args: string[]): RunSegments {
  const segments: RunSegments = { steps: [], overrides: {}, planNames: [], testNames: [] };

  for (const { keyword, args: segmentArgs } of splitSegments(args)) {
    if (keyword === "plan" || keyword === "test") {
      const names = parseNameSegment(keyword, segmentArgs);
      (keyword === "plan" ? segments.planNames : segments.testNames).push(...names);
      continue;
    }

    if (!segments.steps.includes(keyword)) segments.steps.push(keyword);
    const override = parseStepSegment(keyword, segmentArgs);
    if (override) {
      const list = segments.overrides[keyword] ?? [];
      list.push(override);
      segments.overrides[keyword] = list;
    }
  }

  return segments;
}

/** `KEY=VALUE` pairs of `-e`; a later key wins. */
export function parseEnvironmentPairs(pairs: string[]): Record<string, string> {
  const environment: Record<string, string> = {};
  for (const pair of pairs) {
    const [key, value] = splitPair(pair, "--environment");
    environment[key] = value;
  }
  return environment;
}

/** `DIMENSION=VALUE[,VALUE]` pairs of `-c`; repeating a dimension adds values. */
export function parseContextPairs(pairs: string[]): Record<string, string[]> {
  const context: Record<string, string[]> = {};
  for (const pair of pairs) {
    const [dimension, value] = splitPair(pair, "--context");
    const values = value.split(",").map((item) => item.trim()).filter((item) => item.length > 0);
    context[dimension] = [...(context[dimension] ?? []), ...values];
  }
  return context;
}

export function collectValues(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}

// =============================================================================
// INTERNALS
// =============================================================================

function splitSegments(args: string[]): Array<{ keyword: SegmentKeyword; args: string[] }> {
  const segments: Array<{ keyword: SegmentKeyword; args: string[] }> = [];

  for (const arg of args) {
    if (isSegmentKeyword(arg)) {
      segments.push({ keyword: arg, args: [] });
      continue;
    }
    const current = segments[segments.length - 1];
    if (!current) {
      throw new ConfigError(
        `Unexpected argument '${arg}' (expected a step, 'plan' or 'test'; steps: ${STEP_NAMES.join(", ")}).`,
      );
    }
    current.args.push(arg);
  }

  return segments;
}

function isSegmentKeyword(value: string): value is SegmentKeyword {
  return value === "plan" || value === "test" || isStepName(value);
}

function parseNameSegment(keyword: "plan" | "test", args: string[]): string[] {
  const command = segmentCommand(keyword).option(
    "-n, --name <regex>",
    `Select ${keyword}s by name`,
    collectValues,
    [],
  );
  const opts = parseSegment(command, keyword, args).opts<{ name: string[] }>();
  return opts.name;
}

function parseStepSegment(step: StepKey, args: string[]): StepOverride | null {
  const command = segmentCommand(step)
    .option("--how <how>", "Plugin to use")
    .option("--name <name>", "Phase to update or insert")
    .option("--order <order>", "Phase order", parseOrder)
    .option("--where <guest>", "Guest name or role the phase runs on", collectValues, [])
    .option("--insert", "Add a new phase instead of updating existing ones");

  for (const flag of PLUGIN_FLAGS[step]) {
    if (flag.kind === "list") {
      command.option(flag.flags, flag.description, collectValues);
    } else if (flag.kind === "number") {
      command.option(flag.flags, flag.description, parsePort);
    } else {
      command.option(flag.flags, flag.description);
    }
  }

  const parsed = parseSegment(command, step, args);
  const common = parsed.opts<CommonStepOptions>();
  const values: Record<string, unknown> = parsed.opts();

  const options: Record<string, unknown> = {};
  for (const flag of PLUGIN_FLAGS[step]) {
    const value = values[optionProperty(flag.key)];
    if (value !== undefined) options[flag.key] = value;
  }

  const override: StepOverride = { options };
  if (common.how !== undefined) override.how = common.how;
  if (common.name !== undefined) override.name = common.name;
  if (common.order !== undefined) override.order = common.order;
  if (common.where.length > 0) override.where = common.where;
  if (common.insert) override.insert = true;

  const empty = Object.keys(override).length === 1 && Object.keys(options).length === 0;
  return empty ? null : override;
}

function segmentCommand(name: string): Command {
  return new Command(name)
    .exitOverride()
    .helpOption(false)
    .configureOutput({ writeOut: () => undefined, writeErr: () => undefined });
}

function parseSegment(command: Command, keyword: SegmentKeyword, args: string[]): Command {
  try {
    return command.parse(args, { from: "user" });
  } catch (err) {
    if (err instanceof ConfigError) throw err;
    const message = err instanceof CommanderError ? err.message.replace(/^error: /, "") : String(err);
    throw new ConfigError(`Invalid options for '${keyword}': ${message}`, err);
  }
}

/** commander stores `--failed-only` as `failedOnly`. */
function optionProperty(key: string): string {
  return key.replace(/-([a-z])/g, (_, letter: string) => letter.toUpperCase());
}

function parseOrder(value: string): number {
  const order = Number(value);
  if (!Number.isInteger(order)) throw new ConfigError(`Invalid --order '${value}': expected an integer.`);
  return order;
}

function parsePort(value: string): number {
  const port = Number(value);
  if (!Number.isInteger(port) || port <= 0) {
    throw new ConfigError(`Invalid --port '${value}': expected a positive integer.`);
  }
  return port;
}

function splitPair(pair: string, flag: string): [string, string] {
  const index = pair.indexOf("=");
  if (index <= 0) throw new ConfigError(`Invalid ${flag} '${pair}': expected KEY=VALUE.`);
  return [pair.slice(0, index), pair.slice(index + 1)];
}
