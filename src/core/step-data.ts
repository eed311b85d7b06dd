/*
Purpose: normalise phase records for one step.
Assumptions: raw phases come from plan metadata in declaration order; environment
variables `TMT_PLUGIN_<STEP>_<HOW>_<KEY>` override metadata, CLI step options
override both.
Usage: normalizePhases("prepare", plan.steps.prepare, { env: process.env, overrides }).
*/

import yaml from "js-yaml";
import { z } from "zod";

import { formatIssues } from "./config-loader.js";
import { ConfigError } from "./errors.js";
import { StringListSchema, type RawPhase, type StepKey } from "./metadata.js";
import { DEFAULT_NAME, duplicates } from "./utils.js";

// =============================================================================
// TYPES
// =============================================================================

export type PhaseData = {
  name: string;
  how: string;
  order: number;
  where: string[];
  when: string[];
  summary?: string;
  /** Declaration position; breaks ties between equal orders. */
  index: number;
  /** Plugin-specific keys, as spelled in metadata (`package-manager`). */
  options: Record<string, unknown>;
};

export type StepOverride = {
  how?: string;
  name?: string;
  order?: number;
  where?: string[];
  insert?: boolean;
  options: Record<string, unknown>;
};

export const DEFAULT_ORDER = 50;

export const DEFAULT_HOW: Record<StepKey, string> = {
  discover: "fmf",
  provision: "local",
  prepare: "shell",
  execute: "tmt",
  report: "display",
  finish: "shell",
};

const BASE_KEYS = new Set(["name", "how", "order", "where", "when", "summary"]);

const PhaseBaseSchema = z
  .object({
    name: z.string().min(1).optional(),
    how: z.string().min(1).optional(),
    order: z.coerce.number().int().optional(),
    where: StringListSchema.optional(),
    when: StringListSchema.optional(),
    summary: z.string().optional(),
  })
  .passthrough();

// =============================================================================
// PUBLIC API
// =============================================================================

export function normalizePhases(
  step: StepKey,
  raw: RawPhase[],
  opts: { env?: NodeJS.ProcessEnv; overrides?: StepOverride[] } = {},
): PhaseData[] {
  const names = new DefaultNameGenerator(
    raw.map((phase) => phase.name).filter((name): name is string => typeof name === "string"),
  );

  let phases = raw.map((phase, index) => parsePhase(step, phase, index, names));
  phases = phases.map((phase) => applyEnvironmentOverrides(step, phase, opts.env ?? {}));

  for (const override of opts.overrides ?? []) {
    phases = applyStepOverride(step, phases, override, names);
  }

  const duplicateNames = duplicates(phases.map((phase) => phase.name));
  if (duplicateNames.length > 0) {
    throw new ConfigError(
      `Duplicate phase name${duplicateNames.length > 1 ? "s" : ""} in step '${step}': ${duplicateNames
        .map((name) => `'${name}'`)
        .join(", ")}.`,
    );
  }

  return sortPhases(phases);
}

export function sortPhases<T extends { order: number; index: number }>(phases: T[]): T[] {
  return [...phases].sort((a, b) => a.order - b.order || a.index - b.index);
}

/** Serialised form stored in `<step>/step.yaml`. */
export function phaseToRecord(phase: PhaseData): Record<string, unknown> {
  return {
    name: phase.name,
    how: phase.how,
    order: phase.order,
    ...(phase.where.length > 0 ? { where: phase.where } : {}),
    ...(phase.when.length > 0 ? { when: phase.when } : {}),
    ...(phase.summary ? { summary: phase.summary } : {}),
    ...phase.options,
  };
}

/** `default-0`, `default-1`, ... skipping names already taken. */
export class DefaultNameGenerator {
  private counter = 0;
  private readonly taken: Set<string>;

  constructor(known: string[] = []) {
    this.taken = new Set(known);
  }

  next(): string {
    for (;;) {
      const candidate = `${DEFAULT_NAME}-${this.counter}`;
      this.counter += 1;
      if (!this.taken.has(candidate)) {
        this.taken.add(candidate);
        return candidate;
      }
    }
  }
}

// =============================================================================
// INTERNALS
// =============================================================================

function parsePhase(
  step: StepKey,
  raw: RawPhase,
  index: number,
  names: DefaultNameGenerator,
): PhaseData {
  const parsed = PhaseBaseSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(
      `Invalid ${step} phase #${index}:\n${formatIssues(parsed.error.issues)}`,
      parsed.error,
    );
  }

  const base = parsed.data;
  return {
    name: base.name ?? names.next(),
    how: base.how ?? DEFAULT_HOW[step],
    order: base.order ?? DEFAULT_ORDER,
    where: base.where ?? [],
    when: base.when ?? [],
    ...(base.summary !== undefined ? { summary: base.summary } : {}),
    index,
    options: Object.fromEntries(Object.entries(raw).filter(([key]) => !BASE_KEYS.has(key))),
  };
}

function applyEnvironmentOverrides(
  step: StepKey,
  phase: PhaseData,
  env: NodeJS.ProcessEnv,
): PhaseData {
  const prefix = `TMT_PLUGIN_${envKey(step)}_${envKey(phase.how)}_`;
  const options = { ...phase.options };
  let order = phase.order;

  for (const [name, value] of Object.entries(env)) {
    if (value === undefined || !name.startsWith(prefix)) continue;
    const key = name.slice(prefix.length).toLowerCase().replace(/_/g, "-");
    if (key.length === 0) continue;

    if (key === "order") {
      order = parseOrder(value, name);
      continue;
    }
    options[key] = parseScalar(value);
  }

  return { ...phase, order, options };
}

function applyStepOverride(
  step: StepKey,
  phases: PhaseData[],
  override: StepOverride,
  names: DefaultNameGenerator,
): PhaseData[] {
  if (override.insert) {
    const inserted: PhaseData = {
      name: override.name ?? names.next(),
      how: override.how ?? DEFAULT_HOW[step],
      order: override.order ?? DEFAULT_ORDER,
      where: override.where ?? [],
      when: [],
      index: phases.length,
      options: { ...override.options },
    };
    return [...phases, inserted];
  }

  if (override.name !== undefined && !phases.some((phase) => phase.name === override.name)) {
    throw new ConfigError(`Cannot update phase '${override.name}' in step '${step}': no such phase.`);
  }

  // A step without phases still gets one to apply the options to.
  const targets =
    phases.length > 0
      ? phases
      : [
          {
            name: names.next(),
            how: DEFAULT_HOW[step],
            order: DEFAULT_ORDER,
            where: [],
            when: [],
            index: 0,
            options: {},
          },
        ];

  return targets.map((phase) => {
    if (override.name !== undefined && phase.name !== override.name) return phase;
    const howChanged = override.how !== undefined && override.how !== phase.how;
    return {
      ...phase,
      how: override.how ?? phase.how,
      order: override.order ?? phase.order,
      where: override.where ?? phase.where,
      // plugin keys of another plugin do not carry over
      options: { ...(howChanged ? {} : phase.options), ...override.options },
    };
  });
}

function envKey(value: string): string {
  return value.toUpperCase().replace(/[^A-Z0-9]+/g, "_");
}

function parseOrder(value: string, source: string): number {
  const order = Number(value);
  if (!Number.isInteger(order)) {
    throw new ConfigError(`Invalid order '${value}' in ${source}.`);
  }
  return order;
}

function parseScalar(value: string): unknown {
  try {
    const loaded: unknown = yaml.load(value);
    if (typeof loaded === "number" || typeof loaded === "boolean") return loaded;
  } catch {
    return value;
  }
  return value;
}
