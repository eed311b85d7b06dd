import { ConfigError } from "./errors.js";
import { STEP_NAMES, type StepKey } from "./metadata.js";

export type StepSelection = {
  /** Steps named on the command line, in any order. */
  steps?: StepKey[];
  all?: boolean;
  until?: StepKey;
  since?: StepKey;
  before?: StepKey;
  after?: StepKey;
  skip?: StepKey[];
};

export function isStepName(value: string): value is StepKey {
  return STEP_NAMES.some((step) => step === value);
}

export function parseStepName(value: string, flag: string): StepKey {
  if (isStepName(value)) return value;
  throw new ConfigError(`Invalid step '${value}' for ${flag} (known: ${STEP_NAMES.join(", ")}).`);
}

/**
 * Steps to run, always in pipeline order. Named steps and a range combine;
 * with neither, every step runs. `skip` is removed last.
 */
export function selectSteps(selection: StepSelection): StepKey[] {
  const named = new Set(selection.steps ?? []);
  const range = stepRange(selection);

  let selected: StepKey[];
  if (selection.all || (named.size === 0 && range === null)) {
    selected = [...STEP_NAMES];
  } else {
    selected = STEP_NAMES.filter((step) => named.has(step) || (range?.has(step) ?? false));
  }

  const skipped = new Set(selection.skip ?? []);
  return selected.filter((step) => !skipped.has(step));
}

function stepRange(selection: StepSelection): Set<StepKey> | null {
  const bounds = [selection.until, selection.since, selection.before, selection.after];
  if (bounds.every((bound) => bound === undefined)) return null;

  let first = 0;
  let last = STEP_NAMES.length - 1;
  if (selection.since) first = Math.max(first, STEP_NAMES.indexOf(selection.since));
  if (selection.after) first = Math.max(first, STEP_NAMES.indexOf(selection.after) + 1);
  if (selection.until) last = Math.min(last, STEP_NAMES.indexOf(selection.until));
  if (selection.before) last = Math.min(last, STEP_NAMES.indexOf(selection.before) - 1);

  if (first > last) {
    throw new ConfigError("The step range selects no steps; check --since/--after against --until/--before.");
  }
  return new Set(STEP_NAMES.slice(first, last + 1));
}
