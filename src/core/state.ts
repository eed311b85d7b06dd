import { z } from "zod";

import { isoNow } from "./utils.js";

// =============================================================================
// STATUS ENUMS
// =============================================================================

export const RunStatusSchema = z.enum(["running", "complete", "failed", "interrupted"]);
export type RunStatus = z.infer<typeof RunStatusSchema>;

export const PlanStatusSchema = z.enum(["pending", "running", "complete", "failed"]);
export type PlanStatus = z.infer<typeof PlanStatusSchema>;

// =============================================================================
// RUN STATE
// =============================================================================

export const PlanStateSchema = z
  .object({
    name: z.string().min(1),
    status: PlanStatusSchema,
    exit_code: z.number().int().nullable().default(null),
    last_error: z.string().nullable().default(null),
    updated_at: z.string(),
  })
  .strict();
export type PlanState = z.infer<typeof PlanStateSchema>;

export const RunStateSchema = z
  .object({
    run_id: z.string().min(1),
    status: RunStatusSchema,
    started_at: z.string(),
    updated_at: z.string(),
    root: z.string(),
    environment: z.record(z.string()).default({}),
    context: z.record(z.array(z.string())).default({}),
    exit_code: z.number().int().nullable().default(null),
    plans: z.array(PlanStateSchema).default([]),
  })
  .strict();
export type RunState = z.infer<typeof RunStateSchema>;

// =============================================================================
// MUTATIONS
// =============================================================================

export function createRunState(args: {
  runId: string;
  root: string;
  environment?: Record<string, string>;
  context?: Record<string, string[]>;
  now?: string;
}): RunState {
  const now = args.now ?? isoNow();
  return {
    run_id: args.runId,
    status: "running",
    started_at: now,
    updated_at: now,
    root: args.root,
    environment: args.environment ?? {},
    context: args.context ?? {},
    exit_code: null,
    plans: [],
  };
}

/** Registers plans in selection order; already known plans keep their place. */
export function registerPlans(state: RunState, names: string[], now: string = isoNow()): void {
  for (const name of names) {
    if (state.plans.some((plan) => plan.name === name)) continue;
    state.plans.push({ name, status: "pending", exit_code: null, last_error: null, updated_at: now });
  }
}

export function markPlanRunning(state: RunState, name: string, now: string = isoNow()): void {
  const plan = requirePlan(state, name);
  plan.status = "running";
  plan.last_error = null;
  plan.updated_at = now;
}

export function markPlanFinished(
  state: RunState,
  name: string,
  outcome: { exitCode: number; error?: string },
  now: string = isoNow(),
): void {
  const plan = requirePlan(state, name);
  plan.status = outcome.error ? "failed" : "complete";
  plan.exit_code = outcome.exitCode;
  plan.last_error = outcome.error ?? null;
  plan.updated_at = now;
}

export function resumeRun(state: RunState, now: string = isoNow()): void {
  state.status = "running";
  state.exit_code = null;
  state.updated_at = now;
  for (const plan of state.plans) {
    if (plan.status === "running") plan.status = "pending";
  }
}

export function completeRun(
  state: RunState,
  outcome: { exitCode: number; interrupted?: boolean },
  now: string = isoNow(),
): void {
  state.exit_code = outcome.exitCode;
  state.status = outcome.interrupted
    ? "interrupted"
    : state.plans.some((plan) => plan.status === "failed")
      ? "failed"
      : "complete";
  state.updated_at = now;
}

function requirePlan(state: RunState, name: string): PlanState {
  const plan = state.plans.find((candidate) => candidate.name === name);
  if (!plan) {
    throw new Error(`Unknown plan in run state: ${name}`);
  }
  return plan;
}
