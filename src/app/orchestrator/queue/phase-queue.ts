/**
 * Multihost dispatcher for guest-targeted phases.
 * Purpose: run each (phase, guest) pair with per-guest FIFO ordering and
 * concurrency across guests, wave by wave.
 * Assumptions: phases arrive sorted by declaration; guests are ready.
 * Usage: await dispatchPhases({ step: "prepare", phases, guests, run }).
 */

import { buildWaves, type GuestIdentity, type Schedulable } from "../../../core/scheduler.js";
import { formatErrorMessage } from "../../../core/error-format.js";
import { logRunEvent, type EventLogger } from "../../../core/logger.js";

// =============================================================================
// TYPES
// =============================================================================

export type PhaseOutcome<P, G, R> =
  | { status: "ok"; phase: P; guest: G; result: R }
  | { status: "error"; phase: P; guest: G; error: unknown }
  | { status: "skipped"; phase: P; guest: G; reason: string };

export type DispatchOptions<P, G, R> = {
  step: string;
  phases: P[];
  guests: G[];
  run: (phase: P, guest: G) => Promise<R>;
  signal?: AbortSignal;
  logger?: EventLogger;
};

export const SKIP_REASONS = {
  aborted: "interrupted",
  earlierWaveFailed: "an earlier phase failed",
  guestFailed: "an earlier phase failed on this guest",
} as const;

// =============================================================================
// PUBLIC API
// =============================================================================

/**
 * Outcomes come back in enqueue order (wave, phase, guest), whatever order the
 * work finished in. A `where` matching no guest throws before anything runs.
 */
export async function dispatchPhases<P extends Schedulable, G extends GuestIdentity, R>(
  opts: DispatchOptions<P, G, R>,
): Promise<PhaseOutcome<P, G, R>[]> {
  const waves = buildWaves(opts.phases, opts.guests, opts.step);
  const outcomes: PhaseOutcome<P, G, R>[] = [];
  let stopReason: string | null = null;

  for (const wave of waves) {
    if (stopReason === null && opts.signal?.aborted) stopReason = SKIP_REASONS.aborted;

    const pairs = wave.assignments.flatMap((assignment) =>
      assignment.guests.map((guest) => ({ phase: assignment.phase, guest })),
    );

    if (stopReason !== null) {
      const reason = stopReason;
      outcomes.push(...pairs.map((pair) => ({ status: "skipped" as const, ...pair, reason })));
      continue;
    }

    const slots = await runWave(pairs, opts);
    outcomes.push(...slots);

    if (slots.some((slot) => slot.status === "error")) {
      stopReason = SKIP_REASONS.earlierWaveFailed;
    } else if (opts.signal?.aborted) {
      stopReason = SKIP_REASONS.aborted;
    }
  }

  return outcomes;
}

export function failedOutcomes<P, G, R>(
  outcomes: PhaseOutcome<P, G, R>[],
): Extract<PhaseOutcome<P, G, R>, { status: "error" }>[] {
  return outcomes.filter(
    (outcome): outcome is Extract<PhaseOutcome<P, G, R>, { status: "error" }> =>
      outcome.status === "error",
  );
}

// =============================================================================
// INTERNALS
// =============================================================================

async function runWave<P extends Schedulable, G extends GuestIdentity, R>(
  pairs: Array<{ phase: P; guest: G }>,
  opts: DispatchOptions<P, G, R>,
): Promise<PhaseOutcome<P, G, R>[]> {
  const slots = new Array<PhaseOutcome<P, G, R>>(pairs.length);

  // one sequential lane per guest, lanes run concurrently
  const lanes = new Map<string, number[]>();
  pairs.forEach((pair, index) => {
    const lane = lanes.get(pair.guest.name) ?? [];
    lane.push(index);
    lanes.set(pair.guest.name, lane);
  });

  await Promise.all(
    [...lanes.values()].map(async (indexes) => {
      let guestFailed = false;
      for (const index of indexes) {
        const { phase, guest } = pairs[index];
        if (guestFailed) {
          slots[index] = { status: "skipped", phase, guest, reason: SKIP_REASONS.guestFailed };
          continue;
        }
        if (opts.signal?.aborted) {
          slots[index] = { status: "skipped", phase, guest, reason: SKIP_REASONS.aborted };
          continue;
        }

        slots[index] = await runPair(phase, guest, opts);
        if (slots[index].status === "error") guestFailed = true;
      }
    }),
  );

  return slots;
}

async function runPair<P extends Schedulable, G extends GuestIdentity, R>(
  phase: P,
  guest: G,
  opts: DispatchOptions<P, G, R>,
): Promise<PhaseOutcome<P, G, R>> {
  const log = opts.logger;
  if (log) {
    logRunEvent(log, "phase.start", { step: opts.step, phase: phase.name, guest: guest.name });
  }

  try {
    const result = await opts.run(phase, guest);
    if (log) {
      logRunEvent(log, "phase.complete", { step: opts.step, phase: phase.name, guest: guest.name });
    }
    return { status: "ok", phase, guest, result };
  } catch (error) {
    if (log) {
      logRunEvent(log, "phase.error", {
        step: opts.step,
        phase: phase.name,
        guest: guest.name,
        message: formatErrorMessage(error),
      });
    }
    return { status: "error", phase, guest, error };
  }
}
