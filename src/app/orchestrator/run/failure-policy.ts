/**
 * Exit code policy.
 * Purpose: centralize how plan outcomes turn into the process exit code.
 */

import { EXIT_CODES, resultsToExitCode, type ExitCode } from "../../../core/results.js";

import type { PlanOutcome } from "./plan-engine.js";

// =============================================================================
// PUBLIC API
// =============================================================================

export type ExitInput = Pick<PlanOutcome, "results" | "hasResults" | "error" | "interrupted">;

/**
 * Errors and interrupts win. Plans that never got to execute say nothing
 * about results, so a run where none did exits 0.
 */
export function exitCodeFor(outcomes: ExitInput[]): ExitCode {
  if (outcomes.some((outcome) => outcome.error !== null || outcome.interrupted)) {
    return EXIT_CODES.error;
  }

  const executed = outcomes.filter((outcome) => outcome.hasResults);
  if (executed.length === 0) return EXIT_CODES.success;

  return resultsToExitCode(
    executed.flatMap((outcome) => outcome.results.map((result) => result.result)),
  );
}
