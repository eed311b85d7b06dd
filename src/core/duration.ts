/*
Purpose: parse test `duration` values and format elapsed time.
Assumptions: durations are whitespace-separated terms like "5m", "1h 30m", "90"
(seconds) and multipliers like "*2" applied after summing.
Usage: parseDuration("1h 30m") -> 5400, formatElapsed(3723000) -> "01:02:03".
*/

import { ConfigError } from "./errors.js";

export const DEFAULT_TEST_DURATION = "5m";

const UNIT_SECONDS: Record<string, number> = {
  s: 1,
  m: 60,
  h: 60 * 60,
  d: 60 * 60 * 24,
};

const TERM_PATTERN = /^(?:\*(\d+(?:\.\d+)?)|(\d+)([smhd])?)$/;

/** Returns whole seconds, rounded up after multipliers are applied. */
export function parseDuration(input: string): number {
  // "1h30m" reads the same as "1h 30m"
  const normalized = input.trim().replace(/([smhd])(?=[\d*])/g, "$1 ").replace(/\*\s+/g, "*");
  if (normalized.length === 0) {
    throw new ConfigError(`Invalid duration '${input}'.`);
  }

  let totalSeconds = 0;
  let multiplier = 1;

  for (const term of normalized.split(/\s+/)) {
    const match = TERM_PATTERN.exec(term);
    if (!match) {
      throw new ConfigError(`Invalid duration '${input}'.`);
    }

    const [, factor, digits, suffix] = match;
    if (factor !== undefined) {
      multiplier *= Number(factor);
      continue;
    }

    totalSeconds += Number(digits) * UNIT_SECONDS[suffix ?? "s"];
  }

  return Math.ceil(totalSeconds * multiplier);
}

export function parseDurationMs(input: string): number {
  return parseDuration(input) * 1000;
}

/** For `duration_seconds` in results: millisecond precision, 0 for non-finite input. */
export function secondsFromMs(durationMs: number): number {
  if (!Number.isFinite(durationMs)) return 0;
  return Number((durationMs / 1000).toFixed(3));
}

export function formatElapsed(durationMs: number): string {
  const totalSeconds = Math.max(0, Math.round(durationMs / 1000));
  const hours = Math.floor(totalSeconds / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const seconds = totalSeconds % 60;
  return [hours, minutes, seconds].map((part) => String(part).padStart(2, "0")).join(":");
}
