/**
 * Discovered tests as the discover step hands them to later steps.
 * Purpose: attach serial numbers, `where` and the originating phase to test
 * records, and keep them in `discover/tests.yaml` with kebab-case keys.
 */

import { z } from "zod";

import { formatIssues } from "./config-loader.js";
import { ConfigError } from "./errors.js";
import { TestNodeSchema, type TestRecord } from "./metadata.js";

// =============================================================================
// TYPES
// =============================================================================

export type DiscoveredTest = TestRecord & {
  serialNumber: number;
  discoverPhase: string;
  /** Guests the test runs on, taken from its discover phase. Empty means all. */
  where: string[];
};

export type DiscoveredBatch = {
  phase: string;
  where: string[];
  tests: TestRecord[];
};

// =============================================================================
// SERIAL NUMBERS
// =============================================================================

/**
 * Serial numbers go 1..N in discovery order across all discover phases, so a
 * test selected twice gets two distinct numbers.
 */
export function assignSerialNumbers(batches: DiscoveredBatch[]): DiscoveredTest[] {
  let serial = 0;
  return batches.flatMap((batch) =>
    batch.tests.map((test) => {
      serial += 1;
      return { ...test, serialNumber: serial, discoverPhase: batch.phase, where: batch.where };
    }),
  );
}

export function testsForGuest(
  tests: DiscoveredTest[],
  guest: { name: string; role: string | null },
): DiscoveredTest[] {
  return tests.filter(
    (test) =>
      test.where.length === 0 ||
      test.where.includes(guest.name) ||
      (guest.role !== null && test.where.includes(guest.role)),
  );
}

// =============================================================================
// PERSISTENCE
// =============================================================================

const StoredTestSchema = TestNodeSchema.extend({
  name: z.string().min(1),
  "serial-number": z.number().int().positive(),
  "discover-phase": z.string().min(1),
  where: z.array(z.string()).default([]),
}).transform((stored): DiscoveredTest => {
  const { "serial-number": serialNumber, "discover-phase": discoverPhase, ...test } = stored;
  return { ...test, serialNumber, discoverPhase };
});

export function serializeTests(tests: DiscoveredTest[]): Record<string, unknown>[] {
  return tests.map((test) => {
    const { serialNumber, discoverPhase, ...rest } = test;
    return { ...rest, "serial-number": serialNumber, "discover-phase": discoverPhase };
  });
}

export function parseTests(doc: unknown, source: string): DiscoveredTest[] {
  const parsed = z.array(StoredTestSchema).safeParse(doc ?? []);
  if (!parsed.success) {
    throw new ConfigError(
      `Invalid discovered tests in ${source}:\n${formatIssues(parsed.error.issues)}`,
      parsed.error,
    );
  }
  return parsed.data;
}
