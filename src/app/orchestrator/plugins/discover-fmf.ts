/*
Purpose: discover tests from the metadata tree and copy the tree next to the plan
so every guest sees the test code at the same path.
Assumptions: the tree root holds the test scripts; test `path` is relative to it.
Usage: registry.create("discover", phase) with `how: fmf`.
*/

import path from "node:path";

import fse from "fs-extra";
import { z } from "zod";

import { ConfigError } from "../../../core/errors.js";
import { StringListSchema, type TestRecord } from "../../../core/metadata.js";
import type { TestResult } from "../../../core/results.js";
import { matchesAnyPattern, selectTests } from "../../../core/selection.js";
import type { PhaseData } from "../../../core/step-data.js";

import type { DiscoverContext, DiscoverPlugin } from "./plugin.js";
import { parsePhaseOptions } from "./registry.js";

export const SelectionOptionsSchema = z.object({
  test: StringListSchema.default([]),
  include: StringListSchema.default([]),
  exclude: StringListSchema.default([]),
  filter: StringListSchema.default([]),
  "failed-only": z.boolean().default(false),
});

const FmfOptionsSchema = SelectionOptionsSchema.strict();

export type SelectionOptions = z.infer<typeof SelectionOptionsSchema>;

/** Where discover copies test code; test `path` resolves under it. */
export function testsCodeDir(phaseWorkdir: string): string {
  return path.join(phaseWorkdir, "tests");
}

export class FmfDiscover implements DiscoverPlugin {
  private readonly options: SelectionOptions;

  constructor(phase: PhaseData) {
    this.options = parsePhaseOptions("discover", phase, FmfOptionsSchema);
  }

  async discover(ctx: DiscoverContext): Promise<TestRecord[]> {
    const tree = ctx.runtime.tree;
    const all = await tree.tests({ filters: this.options.filter });

    await copyTree(tree.root, testsCodeDir(ctx.workdir));
    return applySelection(all, this.options, ctx);
  }
}

// =============================================================================
// SHARED SELECTION
// =============================================================================

/**
 * Phase keys first, then `test --name` from the command line, then
 * `failed-only` against the previous execute results.
 */
export function applySelection<T extends TestRecord>(
  all: T[],
  options: SelectionOptions,
  ctx: Pick<DiscoverContext, "testNames" | "previousResults">,
): T[] {
  let selected = selectTests(all, {
    tests: options.test,
    includes: options.include,
    excludes: options.exclude,
  });

  if (ctx.testNames.length > 0) {
    selected = selected.filter((test) => matchesAnyPattern(test.name, ctx.testNames));
  }

  if (options["failed-only"]) {
    const failed = failedTestNames(ctx.previousResults);
    selected = selected.filter((test) => failed.has(test.name));
  }

  return selected;
}

export function failedTestNames(results: TestResult[]): Set<string> {
  const passing = new Set<string>(["pass", "info", "skip"]);
  return new Set(
    results
      .filter((result) => !passing.has(result.result))
      .map((result) => result.name),
  );
}

async function copyTree(root: string, destination: string): Promise<void> {
  if (isSameOrInside(destination, root)) {
    throw new ConfigError(
      `The workdir ${destination} lies inside the metadata tree ${root}; pass another --workdir-root.`,
    );
  }
  await fse.remove(destination);
  await fse.copy(root, destination, {
    dereference: true,
    filter: (source) => path.basename(source) !== ".git",
  });
}

function isSameOrInside(candidate: string, dir: string): boolean {
  const relative = path.relative(path.resolve(dir), path.resolve(candidate));
  return relative === "" || (!relative.startsWith("..") && !path.isAbsolute(relative));
}
