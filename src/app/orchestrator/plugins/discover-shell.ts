/*
Purpose: tests written inline in the plan, no metadata tree lookup.
Usage: discover: { how: shell, tests: [{ name: /smoke, test: "true" }] }.
*/

import fse from "fs-extra";
import { z } from "zod";

import { normalizeNodeName, TestNodeSchema, type TestRecord } from "../../../core/metadata.js";
import { matchesFilters } from "../../../core/selection.js";
import type { PhaseData } from "../../../core/step-data.js";

import { applySelection, SelectionOptionsSchema, testsCodeDir } from "./discover-fmf.js";
import type { DiscoverContext, DiscoverPlugin } from "./plugin.js";
import { parsePhaseOptions } from "./registry.js";

const InlineTestSchema = TestNodeSchema.extend({ name: z.string().min(1) });

const ShellDiscoverOptionsSchema = SelectionOptionsSchema.extend({
  tests: z.array(InlineTestSchema).default([]),
}).strict();

export class ShellDiscover implements DiscoverPlugin {
  private readonly options: z.infer<typeof ShellDiscoverOptionsSchema>;

  constructor(phase: PhaseData) {
    this.options = parsePhaseOptions("discover", phase, ShellDiscoverOptionsSchema);
  }

  async discover(ctx: DiscoverContext): Promise<TestRecord[]> {
    // scripts run relative to an empty code directory
    await fse.ensureDir(testsCodeDir(ctx.workdir));

    const all = this.options.tests
      .map((test, index) => ({ test: { ...test, name: normalizeNodeName(test.name) }, index }))
      .sort((a, b) => a.test.order - b.test.order || a.index - b.index)
      .map(({ test }) => test)
      .filter((test) => matchesFilters(test, this.options.filter));

    return applySelection(all, this.options, ctx);
  }
}
