/*
Purpose: print results to the console.
Usage: report: { how: display, display-guest: always }.
*/

import { z } from "zod";

import { summarizeResults } from "../../../core/results.js";
import type { PhaseData } from "../../../core/step-data.js";
import { formatResultLine } from "../helpers/format.js";

import type { ReportContext, ReportPlugin } from "./plugin.js";
import { parsePhaseOptions } from "./registry.js";

const DisplayOptionsSchema = z
  .object({
    "display-guest": z.enum(["auto", "always", "never"]).default("auto"),
  })
  .strict();

export class DisplayReport implements ReportPlugin {
  private readonly displayGuest: "auto" | "always" | "never";

  constructor(phase: PhaseData) {
    this.displayGuest = parsePhaseOptions("report", phase, DisplayOptionsSchema)["display-guest"];
  }

  async report(ctx: ReportContext): Promise<void> {
    const output = ctx.runtime.output;
    const showGuest =
      this.displayGuest === "always" || (this.displayGuest === "auto" && ctx.guests.length > 1);

    for (const result of ctx.results) {
      output.info(formatResultLine(result, { showGuest, output }));
      if (result.note) output.verbose(`    note: ${result.note}`);
      for (const log of result.log) output.verbose(`    log: ${log}`);
    }

    output.print(`summary: ${summarizeResults(ctx.results.map((result) => result.result))}`);
  }
}
