/*
Purpose: `trellis plans` and `trellis tests`, listing what a metadata tree holds.
Usage: await listPlansCommand({ root: "." });
*/

import { ConsoleOutput } from "../core/console-output.js";
import { FileMetadataTree, type MetadataTree } from "../core/metadata.js";

import { normalizeCommandError } from "./command-errors.js";
import { pad } from "./status.js";

type ListOptions = {
  root?: string;
};

export type ListCommandDeps = {
  env?: NodeJS.ProcessEnv;
  output?: ConsoleOutput;
  tree?: MetadataTree;
};

export async function listPlansCommand(opts: ListOptions, deps: ListCommandDeps = {}): Promise<void> {
  const output = deps.output ?? new ConsoleOutput();

  try {
    const tree = deps.tree ?? new FileMetadataTree(opts.root ?? process.cwd(), { env: deps.env });
    const plans = await tree.plans();
    if (plans.length === 0) {
      output.print(`No plans found in ${tree.root}.`);
      return;
    }

    const nameWidth = Math.max(...plans.map((plan) => plan.name.length));
    for (const plan of plans) {
      const line = `${pad(plan.name, nameWidth)}  ${plan.enabled ? "" : "(disabled) "}${plan.summary ?? ""}`;
      output.print(line.trimEnd());
    }
  } catch (error) {
    throw normalizeCommandError(error, { title: "Listing plans failed." });
  }
}

export async function listTestsCommand(opts: ListOptions, deps: ListCommandDeps = {}): Promise<void> {
  const output = deps.output ?? new ConsoleOutput();

  try {
    const tree = deps.tree ?? new FileMetadataTree(opts.root ?? process.cwd(), { env: deps.env });
    const tests = await tree.tests();
    if (tests.length === 0) {
      output.print(`No tests found in ${tree.root}.`);
      return;
    }

    const nameWidth = Math.max(...tests.map((test) => test.name.length));
    for (const test of tests) {
      output.print(`${pad(test.name, nameWidth)}  ${test.order}${test.enabled ? "" : "  (disabled)"}`);
      output.verbose(`    ${test.test}`);
    }
  } catch (error) {
    throw normalizeCommandError(error, { title: "Listing tests failed." });
  }
}
