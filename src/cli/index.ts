import { Command, InvalidArgumentError } from "commander";

import { cleanCommand } from "./clean.js";
import { listPlansCommand, listTestsCommand } from "./list.js";
import { runCommand, type RunCommandOptions } from "./run.js";
import { collectValues } from "./run-args.js";
import { statusCommand } from "./status.js";

export function buildCli(): Command {
  const program = new Command();

  program
    .name("trellis")
    .description("Run test plans on provisioned guests, step by step")
    .version("0.1.0")
    .enablePositionalOptions();

  // Options after the first step name belong to that step; see parseRunSegments.
  program
    .command("run")
    .description("Run plans: discover, provision, prepare, execute, report, finish")
    .argument("[segments...]", "Steps with their options, then 'plan --name <re>' or 'test --name <re>'")
    .passThroughOptions()
    .option("-i, --id <id>", "Run id (default: a new timestamped id)")
    .option("-l, --last", "Continue the most recent run", false)
    .option("-r, --root <path>", "Metadata tree root (default: current directory)")
    .option("--workdir-root <path>", "Directory holding run workdirs (default: $TRELLIS_WORKDIR_ROOT or /var/tmp/trellis)")
    .option("-f, --force", "Remove the run workdir and start over", false)
    .option("--dry", "Discover, then print what each step would do", false)
    .option("-k, --keep", "Keep guests running after finish", false)
    .option("--debug", "Write debug events to the run log", false)
    .option("-v, --verbose", "Verbose output", false)
    .option("-q, --quiet", "Only print results and errors", false)
    .option("-a, --all", "Run all steps, including the ones after a named step", false)
    .option("--until <step>", "Run steps up to and including <step>")
    .option("--since <step>", "Run steps from <step> on")
    .option("--before <step>", "Run steps before <step>")
    .option("--after <step>", "Run steps after <step>")
    .option("--skip <step>", "Skip a step (repeatable)", collectValues, [])
    .option("-e, --environment <key=value>", "Environment for tests (repeatable)", collectValues, [])
    .option("-c, --context <key=value>", "Context dimension (repeatable)", collectValues, [])
    .option("--max-workers <n>", "Guests worked on at once per phase", parsePositiveInt)
    .action(async (segments: string[], opts: RunCommandOptions) => {
      process.exitCode = await runCommand(segments, opts);
    });

  program
    .command("status")
    .description("Show the state of a run")
    .option("-i, --id <id>", "Run id (default: the most recent run)")
    .option("-l, --last", "Show the most recent run", false)
    .option("--workdir-root <path>", "Directory holding run workdirs")
    .action(async (opts: { id?: string; last?: boolean; workdirRoot?: string }) => {
      process.exitCode = await statusCommand(opts);
    });

  program
    .command("clean")
    .description("Remove a run's guests and its workdir")
    .option("-i, --id <id>", "Run id (default: the most recent run)")
    .option("-l, --last", "Clean the most recent run", false)
    .option("--workdir-root <path>", "Directory holding run workdirs")
    .option("--keep-guests", "Only remove the workdir", false)
    .action(async (opts: { id?: string; last?: boolean; workdirRoot?: string; keepGuests?: boolean }) => {
      process.exitCode = await cleanCommand(opts);
    });

  program
    .command("plans")
    .description("List plans in the metadata tree")
    .option("-r, --root <path>", "Metadata tree root (default: current directory)")
    .action(async (opts: { root?: string }) => {
      await listPlansCommand(opts);
    });

  program
    .command("tests")
    .description("List tests in the metadata tree, in execution order")
    .option("-r, --root <path>", "Metadata tree root (default: current directory)")
    .action(async (opts: { root?: string }) => {
      await listTestsCommand(opts);
    });

  return program;
}

function parsePositiveInt(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isInteger(parsed) || parsed <= 0 || `${parsed}` !== value.trim()) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }
  return parsed;
}
