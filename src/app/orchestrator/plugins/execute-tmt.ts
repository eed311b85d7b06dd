/**
 * Shell test runner.
 * Purpose: run discovered tests one by one on a guest, honour reboot requests,
 * checks and the `result` key, and turn every invocation into a TestResult.
 * Assumptions: tests and the invocation directory live under the plan workdir,
 * which the guest sees at the same path; files the test writes are pulled back
 * before they are read.
 * Usage: registry.create("execute", phase) with `how: tmt`.
 */

import path from "node:path";

import fse from "fs-extra";
import yaml from "js-yaml";
import { z } from "zod";

import { formatElapsed, parseDurationMs, secondsFromMs } from "../../../core/duration.js";
import { formatErrorMessage } from "../../../core/error-format.js";
import { GuestTimeoutError, OrchestratorError } from "../../../core/errors.js";
import type { DiscoveredTest } from "../../../core/discovered.js";
import { logRunEvent } from "../../../core/logger.js";
import { phaseWorkdir, testInvocationDir } from "../../../core/paths.js";
import {
  interpretOutcome,
  outcomeFromExitCode,
  parseCustomResults,
  worstOutcome,
  type CheckOutcome,
  type ResultOutcome,
  type SubResult,
  type TestResult,
} from "../../../core/results.js";
import type { PhaseData } from "../../../core/step-data.js";
import { isoNow } from "../../../core/utils.js";
import { formatResultLine } from "../helpers/format.js";
import type { Guest } from "../guests/guest.js";
import { buildTopology, pushTopology } from "../guests/topology.js";

import { runChecks } from "./checks.js";
import { testsCodeDir } from "./discover-fmf.js";
import type { ExecuteContext, ExecutePlugin } from "./plugin.js";
import { parsePhaseOptions } from "./registry.js";

// =============================================================================
// TYPES
// =============================================================================

const TmtOptionsSchema = z
  .object({
    /** Replaces every test's own duration. */
    duration: z.string().min(1).optional(),
    "exit-first": z.boolean().default(false),
  })
  .strict();

type TmtOptions = z.infer<typeof TmtOptionsSchema>;

export const MAX_REBOOTS = 10;
export const CUSTOM_RESULTS_FILE = "results.yaml";
export const REBOOT_REQUEST_FILE = "reboot-request";
export const OUTPUT_FILE = "output.txt";

const RebootRequestSchema = z
  .object({
    command: z.string().min(1).nullable().optional(),
    timeout: z.number().int().positive().nullable().optional(),
  })
  .nullable();

type Invocation = {
  dir: string;
  dataDir: string;
  rebootRequest: string;
  outputPath: string;
  cwd: string;
};

type RawRun = {
  raw: ResultOutcome;
  notes: string[];
  transcript: string[];
  checks: CheckOutcome[];
  /** The test command ran to its end, not cut off by a timeout or a failure. */
  completed: boolean;
  /** The guest is gone; later tests on it cannot run. */
  guestLost: boolean;
};

// =============================================================================
// PLUGIN
// =============================================================================

export class TmtExecute implements ExecutePlugin {
  private readonly options: TmtOptions;

  constructor(phase: PhaseData) {
    this.options = parsePhaseOptions("execute", phase, TmtOptionsSchema);
  }

  async execute(ctx: ExecuteContext): Promise<TestResult[]> {
    const { runtime, guest } = ctx;
    const results: TestResult[] = [];
    const showGuest = ctx.guests.length > 1;

    for (const test of ctx.tests) {
      if (runtime.signal?.aborted) break;

      const { result, guestLost } = await this.runTest(ctx, test);
      results.push(result);
      runtime.output.info(formatResultLine(result, { showGuest, output: runtime.output }));

      if (guestLost) {
        runtime.output.warn(`Guest ${guest.name} is gone, not running its remaining tests.`);
        break;
      }
      if (this.options["exit-first"] && (result.result === "fail" || result.result === "error")) {
        runtime.output.info(`Stopping on guest ${guest.name} after ${test.name} (exit-first).`);
        break;
      }
    }

    return results;
  }

  private async runTest(
    ctx: ExecuteContext,
    test: DiscoveredTest,
  ): Promise<{ result: TestResult; guestLost: boolean }> {
    const { runtime, guest } = ctx;
    const invocation = await prepareInvocation(ctx, test);
    const timeoutMs = parseDurationMs(this.options.duration ?? test.duration);

    logRunEvent(runtime.logger, "test.start", {
      test: test.name,
      serial_number: test.serialNumber,
      guest: guest.name,
    });

    const startTime = isoNow();
    const started = Date.now();
    const run = await runInvocation(ctx, test, invocation, timeoutMs);
    const elapsedMs = Date.now() - started;

    let subresult: SubResult[] = [];
    let raw = run.raw;
    if (test.result === "custom" && run.completed) {
      const custom = await readCustomResults(invocation.dataDir);
      subresult = custom.subresult;
      raw = custom.raw;
      run.notes.push(...custom.notes);
    }

    const interpretation = interpretOutcome({
      raw,
      interpret: test.result,
      checks: run.checks,
      notes: run.notes,
    });

    // written after the last pull, which mirrors the guest side of the directory
    await fse.outputFile(invocation.outputPath, run.transcript.join(""));

    const result: TestResult = {
      name: test.name,
      serialNumber: test.serialNumber,
      guest: { name: guest.name, role: guest.role },
      result: interpretation.result,
      ...(interpretation.originalResult ? { originalResult: interpretation.originalResult } : {}),
      note: interpretation.note,
      log: [path.relative(runtime.workdir, invocation.outputPath)],
      startTime,
      endTime: isoNow(),
      duration: formatElapsed(elapsedMs),
      dataPath: path.relative(runtime.workdir, invocation.dataDir),
      subresult,
      check: interpretation.check,
    };

    logRunEvent(runtime.logger, "test.complete", {
      test: test.name,
      serial_number: test.serialNumber,
      guest: guest.name,
      result: result.result,
      duration_seconds: secondsFromMs(elapsedMs),
    });

    return { result, guestLost: run.guestLost };
  }
}

// =============================================================================
// INVOCATION
// =============================================================================

async function prepareInvocation(ctx: ExecuteContext, test: DiscoveredTest): Promise<Invocation> {
  const workdir = ctx.runtime.workdir;
  const dir = testInvocationDir(workdir, ctx.guest.name, test.name, test.serialNumber);
  const dataDir = path.join(dir, "data");

  await fse.remove(dir);
  await fse.ensureDir(dataDir);

  const codeDir = testsCodeDir(phaseWorkdir(workdir, "discover", test.discoverPhase));
  return {
    dir,
    dataDir,
    rebootRequest: path.join(dir, REBOOT_REQUEST_FILE),
    outputPath: path.join(dir, OUTPUT_FILE),
    cwd: path.join(codeDir, test.path),
  };
}

/**
 * Runs the test, rebooting and rerunning it while it asks for reboots.
 * Guest failures end the invocation with an `error` outcome instead of
 * propagating, so sibling tests on other guests keep their results.
 */
async function runInvocation(
  ctx: ExecuteContext,
  test: DiscoveredTest,
  invocation: Invocation,
  timeoutMs: number,
): Promise<RawRun> {
  const { guest, runtime } = ctx;
  const run: RawRun = {
    raw: "error",
    notes: [],
    transcript: [],
    checks: [],
    completed: false,
    guestLost: false,
  };
  let rebootCount = 0;

  try {
    for (;;) {
      const topologyEnv = await pushTopology(buildTopology(ctx.guests, guest), {
        dir: invocation.dir,
        guest,
      });
      const env = testEnvironment(ctx, test, invocation, rebootCount, topologyEnv);
      const checkOpts = {
        guest,
        cwd: invocation.cwd,
        env,
        logDir: invocation.dir,
        relativeTo: runtime.workdir,
      };

      if (rebootCount === 0 && test.check.length > 0) {
        run.checks.push(...(await runChecks("before-test", test.check, checkOpts)));
        // the pull after the test mirrors the guest side, check logs included
        await guest.push(invocation.dir);
      }

      const exitCode = await runCommand(guest, test, invocation, env, timeoutMs, run);
      await guest.pull(invocation.dir);

      if (exitCode === null) {
        run.raw = "error";
        run.notes.push("timeout");
        break;
      }

      const request = await takeRebootRequest(invocation.rebootRequest);
      if (request) {
        if (rebootCount >= MAX_REBOOTS) {
          run.raw = "error";
          run.notes.push(`reboot limit of ${MAX_REBOOTS} reached`);
          break;
        }
        rebootCount += 1;
        logRunEvent(runtime.logger, "test.reboot", {
          test: test.name,
          guest: guest.name,
          reboot_count: rebootCount,
        });
        await guest.reboot(request);
        continue;
      }

      run.raw = outcomeFromExitCode(exitCode);
      run.completed = true;
      run.checks.push(...(await runChecks("after-test", test.check, checkOpts)));
      break;
    }
  } catch (err) {
    if (!(err instanceof OrchestratorError)) throw err;
    run.raw = "error";
    run.notes.push(formatErrorMessage(err));
    run.guestLost = !guest.isReady();
  }

  return run;
}

/** `null` when the test ran out of time. */
async function runCommand(
  guest: Guest,
  test: DiscoveredTest,
  invocation: Invocation,
  env: Record<string, string>,
  timeoutMs: number,
  run: RawRun,
): Promise<number | null> {
  try {
    const res = await guest.execute(test.test, { cwd: invocation.cwd, env, timeoutMs });
    run.transcript.push(res.stdout, res.stderr);
    return res.exitCode;
  } catch (err) {
    if (err instanceof GuestTimeoutError) {
      run.transcript.push(`\nTest timed out after ${formatElapsed(timeoutMs)}.\n`);
      return null;
    }
    throw err;
  }
}

export function testEnvironment(
  ctx: ExecuteContext,
  test: DiscoveredTest,
  invocation: Pick<Invocation, "dataDir" | "rebootRequest">,
  rebootCount: number,
  topologyEnv: Record<string, string>,
): Record<string, string> {
  return {
    ...ctx.runtime.environment,
    ...test.environment,
    TMT_TEST_NAME: test.name,
    TMT_TEST_DATA: invocation.dataDir,
    TMT_TEST_SERIAL_NUMBER: String(test.serialNumber),
    TMT_REBOOT_COUNT: String(rebootCount),
    TMT_REBOOT_REQUEST: invocation.rebootRequest,
    TMT_PLAN_DATA: ctx.runtime.dataDir,
    ...topologyEnv,
  };
}

// =============================================================================
// FILES WRITTEN BY THE TEST
// =============================================================================

/** Reads and deletes the reboot request; `null` when the test did not ask. */
export async function takeRebootRequest(
  filePath: string,
): Promise<{ command?: string; timeoutMs?: number } | null> {
  if (!(await fse.pathExists(filePath))) return null;

  const text = await fse.readFile(filePath, "utf8");
  await fse.remove(filePath);

  let doc: unknown;
  try {
    doc = text.trim().length > 0 ? yaml.load(text) : null;
  } catch (err) {
    throw new OrchestratorError(`Invalid reboot request in ${filePath}.`, err);
  }

  const parsed = RebootRequestSchema.safeParse(doc);
  if (!parsed.success) {
    throw new OrchestratorError(`Invalid reboot request in ${filePath}.`, parsed.error);
  }

  const request: { command?: string; timeoutMs?: number } = {};
  if (parsed.data?.command) request.command = parsed.data.command;
  if (parsed.data?.timeout) request.timeoutMs = parsed.data.timeout * 1000;
  return request;
}

async function readCustomResults(
  dataDir: string,
): Promise<{ raw: ResultOutcome; subresult: SubResult[]; notes: string[] }> {
  const filePath = path.join(dataDir, CUSTOM_RESULTS_FILE);
  if (!(await fse.pathExists(filePath))) {
    return { raw: "error", subresult: [], notes: [`custom results file ${CUSTOM_RESULTS_FILE} not found`] };
  }

  try {
    const subresult = parseCustomResults(yaml.load(await fse.readFile(filePath, "utf8")), filePath);
    const worst = worstOutcome(subresult.map((entry) => entry.result));
    if (worst === null) {
      return { raw: "error", subresult, notes: ["custom results file is empty"] };
    }
    return { raw: worst, subresult, notes: [] };
  } catch (err) {
    return { raw: "error", subresult: [], notes: [formatErrorMessage(err)] };
  }
}
