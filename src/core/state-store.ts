import fs from "node:fs/promises";
import path from "node:path";
import { randomUUID } from "node:crypto";

import fse from "fs-extra";
import yaml from "js-yaml";

import { formatIssues } from "./config-loader.js";
import { ConfigError } from "./errors.js";
import { runStatePath } from "./paths.js";
import { RunStateSchema, type PlanStatus, type RunState, type RunStatus } from "./state.js";
import { isoNow, toYaml } from "./utils.js";

// =============================================================================
// TYPES
// =============================================================================

export type PlanStatusRow = {
  name: string;
  status: PlanStatus;
  exitCode: number | null;
  lastError: string | null;
};

export type RunStatusSummary = {
  runId: string;
  status: RunStatus;
  startedAt: string;
  updatedAt: string;
  exitCode: number | null;
  planCounts: Record<PlanStatus, number> & { total: number };
  plans: PlanStatusRow[];
};

// =============================================================================
// STORE
// =============================================================================

export class StateStore {
  private readonly statePathValue: string;

  constructor(
    public readonly workdirRoot: string,
    public readonly runId: string,
  ) {
    this.statePathValue = runStatePath(workdirRoot, runId);
  }

  get statePath(): string {
    return this.statePathValue;
  }

  async exists(): Promise<boolean> {
    return fse.pathExists(this.statePathValue);
  }

  async load(): Promise<RunState> {
    return loadRunState(this.statePathValue);
  }

  async save(state: RunState): Promise<void> {
    await saveRunState(this.statePathValue, state);
  }
}

export async function findLatestRunId(workdirRoot: string): Promise<string | null> {
  if (!(await fse.pathExists(workdirRoot))) return null;

  const entries = await fse.readdir(workdirRoot);
  const candidates = await Promise.all(
    entries.map(async (entry) => {
      const statePath = runStatePath(workdirRoot, entry);
      if (!(await fse.pathExists(statePath))) return null;
      const stat = await fse.stat(statePath);
      return { runId: entry, mtime: stat.mtimeMs };
    }),
  );

  const runs = candidates.filter(
    (candidate): candidate is { runId: string; mtime: number } => candidate !== null,
  );
  if (runs.length === 0) return null;

  runs.sort((a, b) => b.mtime - a.mtime || b.runId.localeCompare(a.runId));
  return runs[0].runId;
}

export async function loadRunStateForRoot(
  workdirRoot: string,
  runId?: string,
): Promise<{ runId: string; state: RunState } | null> {
  const resolvedRunId = runId ?? (await findLatestRunId(workdirRoot));
  if (!resolvedRunId) return null;

  const store = new StateStore(workdirRoot, resolvedRunId);
  if (!(await store.exists())) return null;

  const state = await store.load();
  return { runId: resolvedRunId, state };
}

export function summarizeRunState(state: RunState): RunStatusSummary {
  const planCounts = { total: state.plans.length, pending: 0, running: 0, complete: 0, failed: 0 };
  for (const plan of state.plans) {
    planCounts[plan.status] += 1;
  }

  return {
    runId: state.run_id,
    status: state.status,
    startedAt: state.started_at,
    updatedAt: state.updated_at,
    exitCode: state.exit_code,
    planCounts,
    plans: state.plans.map((plan) => ({
      name: plan.name,
      status: plan.status,
      exitCode: plan.exit_code,
      lastError: plan.last_error,
    })),
  };
}

// =============================================================================
// LOAD/SAVE
// =============================================================================

export async function loadRunState(statePath: string): Promise<RunState> {
  const raw = await fse.readFile(statePath, "utf8");
  const parsed = RunStateSchema.safeParse(yaml.load(raw));
  if (!parsed.success) {
    throw new ConfigError(
      `Invalid run state at ${statePath}:\n${formatIssues(parsed.error.issues)}`,
      parsed.error,
    );
  }

  return parsed.data;
}

export async function saveRunState(statePath: string, state: RunState): Promise<void> {
  const parsed = RunStateSchema.safeParse(state);
  if (!parsed.success) {
    throw new Error(`Cannot save run state: ${parsed.error.toString()}`);
  }

  const normalized: RunState = { ...parsed.data, updated_at: isoNow() };
  Object.assign(state, normalized);

  await writeFileAtomic(statePath, toYaml(normalized));
}

/** Temp file, fsync, rename: readers see the old or the new file, never half of one. */
export async function writeFileAtomic(filePath: string, content: string): Promise<void> {
  await fse.ensureDir(path.dirname(filePath));

  const tmpPath = `${filePath}.${randomUUID()}.tmp`;
  const handle = await fs.open(tmpPath, "w");

  try {
    await handle.writeFile(content, "utf8");
    await handle.sync();
    await handle.close();
    await fs.rename(tmpPath, filePath);
  } catch (err) {
    await handle.close().catch(() => undefined);
    await fse.remove(tmpPath).catch(() => undefined);
    throw err;
  }
}

export async function writeYamlAtomic(filePath: string, data: unknown): Promise<void> {
  await writeFileAtomic(filePath, toYaml(data));
}
