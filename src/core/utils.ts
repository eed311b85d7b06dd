import path from "node:path";
import { setTimeout as delay } from "node:timers/promises";

import fse from "fs-extra";
import yaml from "js-yaml";

export const DEFAULT_NAME = "default";

export function slugify(input: string): string {
  return input
    .toLowerCase()
    .trim()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "")
    .slice(0, 80);
}

/** Filesystem-safe rendition of a hierarchical name, keeping its slashes out. */
export function safeName(input: string): string {
  return input
    .replace(/^\/+/, "")
    .replace(/[^A-Za-z0-9_.-]+/g, "-")
    .replace(/^-+|-+$/g, "");
}

export function isoNow(): string {
  return new Date().toISOString();
}

export function defaultRunId(): string {
  // YYYYMMDD-HHMMSS
  const d = new Date();
  const yyyy = d.getUTCFullYear();
  const mm = String(d.getUTCMonth() + 1).padStart(2, "0");
  const dd = String(d.getUTCDate()).padStart(2, "0");
  const hh = String(d.getUTCHours()).padStart(2, "0");
  const mi = String(d.getUTCMinutes()).padStart(2, "0");
  const ss = String(d.getUTCSeconds()).padStart(2, "0");
  return `run-${yyyy}${mm}${dd}-${hh}${mi}${ss}`;
}

export async function sleep(ms: number): Promise<void> {
  if (ms <= 0) return;
  await delay(ms);
}

export function listed(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? "" : "s"}`;
}

export function duplicates<T>(values: Iterable<T>): T[] {
  const seen = new Set<T>();
  const dups = new Set<T>();
  for (const value of values) {
    if (seen.has(value)) dups.add(value);
    seen.add(value);
  }
  return [...dups];
}

export async function ensureDir(dir: string): Promise<void> {
  await fse.ensureDir(dir);
}

export async function pathExists(p: string): Promise<boolean> {
  return fse.pathExists(p);
}

export async function writeTextFile(filePath: string, content: string): Promise<void> {
  await ensureDir(path.dirname(filePath));
  await fse.writeFile(filePath, content, "utf8");
}

export async function readYamlFile(filePath: string): Promise<unknown> {
  const raw = await fse.readFile(filePath, "utf8");
  return yaml.load(raw);
}

export function toYaml(data: unknown): string {
  return yaml.dump(data, { noRefs: true, lineWidth: -1, sortKeys: false, skipInvalid: true });
}

/** Rejects with `makeError()` when `promise` has not settled within `ms`. */
export async function withTimeout<T>(
  promise: Promise<T>,
  ms: number,
  makeError: () => Error,
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(makeError()), ms);
  });

  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}
