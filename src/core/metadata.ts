/**
 * Metadata tree adapter.
 * Purpose: expose tests and plans as flat, validated records.
 * Assumptions: inheritance and adjust rules are already resolved by whatever
 * produced the tree; `FileMetadataTree` reads them from `<root>/trellis.yaml`.
 * Usage: `const tree = new FileMetadataTree(root); await tree.plans({ names: ["smoke"] })`.
 */

import path from "node:path";

import fse from "fs-extra";
import { z } from "zod";

import { expandEnv, formatIssues, readYamlDocument } from "./config-loader.js";
import { DEFAULT_TEST_DURATION } from "./duration.js";
import { ConfigError, UserFacingError, USER_FACING_ERROR_CODES } from "./errors.js";
import { matchesFilters, matchesAnyPattern } from "./selection.js";

// =============================================================================
// SCHEMAS
// =============================================================================

export const METADATA_FILE = "trellis.yaml";

export const STEP_NAMES = [
  "discover",
  "provision",
  "prepare",
  "execute",
  "report",
  "finish",
] as const;

export const StringListSchema = z
  .union([z.string(), z.array(z.string())])
  .transform((value) => (typeof value === "string" ? [value] : value));

export const EnvironmentSchema = z.record(
  z.union([z.string(), z.number(), z.boolean()]).transform((value) => String(value)),
);
export type Environment = z.infer<typeof EnvironmentSchema>;

export const ContextSchema = z.record(
  z
    .union([z.string(), z.number(), z.array(z.union([z.string(), z.number()]))])
    .transform((value) => (Array.isArray(value) ? value : [value]).map(String)),
);

export const ResultInterpretationSchema = z.enum([
  "respect",
  "custom",
  "xfail",
  "pass",
  "fail",
  "info",
  "warn",
  "error",
  "skip",
]);
export type ResultInterpretation = z.infer<typeof ResultInterpretationSchema>;

export const CheckEventSchema = z.enum(["before-test", "after-test"]);
export type CheckEvent = z.infer<typeof CheckEventSchema>;

export const CheckSpecSchema = z.object({
  how: z.string().min(1).default("shell"),
  name: z.string().min(1).optional(),
  script: z.string().min(1).optional(),
  event: CheckEventSchema.default("after-test"),
  result: z.enum(["respect", "xfail", "info"]).default("respect"),
  enabled: z.boolean().default(true),
});
export type CheckSpec = z.infer<typeof CheckSpecSchema>;

const CheckListSchema = z
  .union([z.string(), CheckSpecSchema, z.array(z.union([z.string(), CheckSpecSchema]))])
  .transform((value) => (Array.isArray(value) ? value : [value]))
  .transform((items) =>
    items.map((item) => (typeof item === "string" ? CheckSpecSchema.parse({ how: item }) : item)),
  );

export const TestNodeSchema = z
  .object({
    summary: z.string().optional(),
    test: z.string().min(1),
    path: z.string().default("/"),
    framework: z.enum(["shell", "beakerlib"]).default("shell"),
    require: StringListSchema.default([]),
    recommend: StringListSchema.default([]),
    environment: EnvironmentSchema.default({}),
    duration: z.string().min(1).default(DEFAULT_TEST_DURATION),
    order: z.number().int().default(50),
    enabled: z.boolean().default(true),
    result: ResultInterpretationSchema.default("respect"),
    check: CheckListSchema.default([]),
    tag: StringListSchema.default([]),
    tier: z
      .union([z.string(), z.number()])
      .nullable()
      .default(null)
      .transform((value) => (value === null ? null : String(value))),
    component: StringListSchema.default([]),
  })
  .strict();

export type TestRecord = z.infer<typeof TestNodeSchema> & { name: string };

const PhaseRawSchema = z.record(z.unknown());
const PhaseListSchema = z
  .union([PhaseRawSchema, z.array(PhaseRawSchema)])
  .transform((value) => (Array.isArray(value) ? value : [value]));

export type RawPhase = z.infer<typeof PhaseRawSchema>;

export const PlanNodeSchema = z
  .object({
    summary: z.string().optional(),
    enabled: z.boolean().default(true),
    environment: EnvironmentSchema.default({}),
    context: ContextSchema.default({}),
    discover: PhaseListSchema.optional(),
    provision: PhaseListSchema.optional(),
    prepare: PhaseListSchema.optional(),
    execute: PhaseListSchema.optional(),
    report: PhaseListSchema.optional(),
    finish: PhaseListSchema.optional(),
  })
  .strict();

export type StepKey = (typeof STEP_NAMES)[number];

export type PlanRecord = {
  name: string;
  summary?: string;
  enabled: boolean;
  environment: Environment;
  context: Record<string, string[]>;
  steps: Record<StepKey, RawPhase[]>;
};

const MetadataFileSchema = z
  .object({
    tests: z.record(TestNodeSchema).default({}),
    plans: z.record(PlanNodeSchema).default({}),
  })
  .strict();

// =============================================================================
// COLLABORATOR INTERFACE
// =============================================================================

export type TestQuery = {
  /** Regular expressions searched in test names. */
  names?: string[];
  /** `key:value` expressions, see `matchesFilters`. */
  filters?: string[];
  excludes?: string[];
};

export type PlanQuery = {
  names?: string[];
};

export interface MetadataTree {
  readonly root: string;
  tests(query?: TestQuery): Promise<TestRecord[]>;
  plans(query?: PlanQuery): Promise<PlanRecord[]>;
}

// =============================================================================
// FILE-BACKED TREE
// =============================================================================

export class FileMetadataTree implements MetadataTree {
  readonly root: string;
  private readonly env: NodeJS.ProcessEnv;
  private loaded: Promise<z.infer<typeof MetadataFileSchema>> | null = null;

  constructor(root: string, opts: { env?: NodeJS.ProcessEnv } = {}) {
    this.root = path.resolve(root);
    this.env = opts.env ?? process.env;
  }

  get filePath(): string {
    return path.join(this.root, METADATA_FILE);
  }

  async tests(query: TestQuery = {}): Promise<TestRecord[]> {
    const doc = await this.load();

    const tests = Object.entries(doc.tests).map(
      ([name, node], index) => ({ record: { ...node, name: normalizeNodeName(name) }, index }),
    );

    return tests
      .sort((a, b) => a.record.order - b.record.order || a.index - b.index)
      .map(({ record }) => record)
      .filter((test) => !query.names?.length || matchesAnyPattern(test.name, query.names))
      .filter((test) => matchesFilters(test, query.filters ?? []))
      .filter((test) => !query.excludes?.length || !matchesAnyPattern(test.name, query.excludes));
  }

  /** Nodes without an `execute` key are not plans. */
  async plans(query: PlanQuery = {}): Promise<PlanRecord[]> {
    const doc = await this.load();

    return Object.entries(doc.plans)
      .filter(([, node]) => node.execute !== undefined)
      .map(([name, node]) => toPlanRecord(normalizeNodeName(name), node))
      .filter((plan) => !query.names?.length || matchesAnyPattern(plan.name, query.names));
  }

  private load(): Promise<z.infer<typeof MetadataFileSchema>> {
    if (!this.loaded) {
      this.loaded = this.readFile();
    }
    return this.loaded;
  }

  private async readFile(): Promise<z.infer<typeof MetadataFileSchema>> {
    const filePath = this.filePath;
    if (!(await fse.pathExists(filePath))) {
      throw new UserFacingError({
        code: USER_FACING_ERROR_CODES.config,
        title: "Metadata tree missing.",
        message: `No ${METADATA_FILE} found in ${this.root}.`,
        hint: "Pass --root <path> pointing at a directory with a trellis.yaml file.",
      });
    }

    const doc = readYamlDocument(filePath) ?? {};
    const expanded = expandEnv(doc, { file: filePath, env: this.env });
    const parsed = MetadataFileSchema.safeParse(expanded);
    if (!parsed.success) {
      throw new ConfigError(
        `Invalid metadata in ${filePath}:\n${formatIssues(parsed.error.issues)}`,
        parsed.error,
      );
    }
    return parsed.data;
  }
}

// =============================================================================
// HELPERS
// =============================================================================

export function normalizeNodeName(name: string): string {
  return name.startsWith("/") ? name : `/${name}`;
}

function toPlanRecord(name: string, node: z.infer<typeof PlanNodeSchema>): PlanRecord {
  return {
    name,
    summary: node.summary,
    enabled: node.enabled,
    environment: node.environment,
    context: node.context,
    steps: {
      discover: node.discover ?? [],
      provision: node.provision ?? [],
      prepare: node.prepare ?? [],
      execute: node.execute ?? [],
      report: node.report ?? [],
      finish: node.finish ?? [],
    },
  };
}

