/**
 * Plugin registry keyed by step and `how`.
 * Purpose: map phase data to plugin instances, and guest records from
 * `guests.yaml` back to live guests.
 * Usage: registerPlugin("provision", "beaker", (phase) => new BeakerProvision(phase)).
 */

import { z } from "zod";

import { formatIssues } from "../../../core/config-loader.js";
import { formatErrorMessage } from "../../../core/error-format.js";
import { ConfigError } from "../../../core/errors.js";
import type { EventLogger } from "../../../core/logger.js";
import type { StepKey } from "../../../core/metadata.js";
import type { PhaseData } from "../../../core/step-data.js";
import type { Guest, SerializedGuest } from "../guests/guest.js";

import type { PluginFactory, PluginsByStep } from "./plugin.js";

// =============================================================================
// TYPES
// =============================================================================

export type GuestFactoryContext = {
  logger?: EventLogger;
};

/** Rebuilds a guest provisioned by an earlier invocation. */
export type GuestFactory = (record: SerializedGuest, ctx: GuestFactoryContext) => Guest;

type FactoryTable = { [S in StepKey]: Map<string, PluginFactory<S>> };

// =============================================================================
// REGISTRY
// =============================================================================

export class PluginRegistry {
  private readonly factories: FactoryTable = {
    discover: new Map(),
    provision: new Map(),
    prepare: new Map(),
    execute: new Map(),
    report: new Map(),
    finish: new Map(),
  };
  private readonly guestFactories = new Map<string, GuestFactory>();

  register<S extends StepKey>(step: S, how: string, factory: PluginFactory<S>): void {
    const table: Map<string, PluginFactory<S>> = this.factories[step];
    table.set(how, factory);
  }

  registerGuest(how: string, factory: GuestFactory): void {
    this.guestFactories.set(how, factory);
  }

  has(step: StepKey, how: string): boolean {
    return this.factories[step].has(how);
  }

  known(step: StepKey): string[] {
    return [...this.factories[step].keys()].sort();
  }

  /** Throws ConfigError for an unknown `how` or invalid phase options. */
  create<S extends StepKey>(step: S, phase: PhaseData): PluginsByStep[S] {
    const table: Map<string, PluginFactory<S>> = this.factories[step];
    const factory = table.get(phase.how);
    if (!factory) {
      throw new ConfigError(
        `Unsupported ${step} method '${phase.how}' in phase '${phase.name}' ` +
          `(known: ${this.known(step).join(", ") || "none"}).`,
      );
    }
    return factory(phase);
  }

  restoreGuest(record: SerializedGuest, ctx: GuestFactoryContext = {}): Guest {
    const factory = this.guestFactories.get(record.how);
    if (!factory) {
      throw new ConfigError(
        `Cannot restore guest '${record.name}': no guest backend '${record.how}' is registered.`,
      );
    }
    try {
      return factory(record, ctx);
    } catch (err) {
      if (err instanceof ConfigError) throw err;
      throw new ConfigError(
        `Cannot restore guest '${record.name}' (${record.how}): ${formatErrorMessage(err)}`,
        err,
      );
    }
  }
}

/** Shared by `registerPlugin` and the CLI. */
export const globalRegistry = new PluginRegistry();

export function registerPlugin<S extends StepKey>(
  step: S,
  how: string,
  factory: PluginFactory<S>,
): void {
  globalRegistry.register(step, how, factory);
}

// =============================================================================
// OPTION PARSING
// =============================================================================

/**
 * Validates plugin-specific keys of a phase. Keys keep their metadata
 * spelling (`package-manager`), so schemas are written in kebab-case.
 */
export function parsePhaseOptions<T extends z.ZodTypeAny>(
  step: StepKey,
  phase: PhaseData,
  schema: T,
): z.output<T> {
  const parsed = schema.safeParse(phase.options);
  if (!parsed.success) {
    throw new ConfigError(
      `Invalid options for ${step} phase '${phase.name}' (how: ${phase.how}):\n` +
        formatIssues(parsed.error.issues),
      parsed.error,
    );
  }
  return parsed.data;
}
