/**
 * Built-in provision plugins and the factories restoring their guests.
 * Purpose: turn a provision phase into a guest named after the phase.
 * Assumptions: the container backend mounts the plan workdir at the same path.
 */

import { z } from "zod";

import { parseDurationMs } from "../../../core/duration.js";
import { StringListSchema } from "../../../core/metadata.js";
import type { PhaseData } from "../../../core/step-data.js";
import { ConnectGuest } from "../guests/connect-guest.js";
import { ContainerGuest } from "../guests/container-guest.js";
import type { Guest } from "../guests/guest.js";
import { LocalGuest } from "../guests/local-guest.js";

import type { ProvisionContext, ProvisionPlugin } from "./plugin.js";
import { parsePhaseOptions, type GuestFactory } from "./registry.js";

// =============================================================================
// SCHEMAS
// =============================================================================

const ProvisionBaseSchema = z.object({
  role: z.string().min(1).optional(),
  retries: z.number().int().nonnegative().default(0),
  timeout: z
    .union([z.string().min(1), z.number().int().positive()])
    .optional()
    .transform((value) =>
      value === undefined ? null : parseDurationMs(typeof value === "number" ? String(value) : value),
    ),
});

const LocalOptionsSchema = ProvisionBaseSchema.strict();

const ConnectOptionsSchema = ProvisionBaseSchema.extend({
  guest: z.string().min(1),
  user: z.string().min(1).default("root"),
  port: z.coerce.number().int().positive().optional(),
  key: StringListSchema.default([]),
  password: z.string().optional(),
  "ssh-option": StringListSchema.default([]),
}).strict();

const ContainerOptionsSchema = ProvisionBaseSchema.extend({
  image: z.string().min(1).default("fedora:latest"),
  user: z.string().min(1).optional(),
  pull: z.enum(["always", "missing", "never"]).default("missing"),
  network: z.string().min(1).optional(),
}).strict();

// =============================================================================
// PLUGINS
// =============================================================================

abstract class BaseProvision implements ProvisionPlugin {
  readonly role: string | null;
  readonly retries: number;
  readonly timeoutMs: number | null;

  protected constructor(
    protected readonly phase: PhaseData,
    base: z.infer<typeof ProvisionBaseSchema>,
  ) {
    this.role = base.role ?? null;
    this.retries = base.retries;
    this.timeoutMs = base.timeout;
  }

  abstract createGuest(ctx: ProvisionContext): Guest;
}

export class LocalProvision extends BaseProvision {
  constructor(phase: PhaseData) {
    super(phase, parsePhaseOptions("provision", phase, LocalOptionsSchema));
  }

  createGuest(ctx: ProvisionContext): Guest {
    return new LocalGuest({ name: this.phase.name, role: this.role, logger: ctx.runtime.logger });
  }
}

export class ConnectProvision extends BaseProvision {
  private readonly options: z.infer<typeof ConnectOptionsSchema>;

  constructor(phase: PhaseData) {
    const options = parsePhaseOptions("provision", phase, ConnectOptionsSchema);
    super(phase, options);
    this.options = options;
  }

  createGuest(ctx: ProvisionContext): Guest {
    return new ConnectGuest({
      name: this.phase.name,
      role: this.role,
      logger: ctx.runtime.logger,
      guest: this.options.guest,
      user: this.options.user,
      port: this.options.port,
      key: this.options.key,
      password: this.options.password,
      sshOptions: this.options["ssh-option"],
    });
  }
}

export class ContainerProvision extends BaseProvision {
  private readonly options: z.infer<typeof ContainerOptionsSchema>;

  constructor(phase: PhaseData) {
    const options = parsePhaseOptions("provision", phase, ContainerOptionsSchema);
    super(phase, options);
    this.options = options;
  }

  createGuest(ctx: ProvisionContext): Guest {
    return new ContainerGuest({
      name: this.phase.name,
      role: this.role,
      logger: ctx.runtime.logger,
      image: this.options.image,
      mountPath: ctx.runtime.workdir,
      user: this.options.user,
      pull: this.options.pull,
      network: this.options.network,
    });
  }
}

// =============================================================================
// RESTORING GUESTS
// =============================================================================

const ConnectDataSchema = z.object({
  guest: z.string().min(1),
  user: z.string().min(1).default("root"),
  port: z.number().int().positive().optional(),
  key: z.array(z.string()).default([]),
  password: z.string().optional(),
  "ssh-option": z.array(z.string()).default([]),
});

const ContainerDataSchema = z.object({
  image: z.string().min(1),
  "mount-path": z.string().min(1),
  container: z.string().min(1),
  "container-id": z.string().min(1).optional(),
  user: z.string().optional(),
  network: z.string().optional(),
  pull: z.enum(["always", "missing", "never"]).default("missing"),
});

export const restoreLocalGuest: GuestFactory = (record, ctx) =>
  new LocalGuest({ name: record.name, role: record.role, status: record.status, logger: ctx.logger });

export const restoreConnectGuest: GuestFactory = (record, ctx) => {
  const data = ConnectDataSchema.parse(record.data);
  return new ConnectGuest({
    name: record.name,
    role: record.role,
    status: record.status,
    logger: ctx.logger,
    guest: data.guest,
    user: data.user,
    port: data.port,
    key: data.key,
    password: data.password,
    sshOptions: data["ssh-option"],
  });
};

export const restoreContainerGuest: GuestFactory = (record, ctx) => {
  const data = ContainerDataSchema.parse(record.data);
  return new ContainerGuest({
    name: record.name,
    role: record.role,
    status: record.status,
    logger: ctx.logger,
    image: data.image,
    mountPath: data["mount-path"],
    containerName: data.container,
    containerId: data["container-id"],
    user: data.user,
    network: data.network,
    pull: data.pull,
  });
};
