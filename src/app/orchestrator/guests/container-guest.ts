/**
 * ContainerGuest runs a long-lived container and execs commands into it.
 * Assumptions: the plan workdir is bind-mounted at the same path inside the
 * container, so files under it need no copying; nothing else can be shared.
 */

import path from "node:path";
import { randomUUID } from "node:crypto";

import { ConnectionLostError, DockerError, OrchestratorError } from "../../../core/errors.js";
import { slugify } from "../../../core/utils.js";
import type { ContainerLike } from "../../../docker/docker.js";
import { DockerManager, type PullPolicy } from "../../../docker/manager.js";

import { Guest, type CommandOutput, type ExecuteOptions, type GuestOptions } from "./guest.js";

export type ContainerGuestOptions = GuestOptions & {
  image: string;
  /** Host directory shared at the same path. */
  mountPath: string;
  user?: string;
  pull?: PullPolicy;
  network?: string;
  containerName?: string;
  /** Set when rehydrating a guest provisioned by an earlier invocation. */
  containerId?: string;
  manager?: DockerManager;
};

export class ContainerGuest extends Guest {
  readonly how = "container";

  private readonly image: string;
  private readonly mountPath: string;
  private readonly user?: string;
  private readonly pullPolicy: PullPolicy;
  private readonly network?: string;
  private readonly containerName: string;
  private readonly manager: DockerManager;
  private container: ContainerLike | null;

  constructor(opts: ContainerGuestOptions) {
    super(opts);
    this.image = opts.image;
    this.mountPath = path.resolve(opts.mountPath);
    this.user = opts.user;
    this.pullPolicy = opts.pull ?? "missing";
    this.network = opts.network;
    this.containerName =
      opts.containerName ?? `trellis-${slugify(opts.name)}-${randomUUID().slice(0, 8)}`;
    this.manager = opts.manager ?? new DockerManager();
    this.container = opts.containerId ? this.manager.getContainer(opts.containerId) : null;
  }

  get hostname(): string {
    return this.containerName;
  }

  get containerId(): string | null {
    return this.container?.id ?? null;
  }

  protected async provisionGuest(): Promise<void> {
    await this.manager.ensureImage(this.image, this.pullPolicy);
    this.container = await this.manager.startContainer({
      name: this.containerName,
      image: this.image,
      env: {},
      binds: [{ hostPath: this.mountPath, containerPath: this.mountPath, mode: "rw" }],
      user: this.user,
      networkMode: this.network,
      labels: { "trellis.guest": this.name },
    });
  }

  protected async runCommand(command: string, opts: ExecuteOptions): Promise<CommandOutput> {
    const container = this.requireContainer();
    try {
      return await this.manager.execInContainer(container, ["bash", "-c", command], {
        env: opts.env,
        workdir: opts.cwd,
        user: this.user,
        timeoutMs: opts.timeoutMs,
      });
    } catch (err) {
      if (err instanceof DockerError && !(await this.manager.isRunning(container))) {
        throw new ConnectionLostError(`Container ${this.containerName} is not running.`, err);
      }
      throw err;
    }
  }

  protected async pushFiles(source: string, destination: string): Promise<void> {
    this.assertShared(source, destination);
  }

  protected async pullFiles(source: string, destination: string): Promise<void> {
    this.assertShared(source, destination);
  }

  protected async removeGuest(): Promise<void> {
    if (!this.container) return;
    await this.manager.removeContainer(this.container);
    this.container = null;
  }

  protected serializeData(): Record<string, unknown> {
    return {
      image: this.image,
      "mount-path": this.mountPath,
      container: this.containerName,
      ...(this.containerId ? { "container-id": this.containerId } : {}),
      ...(this.user !== undefined ? { user: this.user } : {}),
      ...(this.network !== undefined ? { network: this.network } : {}),
      pull: this.pullPolicy,
    };
  }

  // restart is synchronous, so there is no boot id to wait on
  protected override async readBootId(): Promise<string | null> {
    return null;
  }

  protected override async softReboot(): Promise<void> {
    await this.manager.restartContainer(this.requireContainer());
  }

  protected override async hardReboot(): Promise<void> {
    await this.manager.restartContainer(this.requireContainer());
  }

  private requireContainer(): ContainerLike {
    if (!this.container) {
      throw new OrchestratorError(`Container for guest ${this.name} has not been created.`);
    }
    return this.container;
  }

  private assertShared(source: string, destination: string): void {
    const resolvedSource = path.resolve(source);
    if (resolvedSource !== path.resolve(destination) || !isWithin(this.mountPath, resolvedSource)) {
      throw new OrchestratorError(
        `Container guest ${this.name} only shares files under ${this.mountPath} at the same path (got ${source} -> ${destination}).`,
      );
    }
  }
}

function isWithin(root: string, candidate: string): boolean {
  const relative = path.relative(root, candidate);
  return relative === "" || (!relative.startsWith("..") && !path.isAbsolute(relative));
}
