import path from "node:path";

import Docker from "dockerode";

import { isRecord } from "../core/config-loader.js";
import { DockerError, UserFacingError, USER_FACING_ERROR_CODES } from "../core/errors.js";

// =============================================================================
// TYPES
// =============================================================================

/**
 * The slice of dockerode the container guest uses. `new Docker()` satisfies it;
 * tests hand in fakes.
 */
export interface DockerModem {
  demuxStream(
    stream: NodeJS.ReadableStream,
    stdout: NodeJS.WritableStream,
    stderr: NodeJS.WritableStream,
  ): void;
  followProgress(
    stream: NodeJS.ReadableStream,
    onFinished: (err: Error | null, output: unknown[]) => void,
  ): void;
}

export interface ContainerExec {
  start(opts: { hijack: boolean; stdin: boolean }): Promise<NodeJS.ReadableStream>;
  inspect(): Promise<{ ExitCode: number | null }>;
}

export interface ContainerLike {
  readonly id: string;
  start(): Promise<unknown>;
  restart(): Promise<unknown>;
  remove(opts: { force: boolean }): Promise<unknown>;
  exec(opts: Docker.ExecCreateOptions): Promise<ContainerExec>;
  inspect(): Promise<{ State: { Running: boolean } }>;
}

export interface DockerLike {
  readonly modem: DockerModem;
  createContainer(opts: Docker.ContainerCreateOptions): Promise<ContainerLike>;
  getContainer(id: string): ContainerLike;
  getImage(name: string): { inspect(): Promise<unknown> };
  pull(image: string): Promise<NodeJS.ReadableStream>;
}

export type ContainerSpec = {
  name: string;
  image: string;
  env: Record<string, string | undefined>;
  binds: Array<{ hostPath: string; containerPath: string; mode: "rw" | "ro" }>;
  workdir?: string;
  labels?: Record<string, string>;
  cmd?: string[];
  user?: string;
  networkMode?: string;
};

/** Keeps the container alive so commands can be exec'd into it. */
export const IDLE_COMMAND = ["sleep", "infinity"];

// =============================================================================
// PUBLIC API
// =============================================================================

export function dockerClient(): DockerLike {
  return new Docker();
}

export async function imageExists(docker: DockerLike, imageName: string): Promise<boolean> {
  try {
    await docker.getImage(imageName).inspect();
    return true;
  } catch {
    return false;
  }
}

export async function pullImage(docker: DockerLike, imageName: string): Promise<void> {
  try {
    const stream = await docker.pull(imageName);
    await new Promise<void>((resolve, reject) => {
      docker.modem.followProgress(stream, (err) => (err ? reject(err) : resolve()));
    });
  } catch (err) {
    throw dockerUserFacingError({
      title: "Docker image pull failed.",
      message: `Unable to pull image ${imageName}.`,
      detailPrefix: `Failed to pull image ${imageName}`,
      err,
    });
  }
}

export async function createContainer(
  docker: DockerLike,
  spec: ContainerSpec,
): Promise<ContainerLike> {
  const Env = Object.entries(spec.env)
    .filter((entry): entry is [string, string] => entry[1] !== undefined)
    .map(([key, value]) => `${key}=${value}`);

  const Binds = spec.binds.map(
    (bind) => `${path.resolve(bind.hostPath)}:${bind.containerPath}:${bind.mode}`,
  );

  try {
    return await docker.createContainer({
      Image: spec.image,
      name: spec.name,
      Env,
      WorkingDir: spec.workdir,
      Cmd: spec.cmd ?? IDLE_COMMAND,
      Labels: spec.labels,
      User: spec.user,
      HostConfig: {
        Binds,
        NetworkMode: spec.networkMode ?? "bridge",
        AutoRemove: false,
      },
    });
  } catch (err) {
    throw dockerUserFacingError({
      title: "Docker container creation failed.",
      message: `Unable to create Docker container ${spec.name}.`,
      detailPrefix: `Failed to create container ${spec.name}`,
      err,
    });
  }
}

export async function startContainer(container: ContainerLike): Promise<void> {
  try {
    await container.start();
  } catch (err) {
    throw dockerUserFacingError({
      title: "Docker container start failed.",
      message: "Unable to start the Docker container.",
      detailPrefix: "Failed to start container",
      err,
    });
  }
}

export async function removeContainer(container: ContainerLike): Promise<void> {
  try {
    await container.remove({ force: true });
  } catch (err) {
    // already gone is fine
    if (resolveDockerErrorDetails(err).statusCode === 404) return;
    throw new DockerError(
      `Failed to remove container ${container.id}: ${resolveDockerErrorDetails(err).message}`,
      err,
    );
  }
}

// =============================================================================
// ERROR HELPERS
// =============================================================================

const DOCKER_UNAVAILABLE_HINT =
  "Start the Docker daemon and retry, or provision with `--how local` instead.";

const DOCKER_RUN_HINT = "Check that the container image and configuration are valid, then retry.";

type DockerErrorDetails = {
  message: string;
  code?: string;
  reason?: string;
  statusCode?: number;
};

function dockerUserFacingError(input: {
  title: string;
  message: string;
  detailPrefix: string;
  err: unknown;
}): UserFacingError {
  const details = resolveDockerErrorDetails(input.err);
  const detail = details.reason || details.message || "Unknown docker error.";
  const dockerError = new DockerError(`${input.detailPrefix}: ${detail}`, input.err);

  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.docker,
    title: input.title,
    message: input.message,
    hint: isDockerUnavailableError(details) ? DOCKER_UNAVAILABLE_HINT : DOCKER_RUN_HINT,
    cause: dockerError,
  });
}

export function resolveDockerErrorDetails(err: unknown): DockerErrorDetails {
  if (!isRecord(err)) {
    return { message: String(err) };
  }

  const message = typeof err.message === "string" ? err.message : String(err);
  return {
    message,
    ...(typeof err.code === "string" ? { code: err.code } : {}),
    ...(typeof err.reason === "string" ? { reason: err.reason } : {}),
    ...(typeof err.statusCode === "number" ? { statusCode: err.statusCode } : {}),
  };
}

export function isDockerUnavailableError(details: DockerErrorDetails): boolean {
  if (details.code === "ENOENT" || details.code === "ECONNREFUSED") {
    return true;
  }

  const text = `${details.message}\n${details.reason ?? ""}`.toLowerCase();
  return (
    text.includes("cannot connect to the docker daemon") ||
    text.includes("is the docker daemon running") ||
    text.includes("error during connect") ||
    text.includes("docker.sock") ||
    text.includes("connect econnrefused") ||
    text.includes("connect enoent")
  );
}
