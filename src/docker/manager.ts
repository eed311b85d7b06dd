import { PassThrough, Readable } from "node:stream";

import { DockerError, GuestTimeoutError } from "../core/errors.js";
import { formatErrorMessage } from "../core/error-format.js";
import { withTimeout } from "../core/utils.js";

import {
  type ContainerLike,
  type ContainerSpec,
  type DockerLike,
  createContainer as createDockerContainer,
  dockerClient,
  imageExists,
  pullImage,
  removeContainer as removeDockerContainer,
  startContainer as startDockerContainer,
} from "./docker.js";

export type ExecOptions = {
  env?: Record<string, string | undefined>;
  workdir?: string;
  user?: string;
  timeoutMs?: number;
};

export type ExecResult = {
  exitCode: number;
  stdout: string;
  stderr: string;
};

export type PullPolicy = "always" | "missing" | "never";

export class DockerManager {
  readonly docker: DockerLike;

  constructor(opts: { docker?: DockerLike } = {}) {
    this.docker = opts.docker ?? dockerClient();
  }

  async ensureImage(image: string, policy: PullPolicy = "missing"): Promise<void> {
    if (policy === "never") return;
    if (policy === "missing" && (await imageExists(this.docker, image))) return;
    await pullImage(this.docker, image);
  }

  /** Creates and starts a long-lived container. */
  async startContainer(spec: ContainerSpec): Promise<ContainerLike> {
    const container = await createDockerContainer(this.docker, spec);
    await startDockerContainer(container);
    return container;
  }

  getContainer(id: string): ContainerLike {
    return this.docker.getContainer(id);
  }

  async isRunning(container: ContainerLike): Promise<boolean> {
    try {
      const info = await container.inspect();
      return info.State.Running;
    } catch {
      return false;
    }
  }

  async restartContainer(container: ContainerLike): Promise<void> {
    try {
      await container.restart();
    } catch (err) {
      throw new DockerError(
        `Failed to restart container ${container.id}: ${formatErrorMessage(err)}`,
        err,
      );
    }
  }

  /**
   * With `timeoutMs` the command runs under `timeout -s KILL` inside the
   * container, since an exec cannot be killed through the Engine API, and the
   * attached stream is destroyed once the deadline passes.
   */
  async execInContainer(
    container: ContainerLike,
    command: string[],
    opts: ExecOptions = {},
  ): Promise<ExecResult> {
    if (opts.timeoutMs === undefined) return this.runExec(container, command, opts);

    const timeoutMs = opts.timeoutMs;
    const controller = new AbortController();
    try {
      return await withTimeout(
        this.runExec(container, boundedCommand(command, timeoutMs), opts, controller.signal),
        timeoutMs,
        () =>
          new GuestTimeoutError(
            `Command timed out after ${Math.round(timeoutMs / 1000)}s in container ${container.id}.`,
            timeoutMs,
          ),
      );
    } catch (err) {
      if (err instanceof GuestTimeoutError) controller.abort(err);
      throw err;
    }
  }

  async removeContainer(container: ContainerLike): Promise<void> {
    await removeDockerContainer(container);
  }

  private async runExec(
    container: ContainerLike,
    command: string[],
    opts: ExecOptions,
    signal?: AbortSignal,
  ): Promise<ExecResult> {
    try {
      const exec = await container.exec({
        Cmd: command,
        Env: normalizeEnv(opts.env),
        AttachStdout: true,
        AttachStderr: true,
        WorkingDir: opts.workdir,
        User: opts.user,
        Tty: false,
      });

      const stdout = new PassThrough();
      const stderr = new PassThrough();

      const stream = await exec.start({ hijack: true, stdin: false });
      this.pipeExecStream(stream, stdout, stderr);
      if (signal) {
        if (signal.aborted) destroyStream(stream);
        signal.addEventListener("abort", () => destroyStream(stream), { once: true });
      }

      const [stdoutText, stderrText] = await Promise.all([
        collectStream(stdout),
        collectStream(stderr),
      ]);

      const inspect = await exec.inspect();
      return { exitCode: inspect.ExitCode ?? -1, stdout: stdoutText, stderr: stderrText };
    } catch (err) {
      throw new DockerError(`Failed to exec in container: ${formatErrorMessage(err)}`, err);
    }
  }

  private pipeExecStream(
    stream: NodeJS.ReadableStream,
    stdout: PassThrough,
    stderr: PassThrough,
  ): void {
    this.docker.modem.demuxStream(stream, stdout, stderr);

    const close = (): void => {
      stdout.end();
      stderr.end();
    };

    stream.on("end", close);
    stream.on("close", close);
    stream.on("error", (err: Error) => {
      stdout.destroy(err);
      stderr.destroy(err);
    });
  }
}

/** `timeout` takes whole seconds; anything under one second rounds up. */
export function boundedCommand(command: string[], timeoutMs: number): string[] {
  const seconds = Math.max(1, Math.ceil(timeoutMs / 1000));
  return ["timeout", "-s", "KILL", String(seconds), ...command];
}

function destroyStream(stream: NodeJS.ReadableStream): void {
  if (stream instanceof Readable) {
    stream.destroy();
  } else {
    stream.pause();
  }
}

function normalizeEnv(env?: Record<string, string | undefined>): string[] | undefined {
  if (!env) return undefined;
  return Object.entries(env)
    .filter((entry): entry is [string, string] => entry[1] !== undefined)
    .map(([key, value]) => `${key}=${value}`);
}

function collectStream(stream: PassThrough): Promise<string> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    stream.on("data", (chunk: Buffer | string) => {
      chunks.push(typeof chunk === "string" ? Buffer.from(chunk, "utf8") : chunk);
    });
    stream.on("end", () => resolve(Buffer.concat(chunks).toString("utf8")));
    stream.on("error", reject);
  });
}
