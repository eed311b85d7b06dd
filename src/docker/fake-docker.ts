/**
 * In-memory Docker Engine stand-in for tests.
 * Exec output travels as JSON lines `{ fd, data }`; FakeModem demultiplexes them.
 */

import { PassThrough } from "node:stream";

import type Docker from "dockerode";

import type { ContainerExec, ContainerLike, DockerLike, DockerModem } from "./docker.js";

export type ExecReply = { exitCode: number; stdout?: string; stderr?: string };

/** Returning null leaves the exec hanging. */
export type ExecHandler = (command: string[], opts: Docker.ExecCreateOptions) => ExecReply | null;

export class FakeModem implements DockerModem {
  demuxStream(
    stream: NodeJS.ReadableStream,
    stdout: NodeJS.WritableStream,
    stderr: NodeJS.WritableStream,
  ): void {
    let buffer = "";
    stream.on("data", (chunk: Buffer | string) => {
      buffer += chunk.toString();
      let index: number;
      while ((index = buffer.indexOf("\n")) >= 0) {
        const line = buffer.slice(0, index);
        buffer = buffer.slice(index + 1);
        const frame: unknown = JSON.parse(line);
        if (isFrame(frame)) {
          (frame.fd === 2 ? stderr : stdout).write(frame.data);
        }
      }
    });
  }

  followProgress(
    stream: NodeJS.ReadableStream,
    onFinished: (err: Error | null, output: unknown[]) => void,
  ): void {
    stream.on("end", () => onFinished(null, []));
    stream.resume();
  }
}

export class FakeContainer implements ContainerLike {
  running = false;
  removed = false;
  restarts = 0;
  readonly execCalls: Docker.ExecCreateOptions[] = [];
  /** Attached output streams, one per started exec. */
  readonly execStreams: PassThrough[] = [];

  constructor(
    readonly id: string,
    readonly createOptions: Docker.ContainerCreateOptions,
    private readonly handler: ExecHandler,
  ) {}

  async start(): Promise<void> {
    this.running = true;
  }

  async restart(): Promise<void> {
    this.restarts += 1;
    this.running = true;
  }

  async remove(): Promise<void> {
    this.removed = true;
    this.running = false;
  }

  async exec(opts: Docker.ExecCreateOptions): Promise<ContainerExec> {
    this.execCalls.push(opts);
    if (!this.running) throw new Error(`container ${this.id} is not running`);
    return new FakeExec(this.handler(opts.Cmd ?? [], opts), (stream) => this.execStreams.push(stream));
  }

  async inspect(): Promise<{ State: { Running: boolean } }> {
    return { State: { Running: this.running } };
  }
}

class FakeExec implements ContainerExec {
  constructor(
    private readonly reply: ExecReply | null,
    private readonly onStart: (stream: PassThrough) => void,
  ) {}

  async start(): Promise<NodeJS.ReadableStream> {
    const stream = new PassThrough();
    this.onStart(stream);
    const reply = this.reply;
    if (reply === null) return stream;

    setImmediate(() => {
      if (reply.stdout) stream.write(`${JSON.stringify({ fd: 1, data: reply.stdout })}\n`);
      if (reply.stderr) stream.write(`${JSON.stringify({ fd: 2, data: reply.stderr })}\n`);
      stream.end();
    });
    return stream;
  }

  async inspect(): Promise<{ ExitCode: number | null }> {
    return { ExitCode: this.reply?.exitCode ?? null };
  }
}

export class FakeDocker implements DockerLike {
  readonly modem = new FakeModem();
  readonly containers = new Map<string, FakeContainer>();
  readonly images = new Set<string>();
  readonly pulled: string[] = [];
  private counter = 0;

  constructor(private readonly handler: ExecHandler = () => ({ exitCode: 0 })) {}

  async createContainer(opts: Docker.ContainerCreateOptions): Promise<FakeContainer> {
    this.counter += 1;
    const container = new FakeContainer(`container-${this.counter}`, opts, this.handler);
    this.containers.set(container.id, container);
    return container;
  }

  getContainer(id: string): FakeContainer {
    const container = this.containers.get(id);
    if (!container) throw new Error(`no such container: ${id}`);
    return container;
  }

  getImage(name: string): { inspect(): Promise<unknown> } {
    return {
      inspect: async () => {
        if (!this.images.has(name)) throw new Error(`no such image: ${name}`);
        return { Id: name };
      },
    };
  }

  async pull(image: string): Promise<NodeJS.ReadableStream> {
    this.pulled.push(image);
    this.images.add(image);
    const stream = new PassThrough();
    stream.end();
    return stream;
  }
}

function isFrame(value: unknown): value is { fd: number; data: string } {
  return (
    typeof value === "object" &&
    value !== null &&
    "fd" in value &&
    "data" in value &&
    typeof value.fd === "number" &&
    typeof value.data === "string"
  );
}
