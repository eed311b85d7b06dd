import type Docker from "dockerode";
import { describe, expect, it } from "vitest";

import { DockerError, UserFacingError, USER_FACING_ERROR_CODES } from "../core/errors.js";

import {
  createContainer,
  IDLE_COMMAND,
  isDockerUnavailableError,
  removeContainer,
  resolveDockerErrorDetails,
  startContainer,
} from "./docker.js";
import { FakeContainer, FakeDocker } from "./fake-docker.js";

const daemonDown = Object.assign(
  new Error("Cannot connect to the Docker daemon at unix:///var/run/docker.sock."),
  { code: "ECONNREFUSED" },
);

class UnavailableDocker extends FakeDocker {
  override async createContainer(): Promise<FakeContainer> {
    throw daemonDown;
  }
}

class BrokenContainer extends FakeContainer {
  constructor(private readonly failure: unknown) {
    super("broken", {}, () => ({ exitCode: 0 }));
  }

  override async start(): Promise<void> {
    throw this.failure;
  }

  override async remove(): Promise<void> {
    throw this.failure;
  }
}

describe("createContainer", () => {
  it("maps container options onto the create request", async () => {
    const docker = new FakeDocker();

    const container = await createContainer(docker, {
      name: "trellis-client",
      image: "fedora:40",
      user: "tester",
      env: { KEEP: "1", DROP: undefined },
      binds: [{ hostPath: "/var/tmp/trellis/run-1", containerPath: "/var/tmp/trellis/run-1", mode: "rw" }],
      labels: { "trellis.guest": "client" },
    });

    const opts: Docker.ContainerCreateOptions = docker.getContainer(container.id).createOptions;
    expect(opts.name).toBe("trellis-client");
    expect(opts.Image).toBe("fedora:40");
    expect(opts.User).toBe("tester");
    expect(opts.Env).toEqual(["KEEP=1"]);
    expect(opts.Cmd).toEqual(IDLE_COMMAND);
    expect(opts.Labels).toEqual({ "trellis.guest": "client" });
    expect(opts.HostConfig?.NetworkMode).toBe("bridge");
    expect(opts.HostConfig?.Binds).toEqual([
      "/var/tmp/trellis/run-1:/var/tmp/trellis/run-1:rw",
    ]);
  });

  it("wraps creation failures with a user-facing hint", async () => {
    const result: unknown = await createContainer(new UnavailableDocker(), {
      name: "ct-err",
      image: "fedora:40",
      env: {},
      binds: [],
    }).catch((err: unknown) => err);

    expect(result).toBeInstanceOf(UserFacingError);
    if (!(result instanceof UserFacingError)) return;
    expect(result.code).toBe(USER_FACING_ERROR_CODES.docker);
    expect(result.hint).toBe(
      "Start the Docker daemon and retry, or provision with `--how local` instead.",
    );
    expect(result.cause).toBeInstanceOf(DockerError);
  });
});

describe("startContainer", () => {
  it("uses the generic hint when the daemon is reachable", async () => {
    const result: unknown = await startContainer(
      new BrokenContainer(new Error("image has no entrypoint")),
    ).catch((err: unknown) => err);

    expect(result).toBeInstanceOf(UserFacingError);
    if (!(result instanceof UserFacingError)) return;
    expect(result.title).toBe("Docker container start failed.");
    expect(result.hint).toBe(
      "Check that the container image and configuration are valid, then retry.",
    );
  });
});

describe("removeContainer", () => {
  it("treats a missing container as removed", async () => {
    const gone = Object.assign(new Error("no such container"), { statusCode: 404 });
    await expect(removeContainer(new BrokenContainer(gone))).resolves.toBeUndefined();
  });

  it("reports other failures", async () => {
    await expect(removeContainer(new BrokenContainer(new Error("busy")))).rejects.toThrow(
      "Failed to remove container broken: busy",
    );
  });
});

describe("docker error details", () => {
  it("reads code, reason and status from error objects", () => {
    const details = resolveDockerErrorDetails(
      Object.assign(new Error("boom"), { reason: "server error", statusCode: 500 }),
    );
    expect(details).toEqual({ message: "boom", reason: "server error", statusCode: 500 });
    expect(resolveDockerErrorDetails("plain")).toEqual({ message: "plain" });
  });

  it("recognises an unreachable daemon", () => {
    expect(isDockerUnavailableError({ message: "x", code: "ENOENT" })).toBe(true);
    expect(isDockerUnavailableError({ message: "error during connect: pipe" })).toBe(true);
    expect(isDockerUnavailableError({ message: "manifest unknown" })).toBe(false);
  });
});
