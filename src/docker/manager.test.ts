import { describe, expect, it } from "vitest";

import { DockerError, GuestTimeoutError } from "../core/errors.js";

import { FakeDocker } from "./fake-docker.js";
import { boundedCommand, DockerManager } from "./manager.js";

const spec = { name: "ct-1", image: "fedora:40", env: {}, binds: [] };

describe("DockerManager", () => {
  it("executes a command inside a container and captures output", async () => {
    const docker = new FakeDocker(() => ({ exitCode: 17, stdout: "first\nlast\n", stderr: "oops\n" }));
    const manager = new DockerManager({ docker });
    const container = await manager.startContainer(spec);

    const result = await manager.execInContainer(container, ["bash", "-c", "echo hi"], {
      env: { KEEP: "1", DROP: undefined },
      workdir: "/work",
      user: "tester",
    });

    const execOpts = docker.getContainer(container.id).execCalls[0];
    expect(execOpts?.Cmd).toEqual(["bash", "-c", "echo hi"]);
    expect(execOpts?.Env).toEqual(["KEEP=1"]);
    expect(execOpts?.WorkingDir).toBe("/work");
    expect(execOpts?.User).toBe("tester");

    expect(result).toEqual({ exitCode: 17, stdout: "first\nlast\n", stderr: "oops\n" });
  });

  it("times out commands that never finish", async () => {
    const manager = new DockerManager({ docker: new FakeDocker(() => null) });
    const container = await manager.startContainer(spec);

    await expect(
      manager.execInContainer(container, ["sleep", "100"], { timeoutMs: 5 }),
    ).rejects.toBeInstanceOf(GuestTimeoutError);
  });

  it("bounds timed commands and stops reading them at the deadline", async () => {
    const docker = new FakeDocker(() => null);
    const manager = new DockerManager({ docker });
    const container = await manager.startContainer(spec);

    await expect(
      manager.execInContainer(container, ["sleep", "100"], { timeoutMs: 5 }),
    ).rejects.toBeInstanceOf(GuestTimeoutError);

    const fake = docker.getContainer(container.id);
    expect(fake.execCalls[0]?.Cmd).toEqual(["timeout", "-s", "KILL", "1", "sleep", "100"]);
    expect(fake.execStreams).toHaveLength(1);
    expect(fake.execStreams[0]?.destroyed).toBe(true);
  });

  it("rounds timeouts up to whole seconds", () => {
    expect(boundedCommand(["true"], 90_500)).toEqual(["timeout", "-s", "KILL", "91", "true"]);
    expect(boundedCommand(["true"], 2_000)).toEqual(["timeout", "-s", "KILL", "2", "true"]);
  });

  it("wraps exec failures", async () => {
    const docker = new FakeDocker();
    const manager = new DockerManager({ docker });
    const container = await manager.startContainer(spec);
    await manager.removeContainer(container);

    await expect(manager.execInContainer(container, ["true"])).rejects.toBeInstanceOf(DockerError);
    expect(await manager.isRunning(container)).toBe(false);
  });

  it("pulls images only when missing", async () => {
    const docker = new FakeDocker();
    docker.images.add("fedora:40");
    const manager = new DockerManager({ docker });

    await manager.ensureImage("fedora:40");
    await manager.ensureImage("alpine:3", "missing");
    await manager.ensureImage("alpine:3", "always");
    await manager.ensureImage("busybox", "never");

    expect(docker.pulled).toEqual(["alpine:3", "alpine:3"]);
  });

  it("restarts containers", async () => {
    const docker = new FakeDocker();
    const manager = new DockerManager({ docker });
    const container = await manager.startContainer(spec);

    await manager.restartContainer(container);
    expect(docker.getContainer(container.id).restarts).toBe(1);
  });
});
