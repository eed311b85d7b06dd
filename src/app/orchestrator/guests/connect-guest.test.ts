import { describe, expect, it } from "vitest";

import { ConnectGuest, buildRemoteCommand, rsyncArgs, shellQuote } from "./connect-guest.js";

describe("ConnectGuest", () => {
  it("builds the ssh command line", () => {
    const guest = new ConnectGuest({
      name: "server",
      guest: "10.0.0.5",
      user: "tester",
      port: 2222,
      key: ["/keys/id_test"],
    });

    expect(guest.sshCommand()).toEqual([
      "ssh",
      "-o",
      "StrictHostKeyChecking=no",
      "-o",
      "UserKnownHostsFile=/dev/null",
      "-o",
      "LogLevel=ERROR",
      "-o",
      "ServerAliveInterval=5",
      "-o",
      "ServerAliveCountMax=60",
      "-p",
      "2222",
      "-i",
      "/keys/id_test",
      "-o",
      "BatchMode=yes",
      "tester@10.0.0.5",
    ]);
  });

  it("wraps password logins in sshpass", () => {
    const guest = new ConnectGuest({ name: "server", guest: "box", password: "test-secret" });
    const argv = guest.sshCommand();

    expect(argv.slice(0, 4)).toEqual(["sshpass", "-p", "test-secret", "ssh"]);
    expect(argv).not.toContain("BatchMode=yes");
    expect(argv[argv.length - 1]).toBe("root@box");
  });

  it("records connection data", () => {
    const guest = new ConnectGuest({ name: "server", guest: "box", port: 22 });
    expect(guest.toSerialized().data).toEqual({ guest: "box", user: "root", port: 22 });
    expect(guest.hostname).toBe("box");
  });
});

describe("buildRemoteCommand", () => {
  it("changes directory and exports variables before the command", () => {
    expect(
      buildRemoteCommand("./runtest.sh", { cwd: "/srv/tests/a b", env: { TMT_TEST_NAME: "/tests/a" } }),
    ).toBe("cd '/srv/tests/a b' || exit 1; export TMT_TEST_NAME=/tests/a; ./runtest.sh");
  });

  it("leaves plain commands alone", () => {
    expect(buildRemoteCommand("true", {})).toBe("true");
  });
});

describe("shellQuote", () => {
  it("quotes only when needed", () => {
    expect(shellQuote("/plain/path-1.txt")).toBe("/plain/path-1.txt");
    expect(shellQuote("it's")).toBe("'it'\\''s'");
  });
});

describe("rsyncArgs", () => {
  it("copies over ssh without deleting at the destination", () => {
    expect(rsyncArgs("ssh -p 2222", "/work/plan/data/", "tester@box:/work/plan/data/")).toEqual([
      "-a",
      "-e",
      "ssh -p 2222",
      "/work/plan/data/",
      "tester@box:/work/plan/data/",
    ]);
  });
});
