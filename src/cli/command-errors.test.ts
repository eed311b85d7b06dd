import { describe, expect, it } from "vitest";

import {
  ConfigError,
  DockerError,
  GuestTimeoutError,
  USER_FACING_ERROR_CODES,
  UserFacingError,
} from "../core/errors.js";

import { normalizeCommandError, resolveCommandErrorCode } from "./command-errors.js";

describe("normalizeCommandError", () => {
  it("maps orchestrator errors to codes and picks the matching hint", () => {
    const error = normalizeCommandError(new DockerError("daemon not running"), {
      title: "Run command failed.",
      hints: { [USER_FACING_ERROR_CODES.docker]: "Start Docker." },
    });

    expect(error.code).toBe("DOCKER_ERROR");
    expect(error.title).toBe("Run command failed.");
    expect(error.message).toBe("daemon not running");
    expect(error.hint).toBe("Start Docker.");
  });

  it("keeps the inner title in the message of a wrapped user-facing error", () => {
    const inner = new UserFacingError({
      code: USER_FACING_ERROR_CODES.config,
      title: "Metadata tree missing.",
      message: "No trellis.yaml found in /srv.",
      hint: "Pass --root.",
    });

    const error = normalizeCommandError(inner, {
      title: "Run command failed.",
      hints: { [USER_FACING_ERROR_CODES.config]: "unused" },
    });

    expect(error.message).toBe("Metadata tree missing. No trellis.yaml found in /srv.");
    expect(error.hint).toBe("Pass --root.");
    expect(error.cause).toBe(inner);
  });

  it("resolves codes for each error family", () => {
    expect(resolveCommandErrorCode(new ConfigError("bad"))).toBe("CONFIG_ERROR");
    expect(resolveCommandErrorCode(new GuestTimeoutError("slow", 1000))).toBe("GUEST_ERROR");
    expect(resolveCommandErrorCode(new Error("plain"))).toBe("UNKNOWN_ERROR");
  });
});
