import { describe, expect, it } from "vitest";

import { ConfigError } from "./errors.js";
import { buildWaves, resolveWhere } from "./scheduler.js";

const guests = [
  { name: "server", role: "servers" },
  { name: "client-1", role: "clients" },
  { name: "client-2", role: "clients" },
  { name: "lonely", role: null },
];

function phase(name: string, order: number, where: string[] = []) {
  return { name, order, where };
}

describe("resolveWhere", () => {
  it("selects every guest for an empty selector", () => {
    expect(resolveWhere([], guests, { step: "prepare", phase: "a" })).toEqual(guests);
  });

  it("matches names and roles in provisioning order", () => {
    const matched = resolveWhere(["clients", "server"], guests, { step: "prepare", phase: "a" });
    expect(matched.map((guest) => guest.name)).toEqual(["server", "client-1", "client-2"]);
  });

  it("rejects selectors that match nothing", () => {
    const error = (() => {
      try {
        resolveWhere(["clinets"], guests, { step: "execute", phase: "default-0" });
      } catch (err) {
        return err;
      }
      return null;
    })();

    expect(error).toBeInstanceOf(ConfigError);
    expect(error).toHaveProperty(
      "message",
      "No guests match 'where: clinets' of phase 'default-0' in step 'execute' " +
        "(known guests: server (servers), client-1 (clients), client-2 (clients), lonely). Typo in where?",
    );
  });
});

describe("buildWaves", () => {
  it("groups phases by order and keeps declaration order inside a wave", () => {
    const waves = buildWaves(
      [phase("late", 60), phase("a", 50, ["server"]), phase("early", 10), phase("b", 50, ["clients"])],
      guests,
      "prepare",
    );

    expect(
      waves.map((wave) => [
        wave.order,
        wave.assignments.map((assignment) => [
          assignment.phase.name,
          assignment.guests.map((guest) => guest.name),
        ]),
      ]),
    ).toEqual([
      [10, [["early", ["server", "client-1", "client-2", "lonely"]]]],
      [
        50,
        [
          ["a", ["server"]],
          ["b", ["client-1", "client-2"]],
        ],
      ],
      [60, [["late", ["server", "client-1", "client-2", "lonely"]]]],
    ]);
  });

  it("fails before scheduling anything when a selector is wrong", () => {
    expect(() => buildWaves([phase("ok", 10), phase("bad", 90, ["nobody"])], guests, "finish")).toThrow(
      ConfigError,
    );
  });

  it("returns no waves for no phases", () => {
    expect(buildWaves([], guests, "prepare")).toEqual([]);
  });
});
