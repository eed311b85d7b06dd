/*
Purpose: describe the provisioned guests to tests and scripts running on one of them.
Assumptions: guests keep their provisioning order; roles keep first-seen order.
Usage: const env = await pushTopology(buildTopology(guests, current), { dir, guest: current }).
*/

import path from "node:path";

import { toYaml, writeTextFile } from "../../../core/utils.js";

import type { Guest } from "./guest.js";

// =============================================================================
// TYPES
// =============================================================================

export type GuestTopology = {
  name: string;
  role: string | null;
  hostname: string | null;
};

export type Topology = {
  guest: GuestTopology | null;
  guestNames: string[];
  guests: Record<string, GuestTopology>;
  roleNames: string[];
  roles: Record<string, string[]>;
};

type TopologySource = Pick<Guest, "name" | "role" | "hostname">;

export const TOPOLOGY_FILENAME_BASE = "tmt-topology";

// =============================================================================
// PUBLIC API
// =============================================================================

export function buildTopology(guests: TopologySource[], current?: TopologySource): Topology {
  const roles = new Map<string, string[]>();
  const entries: Record<string, GuestTopology> = {};

  for (const guest of guests) {
    entries[guest.name] = describeGuest(guest);
    if (guest.role) {
      const members = roles.get(guest.role) ?? [];
      members.push(guest.name);
      roles.set(guest.role, members);
    }
  }

  return {
    guest: current ? describeGuest(current) : null,
    guestNames: guests.map((guest) => guest.name),
    guests: entries,
    roleNames: [...roles.keys()],
    roles: Object.fromEntries(roles),
  };
}

export function topologyToYaml(topology: Topology): string {
  return toYaml({
    guest: topology.guest,
    "guest-names": topology.guestNames,
    guests: topology.guests,
    "role-names": topology.roleNames,
    roles: topology.roles,
  });
}

export function topologyToBash(topology: Topology): string {
  const lines: string[] = [];

  if (topology.guest) {
    lines.push("declare -A TMT_GUEST", ...emitGuest(topology.guest, "TMT_GUEST", ""), "");
  }

  lines.push(`TMT_GUEST_NAMES=${bashString(topology.guestNames.join(" "))}`, "");
  lines.push("declare -A TMT_GUESTS");
  for (const guest of Object.values(topology.guests)) {
    lines.push(...emitGuest(guest, "TMT_GUESTS", `${guest.name}.`));
  }

  lines.push("", `TMT_ROLE_NAMES=${bashString(topology.roleNames.join(" "))}`, "");
  lines.push("declare -A TMT_ROLES");
  for (const [role, names] of Object.entries(topology.roles)) {
    lines.push(`TMT_ROLES[${role}]=${bashString(names.join(" "))}`);
  }

  return `${lines.join("\n")}\n`;
}

/** Writes both files to `dir` and returns the variables pointing at them. */
export async function saveTopology(
  topology: Topology,
  dir: string,
): Promise<{ TMT_TOPOLOGY_YAML: string; TMT_TOPOLOGY_BASH: string }> {
  const yamlPath = path.join(dir, `${TOPOLOGY_FILENAME_BASE}.yaml`);
  const bashPath = path.join(dir, `${TOPOLOGY_FILENAME_BASE}.sh`);

  await writeTextFile(yamlPath, topologyToYaml(topology));
  await writeTextFile(bashPath, topologyToBash(topology));

  return { TMT_TOPOLOGY_YAML: yamlPath, TMT_TOPOLOGY_BASH: bashPath };
}

/** Saves the files and pushes them to the guest at the same paths. */
export async function pushTopology(
  topology: Topology,
  opts: { dir: string; guest: Pick<Guest, "push"> },
): Promise<Record<string, string>> {
  const env = await saveTopology(topology, opts.dir);
  await opts.guest.push(opts.dir);
  return { ...env };
}

// =============================================================================
// INTERNALS
// =============================================================================

function describeGuest(guest: TopologySource): GuestTopology {
  return { name: guest.name, role: guest.role, hostname: guest.hostname };
}

function emitGuest(guest: GuestTopology, variable: string, keyPrefix: string): string[] {
  return [
    `${variable}[${keyPrefix}name]=${bashString(guest.name)}`,
    `${variable}[${keyPrefix}role]=${bashString(guest.role ?? "")}`,
    `${variable}[${keyPrefix}hostname]=${bashString(guest.hostname ?? "")}`,
  ];
}

function bashString(value: string): string {
  return `"${value.replace(/(["\\$`])/g, "\\$1")}"`;
}
