import { ConfigError } from "./errors.js";

// =============================================================================
// TYPES
// =============================================================================

export type Schedulable = {
  name: string;
  order: number;
  where: string[];
};

export type GuestIdentity = {
  name: string;
  role: string | null;
};

export type Assignment<P, G> = {
  phase: P;
  guests: G[];
};

/** Phases sharing one `order`, each with the guests it runs on. */
export type Wave<P, G> = {
  order: number;
  assignments: Assignment<P, G>[];
};

// =============================================================================
// PUBLIC API
// =============================================================================

/**
 * Guests named by `where`, by guest name or role, in provisioning order.
 * An empty `where` selects every guest.
 */
export function resolveWhere<G extends GuestIdentity>(
  where: string[],
  guests: G[],
  context: { step: string; phase: string },
): G[] {
  if (where.length === 0) return [...guests];

  const wanted = new Set(where);
  const matched = guests.filter(
    (guest) => wanted.has(guest.name) || (guest.role !== null && wanted.has(guest.role)),
  );

  if (matched.length === 0) {
    throw new ConfigError(
      `No guests match 'where: ${where.join(", ")}' of phase '${context.phase}' in step '${context.step}' ` +
        `(known guests: ${formatGuestList(guests)}). Typo in where?`,
    );
  }

  return matched;
}

/**
 * Groups phases by `order` into waves, keeping the declared sequence inside each
 * wave. Every selector is resolved up front so a typo fails before anything runs.
 */
export function buildWaves<P extends Schedulable, G extends GuestIdentity>(
  phases: P[],
  guests: G[],
  step: string,
): Wave<P, G>[] {
  const waves: Wave<P, G>[] = [];

  for (const phase of sortByOrder(phases)) {
    const assignment = {
      phase,
      guests: resolveWhere(phase.where, guests, { step, phase: phase.name }),
    };

    const current = waves[waves.length - 1];
    if (current && current.order === phase.order) {
      current.assignments.push(assignment);
    } else {
      waves.push({ order: phase.order, assignments: [assignment] });
    }
  }

  return waves;
}

// =============================================================================
// INTERNALS
// =============================================================================

function sortByOrder<P extends Schedulable>(phases: P[]): P[] {
  // Array.prototype.sort is stable, declaration order breaks ties
  return [...phases].sort((a, b) => a.order - b.order);
}

function formatGuestList(guests: GuestIdentity[]): string {
  if (guests.length === 0) return "none";
  return guests.map((guest) => (guest.role ? `${guest.name} (${guest.role})` : guest.name)).join(", ");
}
