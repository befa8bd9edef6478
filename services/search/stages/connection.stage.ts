import { isWithinRange, MS_PER_MINUTE } from "../dates.js";
import type { FlightLeg, RouteQuery } from "../types.js";
import type { LegSource } from "./legs.stage.js";

export interface ConnectionRules {
  minConnectionMinutes: number;
  maxLayoverMinutes: number;
}

interface Frame {
  path: FlightLeg[];
  /** Airports already on the path, origin included. */
  visited: ReadonlySet<string>;
}

export function isValidConnection(arriving: FlightLeg, departing: FlightLeg, rules: ConnectionRules): boolean {
  if (arriving.destination !== departing.origin) return false;
  // Compared in milliseconds; layoverMinutes on an itinerary is rounded for display only.
  const gapMs = departing.departureTime.getTime() - arriving.arrivalTime.getTime();
  return gapMs >= rules.minConnectionMinutes * MS_PER_MINUTE && gapMs <= rules.maxLayoverMinutes * MS_PER_MINUTE;
}

/**
 * Connection stage: depth-bounded search from the origin over timed legs.
 * Explicit stack, no shared state beyond the per-path visited set. A path is
 * dropped when it would exceed maxConnections + 1 legs, break the layover
 * window, or revisit an airport; a path that reaches the destination ends there.
 *
 * There is no cross-path visited-with-cost map: a slower path through an airport
 * is still explored, because its later arrival may be the only one that makes
 * a connection. Every path that fits the rules is returned and ranking orders
 * them.
 */
export async function connections(
  query: RouteQuery,
  maxConnections: number,
  source: LegSource,
  rules: ConnectionRules
): Promise<FlightLeg[][]> {
  const maxLegs = maxConnections + 1;
  const found: FlightLeg[][] = [];
  const stack: Frame[] = [];

  const firstLegs = await source.departures(query.origin, maxLegs === 1 ? query.destination : undefined);
  for (const leg of firstLegs) {
    if (leg.origin !== query.origin || leg.destination === query.origin) continue;
    if (!isWithinRange(leg.departureTime, query.dateRange)) continue;
    stack.push({ path: [leg], visited: new Set([query.origin, leg.destination]) });
  }

  for (let frame = stack.pop(); frame; frame = stack.pop()) {
    const last = frame.path[frame.path.length - 1];
    if (last.destination === query.destination) {
      found.push(frame.path);
      continue;
    }
    if (frame.path.length >= maxLegs) continue;

    const finalHop = frame.path.length + 1 === maxLegs;
    const next = await source.departures(last.destination, finalHop ? query.destination : undefined);
    for (const leg of next) {
      if (frame.visited.has(leg.destination)) continue;
      if (!isValidConnection(last, leg, rules)) continue;
      stack.push({ path: [...frame.path, leg], visited: new Set([...frame.visited, leg.destination]) });
    }
  }

  return found;
}
