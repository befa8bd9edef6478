import { minutesBetween } from "../dates.js";
import type { FlightLeg, Itinerary } from "../types.js";

export function toItinerary(legs: readonly FlightLeg[]): Itinerary {
  const first = legs[0];
  const last = legs[legs.length - 1];
  const layoverMinutes: number[] = [];
  for (let i = 1; i < legs.length; i++) {
    layoverMinutes.push(minutesBetween(legs[i - 1].arrivalTime, legs[i].departureTime));
  }
  return Object.freeze({
    legs: Object.freeze([...legs]),
    departureTime: first.departureTime,
    arrivalTime: last.arrivalTime,
    elapsedMinutes: minutesBetween(first.departureTime, last.arrivalTime),
    connections: legs.length - 1,
    layoverMinutes: Object.freeze(layoverMinutes),
  });
}

function flightKey(it: Itinerary): string {
  return it.legs.map((l) => l.flightId).join(",");
}

function compareText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/** Elapsed time, then leg count, then departure; flight ids break whatever ties remain. */
export function compareItineraries(a: Itinerary, b: Itinerary): number {
  return (
    a.elapsedMinutes - b.elapsedMinutes ||
    a.legs.length - b.legs.length ||
    a.departureTime.getTime() - b.departureTime.getTime() ||
    compareText(flightKey(a), flightKey(b))
  );
}

/** Ranking stage: build itineraries, order them and keep the first `limit`. */
export function ranking(paths: readonly FlightLeg[][], limit: number): Itinerary[] {
  return paths.map(toItinerary).sort(compareItineraries).slice(0, limit);
}
