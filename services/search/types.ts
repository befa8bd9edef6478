// ─── Seat classes ────────────────────────────────────────────────────────────

export const SeatClass = {
  ECONOMY: "ECONOMY",
  BUSINESS: "BUSINESS",
  FIRST: "FIRST",
} as const;

export type SeatClass = (typeof SeatClass)[keyof typeof SeatClass];

export const SEAT_CLASSES: readonly SeatClass[] = Object.values(SeatClass);

// ─── Value types ─────────────────────────────────────────────────────────────

/** IATA (3 letters) or ICAO (4 letters) code, upper case once validated. */
export type AirportCode = string;

/** Inclusive range of UTC calendar days, both ends as `YYYY-MM-DD`. */
export interface DateRange {
  start: string;
  end: string;
}

// ─── SearchCriteria ──────────────────────────────────────────────────────────
/**
 * Search request as received from a caller. Nothing here is trusted: codes may be
 * lower case, dates may be malformed and seatClass may be outside the enum. The
 * validator turns it into a SearchPlan or a list of issues.
 */
export interface SearchCriteria {
  origin: string;
  destination: string;
  dateRange: DateRange;
  seatClass: string;
  isRoundTrip: boolean;
  returnDate?: string;
  /** Overrides the default number of connections (0 = direct only). */
  maxConnections?: number;
  /** Two-character airline codes; when non-empty every leg must be operated by one of them. */
  airlines?: string[];
}

// ─── SearchPlan ──────────────────────────────────────────────────────────────
/**
 * Validated, normalized criteria. Immutable; consumed by fingerprinting, the
 * resolver and the cache tags.
 * - origin/destination: upper-cased airport codes
 * - outbound: departure window for the first leg
 * - returnDate: only set for round trips
 * - airlines: unique, sorted, upper case (empty = any airline)
 */
export interface SearchPlan {
  criteria: SearchCriteria;
  origin: AirportCode;
  destination: AirportCode;
  outbound: DateRange;
  seatClass: SeatClass;
  isRoundTrip: boolean;
  returnDate?: string;
  maxConnections: number;
  airlines: readonly string[];
}

// ─── RouteQuery ──────────────────────────────────────────────────────────────
/** One directed journey handed to the connection resolver. */
export interface RouteQuery {
  origin: AirportCode;
  destination: AirportCode;
  dateRange: DateRange;
  seatClass: SeatClass;
  airlines?: readonly string[];
}

// ─── FlightLeg ───────────────────────────────────────────────────────────────
/** A single scheduled segment as read from the schedule store. */
export interface FlightLeg {
  flightId: string;
  airlineId: string;
  flightNumber: string;
  origin: AirportCode;
  destination: AirportCode;
  departureTime: Date;
  arrivalTime: Date;
  /** Seats left per class; a missing class means none. */
  seatAvailability: Partial<Record<SeatClass, number>>;
}

// ─── Itinerary ───────────────────────────────────────────────────────────────
export interface Itinerary {
  legs: readonly FlightLeg[];
  departureTime: Date;
  arrivalTime: Date;
  elapsedMinutes: number;
  /** legs.length - 1 */
  connections: number;
  /** Ground time between consecutive legs, in minutes. */
  layoverMinutes: readonly number[];
}

// ─── Validation issues ───────────────────────────────────────────────────────
/** Field-attributed validation failure, returned as data rather than thrown. */
export interface ValidationIssue {
  field: string;
  code: string;
  message: string;
}

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

// ─── SearchResponse ──────────────────────────────────────────────────────────
export interface SearchResponse {
  criteria: SearchCriteria;
  itineraries: readonly Itinerary[];
  /** Return journeys, empty unless the search is a round trip. */
  returnItineraries: readonly Itinerary[];
  servedFromCache: boolean;
  /** False when a journey came back empty while its schedule data was still being ingested. */
  complete: boolean;
  computedAt?: Date;
  errors: ValidationIssue[];
}

// ─── External collaborators ──────────────────────────────────────────────────

/**
 * Read contract of the schedule data. Must be safe to call concurrently and must
 * fail (not return []) when the data cannot be read.
 */
export interface ScheduleStore {
  /**
   * Legs leaving `origin` on a day inside `dateRange` with at least one seat in
   * `seatClass`. `destination` undefined means any destination.
   */
  findLegs(
    origin: AirportCode,
    destination: AirportCode | undefined,
    dateRange: DateRange,
    seatClass: SeatClass
  ): Promise<FlightLeg[]>;

  findLegById(flightId: string): Promise<FlightLeg | undefined>;
}

/** Whether schedule data covering a range has been fully ingested. */
export interface IngestionStatus {
  isComplete(dateRange: DateRange): Promise<boolean>;
}
