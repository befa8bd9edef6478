/**
 * Legs query: the Postgres ScheduleStore.
 *
 * Applies:
 * - Origin filter, plus destination when the resolver asks for a final hop
 * - Departure window: UTC days [start, end] of the requested range
 * - Seat filter: a seat_availability row for the class with seats left
 * - Keyset pages of LEGS_PAGE_SIZE rows on (departure_time, flight_id)
 * - Hard limit: a read past LEGS_HARD_LIMIT rows fails instead of truncating
 *
 * Schema: database/schema.sql (flight_legs, seat_availability).
 * Index: idx_flight_legs_origin_departure (origin, departure_time).
 */

import { query } from "../../database/index.js";
import { InfrastructureError, SearchErrorCode } from "../errors.js";
import { SEAT_CLASSES, type AirportCode, type DateRange, type FlightLeg, type ScheduleStore, type SeatClass } from "../search/types.js";

// ─── Hard limits ────────────────────────────────────────────────────────────

/** Rows fetched per round trip to Postgres. */
export const LEGS_PAGE_SIZE = 1_000;

/** Maximum legs one read may return; beyond it the read fails with SCHEDULE_READ_TOO_LARGE. */
export const LEGS_HARD_LIMIT = 20_000;

// ─── Query builder ──────────────────────────────────────────────────────────

const LEG_COLUMNS = `
  l.flight_id, l.airline_id, l.flight_number, l.origin, l.destination,
  l.departure_time, l.arrival_time,
  COALESCE(
    json_object_agg(s.seat_class, s.available_seats) FILTER (WHERE s.seat_class IS NOT NULL),
    '{}'::json
  ) AS seats`;

/** Last row of the previous page; the next page starts strictly after it. */
export interface LegCursor {
  departureTime: Date;
  flightId: string;
}

export function buildLegsSql(
  origin: AirportCode,
  destination: AirportCode | undefined,
  range: DateRange,
  seatClass: SeatClass,
  after?: LegCursor,
  pageSize: number = LEGS_PAGE_SIZE
): { text: string; values: unknown[] } {
  const values: unknown[] = [origin, range.start, range.end, seatClass];
  const conditions = [
    "l.origin = $1",
    "l.departure_time >= ($2::date)::timestamp AT TIME ZONE 'UTC'",
    "l.departure_time < (($3::date + 1))::timestamp AT TIME ZONE 'UTC'",
  ];

  if (destination) {
    values.push(destination);
    conditions.push(`l.destination = $${values.length}`);
  }

  if (after) {
    values.push(after.departureTime, after.flightId);
    conditions.push(`(l.departure_time, l.flight_id) > ($${values.length - 1}, $${values.length})`);
  }

  values.push(pageSize);
  const limitParam = values.length;

  const text = `
SELECT ${LEG_COLUMNS}
FROM flight_legs l
JOIN seat_availability req
  ON req.flight_id = l.flight_id AND req.seat_class = $4 AND req.available_seats > 0
LEFT JOIN seat_availability s ON s.flight_id = l.flight_id
WHERE ${conditions.join(" AND ")}
GROUP BY l.flight_id
ORDER BY l.departure_time, l.flight_id
LIMIT $${limitParam};
`.trim();

  return { text, values };
}

// ─── Row mapping ─────────────────────────────────────────────────────────────

export interface LegRow {
  flight_id: string;
  airline_id: string;
  flight_number: string;
  origin: string;
  destination: string;
  departure_time: Date;
  arrival_time: Date;
  seats: Record<string, number> | null;
}

export function mapRowToLeg(r: LegRow): FlightLeg {
  const seatAvailability: Partial<Record<SeatClass, number>> = {};
  for (const seatClass of SEAT_CLASSES) {
    const n = r.seats?.[seatClass];
    if (n !== undefined) seatAvailability[seatClass] = Number(n);
  }
  return {
    flightId: String(r.flight_id),
    airlineId: r.airline_id,
    flightNumber: r.flight_number,
    origin: r.origin,
    destination: r.destination,
    departureTime: new Date(r.departure_time),
    arrivalTime: new Date(r.arrival_time),
    seatAvailability,
  };
}

function unavailable(err: unknown): InfrastructureError {
  return new InfrastructureError(
    SearchErrorCode.SCHEDULE_UNAVAILABLE,
    `schedule database query failed: ${err instanceof Error ? err.message : String(err)}`,
    { cause: err }
  );
}

// ─── Public API ─────────────────────────────────────────────────────────────

export type LegQuery = (text: string, values: unknown[]) => Promise<LegRow[]>;

export interface PgScheduleStoreOptions {
  /** Runs one statement; defaults to the shared pool. */
  run?: LegQuery;
  pageSize?: number;
  maxRows?: number;
}

export class PgScheduleStore implements ScheduleStore {
  private readonly run: LegQuery;
  private readonly pageSize: number;
  private readonly maxRows: number;

  constructor(options: PgScheduleStoreOptions = {}) {
    this.run = options.run ?? ((text, values) => query<LegRow>(text, values));
    this.pageSize = options.pageSize ?? LEGS_PAGE_SIZE;
    this.maxRows = options.maxRows ?? LEGS_HARD_LIMIT;
  }

  async findLegs(
    origin: AirportCode,
    destination: AirportCode | undefined,
    dateRange: DateRange,
    seatClass: SeatClass
  ): Promise<FlightLeg[]> {
    const legs: FlightLeg[] = [];
    let after: LegCursor | undefined;
    try {
      for (;;) {
        const { text, values } = buildLegsSql(origin, destination, dateRange, seatClass, after, this.pageSize);
        const rows = await this.run(text, values);
        legs.push(...rows.map(mapRowToLeg));
        if (legs.length > this.maxRows) {
          throw new InfrastructureError(
            SearchErrorCode.SCHEDULE_READ_TOO_LARGE,
            `more than ${this.maxRows} legs leave ${origin} between ${dateRange.start} and ${dateRange.end}`,
            { retryable: false }
          );
        }
        if (rows.length < this.pageSize) return legs;
        const last = rows[rows.length - 1];
        after = { departureTime: new Date(last.departure_time), flightId: String(last.flight_id) };
      }
    } catch (err) {
      if (err instanceof InfrastructureError) throw err;
      throw unavailable(err);
    }
  }

  async findLegById(flightId: string): Promise<FlightLeg | undefined> {
    try {
      const rows = await this.run(
        `SELECT ${LEG_COLUMNS}
FROM flight_legs l
LEFT JOIN seat_availability s ON s.flight_id = l.flight_id
WHERE l.flight_id = $1
GROUP BY l.flight_id;`,
        [flightId]
      );
      return rows.length > 0 ? mapRowToLeg(rows[0]) : undefined;
    } catch (err) {
      throw unavailable(err);
    }
  }
}
