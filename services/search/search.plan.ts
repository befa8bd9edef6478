import { daysBetween, parseCalendarDate, startOfUtcDay, addDays } from "./dates.js";
import { SEAT_CLASSES, type Result, type SearchCriteria, type SearchPlan, type SeatClass, type ValidationIssue } from "./types.js";

// ─── Domain validation errors ───────────────────────────────────────────────

export const SearchPlanErrorCode = {
  INVALID_AIRPORT_CODE: "INVALID_AIRPORT_CODE",
  SAME_AIRPORTS: "SAME_AIRPORTS",
  INVALID_DATE: "INVALID_DATE",
  INVERTED_DATE_RANGE: "INVERTED_DATE_RANGE",
  DATE_IN_PAST: "DATE_IN_PAST",
  DATE_TOO_FAR: "DATE_TOO_FAR",
  DATE_RANGE_TOO_WIDE: "DATE_RANGE_TOO_WIDE",
  MISSING_RETURN_DATE: "MISSING_RETURN_DATE",
  RETURN_BEFORE_DEPARTURE: "RETURN_BEFORE_DEPARTURE",
  INVALID_SEAT_CLASS: "INVALID_SEAT_CLASS",
  INVALID_MAX_CONNECTIONS: "INVALID_MAX_CONNECTIONS",
  INVALID_AIRLINE_CODE: "INVALID_AIRLINE_CODE",
} as const;

export type SearchPlanErrorCode =
  (typeof SearchPlanErrorCode)[keyof typeof SearchPlanErrorCode];

// ─── Rules ──────────────────────────────────────────────────────────────────

export interface ValidationRules {
  /** Days before today a departure may still start (late-night searches across midnight). */
  pastGraceDays: number;
  maxAdvanceDays: number;
  maxRangeDays: number;
  defaultMaxConnections: number;
  maxConnectionsLimit: number;
}

export const DEFAULT_VALIDATION_RULES: ValidationRules = {
  pastGraceDays: 1,
  maxAdvanceDays: 365,
  maxRangeDays: 31,
  defaultMaxConnections: 1,
  maxConnectionsLimit: 2,
};

const AIRPORT_CODE = /^[A-Z]{3,4}$/;
const AIRLINE_CODE = /^[A-Z0-9]{2}$/;

// ─── Helpers ───────────────────────────────────────────────────────────────

function issue(field: string, code: SearchPlanErrorCode, message: string): ValidationIssue {
  return { field, code, message };
}

/** Case-fold and check an airport code; no trimming, whitespace is an error. */
function parseAirport(value: unknown, field: "origin" | "destination", issues: ValidationIssue[]): string | undefined {
  const code = typeof value === "string" ? value.toUpperCase() : "";
  if (!AIRPORT_CODE.test(code)) {
    issues.push(
      issue(field, SearchPlanErrorCode.INVALID_AIRPORT_CODE, `${field} must be a 3-letter IATA or 4-letter ICAO airport code`)
    );
    return undefined;
  }
  return code;
}

function parseDate(value: unknown, field: string, issues: ValidationIssue[]): Date | undefined {
  const d = typeof value === "string" ? parseCalendarDate(value) : undefined;
  if (!d) {
    issues.push(
      issue(field, SearchPlanErrorCode.INVALID_DATE, `${field} must be a calendar date in YYYY-MM-DD format, got "${String(value)}"`)
    );
  }
  return d;
}

function parseSeatClass(value: unknown, issues: ValidationIssue[]): SeatClass | undefined {
  const upper = typeof value === "string" ? value.toUpperCase() : "";
  const match = SEAT_CLASSES.find((c) => c === upper);
  if (!match) {
    issues.push(
      issue("seatClass", SearchPlanErrorCode.INVALID_SEAT_CLASS, `seatClass must be one of ${SEAT_CLASSES.join(", ")}`)
    );
  }
  return match;
}

function parseMaxConnections(value: number | undefined, rules: ValidationRules, issues: ValidationIssue[]): number {
  if (value === undefined) return rules.defaultMaxConnections;
  if (!Number.isInteger(value) || value < 0 || value > rules.maxConnectionsLimit) {
    issues.push(
      issue(
        "maxConnections",
        SearchPlanErrorCode.INVALID_MAX_CONNECTIONS,
        `maxConnections must be an integer between 0 and ${rules.maxConnectionsLimit}`
      )
    );
    return rules.defaultMaxConnections;
  }
  return value;
}

function parseAirlines(value: string[] | undefined, issues: ValidationIssue[]): string[] {
  if (!value || value.length === 0) return [];
  const codes = value.map((a) => a.toUpperCase());
  const bad = codes.filter((a) => !AIRLINE_CODE.test(a));
  if (bad.length > 0) {
    issues.push(
      issue("airlines", SearchPlanErrorCode.INVALID_AIRLINE_CODE, `airline codes must be 2 characters: ${bad.join(", ")}`)
    );
  }
  return [...new Set(codes)].sort();
}

// ─── Public API ─────────────────────────────────────────────────────────────

/**
 * Validate criteria and build an immutable SearchPlan. Every failing rule is
 * reported; nothing is silently corrected apart from case-folding codes and
 * seat class. `now` anchors the past/advance windows.
 */
export function buildSearchPlan(
  criteria: SearchCriteria,
  rules: ValidationRules = DEFAULT_VALIDATION_RULES,
  now: Date = new Date()
): Result<SearchPlan, ValidationIssue[]> {
  const issues: ValidationIssue[] = [];

  const origin = parseAirport(criteria.origin, "origin", issues);
  const destination = parseAirport(criteria.destination, "destination", issues);
  if (origin && destination && origin === destination) {
    issues.push(
      issue("destination", SearchPlanErrorCode.SAME_AIRPORTS, "origin and destination airports must differ")
    );
  }

  const start = parseDate(criteria.dateRange?.start, "dateRange.start", issues);
  const end = parseDate(criteria.dateRange?.end, "dateRange.end", issues);
  const today = startOfUtcDay(now);
  const latest = addDays(today, rules.maxAdvanceDays);

  if (start && end) {
    if (start.getTime() > end.getTime()) {
      issues.push(
        issue("dateRange", SearchPlanErrorCode.INVERTED_DATE_RANGE, "dateRange.start must not be after dateRange.end")
      );
    } else if (daysBetween(start, end) + 1 > rules.maxRangeDays) {
      issues.push(
        issue("dateRange", SearchPlanErrorCode.DATE_RANGE_TOO_WIDE, `dateRange may span at most ${rules.maxRangeDays} days`)
      );
    }
  }
  if (start) {
    if (start.getTime() < addDays(today, -rules.pastGraceDays).getTime()) {
      issues.push(issue("dateRange.start", SearchPlanErrorCode.DATE_IN_PAST, "departure date is in the past"));
    } else if (start.getTime() > latest.getTime()) {
      issues.push(
        issue(
          "dateRange.start",
          SearchPlanErrorCode.DATE_TOO_FAR,
          `cannot search flights more than ${rules.maxAdvanceDays} days in advance`
        )
      );
    }
  }

  let returnDate: Date | undefined;
  if (criteria.isRoundTrip) {
    if (criteria.returnDate === undefined || criteria.returnDate === "") {
      issues.push(
        issue("returnDate", SearchPlanErrorCode.MISSING_RETURN_DATE, "returnDate is required for a round trip")
      );
    } else {
      returnDate = parseDate(criteria.returnDate, "returnDate", issues);
      if (returnDate && start && returnDate.getTime() < start.getTime()) {
        issues.push(
          issue("returnDate", SearchPlanErrorCode.RETURN_BEFORE_DEPARTURE, "returnDate must not be before the departure date")
        );
      } else if (returnDate && returnDate.getTime() > latest.getTime()) {
        issues.push(
          issue(
            "returnDate",
            SearchPlanErrorCode.DATE_TOO_FAR,
            `returnDate cannot be more than ${rules.maxAdvanceDays} days in the future`
          )
        );
      }
    }
  }

  const seatClass = parseSeatClass(criteria.seatClass, issues);
  const maxConnections = parseMaxConnections(criteria.maxConnections, rules, issues);
  const airlines = parseAirlines(criteria.airlines, issues);

  if (issues.length > 0 || !origin || !destination || !seatClass) {
    return { ok: false, error: issues };
  }

  const plan: SearchPlan = {
    criteria,
    origin,
    destination,
    outbound: Object.freeze({ start: criteria.dateRange.start, end: criteria.dateRange.end }),
    seatClass,
    isRoundTrip: criteria.isRoundTrip,
    returnDate: criteria.isRoundTrip ? criteria.returnDate : undefined,
    maxConnections,
    airlines: Object.freeze(airlines),
  };

  return { ok: true, value: Object.freeze(plan) };
}
