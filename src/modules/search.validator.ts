import { z } from "zod";
import { parseCalendarDate } from "../../services/search/dates.js";
import { SeatClass, type SearchCriteria, type ValidationIssue } from "../../services/search/types.js";

/** "true"/"false"/"1"/"0" from a query string, or a JSON boolean from a body. */
const booleanish = z
  .union([z.boolean(), z.enum(["true", "false", "1", "0"])])
  .transform((v) => v === true || v === "true" || v === "1");

/** Digits only in a query string, so a blank value is reported rather than read as 0. */
const connectionCount = z.union([z.number(), z.string()]).transform((v, ctx) => {
  if (typeof v === "number") return v;
  if (!/^\d+$/.test(v)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: "maxConnections must be a whole number" });
    return z.NEVER;
  }
  return Number(v);
});

/** Comma-separated in a query string, an array in a body. */
const airlineList = z
  .union([z.string(), z.array(z.string())])
  .optional()
  .transform((v) => {
    if (v === undefined) return undefined;
    const list = Array.isArray(v) ? v : v.split(",");
    return list.filter((a) => a.length > 0);
  });

/**
 * Shape of an inbound search (query string or JSON body). Only types are checked
 * here; airport codes, dates and seat class are checked by the search plan so
 * every semantic failure is reported with its field.
 */
export const SearchQuerySchema = z.object({
  origin: z.string({ required_error: "origin is required" }),
  destination: z.string({ required_error: "destination is required" }),
  start: z.string({ required_error: "start is required" }),
  /** Last departure day; defaults to `start`. */
  end: z.string().optional(),
  seatClass: z.string().default(SeatClass.ECONOMY),
  roundTrip: booleanish.default(false),
  returnDate: z.string().optional(),
  maxConnections: connectionCount.optional(),
  airlines: airlineList,
});

export type SearchQuery = z.infer<typeof SearchQuerySchema>;

export const IngestionCompleteSchema = z
  .object({
    start: z.string().refine((v) => parseCalendarDate(v) !== undefined, { message: "start must be a YYYY-MM-DD date" }),
    end: z.string().refine((v) => parseCalendarDate(v) !== undefined, { message: "end must be a YYYY-MM-DD date" }).optional(),
  })
  .refine((v) => v.end === undefined || v.start <= v.end, { message: "start must not be after end", path: ["end"] });

export const FlightParamsSchema = z.object({
  flightId: z.string().min(1).max(64),
});

// ─── Mapping ────────────────────────────────────────────────────────────────

export function toSearchCriteria(q: SearchQuery): SearchCriteria {
  return {
    origin: q.origin,
    destination: q.destination,
    dateRange: { start: q.start, end: q.end ?? q.start },
    seatClass: q.seatClass,
    isRoundTrip: q.roundTrip,
    returnDate: q.returnDate,
    maxConnections: q.maxConnections,
    airlines: q.airlines,
  };
}

export function toValidationIssues(error: z.ZodError): ValidationIssue[] {
  return error.issues.map((e) => ({
    field: e.path.length ? e.path.join(".") : "value",
    code: "INVALID_FORMAT",
    message: e.message,
  }));
}

/** Parse raw input into criteria, or the shape issues. */
export function parseSearchInput(raw: unknown): { ok: true; criteria: SearchCriteria } | { ok: false; issues: ValidationIssue[] } {
  const parsed = SearchQuerySchema.safeParse(raw ?? {});
  if (!parsed.success) return { ok: false, issues: toValidationIssues(parsed.error) };
  return { ok: true, criteria: toSearchCriteria(parsed.data) };
}
