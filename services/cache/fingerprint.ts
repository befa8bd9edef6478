import { createHash } from "node:crypto";
import { eachDate } from "../search/dates.js";
import type { DateRange, SearchPlan } from "../search/types.js";

/** Bump when the canonical form changes so old keys stop matching. */
const FINGERPRINT_VERSION = "v1";

/**
 * Canonical text of a plan. Two criteria that differ only in code case, airline
 * order or a return date on a one-way search produce the same text.
 */
export function canonicalize(plan: SearchPlan): string {
  return [
    FINGERPRINT_VERSION,
    plan.origin.toUpperCase(),
    plan.destination.toUpperCase(),
    `${plan.outbound.start}/${plan.outbound.end}`,
    plan.seatClass,
    plan.isRoundTrip ? "RT" : "OW",
    plan.isRoundTrip ? (plan.returnDate ?? "") : "",
    String(plan.maxConnections),
    [...plan.airlines].sort().join(","),
  ].join("|");
}

/** SHA-256 hex digest of the canonical plan; used as the cache key. */
export function fingerprintOf(plan: SearchPlan): string {
  return createHash("sha256").update(canonicalize(plan)).digest("hex");
}

export function dateTag(date: string): string {
  return `date:${date}`;
}

/**
 * Tags for every schedule day a plan's result was built from. `readWindow` maps a
 * journey's departure days to the days actually read, spill days included.
 */
export function tagsOf(plan: SearchPlan, readWindow: (range: DateRange) => DateRange = (range) => range): string[] {
  const days = new Set(eachDate(readWindow(plan.outbound)));
  if (plan.isRoundTrip && plan.returnDate) {
    for (const day of eachDate(readWindow({ start: plan.returnDate, end: plan.returnDate }))) days.add(day);
  }
  return [...days].sort().map(dateTag);
}
