import { describe, expect, it } from "vitest";
import { buildSearchPlan, DEFAULT_VALIDATION_RULES, SearchPlanErrorCode } from "../services/search/search.plan.js";
import type { SearchCriteria } from "../services/search/types.js";
import { TODAY } from "./support/fakes.js";

function criteria(overrides: Partial<SearchCriteria> = {}): SearchCriteria {
  return {
    origin: "JFK",
    destination: "LAX",
    dateRange: { start: "2024-06-01", end: "2024-06-01" },
    seatClass: "ECONOMY",
    isRoundTrip: false,
    ...overrides,
  };
}

function issuesOf(c: SearchCriteria) {
  const result = buildSearchPlan(c, DEFAULT_VALIDATION_RULES, TODAY);
  if (result.ok) throw new Error("expected validation to fail");
  return result.error;
}

describe("buildSearchPlan", () => {
  it("normalizes codes, seat class and airlines", () => {
    const result = buildSearchPlan(
      criteria({ origin: "jfk", destination: "klax", seatClass: "business", airlines: ["ua", "AA", "ua"] }),
      DEFAULT_VALIDATION_RULES,
      TODAY
    );
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.origin).toBe("JFK");
    expect(result.value.destination).toBe("KLAX");
    expect(result.value.seatClass).toBe("BUSINESS");
    expect(result.value.airlines).toEqual(["AA", "UA"]);
    expect(result.value.maxConnections).toBe(1);
    expect(Object.isFrozen(result.value)).toBe(true);
  });

  it("reports the same airport on destination", () => {
    expect(issuesOf(criteria({ destination: "jfk" }))).toEqual([
      { field: "destination", code: SearchPlanErrorCode.SAME_AIRPORTS, message: "origin and destination airports must differ" },
    ]);
  });

  it("requires a return date on a round trip", () => {
    expect(issuesOf(criteria({ isRoundTrip: true }))).toEqual([
      { field: "returnDate", code: SearchPlanErrorCode.MISSING_RETURN_DATE, message: "returnDate is required for a round trip" },
    ]);
  });

  it("rejects a return date before departure", () => {
    const issues = issuesOf(criteria({ isRoundTrip: true, returnDate: "2024-05-31" }));
    expect(issues.map((i) => i.code)).toEqual([SearchPlanErrorCode.RETURN_BEFORE_DEPARTURE]);
  });

  it("ignores a return date on a one-way search", () => {
    const result = buildSearchPlan(criteria({ returnDate: "2024-06-05" }), DEFAULT_VALIDATION_RULES, TODAY);
    expect(result.ok && result.value.returnDate).toBeUndefined();
  });

  it("rejects codes it would have to trim or correct", () => {
    const issues = issuesOf(criteria({ origin: " JFK", destination: "LA1" }));
    expect(issues.map((i) => [i.field, i.code])).toEqual([
      ["origin", SearchPlanErrorCode.INVALID_AIRPORT_CODE],
      ["destination", SearchPlanErrorCode.INVALID_AIRPORT_CODE],
    ]);
  });

  it("rejects dates that are not on the calendar", () => {
    const issues = issuesOf(criteria({ dateRange: { start: "2024-02-30", end: "2024-06-01" } }));
    expect(issues.map((i) => [i.field, i.code])).toEqual([["dateRange.start", SearchPlanErrorCode.INVALID_DATE]]);
  });

  it("allows yesterday but not the day before", () => {
    expect(buildSearchPlan(criteria({ dateRange: { start: "2024-05-19", end: "2024-05-19" } }), DEFAULT_VALIDATION_RULES, TODAY).ok).toBe(true);
    const issues = issuesOf(criteria({ dateRange: { start: "2024-05-18", end: "2024-05-18" } }));
    expect(issues.map((i) => [i.field, i.code])).toEqual([["dateRange.start", SearchPlanErrorCode.DATE_IN_PAST]]);
  });

  it("bounds how far ahead a search may start", () => {
    expect(buildSearchPlan(criteria({ dateRange: { start: "2025-05-20", end: "2025-05-20" } }), DEFAULT_VALIDATION_RULES, TODAY).ok).toBe(true);
    const issues = issuesOf(criteria({ dateRange: { start: "2025-05-21", end: "2025-05-21" } }));
    expect(issues.map((i) => i.code)).toEqual([SearchPlanErrorCode.DATE_TOO_FAR]);
  });

  it("rejects inverted and overly wide ranges", () => {
    expect(issuesOf(criteria({ dateRange: { start: "2024-06-02", end: "2024-06-01" } })).map((i) => [i.field, i.code])).toEqual([
      ["dateRange", SearchPlanErrorCode.INVERTED_DATE_RANGE],
    ]);
    expect(buildSearchPlan(criteria({ dateRange: { start: "2024-06-01", end: "2024-07-01" } }), DEFAULT_VALIDATION_RULES, TODAY).ok).toBe(true);
    expect(issuesOf(criteria({ dateRange: { start: "2024-06-01", end: "2024-07-02" } })).map((i) => i.code)).toEqual([
      SearchPlanErrorCode.DATE_RANGE_TOO_WIDE,
    ]);
  });

  it("validates seat class, connection count and airline codes", () => {
    const issues = issuesOf(criteria({ seatClass: "PREMIUM", maxConnections: 3, airlines: ["AA", "DELTA"] }));
    expect(issues.map((i) => [i.field, i.code])).toEqual([
      ["seatClass", SearchPlanErrorCode.INVALID_SEAT_CLASS],
      ["maxConnections", SearchPlanErrorCode.INVALID_MAX_CONNECTIONS],
      ["airlines", SearchPlanErrorCode.INVALID_AIRLINE_CODE],
    ]);
    expect(issuesOf(criteria({ maxConnections: 1.5 })).map((i) => i.code)).toEqual([SearchPlanErrorCode.INVALID_MAX_CONNECTIONS]);
  });

  it("collects every failure instead of stopping at the first", () => {
    const issues = issuesOf(criteria({ origin: "J", seatClass: "", isRoundTrip: true }));
    expect(issues.map((i) => i.field)).toEqual(["origin", "returnDate", "seatClass"]);
  });
});
