/**
 * Search service
 *
 * Orchestrates a flight search: plan (validate) → fingerprint → cache
 * (getOrCompute) → on miss: resolve outbound + return journeys → response.
 * Also carries the cache administration used on schedule changes.
 */

import type { Logger } from "pino";
import type { CacheCoordinator, CacheEntry, CacheStats, ComputedResult } from "../cache/cache.coordinator.js";
import { dateTag, fingerprintOf, tagsOf } from "../cache/fingerprint.js";
import { SearchValidationError } from "../errors.js";
import { eachDate } from "./dates.js";
import { buildSearchPlan, DEFAULT_VALIDATION_RULES, type ValidationRules } from "./search.plan.js";
import type { ConnectionResolver } from "./connection.resolver.js";
import type {
  DateRange,
  FlightLeg,
  IngestionStatus,
  Itinerary,
  Result,
  ScheduleStore,
  SearchCriteria,
  SearchPlan,
  SearchResponse,
  ValidationIssue,
} from "./types.js";

export interface SearchCoordinatorDeps {
  resolver: ConnectionResolver;
  cache: CacheCoordinator;
  store: ScheduleStore;
  logger: Logger;
  ingestion?: IngestionStatus;
  rules?: ValidationRules;
  /** TTL for results computed while ingestion was still running. */
  partialTtlMs?: number;
  now?: () => Date;
}

export interface SearchOptions {
  signal?: AbortSignal;
}

// ─── Public API ─────────────────────────────────────────────────────────────

export class SearchCoordinator {
  private readonly resolver: ConnectionResolver;
  private readonly cache: CacheCoordinator;
  private readonly store: ScheduleStore;
  private readonly ingestion?: IngestionStatus;
  private readonly rules: ValidationRules;
  private readonly partialTtlMs?: number;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(deps: SearchCoordinatorDeps) {
    this.resolver = deps.resolver;
    this.cache = deps.cache;
    this.store = deps.store;
    this.ingestion = deps.ingestion;
    this.rules = deps.rules ?? DEFAULT_VALIDATION_RULES;
    this.partialTtlMs = deps.partialTtlMs;
    this.logger = deps.logger.child({ component: "search" });
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * Run a search. Validation failures come back as `errors` on the response;
   * infrastructure failures reject with InfrastructureError.
   */
  async search(criteria: SearchCriteria, options: SearchOptions = {}): Promise<SearchResponse> {
    // 1. Plan (validates and normalizes)
    const planned = this.plan(criteria);
    if (!planned.ok) {
      this.logger.info({ issues: planned.error.length }, "search rejected");
      return {
        criteria,
        itineraries: [],
        returnItineraries: [],
        servedFromCache: false,
        complete: true,
        errors: planned.error,
      };
    }
    const plan = planned.value;

    // 2. Fingerprint + cache, at most one resolution per fingerprint
    const fingerprint = fingerprintOf(plan);
    const { entry, source } = await this.cache.getOrCompute(fingerprint, () => this.compute(plan), {
      signal: options.signal,
      tags: this.tags(plan),
    });

    this.logger.info(
      { fingerprint, source, itineraries: entry.itineraries.length, returnItineraries: entry.returnItineraries.length },
      "search served"
    );

    // 3. Response
    return {
      criteria,
      itineraries: entry.itineraries,
      returnItineraries: entry.returnItineraries,
      servedFromCache: source !== "computed",
      complete: entry.complete,
      computedAt: entry.computedAt,
      errors: [],
    };
  }

  /** Single flight by id; undefined when the store has no such flight. */
  async getFlight(flightId: string): Promise<FlightLeg | undefined> {
    return this.store.findLegById(flightId);
  }

  /** Drop the cached result for these criteria. */
  invalidate(criteria: SearchCriteria): Result<boolean, ValidationIssue[]> {
    const planned = this.plan(criteria);
    if (!planned.ok) return planned;
    return { ok: true, value: this.cache.invalidate(fingerprintOf(planned.value)) };
  }

  /** Recompute the result for these criteria now and swap it in. Throws SearchValidationError on bad criteria. */
  async refresh(criteria: SearchCriteria): Promise<CacheEntry> {
    const planned = this.plan(criteria);
    if (!planned.ok) throw new SearchValidationError(planned.error);
    const plan = planned.value;
    return this.cache.refresh(fingerprintOf(plan), () => this.compute(plan), this.tags(plan));
  }

  /**
   * Schedule data for `range` finished loading: every result that read one of
   * those days is dropped and recomputed on its next search.
   */
  onIngestionCompleted(range: DateRange): number {
    let invalidated = 0;
    for (const day of eachDate(range)) invalidated += this.cache.invalidateByTag(dateTag(day));
    this.logger.info({ range, invalidated }, "ingestion completed; cache entries invalidated");
    return invalidated;
  }

  cacheStats(): CacheStats {
    return this.cache.stats();
  }

  // ─── Internals ─────────────────────────────────────────────────────────────

  private plan(criteria: SearchCriteria): Result<SearchPlan, ValidationIssue[]> {
    return buildSearchPlan(criteria, this.rules, this.now());
  }

  private tags(plan: SearchPlan): string[] {
    return tagsOf(plan, (range) => this.resolver.readWindow(range, plan.maxConnections));
  }

  private async compute(plan: SearchPlan): Promise<ComputedResult> {
    const outboundRange = plan.outbound;
    const returnRange = plan.returnDate ? { start: plan.returnDate, end: plan.returnDate } : undefined;

    const [itineraries, returnItineraries] = await Promise.all([
      this.resolver.resolve(
        {
          origin: plan.origin,
          destination: plan.destination,
          dateRange: outboundRange,
          seatClass: plan.seatClass,
          airlines: plan.airlines,
        },
        plan.maxConnections
      ),
      returnRange
        ? this.resolver.resolve(
            {
              origin: plan.destination,
              destination: plan.origin,
              dateRange: returnRange,
              seatClass: plan.seatClass,
              airlines: plan.airlines,
            },
            plan.maxConnections
          )
        : Promise.resolve<Itinerary[]>([]),
    ]);

    const complete =
      (await this.isAuthoritative(itineraries, outboundRange, plan.maxConnections)) &&
      (returnRange === undefined || (await this.isAuthoritative(returnItineraries, returnRange, plan.maxConnections)));

    return {
      itineraries,
      returnItineraries,
      complete,
      ttlMs: complete ? undefined : this.partialTtlMs,
    };
  }

  /** An empty journey is only final once every day it read is fully ingested. */
  private async isAuthoritative(found: readonly Itinerary[], range: DateRange, maxConnections: number): Promise<boolean> {
    if (found.length > 0 || !this.ingestion) return true;
    return this.ingestion.isComplete(this.resolver.readWindow(range, maxConnections));
  }
}
