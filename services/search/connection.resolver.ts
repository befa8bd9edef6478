/**
 * Connection resolver: legs → connections → ranking.
 *
 * Returns [] when nothing satisfies the constraints. Store failures surface as
 * InfrastructureError and are never reported as "no flights".
 */

import type { Logger } from "pino";
import { extendRange, MS_PER_DAY, MS_PER_MINUTE } from "./dates.js";
import { connections, type ConnectionRules } from "./stages/connection.stage.js";
import { LegSource } from "./stages/legs.stage.js";
import { ranking } from "./stages/ranking.stage.js";
import type { DateRange, Itinerary, RouteQuery, ScheduleStore } from "./types.js";

export interface ResolverOptions extends ConnectionRules {
  defaultMaxConnections: number;
  maxItineraries: number;
  storeTimeoutMs: number;
}

export const DEFAULT_RESOLVER_OPTIONS: ResolverOptions = {
  minConnectionMinutes: 45,
  maxLayoverMinutes: 240,
  defaultMaxConnections: 1,
  maxItineraries: 100,
  storeTimeoutMs: 5_000,
};

export class ConnectionResolver {
  private readonly options: ResolverOptions;
  private readonly logger: Logger;

  constructor(
    private readonly store: ScheduleStore,
    logger: Logger,
    options: Partial<ResolverOptions> = {}
  ) {
    this.options = { ...DEFAULT_RESOLVER_OPTIONS, ...options };
    this.logger = logger.child({ component: "resolver" });
  }

  /**
   * Days of schedule data a resolution reads: the search range plus the days a
   * connecting leg may still leave on after the last search day.
   */
  readWindow(range: DateRange, maxConnections: number = this.options.defaultMaxConnections): DateRange {
    if (maxConnections === 0) return range;
    const spillDays = Math.ceil((this.options.maxLayoverMinutes * MS_PER_MINUTE) / MS_PER_DAY) + 1;
    return extendRange(range, spillDays);
  }

  /** Direct and connecting itineraries for one journey, ordered per compareItineraries. */
  async resolve(query: RouteQuery, maxConnections: number = this.options.defaultMaxConnections): Promise<Itinerary[]> {
    const t0 = performance.now();

    const source = new LegSource(
      this.store,
      this.readWindow(query.dateRange, maxConnections),
      query.seatClass,
      this.options.storeTimeoutMs,
      query.airlines
    );

    const paths = await connections(query, maxConnections, source, this.options);
    const itineraries = ranking(paths, this.options.maxItineraries);

    this.logger.debug(
      {
        origin: query.origin,
        destination: query.destination,
        maxConnections,
        storeReads: source.reads,
        found: paths.length,
        returned: itineraries.length,
        durationMs: Math.round(performance.now() - t0),
      },
      "resolved itineraries"
    );
    return itineraries;
  }
}
