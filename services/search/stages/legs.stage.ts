import { InfrastructureError, SearchErrorCode } from "../../errors.js";
import type { AirportCode, DateRange, FlightLeg, ScheduleStore, SeatClass } from "../types.js";

/**
 * Legs stage: read departures from the schedule store for one resolution.
 * Reads are memoized per (origin, destination) so the search never asks twice
 * for the same airport. One bounded attempt per read; no retry here.
 */
export class LegSource {
  private readonly memo = new Map<string, Promise<FlightLeg[]>>();

  constructor(
    private readonly store: ScheduleStore,
    private readonly window: DateRange,
    private readonly seatClass: SeatClass,
    private readonly timeoutMs: number,
    private readonly airlines: readonly string[] = []
  ) {}

  /** Store reads issued so far. */
  get reads(): number {
    return this.memo.size;
  }

  departures(origin: AirportCode, destination?: AirportCode): Promise<FlightLeg[]> {
    const key = `${origin}>${destination ?? "*"}`;
    let pending = this.memo.get(key);
    if (!pending) {
      pending = this.read(origin, destination);
      this.memo.set(key, pending);
    }
    return pending;
  }

  private async read(origin: AirportCode, destination: AirportCode | undefined): Promise<FlightLeg[]> {
    const legs = await withTimeout(
      this.store.findLegs(origin, destination, this.window, this.seatClass),
      this.timeoutMs,
      `schedule store did not answer for ${origin} within ${this.timeoutMs}ms`
    );
    return legs.filter(
      (leg) =>
        (leg.seatAvailability[this.seatClass] ?? 0) > 0 &&
        leg.arrivalTime.getTime() > leg.departureTime.getTime() &&
        (this.airlines.length === 0 || this.airlines.includes(leg.airlineId.toUpperCase()))
    );
  }
}

/** Race a store read against a timer; both failures surface as InfrastructureError. */
export async function withTimeout<T>(promise: Promise<T>, timeoutMs: number, message: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new InfrastructureError(SearchErrorCode.SCHEDULE_TIMEOUT, message)), timeoutMs);
  });
  try {
    return await Promise.race([promise, timeout]);
  } catch (err) {
    if (err instanceof InfrastructureError) throw err;
    throw new InfrastructureError(
      SearchErrorCode.SCHEDULE_UNAVAILABLE,
      `schedule store read failed: ${err instanceof Error ? err.message : String(err)}`,
      { cause: err }
    );
  } finally {
    clearTimeout(timer);
  }
}
