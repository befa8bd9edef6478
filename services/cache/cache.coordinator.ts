/**
 * Cache coordinator: fingerprint → itinerary result sets.
 *
 * - READY entries live in `entries`, a Map kept in least-recently-used order.
 * - Computations in flight live in `inflight`, one per fingerprint. They are not
 *   part of the LRU, so capacity eviction can never drop a PENDING entry.
 * - Entries handed to callers are frozen; replacing one is a single Map write.
 */

import type { Logger } from "pino";
import { SearchAbortedError } from "../errors.js";
import type { Itinerary } from "../search/types.js";

// ─── Types ──────────────────────────────────────────────────────────────────

export const CacheEntryState = {
  PENDING: "PENDING",
  READY: "READY",
} as const;

export type CacheEntryState = (typeof CacheEntryState)[keyof typeof CacheEntryState];

export interface CacheEntry {
  fingerprint: string;
  itineraries: readonly Itinerary[];
  returnItineraries: readonly Itinerary[];
  /** False when the result was computed while schedule data was still loading. */
  complete: boolean;
  computedAt: Date;
  expiresAt: Date;
  state: CacheEntryState;
  tags: readonly string[];
}

/** What a compute function hands back; the coordinator adds timing and state. */
export interface ComputedResult {
  itineraries: readonly Itinerary[];
  returnItineraries: readonly Itinerary[];
  complete: boolean;
  /** Overrides the default TTL for this entry. */
  ttlMs?: number;
}

export type ComputeFn = () => Promise<ComputedResult>;

/** `cache`: READY hit. `shared`: attached to another caller's computation. `computed`: ran computeFn. */
export type CacheSource = "cache" | "shared" | "computed";

export interface CacheLookup {
  entry: CacheEntry;
  source: CacheSource;
}

export interface CacheCoordinatorOptions {
  ttlMs: number;
  maxEntries: number;
  logger: Logger;
  now?: () => number;
}

export interface CacheStats {
  size: number;
  inflight: number;
  hits: number;
  misses: number;
}

interface InFlight {
  promise: Promise<CacheEntry>;
  startedAt: Date;
  tags: readonly string[];
  /** `discarded` is set by invalidate(); the result still reaches waiters but is not stored. */
  control: { discarded: boolean };
}

export interface ComputeOptions {
  signal?: AbortSignal;
  /** Labels stored with the entry, matched by invalidateByTag(). */
  tags?: readonly string[];
}

// ─── Helpers ────────────────────────────────────────────────────────────────

/** Wait for `promise` unless `signal` aborts first; abandoning never cancels the promise itself. */
function abandonable<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) return promise;
  if (signal.aborted) return Promise.reject(new SearchAbortedError());
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(new SearchAbortedError());
    signal.addEventListener("abort", onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(err);
      }
    );
  });
}

const EMPTY: readonly Itinerary[] = Object.freeze([]);

// ─── CacheCoordinator ───────────────────────────────────────────────────────

export class CacheCoordinator {
  private readonly entries = new Map<string, CacheEntry>();
  private readonly inflight = new Map<string, InFlight>();
  private readonly ttlMs: number;
  private readonly maxEntries: number;
  private readonly logger: Logger;
  private readonly now: () => number;
  private hits = 0;
  private misses = 0;

  constructor(options: CacheCoordinatorOptions) {
    this.ttlMs = options.ttlMs;
    this.maxEntries = options.maxEntries;
    this.logger = options.logger.child({ component: "cache" });
    this.now = options.now ?? Date.now;
  }

  // ─── Public API ──────────────────────────────────────────────────────────

  /**
   * READY entry if fresh, a PENDING snapshot (no itineraries) while only a
   * computation is in flight, otherwise undefined.
   */
  lookup(fingerprint: string): CacheEntry | undefined {
    const ready = this.readReady(fingerprint, false);
    if (ready) return ready;
    const flight = this.inflight.get(fingerprint);
    if (!flight) return undefined;
    return Object.freeze({
      fingerprint,
      itineraries: EMPTY,
      returnItineraries: EMPTY,
      complete: false,
      computedAt: flight.startedAt,
      expiresAt: flight.startedAt,
      state: CacheEntryState.PENDING,
      tags: flight.tags,
    });
  }

  /**
   * Serve a fresh entry, attach to the computation already running for this
   * fingerprint, or run `compute` once and store its result.
   */
  async getOrCompute(
    fingerprint: string,
    compute: ComputeFn,
    options: ComputeOptions = {}
  ): Promise<CacheLookup> {
    const ready = this.readReady(fingerprint, true);
    if (ready) {
      this.hits++;
      return { entry: ready, source: "cache" };
    }

    const existing = this.inflight.get(fingerprint);
    if (existing) {
      this.hits++;
      this.logger.debug({ fingerprint }, "joining in-flight computation");
      return { entry: await abandonable(existing.promise, options.signal), source: "shared" };
    }

    this.misses++;
    const flight = this.start(fingerprint, compute, options.tags ?? []);
    return { entry: await abandonable(flight.promise, options.signal), source: "computed" };
  }

  /**
   * Recompute regardless of freshness. The current entry keeps serving until the
   * new one replaces it. Attaches to a computation already in flight.
   */
  async refresh(fingerprint: string, compute: ComputeFn, tags: readonly string[] = []): Promise<CacheEntry> {
    const flight = this.inflight.get(fingerprint) ?? this.start(fingerprint, compute, tags);
    return flight.promise;
  }

  /** Drop the entry; a computation in flight finishes but its result is not stored. */
  invalidate(fingerprint: string): boolean {
    const removed = this.entries.delete(fingerprint);
    const flight = this.inflight.get(fingerprint);
    if (flight) {
      flight.control.discarded = true;
      this.inflight.delete(fingerprint);
    }
    if (removed || flight) {
      this.logger.info({ fingerprint, inflight: Boolean(flight) }, "cache entry invalidated");
    }
    return removed || Boolean(flight);
  }

  /** Invalidate every entry (READY or in flight) carrying `tag`. Returns how many were dropped. */
  invalidateByTag(tag: string): number {
    const matches = new Set<string>();
    for (const [fingerprint, entry] of this.entries) {
      if (entry.tags.includes(tag)) matches.add(fingerprint);
    }
    for (const [fingerprint, flight] of this.inflight) {
      if (flight.tags.includes(tag)) matches.add(fingerprint);
    }
    for (const fingerprint of matches) this.invalidate(fingerprint);
    return matches.size;
  }

  clear(): void {
    for (const flight of this.inflight.values()) flight.control.discarded = true;
    this.inflight.clear();
    this.entries.clear();
    this.logger.info("cache cleared");
  }

  stats(): CacheStats {
    return { size: this.entries.size, inflight: this.inflight.size, hits: this.hits, misses: this.misses };
  }

  // ─── Internals ───────────────────────────────────────────────────────────

  private readReady(fingerprint: string, touch: boolean): CacheEntry | undefined {
    const entry = this.entries.get(fingerprint);
    if (!entry) return undefined;
    if (entry.expiresAt.getTime() <= this.now()) {
      this.entries.delete(fingerprint);
      return undefined;
    }
    if (touch) {
      this.entries.delete(fingerprint);
      this.entries.set(fingerprint, entry);
    }
    return entry;
  }

  /**
   * Registers the in-flight record synchronously; `compute` runs on the next
   * microtask, so a synchronous throw still settles through the record.
   */
  private start(fingerprint: string, compute: ComputeFn, tags: readonly string[]): InFlight {
    const t0 = this.now();
    const control = { discarded: false };

    const promise = Promise.resolve()
      .then(() => compute())
      .then((result) => {
        const computedAt = this.now();
        const entry: CacheEntry = Object.freeze({
          fingerprint,
          itineraries: Object.freeze([...result.itineraries]),
          returnItineraries: Object.freeze([...result.returnItineraries]),
          complete: result.complete,
          computedAt: new Date(computedAt),
          expiresAt: new Date(computedAt + (result.ttlMs ?? this.ttlMs)),
          state: CacheEntryState.READY,
          tags: Object.freeze([...tags]),
        });
        if (!control.discarded) this.store(entry);
        this.logger.debug(
          { fingerprint, durationMs: computedAt - t0, discarded: control.discarded, count: entry.itineraries.length },
          "computation settled"
        );
        return entry;
      })
      .finally(() => {
        if (this.inflight.get(fingerprint)?.control === control) this.inflight.delete(fingerprint);
      });

    // Every waiter may have abandoned; keep the rejection observed.
    promise.catch((err: unknown) => {
      this.logger.warn({ fingerprint, err }, "computation failed; nothing cached");
    });

    const flight: InFlight = { promise, startedAt: new Date(t0), tags, control };
    this.inflight.set(fingerprint, flight);
    return flight;
  }

  private store(entry: CacheEntry): void {
    this.entries.delete(entry.fingerprint);
    this.entries.set(entry.fingerprint, entry);
    this.pruneExpired();
    while (this.entries.size > this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
      this.logger.debug({ fingerprint: oldest.value }, "evicted least recently used entry");
    }
  }

  private pruneExpired(): void {
    const now = this.now();
    for (const [fingerprint, entry] of this.entries) {
      if (entry.expiresAt.getTime() <= now) this.entries.delete(fingerprint);
    }
  }
}
