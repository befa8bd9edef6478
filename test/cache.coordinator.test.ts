import { describe, expect, it, vi } from "vitest";
import { CacheCoordinator, CacheEntryState, type ComputedResult } from "../services/cache/cache.coordinator.js";
import { SearchAbortedError } from "../services/errors.js";
import { toItinerary } from "../services/search/stages/ranking.stage.js";
import { deferred, leg, silentLogger } from "./support/fakes.js";

const RESULT: ComputedResult = {
  itineraries: [toItinerary([leg({ id: "D1", from: "JFK", to: "LAX", dep: "2024-06-01T08:00:00Z", arr: "2024-06-01T11:00:00Z" })])],
  returnItineraries: [],
  complete: true,
};

function coordinator(overrides: { ttlMs?: number; maxEntries?: number; now?: () => number } = {}) {
  return new CacheCoordinator({ ttlMs: 60_000, maxEntries: 100, logger: silentLogger, ...overrides });
}

describe("CacheCoordinator", () => {
  it("runs one computation for concurrent callers and hands them the same entry", async () => {
    const cache = coordinator();
    const pending = deferred<ComputedResult>();
    const compute = vi.fn(() => pending.promise);

    const calls = [cache.getOrCompute("fp", compute), cache.getOrCompute("fp", compute), cache.getOrCompute("fp", compute)];
    pending.resolve(RESULT);
    const results = await Promise.all(calls);

    expect(compute).toHaveBeenCalledTimes(1);
    expect(results.map((r) => r.source)).toEqual(["computed", "shared", "shared"]);
    expect(results[1].entry).toBe(results[0].entry);
    expect(results[2].entry).toBe(results[0].entry);
    expect(Object.isFrozen(results[0].entry)).toBe(true);
    expect(cache.stats()).toEqual({ size: 1, inflight: 0, hits: 2, misses: 1 });
  });

  it("serves a fresh entry without computing again", async () => {
    const cache = coordinator();
    const compute = vi.fn(async () => RESULT);

    const first = await cache.getOrCompute("fp", compute);
    const second = await cache.getOrCompute("fp", compute);

    expect(compute).toHaveBeenCalledTimes(1);
    expect(second.source).toBe("cache");
    expect(second.entry).toBe(first.entry);
  });

  it("treats an entry as gone once its TTL has passed", async () => {
    let now = 0;
    const cache = coordinator({ ttlMs: 1_000, now: () => now });
    const compute = vi.fn(async () => RESULT);

    const { entry } = await cache.getOrCompute("fp", compute);
    expect(entry.expiresAt.getTime()).toBe(1_000);

    now = 999;
    expect(cache.lookup("fp")).toBe(entry);
    now = 1_000;
    expect(cache.lookup("fp")).toBeUndefined();
    expect((await cache.getOrCompute("fp", compute)).source).toBe("computed");
    expect(compute).toHaveBeenCalledTimes(2);
  });

  it("uses the TTL a computation asks for", async () => {
    let now = 5_000;
    const cache = coordinator({ now: () => now });
    const { entry } = await cache.getOrCompute("fp", async () => ({ ...RESULT, complete: false, ttlMs: 250 }));
    expect(entry.complete).toBe(false);
    expect(entry.expiresAt.getTime()).toBe(5_250);
    now = 5_250;
    expect(cache.lookup("fp")).toBeUndefined();
  });

  it("evicts the least recently used entry beyond capacity", async () => {
    const cache = coordinator({ maxEntries: 2 });
    const compute = async () => RESULT;

    await cache.getOrCompute("a", compute);
    await cache.getOrCompute("b", compute);
    await cache.getOrCompute("a", compute);
    await cache.getOrCompute("c", compute);

    expect(cache.lookup("a")).toBeDefined();
    expect(cache.lookup("b")).toBeUndefined();
    expect(cache.lookup("c")).toBeDefined();
  });

  it("forgets an entry once invalidated", async () => {
    const cache = coordinator();
    await cache.getOrCompute("fp", async () => RESULT);

    expect(cache.invalidate("fp")).toBe(true);
    expect(cache.lookup("fp")).toBeUndefined();
    expect(cache.invalidate("fp")).toBe(false);
  });

  it("does not cache failures and rejects every waiter", async () => {
    const cache = coordinator();
    const pending = deferred<ComputedResult>();
    const failure = new Error("store down");

    const first = cache.getOrCompute("fp", () => pending.promise);
    const second = cache.getOrCompute("fp", () => pending.promise);
    pending.reject(failure);

    const settled = await Promise.allSettled([first, second]);
    expect(settled).toEqual([
      { status: "rejected", reason: failure },
      { status: "rejected", reason: failure },
    ]);
    expect(cache.lookup("fp")).toBeUndefined();
    expect(cache.stats().inflight).toBe(0);
    expect((await cache.getOrCompute("fp", async () => RESULT)).source).toBe("computed");
  });

  it("settles a synchronous throw from the compute function like a rejection", async () => {
    const cache = coordinator();
    const compute = (): Promise<ComputedResult> => {
      throw new Error("boom");
    };
    await expect(cache.getOrCompute("fp", compute)).rejects.toThrow("boom");
    expect(cache.stats().inflight).toBe(0);
  });

  it("reports a pending snapshot while only a computation is in flight", async () => {
    const cache = coordinator();
    const pending = deferred<ComputedResult>();
    const call = cache.getOrCompute("fp", () => pending.promise, { tags: ["date:2024-06-01"] });

    const snapshot = cache.lookup("fp");
    expect(snapshot?.state).toBe(CacheEntryState.PENDING);
    expect(snapshot?.itineraries).toEqual([]);
    expect(snapshot?.tags).toEqual(["date:2024-06-01"]);

    pending.resolve(RESULT);
    expect((await call).entry.state).toBe(CacheEntryState.READY);
  });

  it("delivers but does not store a result invalidated while in flight", async () => {
    const cache = coordinator();
    const pending = deferred<ComputedResult>();
    const call = cache.getOrCompute("fp", () => pending.promise);

    expect(cache.invalidate("fp")).toBe(true);
    pending.resolve(RESULT);

    expect((await call).entry.itineraries).toHaveLength(1);
    expect(cache.lookup("fp")).toBeUndefined();
  });

  it("keeps serving the old entry until a refresh replaces it", async () => {
    const cache = coordinator();
    const { entry: old } = await cache.getOrCompute("fp", async () => RESULT);

    const pending = deferred<ComputedResult>();
    const refreshing = cache.refresh("fp", () => pending.promise);
    expect(cache.lookup("fp")).toBe(old);

    pending.resolve({ ...RESULT, itineraries: [] });
    const fresh = await refreshing;

    expect(fresh).not.toBe(old);
    expect(cache.lookup("fp")).toBe(fresh);
    expect(fresh.itineraries).toEqual([]);
  });

  it("attaches a refresh to a computation already in flight", async () => {
    const cache = coordinator();
    const pending = deferred<ComputedResult>();
    const call = cache.getOrCompute("fp", () => pending.promise);
    const second = vi.fn(async () => RESULT);

    const refreshing = cache.refresh("fp", second);
    pending.resolve(RESULT);

    expect(await refreshing).toBe((await call).entry);
    expect(second).not.toHaveBeenCalled();
  });

  it("invalidates ready and in-flight entries by tag", async () => {
    const cache = coordinator();
    await cache.getOrCompute("a", async () => RESULT, { tags: ["date:2024-06-01", "date:2024-06-02"] });
    await cache.getOrCompute("b", async () => RESULT, { tags: ["date:2024-06-03"] });
    const pending = deferred<ComputedResult>();
    const call = cache.getOrCompute("c", () => pending.promise, { tags: ["date:2024-06-02"] });

    expect(cache.invalidateByTag("date:2024-06-02")).toBe(2);
    pending.resolve(RESULT);
    await call;

    expect(cache.lookup("a")).toBeUndefined();
    expect(cache.lookup("b")).toBeDefined();
    expect(cache.lookup("c")).toBeUndefined();
    expect(cache.invalidateByTag("date:2024-06-09")).toBe(0);
  });

  it("lets an aborted caller stop waiting without cancelling the computation", async () => {
    const cache = coordinator();
    const pending = deferred<ComputedResult>();
    const controller = new AbortController();

    const abandoned = cache.getOrCompute("fp", () => pending.promise, { signal: controller.signal });
    const patient = cache.getOrCompute("fp", () => pending.promise);
    controller.abort();

    await expect(abandoned).rejects.toBeInstanceOf(SearchAbortedError);
    pending.resolve(RESULT);
    expect((await patient).source).toBe("shared");
    expect(cache.lookup("fp")?.state).toBe(CacheEntryState.READY);
  });

  it("clears everything", async () => {
    const cache = coordinator();
    await cache.getOrCompute("a", async () => RESULT);
    cache.clear();
    expect(cache.lookup("a")).toBeUndefined();
    expect(cache.stats().size).toBe(0);
  });
});
