import { describe, it, expect, beforeEach } from "vitest";
import { ScheduleCache } from "../src/services/scheduleCache";
import { parseCacheEntry } from "../src/services/cacheEntry";
import { PrayerDataError } from "../src/errors";
import { FakeCalculator, FlakyStore, TestClock } from "./fakes";

const HOUR = 60 * 60 * 1000;
const DATE = "2026-03-10";
const MECCA = { latitude: 21.4225, longitude: 39.8262 };

describe("ScheduleCache", () => {
  let calculator: FakeCalculator;
  let store: FlakyStore;
  let clock: TestClock;
  let cache: ScheduleCache;

  beforeEach(() => {
    calculator = new FakeCalculator();
    store = new FlakyStore();
    clock = new TestClock(new Date("2026-03-10T03:00:00.000Z"));
    cache = new ScheduleCache({ calculator, store, ttlMs: 24 * HOUR, now: clock.now });
  });

  it("computes on a miss and serves the stored entry afterwards", async () => {
    const first = await cache.getOrCompute(DATE, MECCA, "MuslimWorldLeague", "shafi");
    const second = await cache.getOrCompute(DATE, MECCA, "MuslimWorldLeague", "shafi");

    expect(calculator.calls).toHaveLength(1);
    expect(second).toEqual(first);
    const stored = await store.get("prayer_times:2026-03-10");
    expect(stored).not.toBeNull();
  });

  it("calls the calculator once for concurrent identical requests", async () => {
    await Promise.all([
      cache.getOrCompute(DATE, MECCA, "MuslimWorldLeague", "shafi"),
      cache.getOrCompute(DATE, MECCA, "MuslimWorldLeague", "shafi"),
      cache.getOrCompute(DATE, MECCA, "MuslimWorldLeague", "shafi"),
    ]);
    expect(calculator.calls).toHaveLength(1);
  });

  it("recomputes when the request no longer matches", async () => {
    await cache.getOrCompute(DATE, MECCA, "MuslimWorldLeague", "shafi");
    await cache.getOrCompute(DATE, { latitude: 21.4225, longitude: 39.9 }, "MuslimWorldLeague", "shafi");
    await cache.getOrCompute(DATE, { latitude: 21.4225, longitude: 39.9 }, "MuslimWorldLeague", "hanafi");

    expect(calculator.calls.map((c) => c.legalSchool)).toEqual(["shafi", "shafi", "hanafi"]);
    const entry = await cache.getCachedEntry(DATE);
    expect(entry?.legalSchool).toBe("hanafi");
    expect(entry?.longitude).toBe(39.9);
  });

  it("recomputes once the entry has expired", async () => {
    await cache.getOrCompute(DATE, MECCA, "MuslimWorldLeague", "shafi");
    clock.advance(24 * HOUR);
    await cache.getOrCompute(DATE, MECCA, "MuslimWorldLeague", "shafi");

    expect(calculator.calls).toHaveLength(2);
    const entry = await cache.getCachedEntry(DATE);
    expect(entry?.cachedAt.toISOString()).toBe("2026-03-11T03:00:00.000Z");
  });

  it("keeps one entry per calendar day", async () => {
    await cache.getOrCompute(DATE, MECCA, "MuslimWorldLeague", "shafi");
    await cache.getOrCompute("2026-03-11", MECCA, "MuslimWorldLeague", "shafi");
    await cache.getOrCompute(DATE, MECCA, "MuslimWorldLeague", "shafi");

    expect(calculator.calls.map((c) => c.date)).toEqual(["2026-03-10", "2026-03-11"]);
  });

  it("treats a malformed stored entry as a miss and overwrites it", async () => {
    await store.set("prayer_times:2026-03-10", "{broken");

    await cache.getOrCompute(DATE, MECCA, "MuslimWorldLeague", "shafi");

    expect(calculator.calls).toHaveLength(1);
    const raw = await store.get("prayer_times:2026-03-10");
    expect(raw === null ? null : parseCacheEntry(raw)?.method).toBe("MuslimWorldLeague");
  });

  it("wraps calculator failures and leaves the store untouched", async () => {
    calculator.failWith = new Error("ephemeris unavailable");

    await expect(cache.getOrCompute(DATE, MECCA, "MuslimWorldLeague", "shafi")).rejects.toBeInstanceOf(
      PrayerDataError
    );
    expect(await store.get("prayer_times:2026-03-10")).toBeNull();
  });

  it("still answers when the store cannot be read", async () => {
    store.failGets = true;
    const times = await cache.getOrCompute(DATE, MECCA, "MuslimWorldLeague", "shafi");
    expect(times.date).toBe(DATE);
  });

  it("invalidate forces the next request to recompute", async () => {
    await cache.getOrCompute(DATE, MECCA, "MuslimWorldLeague", "shafi");
    await cache.invalidate(DATE);
    await cache.getOrCompute(DATE, MECCA, "MuslimWorldLeague", "shafi");
    expect(calculator.calls).toHaveLength(2);
  });
});
