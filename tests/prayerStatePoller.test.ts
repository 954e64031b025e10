import { describe, it, expect, beforeEach, vi } from "vitest";
import type { TickScheduler } from "../src/schedulers/prayerStatePoller";
import { PrayerStatePoller } from "../src/schedulers/prayerStatePoller";
import { ScheduleCache } from "../src/services/scheduleCache";
import { InMemoryKeyValueStore } from "../src/services/keyValueStore";
import { defaultSettings } from "../src/services/settingsStore";
import type { PrayerState } from "../src/types";
import { FakeCalculator, TestClock, fixedLocationService, unavailableTimes } from "./fakes";

describe("PrayerStatePoller", () => {
  let calculator: FakeCalculator;
  let clock: TestClock;
  let onTick: (() => void) | null;
  let stopTick: ReturnType<typeof vi.fn>;
  let poller: PrayerStatePoller;

  beforeEach(() => {
    calculator = new FakeCalculator();
    clock = new TestClock(new Date("2026-03-10T13:00:00.000Z"));
    onTick = null;
    stopTick = vi.fn();
    const scheduleTick: TickScheduler = (tick) => {
      onTick = tick;
      return { stop: stopTick };
    };
    poller = new PrayerStatePoller({
      scheduleCache: new ScheduleCache({
        calculator,
        store: new InMemoryKeyValueStore(),
        ttlMs: 24 * 60 * 60 * 1000,
        now: clock.now,
      }),
      locationService: fixedLocationService(),
      getSettings: defaultSettings,
      timezone: "UTC",
      now: clock.now,
      scheduleTick,
    });
  });

  it("derives the current and next prayer from today's times", async () => {
    await poller.refresh();
    expect(poller.state).toEqual({
      currentPrayer: "dhuhr",
      nextPrayer: "asr",
      nextPrayerTime: new Date("2026-03-10T15:30:00.000Z"),
      nextIsTomorrow: false,
    });
  });

  it("looks at tomorrow's Fajr once Isha has passed", async () => {
    clock.set(new Date("2026-03-10T21:00:00.000Z"));
    await poller.refresh();

    expect(poller.state).toEqual({
      currentPrayer: "isha",
      nextPrayer: "fajr",
      nextPrayerTime: new Date("2026-03-11T05:00:00.000Z"),
      nextIsTomorrow: true,
    });
    expect(calculator.calls.map((c) => c.date)).toEqual(["2026-03-10", "2026-03-11"]);
  });

  it("publishes nulls when no time of the day is available", async () => {
    calculator.produce = unavailableTimes;
    await poller.refresh();
    expect(poller.state).toEqual({
      currentPrayer: null,
      nextPrayer: null,
      nextPrayerTime: null,
      nextIsTomorrow: false,
    });
  });

  it("notifies listeners only when the state changes", async () => {
    const seen: PrayerState[] = [];
    poller.subscribe((state) => seen.push(state));

    await poller.refresh();
    await poller.refresh();
    expect(seen).toHaveLength(1);

    clock.set(new Date("2026-03-10T16:00:00.000Z"));
    await poller.refresh();
    expect(seen.map((s) => s.nextPrayer)).toEqual(["asr", "maghrib"]);
  });

  it("publishes nothing from a refresh that finishes after stop", async () => {
    const seen: PrayerState[] = [];
    poller.subscribe((state) => seen.push(state));

    poller.start();
    poller.stop();
    await poller.refresh();

    expect(seen).toEqual([]);
    expect(poller.state.nextPrayer).toBeNull();
    expect(stopTick).toHaveBeenCalledTimes(1);
  });

  it("shares a refresh that is still in flight", async () => {
    const first = poller.refresh();
    const second = poller.refresh();
    expect(second).toBe(first);
    await first;
    expect(calculator.calls).toHaveLength(1);
  });

  it("keeps the previous state when the calculator fails", async () => {
    await poller.refresh();
    clock.set(new Date("2026-03-11T13:00:00.000Z"));
    calculator.failWith = new Error("calculator down");

    await poller.refresh();
    expect(poller.state.nextPrayer).toBe("asr");
  });

  it("refreshes on start and on each tick, and stops the tick", async () => {
    poller.start();
    await vi.waitFor(() => expect(poller.state.nextPrayer).toBe("asr"));

    clock.set(new Date("2026-03-10T16:00:00.000Z"));
    onTick?.();
    await vi.waitFor(() => expect(poller.state.nextPrayer).toBe("maghrib"));

    poller.stop();
    expect(stopTick).toHaveBeenCalledTimes(1);
  });
});
