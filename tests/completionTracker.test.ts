import { describe, it, expect, beforeEach } from "vitest";
import { CompletionTracker, computeStreak } from "../src/services/completionTracker";
import { InMemoryCompletionRepository } from "../src/services/completionRepository";
import type { CompletionRecord, PrayerSlot } from "../src/types";
import { TestClock } from "./fakes";

const MINUTE = 60 * 1000;

function fajrRecords(flags: boolean[], start = 1): CompletionRecord[] {
  return flags.map((completed, i) => ({
    prayerId: "fajr",
    date: `2026-03-${String(start + i).padStart(2, "0")}`,
    completed,
  }));
}

describe("computeStreak", () => {
  it("counts back from the newest day and keeps the best run", () => {
    expect(computeStreak("fajr", fajrRecords([true, true, true, false, true]))).toEqual({
      current: 1,
      longest: 3,
    });
  });

  it("returns zeros for no records", () => {
    expect(computeStreak("fajr", [])).toEqual({ current: 0, longest: 0 });
  });

  it("treats a missing day as a break", () => {
    const records = [...fajrRecords([true, true]), ...fajrRecords([true], 4)];
    expect(computeStreak("fajr", records)).toEqual({ current: 1, longest: 2 });
  });

  it("has no current streak when the newest record is a miss", () => {
    expect(computeStreak("fajr", fajrRecords([true, true, false]))).toEqual({ current: 0, longest: 2 });
  });

  it("ignores other prayers", () => {
    const records: CompletionRecord[] = [
      ...fajrRecords([true, true]),
      { prayerId: "isha", date: "2026-03-03", completed: true },
    ];
    expect(computeStreak("fajr", records)).toEqual({ current: 2, longest: 2 });
  });

  it("drops a current streak that ended before yesterday", () => {
    const records = fajrRecords([true, true, true]);
    expect(computeStreak("fajr", records, "2026-03-04")).toEqual({ current: 3, longest: 3 });
    expect(computeStreak("fajr", records, "2026-03-05")).toEqual({ current: 0, longest: 3 });
  });
});

describe("CompletionTracker", () => {
  const fajrTime = new Date("2026-03-10T05:00:00.000Z");
  let clock: TestClock;
  let repository: InMemoryCompletionRepository;
  let slot: PrayerSlot;
  let tracker: CompletionTracker;

  beforeEach(() => {
    clock = new TestClock(new Date(fajrTime.getTime() - 120 * MINUTE));
    repository = new InMemoryCompletionRepository();
    slot = { ok: true, time: fajrTime };
    tracker = new CompletionTracker({
      repository,
      prayerTimeLookup: async () => slot,
      timezone: "UTC",
      now: clock.now,
    });
  });

  it("refuses to mark a prayer two hours before its time", async () => {
    const result = await tracker.markCompleted("fajr");
    expect(result).toEqual({ ok: false, reason: "not_yet_due", scheduledAt: fajrTime });
    expect(await tracker.isCompletedToday("fajr")).toBe(false);
  });

  it("marks a prayer one minute after its time", async () => {
    clock.set(new Date(fajrTime.getTime() + MINUTE));
    const result = await tracker.markCompleted("fajr");

    expect(result).toEqual({
      ok: true,
      record: { prayerId: "fajr", date: "2026-03-10", completed: true },
    });
    expect(await tracker.isCompletedToday("fajr")).toBe(true);
  });

  it("does not track sunrise", async () => {
    expect(await tracker.markCompleted("sunrise")).toEqual({ ok: false, reason: "not_trackable" });
  });

  it("refuses when the prayer time is unavailable", async () => {
    slot = { ok: false, reason: "polar night" };
    expect(await tracker.markCompleted("isha")).toEqual({ ok: false, reason: "time_unavailable" });
  });

  it("unmarks a completed prayer", async () => {
    clock.set(new Date(fajrTime.getTime() + MINUTE));
    await tracker.markCompleted("fajr");

    expect(await tracker.unmark("fajr")).toBe(true);
    expect(await tracker.isCompletedToday("fajr")).toBe(false);
    expect(await tracker.unmark("fajr")).toBe(false);
  });

  it("reports the streak as of today", async () => {
    clock.set(new Date("2026-03-04T12:00:00.000Z"));
    for (const record of fajrRecords([true, true, true])) await repository.upsert(record);
    expect(await tracker.getStreak("fajr")).toEqual({ current: 3, longest: 3 });
  });
});
