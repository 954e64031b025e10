import { describe, it, expect } from "vitest";
import {
  PrayerAnalytics,
  allPrayersStreak,
  analyzeCompletions,
  consistencyScore,
  trendDirection,
  trendSlope,
} from "../src/services/prayerAnalytics";
import { CompletionTracker } from "../src/services/completionTracker";
import { InMemoryCompletionRepository } from "../src/services/completionRepository";
import type { CompletionRecord, TrackablePrayerId } from "../src/types";
import { TRACKABLE_PRAYER_IDS } from "../src/types";
import { TestClock } from "./fakes";

function day(date: string, prayers: readonly TrackablePrayerId[]): CompletionRecord[] {
  return prayers.map((prayerId) => ({ prayerId, date, completed: true }));
}

describe("trend", () => {
  it("fits a least-squares slope", () => {
    expect(trendSlope([0, 0.5, 1])).toBeCloseTo(0.5);
    expect(trendSlope([0.4])).toBe(0);
  });

  it("classifies small slopes as stable", () => {
    expect(trendDirection(0.01)).toBe("improving");
    expect(trendDirection(-0.01)).toBe("declining");
    expect(trendDirection(0.0005)).toBe("stable");
  });
});

describe("analyzeCompletions", () => {
  const records = [
    ...day("2026-03-01", TRACKABLE_PRAYER_IDS),
    ...day("2026-03-02", ["fajr", "dhuhr"]),
    { prayerId: "asr" as const, date: "2026-03-03", completed: false },
  ];
  const report = analyzeCompletions(records, "2026-03-01", "2026-03-03");

  it("counts completions per prayer and overall", () => {
    expect(report.days).toBe(3);
    expect(report.totalCompleted).toBe(7);
    expect(report.completionRate).toBeCloseTo(7 / 15);
    expect(report.perPrayer.fajr).toEqual({ completed: 2, rate: 2 / 3 });
    expect(report.perPrayer.isha).toEqual({ completed: 1, rate: 1 / 3 });
  });

  it("builds one grid row per day, empty days included", () => {
    expect(report.daily.map((d) => [d.date, d.completed.length])).toEqual([
      ["2026-03-01", 5],
      ["2026-03-02", 2],
      ["2026-03-03", 0],
    ]);
  });

  it("detects a declining trend and scores consistency", () => {
    expect(report.trend.slope).toBeCloseTo(-0.5);
    expect(report.trend.direction).toBe("declining");
    // round(0.467 * 60) - 10 + round(1/3 * 20)
    expect(report.consistencyScore).toBe(25);
    expect(report.allPrayersStreak).toBe(0);
  });
});

describe("allPrayersStreak", () => {
  it("lets today be incomplete", () => {
    const report = analyzeCompletions(
      [
        ...day("2026-03-01", ["fajr"]),
        ...day("2026-03-02", TRACKABLE_PRAYER_IDS),
        ...day("2026-03-03", TRACKABLE_PRAYER_IDS),
        ...day("2026-03-04", ["fajr", "dhuhr"]),
      ],
      "2026-03-01",
      "2026-03-04"
    );
    expect(allPrayersStreak(report.daily)).toBe(2);
  });
});

describe("consistencyScore", () => {
  it("is capped at 100", () => {
    const daily = [
      { date: "2026-03-01", completed: [...TRACKABLE_PRAYER_IDS], rate: 1 },
      { date: "2026-03-02", completed: [...TRACKABLE_PRAYER_IDS], rate: 1 },
    ];
    expect(consistencyScore(daily, "improving")).toBe(100);
    expect(consistencyScore([], "stable")).toBe(0);
  });
});

describe("PrayerAnalytics", () => {
  it("reports over the requested number of days ending today", async () => {
    const repository = new InMemoryCompletionRepository(day("2026-03-09", ["fajr"]));
    const clock = new TestClock(new Date("2026-03-10T12:00:00.000Z"));
    const tracker = new CompletionTracker({
      repository,
      prayerTimeLookup: async () => ({ ok: false, reason: "unused" }),
      timezone: "UTC",
      now: clock.now,
    });

    const report = await new PrayerAnalytics(tracker).report(7);

    expect(report.from).toBe("2026-03-04");
    expect(report.to).toBe("2026-03-10");
    expect(report.totalCompleted).toBe(1);
  });
});
