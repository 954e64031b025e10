import type { CalendarDay, CompletionRecord, TrackablePrayerId } from "../types";
import { TRACKABLE_PRAYER_IDS } from "../types";
import { CompletionTracker } from "./completionTracker";
import timezoneService from "../utils/timezone";

export type TrendDirection = "improving" | "declining" | "stable";

export interface DailyCompletion {
  date: CalendarDay;
  completed: TrackablePrayerId[];
  /** Share of the five prayers completed that day, 0..1. */
  rate: number;
}

export interface PrayerAnalyticsReport {
  from: CalendarDay;
  to: CalendarDay;
  days: number;
  totalCompleted: number;
  completionRate: number;
  perPrayer: Record<TrackablePrayerId, { completed: number; rate: number }>;
  daily: DailyCompletion[];
  trend: { slope: number; direction: TrendDirection };
  consistencyScore: number;
  allPrayersStreak: number;
}

const TREND_THRESHOLD = 0.001;
const HIGH_DAY_RATE = 0.8;

/** Least-squares slope of `values` against their index. */
export function trendSlope(values: number[]): number {
  const n = values.length;
  if (n < 2) return 0;
  const meanX = (n - 1) / 2;
  const meanY = values.reduce((sum, v) => sum + v, 0) / n;
  let numerator = 0;
  let denominator = 0;
  values.forEach((y, x) => {
    numerator += (x - meanX) * (y - meanY);
    denominator += (x - meanX) ** 2;
  });
  return denominator === 0 ? 0 : numerator / denominator;
}

export function trendDirection(slope: number): TrendDirection {
  if (slope > TREND_THRESHOLD) return "improving";
  if (slope < -TREND_THRESHOLD) return "declining";
  return "stable";
}

/**
 * 0..100. Mostly the average daily rate, nudged by the trend and by the
 * share of days with at least four of five prayers.
 */
export function consistencyScore(daily: DailyCompletion[], direction: TrendDirection): number {
  if (daily.length === 0) return 0;
  const average = daily.reduce((sum, day) => sum + day.rate, 0) / daily.length;
  const highDays = daily.filter((day) => day.rate >= HIGH_DAY_RATE).length / daily.length;
  const trendBonus = direction === "improving" ? 20 : direction === "declining" ? -10 : 0;
  const score = Math.round(average * 60) + trendBonus + Math.round(highDays * 20);
  return Math.max(0, Math.min(100, score));
}

/**
 * Consecutive days with all five prayers completed, ending on `to` or the
 * day before it (today may still be in progress).
 */
export function allPrayersStreak(daily: DailyCompletion[]): number {
  const full = (day: DailyCompletion) => day.completed.length === TRACKABLE_PRAYER_IDS.length;
  let index = daily.length - 1;
  if (index >= 0 && !full(daily[index])) index--;
  let streak = 0;
  while (index >= 0 && full(daily[index])) {
    streak++;
    index--;
  }
  return streak;
}

export function analyzeCompletions(
  records: CompletionRecord[],
  from: CalendarDay,
  to: CalendarDay
): PrayerAnalyticsReport {
  const dayCount = timezoneService.diffInDays(from, to) + 1;
  const completedByDay = new Map<CalendarDay, Set<TrackablePrayerId>>();
  for (const record of records) {
    if (record.date < from || record.date > to) continue;
    const set = completedByDay.get(record.date) ?? new Set<TrackablePrayerId>();
    if (record.completed) set.add(record.prayerId);
    else set.delete(record.prayerId);
    completedByDay.set(record.date, set);
  }

  const daily: DailyCompletion[] = [];
  for (let i = 0; i < dayCount; i++) {
    const date = timezoneService.addDays(from, i);
    const set = completedByDay.get(date);
    const completed = TRACKABLE_PRAYER_IDS.filter((id) => set?.has(id) ?? false);
    daily.push({ date, completed, rate: completed.length / TRACKABLE_PRAYER_IDS.length });
  }

  const perPrayer = {
    fajr: { completed: 0, rate: 0 },
    dhuhr: { completed: 0, rate: 0 },
    asr: { completed: 0, rate: 0 },
    maghrib: { completed: 0, rate: 0 },
    isha: { completed: 0, rate: 0 },
  };
  for (const day of daily) {
    for (const id of day.completed) perPrayer[id].completed++;
  }
  for (const id of TRACKABLE_PRAYER_IDS) {
    perPrayer[id].rate = dayCount > 0 ? perPrayer[id].completed / dayCount : 0;
  }

  const totalCompleted = daily.reduce((sum, day) => sum + day.completed.length, 0);
  const slope = trendSlope(daily.map((day) => day.rate));
  const direction = trendDirection(slope);

  return {
    from,
    to,
    days: dayCount,
    totalCompleted,
    completionRate: dayCount > 0 ? totalCompleted / (dayCount * TRACKABLE_PRAYER_IDS.length) : 0,
    perPrayer,
    daily,
    trend: { slope, direction },
    consistencyScore: consistencyScore(daily, direction),
    allPrayersStreak: allPrayersStreak(daily),
  };
}

export class PrayerAnalytics {
  constructor(private readonly tracker: CompletionTracker) {}

  async report(days = 30): Promise<PrayerAnalyticsReport> {
    const { from, to, records } = await this.tracker.getRecentRecords(days);
    return analyzeCompletions(records, from, to);
  }
}
