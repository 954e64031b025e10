import type { DailyTimes, PrayerId } from "../types";
import { PRAYER_IDS } from "../types";

export interface TimedPrayer {
  prayerId: PrayerId;
  time: Date;
}

export type NextPrayerResult =
  | { kind: "today"; prayerId: PrayerId; time: Date }
  /** Every available time has passed; look at tomorrow. */
  | { kind: "allPassed" }
  /** No slot of the day could be computed. */
  | { kind: "unavailable" };

/** Slots that carry a time, in day order. */
export function availableTimes(times: DailyTimes): TimedPrayer[] {
  const result: TimedPrayer[] = [];
  for (const prayerId of PRAYER_IDS) {
    const slot = times.slots[prayerId];
    if (slot.ok) result.push({ prayerId, time: slot.time });
  }
  return result;
}

export function findNextPrayer(times: DailyTimes, now: Date): NextPrayerResult {
  const available = availableTimes(times);
  if (available.length === 0) return { kind: "unavailable" };
  const next = available.find(({ time }) => time.getTime() > now.getTime());
  return next ? { kind: "today", ...next } : { kind: "allPassed" };
}

/** Most recent prayer whose time has arrived, or null before the first one. */
export function findCurrentPrayer(times: DailyTimes, now: Date): PrayerId | null {
  let current: PrayerId | null = null;
  for (const { prayerId, time } of availableTimes(times)) {
    if (time.getTime() <= now.getTime()) current = prayerId;
  }
  return current;
}

/** First available slot of a day, used when today's have all passed. */
export function firstPrayer(times: DailyTimes): TimedPrayer | null {
  return availableTimes(times)[0] ?? null;
}
