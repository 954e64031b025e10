import type {
  CalendarDay,
  CompletionRecord,
  PrayerId,
  PrayerSlot,
  Streak,
  TrackablePrayerId,
} from "../types";
import { TrackablePrayerIdSchema } from "../validation/schemas";
import { config } from "../config";
import type { CompletionRepository } from "./completionRepository";
import timezoneService from "../utils/timezone";
import logger from "../utils/logger";

/** Resolves the calculated time of a prayer on a day. */
export type PrayerTimeLookup = (prayerId: PrayerId, date: CalendarDay) => Promise<PrayerSlot>;

export type MarkResult =
  | { ok: true; record: CompletionRecord }
  | { ok: false; reason: "not_yet_due"; scheduledAt: Date }
  | { ok: false; reason: "time_unavailable" }
  | { ok: false; reason: "not_trackable" };

export interface CompletionTrackerOptions {
  repository: CompletionRepository;
  prayerTimeLookup: PrayerTimeLookup;
  timezone?: string;
  now?: () => Date;
}

/** Latest record per day, oldest first. */
function byDay(records: CompletionRecord[]): CompletionRecord[] {
  const latest = new Map<CalendarDay, CompletionRecord>();
  for (const record of records) latest.set(record.date, record);
  return [...latest.values()].sort((a, b) => a.date.localeCompare(b.date));
}

/**
 * Streak over one prayer's records. `current` counts back from the newest
 * record while days are consecutive and completed; `longest` is the best
 * such run anywhere. With `asOf`, a current run that ended before yesterday
 * no longer counts.
 */
export function computeStreak(
  prayerId: TrackablePrayerId,
  records: CompletionRecord[],
  asOf?: CalendarDay
): Streak {
  const days = byDay(records.filter((record) => record.prayerId === prayerId));
  if (days.length === 0) return { current: 0, longest: 0 };

  let current = 0;
  for (let i = days.length - 1; i >= 0; i--) {
    const day = days[i];
    if (!day.completed) break;
    if (i < days.length - 1 && timezoneService.diffInDays(day.date, days[i + 1].date) !== 1) {
      break;
    }
    current++;
  }
  if (asOf !== undefined && current > 0) {
    const newest = days[days.length - 1].date;
    if (timezoneService.diffInDays(newest, asOf) > 1) current = 0;
  }

  let longest = 0;
  let run = 0;
  let previous: CalendarDay | null = null;
  for (const day of days) {
    if (!day.completed) {
      run = 0;
    } else if (previous !== null && run > 0 && timezoneService.diffInDays(previous, day.date) === 1) {
      run++;
    } else {
      run = 1;
    }
    previous = day.date;
    longest = Math.max(longest, run);
  }

  return { current, longest };
}

/** Per-day completion flags for the five daily prayers. */
export class CompletionTracker {
  private readonly repository: CompletionRepository;
  private readonly prayerTimeLookup: PrayerTimeLookup;
  private readonly timezone: string;
  private readonly now: () => Date;

  constructor(options: CompletionTrackerOptions) {
    this.repository = options.repository;
    this.prayerTimeLookup = options.prayerTimeLookup;
    this.timezone = options.timezone ?? config.timezone;
    this.now = options.now ?? (() => new Date());
  }

  today(): CalendarDay {
    return timezoneService.getDateInTimezone(this.timezone, this.now());
  }

  /** Refused while the prayer's time on that day has not yet arrived. */
  async markCompleted(prayerId: PrayerId, date: CalendarDay = this.today()): Promise<MarkResult> {
    const trackable = TrackablePrayerIdSchema.safeParse(prayerId);
    if (!trackable.success) {
      return { ok: false, reason: "not_trackable" };
    }

    const slot = await this.prayerTimeLookup(prayerId, date);
    if (!slot.ok) {
      logger.warn(`Cannot mark ${prayerId} on ${date}: ${slot.reason}`);
      return { ok: false, reason: "time_unavailable" };
    }
    if (slot.time.getTime() > this.now().getTime()) {
      logger.info(`Refused to mark ${prayerId} on ${date} before its time`);
      return { ok: false, reason: "not_yet_due", scheduledAt: slot.time };
    }

    const record: CompletionRecord = { prayerId: trackable.data, date, completed: true };
    await this.repository.upsert(record);
    logger.info(`Marked ${prayerId} completed on ${date}`);
    return { ok: true, record };
  }

  /** Clears a completed entry. Returns false when there was nothing to clear. */
  async unmark(prayerId: TrackablePrayerId, date: CalendarDay = this.today()): Promise<boolean> {
    const existing = await this.repository.get(prayerId, date);
    if (!existing?.completed) return false;
    await this.repository.upsert({ prayerId, date, completed: false });
    logger.info(`Unmarked ${prayerId} on ${date}`);
    return true;
  }

  async isCompletedToday(prayerId: TrackablePrayerId): Promise<boolean> {
    const record = await this.repository.get(prayerId, this.today());
    return record?.completed ?? false;
  }

  async getStreak(prayerId: TrackablePrayerId): Promise<Streak> {
    const records = await this.repository.listForPrayer(prayerId);
    return computeStreak(prayerId, records, this.today());
  }

  /** Records for the last `days` days up to and including today. */
  async getRecentRecords(days: number): Promise<{ from: CalendarDay; to: CalendarDay; records: CompletionRecord[] }> {
    const to = this.today();
    const from = timezoneService.addDays(to, -(days - 1));
    return { from, to, records: await this.repository.listRange(from, to) };
  }
}
