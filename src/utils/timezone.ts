import type { CalendarDay, HijriDate, TimeFormat } from "../types";
import logger from "./logger";

const DAY_MS = 24 * 60 * 60 * 1000;

export class TimezoneService {
  /**
   * Returns the calendar day (YYYY-MM-DD) of `at` in the given timezone.
   * Use this for "today" so the server's own zone never decides the date.
   */
  getDateInTimezone(timezone: string, at: Date = new Date()): CalendarDay {
    return at.toLocaleDateString("en-CA", { timeZone: timezone });
  }

  addDays(day: CalendarDay, days: number): CalendarDay {
    const base = this.toUtcMidnight(day);
    return new Date(base + days * DAY_MS).toISOString().slice(0, 10);
  }

  /** Whole days from `from` to `to` (negative when `to` is earlier). */
  diffInDays(from: CalendarDay, to: CalendarDay): number {
    return Math.round((this.toUtcMidnight(to) - this.toUtcMidnight(from)) / DAY_MS);
  }

  /** Local midnight of the calendar day in the process zone, as calculators expect it. */
  toLocalDate(day: CalendarDay): Date {
    const [year, month, date] = day.split("-").map(Number);
    return new Date(year, month - 1, date);
  }

  addMinutes(time: Date, minutes: number): Date {
    return new Date(time.getTime() + minutes * 60 * 1000);
  }

  /** Formats a time as "05:05" or "5:05 AM" in the given timezone. */
  formatTime(time: Date, timezone: string, format: TimeFormat = "24h"): string {
    return time.toLocaleTimeString(format === "24h" ? "en-GB" : "en-US", {
      timeZone: timezone,
      hour: "2-digit",
      minute: "2-digit",
      hour12: format === "12h",
    });
  }

  /**
   * Islamic (Umm al-Qura) calendar date for a calendar day, via ICU.
   * Returns null where the runtime lacks the calendar.
   */
  getHijriDate(day: CalendarDay): HijriDate | null {
    try {
      const noonUtc = new Date(this.toUtcMidnight(day) + DAY_MS / 2);
      const numeric = new Intl.DateTimeFormat("en-US-u-ca-islamic-umalqura", {
        timeZone: "UTC",
        day: "numeric",
        month: "numeric",
        year: "numeric",
      }).formatToParts(noonUtc);
      const monthName = new Intl.DateTimeFormat("en-US-u-ca-islamic-umalqura", {
        timeZone: "UTC",
        month: "long",
      }).format(noonUtc);

      const part = (type: Intl.DateTimeFormatPartTypes): number =>
        parseInt(numeric.find((p) => p.type === type)?.value ?? "", 10);

      const hijri = {
        day: part("day"),
        month: part("month"),
        year: part("year"),
        monthName,
      };
      if ([hijri.day, hijri.month, hijri.year].some((n) => Number.isNaN(n))) {
        return null;
      }
      return hijri;
    } catch (error) {
      logger.warn("Error deriving Hijri date:", error);
      return null;
    }
  }

  private toUtcMidnight(day: CalendarDay): number {
    const [year, month, date] = day.split("-").map(Number);
    return Date.UTC(year, month - 1, date);
  }
}

export default new TimezoneService();
