/** Day order, pre-dawn through night prayer. */
export const PRAYER_IDS = ["fajr", "sunrise", "dhuhr", "asr", "maghrib", "isha"] as const;

export type PrayerId = (typeof PRAYER_IDS)[number];

/** Sunrise marks the end of the Fajr window; it is never prayed or tracked. */
export const TRACKABLE_PRAYER_IDS = ["fajr", "dhuhr", "asr", "maghrib", "isha"] as const;

export type TrackablePrayerId = (typeof TRACKABLE_PRAYER_IDS)[number];

export const PRAYER_DISPLAY_NAMES: Record<PrayerId, string> = {
  fajr: "Fajr",
  sunrise: "Sunrise",
  dhuhr: "Dhuhr",
  asr: "Asr",
  maghrib: "Maghrib",
  isha: "Isha",
};

export const DHIKR_REMINDER_ID = "dhikr";

/** Fixed identifier space used for cancel/reschedule idempotency. */
export type ReminderId = PrayerId | typeof DHIKR_REMINDER_ID;

/** `YYYY-MM-DD` in the service's configured time zone. */
export type CalendarDay = string;

export interface Coordinates {
  latitude: number;
  longitude: number;
}

export type PrayerSlot =
  | { ok: true; time: Date }
  | { ok: false; reason: string };

export interface HijriDate {
  day: number;
  month: number;
  year: number;
  monthName: string;
}

export interface DailyTimes {
  date: CalendarDay;
  slots: Record<PrayerId, PrayerSlot>;
  hijri: HijriDate | null;
}

export interface CacheEntry {
  prayerTimes: DailyTimes;
  latitude: number;
  longitude: number;
  method: string;
  legalSchool: string;
  cachedAt: Date;
  expiresAt: Date;
}

export type NotificationPermissionStatus =
  | "notDetermined"
  | "granted"
  | "denied"
  | "restricted";

export type TimeFormat = "12h" | "24h";

export interface Settings {
  calculationMethod: string;
  legalSchool: string;
  /** Minutes added to each calculated time before its reminder is armed (±30 by convention). */
  offsets: Record<PrayerId, number>;
  notifications: Record<PrayerId, boolean>;
  dhikrRemindersEnabled: boolean;
  dhikrReminderIntervalHours: number;
  adhanSound: string;
  timeFormat: TimeFormat;
  permissionStatus: NotificationPermissionStatus;
}

export interface CompletionRecord {
  prayerId: TrackablePrayerId;
  date: CalendarDay;
  completed: boolean;
}

export interface Streak {
  current: number;
  longest: number;
}

export type SoundCategory = "adhan" | "default";

export interface ReminderRequest {
  id: ReminderId;
  title: string;
  body: string;
  fireAt: Date;
  sound: SoundCategory;
  /** Audio file for adhan reminders. */
  soundFile?: string;
  payload?: ReminderPayload;
}

export type ReminderPayload =
  | { type: "prayer"; prayerId: PrayerId }
  | { type: "dhikr"; intervalHours: number; phraseIndex: number };

export interface DeliveredReminder {
  id: ReminderId;
  deliveredAt: Date;
  /** False when the sink fired but the transport rejected the message. */
  succeeded: boolean;
  payload?: ReminderPayload;
}

export interface PrayerState {
  currentPrayer: PrayerId | null;
  nextPrayer: PrayerId | null;
  nextPrayerTime: Date | null;
  nextIsTomorrow: boolean;
}
