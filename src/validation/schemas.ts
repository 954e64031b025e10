import { z } from "zod";
import { PRAYER_IDS, TRACKABLE_PRAYER_IDS } from "../types";

export const CalendarDaySchema = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, "Must be YYYY-MM-DD");

export const PrayerIdSchema = z.enum(PRAYER_IDS);

export const TrackablePrayerIdSchema = z.enum(TRACKABLE_PRAYER_IDS);

const IsoDateSchema = z
  .string()
  .datetime({ offset: true })
  .transform((value) => new Date(value));

function perPrayer<T extends z.ZodTypeAny>(value: T) {
  return z.object({
    fajr: value,
    sunrise: value,
    dhuhr: value,
    asr: value,
    maghrib: value,
    isha: value,
  });
}

export const OffsetMinutesSchema = z.number().int().min(-30).max(30);

export const PermissionStatusSchema = z.enum([
  "notDetermined",
  "granted",
  "denied",
  "restricted",
]);

export const TimeFormatSchema = z.enum(["12h", "24h"]);

export const DhikrIntervalSchema = z.number().int().min(1).max(24);

export const SettingsSchema = z.object({
  calculationMethod: z.string().min(1),
  legalSchool: z.string().min(1),
  offsets: perPrayer(z.number().int()),
  notifications: perPrayer(z.boolean()),
  dhikrRemindersEnabled: z.boolean(),
  dhikrReminderIntervalHours: DhikrIntervalSchema,
  adhanSound: z.string().min(1),
  timeFormat: TimeFormatSchema,
  permissionStatus: PermissionStatusSchema,
});

const PrayerSlotSchema = z.discriminatedUnion("ok", [
  z.object({ ok: z.literal(true), time: IsoDateSchema }),
  z.object({ ok: z.literal(false), reason: z.string() }),
]);

const HijriDateSchema = z.object({
  day: z.number().int(),
  month: z.number().int(),
  year: z.number().int(),
  monthName: z.string(),
});

export const DailyTimesSchema = z.object({
  date: CalendarDaySchema,
  slots: perPrayer(PrayerSlotSchema),
  hijri: HijriDateSchema.nullable(),
});

export const CacheEntrySchema = z.object({
  prayerTimes: DailyTimesSchema,
  latitude: z.number(),
  longitude: z.number(),
  method: z.string(),
  legalSchool: z.string(),
  cachedAt: IsoDateSchema,
  expiresAt: IsoDateSchema,
});

/** Body of PATCH /api/settings. Every field optional; unknown keys rejected. */
export const SettingsPatchSchema = z
  .object({
    calculationMethod: z.string().min(1),
    legalSchool: z.string().min(1),
    offsets: perPrayer(OffsetMinutesSchema).partial(),
    notifications: perPrayer(z.boolean()).partial(),
    dhikrRemindersEnabled: z.boolean(),
    dhikrReminderIntervalHours: DhikrIntervalSchema,
    adhanSound: z.string().min(1),
    timeFormat: TimeFormatSchema,
  })
  .partial()
  .strict();

export type SettingsPatch = z.infer<typeof SettingsPatchSchema>;

export const CompletionBodySchema = z.object({
  date: CalendarDaySchema.optional(),
});
