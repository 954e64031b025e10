import axios from "axios";
import { z } from "zod";
import type { CalendarDay, DailyTimes, HijriDate, PrayerSlot } from "../../types";
import { PrayerDataError } from "../../errors";
import logger from "../../utils/logger";
import type { CalculationMethodName, PrayerCalculator } from ".";
import { isCalculationMethod } from ".";

/** Method ids of the Aladhan `method` query parameter. */
const METHOD_IDS: Record<CalculationMethodName, number> = {
  Karachi: 1,
  NorthAmerica: 2,
  MuslimWorldLeague: 3,
  UmmAlQura: 4,
  Egyptian: 5,
  Tehran: 7,
  Kuwait: 9,
  Qatar: 10,
  Singapore: 11,
  Turkey: 13,
  MoonsightingCommittee: 15,
  Dubai: 16,
};

const TimingSchema = z.string().optional();

const TimingsResponseSchema = z.object({
  data: z.object({
    timings: z.object({
      Fajr: TimingSchema,
      Sunrise: TimingSchema,
      Dhuhr: TimingSchema,
      Asr: TimingSchema,
      Maghrib: TimingSchema,
      Isha: TimingSchema,
    }),
    date: z
      .object({
        hijri: z.object({
          day: z.string(),
          year: z.string(),
          month: z.object({ number: z.number(), en: z.string() }),
        }),
      })
      .optional(),
  }),
});

type TimingsResponse = z.infer<typeof TimingsResponseSchema>;

function toSlot(value: string | undefined): PrayerSlot {
  if (!value) return { ok: false, reason: "Missing from API response" };
  const time = new Date(value);
  return Number.isNaN(time.getTime())
    ? { ok: false, reason: `Unparseable time "${value}"` }
    : { ok: true, time };
}

function toHijri(data: TimingsResponse["data"]): HijriDate | null {
  const hijri = data.date?.hijri;
  if (!hijri) return null;
  return {
    day: parseInt(hijri.day, 10),
    month: hijri.month.number,
    year: parseInt(hijri.year, 10),
    monthName: hijri.month.en,
  };
}

/** Remote calculator backed by the public Aladhan timings endpoint. */
export class AladhanCalculator implements PrayerCalculator {
  constructor(private readonly baseUrl: string) {}

  async compute(
    date: CalendarDay,
    latitude: number,
    longitude: number,
    method: string,
    legalSchool: string
  ): Promise<DailyTimes> {
    const methodName: CalculationMethodName = isCalculationMethod(method)
      ? method
      : "MuslimWorldLeague";
    if (methodName !== method) {
      logger.warn(`Unknown calculation method "${method}", using MuslimWorldLeague`);
    }

    const [year, month, day] = date.split("-");
    let body: unknown;
    try {
      const response = await axios.get(`${this.baseUrl}/timings/${day}-${month}-${year}`, {
        params: {
          latitude,
          longitude,
          method: METHOD_IDS[methodName],
          school: legalSchool === "hanafi" ? 1 : 0,
          iso8601: "true",
        },
        timeout: 10000,
      });
      body = response.data;
    } catch (error) {
      logger.error("Error fetching prayer times from Aladhan:", error);
      throw new PrayerDataError(`Aladhan request failed for ${date}`, { cause: error });
    }

    const parsed = TimingsResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new PrayerDataError(`Unexpected Aladhan response for ${date}`, {
        cause: parsed.error,
      });
    }

    const { timings } = parsed.data.data;
    return {
      date,
      slots: {
        fajr: toSlot(timings.Fajr),
        sunrise: toSlot(timings.Sunrise),
        dhuhr: toSlot(timings.Dhuhr),
        asr: toSlot(timings.Asr),
        maghrib: toSlot(timings.Maghrib),
        isha: toSlot(timings.Isha),
      },
      hijri: toHijri(parsed.data.data),
    };
  }
}
