import { CalculationMethod, Coordinates, Madhab, PrayerTimes } from "adhan";
import type { CalculationParameters } from "adhan";
import type { CalendarDay, DailyTimes, PrayerSlot } from "../../types";
import { PrayerDataError } from "../../errors";
import timezoneService from "../../utils/timezone";
import logger from "../../utils/logger";
import type { CalculationMethodName, PrayerCalculator } from ".";
import { isCalculationMethod } from ".";

const METHOD_PARAMETERS: Record<CalculationMethodName, () => CalculationParameters> = {
  MuslimWorldLeague: () => CalculationMethod.MuslimWorldLeague(),
  Egyptian: () => CalculationMethod.Egyptian(),
  Karachi: () => CalculationMethod.Karachi(),
  UmmAlQura: () => CalculationMethod.UmmAlQura(),
  Dubai: () => CalculationMethod.Dubai(),
  MoonsightingCommittee: () => CalculationMethod.MoonsightingCommittee(),
  NorthAmerica: () => CalculationMethod.NorthAmerica(),
  Kuwait: () => CalculationMethod.Kuwait(),
  Qatar: () => CalculationMethod.Qatar(),
  Singapore: () => CalculationMethod.Singapore(),
  Tehran: () => CalculationMethod.Tehran(),
  Turkey: () => CalculationMethod.Turkey(),
};

function toSlot(time: Date): PrayerSlot {
  return Number.isNaN(time.getTime())
    ? { ok: false, reason: "Calculation produced no valid time" }
    : { ok: true, time };
}

/** Offline calculator on top of the `adhan` astronomical library. */
export class AdhanCalculator implements PrayerCalculator {
  async compute(
    date: CalendarDay,
    latitude: number,
    longitude: number,
    method: string,
    legalSchool: string
  ): Promise<DailyTimes> {
    let params: CalculationParameters;
    if (isCalculationMethod(method)) {
      params = METHOD_PARAMETERS[method]();
    } else {
      logger.warn(`Unknown calculation method "${method}", using MuslimWorldLeague`);
      params = METHOD_PARAMETERS.MuslimWorldLeague();
    }
    params.madhab = legalSchool === "hanafi" ? Madhab.Hanafi : Madhab.Shafi;

    let times: PrayerTimes;
    try {
      times = new PrayerTimes(
        new Coordinates(latitude, longitude),
        timezoneService.toLocalDate(date),
        params
      );
    } catch (error) {
      throw new PrayerDataError(`adhan failed to compute times for ${date}`, {
        cause: error,
      });
    }

    return {
      date,
      slots: {
        fajr: toSlot(times.fajr),
        sunrise: toSlot(times.sunrise),
        dhuhr: toSlot(times.dhuhr),
        asr: toSlot(times.asr),
        maghrib: toSlot(times.maghrib),
        isha: toSlot(times.isha),
      },
      hijri: timezoneService.getHijriDate(date),
    };
  }
}
