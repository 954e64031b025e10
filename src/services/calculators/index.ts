import type { CalendarDay, DailyTimes } from "../../types";

/**
 * Source of raw prayer times for one day and place. Implementations may be
 * offline (astronomical library) or remote (HTTP API); the schedule cache
 * sits in front of either.
 */
export interface PrayerCalculator {
  compute(
    date: CalendarDay,
    latitude: number,
    longitude: number,
    method: string,
    legalSchool: string
  ): Promise<DailyTimes>;
}

/** Calculation method names accepted across providers. */
export const CALCULATION_METHODS = [
  "MuslimWorldLeague",
  "Egyptian",
  "Karachi",
  "UmmAlQura",
  "Dubai",
  "MoonsightingCommittee",
  "NorthAmerica",
  "Kuwait",
  "Qatar",
  "Singapore",
  "Tehran",
  "Turkey",
] as const;

export type CalculationMethodName = (typeof CALCULATION_METHODS)[number];

export function isCalculationMethod(value: string): value is CalculationMethodName {
  return CALCULATION_METHODS.some((method) => method === value);
}
