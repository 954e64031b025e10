import { describe, it, expect, vi } from "vitest";
import axios from "axios";
import { AdhanCalculator } from "../src/services/calculators/adhanCalculator";
import { AladhanCalculator } from "../src/services/calculators/aladhanCalculator";
import type { PrayerSlot } from "../src/types";
import { PRAYER_IDS } from "../src/types";
import { PrayerDataError } from "../src/errors";
import { axiosResponse } from "./fakes";

function timeOf(slot: PrayerSlot): number {
  if (!slot.ok) throw new Error(`expected a time, got "${slot.reason}"`);
  return slot.time.getTime();
}

describe("AdhanCalculator", () => {
  const calculator = new AdhanCalculator();

  it("computes all six times in day order", async () => {
    const times = await calculator.compute("2026-03-10", 21.4225, 39.8262, "UmmAlQura", "shafi");

    expect(times.date).toBe("2026-03-10");
    const ordered = PRAYER_IDS.map((id) => timeOf(times.slots[id]));
    expect([...ordered].sort((a, b) => a - b)).toEqual(ordered);
  });

  it("puts Asr later for the Hanafi school", async () => {
    const shafi = await calculator.compute("2026-03-10", 21.4225, 39.8262, "MuslimWorldLeague", "shafi");
    const hanafi = await calculator.compute("2026-03-10", 21.4225, 39.8262, "MuslimWorldLeague", "hanafi");
    expect(timeOf(hanafi.slots.asr)).toBeGreaterThan(timeOf(shafi.slots.asr));
    expect(timeOf(hanafi.slots.dhuhr)).toBe(timeOf(shafi.slots.dhuhr));
  });

  it("falls back to Muslim World League for an unknown method", async () => {
    const known = await calculator.compute("2026-03-10", 21.4225, 39.8262, "MuslimWorldLeague", "shafi");
    const unknown = await calculator.compute("2026-03-10", 21.4225, 39.8262, "NoSuchMethod", "shafi");
    expect(unknown.slots).toEqual(known.slots);
  });
});

describe("AladhanCalculator", () => {
  const calculator = new AladhanCalculator("https://api.test/v1");

  it("requests the day's timings and parses them", async () => {
    const get = vi.spyOn(axios, "get").mockResolvedValue(
      axiosResponse({
        code: 200,
        data: {
          timings: {
            Fajr: "2026-03-10T05:01:00+03:00",
            Sunrise: "2026-03-10T06:18:00+03:00",
            Dhuhr: "2026-03-10T12:23:00+03:00",
            Asr: "2026-03-10T15:46:00+03:00",
            Maghrib: "2026-03-10T18:27:00+03:00",
          },
          date: { hijri: { day: "21", year: "1447", month: { number: 9, en: "Ramadan" } } },
        },
      })
    );

    const times = await calculator.compute("2026-03-10", 21.4225, 39.8262, "UmmAlQura", "hanafi");

    expect(get).toHaveBeenCalledWith("https://api.test/v1/timings/10-03-2026", {
      params: { latitude: 21.4225, longitude: 39.8262, method: 4, school: 1, iso8601: "true" },
      timeout: 10000,
    });
    expect(times.slots.fajr).toEqual({ ok: true, time: new Date("2026-03-10T02:01:00.000Z") });
    expect(times.slots.isha).toEqual({ ok: false, reason: "Missing from API response" });
    expect(times.hijri).toEqual({ day: 21, month: 9, year: 1447, monthName: "Ramadan" });
  });

  it("raises PrayerDataError when the request fails", async () => {
    vi.spyOn(axios, "get").mockRejectedValue(new Error("502 Bad Gateway"));
    await expect(
      calculator.compute("2026-03-10", 21.4225, 39.8262, "MuslimWorldLeague", "shafi")
    ).rejects.toBeInstanceOf(PrayerDataError);
  });

  it("raises PrayerDataError for an unexpected body", async () => {
    vi.spyOn(axios, "get").mockResolvedValue(axiosResponse({ code: 400, data: "Invalid date" }));
    await expect(
      calculator.compute("2026-03-10", 21.4225, 39.8262, "MuslimWorldLeague", "shafi")
    ).rejects.toBeInstanceOf(PrayerDataError);
  });
});
