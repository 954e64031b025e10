import { describe, it, expect, vi } from "vitest";
import axios from "axios";
import type { LocationSource } from "../src/services/location";
import {
  HttpLocationSource,
  KAABA_COORDINATES,
  LocationService,
  StaticLocationSource,
} from "../src/services/location";
import { LocationServiceError } from "../src/errors";
import { TestClock, axiosResponse } from "./fakes";

const MINUTE = 60 * 1000;

class CountingSource implements LocationSource {
  calls = 0;
  async getPosition() {
    this.calls++;
    return { latitude: 51.5 + this.calls, longitude: -0.12 };
  }
}

describe("LocationService", () => {
  it("falls back to the Kaaba when no coordinates are configured", async () => {
    const service = new LocationService({ source: new StaticLocationSource({}), ttlMs: 5 * MINUTE });
    expect(await service.getCoordinates()).toEqual(KAABA_COORDINATES);
  });

  it("falls back to the Kaaba when configured coordinates are out of range", async () => {
    const service = new LocationService({
      source: new StaticLocationSource({ latitude: 95, longitude: 10 }),
      ttlMs: 5 * MINUTE,
    });
    expect(await service.getCoordinates()).toEqual(KAABA_COORDINATES);
  });

  it("reuses a position until it is older than the TTL", async () => {
    const source = new CountingSource();
    const clock = new TestClock(new Date("2026-03-10T12:00:00.000Z"));
    const service = new LocationService({ source, ttlMs: 5 * MINUTE, now: clock.now });

    expect(await service.getCoordinates()).toEqual({ latitude: 52.5, longitude: -0.12 });
    clock.advance(4 * MINUTE);
    expect(await service.getCoordinates()).toEqual({ latitude: 52.5, longitude: -0.12 });
    clock.advance(MINUTE);
    expect(await service.getCoordinates()).toEqual({ latitude: 53.5, longitude: -0.12 });
    expect(source.calls).toBe(2);
  });
});

describe("HttpLocationSource", () => {
  it("reads lat/lon responses", async () => {
    vi.spyOn(axios, "get").mockResolvedValue(axiosResponse({ status: "success", lat: 41.01, lon: 28.97 }));
    const source = new HttpLocationSource("http://geo.test/json");
    expect(await source.getPosition()).toEqual({ latitude: 41.01, longitude: 28.97 });
  });

  it("reads latitude/longitude responses", async () => {
    vi.spyOn(axios, "get").mockResolvedValue(axiosResponse({ latitude: 3.14, longitude: 101.69 }));
    const source = new HttpLocationSource("http://geo.test/json");
    expect(await source.getPosition()).toEqual({ latitude: 3.14, longitude: 101.69 });
  });

  it("raises LocationServiceError when the lookup fails", async () => {
    vi.spyOn(axios, "get").mockRejectedValue(new Error("ECONNREFUSED"));
    const source = new HttpLocationSource("http://geo.test/json");
    await expect(source.getPosition()).rejects.toBeInstanceOf(LocationServiceError);
  });

  it("raises LocationServiceError for a response without coordinates", async () => {
    vi.spyOn(axios, "get").mockResolvedValue(axiosResponse({ status: "fail" }));
    const source = new HttpLocationSource("http://geo.test/json");
    await expect(source.getPosition()).rejects.toBeInstanceOf(LocationServiceError);
  });
});
