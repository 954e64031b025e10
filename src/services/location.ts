import axios from "axios";
import { z } from "zod";
import type { Coordinates } from "../types";
import { LocationServiceError } from "../errors";
import logger from "../utils/logger";

/** Default position when no location can be determined. */
export const KAABA_COORDINATES: Coordinates = {
  latitude: 21.422487,
  longitude: 39.826206,
};

export interface LocationSource {
  /** Rejects with LocationServiceError when no position is available. */
  getPosition(): Promise<Coordinates>;
}

/** Coordinates fixed by configuration. */
export class StaticLocationSource implements LocationSource {
  constructor(private readonly coordinates: Partial<Coordinates>) {}

  async getPosition(): Promise<Coordinates> {
    const { latitude, longitude } = this.coordinates;
    if (latitude === undefined || longitude === undefined) {
      throw new LocationServiceError("No coordinates configured");
    }
    if (Math.abs(latitude) > 90 || Math.abs(longitude) > 180) {
      throw new LocationServiceError(`Configured coordinates out of range: ${latitude},${longitude}`);
    }
    return { latitude, longitude };
  }
}

const LookupResponseSchema = z.union([
  z.object({ latitude: z.number(), longitude: z.number() }),
  z
    .object({ lat: z.number(), lon: z.number() })
    .transform(({ lat, lon }) => ({ latitude: lat, longitude: lon })),
]);

/** IP geolocation lookup answering `{latitude, longitude}` or `{lat, lon}`. */
export class HttpLocationSource implements LocationSource {
  constructor(private readonly url: string) {}

  async getPosition(): Promise<Coordinates> {
    let body: unknown;
    try {
      const response = await axios.get(this.url, { timeout: 5000 });
      body = response.data;
    } catch (error) {
      throw new LocationServiceError("Location lookup request failed", error);
    }

    const parsed = LookupResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new LocationServiceError("Location lookup returned no coordinates", parsed.error);
    }
    return parsed.data;
  }
}

export interface LocationServiceOptions {
  source: LocationSource;
  ttlMs: number;
  now?: () => Date;
}

/**
 * Current position with a short-lived cache. Never rejects: any source
 * failure is logged and answered with the Kaaba coordinates.
 */
export class LocationService {
  private readonly source: LocationSource;
  private readonly ttlMs: number;
  private readonly now: () => Date;
  private cached: { coordinates: Coordinates; fetchedAt: number } | null = null;

  constructor(options: LocationServiceOptions) {
    this.source = options.source;
    this.ttlMs = options.ttlMs;
    this.now = options.now ?? (() => new Date());
  }

  async getCoordinates(): Promise<Coordinates> {
    const nowMs = this.now().getTime();
    if (this.cached && nowMs - this.cached.fetchedAt < this.ttlMs) {
      return this.cached.coordinates;
    }

    try {
      const coordinates = await this.source.getPosition();
      this.cached = { coordinates, fetchedAt: nowMs };
      return coordinates;
    } catch (error) {
      if (error instanceof LocationServiceError) {
        logger.warn(`Location unavailable, using Kaaba coordinates: ${error.message}`);
      } else {
        logger.error("Unexpected error resolving location, using Kaaba coordinates:", error);
      }
      return KAABA_COORDINATES;
    }
  }
}
