import type { CacheEntry, Coordinates, DailyTimes } from "../types";
import { CacheEntrySchema } from "../validation/schemas";
import logger from "../utils/logger";

/** Per-axis tolerance in degrees, about 100 m at the equator. */
export const POSITION_TOLERANCE = 0.001;

/**
 * True when the entry was computed for (nearly) the same place with the same
 * calculation method and legal school. Latitude and longitude are compared
 * independently; this is not a geodesic distance.
 */
export function matches(
  entry: CacheEntry,
  location: Coordinates,
  method: string,
  legalSchool: string
): boolean {
  return (
    Math.abs(location.latitude - entry.latitude) < POSITION_TOLERANCE &&
    Math.abs(location.longitude - entry.longitude) < POSITION_TOLERANCE &&
    entry.method === method &&
    entry.legalSchool === legalSchool
  );
}

export function isValid(entry: CacheEntry, now: Date = new Date()): boolean {
  return now.getTime() < entry.expiresAt.getTime();
}

/** A request is served from the entry only when both checks hold. */
export function satisfies(
  entry: CacheEntry,
  location: Coordinates,
  method: string,
  legalSchool: string,
  now: Date = new Date()
): boolean {
  return matches(entry, location, method, legalSchool) && isValid(entry, now);
}

export function createCacheEntry(params: {
  prayerTimes: DailyTimes;
  location: Coordinates;
  method: string;
  legalSchool: string;
  cachedAt: Date;
  ttlMs: number;
}): CacheEntry {
  return {
    prayerTimes: params.prayerTimes,
    latitude: params.location.latitude,
    longitude: params.location.longitude,
    method: params.method,
    legalSchool: params.legalSchool,
    cachedAt: params.cachedAt,
    expiresAt: new Date(params.cachedAt.getTime() + params.ttlMs),
  };
}

export function serializeCacheEntry(entry: CacheEntry): string {
  return JSON.stringify(entry);
}

/** Returns null for anything that is not a well-formed entry. */
export function parseCacheEntry(raw: string): CacheEntry | null {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    logger.warn("Cached prayer times are not valid JSON", { error });
    return null;
  }

  const result = CacheEntrySchema.safeParse(json);
  if (!result.success) {
    logger.warn("Cached prayer times failed validation", {
      issues: result.error.issues.map((issue) => issue.message),
    });
    return null;
  }
  return result.data;
}
