import type { CacheEntry, CalendarDay, Coordinates, DailyTimes } from "../types";
import { PrayerDataError } from "../errors";
import type { PrayerCalculator } from "./calculators";
import type { KeyValueStore } from "./keyValueStore";
import {
  createCacheEntry,
  parseCacheEntry,
  satisfies,
  serializeCacheEntry,
} from "./cacheEntry";
import logger from "../utils/logger";

const CACHE_KEY_PREFIX = "prayer_times:";

export interface ScheduleCacheOptions {
  calculator: PrayerCalculator;
  store: KeyValueStore;
  ttlMs: number;
  now?: () => Date;
}

/**
 * Date-keyed cache of computed prayer times in front of an external
 * calculator. One entry per calendar day, replaced wholesale on refresh.
 *
 * Requests for the same day are serialized through a per-key promise chain,
 * so a burst of identical requests on a cold cache reaches the calculator
 * once and every later caller reads the freshly stored entry.
 */
export class ScheduleCache {
  private readonly calculator: PrayerCalculator;
  private readonly store: KeyValueStore;
  private readonly ttlMs: number;
  private readonly now: () => Date;
  private queues = new Map<string, Promise<unknown>>();

  constructor(options: ScheduleCacheOptions) {
    this.calculator = options.calculator;
    this.store = options.store;
    this.ttlMs = options.ttlMs;
    this.now = options.now ?? (() => new Date());
  }

  static keyFor(date: CalendarDay): string {
    return `${CACHE_KEY_PREFIX}${date}`;
  }

  async getOrCompute(
    date: CalendarDay,
    location: Coordinates,
    method: string,
    legalSchool: string
  ): Promise<DailyTimes> {
    const key = ScheduleCache.keyFor(date);
    return this.runExclusive(key, async () => {
      const entry = await this.readEntry(key);
      if (entry && satisfies(entry, location, method, legalSchool, this.now())) {
        logger.debug(`Prayer times cache hit for ${date}`);
        return entry.prayerTimes;
      }

      logger.debug(`Prayer times cache miss for ${date}`, {
        reason: entry ? "stale_or_mismatch" : "empty",
      });

      const prayerTimes = await this.compute(date, location, method, legalSchool);
      const fresh = createCacheEntry({
        prayerTimes,
        location,
        method,
        legalSchool,
        cachedAt: this.now(),
        ttlMs: this.ttlMs,
      });
      await this.writeEntry(key, fresh);
      return prayerTimes;
    });
  }

  /** Stored entry for a day, whether or not it is still valid. */
  async getCachedEntry(date: CalendarDay): Promise<CacheEntry | null> {
    return this.readEntry(ScheduleCache.keyFor(date));
  }

  /** Forces the next request for the day to recompute. */
  async invalidate(date: CalendarDay): Promise<void> {
    const key = ScheduleCache.keyFor(date);
    await this.runExclusive(key, async () => {
      const entry = await this.readEntry(key);
      if (!entry) return;
      await this.writeEntry(key, { ...entry, expiresAt: new Date(0) });
    });
  }

  private async compute(
    date: CalendarDay,
    location: Coordinates,
    method: string,
    legalSchool: string
  ): Promise<DailyTimes> {
    try {
      return await this.calculator.compute(
        date,
        location.latitude,
        location.longitude,
        method,
        legalSchool
      );
    } catch (error) {
      if (error instanceof PrayerDataError) throw error;
      throw new PrayerDataError(`Prayer time calculation failed for ${date}`, {
        cause: error,
      });
    }
  }

  private async readEntry(key: string): Promise<CacheEntry | null> {
    let raw: string | null;
    try {
      raw = await this.store.get(key);
    } catch (error) {
      logger.warn(`Error reading cached prayer times (${key}), recomputing`, { error });
      return null;
    }
    return raw ? parseCacheEntry(raw) : null;
  }

  private async writeEntry(key: string, entry: CacheEntry): Promise<void> {
    try {
      await this.store.set(key, serializeCacheEntry(entry));
    } catch (error) {
      logger.warn(`Error persisting prayer times (${key}); serving uncached result`, {
        error,
      });
    }
  }

  private runExclusive<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.queues.get(key) ?? Promise.resolve();
    const run = previous.then(task, task);
    const settled = run.then(
      () => undefined,
      () => undefined
    );
    this.queues.set(key, settled);
    void settled.then(() => {
      if (this.queues.get(key) === settled) {
        this.queues.delete(key);
      }
    });
    return run;
  }
}
