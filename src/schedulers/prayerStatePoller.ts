import cron from "node-cron";
import type { PrayerState, Settings } from "../types";
import { config } from "../config";
import { ScheduleCache } from "../services/scheduleCache";
import { LocationService } from "../services/location";
import { findCurrentPrayer, findNextPrayer, firstPrayer } from "../services/prayerTimes";
import timezoneService from "../utils/timezone";
import logger from "../utils/logger";

export type PrayerStateListener = (state: PrayerState) => void;

export interface TickHandle {
  stop(): void;
}

/** Starts a periodic tick; the default runs once a minute via node-cron. */
export type TickScheduler = (onTick: () => void) => TickHandle;

export const cronMinuteTick: TickScheduler = (onTick) =>
  cron.schedule("* * * * *", onTick, { timezone: config.timezone });

export interface PrayerStatePollerOptions {
  scheduleCache: ScheduleCache;
  locationService: LocationService;
  getSettings: () => Settings;
  timezone?: string;
  now?: () => Date;
  scheduleTick?: TickScheduler;
}

const EMPTY_STATE: PrayerState = {
  currentPrayer: null,
  nextPrayer: null,
  nextPrayerTime: null,
  nextIsTomorrow: false,
};

function sameState(a: PrayerState, b: PrayerState): boolean {
  return (
    a.currentPrayer === b.currentPrayer &&
    a.nextPrayer === b.nextPrayer &&
    a.nextIsTomorrow === b.nextIsTomorrow &&
    (a.nextPrayerTime?.getTime() ?? null) === (b.nextPrayerTime?.getTime() ?? null)
  );
}

/**
 * Keeps the current/next prayer read model fresh. Listeners hear only
 * actual changes, and a tick that lands while a refresh is still running
 * is dropped.
 */
export class PrayerStatePoller {
  private readonly scheduleCache: ScheduleCache;
  private readonly locationService: LocationService;
  private readonly getSettings: () => Settings;
  private readonly timezone: string;
  private readonly now: () => Date;
  private readonly scheduleTick: TickScheduler;

  private current: PrayerState = EMPTY_STATE;
  private listeners = new Set<PrayerStateListener>();
  private inFlight: Promise<void> | null = null;
  private tick: TickHandle | null = null;
  private stopped = false;

  constructor(options: PrayerStatePollerOptions) {
    this.scheduleCache = options.scheduleCache;
    this.locationService = options.locationService;
    this.getSettings = options.getSettings;
    this.timezone = options.timezone ?? config.timezone;
    this.now = options.now ?? (() => new Date());
    this.scheduleTick = options.scheduleTick ?? cronMinuteTick;
  }

  get state(): PrayerState {
    return { ...this.current };
  }

  start(): void {
    if (this.tick) {
      logger.warn("Prayer state poller is already running");
      return;
    }
    this.stopped = false;
    this.tick = this.scheduleTick(() => {
      void this.refresh();
    });
    void this.refresh();
    logger.info("Prayer state poller started");
  }

  /** Stops ticking; a refresh still running when this is called publishes nothing. */
  stop(): void {
    this.stopped = true;
    this.tick?.stop();
    this.tick = null;
  }

  subscribe(listener: PrayerStateListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /** Recomputes the read model; concurrent calls share the running refresh. */
  refresh(): Promise<void> {
    if (this.inFlight) {
      logger.debug("Prayer state refresh already in flight, skipping tick");
      return this.inFlight;
    }
    this.inFlight = this.compute()
      .then((next) => {
        if (next) this.publish(next);
      })
      .finally(() => {
        this.inFlight = null;
      });
    return this.inFlight;
  }

  private async compute(): Promise<PrayerState | null> {
    const now = this.now();
    const settings = this.getSettings();
    const today = timezoneService.getDateInTimezone(this.timezone, now);

    try {
      const location = await this.locationService.getCoordinates();
      const times = await this.scheduleCache.getOrCompute(
        today,
        location,
        settings.calculationMethod,
        settings.legalSchool
      );

      const currentPrayer = findCurrentPrayer(times, now);
      const next = findNextPrayer(times, now);

      if (next.kind === "today") {
        return { currentPrayer, nextPrayer: next.prayerId, nextPrayerTime: next.time, nextIsTomorrow: false };
      }
      if (next.kind === "unavailable") {
        logger.warn(`No prayer times available for ${today}`);
        return { ...EMPTY_STATE, currentPrayer };
      }

      const tomorrow = await this.scheduleCache.getOrCompute(
        timezoneService.addDays(today, 1),
        location,
        settings.calculationMethod,
        settings.legalSchool
      );
      const first = firstPrayer(tomorrow);
      return {
        currentPrayer,
        nextPrayer: first?.prayerId ?? null,
        nextPrayerTime: first?.time ?? null,
        nextIsTomorrow: first !== null,
      };
    } catch (error) {
      logger.error("Error refreshing prayer state, keeping previous state:", error);
      return null;
    }
  }

  private publish(next: PrayerState): void {
    if (this.stopped) return;
    if (sameState(this.current, next)) return;
    this.current = next;
    for (const listener of this.listeners) {
      try {
        listener(this.state);
      } catch (error) {
        logger.error("Prayer state listener failed:", error);
      }
    }
  }
}
