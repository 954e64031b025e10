import type { DailyTimes, DeliveredReminder, PrayerId, ReminderRequest, Settings } from "../types";
import { DHIKR_REMINDER_ID, PRAYER_IDS } from "../types";
import { toError } from "../errors";
import { config } from "../config";
import type { NotificationSink } from "./notificationSink";
import { ScheduleCache } from "./scheduleCache";
import { LocationService } from "./location";
import timezoneService from "../utils/timezone";
import messageTemplates, { DHIKR_PHRASES, soundFor } from "../utils/messageTemplates";
import logger from "../utils/logger";

const DAY_MS = 24 * 60 * 60 * 1000;
const HOUR_MS = 60 * 60 * 1000;

export interface SkippedPrayer {
  prayerId: PrayerId;
  reason: "disabled" | "unavailable";
}

export type RescheduleOutcome =
  | { status: "aborted"; error: Error }
  /** A newer request was queued before this one started. */
  | { status: "superseded" }
  | {
      status: "rescheduled";
      date: string;
      scheduled: ReminderRequest[];
      skipped: SkippedPrayer[];
    };

export interface NotificationOrchestratorOptions {
  sink: NotificationSink;
  scheduleCache: ScheduleCache;
  locationService: LocationService;
  timezone?: string;
  now?: () => Date;
}

/**
 * Turns settings plus today's prayer times into armed reminders.
 *
 * Reschedules are serialized; a request still waiting in the queue when a
 * newer one arrives is skipped, so the newest settings always win.
 */
export class NotificationOrchestrator {
  private readonly sink: NotificationSink;
  private readonly scheduleCache: ScheduleCache;
  private readonly locationService: LocationService;
  private readonly timezone: string;
  private readonly now: () => Date;

  private queue: Promise<unknown> = Promise.resolve();
  private generation = 0;
  private dhikr = { enabled: false, intervalHours: 4, phraseIndex: 0 };
  private unsubscribeDelivered: () => void;

  constructor(options: NotificationOrchestratorOptions) {
    this.sink = options.sink;
    this.scheduleCache = options.scheduleCache;
    this.locationService = options.locationService;
    this.timezone = options.timezone ?? config.timezone;
    this.now = options.now ?? (() => new Date());
    this.unsubscribeDelivered = this.sink.onDelivered((delivered) => {
      void this.handleDelivered(delivered);
    });
  }

  recalculateAndReschedule(settings: Settings): Promise<RescheduleOutcome> {
    const generation = ++this.generation;
    const run: Promise<RescheduleOutcome> = this.queue.then(() => {
      if (generation !== this.generation) {
        logger.debug("Reschedule superseded by a newer request");
        return { status: "superseded" } satisfies RescheduleOutcome;
      }
      return this.reschedule(settings);
    });
    this.queue = run.catch(() => undefined);
    return run;
  }

  async updateDhikrReminders(enabled: boolean, intervalHours: number): Promise<void> {
    this.dhikr = { ...this.dhikr, enabled, intervalHours };
    await this.sink.cancel(DHIKR_REMINDER_ID);
    if (!enabled) {
      logger.info("Dhikr reminders disabled");
      return;
    }
    await this.scheduleDhikr(this.now(), intervalHours);
  }

  dispose(): void {
    this.unsubscribeDelivered();
  }

  private async reschedule(settings: Settings): Promise<RescheduleOutcome> {
    const now = this.now();
    const date = timezoneService.getDateInTimezone(this.timezone, now);

    let times: DailyTimes;
    try {
      const location = await this.locationService.getCoordinates();
      times = await this.scheduleCache.getOrCompute(
        date,
        location,
        settings.calculationMethod,
        settings.legalSchool
      );
    } catch (error) {
      logger.error("Could not obtain prayer times; reminders left unchanged", {
        error: toError(error).message,
        calculationMethod: settings.calculationMethod,
        legalSchool: settings.legalSchool,
        enabledPrayers: PRAYER_IDS.filter((id) => settings.notifications[id]),
      });
      return { status: "aborted", error: toError(error) };
    }

    await this.sink.cancelMany(PRAYER_IDS);

    const scheduled: ReminderRequest[] = [];
    const skipped: SkippedPrayer[] = [];

    for (const prayerId of PRAYER_IDS) {
      if (!settings.notifications[prayerId]) {
        skipped.push({ prayerId, reason: "disabled" });
        continue;
      }
      const slot = times.slots[prayerId];
      if (!slot.ok) {
        logger.warn(`No time for ${prayerId} on ${date}: ${slot.reason}`);
        skipped.push({ prayerId, reason: "unavailable" });
        continue;
      }

      const offsetted = timezoneService.addMinutes(slot.time, settings.offsets[prayerId]);
      const fireAt =
        offsetted.getTime() <= now.getTime()
          ? new Date(offsetted.getTime() + DAY_MS)
          : offsetted;

      const request = this.prayerRequest(prayerId, offsetted, fireAt, settings);
      await this.sink.schedule(request);
      scheduled.push(request);
    }

    logger.info(`Rescheduled prayer reminders for ${date}`, {
      scheduled: scheduled.map((r) => r.id),
      skipped: skipped.map((s) => `${s.prayerId}:${s.reason}`),
    });
    return { status: "rescheduled", date, scheduled, skipped };
  }

  private prayerRequest(
    prayerId: PrayerId,
    displayTime: Date,
    fireAt: Date,
    settings: Settings
  ): ReminderRequest {
    const sound = soundFor(prayerId);
    const { title, body } = messageTemplates.formatPrayerReminder(
      prayerId,
      timezoneService.formatTime(displayTime, this.timezone, settings.timeFormat)
    );
    return {
      id: prayerId,
      title,
      body,
      fireAt,
      sound,
      soundFile: sound === "adhan" ? settings.adhanSound : undefined,
      payload: { type: "prayer", prayerId },
    };
  }

  private async scheduleDhikr(from: Date, intervalHours: number): Promise<void> {
    const phraseIndex = this.dhikr.phraseIndex;
    this.dhikr.phraseIndex = (phraseIndex + 1) % DHIKR_PHRASES.length;
    const { title, body } = messageTemplates.formatDhikrReminder(phraseIndex);
    await this.sink.schedule({
      id: DHIKR_REMINDER_ID,
      title,
      body,
      fireAt: new Date(from.getTime() + intervalHours * HOUR_MS),
      sound: "default",
      payload: { type: "dhikr", intervalHours, phraseIndex },
    });
  }

  private async handleDelivered(delivered: DeliveredReminder): Promise<void> {
    const payload = delivered.payload;
    if (delivered.id !== DHIKR_REMINDER_ID || payload?.type !== "dhikr") return;
    if (!this.dhikr.enabled) return;
    try {
      await this.scheduleDhikr(delivered.deliveredAt, payload.intervalHours);
    } catch (error) {
      logger.error("Could not re-arm dhikr reminder:", error);
    }
  }
}
