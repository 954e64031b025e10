import type { PrayerId, Settings, TimeFormat } from "../types";
import { PRAYER_IDS } from "../types";
import { toError } from "../errors";
import type { SettingsPatch } from "../validation/schemas";
import type { SaveMode } from "./settingsStore";
import { SettingsStore, defaultSettings, parseSettings } from "./settingsStore";
import type { RescheduleOutcome } from "./notificationOrchestrator";
import { NotificationOrchestrator } from "./notificationOrchestrator";
import type { NotificationSink } from "./notificationSink";
import logger from "../utils/logger";

export const MAX_OFFSET_MINUTES = 30;

export function clampOffset(minutes: number): number {
  return Math.max(-MAX_OFFSET_MINUTES, Math.min(MAX_OFFSET_MINUTES, Math.round(minutes)));
}

export interface SettingsServiceOptions {
  store: SettingsStore;
  orchestrator: NotificationOrchestrator;
  sink: NotificationSink;
}

function mergePerPrayer<T>(
  base: Record<PrayerId, T>,
  patch?: Partial<Record<PrayerId, T | undefined>>
): Record<PrayerId, T> {
  const result = { ...base };
  if (!patch) return result;
  for (const id of PRAYER_IDS) {
    const value = patch[id];
    if (value !== undefined) result[id] = value;
  }
  return result;
}

/** Fields whose change alters which reminders fire, when, or with what sound. */
function affectsPrayerReminders(before: Settings, after: Settings): boolean {
  return (
    before.calculationMethod !== after.calculationMethod ||
    before.legalSchool !== after.legalSchool ||
    before.adhanSound !== after.adhanSound ||
    PRAYER_IDS.some(
      (id) =>
        before.offsets[id] !== after.offsets[id] ||
        before.notifications[id] !== after.notifications[id]
    )
  );
}

function affectsDhikr(before: Settings, after: Settings): boolean {
  return (
    before.dhikrRemindersEnabled !== after.dhikrRemindersEnabled ||
    before.dhikrReminderIntervalHours !== after.dhikrReminderIntervalHours
  );
}

/**
 * Setters over the persisted settings. Changes that affect reminders are
 * saved immediately and followed by a reschedule; cosmetic ones are
 * debounced.
 */
export class SettingsService {
  private readonly store: SettingsStore;
  private readonly orchestrator: NotificationOrchestrator;
  private unsubscribePermission: () => void;

  constructor(options: SettingsServiceOptions) {
    this.store = options.store;
    this.orchestrator = options.orchestrator;
    this.unsubscribePermission = options.sink.onPermissionStatus((status) => {
      if (status === this.store.current.permissionStatus) return;
      logger.info(`Notification permission changed to ${status}`);
      void this.store.updateField((s) => ({ ...s, permissionStatus: status }), "debounced");
    });
  }

  get current(): Settings {
    return this.store.current;
  }

  /** Loads persisted settings and arms every reminder they call for. */
  async initialize(): Promise<RescheduleOutcome> {
    const settings = await this.store.load();
    await this.orchestrator.updateDhikrReminders(
      settings.dhikrRemindersEnabled,
      settings.dhikrReminderIntervalHours
    );
    return this.recalculateAndReschedule();
  }

  recalculateAndReschedule(): Promise<RescheduleOutcome> {
    return this.orchestrator.recalculateAndReschedule(this.store.current);
  }

  async updateCalculationMethod(method: string): Promise<Settings> {
    return this.apply({ calculationMethod: method });
  }

  async updateLegalSchool(legalSchool: string): Promise<Settings> {
    return this.apply({ legalSchool });
  }

  async updatePrayerOffset(prayerId: PrayerId, minutes: number): Promise<Settings> {
    const offsets: Partial<Record<PrayerId, number>> = {};
    offsets[prayerId] = clampOffset(minutes);
    return this.apply({ offsets });
  }

  async updatePrayerNotification(prayerId: PrayerId, enabled: boolean): Promise<Settings> {
    const notifications: Partial<Record<PrayerId, boolean>> = {};
    notifications[prayerId] = enabled;
    return this.apply({ notifications });
  }

  async updateAllPrayerNotifications(enabled: boolean): Promise<Settings> {
    const notifications: Partial<Record<PrayerId, boolean>> = {};
    for (const id of PRAYER_IDS) notifications[id] = enabled;
    return this.apply({ notifications });
  }

  async updateAdhanSound(adhanSound: string): Promise<Settings> {
    return this.apply({ adhanSound });
  }

  async updateDhikrReminders(enabled: boolean, intervalHours?: number): Promise<Settings> {
    return this.apply({
      dhikrRemindersEnabled: enabled,
      dhikrReminderIntervalHours:
        intervalHours === undefined
          ? undefined
          : Math.max(1, Math.min(24, Math.round(intervalHours))),
    });
  }

  async updateTimeFormat(timeFormat: TimeFormat): Promise<Settings> {
    return this.apply({ timeFormat });
  }

  /** Applies a validated partial update. */
  async applyPatch(patch: SettingsPatch): Promise<Settings> {
    return this.apply(patch);
  }

  async resetToDefaults(): Promise<Settings> {
    const defaults = defaultSettings();
    defaults.permissionStatus = this.store.current.permissionStatus;
    return this.replaceAll(defaults);
  }

  exportSettings(): string {
    return JSON.stringify(this.store.current, null, 2);
  }

  /** Replaces all settings from an exported document. Returns null when it is not valid. */
  async importSettings(raw: string): Promise<Settings | null> {
    const parsed = parseSettings(raw);
    if (!parsed) {
      logger.warn("Rejected settings import: not a valid settings document");
      return null;
    }
    for (const id of PRAYER_IDS) {
      parsed.offsets[id] = clampOffset(parsed.offsets[id]);
    }
    return this.replaceAll(parsed);
  }

  dispose(): void {
    this.unsubscribePermission();
    this.store.dispose();
  }

  private async apply(patch: SettingsPatch): Promise<Settings> {
    const before = this.store.current;
    const after: Settings = {
      ...before,
      calculationMethod: patch.calculationMethod ?? before.calculationMethod,
      legalSchool: patch.legalSchool ?? before.legalSchool,
      offsets: mergePerPrayer(before.offsets, patch.offsets),
      notifications: mergePerPrayer(before.notifications, patch.notifications),
      dhikrRemindersEnabled: patch.dhikrRemindersEnabled ?? before.dhikrRemindersEnabled,
      dhikrReminderIntervalHours:
        patch.dhikrReminderIntervalHours ?? before.dhikrReminderIntervalHours,
      adhanSound: patch.adhanSound ?? before.adhanSound,
      timeFormat: patch.timeFormat ?? before.timeFormat,
    };
    return this.commit(before, after);
  }

  private async replaceAll(next: Settings): Promise<Settings> {
    return this.commit(this.store.current, next);
  }

  private async commit(before: Settings, after: Settings): Promise<Settings> {
    const reminders = affectsPrayerReminders(before, after);
    const dhikr = affectsDhikr(before, after);
    const changed = JSON.stringify(before) !== JSON.stringify(after);
    if (!changed) {
      logger.debug("Settings unchanged, nothing to do");
      return before;
    }

    const mode: SaveMode = reminders || dhikr ? "immediate" : "debounced";
    let saveError: Error | null = null;
    try {
      await this.store.save(after, mode);
    } catch (error) {
      saveError = toError(error);
    }

    if (dhikr) {
      await this.orchestrator.updateDhikrReminders(
        after.dhikrRemindersEnabled,
        after.dhikrReminderIntervalHours
      );
    }
    if (reminders) {
      const outcome = await this.recalculateAndReschedule();
      if (outcome.status === "aborted") {
        logger.warn("Settings saved but reminders could not be rescheduled");
      }
    }

    if (saveError) throw saveError;
    return this.store.current;
  }
}
