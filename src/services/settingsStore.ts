import type { PrayerId, Settings } from "../types";
import { PersistenceError, toError } from "../errors";
import { SettingsSchema } from "../validation/schemas";
import { config } from "../config";
import type { KeyValueStore } from "./keyValueStore";
import logger from "../utils/logger";

export const SETTINGS_KEY = "app_settings";

export type SaveMode = "debounced" | "immediate";

export type SettingsListener = (settings: Settings) => void;

function perPrayer<T>(value: T): Record<PrayerId, T> {
  return {
    fajr: value,
    sunrise: value,
    dhuhr: value,
    asr: value,
    maghrib: value,
    isha: value,
  };
}

export function defaultSettings(): Settings {
  return {
    calculationMethod: config.prayer.defaultMethod,
    legalSchool: config.prayer.defaultLegalSchool,
    offsets: perPrayer(0),
    notifications: perPrayer(true),
    dhikrRemindersEnabled: false,
    dhikrReminderIntervalHours: 4,
    adhanSound: "makkah_adhan.mp3",
    timeFormat: "12h",
    permissionStatus: "notDetermined",
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Parses a persisted settings blob. Fields added since the blob was written
 * are filled from defaults; anything else malformed yields null.
 */
export function parseSettings(raw: string): Settings | null {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return null;
  }
  if (!isRecord(json)) return null;

  const defaults = defaultSettings();
  const merged = {
    ...defaults,
    ...json,
    offsets: { ...defaults.offsets, ...(isRecord(json.offsets) ? json.offsets : {}) },
    notifications: {
      ...defaults.notifications,
      ...(isRecord(json.notifications) ? json.notifications : {}),
    },
  };
  const result = SettingsSchema.safeParse(merged);
  return result.success ? result.data : null;
}

export function cloneSettings(settings: Settings): Settings {
  return {
    ...settings,
    offsets: { ...settings.offsets },
    notifications: { ...settings.notifications },
  };
}

export interface SettingsStoreOptions {
  store: KeyValueStore;
  debounceMs: number;
  retryDelayMs: number;
}

/**
 * In-memory settings record persisted as one JSON blob.
 *
 * Memory is authoritative: a failed write never rolls the record back.
 * Writes are either immediate or debounced; each write is retried once.
 */
export class SettingsStore {
  private readonly store: KeyValueStore;
  private readonly debounceMs: number;
  private readonly retryDelayMs: number;
  private settings: Settings;
  private listeners = new Set<SettingsListener>();
  private debounceTimer: NodeJS.Timeout | null = null;
  private retryWait: { timer: NodeJS.Timeout; resolve: () => void } | null = null;
  private disposed = false;

  lastPersistenceError: PersistenceError | null = null;

  constructor(options: SettingsStoreOptions) {
    this.store = options.store;
    this.debounceMs = options.debounceMs;
    this.retryDelayMs = options.retryDelayMs;
    this.settings = this.initialSettings();
  }

  get current(): Settings {
    return cloneSettings(this.settings);
  }

  /** Reads the persisted blob, healing it with defaults when missing or corrupt. */
  async load(): Promise<Settings> {
    let raw: string | null;
    try {
      raw = await this.store.get(SETTINGS_KEY);
    } catch (error) {
      logger.error("Error reading settings, using defaults:", error);
      this.replace(defaultSettings());
      return this.current;
    }

    if (raw === null) {
      logger.info("No stored settings, persisting defaults");
      await this.healWith(defaultSettings());
      return this.current;
    }

    const parsed = parseSettings(raw);
    if (!parsed) {
      logger.warn("Stored settings are corrupt, resetting to defaults");
      await this.healWith(defaultSettings());
      return this.current;
    }

    this.replace(parsed);
    return this.current;
  }

  /**
   * Replaces the whole record. Immediate saves reject with a PersistenceError
   * when both write attempts fail; the in-memory record is kept regardless.
   */
  async save(settings: Settings, mode: SaveMode = "immediate"): Promise<void> {
    this.replace(cloneSettings(settings));
    await this.persist(mode);
  }

  async updateField(
    update: (settings: Settings) => Settings,
    mode: SaveMode
  ): Promise<Settings> {
    this.replace(update(this.current));
    await this.persist(mode);
    return this.current;
  }

  subscribe(listener: SettingsListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /** Writes any pending debounced change now. */
  async flush(): Promise<void> {
    if (!this.debounceTimer) return;
    clearTimeout(this.debounceTimer);
    this.debounceTimer = null;
    await this.writeDebounced();
  }

  dispose(): void {
    this.disposed = true;
    if (this.debounceTimer) {
      clearTimeout(this.debounceTimer);
      this.debounceTimer = null;
    }
    if (this.retryWait) {
      clearTimeout(this.retryWait.timer);
      this.retryWait.resolve();
      this.retryWait = null;
    }
    this.listeners.clear();
  }

  private initialSettings(): Settings {
    const warm = this.store.peek?.(SETTINGS_KEY);
    if (typeof warm === "string") {
      const parsed = parseSettings(warm);
      if (parsed) return parsed;
    }
    return defaultSettings();
  }

  private async healWith(settings: Settings): Promise<void> {
    this.replace(settings);
    try {
      await this.persist("immediate");
    } catch (error) {
      logger.error("Could not persist default settings:", error);
    }
  }

  private replace(settings: Settings): void {
    this.settings = settings;
    for (const listener of this.listeners) {
      try {
        listener(this.current);
      } catch (error) {
        logger.error("Settings listener failed:", error);
      }
    }
  }

  private async persist(mode: SaveMode): Promise<void> {
    if (this.disposed) return;

    if (mode === "debounced") {
      if (this.debounceTimer) clearTimeout(this.debounceTimer);
      this.debounceTimer = setTimeout(() => {
        this.debounceTimer = null;
        void this.writeDebounced();
      }, this.debounceMs);
      return;
    }

    if (this.debounceTimer) {
      clearTimeout(this.debounceTimer);
      this.debounceTimer = null;
    }
    await this.writeWithRetry();
  }

  private async writeDebounced(): Promise<void> {
    try {
      await this.writeWithRetry();
    } catch (error) {
      logger.error("Debounced settings write failed, keeping in-memory settings:", error);
    }
  }

  private async writeWithRetry(): Promise<void> {
    try {
      await this.store.set(SETTINGS_KEY, JSON.stringify(this.settings));
      this.lastPersistenceError = null;
      return;
    } catch (error) {
      logger.warn(`Settings write failed, retrying in ${this.retryDelayMs}ms`, {
        error: toError(error).message,
      });
    }

    await this.waitForRetry();
    if (this.disposed) {
      const failure = new PersistenceError("Settings store disposed before retry", "write", {
        key: SETTINGS_KEY,
      });
      this.lastPersistenceError = failure;
      throw failure;
    }

    try {
      // Latest state, in case it changed while waiting.
      await this.store.set(SETTINGS_KEY, JSON.stringify(this.settings));
      this.lastPersistenceError = null;
    } catch (error) {
      const failure =
        error instanceof PersistenceError
          ? error
          : new PersistenceError("Settings write failed", "write", {
              key: SETTINGS_KEY,
              cause: error,
            });
      this.lastPersistenceError = failure;
      logger.error("Settings write failed after retry:", failure);
      throw failure;
    }
  }

  private waitForRetry(): Promise<void> {
    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        this.retryWait = null;
        resolve();
      }, this.retryDelayMs);
      this.retryWait = { timer, resolve };
    });
  }
}
