import dotenv from "dotenv";

dotenv.config();

function parseOptionalNumber(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === "") return undefined;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : undefined;
}

export type StorageDriver = "mongo" | "memory";
export type NotificationDriver = "twilio" | "log";
export type PrayerProvider = "adhan" | "aladhan";

function storageDriver(value: string | undefined): StorageDriver {
  return value === "memory" ? "memory" : "mongo";
}

function notificationDriver(value: string | undefined): NotificationDriver {
  return value === "log" ? "log" : "twilio";
}

function prayerProvider(value: string | undefined): PrayerProvider {
  return value === "aladhan" ? "aladhan" : "adhan";
}

export const config = {
  port: parseInt(process.env.PORT || "3000", 10),
  nodeEnv: process.env.NODE_ENV || "development",
  logLevel: process.env.LOG_LEVEL || "info",
  timezone: process.env.TIMEZONE || "Asia/Riyadh",

  storage: {
    driver: storageDriver(process.env.STORAGE_DRIVER),
    mongoUri: process.env.MONGODB_URI || "",
    dbName: process.env.MONGODB_DB_NAME || "",
  },

  prayer: {
    provider: prayerProvider(process.env.PRAYER_PROVIDER),
    aladhanBaseUrl: process.env.ALADHAN_API_BASE_URL || "https://api.aladhan.com/v1",
    cacheTtlMinutes: parseInt(process.env.PRAYER_CACHE_TTL_MINUTES || "1440", 10),
    defaultMethod: process.env.DEFAULT_CALCULATION_METHOD || "MuslimWorldLeague",
    defaultLegalSchool: process.env.DEFAULT_LEGAL_SCHOOL || "shafi",
  },

  location: {
    latitude: parseOptionalNumber(process.env.LOCATION_LATITUDE),
    longitude: parseOptionalNumber(process.env.LOCATION_LONGITUDE),
    lookupUrl: process.env.LOCATION_LOOKUP_URL || "",
    cacheTtlMinutes: parseInt(process.env.LOCATION_CACHE_TTL_MINUTES || "5", 10),
  },

  settings: {
    debounceMs: parseInt(process.env.SETTINGS_DEBOUNCE_MS || "200", 10),
    retryDelayMs: parseInt(process.env.SETTINGS_RETRY_DELAY_MS || "1000", 10),
  },

  notifications: {
    driver: notificationDriver(process.env.NOTIFICATION_DRIVER),
    recipient: process.env.REMINDER_RECIPIENT || "",
  },

  twilio: {
    accountSid: process.env.TWILIO_ACCOUNT_SID || "",
    authToken: process.env.TWILIO_AUTH_TOKEN || "",
    whatsappFrom: process.env.TWILIO_WHATSAPP_FROM || "",
  },

  api: {
    apiKey: process.env.API_KEY || "",
  },
};

/**
 * Checks the variables the selected drivers cannot run without.
 * Called once from the entry point so tests can import modules freely.
 */
export function validateConfig(): void {
  const requiredVars: string[] = [];

  if (config.storage.driver === "mongo") {
    requiredVars.push("MONGODB_URI");
  }
  if (config.notifications.driver === "twilio") {
    requiredVars.push(
      "TWILIO_ACCOUNT_SID",
      "TWILIO_AUTH_TOKEN",
      "TWILIO_WHATSAPP_FROM",
      "REMINDER_RECIPIENT"
    );
  }

  for (const varName of requiredVars) {
    if (!process.env[varName]) {
      throw new Error(`Missing required environment variable: ${varName}`);
    }
  }
}
