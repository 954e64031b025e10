import type { Server } from "http";
import { config, validateConfig } from "./config";
import { createApp } from "./app";
import type { KeyValueStore } from "./services/keyValueStore";
import { InMemoryKeyValueStore } from "./services/keyValueStore";
import type { CompletionRepository } from "./services/completionRepository";
import { InMemoryCompletionRepository } from "./services/completionRepository";
import { MongoCompletionRepository, MongoKeyValueStore, closeMongo, connectMongo } from "./services/mongo";
import type { PrayerCalculator } from "./services/calculators";
import { AdhanCalculator } from "./services/calculators/adhanCalculator";
import { AladhanCalculator } from "./services/calculators/aladhanCalculator";
import { ScheduleCache } from "./services/scheduleCache";
import type { LocationSource } from "./services/location";
import { HttpLocationSource, LocationService, StaticLocationSource } from "./services/location";
import { SETTINGS_KEY, SettingsStore } from "./services/settingsStore";
import { LogNotificationSink, TimerNotificationSink, TwilioNotificationSink } from "./services/notificationSink";
import { NotificationOrchestrator } from "./services/notificationOrchestrator";
import { SettingsService } from "./services/settingsService";
import { CompletionTracker } from "./services/completionTracker";
import { PrayerAnalytics } from "./services/prayerAnalytics";
import { PrayerStatePoller } from "./schedulers/prayerStatePoller";
import { DailyRescheduler } from "./schedulers/dailyRescheduler";
import twilioService from "./services/twilio";
import logger from "./utils/logger";

function createCalculator(): PrayerCalculator {
  return config.prayer.provider === "aladhan"
    ? new AladhanCalculator(config.prayer.aladhanBaseUrl)
    : new AdhanCalculator();
}

function createLocationSource(): LocationSource {
  const { latitude, longitude, lookupUrl } = config.location;
  if ((latitude === undefined || longitude === undefined) && lookupUrl) {
    return new HttpLocationSource(lookupUrl);
  }
  return new StaticLocationSource({ latitude, longitude });
}

async function createStorage(): Promise<{ store: KeyValueStore; completions: CompletionRepository }> {
  if (config.storage.driver === "memory") {
    logger.warn("Using in-memory storage; settings and completions are lost on restart");
    return { store: new InMemoryKeyValueStore(), completions: new InMemoryCompletionRepository() };
  }
  await connectMongo();
  const store = new MongoKeyValueStore([SETTINGS_KEY]);
  await store.preload();
  return { store, completions: new MongoCompletionRepository() };
}

async function main(): Promise<void> {
  validateConfig();

  const { store, completions } = await createStorage();
  const scheduleCache = new ScheduleCache({
    calculator: createCalculator(),
    store,
    ttlMs: config.prayer.cacheTtlMinutes * 60 * 1000,
  });
  const locationService = new LocationService({
    source: createLocationSource(),
    ttlMs: config.location.cacheTtlMinutes * 60 * 1000,
  });

  const twilioSink =
    config.notifications.driver === "twilio"
      ? new TwilioNotificationSink(twilioService, config.notifications.recipient)
      : null;
  const sink: TimerNotificationSink = twilioSink ?? new LogNotificationSink();

  const settingsStore = new SettingsStore({
    store,
    debounceMs: config.settings.debounceMs,
    retryDelayMs: config.settings.retryDelayMs,
  });
  const orchestrator = new NotificationOrchestrator({ sink, scheduleCache, locationService });
  const settingsService = new SettingsService({ store: settingsStore, orchestrator, sink });

  const tracker = new CompletionTracker({
    repository: completions,
    prayerTimeLookup: async (prayerId, date) => {
      const settings = settingsService.current;
      const times = await scheduleCache.getOrCompute(
        date,
        await locationService.getCoordinates(),
        settings.calculationMethod,
        settings.legalSchool
      );
      return times.slots[prayerId];
    },
  });
  const analytics = new PrayerAnalytics(tracker);

  const poller = new PrayerStatePoller({
    scheduleCache,
    locationService,
    getSettings: () => settingsService.current,
  });
  poller.subscribe((state) => {
    logger.info("Prayer state changed", {
      currentPrayer: state.currentPrayer,
      nextPrayer: state.nextPrayer,
      nextPrayerTime: state.nextPrayerTime?.toISOString() ?? null,
    });
  });
  const dailyRescheduler = new DailyRescheduler({
    reschedule: () => settingsService.recalculateAndReschedule(),
  });

  const outcome = await settingsService.initialize();
  if (outcome.status === "aborted") {
    logger.warn("Initial reminder scheduling failed; the daily job will retry");
  }

  const app = createApp({
    settingsService,
    scheduleCache,
    locationService,
    tracker,
    analytics,
    poller,
    webhooks: twilioSink
      ? {
          sink: twilioSink,
          verifySignature: (url, params, signature) =>
            twilioService.validateWebhookSignature(url, params, signature),
        }
      : undefined,
  });

  const server: Server = app.listen(config.port, () => {
    logger.info(`Server running on port ${config.port}`);
    logger.info(`Environment: ${config.nodeEnv}`);
    poller.start();
    dailyRescheduler.start();
    logger.info("Prayer reminder service is ready");
  });

  let shuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info(`${signal} received, shutting down gracefully`);
    poller.stop();
    dailyRescheduler.stop();
    await settingsStore.flush();
    settingsService.dispose();
    orchestrator.dispose();
    sink.dispose();
    await new Promise<void>((resolve) => server.close(() => resolve()));
    if (config.storage.driver === "mongo") await closeMongo();
    process.exit(0);
  };

  process.on("SIGTERM", () => void shutdown("SIGTERM"));
  process.on("SIGINT", () => void shutdown("SIGINT"));
}

main().catch((error) => {
  logger.error("Failed to start prayer reminder service:", error);
  process.exit(1);
});
