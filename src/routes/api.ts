import type { Request, Response, NextFunction } from "express";
import { Router } from "express";
import { ZodError } from "zod";
import { config } from "../config";
import type { PrayerId, TrackablePrayerId } from "../types";
import {
  CompletionBodySchema,
  PrayerIdSchema,
  SettingsPatchSchema,
  TrackablePrayerIdSchema,
} from "../validation/schemas";
import { SettingsService } from "../services/settingsService";
import { ScheduleCache } from "../services/scheduleCache";
import { LocationService } from "../services/location";
import { CompletionTracker } from "../services/completionTracker";
import { PrayerAnalytics } from "../services/prayerAnalytics";
import { PrayerStatePoller } from "../schedulers/prayerStatePoller";
import { toError } from "../errors";
import timezoneService from "../utils/timezone";
import logger from "../utils/logger";

export interface ApiDependencies {
  settingsService: SettingsService;
  scheduleCache: ScheduleCache;
  locationService: LocationService;
  tracker: CompletionTracker;
  analytics: PrayerAnalytics;
  poller: PrayerStatePoller;
  apiKey?: string;
  timezone?: string;
  now?: () => Date;
}

function getApiKey(req: Request): string | null {
  const auth = req.headers.authorization;
  if (auth?.startsWith("Bearer ")) return auth.slice(7).trim();
  const key = req.headers["x-api-key"];
  if (typeof key === "string") return key.trim();
  return null;
}

function requireApiKey(apiKey: string) {
  return (req: Request, res: Response, next: NextFunction): void => {
    if (!apiKey) {
      next();
      return;
    }
    const provided = getApiKey(req);
    if (!provided || provided !== apiKey) {
      res.status(401).json({ error: "Unauthorized" });
      return;
    }
    next();
  };
}

function sendError(res: Response, context: string, error: unknown): void {
  if (error instanceof ZodError) {
    res.status(400).json({ error: "Invalid request", issues: error.issues.map((i) => i.message) });
    return;
  }
  logger.error(`${context}:`, error);
  res.status(500).json({ error: toError(error).message });
}

function parsePrayerId(req: Request, res: Response): PrayerId | null {
  const parsed = PrayerIdSchema.safeParse(req.params.prayerId);
  if (!parsed.success) {
    res.status(404).json({ error: `Unknown prayer "${req.params.prayerId}"` });
    return null;
  }
  return parsed.data;
}

function parseTrackableId(req: Request, res: Response): TrackablePrayerId | null {
  const parsed = TrackablePrayerIdSchema.safeParse(req.params.prayerId);
  if (!parsed.success) {
    res.status(404).json({ error: `"${req.params.prayerId}" is not a tracked prayer` });
    return null;
  }
  return parsed.data;
}

export function createApiRouter(deps: ApiDependencies): Router {
  const router = Router();
  const timezone = deps.timezone ?? config.timezone;
  const now = deps.now ?? (() => new Date());

  router.use(requireApiKey(deps.apiKey ?? config.api.apiKey));

  /** GET /api/prayers/today - Today's times, formatted per settings */
  router.get("/prayers/today", async (_req: Request, res: Response) => {
    try {
      const settings = deps.settingsService.current;
      const date = timezoneService.getDateInTimezone(timezone, now());
      const location = await deps.locationService.getCoordinates();
      const times = await deps.scheduleCache.getOrCompute(
        date,
        location,
        settings.calculationMethod,
        settings.legalSchool
      );
      const prayers = Object.entries(times.slots).map(([prayerId, slot]) =>
        slot.ok
          ? {
              prayerId,
              time: slot.time.toISOString(),
              display: timezoneService.formatTime(slot.time, timezone, settings.timeFormat),
            }
          : { prayerId, time: null, error: slot.reason }
      );
      res.json({ date, location, hijri: times.hijri, prayers });
    } catch (error) {
      sendError(res, "Error fetching today's prayer times", error);
    }
  });

  /** GET /api/prayers/state - Current and next prayer */
  router.get("/prayers/state", (_req: Request, res: Response) => {
    const state = deps.poller.state;
    res.json({ ...state, nextPrayerTime: state.nextPrayerTime?.toISOString() ?? null });
  });

  router.get("/settings", (_req: Request, res: Response) => {
    res.json(deps.settingsService.current);
  });

  /** PATCH /api/settings - Partial update; reminder-affecting fields reschedule */
  router.patch("/settings", async (req: Request, res: Response) => {
    try {
      const patch = SettingsPatchSchema.parse(req.body);
      res.json(await deps.settingsService.applyPatch(patch));
    } catch (error) {
      sendError(res, "Error updating settings", error);
    }
  });

  router.post("/settings/reset", async (_req: Request, res: Response) => {
    try {
      res.json(await deps.settingsService.resetToDefaults());
    } catch (error) {
      sendError(res, "Error resetting settings", error);
    }
  });

  router.get("/settings/export", (_req: Request, res: Response) => {
    res.type("application/json").send(deps.settingsService.exportSettings());
  });

  router.post("/settings/import", async (req: Request, res: Response) => {
    try {
      const imported = await deps.settingsService.importSettings(JSON.stringify(req.body));
      if (!imported) {
        res.status(400).json({ error: "Not a valid settings document" });
        return;
      }
      res.json(imported);
    } catch (error) {
      sendError(res, "Error importing settings", error);
    }
  });

  /** POST /api/completions/:prayerId - Mark completed (refused before its time) */
  router.post("/completions/:prayerId", async (req: Request, res: Response) => {
    const prayerId = parsePrayerId(req, res);
    if (!prayerId) return;
    try {
      const { date } = CompletionBodySchema.parse(req.body ?? {});
      const result = await deps.tracker.markCompleted(prayerId, date);
      if (result.ok) {
        res.status(201).json(result.record);
      } else if (result.reason === "not_yet_due") {
        res.status(409).json({ error: result.reason, scheduledAt: result.scheduledAt.toISOString() });
      } else {
        res.status(422).json({ error: result.reason });
      }
    } catch (error) {
      sendError(res, "Error marking prayer completed", error);
    }
  });

  router.delete("/completions/:prayerId", async (req: Request, res: Response) => {
    const prayerId = parseTrackableId(req, res);
    if (!prayerId) return;
    try {
      const { date } = CompletionBodySchema.parse({ date: req.query.date });
      const removed = await deps.tracker.unmark(prayerId, date);
      res.status(removed ? 200 : 404).json({ removed });
    } catch (error) {
      sendError(res, "Error unmarking prayer", error);
    }
  });

  router.get("/completions/:prayerId/streak", async (req: Request, res: Response) => {
    const prayerId = parseTrackableId(req, res);
    if (!prayerId) return;
    try {
      const [streak, completedToday] = await Promise.all([
        deps.tracker.getStreak(prayerId),
        deps.tracker.isCompletedToday(prayerId),
      ]);
      res.json({ prayerId, ...streak, completedToday });
    } catch (error) {
      sendError(res, "Error computing streak", error);
    }
  });

  /** GET /api/analytics?days=30 - Completion analytics, 1 to 365 days */
  router.get("/analytics", async (req: Request, res: Response) => {
    const days = Math.min(Math.max(parseInt(String(req.query.days || "30"), 10) || 30, 1), 365);
    try {
      res.json(await deps.analytics.report(days));
    } catch (error) {
      sendError(res, "Error computing analytics", error);
    }
  });

  return router;
}
