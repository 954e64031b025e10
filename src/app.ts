import express from "express";
import type { Express } from "express";
import type { ApiDependencies } from "./routes/api";
import { createApiRouter } from "./routes/api";
import type { WebhookDependencies } from "./routes/webhooks";
import { createWebhookRouter } from "./routes/webhooks";

export interface AppDependencies extends ApiDependencies {
  webhooks?: WebhookDependencies;
}

export function createApp(deps: AppDependencies): Express {
  const app = express();

  app.use(express.urlencoded({ extended: true }));
  app.use(express.json());

  // Health check endpoint
  app.get("/health", (_req, res) => {
    res.status(200).json({ status: "ok", timestamp: new Date().toISOString() });
  });

  app.use("/api", createApiRouter(deps));
  if (deps.webhooks) {
    app.use("/webhook", createWebhookRouter(deps.webhooks));
  }

  return app;
}
