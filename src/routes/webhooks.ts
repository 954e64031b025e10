import type { Request, Response } from "express";
import { Router } from "express";
import { z } from "zod";
import { TwilioNotificationSink } from "../services/notificationSink";
import logger from "../utils/logger";

const StatusCallbackSchema = z.object({
  MessageSid: z.string().optional(),
  MessageStatus: z.string(),
  ErrorCode: z.coerce.number().int().optional(),
});

export interface WebhookDependencies {
  sink: TwilioNotificationSink;
  /** Returns false for requests not signed by Twilio. */
  verifySignature: (url: string, params: Record<string, string>, signature: string) => boolean;
}

function formParams(body: unknown): Record<string, string> {
  const params: Record<string, string> = {};
  if (typeof body === "object" && body !== null) {
    for (const [key, value] of Object.entries(body)) {
      if (typeof value === "string") params[key] = value;
    }
  }
  return params;
}

export function createWebhookRouter(deps: WebhookDependencies): Router {
  const router = Router();

  // Twilio status callback endpoint for message delivery status
  router.post("/status", (req: Request, res: Response) => {
    const signature = req.header("X-Twilio-Signature") ?? "";
    const url = `${req.protocol}://${req.get("host")}${req.originalUrl}`;
    if (!deps.verifySignature(url, formParams(req.body), signature)) {
      logger.warn("Rejected status callback with invalid signature");
      res.status(403).send("Forbidden");
      return;
    }

    const parsed = StatusCallbackSchema.safeParse(req.body);
    if (!parsed.success) {
      logger.warn("Invalid status callback payload:", req.body);
      res.status(400).send("Bad request");
      return;
    }

    const { MessageSid, MessageStatus, ErrorCode } = parsed.data;
    logger.info("Message status update:", { MessageSid, MessageStatus, ErrorCode });
    deps.sink.recordDeliveryStatus(MessageStatus, ErrorCode ?? null);
    res.status(200).send("OK");
  });

  return router;
}
