import twilio from "twilio";
import { config } from "../config";
import logger from "../utils/logger";

type TwilioClient = ReturnType<typeof twilio>;

/** Anything that can deliver a text message to a recipient. */
export interface MessageSender {
  /** Resolves with the provider's message id. */
  sendMessage(to: string, message: string): Promise<string>;
}

/** Twilio error codes meaning the recipient cannot currently receive messages. */
export const RECIPIENT_BLOCKED_CODES: ReadonlySet<number> = new Set([21610, 63016]);

export function twilioErrorCode(error: unknown): number | null {
  if (typeof error === "object" && error !== null && "code" in error && typeof error.code === "number") {
    return error.code;
  }
  return null;
}

export class TwilioService implements MessageSender {
  private client: TwilioClient | null = null;

  /** Created on first send so that importing never requires credentials. */
  private getClient(): TwilioClient {
    if (!this.client) {
      this.client = twilio(config.twilio.accountSid, config.twilio.authToken);
    }
    return this.client;
  }

  /**
   * Sends a WhatsApp message using Twilio
   */
  async sendMessage(to: string, message: string): Promise<string> {
    try {
      const result = await this.getClient().messages.create({
        from: `whatsapp:${config.twilio.whatsappFrom}`,
        to: `whatsapp:${to}`,
        body: message,
      });

      logger.info(`Message sent to ${to}: ${result.sid}`);
      return result.sid;
    } catch (error) {
      logger.error(`Error sending message to ${to}:`, error);
      throw error;
    }
  }

  /**
   * Validates webhook signature
   */
  validateWebhookSignature(
    url: string,
    params: Record<string, string>,
    signature: string
  ): boolean {
    try {
      return twilio.validateRequest(config.twilio.authToken, signature, url, params);
    } catch (error) {
      logger.error("Error validating webhook signature:", error);
      return false;
    }
  }
}

export default new TwilioService();
