import { EventEmitter } from "events";
import type {
  DeliveredReminder,
  NotificationPermissionStatus,
  ReminderId,
  ReminderRequest,
} from "../types";
import type { MessageSender } from "./twilio";
import { RECIPIENT_BLOCKED_CODES, twilioErrorCode } from "./twilio";
import messageTemplates from "../utils/messageTemplates";
import logger from "../utils/logger";

export type DeliveredListener = (delivered: DeliveredReminder) => void;
export type PermissionListener = (status: NotificationPermissionStatus) => void;

/**
 * Destination for scheduled reminders. Scheduling an id that is already
 * pending replaces it.
 */
export interface NotificationSink {
  schedule(request: ReminderRequest): Promise<void>;
  cancel(id: ReminderId): Promise<void>;
  cancelMany(ids: readonly ReminderId[]): Promise<void>;
  cancelAll(): Promise<void>;
  pending(): ReminderRequest[];
  onDelivered(listener: DeliveredListener): () => void;
  onPermissionStatus(listener: PermissionListener): () => void;
}

// setTimeout overflows past this delay.
const MAX_TIMER_DELAY_MS = 2 ** 31 - 1;

/** Arms one in-process timer per reminder id and delivers when it fires. */
export abstract class TimerNotificationSink implements NotificationSink {
  private timers = new Map<ReminderId, { request: ReminderRequest; timer: NodeJS.Timeout }>();
  private events = new EventEmitter();

  constructor(protected readonly now: () => Date = () => new Date()) {}

  protected abstract deliver(request: ReminderRequest): Promise<void>;

  async schedule(request: ReminderRequest): Promise<void> {
    this.clearTimer(request.id);
    this.arm(request);
    logger.debug(`Reminder ${request.id} armed for ${request.fireAt.toISOString()}`);
  }

  async cancel(id: ReminderId): Promise<void> {
    this.clearTimer(id);
  }

  async cancelMany(ids: readonly ReminderId[]): Promise<void> {
    for (const id of ids) this.clearTimer(id);
  }

  async cancelAll(): Promise<void> {
    for (const id of [...this.timers.keys()]) this.clearTimer(id);
  }

  pending(): ReminderRequest[] {
    return [...this.timers.values()]
      .map(({ request }) => request)
      .sort((a, b) => a.fireAt.getTime() - b.fireAt.getTime());
  }

  onDelivered(listener: DeliveredListener): () => void {
    this.events.on("delivered", listener);
    return () => {
      this.events.off("delivered", listener);
    };
  }

  onPermissionStatus(listener: PermissionListener): () => void {
    this.events.on("permission", listener);
    return () => {
      this.events.off("permission", listener);
    };
  }

  dispose(): void {
    for (const id of [...this.timers.keys()]) this.clearTimer(id);
    this.events.removeAllListeners();
  }

  protected emitPermission(status: NotificationPermissionStatus): void {
    this.events.emit("permission", status);
  }

  private arm(request: ReminderRequest): void {
    const delay = Math.max(0, request.fireAt.getTime() - this.now().getTime());
    const timer = setTimeout(() => {
      if (delay > MAX_TIMER_DELAY_MS) {
        this.arm(request);
        return;
      }
      this.timers.delete(request.id);
      void this.fire(request);
    }, Math.min(delay, MAX_TIMER_DELAY_MS));
    this.timers.set(request.id, { request, timer });
  }

  private async fire(request: ReminderRequest): Promise<void> {
    let succeeded = true;
    try {
      await this.deliver(request);
    } catch (error) {
      succeeded = false;
      logger.error(`Delivering reminder ${request.id} failed:`, error);
    }
    const delivered: DeliveredReminder = {
      id: request.id,
      deliveredAt: this.now(),
      succeeded,
      payload: request.payload,
    };
    try {
      this.events.emit("delivered", delivered);
    } catch (error) {
      logger.error(`Delivered listener for ${request.id} failed:`, error);
    }
  }

  private clearTimer(id: ReminderId): void {
    const entry = this.timers.get(id);
    if (entry) {
      clearTimeout(entry.timer);
      this.timers.delete(id);
    }
  }
}

/**
 * Delivers reminders as WhatsApp messages. Twilio's answer doubles as the
 * permission signal: a successful send means granted, an opt-out error
 * means denied.
 */
export class TwilioNotificationSink extends TimerNotificationSink {
  private lastStatus: NotificationPermissionStatus = "notDetermined";

  constructor(
    private readonly sender: MessageSender,
    private readonly recipient: string,
    now?: () => Date
  ) {
    super(now);
  }

  get permissionStatus(): NotificationPermissionStatus {
    return this.lastStatus;
  }

  protected async deliver(request: ReminderRequest): Promise<void> {
    try {
      await this.sender.sendMessage(
        this.recipient,
        messageTemplates.formatMessage(request.title, request.body)
      );
      this.updateStatus("granted");
    } catch (error) {
      const code = twilioErrorCode(error);
      if (code !== null && RECIPIENT_BLOCKED_CODES.has(code)) {
        this.updateStatus("denied");
      }
      throw error;
    }
  }

  /** Applies a delivery status reported back by Twilio's status callback. */
  recordDeliveryStatus(messageStatus: string, errorCode: number | null): void {
    if (errorCode !== null && RECIPIENT_BLOCKED_CODES.has(errorCode)) {
      this.updateStatus("denied");
    } else if (messageStatus === "delivered" || messageStatus === "read") {
      this.updateStatus("granted");
    }
  }

  private updateStatus(status: NotificationPermissionStatus): void {
    if (status === this.lastStatus) return;
    this.lastStatus = status;
    this.emitPermission(status);
  }
}

/** Writes reminders to the log instead of sending them. */
export class LogNotificationSink extends TimerNotificationSink {
  protected async deliver(request: ReminderRequest): Promise<void> {
    logger.info(`Reminder ${request.id}: ${request.title} - ${request.body}`, {
      sound: request.sound,
      soundFile: request.soundFile,
    });
  }
}
