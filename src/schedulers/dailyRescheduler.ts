import cron from "node-cron";
import type { ScheduledTask } from "node-cron";
import { config } from "../config";
import logger from "../utils/logger";

export interface DailyReschedulerOptions {
  reschedule: () => Promise<unknown>;
  timezone?: string;
  /** Defaults to five minutes past local midnight. */
  expression?: string;
}

/** Re-arms the day's prayer reminders once the calendar day has turned. */
export class DailyRescheduler {
  private task: ScheduledTask | null = null;
  private readonly reschedule: () => Promise<unknown>;
  private readonly timezone: string;
  private readonly expression: string;

  constructor(options: DailyReschedulerOptions) {
    this.reschedule = options.reschedule;
    this.timezone = options.timezone ?? config.timezone;
    this.expression = options.expression ?? "5 0 * * *";
  }

  start(): void {
    if (this.task) {
      logger.warn("Daily rescheduler is already running");
      return;
    }
    this.task = cron.schedule(
      this.expression,
      () => {
        void this.run();
      },
      { timezone: this.timezone }
    );
    logger.info(`Daily rescheduler started (${this.expression} ${this.timezone})`);
  }

  stop(): void {
    this.task?.stop();
    this.task = null;
  }

  async run(): Promise<void> {
    try {
      logger.info("Running daily reminder reschedule");
      await this.reschedule();
    } catch (error) {
      logger.error("Daily reschedule failed:", error);
    }
  }
}
