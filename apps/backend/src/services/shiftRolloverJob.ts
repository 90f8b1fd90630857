/**
 * Shift Rollover Job
 * Background timer that notices the calendar day changing and opens the new
 * day's shift totals so displays reset at midnight without a restart.
 */

import type { Logger } from "pino";
import type { LineService } from "./lineService";

const DEFAULT_INTERVAL_MS = 60 * 1000;

export class ShiftRolloverJob {
  private intervalHandle: ReturnType<typeof setInterval> | null = null;
  private isRunning = false;

  constructor(
    private readonly lineService: LineService,
    private readonly logger: Logger,
    private readonly intervalMs: number = DEFAULT_INTERVAL_MS,
  ) {}

  start(): void {
    if (this.intervalHandle) {
      this.logger.warn("Shift rollover job already running");
      return;
    }

    this.logger.info({ intervalMs: this.intervalMs }, "Starting shift rollover job");
    this.intervalHandle = setInterval(() => {
      void this.runOnce();
    }, this.intervalMs);
    this.intervalHandle.unref();
  }

  stop(): void {
    if (this.intervalHandle) {
      clearInterval(this.intervalHandle);
      this.intervalHandle = null;
      this.logger.info("Shift rollover job stopped");
    }
  }

  /** One check. Never rejects; failures are logged and retried next tick. */
  async runOnce(): Promise<boolean> {
    if (this.isRunning) {
      this.logger.debug("Shift rollover check already running, skipping");
      return false;
    }

    this.isRunning = true;
    try {
      return await this.lineService.checkShiftRollover();
    } catch (error) {
      this.logger.error({ err: error }, "Shift rollover check failed");
      return false;
    } finally {
      this.isRunning = false;
    }
  }
}
