// =============================================================================
// @rss-courier/worker — Cron scheduler for watch mode
// =============================================================================
// Wraps node-cron to repeat the pipeline on CRON_SCHEDULE. A tick that fires
// while the previous run is still going is skipped rather than queued.
// Returns a handle with stop() for graceful shutdown.
// =============================================================================

import cron from "node-cron";
import { ConfigError, errorMessage, type Logger } from "@rss-courier/shared";

export interface SchedulerHandle {
  stop(): void;
  /** Resolves when no run is in progress */
  idle(): Promise<void>;
}

/** Throws ConfigError for an expression node-cron would reject. */
export function assertValidSchedule(schedule: string): void {
  if (!cron.validate(schedule)) {
    throw new ConfigError([`CRON_SCHEDULE: "${schedule}" is not a valid cron expression`]);
  }
}

export function startScheduler(
  schedule: string,
  job: () => Promise<unknown>,
  logger: Logger,
): SchedulerHandle {
  assertValidSchedule(schedule);

  let running: Promise<void> | null = null;

  const task = cron.schedule(schedule, () => {
    if (running) {
      logger.warn("Previous run still in progress, skipping tick");
      return;
    }
    const start = performance.now();
    logger.info("Scheduled run starting");
    running = job()
      .then((result) => {
        const durationMs = Math.round(performance.now() - start);
        logger.info("Scheduled run completed", { durationMs, result });
      })
      .catch((err: unknown) => {
        const durationMs = Math.round(performance.now() - start);
        logger.error("Scheduled run failed", {
          durationMs,
          error: errorMessage(err),
        });
      })
      .finally(() => {
        running = null;
      });
  });

  logger.info("Scheduler started", { schedule });

  return {
    stop() {
      task.stop();
      logger.info("Scheduler stopped");
    },
    async idle() {
      if (running) await running;
    },
  };
}
