// =============================================================================
// @reinforce-lab/worker — Cron scheduler for the digest
// =============================================================================
// Wraps node-cron to run the digest on a schedule (DIGEST_CRON). A tick that
// fires while the previous run is still going is skipped. Returns a handle
// with stop() for graceful shutdown.
// =============================================================================

import cron, { type ScheduledTask } from "node-cron";
import type { Logger } from "@reinforce-lab/shared";

export interface SchedulerHandle {
  stop(): void;
}

export function startScheduler(
  name: string,
  schedule: string,
  job: () => Promise<unknown>,
  logger: Logger,
): SchedulerHandle {
  if (!cron.validate(schedule)) {
    throw new Error(`Invalid cron expression for ${name}: "${schedule}"`);
  }

  let running = false;

  const task: ScheduledTask = cron.schedule(schedule, async () => {
    if (running) {
      logger.warn(`Cron job still running, skipping tick: ${name}`);
      return;
    }

    running = true;
    const start = performance.now();
    logger.info(`Cron job starting: ${name}`);
    try {
      const result = await job();
      const durationMs = Math.round(performance.now() - start);
      logger.info(`Cron job completed: ${name}`, { durationMs, result });
    } catch (err) {
      const durationMs = Math.round(performance.now() - start);
      logger.error(`Cron job failed: ${name}`, {
        durationMs,
        error: err instanceof Error ? err.message : String(err),
      });
    } finally {
      running = false;
    }
  });

  logger.info("Cron scheduler started", { job: name, schedule });

  return {
    stop() {
      task.stop();
      logger.info("Cron scheduler stopped", { job: name });
    },
  };
}
