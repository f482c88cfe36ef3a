/**
 * Monitoring notifications around a job run
 */

import type { JobOutcome, Monitor, MonitorKey } from "../../types";
import { logger } from "../../utils/logger";

async function notifyAll(
  monitors: Monitor[],
  event: string,
  notify: (monitor: Monitor) => Promise<void>,
): Promise<void> {
  await Promise.all(
    monitors.map(async (monitor) => {
      try {
        await notify(monitor);
      } catch (err) {
        logger.warn(`Monitor ${monitor.name} failed to send ${event} notification`, err);
      }
    }),
  );
}

/**
 * Send start, run the job, then send success or failure with the run's
 * stats. Notification failures are logged and never change the outcome.
 */
export async function runMonitoredJob(
  key: MonitorKey,
  monitors: Monitor[],
  run: () => Promise<JobOutcome>,
): Promise<JobOutcome> {
  await notifyAll(monitors, "start", (monitor) => monitor.notifyStart(key));

  const outcome = await run();

  if (outcome.ok) {
    await notifyAll(monitors, "success", (monitor) => monitor.notifySuccess(key, outcome.stats));
  } else {
    await notifyAll(monitors, "failure", (monitor) => monitor.notifyFailure(key, outcome.stats));
  }

  return outcome;
}
