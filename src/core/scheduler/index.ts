/**
 * Scheduler module exports
 */

export { runMonitoredJob } from "./adapter";
export {
  getNextRun,
  matchesCron,
  type ParseCronOptions,
  type ParsedCron,
  parseCron,
} from "./cron-parser";
export { type JobStatus, type ScheduledJob, Scheduler, type SchedulerOptions } from "./daemon";
