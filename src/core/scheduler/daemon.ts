/**
 * Scheduler daemon
 */

import type { JobOutcome } from "../../types";
import { describeError } from "../../utils/errors";
import { logger } from "../../utils/logger";
import { getNextRun, matchesCron, type ParsedCron, parseCron } from "./cron-parser";

export interface ScheduledJob {
  name: string;
  schedule: string;
  timezone?: string;
  run: () => Promise<JobOutcome>;
}

export interface SchedulerOptions {
  /** How often schedules are checked, one minute by default */
  checkIntervalMs?: number;
  now?: () => Date;
}

export interface JobStatus {
  name: string;
  cron: string;
  timezone: string | undefined;
  running: boolean;
  lastRun: Date | null;
  lastResult: "success" | "failure" | null;
  nextRun: Date | null;
}

interface JobState {
  job: ScheduledJob;
  cron: ParsedCron;
  lastRun: Date | null;
  lastResult: "success" | "failure" | null;
  active: Promise<void> | null;
}

export class Scheduler {
  private readonly jobs = new Map<string, JobState>();
  private readonly checkIntervalMs: number;
  private readonly now: () => Date;
  private checkInterval: NodeJS.Timeout | null = null;

  /**
   * Throws when a job's schedule does not parse
   */
  constructor(jobs: ScheduledJob[], options: SchedulerOptions = {}) {
    this.checkIntervalMs = options.checkIntervalMs ?? 60 * 1000;
    this.now = options.now ?? (() => new Date());

    for (const job of jobs) {
      const cron = parseCron(job.schedule, { timezone: job.timezone });
      this.jobs.set(job.name, { job, cron, lastRun: null, lastResult: null, active: null });
      logger.debug(`Parsed schedule for job "${job.name}": ${job.schedule}`);
    }
  }

  get isStarted(): boolean {
    return this.checkInterval !== null;
  }

  start(): void {
    if (this.checkInterval) {
      logger.warn("Scheduler is already running");
      return;
    }

    logger.info(`Scheduler started with ${this.jobs.size} job(s)`);
    this.checkSchedules();
    this.checkInterval = setInterval(() => this.checkSchedules(), this.checkIntervalMs);
  }

  /**
   * Stop triggering new runs and wait for active ones to finish
   */
  async stop(): Promise<void> {
    if (this.checkInterval) {
      clearInterval(this.checkInterval);
      this.checkInterval = null;
      logger.info("Scheduler stopped");
    }
    await this.whenIdle();
  }

  async whenIdle(): Promise<void> {
    const active: Promise<void>[] = [];
    for (const state of this.jobs.values()) {
      if (state.active) active.push(state.active);
    }
    await Promise.all(active);
  }

  /**
   * Launch every job due in the current minute. A job whose previous run
   * is still in progress is skipped for this tick.
   */
  checkSchedules(): void {
    const now = this.now();
    now.setSeconds(0, 0);

    for (const [name, state] of this.jobs) {
      if (!matchesCron(state.cron, now)) {
        continue;
      }
      if (state.lastRun && state.lastRun.getTime() === now.getTime()) {
        continue;
      }
      if (state.active) {
        logger.warn(`Job "${name}" is still running, skipping this trigger`);
        continue;
      }

      logger.info(`Job "${name}" triggered`);
      state.lastRun = now;
      state.active = this.execute(state).finally(() => {
        state.active = null;
      });
    }
  }

  private async execute(state: JobState): Promise<void> {
    try {
      const outcome = await state.job.run();
      state.lastResult = outcome.ok ? "success" : "failure";
      if (outcome.ok) {
        logger.info(`Job "${state.job.name}" completed`);
      } else {
        logger.error(`Job "${state.job.name}" failed: ${describeError(outcome.error)}`);
      }
    } catch (err) {
      state.lastResult = "failure";
      logger.error(`Job "${state.job.name}" crashed`, err);
    }
  }

  getNextRun(name: string): Date | null {
    const state = this.jobs.get(name);
    if (!state) {
      return null;
    }
    return getNextRun(state.cron, this.now());
  }

  getStatus(): JobStatus[] {
    return [...this.jobs.values()].map((state) => ({
      name: state.job.name,
      cron: state.cron.expression,
      timezone: state.cron.timezone,
      running: state.active !== null,
      lastRun: state.lastRun,
      lastResult: state.lastResult,
      nextRun: this.getNextRun(state.job.name),
    }));
  }
}
