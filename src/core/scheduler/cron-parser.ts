/**
 * Cron expression parser using cron-parser library
 *
 * Supports: minute hour day-of-month month day-of-week
 *
 * Examples:
 *   "0 2 * * *"      - Every day at 2:00 AM
 *   "30 1 * * 6"     - Every Saturday at 1:30 AM
 *   "0 0,12 * * *"   - Twice a day
 */

import { CronExpressionParser } from "cron-parser";

export interface ParsedCron {
  expression: string;
  timezone?: string;
}

export interface ParseCronOptions {
  timezone?: string;
}

function parserOptions(cron: ParsedCron, currentDate?: Date): { currentDate?: Date; tz?: string } {
  const options: { currentDate?: Date; tz?: string } = {};
  if (currentDate) {
    options.currentDate = currentDate;
  }
  if (cron.timezone) {
    options.tz = cron.timezone;
  }
  return options;
}

/**
 * Validate a five-field expression (and timezone) up front so that a bad
 * schedule fails at startup rather than at its first check.
 */
export function parseCron(expression: string, options?: ParseCronOptions): ParsedCron {
  const fields = expression.trim().split(/\s+/);
  if (fields.length !== 5) {
    throw new Error(
      `Invalid cron expression: "${expression}". Expected 5 fields, got ${fields.length}.`,
    );
  }

  const cron: ParsedCron = { expression: expression.trim() };
  if (options?.timezone) {
    cron.timezone = options.timezone;
  }
  CronExpressionParser.parse(cron.expression, parserOptions(cron));
  return cron;
}

/**
 * Whether the expression fires in the minute containing `date`
 */
export function matchesCron(cron: ParsedCron, date: Date): boolean {
  const minute = new Date(date);
  minute.setSeconds(0, 0);

  const from = new Date(minute.getTime() - 60_000);
  const next = CronExpressionParser.parse(cron.expression, parserOptions(cron, from))
    .next()
    .toDate();
  next.setSeconds(0, 0);

  return next.getTime() === minute.getTime();
}

export function getNextRun(cron: ParsedCron, fromDate: Date = new Date()): Date {
  return CronExpressionParser.parse(cron.expression, parserOptions(cron, fromDate))
    .next()
    .toDate();
}
