/**
 * Schedule math - next run times for workflows and scheduled reports
 *
 * Interval descriptors are exact. Cron-like descriptors go through a
 * NextRunCalculator; the default moves the run forward one day.
 */

import { createLogger } from '../utils/logger';
import { DAY_MS, HOUR_MS, MINUTE_MS, type JsonObject, type ScheduledReport, type Workflow } from './types';

const logger = createLogger('schedule');

const DEFAULT_WORKFLOW_INTERVAL_MINUTES = 60;
const DEFAULT_REPORT_INTERVAL_HOURS = 24;

/** Next run time for a cron-like descriptor, or null when there is none. */
export type NextRunCalculator = (descriptor: JsonObject, now: number) => number | null;

export type CronCalculatorName = 'daily' | 'expression';

// =============================================================================
// CALCULATORS
// =============================================================================

/** Ignores the expression and runs again in one day. */
export const dailyCronCalculator: NextRunCalculator = (_descriptor, now) => now + DAY_MS;

/**
 * Five-field cron (`minute hour day-of-month month day-of-week`, UTC).
 * Supports `*`, lists, ranges and steps. Falls back to one day when the
 * expression does not parse or never matches.
 */
export const cronExpressionCalculator: NextRunCalculator = (descriptor, now) => {
  const expression = typeof descriptor.expression === 'string' ? descriptor.expression : '';
  const parsed = parseCronExpression(expression);
  if (!parsed.ok) {
    logger.warn({ expression, error: parsed.error }, 'Unusable cron expression, scheduling one day ahead');
    return now + DAY_MS;
  }
  const next = nextCronTime(parsed.schedule, now);
  if (next === null) {
    logger.warn({ expression }, 'Cron expression never matches, scheduling one day ahead');
    return now + DAY_MS;
  }
  return next;
};

export function getCronCalculator(name: CronCalculatorName): NextRunCalculator {
  return name === 'expression' ? cronExpressionCalculator : dailyCronCalculator;
}

// =============================================================================
// CRON EXPRESSIONS
// =============================================================================

/** Allowed values per field, ascending. Day of week 0 is Sunday. */
export interface CronSchedule {
  minutes: number[];
  hours: number[];
  daysOfMonth: number[];
  months: number[];
  daysOfWeek: number[];
}

export type CronParseResult = { ok: true; schedule: CronSchedule } | { ok: false; error: string };

interface CronFieldRange {
  name: string;
  min: number;
  max: number;
}

const MINUTE_FIELD: CronFieldRange = { name: 'minute', min: 0, max: 59 };
const HOUR_FIELD: CronFieldRange = { name: 'hour', min: 0, max: 23 };
const DAY_OF_MONTH_FIELD: CronFieldRange = { name: 'day of month', min: 1, max: 31 };
const MONTH_FIELD: CronFieldRange = { name: 'month', min: 1, max: 12 };
const DAY_OF_WEEK_FIELD: CronFieldRange = { name: 'day of week', min: 0, max: 7 };

// `*`, `n` or `n-m`, each with an optional `/step`
const CRON_PART = /^(?:(\*)|(\d+)(?:-(\d+))?)(?:\/(\d+))?$/;

// Weekday patterns of the calendar repeat every 28 years
const SEARCH_YEARS = 28;

function parseCronField(field: string, range: CronFieldRange): number[] | null {
  const values = new Set<number>();
  for (const part of field.split(',')) {
    const match = CRON_PART.exec(part);
    if (!match) return null;
    const [, star, startText, endText, stepText] = match;

    const start = star ? range.min : Number(startText);
    let end = start;
    if (star) end = range.max;
    else if (endText !== undefined) end = Number(endText);
    else if (stepText !== undefined) end = range.max;
    const step = stepText === undefined ? 1 : Number(stepText);

    if (start < range.min || end > range.max || start > end || step < 1) return null;
    for (let value = start; value <= end; value += step) values.add(value);
  }
  return [...values].sort((a, b) => a - b);
}

/** Parse a five-field expression, naming the first field that is out of range. */
export function parseCronExpression(expression: string): CronParseResult {
  const fields = expression.trim().split(/\s+/);
  if (fields.length !== 5) return { ok: false, error: 'Cron expression must have five fields' };

  const [minuteField, hourField, dayOfMonthField, monthField, dayOfWeekField] = fields;
  const field = (text: string, range: CronFieldRange): number[] | string =>
    parseCronField(text, range) ?? `Invalid ${range.name} field "${text}"`;

  const minutes = field(minuteField, MINUTE_FIELD);
  if (typeof minutes === 'string') return { ok: false, error: minutes };
  const hours = field(hourField, HOUR_FIELD);
  if (typeof hours === 'string') return { ok: false, error: hours };
  const daysOfMonth = field(dayOfMonthField, DAY_OF_MONTH_FIELD);
  if (typeof daysOfMonth === 'string') return { ok: false, error: daysOfMonth };
  const months = field(monthField, MONTH_FIELD);
  if (typeof months === 'string') return { ok: false, error: months };
  const daysOfWeek = field(dayOfWeekField, DAY_OF_WEEK_FIELD);
  if (typeof daysOfWeek === 'string') return { ok: false, error: daysOfWeek };

  // 7 is another name for Sunday
  const weekdays = [...new Set(daysOfWeek.map((d) => d % 7))].sort((a, b) => a - b);
  return { ok: true, schedule: { minutes, hours, daysOfMonth, months, daysOfWeek: weekdays } };
}

/**
 * First matching minute strictly after `now`, or null when none exists.
 * Day of month and day of week must both match.
 */
export function nextCronTime(schedule: CronSchedule, now: number): number | null {
  const start = new Date(Math.floor(now / MINUTE_MS) * MINUTE_MS + MINUTE_MS);
  const startYear = start.getUTCFullYear();
  const startMonth = start.getUTCMonth() + 1;
  const startDay = start.getUTCDate();
  const startHour = start.getUTCHours();
  const startMinute = start.getUTCMinutes();
  const weekdays = new Set(schedule.daysOfWeek);

  for (let year = startYear; year <= startYear + SEARCH_YEARS; year++) {
    for (const month of schedule.months) {
      if (year === startYear && month < startMonth) continue;
      const inStartMonth = year === startYear && month === startMonth;
      const monthLength = new Date(Date.UTC(year, month, 0)).getUTCDate();

      for (const day of schedule.daysOfMonth) {
        if (day > monthLength) break;
        if (inStartMonth && day < startDay) continue;
        if (!weekdays.has(new Date(Date.UTC(year, month - 1, day)).getUTCDay())) continue;
        const onStartDay = inStartMonth && day === startDay;

        for (const hour of schedule.hours) {
          if (onStartDay && hour < startHour) continue;
          const earliest = onStartDay && hour === startHour ? startMinute : 0;
          const minute = schedule.minutes.find((m) => m >= earliest);
          if (minute !== undefined) return Date.UTC(year, month - 1, day, hour, minute);
        }
      }
    }
  }

  return null;
}

/** Why an expression cannot be scheduled, or null when it can. */
export function cronExpressionProblem(expression: string): string | null {
  const parsed = parseCronExpression(expression);
  if (!parsed.ok) return parsed.error;
  if (nextCronTime(parsed.schedule, 0) === null) return 'Cron expression never matches';
  return null;
}

// =============================================================================
// NEXT RUN
// =============================================================================

function positiveNumber(value: unknown, fallback: number): number {
  return typeof value === 'number' && Number.isFinite(value) && value > 0 ? value : fallback;
}

/**
 * Next execution for a workflow. Null unless the workflow is active with a
 * schedule trigger, which keeps `nextExecution` consistent with its status.
 */
export function computeNextWorkflowRun(
  workflow: Pick<Workflow, 'status' | 'triggerKind' | 'triggerConfig'>,
  now: number,
  calculator: NextRunCalculator = dailyCronCalculator,
): number | null {
  if (workflow.status !== 'active' || workflow.triggerKind !== 'schedule') return null;

  const config = workflow.triggerConfig;
  switch (config.type) {
    case 'interval':
      return now + positiveNumber(config.interval_minutes, DEFAULT_WORKFLOW_INTERVAL_MINUTES) * MINUTE_MS;
    case 'cron':
      return calculator(config, now);
    default:
      return null;
  }
}

export function computeNextReportRun(
  report: Pick<ScheduledReport, 'scheduleType' | 'scheduleConfig'>,
  now: number,
  calculator: NextRunCalculator = dailyCronCalculator,
): number | null {
  switch (report.scheduleType) {
    case 'interval':
      return now + positiveNumber(report.scheduleConfig.interval_hours, DEFAULT_REPORT_INTERVAL_HOURS) * HOUR_MS;
    case 'cron':
      return calculator(report.scheduleConfig, now);
  }
}
