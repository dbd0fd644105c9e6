import { describe, it, expect } from 'vitest';
import {
  computeNextReportRun,
  computeNextWorkflowRun,
  cronExpressionCalculator,
  cronExpressionProblem,
  nextCronTime,
  parseCronExpression,
  dailyCronCalculator,
  getCronCalculator,
} from './schedule';
import { DAY_MS, HOUR_MS, MINUTE_MS } from './types';
import { T0 } from './test-utils';

describe('computeNextWorkflowRun', () => {
  it('adds the interval to now', () => {
    const next = computeNextWorkflowRun(
      { status: 'active', triggerKind: 'schedule', triggerConfig: { type: 'interval', interval_minutes: 60 } },
      T0,
    );
    expect(next).toBe(T0 + 60 * MINUTE_MS);
  });

  it('defaults to 60 minutes when the interval is missing or invalid', () => {
    expect(
      computeNextWorkflowRun({ status: 'active', triggerKind: 'schedule', triggerConfig: { type: 'interval' } }, T0),
    ).toBe(T0 + HOUR_MS);
    expect(
      computeNextWorkflowRun(
        { status: 'active', triggerKind: 'schedule', triggerConfig: { type: 'interval', interval_minutes: -5 } },
        T0,
      ),
    ).toBe(T0 + HOUR_MS);
  });

  it('moves cron triggers one day ahead by default', () => {
    const next = computeNextWorkflowRun(
      { status: 'active', triggerKind: 'schedule', triggerConfig: { type: 'cron', expression: '0 9 * * 1' } },
      T0,
    );
    expect(next).toBe(T0 + DAY_MS);
  });

  it('uses the supplied calculator for cron triggers', () => {
    const next = computeNextWorkflowRun(
      { status: 'active', triggerKind: 'schedule', triggerConfig: { type: 'cron', expression: '0 9 * * 1' } },
      T0,
      cronExpressionCalculator,
    );
    expect(next).toBe(Date.UTC(2024, 0, 22, 9, 0, 0));
  });

  it('is null unless the workflow is active with a schedule trigger', () => {
    const triggerConfig = { type: 'interval', interval_minutes: 10 };
    expect(computeNextWorkflowRun({ status: 'paused', triggerKind: 'schedule', triggerConfig }, T0)).toBeNull();
    expect(computeNextWorkflowRun({ status: 'active', triggerKind: 'event', triggerConfig }, T0)).toBeNull();
    expect(computeNextWorkflowRun({ status: 'active', triggerKind: 'manual', triggerConfig }, T0)).toBeNull();
  });

  it('is null for an unknown schedule type', () => {
    expect(
      computeNextWorkflowRun({ status: 'active', triggerKind: 'schedule', triggerConfig: { type: 'hourly' } }, T0),
    ).toBeNull();
  });
});

describe('computeNextReportRun', () => {
  it('adds interval hours to now', () => {
    expect(computeNextReportRun({ scheduleType: 'interval', scheduleConfig: { interval_hours: 6 } }, T0)).toBe(
      T0 + 6 * HOUR_MS,
    );
  });

  it('defaults to 24 hours', () => {
    expect(computeNextReportRun({ scheduleType: 'interval', scheduleConfig: {} }, T0)).toBe(T0 + DAY_MS);
  });

  it('moves cron reports one day ahead by default', () => {
    expect(computeNextReportRun({ scheduleType: 'cron', scheduleConfig: { expression: '0 9 * * *' } }, T0)).toBe(
      T0 + DAY_MS,
    );
  });
});

describe('cron calculators', () => {
  it('daily calculator ignores the expression', () => {
    expect(dailyCronCalculator({ expression: '*/5 * * * *' }, T0)).toBe(T0 + DAY_MS);
  });

  it('finds the next matching minute', () => {
    expect(cronExpressionCalculator({ expression: '*/15 * * * *' }, T0)).toBe(T0 + 15 * MINUTE_MS);
    expect(cronExpressionCalculator({ expression: '30 12 * * *' }, T0)).toBe(T0 + 30 * MINUTE_MS);
    expect(cronExpressionCalculator({ expression: '0 8 * * *' }, T0)).toBe(Date.UTC(2024, 0, 16, 8, 0, 0));
  });

  it('supports lists and ranges', () => {
    // Saturday or Sunday at 10:00
    expect(cronExpressionCalculator({ expression: '0 10 * * 0,6' }, T0)).toBe(Date.UTC(2024, 0, 20, 10, 0, 0));
    // Weekdays at 07:00
    expect(cronExpressionCalculator({ expression: '0 7 * * 1-5' }, T0)).toBe(Date.UTC(2024, 0, 16, 7, 0, 0));
  });

  it('supports steps, Sunday as 7 and leap days', () => {
    expect(cronExpressionCalculator({ expression: '0 9-17/4 * * *' }, T0)).toBe(Date.UTC(2024, 0, 15, 13, 0, 0));
    expect(cronExpressionCalculator({ expression: '0 10 * * 7' }, T0)).toBe(Date.UTC(2024, 0, 21, 10, 0, 0));
    expect(cronExpressionCalculator({ expression: '0 9 * * 1' }, T0)).toBe(Date.UTC(2024, 0, 22, 9, 0, 0));
    expect(cronExpressionCalculator({ expression: '0 0 29 2 *' }, T0)).toBe(Date.UTC(2024, 1, 29, 0, 0, 0));
  });

  it('falls back to one day for an unusable expression', () => {
    expect(cronExpressionCalculator({ expression: 'every monday' }, T0)).toBe(T0 + DAY_MS);
    expect(cronExpressionCalculator({ expression: 'not a cron expr' }, T0)).toBe(T0 + DAY_MS);
    expect(cronExpressionCalculator({}, T0)).toBe(T0 + DAY_MS);
  });

  it('falls back to one day for an expression that never matches', () => {
    expect(cronExpressionCalculator({ expression: '0 0 31 2 *' }, T0)).toBe(T0 + DAY_MS);
  });

  it('selects a calculator by name', () => {
    expect(getCronCalculator('daily')).toBe(dailyCronCalculator);
    expect(getCronCalculator('expression')).toBe(cronExpressionCalculator);
  });
});

describe('parseCronExpression', () => {
  it('expands each field into its allowed values', () => {
    expect(parseCronExpression('*/20 9-11 1,15 * 5-7')).toEqual({
      ok: true,
      schedule: {
        minutes: [0, 20, 40],
        hours: [9, 10, 11],
        daysOfMonth: [1, 15],
        months: [1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11, 12],
        daysOfWeek: [0, 5, 6],
      },
    });
  });

  it('rejects the wrong number of fields', () => {
    expect(parseCronExpression('not a cron expr')).toEqual({ ok: false, error: 'Cron expression must have five fields' });
    expect(parseCronExpression('')).toEqual({ ok: false, error: 'Cron expression must have five fields' });
  });

  it('names the field that is out of range', () => {
    expect(parseCronExpression('0 25 * * *')).toEqual({ ok: false, error: 'Invalid hour field "25"' });
    expect(parseCronExpression('60 * * * *')).toEqual({ ok: false, error: 'Invalid minute field "60"' });
    expect(parseCronExpression('0 0 0 * *')).toEqual({ ok: false, error: 'Invalid day of month field "0"' });
    expect(parseCronExpression('0 0 * 5-2 *')).toEqual({ ok: false, error: 'Invalid month field "5-2"' });
    expect(parseCronExpression('0 0 * * mon')).toEqual({ ok: false, error: 'Invalid day of week field "mon"' });
    expect(parseCronExpression('*/0 * * * *')).toEqual({ ok: false, error: 'Invalid minute field "*/0"' });
  });
});

describe('nextCronTime', () => {
  it('returns null when no date matches', () => {
    const parsed = parseCronExpression('0 0 30 2 *');
    expect(parsed.ok).toBe(true);
    if (parsed.ok) expect(nextCronTime(parsed.schedule, T0)).toBeNull();
  });

  it('requires both day fields to match', () => {
    // Friday the 13th
    const parsed = parseCronExpression('0 12 13 * 5');
    if (!parsed.ok) throw new Error(parsed.error);
    expect(nextCronTime(parsed.schedule, T0)).toBe(Date.UTC(2024, 8, 13, 12, 0, 0));
  });
});

describe('cronExpressionProblem', () => {
  it('accepts a schedulable expression', () => {
    expect(cronExpressionProblem('0 9 * * 1')).toBeNull();
  });

  it('reports parse errors and expressions that never match', () => {
    expect(cronExpressionProblem('not a cron expr')).toBe('Cron expression must have five fields');
    expect(cronExpressionProblem('0 0 31 2 *')).toBe('Cron expression never matches');
  });
});
