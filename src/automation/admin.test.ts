import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { Database } from '../db/index';
import { createActionRegistry } from './actions';
import { createAutomationAdmin, type AutomationAdmin } from './admin';
import { RecordNotFoundError, ValidationError } from './errors';
import { createAutomationStore, type AutomationStore } from './store';
import { DAY_MS, HOUR_MS, MINUTE_MS } from './types';
import {
  T0,
  createFakeClock,
  createRecordingExecutors,
  createTestDb,
  makeAlertRule,
  makeAutomationRule,
  makeScheduledReport,
  makeTask,
  makeWorkflow,
  type FakeClock,
} from './test-utils';

describe('AutomationAdmin', () => {
  let db: Database;
  let store: AutomationStore;
  let clock: FakeClock;
  let admin: AutomationAdmin;

  const notify = { kind: 'send_notification', config: { channels: ['email'] } };

  beforeEach(async () => {
    db = await createTestDb();
    store = createAutomationStore(db);
    clock = createFakeClock(T0);
    admin = createAutomationAdmin({
      store,
      actions: createActionRegistry(createRecordingExecutors().executors),
      clock,
    });
  });

  afterEach(() => {
    db.close();
  });

  // -- workflows --

  describe('createWorkflow', () => {
    it('creates an interval workflow due one interval from now', () => {
      const workflow = admin.createWorkflow({
        userId: 'user-1',
        name: 'Half-hourly digest',
        triggerKind: 'schedule',
        triggerConfig: { type: 'interval', interval_minutes: 30 },
        actions: [notify],
      });

      expect(workflow).toMatchObject({
        userId: 'user-1',
        name: 'Half-hourly digest',
        description: null,
        status: 'active',
        maxExecutions: null,
        executionCount: 0,
        lastExecution: null,
        nextExecution: T0 + 30 * MINUTE_MS,
        createdAt: T0,
        updatedAt: T0,
      });
      expect(workflow.id).toMatch(/^wf_/);
      expect(store.getWorkflow(workflow.id)).toEqual(workflow);
    });

    it('schedules cron workflows with the configured calculator', () => {
      const workflow = admin.createWorkflow({
        name: 'Morning run',
        triggerKind: 'schedule',
        triggerConfig: { type: 'cron', expression: '0 9 * * *' },
        actions: [notify],
      });
      expect(workflow.nextExecution).toBe(T0 + DAY_MS);
      expect(workflow.userId).toBe('default');
    });

    it('leaves next execution empty for event, manual and paused workflows', () => {
      const event = admin.createWorkflow({
        name: 'On review',
        triggerKind: 'event',
        triggerConfig: { event: 'new_review' },
        actions: [notify],
      });
      const manual = admin.createWorkflow({ name: 'By hand', triggerKind: 'manual', actions: [notify] });
      const paused = admin.createWorkflow({
        name: 'Later',
        status: 'paused',
        triggerKind: 'schedule',
        triggerConfig: { type: 'interval', interval_minutes: 15 },
        actions: [notify],
      });

      expect(event.nextExecution).toBeNull();
      expect(manual.nextExecution).toBeNull();
      expect(paused.nextExecution).toBeNull();
    });

    it('rejects a blank name', () => {
      expect(() => admin.createWorkflow({ name: '   ', triggerKind: 'manual', actions: [notify] })).toThrow(
        'name: Name is required',
      );
    });

    it('rejects a workflow without actions', () => {
      expect(() => admin.createWorkflow({ name: 'Empty', triggerKind: 'manual', actions: [] })).toThrow(
        'actions: At least one action is required',
      );
    });

    it('rejects an unknown schedule type', () => {
      expect(() =>
        admin.createWorkflow({
          name: 'Hourly',
          triggerKind: 'schedule',
          triggerConfig: { type: 'hourly' },
          actions: [notify],
        }),
      ).toThrow("triggerConfig.type: Must be 'interval' or 'cron'");
    });

    it('rejects a non-positive interval', () => {
      expect(() =>
        admin.createWorkflow({
          name: 'Never',
          triggerKind: 'schedule',
          triggerConfig: { type: 'interval', interval_minutes: 0 },
          actions: [notify],
        }),
      ).toThrow('triggerConfig.interval_minutes: Must be a positive number');
    });

    it('rejects a cron trigger without an expression', () => {
      expect(() =>
        admin.createWorkflow({
          name: 'Cron',
          triggerKind: 'schedule',
          triggerConfig: { type: 'cron' },
          actions: [notify],
        }),
      ).toThrow('triggerConfig.expression: Cron expression is required');
    });

    it('rejects a malformed cron expression', () => {
      expect(() =>
        admin.createWorkflow({
          name: 'Cron',
          triggerKind: 'schedule',
          triggerConfig: { type: 'cron', expression: 'not a cron expr' },
          actions: [notify],
        }),
      ).toThrow('triggerConfig.expression: Cron expression must have five fields');
    });

    it('rejects a cron expression that never matches', () => {
      expect(() =>
        admin.createWorkflow({
          name: 'Cron',
          triggerKind: 'schedule',
          triggerConfig: { type: 'cron', expression: '0 0 31 2 *' },
          actions: [notify],
        }),
      ).toThrow('triggerConfig.expression: Cron expression never matches');
    });

    it('rejects an event trigger without an event name', () => {
      expect(() => admin.createWorkflow({ name: 'Event', triggerKind: 'event', actions: [notify] })).toThrow(
        'triggerConfig.event: Event name is required',
      );
    });

    it('rejects an unknown action kind', () => {
      let caught: unknown;
      try {
        admin.createWorkflow({ name: 'Fax', triggerKind: 'manual', actions: [notify, { kind: 'fax', config: {} }] });
      } catch (err) {
        caught = err;
      }

      expect(caught).toBeInstanceOf(ValidationError);
      expect(caught).toMatchObject({
        field: 'actions.1',
        message: 'actions.1: Invalid fax action: unknown action kind',
      });
      expect(store.listWorkflows()).toEqual([]);
    });

    it('rejects an action whose config does not fit its kind', () => {
      expect(() =>
        admin.createWorkflow({
          name: 'Hook',
          triggerKind: 'manual',
          actions: [{ kind: 'webhook_call', config: { url: 'not a url' } }],
        }),
      ).toThrow(/^actions\.0: Invalid webhook_call action: url: /);
    });
  });

  describe('setWorkflowStatus', () => {
    it('clears next execution on pause and restores it on resume', () => {
      const workflow = admin.createWorkflow({
        name: 'Hourly',
        triggerKind: 'schedule',
        triggerConfig: { type: 'interval', interval_minutes: 60 },
        actions: [notify],
      });

      const paused = admin.setWorkflowStatus(workflow.id, 'paused');
      expect(paused.status).toBe('paused');
      expect(paused.nextExecution).toBeNull();

      clock.advance(10 * MINUTE_MS);
      const resumed = admin.setWorkflowStatus(workflow.id, 'active');
      expect(resumed.nextExecution).toBe(T0 + 70 * MINUTE_MS);
      expect(resumed.updatedAt).toBe(T0 + 10 * MINUTE_MS);
      expect(store.getWorkflow(workflow.id)).toEqual(resumed);
    });

    it('keeps a capped workflow unscheduled on resume', () => {
      const workflow = makeWorkflow({ status: 'paused', maxExecutions: 1, executionCount: 1, nextExecution: null });
      store.insertWorkflow(workflow);

      const resumed = admin.setWorkflowStatus(workflow.id, 'active');

      expect(resumed.status).toBe('active');
      expect(resumed.nextExecution).toBeNull();
    });

    it('throws for a missing workflow', () => {
      expect(() => admin.setWorkflowStatus('wf_missing', 'paused')).toThrow(RecordNotFoundError);
      expect(() => admin.setWorkflowStatus('wf_missing', 'paused')).toThrow('Workflow not found: wf_missing');
    });
  });

  // -- rules, reports, alerts --

  describe('createAutomationRule', () => {
    it('applies defaults', () => {
      const rule = admin.createAutomationRule({ name: 'New reviews', triggerEvent: 'new_review', actions: [notify] });

      expect(rule).toMatchObject({
        isActive: true,
        conditions: null,
        cooldownMinutes: 0,
        priority: 100,
        triggerCount: 0,
        lastTriggered: null,
      });
      expect(rule.id).toMatch(/^rule_/);
      expect(store.getAutomationRule(rule.id)).toEqual(rule);
    });

    it('requires a trigger event', () => {
      expect(() => admin.createAutomationRule({ name: 'No event', triggerEvent: ' ', actions: [notify] })).toThrow(
        'triggerEvent: Trigger event is required',
      );
    });

    it('validates actions', () => {
      expect(() =>
        admin.createAutomationRule({
          name: 'Bad status',
          triggerEvent: 'new_review',
          actions: [{ kind: 'update_status', config: {} }],
        }),
      ).toThrow(/^actions\.0: Invalid update_status action: status: /);
    });
  });

  describe('createScheduledReport', () => {
    it('sets the first generation from the interval', () => {
      const report = admin.createScheduledReport({
        name: 'Six-hourly',
        reportType: 'summary',
        scheduleType: 'interval',
        scheduleConfig: { interval_hours: 6 },
      });

      expect(report.nextGeneration).toBe(T0 + 6 * HOUR_MS);
      expect(report.reportFormat).toBe('pdf');
      expect(report.deliveryMethod).toBe('download');
      expect(store.getScheduledReport(report.id)).toEqual(report);
    });

    it('moves cron reports one day ahead', () => {
      const report = admin.createScheduledReport({
        name: 'Daily',
        reportType: 'daily',
        scheduleType: 'cron',
        scheduleConfig: { expression: '0 8 * * *' },
      });
      expect(report.nextGeneration).toBe(T0 + DAY_MS);
    });

    it('rejects a non-positive interval', () => {
      expect(() =>
        admin.createScheduledReport({
          name: 'Broken',
          reportType: 'daily',
          scheduleType: 'interval',
          scheduleConfig: { interval_hours: -1 },
        }),
      ).toThrow('scheduleConfig.interval_hours: Must be a positive number');
    });

    it('rejects an out-of-range cron expression', () => {
      expect(() =>
        admin.createScheduledReport({
          name: 'Broken',
          reportType: 'daily',
          scheduleType: 'cron',
          scheduleConfig: { expression: '0 25 * * *' },
        }),
      ).toThrow('scheduleConfig.expression: Invalid hour field "25"');
    });

    it('rejects a cron report without an expression', () => {
      expect(() =>
        admin.createScheduledReport({ name: 'Broken', reportType: 'daily', scheduleType: 'cron' }),
      ).toThrow('scheduleConfig.expression: Cron expression is required');
    });
  });

  describe('createAlertRule', () => {
    it('applies defaults', () => {
      const rule = admin.createAlertRule({
        name: 'Rating drop',
        metricType: 'rating_drop',
        thresholdConfig: { drop_threshold: 0.5 },
      });

      expect(rule).toMatchObject({
        severity: 'medium',
        alertFrequency: 'immediate',
        notificationChannels: [],
        notificationConfig: null,
        cooldownMinutes: 0,
        lastCheck: null,
        triggerCount: 0,
      });
      expect(store.getAlertRule(rule.id)).toEqual(rule);
    });
  });

  // -- tasks --

  describe('cancelTask', () => {
    it('cancels a pending task', () => {
      const task = makeTask();
      store.insertTask(task);
      clock.advance(MINUTE_MS);

      const cancelled = admin.cancelTask(task.id);

      expect(cancelled.status).toBe('cancelled');
      expect(cancelled.completedAt).toBe(T0 + MINUTE_MS);
      expect(store.getTask(task.id)).toEqual(cancelled);
    });

    it('refuses tasks that already started', () => {
      const task = makeTask({ status: 'running', startedAt: T0 });
      store.insertTask(task);

      expect(() => admin.cancelTask(task.id)).toThrow('Only pending tasks can be cancelled (task is running)');
      expect(store.getTask(task.id)?.status).toBe('running');
    });

    it('throws for a missing task', () => {
      expect(() => admin.cancelTask('task_missing')).toThrow(RecordNotFoundError);
    });
  });

  it('lists tasks for a workflow', () => {
    const workflow = makeWorkflow();
    store.insertWorkflow(workflow);
    const task = makeTask({ workflowId: workflow.id });
    store.insertTask(task);
    store.insertTask(makeTask());

    expect(admin.listTasksForWorkflow(workflow.id).map((t) => t.id)).toEqual([task.id]);
  });

  // -- overview --

  describe('getOverview', () => {
    it('counts the user records and lists their recent tasks', () => {
      const active = makeWorkflow({ userId: 'user-1' });
      store.insertWorkflow(active);
      store.insertWorkflow(makeWorkflow({ userId: 'user-1', status: 'paused' }));
      const other = makeWorkflow({ userId: 'user-2' });
      store.insertWorkflow(other);

      store.insertAutomationRule(makeAutomationRule({ userId: 'user-1' }));
      store.insertAutomationRule(makeAutomationRule({ userId: 'user-1', isActive: false }));
      store.insertScheduledReport(makeScheduledReport({ userId: 'user-1' }));
      store.insertScheduledReport(makeScheduledReport({ userId: 'user-1', isActive: false }));
      store.insertAlertRule(makeAlertRule({ userId: 'user-1' }));
      store.insertAlertRule(makeAlertRule({ userId: 'user-2' }));

      for (let i = 0; i < 12; i++) {
        store.insertTask(makeTask({ id: `task_${String(i).padStart(2, '0')}`, workflowId: active.id, createdAt: T0 + i }));
      }
      store.insertTask(makeTask({ id: 'task_other', workflowId: other.id, createdAt: T0 + 100 }));

      const overview = admin.getOverview('user-1');

      expect(overview.statistics).toEqual({
        totalWorkflows: 2,
        activeWorkflows: 1,
        totalRules: 2,
        activeRules: 1,
        scheduledReports: 1,
        alertRules: 1,
      });
      expect(overview.recentTasks).toHaveLength(10);
      expect(overview.recentTasks[0].id).toBe('task_11');
      expect(overview.recentTasks.map((t) => t.id)).not.toContain('task_other');
    });

    it('is empty for a user without records', () => {
      expect(admin.getOverview('nobody')).toEqual({
        statistics: {
          totalWorkflows: 0,
          activeWorkflows: 0,
          totalRules: 0,
          activeRules: 0,
          scheduledReports: 0,
          alertRules: 0,
        },
        recentTasks: [],
      });
    });
  });
});
