/**
 * Shared fixtures for automation tests: in-memory database, fake clock,
 * recording executors and record builders.
 */

import { createDatabase, type Database } from '../db/index';
import { createMigrationRunner } from '../db/migrations';
import { generateId } from '../utils/id';
import type { ActionContext, ActionExecutors } from './actions';
import type { MetricsSource } from './metrics';
import type { AlertRule, AutomationRule, Clock, JsonObject, ScheduledReport, Task, Workflow } from './types';

/** 2024-01-15 12:00:00 UTC */
export const T0 = Date.UTC(2024, 0, 15, 12, 0, 0);

export async function createTestDb(): Promise<Database> {
  const db = await createDatabase();
  createMigrationRunner(db).migrate();
  return db;
}

export interface FakeClock extends Clock {
  set(time: number): void;
  advance(ms: number): void;
}

export function createFakeClock(start: number = T0): FakeClock {
  let current = start;
  return {
    now: () => current,
    set: (time) => {
      current = time;
    },
    advance: (ms) => {
      current += ms;
    },
  };
}

// =============================================================================
// EXECUTORS
// =============================================================================

export interface RecordedCall {
  kind: string;
  config: JsonObject;
  context: ActionContext;
}

/**
 * Executors that record every call and resolve with `{ ok: true }`.
 * `failing` lists kinds whose executor rejects.
 */
export function createRecordingExecutors(failing: string[] = []): { executors: ActionExecutors; calls: RecordedCall[] } {
  const calls: RecordedCall[] = [];

  function record(kind: string) {
    return async (config: JsonObject, context: ActionContext): Promise<unknown> => {
      calls.push({ kind, config, context });
      if (failing.includes(kind)) {
        throw new Error(`${kind} failed`);
      }
      return { ok: true };
    };
  }

  return {
    calls,
    executors: {
      generate_response: record('generate_response'),
      send_notification: record('send_notification'),
      generate_report: record('generate_report'),
      update_status: record('update_status'),
      send_email: record('send_email'),
      webhook_call: record('webhook_call'),
    },
  };
}

export interface FakeMetricsValues {
  recentAvg?: number | null;
  previousAvg?: number | null;
  reviewCount?: number;
  negativeRatio?: number;
}

/**
 * Metrics that answer from fixed values. `averageRating` returns `recentAvg`
 * for a window ending at the call's `end` == now, `previousAvg` otherwise.
 */
export function createFakeMetrics(values: FakeMetricsValues, clock: Clock): MetricsSource {
  return {
    async averageRating(_start, end) {
      return end === clock.now() ? values.recentAvg ?? null : values.previousAvg ?? null;
    },
    async reviewCount() {
      return values.reviewCount ?? 0;
    },
    async negativeSentimentRatio() {
      return values.negativeRatio ?? 0;
    },
  };
}

// =============================================================================
// RECORD BUILDERS
// =============================================================================

export function makeWorkflow(overrides: Partial<Workflow> = {}): Workflow {
  return {
    id: generateId('wf'),
    userId: 'user-1',
    name: 'Test workflow',
    description: null,
    status: 'active',
    triggerKind: 'schedule',
    triggerConfig: { type: 'interval', interval_minutes: 60 },
    actions: [{ kind: 'send_notification', config: { channels: ['email'] } }],
    maxExecutions: null,
    executionCount: 0,
    lastExecution: null,
    nextExecution: T0,
    createdAt: T0,
    updatedAt: T0,
    ...overrides,
  };
}

export function makeTask(overrides: Partial<Task> = {}): Task {
  return {
    id: generateId('task'),
    workflowId: null,
    actionKind: 'send_notification',
    actionConfig: { channels: ['email'] },
    status: 'pending',
    scheduledAt: T0,
    startedAt: null,
    completedAt: null,
    result: null,
    errorMessage: null,
    retryCount: 0,
    maxRetries: 3,
    createdAt: T0,
    ...overrides,
  };
}

export function makeAutomationRule(overrides: Partial<AutomationRule> = {}): AutomationRule {
  return {
    id: generateId('rule'),
    userId: 'user-1',
    name: 'Test rule',
    description: null,
    isActive: true,
    triggerEvent: 'new_review',
    conditions: null,
    actions: [{ kind: 'send_notification', config: { channels: ['in_app'] } }],
    cooldownMinutes: 0,
    lastTriggered: null,
    triggerCount: 0,
    priority: 100,
    createdAt: T0,
    updatedAt: T0,
    ...overrides,
  };
}

export function makeScheduledReport(overrides: Partial<ScheduledReport> = {}): ScheduledReport {
  return {
    id: generateId('rpt'),
    userId: 'user-1',
    name: 'Test report',
    description: null,
    isActive: true,
    reportType: 'weekly',
    reportFormat: 'pdf',
    filters: null,
    scheduleType: 'interval',
    scheduleConfig: { interval_hours: 24 },
    deliveryMethod: 'download',
    deliveryConfig: null,
    lastGenerated: null,
    nextGeneration: T0,
    generationCount: 0,
    createdAt: T0,
    updatedAt: T0,
    ...overrides,
  };
}

export function makeAlertRule(overrides: Partial<AlertRule> = {}): AlertRule {
  return {
    id: generateId('alert'),
    userId: 'user-1',
    name: 'Test alert',
    description: null,
    isActive: true,
    metricType: 'review_volume',
    thresholdConfig: { volume_threshold: 10 },
    severity: 'high',
    alertFrequency: 'immediate',
    notificationChannels: ['email'],
    notificationConfig: null,
    cooldownMinutes: 0,
    lastTriggered: null,
    triggerCount: 0,
    lastCheck: null,
    createdAt: T0,
    updatedAt: T0,
    ...overrides,
  };
}
