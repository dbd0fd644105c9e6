/**
 * Automation Types - Durable records owned by the store
 */

import type { JsonObject } from '../db/rows';

export type { JsonObject };

// =============================================================================
// STATUS & KIND UNIONS
// =============================================================================

export type WorkflowStatus = 'active' | 'paused' | 'disabled' | 'error';
export type TriggerKind = 'schedule' | 'event' | 'manual';
export type TaskStatus = 'pending' | 'running' | 'completed' | 'failed' | 'cancelled';
export type ScheduleType = 'interval' | 'cron';

export const WORKFLOW_STATUSES: readonly WorkflowStatus[] = ['active', 'paused', 'disabled', 'error'];
export const TRIGGER_KINDS: readonly TriggerKind[] = ['schedule', 'event', 'manual'];
export const TASK_STATUSES: readonly TaskStatus[] = ['pending', 'running', 'completed', 'failed', 'cancelled'];

/** Statuses a task never leaves. */
export const TERMINAL_TASK_STATUSES: readonly TaskStatus[] = ['completed', 'failed', 'cancelled'];

export type ActionKind =
  | 'generate_response'
  | 'send_notification'
  | 'generate_report'
  | 'update_status'
  | 'send_email'
  | 'webhook_call';

export const ACTION_KINDS: readonly ActionKind[] = [
  'generate_response',
  'send_notification',
  'generate_report',
  'update_status',
  'send_email',
  'webhook_call',
];

export function isActionKind(value: string): value is ActionKind {
  return ACTION_KINDS.some((kind) => kind === value);
}

/**
 * A configured action as stored on a workflow or rule. The kind is kept as
 * written; the action registry validates kind and config at dispatch time.
 */
export interface ActionSpec {
  kind: string;
  config: JsonObject;
}

// =============================================================================
// RECORDS
// =============================================================================

export interface Workflow {
  id: string;
  userId: string;
  name: string;
  description: string | null;
  status: WorkflowStatus;
  triggerKind: TriggerKind;
  /** `{ type: 'interval', interval_minutes }`, `{ type: 'cron', expression }` or `{ event, conditions }` */
  triggerConfig: JsonObject;
  actions: ActionSpec[];
  maxExecutions: number | null;
  executionCount: number;
  lastExecution: number | null;
  /** Set only while the workflow is active with a schedule trigger */
  nextExecution: number | null;
  createdAt: number;
  updatedAt: number;
}

export interface Task {
  id: string;
  /** null for ad hoc tasks (reports, alert notifications) */
  workflowId: string | null;
  actionKind: string;
  /** Snapshot taken when the task was created */
  actionConfig: JsonObject;
  status: TaskStatus;
  /** Earliest time the task may run */
  scheduledAt: number;
  startedAt: number | null;
  completedAt: number | null;
  result: unknown;
  errorMessage: string | null;
  retryCount: number;
  maxRetries: number;
  createdAt: number;
}

export interface AutomationRule {
  id: string;
  userId: string;
  name: string;
  description: string | null;
  isActive: boolean;
  /** Event class this rule reacts to, e.g. "new_review" */
  triggerEvent: string;
  conditions: JsonObject | null;
  actions: ActionSpec[];
  cooldownMinutes: number;
  lastTriggered: number | null;
  triggerCount: number;
  /** Lower runs first */
  priority: number;
  createdAt: number;
  updatedAt: number;
}

export interface ScheduledReport {
  id: string;
  userId: string;
  name: string;
  description: string | null;
  isActive: boolean;
  reportType: string;
  reportFormat: string;
  filters: JsonObject | null;
  scheduleType: ScheduleType;
  /** `{ interval_hours }` or `{ expression }` */
  scheduleConfig: JsonObject;
  deliveryMethod: string;
  deliveryConfig: JsonObject | null;
  lastGenerated: number | null;
  nextGeneration: number | null;
  generationCount: number;
  createdAt: number;
  updatedAt: number;
}

export interface AlertRule {
  id: string;
  userId: string;
  name: string;
  description: string | null;
  isActive: boolean;
  /** rating_drop, review_volume, negative_sentiment, ... */
  metricType: string;
  thresholdConfig: JsonObject;
  severity: string;
  alertFrequency: string;
  notificationChannels: string[];
  notificationConfig: JsonObject | null;
  cooldownMinutes: number;
  lastTriggered: number | null;
  triggerCount: number;
  lastCheck: number | null;
  createdAt: number;
  updatedAt: number;
}

// =============================================================================
// COLLABORATORS
// =============================================================================

export interface Clock {
  now(): number;
}

export const systemClock: Clock = {
  now: () => Date.now(),
};

export const MINUTE_MS = 60 * 1000;
export const HOUR_MS = 60 * MINUTE_MS;
export const DAY_MS = 24 * HOUR_MS;
