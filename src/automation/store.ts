/**
 * Automation Store - Persistence for workflows, tasks and rules
 *
 * Typed CRUD and the filtered queries the scheduler needs, on top of the
 * sql.js Database. Nothing is cached: every call reads or writes the
 * database, so request handlers and the scheduler always see committed state.
 */

import type { Database, SqlRow } from '../db/index';
import {
  isJsonObject,
  readBoolean,
  readJsonArray,
  readJsonObject,
  readJsonValue,
  readNullableJsonObject,
  readNullableNumber,
  readNullableString,
  readNumber,
  readString,
  toJson,
} from '../db/rows';
import {
  TASK_STATUSES,
  TRIGGER_KINDS,
  WORKFLOW_STATUSES,
  type ActionSpec,
  type AlertRule,
  type AutomationRule,
  type ScheduleType,
  type ScheduledReport,
  type Task,
  type TaskStatus,
  type TriggerKind,
  type Workflow,
  type WorkflowStatus,
} from './types';

// =============================================================================
// INTERFACE
// =============================================================================

export interface RecentTaskQuery {
  /** Only tasks of workflows owned by this user */
  userId?: string;
  limit?: number;
}

export interface AutomationStore {
  /** Run `fn` as one atomic unit (nested calls become savepoints). */
  transaction<T>(fn: () => T): T;

  // Workflows
  insertWorkflow(workflow: Workflow): void;
  getWorkflow(id: string): Workflow | undefined;
  updateWorkflow(workflow: Workflow): void;
  listWorkflows(userId?: string): Workflow[];
  /** Active, schedule-triggered workflows under their execution cap with `nextExecution <= now`, oldest first */
  findDueWorkflows(now: number): Workflow[];

  // Tasks
  insertTask(task: Task): void;
  getTask(id: string): Task | undefined;
  updateTask(task: Task): void;
  /**
   * Move a pending task to running. Returns false when the task is no longer
   * pending, e.g. another worker claimed it first.
   */
  claimTask(id: string, startedAt: number): boolean;
  /** Pending tasks with `scheduledAt <= now`, ordered by `scheduledAt` */
  findPendingTasks(now: number, limit: number): Task[];
  listTasksForWorkflow(workflowId: string): Task[];
  listRecentTasks(query?: RecentTaskQuery): Task[];
  /** Delete terminal tasks completed before `cutoff`. Returns the number removed. */
  deleteTerminalTasksBefore(cutoff: number): number;

  // Automation rules
  insertAutomationRule(rule: AutomationRule): void;
  getAutomationRule(id: string): AutomationRule | undefined;
  updateAutomationRule(rule: AutomationRule): void;
  listAutomationRules(userId?: string): AutomationRule[];
  /** Active rules for an event, by priority then id */
  findRulesForEvent(eventName: string): AutomationRule[];

  // Scheduled reports
  insertScheduledReport(report: ScheduledReport): void;
  getScheduledReport(id: string): ScheduledReport | undefined;
  updateScheduledReport(report: ScheduledReport): void;
  listScheduledReports(userId?: string): ScheduledReport[];
  /** Active reports with `nextGeneration <= now` */
  findDueReports(now: number): ScheduledReport[];

  // Alert rules
  insertAlertRule(rule: AlertRule): void;
  getAlertRule(id: string): AlertRule | undefined;
  updateAlertRule(rule: AlertRule): void;
  listAlertRules(userId?: string): AlertRule[];
  /** Active rules never checked or last checked at or before `checkedBefore` */
  findAlertRulesDueForCheck(checkedBefore: number): AlertRule[];
}

// =============================================================================
// ROW PARSERS
// =============================================================================

function oneOf<T extends string>(values: readonly T[], raw: string, fallback: T): T {
  return values.find((value) => value === raw) ?? fallback;
}

function parseActions(row: SqlRow, column: string): ActionSpec[] {
  return readJsonArray(row, column)
    .filter(isJsonObject)
    .map((entry) => ({
      kind: typeof entry.kind === 'string' ? entry.kind : '',
      config: isJsonObject(entry.config) ? entry.config : {},
    }));
}

function parseStringList(row: SqlRow, column: string): string[] {
  return readJsonArray(row, column).filter((v): v is string => typeof v === 'string');
}

function parseWorkflowRow(row: SqlRow): Workflow {
  return {
    id: readString(row, 'id'),
    userId: readString(row, 'user_id', 'default'),
    name: readString(row, 'name'),
    description: readNullableString(row, 'description'),
    status: oneOf<WorkflowStatus>(WORKFLOW_STATUSES, readString(row, 'status'), 'error'),
    triggerKind: oneOf<TriggerKind>(TRIGGER_KINDS, readString(row, 'trigger_kind'), 'manual'),
    triggerConfig: readJsonObject(row, 'trigger_config'),
    actions: parseActions(row, 'actions'),
    maxExecutions: readNullableNumber(row, 'max_executions'),
    executionCount: readNumber(row, 'execution_count'),
    lastExecution: readNullableNumber(row, 'last_execution'),
    nextExecution: readNullableNumber(row, 'next_execution'),
    createdAt: readNumber(row, 'created_at'),
    updatedAt: readNumber(row, 'updated_at'),
  };
}

function parseTaskRow(row: SqlRow): Task {
  return {
    id: readString(row, 'id'),
    workflowId: readNullableString(row, 'workflow_id'),
    actionKind: readString(row, 'action_kind'),
    actionConfig: readJsonObject(row, 'action_config'),
    status: oneOf<TaskStatus>(TASK_STATUSES, readString(row, 'status'), 'failed'),
    scheduledAt: readNumber(row, 'scheduled_at'),
    startedAt: readNullableNumber(row, 'started_at'),
    completedAt: readNullableNumber(row, 'completed_at'),
    result: readJsonValue(row, 'result'),
    errorMessage: readNullableString(row, 'error_message'),
    retryCount: readNumber(row, 'retry_count'),
    maxRetries: readNumber(row, 'max_retries', 3),
    createdAt: readNumber(row, 'created_at'),
  };
}

function parseAutomationRuleRow(row: SqlRow): AutomationRule {
  return {
    id: readString(row, 'id'),
    userId: readString(row, 'user_id', 'default'),
    name: readString(row, 'name'),
    description: readNullableString(row, 'description'),
    isActive: readBoolean(row, 'is_active'),
    triggerEvent: readString(row, 'trigger_event'),
    conditions: readNullableJsonObject(row, 'conditions'),
    actions: parseActions(row, 'actions'),
    cooldownMinutes: readNumber(row, 'cooldown_minutes'),
    lastTriggered: readNullableNumber(row, 'last_triggered'),
    triggerCount: readNumber(row, 'trigger_count'),
    priority: readNumber(row, 'priority', 100),
    createdAt: readNumber(row, 'created_at'),
    updatedAt: readNumber(row, 'updated_at'),
  };
}

function parseScheduledReportRow(row: SqlRow): ScheduledReport {
  return {
    id: readString(row, 'id'),
    userId: readString(row, 'user_id', 'default'),
    name: readString(row, 'name'),
    description: readNullableString(row, 'description'),
    isActive: readBoolean(row, 'is_active'),
    reportType: readString(row, 'report_type'),
    reportFormat: readString(row, 'report_format'),
    filters: readNullableJsonObject(row, 'filters'),
    scheduleType: oneOf<ScheduleType>(['interval', 'cron'], readString(row, 'schedule_type'), 'interval'),
    scheduleConfig: readJsonObject(row, 'schedule_config'),
    deliveryMethod: readString(row, 'delivery_method', 'download'),
    deliveryConfig: readNullableJsonObject(row, 'delivery_config'),
    lastGenerated: readNullableNumber(row, 'last_generated'),
    nextGeneration: readNullableNumber(row, 'next_generation'),
    generationCount: readNumber(row, 'generation_count'),
    createdAt: readNumber(row, 'created_at'),
    updatedAt: readNumber(row, 'updated_at'),
  };
}

function parseAlertRuleRow(row: SqlRow): AlertRule {
  return {
    id: readString(row, 'id'),
    userId: readString(row, 'user_id', 'default'),
    name: readString(row, 'name'),
    description: readNullableString(row, 'description'),
    isActive: readBoolean(row, 'is_active'),
    metricType: readString(row, 'metric_type'),
    thresholdConfig: readJsonObject(row, 'threshold_config'),
    severity: readString(row, 'severity', 'medium'),
    alertFrequency: readString(row, 'alert_frequency', 'immediate'),
    notificationChannels: parseStringList(row, 'notification_channels'),
    notificationConfig: readNullableJsonObject(row, 'notification_config'),
    cooldownMinutes: readNumber(row, 'cooldown_minutes'),
    lastTriggered: readNullableNumber(row, 'last_triggered'),
    triggerCount: readNumber(row, 'trigger_count'),
    lastCheck: readNullableNumber(row, 'last_check'),
    createdAt: readNumber(row, 'created_at'),
    updatedAt: readNumber(row, 'updated_at'),
  };
}

// =============================================================================
// IMPLEMENTATION
// =============================================================================

export function createAutomationStore(db: Database): AutomationStore {
  function first<T>(rows: SqlRow[], parse: (row: SqlRow) => T): T | undefined {
    return rows.length > 0 ? parse(rows[0]) : undefined;
  }

  function byUser(table: string, userId?: string): SqlRow[] {
    return userId
      ? db.query(`SELECT * FROM ${table} WHERE user_id = ? ORDER BY created_at DESC, id ASC`, [userId])
      : db.query(`SELECT * FROM ${table} ORDER BY created_at DESC, id ASC`);
  }

  const store: AutomationStore = {
    transaction<T>(fn: () => T): T {
      return db.transaction(fn);
    },

    // -- Workflows --

    insertWorkflow(workflow: Workflow): void {
      db.run(
        `INSERT INTO workflows (id, user_id, name, description, status, trigger_kind, trigger_config, actions,
           max_executions, execution_count, last_execution, next_execution, created_at, updated_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
        [
          workflow.id,
          workflow.userId,
          workflow.name,
          workflow.description,
          workflow.status,
          workflow.triggerKind,
          JSON.stringify(workflow.triggerConfig),
          JSON.stringify(workflow.actions),
          workflow.maxExecutions,
          workflow.executionCount,
          workflow.lastExecution,
          workflow.nextExecution,
          workflow.createdAt,
          workflow.updatedAt,
        ],
      );
    },

    getWorkflow(id: string): Workflow | undefined {
      return first(db.query('SELECT * FROM workflows WHERE id = ?', [id]), parseWorkflowRow);
    },

    updateWorkflow(workflow: Workflow): void {
      db.run(
        `UPDATE workflows SET name = ?, description = ?, status = ?, trigger_kind = ?, trigger_config = ?,
           actions = ?, max_executions = ?, execution_count = ?, last_execution = ?, next_execution = ?,
           updated_at = ?
         WHERE id = ?`,
        [
          workflow.name,
          workflow.description,
          workflow.status,
          workflow.triggerKind,
          JSON.stringify(workflow.triggerConfig),
          JSON.stringify(workflow.actions),
          workflow.maxExecutions,
          workflow.executionCount,
          workflow.lastExecution,
          workflow.nextExecution,
          workflow.updatedAt,
          workflow.id,
        ],
      );
    },

    listWorkflows(userId?: string): Workflow[] {
      return byUser('workflows', userId).map(parseWorkflowRow);
    },

    findDueWorkflows(now: number): Workflow[] {
      return db
        .query(
          `SELECT * FROM workflows
           WHERE status = 'active' AND trigger_kind = 'schedule'
             AND next_execution IS NOT NULL AND next_execution <= ?
             AND (max_executions IS NULL OR execution_count < max_executions)
           ORDER BY next_execution ASC, id ASC`,
          [now],
        )
        .map(parseWorkflowRow);
    },

    // -- Tasks --

    insertTask(task: Task): void {
      db.run(
        `INSERT INTO tasks (id, workflow_id, action_kind, action_config, status, scheduled_at, started_at,
           completed_at, result, error_message, retry_count, max_retries, created_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
        [
          task.id,
          task.workflowId,
          task.actionKind,
          JSON.stringify(task.actionConfig),
          task.status,
          task.scheduledAt,
          task.startedAt,
          task.completedAt,
          toJson(task.result),
          task.errorMessage,
          task.retryCount,
          task.maxRetries,
          task.createdAt,
        ],
      );
    },

    getTask(id: string): Task | undefined {
      return first(db.query('SELECT * FROM tasks WHERE id = ?', [id]), parseTaskRow);
    },

    updateTask(task: Task): void {
      db.run(
        `UPDATE tasks SET status = ?, scheduled_at = ?, started_at = ?, completed_at = ?, result = ?,
           error_message = ?, retry_count = ?, max_retries = ?
         WHERE id = ?`,
        [
          task.status,
          task.scheduledAt,
          task.startedAt,
          task.completedAt,
          toJson(task.result),
          task.errorMessage,
          task.retryCount,
          task.maxRetries,
          task.id,
        ],
      );
    },

    claimTask(id: string, startedAt: number): boolean {
      return db.transaction(() => {
        db.run(
          "UPDATE tasks SET status = 'running', started_at = ? WHERE id = ? AND status = 'pending'",
          [startedAt, id],
        );
        return db.changes() === 1;
      });
    },

    findPendingTasks(now: number, limit: number): Task[] {
      return db
        .query(
          `SELECT * FROM tasks
           WHERE status = 'pending' AND scheduled_at <= ?
           ORDER BY scheduled_at ASC, created_at ASC, id ASC
           LIMIT ?`,
          [now, Math.max(0, limit)],
        )
        .map(parseTaskRow);
    },

    listTasksForWorkflow(workflowId: string): Task[] {
      return db
        .query('SELECT * FROM tasks WHERE workflow_id = ? ORDER BY created_at DESC, id ASC', [workflowId])
        .map(parseTaskRow);
    },

    listRecentTasks(query: RecentTaskQuery = {}): Task[] {
      const limit = Math.max(1, Math.min(query.limit ?? 10, 200));
      const rows = query.userId
        ? db.query(
            `SELECT t.* FROM tasks t
             INNER JOIN workflows w ON w.id = t.workflow_id
             WHERE w.user_id = ?
             ORDER BY t.created_at DESC, t.id ASC
             LIMIT ?`,
            [query.userId, limit],
          )
        : db.query('SELECT * FROM tasks ORDER BY created_at DESC, id ASC LIMIT ?', [limit]);
      return rows.map(parseTaskRow);
    },

    deleteTerminalTasksBefore(cutoff: number): number {
      return db.transaction(() => {
        db.run(
          `DELETE FROM tasks
           WHERE status IN ('completed', 'failed', 'cancelled')
             AND completed_at IS NOT NULL AND completed_at < ?`,
          [cutoff],
        );
        return db.changes();
      });
    },

    // -- Automation rules --

    insertAutomationRule(rule: AutomationRule): void {
      db.run(
        `INSERT INTO automation_rules (id, user_id, name, description, is_active, trigger_event, conditions,
           actions, cooldown_minutes, last_triggered, trigger_count, priority, created_at, updated_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
        [
          rule.id,
          rule.userId,
          rule.name,
          rule.description,
          rule.isActive ? 1 : 0,
          rule.triggerEvent,
          toJson(rule.conditions),
          JSON.stringify(rule.actions),
          rule.cooldownMinutes,
          rule.lastTriggered,
          rule.triggerCount,
          rule.priority,
          rule.createdAt,
          rule.updatedAt,
        ],
      );
    },

    getAutomationRule(id: string): AutomationRule | undefined {
      return first(db.query('SELECT * FROM automation_rules WHERE id = ?', [id]), parseAutomationRuleRow);
    },

    updateAutomationRule(rule: AutomationRule): void {
      db.run(
        `UPDATE automation_rules SET name = ?, description = ?, is_active = ?, trigger_event = ?, conditions = ?,
           actions = ?, cooldown_minutes = ?, last_triggered = ?, trigger_count = ?, priority = ?, updated_at = ?
         WHERE id = ?`,
        [
          rule.name,
          rule.description,
          rule.isActive ? 1 : 0,
          rule.triggerEvent,
          toJson(rule.conditions),
          JSON.stringify(rule.actions),
          rule.cooldownMinutes,
          rule.lastTriggered,
          rule.triggerCount,
          rule.priority,
          rule.updatedAt,
          rule.id,
        ],
      );
    },

    listAutomationRules(userId?: string): AutomationRule[] {
      return byUser('automation_rules', userId).map(parseAutomationRuleRow);
    },

    findRulesForEvent(eventName: string): AutomationRule[] {
      return db
        .query(
          `SELECT * FROM automation_rules
           WHERE is_active = 1 AND trigger_event = ?
           ORDER BY priority ASC, id ASC`,
          [eventName],
        )
        .map(parseAutomationRuleRow);
    },

    // -- Scheduled reports --

    insertScheduledReport(report: ScheduledReport): void {
      db.run(
        `INSERT INTO scheduled_reports (id, user_id, name, description, is_active, report_type, report_format,
           filters, schedule_type, schedule_config, delivery_method, delivery_config, last_generated,
           next_generation, generation_count, created_at, updated_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
        [
          report.id,
          report.userId,
          report.name,
          report.description,
          report.isActive ? 1 : 0,
          report.reportType,
          report.reportFormat,
          toJson(report.filters),
          report.scheduleType,
          JSON.stringify(report.scheduleConfig),
          report.deliveryMethod,
          toJson(report.deliveryConfig),
          report.lastGenerated,
          report.nextGeneration,
          report.generationCount,
          report.createdAt,
          report.updatedAt,
        ],
      );
    },

    getScheduledReport(id: string): ScheduledReport | undefined {
      return first(db.query('SELECT * FROM scheduled_reports WHERE id = ?', [id]), parseScheduledReportRow);
    },

    updateScheduledReport(report: ScheduledReport): void {
      db.run(
        `UPDATE scheduled_reports SET name = ?, description = ?, is_active = ?, report_type = ?, report_format = ?,
           filters = ?, schedule_type = ?, schedule_config = ?, delivery_method = ?, delivery_config = ?,
           last_generated = ?, next_generation = ?, generation_count = ?, updated_at = ?
         WHERE id = ?`,
        [
          report.name,
          report.description,
          report.isActive ? 1 : 0,
          report.reportType,
          report.reportFormat,
          toJson(report.filters),
          report.scheduleType,
          JSON.stringify(report.scheduleConfig),
          report.deliveryMethod,
          toJson(report.deliveryConfig),
          report.lastGenerated,
          report.nextGeneration,
          report.generationCount,
          report.updatedAt,
          report.id,
        ],
      );
    },

    listScheduledReports(userId?: string): ScheduledReport[] {
      return byUser('scheduled_reports', userId).map(parseScheduledReportRow);
    },

    findDueReports(now: number): ScheduledReport[] {
      return db
        .query(
          `SELECT * FROM scheduled_reports
           WHERE is_active = 1 AND next_generation IS NOT NULL AND next_generation <= ?
           ORDER BY next_generation ASC, id ASC`,
          [now],
        )
        .map(parseScheduledReportRow);
    },

    // -- Alert rules --

    insertAlertRule(rule: AlertRule): void {
      db.run(
        `INSERT INTO alert_rules (id, user_id, name, description, is_active, metric_type, threshold_config,
           severity, alert_frequency, notification_channels, notification_config, cooldown_minutes,
           last_triggered, trigger_count, last_check, created_at, updated_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
        [
          rule.id,
          rule.userId,
          rule.name,
          rule.description,
          rule.isActive ? 1 : 0,
          rule.metricType,
          JSON.stringify(rule.thresholdConfig),
          rule.severity,
          rule.alertFrequency,
          JSON.stringify(rule.notificationChannels),
          toJson(rule.notificationConfig),
          rule.cooldownMinutes,
          rule.lastTriggered,
          rule.triggerCount,
          rule.lastCheck,
          rule.createdAt,
          rule.updatedAt,
        ],
      );
    },

    getAlertRule(id: string): AlertRule | undefined {
      return first(db.query('SELECT * FROM alert_rules WHERE id = ?', [id]), parseAlertRuleRow);
    },

    updateAlertRule(rule: AlertRule): void {
      db.run(
        `UPDATE alert_rules SET name = ?, description = ?, is_active = ?, metric_type = ?, threshold_config = ?,
           severity = ?, alert_frequency = ?, notification_channels = ?, notification_config = ?,
           cooldown_minutes = ?, last_triggered = ?, trigger_count = ?, last_check = ?, updated_at = ?
         WHERE id = ?`,
        [
          rule.name,
          rule.description,
          rule.isActive ? 1 : 0,
          rule.metricType,
          JSON.stringify(rule.thresholdConfig),
          rule.severity,
          rule.alertFrequency,
          JSON.stringify(rule.notificationChannels),
          toJson(rule.notificationConfig),
          rule.cooldownMinutes,
          rule.lastTriggered,
          rule.triggerCount,
          rule.lastCheck,
          rule.updatedAt,
          rule.id,
        ],
      );
    },

    listAlertRules(userId?: string): AlertRule[] {
      return byUser('alert_rules', userId).map(parseAlertRuleRow);
    },

    findAlertRulesDueForCheck(checkedBefore: number): AlertRule[] {
      return db
        .query(
          `SELECT * FROM alert_rules
           WHERE is_active = 1 AND (last_check IS NULL OR last_check <= ?)
           ORDER BY id ASC`,
          [checkedBefore],
        )
        .map(parseAlertRuleRow);
    },
  };

  return store;
}
