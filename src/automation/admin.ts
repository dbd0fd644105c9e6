/**
 * Automation admin - record creation and owner-side operations
 *
 * The request layer goes through here to create and change records, so that
 * every record enters the store satisfying its invariants: valid actions, a
 * known trigger, and `nextExecution` / `nextGeneration` set from the schedule.
 */

import { z } from 'zod';
import { createLogger } from '../utils/logger';
import { generateId } from '../utils/id';
import type { ActionRegistry } from './actions';
import { ActionConfigError, RecordNotFoundError, ValidationError } from './errors';
import {
  computeNextReportRun,
  computeNextWorkflowRun,
  cronExpressionProblem,
  dailyCronCalculator,
  type NextRunCalculator,
} from './schedule';
import type { AutomationStore } from './store';
import { hasReachedExecutionCap } from './workflow-engine';
import {
  WORKFLOW_STATUSES,
  systemClock,
  type ActionSpec,
  type AlertRule,
  type AutomationRule,
  type Clock,
  type ScheduledReport,
  type Task,
  type Workflow,
  type WorkflowStatus,
} from './types';

const logger = createLogger('automation-admin');

// =============================================================================
// INPUT SCHEMAS
// =============================================================================

const jsonObjectSchema = z.record(z.unknown());
const nameSchema = z.string().trim().min(1, 'Name is required').max(200);
const userIdSchema = z.string().min(1).default('default');

const actionSpecSchema = z.object({
  kind: z.string(),
  config: jsonObjectSchema.default({}),
});

const actionsSchema = z.array(actionSpecSchema).min(1, 'At least one action is required');

function checkCronExpression(expression: unknown, path: string[], ctx: z.RefinementCtx): void {
  if (typeof expression !== 'string' || expression.trim() === '') {
    ctx.addIssue({ code: 'custom', path, message: 'Cron expression is required' });
    return;
  }
  const problem = cronExpressionProblem(expression);
  if (problem) ctx.addIssue({ code: 'custom', path, message: problem });
}

const workflowInputSchema = z
  .object({
    userId: userIdSchema,
    name: nameSchema,
    description: z.string().nullable().default(null),
    status: z.enum(['active', 'paused', 'disabled', 'error']).default('active'),
    triggerKind: z.enum(['schedule', 'event', 'manual']),
    triggerConfig: jsonObjectSchema.default({}),
    actions: actionsSchema,
    maxExecutions: z.number().int().positive().nullable().default(null),
  })
  .superRefine((input, ctx) => {
    const config = input.triggerConfig;
    if (input.triggerKind === 'schedule') {
      if (config.type === 'interval') {
        if (config.interval_minutes !== undefined && !isPositiveNumber(config.interval_minutes)) {
          ctx.addIssue({ code: 'custom', path: ['triggerConfig', 'interval_minutes'], message: 'Must be a positive number' });
        }
      } else if (config.type === 'cron') {
        checkCronExpression(config.expression, ['triggerConfig', 'expression'], ctx);
      } else {
        ctx.addIssue({ code: 'custom', path: ['triggerConfig', 'type'], message: "Must be 'interval' or 'cron'" });
      }
    }
    if (input.triggerKind === 'event' && (typeof config.event !== 'string' || config.event === '')) {
      ctx.addIssue({ code: 'custom', path: ['triggerConfig', 'event'], message: 'Event name is required' });
    }
  });

const automationRuleInputSchema = z.object({
  userId: userIdSchema,
  name: nameSchema,
  description: z.string().nullable().default(null),
  isActive: z.boolean().default(true),
  triggerEvent: z.string().trim().min(1, 'Trigger event is required'),
  conditions: jsonObjectSchema.nullable().default(null),
  actions: actionsSchema,
  cooldownMinutes: z.number().int().nonnegative().default(0),
  priority: z.number().int().default(100),
});

const scheduledReportInputSchema = z
  .object({
    userId: userIdSchema,
    name: nameSchema,
    description: z.string().nullable().default(null),
    isActive: z.boolean().default(true),
    reportType: z.string().min(1),
    reportFormat: z.string().min(1).default('pdf'),
    filters: jsonObjectSchema.nullable().default(null),
    scheduleType: z.enum(['interval', 'cron']),
    scheduleConfig: jsonObjectSchema.default({}),
    deliveryMethod: z.string().min(1).default('download'),
    deliveryConfig: jsonObjectSchema.nullable().default(null),
  })
  .superRefine((input, ctx) => {
    const hours = input.scheduleConfig.interval_hours;
    if (input.scheduleType === 'interval' && hours !== undefined && !isPositiveNumber(hours)) {
      ctx.addIssue({ code: 'custom', path: ['scheduleConfig', 'interval_hours'], message: 'Must be a positive number' });
    }
    if (input.scheduleType === 'cron') {
      checkCronExpression(input.scheduleConfig.expression, ['scheduleConfig', 'expression'], ctx);
    }
  });

const alertRuleInputSchema = z.object({
  userId: userIdSchema,
  name: nameSchema,
  description: z.string().nullable().default(null),
  isActive: z.boolean().default(true),
  metricType: z.string().min(1),
  thresholdConfig: z.record(z.number()).default({}),
  severity: z.string().min(1).default('medium'),
  alertFrequency: z.string().min(1).default('immediate'),
  notificationChannels: z.array(z.string()).default([]),
  notificationConfig: jsonObjectSchema.nullable().default(null),
  cooldownMinutes: z.number().int().nonnegative().default(0),
});

export type CreateWorkflowInput = z.input<typeof workflowInputSchema>;
export type CreateAutomationRuleInput = z.input<typeof automationRuleInputSchema>;
export type CreateScheduledReportInput = z.input<typeof scheduledReportInputSchema>;
export type CreateAlertRuleInput = z.input<typeof alertRuleInputSchema>;

function isPositiveNumber(value: unknown): boolean {
  return typeof value === 'number' && Number.isFinite(value) && value > 0;
}

function parseInput<S extends z.ZodTypeAny>(schema: S, input: unknown): z.output<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    const issue = result.error.issues[0];
    const field = issue.path.join('.');
    throw new ValidationError(field ? `${field}: ${issue.message}` : issue.message, field || undefined);
  }
  return result.data;
}

// =============================================================================
// OVERVIEW
// =============================================================================

export interface AutomationOverview {
  statistics: {
    totalWorkflows: number;
    activeWorkflows: number;
    totalRules: number;
    activeRules: number;
    scheduledReports: number;
    alertRules: number;
  };
  recentTasks: Task[];
}

/** Counts for a user's automation records plus their ten most recent workflow tasks. */
export function getAutomationOverview(store: AutomationStore, userId: string): AutomationOverview {
  const workflows = store.listWorkflows(userId);
  const rules = store.listAutomationRules(userId);

  return {
    statistics: {
      totalWorkflows: workflows.length,
      activeWorkflows: workflows.filter((w) => w.status === 'active').length,
      totalRules: rules.length,
      activeRules: rules.filter((r) => r.isActive).length,
      scheduledReports: store.listScheduledReports(userId).filter((r) => r.isActive).length,
      alertRules: store.listAlertRules(userId).filter((r) => r.isActive).length,
    },
    recentTasks: store.listRecentTasks({ userId, limit: 10 }),
  };
}

// =============================================================================
// ADMIN
// =============================================================================

export interface AutomationAdminDeps {
  store: AutomationStore;
  actions: ActionRegistry;
  clock?: Clock;
  calculator?: NextRunCalculator;
}

export interface AutomationAdmin {
  createWorkflow(input: CreateWorkflowInput): Workflow;
  /** Change status, keeping `nextExecution` in step with it. Capped workflows stay unscheduled. */
  setWorkflowStatus(workflowId: string, status: WorkflowStatus): Workflow;
  createAutomationRule(input: CreateAutomationRuleInput): AutomationRule;
  createScheduledReport(input: CreateScheduledReportInput): ScheduledReport;
  createAlertRule(input: CreateAlertRuleInput): AlertRule;
  listTasksForWorkflow(workflowId: string): Task[];
  /** Cancel a pending task. Tasks that already started cannot be cancelled. */
  cancelTask(taskId: string): Task;
  getOverview(userId: string): AutomationOverview;
}

export function createAutomationAdmin(deps: AutomationAdminDeps): AutomationAdmin {
  const { store, actions } = deps;
  const clock = deps.clock ?? systemClock;
  const calculator = deps.calculator ?? dailyCronCalculator;

  function validateActions(specs: ActionSpec[]): ActionSpec[] {
    specs.forEach((spec, index) => {
      try {
        actions.parse(spec.kind, spec.config);
      } catch (err) {
        if (err instanceof ActionConfigError) {
          throw new ValidationError(`actions.${index}: ${err.message}`, `actions.${index}`);
        }
        throw err;
      }
    });
    return specs.map((spec) => ({ kind: spec.kind, config: spec.config }));
  }

  return {
    createWorkflow(input: CreateWorkflowInput): Workflow {
      const data = parseInput(workflowInputSchema, input);
      const now = clock.now();
      const workflow: Workflow = {
        id: generateId('wf'),
        userId: data.userId,
        name: data.name,
        description: data.description,
        status: data.status,
        triggerKind: data.triggerKind,
        triggerConfig: data.triggerConfig,
        actions: validateActions(data.actions),
        maxExecutions: data.maxExecutions,
        executionCount: 0,
        lastExecution: null,
        nextExecution: computeNextWorkflowRun(data, now, calculator),
        createdAt: now,
        updatedAt: now,
      };

      store.transaction(() => store.insertWorkflow(workflow));
      logger.info({ workflowId: workflow.id, triggerKind: workflow.triggerKind }, 'Workflow created');
      return workflow;
    },

    setWorkflowStatus(workflowId: string, status: WorkflowStatus): Workflow {
      if (!WORKFLOW_STATUSES.includes(status)) {
        throw new ValidationError(`Unknown workflow status: ${status}`, 'status');
      }

      return store.transaction(() => {
        const workflow = store.getWorkflow(workflowId);
        if (!workflow) throw new RecordNotFoundError('Workflow', workflowId);

        const now = clock.now();
        const updated: Workflow = {
          ...workflow,
          status,
          nextExecution: hasReachedExecutionCap(workflow)
            ? null
            : computeNextWorkflowRun({ ...workflow, status }, now, calculator),
          updatedAt: now,
        };
        store.updateWorkflow(updated);
        logger.info({ workflowId, from: workflow.status, to: status }, 'Workflow status changed');
        return updated;
      });
    },

    createAutomationRule(input: CreateAutomationRuleInput): AutomationRule {
      const data = parseInput(automationRuleInputSchema, input);
      const now = clock.now();
      const rule: AutomationRule = {
        id: generateId('rule'),
        userId: data.userId,
        name: data.name,
        description: data.description,
        isActive: data.isActive,
        triggerEvent: data.triggerEvent,
        conditions: data.conditions,
        actions: validateActions(data.actions),
        cooldownMinutes: data.cooldownMinutes,
        lastTriggered: null,
        triggerCount: 0,
        priority: data.priority,
        createdAt: now,
        updatedAt: now,
      };

      store.transaction(() => store.insertAutomationRule(rule));
      logger.info({ ruleId: rule.id, triggerEvent: rule.triggerEvent }, 'Automation rule created');
      return rule;
    },

    createScheduledReport(input: CreateScheduledReportInput): ScheduledReport {
      const data = parseInput(scheduledReportInputSchema, input);
      const now = clock.now();
      const report: ScheduledReport = {
        id: generateId('rpt'),
        userId: data.userId,
        name: data.name,
        description: data.description,
        isActive: data.isActive,
        reportType: data.reportType,
        reportFormat: data.reportFormat,
        filters: data.filters,
        scheduleType: data.scheduleType,
        scheduleConfig: data.scheduleConfig,
        deliveryMethod: data.deliveryMethod,
        deliveryConfig: data.deliveryConfig,
        lastGenerated: null,
        nextGeneration: computeNextReportRun(data, now, calculator),
        generationCount: 0,
        createdAt: now,
        updatedAt: now,
      };

      store.transaction(() => store.insertScheduledReport(report));
      logger.info({ reportId: report.id, scheduleType: report.scheduleType }, 'Scheduled report created');
      return report;
    },

    createAlertRule(input: CreateAlertRuleInput): AlertRule {
      const data = parseInput(alertRuleInputSchema, input);
      const now = clock.now();
      const rule: AlertRule = {
        id: generateId('alert'),
        userId: data.userId,
        name: data.name,
        description: data.description,
        isActive: data.isActive,
        metricType: data.metricType,
        thresholdConfig: data.thresholdConfig,
        severity: data.severity,
        alertFrequency: data.alertFrequency,
        notificationChannels: data.notificationChannels,
        notificationConfig: data.notificationConfig,
        cooldownMinutes: data.cooldownMinutes,
        lastTriggered: null,
        triggerCount: 0,
        lastCheck: null,
        createdAt: now,
        updatedAt: now,
      };

      store.transaction(() => store.insertAlertRule(rule));
      logger.info({ alertRuleId: rule.id, metricType: rule.metricType }, 'Alert rule created');
      return rule;
    },

    listTasksForWorkflow(workflowId: string): Task[] {
      return store.listTasksForWorkflow(workflowId);
    },

    cancelTask(taskId: string): Task {
      return store.transaction(() => {
        const task = store.getTask(taskId);
        if (!task) throw new RecordNotFoundError('Task', taskId);
        if (task.status !== 'pending') {
          throw new ValidationError(`Only pending tasks can be cancelled (task is ${task.status})`, 'status');
        }

        const cancelled: Task = { ...task, status: 'cancelled', completedAt: clock.now() };
        store.updateTask(cancelled);
        logger.info({ taskId }, 'Task cancelled');
        return cancelled;
      });
    },

    getOverview(userId: string): AutomationOverview {
      return getAutomationOverview(store, userId);
    },
  };
}
