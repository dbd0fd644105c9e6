/**
 * Automation core - wires store, engines and scheduler together
 *
 * Everything is constructed here from injected collaborators; there is no
 * module-level registry or connection. Callers (the request layer, the
 * process bootstrap) hold on to the returned object.
 */

import type { Database } from '../db/index';
import { createActionRegistry, type ActionExecutors, type ActionRegistry } from './actions';
import { createAutomationAdmin, type AutomationAdmin } from './admin';
import type { ConditionMatcher } from './conditions';
import { createEventRuleEngine, type EventRuleEngine } from './event-rules';
import { createSqlMetricsSource, type MetricsSource } from './metrics';
import { dailyCronCalculator, type NextRunCalculator } from './schedule';
import { AutomationScheduler } from './scheduler';
import { createAutomationStore, type AutomationStore } from './store';
import { systemClock, type Clock } from './types';
import { createWorkflowEngine, type WorkflowEngine } from './workflow-engine';

export interface AutomationCoreDeps {
  db: Database;
  executors: ActionExecutors;
  /** Defaults to the SQL metrics over the reviews table of `db` */
  metrics?: MetricsSource;
  matcher?: ConditionMatcher;
  clock?: Clock;
  calculator?: NextRunCalculator;
  tickIntervalMs?: number;
  taskBatchSize?: number;
  alertCheckIntervalMs?: number;
  taskRetentionMs?: number;
  retryDelayMs?: number;
  maxRetries?: number;
}

export interface AutomationCore {
  store: AutomationStore;
  actions: ActionRegistry;
  admin: AutomationAdmin;
  workflowEngine: WorkflowEngine;
  eventRules: EventRuleEngine;
  scheduler: AutomationScheduler;
  startScheduler(tickIntervalMs?: number): void;
  stopScheduler(): Promise<void>;
}

export function createAutomationCore(deps: AutomationCoreDeps): AutomationCore {
  const clock = deps.clock ?? systemClock;
  const calculator = deps.calculator ?? dailyCronCalculator;

  const store = createAutomationStore(deps.db);
  const actions = createActionRegistry(deps.executors);
  const workflowEngine = createWorkflowEngine({
    store,
    actions,
    clock,
    calculator,
    retryDelayMs: deps.retryDelayMs,
    maxRetries: deps.maxRetries,
  });
  const eventRules = createEventRuleEngine({ store, actions, clock, matcher: deps.matcher });
  const admin = createAutomationAdmin({ store, actions, clock, calculator });
  const scheduler = new AutomationScheduler({
    store,
    workflowEngine,
    metrics: deps.metrics ?? createSqlMetricsSource(deps.db),
    clock,
    calculator,
    tickIntervalMs: deps.tickIntervalMs,
    taskBatchSize: deps.taskBatchSize,
    alertCheckIntervalMs: deps.alertCheckIntervalMs,
    taskRetentionMs: deps.taskRetentionMs,
    taskMaxRetries: deps.maxRetries,
  });

  return {
    store,
    actions,
    admin,
    workflowEngine,
    eventRules,
    scheduler,
    startScheduler: (tickIntervalMs?: number) => scheduler.start(tickIntervalMs),
    stopScheduler: () => scheduler.stop(),
  };
}

export * from './types';
export * from './errors';
export { createActionRegistry, createLoggingExecutors } from './actions';
export type { ActionContext, ActionExecutor, ActionExecutors, ActionRegistry, TaskAction } from './actions';
export { getAutomationOverview } from './admin';
export type { AutomationAdmin, AutomationOverview, CreateAlertRuleInput, CreateAutomationRuleInput, CreateScheduledReportInput, CreateWorkflowInput } from './admin';
export { alwaysMatch, matchEventConditions } from './conditions';
export type { ConditionMatcher } from './conditions';
export type { ActionOutcome, EventRuleEngine, FiredRule } from './event-rules';
export { createSqlMetricsSource } from './metrics';
export type { MetricsSource } from './metrics';
export { evaluateAlertRule } from './rule-evaluator';
export {
  computeNextReportRun,
  computeNextWorkflowRun,
  cronExpressionCalculator,
  cronExpressionProblem,
  dailyCronCalculator,
  getCronCalculator,
  nextCronTime,
  parseCronExpression,
} from './schedule';
export type { CronCalculatorName, CronParseResult, CronSchedule, NextRunCalculator } from './schedule';
export { AutomationScheduler } from './scheduler';
export type { StepReport, TickReport } from './scheduler';
export type { AutomationStore } from './store';
export { WORKFLOW_TEMPLATES, createWorkflowFromTemplate, getWorkflowTemplate } from './templates';
export type { WorkflowTemplate } from './templates';
export type { TaskAttempt, WorkflowEngine } from './workflow-engine';
