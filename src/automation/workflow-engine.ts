/**
 * Workflow Engine - Expands workflows into tasks and runs them
 *
 * `execute` turns every configured action of an eligible workflow into a
 * pending task and advances the workflow's counters, all in one transaction,
 * then runs the new tasks in action order. `executeTask` runs a single task
 * and applies the retry policy when its action fails.
 *
 * Action failures never reject: they end up on the task. Store failures do.
 */

import { createLogger } from '../utils/logger';
import { generateId } from '../utils/id';
import type { ActionRegistry } from './actions';
import { errorMessage } from './errors';
import { computeNextWorkflowRun, dailyCronCalculator, type NextRunCalculator } from './schedule';
import type { AutomationStore } from './store';
import { MINUTE_MS, systemClock, type Clock, type Task, type Workflow } from './types';

const logger = createLogger('workflow-engine');

export const DEFAULT_RETRY_DELAY_MS = 5 * MINUTE_MS;
export const DEFAULT_MAX_RETRIES = 3;

// =============================================================================
// TYPES
// =============================================================================

export interface WorkflowEngineDeps {
  store: AutomationStore;
  actions: ActionRegistry;
  clock?: Clock;
  /** Next-run calculator for cron-like triggers */
  calculator?: NextRunCalculator;
  /** Backoff before a failed task is retried */
  retryDelayMs?: number;
  /** maxRetries given to tasks created by `execute` */
  maxRetries?: number;
}

export interface WorkflowEngine {
  /**
   * Run a workflow now. Returns false without side effects when the workflow
   * does not exist, is not active, or has reached its execution cap.
   */
  execute(workflowId: string): Promise<boolean>;
  /** Run one pending task. Resolves with the task as persisted after the attempt. */
  executeTask(task: Task): Promise<Task>;
  /** Like `executeTask`, also telling whether this call claimed the task. */
  attemptTask(task: Task): Promise<TaskAttempt>;
}

export interface TaskAttempt {
  /** False when the task was no longer pending and nothing ran */
  claimed: boolean;
  task: Task;
}

// =============================================================================
// TASK STATE MACHINE
// =============================================================================

export function hasReachedExecutionCap(workflow: Pick<Workflow, 'maxExecutions' | 'executionCount'>): boolean {
  return workflow.maxExecutions !== null && workflow.executionCount >= workflow.maxExecutions;
}

/**
 * The task after a failed attempt: back to pending with a deferred
 * `scheduledAt` while retries remain, otherwise failed for good.
 */
export function applyTaskFailure(task: Task, message: string, now: number, retryDelayMs: number): Task {
  if (task.retryCount < task.maxRetries) {
    return {
      ...task,
      status: 'pending',
      errorMessage: message,
      retryCount: task.retryCount + 1,
      scheduledAt: now + retryDelayMs,
      startedAt: null,
      completedAt: null,
    };
  }

  return {
    ...task,
    status: 'failed',
    errorMessage: message,
    completedAt: now,
  };
}

export function buildTask(
  fields: Pick<Task, 'workflowId' | 'actionKind' | 'actionConfig'>,
  now: number,
  maxRetries: number = DEFAULT_MAX_RETRIES,
): Task {
  return {
    id: generateId('task'),
    workflowId: fields.workflowId,
    actionKind: fields.actionKind,
    actionConfig: structuredClone(fields.actionConfig),
    status: 'pending',
    scheduledAt: now,
    startedAt: null,
    completedAt: null,
    result: null,
    errorMessage: null,
    retryCount: 0,
    maxRetries,
    createdAt: now,
  };
}

// =============================================================================
// ENGINE
// =============================================================================

export function createWorkflowEngine(deps: WorkflowEngineDeps): WorkflowEngine {
  const { store, actions } = deps;
  const clock = deps.clock ?? systemClock;
  const calculator = deps.calculator ?? dailyCronCalculator;
  const retryDelayMs = deps.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS;
  const maxRetries = deps.maxRetries ?? DEFAULT_MAX_RETRIES;

  /** Create the tasks and advance the workflow as one unit. Null when not eligible. */
  function startExecution(workflowId: string, now: number): Task[] | null {
    return store.transaction(() => {
      const workflow = store.getWorkflow(workflowId);
      if (!workflow) {
        logger.debug({ workflowId }, 'Workflow not found');
        return null;
      }
      if (workflow.status !== 'active') {
        logger.debug({ workflowId, status: workflow.status }, 'Workflow not active');
        return null;
      }
      if (hasReachedExecutionCap(workflow)) {
        logger.debug({ workflowId, executionCount: workflow.executionCount }, 'Workflow reached max executions');
        return null;
      }

      const tasks = workflow.actions.map((action) =>
        buildTask({ workflowId: workflow.id, actionKind: action.kind, actionConfig: action.config }, now, maxRetries),
      );
      for (const task of tasks) {
        store.insertTask(task);
      }

      const executionCount = workflow.executionCount + 1;
      const capped = hasReachedExecutionCap({ maxExecutions: workflow.maxExecutions, executionCount });
      store.updateWorkflow({
        ...workflow,
        executionCount,
        lastExecution: now,
        // Capped workflows are never due again
        nextExecution: capped ? null : computeNextWorkflowRun(workflow, now, calculator),
        updatedAt: now,
      });

      return tasks;
    });
  }

  async function attemptTask(task: Task): Promise<TaskAttempt> {
    const startedAt = clock.now();
    if (!store.claimTask(task.id, startedAt)) {
      logger.warn({ taskId: task.id }, 'Task is no longer pending, skipping');
      return { claimed: false, task: store.getTask(task.id) ?? task };
    }

    const running: Task = { ...task, status: 'running', startedAt };
    logger.debug({ taskId: task.id, actionKind: task.actionKind }, 'Running task');

    let outcome: { ok: true; result: unknown } | { ok: false; error: string };
    try {
      const result = await actions.execute(task.actionKind, task.actionConfig, {
        taskId: task.id,
        workflowId: task.workflowId,
        ruleId: null,
        payload: null,
      });
      outcome = { ok: true, result: result ?? null };
    } catch (err) {
      outcome = { ok: false, error: errorMessage(err) };
    }

    const finishedAt = clock.now();
    let finished: Task;
    if (outcome.ok) {
      finished = {
        ...running,
        status: 'completed',
        result: outcome.result,
        errorMessage: null,
        completedAt: finishedAt,
      };
      logger.info({ taskId: task.id, actionKind: task.actionKind }, 'Task completed');
    } else {
      finished = applyTaskFailure(running, outcome.error, finishedAt, retryDelayMs);
      if (finished.status === 'pending') {
        logger.warn(
          { taskId: task.id, error: outcome.error, retryCount: finished.retryCount, retryAt: finished.scheduledAt },
          'Task failed, retry scheduled',
        );
      } else {
        logger.error({ taskId: task.id, error: outcome.error, retryCount: finished.retryCount }, 'Task failed permanently');
      }
    }

    store.transaction(() => store.updateTask(finished));
    return { claimed: true, task: finished };
  }

  async function executeTask(task: Task): Promise<Task> {
    return (await attemptTask(task)).task;
  }

  return {
    async execute(workflowId: string): Promise<boolean> {
      const now = clock.now();
      const tasks = startExecution(workflowId, now);
      if (!tasks) return false;

      logger.info({ workflowId, taskCount: tasks.length }, 'Workflow executed');

      for (const task of tasks) {
        await executeTask(task);
      }
      return true;
    },

    executeTask,
    attemptTask,
  };
}
