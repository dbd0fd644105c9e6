/**
 * Automation Scheduler - the background tick loop
 *
 * Each tick runs five steps in order:
 *   1. due workflows     - execute active schedule-triggered workflows that are due
 *   2. pending tasks     - run a bounded batch of due pending tasks, oldest first
 *   3. due reports       - queue a generate_report task per due scheduled report
 *   4. alert rules       - evaluate alert rules not checked in the last few minutes
 *   5. cleanup           - purge terminal tasks past the retention window
 *
 * Steps are isolated from each other, and records within a step are isolated
 * from each other: a failure is logged, counted in the TickReport and the loop
 * moves on. Nothing is cached between ticks; every step re-reads the store.
 *
 * The loop never overlaps itself. The next tick is scheduled only after the
 * previous one has finished, and `stop()` waits for the tick in flight.
 */

import { createLogger } from '../utils/logger';
import { errorMessage } from './errors';
import type { MetricsSource } from './metrics';
import { evaluateAlertRule } from './rule-evaluator';
import { computeNextReportRun, dailyCronCalculator, type NextRunCalculator } from './schedule';
import type { AutomationStore } from './store';
import { DAY_MS, MINUTE_MS, systemClock, type AlertRule, type Clock, type ScheduledReport } from './types';
import { buildTask, DEFAULT_MAX_RETRIES, type WorkflowEngine } from './workflow-engine';

const logger = createLogger('scheduler');

export const DEFAULT_TICK_INTERVAL_MS = 60_000;
export const DEFAULT_TASK_BATCH_SIZE = 10;
export const DEFAULT_ALERT_CHECK_INTERVAL_MS = 5 * MINUTE_MS;
export const DEFAULT_TASK_RETENTION_MS = 7 * DAY_MS;

// =============================================================================
// TYPES
// =============================================================================

export type SchedulerStepName = 'due_workflows' | 'pending_tasks' | 'due_reports' | 'alert_rules' | 'cleanup';

export interface StepReport {
  step: SchedulerStepName;
  /** Records handled successfully (tasks purged, for cleanup) */
  processed: number;
  /** Records whose processing threw */
  failed: number;
  /** Set when the step itself failed */
  error?: string;
}

export interface TickReport {
  startedAt: number;
  finishedAt: number;
  steps: StepReport[];
  /** True when a stop request cut the tick short */
  stopped: boolean;
}

export interface AutomationSchedulerOptions {
  store: AutomationStore;
  workflowEngine: WorkflowEngine;
  metrics: MetricsSource;
  clock?: Clock;
  calculator?: NextRunCalculator;
  tickIntervalMs?: number;
  taskBatchSize?: number;
  alertCheckIntervalMs?: number;
  taskRetentionMs?: number;
  /** maxRetries given to report and notification tasks */
  taskMaxRetries?: number;
}

interface StepCounts {
  processed: number;
  failed: number;
}

type Step = (now: number) => Promise<StepCounts> | StepCounts;

export function isAlertInCooldown(rule: Pick<AlertRule, 'cooldownMinutes' | 'lastTriggered'>, now: number): boolean {
  if (rule.cooldownMinutes <= 0 || rule.lastTriggered === null) return false;
  return now < rule.lastTriggered + rule.cooldownMinutes * MINUTE_MS;
}

// =============================================================================
// SCHEDULER
// =============================================================================

export class AutomationScheduler {
  private readonly store: AutomationStore;
  private readonly workflowEngine: WorkflowEngine;
  private readonly metrics: MetricsSource;
  private readonly clock: Clock;
  private readonly calculator: NextRunCalculator;
  private readonly tickIntervalMs: number;
  private readonly taskBatchSize: number;
  private readonly alertCheckIntervalMs: number;
  private readonly taskRetentionMs: number;
  private readonly taskMaxRetries: number;

  private running = false;
  private stopRequested = false;
  private loop: Promise<void> | null = null;
  private wake: (() => void) | null = null;

  constructor(options: AutomationSchedulerOptions) {
    this.store = options.store;
    this.workflowEngine = options.workflowEngine;
    this.metrics = options.metrics;
    this.clock = options.clock ?? systemClock;
    this.calculator = options.calculator ?? dailyCronCalculator;
    this.tickIntervalMs = options.tickIntervalMs ?? DEFAULT_TICK_INTERVAL_MS;
    this.taskBatchSize = options.taskBatchSize ?? DEFAULT_TASK_BATCH_SIZE;
    this.alertCheckIntervalMs = options.alertCheckIntervalMs ?? DEFAULT_ALERT_CHECK_INTERVAL_MS;
    this.taskRetentionMs = options.taskRetentionMs ?? DEFAULT_TASK_RETENTION_MS;
    this.taskMaxRetries = options.taskMaxRetries ?? DEFAULT_MAX_RETRIES;
  }

  /**
   * Start the loop. The first tick runs immediately, later ticks
   * `tickIntervalMs` after the previous one finished.
   */
  start(tickIntervalMs: number = this.tickIntervalMs): void {
    if (this.running) {
      logger.warn('Automation scheduler already running');
      return;
    }

    this.running = true;
    this.stopRequested = false;
    logger.info({ tickIntervalMs }, 'Automation scheduler started');
    this.loop = this.runLoop(tickIntervalMs);
  }

  /**
   * Stop the loop. Resolves once the tick in flight, if any, has finished.
   */
  async stop(): Promise<void> {
    if (!this.loop) return;

    this.stopRequested = true;
    this.wake?.();
    await this.loop;
    this.loop = null;
    logger.info('Automation scheduler stopped');
  }

  isRunning(): boolean {
    return this.running;
  }

  /**
   * Run one full pass of all steps.
   */
  async runTick(): Promise<TickReport> {
    const startedAt = this.clock.now();
    const steps: StepReport[] = [];
    let stopped = false;

    const plan: Array<[SchedulerStepName, Step]> = [
      ['due_workflows', (now) => this.runDueWorkflows(now)],
      ['pending_tasks', (now) => this.runPendingTasks(now)],
      ['due_reports', (now) => this.queueDueReports(now)],
      ['alert_rules', (now) => this.checkAlertRules(now)],
      ['cleanup', (now) => this.cleanupTasks(now)],
    ];

    for (const [name, step] of plan) {
      if (this.stopRequested) {
        stopped = true;
        break;
      }
      steps.push(await this.runStep(name, step));
    }

    const report: TickReport = { startedAt, finishedAt: this.clock.now(), steps, stopped };
    logger.debug({ steps: report.steps, stopped }, 'Tick finished');
    return report;
  }

  // ===========================================================================
  // PRIVATE
  // ===========================================================================

  private async runLoop(tickIntervalMs: number): Promise<void> {
    try {
      while (!this.stopRequested) {
        try {
          await this.runTick();
        } catch (err) {
          logger.error({ err }, 'Scheduler tick failed');
        }
        if (this.stopRequested) break;
        await this.sleep(tickIntervalMs);
      }
    } finally {
      this.running = false;
    }
  }

  /** Sleep that `stop()` can cut short. */
  private sleep(ms: number): Promise<void> {
    return new Promise<void>((resolve) => {
      const timer = setTimeout(resolve, ms);
      this.wake = () => {
        clearTimeout(timer);
        resolve();
      };
    }).finally(() => {
      this.wake = null;
    });
  }

  private async runStep(step: SchedulerStepName, fn: Step): Promise<StepReport> {
    try {
      const counts = await fn(this.clock.now());
      if (counts.processed > 0 || counts.failed > 0) {
        logger.info({ step, ...counts }, 'Scheduler step finished');
      }
      return { step, ...counts };
    } catch (err) {
      logger.error({ err, step }, 'Scheduler step failed');
      return { step, processed: 0, failed: 0, error: errorMessage(err) };
    }
  }

  private async runDueWorkflows(now: number): Promise<StepCounts> {
    const counts: StepCounts = { processed: 0, failed: 0 };

    for (const workflow of this.store.findDueWorkflows(now)) {
      if (this.stopRequested) break;
      try {
        const executed = await this.workflowEngine.execute(workflow.id);
        if (executed) {
          counts.processed++;
        } else {
          logger.warn({ workflowId: workflow.id, name: workflow.name }, 'Due workflow was skipped');
        }
      } catch (err) {
        counts.failed++;
        logger.error({ err, workflowId: workflow.id }, 'Error executing workflow');
      }
    }

    return counts;
  }

  private async runPendingTasks(now: number): Promise<StepCounts> {
    const counts: StepCounts = { processed: 0, failed: 0 };

    for (const task of this.store.findPendingTasks(now, this.taskBatchSize)) {
      if (this.stopRequested) break;
      try {
        const attempt = await this.workflowEngine.attemptTask(task);
        if (attempt.claimed) {
          counts.processed++;
        } else {
          logger.debug({ taskId: task.id, status: attempt.task.status }, 'Task claimed elsewhere, not counted');
        }
      } catch (err) {
        counts.failed++;
        logger.error({ err, taskId: task.id }, 'Error processing task');
      }
    }

    return counts;
  }

  private queueReport(report: ScheduledReport, now: number): void {
    const task = buildTask(
      {
        workflowId: null,
        actionKind: 'generate_report',
        actionConfig: {
          report_id: report.id,
          report_type: report.reportType,
          format: report.reportFormat,
          filters: report.filters,
          delivery_method: report.deliveryMethod,
          delivery_config: report.deliveryConfig,
        },
      },
      now,
      this.taskMaxRetries,
    );
    this.store.insertTask(task);
    this.store.updateScheduledReport({
      ...report,
      lastGenerated: now,
      generationCount: report.generationCount + 1,
      nextGeneration: computeNextReportRun(report, now, this.calculator),
      updatedAt: now,
    });
  }

  private queueDueReports(now: number): StepCounts {
    return this.store.transaction(() => {
      const counts: StepCounts = { processed: 0, failed: 0 };

      for (const report of this.store.findDueReports(now)) {
        try {
          this.store.transaction(() => this.queueReport(report, now));
          counts.processed++;
          logger.info({ reportId: report.id, name: report.name }, 'Scheduled report queued');
        } catch (err) {
          counts.failed++;
          logger.error({ err, reportId: report.id }, 'Error scheduling report');
        }
      }

      return counts;
    });
  }

  private async checkAlertRule(rule: AlertRule, now: number): Promise<boolean> {
    const cooling = isAlertInCooldown(rule, now);
    const triggered = cooling ? false : await evaluateAlertRule(rule, this.metrics, now);
    if (cooling) {
      logger.debug({ alertRuleId: rule.id }, 'Alert rule in cooldown');
    }

    const recorded = this.store.transaction(() => {
      // Merge onto the latest row so concurrent owner edits survive
      const current = this.store.getAlertRule(rule.id);
      if (!current) return false;
      if (!current.isActive) {
        // Deactivated while its metrics were read
        this.store.updateAlertRule({ ...current, lastCheck: now, updatedAt: now });
        return false;
      }

      if (triggered) {
        this.store.insertTask(
          buildTask(
            {
              workflowId: null,
              actionKind: 'send_notification',
              actionConfig: {
                alert_rule_id: current.id,
                channels: current.notificationChannels,
                config: current.notificationConfig,
                severity: current.severity,
                alert_frequency: current.alertFrequency,
                metric_type: current.metricType,
              },
            },
            now,
            this.taskMaxRetries,
          ),
        );
      }

      this.store.updateAlertRule({
        ...current,
        lastCheck: now,
        lastTriggered: triggered ? now : current.lastTriggered,
        triggerCount: triggered ? current.triggerCount + 1 : current.triggerCount,
        updatedAt: now,
      });
      return true;
    });

    if (recorded && triggered) {
      logger.info({ alertRuleId: rule.id, metricType: rule.metricType, severity: rule.severity }, 'Alert rule triggered');
    }
    return recorded && triggered;
  }

  private async checkAlertRules(now: number): Promise<StepCounts> {
    const counts: StepCounts = { processed: 0, failed: 0 };

    for (const rule of this.store.findAlertRulesDueForCheck(now - this.alertCheckIntervalMs)) {
      if (this.stopRequested) break;
      try {
        await this.checkAlertRule(rule, now);
        counts.processed++;
      } catch (err) {
        counts.failed++;
        logger.error({ err, alertRuleId: rule.id }, 'Error checking alert rule');
      }
    }

    return counts;
  }

  private cleanupTasks(now: number): StepCounts {
    const removed = this.store.deleteTerminalTasksBefore(now - this.taskRetentionMs);
    if (removed > 0) {
      logger.info({ removed }, 'Cleaned up old tasks');
    }
    return { processed: removed, failed: 0 };
  }
}
