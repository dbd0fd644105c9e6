/**
 * Migration 001 - Automation records
 *
 * Workflows and their tasks, event-driven automation rules, scheduled reports
 * and metric alert rules.
 */

export const MIGRATION_001_UP = `
  -- Workflow definitions
  CREATE TABLE IF NOT EXISTS workflows (
    id TEXT PRIMARY KEY,
    user_id TEXT NOT NULL DEFAULT 'default',
    name TEXT NOT NULL,
    description TEXT,
    status TEXT NOT NULL DEFAULT 'active',
    trigger_kind TEXT NOT NULL,
    trigger_config TEXT NOT NULL DEFAULT '{}',
    actions TEXT NOT NULL DEFAULT '[]',
    max_executions INTEGER,
    execution_count INTEGER NOT NULL DEFAULT 0,
    last_execution INTEGER,
    next_execution INTEGER,
    created_at INTEGER NOT NULL DEFAULT (strftime('%s','now') * 1000),
    updated_at INTEGER NOT NULL DEFAULT (strftime('%s','now') * 1000)
  );
  CREATE INDEX IF NOT EXISTS idx_workflows_user ON workflows(user_id);
  CREATE INDEX IF NOT EXISTS idx_workflows_due ON workflows(status, trigger_kind, next_execution);

  -- Units of work, one per workflow action or ad hoc job
  CREATE TABLE IF NOT EXISTS tasks (
    id TEXT PRIMARY KEY,
    workflow_id TEXT,
    action_kind TEXT NOT NULL,
    action_config TEXT NOT NULL DEFAULT '{}',
    status TEXT NOT NULL DEFAULT 'pending',
    scheduled_at INTEGER NOT NULL,
    started_at INTEGER,
    completed_at INTEGER,
    result TEXT,
    error_message TEXT,
    retry_count INTEGER NOT NULL DEFAULT 0,
    max_retries INTEGER NOT NULL DEFAULT 3,
    created_at INTEGER NOT NULL DEFAULT (strftime('%s','now') * 1000)
  );
  CREATE INDEX IF NOT EXISTS idx_tasks_pending ON tasks(status, scheduled_at);
  CREATE INDEX IF NOT EXISTS idx_tasks_workflow ON tasks(workflow_id);
  CREATE INDEX IF NOT EXISTS idx_tasks_completed ON tasks(completed_at);

  -- Event-driven rules
  CREATE TABLE IF NOT EXISTS automation_rules (
    id TEXT PRIMARY KEY,
    user_id TEXT NOT NULL DEFAULT 'default',
    name TEXT NOT NULL,
    description TEXT,
    is_active INTEGER NOT NULL DEFAULT 1,
    trigger_event TEXT NOT NULL,
    conditions TEXT,
    actions TEXT NOT NULL DEFAULT '[]',
    cooldown_minutes INTEGER NOT NULL DEFAULT 0,
    last_triggered INTEGER,
    trigger_count INTEGER NOT NULL DEFAULT 0,
    priority INTEGER NOT NULL DEFAULT 100,
    created_at INTEGER NOT NULL DEFAULT (strftime('%s','now') * 1000),
    updated_at INTEGER NOT NULL DEFAULT (strftime('%s','now') * 1000)
  );
  CREATE INDEX IF NOT EXISTS idx_automation_rules_event ON automation_rules(trigger_event, is_active, priority);

  -- Reports generated on a schedule
  CREATE TABLE IF NOT EXISTS scheduled_reports (
    id TEXT PRIMARY KEY,
    user_id TEXT NOT NULL DEFAULT 'default',
    name TEXT NOT NULL,
    description TEXT,
    is_active INTEGER NOT NULL DEFAULT 1,
    report_type TEXT NOT NULL,
    report_format TEXT NOT NULL,
    filters TEXT,
    schedule_type TEXT NOT NULL,
    schedule_config TEXT NOT NULL DEFAULT '{}',
    delivery_method TEXT NOT NULL DEFAULT 'download',
    delivery_config TEXT,
    last_generated INTEGER,
    next_generation INTEGER,
    generation_count INTEGER NOT NULL DEFAULT 0,
    created_at INTEGER NOT NULL DEFAULT (strftime('%s','now') * 1000),
    updated_at INTEGER NOT NULL DEFAULT (strftime('%s','now') * 1000)
  );
  CREATE INDEX IF NOT EXISTS idx_scheduled_reports_due ON scheduled_reports(is_active, next_generation);

  -- Metric threshold alerts
  CREATE TABLE IF NOT EXISTS alert_rules (
    id TEXT PRIMARY KEY,
    user_id TEXT NOT NULL DEFAULT 'default',
    name TEXT NOT NULL,
    description TEXT,
    is_active INTEGER NOT NULL DEFAULT 1,
    metric_type TEXT NOT NULL,
    threshold_config TEXT NOT NULL DEFAULT '{}',
    severity TEXT NOT NULL DEFAULT 'medium',
    alert_frequency TEXT NOT NULL DEFAULT 'immediate',
    notification_channels TEXT NOT NULL DEFAULT '[]',
    notification_config TEXT,
    cooldown_minutes INTEGER NOT NULL DEFAULT 0,
    last_triggered INTEGER,
    trigger_count INTEGER NOT NULL DEFAULT 0,
    last_check INTEGER,
    created_at INTEGER NOT NULL DEFAULT (strftime('%s','now') * 1000),
    updated_at INTEGER NOT NULL DEFAULT (strftime('%s','now') * 1000)
  );
  CREATE INDEX IF NOT EXISTS idx_alert_rules_check ON alert_rules(is_active, last_check);
`;
