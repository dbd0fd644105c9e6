/**
 * Review Automation Engine
 *
 * Entry point - opens the database, builds the automation core and runs the
 * scheduler until the process is told to stop.
 */

import { createDatabase, type Database } from './db/index';
import { createMigrationRunner } from './db/migrations';
import {
  createAutomationCore,
  createLoggingExecutors,
  getCronCalculator,
  matchEventConditions,
  DAY_MS,
  MINUTE_MS,
  type AutomationCore,
} from './automation/index';
import { loadConfig, type AutomationConfig } from './utils/config';
import { logger, setLogLevel } from './utils/logger';
import { setupShutdownHandlers } from './utils/production';

export interface Engine {
  config: AutomationConfig;
  db: Database;
  core: AutomationCore;
  stop(): Promise<void>;
}

/**
 * Open the database, apply migrations and construct the core. The scheduler
 * is started when `scheduler.enabled` is set.
 */
export async function startEngine(config: AutomationConfig): Promise<Engine> {
  setLogLevel(config.logLevel);

  const db = await createDatabase({ file: config.databaseFile });
  createMigrationRunner(db).migrate();

  const core = createAutomationCore({
    db,
    executors: createLoggingExecutors(),
    matcher: matchEventConditions,
    calculator: getCronCalculator(config.scheduler.cronCalculator),
    tickIntervalMs: config.scheduler.tickIntervalMs,
    taskBatchSize: config.scheduler.taskBatchSize,
    alertCheckIntervalMs: config.scheduler.alertCheckIntervalMinutes * MINUTE_MS,
    taskRetentionMs: config.scheduler.taskRetentionDays * DAY_MS,
    retryDelayMs: config.tasks.retryDelayMinutes * MINUTE_MS,
    maxRetries: config.tasks.maxRetries,
  });

  if (config.scheduler.enabled) {
    core.startScheduler();
  } else {
    logger.info('Scheduler disabled by configuration');
  }

  return {
    config,
    db,
    core,
    async stop() {
      await core.stopScheduler();
      db.close();
    },
  };
}

async function main(): Promise<void> {
  const config = await loadConfig();
  logger.info({ stateDir: config.stateDir, databaseFile: config.databaseFile }, 'Starting review automation engine');

  const engine = await startEngine(config);
  setupShutdownHandlers(() => engine.stop());
}

if (require.main === module) {
  main().catch((err: unknown) => {
    logger.fatal({ err }, 'Failed to start');
    process.exit(1);
  });
}

export * from './automation/index';
export { createDatabase } from './db/index';
export type { Database } from './db/index';
export { createMigrationRunner } from './db/migrations';
export { loadConfig } from './utils/config';
export type { AutomationConfig } from './utils/config';
