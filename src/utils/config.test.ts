import { describe, it, expect } from 'vitest';
import { homedir } from 'os';
import { join } from 'path';
import { deepMerge, loadConfig, resolveStateDir } from './config';

const MISSING_CONFIG = '/nonexistent/review-automation/automation.json';

function load(env: NodeJS.ProcessEnv) {
  return loadConfig({ env, configPath: MISSING_CONFIG, loadEnvFiles: false });
}

describe('loadConfig', () => {
  it('falls back to defaults', async () => {
    const config = await load({ AUTOMATION_STATE_DIR: '/srv/automation' });

    expect(config).toEqual({
      stateDir: '/srv/automation',
      databaseFile: '/srv/automation/automation.db',
      logLevel: 'info',
      scheduler: {
        enabled: true,
        tickIntervalMs: 60_000,
        taskBatchSize: 10,
        alertCheckIntervalMinutes: 5,
        taskRetentionDays: 7,
        cronCalculator: 'daily',
      },
      tasks: {
        retryDelayMinutes: 5,
        maxRetries: 3,
      },
    });
  });

  it('reads overrides from the environment', async () => {
    const config = await load({
      AUTOMATION_STATE_DIR: '/srv/automation',
      AUTOMATION_DB_FILE: '/data/reviews.db',
      LOG_LEVEL: 'debug',
      SCHEDULER_ENABLED: 'false',
      SCHEDULER_TICK_INTERVAL_MS: '1000',
      SCHEDULER_TASK_BATCH_SIZE: '25',
      SCHEDULER_ALERT_CHECK_MINUTES: '15',
      SCHEDULER_TASK_RETENTION_DAYS: '30',
      SCHEDULER_CRON_CALCULATOR: 'expression',
      TASK_RETRY_DELAY_MINUTES: '2',
      TASK_MAX_RETRIES: '5',
    });

    expect(config.databaseFile).toBe('/data/reviews.db');
    expect(config.logLevel).toBe('debug');
    expect(config.scheduler).toEqual({
      enabled: false,
      tickIntervalMs: 1000,
      taskBatchSize: 25,
      alertCheckIntervalMinutes: 15,
      taskRetentionDays: 30,
      cronCalculator: 'expression',
    });
    expect(config.tasks).toEqual({ retryDelayMinutes: 2, maxRetries: 5 });
  });

  it('ignores blank environment values', async () => {
    const config = await load({ AUTOMATION_STATE_DIR: '/srv/automation', SCHEDULER_TICK_INTERVAL_MS: '  ' });
    expect(config.scheduler.tickIntervalMs).toBe(60_000);
  });

  it('keeps the scheduler enabled for any value but false', async () => {
    const config = await load({ AUTOMATION_STATE_DIR: '/srv/automation', SCHEDULER_ENABLED: 'yes' });
    expect(config.scheduler.enabled).toBe(true);
  });

  it('substitutes ${VAR} references', async () => {
    const config = await load({
      AUTOMATION_STATE_DIR: '/srv/automation',
      DATA_DIR: '/mnt/data',
      AUTOMATION_DB_FILE: '${DATA_DIR}/automation.db',
    });
    expect(config.databaseFile).toBe('/mnt/data/automation.db');
  });

  it('rejects invalid values', async () => {
    await expect(
      load({ AUTOMATION_STATE_DIR: '/srv/automation', SCHEDULER_TASK_BATCH_SIZE: 'ten' }),
    ).rejects.toThrow();
    await expect(load({ AUTOMATION_STATE_DIR: '/srv/automation', LOG_LEVEL: 'loud' })).rejects.toThrow();
  });
});

describe('resolveStateDir', () => {
  it('defaults to a directory in the home folder', () => {
    expect(resolveStateDir({})).toBe(join(homedir(), '.review-automation'));
  });

  it('expands ~ in an override', () => {
    expect(resolveStateDir({ AUTOMATION_STATE_DIR: '~/automation-state' })).toBe(join(homedir(), 'automation-state'));
  });
});

describe('deepMerge', () => {
  it('merges nested objects', () => {
    const merged = deepMerge(
      { scheduler: { enabled: true, tickIntervalMs: 60_000 }, logLevel: 'info' },
      { scheduler: { tickIntervalMs: 5000 } },
    );
    expect(merged).toEqual({ scheduler: { enabled: true, tickIntervalMs: 5000 }, logLevel: 'info' });
  });

  it('skips undefined values', () => {
    expect(deepMerge({ logLevel: 'info' }, { logLevel: undefined })).toEqual({ logLevel: 'info' });
  });

  it('ignores prototype keys', () => {
    const source: Record<string, unknown> = JSON.parse('{"__proto__": {"polluted": true}, "name": "ok"}');
    const merged = deepMerge({}, source);

    expect(merged).toEqual({ name: 'ok' });
    expect(Object.prototype.hasOwnProperty.call(merged, '__proto__')).toBe(false);
    expect(Object.prototype.hasOwnProperty.call(Object.prototype, 'polluted')).toBe(false);
  });
});
