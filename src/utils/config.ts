/**
 * Configuration loading for the automation engine
 *
 * Sources, later ones winning:
 *   1. built-in defaults
 *   2. ~/.review-automation/automation.json (or AUTOMATION_CONFIG_PATH)
 *   3. environment variables, including those from ~/.review-automation/.env and ./.env
 */

import { readFileSync, existsSync } from 'fs';
import { homedir } from 'os';
import { join, resolve } from 'path';
import { config as dotenvConfig } from 'dotenv';
import { z } from 'zod';
import { isJsonObject, type JsonObject } from '../db/rows';
import { createLogger } from './logger';

const logger = createLogger('config');

const STATE_DIR_NAME = '.review-automation';
const CONFIG_FILE_NAME = 'automation.json';

const configSchema = z.object({
  stateDir: z.string().min(1),
  databaseFile: z.string().min(1),
  logLevel: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  scheduler: z
    .object({
      enabled: z.boolean().default(true),
      tickIntervalMs: z.coerce.number().int().positive().default(60_000),
      taskBatchSize: z.coerce.number().int().positive().default(10),
      alertCheckIntervalMinutes: z.coerce.number().positive().default(5),
      taskRetentionDays: z.coerce.number().positive().default(7),
      cronCalculator: z.enum(['daily', 'expression']).default('daily'),
    })
    .default({}),
  tasks: z
    .object({
      retryDelayMinutes: z.coerce.number().nonnegative().default(5),
      maxRetries: z.coerce.number().int().nonnegative().default(3),
    })
    .default({}),
});

export type AutomationConfig = z.infer<typeof configSchema>;

export interface LoadConfigOptions {
  /** Config file to read instead of the one in the state directory */
  configPath?: string;
  env?: NodeJS.ProcessEnv;
  /** Read .env files into process.env first (default true) */
  loadEnvFiles?: boolean;
}

function resolveUserPath(input: string): string {
  const trimmed = input.trim();
  if (!trimmed) return trimmed;
  if (trimmed.startsWith('~')) {
    return resolve(trimmed.replace(/^~(?=$|[\\/])/, homedir()));
  }
  return resolve(trimmed);
}

export function resolveStateDir(env: NodeJS.ProcessEnv = process.env): string {
  const override = env.AUTOMATION_STATE_DIR?.trim();
  if (override) return resolveUserPath(override);
  return join(homedir(), STATE_DIR_NAME);
}

function resolveConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  const override = env.AUTOMATION_CONFIG_PATH?.trim();
  if (override) return resolveUserPath(override);
  return join(resolveStateDir(env), CONFIG_FILE_NAME);
}

/**
 * Substitute environment variables in config values.
 * Supports ${VAR_NAME} syntax.
 */
function substituteEnvVars(value: unknown, env: NodeJS.ProcessEnv): unknown {
  if (typeof value === 'string') {
    return value.replace(/\$\{([A-Z_][A-Z0-9_]*)\}/g, (_, varName: string) => env[varName] ?? '');
  }
  if (Array.isArray(value)) {
    return value.map((item) => substituteEnvVars(item, env));
  }
  if (isJsonObject(value)) {
    const result: JsonObject = {};
    for (const [key, item] of Object.entries(value)) {
      result[key] = substituteEnvVars(item, env);
    }
    return result;
  }
  return value;
}

/**
 * Deep merge two objects. Protects against prototype pollution.
 */
export function deepMerge(target: JsonObject, source: JsonObject): JsonObject {
  const DANGEROUS_KEYS = new Set(['__proto__', 'constructor', 'prototype']);
  const result: JsonObject = { ...target };
  for (const key of Object.keys(source)) {
    if (DANGEROUS_KEYS.has(key)) continue;
    const sourceValue = source[key];
    const targetValue = target[key];

    if (isJsonObject(sourceValue) && isJsonObject(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      result[key] = sourceValue;
    }
  }
  return result;
}

function readConfigFile(configPath: string): JsonObject {
  if (!existsSync(configPath)) return {};
  try {
    const parsed: unknown = JSON.parse(readFileSync(configPath, 'utf-8'));
    if (isJsonObject(parsed)) return parsed;
    logger.error({ configPath }, 'Config file must contain a JSON object, ignoring it');
  } catch (err) {
    logger.error({ configPath, err }, 'Failed to parse config file');
  }
  return {};
}

/** Environment variables that override config keys. Unset or empty ones are skipped. */
function envOverrides(env: NodeJS.ProcessEnv): JsonObject {
  const pick = (name: string): string | undefined => {
    const value = env[name]?.trim();
    return value ? value : undefined;
  };

  return {
    databaseFile: pick('AUTOMATION_DB_FILE'),
    logLevel: pick('LOG_LEVEL'),
    scheduler: {
      enabled: pick('SCHEDULER_ENABLED') === undefined ? undefined : pick('SCHEDULER_ENABLED') !== 'false',
      tickIntervalMs: pick('SCHEDULER_TICK_INTERVAL_MS'),
      taskBatchSize: pick('SCHEDULER_TASK_BATCH_SIZE'),
      alertCheckIntervalMinutes: pick('SCHEDULER_ALERT_CHECK_MINUTES'),
      taskRetentionDays: pick('SCHEDULER_TASK_RETENTION_DAYS'),
      cronCalculator: pick('SCHEDULER_CRON_CALCULATOR'),
    },
    tasks: {
      retryDelayMinutes: pick('TASK_RETRY_DELAY_MINUTES'),
      maxRetries: pick('TASK_MAX_RETRIES'),
    },
  };
}

/**
 * Load configuration from file and environment
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<AutomationConfig> {
  const env = options.env ?? process.env;

  if (options.loadEnvFiles ?? true) {
    // ~/.review-automation/.env first, then CWD fallback (neither overrides existing vars)
    dotenvConfig({ path: join(resolveStateDir(env), '.env') });
    dotenvConfig();
  }

  const stateDir = resolveStateDir(env);
  const defaults: JsonObject = {
    stateDir,
    databaseFile: join(stateDir, 'automation.db'),
  };

  const fileConfig = readConfigFile(options.configPath ?? resolveConfigPath(env));
  const merged = deepMerge(deepMerge(defaults, fileConfig), envOverrides(env));

  return configSchema.parse(substituteEnvVars(merged, env));
}
