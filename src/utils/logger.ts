/**
 * Logger utility using Pino
 */
import pino from 'pino';

const isTest = process.env.NODE_ENV === 'test' || process.env.VITEST !== undefined;
const level = process.env.LOG_LEVEL || (isTest ? 'silent' : 'info');

let transport: pino.DestinationStream | undefined;
if (!isTest) {
  try {
    transport = pino.transport({
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname',
      },
    });
  } catch (err) {
    process.stderr.write(`pino-pretty unavailable, logging JSON: ${String(err)}\n`);
  }
}

const rootLogger = transport ? pino({ level }, transport) : pino({ level });
const moduleLoggers = new Set<pino.Logger>();

export type Logger = pino.Logger;

export function createLogger(name: string): Logger {
  const child = rootLogger.child({ name });
  moduleLoggers.add(child);
  return child;
}

/** Change the level of the root logger and every module logger. */
export function setLogLevel(next: string): void {
  rootLogger.level = next;
  for (const child of moduleLoggers) {
    child.level = next;
  }
}

export { rootLogger as logger };
