// src/services/logger.ts: structured logging for the fan-out pipeline
import { appendFileSync, mkdirSync } from 'fs';
import path from 'path';
import { Logger, type ILogObj } from 'tslog';

const LEVELS: Record<string, number> = {
  silly: 0,
  trace: 1,
  debug: 2,
  info: 3,
  warn: 4,
  error: 5,
  fatal: 6,
};

export function levelFromName(name: string | undefined): number {
  return LEVELS[(name ?? 'info').toLowerCase()] ?? LEVELS.info;
}

export const logger = new Logger<ILogObj>({
  name: 'query-fanout',
  minLevel: levelFromName(process.env.LOG_LEVEL),
  prettyLogTemplate: '{{yyyy}}-{{mm}}-{{dd}} {{hh}}:{{MM}}:{{ss}} {{logLevelName}} [{{name}}] ',
  type: 'pretty',
});

/**
 * Mirrors every log record into `<logDir>/query-fan-out-run-<runStamp>.log`
 * as one JSON object per line. Returns the file path.
 */
export function attachRunLogFile(logDir: string, runStamp: string): string {
  mkdirSync(logDir, { recursive: true });
  const file = path.join(logDir, `query-fan-out-run-${runStamp}.log`);
  logger.attachTransport((logObj) => {
    appendFileSync(file, `${JSON.stringify(logObj)}\n`, 'utf-8');
  });
  return file;
}
