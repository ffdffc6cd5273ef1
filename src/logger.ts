import { Logger } from 'tslog';
import type { ILogObj } from 'tslog';

// Configuration
const LOG_LEVEL = process.env.LOG_LEVEL || 'info';
const LOG_FORMAT = process.env.LOG_FORMAT === 'json' ? 'json' : 'pretty';

export const LOG_LEVELS = ['silly', 'trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export function normalizeLogLevel(level: string | undefined, fallback: LogLevel = 'info'): LogLevel {
  const candidate = (level ?? '').trim().toLowerCase();
  const match = LOG_LEVELS.find((known) => known === candidate);
  return match ?? fallback;
}

/**
 * Map a level name to tslog's numeric minLevel (silly=0 ... fatal=6).
 */
export function levelToMinLevel(level: LogLevel): number {
  const map: Record<LogLevel, number> = {
    silly: 0,
    trace: 1,
    debug: 2,
    info: 3,
    warn: 4,
    error: 5,
    fatal: 6,
    silent: Number.POSITIVE_INFINITY,
  };
  return map[level];
}

const level = normalizeLogLevel(LOG_LEVEL);

const rootLogger = new Logger<ILogObj>({
  name: 'datalogger',
  minLevel: levelToMinLevel(level),
  type: level === 'silent' ? 'hidden' : LOG_FORMAT,
});

export type DataloggerLogger = Logger<ILogObj>;

/**
 * Sub-logger for one part of the pipeline (`parse`, `ingest`, `export`, ...).
 */
export function getLogger(subsystem: string): DataloggerLogger {
  return rootLogger.getSubLogger({ name: subsystem });
}
