/**
 * Structured JSON Logger
 *
 * One JSON object per line with a consistent envelope:
 * - timestamp: ISO 8601 format
 * - level: debug | info | warn | error
 * - event: dotted event name for filtering
 * - traceId: optional per-invocation correlation id
 *
 * Every level is written to stderr. stdout belongs to the JSON-RPC stream
 * when the server runs over stdio, so nothing else may write there.
 */

import type { ClassifiedError } from './errors.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  event: string;
  traceId?: string;
  durationMs?: number;
  [key: string]: unknown;
}

/**
 * Extended log entry for ClassifiedError logging.
 */
export interface ClassifiedErrorLogEntry extends Omit<LogEntry, 'timestamp' | 'level'> {
  errorKind: string;
  errorMessage: string;
  retryable: boolean;
  httpStatus?: number;
  errorCode?: string;
  /** Number of attempts recorded before the error surfaced */
  attempts?: number;
  stack?: string;
}

type LogData = Omit<LogEntry, 'timestamp' | 'level'>;

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_ORDER;
}

function currentThreshold(): number {
  const raw = (process.env.LOG_LEVEL ?? 'info').toLowerCase();
  return LEVEL_ORDER[isLogLevel(raw) ? raw : 'info'];
}

function formatLog(level: LogLevel, data: LogData): string {
  return JSON.stringify({
    timestamp: new Date().toISOString(),
    level,
    ...data,
  });
}

function write(level: LogLevel, data: LogData): void {
  if (LEVEL_ORDER[level] < currentThreshold()) return;
  process.stderr.write(`${formatLog(level, data)}\n`);
}

export const logger = {
  debug: (data: LogData): void => {
    write('debug', data);
  },
  info: (data: LogData): void => {
    write('info', data);
  },
  warn: (data: LogData): void => {
    write('warn', data);
  },
  error: (data: LogData): void => {
    write('error', data);
  },

  /**
   * Log a ClassifiedError with its classification and cause stack.
   *
   * Retryable kinds that were exhausted log at `error`, terminal client-side
   * kinds (bad request, not found, cancelled) at `warn`.
   */
  classifiedError: (error: ClassifiedError, context: LogData): void => {
    const entry: ClassifiedErrorLogEntry = {
      ...context,
      errorKind: error.kind,
      errorMessage: error.message,
      retryable: error.retryable,
      httpStatus: error.httpStatus,
      errorCode: error.errorCode,
      attempts: error.history?.length,
      stack: error.cause instanceof Error ? error.cause.stack : undefined,
    };
    const level: LogLevel =
      error.kind === 'BadRequestError' ||
      error.kind === 'NotFoundError' ||
      error.kind === 'Cancelled' ||
      error.kind === 'StaleCursor'
        ? 'warn'
        : 'error';
    write(level, entry);
  },
};
