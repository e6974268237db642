/**
 * Structured Logging with Correlation IDs
 *
 * All logs automatically include correlation and document IDs from AsyncLocalStorage context.
 * LOG_LEVEL selects the threshold (error, warn, info, debug, silent).
 */

import { getCorrelationId, getContext } from './context';

export interface LogContext {
  [key: string]: unknown;
}

type Level = 'ERROR' | 'WARN' | 'INFO' | 'DEBUG';

const LEVEL_RANK: Record<Level, number> = {
  ERROR: 0,
  WARN: 1,
  INFO: 2,
  DEBUG: 3,
};

function threshold(): number {
  const configured = (process.env.LOG_LEVEL || '').toLowerCase();
  switch (configured) {
    case 'silent':
      return -1;
    case 'error':
      return LEVEL_RANK.ERROR;
    case 'warn':
      return LEVEL_RANK.WARN;
    case 'info':
      return LEVEL_RANK.INFO;
    case 'debug':
      return LEVEL_RANK.DEBUG;
    default:
      return process.env.NODE_ENV === 'production' ? LEVEL_RANK.INFO : LEVEL_RANK.DEBUG;
  }
}

function enabled(level: Level): boolean {
  return LEVEL_RANK[level] <= threshold();
}

function formatLog(level: Level, message: string, context?: LogContext): string {
  const correlationId = getCorrelationId();
  const timestamp = new Date().toISOString();
  const reqContext = getContext();

  const logEntry = {
    timestamp,
    level,
    correlationId,
    documentId: reqContext?.documentId,
    page: reqContext?.page,
    message,
    ...context,
  };

  return JSON.stringify(logEntry);
}

function describeError(error: unknown): LogContext['error'] {
  return error instanceof Error
    ? {
        message: error.message,
        stack: error.stack,
        name: error.name,
      }
    : String(error);
}

export const logger = {
  info: (message: string, context?: LogContext) => {
    if (enabled('INFO')) console.log(formatLog('INFO', message, context));
  },

  warn: (message: string, context?: LogContext) => {
    if (enabled('WARN')) console.warn(formatLog('WARN', message, context));
  },

  error: (message: string, error?: Error | unknown, context?: LogContext) => {
    if (!enabled('ERROR')) return;
    console.error(formatLog('ERROR', message, { ...context, error: describeError(error) }));
  },

  debug: (message: string, context?: LogContext) => {
    if (enabled('DEBUG')) console.debug(formatLog('DEBUG', message, context));
  },
};
