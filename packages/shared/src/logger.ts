/**
 * Structured Logging with Correlation IDs
 *
 * JSON lines on stdout/stderr. Run ID, registry key and document ID are
 * taken from the AsyncLocalStorage context when one is active.
 */

import { getCorrelationId, getContext } from './context';

export interface LogContext {
  [key: string]: unknown;
}

function formatLog(level: string, message: string, context?: LogContext): string {
  const reqContext = getContext();

  const logEntry = {
    timestamp: new Date().toISOString(),
    level,
    correlationId: getCorrelationId(),
    runId: reqContext?.runId,
    registryKey: reqContext?.registryKey,
    documentId: reqContext?.documentId,
    message,
    ...context,
  };

  return JSON.stringify(logEntry);
}

function describeError(error: unknown): unknown {
  if (error instanceof Error) {
    const described: Record<string, unknown> = {
      message: error.message,
      name: error.name,
      stack: error.stack,
    };
    if ('code' in error && typeof error.code === 'string') {
      described.code = error.code;
    }
    return described;
  }
  return String(error);
}

export const logger = {
  info: (message: string, context?: LogContext) => {
    console.log(formatLog('INFO', message, context));
  },

  warn: (message: string, context?: LogContext) => {
    console.warn(formatLog('WARN', message, context));
  },

  error: (message: string, error?: unknown, context?: LogContext) => {
    console.error(formatLog('ERROR', message, { ...context, error: describeError(error) }));
  },

  debug: (message: string, context?: LogContext) => {
    if (process.env.LOG_LEVEL === 'debug' || process.env.NODE_ENV !== 'production') {
      console.debug(formatLog('DEBUG', message, context));
    }
  },
};
