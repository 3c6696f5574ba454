/**
 * Structured Logging
 *
 * One JSON object per line. Every entry carries the correlation ID and, once
 * the pipeline has seen it, the document filename. Output is passed through
 * redactSecrets before it reaches the console.
 */

import { getCorrelationId, getContext } from './context';
import { redactSecrets } from './redact';

export interface LogContext {
  [key: string]: unknown;
}

const LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;

type LogLevel = (typeof LEVELS)[number];

function isLogLevel(value: string): value is LogLevel {
  return LEVELS.some((level) => level === value);
}

// Read per call so tests and the service can change LOG_LEVEL at run time
function threshold(): LogLevel {
  const configured = (process.env.LOG_LEVEL || '').toLowerCase();
  if (isLogLevel(configured)) {
    return configured;
  }
  return process.env.NODE_ENV === 'production' ? 'info' : 'debug';
}

function enabled(level: Exclude<LogLevel, 'silent'>): boolean {
  return LEVELS.indexOf(level) >= LEVELS.indexOf(threshold());
}

function formatLog(level: string, message: string, context?: LogContext): string {
  const logEntry = {
    timestamp: new Date().toISOString(),
    level,
    correlationId: getCorrelationId(),
    filename: getContext()?.filename,
    message,
    ...context,
  };

  return redactSecrets(JSON.stringify(logEntry));
}

function serializeError(error: unknown): LogContext | string {
  if (error instanceof Error) {
    return { name: error.name, message: error.message, stack: error.stack };
  }
  return String(error);
}

export const logger = {
  debug: (message: string, context?: LogContext) => {
    if (enabled('debug')) console.debug(formatLog('DEBUG', message, context));
  },

  info: (message: string, context?: LogContext) => {
    if (enabled('info')) console.log(formatLog('INFO', message, context));
  },

  warn: (message: string, context?: LogContext) => {
    if (enabled('warn')) console.warn(formatLog('WARN', message, context));
  },

  error: (message: string, error?: unknown, context?: LogContext) => {
    if (!enabled('error')) return;
    console.error(formatLog('ERROR', message, { ...context, error: serializeError(error) }));
  },
};
