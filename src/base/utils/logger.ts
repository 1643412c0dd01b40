/**
 * Structured logging module for plugdoc
 * Provides consistent logging across all components
 */

import { getDebugConfig } from './debug.js';

export enum LogLevel {
  ERROR = 'error',
  WARN = 'warn',
  INFO = 'info',
  DEBUG = 'debug',
}

export interface LogContext {
  [key: string]: unknown;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  [LogLevel.ERROR]: 0,
  [LogLevel.WARN]: 1,
  [LogLevel.INFO]: 2,
  [LogLevel.DEBUG]: 3,
};

/**
 * Minimum level from PLUGDOC_LOG_LEVEL (read on every call so tests can change it)
 */
export function getMinimumLogLevel(): LogLevel {
  switch (process.env.PLUGDOC_LOG_LEVEL?.toLowerCase()) {
    case 'error':
      return LogLevel.ERROR;
    case 'warn':
      return LogLevel.WARN;
    case 'debug':
      return LogLevel.DEBUG;
    default:
      return LogLevel.INFO;
  }
}

/**
 * Format context object for readable output
 */
export function formatContext(context: LogContext): string {
  const entries = Object.entries(context);
  if (entries.length === 0) {
    return '';
  }

  const formatted = entries
    .map(([key, value]) => {
      if (typeof value === 'string') {
        return `${key}="${value}"`;
      }
      if (value === undefined || value === null) {
        return `${key}=${value}`;
      }
      if (typeof value === 'object') {
        return `${key}=${JSON.stringify(value)}`;
      }
      return `${key}=${String(value)}`;
    })
    .join(' ');

  return ` [${formatted}]`;
}

/**
 * Log a message with structured context
 *
 * @param component - Component name (e.g., 'Parser', 'Registry', 'Discovery')
 */
export function log(
  level: LogLevel,
  component: string,
  message: string,
  context?: LogContext
): void {
  // Debug lines pass when any PLUGDOC_DEBUG* switch is on, whatever the minimum level says
  if (level === LogLevel.DEBUG) {
    const debug = getDebugConfig();
    if (!debug.enabled && !Object.values(debug.components).some((value) => value >= 1)) return;
  } else if (LEVEL_RANK[level] > LEVEL_RANK[getMinimumLogLevel()]) {
    return;
  }

  const timestamp = new Date().toISOString();
  const contextStr = context ? formatContext(context) : '';
  const formatted = `[${timestamp}] ${component}:${level} - ${message}${contextStr}`;

  switch (level) {
    case LogLevel.ERROR:
      console.error(formatted);
      break;
    case LogLevel.WARN:
      console.warn(formatted);
      break;
    case LogLevel.DEBUG:
      console.error(formatted);
      break;
    case LogLevel.INFO:
    default:
      console.log(formatted);
      break;
  }
}

/**
 * Convenience functions for each log level
 */
export const logger = {
  error: (component: string, message: string, context?: LogContext) =>
    log(LogLevel.ERROR, component, message, context),

  warn: (component: string, message: string, context?: LogContext) =>
    log(LogLevel.WARN, component, message, context),

  info: (component: string, message: string, context?: LogContext) =>
    log(LogLevel.INFO, component, message, context),

  debug: (component: string, message: string, context?: LogContext) =>
    log(LogLevel.DEBUG, component, message, context),
};
