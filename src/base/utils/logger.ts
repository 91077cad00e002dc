/**
 * Structured logging module
 *
 * Every level writes to stderr: stdout is reserved for the expanded document.
 */

import { isDebugEnabled, type DebugComponent } from './debug.js';

export enum LogLevel {
  ERROR = 'error',
  WARN = 'warn',
  INFO = 'info',
  DEBUG = 'debug',
}

export interface LogContext {
  [key: string]: unknown;
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
 * @param component - Component name (e.g., 'Expander', 'Config', 'CLI')
 */
export function log(
  level: LogLevel,
  component: string,
  message: string,
  context?: LogContext
): void {
  if (level === LogLevel.DEBUG && !isDebugEnabled(toDebugComponent(component))) {
    return;
  }

  const timestamp = new Date().toISOString();
  const contextStr = context ? formatContext(context) : '';
  const formatted = `[${timestamp}] ${component}:${level} - ${message}${contextStr}`;

  switch (level) {
    case LogLevel.WARN:
      console.warn(formatted);
      break;
    case LogLevel.ERROR:
    case LogLevel.INFO:
    case LogLevel.DEBUG:
    default:
      console.error(formatted);
      break;
  }
}

function toDebugComponent(component: string): DebugComponent {
  switch (component.toLowerCase()) {
    case 'config':
      return 'config';
    case 'cli':
      return 'cli';
    default:
      return 'expander';
  }
}

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
