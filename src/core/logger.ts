import fs from 'fs';
import { getLogFilePath } from './paths.js';

export enum LogLevel {
  INFO = 'INFO',
  WARN = 'WARN',
  ERROR = 'ERROR',
  DEBUG = 'DEBUG'
}

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  data?: Record<string, unknown>;
}

const STDERR_PREFIX = '[context-reminder]';

/**
 * Format log entry as single line
 */
export function formatLogEntry(entry: LogEntry): string {
  const dataStr = entry.data ? ` ${JSON.stringify(entry.data)}` : '';
  return `[${entry.timestamp}] [${entry.level}] ${entry.message}${dataStr}`;
}

/**
 * Write log entry to file.
 *
 * A hook must never fail because its log is unwritable, so a write failure
 * is reported on stderr instead of thrown.
 */
function writeLog(entry: LogEntry): void {
  try {
    const logPath = getLogFilePath();
    fs.appendFileSync(logPath, formatLogEntry(entry) + '\n', 'utf-8');
  } catch (error) {
    console.error(`${STDERR_PREFIX} Failed to write log: ${error instanceof Error ? error.message : String(error)}`);
  }
}

/**
 * Log info message.
 *
 * NOTE: stdout carries the hook's JSON reply, so info lines go to the file only.
 */
export function logInfo(message: string, data?: Record<string, unknown>): void {
  writeLog({
    timestamp: new Date().toISOString(),
    level: LogLevel.INFO,
    message,
    data
  });
}

/**
 * Log warning message
 */
export function logWarn(message: string, data?: Record<string, unknown>): void {
  writeLog({
    timestamp: new Date().toISOString(),
    level: LogLevel.WARN,
    message,
    data
  });
  console.error(`${STDERR_PREFIX} [WARN] ${message}`);
}

/**
 * Log error message to the file and the error channel
 */
export function logError(message: string, error?: unknown, data?: Record<string, unknown>): void {
  const errorData = error instanceof Error ? {
    name: error.name,
    message: error.message,
    stack: error.stack
  } : error;

  writeLog({
    timestamp: new Date().toISOString(),
    level: LogLevel.ERROR,
    message,
    data: data ? { ...data, error: errorData } : { error: errorData }
  });
  const detail = error instanceof Error ? `: ${error.message}` : '';
  console.error(`${STDERR_PREFIX} [ERROR] ${message}${detail}`);
}

/**
 * Log debug message (only when CONTEXT_REMINDER_DEBUG is set)
 */
export function logDebug(message: string, data?: Record<string, unknown>): void {
  if (process.env.CONTEXT_REMINDER_DEBUG !== 'true') {
    return;
  }

  writeLog({
    timestamp: new Date().toISOString(),
    level: LogLevel.DEBUG,
    message,
    data
  });
}
