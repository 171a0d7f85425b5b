/**
 * Logger writing to stderr so that stdout stays reserved for extracted JSON.
 *
 * All output is passed through redactForLogging, since logged records can
 * contain signed image URLs.
 */

import { redactForLogging } from './security.js';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && LOG_LEVELS.some((level) => level === value);
}

const envLevel = process.env.LOG_LEVEL;
let currentLevel: LogLevel = isLogLevel(envLevel) ? envLevel : 'info';

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[currentLevel];
}

/** One stderr line: timestamp, level, then the redacted message and arguments */
export function formatMessage(level: LogLevel, message: string, ...args: unknown[]): string {
  const parts = [message, ...args].map((part) => redactForLogging(part, 2));
  return `[${new Date().toISOString()}] [${level.toUpperCase()}] ${parts.join(' ')}`;
}

function write(level: LogLevel, message: string, args: unknown[]): void {
  if (shouldLog(level)) {
    console.error(formatMessage(level, message, ...args));
  }
}

export const logger = {
  debug(message: string, ...args: unknown[]): void {
    write('debug', message, args);
  },

  info(message: string, ...args: unknown[]): void {
    write('info', message, args);
  },

  warn(message: string, ...args: unknown[]): void {
    write('warn', message, args);
  },

  error(message: string, ...args: unknown[]): void {
    write('error', message, args);
  },
};
