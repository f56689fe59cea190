/**
 * Level-based logger for the MCP server.
 * Writes one line per message to stderr (stdout belongs to the stdio transport).
 */

import type { LogLevel } from './config.js';

const LEVEL_ORDER: Record<LogLevel, number> = {
  DEBUG: 0,
  INFO: 1,
  WARN: 2,
  ERROR: 3,
};

/** Keys whose values are replaced before a data object is written. */
const SECRET_KEY_PATTERN = /(api[_-]?key|token|secret|password|private[_-]?key|authorization)/i;

let currentLevel: LogLevel = 'INFO';

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

function shouldLog(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[currentLevel];
}

/** Replace values of secret-looking keys, recursively. */
export function redactSecrets(data: unknown): unknown {
  if (Array.isArray(data)) {
    return data.map((item) => redactSecrets(item));
  }
  if (data !== null && typeof data === 'object') {
    const out: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(data)) {
      out[key] = SECRET_KEY_PATTERN.test(key) ? '[redacted]' : redactSecrets(value);
    }
    return out;
  }
  return data;
}

export function formatMessage(level: LogLevel, msg: string, data?: unknown): string {
  const prefix = `[${new Date().toISOString()}] [${level}]`;
  if (data === undefined) {
    return `${prefix} ${msg}`;
  }
  return `${prefix} ${msg} ${JSON.stringify(redactSecrets(data))}`;
}

function write(level: LogLevel, msg: string, data?: unknown): void {
  if (shouldLog(level)) {
    console.error(formatMessage(level, msg, data));
  }
}

export function debug(msg: string, data?: unknown): void {
  write('DEBUG', msg, data);
}

export function info(msg: string, data?: unknown): void {
  write('INFO', msg, data);
}

export function warn(msg: string, data?: unknown): void {
  write('WARN', msg, data);
}

/** Log an ERROR-level message; an Error contributes its message and stack. */
export function error(msg: string, err?: unknown): void {
  const detail =
    err instanceof Error
      ? { message: err.message, stack: err.stack }
      : err !== undefined
        ? String(err)
        : undefined;
  write('ERROR', msg, detail !== undefined ? { error: detail } : undefined);
}
