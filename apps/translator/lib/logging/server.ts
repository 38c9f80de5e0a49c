import { promises as fs } from 'fs';
import path from 'path';
import { readLoggingEnv } from '../../config/env';

export type LogLevel = 'info' | 'warn' | 'error';

export type LogCategory = 'translation:token' | 'translation:textra' | 'translation:tool';

export interface ServerLogEntry {
  level: LogLevel;
  category: LogCategory;
  message: string;
  details?: unknown;
}

const REDACTED = '[REDACTED]';

const SECRET_KEYS = new Set(['access_token', 'client_secret', 'key', 'apiKey', 'apiSecret', 'token']);

const ensuredDirs = new Map<string, Promise<void>>();

async function ensureLogDirExists(dir: string): Promise<void> {
  let pending = ensuredDirs.get(dir);
  if (!pending) {
    pending = fs.mkdir(dir, { recursive: true }).then(
      () => undefined,
      (error: unknown) => {
        ensuredDirs.delete(dir);
        throw error;
      }
    );
    ensuredDirs.set(dir, pending);
  }
  return pending;
}

function formatDate(date: Date): string {
  const year = date.getUTCFullYear();
  const month = String(date.getUTCMonth() + 1).padStart(2, '0');
  const day = String(date.getUTCDate()).padStart(2, '0');
  return `${year}-${month}-${day}`;
}

export function getLogDirectory(): string {
  return readLoggingEnv().logDir;
}

export function getLogFileName(date: Date = new Date()): string {
  return `server-${formatDate(date)}.log`;
}

export function getLogFilePath(date: Date = new Date()): string {
  return path.join(getLogDirectory(), getLogFileName(date));
}

/**
 * Appends one JSON line to today's log file. Never rejects, so callers may
 * fire and forget with `void`.
 */
export async function logServerEvent(entry: ServerLogEntry): Promise<void> {
  try {
    const dir = getLogDirectory();
    await ensureLogDirExists(dir);
    const now = new Date();
    const details = entry.details === undefined ? null : sanitizeForLog(entry.details);
    const payload = {
      timestamp: now.toISOString(),
      level: entry.level,
      category: entry.category,
      message: entry.message,
      details,
    };
    const line = JSON.stringify(payload) + '\n';
    await fs.appendFile(path.join(dir, getLogFileName(now)), line, 'utf8');
  } catch (error) {
    // eslint-disable-next-line no-console
    console.error('[server-logger] failed to write log entry', error);
  }
}

export function sanitizeForLog(value: unknown, seen: WeakSet<object> = new WeakSet()): unknown {
  if (value === null || typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  if (typeof value === 'bigint') {
    return value.toString();
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (value instanceof Error) {
    return {
      name: value.name || 'Error',
      message: value.message,
      stack: value.stack,
      cause: value.cause ? sanitizeForLog(value.cause, seen) : undefined,
    };
  }
  if (Array.isArray(value)) {
    return value.map((item) => sanitizeForLog(item, seen));
  }
  if (value && typeof value === 'object') {
    if (seen.has(value)) {
      return '[Circular]';
    }
    seen.add(value);
    const entries: Record<string, unknown> = {};
    for (const [key, val] of Object.entries(value)) {
      entries[key] = SECRET_KEYS.has(key) && val ? REDACTED : sanitizeForLog(val, seen);
    }
    return entries;
  }
  if (typeof value === 'undefined') {
    return undefined;
  }
  return String(value);
}
