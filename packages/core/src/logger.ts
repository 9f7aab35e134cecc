/**
 * Console logger with level filtering, secret masking and a ring buffer.
 *
 * Records can be tagged with a bot name through createLogger(); every record
 * is also pushed to logEmitter so other parts of the process can follow it.
 */
import { EventEmitter } from 'node:events';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  level: LogLevel;
  bot: string;
  message: string;
  data?: unknown;
  timestamp: string;
}

export interface Logger {
  debug(data: unknown, msg?: string): void;
  info(data: unknown, msg?: string): void;
  warn(data: unknown, msg?: string): void;
  error(data: unknown, msg?: string): void;
}

const levels: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function isLogLevel(value: string): value is LogLevel {
  return value in levels;
}

let currentLevel: LogLevel = (() => {
  const fromEnv = (process.env.LOG_LEVEL || 'info').toLowerCase();
  return isLogLevel(fromEnv) ? fromEnv : 'info';
})();

export function setLogLevel(level: string): void {
  const normalized = level.toLowerCase();
  if (isLogLevel(normalized)) {
    currentLevel = normalized;
  }
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

function shouldLog(level: LogLevel): boolean {
  return levels[level] >= levels[currentLevel];
}

const SENSITIVE_KEYS = /key|token|secret|password|credential|auth/i;

export function maskSensitiveData(obj: unknown): unknown {
  if (typeof obj !== 'object' || obj === null) return obj;
  if (obj instanceof Error) return { name: obj.name, message: obj.message };
  if (Array.isArray(obj)) return obj.map(maskSensitiveData);
  const masked: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(obj)) {
    if (SENSITIVE_KEYS.test(k) && typeof v === 'string') {
      masked[k] = '[REDACTED]';
    } else {
      masked[k] = maskSensitiveData(v);
    }
  }
  return masked;
}

function formatData(data: unknown): string {
  if (typeof data === 'string') return data;
  if (typeof data === 'object') return JSON.stringify(maskSensitiveData(data));
  return String(data);
}

// ============================================================================
// Buffer & emitter
// ============================================================================

const LOG_BUFFER_SIZE = 500;
const logBuffer: LogEntry[] = [];

export const logEmitter = new EventEmitter();

export function getLogBuffer(): ReadonlyArray<LogEntry> {
  return [...logBuffer];
}

export function clearLogBuffer(): void {
  logBuffer.length = 0;
}

// ============================================================================
// Writers
// ============================================================================

const SYSTEM_TAG = 'SYSTEM';

function write(level: LogLevel, bot: string, data: unknown, msg?: string): void {
  if (!shouldLog(level)) return;

  const entry: LogEntry = {
    level,
    bot,
    message: msg ?? (typeof data === 'string' ? data : ''),
    data: typeof data === 'string' ? undefined : maskSensitiveData(data),
    timestamp: new Date().toISOString(),
  };
  if (logBuffer.length >= LOG_BUFFER_SIZE) {
    logBuffer.shift();
  }
  logBuffer.push(entry);
  logEmitter.emit('log', entry);

  const line = `${entry.timestamp} [${level.toUpperCase()}] ${bot} | ${msg || ''} ${formatData(data)}`;
  if (level === 'error') {
    console.error(line);
  } else if (level === 'warn') {
    console.warn(line);
  } else {
    console.log(line);
  }
}

/**
 * Logger bound to a bot name. Console output is shared; the tag lets the
 * buffer and subscribers tell bots apart.
 */
export function createLogger(bot: string = SYSTEM_TAG): Logger {
  return {
    debug: (data, msg) => write('debug', bot, data, msg),
    info: (data, msg) => write('info', bot, data, msg),
    warn: (data, msg) => write('warn', bot, data, msg),
    error: (data, msg) => write('error', bot, data, msg),
  };
}

export const logger: Logger = createLogger();
