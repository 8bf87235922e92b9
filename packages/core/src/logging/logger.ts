/**
 * Scoped console logging with a bounded in-memory history.
 * Every entry is kept in history; the console only gets entries at or above the current level.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  timestamp: number;
  level: LogLevel;
  scope: string;
  message: string;
}

export interface Logger {
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

const MAX_ENTRIES = 200;
const LEVEL_ORDER: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

const buffer: LogEntry[] = [];
const listeners: Array<(entry: LogEntry) => void> = [];
let minLevel: LogLevel = levelFromEnv(process.env['TASKBELL_LOG_LEVEL']) ?? 'info';

function levelFromEnv(value: string | undefined): LogLevel | null {
  if (value === 'debug' || value === 'info' || value === 'warn' || value === 'error') return value;
  return null;
}

function formatArg(arg: unknown): string {
  if (typeof arg === 'string') return arg;
  if (arg instanceof Error) return arg.message;
  try {
    return JSON.stringify(arg) ?? String(arg);
  } catch {
    // circular or bigint
    return String(arg);
  }
}

function push(level: LogLevel, scope: string, args: unknown[]): void {
  const message = args.map(formatArg).join(' ');
  const entry: LogEntry = { timestamp: Date.now(), level, scope, message };
  buffer.push(entry);
  if (buffer.length > MAX_ENTRIES) buffer.shift();
  for (const cb of listeners) cb(entry);

  if (LEVEL_ORDER[level] < LEVEL_ORDER[minLevel]) return;
  const prefix = `[${scope}]:`;
  switch (level) {
    case 'debug':
    case 'info':
      console.log(prefix, ...args);
      break;
    case 'warn':
      console.warn(prefix, ...args);
      break;
    case 'error':
      console.error(prefix, ...args);
      break;
  }
}

export function createLogger(scope: string): Logger {
  return {
    debug: (...args) => push('debug', scope, args),
    info: (...args) => push('info', scope, args),
    warn: (...args) => push('warn', scope, args),
    error: (...args) => push('error', scope, args),
  };
}

export function setLogLevel(level: LogLevel): void {
  minLevel = level;
}

export function getLogLevel(): LogLevel {
  return minLevel;
}

export function getLogHistory(): LogEntry[] {
  return [...buffer];
}

export function clearLogs(): void {
  buffer.length = 0;
}

export function onLog(callback: (entry: LogEntry) => void): () => void {
  listeners.push(callback);
  return () => {
    const idx = listeners.indexOf(callback);
    if (idx >= 0) listeners.splice(idx, 1);
  };
}
