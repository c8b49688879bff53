/**
 * Component logger backed by an in-memory ring buffer.
 * Entries are kept for inspection (CLI summary, tests); console output is gated by the
 * configured level (setLogLevel) or LOG_LEVEL.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'success';

export interface LogEntry {
  id: string;
  ts: number;
  component: string;
  level: LogLevel;
  message: string;
  detail?: unknown;
}

export interface Logger {
  debug(message: string, detail?: unknown): void;
  info(message: string, detail?: unknown): void;
  warn(message: string, detail?: unknown): void;
  error(message: string, detail?: unknown): void;
  success(message: string, detail?: unknown): void;
}

const MAX_LOGS = 500;
const logs: LogEntry[] = [];
let nextId = 1;

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  success: 20,
  warn: 30,
  error: 40,
};

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

let configuredLevel: LogLevel | null = null;

/** Set the console threshold from loaded configuration; `null` falls back to LOG_LEVEL. */
export function setLogLevel(level: LogLevel | null): void {
  configuredLevel = level;
}

function threshold(): number {
  if (configuredLevel) return LEVEL_ORDER[configuredLevel];
  const configured = process.env.LOG_LEVEL?.toLowerCase();
  return configured && isLogLevel(configured) ? LEVEL_ORDER[configured] : LEVEL_ORDER.info;
}

function write(component: string, level: LogLevel, message: string, detail?: unknown): LogEntry {
  const entry: LogEntry = {
    id: `log-${nextId++}`,
    ts: Date.now(),
    component,
    level,
    message,
    detail,
  };
  logs.push(entry);
  if (logs.length > MAX_LOGS) logs.shift();

  if (level === 'error' || LEVEL_ORDER[level] >= threshold()) {
    const line = `[${component}] [${level.toUpperCase()}] ${message}`;
    const sink = level === 'error' ? console.error : level === 'warn' ? console.warn : console.log;
    if (detail === undefined) sink(line);
    else sink(line, detail);
  }
  return entry;
}

export function createLogger(component: string): Logger {
  return {
    debug: (message, detail) => void write(component, 'debug', message, detail),
    info: (message, detail) => void write(component, 'info', message, detail),
    warn: (message, detail) => void write(component, 'warn', message, detail),
    error: (message, detail) => void write(component, 'error', message, detail),
    success: (message, detail) => void write(component, 'success', message, detail),
  };
}

export function getLogs(afterId?: string): LogEntry[] {
  if (!afterId) return [...logs];
  const idx = logs.findIndex((l) => l.id === afterId);
  if (idx < 0) return [...logs];
  return logs.slice(idx + 1);
}

export function clearLogs(): void {
  logs.length = 0;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
