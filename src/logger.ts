import { types } from 'node:util';

/**
 * Structured, level-based logging with context.
 *
 * Every component receives a Logger through its constructor; the CLI decides
 * the minimum level and tests swap the handler with setLogHandler().
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  level: LogLevel;
  message: string;
  context?: Record<string, unknown>;
  timestamp: string;
}

export type LogHandler = (entry: LogEntry) => void;

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3
};

// bigint ids and Error values do not survive JSON.stringify as-is
function replacer(_key: string, value: unknown): unknown {
  if (typeof value === 'bigint') return value.toString();
  if (value instanceof Error || types.isNativeError(value)) return value.message;
  return value;
}

/** Default handler: one JSON line per entry on stderr, leaving stdout to the CLI. */
const defaultLogHandler: LogHandler = (entry) => {
  const output = {
    level: entry.level,
    ts: entry.timestamp,
    msg: entry.message,
    ...entry.context
  };
  console.error(JSON.stringify(output, replacer));
};

let currentHandler: LogHandler = defaultLogHandler;
let currentMinLevel: LogLevel = 'info';

export function setLogHandler(handler: LogHandler): void {
  currentHandler = handler;
}

export function resetLogHandler(): void {
  currentHandler = defaultLogHandler;
}

export function setLogLevel(level: LogLevel): void {
  currentMinLevel = level;
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_ORDER, value);
}

function log(level: LogLevel, message: string, context?: Record<string, unknown>): void {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[currentMinLevel]) return;
  currentHandler({
    level,
    message,
    context,
    timestamp: new Date().toISOString()
  });
}

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
  child(context: Record<string, unknown>): Logger;
}

export function createLogger(baseContext: Record<string, unknown> = {}): Logger {
  return {
    debug: (msg, ctx) => log('debug', msg, { ...baseContext, ...ctx }),
    info: (msg, ctx) => log('info', msg, { ...baseContext, ...ctx }),
    warn: (msg, ctx) => log('warn', msg, { ...baseContext, ...ctx }),
    error: (msg, ctx) => log('error', msg, { ...baseContext, ...ctx }),
    child: (childCtx) => createLogger({ ...baseContext, ...childCtx })
  };
}
