/**
 * Structured logging for the sync engine.
 *
 * Every entry is a level, a message and a flat context of fields such as
 * serviceId, accountId, decisionId or code. Context keys that name a
 * credential are masked before the entry reaches the sink, so an account
 * token handed to a logger by mistake is never written in full.
 */

import { maskSecret } from './domain/errors';

export enum LogLevel {
  Debug = 'debug',
  Info = 'info',
  Warn = 'warn',
  Error = 'error',
}

export type LogContext = Record<string, unknown>;

export interface LogEntry {
  level: LogLevel;
  message: string;
  context?: LogContext;
  timestamp: string;
}

export type LogHandler = (entry: LogEntry) => void;

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  child(context: LogContext): Logger;
}

/** Lowest first; a level is emitted when its index reaches the threshold's. */
const LEVEL_ORDER: readonly LogLevel[] = [LogLevel.Debug, LogLevel.Info, LogLevel.Warn, LogLevel.Error];

const CREDENTIAL_KEY = /token|secret|password|authorization/i;

/** Parse a level name such as "debug" or "WARN". */
export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  if (!value) return undefined;
  const wanted = value.trim().toLowerCase();
  return LEVEL_ORDER.find((level) => level === wanted);
}

/** Mask string values stored under credential-like keys. */
export function redactContext(context: LogContext): LogContext {
  const out: LogContext = {};
  for (const [key, value] of Object.entries(context)) {
    out[key] = typeof value === 'string' && CREDENTIAL_KEY.test(key) ? maskSecret(value) : value;
  }
  return out;
}

function writeJsonLine(entry: LogEntry): void {
  const line = JSON.stringify({ ts: entry.timestamp, level: entry.level, msg: entry.message, ...entry.context });
  switch (entry.level) {
    case LogLevel.Error:
      console.error(line);
      return;
    case LogLevel.Warn:
      console.warn(line);
      return;
    default:
      console.log(line);
  }
}

let sink: LogHandler = writeJsonLine;
let threshold = LEVEL_ORDER.indexOf(parseLogLevel(process.env.LOG_LEVEL) ?? LogLevel.Info);

/** Route entries somewhere other than stdout/stderr (tests, log shippers). */
export function setLogHandler(handler: LogHandler): void {
  sink = handler;
}

export function resetLogHandler(): void {
  sink = writeJsonLine;
}

/** Entries below this level are dropped before redaction. */
export function setLogLevel(level: LogLevel): void {
  threshold = LEVEL_ORDER.indexOf(level);
}

class ContextLogger implements Logger {
  constructor(private readonly bound: LogContext) {}

  debug(message: string, context?: LogContext): void {
    this.write(LogLevel.Debug, message, context);
  }

  info(message: string, context?: LogContext): void {
    this.write(LogLevel.Info, message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.write(LogLevel.Warn, message, context);
  }

  error(message: string, context?: LogContext): void {
    this.write(LogLevel.Error, message, context);
  }

  child(context: LogContext): Logger {
    return new ContextLogger({ ...this.bound, ...context });
  }

  private write(level: LogLevel, message: string, context?: LogContext): void {
    if (LEVEL_ORDER.indexOf(level) < threshold) return;
    sink({
      level,
      message,
      context: redactContext({ ...this.bound, ...context }),
      timestamp: new Date().toISOString(),
    });
  }
}

export function createLogger(baseContext: LogContext = {}): Logger {
  return new ContextLogger(baseContext);
}

/** Process-wide root; modules derive children carrying their own fields. */
export const logger = createLogger({ component: 'edge-sync' });
