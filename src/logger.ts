/**
 * Reporting logger.
 *
 * Structured, level-based logging for the event pipeline. The bus logs
 * through a session-scoped logger and listeners through listener-scoped
 * ones, so every entry says which session or listener produced it.
 * Embedding test runners redirect or silence output with setLogHandler() /
 * setLogLevel(); nothing below `warn` is emitted by default.
 */

export enum LogLevel {
  Debug = 'debug',
  Info = 'info',
  Warn = 'warn',
  Error = 'error',
}

/** Context fields the pipeline binds; anything else is free-form. */
export interface LogContext {
  component?: string;
  sessionId?: string;
  listener?: string;
  uniqueId?: string;
  [key: string]: unknown;
}

export interface LogEntry {
  level: LogLevel;
  message: string;
  context: LogContext;
  timestamp: string;
}

export type LogHandler = (entry: LogEntry) => void;

const LEVEL_RANK: Record<LogLevel, number> = {
  [LogLevel.Debug]: 0,
  [LogLevel.Info]: 1,
  [LogLevel.Warn]: 2,
  [LogLevel.Error]: 3,
};

/** One JSON object per line; errors and warnings go to stderr. */
const consoleHandler: LogHandler = ({ level, message, context, timestamp }) => {
  const line = JSON.stringify({ level, ts: timestamp, msg: message, ...context });
  if (level === LogLevel.Error || level === LogLevel.Warn) {
    console.error(line);
  } else {
    console.log(line);
  }
};

let handler: LogHandler = consoleHandler;
let minLevel: LogLevel = LogLevel.Warn;

/** Replace the log handler (e.g., to capture entries in a test). */
export function setLogHandler(next: LogHandler): void {
  handler = next;
}

/** Restore the JSON console handler. */
export function resetLogHandler(): void {
  handler = consoleHandler;
}

/** Messages below this level are dropped. */
export function setLogLevel(level: LogLevel): void {
  minLevel = level;
}

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  child(context: LogContext): Logger;
}

/** Create a logger whose entries always carry `bound`. */
export function createLogger(bound: LogContext = {}): Logger {
  const emit = (level: LogLevel, message: string, context?: LogContext): void => {
    if (LEVEL_RANK[level] < LEVEL_RANK[minLevel]) return;
    handler({ level, message, context: { ...bound, ...context }, timestamp: new Date().toISOString() });
  };
  return {
    debug: (message, context) => emit(LogLevel.Debug, message, context),
    info: (message, context) => emit(LogLevel.Info, message, context),
    warn: (message, context) => emit(LogLevel.Warn, message, context),
    error: (message, context) => emit(LogLevel.Error, message, context),
    child: (context) => createLogger({ ...bound, ...context }),
  };
}

/** Root logger instance. */
export const logger = createLogger({ component: 'test-events' });

/** Logger for one execution session. */
export function sessionLogger(sessionId: string): Logger {
  return logger.child({ sessionId });
}

/** Logger for one listener, optionally inside a session. */
export function listenerLogger(listener: string, sessionId?: string): Logger {
  return sessionId === undefined ? logger.child({ listener }) : sessionLogger(sessionId).child({ listener });
}
