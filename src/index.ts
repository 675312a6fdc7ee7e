/**
 * Test event pipeline: identifiers, lifecycle events, listeners and trace
 * assertions for test execution engines.
 */

export * from './domain';
export * from './engine';
export * from './config';
export * from './listeners';
export * from './testkit';
export {
  logger,
  createLogger,
  sessionLogger,
  listenerLogger,
  setLogHandler,
  resetLogHandler,
  setLogLevel,
  LogLevel,
} from './logger';
export type { Logger, LogContext, LogEntry, LogHandler } from './logger';
