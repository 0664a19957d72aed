/**
 * Logging module exports
 */

export {
  LogLevel,
  ConsoleLogger,
  NoopLogger,
  noopLogger,
  noopObserver,
  loggerObserver,
} from './logger';
