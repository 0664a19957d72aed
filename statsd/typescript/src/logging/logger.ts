/**
 * Logger implementations for the StatsD client.
 */

import type { Logger, MetricObserver } from '../types';

/**
 * Log levels in order of severity.
 */
export enum LogLevel {
  Debug = 0,
  Info = 1,
  Warn = 2,
  Error = 3,
}

/**
 * Console logger implementation.
 */
export class ConsoleLogger implements Logger {
  private readonly level: LogLevel;
  private readonly context: Record<string, unknown>;
  private readonly format: 'json' | 'pretty';

  constructor(options: {
    level?: LogLevel;
    context?: Record<string, unknown>;
    format?: 'json' | 'pretty';
  } = {}) {
    this.level = options.level ?? LogLevel.Info;
    this.context = options.context ?? {};
    this.format = options.format ?? 'pretty';
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.Debug, message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.Info, message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.Warn, message, context);
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.Error, message, context);
  }

  private log(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    if (level < this.level) return;

    const mergedContext = { ...this.context, ...context };
    const timestamp = new Date().toISOString();
    const levelName = LogLevel[level].toUpperCase();

    if (this.format === 'json') {
      console.log(JSON.stringify({ timestamp, level: levelName, message, ...mergedContext }));
    } else {
      const contextStr = Object.keys(mergedContext).length > 0
        ? ` ${JSON.stringify(mergedContext)}`
        : '';
      console.log(`[${timestamp}] ${levelName}: ${message}${contextStr}`);
    }
  }
}

/**
 * No-op logger, the default when none is injected.
 */
export class NoopLogger implements Logger {
  debug(_message: string, _context?: Record<string, unknown>): void { /* noop */ }
  info(_message: string, _context?: Record<string, unknown>): void { /* noop */ }
  warn(_message: string, _context?: Record<string, unknown>): void { /* noop */ }
  error(_message: string, _context?: Record<string, unknown>): void { /* noop */ }
}

export const noopLogger: Logger = new NoopLogger();

/**
 * No-op metric observer
 */
export const noopObserver: MetricObserver = () => undefined;

/**
 * Metric observer that logs every outgoing line at debug level
 */
export function loggerObserver(logger: Logger): MetricObserver {
  return (line, request) => {
    logger.debug(line, { kind: request.kind, stat: request.stat, rate: request.rate });
  };
}
