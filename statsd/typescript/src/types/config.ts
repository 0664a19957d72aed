/**
 * Configuration types for the StatsD client.
 *
 * Defines configuration structure, flush policy, and logger interface.
 */

/**
 * Logger interface for client logging
 */
export interface Logger {
  /** Log debug message */
  debug(message: string, context?: Record<string, unknown>): void;
  /** Log info message */
  info(message: string, context?: Record<string, unknown>): void;
  /** Log warning message */
  warn(message: string, context?: Record<string, unknown>): void;
  /** Log error message */
  error(message: string, context?: Record<string, unknown>): void;
}

/**
 * What to do when the flush forced by a full buffer fails.
 *
 * - `swallow`: drop the unsent bytes, log a warning, keep buffering
 * - `propagate`: reject the send that forced the flush
 */
export type OverflowFlushPolicy = 'swallow' | 'propagate';

/**
 * Configuration for a StatsD client dialed over UDP
 */
export interface StatsDConfig {
  /** Collector host (defaults to 'localhost') */
  host: string;
  /** Collector port (defaults to 8125) */
  port: number;
  /** Literal prefix for every stat; no delimiter is added */
  prefix: string;
  /** Maximum packet size in bytes (defaults to 512) */
  packetSize: number;
  /** Connection setup timeout in ms, including name resolution; 0 means none */
  connectTimeoutMs?: number;
  /** Handling of failed overflow flushes (defaults to 'swallow') */
  overflowFlushPolicy: OverflowFlushPolicy;
}
