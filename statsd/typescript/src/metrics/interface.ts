/**
 * MetricsClient interface
 */

import type { Elapsed, MetricRequest } from '../types';
import type { Timer } from './timer';

/**
 * MetricsClient interface for emitting StatsD metrics.
 *
 * Every method resolves once the line is buffered (or sampled away) and
 * rejects with the sink's error when a flush it triggered failed.
 * `rate` defaults to 1 wherever it is optional.
 */
export interface MetricsClient {
  /**
   * Sample, format and buffer one metric event
   */
  send(request: MetricRequest): Promise<void>;

  /**
   * Increment a counter by `count`
   */
  increment(stat: string, count: number, rate?: number): Promise<void>;

  /**
   * Increment a counter by 1
   */
  incr(stat: string): Promise<void>;

  /**
   * Increment a counter by `n`
   */
  incrBy(stat: string, n: number): Promise<void>;

  /**
   * Decrement a counter by `count`
   */
  decrement(stat: string, count: number, rate?: number): Promise<void>;

  /**
   * Decrement a counter by 1
   */
  decr(stat: string): Promise<void>;

  /**
   * Decrement a counter by `n`
   */
  decrBy(stat: string, n: number): Promise<void>;

  /**
   * Set a gauge to an absolute value
   */
  gauge(stat: string, value: number, rate?: number): Promise<void>;

  /**
   * Raise a gauge by `value`
   */
  incrementGauge(stat: string, value: number, rate?: number): Promise<void>;

  /**
   * Raise a gauge by `value` at full rate
   */
  incrementGaugeBy(stat: string, value: number): Promise<void>;

  /**
   * Lower a gauge by `value`
   */
  decrementGauge(stat: string, value: number, rate?: number): Promise<void>;

  /**
   * Lower a gauge by `value` at full rate
   */
  decrementGaugeBy(stat: string, value: number): Promise<void>;

  /**
   * Record a timing value in milliseconds
   */
  timing(stat: string, milliseconds: number, rate?: number): Promise<void>;

  /**
   * Record a histogram value. Sent with the timing wire type.
   */
  histogram(stat: string, value: number, rate?: number): Promise<void>;

  /**
   * Record elapsed time
   */
  duration(stat: string, elapsed: Elapsed, rate?: number): Promise<void>;

  /**
   * Record time elapsed since `start`, a `process.hrtime.bigint()` reading
   */
  durationSince(stat: string, start: bigint): Promise<void>;

  /**
   * Time `fn` and record its duration
   */
  time(stat: string, rate: number, fn: () => void | Promise<void>): Promise<void>;

  /**
   * Start a timer that records to `stat` once, when stopped
   */
  startTimer(stat: string, rate?: number): Timer;

  /**
   * Record an occurrence of a unique value
   */
  unique(stat: string, value: number | string, rate?: number): Promise<void>;

  /**
   * Send an annotation, substituting printf-style `args` into `template`
   */
  annotate(name: string, template: string, ...args: unknown[]): Promise<void>;

  /**
   * Flush buffered metrics
   */
  flush(): Promise<void>;

  /**
   * Flush and close the metrics client
   */
  close(): Promise<void>;
}
