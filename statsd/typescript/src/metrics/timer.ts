/**
 * Timer - Utility for timing operations and recording metrics
 */

import type { MetricsClient } from './interface';
import { millisecondsFromDuration } from './format';

/**
 * Timer class for measuring operation duration and emitting timing metrics
 */
export class Timer {
  private readonly startTime: bigint;
  private readonly stat: string;
  private readonly rate: number;
  private readonly client: MetricsClient;
  private stopped: boolean = false;

  constructor(client: MetricsClient, stat: string, rate: number = 1) {
    this.client = client;
    this.stat = stat;
    this.rate = rate;
    this.startTime = process.hrtime.bigint();
  }

  /**
   * Stop the timer and record the timing metric.
   * Resolves with the elapsed whole milliseconds; a second stop records nothing and resolves 0.
   */
  async stop(): Promise<number> {
    if (this.stopped) {
      return 0;
    }

    this.stopped = true;
    const elapsed = process.hrtime.bigint() - this.startTime;
    await this.client.duration(this.stat, elapsed, this.rate);

    return millisecondsFromDuration(elapsed);
  }

  /**
   * Get elapsed whole milliseconds without stopping the timer
   */
  elapsed(): number {
    return millisecondsFromDuration(process.hrtime.bigint() - this.startTime);
  }

  /**
   * Check if the timer has been stopped
   */
  isStopped(): boolean {
    return this.stopped;
  }
}
