/**
 * In-memory packet sink for testing
 *
 * @module testing/memory-sink
 */

import { setImmediate as nextTick } from 'node:timers/promises';
import type { PacketSink } from '../transport/sink';

/**
 * PacketSink that records every packet instead of sending it.
 *
 * Writes settle on a later turn of the event loop, like a real socket,
 * so concurrent callers can interleave around them.
 */
export class MemorySink implements PacketSink {
  private readonly written: string[] = [];
  private readonly pendingFailures: Error[] = [];
  private closeCount = 0;
  private writeAttempts = 0;

  /**
   * Make the next write reject with `error`. Calls queue up.
   */
  failNextWrite(error: Error = new Error('write failed')): this {
    this.pendingFailures.push(error);
    return this;
  }

  async write(packet: Buffer): Promise<void> {
    this.writeAttempts++;
    await nextTick();

    const failure = this.pendingFailures.shift();
    if (failure) {
      throw failure;
    }
    this.written.push(packet.toString('utf8'));
  }

  async close(): Promise<void> {
    this.closeCount++;
  }

  /**
   * Packets written successfully, in order
   */
  get packets(): string[] {
    return [...this.written];
  }

  /**
   * Every line across all packets, in order
   */
  get lines(): string[] {
    return this.written.flatMap((packet) => packet.split('\n'));
  }

  /**
   * Number of write calls, failed ones included
   */
  get attempts(): number {
    return this.writeAttempts;
  }

  /**
   * Number of close calls
   */
  get closes(): number {
    return this.closeCount;
  }
}
