/**
 * Stream transport: any Node Writable (file, pipe, socket) as a packet sink.
 *
 * Packets are written back to back with no framing between them; stream
 * backpressure shows up as a slower write(). Failures reach callers through
 * the promises of write() and close(); the stream's 'error' event is only
 * logged.
 */

import type { Writable } from 'node:stream';
import { finished } from 'node:stream/promises';
import type { Logger } from '../types';
import type { PacketSink } from './sink';
import { noopLogger } from '../logging';

export class WritableSink implements PacketSink {
  private readonly stream: Writable;

  constructor(stream: Writable, logger: Logger = noopLogger) {
    this.stream = stream;
    // An unhandled 'error' event would be rethrown by the emitter
    this.stream.on('error', (error: Error) => {
      logger.warn('StatsD stream error', { error: error.message });
    });
  }

  write(packet: Buffer): Promise<void> {
    return new Promise((resolve, reject) => {
      this.stream.write(packet, (error) => {
        if (error) {
          reject(error);
        } else {
          resolve();
        }
      });
    });
  }

  /**
   * End the stream and wait until everything written has been flushed
   * to the underlying resource. Rejects if the stream fails on the way.
   */
  async close(): Promise<void> {
    this.stream.end();
    await finished(this.stream, { readable: false });
  }
}
