/**
 * Size-bounded packet buffer.
 *
 * Accumulates newline-joined metric lines in a fixed-capacity byte buffer
 * and hands them to a {@link PacketSink} as one packet per flush. There is
 * no timer: bytes leave only on an explicit flush or when an append would
 * overflow the buffer.
 *
 * Not safe for concurrent use on its own; the client serializes every
 * operation through its mutex.
 */

import type { Logger, OverflowFlushPolicy } from '../types';
import type { PacketSink } from '../transport/sink';
import { ClientClosedError } from '../errors';
import { noopLogger } from '../logging';

/**
 * Default packet size in bytes, small enough to fit common network MTUs
 */
export const DEFAULT_PACKET_SIZE = 512;

const NEWLINE = 0x0a;

/**
 * PacketBuffer options
 */
export interface PacketBufferOptions {
  /** Maximum packet size in bytes; missing or non-positive means 512 */
  capacity?: number;
  /** Handling of failed overflow flushes (defaults to 'swallow') */
  overflowFlushPolicy?: OverflowFlushPolicy;
  /** Logger for swallowed flush failures */
  logger?: Logger;
}

/**
 * Resolve a requested packet size to the capacity actually used
 */
export function resolvePacketSize(size?: number): number {
  if (size === undefined || !Number.isFinite(size) || size <= 0) {
    return DEFAULT_PACKET_SIZE;
  }
  return Math.floor(size);
}

export class PacketBuffer {
  private readonly sink: PacketSink;
  private readonly overflowFlushPolicy: OverflowFlushPolicy;
  private readonly logger: Logger;
  private readonly size: number;
  private bytes: Buffer | null;
  private length = 0;

  constructor(sink: PacketSink, options?: PacketBufferOptions) {
    this.sink = sink;
    this.size = resolvePacketSize(options?.capacity);
    this.overflowFlushPolicy = options?.overflowFlushPolicy ?? 'swallow';
    this.logger = options?.logger ?? noopLogger;
    this.bytes = Buffer.alloc(this.size);
  }

  /**
   * Maximum packet size in bytes
   */
  get capacity(): number {
    return this.size;
  }

  /**
   * Bytes buffered since the last flush
   */
  get buffered(): number {
    return this.length;
  }

  /**
   * Bytes that can still be buffered before a flush is forced
   */
  get available(): number {
    return this.size - this.length;
  }

  /**
   * Whether close() has completed
   */
  get closed(): boolean {
    return this.bytes === null;
  }

  /**
   * Append one line, flushing the current packet first if the line (with
   * its separator) would not fit. A line larger than the whole capacity is
   * sent on its own as a single packet.
   */
  async append(line: string): Promise<void> {
    const bytes = this.requireOpen('append');
    const lineLength = Buffer.byteLength(line);
    const needed = this.length > 0 ? lineLength + 1 : lineLength;

    if (needed > this.available) {
      await this.flushForOverflow();
    }

    if (this.length === 0 && lineLength > this.size) {
      await this.sink.write(Buffer.from(line));
      return;
    }

    if (this.length > 0) {
      bytes[this.length] = NEWLINE;
      this.length += 1;
    }
    this.length += bytes.write(line, this.length);
  }

  /**
   * Write all buffered bytes to the sink as one packet.
   *
   * On failure the sink's error is rethrown as-is and the bytes stay buffered.
   */
  async flush(): Promise<void> {
    const bytes = this.requireOpen('flush');
    if (this.length === 0) {
      return;
    }

    // Copy out: the buffer is reused as soon as the write settles
    const packet = Buffer.from(bytes.subarray(0, this.length));
    await this.sink.write(packet);
    this.length = 0;
  }

  /**
   * Flush, then close the sink, then invalidate the buffer.
   *
   * A failed flush leaves everything open.
   */
  async close(): Promise<void> {
    this.requireOpen('close');
    await this.flush();

    try {
      await this.sink.close();
    } finally {
      this.bytes = null;
      this.length = 0;
    }
  }

  private async flushForOverflow(): Promise<void> {
    try {
      await this.flush();
    } catch (error) {
      if (this.overflowFlushPolicy === 'propagate') {
        throw error;
      }

      this.logger.warn('Dropped packet after failed overflow flush', {
        droppedBytes: this.length,
        error: error instanceof Error ? error.message : String(error),
      });
      this.length = 0;
    }
  }

  private requireOpen(operation: string): Buffer {
    if (this.bytes === null) {
      throw new ClientClosedError(operation);
    }
    return this.bytes;
  }
}
