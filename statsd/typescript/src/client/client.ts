/**
 * StatsD client implementation.
 *
 * Composes the sampler, the line formatter and the packet buffer behind
 * one send path. Every buffer operation (append, flush, close) runs under
 * a single mutex, so lines appear on the wire in the order callers
 * acquired it and a flush never interleaves with an append.
 */

import type {
  Elapsed,
  Logger,
  MetricObserver,
  MetricRequest,
  OverflowFlushPolicy,
} from '../types';
import type { MetricsClient } from '../metrics/interface';
import type { PacketSink } from '../transport/sink';
import { PacketBuffer } from '../buffer/packet-buffer';
import { AsyncMutex } from '../concurrency/async-mutex';
import { ClientClosedError } from '../errors';
import { noopLogger, noopObserver } from '../logging';
import { formatAnnotation, formatLine, millisecondsFromDuration } from '../metrics/format';
import { Timer } from '../metrics/timer';
import { Sampler, type RandomSource } from '../sampling/sampler';

/**
 * Options for a client bound to an already-open sink
 */
export interface StatsDClientOptions {
  /** Maximum packet size in bytes; missing or non-positive means 512 */
  packetSize?: number;
  /** Literal prefix for every stat */
  prefix?: string;
  /** Handling of failed overflow flushes (defaults to 'swallow') */
  overflowFlushPolicy?: OverflowFlushPolicy;
  /** Logger for lifecycle events and swallowed flush failures */
  logger?: Logger;
  /** Called with every line about to be buffered */
  observer?: MetricObserver;
  /** Random source for sampling (defaults to Math.random) */
  random?: RandomSource;
}

/**
 * A long-lived StatsD client. Share it by reference; it owns its sink.
 *
 * `close()` must not race with in-flight sends: stop producers first.
 */
export class StatsDClient implements MetricsClient {
  private readonly buffer: PacketBuffer;
  private readonly mutex = new AsyncMutex();
  private readonly sampler: Sampler;
  private readonly logger: Logger;
  private readonly observer: MetricObserver;
  private statPrefix: string;

  constructor(sink: PacketSink, options: StatsDClientOptions = {}) {
    this.logger = options.logger ?? noopLogger;
    this.observer = options.observer ?? noopObserver;
    this.statPrefix = options.prefix ?? '';
    this.sampler = new Sampler({ random: options.random });
    this.buffer = new PacketBuffer(sink, {
      capacity: options.packetSize,
      overflowFlushPolicy: options.overflowFlushPolicy,
      logger: this.logger,
    });
  }

  /**
   * Literal prefix prepended to every stat
   */
  get prefix(): string {
    return this.statPrefix;
  }

  /**
   * Set the stat prefix. It is literal: use "foo.bar." rather than
   * "foo.bar" to get "foo.bar.baz" from "baz".
   */
  setPrefix(prefix: string): void {
    this.statPrefix = prefix;
  }

  /**
   * Maximum packet size in bytes
   */
  get packetSize(): number {
    return this.buffer.capacity;
  }

  /**
   * Whether the client has been closed
   */
  get closed(): boolean {
    return this.buffer.closed;
  }

  async send(request: MetricRequest): Promise<void> {
    if (this.buffer.closed) {
      throw new ClientClosedError('send');
    }

    const decision = this.sampler.sample(request.rate);
    if (!decision.emit) {
      return;
    }

    const line = formatLine(this.statPrefix, request, decision.rate);
    this.observer(line, request);

    await this.mutex.runExclusive(() => this.buffer.append(line));
  }

  increment(stat: string, count: number, rate: number = 1): Promise<void> {
    return this.send({ kind: 'counter', stat, value: count, rate });
  }

  incr(stat: string): Promise<void> {
    return this.increment(stat, 1, 1);
  }

  incrBy(stat: string, n: number): Promise<void> {
    return this.increment(stat, n, 1);
  }

  decrement(stat: string, count: number, rate: number = 1): Promise<void> {
    return this.increment(stat, -count, rate);
  }

  decr(stat: string): Promise<void> {
    return this.increment(stat, -1, 1);
  }

  decrBy(stat: string, n: number): Promise<void> {
    return this.increment(stat, -n, 1);
  }

  gauge(stat: string, value: number, rate: number = 1): Promise<void> {
    return this.send({ kind: 'gauge', stat, value, rate });
  }

  incrementGauge(stat: string, value: number, rate: number = 1): Promise<void> {
    return this.send({ kind: 'gauge-delta', direction: 'up', stat, value, rate });
  }

  incrementGaugeBy(stat: string, value: number): Promise<void> {
    return this.incrementGauge(stat, value, 1);
  }

  decrementGauge(stat: string, value: number, rate: number = 1): Promise<void> {
    return this.send({ kind: 'gauge-delta', direction: 'down', stat, value, rate });
  }

  decrementGaugeBy(stat: string, value: number): Promise<void> {
    return this.decrementGauge(stat, value, 1);
  }

  timing(stat: string, milliseconds: number, rate: number = 1): Promise<void> {
    return this.send({ kind: 'timing', stat, value: milliseconds, rate });
  }

  /**
   * Alias of timing(); collectors disagree on a dedicated histogram type
   */
  histogram(stat: string, value: number, rate: number = 1): Promise<void> {
    return this.timing(stat, value, rate);
  }

  duration(stat: string, elapsed: Elapsed, rate: number = 1): Promise<void> {
    return this.timing(stat, millisecondsFromDuration(elapsed), rate);
  }

  durationSince(stat: string, start: bigint): Promise<void> {
    return this.duration(stat, process.hrtime.bigint() - start, 1);
  }

  /**
   * Time `fn` and record its duration. If `fn` throws, nothing is recorded.
   */
  async time(stat: string, rate: number, fn: () => void | Promise<void>): Promise<void> {
    const start = process.hrtime.bigint();
    await fn();
    await this.duration(stat, process.hrtime.bigint() - start, rate);
  }

  /**
   * Start a timer that records to `stat` when stopped
   */
  startTimer(stat: string, rate: number = 1): Timer {
    return new Timer(this, stat, rate);
  }

  unique(stat: string, value: number | string, rate: number = 1): Promise<void> {
    return this.send({ kind: 'set', stat, value, rate });
  }

  annotate(name: string, template: string, ...args: unknown[]): Promise<void> {
    return this.send({
      kind: 'annotation',
      stat: name,
      text: formatAnnotation(template, ...args),
      rate: 1,
    });
  }

  flush(): Promise<void> {
    return this.mutex.runExclusive(() => this.buffer.flush());
  }

  close(): Promise<void> {
    return this.mutex.runExclusive(async () => {
      await this.buffer.close();
      this.logger.debug('StatsD client closed');
    });
  }
}
