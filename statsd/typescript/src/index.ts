/**
 * StatsD client for TypeScript
 *
 * Formats counters, timers, gauges, sets and annotations as StatsD lines,
 * samples them, and packs them into size-bounded UDP packets. Buffer
 * access is serialized, so one client can be shared by concurrent callers.
 *
 * @example
 * ```typescript
 * import { dial } from '@statsd-packet/client';
 *
 * const client = await dial('localhost:8125', { prefix: 'app.' });
 * await client.incr('hits');
 * await client.gauge('mem', 42);
 * await client.flush(); // one packet: "app.hits:1|c\napp.mem:42|g"
 * ```
 *
 * @packageDocumentation
 */

// ============================================================================
// Client Exports
// ============================================================================

export {
  StatsDClient,
  dial,
  createClient,
  createClientFromConfig,
  createClientFromEnvironment,
} from './client';
export type { StatsDClientOptions, DialOptions } from './client';

// ============================================================================
// Metrics Exports
// ============================================================================

export type { MetricsClient } from './metrics';
export {
  Timer,
  formatLine,
  formatValue,
  formatRate,
  formatAnnotation,
  millisecondsFromDuration,
} from './metrics';
export { Sampler } from './sampling/sampler';
export type { SamplingDecision, SamplerOptions, RandomSource } from './sampling/sampler';
export { PacketBuffer, DEFAULT_PACKET_SIZE, resolvePacketSize } from './buffer/packet-buffer';
export type { PacketBufferOptions } from './buffer/packet-buffer';
export { AsyncMutex } from './concurrency/async-mutex';
export type { ReleaseFn } from './concurrency/async-mutex';

// ============================================================================
// Transport Exports
// ============================================================================

export { UdpSink, WritableSink, connectUdp, parseAddress } from './transport';
export type { PacketSink, DatagramSocket, CollectorAddress } from './transport';

// ============================================================================
// Type Exports
// ============================================================================

export { MetricType } from './types';
export type {
  MetricRequest,
  CounterRequest,
  TimingRequest,
  GaugeRequest,
  GaugeDeltaRequest,
  SetRequest,
  AnnotationRequest,
  GaugeDirection,
  Elapsed,
  MetricObserver,
  StatsDConfig,
  OverflowFlushPolicy,
  Logger,
} from './types';

// ============================================================================
// Configuration Exports
// ============================================================================

export {
  DEFAULT_CONFIG,
  DEFAULT_PORT,
  applyDefaults,
  validateConfig,
  configFromEnvironment,
} from './config';

// ============================================================================
// Logging Exports
// ============================================================================

export {
  LogLevel,
  ConsoleLogger,
  NoopLogger,
  noopLogger,
  noopObserver,
  loggerObserver,
} from './logging';

// ============================================================================
// Error Exports
// ============================================================================

export {
  StatsDError,
  isStatsDError,
  isRetryableError,
  isErrorCategory,
  ConfigurationError,
  ConnectionError,
  AddressResolutionError,
  ConnectTimeoutError,
  SocketError,
  ClientClosedError,
} from './errors';
export type { ErrorCategory } from './errors';
