/**
 * Factory functions for creating StatsD clients.
 *
 * `dial` opens a UDP connection to a collector; `createClient` binds a
 * client to any other sink.
 */

import type { StatsDConfig } from '../types';
import type { PacketSink } from '../transport/sink';
import { StatsDClient, type StatsDClientOptions } from './client';
import { parseAddress } from '../transport/address';
import { UdpSink, connectUdp } from '../transport/udp';
import { validateConfig } from '../config/validation';
import { configFromEnvironment } from '../config/env';

/**
 * Options for dialing a collector
 */
export interface DialOptions extends StatsDClientOptions {
  /** Connection setup timeout in ms, including name resolution; missing or non-positive means none */
  timeoutMs?: number;
}

/**
 * Connect to a collector at `host:port` over UDP.
 *
 * @example
 * ```typescript
 * const client = await dial('localhost:8125', { prefix: 'api.', timeoutMs: 1000 });
 * await client.incr('requests');
 * await client.close();
 * ```
 *
 * @throws ConfigurationError for a malformed address
 * @throws AddressResolutionError, ConnectTimeoutError or ConnectionError when the connection cannot be set up
 */
export async function dial(address: string, options: DialOptions = {}): Promise<StatsDClient> {
  const { host, port } = parseAddress(address);
  const socket = await connectUdp(host, port, options.timeoutMs);

  options.logger?.debug('Connected to StatsD collector', { host, port });
  return new StatsDClient(new UdpSink(socket, options.logger), options);
}

/**
 * Bind a client to an already-open sink
 */
export function createClient(sink: PacketSink, options?: StatsDClientOptions): StatsDClient {
  return new StatsDClient(sink, options);
}

/**
 * Validate `config` and dial the collector it names
 */
export async function createClientFromConfig(
  config: Partial<StatsDConfig>,
  options: Omit<DialOptions, keyof StatsDConfig | 'timeoutMs'> = {}
): Promise<StatsDClient> {
  const validated = validateConfig(config);
  const host = validated.host.includes(':') ? `[${validated.host}]` : validated.host;

  return dial(`${host}:${validated.port}`, {
    ...options,
    prefix: validated.prefix,
    packetSize: validated.packetSize,
    overflowFlushPolicy: validated.overflowFlushPolicy,
    timeoutMs: validated.connectTimeoutMs,
  });
}

/**
 * Dial the collector named by STATSD_* environment variables
 */
export function createClientFromEnvironment(
  options: Omit<DialOptions, keyof StatsDConfig | 'timeoutMs'> = {},
  env: NodeJS.ProcessEnv = process.env
): Promise<StatsDClient> {
  return createClientFromConfig(configFromEnvironment(env), options);
}
