/**
 * Environment variable configuration for the StatsD client
 */

import type { OverflowFlushPolicy, StatsDConfig } from '../types';

/**
 * Parse numeric environment variable
 *
 * @returns Parsed number or undefined if unset or invalid
 */
function parseNumber(value: string | undefined): number | undefined {
  if (!value) {
    return undefined;
  }

  const parsed = Number(value);
  return isNaN(parsed) ? undefined : parsed;
}

function parsePolicy(value: string | undefined): OverflowFlushPolicy | undefined {
  const lower = value?.trim().toLowerCase();
  if (lower === 'swallow' || lower === 'propagate') {
    return lower;
  }
  return undefined;
}

/**
 * Create configuration from environment variables
 *
 * Reads:
 * - STATSD_HOST - Collector hostname
 * - STATSD_PORT - Collector port
 * - STATSD_PREFIX - Literal stat prefix
 * - STATSD_PACKET_SIZE - Maximum packet size in bytes
 * - STATSD_CONNECT_TIMEOUT_MS - Connection setup timeout
 * - STATSD_OVERFLOW_FLUSH_POLICY - 'swallow' or 'propagate'
 *
 * Unset or unparsable values are left out.
 */
export function configFromEnvironment(
  env: NodeJS.ProcessEnv = process.env
): Partial<StatsDConfig> {
  const config: Partial<StatsDConfig> = {};

  if (env.STATSD_HOST) {
    config.host = env.STATSD_HOST;
  }

  const port = parseNumber(env.STATSD_PORT);
  if (port !== undefined) {
    config.port = port;
  }

  if (env.STATSD_PREFIX !== undefined) {
    config.prefix = env.STATSD_PREFIX;
  }

  const packetSize = parseNumber(env.STATSD_PACKET_SIZE);
  if (packetSize !== undefined) {
    config.packetSize = packetSize;
  }

  const connectTimeoutMs = parseNumber(env.STATSD_CONNECT_TIMEOUT_MS);
  if (connectTimeoutMs !== undefined) {
    config.connectTimeoutMs = connectTimeoutMs;
  }

  const policy = parsePolicy(env.STATSD_OVERFLOW_FLUSH_POLICY);
  if (policy !== undefined) {
    config.overflowFlushPolicy = policy;
  }

  return config;
}
