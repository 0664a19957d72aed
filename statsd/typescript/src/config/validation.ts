/**
 * Configuration validation for the StatsD client
 */

import { z } from 'zod';
import type { StatsDConfig } from '../types';
import { ConfigurationError } from '../errors';
import { resolvePacketSize } from '../buffer/packet-buffer';
import { applyDefaults } from './defaults';

/**
 * Zod schema for configuration validation.
 *
 * packetSize accepts any integer: non-positive sizes fall back to the default.
 */
const configSchema = z.object({
  host: z.string().min(1),
  port: z.number().int().min(1).max(65535),
  prefix: z.string(),
  packetSize: z.number().int(),
  connectTimeoutMs: z.number().int().nonnegative().optional(),
  overflowFlushPolicy: z.enum(['swallow', 'propagate']),
});

/**
 * Validate a StatsD client configuration and apply defaults
 *
 * @throws ConfigurationError listing every invalid field
 */
export function validateConfig(config: Partial<StatsDConfig>): StatsDConfig {
  const result = configSchema.safeParse(applyDefaults(config));
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw ConfigurationError.invalidConfig(issues);
  }

  return {
    ...result.data,
    packetSize: resolvePacketSize(result.data.packetSize),
  };
}
