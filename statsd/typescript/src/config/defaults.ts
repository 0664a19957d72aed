/**
 * Default configuration values for the StatsD client
 */

import type { StatsDConfig } from '../types';
import { DEFAULT_PACKET_SIZE } from '../buffer/packet-buffer';

/**
 * Default collector port
 */
export const DEFAULT_PORT = 8125;

/**
 * Default configuration values
 */
export const DEFAULT_CONFIG: StatsDConfig = {
  host: 'localhost',
  port: DEFAULT_PORT,
  prefix: '',
  packetSize: DEFAULT_PACKET_SIZE,
  overflowFlushPolicy: 'swallow',
};

/**
 * Apply default values to a partial configuration
 */
export function applyDefaults(config: Partial<StatsDConfig>): StatsDConfig {
  return {
    ...DEFAULT_CONFIG,
    ...config,
  };
}
