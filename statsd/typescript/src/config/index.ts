/**
 * Configuration module exports for the StatsD client
 */

export type { StatsDConfig, OverflowFlushPolicy } from '../types';
export { DEFAULT_CONFIG, DEFAULT_PORT, applyDefaults } from './defaults';
export { validateConfig } from './validation';
export { configFromEnvironment } from './env';
