/**
 * Client module exports
 */

export { StatsDClient } from './client';
export type { StatsDClientOptions } from './client';
export {
  dial,
  createClient,
  createClientFromConfig,
  createClientFromEnvironment,
} from './factory';
export type { DialOptions } from './factory';
