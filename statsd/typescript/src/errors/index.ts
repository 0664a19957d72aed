/**
 * Error classes for the StatsD client.
 *
 * Exports all error classes and utility functions.
 */

// Base error
export {
  StatsDError,
  isStatsDError,
  isRetryableError,
  isErrorCategory,
} from './base';
export type { ErrorCategory } from './base';

// Configuration errors
export { ConfigurationError } from './configuration';

// Connection errors
export {
  ConnectionError,
  AddressResolutionError,
  ConnectTimeoutError,
  SocketError,
} from './connection';

// Lifecycle errors
export { ClientClosedError } from './client';
