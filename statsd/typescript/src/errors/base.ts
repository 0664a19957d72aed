/**
 * Root of the StatsD client error hierarchy.
 *
 * Sampling misses are not errors. Sink failures surface unchanged from
 * send/flush/close; everything the client raises itself extends StatsDError.
 */

/**
 * Where an error came from
 */
export type ErrorCategory = 'configuration' | 'connection' | 'client';

export abstract class StatsDError extends Error {
  abstract readonly category: ErrorCategory;

  /**
   * Whether repeating the same call may succeed. The client never retries
   * on its own.
   */
  readonly isRetryable: boolean;

  constructor(message: string, options: { isRetryable?: boolean; cause?: Error } = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'StatsDError';
    this.isRetryable = options.isRetryable ?? false;
  }
}

export function isStatsDError(error: unknown): error is StatsDError {
  return error instanceof StatsDError;
}

export function isRetryableError(error: unknown): boolean {
  return isStatsDError(error) && error.isRetryable;
}

export function isErrorCategory(error: unknown, category: ErrorCategory): boolean {
  return isStatsDError(error) && error.category === category;
}
