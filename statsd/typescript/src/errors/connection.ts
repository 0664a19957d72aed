/**
 * Errors from reaching the collector: name resolution, connection setup
 * and datagram sends. All are retryable.
 */

import { StatsDError } from './base';

/**
 * Connection setup to `host:port` failed
 */
export class ConnectionError extends StatsDError {
  readonly category = 'connection';
  readonly host?: string;
  readonly port?: number;

  constructor(message: string, options: { host?: string; port?: number; cause?: Error } = {}) {
    super(message, { isRetryable: true, cause: options.cause });
    this.name = 'ConnectionError';
    this.host = options.host;
    this.port = options.port;
  }
}

export class AddressResolutionError extends ConnectionError {
  constructor(host: string, cause?: Error) {
    super(`Failed to resolve collector host: ${host}`, { host, cause });
    this.name = 'AddressResolutionError';
  }
}

export class ConnectTimeoutError extends ConnectionError {
  readonly timeoutMs: number;

  constructor(host: string, port: number, timeoutMs: number) {
    super(`Connecting to collector at ${host}:${port} timed out after ${timeoutMs}ms`, {
      host,
      port,
    });
    this.name = 'ConnectTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

/**
 * A datagram the operating system refused to send
 */
export class SocketError extends ConnectionError {
  /** Size of the packet that was not sent */
  readonly bytes: number;

  constructor(bytes: number, cause?: Error) {
    super(`Failed to send ${bytes}-byte packet`, { cause });
    this.name = 'SocketError';
    this.bytes = bytes;
  }
}
