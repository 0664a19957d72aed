/**
 * UDP transport: a connected datagram socket as a packet sink.
 *
 * Delivery is fire-and-forget. A send resolves once the datagram has been
 * handed to the operating system; nothing is acknowledged by the collector.
 */

import { createSocket, type Socket } from 'node:dgram';
import { lookup } from 'node:dns/promises';
import type { Logger } from '../types';
import type { PacketSink } from './sink';
import {
  AddressResolutionError,
  ConnectionError,
  ConnectTimeoutError,
  SocketError,
} from '../errors';
import { noopLogger } from '../logging';

/**
 * The part of a connected `dgram.Socket` the sink relies on
 */
export interface DatagramSocket {
  send(msg: Uint8Array, callback: (error: Error | null, bytes: number) => void): void;
  close(callback?: () => void): void;
  on(event: 'error', listener: (error: Error) => void): unknown;
}

/**
 * PacketSink over a connected datagram socket
 */
export class UdpSink implements PacketSink {
  private readonly socket: DatagramSocket;
  private closed = false;

  constructor(socket: DatagramSocket, logger: Logger = noopLogger) {
    this.socket = socket;
    // Asynchronous socket errors (e.g. ICMP unreachable) would otherwise crash the process
    this.socket.on('error', (error) => {
      logger.warn('StatsD socket error', { error: error.message });
    });
  }

  write(packet: Buffer): Promise<void> {
    return new Promise((resolve, reject) => {
      this.socket.send(packet, (error) => {
        if (error) {
          reject(new SocketError(packet.length, error));
        } else {
          resolve();
        }
      });
    });
  }

  close(): Promise<void> {
    if (this.closed) {
      return Promise.resolve();
    }
    this.closed = true;

    return new Promise((resolve) => {
      this.socket.close(() => resolve());
    });
  }
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

async function resolveAndConnect(host: string, port: number): Promise<Socket> {
  let resolved: { address: string; family: number };
  try {
    resolved = await lookup(host);
  } catch (error) {
    throw new AddressResolutionError(host, toError(error));
  }

  return new Promise<Socket>((resolve, reject) => {
    const socket = createSocket(resolved.family === 6 ? 'udp6' : 'udp4');

    const onError = (error: Error): void => {
      socket.close();
      reject(
        new ConnectionError(
          `Failed to connect to collector at ${host}:${port} (${resolved.address})`,
          { host, port, cause: error }
        )
      );
    };

    socket.once('error', onError);
    socket.connect(port, resolved.address, () => {
      socket.removeListener('error', onError);
      resolve(socket);
    });
  });
}

/**
 * Resolve `host` and open a UDP socket connected to it.
 *
 * @param timeoutMs - Limit covering name resolution and connect; missing or non-positive means none
 * @throws AddressResolutionError, ConnectTimeoutError or ConnectionError
 */
export async function connectUdp(
  host: string,
  port: number,
  timeoutMs?: number
): Promise<Socket> {
  const attempt = resolveAndConnect(host, port);
  if (timeoutMs === undefined || timeoutMs <= 0) {
    return attempt;
  }

  let timeoutId: ReturnType<typeof setTimeout> | undefined;
  const timeoutPromise = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(
      () => reject(new ConnectTimeoutError(host, port, timeoutMs)),
      timeoutMs
    );
  });

  try {
    return await Promise.race([attempt, timeoutPromise]);
  } catch (error) {
    // A socket that connects after the deadline still has to be released;
    // a late failure has already been superseded by the timeout error.
    void attempt.then(
      (socket) => socket.close(),
      () => undefined
    );
    throw error;
  } finally {
    clearTimeout(timeoutId);
  }
}
