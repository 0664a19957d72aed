/**
 * Tests for address parsing and the datagram and stream sinks.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { once } from 'node:events';
import { PassThrough, Writable } from 'node:stream';
import { parseAddress } from '../../src/transport/address';
import { UdpSink, type DatagramSocket } from '../../src/transport/udp';
import { WritableSink } from '../../src/transport/writable';
import { createClient } from '../../src/client/factory';
import { ConfigurationError, SocketError } from '../../src/errors';
import { LogLevel } from '../../src/logging';
import { InMemoryLogger } from '../../src/testing';

class FakeDatagramSocket implements DatagramSocket {
  readonly sent: string[] = [];
  closeCalls = 0;
  failure: Error | null = null;
  private readonly errorListeners: Array<(error: Error) => void> = [];

  send(msg: Uint8Array, callback: (error: Error | null, bytes: number) => void): void {
    if (this.failure) {
      callback(this.failure, 0);
      return;
    }
    this.sent.push(Buffer.from(msg).toString('utf8'));
    callback(null, msg.length);
  }

  close(callback?: () => void): void {
    this.closeCalls++;
    callback?.();
  }

  on(_event: 'error', listener: (error: Error) => void): this {
    this.errorListeners.push(listener);
    return this;
  }

  emitError(error: Error): void {
    for (const listener of this.errorListeners) {
      listener(error);
    }
  }
}

describe('parseAddress', () => {
  it('should split host and port', () => {
    expect(parseAddress('localhost:8125')).toEqual({ host: 'localhost', port: 8125 });
    expect(parseAddress(' 10.0.0.5:9125 ')).toEqual({ host: '10.0.0.5', port: 9125 });
  });

  it('should accept bracketed IPv6 hosts', () => {
    expect(parseAddress('[::1]:8125')).toEqual({ host: '::1', port: 8125 });
  });

  it('should reject malformed addresses', () => {
    expect(() => parseAddress('localhost')).toThrow('missing port');
    expect(() => parseAddress(':8125')).toThrow('missing host');
    expect(() => parseAddress('::1:8125')).toThrow('IPv6 hosts must be bracketed');
    expect(() => parseAddress('[::1]8125')).toThrow('expected [host]:port');
    expect(() => parseAddress('localhost:0')).toThrow(
      'port must be an integer between 1 and 65535'
    );
    expect(() => parseAddress('localhost:65536')).toThrow(ConfigurationError);
    expect(() => parseAddress('localhost:81.5')).toThrow(ConfigurationError);
  });

  it('should name the address in the error message', () => {
    expect(() => parseAddress('localhost')).toThrow(
      'Invalid collector address "localhost": missing port'
    );
  });
});

describe('UdpSink', () => {
  let socket: FakeDatagramSocket;

  beforeEach(() => {
    socket = new FakeDatagramSocket();
  });

  it('should send each packet as one datagram', async () => {
    const sink = new UdpSink(socket);

    await sink.write(Buffer.from('a:1|c\nb:1|c'));

    expect(socket.sent).toEqual(['a:1|c\nb:1|c']);
  });

  it('should wrap send failures in a SocketError', async () => {
    const sink = new UdpSink(socket);
    const failure = new Error('EMSGSIZE');
    socket.failure = failure;

    const result = sink.write(Buffer.from('a:1|c'));

    await expect(result).rejects.toThrow(SocketError);
    await expect(result).rejects.toThrow('Failed to send 5-byte packet');
    await expect(result).rejects.toHaveProperty('cause', failure);
  });

  it('should close the socket once', async () => {
    const sink = new UdpSink(socket);

    await sink.close();
    await sink.close();

    expect(socket.closeCalls).toBe(1);
  });

  it('should log asynchronous socket errors', () => {
    const logger = new InMemoryLogger();
    new UdpSink(socket, logger);

    socket.emitError(new Error('ECONNREFUSED'));

    expect(logger.getLogsByLevel(LogLevel.Warn)).toEqual([
      {
        level: LogLevel.Warn,
        message: 'StatsD socket error',
        context: { error: 'ECONNREFUSED' },
      },
    ]);
  });

  it('should carry a client through to the socket', async () => {
    const client = createClient(new UdpSink(socket), { prefix: 'svc.' });

    await client.incr('requests');
    await client.timing('latency', 12, 1);
    await client.close();

    expect(socket.sent).toEqual(['svc.requests:1|c\nsvc.latency:12|ms']);
    expect(socket.closeCalls).toBe(1);
  });
});

describe('WritableSink', () => {
  it('should write packets to the stream and end it on close', async () => {
    const stream = new PassThrough();
    const chunks: Buffer[] = [];
    stream.on('data', (chunk: Buffer) => chunks.push(chunk));
    const ended = once(stream, 'end');
    const sink = new WritableSink(stream);

    await sink.write(Buffer.from('a:1|c'));
    await sink.write(Buffer.from('b:1|c'));
    await sink.close();
    await ended;

    expect(Buffer.concat(chunks).toString('utf8')).toBe('a:1|cb:1|c');
  });

  it('should reject a failed write and only log the stream error', async () => {
    const logger = new InMemoryLogger();
    const stream = new Writable({
      write(_chunk, _encoding, callback) {
        callback(new Error('disk full'));
      },
    });
    const client = createClient(new WritableSink(stream, logger));

    await client.incr('a');
    await expect(client.flush()).rejects.toThrow('disk full');
    await new Promise((resolve) => setImmediate(resolve));

    expect(logger.getLogsByLevel(LogLevel.Warn)).toEqual([
      {
        level: LogLevel.Warn,
        message: 'StatsD stream error',
        context: { error: 'disk full' },
      },
    ]);
  });

  it('should reject close when the stream fails to finish', async () => {
    const stream = new Writable({
      write(_chunk, _encoding, callback) {
        callback();
      },
      final(callback) {
        callback(new Error('sync failed'));
      },
    });
    const sink = new WritableSink(stream);

    await sink.write(Buffer.from('a:1|c'));

    await expect(sink.close()).rejects.toThrow('sync failed');
  });
});
