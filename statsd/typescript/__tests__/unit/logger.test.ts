/**
 * Tests for the console logger.
 */

import { describe, it, expect, afterEach, vi } from 'vitest';
import { ConsoleLogger, LogLevel, NoopLogger } from '../../src/logging';

describe('ConsoleLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should skip messages below its level', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const logger = new ConsoleLogger({ level: LogLevel.Warn });

    logger.debug('hidden');
    logger.info('hidden');
    logger.warn('shown');
    logger.error('shown');

    expect(log).toHaveBeenCalledTimes(2);
  });

  it('should write JSON lines with merged context', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const logger = new ConsoleLogger({
      format: 'json',
      context: { service: 'api' },
    });

    logger.info('StatsD client closed', { port: 8125 });

    const [line] = log.mock.calls[0];
    expect(typeof line).toBe('string');
    expect(JSON.parse(String(line))).toMatchObject({
      level: 'INFO',
      message: 'StatsD client closed',
      service: 'api',
      port: 8125,
    });
  });

  it('should write readable lines by default', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const logger = new ConsoleLogger();

    logger.warn('StatsD socket error', { error: 'ECONNREFUSED' });

    expect(String(log.mock.calls[0][0])).toMatch(
      /^\[.+\] WARN: StatsD socket error \{"error":"ECONNREFUSED"\}$/
    );
  });
});

describe('NoopLogger', () => {
  it('should write nothing', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);

    new NoopLogger().error('ignored');

    expect(log).not.toHaveBeenCalled();
    log.mockRestore();
  });
});
