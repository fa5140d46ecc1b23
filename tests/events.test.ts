/**
 * Tests for notifications, logging and configuration
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { PoolEvents } from '../src/events.js';
import { Logger } from '../src/utils/logger.js';
import { parseLogLevel } from '../src/config.js';

describe('PoolEvents', () => {
  it('should deliver events to listeners of that name only', () => {
    const events = new PoolEvents();
    const swaps = vi.fn();
    const adds = vi.fn();
    events.on('Swap', swaps);
    events.on('LiquidityAdded', adds);

    const event = { trader: 't', assetIn: 'A', assetOut: 'B', amountIn: 1n, amountOut: 1n };
    events.emit('Swap', event);

    expect(swaps).toHaveBeenCalledWith(event);
    expect(adds).not.toHaveBeenCalled();
  });

  it('should track and remove listeners', () => {
    const events = new PoolEvents();
    const listener = vi.fn();
    events.on('LiquidityRemoved', listener);
    expect(events.listenerCount('LiquidityRemoved')).toBe(1);

    events.off('LiquidityRemoved', listener);
    expect(events.listenerCount('LiquidityRemoved')).toBe(0);
  });
});

describe('Logger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should write level-tagged lines with context', () => {
    const spy = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    new Logger('Test', 'info').child('Pool').info('activated');

    expect(spy).toHaveBeenCalledTimes(1);
    const line = String(spy.mock.calls[0][0]);
    expect(line).toContain('[INFO]');
    expect(line).toContain('[Test:Pool]');
    expect(line).toContain('activated');
  });

  it('should drop lines below the configured level', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const logger = new Logger('Test', 'warn');

    logger.debug('hidden');
    logger.info('hidden');
    logger.error('shown');

    expect(log).not.toHaveBeenCalled();
    expect(error).toHaveBeenCalledTimes(1);
  });

  it('should write nothing when silent', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    new Logger('Test', 'silent').error('hidden');
    expect(error).not.toHaveBeenCalled();
  });
});

describe('parseLogLevel', () => {
  it('should accept known levels in any case', () => {
    expect(parseLogLevel('DEBUG')).toBe('debug');
    expect(parseLogLevel(' warn ')).toBe('warn');
    expect(parseLogLevel('silent')).toBe('silent');
  });

  it('should default to info', () => {
    expect(parseLogLevel(undefined)).toBe('info');
    expect(parseLogLevel('verbose')).toBe('info');
  });
});
