import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import Logger from '../src/logger.js';
import { GaugeTimeoutError } from '../src/errors.js';
import type { LogRecord } from '../src/types/gauge-types.js';

describe('Logger', () => {
  let logger: Logger;

  beforeEach(() => {
    logger = new Logger();
    logger.disableColors();
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('prints a header, the message and the remaining context', () => {
    const info = vi.spyOn(console, 'info').mockImplementation(() => {});
    logger.setLogFormat(['level', 'logger', 'command']);

    logger.createLogger('Client').info('sent', { command: 'PR1', bytes: 3 });

    expect(info).toHaveBeenCalledWith('[INFO][Client][C:PR1]', 'sent', '{"bytes":3}');
  });

  it('shows the global gauge in the header', () => {
    const info = vi.spyOn(console, 'info').mockImplementation(() => {});
    logger.setLogFormat(['gauge']);
    logger.setGlobalContext({ gauge: 2 });

    logger.info('reading');

    expect(info).toHaveBeenCalledWith('[G:2]', 'reading');
  });

  it('prints errors by name and message', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    logger.setLogFormat(['level']);

    logger.error(new GaugeTimeoutError('late'));

    expect(error).toHaveBeenCalledWith('[ERROR]', 'GaugeTimeoutError: late');
  });

  it('colors the header', () => {
    const info = vi.spyOn(console, 'info').mockImplementation(() => {});
    const colored = new Logger();
    colored.setLogFormat(['level']);

    colored.info('x');

    expect(info).toHaveBeenCalledWith('\x1b[1;32m[INFO]\x1b[0m', 'x');
  });

  it('filters by global and per-category level', () => {
    const records: LogRecord[] = [];
    logger.setConsoleOutput(false);
    logger.watch(record => records.push(record));
    const framer = logger.createLogger('Framer');
    const client = logger.createLogger('Client');

    framer.debug('hidden');
    framer.setLevel('debug');
    framer.debug('shown');
    client.pause();
    client.error('muted');
    client.resume();
    client.warn('back');

    expect(records.map(r => r.args[0])).toEqual(['shown', 'back']);
    expect(records[1]?.context.logger).toBe('Client');
    expect(logger.getCounts()).toEqual({ trace: 0, debug: 1, info: 0, warn: 1, error: 0 });
  });

  it('stays silent while disabled', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    logger.disable();
    logger.warn('nothing');
    logger.enable();
    expect(warn).not.toHaveBeenCalled();
    expect(logger.isEnabled()).toBe(true);
  });

  it('requires a category name', () => {
    expect(() => logger.createLogger('')).toThrow('Logger name required');
  });
});
