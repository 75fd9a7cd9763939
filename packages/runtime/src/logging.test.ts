// Tests for loggers

import { describe, it, expect, vi, afterEach } from 'vitest';
import { createConsoleLogger, createCapturingLogger, silentLogger } from './logging.js';

describe('createConsoleLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should drop entries below the configured level', () => {
    const info = vi.spyOn(console, 'info').mockImplementation(() => {});
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});

    const logger = createConsoleLogger({ level: 'warn' });
    logger.info('hidden');
    logger.warn('careful', { grantId: 'grant-1' });

    expect(info).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledWith('[WARN] careful', { grantId: 'grant-1' });
  });

  it('should default to info', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => {});
    const info = vi.spyOn(console, 'info').mockImplementation(() => {});

    const logger = createConsoleLogger();
    logger.debug('noise');
    logger.info('hello');

    expect(debug).not.toHaveBeenCalled();
    expect(info).toHaveBeenCalledWith('[INFO] hello', '');
  });
});

describe('silentLogger', () => {
  it('should write nothing', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    silentLogger.error('boom');
    expect(error).not.toHaveBeenCalled();
    error.mockRestore();
  });
});

describe('createCapturingLogger', () => {
  it('should record entries in order', () => {
    const logger = createCapturingLogger();

    logger.debug('one');
    logger.error('two', { code: 'NOT_FOUND' });

    expect(logger.entries.map(({ level, message, data }) => ({ level, message, data }))).toEqual([
      { level: 'debug', message: 'one', data: undefined },
      { level: 'error', message: 'two', data: { code: 'NOT_FOUND' } },
    ]);
  });
});
