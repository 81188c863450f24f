import { describe, it, expect, afterEach, vi } from 'vitest';
import { createConsoleLogger, isLevelEnabled } from '../logger.js';

describe('isLevelEnabled', () => {
  it('should pass messages at or above the threshold', () => {
    expect(isLevelEnabled('info', 'warn')).toBe(true);
    expect(isLevelEnabled('info', 'info')).toBe(true);
    expect(isLevelEnabled('info', 'debug')).toBe(false);
    expect(isLevelEnabled('silent', 'error')).toBe(false);
    expect(isLevelEnabled('debug', 'debug')).toBe(true);
  });
});

describe('createConsoleLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should drop messages below the level', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const logger = createConsoleLogger('warn');

    logger.info('computing');
    logger.warn('corrupt entry');

    expect(log).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn).toHaveBeenCalledWith(expect.stringContaining('corrupt entry'));
  });

  it('should write errors through console.error with the scope', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const logger = createConsoleLogger('error', 'train');

    logger.error('failed');

    expect(error).toHaveBeenCalledWith(expect.stringContaining('[train]'));
  });

  it('should emit nothing when silent', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    createConsoleLogger('silent').error('failed');
    expect(error).not.toHaveBeenCalled();
  });
});
