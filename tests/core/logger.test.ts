import { describe, expect, it, vi } from 'vitest';

import { Logger, isLogLevel } from '../../src/core/logger.js';

describe('Logger', () => {
  it('writes enabled levels to stderr only', () => {
    const stderr = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const stdout = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const logger = new Logger('warn');

    logger.info('hidden');
    logger.warn('shown', new Error('boom'));

    expect(stdout).not.toHaveBeenCalled();
    expect(stderr).toHaveBeenCalledTimes(1);
    const [line, meta] = stderr.mock.calls[0] ?? [];
    expect(String(line)).toMatch(/^\[.+\] WARN shown$/);
    expect(meta).toBe('boom');
  });

  it('changes level at runtime', () => {
    const logger = new Logger('error');
    expect(logger.isEnabled('debug')).toBe(false);
    logger.setLevel('debug');
    expect(logger.isEnabled('debug')).toBe(true);
  });

  it('recognizes level names', () => {
    expect(isLogLevel('info')).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
  });
});
