import { afterEach, describe, expect, it, vi } from 'vitest';
import logger, { setLogLevel } from '../src/utils/logger.js';

describe('logger', () => {
  afterEach(() => {
    setLogLevel('silent');
    vi.restoreAllMocks();
  });

  it('drops messages below the current level', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    setLogLevel('warn');
    logger.info('hidden');
    logger.warn('shown', { offset: 24 });
    expect(log).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn.mock.calls[0][0]).toMatch(/^\[\S+\] \[WARN\] shown \{"offset":24\}$/);
  });
});
