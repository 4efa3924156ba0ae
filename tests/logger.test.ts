import { describe, it, expect, vi, afterEach } from 'vitest';
import { logger } from '../src/core/logger';

describe('logger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('offers only debug and warn', () => {
    expect(Object.keys(logger).sort()).toEqual(['debug', 'warn']);
  });

  it.skipIf(!!process.env.LCOV_PRUNE_DEBUG)('stays silent without LCOV_PRUNE_DEBUG', () => {
    const write = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    logger.debug('test', 'hidden');
    logger.warn('test', 'hidden', { n: 1 });
    expect(write).not.toHaveBeenCalled();
  });
});
