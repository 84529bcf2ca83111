import { describe, it, expect, vi, afterEach } from 'vitest';
import { createLogger, isLogLevel } from '@/lib/utils/logger';

describe('Logger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('prefixes the scope and appends the context as JSON', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});

    createLogger('roster', 'debug').warn('Roster truncated', { supplied: 70, kept: 64 });

    expect(warn).toHaveBeenCalledWith('[roster] Roster truncated {"supplied":70,"kept":64}');
  });

  it('routes levels to the matching console method', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    const logger = createLogger('codec', 'debug');

    logger.debug('decoded');
    logger.info('stored');
    logger.error('failed');

    expect(log.mock.calls).toEqual([['[codec] decoded'], ['[codec] stored']]);
    expect(error).toHaveBeenCalledWith('[codec] failed');
  });

  it('drops messages below the minimum level', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const logger = createLogger('quiet', 'warn');

    logger.debug('hidden');
    logger.info('hidden');
    logger.warn('shown');

    expect(log).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it('recognises only the four level names', () => {
    expect(isLogLevel('info')).toBe(true);
    expect(isLogLevel('trace')).toBe(false);
    expect(isLogLevel('toString')).toBe(false);
    expect(isLogLevel(1)).toBe(false);
  });
});
