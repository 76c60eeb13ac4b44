import { afterEach, describe, it, expect, vi } from 'vitest';
import { isLogLevel, log } from '@/lib/logger';

describe('log', () => {
  afterEach(() => {
    log.setLevel('silent');
  });

  it('should prefix every line', () => {
    log.setLevel('debug');
    const info = vi.spyOn(console, 'log').mockImplementation(() => undefined);

    log.info('loaded', 3);

    expect(info).toHaveBeenCalledWith('[annotate]', 'loaded', 3);
  });

  it('should drop lines below the current level', () => {
    log.setLevel('warn');
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined);
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    log.debug('hidden');
    log.error('shown');

    expect(debug).not.toHaveBeenCalled();
    expect(error).toHaveBeenCalledTimes(1);
  });

  it('should print nothing when silent', () => {
    log.setLevel('silent');
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    log.error('hidden');

    expect(error).not.toHaveBeenCalled();
  });

  it('should recognise level names', () => {
    expect(isLogLevel('warn')).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
    expect(isLogLevel(2)).toBe(false);
  });
});
