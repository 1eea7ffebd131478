import { afterEach, describe, expect, it, vi } from 'vitest';
import { logger } from '../utils/logger';

describe('logger', () => {
  afterEach(() => {
    logger.setLevel('info');
    vi.restoreAllMocks();
  });

  it('drops debug output at the default level', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined);

    logger.debug('Fetched page');

    expect(debug).not.toHaveBeenCalled();
  });

  it('follows the configured level', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined);
    const info = vi.spyOn(console, 'log').mockImplementation(() => undefined);

    logger.setLevel('debug');
    logger.debug('Fetched page', { links: 3 });
    expect(debug).toHaveBeenCalledWith(expect.stringMatching(/^\[DEBUG\] .+ - Fetched page$/), { links: 3 });

    logger.setLevel('warn');
    logger.info('Link check started');
    expect(info).not.toHaveBeenCalled();
    expect(logger.isEnabled('error')).toBe(true);
  });
});
