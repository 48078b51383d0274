import { afterEach, describe, expect, it, vi } from 'vitest';
import { createLogger } from '../../../src/utils/logger.js';

afterEach(() => {
  vi.restoreAllMocks();
});

describe('createLogger', () => {
  it('drops messages below the threshold', () => {
    const info = vi.spyOn(console, 'info').mockImplementation(() => {});
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const logger = createLogger('warn');

    logger.info('hidden');
    logger.warn('shown');

    expect(info).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it('prefixes lines with timestamp and level', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    createLogger('debug').error('boom');

    const [prefix, message] = error.mock.calls[0];
    expect(prefix).toMatch(/^\[\d{4}-\d{2}-\d{2}T[\d:.]+Z\] ERROR:$/);
    expect(message).toBe('boom');
  });

  it('routes debug to console.log', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    createLogger('debug').debug('trace');
    expect(log).toHaveBeenCalledTimes(1);
  });

  it('child loggers carry a scope tag and the parent level', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const child = createLogger('warn', 'scan').child('deps');

    expect(child.level).toBe('warn');
    child.warn('malformed');
    expect(warn.mock.calls[0][0]).toMatch(/ WARN \[scan:deps\]:$/);
  });

  it('can route every level to stderr', () => {
    const info = vi.spyOn(console, 'info').mockImplementation(() => {});
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    const logger = createLogger('debug', undefined, true);

    logger.info('progress');
    logger.child('scan').debug('detail');

    expect(info).not.toHaveBeenCalled();
    expect(error).toHaveBeenCalledTimes(2);
    expect(error.mock.calls[0][0]).toMatch(/ INFO:$/);
    expect(error.mock.calls[1][0]).toMatch(/ DEBUG \[scan\]:$/);
  });
});
