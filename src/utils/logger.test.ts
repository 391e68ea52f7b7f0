import { describe, it, expect, vi } from 'vitest';
import { errorMessage, Logger } from './logger';

describe('Logger', () => {
  it('should drop messages below the configured level', () => {
    const info = vi.spyOn(console, 'info').mockImplementation(() => undefined);
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const logger = new Logger('warn');

    logger.info('hidden');
    logger.success('hidden');
    logger.warn('shown');

    expect(info).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn.mock.calls[0]?.[0]).toContain('shown');
  });

  it('should append the error message', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    new Logger('error').error('Scraping aborted', new Error('status 503'));

    expect(error.mock.calls[0]?.[0]).toContain('Scraping aborted: status 503');
  });
});

describe('errorMessage', () => {
  it('should describe errors and other values', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom');
    expect(errorMessage('plain')).toBe('plain');
  });
});
