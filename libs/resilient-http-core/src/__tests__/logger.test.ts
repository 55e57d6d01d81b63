import { afterEach, describe, expect, it, vi } from 'vitest';
import { ConsoleLogger, noopLogger } from '../logger';

describe('ConsoleLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('writes each level to the matching console method', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const logger = new ConsoleLogger();

    logger.warn('http.request.failed', { attempt: 2 });
    logger.error('http.request.failed');

    expect(warn).toHaveBeenCalledWith('http.request.failed', { attempt: 2 });
    expect(error).toHaveBeenCalledWith('http.request.failed');
  });
});

describe('noopLogger', () => {
  it('writes nothing', () => {
    const info = vi.spyOn(console, 'info').mockImplementation(() => undefined);

    noopLogger.info('ignored', { a: 1 });

    expect(info).not.toHaveBeenCalled();
    info.mockRestore();
  });
});
