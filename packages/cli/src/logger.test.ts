import { afterEach, describe, expect, test, vi } from 'vitest';
import { createConsoleLogger } from './logger.js';

describe('createConsoleLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  test('sends progress to stdout and problems to stderr', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});

    const logger = createConsoleLogger();
    logger.log?.('Wrote doc/adr/0002-use-redis.md');
    logger.warn?.('Skipping 0003-broken.md');
    logger.error?.('ADR not found: 9');

    expect(log).toHaveBeenCalledWith('Wrote doc/adr/0002-use-redis.md');
    expect(warn).toHaveBeenCalledWith('warning: Skipping 0003-broken.md');
    expect(error).toHaveBeenCalledWith('error: ADR not found: 9');
  });

  test('drops progress messages when quiet', () => {
    const logger = createConsoleLogger({ quiet: true });
    expect(logger.log).toBeUndefined();
    expect(logger.warn).toBeTypeOf('function');
  });
});
