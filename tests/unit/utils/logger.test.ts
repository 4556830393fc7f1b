import { describe, it, expect, vi, afterEach } from 'vitest';
import { createLogger, isLogLevel, Logger } from '../../../src/utils/logger.js';

describe('Logger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should write info and debug lines to stderr', () => {
    const write = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    const log = createLogger({ level: 'debug', prefix: 'Test' });

    log.info('Parsed', { repairs: 1 });
    log.debug('Detail');

    expect(write).toHaveBeenNthCalledWith(1, '[Test] INFO: Parsed {"repairs":1}\n');
    expect(write).toHaveBeenNthCalledWith(2, '[Test] DEBUG: Detail \n');
  });

  it('should drop messages below the configured level', () => {
    const write = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const log = new Logger({ level: 'warn' });

    log.debug('hidden');
    log.info('hidden');
    log.warn('Gap', { entity: 'Order' });
    log.error('Failed');

    expect(write).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledWith('[Schemawright] WARN:', 'Gap', { entity: 'Order' });
    expect(error).toHaveBeenCalledWith('[Schemawright] ERROR:', 'Failed', '');
  });

  it('should change level at runtime', () => {
    const log = new Logger();
    expect(log.getLevel()).toBe('info');
    log.setLevel('error');
    expect(log.getLevel()).toBe('error');
  });

  it('should recognise log levels', () => {
    expect(isLogLevel('debug')).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
    expect(isLogLevel(3)).toBe(false);
  });
});
