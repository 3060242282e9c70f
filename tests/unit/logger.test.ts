import { describe, it, expect, vi, afterEach } from 'vitest';
import { Logger } from '../../src/logger.js';
import { normalizeLogLevel } from '../../src/utils.js';

describe('Logger', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('should prefix messages with the component name', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    new Logger('Test', 'debug').info('hello', 42);
    expect(log).toHaveBeenCalledWith('[Test]', 'hello', 42);
  });

  it('should extend the prefix for child loggers', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    new Logger('Test', 'debug').child('sub').debug('hello');
    expect(log).toHaveBeenCalledWith('[Test:sub]', 'hello');
  });

  it('should drop messages below its level', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    const logger = new Logger('Test', 'warn');

    logger.debug('a');
    logger.info('b');
    logger.warn('c');
    logger.error('d');

    expect(log).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledWith('[Test]', 'c');
    expect(error).toHaveBeenCalledWith('[Test]', 'd');
    expect(logger.isEnabled('info')).toBe(false);
  });

  it('should read its level from the environment', () => {
    vi.stubEnv('ASTROMECH_LOG_LEVEL', 'debug');
    expect(new Logger('Test').isEnabled('debug')).toBe(true);
  });

  it('should add a timestamp unless disabled', () => {
    vi.stubEnv('ASTROMECH_LOG_TIMESTAMPS', 'true');
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    new Logger('Test', 'info').info('hello');
    expect(log.mock.calls[0][0]).toMatch(/^\[\d{2}:\d{2}:\d{2}\.\d{3}\] \[Test\]$/);
  });
});

describe('normalizeLogLevel', () => {
  it('should map aliases onto the four levels', () => {
    expect(normalizeLogLevel('TRACE')).toBe('debug');
    expect(normalizeLogLevel('verbose')).toBe('debug');
    expect(normalizeLogLevel('warning')).toBe('warn');
    expect(normalizeLogLevel(undefined)).toBe('info');
  });

  it('should default unknown levels to info', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    expect(normalizeLogLevel('loud')).toBe('info');
    expect(warn).toHaveBeenCalledWith("[Config] Unknown log level 'loud', defaulting to info");
  });
});
