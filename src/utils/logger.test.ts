import { afterEach, beforeEach, describe, expect, it, type MockInstance, vi } from 'vitest';
import { Logger, LogLevel, parseLogLevel, shouldUseColors } from './logger.js';

describe('Logger', () => {
  let logger: Logger;
  let consoleLogSpy: MockInstance<typeof console.log>;
  let consoleErrorSpy: MockInstance<typeof console.error>;

  beforeEach(() => {
    logger = new Logger({ useColors: false });
    consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    consoleErrorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    consoleLogSpy.mockRestore();
    consoleErrorSpy.mockRestore();
  });

  it('should log info messages', () => {
    logger.info('info message');
    expect(consoleLogSpy).toHaveBeenCalledWith(expect.stringContaining('ℹ️ info message'));
  });

  it('should send error messages to stderr', () => {
    logger.error('error message');
    expect(consoleErrorSpy).toHaveBeenCalledWith(expect.stringContaining('❌ error message'));
    expect(consoleLogSpy).not.toHaveBeenCalled();
  });

  it('should prefix lines with a MM-DD HH:mm:ss timestamp', () => {
    logger.success('done');
    const line = consoleLogSpy.mock.calls[0]?.[0];
    expect(line).toMatch(/^\d{2}-\d{2} \d{2}:\d{2}:\d{2} ✅ done$/);
  });

  it('should filter messages based on level', () => {
    logger.setLevel(LogLevel.WARNING);

    logger.debug('debug');
    logger.info('info');
    logger.success('success');
    logger.warning('warning');
    logger.error('error');

    expect(consoleLogSpy).toHaveBeenCalledTimes(1);
    expect(consoleLogSpy).toHaveBeenCalledWith(expect.stringContaining('warning'));
    expect(consoleErrorSpy).toHaveBeenCalledWith(expect.stringContaining('error'));
    expect(logger.getLevel()).toBe(LogLevel.WARNING);
  });

  it('should use colors when enabled', () => {
    logger = new Logger({ useColors: true });
    logger.info('message');
    expect(consoleLogSpy).toHaveBeenCalledWith(expect.stringContaining('\x1b[34mmessage\x1b[0m'));
  });

  it('should not emit escape codes when colors are disabled', () => {
    logger.info('message');
    expect(consoleLogSpy.mock.lastCall?.[0]).not.toContain('\x1b[');
  });
});

describe('parseLogLevel', () => {
  it('should accept any casing', () => {
    expect(parseLogLevel('debug')).toBe(LogLevel.DEBUG);
    expect(parseLogLevel(' Warning ')).toBe(LogLevel.WARNING);
  });

  it('should fall back for unknown or missing names', () => {
    expect(parseLogLevel('verbose')).toBe(LogLevel.INFO);
    expect(parseLogLevel(undefined, LogLevel.ERROR)).toBe(LogLevel.ERROR);
  });
});

describe('shouldUseColors', () => {
  it('should turn colors off when NO_COLOR is set', () => {
    expect(shouldUseColors({ NO_COLOR: '1' })).toBe(false);
  });
});
