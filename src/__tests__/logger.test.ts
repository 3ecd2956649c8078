import { describe, it, expect, afterEach } from 'vitest';
import { createLogger, getLogger, getLoggerConfig, initializeLogger } from '../logger';

describe('logger', () => {
  const original = { LOG_LEVEL: process.env.LOG_LEVEL, NODE_ENV: process.env.NODE_ENV };

  afterEach(() => {
    for (const [key, value] of Object.entries(original)) {
      if (value === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = value;
      }
    }
  });

  it('should prefer an explicit level', () => {
    process.env.LOG_LEVEL = 'error';
    expect(getLoggerConfig('debug').level).toBe('debug');
  });

  it('should fall back to LOG_LEVEL, then warn', () => {
    process.env.LOG_LEVEL = 'info';
    expect(getLoggerConfig().level).toBe('info');

    process.env.LOG_LEVEL = 'chatty';
    expect(getLoggerConfig().level).toBe('warn');

    delete process.env.LOG_LEVEL;
    expect(getLoggerConfig().level).toBe('warn');
  });

  it('should be silent under test', () => {
    process.env.NODE_ENV = 'test';
    expect(getLoggerConfig().silent).toBe(true);
    expect(createLogger().silent).toBe(true);
  });

  it('should log when not under test', () => {
    process.env.NODE_ENV = 'production';
    expect(getLoggerConfig().silent).toBe(false);
  });

  it('should replace the shared logger on initialization', () => {
    const logger = initializeLogger('debug');

    expect(logger.level).toBe('debug');
    expect(getLogger()).toBe(logger);
  });
});
