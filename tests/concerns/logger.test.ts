import { describe, it, expect, afterEach } from 'vitest';
import { createLogger, getLoggerOptionsFromEnv, isLogLevel } from '../../src/concerns/logger.js';

function restore(name: string, value: string | undefined): void {
  if (value === undefined) delete process.env[name];
  else process.env[name] = value;
}

describe('getLoggerOptionsFromEnv', () => {
  const saved = { level: process.env.DORKSCAN_LOG_LEVEL, format: process.env.DORKSCAN_LOG_FORMAT };

  afterEach(() => {
    restore('DORKSCAN_LOG_LEVEL', saved.level);
    restore('DORKSCAN_LOG_FORMAT', saved.format);
  });

  it('should read level and format from the environment', () => {
    process.env.DORKSCAN_LOG_LEVEL = 'DEBUG';
    process.env.DORKSCAN_LOG_FORMAT = 'json';
    expect(getLoggerOptionsFromEnv()).toEqual({ level: 'debug', format: 'json' });
  });

  it('should ignore unknown values', () => {
    process.env.DORKSCAN_LOG_LEVEL = 'loud';
    process.env.DORKSCAN_LOG_FORMAT = 'xml';
    expect(getLoggerOptionsFromEnv()).toEqual({});
  });

  it('should let explicit options win', () => {
    process.env.DORKSCAN_LOG_LEVEL = 'debug';
    process.env.DORKSCAN_LOG_FORMAT = 'json';
    expect(getLoggerOptionsFromEnv({ level: 'error' })).toEqual({ level: 'error', format: 'json' });
  });

  it('should keep environment values when options are undefined', () => {
    process.env.DORKSCAN_LOG_LEVEL = 'debug';
    process.env.DORKSCAN_LOG_FORMAT = 'json';
    expect(getLoggerOptionsFromEnv({ level: undefined, format: undefined })).toEqual({ level: 'debug', format: 'json' });
  });
});

describe('createLogger', () => {
  it('should honor the level', () => {
    const logger = createLogger({ level: 'warn', format: 'json' });
    expect(logger.level).toBe('warn');
    expect(logger.isLevelEnabled('info')).toBe(false);
  });

  it('should bind extra fields through a child logger', () => {
    const logger = createLogger({ level: 'silent', format: 'json', bindings: { run: 'r1' } });
    expect(logger.bindings()).toMatchObject({ run: 'r1' });
  });
});

describe('isLogLevel', () => {
  it('should accept pino levels only', () => {
    expect(isLogLevel('silent')).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
    expect(isLogLevel(3)).toBe(false);
  });
});
