import pino, { type Logger as PinoLogger, type LoggerOptions as PinoLoggerOptions, type TransportSingleOptions } from 'pino';
import { BaseError } from '../errors.js';

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';
export type LogFormat = 'json' | 'pretty';

export interface LoggerOptions {
  level?: LogLevel;
  name?: string;
  format?: LogFormat;
  bindings?: Record<string, unknown>;
}

export type Logger = PinoLogger;

const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

// API credentials travel inside config objects and request params
const REDACT_PATHS = [
  'googleApiKey',
  '*.googleApiKey',
  'config.googleApiKey',
  'params.key',
];

function serializeError(err: unknown): unknown {
  if (err instanceof BaseError) {
    return err.toJSON();
  }

  if (err instanceof Error) {
    return {
      name: err.name,
      message: err.message,
      stack: err.stack,
    };
  }

  return err;
}

function createPrettyTransport(): TransportSingleOptions {
  return {
    target: 'pino-pretty',
    options: {
      colorize: true,
      translateTime: 'HH:MM:ss.l',
      ignore: 'pid,hostname',
      singleLine: true
    }
  };
}

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && LOG_LEVELS.some((level) => level === value);
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const {
    level = 'info',
    name,
    format = 'pretty',
    bindings = {}
  } = options;

  const config: PinoLoggerOptions = {
    level,
    name,
    redact: { paths: REDACT_PATHS, censor: '[redacted]' },
    transport: format === 'pretty' && level !== 'silent' ? createPrettyTransport() : undefined,
    serializers: {
      err: serializeError,
      error: serializeError
    }
  };

  const logger = pino(config);

  return Object.keys(bindings).length > 0 ? logger.child(bindings) : logger;
}

/**
 * Reads `DORKSCAN_LOG_LEVEL` and `DORKSCAN_LOG_FORMAT`; explicit options win.
 */
export function getLoggerOptionsFromEnv(configOptions: LoggerOptions = {}): LoggerOptions {
  const options: LoggerOptions = {};

  const envLevel = process.env.DORKSCAN_LOG_LEVEL?.toLowerCase();
  if (isLogLevel(envLevel)) {
    options.level = envLevel;
  }

  const envFormat = process.env.DORKSCAN_LOG_FORMAT?.toLowerCase();
  if (envFormat === 'json' || envFormat === 'pretty') {
    options.format = envFormat;
  }

  if (configOptions.level) options.level = configOptions.level;
  if (configOptions.format) options.format = configOptions.format;

  return { ...configOptions, ...options };
}

export default createLogger;
