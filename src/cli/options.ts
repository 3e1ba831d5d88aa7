import { InvalidArgumentError } from 'commander';
import { DEFAULT_TOR_PORT, type ProxyConfig, type ScanConfigInput } from '../config/scan-config.js';
import { isLogLevel, type LogFormat, type LogLevel } from '../concerns/logger.js';

export interface ScanCliOptions {
  category?: string;
  target?: string;
  num?: number;
  depth?: number;
  concurrency?: number;
  delay?: number;
  googleApiKey?: string;
  googleCx?: string;
  allowSensitive?: boolean;
  snapshot?: boolean;
  outputDir?: string;
  ignoreSsl?: boolean;
  dorksFile?: string;
  tor?: boolean;
  torPort?: number;
  proxyHost?: string;
  proxyPort?: number;
  logLevel?: LogLevel;
  logFormat?: LogFormat;
}

export function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

export function parseSeconds(value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Expected a non-negative number of seconds.');
  }
  return parsed;
}

export function parseLogLevel(value: string): LogLevel {
  const level = value.toLowerCase();
  if (!isLogLevel(level)) {
    throw new InvalidArgumentError('Expected one of trace, debug, info, warn, error, fatal, silent.');
  }
  return level;
}

export function parseLogFormat(value: string): LogFormat {
  if (value !== 'json' && value !== 'pretty') {
    throw new InvalidArgumentError('Expected json or pretty.');
  }
  return value;
}

/**
 * `--proxy-host` wins over `--tor`; `--tor` alone routes through the local
 * Tor SOCKS port. `--proxy-port` without `--proxy-host` is rejected.
 */
export function resolveProxy(options: Pick<ScanCliOptions, 'tor' | 'torPort' | 'proxyHost' | 'proxyPort'>): ProxyConfig | undefined {
  if (options.proxyPort !== undefined && !options.proxyHost) {
    throw new InvalidArgumentError('--proxy-port requires --proxy-host (use --tor-port for the local Tor proxy).');
  }
  if (options.proxyHost) {
    return { host: options.proxyHost, port: options.proxyPort ?? options.torPort ?? DEFAULT_TOR_PORT };
  }
  if (options.tor) {
    return { host: '127.0.0.1', port: options.torPort ?? DEFAULT_TOR_PORT };
  }
  return undefined;
}

export function toScanConfigInput(options: ScanCliOptions): ScanConfigInput {
  return {
    catalogPath: options.dorksFile,
    category: options.category,
    target: options.target,
    resultsPerDork: options.num,
    searchDepth: options.depth,
    concurrency: options.concurrency,
    delay: options.delay,
    googleApiKey: options.googleApiKey,
    googleCx: options.googleCx,
    allowSensitive: options.allowSensitive,
    snapshot: options.snapshot,
    outputDir: options.outputDir,
    ignoreSsl: options.ignoreSsl,
    proxy: resolveProxy(options),
  };
}
