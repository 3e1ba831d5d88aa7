import Validator from 'fastest-validator';
import { ConfigurationError } from '../errors.js';

export interface ProxyConfig {
  host: string;
  port: number;
}

export interface ScanConfig {
  /** Path of the dork catalog JSON file */
  catalogPath: string;
  /** Run only this category */
  category?: string;
  /** Restrict every query to this domain (`site:<target>`) */
  target?: string;
  /** Findings kept per dork after deduplication */
  resultsPerDork: number;
  /** URLs requested from the backends per query */
  searchDepth: number;
  /** Query pipelines allowed in flight at once */
  concurrency: number;
  /** Seconds between the starts of consecutive queries */
  delay: number;
  googleApiKey?: string;
  googleCx?: string;
  allowSensitive: boolean;
  snapshot: boolean;
  outputDir: string;
  ignoreSsl: boolean;
  proxy?: ProxyConfig;
  searchTimeout: number;
  snapshotTimeout: number;
  excerptLength: number;
}

export type ScanConfigInput = Partial<ScanConfig>;

export const DEFAULT_TOR_PORT = 9050;

export const DEFAULT_SCAN_CONFIG: ScanConfig = {
  catalogPath: 'dorks.json',
  resultsPerDork: 5,
  searchDepth: 100,
  concurrency: 6,
  delay: 1.5,
  allowSensitive: false,
  snapshot: false,
  outputDir: 'dorkscan-output',
  ignoreSsl: false,
  searchTimeout: 30000,
  snapshotTimeout: 60000,
  excerptLength: 2000,
};

const validator = new Validator();

const checkConfig = validator.compile({
  $$strict: false,
  catalogPath: { type: 'string', empty: false },
  category: { type: 'string', optional: true },
  target: { type: 'string', optional: true },
  resultsPerDork: { type: 'number', integer: true, positive: true },
  searchDepth: { type: 'number', integer: true, positive: true },
  concurrency: { type: 'number', integer: true, positive: true },
  delay: { type: 'number', min: 0 },
  googleApiKey: { type: 'string', optional: true },
  googleCx: { type: 'string', optional: true },
  allowSensitive: 'boolean',
  snapshot: 'boolean',
  outputDir: { type: 'string', empty: false },
  ignoreSsl: 'boolean',
  proxy: {
    type: 'object',
    optional: true,
    props: {
      host: { type: 'string', empty: false },
      port: { type: 'number', integer: true, min: 1, max: 65535 }
    }
  },
  searchTimeout: { type: 'number', integer: true, positive: true },
  snapshotTimeout: { type: 'number', integer: true, positive: true },
  excerptLength: { type: 'number', integer: true, positive: true }
});

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

/** Values taken from `DORKSCAN_*` environment variables */
export function scanConfigFromEnv(env: NodeJS.ProcessEnv = process.env): ScanConfigInput {
  const fromEnv: ScanConfigInput = {};

  const apiKey = nonEmpty(env.DORKSCAN_GOOGLE_API_KEY);
  if (apiKey) fromEnv.googleApiKey = apiKey;

  const cx = nonEmpty(env.DORKSCAN_GOOGLE_CX);
  if (cx) fromEnv.googleCx = cx;

  const outputDir = nonEmpty(env.DORKSCAN_OUTPUT_DIR);
  if (outputDir) fromEnv.outputDir = outputDir;

  const catalogPath = nonEmpty(env.DORKSCAN_DORKS_FILE);
  if (catalogPath) fromEnv.catalogPath = catalogPath;

  return fromEnv;
}

/**
 * Defaults, then environment, then explicit options. Blank credentials and
 * targets count as absent. Throws ConfigurationError on invalid values.
 */
export function resolveScanConfig(input: ScanConfigInput = {}, env: NodeJS.ProcessEnv = process.env): ScanConfig {
  const fromEnv = scanConfigFromEnv(env);
  const pick = <K extends keyof ScanConfig>(key: K): ScanConfig[K] =>
    input[key] ?? fromEnv[key] ?? DEFAULT_SCAN_CONFIG[key];

  const config: ScanConfig = {
    catalogPath: pick('catalogPath'),
    category: nonEmpty(pick('category')),
    target: nonEmpty(pick('target')),
    resultsPerDork: pick('resultsPerDork'),
    searchDepth: pick('searchDepth'),
    concurrency: pick('concurrency'),
    delay: pick('delay'),
    googleApiKey: nonEmpty(pick('googleApiKey')),
    googleCx: nonEmpty(pick('googleCx')),
    allowSensitive: pick('allowSensitive'),
    snapshot: pick('snapshot'),
    outputDir: pick('outputDir'),
    ignoreSsl: pick('ignoreSsl'),
    proxy: pick('proxy'),
    searchTimeout: pick('searchTimeout'),
    snapshotTimeout: pick('snapshotTimeout'),
    excerptLength: pick('excerptLength'),
  };

  const result = checkConfig(config);
  if (result !== true) {
    const details = Array.isArray(result)
      ? result.map((e) => e.message || `${e.field}: ${e.type}`).join('; ')
      : 'asynchronous validation is not supported';
    throw new ConfigurationError(`Invalid scan options: ${details}`);
  }

  return config;
}

export function hasApiCredentials(config: Pick<ScanConfig, 'googleApiKey' | 'googleCx'>): boolean {
  return Boolean(config.googleApiKey && config.googleCx);
}
