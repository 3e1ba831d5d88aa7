import * as cheerio from 'cheerio';
import { FetchError, errorMessage } from '../errors.js';
import { tryFn, tryFnSync } from '../concerns/try-fn.js';
import type { HttpClient } from '../concerns/http-client.js';
import type { Logger } from '../concerns/logger.js';

export const DEFAULT_EXCERPT_LENGTH = 2000;
export const DEFAULT_SNAPSHOT_TIMEOUT = 60000;
/** Bytes read per excerpt character; covers the widest UTF-8 sequence */
export const BYTES_PER_EXCERPT_CHAR = 4;

export interface PageSnapshot {
  kind: 'page';
  finalUrl: string;
  status: number;
  title?: string;
  contentExcerpt: string;
}

export interface ErrorSnapshot {
  kind: 'error';
  url: string;
  status: 'error';
  error: string;
}

export type Snapshot = PageSnapshot | ErrorSnapshot;

export interface SnapshotFetcherOptions {
  http: HttpClient;
  logger: Logger;
  userAgent: string;
  timeout?: number;
  excerptLength?: number;
}

export function extractTitle(html: string): string | undefined {
  const [ok, , title] = tryFnSync(() => cheerio.load(html)('title').first().text().trim());
  return ok && title ? title : undefined;
}

/**
 * Retrieves a result page for heuristic inspection. Only a bounded prefix of
 * the body is kept. Failures come back as an ErrorSnapshot, never as a throw,
 * so one dead link cannot stop the remaining URLs of a query.
 */
export class SnapshotFetcher {
  private http: HttpClient;
  private logger: Logger;
  private userAgent: string;
  private timeout: number;
  private excerptLength: number;

  constructor(options: SnapshotFetcherOptions) {
    this.http = options.http;
    this.logger = options.logger;
    this.userAgent = options.userAgent;
    this.timeout = options.timeout ?? DEFAULT_SNAPSHOT_TIMEOUT;
    this.excerptLength = options.excerptLength ?? DEFAULT_EXCERPT_LENGTH;
  }

  /** Reads at most `excerptLength * 4` bytes; the title is taken from that prefix */
  async fetch(url: string, signal?: AbortSignal): Promise<Snapshot> {
    const [ok, err, response] = await tryFn(this.http.get(url, {
      headers: { 'User-Agent': this.userAgent },
      timeout: this.timeout,
      maxBytes: this.excerptLength * BYTES_PER_EXCERPT_CHAR,
      signal
    }));

    if (!ok) {
      return this._failed(new FetchError(errorMessage(err), { url, original: err }));
    }

    if (!response.ok) {
      return this._failed(new FetchError(`HTTP ${response.status} for ${response.url}`, { url, status: response.status }));
    }

    return {
      kind: 'page',
      finalUrl: response.url,
      status: response.status,
      title: extractTitle(response.body),
      contentExcerpt: response.body.slice(0, this.excerptLength)
    };
  }

  private _failed(error: FetchError): ErrorSnapshot {
    this.logger.warn({ url: error.url, status: error.status, error: error.message }, 'snapshot fetch failed');
    return { kind: 'error', url: error.url, status: 'error', error: error.message };
  }
}

export default SnapshotFetcher;
