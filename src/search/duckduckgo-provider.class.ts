import { errorMessage } from '../errors.js';
import { tryFn } from '../concerns/try-fn.js';
import type { HttpClient } from '../concerns/http-client.js';
import type { Logger } from '../concerns/logger.js';
import { extractResultLinks } from './html-extractors.js';
import { BROWSER_HEADERS, type SearchOutcome, type SearchProvider, type SearchRequest } from './search-provider.interface.js';

export const DUCKDUCKGO_HTML_URL = 'https://html.duckduckgo.com/html/';

export interface DuckDuckGoProviderOptions {
  http: HttpClient;
  logger: Logger;
  timeout?: number;
  endpoint?: string;
}

/**
 * Scrapes the DuckDuckGo HTML endpoint. Needs no credentials, which makes it
 * the fallback of the chain. Transport problems yield an empty outcome; a 403
 * is reported as `blocked` and no extraction is attempted.
 */
export class DuckDuckGoProvider implements SearchProvider {
  readonly name = 'duckduckgo';
  private http: HttpClient;
  private logger: Logger;
  private timeout: number;
  private endpoint: string;

  constructor(options: DuckDuckGoProviderOptions) {
    this.http = options.http;
    this.logger = options.logger;
    this.timeout = options.timeout ?? 30000;
    this.endpoint = options.endpoint || DUCKDUCKGO_HTML_URL;
  }

  async search({ query, desiredCount, signal }: SearchRequest): Promise<SearchOutcome> {
    const [ok, err, response] = await tryFn(this.http.get(this.endpoint, {
      query: { q: query },
      headers: BROWSER_HEADERS,
      timeout: this.timeout,
      signal
    }));

    if (!ok) {
      this.logger.warn({ provider: this.name, query, error: errorMessage(err) }, 'search request failed');
      return { kind: 'empty', provider: this.name, reason: errorMessage(err) };
    }

    if (response.status === 403) {
      this.logger.warn({ provider: this.name, query }, '403 Forbidden: automated requests are being blocked');
      return { kind: 'blocked', provider: this.name, status: 403 };
    }

    if (!response.ok) {
      this.logger.warn({ provider: this.name, query, status: response.status }, 'search returned an error status');
      return { kind: 'empty', provider: this.name, reason: `HTTP ${response.status}` };
    }

    const { strategy, links } = extractResultLinks(response.body, desiredCount);
    if (links.length === 0) {
      return { kind: 'empty', provider: this.name, reason: 'no result links on the page' };
    }

    this.logger.debug({ provider: this.name, query, strategy, count: links.length }, 'extracted result links');
    return { kind: 'hits', provider: this.name, urls: links };
  }
}

export default DuckDuckGoProvider;
