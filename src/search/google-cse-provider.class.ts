import { BackendError, errorMessage } from '../errors.js';
import { tryFn, tryFnSync } from '../concerns/try-fn.js';
import { asRecord } from '../concerns/guards.js';
import type { HttpClient } from '../concerns/http-client.js';
import type { Logger } from '../concerns/logger.js';
import type { SearchOutcome, SearchProvider, SearchRequest } from './search-provider.interface.js';

export const GOOGLE_CSE_URL = 'https://www.googleapis.com/customsearch/v1';

/** The JSON API serves at most 10 results per page */
export const GOOGLE_CSE_MAX_PAGE_SIZE = 10;

export interface GoogleCseProviderOptions {
  http: HttpClient;
  logger: Logger;
  apiKey: string;
  cx: string;
  timeout?: number;
  endpoint?: string;
}

function parseJson(body: string): unknown {
  const [ok, , data] = tryFnSync((): unknown => JSON.parse(body));
  return ok ? data : null;
}

export function extractItemLinks(payload: unknown): string[] {
  const items = asRecord(payload)?.items;
  if (!Array.isArray(items)) return [];

  const links: string[] = [];
  for (const item of items) {
    const link = asRecord(item)?.link;
    if (typeof link === 'string' && link.length > 0) {
      links.push(link);
    }
  }
  return links;
}

export function extractApiErrorMessage(payload: unknown): string | null {
  const message = asRecord(asRecord(payload)?.error)?.message;
  return typeof message === 'string' ? message : null;
}

/**
 * Google Custom Search JSON API. Every failure is reported as a `failed`
 * outcome carrying a BackendError so the chain can fall through.
 */
export class GoogleCseProvider implements SearchProvider {
  readonly name = 'google-cse';
  private http: HttpClient;
  private logger: Logger;
  private apiKey: string;
  private cx: string;
  private timeout: number;
  private endpoint: string;

  constructor(options: GoogleCseProviderOptions) {
    this.http = options.http;
    this.logger = options.logger;
    this.apiKey = options.apiKey;
    this.cx = options.cx;
    this.timeout = options.timeout ?? 30000;
    this.endpoint = options.endpoint || GOOGLE_CSE_URL;
  }

  async search({ query, desiredCount, signal }: SearchRequest): Promise<SearchOutcome> {
    const num = Math.max(1, Math.min(desiredCount, GOOGLE_CSE_MAX_PAGE_SIZE));

    const [ok, err, response] = await tryFn(this.http.get(this.endpoint, {
      query: { key: this.apiKey, cx: this.cx, q: query, num },
      headers: { 'Accept': 'application/json' },
      timeout: this.timeout,
      signal
    }));

    if (!ok) {
      return this._failed(new BackendError(`network error: ${errorMessage(err)}`, {
        provider: this.name,
        query,
        original: err
      }));
    }

    if (!response.ok) {
      if (response.status === 400) {
        const upstream = extractApiErrorMessage(parseJson(response.body)) || 'unknown api error.';
        return this._failed(new BackendError(`google cse api error (400): ${upstream}`, {
          provider: this.name,
          query,
          status: 400,
          retriable: false
        }));
      }

      return this._failed(new BackendError(
        `google cse api returned an unexpected status code: ${response.status} - ${response.body.slice(0, 200)}`,
        { provider: this.name, query, status: response.status }
      ));
    }

    const urls = extractItemLinks(parseJson(response.body));
    if (urls.length === 0) {
      return { kind: 'empty', provider: this.name, reason: 'api returned no items' };
    }

    return { kind: 'hits', provider: this.name, urls };
  }

  private _failed(error: BackendError): SearchOutcome {
    this.logger.debug({ provider: this.name, query: error.query, status: error.status }, error.message);
    return { kind: 'failed', provider: this.name, error };
  }
}

export default GoogleCseProvider;
