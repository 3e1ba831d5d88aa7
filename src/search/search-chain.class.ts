import type { Logger } from '../concerns/logger.js';
import type { HttpClient } from '../concerns/http-client.js';
import { GoogleCseProvider } from './google-cse-provider.class.js';
import { DuckDuckGoProvider } from './duckduckgo-provider.class.js';
import type { SearchOutcome, SearchProvider } from './search-provider.interface.js';

export interface ChainResult {
  urls: string[];
  /** Provider that produced the hits, null when every provider came back empty */
  provider: string | null;
  outcomes: SearchOutcome[];
}

/**
 * Ordered list of search providers. Each query walks the list once and stops
 * at the first provider reporting hits; `failed`, `empty` and `blocked`
 * outcomes move on to the next provider. Nothing is retried.
 */
export class SearchChain {
  readonly providers: readonly SearchProvider[];
  private logger: Logger;

  constructor(providers: SearchProvider[], logger: Logger) {
    this.providers = providers;
    this.logger = logger;
  }

  async resolve(query: string, desiredCount: number, signal?: AbortSignal): Promise<ChainResult> {
    const outcomes: SearchOutcome[] = [];

    for (const provider of this.providers) {
      if (signal?.aborted) break;

      this.logger.debug({ provider: provider.name, query }, 'querying search provider');
      const outcome = await provider.search({ query, desiredCount, signal });
      outcomes.push(outcome);

      switch (outcome.kind) {
        case 'hits':
          return { urls: outcome.urls, provider: outcome.provider, outcomes };
        case 'failed':
          this.logger.warn(
            { provider: outcome.provider, query, error: outcome.error.message },
            'search provider failed, falling back'
          );
          break;
        case 'empty':
          this.logger.info({ provider: outcome.provider, query, reason: outcome.reason }, 'search provider returned no results');
          break;
        case 'blocked':
          this.logger.warn({ provider: outcome.provider, query, status: outcome.status }, 'search provider is blocking requests');
          break;
      }
    }

    return { urls: [], provider: null, outcomes };
  }

  async search(query: string, desiredCount: number, signal?: AbortSignal): Promise<string[]> {
    const { urls } = await this.resolve(query, desiredCount, signal);
    return urls;
  }
}

export interface SearchChainOptions {
  http: HttpClient;
  logger: Logger;
  googleApiKey?: string | null;
  googleCx?: string | null;
  timeout?: number;
}

/**
 * API provider first when both the key and the engine id are present,
 * then the HTML scraper. Without credentials the scraper runs alone.
 */
export function createSearchChain(options: SearchChainOptions): SearchChain {
  const { http, logger, googleApiKey, googleCx, timeout } = options;
  const providers: SearchProvider[] = [];

  if (googleApiKey && googleCx) {
    providers.push(new GoogleCseProvider({ http, logger, apiKey: googleApiKey, cx: googleCx, timeout }));
  }
  providers.push(new DuckDuckGoProvider({ http, logger, timeout }));

  return new SearchChain(providers, logger);
}

export default SearchChain;
