import type { BackendError } from '../errors.js';

/**
 * What a single provider call produced. The chain walks providers in order
 * and stops at the first `hits`; every other kind means "try the next one".
 */
export type SearchOutcome =
  | { kind: 'hits'; provider: string; urls: string[] }
  | { kind: 'empty'; provider: string; reason: string }
  | { kind: 'blocked'; provider: string; status: number }
  | { kind: 'failed'; provider: string; error: BackendError };

export interface SearchRequest {
  query: string;
  desiredCount: number;
  signal?: AbortSignal;
}

export interface SearchProvider {
  readonly name: string;
  search(request: SearchRequest): Promise<SearchOutcome>;
}

export const BROWSER_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36';

export const BROWSER_HEADERS: Record<string, string> = {
  'User-Agent': BROWSER_USER_AGENT,
  'Accept': 'text/html,application/xhtml+xml,application/xml;q=0.9,image/avif,image/webp,*/*;q=0.8',
  'Accept-Language': 'en-US,en;q=0.9'
};
