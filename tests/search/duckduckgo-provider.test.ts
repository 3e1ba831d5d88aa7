import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { MockAgent } from 'undici';
import { DuckDuckGoProvider } from '../../src/search/duckduckgo-provider.class.js';
import type { HttpClient } from '../../src/concerns/http-client.js';
import { createMockHttp, silentLogger } from '../utils/fixtures.js';

const ORIGIN = 'https://html.duckduckgo.com';
const RESULTS = '<div class="result"><a class="result__url" href="//duckduckgo.com/l/?uddg=http%3A%2F%2Fexample.com%2Fa.pdf">a</a></div>'
  + '<div class="result"><a class="result__url" href="http://example.com/b.pdf">b</a></div>';

const isSearchPath = (path: string) => path.startsWith('/html/');

describe('DuckDuckGoProvider', () => {
  let agent: MockAgent;
  let http: HttpClient;
  let provider: DuckDuckGoProvider;

  beforeEach(() => {
    ({ agent, http } = createMockHttp());
    provider = new DuckDuckGoProvider({ http, logger: silentLogger() });
  });

  afterEach(async () => {
    await agent.close();
  });

  it('should return the extracted links as hits', async () => {
    agent.get(ORIGIN).intercept({ path: isSearchPath, method: 'GET' }).reply(200, RESULTS);

    const outcome = await provider.search({ query: 'filetype:pdf confidential', desiredCount: 10 });

    expect(outcome).toEqual({
      kind: 'hits',
      provider: 'duckduckgo',
      urls: ['http://example.com/a.pdf', 'http://example.com/b.pdf']
    });
  });

  it('should send the query in the q parameter', async () => {
    const seen: string[] = [];
    agent.get(ORIGIN)
      .intercept({
        path: (path: string) => {
          seen.push(path);
          return isSearchPath(path);
        },
        method: 'GET'
      })
      .reply(200, RESULTS);

    await provider.search({ query: 'site:example.com filetype:pdf', desiredCount: 10 });

    const url = new URL(seen[seen.length - 1] ?? '', ORIGIN);
    expect(url.searchParams.get('q')).toBe('site:example.com filetype:pdf');
  });

  it('should truncate hits to the desired count', async () => {
    agent.get(ORIGIN).intercept({ path: isSearchPath, method: 'GET' }).reply(200, RESULTS);

    const outcome = await provider.search({ query: 'q', desiredCount: 1 });

    expect(outcome).toEqual({ kind: 'hits', provider: 'duckduckgo', urls: ['http://example.com/a.pdf'] });
  });

  it('should report a 403 as blocked without extracting anything', async () => {
    agent.get(ORIGIN).intercept({ path: isSearchPath, method: 'GET' }).reply(403, RESULTS);

    const outcome = await provider.search({ query: 'q', desiredCount: 10 });

    expect(outcome).toEqual({ kind: 'blocked', provider: 'duckduckgo', status: 403 });
  });

  it('should return empty for other error statuses', async () => {
    agent.get(ORIGIN).intercept({ path: isSearchPath, method: 'GET' }).reply(503, 'unavailable');

    const outcome = await provider.search({ query: 'q', desiredCount: 10 });

    expect(outcome).toEqual({ kind: 'empty', provider: 'duckduckgo', reason: 'HTTP 503' });
  });

  it('should return empty when the page has no results', async () => {
    agent.get(ORIGIN).intercept({ path: isSearchPath, method: 'GET' }).reply(200, '<p>No results.</p>');

    const outcome = await provider.search({ query: 'q', desiredCount: 10 });

    expect(outcome).toEqual({ kind: 'empty', provider: 'duckduckgo', reason: 'no result links on the page' });
  });

  it('should return empty on transport failure', async () => {
    agent.get(ORIGIN).intercept({ path: isSearchPath, method: 'GET' }).replyWithError(new Error('socket hang up'));

    const outcome = await provider.search({ query: 'q', desiredCount: 10 });

    expect(outcome.kind).toBe('empty');
  });
});
