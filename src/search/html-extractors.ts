import * as cheerio from 'cheerio';
import type { CheerioAPI } from 'cheerio';

export interface LinkExtractionStrategy {
  readonly name: string;
  extract($: CheerioAPI): Array<string | undefined>;
}

export type ExtractionOutcome =
  | { kind: 'links'; strategy: string; links: string[] }
  | { kind: 'next'; strategy: string };

const SEARCH_PAGE_BASE = 'https://html.duckduckgo.com/';
const ABSOLUTE_HTTP = /^https?:\/\//i;

/** Anchors DuckDuckGo marks as the displayed result URL */
export const resultUrlStrategy: LinkExtractionStrategy = {
  name: 'result__url',
  extract: ($) => $('a.result__url[href]').toArray().map((el) => $(el).attr('href'))
};

/** First link inside each result container; survives class renames on the anchor */
export const resultContainerStrategy: LinkExtractionStrategy = {
  name: 'result-container',
  extract: ($) => $('div.result').toArray().map((el) => $(el).find('a[href]').first().attr('href'))
};

export const DEFAULT_STRATEGIES: readonly LinkExtractionStrategy[] = [resultUrlStrategy, resultContainerStrategy];

/**
 * Resolves a result href to the page it points at. DuckDuckGo wraps targets
 * in `/l/?uddg=<encoded>` redirects; anything that is not http(s) is dropped.
 */
export function normalizeResultHref(href: string | undefined): string | null {
  if (!href) return null;
  const trimmed = href.trim();

  if (!ABSOLUTE_HTTP.test(trimmed)) {
    let resolved: URL;
    try {
      resolved = new URL(trimmed, SEARCH_PAGE_BASE);
    } catch {
      return null;
    }
    const target = resolved.searchParams.get('uddg');
    return target && ABSOLUTE_HTTP.test(target) ? target : null;
  }

  return trimmed;
}

function runStrategy($: CheerioAPI, strategy: LinkExtractionStrategy, limit: number): ExtractionOutcome {
  const links: string[] = [];
  for (const href of strategy.extract($)) {
    const link = normalizeResultHref(href);
    if (link && !links.includes(link)) {
      links.push(link);
    }
  }

  return links.length > 0
    ? { kind: 'links', strategy: strategy.name, links: links.slice(0, limit) }
    : { kind: 'next', strategy: strategy.name };
}

/**
 * Tries each strategy in order and returns the first non-empty link set,
 * truncated to `limit`. `strategy` is null when none matched.
 */
export function extractResultLinks(
  html: string,
  limit: number,
  strategies: readonly LinkExtractionStrategy[] = DEFAULT_STRATEGIES
): { strategy: string | null; links: string[] } {
  const $ = cheerio.load(html);

  for (const strategy of strategies) {
    const outcome = runStrategy($, strategy, limit);
    if (outcome.kind === 'links') {
      return { strategy: outcome.strategy, links: outcome.links };
    }
  }

  return { strategy: null, links: [] };
}
