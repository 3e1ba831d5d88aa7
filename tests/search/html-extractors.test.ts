import { describe, it, expect } from 'vitest';
import { extractResultLinks, normalizeResultHref } from '../../src/search/html-extractors.js';

function resultPage(hrefs: string[]): string {
  const results = hrefs
    .map((href) => `<div class="result"><h2><a class="result__a" href="${href}">t</a></h2><a class="result__url" href="${href}">u</a></div>`)
    .join('');
  return `<html><body>${results}</body></html>`;
}

describe('normalizeResultHref', () => {
  it('should keep absolute http(s) links', () => {
    expect(normalizeResultHref(' https://example.com/a ')).toBe('https://example.com/a');
    expect(normalizeResultHref('http://example.com/b')).toBe('http://example.com/b');
  });

  it('should unwrap redirect links through their uddg parameter', () => {
    expect(normalizeResultHref('//duckduckgo.com/l/?uddg=https%3A%2F%2Fexample.com%2Fdoc.pdf&rut=abc')).toBe('https://example.com/doc.pdf');
    expect(normalizeResultHref('/l/?uddg=http%3A%2F%2Fexample.com%2F')).toBe('http://example.com/');
  });

  it('should drop links that do not lead to an http(s) page', () => {
    expect(normalizeResultHref('javascript:void(0)')).toBeNull();
    expect(normalizeResultHref('/settings')).toBeNull();
    expect(normalizeResultHref('/l/?uddg=ftp%3A%2F%2Fexample.com')).toBeNull();
    expect(normalizeResultHref(undefined)).toBeNull();
    expect(normalizeResultHref('')).toBeNull();
  });
});

describe('extractResultLinks', () => {
  it('should use the result url anchors first', () => {
    const html = resultPage(['https://example.com/1', 'https://example.com/2']);
    expect(extractResultLinks(html, 10)).toEqual({
      strategy: 'result__url',
      links: ['https://example.com/1', 'https://example.com/2']
    });
  });

  it('should fall back to the first link of each result container', () => {
    const html = '<div class="result"><a href="https://example.com/x">x</a><a href="https://other.test/">o</a></div>'
      + '<div class="result"><a href="https://example.com/y">y</a></div>';

    expect(extractResultLinks(html, 10)).toEqual({
      strategy: 'result-container',
      links: ['https://example.com/x', 'https://example.com/y']
    });
  });

  it('should truncate to the limit', () => {
    const html = resultPage(['https://example.com/1', 'https://example.com/2', 'https://example.com/3']);
    expect(extractResultLinks(html, 2).links).toEqual(['https://example.com/1', 'https://example.com/2']);
  });

  it('should drop repeated links on the same page', () => {
    const html = resultPage(['https://example.com/1', 'https://example.com/1']);
    expect(extractResultLinks(html, 10).links).toEqual(['https://example.com/1']);
  });

  it('should report no strategy when nothing matches', () => {
    expect(extractResultLinks('<html><body><p>No results.</p></body></html>', 10)).toEqual({ strategy: null, links: [] });
  });
});
