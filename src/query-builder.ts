import type { Query } from './types/scan.types.js';

/**
 * Turns a catalog pattern into the literal query sent to the backends.
 * Patterns are passed through untouched; dork syntax is not validated.
 */
export function buildQuery(category: string, pattern: string, target?: string | null): Query {
  const site = target?.trim();
  return {
    category,
    pattern,
    literal: site ? `site:${site} ${pattern}` : pattern
  };
}

export default buildQuery;
