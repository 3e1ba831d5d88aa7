/**
 * Dork catalog loading
 *
 * The catalog is a JSON object mapping category name to its metadata:
 *
 * ```json
 * {
 *   "files": { "description": "Exposed documents", "risk": "low", "patterns": ["filetype:pdf confidential"] },
 *   "creds": { "risk": "critical", "sensitive": true, "patterns": ["intext:password filetype:log"] },
 *   "misc": ["inurl:admin", "intitle:\"index of\""]
 * }
 * ```
 *
 * A bare list of patterns becomes a category with `risk: "unknown"`. A list
 * holding exactly one object is unwrapped, and the older `dorks` key is read
 * when `patterns` is absent. With neither key the category has no patterns
 * and the scan skips it.
 */

import { readFile } from 'fs/promises';
import Validator, { type ValidationError as FieldError } from 'fastest-validator';
import { ConfigurationError } from '../errors.js';
import { tryFn, tryFnSync } from '../concerns/try-fn.js';
import { isPlainObject } from '../concerns/guards.js';
import { RISK_LEVELS, type DorkCatalog, type DorkCategory, type RiskLevel } from '../types/scan.types.js';

const validator = new Validator();

const checkCategory = validator.compile({
  description: { type: 'string', optional: true },
  risk: { type: 'enum', values: [...RISK_LEVELS], optional: true },
  sensitive: { type: 'boolean', optional: true },
  patterns: { type: 'array', items: 'string' }
});

interface RawCategory {
  description?: string;
  risk?: RiskLevel;
  sensitive?: boolean;
  patterns: string[];
}

function formatFieldErrors(errors: FieldError[]): string {
  return errors.map((e) => e.message || `${e.field}: ${e.type}`).join('; ');
}

function unwrapEntry(value: unknown): unknown {
  if (Array.isArray(value)) {
    if (value.length === 1 && isPlainObject(value[0])) {
      return unwrapEntry(value[0]);
    }
    return { description: '', risk: 'unknown', patterns: value };
  }

  if (isPlainObject(value) && value.patterns === undefined) {
    const { dorks, ...rest } = value;
    return { ...rest, patterns: dorks ?? [] };
  }

  return value;
}

function toRawCategory(name: string, value: unknown): RawCategory {
  const entry = unwrapEntry(value);
  if (!isPlainObject(entry)) {
    throw new ConfigurationError(`Catalog category '${name}' must be an object or a list of patterns`, { category: name });
  }

  const result = checkCategory(entry);
  if (result !== true) {
    const details = Array.isArray(result) ? formatFieldErrors(result) : 'asynchronous validation is not supported';
    throw new ConfigurationError(`Catalog category '${name}' is invalid: ${details}`, { category: name });
  }

  return {
    description: typeof entry.description === 'string' ? entry.description : undefined,
    risk: RISK_LEVELS.find((level) => level === entry.risk),
    sensitive: typeof entry.sensitive === 'boolean' ? entry.sensitive : undefined,
    patterns: Array.isArray(entry.patterns) ? entry.patterns.filter((p): p is string => typeof p === 'string') : []
  };
}

/**
 * Normalizes an already-parsed catalog document. Throws ConfigurationError
 * when the document is not an object or holds no categories.
 */
export function parseCatalog(document: unknown, source = 'catalog'): DorkCatalog {
  if (!isPlainObject(document)) {
    throw new ConfigurationError(`${source} must be a JSON object mapping category names to dorks`);
  }

  const catalog: DorkCatalog = Object.entries(document).map(([name, value]) => {
    const raw = toRawCategory(name, value);
    return {
      name,
      description: raw.description ?? '',
      risk: raw.risk ?? 'unknown',
      sensitive: raw.sensitive ?? false,
      patterns: raw.patterns
    };
  });

  if (catalog.length === 0) {
    throw new ConfigurationError(`${source} is empty; add at least one category`);
  }

  return catalog;
}

export async function loadCatalog(path: string): Promise<DorkCatalog> {
  const [readOk, readErr, text] = await tryFn(readFile(path, 'utf-8'));
  if (!readOk) {
    throw new ConfigurationError(`Dorks file '${path}' could not be read: ${readErr.message}`, {
      original: readErr,
      path,
      suggestion: 'Create the catalog file or point --dorks-file at an existing one.'
    });
  }

  const [parseOk, parseErr, document] = tryFnSync((): unknown => JSON.parse(text));
  if (!parseOk) {
    throw new ConfigurationError(`Dorks file '${path}' is not valid JSON: ${parseErr.message}`, { original: parseErr, path });
  }

  return parseCatalog(document, `Dorks file '${path}'`);
}

export function isSensitiveCategory(category: Pick<DorkCategory, 'risk' | 'sensitive'>): boolean {
  return category.sensitive || category.risk === 'high' || category.risk === 'critical';
}

export interface CategorySelection {
  selected: DorkCategory[];
  missing: string[];
}

/**
 * Picks the categories a run covers: all of them in file order, or only the
 * named one. A name absent from the catalog is reported in `missing`.
 */
export function selectCategories(catalog: DorkCatalog, name?: string | null): CategorySelection {
  if (!name) {
    return { selected: [...catalog], missing: [] };
  }

  const found = catalog.find((category) => category.name === name);
  return found ? { selected: [found], missing: [] } : { selected: [], missing: [name] };
}

export function countPatterns(catalog: DorkCatalog): number {
  return catalog.reduce((sum, category) => sum + category.patterns.length, 0);
}
