import { readFile } from 'fs/promises';
import { existsSync } from 'fs';
import path from 'path';
import { parse } from 'csv-parse/sync';
import { PersistenceError } from '../errors.js';
import { tryFn, tryFnSync } from '../concerns/try-fn.js';
import { isPlainObject } from '../concerns/guards.js';
import { CSV_FILENAME, JSONL_FILENAME } from '../sinks/persistence-sink.class.js';

export const TOP_DOMAINS_LIMIT = 10;

/** A persisted finding as read back: JSONL keeps types, CSV yields strings */
export type LoadedRecord = Record<string, unknown>;

export interface LoadedFindings {
  format: 'jsonl' | 'csv';
  path: string;
  records: LoadedRecord[];
}

export interface CountEntry {
  key: string;
  count: number;
}

export interface FindingsReport {
  total: number;
  sensitive: number;
  byCategory: CountEntry[];
  topDomains: CountEntry[];
}

export function parseJsonLines(text: string): LoadedRecord[] {
  const records: LoadedRecord[] = [];
  for (const line of text.split('\n')) {
    const trimmed = line.trim();
    if (!trimmed) continue;
    const [ok, , value] = tryFnSync((): unknown => JSON.parse(trimmed));
    if (ok && isPlainObject(value)) records.push(value);
  }
  return records;
}

export function parseCsvRecords(text: string): LoadedRecord[] {
  const rows: unknown = parse(text, { columns: true, skip_empty_lines: true, relax_column_count: true });
  return Array.isArray(rows) ? rows.filter(isPlainObject) : [];
}

/**
 * Reads the findings of a previous run from `outputDir`: the JSONL file when
 * present, the CSV file otherwise. Resolves null when neither exists.
 */
export async function loadFindingRecords(outputDir: string): Promise<LoadedFindings | null> {
  const jsonl = path.join(outputDir, JSONL_FILENAME);
  const csv = path.join(outputDir, CSV_FILENAME);

  const source = existsSync(jsonl) ? { format: 'jsonl' as const, file: jsonl }
    : existsSync(csv) ? { format: 'csv' as const, file: csv }
    : null;
  if (!source) return null;
  const { format, file } = source;

  const [ok, err, text] = await tryFn(readFile(file, 'utf-8'));
  if (!ok) {
    throw new PersistenceError(`failed to read ${file}: ${err.message}`, { path: file, original: err });
  }

  return {
    format,
    path: file,
    records: format === 'jsonl' ? parseJsonLines(text) : parseCsvRecords(text),
  };
}

export function isSensitiveRecord(record: LoadedRecord): boolean {
  const hint = record.sensitive_hint;
  return hint === true || hint === 'true' || hint === 'True' || hint === '1';
}

function hostOf(url: unknown): string | null {
  if (typeof url !== 'string' || !url) return null;
  const [ok, , parsed] = tryFnSync(() => new URL(url));
  return ok && parsed.host ? parsed.host.toLowerCase() : null;
}

function ranked(counter: Map<string, number>, limit?: number): CountEntry[] {
  const entries = [...counter].map(([key, count]) => ({ key, count }));
  entries.sort((a, b) => b.count - a.count);
  return limit === undefined ? entries : entries.slice(0, limit);
}

function increment(counter: Map<string, number>, key: string): void {
  counter.set(key, (counter.get(key) ?? 0) + 1);
}

export function analyzeFindings(records: readonly LoadedRecord[]): FindingsReport {
  const categories = new Map<string, number>();
  const domains = new Map<string, number>();
  let sensitive = 0;

  for (const record of records) {
    const category = typeof record.category === 'string' && record.category ? record.category : 'unknown';
    increment(categories, category.toLowerCase());

    if (isSensitiveRecord(record)) sensitive++;

    const host = hostOf(record.url);
    if (host) increment(domains, host);
  }

  return {
    total: records.length,
    sensitive,
    byCategory: ranked(categories),
    topDomains: ranked(domains, TOP_DOMAINS_LIMIT),
  };
}
