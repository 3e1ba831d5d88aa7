import { mkdir, open } from 'fs/promises';
import path from 'path';
import { stringify } from 'csv-stringify/sync';
import { PersistenceError } from '../errors.js';
import { tryFn } from '../concerns/try-fn.js';
import type { Logger } from '../concerns/logger.js';
import {
  CSV_COLUMNS,
  type Finding,
  type FindingRecord,
  type OutputPaths,
} from '../types/scan.types.js';

export const JSONL_FILENAME = 'results.jsonl';
export const CSV_FILENAME = 'results.csv';

export interface PersistenceSinkOptions {
  outputDir: string;
  logger: Logger;
}

export interface AppendResult {
  ok: boolean;
  errors: PersistenceError[];
}

export function toFindingRecord(finding: Finding): FindingRecord {
  return {
    timestamp: finding.timestamp,
    category: finding.category,
    dork: finding.dork,
    query: finding.query,
    url: finding.url,
    status: finding.status,
    title: finding.title,
    sensitive_hint: finding.sensitiveHint,
    error: finding.error,
    content_excerpt: finding.contentExcerpt,
    final_url: finding.finalUrl,
  };
}

function csvCell(value: FindingRecord[keyof FindingRecord]): string {
  if (value === undefined) return '';
  return String(value);
}

export function toCsvRow(record: FindingRecord): string[] {
  return CSV_COLUMNS.map((column) => csvCell(record[column]));
}

const CSV_HEADER = stringify([[...CSV_COLUMNS]]);

/**
 * Append-only JSONL + CSV writer.
 *
 * Appends are queued so two findings never interleave inside a file, and each
 * one is fsync'ed before its promise resolves: an interrupted run leaves a
 * valid prefix of both files. Write failures are logged and returned, never
 * thrown.
 */
export class PersistenceSink {
  readonly paths: OutputPaths;
  private logger: Logger;
  private queue: Promise<unknown>;

  constructor(options: PersistenceSinkOptions) {
    const dir = path.resolve(options.outputDir);
    this.paths = {
      dir,
      jsonl: path.join(dir, JSONL_FILENAME),
      csv: path.join(dir, CSV_FILENAME),
    };
    this.logger = options.logger;
    this.queue = Promise.resolve();
  }

  /**
   * Creates the directory, an empty JSONL file and a CSV file holding only the
   * header when they are missing. Existing files are left as they are.
   */
  async init(): Promise<AppendResult> {
    const run = this.queue.then(() => this._init());
    this.queue = run;
    return run;
  }

  append(finding: Finding): Promise<AppendResult> {
    const run = this.queue.then(() => this._append(finding));
    this.queue = run;
    return run;
  }

  /** Resolves once every queued write has settled */
  async drain(): Promise<void> {
    await this.queue;
  }

  private async _init(): Promise<AppendResult> {
    const [dirOk, dirErr] = await tryFn(mkdir(this.paths.dir, { recursive: true }));
    if (!dirOk) {
      return this._report([this._error('create output directory', this.paths.dir, dirErr)]);
    }

    const errors: PersistenceError[] = [];
    const [jsonlOk, jsonlErr] = await tryFn(this._appendDurably(this.paths.jsonl, () => ''));
    if (!jsonlOk) errors.push(this._error('create', this.paths.jsonl, jsonlErr));

    const [csvOk, csvErr] = await tryFn(this._appendDurably(this.paths.csv, (size) => size === 0 ? CSV_HEADER : ''));
    if (!csvOk) errors.push(this._error('create', this.paths.csv, csvErr));

    return this._report(errors);
  }

  private async _append(finding: Finding): Promise<AppendResult> {
    const record = toFindingRecord(finding);
    const errors: PersistenceError[] = [];

    const line = JSON.stringify(record) + '\n';
    const [jsonlOk, jsonlErr] = await tryFn(this._appendDurably(this.paths.jsonl, () => line));
    if (!jsonlOk) errors.push(this._error('append to', this.paths.jsonl, jsonlErr, finding.url));

    const row = stringify([toCsvRow(record)]);
    const [csvOk, csvErr] = await tryFn(this._appendDurably(this.paths.csv, (size) => (size === 0 ? CSV_HEADER : '') + row));
    if (!csvOk) errors.push(this._error('append to', this.paths.csv, csvErr, finding.url));

    if (errors.length === 0) {
      this.logger.debug({ url: finding.url }, 'finding persisted');
    }
    return this._report(errors);
  }

  /**
   * Opens `file` for append (creating it), writes whatever `content` returns
   * for the current file size, then flushes to disk.
   */
  private async _appendDurably(file: string, content: (size: number) => string): Promise<void> {
    const handle = await open(file, 'a');
    try {
      const { size } = await handle.stat();
      const data = content(size);
      if (data.length > 0) {
        await handle.appendFile(data, 'utf-8');
        await handle.datasync();
      }
    } finally {
      await handle.close();
    }
  }

  private _error(action: string, file: string, original: Error, url?: string): PersistenceError {
    return new PersistenceError(`failed to ${action} ${file}: ${original.message}`, { path: file, url, original });
  }

  private _report(errors: PersistenceError[]): AppendResult {
    for (const error of errors) {
      this.logger.warn({ path: error.path, url: error.data.url, error: error.message }, 'output write failed');
    }
    return { ok: errors.length === 0, errors };
  }
}

export default PersistenceSink;
