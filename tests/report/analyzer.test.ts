import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { writeFile } from 'fs/promises';
import path from 'path';
import {
  analyzeFindings,
  isSensitiveRecord,
  loadFindingRecords,
  parseCsvRecords,
  parseJsonLines
} from '../../src/report/analyzer.js';
import { createTempDir, removeTempDir } from '../utils/fixtures.js';

describe('parseJsonLines', () => {
  it('should skip blank and malformed lines', () => {
    const text = '{"url":"http://a.test/1"}\n\nnot json\n{"url":"http://a.test/2"}\n[1,2]\n';
    expect(parseJsonLines(text)).toEqual([{ url: 'http://a.test/1' }, { url: 'http://a.test/2' }]);
  });
});

describe('parseCsvRecords', () => {
  it('should key rows by the header', () => {
    const text = 'timestamp,category,url,sensitive_hint\n1.5,files,http://a.test/1,false\n';
    expect(parseCsvRecords(text)).toEqual([
      { timestamp: '1.5', category: 'files', url: 'http://a.test/1', sensitive_hint: 'false' }
    ]);
  });
});

describe('isSensitiveRecord', () => {
  it('should accept the boolean and its textual forms', () => {
    expect(isSensitiveRecord({ sensitive_hint: true })).toBe(true);
    expect(isSensitiveRecord({ sensitive_hint: 'true' })).toBe(true);
    expect(isSensitiveRecord({ sensitive_hint: 'True' })).toBe(true);
    expect(isSensitiveRecord({ sensitive_hint: '1' })).toBe(true);
  });

  it('should reject everything else', () => {
    expect(isSensitiveRecord({ sensitive_hint: false })).toBe(false);
    expect(isSensitiveRecord({ sensitive_hint: 'false' })).toBe(false);
    expect(isSensitiveRecord({ sensitive_hint: '' })).toBe(false);
    expect(isSensitiveRecord({})).toBe(false);
  });
});

describe('analyzeFindings', () => {
  it('should count totals, categories and domains', () => {
    const report = analyzeFindings([
      { category: 'Files', url: 'http://Example.com/a.pdf', sensitive_hint: false },
      { category: 'files', url: 'http://example.com/b.pdf', sensitive_hint: true },
      { category: 'login', url: 'https://portal.test:8443/admin', sensitive_hint: 'False' },
      { url: 'not a url' }
    ]);

    expect(report).toEqual({
      total: 4,
      sensitive: 1,
      byCategory: [
        { key: 'files', count: 2 },
        { key: 'login', count: 1 },
        { key: 'unknown', count: 1 }
      ],
      topDomains: [
        { key: 'example.com', count: 2 },
        { key: 'portal.test:8443', count: 1 }
      ]
    });
  });

  it('should keep only the ten most common domains', () => {
    const records = Array.from({ length: 12 }, (_, i) => ({ category: 'x', url: `http://host${i}.test/` }));
    records.push({ category: 'x', url: 'http://host11.test/again' });

    const report = analyzeFindings(records);

    expect(report.topDomains).toHaveLength(10);
    expect(report.topDomains[0]).toEqual({ key: 'host11.test', count: 2 });
  });

  it('should report zeros for no records', () => {
    expect(analyzeFindings([])).toEqual({ total: 0, sensitive: 0, byCategory: [], topDomains: [] });
  });
});

describe('loadFindingRecords', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await createTempDir();
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it('should prefer the JSONL file', async () => {
    await writeFile(path.join(dir, 'results.jsonl'), '{"url":"http://a.test/1","sensitive_hint":true}\n');
    await writeFile(path.join(dir, 'results.csv'), 'url\nhttp://a.test/csv\n');

    const loaded = await loadFindingRecords(dir);

    expect(loaded).toEqual({
      format: 'jsonl',
      path: path.join(dir, 'results.jsonl'),
      records: [{ url: 'http://a.test/1', sensitive_hint: true }]
    });
  });

  it('should fall back to the CSV file', async () => {
    await writeFile(path.join(dir, 'results.csv'), 'url,sensitive_hint\nhttp://a.test/csv,True\n');

    const loaded = await loadFindingRecords(dir);

    expect(loaded?.format).toBe('csv');
    expect(loaded?.records).toEqual([{ url: 'http://a.test/csv', sensitive_hint: 'True' }]);
  });

  it('should resolve null when there are no results', async () => {
    expect(await loadFindingRecords(dir)).toBeNull();
  });
});
