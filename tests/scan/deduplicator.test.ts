import { describe, it, expect } from 'vitest';
import { Deduplicator } from '../../src/scan/deduplicator.class.js';

describe('Deduplicator', () => {
  it('should return every url on first sight, in order', () => {
    const dedup = new Deduplicator();
    expect(dedup.filterNew(['http://a.test/1', 'http://a.test/2'])).toEqual(['http://a.test/1', 'http://a.test/2']);
    expect(dedup.size).toBe(2);
  });

  it('should return an empty list when the same candidates are filtered twice', () => {
    const dedup = new Deduplicator();
    const candidates = ['http://a.test/1', 'http://a.test/2', 'http://a.test/3'];

    dedup.filterNew(candidates);
    expect(dedup.filterNew(candidates)).toEqual([]);
  });

  it('should drop repeats inside a single candidate list', () => {
    const dedup = new Deduplicator();
    expect(dedup.filterNew(['http://a.test/1', 'http://a.test/1', 'http://a.test/2'])).toEqual([
      'http://a.test/1',
      'http://a.test/2'
    ]);
  });

  it('should keep only the unseen part of an overlapping list', () => {
    const dedup = new Deduplicator(['http://a.test/1']);
    expect(dedup.filterNew(['http://a.test/1', 'http://a.test/9'])).toEqual(['http://a.test/9']);
    expect(dedup.has('http://a.test/9')).toBe(true);
  });

  it('should ignore empty urls', () => {
    const dedup = new Deduplicator();
    expect(dedup.filterNew(['', 'http://a.test/1'])).toEqual(['http://a.test/1']);
    expect(dedup.values()).toEqual(['http://a.test/1']);
  });
});
