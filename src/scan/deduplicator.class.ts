/**
 * Run-scoped record of URLs already turned into findings.
 *
 * `filterNew` checks and inserts in one synchronous pass, so concurrent query
 * pipelines cannot both claim the same URL between an await.
 */
export class Deduplicator {
  private seen: Set<string>;

  constructor(initial: Iterable<string> = []) {
    this.seen = new Set(initial);
  }

  filterNew(urls: readonly string[]): string[] {
    const fresh: string[] = [];
    for (const url of urls) {
      if (!url || this.seen.has(url)) continue;
      this.seen.add(url);
      fresh.push(url);
    }
    return fresh;
  }

  has(url: string): boolean {
    return this.seen.has(url);
  }

  get size(): number {
    return this.seen.size;
  }

  values(): string[] {
    return [...this.seen];
  }
}

export default Deduplicator;
