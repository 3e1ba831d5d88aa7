import EventEmitter from 'events';
import { PromisePool } from '@supercharge/promise-pool';
import { createLogger, getLoggerOptionsFromEnv, type Logger } from '../concerns/logger.js';
import { HttpClient } from '../concerns/http-client.js';
import { createDialer } from '../concerns/dialer.js';
import type { PersistenceError } from '../errors.js';
import type { ScanConfig } from '../config/scan-config.js';
import { isSensitiveCategory, loadCatalog, selectCategories } from '../catalog/dork-catalog.js';
import { buildQuery } from '../query-builder.js';
import { createSearchChain, type ChainResult } from '../search/search-chain.class.js';
import { BROWSER_HEADERS, BROWSER_USER_AGENT } from '../search/search-provider.interface.js';
import { SnapshotFetcher, type Snapshot } from '../snapshot/snapshot-fetcher.class.js';
import { containsSensitive } from '../snapshot/sensitive-detector.js';
import { PersistenceSink, type AppendResult } from '../sinks/persistence-sink.class.js';
import { Deduplicator } from './deduplicator.class.js';
import { Pacer } from './pacer.js';
import type {
  DorkCatalog,
  DorkCategory,
  Finding,
  OutputPaths,
  Query,
  ScanSummary,
} from '../types/scan.types.js';

export interface SearchResolver {
  resolve(query: string, desiredCount: number, signal?: AbortSignal): Promise<ChainResult>;
}

export interface PageFetcher {
  fetch(url: string, signal?: AbortSignal): Promise<Snapshot>;
}

export interface FindingSink {
  readonly paths: OutputPaths;
  init(): Promise<AppendResult>;
  append(finding: Finding): Promise<AppendResult>;
  drain(): Promise<void>;
}

export interface ScanOrchestratorOptions {
  config: ScanConfig;
  /** Already-loaded catalog; read from `config.catalogPath` otherwise */
  catalog?: DorkCatalog;
  logger?: Logger;
  http?: HttpClient;
  search?: SearchResolver;
  snapshots?: PageFetcher;
  sink?: FindingSink;
}

export interface ScanEvents {
  'category:start': { category: string; patterns: number };
  'category:skipped': { category: string; reason: 'sensitive' | 'empty' | 'missing' };
  'query:start': { query: Query; index: number; total: number };
  'query:empty': { query: Query };
  'query:done': { query: Query; provider: string | null; findings: number; duplicates: number };
  'finding': Finding;
  'persist:error': { finding: Finding; errors: PersistenceError[] };
  'run:done': ScanSummary;
}

export type ScanEventName = keyof ScanEvents;

/** Recorded as the snapshot error when a stop lands during the fetch */
export const SNAPSHOT_INTERRUPTED = 'interrupted';

export const CANCEL_GRACE_PERIOD_MS = 5000;

export interface ScanOrchestrator {
  emit<K extends ScanEventName>(event: K, payload: ScanEvents[K]): boolean;
  on<K extends ScanEventName>(event: K, listener: (payload: ScanEvents[K]) => void): this;
  once<K extends ScanEventName>(event: K, listener: (payload: ScanEvents[K]) => void): this;
  off<K extends ScanEventName>(event: K, listener: (payload: ScanEvents[K]) => void): this;
}

/**
 * Drives one scan: categories and dorks in catalog order, a bounded pool of
 * query pipelines, fixed start-to-start pacing, run-wide deduplication and
 * durable persistence of every finding.
 *
 * Every collaborator is an instance field; nothing is shared between runs.
 *
 * @example
 * const scan = new ScanOrchestrator({ config: resolveScanConfig({ target: 'example.com' }) });
 * scan.on('finding', (finding) => console.log(finding.url));
 * const summary = await scan.run();
 */
export class ScanOrchestrator extends EventEmitter {
  readonly config: ScanConfig;
  readonly logger: Logger;
  readonly deduplicator: Deduplicator;
  readonly sink: FindingSink;
  private catalog?: DorkCatalog;
  private http: HttpClient;
  private ownsHttp: boolean;
  private search: SearchResolver;
  private snapshots: PageFetcher;
  private pacer: Pacer;
  private controller: AbortController;
  private recorded: Finding[] = [];

  constructor(options: ScanOrchestratorOptions) {
    super();
    const { config } = options;

    this.config = config;
    this.catalog = options.catalog;
    this.logger = options.logger || createLogger({ name: 'dorkscan', ...getLoggerOptionsFromEnv() });
    this.deduplicator = new Deduplicator();
    this.pacer = new Pacer(config.delay * 1000);
    this.controller = new AbortController();

    if (options.http) {
      this.http = options.http;
      this.ownsHttp = false;
    } else {
      this.http = new HttpClient({
        headers: BROWSER_HEADERS,
        timeout: config.searchTimeout,
        ignoreSsl: config.ignoreSsl,
        dialer: createDialer(config.proxy),
      });
      this.ownsHttp = true;
    }

    this.search = options.search || createSearchChain({
      http: this.http,
      logger: this.logger,
      googleApiKey: config.googleApiKey,
      googleCx: config.googleCx,
      timeout: config.searchTimeout,
    });

    this.snapshots = options.snapshots || new SnapshotFetcher({
      http: this.http,
      logger: this.logger,
      userAgent: BROWSER_USER_AGENT,
      timeout: config.snapshotTimeout,
      excerptLength: config.excerptLength,
    });

    this.sink = options.sink || new PersistenceSink({ outputDir: config.outputDir, logger: this.logger });
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get aborted(): boolean {
    return this.controller.signal.aborted;
  }

  /** Findings recorded so far in this run, in append order */
  get findings(): readonly Finding[] {
    return this.recorded;
  }

  /** Stops dispatching new queries and aborts in-flight requests */
  stop(): void {
    if (this.aborted) return;
    this.logger.warn('scan interrupted, finishing in-flight work');
    this.controller.abort();
  }

  /**
   * Plans the queries for the selected categories. Sensitive categories are
   * skipped unless `allowSensitive` is set; empty and unknown ones are
   * reported.
   */
  plan(catalog: DorkCatalog): { queries: Query[]; skipped: string[] } {
    const { selected, missing } = selectCategories(catalog, this.config.category);
    const skipped: string[] = [];

    for (const name of missing) {
      this.logger.warn({ category: name }, 'category not found in catalog');
      this.emit('category:skipped', { category: name, reason: 'missing' });
      skipped.push(name);
    }

    const queries: Query[] = [];
    for (const category of selected) {
      if (isSensitiveCategory(category) && !this.config.allowSensitive) {
        this.logger.warn(
          { category: category.name, risk: category.risk },
          'skipping sensitive category (use --allow-sensitive to include it)'
        );
        this.emit('category:skipped', { category: category.name, reason: 'sensitive' });
        skipped.push(category.name);
        continue;
      }

      if (category.patterns.length === 0) {
        this.logger.warn({ category: category.name }, 'category has no dorks, skipping');
        this.emit('category:skipped', { category: category.name, reason: 'empty' });
        skipped.push(category.name);
        continue;
      }

      queries.push(...this._queriesFor(category));
    }

    return { queries, skipped };
  }

  async run(signal?: AbortSignal): Promise<ScanSummary> {
    const startedAt = new Date();
    const onAbort = () => this.stop();
    if (signal?.aborted) this.stop();
    signal?.addEventListener('abort', onAbort, { once: true });

    try {
      const catalog = this.catalog ?? await loadCatalog(this.config.catalogPath);
      const { queries, skipped } = this.plan(catalog);

      await this.sink.init();
      this.logger.info(
        { queries: queries.length, concurrency: this.config.concurrency, outputDir: this.sink.paths.dir },
        'scan started'
      );

      const counters = { queries: 0, emptyQueries: 0, findings: 0, sensitive: 0 };
      const started = new Set<string>();

      await PromisePool
        .withConcurrency(this.config.concurrency)
        .for(queries)
        .handleError(async (error, query) => {
          // Only programming errors reach this point; providers and sinks report theirs as values
          this.logger.error({ query: query.literal, err: error }, 'query pipeline failed');
        })
        .process(async (query, index, pool) => {
          if (this.aborted || !(await this.pacer.wait(this.signal))) {
            pool.stop();
            return;
          }

          if (!started.has(query.category)) {
            started.add(query.category);
            this.emit('category:start', {
              category: query.category,
              patterns: queries.filter((q) => q.category === query.category).length,
            });
          }

          counters.queries++;
          this.emit('query:start', { query, index, total: queries.length });

          const findings = await this._runQuery(query);
          if (findings === null) {
            counters.emptyQueries++;
            return;
          }

          counters.findings += findings.length;
          counters.sensitive += findings.filter((f) => f.sensitiveHint).length;
        });

      await this.sink.drain();

      const finishedAt = new Date();
      const summary: ScanSummary = {
        startedAt,
        finishedAt,
        durationMs: finishedAt.getTime() - startedAt.getTime(),
        ...counters,
        skippedCategories: skipped,
        aborted: this.aborted,
        outputs: this.sink.paths,
      };

      this.logger.info(
        { ...counters, aborted: summary.aborted, jsonl: summary.outputs.jsonl, csv: summary.outputs.csv },
        'scan finished'
      );
      this.emit('run:done', summary);
      return summary;
    } finally {
      signal?.removeEventListener('abort', onAbort);
      if (this.ownsHttp) {
        await this.http.close();
      }
    }
  }

  /** Returns the findings recorded for the query, or null when no backend had hits */
  private async _runQuery(query: Query): Promise<Finding[] | null> {
    const result = await this.search.resolve(query.literal, this.config.searchDepth, this.signal);

    if (result.urls.length === 0) {
      this.logger.info({ category: query.category, query: query.literal }, 'no results');
      this.emit('query:empty', { query });
      return null;
    }

    const fresh = this.deduplicator.filterNew(result.urls);
    const urls = fresh.slice(0, this.config.resultsPerDork);
    const findings: Finding[] = [];

    for (const url of urls) {
      if (this.aborted) break;

      const finding = await this._buildFinding(query, url);
      const persisted = await this.sink.append(finding);
      if (!persisted.ok) {
        this.emit('persist:error', { finding, errors: persisted.errors });
      }

      findings.push(finding);
      this.recorded.push(finding);
      this.emit('finding', finding);
    }

    this.logger.info(
      { category: query.category, query: query.literal, provider: result.provider, findings: findings.length },
      'query recorded'
    );
    this.emit('query:done', {
      query,
      provider: result.provider,
      findings: findings.length,
      duplicates: result.urls.length - fresh.length,
    });
    return findings;
  }

  private async _buildFinding(query: Query, url: string): Promise<Finding> {
    const finding: Finding = {
      timestamp: Date.now() / 1000,
      category: query.category,
      dork: query.pattern,
      query: query.literal,
      url,
      sensitiveHint: false,
    };

    if (!this.config.snapshot) return finding;

    const snapshot = await this.snapshots.fetch(url, this.signal);
    if (snapshot.kind === 'error') {
      finding.status = snapshot.status;
      finding.error = this.aborted ? SNAPSHOT_INTERRUPTED : snapshot.error;
      return finding;
    }

    finding.status = snapshot.status;
    finding.finalUrl = snapshot.finalUrl;
    finding.title = snapshot.title;
    finding.contentExcerpt = snapshot.contentExcerpt;
    finding.sensitiveHint = containsSensitive(snapshot.contentExcerpt);
    return finding;
  }

  private _queriesFor(category: DorkCategory): Query[] {
    return category.patterns.map((pattern) => buildQuery(category.name, pattern, this.config.target));
  }
}

export default ScanOrchestrator;
