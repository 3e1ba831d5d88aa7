// =============================================================================
// Scan
// =============================================================================

export {
  ScanOrchestrator,
  CANCEL_GRACE_PERIOD_MS,
  SNAPSHOT_INTERRUPTED,
  type ScanOrchestratorOptions,
  type ScanEvents,
  type ScanEventName,
  type SearchResolver,
  type PageFetcher,
  type FindingSink,
} from './scan/scan-orchestrator.class.js';
export { Deduplicator } from './scan/deduplicator.class.js';
export { Pacer, sleep } from './scan/pacer.js';
export { buildQuery } from './query-builder.js';

// =============================================================================
// Configuration & Catalog
// =============================================================================

export {
  resolveScanConfig,
  scanConfigFromEnv,
  hasApiCredentials,
  DEFAULT_SCAN_CONFIG,
  DEFAULT_TOR_PORT,
  type ScanConfig,
  type ScanConfigInput,
  type ProxyConfig,
} from './config/scan-config.js';
export {
  loadCatalog,
  parseCatalog,
  selectCategories,
  isSensitiveCategory,
  countPatterns,
  type CategorySelection,
} from './catalog/dork-catalog.js';

// =============================================================================
// Search Backends
// =============================================================================

export { SearchChain, createSearchChain, type ChainResult, type SearchChainOptions } from './search/search-chain.class.js';
export { GoogleCseProvider } from './search/google-cse-provider.class.js';
export { DuckDuckGoProvider } from './search/duckduckgo-provider.class.js';
export { extractResultLinks, normalizeResultHref, DEFAULT_STRATEGIES } from './search/html-extractors.js';
export * from './search/search-provider.interface.js';

// =============================================================================
// Snapshots & Persistence
// =============================================================================

export { SnapshotFetcher, extractTitle, type Snapshot, type PageSnapshot, type ErrorSnapshot } from './snapshot/snapshot-fetcher.class.js';
export { containsSensitive, findSensitiveTerm, SENSITIVE_TERMS } from './snapshot/sensitive-detector.js';
export {
  PersistenceSink,
  toFindingRecord,
  toCsvRow,
  JSONL_FILENAME,
  CSV_FILENAME,
  type AppendResult,
} from './sinks/persistence-sink.class.js';
export { loadFindingRecords, analyzeFindings, type FindingsReport, type LoadedFindings } from './report/analyzer.js';

// =============================================================================
// Concerns
// =============================================================================

export { HttpClient, createHttpClient, RequestTimeoutError, type HttpResponse, type HttpClientOptions } from './concerns/http-client.js';
export { DirectDialer, SocksDialer, createDialer, type Dialer, type DialOptions } from './concerns/dialer.js';
export { createLogger, getLoggerOptionsFromEnv, type Logger, type LogLevel, type LogFormat } from './concerns/logger.js';
export { tryFn, tryFnSync, type TryResult } from './concerns/try-fn.js';

export * from './errors.js';
export * from './types/scan.types.js';
