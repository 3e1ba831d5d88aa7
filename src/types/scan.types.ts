export type RiskLevel = 'low' | 'medium' | 'high' | 'critical' | 'unknown';

export const RISK_LEVELS: readonly RiskLevel[] = ['low', 'medium', 'high', 'critical', 'unknown'];

export interface DorkCategory {
  name: string;
  description: string;
  risk: RiskLevel;
  sensitive: boolean;
  patterns: string[];
}

/** Categories in file order */
export type DorkCatalog = DorkCategory[];

export interface Query {
  category: string;
  pattern: string;
  literal: string;
}

export type FindingStatus = number | 'error';

export interface Finding {
  /** Seconds since epoch, fractional */
  timestamp: number;
  category: string;
  dork: string;
  query: string;
  url: string;
  status?: FindingStatus;
  title?: string;
  contentExcerpt?: string;
  finalUrl?: string;
  sensitiveHint: boolean;
  error?: string;
}

/**
 * On-disk shape of a finding: the fixed CSV columns in order, then the
 * JSONL-only extras.
 */
export interface FindingRecord {
  timestamp: number;
  category: string;
  dork: string;
  query: string;
  url: string;
  status?: FindingStatus;
  title?: string;
  sensitive_hint: boolean;
  error?: string;
  content_excerpt?: string;
  final_url?: string;
}

export const CSV_COLUMNS = [
  'timestamp',
  'category',
  'dork',
  'query',
  'url',
  'status',
  'title',
  'sensitive_hint',
  'error',
] as const;

export type CsvColumn = typeof CSV_COLUMNS[number];

export interface OutputPaths {
  dir: string;
  jsonl: string;
  csv: string;
}

export interface ScanSummary {
  startedAt: Date;
  finishedAt: Date;
  durationMs: number;
  queries: number;
  emptyQueries: number;
  skippedCategories: string[];
  findings: number;
  sensitive: number;
  aborted: boolean;
  outputs: OutputPaths;
}
