import chalk from 'chalk';
import Table from 'cli-table3';
import type { CountEntry, FindingsReport, LoadedRecord } from '../report/analyzer.js';
import { isSensitiveRecord } from '../report/analyzer.js';

function countTable(title: string, entries: CountEntry[]): string {
  const table = new Table({
    head: [title, 'count'],
    style: { head: ['cyan'] }
  });

  for (const entry of entries) {
    table.push([entry.key, String(entry.count)]);
  }

  return table.toString();
}

function text(value: unknown, fallback: string): string {
  return typeof value === 'string' && value ? value : fallback;
}

export function renderSummary(report: FindingsReport): string {
  return [
    chalk.bold.green(`total results: ${report.total}`),
    chalk.bold.red(`sensitive data: ${report.sensitive}`),
  ].join('\n');
}

export function renderCategories(report: FindingsReport): string {
  return countTable('category', report.byCategory);
}

export function renderDomains(report: FindingsReport): string {
  return countTable('domain', report.topDomains);
}

export function renderDetails(records: readonly LoadedRecord[]): string {
  const table = new Table({
    head: ['category', 'dork', 'url'],
    style: { head: ['blue'] }
  });

  for (const record of records) {
    const url = text(record.url, 'no url');
    table.push([
      text(record.category, 'unknown'),
      text(record.dork, 'unknown'),
      isSensitiveRecord(record) ? chalk.bold.red(`sensitive data: ${url}`) : url,
    ]);
  }

  return table.toString();
}
