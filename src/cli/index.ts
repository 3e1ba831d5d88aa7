#!/usr/bin/env node

/**
 * dorkscan CLI
 *
 * INTENTIONAL CONSOLE USAGE
 * This file uses console.log/error for user-facing terminal output (chalk,
 * ora, cli-table3). Diagnostics from the scan itself go through the Pino
 * logger.
 */

import dotenv from 'dotenv';
import { Command, Option } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { ConfigurationError, DorkscanError, errorMessage } from '../errors.js';
import { createLogger, getLoggerOptionsFromEnv } from '../concerns/logger.js';
import { tryFnSync } from '../concerns/try-fn.js';
import { resolveScanConfig } from '../config/scan-config.js';
import { CANCEL_GRACE_PERIOD_MS, ScanOrchestrator } from '../scan/scan-orchestrator.class.js';
import { analyzeFindings, loadFindingRecords } from '../report/analyzer.js';
import {
  parseInteger,
  parseLogFormat,
  parseLogLevel,
  parseSeconds,
  toScanConfigInput,
  type ScanCliOptions,
} from './options.js';
import { renderCategories, renderDetails, renderDomains, renderSummary } from './report.js';

dotenv.config();

const program = new Command();

function banner(): void {
  console.log(chalk.cyan.bold('dorkscan') + chalk.gray(' - search engine dork scanner'));
  console.log(chalk.gray('Only scan targets you are authorized to test.\n'));
}

function fail(error: unknown): never {
  if (error instanceof DorkscanError) {
    console.error(chalk.red(`✗ ${error.message}`));
    if (error.suggestion) console.error(chalk.gray(`  ${error.suggestion}`));
  } else {
    console.error(chalk.red(`✗ ${errorMessage(error)}`));
  }
  process.exit(1);
}

program
  .name('dorkscan')
  .description('Run a catalog of search dorks and record every result URL')
  .version('1.0.0');

program
  .command('scan')
  .description('Run the dork catalog against the search backends')
  .option('-d, --dorks-file <path>', 'Dork catalog JSON file (default: dorks.json)')
  .option('-c, --category <name>', 'Run only this category')
  .option('-t, --target <domain>', 'Restrict queries to a domain (site:<domain>)')
  .option('-n, --num <count>', 'Findings kept per dork (default: 5)', parseInteger)
  .option('--depth <count>', 'URLs requested per query (default: 100)', parseInteger)
  .option('--concurrency <count>', 'Query pipelines in flight (default: 6)', parseInteger)
  .option('--delay <seconds>', 'Delay between query starts (default: 1.5)', parseSeconds)
  .option('--google-api-key <key>', 'Google Custom Search API key')
  .option('--google-cx <id>', 'Google Custom Search engine id')
  .option('--allow-sensitive', 'Include high/critical and sensitive categories')
  .option('--snapshot', 'Fetch each result page and look for secrets')
  .option('-o, --output-dir <dir>', 'Output directory (default: dorkscan-output)')
  .option('--ignore-ssl', 'Skip TLS certificate verification')
  .option('--tor', 'Route traffic through the local Tor SOCKS proxy')
  .option('--tor-port <port>', 'Tor SOCKS port (default: 9050)', parseInteger)
  .option('--proxy-host <host>', 'SOCKS5 proxy host')
  .option('--proxy-port <port>', 'SOCKS5 proxy port', parseInteger)
  .addOption(new Option('--log-level <level>', 'Log level').argParser(parseLogLevel))
  .addOption(new Option('--log-format <format>', 'Log format (json or pretty)').argParser(parseLogFormat))
  .action(async (options: ScanCliOptions) => {
    banner();

    const [ok, err, config] = tryFnSync(() => resolveScanConfig(toScanConfigInput(options)));
    if (!ok) fail(err);

    const logOptions = getLoggerOptionsFromEnv({ level: options.logLevel, format: options.logFormat });
    const logger = createLogger({ name: 'dorkscan', ...logOptions, level: logOptions.level ?? 'warn' });
    const scan = new ScanOrchestrator({ config, logger });
    const spinner = ora('Loading dork catalog...').start();

    let interrupts = 0;
    const onSigint = () => {
      interrupts++;
      if (interrupts > 1) {
        spinner.fail(chalk.red('Aborted'));
        process.exit(130);
      }
      spinner.text = chalk.yellow(`Interrupted, waiting up to ${CANCEL_GRACE_PERIOD_MS / 1000}s for in-flight requests...`);
      scan.stop();
      setTimeout(() => {
        spinner.fail(chalk.red('Grace period elapsed, exiting'));
        process.exit(130);
      }, CANCEL_GRACE_PERIOD_MS).unref();
    };
    process.on('SIGINT', onSigint);

    scan.on('category:skipped', ({ category, reason }) => {
      spinner.clear();
      console.log(chalk.yellow(`⚠ skipping category '${category}' (${reason})`));
      spinner.render();
    });

    scan.on('query:start', ({ query, index, total }) => {
      spinner.text = `[${index + 1}/${total}] ${chalk.cyan(query.category)} ${query.literal}`;
    });

    scan.on('finding', (finding) => {
      spinner.clear();
      const line = `${chalk.gray(finding.category)} ${finding.url}`;
      console.log(finding.sensitiveHint ? chalk.red(`! ${line}`) : `  ${line}`);
      spinner.render();
    });

    scan.on('persist:error', ({ finding }) => {
      spinner.clear();
      console.error(chalk.yellow(`⚠ could not persist ${finding.url}`));
      spinner.render();
    });

    try {
      const summary = await scan.run();
      const seconds = (summary.durationMs / 1000).toFixed(1);
      const status = `${summary.findings} findings (${summary.sensitive} sensitive) from ${summary.queries} queries in ${seconds}s`;

      if (summary.aborted) {
        spinner.warn(chalk.yellow(`Interrupted: ${status}`));
      } else {
        spinner.succeed(chalk.green(status));
      }

      console.log(chalk.gray(`\nResults saved to:`));
      console.log(`  ${summary.outputs.jsonl}`);
      console.log(`  ${summary.outputs.csv}`);
    } catch (error) {
      spinner.fail(chalk.red('Scan failed'));
      fail(error);
    } finally {
      process.off('SIGINT', onSigint);
    }

    process.exit(0);
  });

program
  .command('analyze')
  .description('Summarize the results of a previous scan')
  .option('-o, --output-dir <dir>', 'Output directory of the scan', process.env.DORKSCAN_OUTPUT_DIR || 'dorkscan-output')
  .option('--details', 'List every finding')
  .action(async (options: { outputDir: string; details?: boolean }) => {
    try {
      const loaded = await loadFindingRecords(options.outputDir);
      if (!loaded) {
        fail(new ConfigurationError(`No results found in ${options.outputDir}`, {
          suggestion: 'Run `dorkscan scan` first or pass --output-dir.'
        }));
      }

      console.log(chalk.green(`${loaded.format} file loaded: ${loaded.path}\n`));
      if (loaded.records.length === 0) {
        console.log(chalk.yellow('File is empty or invalid.'));
        return;
      }

      const report = analyzeFindings(loaded.records);
      console.log(renderSummary(report) + '\n');
      console.log(renderCategories(report));
      console.log(renderDomains(report));
      if (options.details) {
        console.log(renderDetails(loaded.records));
      }
    } catch (error) {
      fail(error);
    }
  });

await program.parseAsync(process.argv);
