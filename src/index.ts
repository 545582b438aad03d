#!/usr/bin/env node

import { Command } from 'commander';
import chalk from 'chalk';
import { loadConfig, type ConfigOverrides, type ScannerConfig } from './core/config.js';
import { FatalConfigError, errorMessage } from './core/errors.js';
import { createLogger } from './core/logger.js';
import {
  clearCache,
  executeClearTemp,
  executeFlush,
  executeScan,
  executeStatus,
  getCacheStats,
} from './core/scan-engine.js';
import { StopToken } from './core/stop-token.js';
import { formatBytes } from './output/format-utils.js';
import { renderStatus, renderStatusJson } from './output/status-renderer.js';
import { renderFlushCounts, renderRecovery, renderScanSummary, renderScanSummaryJson } from './output/summary-renderer.js';

const EXIT_OK = 0;
const EXIT_ERROR = 1;
const EXIT_CONFIG = 2;
const EXIT_INTERRUPTED = 130;

interface ScanOptions {
  years: string;
  verbose?: boolean;
  json?: boolean;
  startFrom?: string;
  resumeFromLast?: boolean;
  companyConcurrency?: string;
  docConcurrency?: string;
  maxRps?: string;
  includePdf?: boolean;
  saveMode?: string;
  resumePolicy?: string;
  maxStagingMb?: string;
  cache: boolean;
}

/**
 * Run a command body and turn failures into exit statuses:
 * 2 for configuration problems, 1 for anything unexpected.
 */
async function runCommand(body: () => Promise<number>): Promise<void> {
  try {
    process.exitCode = await body();
  } catch (err) {
    if (err instanceof FatalConfigError) {
      console.error(chalk.red(`Configuration error: ${err.message}`));
      process.exitCode = EXIT_CONFIG;
      return;
    }
    console.error(chalk.red(`Error: ${errorMessage(err)}`));
    process.exitCode = EXIT_ERROR;
  }
}

/** First signal asks for a graceful stop; a second one exits at once */
function installSignalHandlers(stop: StopToken, log: (message: string) => void): () => void {
  const onSignal = (signal: NodeJS.Signals) => {
    if (stop.requested) {
      console.error(chalk.red(`\n${signal} again; exiting without waiting`));
      process.exit(EXIT_INTERRUPTED);
    }
    stop.request(signal);
    log(`${signal} received; finishing in-flight documents (press Ctrl+C again to exit now)`);
  };
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);
  return () => {
    process.off('SIGINT', onSignal);
    process.off('SIGTERM', onSignal);
  };
}

function storageConfig(): ScannerConfig {
  return loadConfig(process.env, {}, { requireUserAgent: false });
}

const program = new Command();

program
  .name('edgar-crypto-scan')
  .description('Scan SEC EDGAR filings for cryptocurrency keywords and keep the matching evidence')
  .version('0.1.0');

program
  .command('scan')
  .description('Scan every company in a roster workbook (.xlsx, .xls or .csv)')
  .argument('<roster>', 'Roster file with CIK and name columns')
  .option('-y, --years <n>', 'Lookback window in years', '5')
  .option('-v, --verbose', 'Log state transitions and skipped documents')
  .option('-j, --json', 'Print the summary as JSON')
  .option('--start-from <cik>', 'Start at this CIK in roster order')
  .option('--resume-from-last', 'Start after the last CIK in the progress ledger')
  .option('--company-concurrency <n>', 'Companies scanned at once')
  .option('--doc-concurrency <n>', 'Documents fetched at once per company')
  .option('--max-rps <n>', 'Global request ceiling per second')
  .option('--include-pdf', 'Scan PDF exhibits as well')
  .option('--save-mode <mode>', 'excerpt or full')
  .option('--resume-policy <policy>', 'restart or reuse')
  .option('--max-staging-mb <n>', 'Flush completed folders when staging grows past this size')
  .option('--no-cache', 'Do not use the metadata cache')
  .action(async (roster: string, options: ScanOptions) => {
    await runCommand(async () => {
      const overrides: ConfigOverrides = {
        companyConcurrency: options.companyConcurrency,
        docConcurrency: options.docConcurrency,
        maxRps: options.maxRps,
        includePdf: options.includePdf,
        saveMode: options.saveMode,
        resumePolicy: options.resumePolicy,
        maxStagingMb: options.maxStagingMb,
        useCache: options.cache ? undefined : false,
      };
      const config = loadConfig(process.env, overrides);
      const logger = createLogger({ verbose: options.verbose });
      const stop = new StopToken();
      const removeHandlers = installSignalHandlers(stop, message => logger.warn(message));

      try {
        logger.info(
          `Staging ${config.stagingDir}, archive ${config.archiveDir}; ` +
          `${config.companyConcurrency} companies x ${config.docConcurrency} documents at ${config.maxRps} req/s`
        );
        const result = await executeScan(
          {
            rosterPath: roster,
            yearsBack: Number(options.years),
            startFrom: options.startFrom ?? null,
            resumeFromLast: options.resumeFromLast ?? false,
          },
          { config, logger, stop }
        );

        const recovery = renderRecovery(result.recovery);
        if (recovery) console.log(chalk.yellow(recovery));

        if (options.json) {
          console.log(renderScanSummaryJson(result.summary));
        } else {
          console.log('');
          console.log(renderScanSummary(result.summary));
          console.log('');
        }
        return result.summary.status === 'interrupted' ? EXIT_INTERRUPTED : EXIT_OK;
      } finally {
        removeHandlers();
      }
    });
  });

program
  .command('flush')
  .description('Move completed company folders from staging to the archive')
  .action(async () => {
    await runCommand(async () => {
      const config = storageConfig();
      const result = await executeFlush(config, createLogger());
      console.log(`Flush: ${renderFlushCounts(result)}`);
      return result.failed > 0 ? EXIT_ERROR : EXIT_OK;
    });
  });

program
  .command('clear-temp')
  .description('Delete the staging directory')
  .option('--include-progress', 'Also delete the progress ledger')
  .action(async (options: { includeProgress?: boolean }) => {
    await runCommand(async () => {
      const result = await executeClearTemp(storageConfig(), { includeProgress: options.includeProgress });
      console.log(chalk.green(`Removed ${result.stagingDir}`));
      if (result.ledgerPath) console.log(chalk.green(`Removed ${result.ledgerPath}`));
      return EXIT_OK;
    });
  });

program
  .command('status')
  .description('Show staging, archive and ledger statistics')
  .option('-j, --json', 'Output as JSON')
  .action(async (options: { json?: boolean }) => {
    await runCommand(async () => {
      const report = await executeStatus(storageConfig());
      console.log(options.json ? renderStatusJson(report) : `\n${renderStatus(report)}\n`);
      return EXIT_OK;
    });
  });

program
  .command('cache')
  .description('Manage the metadata cache')
  .option('--clear', 'Clear all cached data')
  .option('--stats', 'Show cache statistics')
  .action(async (options: { clear?: boolean; stats?: boolean }) => {
    await runCommand(async () => {
      const config = storageConfig();
      if (options.clear) {
        clearCache(config);
        console.log(chalk.green('Cache cleared.'));
        return EXIT_OK;
      }
      const stats = getCacheStats(config);
      if (options.stats) {
        console.log(`\n  Cache entries: ${stats.entries}`);
        console.log(`  Cache size:    ${formatBytes(stats.sizeBytes)}`);
        console.log(`  Location:      ${config.cachePath}\n`);
      } else {
        console.log(`\n  Cache: ${stats.entries} entries, ${formatBytes(stats.sizeBytes)}`);
        console.log(`  Use --clear to reset, --stats for details\n`);
      }
      return EXIT_OK;
    });
  });

if (process.argv.length <= 2) {
  program.help();
}

await program.parseAsync();
