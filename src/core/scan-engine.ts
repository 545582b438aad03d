/**
 * Command execution for the scanner.
 *
 * Wires configuration, storage and the worker pool together and returns
 * structured results; rendering is left to the CLI.
 */

import { rm } from 'node:fs/promises';
import { ResponseCache, type CacheStats } from './cache.js';
import type { Clock } from './clock.js';
import type { ScannerConfig } from './config.js';
import { FatalConfigError } from './errors.js';
import type { FetchLike } from './http-session.js';
import type { Logger } from './logger.js';
import { RateLimiter } from './rate-limiter.js';
import type { StopToken } from './stop-token.js';
import type { FlushResult, ScanSummary } from './types.js';
import { CompanyWorker } from '../processing/company-worker.js';
import { loadRoster, selectCompanies } from '../processing/roster.js';
import { Scheduler } from '../processing/scheduler.js';
import { FolderStore } from '../storage/company-folder.js';
import { collectFolderStats, type FolderStats } from '../storage/folder-stats.js';
import { Flusher } from '../storage/flusher.js';
import { ProgressLedger } from '../storage/progress-ledger.js';
import { reconcile, type RecoveryReport } from '../storage/recovery.js';

export interface ScanParams {
  rosterPath: string;
  yearsBack: number;
  startFrom?: string | null;
  resumeFromLast?: boolean;
}

export interface ScanEnvironment {
  config: ScannerConfig;
  logger: Logger;
  stop: StopToken;
  /** Test seams; production uses global fetch and the system clock */
  fetchImpl?: FetchLike;
  clock?: Clock;
  now?: () => Date;
  backoffMs?: readonly number[];
  maxRetries?: number;
}

export interface ScanResult {
  /** Companies left after start-from / resume-from-last trimming */
  selected: number;
  recovery: RecoveryReport;
  summary: ScanSummary;
}

export async function executeScan(params: ScanParams, env: ScanEnvironment): Promise<ScanResult> {
  const { config, logger, stop } = env;
  if (!Number.isInteger(params.yearsBack) || params.yearsBack < 1) {
    throw new FatalConfigError(`--years must be a positive whole number (got ${params.yearsBack})`);
  }

  const roster = await loadRoster(params.rosterPath);
  logger.info(`Loaded ${roster.length} compan${roster.length === 1 ? 'y' : 'ies'} from ${params.rosterPath}`);

  const staging = new FolderStore(config.stagingDir);
  const archive = new FolderStore(config.archiveDir);
  await staging.ensureRoot();

  const ledger = await ProgressLedger.open(config.ledgerPath);
  const recovery = await reconcile(staging, ledger, logger);

  const companies = selectCompanies(roster, {
    startFrom: params.startFrom,
    resumeAfter: params.resumeFromLast ? ledger.last() : null,
    isDone: cik => ledger.has(cik),
  }, logger);

  const cache = config.useCache ? new ResponseCache(config.cachePath) : null;
  const worker = new CompanyWorker(
    {
      staging,
      ledger,
      rateLimiter: new RateLimiter(config.maxRps, env.clock),
      stop,
      logger,
      userAgent: config.userAgent,
      cache,
      fetchImpl: env.fetchImpl,
      clock: env.clock,
      backoffMs: env.backoffMs,
      maxRetries: env.maxRetries,
    },
    {
      yearsBack: params.yearsBack,
      docConcurrency: config.docConcurrency,
      maxBytes: config.maxFileBytes,
      includePdf: config.includePdf,
      saveMode: config.saveMode,
      resumePolicy: config.resumePolicy,
      now: env.now,
    }
  );

  const scheduler = new Scheduler(worker, {
    companyConcurrency: config.companyConcurrency,
    stop,
    ledger,
    logger,
    staging,
    flusher: new Flusher(staging, archive, ledger, logger),
    maxStagingBytes: config.maxStagingBytes,
  });

  try {
    const summary = await scheduler.run(companies);
    return { selected: companies.length, recovery, summary };
  } finally {
    cache?.close();
  }
}

export async function executeFlush(config: ScannerConfig, logger: Logger): Promise<FlushResult> {
  const ledger = await ProgressLedger.open(config.ledgerPath);
  const flusher = new Flusher(new FolderStore(config.stagingDir), new FolderStore(config.archiveDir), ledger, logger);
  return flusher.flush();
}

export interface ClearTempResult {
  stagingDir: string;
  ledgerPath: string | null;
}

/** Delete the staging tree, and the progress ledger when asked */
export async function executeClearTemp(
  config: ScannerConfig,
  options: { includeProgress?: boolean } = {}
): Promise<ClearTempResult> {
  await rm(config.stagingDir, { recursive: true, force: true });
  if (!options.includeProgress) {
    return { stagingDir: config.stagingDir, ledgerPath: null };
  }
  const ledger = await ProgressLedger.open(config.ledgerPath);
  await ledger.clear();
  return { stagingDir: config.stagingDir, ledgerPath: config.ledgerPath };
}

export interface StatusReport {
  staging: FolderStats;
  archive: FolderStats;
  ledgerEntries: number;
  lastCompleted: string | null;
}

export async function executeStatus(config: ScannerConfig): Promise<StatusReport> {
  const ledger = await ProgressLedger.open(config.ledgerPath);
  return {
    staging: await collectFolderStats(new FolderStore(config.stagingDir)),
    archive: await collectFolderStats(new FolderStore(config.archiveDir)),
    ledgerEntries: ledger.size,
    lastCompleted: ledger.last(),
  };
}

export function getCacheStats(config: ScannerConfig): CacheStats {
  const cache = new ResponseCache(config.cachePath);
  try {
    return cache.stats();
  } finally {
    cache.close();
  }
}

export function clearCache(config: ScannerConfig): void {
  const cache = new ResponseCache(config.cachePath);
  try {
    cache.clear();
  } finally {
    cache.close();
  }
}
