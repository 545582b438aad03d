import pLimit from 'p-limit';
import { errorMessage } from '../core/errors.js';
import type { Logger } from '../core/logger.js';
import type { StopToken } from '../core/stop-token.js';
import type { Company, CompanyOutcome, FlushResult, ScanSummary } from '../core/types.js';
import type { FolderStore } from '../storage/company-folder.js';
import type { Flusher } from '../storage/flusher.js';
import type { ProgressLedger } from '../storage/progress-ledger.js';

/**
 * Outer pool over companies.
 *
 * Companies already in the ledger are counted as skipped up front. The rest
 * are admitted in roster order, at most `companyConcurrency` at a time. Once a
 * stop is requested no further company starts; running workers reach their
 * own checkpoint, and the flusher runs once at the end either way.
 */

export interface CompanyRunner {
  run(company: Company): Promise<CompanyOutcome>;
}

export interface SchedulerOptions {
  companyConcurrency: number;
  stop: StopToken;
  ledger: ProgressLedger;
  logger: Logger;
  staging: FolderStore;
  flusher?: Flusher | null;
  /** Flush completed folders once staging grows past this many bytes */
  maxStagingBytes?: number | null;
  now?: () => number;
}

export class Scheduler {
  private quotaCheck: Promise<void> | null = null;

  constructor(
    private readonly worker: CompanyRunner,
    private readonly options: SchedulerOptions
  ) {}

  async run(companies: readonly Company[]): Promise<ScanSummary> {
    const { stop, ledger, logger } = this.options;
    const now = this.options.now ?? Date.now;
    const startedAt = now();

    const pending = companies.filter(c => !ledger.has(c.cik));
    const skipped = companies.length - pending.length;
    if (skipped > 0) {
      logger.info(`Skipping ${skipped} compan${skipped === 1 ? 'y' : 'ies'} already in the progress ledger`);
    }

    const limit = pLimit(this.options.companyConcurrency);
    const outcomes: CompanyOutcome[] = [];
    let notStarted = 0;

    await Promise.all(pending.map((company, i) => limit(async () => {
      if (stop.requested) {
        notStarted += 1;
        return;
      }
      logger.info(`${i + 1}/${pending.length} CIK ${company.cik} - ${company.name}`);
      const outcome = await this.runCompany(company);
      outcomes.push(outcome);
      if (outcome.status === 'done') await this.enforceQuota();
    })));

    if (stop.requested) {
      logger.warn(`Stop requested (${stop.reason ?? 'interrupted'}); flushing completed folders`);
    }
    if (this.quotaCheck) await this.quotaCheck;
    const flush = await this.finalFlush();

    const count = (status: CompanyOutcome['status']) => outcomes.filter(o => o.status === status).length;
    const interrupted = count('interrupted');

    return {
      status: interrupted + notStarted > 0 ? 'interrupted' : 'completed',
      total: companies.length,
      completed: count('done'),
      skipped: skipped + count('skipped'),
      failed: count('failed'),
      interrupted,
      notStarted,
      documentsScanned: outcomes.reduce((sum, o) => sum + o.documentsScanned, 0),
      documentsSaved: outcomes.reduce((sum, o) => sum + o.documentsSaved, 0),
      flush,
      elapsedMs: now() - startedAt,
      failures: outcomes
        .filter(o => o.status === 'failed')
        .map(o => ({ cik: o.cik, name: o.name, error: o.error ?? 'unknown error' })),
    };
  }

  /** A worker that throws is reported as failed; the pool carries on */
  private async runCompany(company: Company): Promise<CompanyOutcome> {
    try {
      return await this.worker.run(company);
    } catch (err) {
      const message = errorMessage(err);
      this.options.logger.error(`CIK ${company.cik} (${company.name}) failed: ${message}`);
      return {
        cik: company.cik,
        name: company.name,
        status: 'failed',
        state: 'FAILED',
        documentsScanned: 0,
        documentsSaved: 0,
        documentFailures: 0,
        filingsSkipped: 0,
        error: message,
      };
    }
  }

  private async enforceQuota(): Promise<void> {
    const { maxStagingBytes, flusher } = this.options;
    if (!flusher || maxStagingBytes === null || maxStagingBytes === undefined) return;
    if (this.quotaCheck) return;

    this.quotaCheck = (async () => {
      try {
        const size = await this.options.staging.sizeBytes();
        if (size <= maxStagingBytes) return;
        this.options.logger.info(
          `Staging holds ${toMb(size)} MB, over the ${toMb(maxStagingBytes)} MB quota; flushing`
        );
        await flusher.flush();
      } catch (err) {
        this.options.logger.error(`staging quota flush failed: ${errorMessage(err)}`);
      } finally {
        this.quotaCheck = null;
      }
    })();
    await this.quotaCheck;
  }

  private async finalFlush(): Promise<FlushResult | null> {
    const { flusher, logger } = this.options;
    if (!flusher) return null;
    try {
      return await flusher.flush();
    } catch (err) {
      logger.error(`final flush failed: ${errorMessage(err)}`);
      return null;
    }
  }
}

function toMb(bytes: number): string {
  return (bytes / 1024 / 1024).toFixed(1);
}
