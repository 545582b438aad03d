import pLimit from 'p-limit';
import type { ResponseCache } from '../core/cache.js';
import type { Clock } from '../core/clock.js';
import { ScanInterruptedError, SizeExceededError, errorMessage } from '../core/errors.js';
import { HttpSession, withSession, type FetchLike } from '../core/http-session.js';
import type { Logger } from '../core/logger.js';
import type { RateLimiter } from '../core/rate-limiter.js';
import { EdgarClient } from '../core/sec-client.js';
import type { StopToken } from '../core/stop-token.js';
import type {
  Company,
  CompanyOutcome,
  CompanyState,
  DocumentRef,
  Filing,
  Matched,
  MatchResult,
  ResumePolicy,
  SaveMode,
} from '../core/types.js';
import { MATCHES_FILE, documentFileName, type FolderStore } from '../storage/company-folder.js';
import type { ProgressLedger } from '../storage/progress-ledger.js';
import { DocumentFetcher } from './document-fetcher.js';
import { FilingEnumerator } from './filing-enumerator.js';

/**
 * Company worker: one company from PENDING to DONE.
 *
 *   PENDING → FETCHING_METADATA → SCANNING_DOCUMENTS → WRITING_MARKER → DONE
 *
 * Any step can end in FAILED, which is reported to the scheduler and leaves
 * the staged folder in progress for the next run. An interruption lets the
 * in-flight documents finish, then returns without writing COMPLETE.
 *
 * Each run owns its HttpSession; the rate limiter, ledger, staging store and
 * stop token are shared by all workers.
 */

export interface CompanyWorkerContext {
  staging: FolderStore;
  ledger: ProgressLedger;
  rateLimiter: RateLimiter;
  stop: StopToken;
  logger: Logger;
  userAgent: string;
  cache?: ResponseCache | null;
  fetchImpl?: FetchLike;
  clock?: Clock;
  /** Passed to every HttpSession; tests shorten the backoff */
  backoffMs?: readonly number[];
  maxRetries?: number;
}

export interface CompanyWorkerOptions {
  yearsBack: number;
  docConcurrency: number;
  maxBytes: number;
  includePdf: boolean;
  saveMode: SaveMode;
  resumePolicy: ResumePolicy;
  forms?: readonly string[];
  now?: () => Date;
}

interface ScanCounters {
  scanned: number;
  saved: number;
  failures: number;
}

export class CompanyWorker {
  constructor(
    private readonly context: CompanyWorkerContext,
    private readonly options: CompanyWorkerOptions
  ) {}

  async run(company: Company): Promise<CompanyOutcome> {
    const { ledger, stop, logger } = this.context;
    const counters: ScanCounters = { scanned: 0, saved: 0, failures: 0 };
    let state: CompanyState = 'PENDING';
    let filingsSkipped = 0;

    const outcome = (status: CompanyOutcome['status'], error?: string): CompanyOutcome => ({
      cik: company.cik,
      name: company.name,
      status,
      state,
      documentsScanned: counters.scanned,
      documentsSaved: counters.saved,
      documentFailures: counters.failures,
      filingsSkipped,
      ...(error !== undefined ? { error } : {}),
    });

    if (ledger.has(company.cik)) {
      state = 'DONE';
      logger.debug(`CIK ${company.cik}: already in progress ledger`);
      return outcome('skipped');
    }
    if (stop.requested) return outcome('interrupted');

    try {
      return await withSession(() => this.createSession(), async session => {
        const client = new EdgarClient(session, this.context.cache ?? null);
        const enumerator = new FilingEnumerator(client, {
          yearsBack: this.options.yearsBack,
          forms: this.options.forms,
          includePdf: this.options.includePdf,
          now: this.options.now,
          logger,
        });
        const fetcher = new DocumentFetcher(session, {
          maxBytes: this.options.maxBytes,
          saveMode: this.options.saveMode,
          logger,
        });

        await this.prepareFolder(company.cik);

        state = 'FETCHING_METADATA';
        logger.debug(`CIK ${company.cik}: ${state}`);
        const metadata = await enumerator.fetchMetadata(company);
        await this.context.staging.writeSic(company.cik, metadata.sic);
        logger.debug(`CIK ${company.cik}: ${metadata.filings.length} filing(s) since ${enumerator.cutoffDate()}`);

        state = 'SCANNING_DOCUMENTS';
        logger.debug(`CIK ${company.cik}: ${state}`);
        try {
          await this.scanDocuments(company, enumerator.listCandidates(company, metadata), fetcher, counters);
        } finally {
          filingsSkipped = enumerator.skippedFilings;
        }

        if (stop.requested) {
          logger.info(`CIK ${company.cik}: interrupted after ${counters.scanned} document(s); left in progress`);
          return outcome('interrupted');
        }

        state = 'WRITING_MARKER';
        await this.complete(company.cik);
        state = 'DONE';
        logger.info(
          `CIK ${company.cik}: done, ${counters.scanned} document(s) scanned, ${counters.saved} saved` +
          (counters.failures > 0 ? `, ${counters.failures} failed` : '')
        );
        return outcome('done');
      });
    } catch (err) {
      if (err instanceof ScanInterruptedError || stop.requested) {
        logger.info(`CIK ${company.cik}: interrupted during ${state}; left in progress`);
        return outcome('interrupted');
      }
      const message = errorMessage(err);
      logger.error(`CIK ${company.cik} (${company.name}) failed during ${state}: ${message}`);
      state = 'FAILED';
      return outcome('failed', message);
    }
  }

  private createSession(): HttpSession {
    const { userAgent, rateLimiter, fetchImpl, clock, stop, logger, backoffMs, maxRetries } = this.context;
    return new HttpSession({ userAgent, rateLimiter, fetchImpl, clock, stop, logger, backoffMs, maxRetries });
  }

  /**
   * Mark the folder in progress. Under the restart policy leftovers from an
   * earlier attempt are wiped first.
   */
  private async prepareFolder(cik: string): Promise<void> {
    const { staging, logger } = this.context;
    const previous = await staging.state(cik);

    await staging.markInProgress(cik);
    if (previous === 'complete') {
      await staging.removeCompleteMarker(cik);
    }
    if (previous !== 'absent' && this.options.resumePolicy === 'restart') {
      await staging.reset(cik);
      logger.debug(`CIK ${cik}: cleared partial results from an earlier run`);
    }
  }

  /**
   * Inner pool. Candidates are pulled from the enumerator only while fewer
   * than twice the pool size are queued, and no new document starts once a
   * stop is requested.
   */
  private async scanDocuments(
    company: Company,
    candidates: AsyncIterable<DocumentRef>,
    fetcher: DocumentFetcher,
    counters: ScanCounters
  ): Promise<void> {
    const { staging, stop, logger } = this.context;
    const limit = pLimit(this.options.docConcurrency);
    const running = new Set<Promise<void>>();
    const writeErrors: unknown[] = [];
    const queueLimit = this.options.docConcurrency * 2;
    const claimed = new Map<string, string>();

    try {
      for await (const ref of candidates) {
        if (stop.requested || writeErrors.length > 0) break;

        const fileName = documentFileName(company.cik, ref);
        const owner = claimed.get(fileName);
        if (owner !== undefined && owner !== ref.filing.accession) {
          logger.warn(`${fileName} is named the same in ${owner} and ${ref.filing.accession}; only one copy is kept`);
        }
        claimed.set(fileName, ref.filing.accession);
        if (this.options.resumePolicy === 'reuse' && await staging.hasFile(company.cik, fileName)) {
          logger.debug(`reuse ${fileName}`);
          continue;
        }

        const task: Promise<void> = limit(() => this.scanOne(company.cik, ref, fetcher, counters)).then(
          () => {
            running.delete(task);
          },
          (err: unknown) => {
            running.delete(task);
            writeErrors.push(err);
          }
        );
        running.add(task);

        while (running.size >= queueLimit) {
          await Promise.race(running);
        }
      }
    } finally {
      await Promise.all(running);
    }

    if (writeErrors.length > 0) throw writeErrors[0];
  }

  /**
   * Fetch and persist one document. Fetch failures are logged and counted;
   * only a failed write to the staging folder rejects.
   */
  private async scanOne(cik: string, ref: DocumentRef, fetcher: DocumentFetcher, counters: ScanCounters): Promise<void> {
    const { logger, stop } = this.context;
    if (stop.requested) return;

    let result: MatchResult;
    try {
      result = await fetcher.fetch(ref);
    } catch (err) {
      if (err instanceof ScanInterruptedError) return;
      if (err instanceof SizeExceededError) {
        logger.warn(`skip ${ref.name}: ${err.message}`);
        counters.scanned += 1;
        return;
      }
      counters.failures += 1;
      logger.warn(`skip ${ref.name} (${ref.filing.accession}): ${errorMessage(err)}`);
      return;
    }

    counters.scanned += 1;

    if (ref.kind === 'master') {
      await this.saveMasterRecord(cik, result);
      counters.saved += 1;
      return;
    }

    if (!result.matched) {
      logger.debug(`no match in ${ref.name}`);
      return;
    }

    await this.saveMatch(cik, result);
    counters.saved += 1;
  }

  private async saveMatch(cik: string, result: Matched): Promise<void> {
    const { staging, logger } = this.context;
    const { ref } = result;
    const fileName = documentFileName(cik, ref);
    const keywords = uniqueKeywords(result);

    await staging.writeFile(cik, fileName, result.content);
    await staging.appendLine(cik, MATCHES_FILE, JSON.stringify({
      file: fileName,
      form: ref.filing.form,
      filingDate: ref.filing.filingDate,
      accession: ref.filing.accession,
      document: ref.name,
      keywords,
      snippets: result.matches.map(m => m.context),
    }));
    logger.info(`  saved ${fileName} (${keywords.join(', ')})`);
  }

  /** Master-text records are kept whether or not they matched */
  private async saveMasterRecord(cik: string, result: MatchResult): Promise<void> {
    if (result.matched) {
      await this.saveMatch(cik, result);
      return;
    }
    const fileName = documentFileName(cik, result.ref);
    await this.context.staging.writeFile(cik, fileName, masterHeader(result.ref.filing));
    this.context.logger.debug(`  recorded ${fileName} (no matches)`);
  }

  /**
   * COMPLETE, then the ledger line, then .STAGING removed. A failed ledger
   * write takes COMPLETE back off so the folder reads as in progress.
   */
  private async complete(cik: string): Promise<void> {
    const { staging, ledger } = this.context;
    await staging.markComplete(cik);
    try {
      await ledger.record(cik);
    } catch (err) {
      await staging.removeCompleteMarker(cik);
      throw err;
    }
    await staging.clearInProgress(cik);
  }
}

export function masterHeader(filing: Filing): string {
  return [
    `CIK: ${filing.cik}`,
    `FORM: ${filing.form}`,
    `FILED: ${filing.filingDate}`,
    `ACCESSION: ${filing.accession}`,
    'MATCHES: 0',
    '',
  ].join('\n');
}

function uniqueKeywords(result: Matched): string[] {
  return [...new Set(result.matches.map(m => m.keyword))];
}
