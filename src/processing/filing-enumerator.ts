import { ScanInterruptedError, errorMessage } from '../core/errors.js';
import type { Logger } from '../core/logger.js';
import { silentLogger } from '../core/logger.js';
import {
  documentUrl,
  masterTextUrl,
  type EdgarClient,
  type FilingIndexItem,
  type RecentFilings,
} from '../core/sec-client.js';
import {
  SCANNED_FORMS,
  type Company,
  type CompanyMetadata,
  type DocumentKind,
  type DocumentRef,
  type Filing,
} from '../core/types.js';

/**
 * Turns a company into the ordered list of documents to scan.
 *
 * Filings are restricted to the scanned form types and the lookback window,
 * then ordered newest first (accession descending breaks ties), so two runs
 * over the same remote state walk the same sequence. Each filing's documents
 * come from its index.json; a filing whose index cannot be read is skipped.
 */

export interface FilingEnumeratorOptions {
  yearsBack: number;
  forms?: readonly string[];
  includePdf?: boolean;
  now?: () => Date;
  logger?: Logger;
}

export class FilingEnumerator {
  private readonly forms: ReadonlySet<string>;
  private readonly includePdf: boolean;
  private readonly logger: Logger;
  private skipped = 0;

  constructor(
    private readonly client: EdgarClient,
    private readonly options: FilingEnumeratorOptions
  ) {
    this.forms = new Set(options.forms ?? SCANNED_FORMS);
    this.includePdf = options.includePdf ?? false;
    this.logger = options.logger ?? silentLogger;
  }

  /** Filings skipped because their index could not be read */
  get skippedFilings(): number {
    return this.skipped;
  }

  /** Earliest filing date inside the window, YYYY-MM-DD */
  cutoffDate(): string {
    return lookbackCutoff((this.options.now ?? (() => new Date()))(), this.options.yearsBack);
  }

  /**
   * Submissions metadata for one company, with the filing list already
   * filtered and ordered. Older submission pages are read only while the
   * recent block does not reach back to the cutoff.
   */
  async fetchMetadata(company: Company): Promise<CompanyMetadata> {
    const submissions = await this.client.getSubmissions(company.cik);
    const cutoff = this.cutoffDate();
    const filings = filingsFromRows(company.cik, submissions.filings.recent);

    const oldest = filings.reduce<string | null>(
      (min, f) => (min === null || f.filingDate < min ? f.filingDate : min),
      null
    );
    if (oldest !== null && oldest >= cutoff) {
      for (const page of submissions.filings.files) {
        if (page.filingTo !== undefined && page.filingTo < cutoff) continue;
        try {
          const rows = await this.client.getSubmissionsPage(page.name);
          filings.push(...filingsFromRows(company.cik, rows));
        } catch (err) {
          if (err instanceof ScanInterruptedError) throw err;
          this.logger.warn(`CIK ${company.cik}: skipping older filings page ${page.name}: ${errorMessage(err)}`);
        }
      }
    }

    const sic = submissions.sic === null || submissions.sic === undefined ? '' : String(submissions.sic);
    return {
      cik: company.cik,
      name: company.name,
      sic,
      filings: this.selectFilings(filings, cutoff),
    };
  }

  /** Allowed forms inside the window, newest first, one entry per accession */
  selectFilings(filings: readonly Filing[], cutoff: string = this.cutoffDate()): Filing[] {
    const seen = new Set<string>();
    const selected: Filing[] = [];
    for (const filing of filings) {
      if (!this.forms.has(filing.form) || filing.filingDate < cutoff) continue;
      if (seen.has(filing.accession)) continue;
      seen.add(filing.accession);
      selected.push(filing);
    }
    return selected.sort(compareFilings);
  }

  /**
   * Documents to scan for one filing, or null when the filing is skipped.
   * Falls back to the master submission text when the index lists nothing
   * scannable.
   */
  async resolveDocuments(filing: Filing): Promise<DocumentRef[] | null> {
    let items: FilingIndexItem[];
    try {
      items = await this.client.getFilingIndex(filing.cik, filing.accession);
    } catch (err) {
      if (err instanceof ScanInterruptedError) throw err;
      this.skipped += 1;
      this.logger.warn(`skip filing ${filing.accession} (${filing.form} ${filing.filingDate}): ${errorMessage(err)}`);
      return null;
    }

    const documents = documentsFromIndex(filing, items, this.includePdf);
    if (documents.length > 0) return documents;

    this.logger.debug(`${filing.accession}: no scannable documents in index; using master text`);
    return [masterDocument(filing)];
  }

  async *listCandidates(company: Company, metadata?: CompanyMetadata): AsyncGenerator<DocumentRef> {
    const meta = metadata ?? await this.fetchMetadata(company);
    for (const filing of meta.filings) {
      const documents = await this.resolveDocuments(filing);
      if (documents) yield* documents;
    }
  }
}

export function lookbackCutoff(now: Date, yearsBack: number): string {
  const cutoff = new Date(now.getTime());
  cutoff.setUTCFullYear(cutoff.getUTCFullYear() - yearsBack);
  return cutoff.toISOString().slice(0, 10);
}

/** Column-oriented submissions rows to Filing objects */
export function filingsFromRows(cik: string, rows: RecentFilings): Filing[] {
  const filings: Filing[] = [];
  for (let i = 0; i < rows.accessionNumber.length; i++) {
    const accession = rows.accessionNumber[i];
    const form = rows.form[i];
    const filingDate = rows.filingDate[i];
    if (!accession || !form || !filingDate) continue;
    const primary = rows.primaryDocument?.[i];
    filings.push({
      cik,
      form,
      filingDate,
      accession,
      primaryDocument: primary ? primary : null,
    });
  }
  return filings;
}

export function compareFilings(a: Filing, b: Filing): number {
  if (a.filingDate !== b.filingDate) return a.filingDate < b.filingDate ? 1 : -1;
  if (a.accession !== b.accession) return a.accession < b.accession ? 1 : -1;
  return 0;
}

export function documentKind(name: string): DocumentKind {
  const lower = name.toLowerCase();
  if (lower.endsWith('.pdf')) return 'pdf';
  if (lower.endsWith('.txt')) return 'text';
  return 'html';
}

function isScannable(name: string, includePdf: boolean): boolean {
  const lower = name.toLowerCase();
  if (lower.includes('index')) return false;
  if (lower.endsWith('.htm') || lower.endsWith('.html') || lower.endsWith('.txt')) return true;
  return includePdf && lower.endsWith('.pdf');
}

/** Primary document first, then the rest in index order */
export function documentsFromIndex(
  filing: Filing,
  items: readonly FilingIndexItem[],
  includePdf: boolean
): DocumentRef[] {
  const refs: DocumentRef[] = [];
  const primary = filing.primaryDocument;

  if (primary !== null && isScannable(primary, includePdf)) {
    const listed = items.find(item => item.name === primary);
    refs.push(documentRef(filing, primary, listed?.size ?? null, true));
  }

  for (const item of items) {
    if (item.name === primary || !isScannable(item.name, includePdf)) continue;
    refs.push(documentRef(filing, item.name, item.size, false));
  }
  return refs;
}

export function masterDocument(filing: Filing): DocumentRef {
  return {
    filing,
    name: `${filing.accession}.txt`,
    url: masterTextUrl(filing.cik, filing.accession),
    kind: 'master',
    declaredSize: null,
    isPrimary: false,
  };
}

function documentRef(filing: Filing, name: string, size: number | null, isPrimary: boolean): DocumentRef {
  return {
    filing,
    name,
    url: documentUrl(filing.cik, filing.accession, name),
    kind: documentKind(name),
    declaredSize: size,
    isPrimary,
  };
}
