/**
 * Core data model for the filing scanner.
 *
 * Design principles:
 * - Companies are loaded once from the roster and never mutated
 * - Filings and documents are transient views of remote EDGAR state
 * - Match results live only until they are persisted or discarded
 * - Company folders and ledger entries are the only state that outlives a run
 */

export const SCANNED_FORMS = ['10-K', '10-Q', '8-K', '20-F', '40-F', '6-K'] as const;

export type FormType = typeof SCANNED_FORMS[number];

export interface Company {
  /** 10-digit zero-padded CIK, the canonical company key */
  cik: string;
  name: string;
}

export interface CompanyMetadata {
  cik: string;
  name: string;
  /** Standard Industrial Classification code, '' when EDGAR has none */
  sic: string;
  filings: Filing[];
}

export interface Filing {
  cik: string;
  form: string;
  /** YYYY-MM-DD */
  filingDate: string;
  /** Dashed accession number, e.g. 0000320193-24-000123 */
  accession: string;
  primaryDocument: string | null;
}

export type DocumentKind = 'html' | 'text' | 'pdf' | 'master';

export interface DocumentRef {
  filing: Filing;
  /** File name inside the filing folder, or `{accession}.txt` for master text */
  name: string;
  url: string;
  kind: DocumentKind;
  /** Size listed in the filing index, when present */
  declaredSize: number | null;
  isPrimary: boolean;
}

export interface KeywordMatch {
  /** Lowercase, separators normalized to a single space */
  keyword: string;
  /** Character offset within the decoded document */
  offset: number;
  context: string;
}

interface MatchResultBase {
  ref: DocumentRef;
  bytesRead: number;
  /** Reading stopped at the size cap */
  truncated: boolean;
}

export interface NoMatch extends MatchResultBase {
  matched: false;
}

export interface Matched extends MatchResultBase {
  matched: true;
  matches: KeywordMatch[];
  /** Text kept for the saved copy of the document */
  content: string | Uint8Array;
}

export type MatchResult = NoMatch | Matched;

export type SaveMode = 'excerpt' | 'full';

export type ResumePolicy = 'restart' | 'reuse';

/** Company worker state machine */
export type CompanyState =
  | 'PENDING'
  | 'FETCHING_METADATA'
  | 'SCANNING_DOCUMENTS'
  | 'WRITING_MARKER'
  | 'DONE'
  | 'FAILED';

export type CompanyStatus = 'done' | 'skipped' | 'failed' | 'interrupted';

export interface CompanyOutcome {
  cik: string;
  name: string;
  status: CompanyStatus;
  /** Last state the worker reached */
  state: CompanyState;
  documentsScanned: number;
  documentsSaved: number;
  documentFailures: number;
  filingsSkipped: number;
  error?: string;
}

export interface FlushResult {
  moved: number;
  failed: number;
}

export type RunStatus = 'completed' | 'interrupted';

export interface ScanSummary {
  status: RunStatus;
  total: number;
  completed: number;
  skipped: number;
  failed: number;
  interrupted: number;
  /** Companies never admitted because a stop was requested */
  notStarted: number;
  documentsScanned: number;
  documentsSaved: number;
  flush: FlushResult | null;
  elapsedMs: number;
  failures: Array<{ cik: string; name: string; error: string }>;
}
