import { z } from 'zod';
import type { ResponseCache } from './cache.js';
import { MalformedMetadataError } from './errors.js';
import type { HttpSession } from './http-session.js';

/**
 * SEC EDGAR client for the scanner.
 *
 * Uses the free EDGAR endpoints:
 * - data.sec.gov/submissions/ for company metadata and filing history
 * - www.sec.gov/Archives/edgar/data/ for filing indexes, documents and
 *   the full-submission master text
 *
 * Metadata responses go through the optional ResponseCache; document bodies
 * are streamed by the caller and never cached.
 */

const DATA_URL = 'https://data.sec.gov';
const ARCHIVES_URL = 'https://www.sec.gov/Archives/edgar/data';

const SUBMISSIONS_TTL_HOURS = 24;
// Filings are immutable once accepted
const FILING_INDEX_TTL_HOURS = 720;

const recentFilingsSchema = z.object({
  accessionNumber: z.array(z.string()),
  filingDate: z.array(z.string()),
  form: z.array(z.string()),
  primaryDocument: z.array(z.string()).optional(),
});

const submissionsSchema = z.object({
  cik: z.union([z.string(), z.number()]).optional(),
  name: z.string().optional(),
  sic: z.union([z.string(), z.number()]).nullish(),
  filings: z.object({
    recent: recentFilingsSchema,
    files: z.array(z.object({
      name: z.string(),
      filingCount: z.number().optional(),
      filingFrom: z.string().optional(),
      filingTo: z.string().optional(),
    })).default([]),
  }),
});

const filingIndexSchema = z.object({
  directory: z.object({
    item: z.array(z.object({
      name: z.string(),
      type: z.string().optional(),
      size: z.union([z.string(), z.number()]).optional(),
    })),
  }),
});

export type RecentFilings = z.infer<typeof recentFilingsSchema>;
export type CompanySubmissions = z.infer<typeof submissionsSchema>;

export interface FilingIndexItem {
  name: string;
  type: string;
  /** Bytes, null when the index leaves it blank */
  size: number | null;
}

// ── URL builders ───────────────────────────────────────────────────────

export function padCik(cik: string | number): string {
  return String(cik).replace(/\D/g, '').padStart(10, '0');
}

/** Archive paths use the CIK without leading zeros */
export function cikWithoutLeadingZeros(cik: string): string {
  return String(parseInt(cik, 10));
}

export function submissionsUrl(cik: string): string {
  return `${DATA_URL}/submissions/CIK${padCik(cik)}.json`;
}

export function submissionsPageUrl(fileName: string): string {
  return `${DATA_URL}/submissions/${fileName}`;
}

export function filingIndexUrl(cik: string, accession: string): string {
  return `${ARCHIVES_URL}/${cikWithoutLeadingZeros(cik)}/${accession.replace(/-/g, '')}/index.json`;
}

export function documentUrl(cik: string, accession: string, name: string): string {
  return `${ARCHIVES_URL}/${cikWithoutLeadingZeros(cik)}/${accession.replace(/-/g, '')}/${name}`;
}

export function masterTextUrl(cik: string, accession: string): string {
  return `${ARCHIVES_URL}/${cikWithoutLeadingZeros(cik)}/${accession}.txt`;
}

// ── Client ─────────────────────────────────────────────────────────────

export class EdgarClient {
  constructor(
    private readonly session: HttpSession,
    private readonly cache: ResponseCache | null = null
  ) {}

  /**
   * Fetch company submissions (filing history) from SEC EDGAR.
   */
  async getSubmissions(cik: string): Promise<CompanySubmissions> {
    const url = submissionsUrl(cik);
    const body = await this.fetchCached(url, SUBMISSIONS_TTL_HOURS, `submissions JSON for ${padCik(cik)}`);
    return parseWith(submissionsSchema, body, url, `submissions for CIK ${padCik(cik)}`);
  }

  /**
   * Fetch one of the older filing pages listed under `filings.files`.
   * Those pages have the same shape as `filings.recent`.
   */
  async getSubmissionsPage(fileName: string): Promise<RecentFilings> {
    const url = submissionsPageUrl(fileName);
    const body = await this.fetchCached(url, SUBMISSIONS_TTL_HOURS, fileName);
    return parseWith(recentFilingsSchema, body, url, `submissions page ${fileName}`);
  }

  /**
   * Fetch the directory listing of one filing.
   */
  async getFilingIndex(cik: string, accession: string): Promise<FilingIndexItem[]> {
    const url = filingIndexUrl(cik, accession);
    const body = await this.fetchCached(url, FILING_INDEX_TTL_HOURS, `${accession} index.json`);
    const parsed = parseWith(filingIndexSchema, body, url, `filing index ${accession}`);

    return parsed.directory.item.map(item => ({
      name: item.name,
      type: item.type ?? '',
      size: parseSize(item.size),
    }));
  }

  private async fetchCached(url: string, ttlHours: number, label: string): Promise<string> {
    if (this.cache) {
      try {
        const cached = this.cache.get(url);
        if (cached !== null) return cached;
      } catch {
        // Cache read failed (corruption, locked); proceed without cache
      }
    }

    const body = await this.session.getText(url, label);

    if (this.cache) {
      try {
        this.cache.set(url, body, ttlHours);
      } catch {
        // Cache write failed; non-fatal
      }
    }
    return body;
  }
}

function parseWith<S extends z.ZodTypeAny>(schema: S, body: string, url: string, what: string): z.output<S> {
  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch {
    throw new MalformedMetadataError(`Failed to parse ${what}: response is not JSON.`, url);
  }

  const result = schema.safeParse(json);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue ? `${issue.path.join('.') || '(root)'}: ${issue.message}` : 'unexpected shape';
    throw new MalformedMetadataError(`Unexpected ${what} (${where})`, url);
  }
  return result.data;
}

function parseSize(size: string | number | undefined): number | null {
  if (size === undefined || size === '') return null;
  const n = typeof size === 'number' ? size : parseInt(size, 10);
  return Number.isFinite(n) && n >= 0 ? n : null;
}
