import { SizeExceededError } from '../core/errors.js';
import type { HttpSession } from '../core/http-session.js';
import type { Logger } from '../core/logger.js';
import { silentLogger } from '../core/logger.js';
import type { DocumentRef, MatchResult, SaveMode } from '../core/types.js';
import { KeywordScanner, findKeywordMatches, type MatchOptions } from './keywords.js';
import { PDF_MAX_PAGES, extractPdfText } from './pdf-text.js';

/**
 * Document fetcher: one filing document in, one MatchResult out.
 *
 * Text documents are streamed and decoded incrementally; the keyword scanner
 * sees the body in fixed-size chunks. Reading stops at the size cap, and in
 * excerpt mode as soon as a match is found and a minimal excerpt has been
 * read. Documents the filing index lists as larger than the cap get a HEAD
 * request first to confirm the size.
 *
 * Transport failures propagate from the HttpSession after its retries;
 * the caller decides whether a failure is fatal (it never is for one document).
 */

export const DEFAULT_CHUNK_BYTES = 256 * 1024;
export const DEFAULT_MIN_EXCERPT_CHARS = 25_000;
/** Most recent text kept for the excerpt while no match has been found */
export const EXCERPT_RETAIN_CHARS = 1_000_000;

export interface DocumentFetcherOptions extends MatchOptions {
  maxBytes: number;
  chunkBytes?: number;
  saveMode?: SaveMode;
  minExcerptChars?: number;
  pdfMaxPages?: number;
  logger?: Logger;
  /** Swappable for tests */
  pdfText?: (data: Uint8Array, maxPages: number) => Promise<string>;
}

export class DocumentFetcher {
  private readonly chunkBytes: number;
  private readonly saveMode: SaveMode;
  private readonly minExcerptChars: number;
  private readonly logger: Logger;

  constructor(
    private readonly session: HttpSession,
    private readonly options: DocumentFetcherOptions
  ) {
    this.chunkBytes = options.chunkBytes ?? DEFAULT_CHUNK_BYTES;
    this.saveMode = options.saveMode ?? 'excerpt';
    this.minExcerptChars = options.minExcerptChars ?? DEFAULT_MIN_EXCERPT_CHARS;
    this.logger = options.logger ?? silentLogger;
  }

  async fetch(ref: DocumentRef): Promise<MatchResult> {
    return ref.kind === 'pdf' ? this.fetchPdf(ref) : this.scanText(ref);
  }

  private async scanText(ref: DocumentRef): Promise<MatchResult> {
    const { maxBytes } = this.options;
    const declared = await this.confirmSize(ref);
    if (declared !== null && declared > maxBytes) {
      this.logger.warn(`${ref.name} is ${toMb(declared)} MB; reading only the first ${toMb(maxBytes)} MB`);
    }

    const response = await this.session.get(ref.url, ref.name);
    const earlyExit = this.saveMode === 'excerpt';
    const scanner = new KeywordScanner({
      contextChars: this.options.contextChars,
      maxMatches: this.options.maxMatches,
      html: ref.kind === 'html' || ref.kind === 'master',
    });
    const decoder = new TextDecoder('utf-8');
    let kept: string[] = [];
    let keptChars = 0;
    let pending: Uint8Array[] = [];
    let pendingBytes = 0;
    let bytesRead = 0;
    let truncated = false;

    const feed = (text: string) => {
      if (text.length === 0) return;
      scanner.push(text);
      kept.push(text);
      keptChars += text.length;
      if (earlyExit && !scanner.matched && keptChars > EXCERPT_RETAIN_CHARS) {
        const tail = kept.join('').slice(-EXCERPT_RETAIN_CHARS);
        kept = [tail];
        keptChars = tail.length;
      }
    };

    const flushPending = () => {
      if (pendingBytes === 0) return;
      feed(decoder.decode(concatBytes(pending, pendingBytes), { stream: true }));
      pending = [];
      pendingBytes = 0;
    };

    for await (const value of this.session.chunks(response, ref.name)) {
      let chunk = value;
      const room = maxBytes - bytesRead;
      if (chunk.byteLength > room) {
        chunk = chunk.subarray(0, room);
        truncated = true;
      }
      bytesRead += chunk.byteLength;
      pending.push(chunk);
      pendingBytes += chunk.byteLength;

      if (pendingBytes >= this.chunkBytes || truncated) flushPending();
      if (truncated) break;
      if (earlyExit && scanner.matched && keptChars >= this.minExcerptChars) break;
    }

    flushPending();
    feed(decoder.decode());
    scanner.end();

    if (!scanner.matched) {
      if (truncated) {
        this.logger.warn(`skip ${ref.name}: ${new SizeExceededError(ref.url, declared ?? bytesRead, maxBytes).message}`);
      }
      return { matched: false, ref, bytesRead, truncated };
    }

    return {
      matched: true,
      ref,
      bytesRead,
      truncated,
      matches: scanner.matches,
      content: kept.join(''),
    };
  }

  private async fetchPdf(ref: DocumentRef): Promise<MatchResult> {
    const { maxBytes } = this.options;
    const declared = await this.confirmSize(ref, true);
    if (declared !== null && declared > maxBytes) {
      throw new SizeExceededError(ref.url, declared, maxBytes);
    }

    const response = await this.session.get(ref.url, ref.name);
    const chunks: Uint8Array[] = [];
    let bytesRead = 0;

    for await (const value of this.session.chunks(response, ref.name)) {
      bytesRead += value.byteLength;
      if (bytesRead > maxBytes) {
        throw new SizeExceededError(ref.url, bytesRead, maxBytes);
      }
      chunks.push(value);
    }

    const data = concatBytes(chunks, bytesRead);
    const extract = this.options.pdfText ?? extractPdfText;
    let text = '';
    try {
      text = await extract(data, this.options.pdfMaxPages ?? PDF_MAX_PAGES);
    } catch (err) {
      this.logger.warn(`PDF extraction failed for ${ref.name}: ${err instanceof Error ? err.message : String(err)}`);
    }

    const matches = findKeywordMatches(text, {
      contextChars: this.options.contextChars,
      maxMatches: this.options.maxMatches,
    });
    if (matches.length === 0) {
      return { matched: false, ref, bytesRead, truncated: false };
    }
    return { matched: true, ref, bytesRead, truncated: false, matches, content: data };
  }

  /**
   * Size from a HEAD request when the index says the document is over the cap
   * (or, for PDFs, when the index gives no size at all).
   */
  private async confirmSize(ref: DocumentRef, headWhenUnknown = false): Promise<number | null> {
    const listed = ref.declaredSize;
    const needsHead = listed === null ? headWhenUnknown : listed > this.options.maxBytes;
    if (!needsHead) return listed;

    const head = await this.session.head(ref.url, `HEAD ${ref.name}`);
    this.session.release(head);
    return contentLength(head) ?? listed;
  }
}

export function contentLength(response: Response): number | null {
  const header = response.headers.get('content-length');
  if (header === null) return null;
  const n = parseInt(header, 10);
  return Number.isFinite(n) && n >= 0 ? n : null;
}

function concatBytes(chunks: Uint8Array[], total: number): Uint8Array {
  if (chunks.length === 1) return chunks[0];
  const out = new Uint8Array(total);
  let offset = 0;
  for (const chunk of chunks) {
    out.set(chunk, offset);
    offset += chunk.byteLength;
  }
  return out;
}

function toMb(bytes: number): string {
  return (bytes / 1024 / 1024).toFixed(1);
}
