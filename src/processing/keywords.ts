import type { KeywordMatch } from '../core/types.js';

/**
 * Crypto keyword matching.
 *
 * Exact phrases, case-insensitive, anchored on word boundaries. Multi-word
 * phrases accept either a hyphen or a single space between words; nothing
 * else counts as a separator, so "digitalasset" does not match.
 */

export const KEYWORD_PHRASES = [
  'bitcoin',
  'blockchain',
  'ethereum',
  'cryptocurrency',
  'digital[- ]asset',
  'distributed[- ]ledger',
  'non[- ]fungible[- ]token',
  'crypto[- ]asset',
] as const;

const KEYWORD_SOURCE = `\\b(?:${KEYWORD_PHRASES.join('|')})\\b`;

/** Longest text a single keyword can span ("non-fungible-token" is 18) */
const MAX_KEYWORD_CHARS = 32;

export const DEFAULT_CONTEXT_CHARS = 200;
export const DEFAULT_MAX_MATCHES = 25;

function keywordRegex(): RegExp {
  return new RegExp(KEYWORD_SOURCE, 'gi');
}

export function normalizeKeyword(raw: string): string {
  return raw.toLowerCase().replace(/-/g, ' ');
}

export function containsKeyword(text: string): boolean {
  return new RegExp(KEYWORD_SOURCE, 'i').test(text);
}

export interface MatchOptions {
  contextChars?: number;
  maxMatches?: number;
  /** Strip markup from context snippets */
  html?: boolean;
}

/**
 * Find keyword occurrences in a complete text.
 */
export function findKeywordMatches(text: string, options: MatchOptions = {}): KeywordMatch[] {
  const scanner = new KeywordScanner(options);
  scanner.push(text);
  scanner.end();
  return scanner.matches;
}

/**
 * Incremental matcher fed one decoded chunk at a time.
 *
 * Only a short tail of already-scanned text is retained, enough for context
 * before the next match and for a keyword split across two chunks. A match
 * near the end of the buffered text is held back until the following
 * character ("bitcoin" + "s" must not match) and its trailing context have
 * arrived.
 */
export class KeywordScanner {
  readonly matches: KeywordMatch[] = [];
  private buffer = '';
  /** Absolute offset of buffer[0] */
  private bufferStart = 0;
  /** Absolute offset where the next regex pass begins */
  private scanFrom = 0;
  private found = 0;
  private readonly contextChars: number;
  private readonly maxMatches: number;
  private readonly html: boolean;

  constructor(options: MatchOptions = {}) {
    this.contextChars = options.contextChars ?? DEFAULT_CONTEXT_CHARS;
    this.maxMatches = options.maxMatches ?? DEFAULT_MAX_MATCHES;
    this.html = options.html ?? false;
  }

  /** True once at least one keyword has been seen */
  get matched(): boolean {
    return this.found > 0;
  }

  /** Total occurrences, including those past maxMatches */
  get occurrences(): number {
    return this.found;
  }

  /** Characters pushed so far */
  get length(): number {
    return this.bufferStart + this.buffer.length;
  }

  push(chunk: string): void {
    if (chunk.length === 0) return;
    this.buffer += chunk;
    this.scan(false);
    this.compact();
  }

  end(): void {
    this.scan(true);
  }

  private scan(final: boolean): void {
    const end = this.length;
    const re = keywordRegex();
    re.lastIndex = this.scanFrom - this.bufferStart;
    let resumeAt = end - MAX_KEYWORD_CHARS - this.contextChars;

    let match: RegExpExecArray | null;
    while ((match = re.exec(this.buffer)) !== null) {
      const matchStart = this.bufferStart + match.index;
      const matchEnd = matchStart + match[0].length;
      // Wait for the following character and the full trailing context
      if (!final && matchEnd + this.contextChars >= end) {
        resumeAt = matchStart;
        break;
      }

      this.found += 1;
      if (this.matches.length < this.maxMatches) {
        this.matches.push({
          keyword: normalizeKeyword(match[0]),
          offset: matchStart,
          context: this.contextAround(match.index, match.index + match[0].length),
        });
      }
      this.scanFrom = matchEnd;
    }

    this.scanFrom = final ? end : Math.max(this.scanFrom, resumeAt);
  }

  private contextAround(start: number, stop: number): string {
    const raw = this.buffer.slice(Math.max(0, start - this.contextChars), stop + this.contextChars);
    return cleanSnippet(raw, this.html);
  }

  private compact(): void {
    const keepFrom = Math.max(this.bufferStart, this.scanFrom - this.contextChars);
    if (keepFrom > this.bufferStart) {
      this.buffer = this.buffer.slice(keepFrom - this.bufferStart);
      this.bufferStart = keepFrom;
    }
  }
}

const ENTITIES: Record<string, string> = {
  '&nbsp;': ' ',
  '&#160;': ' ',
  '&#xa0;': ' ',
  '&amp;': '&',
  '&lt;': '<',
  '&gt;': '>',
  '&quot;': '"',
  '&#39;': "'",
  '&#8217;': "'",
  '&#8220;': '"',
  '&#8221;': '"',
  '&#8212;': '-',
};

/**
 * Turn a raw slice of a document into a readable one-line snippet.
 * HTML slices lose their tags, including tags cut in half at either edge.
 */
export function cleanSnippet(raw: string, html: boolean): string {
  let text = raw;
  if (html) {
    const firstClose = text.indexOf('>');
    const firstOpen = text.indexOf('<');
    if (firstClose !== -1 && (firstOpen === -1 || firstClose < firstOpen)) {
      text = text.slice(firstClose + 1);
    }
    text = text
      .replace(/<[^>]*>/g, ' ')
      .replace(/<[^>]*$/, ' ')
      .replace(/&(?:#\d+|#x[0-9a-f]+|[a-z]+);/gi, entity => ENTITIES[entity.toLowerCase()] ?? ' ');
  }
  return text.replace(/\s+/g, ' ').trim();
}
