import { appendFile, mkdir, readdir, rm, stat, writeFile, access } from 'node:fs/promises';
import type { Dirent } from 'node:fs';
import { join } from 'node:path';
import type { DocumentRef, Filing } from '../core/types.js';

/**
 * Per-company folders on disk, used for both the staging area and the
 * archive. Layout of one folder:
 *
 *   {root}/{CIK}/
 *     SIC.txt
 *     {CIK}_{FORM}_{YYYY-MM-DD}_{DOCNAME}        saved documents
 *     {CIK}_{FORM}_{YYYY-MM-DD}_{ACCESSION}.txt  master-text records
 *     MATCHES.jsonl                              keyword snippets, one line per saved document
 *     .STAGING                                   present while in progress
 *     COMPLETE                                   present once fully processed
 */

export const STAGING_MARKER = '.STAGING';
export const COMPLETE_MARKER = 'COMPLETE';
export const SIC_FILE = 'SIC.txt';
export const MATCHES_FILE = 'MATCHES.jsonl';

/** Files that are bookkeeping rather than saved filings */
export const BOOKKEEPING_FILES: ReadonlySet<string> = new Set([
  STAGING_MARKER,
  COMPLETE_MARKER,
  SIC_FILE,
  MATCHES_FILE,
]);

export type FolderState = 'absent' | 'in-progress' | 'complete';

export interface FolderEntry {
  cik: string;
  state: FolderState;
  hasStagingMarker: boolean;
}

export class FolderStore {
  /** Serializes writes and appends to the same file within this process */
  private readonly writeQueues = new Map<string, Promise<void>>();

  constructor(public readonly root: string) {}

  companyDir(cik: string): string {
    return join(this.root, cik);
  }

  async ensureRoot(): Promise<void> {
    await mkdir(this.root, { recursive: true });
  }

  async state(cik: string): Promise<FolderState> {
    const dir = this.companyDir(cik);
    if (!(await exists(dir))) return 'absent';
    return (await exists(join(dir, COMPLETE_MARKER))) ? 'complete' : 'in-progress';
  }

  /** Company folders under the root, sorted by CIK */
  async list(): Promise<FolderEntry[]> {
    let names: string[];
    try {
      names = await readdir(this.root);
    } catch (err) {
      if (isNotFound(err)) return [];
      throw err;
    }

    const entries: FolderEntry[] = [];
    for (const name of names.sort()) {
      const dir = this.companyDir(name);
      const info = await stat(dir);
      if (!info.isDirectory()) continue;
      const complete = await exists(join(dir, COMPLETE_MARKER));
      entries.push({
        cik: name,
        state: complete ? 'complete' : 'in-progress',
        hasStagingMarker: await exists(join(dir, STAGING_MARKER)),
      });
    }
    return entries;
  }

  async markInProgress(cik: string): Promise<void> {
    await mkdir(this.companyDir(cik), { recursive: true });
    await writeFile(join(this.companyDir(cik), STAGING_MARKER), 'in-progress', 'utf-8');
  }

  async clearInProgress(cik: string): Promise<void> {
    await rm(join(this.companyDir(cik), STAGING_MARKER), { force: true });
  }

  async markComplete(cik: string, note: string = 'done'): Promise<void> {
    await writeFile(join(this.companyDir(cik), COMPLETE_MARKER), note, 'utf-8');
  }

  async removeCompleteMarker(cik: string): Promise<void> {
    await rm(join(this.companyDir(cik), COMPLETE_MARKER), { force: true });
  }

  /** Delete everything in a company folder except the in-progress marker */
  async reset(cik: string): Promise<void> {
    const dir = this.companyDir(cik);
    const names = await this.files(cik);
    await Promise.all(
      names
        .filter(name => name !== STAGING_MARKER)
        .map(name => rm(join(dir, name), { recursive: true, force: true }))
    );
  }

  async writeSic(cik: string, sic: string): Promise<void> {
    await writeFile(join(this.companyDir(cik), SIC_FILE), sic, 'utf-8');
  }

  /** Whole-file write; writes to the same path never overlap */
  writeFile(cik: string, name: string, content: string | Uint8Array): Promise<void> {
    const path = join(this.companyDir(cik), name);
    return this.serialize(path, () =>
      typeof content === 'string' ? writeFile(path, content, 'utf-8') : writeFile(path, content)
    );
  }

  async hasFile(cik: string, name: string): Promise<boolean> {
    return exists(join(this.companyDir(cik), name));
  }

  /** Append one line; appends to the same file never interleave */
  appendLine(cik: string, name: string, line: string): Promise<void> {
    const path = join(this.companyDir(cik), name);
    return this.serialize(path, () => appendFile(path, `${line}\n`, 'utf-8'));
  }

  async files(cik: string): Promise<string[]> {
    try {
      return (await readdir(this.companyDir(cik))).sort();
    } catch (err) {
      if (isNotFound(err)) return [];
      throw err;
    }
  }

  async remove(cik: string): Promise<void> {
    await rm(this.companyDir(cik), { recursive: true, force: true });
  }

  private serialize(path: string, op: () => Promise<void>): Promise<void> {
    const previous = this.writeQueues.get(path) ?? Promise.resolve();
    const next = previous.then(op);
    const settled = next.catch(() => undefined);
    this.writeQueues.set(path, settled);
    void settled.then(() => {
      if (this.writeQueues.get(path) === settled) this.writeQueues.delete(path);
    });
    return next;
  }

  /** Total bytes of regular files under the root */
  async sizeBytes(): Promise<number> {
    return directorySize(this.root);
  }
}

// ── Naming ─────────────────────────────────────────────────────────────

/** Form types like "10-K/A" must not create subdirectories */
function safeSegment(value: string): string {
  return value.replace(/[\/\\]/g, '-').replace(/\s+/g, '');
}

export function documentFileName(cik: string, ref: DocumentRef): string {
  const { filing } = ref;
  if (ref.kind === 'master') return masterRecordFileName(cik, filing);
  return `${cik}_${safeSegment(filing.form)}_${filing.filingDate}_${safeSegment(ref.name)}`;
}

export function masterRecordFileName(cik: string, filing: Filing): string {
  return `${cik}_${safeSegment(filing.form)}_${filing.filingDate}_${filing.accession}.txt`;
}

export interface ParsedFileName {
  cik: string;
  form: string;
  filingDate: string;
  rest: string;
}

/** Inverse of documentFileName, for statistics over saved folders */
export function parseDocumentFileName(name: string): ParsedFileName | null {
  const match = /^(\d{10})_([^_]+)_(\d{4}-\d{2}-\d{2})_(.+)$/.exec(name);
  if (!match) return null;
  return { cik: match[1], form: match[2], filingDate: match[3], rest: match[4] };
}

// ── fs helpers ─────────────────────────────────────────────────────────

export async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

export function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

async function directorySize(dir: string): Promise<number> {
  let entries: Dirent[];
  try {
    entries = await readdir(dir, { withFileTypes: true });
  } catch (err) {
    if (isNotFound(err)) return 0;
    throw err;
  }

  let total = 0;
  for (const entry of entries) {
    const path = join(dir, entry.name);
    if (entry.isDirectory()) {
      total += await directorySize(path);
    } else if (entry.isFile()) {
      total += (await stat(path)).size;
    }
  }
  return total;
}
