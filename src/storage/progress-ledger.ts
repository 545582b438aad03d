import { mkdir, open, readFile, rm } from 'node:fs/promises';
import { dirname } from 'node:path';
import { isNotFound } from './company-folder.js';

/**
 * Append-only ledger of fully completed companies: one 10-digit CIK per line.
 *
 * Read once at startup into a skip-set. Each completion appends a line and
 * fsyncs before record() resolves, so a crash before the append lands leaves
 * the company incomplete on the next run. Appends are serialized, and a CIK
 * already present in the file is never written twice.
 */
export class ProgressLedger {
  /** CIKs present in the file */
  private readonly persisted = new Set<string>();
  /** CIKs treated as done for this run */
  private readonly done = new Set<string>();
  private readonly order: string[] = [];
  private tail: Promise<void> = Promise.resolve();
  private needsNewline = false;

  private constructor(public readonly path: string) {}

  static async open(path: string): Promise<ProgressLedger> {
    const ledger = new ProgressLedger(path);
    let text = '';
    try {
      text = await readFile(path, 'utf-8');
    } catch (err) {
      if (!isNotFound(err)) throw err;
    }

    // A torn final line from a crash mid-append is ignored, and the next
    // append starts on a fresh line
    ledger.needsNewline = text.length > 0 && !text.endsWith('\n');
    for (const line of text.split(/\r?\n/)) {
      const cik = line.trim();
      if (!/^\d{10}$/.test(cik) || ledger.persisted.has(cik)) continue;
      ledger.order.push(cik);
      ledger.persisted.add(cik);
      ledger.done.add(cik);
    }
    return ledger;
  }

  has(cik: string): boolean {
    return this.done.has(cik);
  }

  /** Whether the CIK has a line in the file, regardless of reconciliation */
  isPersisted(cik: string): boolean {
    return this.persisted.has(cik);
  }

  get size(): number {
    return this.done.size;
  }

  /** Last CIK appended, in file order */
  last(): string | null {
    return this.order.length > 0 ? this.order[this.order.length - 1] : null;
  }

  entries(): string[] {
    return [...this.order];
  }

  /**
   * Drop a CIK from this run's skip-set without touching the file.
   * Used by startup recovery when a ledger entry disagrees with its folder.
   */
  reopen(cik: string): void {
    this.done.delete(cik);
  }

  /** Durably record a completion. Resolves only after the line is synced. */
  record(cik: string): Promise<void> {
    const write = this.tail.then(async () => {
      if (!this.persisted.has(cik)) {
        await this.append(`${this.needsNewline ? '\n' : ''}${cik}\n`);
        this.needsNewline = false;
        this.persisted.add(cik);
        this.order.push(cik);
      }
      this.done.add(cik);
    });
    this.tail = write.catch(() => undefined);
    return write;
  }

  /** Delete the ledger file and forget every entry */
  async clear(): Promise<void> {
    await this.tail;
    await rm(this.path, { force: true });
    this.persisted.clear();
    this.done.clear();
    this.order.length = 0;
    this.needsNewline = false;
  }

  private async append(line: string): Promise<void> {
    await mkdir(dirname(this.path), { recursive: true });
    const handle = await open(this.path, 'a');
    try {
      await handle.appendFile(line, 'utf-8');
      await handle.sync();
    } finally {
      await handle.close();
    }
  }
}
