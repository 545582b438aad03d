import { copyFile, mkdir, stat } from 'node:fs/promises';
import { join } from 'node:path';
import type { Logger } from '../core/logger.js';
import { silentLogger } from '../core/logger.js';
import { errorMessage } from '../core/errors.js';
import type { FlushResult } from '../core/types.js';
import { COMPLETE_MARKER, STAGING_MARKER, type FolderStore } from './company-folder.js';
import type { ProgressLedger } from './progress-ledger.js';

/**
 * Moves completed company folders from staging to the archive.
 *
 * Only folders carrying the COMPLETE marker whose CIK is already in the
 * progress ledger move. A COMPLETE folder with no ledger line stays in staging
 * for startup recovery. Files are copied first, each copy is checked against
 * the source size, COMPLETE is written last on the archive side, and only
 * then is the staged folder deleted. A failure at
 * any point leaves the staged folder in place, so flush() can simply be run
 * again. Concurrent calls are serialized.
 */
export class Flusher {
  private tail: Promise<unknown> = Promise.resolve();

  constructor(
    private readonly staging: FolderStore,
    private readonly archive: FolderStore,
    private readonly ledger: ProgressLedger,
    private readonly logger: Logger = silentLogger
  ) {}

  flush(): Promise<FlushResult> {
    const run = this.tail.then(() => this.flushOnce());
    this.tail = run.catch(() => undefined);
    return run;
  }

  private async flushOnce(): Promise<FlushResult> {
    const folders = await this.staging.list();
    const complete = folders.filter(f => f.state === 'complete' && this.ledger.isPersisted(f.cik));
    const unrecorded = folders.filter(f => f.state === 'complete' && !this.ledger.isPersisted(f.cik));
    if (unrecorded.length > 0) {
      this.logger.debug(
        `flush: leaving ${unrecorded.length} COMPLETE folder(s) without a ledger entry in staging: ` +
        unrecorded.map(f => f.cik).join(', ')
      );
    }
    if (complete.length === 0) {
      this.logger.debug('flush: nothing to move');
      return { moved: 0, failed: 0 };
    }

    await this.archive.ensureRoot();
    let moved = 0;
    let failed = 0;

    for (const folder of complete) {
      try {
        await this.moveFolder(folder.cik);
        moved += 1;
      } catch (err) {
        failed += 1;
        this.logger.error(`flush of ${folder.cik} failed, left in staging: ${errorMessage(err)}`);
      }
    }

    this.logger.info(`Flushed ${moved} company folder(s) to ${this.archive.root}${failed > 0 ? `, ${failed} failed` : ''}`);
    return { moved, failed };
  }

  private async moveFolder(cik: string): Promise<void> {
    const source = this.staging.companyDir(cik);
    const target = this.archive.companyDir(cik);
    await mkdir(target, { recursive: true });

    const names = (await this.staging.files(cik)).filter(
      name => name !== STAGING_MARKER && name !== COMPLETE_MARKER
    );

    for (const name of names) {
      const from = join(source, name);
      const info = await stat(from);
      if (!info.isFile()) continue;
      const to = join(target, name);
      await copyFile(from, to);
      const copied = await stat(to);
      if (copied.size !== info.size) {
        throw new Error(`size mismatch copying ${name} (${copied.size} of ${info.size} bytes)`);
      }
    }

    await this.archive.clearInProgress(cik);
    await this.archive.markComplete(cik, 'flushed');
    await this.staging.remove(cik);
  }
}
