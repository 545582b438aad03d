import { extname } from 'node:path';
import { BOOKKEEPING_FILES, parseDocumentFileName, type FolderStore } from './company-folder.js';

/**
 * Counts over a staging or archive root, for the `status` command.
 */

export interface FolderStats {
  root: string;
  companies: number;
  complete: number;
  inProgress: number;
  /** Saved documents, bookkeeping files excluded */
  files: number;
  bytes: number;
  byExtension: Record<string, number>;
  byForm: Record<string, number>;
}

export async function collectFolderStats(store: FolderStore): Promise<FolderStats> {
  const stats: FolderStats = {
    root: store.root,
    companies: 0,
    complete: 0,
    inProgress: 0,
    files: 0,
    bytes: await store.sizeBytes(),
    byExtension: {},
    byForm: {},
  };

  for (const folder of await store.list()) {
    stats.companies += 1;
    if (folder.state === 'complete') stats.complete += 1;
    else stats.inProgress += 1;

    for (const name of await store.files(folder.cik)) {
      if (BOOKKEEPING_FILES.has(name)) continue;
      stats.files += 1;
      const ext = extname(name).toLowerCase() || '(none)';
      stats.byExtension[ext] = (stats.byExtension[ext] ?? 0) + 1;
      const parsed = parseDocumentFileName(name);
      const form = parsed ? parsed.form : '(unknown)';
      stats.byForm[form] = (stats.byForm[form] ?? 0) + 1;
    }
  }
  return stats;
}
