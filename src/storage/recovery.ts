import type { Logger } from '../core/logger.js';
import { silentLogger } from '../core/logger.js';
import type { FolderStore } from './company-folder.js';
import type { ProgressLedger } from './progress-ledger.js';

/**
 * Startup reconciliation between staged folders and the progress ledger.
 *
 * The ledger decides "fully done"; the marker pair decides "in progress vs
 * not started". Completion writes COMPLETE, then the ledger line, then removes
 * .STAGING, so each crash window leaves a recognizable state:
 *
 * - COMPLETE without a ledger line: the ledger write never landed. The marker
 *   is removed and the folder is reopened for scanning.
 * - Ledger line, folder without COMPLETE: the folder was changed outside the
 *   scanner. The company is dropped from this run's skip-set and rescanned;
 *   its ledger line is not duplicated when it completes again.
 * - COMPLETE, ledger line and a leftover .STAGING: the crash hit after the
 *   ledger write. The stale .STAGING marker is removed.
 */

export interface RecoveryReport {
  /** COMPLETE markers removed because the ledger had no entry */
  staleCompleteMarkers: string[];
  /** Ledger entries ignored this run because their folder is incomplete */
  reopened: string[];
  /** Leftover .STAGING markers removed from complete folders */
  staleStagingMarkers: string[];
  /** Folders still in progress from an earlier run */
  inProgress: string[];
}

export async function reconcile(
  staging: FolderStore,
  ledger: ProgressLedger,
  logger: Logger = silentLogger
): Promise<RecoveryReport> {
  const report: RecoveryReport = {
    staleCompleteMarkers: [],
    reopened: [],
    staleStagingMarkers: [],
    inProgress: [],
  };

  for (const folder of await staging.list()) {
    const { cik } = folder;
    const recorded = ledger.isPersisted(cik);

    if (folder.state === 'complete' && !recorded) {
      await staging.markInProgress(cik);
      await staging.removeCompleteMarker(cik);
      report.staleCompleteMarkers.push(cik);
      report.inProgress.push(cik);
      logger.warn(`CIK ${cik}: COMPLETE marker without a ledger entry; will rescan`);
      continue;
    }

    if (folder.state === 'in-progress') {
      report.inProgress.push(cik);
      if (recorded) {
        ledger.reopen(cik);
        report.reopened.push(cik);
        logger.warn(`CIK ${cik}: ledger says done but folder is incomplete; will rescan`);
      }
      continue;
    }

    if (folder.hasStagingMarker) {
      await staging.clearInProgress(cik);
      report.staleStagingMarkers.push(cik);
    }
  }

  if (report.inProgress.length > 0) {
    logger.info(`${report.inProgress.length} in-progress company folder(s) from an earlier run will be resumed`);
  }

  return report;
}
