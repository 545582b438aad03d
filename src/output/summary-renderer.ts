import chalk from 'chalk';
import { formatElapsed } from '../core/logger.js';
import type { FlushResult, ScanSummary } from '../core/types.js';
import type { RecoveryReport } from '../storage/recovery.js';
import { padRight } from './format-utils.js';

export function renderScanSummary(summary: ScanSummary): string {
  const lines: string[] = [];

  const header = summary.status === 'completed'
    ? chalk.bold.green('Scan complete')
    : chalk.bold.yellow('Scan interrupted (resumable)');
  lines.push(header);
  lines.push(chalk.dim('='.repeat(30)));

  const row = (label: string, value: string) => lines.push(`  ${padRight(label, 22)}${value}`);
  row('Companies', String(summary.total));
  row('Completed', chalk.green(String(summary.completed)));
  row('Already done', String(summary.skipped));
  if (summary.failed > 0) row('Failed', chalk.red(String(summary.failed)));
  if (summary.interrupted > 0) row('Interrupted', chalk.yellow(String(summary.interrupted)));
  if (summary.notStarted > 0) row('Not started', String(summary.notStarted));
  row('Documents scanned', String(summary.documentsScanned));
  row('Documents saved', String(summary.documentsSaved));
  row('Flushed to archive', summary.flush ? renderFlushCounts(summary.flush) : chalk.dim('not run'));
  row('Elapsed', formatElapsed(summary.elapsedMs));

  if (summary.failures.length > 0) {
    lines.push('');
    lines.push(chalk.bold.underline('  Failures'));
    for (const f of summary.failures) {
      lines.push(`  ${chalk.cyan(f.cik)} ${f.name}: ${chalk.red(f.error)}`);
    }
  }

  if (summary.status === 'interrupted') {
    lines.push('');
    lines.push(chalk.dim('  Run the same scan command again to resume.'));
  }

  return lines.join('\n');
}

export function renderScanSummaryJson(summary: ScanSummary): string {
  return JSON.stringify(summary, null, 2);
}

export function renderFlushCounts(result: FlushResult): string {
  const moved = `${result.moved} moved`;
  return result.failed > 0 ? `${moved}, ${chalk.red(`${result.failed} failed`)}` : moved;
}

/** One line per kind of repair made at startup; '' when there were none */
export function renderRecovery(report: RecoveryReport): string {
  const lines: string[] = [];
  if (report.staleCompleteMarkers.length > 0) {
    lines.push(`Removed ${report.staleCompleteMarkers.length} COMPLETE marker(s) with no ledger entry: ${report.staleCompleteMarkers.join(', ')}`);
  }
  if (report.reopened.length > 0) {
    lines.push(`Rescanning ${report.reopened.length} ledger entr${report.reopened.length === 1 ? 'y' : 'ies'} with incomplete folders: ${report.reopened.join(', ')}`);
  }
  if (report.staleStagingMarkers.length > 0) {
    lines.push(`Cleared ${report.staleStagingMarkers.length} stale .STAGING marker(s)`);
  }
  return lines.join('\n');
}
