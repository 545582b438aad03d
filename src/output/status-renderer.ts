import chalk from 'chalk';
import type { StatusReport } from '../core/scan-engine.js';
import type { FolderStats } from '../storage/folder-stats.js';
import { formatBytes, formatCounts, padRight } from './format-utils.js';

export function renderStatus(report: StatusReport): string {
  const lines: string[] = [];
  lines.push(chalk.bold('Scanner status'));
  lines.push('');
  lines.push(...renderFolderStats('Staging', report.staging));
  lines.push('');
  lines.push(...renderFolderStats('Archive', report.archive));
  lines.push('');
  lines.push(chalk.bold.underline('  Progress ledger'));
  lines.push(`  ${padRight('Completed companies', 22)}${report.ledgerEntries}`);
  lines.push(`  ${padRight('Last completed', 22)}${report.lastCompleted ?? chalk.dim('none')}`);
  return lines.join('\n');
}

function renderFolderStats(title: string, stats: FolderStats): string[] {
  return [
    `${chalk.bold.underline(`  ${title}`)} ${chalk.dim(stats.root)}`,
    `  ${padRight('Size', 22)}${formatBytes(stats.bytes)}`,
    `  ${padRight('Company folders', 22)}${stats.companies} (${stats.complete} complete, ${stats.inProgress} in progress)`,
    `  ${padRight('Saved files', 22)}${stats.files}`,
    `  ${padRight('By extension', 22)}${formatCounts(stats.byExtension)}`,
    `  ${padRight('By form', 22)}${formatCounts(stats.byForm)}`,
  ];
}

export function renderStatusJson(report: StatusReport): string {
  return JSON.stringify(report, null, 2);
}
