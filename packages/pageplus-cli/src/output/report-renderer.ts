/**
 * Table output for batch reports and counts
 */

import path from 'path';
import Table from 'cli-table3';
import chalk from 'chalk';
import type { BatchReport, FileReport, FileStatus } from '@pageplus/core';

const STATUS_COLORS: Record<FileStatus, (text: string) => string> = {
  saved: chalk.green,
  'dry-run': chalk.cyan,
  failed: chalk.red,
};

function createTable(headers: string[]): Table.Table {
  return new Table({
    head: headers.map((header) => chalk.bold.cyan(header)),
    style: { head: [], border: ['gray'] },
    wordWrap: true,
    wrapOnWordBoundary: false,
  });
}

function detail(report: FileReport): string {
  if (report.error) {
    return report.error.message;
  }
  return report.outputPath ?? '';
}

/**
 * One row per file: status, line statistics, output path or error.
 */
export function renderBatchReport(report: BatchReport): string {
  const withMerges = report.files.some((file) => file.stats?.merged !== undefined);
  const headers = ['File', 'Status', 'Lines', 'Changed', 'Failed'];
  if (withMerges) {
    headers.push('Merged');
  }
  headers.push('Output / Error');

  const table = createTable(headers);
  for (const file of report.files) {
    const row = [
      path.basename(file.file),
      STATUS_COLORS[file.status](file.status),
      String(file.stats?.lines ?? '-'),
      String(file.stats?.changed ?? '-'),
      String(file.stats?.failed ?? '-'),
    ];
    if (withMerges) {
      row.push(String(file.stats?.merged ?? '-'));
    }
    row.push(detail(file));
    table.push(row);
  }
  return table.toString();
}

export function summarizeBatchReport(report: BatchReport): string {
  const failed = report.files.filter((file) => file.status === 'failed').length;
  const total = report.files.length;
  return `${report.operation}: ${total - failed} of ${total} files processed` + (failed > 0 ? `, ${failed} failed` : '');
}

export interface CountRow {
  file: string;
  count: number;
}

export function renderCounts(level: string, rows: CountRow[]): string {
  const table = createTable(['File', level]);
  let total = 0;
  for (const row of rows) {
    table.push([path.basename(row.file), String(row.count)]);
    total += row.count;
  }
  table.push([chalk.bold('Total'), chalk.bold(String(total))]);
  return table.toString();
}

export interface WorkspaceRow {
  name: string;
  directories: string[];
  loaded: boolean;
  exists: boolean;
}

export function renderWorkspaces(rows: WorkspaceRow[]): string {
  const table = createTable(['Workspace', 'Directories', 'Loaded']);
  for (const row of rows) {
    const directories = row.directories.join('\n');
    table.push([
      row.loaded ? chalk.bold(row.name) : row.name,
      row.exists ? directories : chalk.red(directories),
      row.loaded ? chalk.green('*') : '',
    ]);
  }
  return table.toString();
}
