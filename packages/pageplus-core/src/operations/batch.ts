/**
 * Sequential batch runner: load, apply, save one file at a time.
 */

import fs from 'fs-extra';
import { InputsNotFoundError, SerializationError, toAppError } from '@pageplus/errors';
import type { AppError } from '@pageplus/errors';
import type { Logger } from '@pageplus/logger';
import { determineOutputPath } from '../io/output-path';
import type { ProcessingConfig } from '../io/output-path';
import { Page } from '../models/page';
import type { OperationStats, PageOperation } from './types';

export type FileStatus = 'saved' | 'dry-run' | 'failed';

export interface FileReport {
  file: string;
  status: FileStatus;
  stats?: OperationStats;
  outputPath?: string;
  error?: AppError;
}

export interface BatchReport {
  operation: string;
  files: FileReport[];
}

export interface BatchHooks {
  onFileStart?(file: string, index: number, total: number): void;
  onFileDone?(report: FileReport, index: number, total: number): void;
}

export interface BatchOptions {
  logger: Logger;
  config: ProcessingConfig;
  hooks?: BatchHooks;
  /** Inputs the file list was collected from, for error messages */
  inputs?: string[];
}

/**
 * A single file's work: produce its report. Failures other than
 * programming errors are reported, not thrown.
 */
export type FileTask = (file: string, logger: Logger) => Promise<FileReport>;

export async function runFiles(
  operationName: string,
  files: string[],
  task: FileTask,
  options: BatchOptions
): Promise<BatchReport> {
  if (files.length === 0) {
    throw new InputsNotFoundError(options.inputs ?? []);
  }
  const { hooks } = options;
  const logger = options.logger.child({ operation: operationName });
  const reports: FileReport[] = [];

  for (const [index, file] of files.entries()) {
    hooks?.onFileStart?.(file, index, files.length);
    let report: FileReport;
    try {
      report = await task(file, logger);
    } catch (error) {
      const appError = toAppError(error);
      if (!appError.isOperational) {
        throw error;
      }
      logger.error(`${file}: ${appError.message}`, { file, code: appError.code, ...appError.context });
      report = { file, status: 'failed', error: appError };
    }
    reports.push(report);
    hooks?.onFileDone?.(report, index, files.length);
  }
  return { operation: operationName, files: reports };
}

/**
 * Apply `operation` to every file and write the results, unless the
 * configuration asks for a dry run. A file that cannot be read or written is
 * recorded as failed and the batch moves on.
 */
export async function runBatch(
  files: string[],
  operation: PageOperation,
  options: BatchOptions
): Promise<BatchReport> {
  const { config } = options;
  return runFiles(
    operation.name,
    files,
    async (file, logger) => {
      logger.info(`Processing file: ${file}`, { file });
      const page = await Page.fromFile(file);
      const stats = operation.apply(page, logger.child({ file }));
      const outputPath = determineOutputPath(file, config);
      if (config.dryRun) {
        logger.info(`Dry run, not writing ${outputPath}`, { file, ...stats });
        return { file, status: 'dry-run', stats, outputPath };
      }
      await page.save(outputPath);
      logger.info(`Wrote modified file to ${outputPath}`, { file, ...stats });
      return { file, status: 'saved', stats, outputPath };
    },
    options
  );
}

/**
 * Write each page's full text to `<name>.txt` beside the modified output.
 */
export async function exportFulltext(
  files: string[],
  extract: (page: Page) => string,
  options: BatchOptions
): Promise<BatchReport> {
  const { config } = options;
  return runFiles(
    'export_fulltext',
    files,
    async (file, logger) => {
      const page = await Page.fromFile(file);
      const text = extract(page);
      const outputPath = determineOutputPath(file, config, '.txt');
      const stats = { lines: page.counter('textlines'), changed: 0, failed: 0 };
      if (config.dryRun) {
        return { file, status: 'dry-run', stats, outputPath };
      }
      await writeText(outputPath, text);
      logger.info(`Wrote full text to ${outputPath}`, { file });
      return { file, status: 'saved', stats: { ...stats, changed: 1 }, outputPath };
    },
    options
  );
}

async function writeText(file: string, text: string): Promise<void> {
  try {
    await fs.outputFile(file, text, 'utf8');
  } catch (error) {
    throw new SerializationError(
      `Cannot write ${file}`,
      file,
      error instanceof Error ? error : undefined
    );
  }
}
