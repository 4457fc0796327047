/**
 * Shared driver for every modification verb: resolve inputs, run the batch
 * with a spinner, print the report.
 */

import type { Command } from 'commander';
import chalk from 'chalk';
import { runBatch } from '@pageplus/core';
import type { BatchReport, PageOperation } from '@pageplus/core';
import { collectInputFiles, createContext, globalOptions, processingConfig } from '../../core/context.js';
import type { OutputOptions } from '../../core/context.js';
import { renderBatchReport, summarizeBatchReport } from '../../output/report-renderer.js';
import { getExitCode, handleError } from '../../utils/error-handler.js';
import { spinner } from '../../utils/spinner.js';

/**
 * Exit code of a finished batch: 0, or the code of the first failure.
 */
export function batchExitCode(report: BatchReport): number {
  const failure = report.files.find((file) => file.status === 'failed');
  return failure ? getExitCode(failure.error) : 0;
}

export async function runModification(
  command: Command,
  inputs: string[],
  options: OutputOptions,
  operation: PageOperation
): Promise<void> {
  const global = globalOptions(command);
  try {
    const context = await createContext(global);
    const files = await collectInputFiles(context, inputs);
    const config = processingConfig(context.settings, options);

    const progress = spinner.start(chalk.cyan(`${operation.name}: starting`));
    let report: BatchReport;
    try {
      report = await runBatch(files, operation, {
        logger: context.logger,
        config,
        inputs,
        hooks: {
          onFileStart: (file, index, total) => progress.update(chalk.cyan(`${operation.name}: [${index + 1}/${total}] ${file}`)),
        },
      });
    } catch (error) {
      progress.fail(`${operation.name} aborted`);
      throw error;
    }

    const exitCode = batchExitCode(report);
    if (exitCode === 0) {
      progress.succeed(summarizeBatchReport(report));
    } else {
      progress.warn(summarizeBatchReport(report));
    }
    if (!global.quiet) {
      console.log(renderBatchReport(report));
    }
    process.exitCode = exitCode;
  } catch (error) {
    handleError(error, global.verbose);
  }
}
