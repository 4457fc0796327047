/**
 * Fulltext Export Command
 *
 * Writes the transcription of each page to a `.txt` file
 */

import { Command, Option } from 'commander';
import chalk from 'chalk';
import { exportFulltext } from '@pageplus/core';
import type { FulltextLevel, ReadingOrderMode } from '@pageplus/core';
import { collectInputFiles, createContext, globalOptions, processingConfig } from '../../core/context.js';
import { renderBatchReport, summarizeBatchReport } from '../../output/report-renderer.js';
import { handleError } from '../../utils/error-handler.js';
import { spinner } from '../../utils/spinner.js';
import { readingOrderModeOption } from '../options.js';
import { batchExitCode } from '../modification/run-modification.js';

interface FulltextCommandOptions {
  outputdir?: string;
  dehyphenate: boolean;
  readingOrder: boolean;
  mode: ReadingOrderMode;
  delimiter: string;
  level: FulltextLevel;
  dryRun: boolean;
}

/**
 * `\n` and `\t` typed on the command line stand for newline and tab.
 */
export function unescapeDelimiter(delimiter: string): string {
  return delimiter.replace(/\\n/g, '\n').replace(/\\t/g, '\t');
}

export function createFulltextCommand(): Command {
  return new Command('fulltext')
    .description('Export the full text of each page to a .txt file')
    .argument('[inputs...]', 'Files, directories or workspaces (e.g. main:modified)')
    .option('--outputdir <dir>', 'Write the text files to this directory instead of the modified subdirectory')
    .option('--dehyphenate', 'Join words hyphenated across line ends', false)
    .option('--no-reading-order', 'Visit regions in document order')
    .addOption(readingOrderModeOption())
    .option('--delimiter <text>', 'Separator between lines or regions', '\\n')
    .addOption(new Option('--level <level>', 'Text of lines or of whole regions').choices(['textline', 'region']).default('textline'))
    .option('--dry-run', 'Extract without writing anything', false)
    .action(async (inputs: string[], options: FulltextCommandOptions, command: Command) => {
      const global = globalOptions(command);
      try {
        const context = await createContext(global);
        const files = await collectInputFiles(context, inputs);
        const config = processingConfig(context.settings, { outputdir: options.outputdir, dryRun: options.dryRun });
        const delimiter = unescapeDelimiter(options.delimiter);

        const progress = spinner.start(chalk.cyan('Exporting full text'));
        const report = await exportFulltext(
          files,
          (page) =>
            page.extractFulltext({
              level: options.level,
              dehyphenate: options.dehyphenate,
              readingOrder: options.readingOrder,
              mode: options.mode,
              delimiter,
            }),
          {
            logger: context.logger,
            config,
            inputs,
            hooks: { onFileStart: (file, index, total) => progress.update(chalk.cyan(`[${index + 1}/${total}] ${file}`)) },
          }
        ).catch((error: unknown) => {
          progress.fail('Export aborted');
          throw error;
        });

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
    });
}
