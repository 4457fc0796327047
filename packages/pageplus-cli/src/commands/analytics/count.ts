/**
 * Count Command
 *
 * Counts elements of one level in every page
 */

import { Command, Option } from 'commander';
import { Page } from '@pageplus/core';
import type { PageCountLevel } from '@pageplus/core';
import { getErrorMessage } from '@pageplus/errors';
import { collectInputFiles, createContext, globalOptions } from '../../core/context.js';
import type { CliContext } from '../../core/context.js';
import { renderCounts } from '../../output/report-renderer.js';
import type { CountRow } from '../../output/report-renderer.js';
import { handleError } from '../../utils/error-handler.js';

export const COUNT_LEVELS: readonly PageCountLevel[] = [
  'textregions',
  'tableregions',
  'tablecells',
  'textlines',
  'words',
  'glyphs',
];

interface CountCommandOptions {
  level: PageCountLevel;
}

/**
 * Count `level` in each file. Unreadable files are logged and left out.
 */
export async function countElements(context: CliContext, files: string[], level: PageCountLevel): Promise<CountRow[]> {
  const rows: CountRow[] = [];
  for (const file of files) {
    try {
      const page = await Page.fromFile(file);
      rows.push({ file, count: page.counter(level) });
    } catch (error) {
      context.logger.error(`${file}: ${getErrorMessage(error)}`, { file });
    }
  }
  return rows;
}

export function createCountCommand(): Command {
  return new Command('count')
    .description('Count regions, lines, words or glyphs per file')
    .argument('[inputs...]', 'Files, directories or workspaces (e.g. main:modified)')
    .addOption(new Option('--level <level>', 'Element level to count').choices(COUNT_LEVELS).default('textlines'))
    .action(async (inputs: string[], options: CountCommandOptions, command: Command) => {
      const global = globalOptions(command);
      try {
        const context = await createContext(global);
        const files = await collectInputFiles(context, inputs);
        const rows = await countElements(context, files, options.level);
        console.log(renderCounts(options.level, rows));
        process.exitCode = rows.length === files.length ? 0 : 1;
      } catch (error) {
        handleError(error, global.verbose);
      }
    });
}
