/**
 * Sort And Merge Command
 */

import { Command } from 'commander';
import { sortAndMergeOperation } from '@pageplus/core';
import type { OutputOptions } from '../../core/context.js';
import { addOutputOptions, parseNonNegative } from '../options.js';
import { runModification } from './run-modification.js';

interface SortAndMergeCommandOptions extends OutputOptions {
  gapX: number;
  gapY: number;
}

export function createSortAndMergeCommand(): Command {
  return addOutputOptions(
    new Command('sort-and-merge')
      .description('Sort text lines and merge lines that were split horizontally')
      .argument('[inputs...]', 'Files, directories or workspaces (e.g. main:modified)')
      .option('--gap-x <pixels>', 'Largest horizontal gap between merged lines', parseNonNegative, 64)
      .option('--gap-y <pixels>', 'Largest vertical offset between merged lines', parseNonNegative, 10)
  ).action(async (inputs: string[], options: SortAndMergeCommandOptions, command: Command) => {
    await runModification(command, inputs, options, sortAndMergeOperation({ gapX: options.gapX, gapY: options.gapY }));
  });
}
