/**
 * Reassign Ids Command
 */

import { Command } from 'commander';
import { reassignIdsOperation } from '@pageplus/core';
import type { ReadingOrderMode } from '@pageplus/core';
import type { OutputOptions } from '../../core/context.js';
import { addOutputOptions, readingOrderModeOption } from '../options.js';
import { runModification } from './run-modification.js';

interface ReassignIdsCommandOptions extends OutputOptions {
  mode: ReadingOrderMode;
}

export function createReassignIdsCommand(): Command {
  return addOutputOptions(
    new Command('reassign-ids')
      .description('Renumber regions, lines, words and glyphs hierarchically')
      .argument('[inputs...]', 'Files, directories or workspaces (e.g. main:modified)')
      .addOption(readingOrderModeOption())
  ).action(async (inputs: string[], options: ReassignIdsCommandOptions, command: Command) => {
    await runModification(command, inputs, options, reassignIdsOperation(options.mode));
  });
}
