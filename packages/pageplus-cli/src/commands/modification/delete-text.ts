/**
 * Delete Text / Delete Text Lines Commands
 */

import { Command, Option } from 'commander';
import { deleteTextLinesOperation, deleteTextOperation } from '@pageplus/core';
import type { TextLevel } from '@pageplus/core';
import type { OutputOptions } from '../../core/context.js';
import { addOutputOptions } from '../options.js';
import { runModification } from './run-modification.js';

interface DeleteTextCommandOptions extends OutputOptions {
  level: TextLevel;
}

export function createDeleteTextCommand(): Command {
  return addOutputOptions(
    new Command('delete-text')
      .description('Delete the transcription at one level')
      .argument('[inputs...]', 'Files, directories or workspaces (e.g. main:modified)')
      .addOption(new Option('--level <level>', 'Text level to delete').choices(['word', 'line', 'region']).default('region'))
  ).action(async (inputs: string[], options: DeleteTextCommandOptions, command: Command) => {
    await runModification(command, inputs, options, deleteTextOperation(options.level));
  });
}

export function createDeleteTextLinesCommand(): Command {
  return addOutputOptions(
    new Command('delete-textlines')
      .description('Delete every text line')
      .argument('[inputs...]', 'Files, directories or workspaces (e.g. main:modified)')
  ).action(async (inputs: string[], options: OutputOptions, command: Command) => {
    await runModification(command, inputs, options, deleteTextLinesOperation());
  });
}
