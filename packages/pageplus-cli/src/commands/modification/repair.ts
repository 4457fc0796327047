/**
 * Repair Command
 *
 * Deduplicates points, replaces invalid polygons by their hull and checks baselines
 */

import { Command } from 'commander';
import { repairOperation } from '@pageplus/core';
import type { OutputOptions } from '../../core/context.js';
import { addOutputOptions } from '../options.js';
import { runModification } from './run-modification.js';

export function createRepairCommand(): Command {
  return addOutputOptions(
    new Command('repair')
      .description('Repair invalid text line polygons and report broken baselines')
      .argument('[inputs...]', 'Files, directories or workspaces (e.g. main:modified)')
  ).action(async (inputs: string[], options: OutputOptions, command: Command) => {
    await runModification(command, inputs, options, repairOperation());
  });
}
