/**
 * Translate Lines Command
 */

import { Command } from 'commander';
import { translateLinesOperation } from '@pageplus/core';
import type { OutputOptions } from '../../core/context.js';
import { addOutputOptions, parseNumber } from '../options.js';
import { runModification } from './run-modification.js';

interface TranslateLinesCommandOptions extends OutputOptions {
  xoff: number;
  yoff: number;
}

export function createTranslateLinesCommand(): Command {
  return addOutputOptions(
    new Command('translate-lines')
      .description('Center line polygons on their baselines and shift lines by an offset')
      .argument('[inputs...]', 'Files, directories or workspaces (e.g. main:modified)')
      .option('--xoff <pixels>', 'Horizontal offset', parseNumber, 0)
      .option('--yoff <pixels>', 'Vertical offset', parseNumber, 0)
  ).action(async (inputs: string[], options: TranslateLinesCommandOptions, command: Command) => {
    await runModification(command, inputs, options, translateLinesOperation({ xoff: options.xoff, yoff: options.yoff }));
  });
}
