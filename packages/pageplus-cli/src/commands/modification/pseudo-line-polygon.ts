/**
 * Pseudo Line Polygon Command
 */

import { Command } from 'commander';
import { pseudoLinePolygonOperation } from '@pageplus/core';
import type { OutputOptions } from '../../core/context.js';
import { addOutputOptions, parseNonNegative, parseNumber } from '../options.js';
import { runModification } from './run-modification.js';

interface PseudoLinePolygonCommandOptions extends OutputOptions {
  buffersize: number;
  baselineOffset: number;
  cutOverlaps: boolean;
}

export function createPseudoLinePolygonCommand(): Command {
  return addOutputOptions(
    new Command('pseudolinepolygon')
      .description('Rebuild text line polygons from the baselines')
      .argument('[inputs...]', 'Files, directories or workspaces (e.g. main:modified)')
      .option('--buffersize <pixels>', 'Half height of the polygon around the baseline', parseNonNegative, 16)
      .option('--baseline-offset <pixels>', 'Move the baseline down by this many pixels afterwards', parseNumber, 10)
      .option('--cut-overlaps', 'Split overlaps with the previous line', false)
  ).action(async (inputs: string[], options: PseudoLinePolygonCommandOptions, command: Command) => {
    const { buffersize, baselineOffset, cutOverlaps } = options;
    await runModification(command, inputs, options, pseudoLinePolygonOperation({ buffersize, baselineOffset, cutOverlaps }));
  });
}
