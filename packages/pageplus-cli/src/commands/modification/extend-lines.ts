/**
 * Extend Lines Command
 */

import { Command, Option } from 'commander';
import { extendLinesOperation } from '@pageplus/core';
import type { BufferDirection } from '@pageplus/core';
import type { OutputOptions } from '../../core/context.js';
import { addOutputOptions, parseNonNegative } from '../options.js';
import { runModification } from './run-modification.js';

interface ExtendLinesCommandOptions extends OutputOptions {
  distance: number;
  dim: BufferDirection;
  rectify: boolean;
  cutOverlaps: boolean;
}

export function createExtendLinesCommand(): Command {
  return addOutputOptions(
    new Command('extend-lines')
      .description('Grow text line polygons, clip them to their region and split overlaps')
      .argument('[inputs...]', 'Files, directories or workspaces (e.g. main:modified)')
      .option('--distance <pixels>', 'Extension in pixels', parseNonNegative, 16)
      .addOption(new Option('--dim <dim>', 'Extend in both axes or only along x or y').choices(['all', 'x', 'y']).default('all'))
      .option('--no-rectify', 'Keep rounded buffers instead of rectangles')
      .option('--no-cut-overlaps', 'Leave overlaps between neighbouring lines')
  ).action(async (inputs: string[], options: ExtendLinesCommandOptions, command: Command) => {
    const { distance, dim, rectify, cutOverlaps } = options;
    await runModification(command, inputs, options, extendLinesOperation({ distance, dim, rectify, cutOverlaps }));
  });
}
