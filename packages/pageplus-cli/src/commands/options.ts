/**
 * Option parsers and option groups shared by several commands
 */

import { Command, InvalidArgumentError, Option } from 'commander';

export function parseNumber(value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed)) {
    throw new InvalidArgumentError('Not a number.');
  }
  return parsed;
}

export function parseNonNegative(value: string): number {
  const parsed = parseNumber(value);
  if (parsed < 0) {
    throw new InvalidArgumentError('Must not be negative.');
  }
  return parsed;
}

export const READING_ORDER_MODES = ['auto', 'reading_order', 'document'] as const;

export function readingOrderModeOption(): Option {
  return new Option('--mode <mode>', 'Region order: reading order, document order, or reading order with fallback')
    .choices(READING_ORDER_MODES)
    .default('auto');
}

/**
 * `--outputdir`, `--overwrite` and `--dry-run`
 */
export function addOutputOptions(command: Command): Command {
  return command
    .option('--outputdir <dir>', 'Write results to this directory instead of the modified subdirectory')
    .option('--overwrite', 'Overwrite the input files', false)
    .option('--dry-run', 'Process the files without writing anything', false);
}
