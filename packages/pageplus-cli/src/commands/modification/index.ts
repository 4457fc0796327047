/**
 * Modification Commands
 *
 * Geometry and structure edits applied to PAGE-XML files in batch
 */

import { Command } from 'commander';
import { createRepairCommand } from './repair.js';
import { createExtendLinesCommand } from './extend-lines.js';
import { createPseudoLinePolygonCommand } from './pseudo-line-polygon.js';
import { createSortAndMergeCommand } from './sort-and-merge.js';
import { createDeleteTextCommand, createDeleteTextLinesCommand } from './delete-text.js';
import { createReassignIdsCommand } from './reassign-ids.js';
import { createTranslateLinesCommand } from './translate-lines.js';

export function createModificationCommand(): Command {
  const command = new Command('modification').description('Modify line geometry, text and identifiers');

  command.addCommand(createRepairCommand());
  command.addCommand(createExtendLinesCommand());
  command.addCommand(createPseudoLinePolygonCommand());
  command.addCommand(createSortAndMergeCommand());
  command.addCommand(createDeleteTextCommand());
  command.addCommand(createDeleteTextLinesCommand());
  command.addCommand(createReassignIdsCommand());
  command.addCommand(createTranslateLinesCommand());

  return command;
}

export default createModificationCommand;
