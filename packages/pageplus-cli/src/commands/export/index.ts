/**
 * Export Commands
 */

import { Command } from 'commander';
import { createFulltextCommand } from './fulltext.js';

export function createExportCommand(): Command {
  const command = new Command('export').description('Export content of PAGE-XML files');

  command.addCommand(createFulltextCommand());

  return command;
}

export default createExportCommand;
