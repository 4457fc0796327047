/**
 * Analytics Commands
 */

import { Command } from 'commander';
import { createCountCommand } from './count.js';

export function createAnalyticsCommand(): Command {
  const command = new Command('analytics').description('Statistics over PAGE-XML files');

  command.addCommand(createCountCommand());

  return command;
}

export default createAnalyticsCommand;
