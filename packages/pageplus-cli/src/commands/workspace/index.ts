/**
 * Workspace Commands
 */

import { Command } from 'commander';
import { createWorkspaceListCommand } from './list.js';

export function createWorkspaceCommand(): Command {
  const command = new Command('workspace').description('Named input directories from the environment');

  command.addCommand(createWorkspaceListCommand());

  return command;
}

export default createWorkspaceCommand;
