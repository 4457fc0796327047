/**
 * CLI Setup and Command Registration for PagePlus
 *
 * Sets up Commander.js with all commands and global options.
 */

import { Command } from 'commander';
import { createModificationCommand } from './commands/modification/index.js';
import { createExportCommand } from './commands/export/index.js';
import { createAnalyticsCommand } from './commands/analytics/index.js';
import { createWorkspaceCommand } from './commands/workspace/index.js';

export const VERSION = '0.3.0';

/**
 * Create and configure the CLI program
 */
export function createCLI(): Command {
  const program = new Command();

  program
    .name('pageplus')
    .description('Repair, extend and normalise text line geometry in PAGE-XML files')
    .version(VERSION, '-V, --version', 'Output the current version');

  program
    .option('-v, --verbose', 'Verbose output (debug level)', false)
    .option('-q, --quiet', 'Minimal output (errors only)', false)
    .option('--env-file <path>', 'Read settings from this dotenv file instead of .env');

  return program;
}

/**
 * Register all commands
 */
export function registerCommands(program: Command): void {
  program.addCommand(createModificationCommand());
  program.addCommand(createExportCommand());
  program.addCommand(createAnalyticsCommand());
  program.addCommand(createWorkspaceCommand());
}

/**
 * Parse CLI arguments and execute
 */
export async function runCLI(argv?: string[]): Promise<void> {
  const program = createCLI();
  registerCommands(program);

  await program.parseAsync(argv ?? process.argv);
}
