/**
 * Workspace List Command
 *
 * Shows the workspaces registered as PAGEPLUS_WS_<NAME> variables
 */

import { Command } from 'commander';
import chalk from 'chalk';
import fs from 'fs-extra';
import path from 'path';
import { WORKSPACE_PREFIX } from '../../core/config/config-manager.js';
import type { PagePlusSettings } from '../../core/config/config-manager.js';
import { toEnvName } from '../../core/config/workspace-resolver.js';
import { createContext, globalOptions } from '../../core/context.js';
import { renderWorkspaces } from '../../output/report-renderer.js';
import type { WorkspaceRow } from '../../output/report-renderer.js';
import { handleError } from '../../utils/error-handler.js';

export function listWorkspaces(settings: PagePlusSettings): WorkspaceRow[] {
  const envName = settings.loadedWorkspace ? toEnvName(settings.loadedWorkspace.split(':')[0]) : undefined;
  const loaded = envName?.startsWith(WORKSPACE_PREFIX) ? envName.slice(WORKSPACE_PREFIX.length) : envName;
  return Object.entries(settings.workspaces)
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([name, value]) => {
      const directories = value.split(path.delimiter).filter((dir) => dir !== '');
      return {
        name,
        directories,
        loaded: name === loaded,
        exists: directories.every((dir) => fs.pathExistsSync(dir)),
      };
    });
}

export function createWorkspaceListCommand(): Command {
  return new Command('list')
    .description('List registered workspaces and mark the loaded one')
    .action(async (_options: Record<string, never>, command: Command) => {
      const global = globalOptions(command);
      try {
        const { settings } = await createContext(global);
        const rows = listWorkspaces(settings);
        if (rows.length === 0) {
          console.log(chalk.yellow('No workspaces registered. Add PAGEPLUS_WS_<NAME>=<directory> to your .env file.'));
          return;
        }
        console.log(renderWorkspaces(rows));
      } catch (error) {
        handleError(error, global.verbose);
      }
    });
}
