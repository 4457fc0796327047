/**
 * Per-invocation state shared by all commands
 */

import type { Command } from 'commander';
import { collectXmlFiles, DEFAULT_EXCLUDES } from '@pageplus/core';
import type { ProcessingConfig } from '@pageplus/core';
import type { Logger } from '@pageplus/logger';
import { ConfigManager } from './config/config-manager.js';
import type { PagePlusSettings } from './config/config-manager.js';
import { WorkspaceResolver } from './config/workspace-resolver.js';
import { configureLogger } from '../utils/logger.js';
import { spinner } from '../utils/spinner.js';

export interface GlobalOptions {
  verbose?: boolean;
  quiet?: boolean;
  envFile?: string;
}

export interface OutputOptions {
  outputdir?: string;
  overwrite?: boolean;
  dryRun?: boolean;
}

export interface CliContext {
  settings: PagePlusSettings;
  logger: Logger;
  resolver: WorkspaceResolver;
  verbose: boolean;
}

/**
 * Load settings, configure logging and the spinner from the global flags.
 */
export async function createContext(options: GlobalOptions): Promise<CliContext> {
  const verbose = options.verbose ?? false;
  const quiet = options.quiet ?? false;
  const settings = await new ConfigManager({ envFile: options.envFile }).load();
  const logger = configureLogger({ level: settings.logLevel, logDir: settings.logDir, verbose, quiet });
  spinner.setSilent(quiet);
  logger.debug('Settings loaded', { envFile: settings.envFile, modifiedSubdirName: settings.modifiedSubdirName });
  return { settings, logger, resolver: new WorkspaceResolver(settings, logger), verbose };
}

/**
 * Global options merged with the command's own.
 */
export function globalOptions(command: Command): GlobalOptions {
  const { verbose, quiet, envFile } = command.optsWithGlobals<GlobalOptions>();
  return { verbose, quiet, envFile };
}

export function processingConfig(settings: PagePlusSettings, options: OutputOptions): ProcessingConfig {
  return {
    modifiedSubdirName: settings.modifiedSubdirName,
    outputDir: options.outputdir,
    overwrite: options.overwrite ?? false,
    dryRun: options.dryRun ?? false,
  };
}

/**
 * Resolve inputs (paths or workspace names) to PAGE-XML files.
 */
export async function collectInputFiles(context: CliContext, inputs: string[]): Promise<string[]> {
  const paths = context.resolver.resolve(inputs);
  const files = await collectXmlFiles(paths, DEFAULT_EXCLUDES);
  context.logger.debug(`Collected ${files.length} PAGE-XML files`, { inputs: paths });
  return files;
}
