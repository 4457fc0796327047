/**
 * Configuration Manager for the PagePlus CLI
 *
 * Settings come from a dotenv file (`--env-file`, `PAGEPLUS_ENV_FILE` or
 * `.env` in the working directory) overlaid by the process environment.
 */

import fs from 'fs-extra';
import path from 'path';
import dotenv from 'dotenv';
import { z } from 'zod';
import { DEFAULT_MODIFIED_SUBDIR } from '@pageplus/core';
import type { LogLevel } from '@pageplus/logger';
import { ConfigurationError } from '../../utils/error-handler.js';

export const WORKSPACE_PREFIX = 'PAGEPLUS_WS_';

const SettingsSchema = z.object({
  PAGEPLUS_MODIFIED: z
    .string()
    .regex(/^[^/\\]+$/, 'must be a single directory name')
    .default(DEFAULT_MODIFIED_SUBDIR),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  PAGEPLUS_LOG_DIR: z.string().optional(),
  PAGEPLUS_LOADED_WS: z.string().optional(),
});

export interface PagePlusSettings {
  modifiedSubdirName: string;
  logLevel: LogLevel;
  logDir?: string;
  /** Workspace name (without prefix) to its directory list */
  workspaces: Record<string, string>;
  loadedWorkspace?: string;
  /** Merged dotenv and process variables, empty values dropped */
  environment: Record<string, string>;
  /** Dotenv file that was read, if any */
  envFile?: string;
}

export interface ConfigLoadOptions {
  envFile?: string;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

export class ConfigManager {
  private settings: PagePlusSettings | null = null;

  constructor(private readonly options: ConfigLoadOptions = {}) {}

  /**
   * Read and validate settings. An env file named explicitly must exist;
   * the default `.env` is optional.
   */
  async load(): Promise<PagePlusSettings> {
    const cwd = this.options.cwd ?? process.cwd();
    const env = this.options.env ?? process.env;
    const explicitFile = this.options.envFile ?? env.PAGEPLUS_ENV_FILE;
    const envFile = path.resolve(cwd, explicitFile ?? '.env');

    let fileValues: Record<string, string> = {};
    const exists = await fs.pathExists(envFile);
    if (exists) {
      fileValues = dotenv.parse(await fs.readFile(envFile, 'utf8'));
    } else if (explicitFile !== undefined) {
      throw new ConfigurationError(`Env file not found: ${envFile}`, { envFile });
    }

    const environment: Record<string, string> = {};
    for (const [key, value] of [...Object.entries(fileValues), ...Object.entries(env)]) {
      if (value !== undefined && value !== '') {
        environment[key] = value;
      }
    }

    const parsed = SettingsSchema.safeParse(environment);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
      throw new ConfigurationError(`Invalid configuration: ${issues.join('; ')}`, { issues });
    }

    const workspaces: Record<string, string> = {};
    for (const [key, value] of Object.entries(environment)) {
      if (key.startsWith(WORKSPACE_PREFIX) && key.length > WORKSPACE_PREFIX.length) {
        workspaces[key.slice(WORKSPACE_PREFIX.length)] = value;
      }
    }

    this.settings = {
      modifiedSubdirName: parsed.data.PAGEPLUS_MODIFIED,
      logLevel: parsed.data.LOG_LEVEL,
      logDir: parsed.data.PAGEPLUS_LOG_DIR,
      workspaces,
      loadedWorkspace: parsed.data.PAGEPLUS_LOADED_WS,
      environment,
      envFile: exists ? envFile : undefined,
    };
    return this.settings;
  }

  get(): PagePlusSettings {
    if (!this.settings) {
      throw new ConfigurationError('Configuration has not been loaded');
    }
    return this.settings;
  }
}
