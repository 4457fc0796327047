/**
 * Maps command inputs to directories and files.
 *
 * An input is either an existing path or a workspace reference
 * `name[:modified[:modified...]]`, where each `:modified` descends once
 * more into the modified-output subdirectory.
 */

import fs from 'fs-extra';
import path from 'path';
import { InputsNotFoundError } from '@pageplus/errors';
import type { Logger } from '@pageplus/logger';
import { WORKSPACE_PREFIX } from './config-manager.js';
import type { PagePlusSettings } from './config-manager.js';

const MODIFIED_SUFFIX = 'modified';

/**
 * Environment variable name for a workspace name, or undefined when the
 * name cannot form one.
 */
export function toEnvName(name: string): string | undefined {
  const envName = name.replace(/[^A-Za-z0-9_]/g, '_').toUpperCase();
  if (envName === '' || /^[0-9]/.test(envName)) {
    return undefined;
  }
  return envName;
}

export class WorkspaceResolver {
  constructor(
    private readonly settings: PagePlusSettings,
    private readonly logger: Logger
  ) {}

  /**
   * Resolve every input; without inputs the loaded workspace is used.
   * Unresolvable inputs are skipped with a warning.
   */
  resolve(inputs: string[]): string[] {
    const requested =
      inputs.length > 0 ? inputs : this.settings.loadedWorkspace ? [this.settings.loadedWorkspace] : [];
    const resolved = requested.flatMap((input) => {
      const paths = this.resolveInput(input);
      if (paths.length === 0) {
        this.logger.warn(`Input not found: ${input}`, { input });
      }
      return paths;
    });
    if (resolved.length === 0) {
      throw new InputsNotFoundError(requested, 'No existing path or workspace for the given inputs');
    }
    return [...new Set(resolved)];
  }

  resolveInput(input: string): string[] {
    if (fs.pathExistsSync(input)) {
      return [path.resolve(input)];
    }

    const [name, ...suffixes] = input.split(':');
    if (suffixes.some((suffix) => suffix !== MODIFIED_SUFFIX)) {
      return [];
    }
    const dirs = this.lookup(name);
    const modified = suffixes.map(() => this.settings.modifiedSubdirName);
    return dirs.map((dir) => path.resolve(dir, ...modified)).filter((dir) => fs.pathExistsSync(dir));
  }

  /**
   * Directories registered under `NAME` or `PAGEPLUS_WS_NAME`; a value may
   * list several directories separated by the platform path delimiter.
   */
  lookup(name: string): string[] {
    const envName = toEnvName(name);
    if (envName === undefined) {
      return [];
    }
    const { environment } = this.settings;
    const value = environment[envName] ?? environment[`${WORKSPACE_PREFIX}${envName}`];
    if (value === undefined) {
      return [];
    }
    return value.split(path.delimiter).filter((dir) => dir !== '');
  }
}
