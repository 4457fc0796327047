import path from 'path';

/**
 * Per-invocation processing settings handed to the drivers.
 */
export interface ProcessingConfig {
  /** Subdirectory created beside the input when no output directory is given */
  modifiedSubdirName: string;
  outputDir?: string;
  overwrite: boolean;
  dryRun: boolean;
}

export const DEFAULT_MODIFIED_SUBDIR = 'PagePlusOutput';

/**
 * Where the transformed copy of `file` is written: the input itself when
 * overwriting, `<outputDir>/<name>` when an output directory is set, else
 * `<dir>/<modifiedSubdirName>/<name>`. With `extension` the file name keeps
 * its stem and takes the new extension.
 */
export function determineOutputPath(file: string, config: ProcessingConfig, extension?: string): string {
  const parsed = path.parse(file);
  const name = extension === undefined ? parsed.base : `${parsed.name}${extension}`;
  if (config.overwrite) {
    return extension === undefined ? file : path.join(parsed.dir, name);
  }
  if (config.outputDir) {
    return path.join(config.outputDir, name);
  }
  return path.join(parsed.dir, config.modifiedSubdirName, name);
}
