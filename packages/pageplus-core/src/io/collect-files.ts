/**
 * Input collection: PAGE-XML files from explicit paths and directories.
 */

import path from 'path';
import fg from 'fast-glob';
import fs from 'fs-extra';
import { isPageXml } from './page-xml';

export const DEFAULT_EXCLUDES: readonly string[] = ['metadata.xml', 'mets.xml', 'METS.xml'];

async function isPageXmlFile(file: string): Promise<boolean> {
  if (path.extname(file).toLowerCase() !== '.xml') {
    return false;
  }
  return isPageXml(await fs.readFile(file, 'utf8'));
}

/**
 * Collect PAGE-XML files from `inputs`. Files are taken as they are,
 * directories contribute their own `*.xml` entries (not recursive). Names
 * in `exclude` and documents outside the PAGE namespace are skipped.
 * Missing inputs are ignored; the result is sorted and free of duplicates.
 */
export async function collectXmlFiles(
  inputs: string[],
  exclude: readonly string[] = DEFAULT_EXCLUDES
): Promise<string[]> {
  const candidates = new Set<string>();

  for (const input of inputs) {
    if (!(await fs.pathExists(input))) {
      continue;
    }
    const stat = await fs.stat(input);
    if (stat.isFile()) {
      candidates.add(path.resolve(input));
    } else if (stat.isDirectory()) {
      const entries = await fg('*.xml', {
        cwd: input,
        absolute: true,
        onlyFiles: true,
        caseSensitiveMatch: false,
      });
      entries.forEach((entry) => candidates.add(path.resolve(entry)));
    }
  }

  const files: string[] = [];
  for (const candidate of [...candidates].sort()) {
    if (exclude.includes(path.basename(candidate))) {
      continue;
    }
    if (await isPageXmlFile(candidate)) {
      files.push(candidate);
    }
  }
  return files;
}
