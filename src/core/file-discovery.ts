import * as fs from 'fs';
import * as path from 'path';
import { glob } from 'glob';
import { DEFAULT_EXCLUDE, DEFAULT_INCLUDE, RulesConfig } from './types';

/**
 * Expand the given files and directories into the Swift files to lint.
 * Files named explicitly are always kept; directories are searched with the
 * configured include and exclude patterns.
 */
export async function discoverFiles(targets: string[], config: RulesConfig, cwd: string = process.cwd()): Promise<string[]> {
  const include = config.include ?? DEFAULT_INCLUDE;
  const ignore = config.exclude ?? DEFAULT_EXCLUDE;
  const files: string[] = [];

  for (const target of targets) {
    const resolved = path.resolve(cwd, target);
    if (!fs.existsSync(resolved)) {
      throw new Error(`No such file or directory: ${target}`);
    }

    if (fs.statSync(resolved).isFile()) {
      files.push(resolved);
      continue;
    }

    for (const pattern of include) {
      const matches = await glob(pattern, { cwd: resolved, ignore, nodir: true });
      files.push(...matches.map(file => path.resolve(resolved, file)));
    }
  }

  return [...new Set(files)].sort();
}
