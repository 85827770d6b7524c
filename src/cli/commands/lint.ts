/**
 * lint command - lint Swift files and directories
 */

import * as fs from 'fs';
import { discoverFiles } from '../../core/file-discovery';
import { fixSource } from '../../core/fixer';
import { lintFiles } from '../../core/linter';
import { loadRulesForFile } from '../../core/rules-loader';
import { LintResult, RulesConfig } from '../../core/types';
import { logVerbose, recordRun, report, ReportOptions, resolveConfig } from '../shared';

export interface LintCommandOptions extends ReportOptions {
  config?: string;
  fix?: boolean;
}

function fixFiles(
  files: string[],
  configFor: (file: string) => RulesConfig,
  root: string,
  verbose?: boolean
): LintResult[] {
  return files.map(file => {
    logVerbose(verbose, `Fixing ${file}`);
    const source = fs.readFileSync(file, 'utf8');
    const fixed = fixSource(source, file, configFor(file), undefined, { root });
    if (fixed.output !== source) {
      fs.writeFileSync(file, fixed.output, 'utf8');
      logVerbose(verbose, `Fixed ${fixed.applied} problem(s) in ${file}`);
    }
    return fixed.result;
  });
}

export async function lint(paths: string[], options: LintCommandOptions): Promise<number> {
  try {
    const resolved = resolveConfig(options.config);
    logVerbose(options.verbose, `Using config: ${resolved.configPath ?? 'built-in defaults'}`);

    const files = await discoverFiles(paths.length > 0 ? paths : ['.'], resolved.config);
    if (files.length === 0) {
      console.log('No Swift files found.');
      return 0;
    }

    const configFor = (file: string) => loadRulesForFile(file, resolved.configRoot, resolved.config);
    const results = options.fix
      ? fixFiles(files, configFor, resolved.configRoot, options.verbose)
      : lintFiles(files, configFor, file => logVerbose(options.verbose, `Linting ${file}`), { root: resolved.configRoot });

    const historyPath = recordRun('lint', results, resolved, options.log);
    if (historyPath) {
      logVerbose(options.verbose, `Run logged to ${historyPath}`);
    }

    return report(results, options, resolved);
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown error';
    console.error(`Error: ${message}`);
    return 2;
  }
}
