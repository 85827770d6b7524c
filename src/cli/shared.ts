/**
 * Helpers shared by the lint and check commands
 */

import * as fs from 'fs';
import * as path from 'path';
import { InvalidArgumentError } from 'commander';
import { appendRun, RunEntry, toRunEntry } from '../core/history';
import { summarize } from '../core/linter';
import { findConfigFile, loadRulesFromPath } from '../core/rules-loader';
import { DEFAULT_RULES, LintResult, RulesConfig } from '../core/types';
import { exitCodeFor, formatResults, OutputFormat } from './formatters';

export interface ReportOptions {
  format: OutputFormat;
  output?: string;
  /** Only report errors */
  quiet?: boolean;
  maxWarnings?: number;
  verbose?: boolean;
  noColors?: boolean;
  /** Append this run to the history file */
  log?: boolean;
}

export interface ResolvedConfig {
  config: RulesConfig;
  /** Directory that holds the root configuration, or the working directory */
  configRoot: string;
  configPath?: string;
}

/**
 * Option parser for whole integers such as `--max-warnings -1`
 */
export function parseInteger(value: string): number {
  if (!/^-?\d+$/.test(value)) {
    throw new InvalidArgumentError('Not a number.');
  }
  return Number.parseInt(value, 10);
}

export function resolveConfig(configOption: string | undefined, cwd: string = process.cwd()): ResolvedConfig {
  if (configOption) {
    const configPath = path.resolve(cwd, configOption);
    if (!fs.existsSync(configPath)) {
      throw new Error(`Config file not found: ${configOption}`);
    }
    return { config: loadRulesFromPath(configPath), configRoot: path.dirname(configPath), configPath };
  }

  const configPath = findConfigFile(cwd);
  if (!configPath) {
    return { config: DEFAULT_RULES, configRoot: cwd };
  }
  return { config: loadRulesFromPath(configPath), configRoot: path.dirname(configPath), configPath };
}

export function logVerbose(enabled: boolean | undefined, message: string): void {
  if (enabled) {
    console.error(message);
  }
}

export function errorsOnly(results: LintResult[]): LintResult[] {
  return results.map(result => ({
    ...summarize(result.fileName, result.violations.filter(v => v.severity === 'error')),
    ...(result.output !== undefined && { output: result.output })
  }));
}

export function recordRun(
  command: RunEntry['command'],
  results: LintResult[],
  resolved: ResolvedConfig,
  force: boolean | undefined
): string | undefined {
  const global = resolved.config.global ?? {};
  if (!force && !global.log_runs) {
    return undefined;
  }
  const historyPath = path.resolve(resolved.configRoot, global.history_path ?? '.swiftstyle/history.json');
  appendRun(historyPath, toRunEntry(command, results));
  return historyPath;
}

/**
 * Print or write the report and compute the exit code
 */
export function report(results: LintResult[], options: ReportOptions, resolved: ResolvedConfig): number {
  const reported = options.quiet ? errorsOnly(results) : results;
  const formatted = formatResults(reported, options.format, {
    colors: !options.noColors && !options.output && options.format === 'text',
    verbose: options.verbose,
    cwd: process.cwd()
  });

  if (options.output) {
    fs.writeFileSync(options.output, formatted + '\n', 'utf8');
    console.log(`Results written to ${options.output}`);
  } else if (formatted.length > 0) {
    console.log(formatted);
  }

  const maxWarnings = options.maxWarnings ?? resolved.config.global?.max_warnings ?? -1;
  return exitCodeFor(reported, maxWarnings);
}
