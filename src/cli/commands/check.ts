/**
 * check command - lint git staged or committed changes, reporting only
 * violations on added lines
 */

import * as path from 'path';
import { execFileSync } from 'child_process';
import { computeDiff, getAddedLineNumbers } from '../../core/diff';
import { matchesAny, toPosixPath } from '../../core/glob';
import { lintSource, summarize } from '../../core/linter';
import { loadRulesForFile } from '../../core/rules-loader';
import { DEFAULT_EXCLUDE, DEFAULT_INCLUDE, LintResult, RulesConfig } from '../../core/types';
import { logVerbose, recordRun, report, ReportOptions, resolveConfig } from '../shared';

export interface CheckOptions extends ReportOptions {
  staged?: boolean;
  commit?: string;
  config?: string;
}

export interface FileChange {
  /** Path relative to the repository root */
  fileName: string;
  before: string;
  after: string;
}

function git(args: string[], cwd: string): string {
  return execFileSync('git', args, { cwd, encoding: 'utf8', maxBuffer: 64 * 1024 * 1024 });
}

/**
 * Parse `--name-status` output into [status, old path, new path]
 */
export function parseNameStatus(output: string): Array<{ status: string; from: string; to: string }> {
  return output
    .split('\n')
    .filter(line => line.trim().length > 0)
    .map(line => {
      const [status, first, second] = line.split('\t');
      return { status: status.charAt(0), from: first, to: second ?? first };
    });
}

function readChanges(
  root: string,
  listArgs: string[],
  beforeRef: (file: string) => string,
  afterRef: (file: string) => string
): FileChange[] {
  return parseNameStatus(git(listArgs, root)).map(({ status, from, to }) => ({
    fileName: to,
    before: status === 'A' ? '' : git(['show', beforeRef(from)], root),
    after: git(['show', afterRef(to)], root)
  }));
}

function getStagedChanges(root: string): FileChange[] {
  try {
    return readChanges(
      root,
      ['diff', '--cached', '--name-status', '--diff-filter=ACMR'],
      file => `HEAD:${file}`,
      file => `:${file}`
    );
  } catch (error) {
    const reason = error instanceof Error ? error.message : 'Unknown error';
    throw new Error(`Failed to get staged changes. Make sure you are in a git repository. (${reason})`);
  }
}

function getCommitChanges(root: string, commit: string): FileChange[] {
  try {
    return readChanges(
      root,
      ['diff-tree', '--root', '--no-commit-id', '--name-status', '-r', '--diff-filter=ACMR', commit],
      file => `${commit}^:${file}`,
      file => `${commit}:${file}`
    );
  } catch (error) {
    const reason = error instanceof Error ? error.message : 'Unknown error';
    throw new Error(`Failed to get changes for commit ${commit}. Make sure the commit exists. (${reason})`);
  }
}

export function isLintTarget(fileName: string, config: RulesConfig): boolean {
  const posix = toPosixPath(fileName);
  return matchesAny(posix, config.include ?? DEFAULT_INCLUDE) && !matchesAny(posix, config.exclude ?? DEFAULT_EXCLUDE);
}

/**
 * Lint the new content of a change, keeping violations on added lines.
 * A file that fails to tokenize keeps its parse error wherever it is.
 */
export function lintChange(change: FileChange, filePath: string, config: RulesConfig, root?: string): LintResult {
  const result = lintSource(change.after, filePath, config, { root });
  const added = getAddedLineNumbers(computeDiff(change.before, change.after));
  return summarize(
    filePath,
    result.violations.filter(v => v.ruleId === 'parse-error' || added.has(v.line))
  );
}

export async function check(options: CheckOptions): Promise<number> {
  try {
    const resolved = resolveConfig(options.config);
    logVerbose(options.verbose, `Using config: ${resolved.configPath ?? 'built-in defaults'}`);

    const root = git(['rev-parse', '--show-toplevel'], process.cwd()).trim();
    const changes = (options.commit ? getCommitChanges(root, options.commit) : getStagedChanges(root))
      .filter(change => isLintTarget(change.fileName, resolved.config));

    if (changes.length === 0) {
      console.log('No Swift changes to check.');
      return 0;
    }

    const results = changes.map(change => {
      const filePath = path.join(root, change.fileName);
      logVerbose(options.verbose, `Checking ${change.fileName}`);
      const config = loadRulesForFile(filePath, resolved.configRoot, resolved.config);
      return lintChange(change, filePath, config, resolved.configRoot);
    });

    recordRun('check', results, resolved, options.log);
    return report(results, options, resolved);
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown error';
    console.error(`Error: ${message}`);
    return 2;
  }
}
