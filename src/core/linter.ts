/**
 * Rule engine
 *
 * Parses one file and runs every enabled rule over it. Files are linted
 * independently, so callers may process them in any order.
 */

import * as fs from 'fs';
import * as path from 'path';
import { ParseError, RuleExecutionError } from './errors';
import { toPosixPath } from './glob';
import { SourceFile, parseSource, positionAt } from './parser';
import { ALL_RULES, RuleDefinition } from './rules';
import { resolveRuleSetting } from './rules-loader';
import { SuppressionIndex } from './suppressions';
import { DEFAULT_LAYERS, DEFAULT_RULES, LintResult, Location, Fix, RulesConfig, Violation } from './types';

export interface LintOptions {
  /** Restrict the run to these rules (still subject to their configured severity) */
  rules?: readonly RuleDefinition[];
  /** Project root that layer paths are relative to */
  root?: string;
}

export function compareViolations(a: Violation, b: Violation): number {
  return a.line - b.line || a.column - b.column || a.ruleId.localeCompare(b.ruleId);
}

export function summarize(fileName: string, violations: Violation[]): LintResult {
  const sorted = [...violations].sort(compareViolations);
  return {
    fileName,
    violations: sorted,
    errorCount: sorted.filter(v => v.severity === 'error').length,
    warningCount: sorted.filter(v => v.severity === 'warning').length,
    fixableCount: sorted.filter(v => v.fix !== undefined).length
  };
}

/**
 * Path of the file as layer patterns see it: relative to the project root
 * when one is known, with forward slashes
 */
export function projectPathOf(fileName: string, root?: string): string {
  if (!root || !path.isAbsolute(fileName)) {
    return toPosixPath(fileName);
  }
  return toPosixPath(path.relative(root, fileName));
}

function runRule(rule: RuleDefinition, file: SourceFile, config: RulesConfig, projectPath: string): Violation[] {
  const setting = resolveRuleSetting(config, rule.id);
  if (setting.severity === 'off') {
    return [];
  }
  const severity = setting.severity;
  const violations: Violation[] = [];

  try {
    rule.check({
      file,
      projectPath,
      options: setting.options,
      layers: config.layers ?? DEFAULT_LAYERS,
      report(location: Location, message: string, fix?: Fix) {
        const end = fix ? positionAt(file, fix.end) : undefined;
        violations.push({
          ruleId: rule.id,
          category: rule.category,
          severity,
          message,
          line: location.line,
          column: location.column,
          endLine: location.endLine ?? end?.line,
          endColumn: location.endColumn ?? end?.column,
          ...(fix && { fix })
        });
      }
    });
  } catch (error) {
    throw new RuleExecutionError(rule.id, file.fileName, error);
  }

  return violations;
}

/**
 * Lint a single source text
 */
export function lintSource(
  source: string,
  fileName: string,
  config: RulesConfig = DEFAULT_RULES,
  options: LintOptions = {}
): LintResult {
  let file: SourceFile;
  try {
    file = parseSource(source, fileName);
  } catch (error) {
    if (error instanceof ParseError) {
      return summarize(fileName, [{
        ruleId: 'parse-error',
        category: 'parser',
        severity: 'error',
        message: error.reason,
        line: error.line,
        column: error.column
      }]);
    }
    throw error;
  }

  const projectPath = projectPathOf(fileName, options.root);
  const violations: Violation[] = [];
  for (const rule of options.rules ?? ALL_RULES) {
    violations.push(...runRule(rule, file, config, projectPath));
  }

  const suppressions = new SuppressionIndex(file.tokens);
  const reported = suppressions.isEmpty
    ? violations
    : violations.filter(violation => !suppressions.isSuppressed(violation));

  return summarize(fileName, reported);
}

/**
 * Lint files from disk, resolving the configuration of each file separately
 */
export function lintFiles(
  filePaths: string[],
  configFor: (filePath: string) => RulesConfig,
  onFile?: (filePath: string) => void,
  options: LintOptions = {}
): LintResult[] {
  return filePaths.map(filePath => {
    onFile?.(filePath);
    const source = fs.readFileSync(filePath, 'utf8');
    return lintSource(source, filePath, configFor(filePath), options);
  });
}
