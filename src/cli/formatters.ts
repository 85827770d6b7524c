/**
 * Output formatters for CLI
 */

import * as path from 'path';
import { getRule } from '../core/rules';
import { LintResult, Violation } from '../core/types';

export type OutputFormat = 'text' | 'json' | 'sarif' | 'compact';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['text', 'json', 'sarif', 'compact'];

export interface FormatterOptions {
  colors?: boolean;
  /** List files without problems in text output */
  verbose?: boolean;
  /** Paths are printed relative to this directory */
  cwd?: string;
}

export interface ResultTotals {
  files: number;
  errors: number;
  warnings: number;
  fixable: number;
}

// ANSI color codes
const colors = {
  reset: '\x1b[0m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  gray: '\x1b[90m',
  bold: '\x1b[1m',
  underline: '\x1b[4m'
};

export function colorize(text: string, color: keyof typeof colors, useColors: boolean): string {
  return useColors ? `${colors[color]}${text}${colors.reset}` : text;
}

export function countTotals(results: LintResult[]): ResultTotals {
  return results.reduce<ResultTotals>((totals, result) => ({
    files: totals.files + 1,
    errors: totals.errors + result.errorCount,
    warnings: totals.warnings + result.warningCount,
    fixable: totals.fixable + result.fixableCount
  }), { files: 0, errors: 0, warnings: 0, fixable: 0 });
}

function displayPath(fileName: string, options: FormatterOptions): string {
  if (!options.cwd || !path.isAbsolute(fileName)) {
    return fileName;
  }
  return path.relative(options.cwd, fileName).split(path.sep).join('/');
}

function plural(count: number, word: string): string {
  return `${count} ${word}${count === 1 ? '' : 's'}`;
}

/**
 * Format results as human-readable text, grouped by file
 */
export function formatText(results: LintResult[], options: FormatterOptions = {}): string {
  const useColors = options.colors ?? true;
  const lines: string[] = [];

  for (const result of results) {
    if (result.violations.length === 0) {
      if (options.verbose) {
        lines.push(colorize(displayPath(result.fileName, options), 'underline', useColors));
        lines.push(colorize('  no problems', 'green', useColors));
        lines.push('');
      }
      continue;
    }
    lines.push(colorize(displayPath(result.fileName, options), 'underline', useColors));

    for (const violation of result.violations) {
      const position = colorize(`${violation.line}:${violation.column}`.padEnd(8), 'gray', useColors);
      const severity = violation.severity === 'error'
        ? colorize('error'.padEnd(8), 'red', useColors)
        : colorize('warning'.padEnd(8), 'yellow', useColors);
      lines.push(`  ${position}${severity}${violation.message}  ${colorize(violation.ruleId, 'gray', useColors)}`);
    }
    lines.push('');
  }

  const totals = countTotals(results);
  const problems = totals.errors + totals.warnings;
  if (problems === 0) {
    lines.push(colorize(`✓ ${plural(totals.files, 'file')} checked, no problems`, 'green', useColors));
  } else {
    const summary = `✗ ${plural(problems, 'problem')} (${plural(totals.errors, 'error')}, ${plural(totals.warnings, 'warning')}) in ${plural(totals.files, 'file')}`;
    lines.push(colorize(summary, totals.errors > 0 ? 'red' : 'yellow', useColors));
    if (totals.fixable > 0) {
      lines.push(colorize(`  ${totals.fixable} fixable with --fix`, 'gray', useColors));
    }
  }

  return lines.join('\n');
}

/**
 * Format results as JSON
 */
export function formatJson(results: LintResult[], options: FormatterOptions = {}): string {
  const totals = countTotals(results);
  const output = {
    summary: {
      filesChecked: totals.files,
      errorCount: totals.errors,
      warningCount: totals.warnings,
      fixableCount: totals.fixable
    },
    files: results.map(result => ({
      fileName: displayPath(result.fileName, options),
      errorCount: result.errorCount,
      warningCount: result.warningCount,
      violations: result.violations.map(v => ({
        ruleId: v.ruleId,
        category: v.category,
        severity: v.severity,
        message: v.message,
        line: v.line,
        column: v.column,
        endLine: v.endLine,
        endColumn: v.endColumn,
        fixable: v.fix !== undefined
      }))
    }))
  };

  return JSON.stringify(output, null, 2);
}

interface SarifRule {
  id: string;
  name: string;
  shortDescription: { text: string };
  defaultConfiguration: { level: 'error' | 'warning' };
}

function getUniqueRules(violations: Violation[]): SarifRule[] {
  const rules = new Map<string, SarifRule>();

  for (const v of violations) {
    if (rules.has(v.ruleId)) {
      continue;
    }
    const rule = getRule(v.ruleId);
    rules.set(v.ruleId, {
      id: v.ruleId,
      name: v.ruleId.split('-').map(part => part.charAt(0).toUpperCase() + part.slice(1)).join(''),
      shortDescription: { text: rule?.description ?? 'Source file could not be tokenized' },
      defaultConfiguration: { level: rule?.defaultSeverity === 'warning' ? 'warning' : 'error' }
    });
  }

  return [...rules.values()];
}

/**
 * Format results as SARIF (Static Analysis Results Interchange Format)
 * Compatible with GitHub Code Scanning
 */
export function formatSarif(results: LintResult[], options: FormatterOptions = {}): string {
  const violations = results.flatMap(result => result.violations);
  const rules = getUniqueRules(violations);

  const sarif = {
    $schema: 'https://raw.githubusercontent.com/oasis-tcs/sarif-spec/master/Schemata/sarif-schema-2.1.0.json',
    version: '2.1.0',
    runs: [
      {
        tool: {
          driver: {
            name: 'swiftstyle',
            version: '0.3.0',
            rules
          }
        },
        results: results.flatMap(result => result.violations.map(v => ({
          ruleId: v.ruleId,
          ruleIndex: rules.findIndex(rule => rule.id === v.ruleId),
          level: v.severity,
          message: {
            text: v.message
          },
          locations: [
            {
              physicalLocation: {
                artifactLocation: {
                  uri: displayPath(result.fileName, options)
                },
                region: {
                  startLine: v.line,
                  startColumn: v.column,
                  ...(v.endLine !== undefined && { endLine: v.endLine }),
                  ...(v.endColumn !== undefined && { endColumn: v.endColumn })
                }
              }
            }
          ]
        })))
      }
    ]
  };

  return JSON.stringify(sarif, null, 2);
}

/**
 * One line per violation: `file:line:col: severity: message [rule]`
 */
export function formatCompact(results: LintResult[], options: FormatterOptions = {}): string {
  return results
    .flatMap(result => result.violations.map(v =>
      `${displayPath(result.fileName, options)}:${v.line}:${v.column}: ${v.severity}: ${v.message} [${v.ruleId}]`
    ))
    .join('\n');
}

/**
 * Format results using specified format
 */
export function formatResults(
  results: LintResult[],
  format: OutputFormat,
  options: FormatterOptions = {}
): string {
  switch (format) {
    case 'json':
      return formatJson(results, options);
    case 'sarif':
      return formatSarif(results, options);
    case 'compact':
      return formatCompact(results, options);
    case 'text':
    default:
      return formatText(results, options);
  }
}

/**
 * 1 when there are errors or more warnings than allowed (negative means unlimited)
 */
export function exitCodeFor(results: LintResult[], maxWarnings: number = -1): number {
  const totals = countTotals(results);
  if (totals.errors > 0) {
    return 1;
  }
  return maxWarnings >= 0 && totals.warnings > maxWarnings ? 1 : 0;
}
