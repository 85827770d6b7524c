import { LintOptions, lintSource } from './linter';
import { DEFAULT_RULES, Fix, LintResult, RulesConfig, Violation } from './types';

export interface ApplyFixesResult {
  output: string;
  applied: number;
  remaining: number;
}

export interface FixSourceResult {
  output: string;
  result: LintResult;
  passes: number;
  applied: number;
}

/**
 * Apply every non-overlapping fix; a fix that starts before the previous one
 * ends is left for a later pass.
 */
export function applyFixes(source: string, violations: Violation[]): ApplyFixesResult {
  const fixes = violations
    .map(violation => violation.fix)
    .filter((fix): fix is Fix => fix !== undefined)
    .sort((a, b) => a.start - b.start || a.end - b.end);

  let output = '';
  let cursor = 0;
  let applied = 0;
  let remaining = 0;

  for (const fix of fixes) {
    if (fix.start < cursor) {
      remaining++;
      continue;
    }
    output += source.slice(cursor, fix.start) + fix.text;
    cursor = fix.end;
    applied++;
  }
  output += source.slice(cursor);

  return { output, applied, remaining };
}

/**
 * Lint and fix repeatedly until the source stops changing
 */
export function fixSource(
  source: string,
  fileName: string,
  config: RulesConfig = DEFAULT_RULES,
  maxPasses: number = 10,
  options: LintOptions = {}
): FixSourceResult {
  let output = source;
  let result = lintSource(output, fileName, config, options);
  let passes = 0;
  let applied = 0;

  while (passes < maxPasses && result.fixableCount > 0) {
    const pass = applyFixes(output, result.violations);
    if (pass.applied === 0 || pass.output === output) {
      break;
    }
    output = pass.output;
    applied += pass.applied;
    passes++;
    result = lintSource(output, fileName, config, options);
  }

  return { output, result: { ...result, output }, passes, applied };
}
