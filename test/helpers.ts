import { lintSource } from '../src/core/linter';
import { RuleDefinition } from '../src/core/rules';
import { DEFAULT_RULES, RuleSettingInput, Violation } from '../src/core/types';

/**
 * Lint `source` with a single rule, optionally overriding its setting
 */
export function runRule(rule: RuleDefinition, source: string, setting?: RuleSettingInput, fileName = 'Test.swift'): Violation[] {
  const config = setting === undefined
    ? DEFAULT_RULES
    : { ...DEFAULT_RULES, rules: { [rule.id]: setting } };
  return lintSource(source, fileName, config, { rules: [rule] }).violations;
}

export function positions(violations: Violation[]): Array<[number, number]> {
  return violations.map(v => [v.line, v.column]);
}

export function messages(violations: Violation[]): string[] {
  return violations.map(v => v.message);
}
