/**
 * rules command - list the available rules
 */

import { ALL_RULES, RuleDefinition } from '../../core/rules';
import { colorize } from '../formatters';

export interface RulesOptions {
  format?: string;
  category?: string;
  noColors?: boolean;
}

export function formatRuleTable(rules: readonly RuleDefinition[], useColors: boolean): string {
  const idWidth = Math.max(...rules.map(rule => rule.id.length), 'RULE'.length) + 2;
  const categoryWidth = Math.max(...rules.map(rule => rule.category.length), 'CATEGORY'.length) + 2;

  const lines = [
    colorize(`${'RULE'.padEnd(idWidth)}${'CATEGORY'.padEnd(categoryWidth)}${'SEVERITY'.padEnd(10)}FIX`, 'bold', useColors)
  ];
  for (const rule of rules) {
    const severity = colorize(rule.defaultSeverity.padEnd(10), rule.defaultSeverity === 'error' ? 'red' : 'yellow', useColors);
    lines.push(`${rule.id.padEnd(idWidth)}${rule.category.padEnd(categoryWidth)}${severity}${rule.fixable ? 'yes' : ''}`);
    lines.push(colorize(`  ${rule.description}`, 'gray', useColors));
  }
  return lines.join('\n');
}

export async function listRules(options: RulesOptions): Promise<number> {
  const rules = options.category
    ? ALL_RULES.filter(rule => rule.category === options.category)
    : ALL_RULES;

  if (rules.length === 0) {
    console.error(`Error: No rules in category "${options.category}"`);
    return 2;
  }

  if (options.format === 'json') {
    console.log(JSON.stringify(rules.map(rule => ({
      id: rule.id,
      category: rule.category,
      description: rule.description,
      defaultSeverity: rule.defaultSeverity,
      fixable: rule.fixable,
      defaultOptions: rule.defaultOptions
    })), null, 2));
  } else {
    console.log(formatRuleTable(rules, !options.noColors));
  }
  return 0;
}
