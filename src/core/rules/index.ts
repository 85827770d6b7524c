import { architectureRules } from './architecture';
import { controlFlowRules } from './control-flow';
import { functionRules } from './functions';
import { namingRules } from './naming';
import { optionalRules } from './optionals';
import { RuleDefinition } from './rule';
import { spacingRules } from './spacing';
import { typeSyntaxRules } from './type-syntax';

export * from './rule';

export const ALL_RULES: readonly RuleDefinition[] = [
  ...spacingRules,
  ...namingRules,
  ...optionalRules,
  ...functionRules,
  ...typeSyntaxRules,
  ...controlFlowRules,
  ...architectureRules
];

const RULES_BY_ID = new Map(ALL_RULES.map(rule => [rule.id, rule]));

export function getRule(id: string): RuleDefinition | undefined {
  return RULES_BY_ID.get(id);
}

export function isKnownRule(id: string): boolean {
  return RULES_BY_ID.has(id);
}
