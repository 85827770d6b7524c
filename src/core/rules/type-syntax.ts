import { RuleDefinition, isAdjacent, isPunctuation } from './rule';

const SHORTHANDS: ReadonlyMap<string, string> = new Map([
  ['Array', '[Element]'],
  ['Dictionary', '[Key: Value]'],
  ['Optional', 'Wrapped?']
]);

export const shorthandType: RuleDefinition = {
  id: 'shorthand-type',
  description: 'Use shorthand syntax for arrays, dictionaries and optionals',
  category: 'types',
  defaultSeverity: 'warning',
  fixable: false,
  defaultOptions: {},
  check({ file, report }) {
    const { code } = file;
    code.forEach((token, i) => {
      const shorthand = token.kind === 'identifier' ? SHORTHANDS.get(token.text) : undefined;
      const next = code[i + 1];
      if (!shorthand || !next || next.kind !== 'operator' || !next.text.startsWith('<') || !isAdjacent(token, next)) {
        return;
      }
      if (isPunctuation(code[i - 1], '.')) {
        return;
      }
      report(token, `Prefer the shorthand '${shorthand}' over '${token.text}<...>'`);
    });
  }
};

export const typeSyntaxRules: RuleDefinition[] = [shorthandType];
