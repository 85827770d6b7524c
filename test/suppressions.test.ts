import { lintSource } from '../src/core/linter';
import { noForceUnwrap } from '../src/core/rules/optionals';
import { noSemicolons } from '../src/core/rules/spacing';
import { parseDirectives } from '../src/core/suppressions';
import { tokenize } from '../src/core/tokenizer';
import { DEFAULT_RULES } from '../src/core/types';

function lintLines(lines: string[]): Array<[string, number]> {
  const result = lintSource(lines.join('\n') + '\n', 'Test.swift', DEFAULT_RULES, {
    rules: [noForceUnwrap, noSemicolons]
  });
  return result.violations.map(v => [v.ruleId, v.line]);
}

describe('Inline suppressions', () => {
  describe('parseDirectives', () => {
    it('should read actions, rule lists and lines', () => {
      const tokens = tokenize('// swiftstyle:disable no-force-unwrap, no-semicolons\nlet a = 1\n/* swiftstyle:enable */\n');

      expect(parseDirectives(tokens)).toEqual([
        { action: 'disable', rules: ['no-force-unwrap', 'no-semicolons'], line: 1 },
        { action: 'enable', rules: 'all', line: 3 }
      ]);
    });
  });

  it('should disable a rule until it is enabled again', () => {
    expect(lintLines([
      'let a = b!',
      '// swiftstyle:disable no-force-unwrap',
      'let c = d!',
      'let e = 1;',
      '// swiftstyle:enable no-force-unwrap',
      'let f = g!'
    ])).toEqual([
      ['no-force-unwrap', 1],
      ['no-semicolons', 4],
      ['no-force-unwrap', 6]
    ]);
  });

  it('should disable every rule with all', () => {
    expect(lintLines([
      '// swiftstyle:disable all',
      'let c = d!;',
      '// swiftstyle:enable all',
      'let e = f!'
    ])).toEqual([['no-force-unwrap', 4]]);
  });

  it('should disable the next line only', () => {
    expect(lintLines([
      '// swiftstyle:disable-next-line no-force-unwrap',
      'let c = d!;',
      'let e = f!'
    ])).toEqual([
      ['no-semicolons', 2],
      ['no-force-unwrap', 3]
    ]);
  });

  it('should disable the directive line', () => {
    expect(lintLines([
      'let c = d! // swiftstyle:disable-line',
      'let e = f!'
    ])).toEqual([['no-force-unwrap', 2]]);
  });

  it('should let a rule-specific enable override disable all', () => {
    expect(lintLines([
      '// swiftstyle:disable all',
      '// swiftstyle:enable no-semicolons',
      'let c = d!;'
    ])).toEqual([['no-semicolons', 3]]);
  });
});
