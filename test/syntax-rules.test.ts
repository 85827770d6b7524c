import { emptyParenthesesWithTrailingClosure, voidReturn } from '../src/core/rules/functions';
import { shorthandType } from '../src/core/rules/type-syntax';
import { isAssignmentOperator, preferLet, redundantConditionParens } from '../src/core/rules/control-flow';
import { messages, positions, runRule } from './helpers';

describe('Function rules', () => {
  describe('void-return', () => {
    it("should replace '-> ()' with '-> Void'", () => {
      const violations = runRule(voidReturn, 'func f() -> () {\n}\n');

      expect(positions(violations)).toEqual([[1, 13]]);
      expect(messages(violations)).toEqual(["Use 'Void' instead of '()' as a return type"]);
      expect(violations[0].fix).toEqual({ start: 12, end: 14, text: 'Void' });
    });

    it('should accept Void', () => {
      expect(runRule(voidReturn, 'let handler: () -> Void = {}\n')).toEqual([]);
    });
  });

  describe('empty-parentheses-with-trailing-closure', () => {
    it('should remove empty parentheses before a trailing closure', () => {
      const violations = runRule(emptyParenthesesWithTrailingClosure, 'items.map() { $0 }\n');

      expect(positions(violations)).toEqual([[1, 10]]);
      expect(violations[0].fix).toEqual({ start: 9, end: 11, text: '' });
    });

    it('should ignore conditions and function declarations', () => {
      const source = 'if isReady() {\n}\nfunc run() {\n}\nwhile hasMore() {\n}\n';

      expect(runRule(emptyParenthesesWithTrailingClosure, source)).toEqual([]);
    });

    it('should ignore conditions spread over several lines', () => {
      const source = 'if ready,\n   isValid() {\n  go()\n}\nwhile hasMore,\n      canRead() {\n}\n';

      expect(runRule(emptyParenthesesWithTrailingClosure, source)).toEqual([]);
    });

    it('should report a call that follows an earlier statement', () => {
      const violations = runRule(emptyParenthesesWithTrailingClosure, 'let ready = true\nitems.forEach() { print($0) }\n');

      expect(positions(violations)).toEqual([[2, 14]]);
    });
  });
});

describe('Type syntax rules', () => {
  describe('shorthand-type', () => {
    it('should prefer shorthand collection and optional types', () => {
      const source = 'let a: Array<Int> = []\nlet d: Dictionary<String, Int> = [:]\nlet o: Optional<Int> = nil\n';
      const violations = runRule(shorthandType, source);

      expect(positions(violations)).toEqual([[1, 8], [2, 8], [3, 8]]);
      expect(messages(violations)).toEqual([
        "Prefer the shorthand '[Element]' over 'Array<...>'",
        "Prefer the shorthand '[Key: Value]' over 'Dictionary<...>'",
        "Prefer the shorthand 'Wrapped?' over 'Optional<...>'"
      ]);
    });

    it('should ignore qualified names and comparisons', () => {
      expect(runRule(shorthandType, 'let a: Swift.Array<Int> = []\nlet b = Array < c\n')).toEqual([]);
    });
  });
});

describe('Control flow rules', () => {
  describe('redundant-condition-parens', () => {
    it('should report parentheses around a whole condition', () => {
      const violations = runRule(redundantConditionParens, 'if (ready) {\n}\nguard (x > 0) else { return }\n');

      expect(positions(violations)).toEqual([[1, 4], [3, 7]]);
      expect(messages(violations)).toEqual([
        "Remove the parentheses around the 'if' condition",
        "Remove the parentheses around the 'guard' condition"
      ]);
    });

    it('should ignore partial parentheses and tuples', () => {
      const source = 'if (a || b) && c {\n}\nswitch (a, b) {\ndefault: break\n}\n';

      expect(runRule(redundantConditionParens, source)).toEqual([]);
    });
  });

  describe('prefer-let', () => {
    it('should report local vars that never change', () => {
      const source = [
        'func run() {',
        '  var total = 0',
        '  var count = 0',
        '  count += 1',
        '  var items = [Int]()',
        '  items.append(1)',
        '  var value = 1',
        '  swap(&value, &other)',
        '  print(total)',
        '}',
        ''
      ].join('\n');
      const violations = runRule(preferLet, source);

      expect(positions(violations)).toEqual([[2, 3]]);
      expect(messages(violations)).toEqual(['Variable "total" is never mutated; declare it with \'let\'']);
    });

    it('should treat tuple assignment as mutation', () => {
      const source = [
        'func rotate() {',
        '  var a = 1',
        '  var b = 2',
        '  var c = 3',
        '  (a, b) = (b, a)',
        '  print(a, b, c)',
        '}',
        ''
      ].join('\n');
      const violations = runRule(preferLet, source);

      expect(positions(violations)).toEqual([[4, 3]]);
      expect(messages(violations)).toEqual(['Variable "c" is never mutated; declare it with \'let\'']);
    });

    it('should ignore properties, lazy and computed vars', () => {
      const source = [
        'var global = 0',
        'struct Box {',
        '  var width = 0',
        '}',
        'func make() {',
        '  lazy var cache = load()',
        '  var area: Int { return 4 }',
        '  print(cache, area)',
        '}',
        ''
      ].join('\n');

      expect(runRule(preferLet, source)).toEqual([]);
    });
  });

  describe('isAssignmentOperator', () => {
    it('should tell assignments from comparisons', () => {
      expect(isAssignmentOperator('=')).toBe(true);
      expect(isAssignmentOperator('+=')).toBe(true);
      expect(isAssignmentOperator('==')).toBe(false);
      expect(isAssignmentOperator('>=')).toBe(false);
    });
  });
});
