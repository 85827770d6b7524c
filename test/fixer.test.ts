import { applyFixes, fixSource } from '../src/core/fixer';
import { Violation } from '../src/core/types';

function violationWithFix(start: number, end: number, text: string): Violation {
  return {
    ruleId: 'trailing-whitespace',
    category: 'spacing',
    severity: 'warning',
    message: 'test',
    line: 1,
    column: start + 1,
    fix: { start, end, text }
  };
}

describe('Fixer', () => {
  describe('applyFixes', () => {
    it('should apply fixes in offset order and skip overlapping ones', () => {
      const result = applyFixes('abcdef', [
        violationWithFix(5, 6, ''),
        violationWithFix(2, 4, 'Y'),
        violationWithFix(1, 3, 'X')
      ]);

      expect(result).toEqual({ output: 'aXde', applied: 2, remaining: 1 });
    });

    it('should leave the source alone without fixes', () => {
      const violation = { ...violationWithFix(0, 0, ''), fix: undefined };

      expect(applyFixes('abc', [violation])).toEqual({ output: 'abc', applied: 0, remaining: 0 });
    });

    it('should apply an insertion at the end of the source', () => {
      expect(applyFixes('abc', [violationWithFix(3, 3, '\n')]).output).toBe('abc\n');
    });
  });

  describe('fixSource', () => {
    it('should apply every fixable violation', () => {
      const fixed = fixSource('let value = 1;\nfunc f() -> () {\n}', 'Test.swift');

      expect(fixed.output).toBe('let value = 1\nfunc f() -> Void {\n}\n');
      expect(fixed.applied).toBe(3);
      expect(fixed.passes).toBe(1);
      expect(fixed.result.fixableCount).toBe(0);
      expect(fixed.result.violations.map(v => v.ruleId)).toEqual(['identifier-name']);
      expect(fixed.result.output).toBe(fixed.output);
    });

    it('should keep fixing until nothing changes', () => {
      const fixed = fixSource('let ab = 1 ;\n', 'Test.swift');

      expect(fixed.output).toBe('let ab = 1\n');
      expect(fixed.passes).toBe(2);
      expect(fixed.result.violations).toEqual([]);
    });

    it('should leave multi-line conditions untouched', () => {
      const source = 'if ready,\n   isValid() {\n  go()\n}\n';

      expect(fixSource(source, 'Test.swift').output).toBe(source);
    });

    it('should stop after the maximum number of passes', () => {
      const fixed = fixSource('let ab = 1 ;\n', 'Test.swift', undefined, 1);

      expect(fixed.output).toBe('let ab = 1 \n');
      expect(fixed.result.violations.map(v => v.ruleId)).toEqual(['trailing-whitespace']);
    });
  });
});
