import {
  noForceCast,
  noForceTry,
  noForceUnwrap,
  noImplicitlyUnwrappedOptional,
  unusedOptionalBinding
} from '../src/core/rules/optionals';
import { messages, positions, runRule } from './helpers';

describe('Optional rules', () => {
  describe('no-force-unwrap', () => {
    it('should report postfix force unwraps', () => {
      const violations = runRule(noForceUnwrap, 'let a = b!\nlet c = d!.count\nlet e = items[0]!\n');

      expect(positions(violations)).toEqual([[1, 10], [2, 10], [3, 17]]);
      expect(messages(violations)[0]).toBe('Avoid force unwrapping; use optional binding or optional chaining');
    });

    it('should ignore negation, inequality and implicitly unwrapped types', () => {
      const source = 'let a = !flag\nif a != b {}\nlet c = (!flag)\nvar label: UILabel!\n';

      expect(runRule(noForceUnwrap, source)).toEqual([]);
    });
  });

  describe('no-force-cast', () => {
    it("should report 'as!'", () => {
      const violations = runRule(noForceCast, 'let v = x as! String\nlet w = x as? String\n');

      expect(positions(violations)).toEqual([[1, 13]]);
      expect(messages(violations)).toEqual(["Avoid force casts; use 'as?' with optional binding"]);
    });
  });

  describe('no-force-try', () => {
    it("should report 'try!'", () => {
      const violations = runRule(noForceTry, 'let d = try! load()\nlet e = try? load()\n');

      expect(positions(violations)).toEqual([[1, 12]]);
      expect(messages(violations)).toEqual(["Avoid 'try!'; handle the error or use 'try?'"]);
    });
  });

  describe('no-implicitly-unwrapped-optional', () => {
    it('should report implicitly unwrapped declarations', () => {
      const violations = runRule(noImplicitlyUnwrappedOptional, 'var label: UILabel!\nvar names: [String]!\n');

      expect(positions(violations)).toEqual([[1, 19], [2, 20]]);
      expect(messages(violations)[0]).toBe('Avoid implicitly unwrapped optionals; declare the type as optional');
    });

    it('should allow outlets unless configured otherwise', () => {
      const source = '@IBOutlet weak var label: UILabel!\n';

      expect(runRule(noImplicitlyUnwrappedOptional, source)).toEqual([]);
      expect(runRule(noImplicitlyUnwrappedOptional, source, { allow_iboutlets: false })).toHaveLength(1);
    });
  });

  describe('unused-optional-binding', () => {
    it("should report binding to '_'", () => {
      const violations = runRule(unusedOptionalBinding, 'if let _ = value {\n}\nif let v = value {\n}\n');

      expect(positions(violations)).toEqual([[1, 8]]);
      expect(messages(violations)).toEqual(["Use '!= nil' instead of binding the value to '_'"]);
    });
  });
});
