import { offsetOf, parseSource, positionAt, lineText, findClosingBracket } from '../src/core/parser';

const SOURCE = [
  'import UIKit',
  'import struct Foundation.Date',
  '',
  'final class ViewController: UIViewController {',
  '  @IBOutlet weak var label: UILabel!',
  '  func load() {',
  '    var count = 0',
  '    count += 1',
  '  }',
  '}',
  '',
  'enum Direction {',
  '  case north, south',
  '  case west(Int)',
  '}',
  ''
].join('\n');

describe('Parser', () => {
  describe('parseSource', () => {
    const file = parseSource(SOURCE, 'ViewController.swift');

    it('should split lines without terminators', () => {
      expect(file.lines).toHaveLength(15);
      expect(file.lines[0]).toBe('import UIKit');
      expect(lineText(file, 4)).toBe('final class ViewController: UIViewController {');
    });

    it('should collect imports', () => {
      expect(file.imports.map(i => [i.module, i.line, i.column])).toEqual([
        ['UIKit', 1, 1],
        ['Foundation', 2, 1]
      ]);
    });

    it('should collect declarations in source order', () => {
      expect(file.declarations.map(d => [d.kind, d.name])).toEqual([
        ['class', 'ViewController'],
        ['var', 'label'],
        ['func', 'load'],
        ['var', 'count'],
        ['enum', 'Direction'],
        ['case', 'north'],
        ['case', 'south'],
        ['case', 'west']
      ]);
    });

    it('should record modifiers, depth and local scope', () => {
      const [viewController, label, load, count] = file.declarations;

      expect(viewController.modifiers).toEqual(['final']);
      expect(viewController.depth).toBe(0);
      expect(label.modifiers).toEqual(['@IBOutlet', 'weak']);
      expect(label.depth).toBe(1);
      expect(label.localScope).toBe(false);
      expect(load.localScope).toBe(false);
      expect(count.depth).toBe(2);
      expect(count.localScope).toBe(true);
      expect(count.statement).toBe(true);
    });

    it('should point scopeEnd at the brace closing the enclosing body', () => {
      const count = file.declarations[3];
      const closing = file.code[count.scopeEnd];

      expect(closing.text).toBe('}');
      expect(closing.line).toBe(9);
    });

    it('should only record enum cases inside enums', () => {
      const switchFile = parseSource('switch x {\ncase a: break\ndefault: break\n}\n', 'Switch.swift');
      expect(switchFile.declarations).toEqual([]);
    });
  });

  describe('positions', () => {
    const file = parseSource('ab\ncd', 'Positions.swift');

    it('should convert offsets to positions', () => {
      expect(positionAt(file, 0)).toEqual({ line: 1, column: 1 });
      expect(positionAt(file, 3)).toEqual({ line: 2, column: 1 });
      expect(positionAt(file, 5)).toEqual({ line: 2, column: 3 });
    });

    it('should convert positions to offsets', () => {
      expect(offsetOf(file, 2, 2)).toBe(4);
    });
  });

  describe('findClosingBracket', () => {
    it('should find the matching bracket', () => {
      const file = parseSource('f(a, (b), c)', 'Call.swift');
      const open = file.code.findIndex(token => token.text === '(');

      expect(file.code[findClosingBracket(file, open)].column).toBe(12);
    });
  });
});
