import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { isLintTarget, lintChange, parseNameStatus } from '../src/cli/commands/check';
import { init, TEMPLATES } from '../src/cli/commands/init';
import { lint, LintCommandOptions } from '../src/cli/commands/lint';
import { listRules } from '../src/cli/commands/rules';
import { stats } from '../src/cli/commands/stats';
import { parseInteger } from '../src/cli/shared';
import { appendRun, readHistory, toRunEntry } from '../src/core/history';
import { loadRulesFromPath } from '../src/core/rules-loader';
import { ALL_RULES } from '../src/core/rules';
import { DEFAULT_RULES } from '../src/core/types';

const TEXT: LintCommandOptions = { format: 'text', noColors: true };

describe('CLI commands', () => {
  const originalCwd = process.cwd();
  let tempDir: string;
  let logSpy: jest.SpyInstance;
  let errorSpy: jest.SpyInstance;

  beforeEach(() => {
    tempDir = fs.realpathSync(fs.mkdtempSync(path.join(os.tmpdir(), 'swiftstyle-cli-')));
    process.chdir(tempDir);
    logSpy = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    process.chdir(originalCwd);
    fs.rmSync(tempDir, { recursive: true, force: true });
    jest.restoreAllMocks();
  });

  function write(relativePath: string, content: string): string {
    const filePath = path.join(tempDir, relativePath);
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, content, 'utf8');
    return filePath;
  }

  function logged(): string[] {
    return logSpy.mock.calls.map(call => String(call[0]));
  }

  describe('lint', () => {
    it('should exit 0 for clean files', async () => {
      write('Sources/Clean.swift', 'let value = 1\n');

      expect(await lint([], TEXT)).toBe(0);
      expect(logged()).toEqual(['✓ 1 file checked, no problems']);
    });

    it('should exit 1 when there are errors', async () => {
      write('Sources/App.swift', 'let ab = b!;\n');

      expect(await lint(['Sources'], TEXT)).toBe(1);
      expect(logged()[0]).toContain('1 error, 1 warning');
    });

    it('should pass with warnings unless they exceed --max-warnings', async () => {
      write('Sources/App.swift', 'let value = 1;\n');

      expect(await lint([], TEXT)).toBe(0);
      expect(await lint([], { ...TEXT, maxWarnings: 0 })).toBe(1);
    });

    it('should take the warning limit from the configuration', async () => {
      write('swiftstyle.yaml', 'global:\n  max_warnings: 0\n');
      write('Sources/App.swift', 'let value = 1;\n');

      expect(await lint([], TEXT)).toBe(1);
    });

    it('should only report errors with --quiet', async () => {
      write('Sources/App.swift', 'let value = 1;\n');

      expect(await lint([], { ...TEXT, quiet: true, maxWarnings: 0 })).toBe(0);
      expect(logged()).toEqual(['✓ 1 file checked, no problems']);
    });

    it('should rewrite files with --fix', async () => {
      const filePath = write('Sources/App.swift', 'let value = 1;\n');

      expect(await lint([], { ...TEXT, fix: true })).toBe(0);
      expect(fs.readFileSync(filePath, 'utf8')).toBe('let value = 1\n');
    });

    it('should print JSON', async () => {
      write('Sources/App.swift', 'let ab = b!;\n');

      await lint([], { format: 'json' });
      const output = JSON.parse(logged()[0]);

      expect(output.summary).toEqual({ filesChecked: 1, errorCount: 1, warningCount: 1, fixableCount: 1 });
    });

    it('should write the report to --output', async () => {
      write('Sources/App.swift', 'let ab = b!;\n');

      await lint([], { format: 'compact', output: 'report.txt' });

      expect(fs.readFileSync(path.join(tempDir, 'report.txt'), 'utf8')).toBe([
        'Sources/App.swift:1:11: error: Avoid force unwrapping; use optional binding or optional chaining [no-force-unwrap]',
        'Sources/App.swift:1:12: warning: Remove the trailing semicolon [no-semicolons]',
        ''
      ].join('\n'));
      expect(logged()).toEqual(['Results written to report.txt']);
    });

    it('should log the run with --log', async () => {
      write('Sources/App.swift', 'let value = 1;\n');

      await lint([], { ...TEXT, log: true });
      const entries = readHistory(path.join(tempDir, '.swiftstyle', 'history.json'));

      expect(entries).toHaveLength(1);
      expect(entries[0].command).toBe('lint');
      expect(entries[0].filesChecked).toBe(1);
      expect(entries[0].violations.map(v => v.ruleId)).toEqual(['no-semicolons']);
    });

    it('should report when there is nothing to lint', async () => {
      write('README.md', '# Readme\n');

      expect(await lint([], TEXT)).toBe(0);
      expect(logged()).toEqual(['No Swift files found.']);
    });

    it('should apply layers configured relative to the project', async () => {
      write('swiftstyle.yaml', [
        'layers:',
        '  - name: Core',
        '    paths: ["Sources/Core/**"]',
        '    modules: [Core]',
        '    may_depend_on: []',
        '  - name: Feature',
        '    paths: ["Sources/Feature/**"]',
        '    modules: [Feature]',
        '    may_depend_on: [Core]',
        ''
      ].join('\n'));
      write('Sources/Core/Engine.swift', 'import Feature\n');

      expect(await lint(['.'], { format: 'compact' })).toBe(1);
      expect(logged()).toEqual([
        'Sources/Core/Engine.swift:1:1: error: Core layer must not depend on Feature (imports Feature) [layer-dependency]'
      ]);
    });

    it('should report progress for every file when fixing verbosely', async () => {
      const filePath = write('Sources/Clean.swift', 'let value = 1\n');

      expect(await lint([], { ...TEXT, fix: true, verbose: true })).toBe(0);
      expect(errorSpy).toHaveBeenCalledWith(`Fixing ${filePath}`);
    });

    it('should exit 2 for a missing path', async () => {
      expect(await lint(['Missing'], TEXT)).toBe(2);
      expect(errorSpy).toHaveBeenCalledWith('Error: No such file or directory: Missing');
    });

    it('should exit 2 for an invalid configuration', async () => {
      write('swiftstyle.yaml', 'rules:\n  no-such-rule: error\n');
      write('Sources/App.swift', 'let value = 1\n');

      expect(await lint([], TEXT)).toBe(2);
    });
  });

  describe('parseInteger', () => {
    it('should accept whole integers', () => {
      expect(parseInteger('10')).toBe(10);
      expect(parseInteger('-1')).toBe(-1);
    });

    it('should reject trailing garbage', () => {
      expect(() => parseInteger('10abc')).toThrow('Not a number.');
      expect(() => parseInteger('')).toThrow('Not a number.');
    });
  });

  describe('check helpers', () => {
    it('should parse name-status output', () => {
      expect(parseNameStatus('M\tSources/A.swift\nR100\tOld.swift\tNew.swift\nA\tB.swift\n')).toEqual([
        { status: 'M', from: 'Sources/A.swift', to: 'Sources/A.swift' },
        { status: 'R', from: 'Old.swift', to: 'New.swift' },
        { status: 'A', from: 'B.swift', to: 'B.swift' }
      ]);
    });

    it('should select Swift files outside excluded directories', () => {
      expect(isLintTarget('Sources/App.swift', DEFAULT_RULES)).toBe(true);
      expect(isLintTarget('Pods/Lib/Lib.swift', DEFAULT_RULES)).toBe(false);
      expect(isLintTarget('README.md', DEFAULT_RULES)).toBe(false);
    });

    it('should only report violations on added lines', () => {
      const result = lintChange(
        { fileName: 'Sources/App.swift', before: 'let ab = b!\n', after: 'let ab = b!\nlet cd = d!\n' },
        'Sources/App.swift',
        DEFAULT_RULES
      );

      expect(result.violations.map(v => [v.ruleId, v.line, v.column])).toEqual([['no-force-unwrap', 2, 11]]);
      expect(result.errorCount).toBe(1);
    });

    it('should keep parse errors on unchanged lines', () => {
      const result = lintChange(
        { fileName: 'Broken.swift', before: 'let s = "open\n', after: 'let s = "open\n' },
        'Broken.swift',
        DEFAULT_RULES
      );

      expect(result.violations.map(v => v.ruleId)).toEqual(['parse-error']);
    });
  });

  describe('init', () => {
    it('should write the standard template by default', async () => {
      expect(await init({ cwd: tempDir })).toBe(0);
      expect(fs.readFileSync(path.join(tempDir, 'swiftstyle.yaml'), 'utf8')).toBe(TEMPLATES.standard);
      expect(logged()[0]).toBe('✓ Created swiftstyle.yaml with "standard" template');
    });

    it.each(['minimal', 'standard', 'strict'])('should write a loadable %s template', async template => {
      expect(await init({ cwd: tempDir, template })).toBe(0);
      expect(() => loadRulesFromPath(path.join(tempDir, 'swiftstyle.yaml'))).not.toThrow();
    });

    it('should not overwrite without --force', async () => {
      write('swiftstyle.yaml', 'rules: {}\n');

      expect(await init({ cwd: tempDir })).toBe(1);
      expect(await init({ cwd: tempDir, force: true, template: 'minimal' })).toBe(0);
      expect(fs.readFileSync(path.join(tempDir, 'swiftstyle.yaml'), 'utf8')).toBe(TEMPLATES.minimal);
    });

    it('should reject an unknown template', async () => {
      expect(await init({ cwd: tempDir, template: 'relaxed' })).toBe(1);
      expect(errorSpy).toHaveBeenCalledWith('Error: Unknown template "relaxed". Use: minimal, standard, or strict');
    });
  });

  describe('rules', () => {
    it('should list every rule as JSON', async () => {
      expect(await listRules({ format: 'json' })).toBe(0);
      const rules: Array<{ id: string }> = JSON.parse(logged()[0]);

      expect(rules.map(rule => rule.id)).toEqual(ALL_RULES.map(rule => rule.id));
    });

    it('should filter by category', async () => {
      await listRules({ format: 'json', category: 'naming' });
      const rules: Array<{ id: string; category: string }> = JSON.parse(logged()[0]);

      expect(rules.map(rule => rule.id).sort()).toEqual(['identifier-name', 'type-name']);
    });

    it('should fail for an empty category', async () => {
      expect(await listRules({ category: 'nothing' })).toBe(2);
    });

    it('should print a table', async () => {
      await listRules({ noColors: true, category: 'naming' });

      expect(logged()[0].split('\n')[0]).toBe(`${'RULE'.padEnd(17)}CATEGORY  SEVERITY  FIX`);
    });
  });

  describe('stats', () => {
    it('should explain how to start logging', async () => {
      expect(await stats({})).toBe(0);
      expect(logged()[0]).toBe(
        `No runs logged yet. Enable "global.log_runs" or pass --log to record runs in ${path.join(tempDir, '.swiftstyle', 'history.json')}`
      );
    });

    it('should summarize logged runs', async () => {
      const historyPath = path.join(tempDir, '.swiftstyle', 'history.json');
      appendRun(historyPath, toRunEntry('lint', [{
        fileName: 'App.swift',
        violations: [{ ruleId: 'no-tabs', category: 'spacing', severity: 'warning', message: 'Tabs', line: 1, column: 1 }],
        errorCount: 0,
        warningCount: 1,
        fixableCount: 0
      }]));

      expect(await stats({ format: 'json', days: 7 })).toBe(0);
      const metrics = JSON.parse(logged()[0]);

      expect(metrics.totalRuns).toBe(1);
      expect(metrics.violationsByRule).toEqual({ 'no-tabs': 1 });
    });
  });
});
