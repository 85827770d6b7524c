import { nextToken, previousToken, tokenAtOffset } from '../parser';
import { Token } from '../tokenizer';
import { RuleDefinition, booleanOption, isKeyword, isPunctuation, numberOption } from './rule';

const URL_PATTERN = /[a-z][a-z0-9+.-]*:\/\//i;

function isInsideLiteral(token: Token | undefined): boolean {
  return token !== undefined && (token.kind === 'string' || token.kind === 'comment');
}

export const trailingWhitespace: RuleDefinition = {
  id: 'trailing-whitespace',
  description: 'Lines must not end with spaces or tabs',
  category: 'spacing',
  defaultSeverity: 'warning',
  fixable: true,
  defaultOptions: {},
  check({ file, report }) {
    file.lines.forEach((line, index) => {
      const match = /[ \t]+$/.exec(line);
      if (!match) {
        return;
      }
      const lineStart = file.lineStarts[index];
      const start = lineStart + match.index;
      // Whitespace inside a multi-line string literal is content
      if (tokenAtOffset(file, start)?.kind === 'string') {
        return;
      }
      report(
        { line: index + 1, column: match.index + 1 },
        'Line has trailing whitespace',
        { start, end: lineStart + line.length, text: '' }
      );
    });
  }
};

export const noTabs: RuleDefinition = {
  id: 'no-tabs',
  description: 'Indent with spaces, never tabs',
  category: 'spacing',
  defaultSeverity: 'warning',
  fixable: false,
  defaultOptions: {},
  check({ file, report }) {
    file.lines.forEach((line, index) => {
      const indent = /^[ \t]*/.exec(line)?.[0] ?? '';
      const tab = indent.indexOf('\t');
      if (tab === -1 || isInsideLiteral(tokenAtOffset(file, file.lineStarts[index] + tab))) {
        return;
      }
      report({ line: index + 1, column: tab + 1 }, 'Indent with spaces, not tabs');
    });
  }
};

export const indentation: RuleDefinition = {
  id: 'indentation',
  description: 'Indentation must be a multiple of the configured width',
  category: 'spacing',
  defaultSeverity: 'warning',
  fixable: false,
  defaultOptions: { width: 2 },
  check({ file, options, report }) {
    const width = numberOption(options, 'width', 2);
    if (width < 1) {
      return;
    }

    file.lines.forEach((line, index) => {
      const indent = /^ */.exec(line)?.[0] ?? '';
      if (line.trim() === '' || line.charAt(indent.length) === '\t' || indent.length % width === 0) {
        return;
      }
      const first = tokenAtOffset(file, file.lineStarts[index] + indent.length);
      if (!first || isInsideLiteral(first)) {
        return;
      }
      report(
        { line: index + 1, column: 1 },
        `Indentation of ${indent.length} spaces is not a multiple of ${width}`
      );
    });
  }
};

export const lineLength: RuleDefinition = {
  id: 'line-length',
  description: 'Lines must not exceed the configured length',
  category: 'spacing',
  defaultSeverity: 'warning',
  fixable: false,
  defaultOptions: { max: 120, ignore_urls: true },
  check({ file, options, report }) {
    const max = numberOption(options, 'max', 120);
    const ignoreUrls = booleanOption(options, 'ignore_urls', true);

    file.lines.forEach((line, index) => {
      if (line.length <= max || (ignoreUrls && URL_PATTERN.test(line))) {
        return;
      }
      report(
        { line: index + 1, column: max + 1 },
        `Line is ${line.length} characters long; the limit is ${max}`
      );
    });
  }
};

export const verticalWhitespace: RuleDefinition = {
  id: 'vertical-whitespace',
  description: 'Limit consecutive empty lines',
  category: 'spacing',
  defaultSeverity: 'warning',
  fixable: true,
  defaultOptions: { max_empty_lines: 1 },
  check({ file, options, report }) {
    const maxEmpty = numberOption(options, 'max_empty_lines', 1);
    const { lines, lineStarts } = file;
    let runStart = -1;

    // Runs reaching the end of the file belong to trailing-newline
    for (let i = 0; i < lines.length; i++) {
      if (lines[i].trim() === '') {
        if (runStart === -1) {
          runStart = i;
        }
        continue;
      }
      if (runStart === -1) {
        continue;
      }

      const runLength = i - runStart;
      const firstExcess = runStart + maxEmpty;
      runStart = -1;
      if (runLength <= maxEmpty || isInsideLiteral(tokenAtOffset(file, lineStarts[firstExcess]))) {
        continue;
      }
      report(
        { line: firstExcess + 1, column: 1 },
        `Too many consecutive empty lines (${runLength}); at most ${maxEmpty} allowed`,
        { start: lineStarts[firstExcess], end: lineStarts[i], text: '' }
      );
    }
  }
};

export const trailingNewline: RuleDefinition = {
  id: 'trailing-newline',
  description: 'Files must end with exactly one newline',
  category: 'spacing',
  defaultSeverity: 'warning',
  fixable: true,
  defaultOptions: {},
  check({ file, report }) {
    const { text } = file;
    let start = text.length;
    while (start > 0 && /\s/.test(text.charAt(start - 1))) {
      start--;
    }
    if (start === 0) {
      return;
    }

    const trailing = text.slice(start);
    const newlines = trailing.split('\n').length - 1;
    if (newlines === 0) {
      const lastLine = file.lines.length;
      report(
        { line: lastLine, column: (file.lines[lastLine - 1] ?? '').length + 1 },
        'File should end with a newline',
        { start: text.length, end: text.length, text: '\n' }
      );
    } else if (newlines > 1) {
      const firstNewline = text.indexOf('\n', start);
      const lastContentLine = text.slice(0, firstNewline).split('\n').length;
      report(
        { line: lastContentLine + 1, column: 1 },
        `File should end with exactly one newline, found ${newlines}`,
        { start: firstNewline, end: text.length, text: '\n' }
      );
    }
  }
};

export const noSemicolons: RuleDefinition = {
  id: 'no-semicolons',
  description: 'Do not terminate or separate statements with semicolons',
  category: 'spacing',
  defaultSeverity: 'warning',
  fixable: true,
  defaultOptions: {},
  check({ file, report }) {
    for (const token of file.code) {
      if (!isPunctuation(token, ';')) {
        continue;
      }
      let after = nextToken(file, token);
      while (after && after.kind === 'whitespace') {
        after = nextToken(file, after);
      }
      const trailing = !after || after.kind === 'newline' || (after.kind === 'comment' && after.text.startsWith('//'));
      if (trailing) {
        report(token, 'Remove the trailing semicolon', { start: token.start, end: token.end, text: '' });
      } else {
        report(token, 'Put each statement on its own line instead of separating them with a semicolon');
      }
    }
  }
};

interface BracketFrame {
  selector: boolean;
  ternaries: number;
  /** Braces of a `switch` body, where `case` and `default` open labels */
  switchBody: boolean;
  pendingSwitch: boolean;
  inLabel: boolean;
}

function newFrame(selector: boolean, switchBody: boolean): BracketFrame {
  return { selector, ternaries: 0, switchBody, pendingSwitch: false, inLabel: false };
}

export const colonSpacing: RuleDefinition = {
  id: 'colon-spacing',
  description: 'No space before a colon and exactly one space after it',
  category: 'spacing',
  defaultSeverity: 'warning',
  fixable: false,
  defaultOptions: {},
  check({ file, report }) {
    const { code } = file;
    const frames: BracketFrame[] = [newFrame(false, false)];

    code.forEach((token, i) => {
      const frame = frames[frames.length - 1];

      if (token.kind === 'punctuation' && ['(', '[', '{'].includes(token.text)) {
        const previous = code[i - 1];
        const selectorCall = token.text === '(' && previous?.kind === 'directive'
          && (previous.text === '#selector' || previous.text === '#keyPath');
        const switchBody = token.text === '{' && frame.pendingSwitch;
        // `if case .a = value {` is a pattern, not a label
        if (token.text === '{') {
          frame.pendingSwitch = false;
          frame.inLabel = false;
        }
        frames.push(newFrame(frame.selector || selectorCall, switchBody));
        return;
      }
      if (isKeyword(token, 'switch')) {
        frame.pendingSwitch = true;
        return;
      }
      if (frame.switchBody && isKeyword(token, 'case', 'default')) {
        frame.inLabel = true;
        return;
      }
      if (token.kind === 'punctuation' && [')', ']', '}'].includes(token.text)) {
        if (frames.length > 1) {
          frames.pop();
        }
        return;
      }
      if (token.kind === 'operator' && token.text === '?') {
        const before = previousToken(file, token);
        if (before && (before.kind === 'whitespace' || before.kind === 'newline')) {
          frame.ternaries++;
        }
        return;
      }
      if (!isPunctuation(token, ':')) {
        return;
      }
      if (frame.ternaries > 0) {
        frame.ternaries--;
        return;
      }
      // `case .a:` and `default:` labels
      if (frame.inLabel) {
        frame.inLabel = false;
        return;
      }
      if (frame.selector || (isPunctuation(code[i - 1], '[') && isPunctuation(code[i + 1], ']'))) {
        return;
      }

      const before = previousToken(file, token);
      if (before?.kind === 'whitespace') {
        const beforeThat = previousToken(file, before);
        if (beforeThat && beforeThat.kind !== 'newline') {
          report(token, "Remove the space before ':'");
        }
      }

      const after = nextToken(file, token);
      if (!after || after.kind === 'newline' || after.kind === 'comment') {
        return;
      }
      if (after.kind === 'whitespace') {
        const following = nextToken(file, after);
        if (after.text !== ' ' && following && following.kind !== 'newline' && following.kind !== 'comment') {
          report(token, "Use exactly one space after ':'");
        }
        return;
      }
      if (isPunctuation(after, ')') || isPunctuation(after, ']')) {
        return;
      }
      report(token, "Add a space after ':'");
    });
  }
};

export const commaSpacing: RuleDefinition = {
  id: 'comma-spacing',
  description: 'No space before a comma and a space after it',
  category: 'spacing',
  defaultSeverity: 'warning',
  fixable: false,
  defaultOptions: {},
  check({ file, report }) {
    for (const token of file.code) {
      if (!isPunctuation(token, ',')) {
        continue;
      }
      const before = previousToken(file, token);
      if (before?.kind === 'whitespace') {
        const beforeThat = previousToken(file, before);
        if (beforeThat && beforeThat.kind !== 'newline') {
          report(token, "Remove the space before ','");
        }
      }
      const after = nextToken(file, token);
      if (after && after.kind !== 'whitespace' && after.kind !== 'newline' && after.kind !== 'comment') {
        report(token, "Add a space after ','");
      }
    }
  }
};

const BRACE_OPENERS_ON_OWN_LINE = new Set(['(', '[', ',', '{', ':']);

export const braceSameLine: RuleDefinition = {
  id: 'brace-same-line',
  description: 'Opening braces go on the same line as their statement',
  category: 'spacing',
  defaultSeverity: 'warning',
  fixable: false,
  defaultOptions: {},
  check({ file, report }) {
    const { code } = file;
    code.forEach((token, i) => {
      if (!isPunctuation(token, '{') || i === 0) {
        return;
      }
      const previous = code[i - 1];
      if (previous.line === token.line) {
        return;
      }
      if (previous.kind === 'punctuation' && BRACE_OPENERS_ON_OWN_LINE.has(previous.text)) {
        return;
      }
      if (isKeyword(previous, 'return', 'in')) {
        return;
      }
      // A closure handed to an operator such as `=` may start on its own line
      if (previous.kind === 'operator' && !/[>?!]$/.test(previous.text)) {
        return;
      }
      report(token, 'Opening brace should be on the same line as the statement it opens');
    });
  }
};

export const elseSameLine: RuleDefinition = {
  id: 'else-same-line',
  description: "'else' goes on the same line as the closing brace before it",
  category: 'spacing',
  defaultSeverity: 'warning',
  fixable: false,
  defaultOptions: {},
  check({ file, report }) {
    file.code.forEach((token, i) => {
      const previous = file.code[i - 1];
      if (isKeyword(token, 'else') && isPunctuation(previous, '}') && previous.line < token.line) {
        report(token, "'else' should be on the same line as the preceding closing brace");
      }
    });
  }
};

export const spacingRules: RuleDefinition[] = [
  trailingWhitespace,
  noTabs,
  indentation,
  lineLength,
  verticalWhitespace,
  trailingNewline,
  noSemicolons,
  colonSpacing,
  commaSpacing,
  braceSameLine,
  elseSameLine
];
