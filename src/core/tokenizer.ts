/**
 * Swift tokenizer
 *
 * Produces a lossless token stream: concatenating every token's text gives
 * back the original source, so rules can map any token to an exact offset
 * and build textual fixes from it.
 */

import { ParseError } from './errors';
import { Position } from './types';

export type TokenKind =
  | 'identifier'
  | 'keyword'
  | 'number'
  | 'string'
  | 'comment'
  | 'operator'
  | 'punctuation'
  | 'attribute'
  | 'directive'
  | 'whitespace'
  | 'newline';

export interface Token {
  kind: TokenKind;
  text: string;
  /** Offset of the first character */
  start: number;
  /** Offset after the last character */
  end: number;
  line: number;
  column: number;
  /** Position in the full token stream */
  index: number;
}

export const KEYWORDS: ReadonlySet<string> = new Set([
  'associatedtype', 'class', 'deinit', 'enum', 'extension', 'fileprivate', 'func', 'import',
  'init', 'inout', 'internal', 'let', 'open', 'operator', 'private', 'precedencegroup',
  'protocol', 'public', 'rethrows', 'static', 'struct', 'subscript', 'typealias', 'var',
  'break', 'case', 'catch', 'continue', 'default', 'defer', 'do', 'else', 'fallthrough',
  'for', 'guard', 'if', 'in', 'repeat', 'return', 'throw', 'switch', 'where', 'while',
  'as', 'false', 'is', 'nil', 'self', 'Self', 'super', 'throws', 'true', 'try'
]);

const OPERATOR_CHARS = new Set(['/', '=', '-', '+', '!', '*', '%', '<', '>', '&', '|', '^', '~', '?']);
const PUNCTUATION = new Set(['(', ')', '[', ']', '{', '}', ',', ':', ';', '.', '\\', '#']);
const INLINE_WHITESPACE = new Set([' ', '\t', '\f', '\v']);

const NUMBER = /0x[0-9a-fA-F_]+(?:\.[0-9a-fA-F][0-9a-fA-F_]*)?(?:[pP][+-]?[0-9][0-9_]*)?|0b[01_]+|0o[0-7_]+|[0-9][0-9_]*(?:\.[0-9][0-9_]*)?(?:[eE][+-]?[0-9][0-9_]*)?/y;
const IDENTIFIER = /[\p{L}_][\p{L}\p{N}_]*/uy;
const IDENTIFIER_START = /[\p{L}_]/u;
const DOLLAR_IDENTIFIER = /\$[\p{L}\p{N}_]+/uy;

function matchSticky(pattern: RegExp, source: string, offset: number): number {
  pattern.lastIndex = offset;
  const match = pattern.exec(source);
  return match ? offset + match[0].length : offset;
}

class Lexer {
  private pos = 0;
  private line = 1;
  private column = 1;
  private readonly tokens: Token[] = [];

  constructor(private readonly source: string) {}

  run(): Token[] {
    while (this.pos < this.source.length) {
      this.scanToken();
    }
    return this.tokens;
  }

  private charAt(offset: number): string {
    return this.source.charAt(offset);
  }

  private emit(kind: TokenKind, end: number): void {
    const text = this.source.slice(this.pos, end);
    this.tokens.push({
      kind,
      text,
      start: this.pos,
      end,
      line: this.line,
      column: this.column,
      index: this.tokens.length
    });

    for (let i = 0; i < text.length; i++) {
      if (text[i] === '\n') {
        this.line++;
        this.column = 1;
      } else {
        this.column++;
      }
    }
    this.pos = end;
  }

  private scanToken(): void {
    const c = this.charAt(this.pos);
    const next = this.charAt(this.pos + 1);

    if (c === '\n') {
      this.emit('newline', this.pos + 1);
      return;
    }
    if (c === '\r' && next === '\n') {
      this.emit('newline', this.pos + 2);
      return;
    }
    if (INLINE_WHITESPACE.has(c) || c === '\r') {
      let end = this.pos + 1;
      while (end < this.source.length) {
        const ch = this.charAt(end);
        if (INLINE_WHITESPACE.has(ch) || (ch === '\r' && this.charAt(end + 1) !== '\n')) {
          end++;
        } else {
          break;
        }
      }
      this.emit('whitespace', end);
      return;
    }
    if (c === '/' && next === '/') {
      let end = this.pos + 2;
      while (end < this.source.length && this.charAt(end) !== '\n' && !(this.charAt(end) === '\r' && this.charAt(end + 1) === '\n')) {
        end++;
      }
      this.emit('comment', end);
      return;
    }
    if (c === '/' && next === '*') {
      this.emit('comment', this.blockCommentEnd());
      return;
    }
    if (c === '"') {
      this.emit('string', this.stringEnd(this.pos, 0));
      return;
    }
    if (c === '#') {
      let hashes = 0;
      while (this.charAt(this.pos + hashes) === '#') {
        hashes++;
      }
      if (this.charAt(this.pos + hashes) === '"') {
        this.emit('string', this.stringEnd(this.pos, hashes));
        return;
      }
      if (IDENTIFIER_START.test(next)) {
        this.emit('directive', matchSticky(IDENTIFIER, this.source, this.pos + 1));
        return;
      }
    }
    if (c === '@' && IDENTIFIER_START.test(next)) {
      this.emit('attribute', matchSticky(IDENTIFIER, this.source, this.pos + 1));
      return;
    }
    if (c >= '0' && c <= '9') {
      this.emit('number', matchSticky(NUMBER, this.source, this.pos));
      return;
    }
    if (c === '`') {
      const close = this.source.indexOf('`', this.pos + 1);
      const newline = this.source.indexOf('\n', this.pos + 1);
      if (close > this.pos + 1 && (newline === -1 || close < newline)) {
        this.emit('identifier', close + 1);
        return;
      }
    }
    if (c === '$') {
      const end = matchSticky(DOLLAR_IDENTIFIER, this.source, this.pos);
      if (end > this.pos) {
        this.emit('identifier', end);
        return;
      }
    }
    if (IDENTIFIER_START.test(c)) {
      const end = matchSticky(IDENTIFIER, this.source, this.pos);
      const word = this.source.slice(this.pos, end);
      this.emit(KEYWORDS.has(word) ? 'keyword' : 'identifier', end);
      return;
    }
    if ((c === '.' && next === '.') || OPERATOR_CHARS.has(c)) {
      this.emit('operator', this.operatorEnd());
      return;
    }
    this.emit('punctuation', this.pos + 1);
  }

  private operatorEnd(): number {
    const dotted = this.charAt(this.pos) === '.';
    let end = this.pos;
    while (end < this.source.length) {
      const ch = this.charAt(end);
      const following = this.charAt(end + 1);
      if (end > this.pos && ch === '/' && (following === '/' || following === '*')) {
        break;
      }
      if (OPERATOR_CHARS.has(ch) || (dotted && ch === '.')) {
        end++;
      } else {
        break;
      }
    }
    return end;
  }

  private blockCommentEnd(): number {
    let depth = 0;
    let i = this.pos;
    while (i < this.source.length) {
      if (this.source.startsWith('/*', i)) {
        depth++;
        i += 2;
      } else if (this.source.startsWith('*/', i)) {
        depth--;
        i += 2;
        if (depth === 0) {
          return i;
        }
      } else {
        i++;
      }
    }
    throw new ParseError('Unterminated block comment', this.line, this.column);
  }

  /**
   * Finds the end of a string literal starting at `start`, where `hashes`
   * is the number of `#` delimiters of a raw string.
   */
  private stringEnd(start: number, hashes: number): number {
    const delimiter = '#'.repeat(hashes);
    let i = start + hashes;
    const multiline = this.source.startsWith('"""', i);
    const closing = (multiline ? '"""' : '"') + delimiter;
    const escape = '\\' + delimiter;
    i += multiline ? 3 : 1;

    while (i < this.source.length) {
      if (this.source.startsWith(escape, i)) {
        const after = i + escape.length;
        if (this.charAt(after) === '(') {
          i = this.interpolationEnd(after);
        } else {
          i = after + 1;
        }
        continue;
      }
      if (this.source.startsWith(closing, i)) {
        return i + closing.length;
      }
      if (!multiline && (this.charAt(i) === '\n' || this.charAt(i) === '\r')) {
        break;
      }
      i++;
    }

    const position = this.positionOf(start);
    throw new ParseError('Unterminated string literal', position.line, position.column);
  }

  private interpolationEnd(open: number): number {
    let depth = 0;
    let i = open;
    while (i < this.source.length) {
      const ch = this.charAt(i);
      if (ch === '"') {
        i = this.stringEnd(i, 0);
        continue;
      }
      if (ch === '(') {
        depth++;
      } else if (ch === ')') {
        depth--;
        if (depth === 0) {
          return i + 1;
        }
      }
      i++;
    }
    const position = this.positionOf(open);
    throw new ParseError('Unterminated string interpolation', position.line, position.column);
  }

  private positionOf(offset: number): Position {
    let line = this.line;
    let column = this.column;
    for (let i = this.pos; i < offset; i++) {
      if (this.source[i] === '\n') {
        line++;
        column = 1;
      } else {
        column++;
      }
    }
    return { line, column };
  }
}

export function tokenize(source: string): Token[] {
  return new Lexer(source).run();
}

export function isTrivia(token: Token): boolean {
  return token.kind === 'whitespace' || token.kind === 'newline' || token.kind === 'comment';
}
