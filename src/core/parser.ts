/**
 * Light syntax model over the token stream.
 *
 * This is not a full Swift grammar: it tracks brace scopes, declarations
 * and imports, which is all the style rules look at.
 */

import { Token, isTrivia, tokenize } from './tokenizer';
import { Position } from './types';

export type DeclarationKind =
  | 'class'
  | 'struct'
  | 'enum'
  | 'protocol'
  | 'extension'
  | 'func'
  | 'init'
  | 'var'
  | 'let'
  | 'case'
  | 'typealias'
  | 'associatedtype';

export interface Declaration {
  kind: DeclarationKind;
  name: string;
  line: number;
  column: number;
  /** Brace depth of the declaration keyword */
  depth: number;
  modifiers: string[];
  /** Index of the declaration keyword in `SourceFile.code` */
  codeIndex: number;
  /** Index of the name token in `SourceFile.code`, -1 when there is none */
  nameIndex: number;
  /** Declared inside a function, accessor or closure body */
  localScope: boolean;
  /** Starts its own statement rather than binding inside `if`, `for`, `case`... */
  statement: boolean;
  /** Index in `SourceFile.code` of the brace closing the enclosing scope */
  scopeEnd: number;
}

export interface ImportDeclaration {
  module: string;
  line: number;
  column: number;
  codeIndex: number;
}

export interface SourceFile {
  fileName: string;
  text: string;
  /** Lines without their terminators */
  lines: string[];
  /** Offset of the first character of each line */
  lineStarts: number[];
  tokens: Token[];
  /** Tokens that are not whitespace, newlines or comments */
  code: Token[];
  /** Brace depth in front of each entry of `code` */
  depthAt: number[];
  declarations: Declaration[];
  imports: ImportDeclaration[];
}

type ScopeKind = 'type' | 'enum' | 'body';

const TYPE_KEYWORDS = ['class', 'struct', 'enum', 'protocol', 'extension'] as const;

type TypeKeyword = typeof TYPE_KEYWORDS[number];

function isTypeKeyword(text: string): text is TypeKeyword {
  return TYPE_KEYWORDS.some(keyword => keyword === text);
}

const IMPORT_KINDS = new Set(['class', 'struct', 'enum', 'protocol', 'func', 'var', 'let', 'typealias']);

export const MODIFIERS: ReadonlySet<string> = new Set([
  'private', 'fileprivate', 'internal', 'public', 'open', 'static', 'class', 'final', 'override',
  'lazy', 'weak', 'unowned', 'mutating', 'nonmutating', 'dynamic', 'required', 'convenience',
  'optional', 'indirect', 'nonisolated'
]);

function splitLines(text: string): { lines: string[]; lineStarts: number[] } {
  const lines = text.split(/\r?\n/);
  const lineStarts = [0];
  for (let i = 0; i < text.length; i++) {
    if (text[i] === '\n') {
      lineStarts.push(i + 1);
    }
  }
  if (text.endsWith('\n')) {
    lines.pop();
    lineStarts.pop();
  }
  return { lines, lineStarts };
}

function isModifierToken(token: Token): boolean {
  return token.kind === 'attribute' || MODIFIERS.has(token.text);
}

function isPunctuation(token: Token | undefined, text: string): boolean {
  return token !== undefined && token.kind === 'punctuation' && token.text === text;
}

export function parseSource(source: string, fileName: string): SourceFile {
  const tokens = tokenize(source);
  const code = tokens.filter(token => !isTrivia(token));
  const { lines, lineStarts } = splitLines(source);

  const depthAt: number[] = [];
  const declarations: Declaration[] = [];
  const imports: ImportDeclaration[] = [];
  const scopes: Array<{ kind: ScopeKind; open: number }> = [];
  const closeOf = new Map<number, number>();
  const pendingScopeEnd: Array<{ declaration: Declaration; open: number }> = [];
  let pendingType: ScopeKind | null = null;
  let skipUntil = -1;

  const collectModifiers = (index: number): { modifiers: string[]; first: number } => {
    const modifiers: string[] = [];
    let first = index;
    while (first > 0 && isModifierToken(code[first - 1])) {
      first--;
      modifiers.unshift(code[first].text);
    }
    return { modifiers, first };
  };

  const startsStatement = (first: number): boolean => {
    if (first === 0) {
      return true;
    }
    const previous = code[first - 1];
    if (previous.line < code[first].line) {
      return true;
    }
    return isPunctuation(previous, '{') || isPunctuation(previous, '}') || isPunctuation(previous, ';');
  };

  const addDeclaration = (kind: DeclarationKind, keywordIndex: number, nameIndex: number): void => {
    const keyword = code[keywordIndex];
    const { modifiers, first } = collectModifiers(keywordIndex);
    const enclosing = scopes[scopes.length - 1];
    const declaration: Declaration = {
      kind,
      name: nameIndex >= 0 ? code[nameIndex].text : kind,
      line: keyword.line,
      column: keyword.column,
      depth: scopes.length,
      modifiers,
      codeIndex: keywordIndex,
      nameIndex,
      localScope: scopes.some(scope => scope.kind === 'body'),
      statement: startsStatement(first),
      scopeEnd: code.length
    };
    declarations.push(declaration);
    if (enclosing) {
      pendingScopeEnd.push({ declaration, open: enclosing.open });
    }
  };

  for (let i = 0; i < code.length; i++) {
    const token = code[i];
    depthAt.push(scopes.length);

    if (token.kind === 'punctuation') {
      if (token.text === '{') {
        scopes.push({ kind: pendingType ?? 'body', open: i });
        pendingType = null;
      } else if (token.text === '}') {
        const scope = scopes.pop();
        if (scope) {
          closeOf.set(scope.open, i);
        }
      }
      continue;
    }

    if (token.kind !== 'keyword' || i <= skipUntil) {
      continue;
    }

    const next = code[i + 1];
    const previous = code[i - 1];

    if (token.text === 'import') {
      let moduleIndex = i + 1;
      if (next && IMPORT_KINDS.has(next.text) && code[i + 2]?.kind === 'identifier') {
        moduleIndex = i + 2;
      }
      const moduleToken = code[moduleIndex];
      if (moduleToken && moduleToken.kind === 'identifier') {
        imports.push({ module: moduleToken.text, line: token.line, column: token.column, codeIndex: i });
        skipUntil = moduleIndex;
      }
      continue;
    }

    const keyword = token.text;
    if (isTypeKeyword(keyword)) {
      if (next?.kind !== 'identifier') {
        continue;
      }
      const kind = keyword;
      addDeclaration(kind, i, i + 1);
      pendingType = kind === 'enum' ? 'enum' : 'type';
      continue;
    }

    switch (keyword) {
      case 'func':
        addDeclaration('func', i, next && (next.kind === 'identifier' || next.kind === 'operator') ? i + 1 : -1);
        break;
      case 'init':
        if (!isPunctuation(previous, '.')) {
          addDeclaration('init', i, -1);
        }
        break;
      case 'var':
      case 'let':
        if (next?.kind === 'identifier') {
          addDeclaration(keyword, i, i + 1);
        }
        break;
      case 'typealias':
      case 'associatedtype':
        if (next?.kind === 'identifier') {
          addDeclaration(keyword, i, i + 1);
        }
        break;
      case 'case': {
        const enclosing = scopes[scopes.length - 1];
        if (enclosing?.kind !== 'enum' || !startsStatement(collectModifiers(i).first)) {
          break;
        }
        let parens = 0;
        let expectName = true;
        for (let j = i + 1; j < code.length && code[j].line === token.line; j++) {
          const current = code[j];
          if (current.kind === 'punctuation' && (current.text === '(' || current.text === '[')) {
            parens++;
          } else if (current.kind === 'punctuation' && (current.text === ')' || current.text === ']')) {
            parens--;
          } else if (parens === 0 && isPunctuation(current, ',')) {
            expectName = true;
            continue;
          } else if (parens === 0 && (isPunctuation(current, ';') || isPunctuation(current, '}'))) {
            break;
          }
          if (expectName && current.kind === 'identifier') {
            addDeclaration('case', i, j);
          }
          expectName = false;
        }
        break;
      }
    }
  }

  for (const { declaration, open } of pendingScopeEnd) {
    declaration.scopeEnd = closeOf.get(open) ?? code.length;
  }

  return {
    fileName,
    text: source,
    lines,
    lineStarts,
    tokens,
    code,
    depthAt,
    declarations,
    imports
  };
}

/**
 * Converts a character offset to a 1-based line and column
 */
export function positionAt(file: SourceFile, offset: number): Position {
  let low = 0;
  let high = file.lineStarts.length - 1;
  while (low < high) {
    const mid = Math.ceil((low + high) / 2);
    if (file.lineStarts[mid] <= offset) {
      low = mid;
    } else {
      high = mid - 1;
    }
  }
  return { line: low + 1, column: offset - (file.lineStarts[low] ?? 0) + 1 };
}

/**
 * Converts a 1-based line and column to a character offset
 */
export function offsetOf(file: SourceFile, line: number, column: number): number {
  const lineStart = file.lineStarts[line - 1] ?? file.text.length;
  return lineStart + column - 1;
}

/**
 * Returns the token covering `offset`, if any
 */
export function tokenAtOffset(file: SourceFile, offset: number): Token | undefined {
  let low = 0;
  let high = file.tokens.length - 1;
  while (low <= high) {
    const mid = (low + high) >> 1;
    const token = file.tokens[mid];
    if (offset < token.start) {
      high = mid - 1;
    } else if (offset >= token.end) {
      low = mid + 1;
    } else {
      return token;
    }
  }
  return undefined;
}

export function lineText(file: SourceFile, line: number): string {
  return file.lines[line - 1] ?? '';
}

export function previousCode(file: SourceFile, codeIndex: number): Token | undefined {
  return codeIndex > 0 ? file.code[codeIndex - 1] : undefined;
}

export function nextCode(file: SourceFile, codeIndex: number): Token | undefined {
  return file.code[codeIndex + 1];
}

/**
 * Token immediately before `token` in the full stream, trivia included
 */
export function previousToken(file: SourceFile, token: Token): Token | undefined {
  return token.index > 0 ? file.tokens[token.index - 1] : undefined;
}

/**
 * Token immediately after `token` in the full stream, trivia included
 */
export function nextToken(file: SourceFile, token: Token): Token | undefined {
  return file.tokens[token.index + 1];
}

/**
 * Index in `code` of the bracket closing the one at `openIndex`, or -1
 */
export function findClosingBracket(file: SourceFile, openIndex: number): number {
  const open = file.code[openIndex].text;
  const close = open === '(' ? ')' : open === '[' ? ']' : '}';
  let depth = 0;
  for (let i = openIndex; i < file.code.length; i++) {
    const token = file.code[i];
    if (token.kind !== 'punctuation') {
      continue;
    }
    if (token.text === open) {
      depth++;
    } else if (token.text === close) {
      depth--;
      if (depth === 0) {
        return i;
      }
    }
  }
  return -1;
}
