/**
 * Rule contract
 *
 * Every rule is an independent pattern-match-and-report check: it receives
 * one parsed file and its own options, and reports what it finds. Rules
 * share no state and may run in any order.
 */

import { SourceFile } from '../parser';
import { Token } from '../tokenizer';
import { Fix, LayerDefinition, Location, RuleCategory, RuleOptions, Severity } from '../types';

export interface RuleContext {
  readonly file: SourceFile;
  /** File path relative to the project root, with forward slashes */
  readonly projectPath: string;
  readonly options: RuleOptions;
  readonly layers: LayerDefinition[];
  report(location: Location, message: string, fix?: Fix): void;
}

export interface RuleDefinition {
  id: string;
  description: string;
  category: RuleCategory;
  defaultSeverity: Severity;
  fixable: boolean;
  defaultOptions: RuleOptions;
  check(context: RuleContext): void;
}

export function numberOption(options: RuleOptions, key: string, fallback: number): number {
  const value = options[key];
  return typeof value === 'number' && Number.isFinite(value) ? value : fallback;
}

export function booleanOption(options: RuleOptions, key: string, fallback: boolean): boolean {
  const value = options[key];
  return typeof value === 'boolean' ? value : fallback;
}

export function stringListOption(options: RuleOptions, key: string, fallback: string[]): string[] {
  const value = options[key];
  if (!Array.isArray(value)) {
    return fallback;
  }
  return value.filter((item): item is string => typeof item === 'string');
}

export function isPunctuation(token: Token | undefined, text: string): boolean {
  return token !== undefined && token.kind === 'punctuation' && token.text === text;
}

export function isKeyword(token: Token | undefined, ...texts: string[]): boolean {
  return token !== undefined && token.kind === 'keyword' && texts.includes(token.text);
}

export function isOperator(token: Token | undefined, text: string): boolean {
  return token !== undefined && token.kind === 'operator' && token.text === text;
}

/**
 * True when nothing but the end of the token separates it from `next`
 */
export function isAdjacent(token: Token, next: Token | undefined): boolean {
  return next !== undefined && token.end === next.start;
}

export function stripBackticks(name: string): string {
  return name.startsWith('`') && name.endsWith('`') ? name.slice(1, -1) : name;
}
