/**
 * Inline suppression comments:
 *
 *   // swiftstyle:disable <rule ids | all>
 *   // swiftstyle:enable <rule ids | all>
 *   // swiftstyle:disable-next-line <rule ids | all>
 *   // swiftstyle:disable-line <rule ids | all>
 *
 * Rule ids may be separated by spaces or commas; no ids means all rules.
 */

import { Token } from './tokenizer';
import { Violation } from './types';

export type DirectiveAction = 'disable' | 'enable' | 'disable-next-line' | 'disable-line';

export interface Directive {
  action: DirectiveAction;
  rules: string[] | 'all';
  line: number;
}

const DIRECTIVE_PATTERN = /swiftstyle:(disable-next-line|disable-line|disable|enable)\b([^\n*]*)/g;

function parseRuleList(text: string): string[] | 'all' {
  const ids = text.split(/[\s,]+/).filter(id => id.length > 0);
  return ids.length === 0 || ids.includes('all') ? 'all' : ids;
}

function toAction(text: string): DirectiveAction {
  switch (text) {
    case 'disable-next-line':
    case 'disable-line':
    case 'enable':
      return text;
    default:
      return 'disable';
  }
}

export function parseDirectives(tokens: Token[]): Directive[] {
  const directives: Directive[] = [];
  for (const token of tokens) {
    if (token.kind !== 'comment') {
      continue;
    }
    for (const match of token.text.matchAll(DIRECTIVE_PATTERN)) {
      const before = token.text.slice(0, match.index ?? 0);
      const line = token.line + before.split('\n').length - 1;
      directives.push({ action: toAction(match[1]), rules: parseRuleList(match[2]), line });
    }
  }
  return directives;
}

function covers(rules: string[] | 'all', ruleId: string): boolean {
  return rules === 'all' || rules.includes(ruleId);
}

/**
 * Decides for each violation whether a directive silences it
 */
export class SuppressionIndex {
  private readonly directives: Directive[];

  constructor(tokens: Token[]) {
    this.directives = parseDirectives(tokens);
  }

  get isEmpty(): boolean {
    return this.directives.length === 0;
  }

  isSuppressed(violation: Violation): boolean {
    let allDisabled = false;
    const explicit = new Map<string, boolean>();

    for (const directive of this.directives) {
      if (directive.line > violation.line) {
        break;
      }
      switch (directive.action) {
        case 'disable-line':
          if (directive.line === violation.line && covers(directive.rules, violation.ruleId)) {
            return true;
          }
          break;
        case 'disable-next-line':
          if (directive.line + 1 === violation.line && covers(directive.rules, violation.ruleId)) {
            return true;
          }
          break;
        case 'disable':
        case 'enable': {
          const disabled = directive.action === 'disable';
          if (directive.rules === 'all') {
            allDisabled = disabled;
            explicit.clear();
          } else {
            for (const id of directive.rules) {
              explicit.set(id, disabled);
            }
          }
          break;
        }
      }
    }

    return explicit.get(violation.ruleId) ?? allDisabled;
  }
}
