import { Token } from '../tokenizer';
import { RuleDefinition, isAdjacent, isKeyword, isOperator, isPunctuation } from './rule';

const CONDITION_KEYWORDS = ['if', 'guard', 'while', 'for', 'switch', 'repeat', 'catch', 'where'];

/**
 * Walk back over the statement that ends at `from`. `if isReady() {` and
 * conditions spread over several lines open a statement body, not a closure.
 */
function opensStatementBody(code: Token[], from: number): boolean {
  let depth = 0;
  for (let j = from; j >= 0; j--) {
    const token = code[j];
    if (isPunctuation(token, ')') || isPunctuation(token, ']')) {
      depth++;
    } else if (isPunctuation(token, '(') || isPunctuation(token, '[')) {
      if (depth === 0) {
        return false;
      }
      depth--;
    } else if (depth === 0) {
      if (isKeyword(token, ...CONDITION_KEYWORDS)) {
        return true;
      }
      if (isPunctuation(token, '{') || isPunctuation(token, '}') || isPunctuation(token, ';')) {
        return false;
      }
    }
  }
  return false;
}

export const voidReturn: RuleDefinition = {
  id: 'void-return',
  description: "Write '-> Void' rather than '-> ()'",
  category: 'functions',
  defaultSeverity: 'warning',
  fixable: true,
  defaultOptions: {},
  check({ file, report }) {
    const { code } = file;
    code.forEach((token, i) => {
      const open = code[i + 1];
      const close = code[i + 2];
      if (isOperator(token, '->') && isPunctuation(open, '(') && isPunctuation(close, ')')) {
        report(open, "Use 'Void' instead of '()' as a return type", { start: open.start, end: close.end, text: 'Void' });
      }
    });
  }
};

export const emptyParenthesesWithTrailingClosure: RuleDefinition = {
  id: 'empty-parentheses-with-trailing-closure',
  description: 'Drop empty parentheses before a trailing closure',
  category: 'functions',
  defaultSeverity: 'warning',
  fixable: true,
  defaultOptions: {},
  check({ file, report }) {
    const { code } = file;
    code.forEach((open, i) => {
      const close = code[i + 1];
      const brace = code[i + 2];
      const callee = code[i - 1];
      if (
        !isPunctuation(open, '(')
        || !isPunctuation(close, ')')
        || !isPunctuation(brace, '{')
        || brace.line !== close.line
        || callee?.kind !== 'identifier'
        || !isAdjacent(callee, open)
        || isKeyword(code[i - 2], 'func')
      ) {
        return;
      }

      if (opensStatementBody(code, i - 2)) {
        return;
      }

      report(open, 'Remove the empty parentheses before the trailing closure', {
        start: open.start,
        end: close.end,
        text: ''
      });
    });
  }
};

export const functionRules: RuleDefinition[] = [voidReturn, emptyParenthesesWithTrailingClosure];
