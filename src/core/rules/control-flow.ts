import { Declaration, SourceFile, findClosingBracket } from '../parser';
import { RuleDefinition, isKeyword, isOperator, isPunctuation } from './rule';

const COMPARISON_OPERATORS = new Set(['==', '!=', '<=', '>=', '===', '!==', '~=']);

export function isAssignmentOperator(text: string): boolean {
  return text === '=' || (text.endsWith('=') && !COMPARISON_OPERATORS.has(text));
}

export const redundantConditionParens: RuleDefinition = {
  id: 'redundant-condition-parens',
  description: 'Conditions of if, guard, while and switch take no parentheses',
  category: 'control-flow',
  defaultSeverity: 'warning',
  fixable: false,
  defaultOptions: {},
  check({ file, report }) {
    const { code } = file;
    code.forEach((token, i) => {
      if (!isKeyword(token, 'if', 'guard', 'while', 'switch') || !isPunctuation(code[i + 1], '(')) {
        return;
      }
      const closeIndex = findClosingBracket(file, i + 1);
      if (closeIndex < 0) {
        return;
      }
      const after = code[closeIndex + 1];
      const wrapsWholeCondition = token.text === 'guard' ? isKeyword(after, 'else') : isPunctuation(after, '{');
      if (!wrapsWholeCondition) {
        return;
      }

      // `switch (a, b)` is a tuple, not a parenthesized condition
      let depth = 0;
      for (let j = i + 1; j <= closeIndex; j++) {
        const current = code[j];
        if (current.kind !== 'punctuation') {
          continue;
        }
        if (current.text === '(' || current.text === '[' || current.text === '{') {
          depth++;
        } else if (current.text === ')' || current.text === ']' || current.text === '}') {
          depth--;
        } else if (current.text === ',' && depth === 1) {
          return;
        }
      }

      report(code[i + 1], `Remove the parentheses around the '${token.text}' condition`);
    });
  }
};

/**
 * `var x: Int { ... }` declares a computed local, which has no `let` form
 */
function isComputed(file: SourceFile, declaration: Declaration): boolean {
  const { code } = file;
  for (let j = declaration.nameIndex + 1; j < code.length && code[j].line === declaration.line; j++) {
    if (code[j].kind === 'operator' && code[j].text === '=') {
      return false;
    }
    if (isPunctuation(code[j], '{')) {
      return true;
    }
  }
  return false;
}

/**
 * `(a, b) = (b, a)` assigns every element of the tuple on its left
 */
function isTupleAssignmentTarget(file: SourceFile, index: number): boolean {
  const { code } = file;
  if (!isPunctuation(code[index - 1], '(') && !isPunctuation(code[index - 1], ',')) {
    return false;
  }
  let depth = 0;
  for (let k = index + 1; k < code.length; k++) {
    const token = code[k];
    if (isPunctuation(token, '(') || isPunctuation(token, '[')) {
      depth++;
    } else if (isPunctuation(token, ']')) {
      if (depth === 0) {
        return false;
      }
      depth--;
    } else if (isPunctuation(token, ')')) {
      if (depth > 0) {
        depth--;
        continue;
      }
      const after = code[k + 1];
      if (after?.kind === 'operator' && isAssignmentOperator(after.text)) {
        return true;
      }
      if (!isPunctuation(after, ',') && !isPunctuation(after, ')')) {
        return false;
      }
    } else if (isPunctuation(token, '{') || isPunctuation(token, '}') || isPunctuation(token, ';')) {
      return false;
    }
  }
  return false;
}

function isMutated(file: SourceFile, declaration: Declaration, name: string): boolean {
  const { code } = file;
  for (let j = declaration.nameIndex + 1; j < declaration.scopeEnd; j++) {
    const token = code[j];
    if (token.kind !== 'identifier' || token.text !== name) {
      continue;
    }
    const before = code[j - 1];
    const after = code[j + 1];
    if (isPunctuation(before, '.')) {
      continue;
    }
    if (isOperator(before, '&')) {
      return true;
    }
    if (after?.kind === 'operator' && isAssignmentOperator(after.text)) {
      return true;
    }
    if (isTupleAssignmentTarget(file, j)) {
      return true;
    }
    // Member access and subscripts may call mutating members
    if (isPunctuation(after, '.') || isPunctuation(after, '[')) {
      return true;
    }
    if (after?.kind === 'operator' && (after.text === '?' || after.text === '!')) {
      const following = code[j + 2];
      if (isPunctuation(following, '.') || isPunctuation(following, '[')) {
        return true;
      }
    }
  }
  return false;
}

export const preferLet: RuleDefinition = {
  id: 'prefer-let',
  description: "Declare local values with 'let' unless they change",
  category: 'control-flow',
  defaultSeverity: 'warning',
  fixable: false,
  defaultOptions: {},
  check({ file, report }) {
    for (const declaration of file.declarations) {
      if (
        declaration.kind !== 'var'
        || !declaration.localScope
        || !declaration.statement
        || declaration.nameIndex < 0
        || declaration.modifiers.includes('lazy')
      ) {
        continue;
      }
      const name = file.code[declaration.nameIndex].text;
      if (name === '_' || isComputed(file, declaration) || isMutated(file, declaration, name)) {
        continue;
      }
      report(declaration, `Variable "${name}" is never mutated; declare it with 'let'`);
    }
  }
};

export const controlFlowRules: RuleDefinition[] = [redundantConditionParens, preferLet];
