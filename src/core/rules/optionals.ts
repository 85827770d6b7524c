import { SourceFile } from '../parser';
import { RuleDefinition, booleanOption, isAdjacent, isKeyword, isOperator, isPunctuation } from './rule';

type ExclamationUse = 'force-unwrap' | 'force-cast' | 'force-try' | 'implicitly-unwrapped';

/**
 * Walks back from a closing `]` to the index of its opening `[`
 */
function openingBracketIndex(file: SourceFile, closeIndex: number): number {
  let depth = 0;
  for (let i = closeIndex; i >= 0; i--) {
    const token = file.code[i];
    if (isPunctuation(token, ']')) {
      depth++;
    } else if (isPunctuation(token, '[')) {
      depth--;
      if (depth === 0) {
        return i;
      }
    }
  }
  return -1;
}

/**
 * True when the code token at `index` ends a type written after `:` or `->`,
 * e.g. `UILabel` in `var label: UILabel!` or `[String]` in `-> [String]!`
 */
function endsTypeAnnotation(file: SourceFile, index: number): boolean {
  const { code } = file;
  let start = index;

  if (isPunctuation(code[index], ']')) {
    start = openingBracketIndex(file, index);
    if (start < 0) {
      return false;
    }
  } else if (code[index].kind === 'identifier' && /^[A-Z]/.test(code[index].text)) {
    while (start >= 2 && isPunctuation(code[start - 1], '.') && code[start - 2].kind === 'identifier') {
      start -= 2;
    }
  } else {
    return false;
  }

  const before = code[start - 1];
  return isPunctuation(before, ':') || isOperator(before, '->');
}

/**
 * Classifies a postfix `!` at code index `index`; null for prefix or infix uses
 */
function classifyExclamation(file: SourceFile, index: number): ExclamationUse | null {
  const token = file.code[index];
  const previous = file.code[index - 1];
  if (!isOperator(token, '!') || !previous || !isAdjacent(previous, token)) {
    return null;
  }
  if (isKeyword(previous, 'as')) {
    return 'force-cast';
  }
  if (isKeyword(previous, 'try')) {
    return 'force-try';
  }
  if (endsTypeAnnotation(file, index - 1)) {
    return 'implicitly-unwrapped';
  }
  if (
    previous.kind === 'identifier'
    || isKeyword(previous, 'self', 'super')
    || isPunctuation(previous, ')')
    || isPunctuation(previous, ']')
  ) {
    return 'force-unwrap';
  }
  return null;
}

/**
 * True when the declaration holding code index `index` carries `@IBOutlet`
 */
function isOutletDeclaration(file: SourceFile, index: number): boolean {
  const { code } = file;
  const line = code[index].line;
  let i = index - 1;
  for (; i >= 0 && code[i].line === line; i--) {
    if (code[i].kind === 'attribute' && code[i].text === '@IBOutlet') {
      return true;
    }
  }
  for (; i >= 0 && code[i].kind === 'attribute'; i--) {
    if (code[i].text === '@IBOutlet') {
      return true;
    }
  }
  return false;
}

function exclamationRule(
  id: string,
  use: ExclamationUse,
  description: string,
  message: string
): RuleDefinition {
  return {
    id,
    description,
    category: 'optionals',
    defaultSeverity: 'error',
    fixable: false,
    defaultOptions: {},
    check({ file, report }) {
      file.code.forEach((token, i) => {
        if (classifyExclamation(file, i) === use) {
          report(token, message);
        }
      });
    }
  };
}

export const noForceUnwrap = exclamationRule(
  'no-force-unwrap',
  'force-unwrap',
  'Avoid force unwrapping optionals',
  'Avoid force unwrapping; use optional binding or optional chaining'
);

export const noForceCast = exclamationRule(
  'no-force-cast',
  'force-cast',
  "Avoid 'as!' force casts",
  "Avoid force casts; use 'as?' with optional binding"
);

export const noForceTry = exclamationRule(
  'no-force-try',
  'force-try',
  "Avoid 'try!'",
  "Avoid 'try!'; handle the error or use 'try?'"
);

export const noImplicitlyUnwrappedOptional: RuleDefinition = {
  id: 'no-implicitly-unwrapped-optional',
  description: 'Avoid implicitly unwrapped optional types',
  category: 'optionals',
  defaultSeverity: 'warning',
  fixable: false,
  defaultOptions: { allow_iboutlets: true },
  check({ file, options, report }) {
    const allowOutlets = booleanOption(options, 'allow_iboutlets', true);
    file.code.forEach((token, i) => {
      if (classifyExclamation(file, i) !== 'implicitly-unwrapped') {
        return;
      }
      if (allowOutlets && isOutletDeclaration(file, i)) {
        return;
      }
      report(token, 'Avoid implicitly unwrapped optionals; declare the type as optional');
    });
  }
};

export const unusedOptionalBinding: RuleDefinition = {
  id: 'unused-optional-binding',
  description: "Prefer '!= nil' over binding an optional to '_'",
  category: 'optionals',
  defaultSeverity: 'warning',
  fixable: false,
  defaultOptions: {},
  check({ file, report }) {
    const { code } = file;
    code.forEach((token, i) => {
      if (!isKeyword(token, 'let', 'var')) {
        return;
      }
      const previous = code[i - 1];
      if (!isKeyword(previous, 'if', 'guard', 'while') && !isPunctuation(previous, ',')) {
        return;
      }
      const name = code[i + 1];
      if (name?.kind === 'identifier' && name.text === '_' && isOperator(code[i + 2], '=')) {
        report(name, "Use '!= nil' instead of binding the value to '_'");
      }
    });
  }
};

export const optionalRules: RuleDefinition[] = [
  noForceUnwrap,
  noForceCast,
  noForceTry,
  noImplicitlyUnwrappedOptional,
  unusedOptionalBinding
];
