import { DeclarationKind } from '../parser';
import { RuleDefinition, numberOption, stringListOption, stripBackticks } from './rule';

const TYPE_KINDS: ReadonlySet<DeclarationKind> = new Set<DeclarationKind>([
  'class', 'struct', 'enum', 'protocol', 'typealias', 'associatedtype'
]);

const VALUE_KINDS: ReadonlySet<DeclarationKind> = new Set<DeclarationKind>(['func', 'var', 'let', 'case']);

const UPPER_CAMEL_CASE = /^[A-Z][A-Za-z0-9]*$/;
const LOWER_CAMEL_CASE = /^_?[a-z][A-Za-z0-9]*$/;
const K_PREFIX = /^k[A-Z]/;

export const typeName: RuleDefinition = {
  id: 'type-name',
  description: 'Type names are UpperCamelCase',
  category: 'naming',
  defaultSeverity: 'error',
  fixable: false,
  defaultOptions: {},
  check({ file, report }) {
    for (const declaration of file.declarations) {
      if (!TYPE_KINDS.has(declaration.kind) || declaration.nameIndex < 0) {
        continue;
      }
      const nameToken = file.code[declaration.nameIndex];
      const name = stripBackticks(nameToken.text);
      if (!UPPER_CAMEL_CASE.test(name)) {
        report(nameToken, `Type name "${name}" should be UpperCamelCase`);
      }
    }
  }
};

export const identifierName: RuleDefinition = {
  id: 'identifier-name',
  description: 'Functions, variables, constants and enum cases are lowerCamelCase',
  category: 'naming',
  defaultSeverity: 'warning',
  fixable: false,
  defaultOptions: { min_length: 2, allowed: ['i', 'j', 'k', 'x', 'y', 'z', 'id'] },
  check({ file, options, report }) {
    const minLength = numberOption(options, 'min_length', 2);
    const allowed = stringListOption(options, 'allowed', ['i', 'j', 'k', 'x', 'y', 'z', 'id']);

    for (const declaration of file.declarations) {
      if (!VALUE_KINDS.has(declaration.kind) || declaration.nameIndex < 0) {
        continue;
      }
      const nameToken = file.code[declaration.nameIndex];
      if (nameToken.kind !== 'identifier') {
        continue;
      }
      const name = stripBackticks(nameToken.text);
      if (name === '_' || name.startsWith('$')) {
        continue;
      }

      if (K_PREFIX.test(name)) {
        report(nameToken, `"${name}" should not use a 'k' prefix; name constants in lowerCamelCase`);
      } else if (!LOWER_CAMEL_CASE.test(name)) {
        report(nameToken, `Name "${name}" should be lowerCamelCase`);
      } else if (name.length < minLength && !allowed.includes(name)) {
        report(nameToken, `Name "${name}" is too short; use at least ${minLength} characters`);
      }
    }
  }
};

export const namingRules: RuleDefinition[] = [typeName, identifierName];
