/**
 * Core module exports
 * Everything the CLI uses, usable on its own as a library
 */

export * from './types';
export * from './errors';
export * from './tokenizer';
export * from './parser';
export * from './rules';
export * from './rules-loader';
export * from './suppressions';
export * from './linter';
export * from './fixer';
export * from './diff';
export * from './history';
export * from './metrics';
export * from './file-discovery';
