/**
 * Core types for swiftstyle
 * Shared between the CLI and the rule engine
 */

export type Severity = 'error' | 'warning';

export type SeveritySetting = Severity | 'off';

export type RuleCategory =
  | 'spacing'
  | 'naming'
  | 'optionals'
  | 'functions'
  | 'types'
  | 'control-flow'
  | 'architecture';

export type RuleOptions = Record<string, unknown>;

export interface RuleSettingObject {
  severity?: SeveritySetting;
  [option: string]: unknown;
}

export type RuleSettingInput = SeveritySetting | RuleSettingObject;

export interface ResolvedRuleSetting {
  severity: SeveritySetting;
  options: RuleOptions;
}

export interface LayerDefinition {
  name: string;
  paths: string[];
  modules: string[];
  may_depend_on: string[];
  forbidden_imports?: string[];
}

export interface GlobalSettings {
  max_warnings?: number;
  log_runs?: boolean;
  history_path?: string;
}

export interface RulesConfig {
  rules: Record<string, RuleSettingInput>;
  include?: string[];
  exclude?: string[];
  layers?: LayerDefinition[];
  global?: GlobalSettings;
}

export interface RulesOverride {
  replace?: boolean;
  rules?: Record<string, RuleSettingInput>;
  disable?: string[];
  layers?: LayerDefinition[];
  global?: GlobalSettings;
}

export interface Position {
  line: number;
  column: number;
}

export interface Location extends Position {
  endLine?: number;
  endColumn?: number;
}

/**
 * Replaces `text.slice(start, end)` with `text`
 */
export interface Fix {
  start: number;
  end: number;
  text: string;
}

export interface Violation {
  ruleId: string;
  category: RuleCategory | 'parser';
  severity: Severity;
  message: string;
  line: number;
  column: number;
  endLine?: number;
  endColumn?: number;
  fix?: Fix;
}

export interface LintResult {
  fileName: string;
  violations: Violation[];
  errorCount: number;
  warningCount: number;
  fixableCount: number;
  /** Source after fixes were applied, when linted with fixing on */
  output?: string;
}

export const DEFAULT_INCLUDE = ['**/*.swift'];

export const DEFAULT_EXCLUDE = ['**/Pods/**', '**/.build/**', '**/Carthage/**', '**/DerivedData/**'];

export const DEFAULT_LAYERS: LayerDefinition[] = [
  {
    name: 'Domain',
    paths: ['**/Domain/**'],
    modules: ['Domain'],
    may_depend_on: [],
    forbidden_imports: ['UIKit', 'SwiftUI']
  },
  {
    name: 'Data',
    paths: ['**/Data/**'],
    modules: ['Data'],
    may_depend_on: ['Domain']
  },
  {
    name: 'Presentation',
    paths: ['**/Presentation/**'],
    modules: ['Presentation'],
    may_depend_on: ['Domain']
  }
];

export const DEFAULT_RULES: RulesConfig = {
  rules: {},
  include: DEFAULT_INCLUDE,
  exclude: DEFAULT_EXCLUDE,
  global: {
    max_warnings: -1,
    log_runs: false,
    history_path: '.swiftstyle/history.json'
  }
};
