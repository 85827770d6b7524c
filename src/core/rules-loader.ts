/**
 * Configuration loading
 * Pure functions with no CLI dependencies
 */

import * as fs from 'fs';
import * as path from 'path';
import * as yaml from 'js-yaml';
import { ConfigError } from './errors';
import { getRule, isKnownRule } from './rules';
import {
  DEFAULT_RULES,
  GlobalSettings,
  LayerDefinition,
  ResolvedRuleSetting,
  RuleSettingInput,
  RuleSettingObject,
  RulesConfig,
  RulesOverride,
  SeveritySetting
} from './types';

export const CONFIG_FILE_NAME = 'swiftstyle.yaml';
export const OVERRIDE_FILE_NAME = '.swiftstyle.yaml';

const SEVERITIES: readonly SeveritySetting[] = ['off', 'warning', 'error'];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isSeverity(value: unknown): value is SeveritySetting {
  return SEVERITIES.some(severity => severity === value);
}

function isStringList(value: unknown): value is string[] {
  return Array.isArray(value) && value.every(item => typeof item === 'string');
}

function validateRuleSettings(rules: Record<string, unknown>, errors: string[]): void {
  for (const [id, setting] of Object.entries(rules)) {
    if (!isKnownRule(id)) {
      errors.push(`unknown rule "${id}"`);
      continue;
    }
    if (isSeverity(setting)) {
      continue;
    }
    if (!isRecord(setting)) {
      errors.push(`rule "${id}" must be a severity (off, warning, error) or an options object`);
      continue;
    }
    if (setting.severity !== undefined && !isSeverity(setting.severity)) {
      errors.push(`rule "${id}" has an invalid severity "${String(setting.severity)}"`);
    }
  }
}

function validateLayers(layers: unknown, errors: string[]): void {
  if (!Array.isArray(layers)) {
    errors.push('"layers" must be a list');
    return;
  }
  layers.forEach((layer: unknown, index) => {
    if (!isRecord(layer) || typeof layer.name !== 'string') {
      errors.push(`layer #${index + 1} must have a name`);
      return;
    }
    for (const key of ['paths', 'modules', 'may_depend_on', 'forbidden_imports']) {
      const value = layer[key];
      if (value === undefined && key !== 'paths') {
        continue;
      }
      if (!isStringList(value)) {
        errors.push(`layer "${layer.name}" must list "${key}" as strings`);
      }
    }
  });
}

function validateGlobal(global: unknown, errors: string[]): void {
  if (!isRecord(global)) {
    errors.push('"global" must be a mapping');
    return;
  }
  if (global.max_warnings !== undefined && typeof global.max_warnings !== 'number') {
    errors.push('"global.max_warnings" must be a number');
  }
  if (global.log_runs !== undefined && typeof global.log_runs !== 'boolean') {
    errors.push('"global.log_runs" must be true or false');
  }
  if (global.history_path !== undefined && typeof global.history_path !== 'string') {
    errors.push('"global.history_path" must be a path');
  }
}

/**
 * Collect every problem with a parsed configuration object
 */
export function validateRulesConfig(config: unknown): string[] {
  const errors: string[] = [];

  if (!isRecord(config)) {
    return ['configuration must be a mapping'];
  }
  if (config.rules !== undefined) {
    if (isRecord(config.rules)) {
      validateRuleSettings(config.rules, errors);
    } else {
      errors.push('"rules" must be a mapping of rule ids to settings');
    }
  }
  for (const key of ['include', 'exclude', 'disable']) {
    if (config[key] !== undefined && !isStringList(config[key])) {
      errors.push(`"${key}" must be a list of strings`);
    }
  }
  if (config.layers !== undefined) {
    validateLayers(config.layers, errors);
  }
  if (config.global !== undefined) {
    validateGlobal(config.global, errors);
  }
  if (config.replace !== undefined && typeof config.replace !== 'boolean') {
    errors.push('"replace" must be true or false');
  }

  return errors;
}

function normalizeLayers(layers: unknown): LayerDefinition[] | undefined {
  if (!Array.isArray(layers)) {
    return undefined;
  }
  return layers.filter(isRecord).map(layer => ({
    name: String(layer.name),
    paths: isStringList(layer.paths) ? layer.paths : [],
    modules: isStringList(layer.modules) ? layer.modules : [],
    may_depend_on: isStringList(layer.may_depend_on) ? layer.may_depend_on : [],
    forbidden_imports: isStringList(layer.forbidden_imports) ? layer.forbidden_imports : undefined
  }));
}

function toSettingObject(setting: Record<string, unknown>): RuleSettingObject {
  const result: RuleSettingObject = {};
  for (const [key, value] of Object.entries(setting)) {
    if (key !== 'severity') {
      result[key] = value;
    } else if (isSeverity(value)) {
      result.severity = value;
    }
  }
  return result;
}

function normalizeRules(rules: unknown): Record<string, RuleSettingInput> {
  const normalized: Record<string, RuleSettingInput> = {};
  if (!isRecord(rules)) {
    return normalized;
  }
  for (const [id, setting] of Object.entries(rules)) {
    if (isSeverity(setting)) {
      normalized[id] = setting;
    } else if (isRecord(setting)) {
      normalized[id] = toSettingObject(setting);
    }
  }
  return normalized;
}

function normalizeGlobal(global: unknown): GlobalSettings {
  if (!isRecord(global)) {
    return {};
  }
  const settings: GlobalSettings = {};
  if (typeof global.max_warnings === 'number') {
    settings.max_warnings = global.max_warnings;
  }
  if (typeof global.log_runs === 'boolean') {
    settings.log_runs = global.log_runs;
  }
  if (typeof global.history_path === 'string') {
    settings.history_path = global.history_path;
  }
  return settings;
}

function readYamlFile(filePath: string): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = yaml.load(fs.readFileSync(filePath, 'utf8'));
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : 'Unknown error';
    throw new ConfigError(errorMessage, filePath);
  }

  if (parsed === undefined || parsed === null) {
    return {};
  }
  const errors = validateRulesConfig(parsed);
  if (errors.length > 0 || !isRecord(parsed)) {
    throw new ConfigError(errors.join('; '), filePath);
  }
  return parsed;
}

/**
 * Load configuration from a specific file path
 */
export function loadRulesFromPath(configPath: string): RulesConfig {
  if (!fs.existsSync(configPath)) {
    return DEFAULT_RULES;
  }

  const parsed = readYamlFile(configPath);
  return {
    rules: normalizeRules(parsed.rules),
    include: isStringList(parsed.include) ? parsed.include : DEFAULT_RULES.include,
    exclude: isStringList(parsed.exclude) ? parsed.exclude : DEFAULT_RULES.exclude,
    layers: normalizeLayers(parsed.layers),
    global: {
      ...DEFAULT_RULES.global,
      ...normalizeGlobal(parsed.global)
    }
  };
}

function loadOverride(overridePath: string): RulesOverride {
  const parsed = readYamlFile(overridePath);
  return {
    replace: parsed.replace === true,
    rules: normalizeRules(parsed.rules),
    disable: isStringList(parsed.disable) ? parsed.disable : undefined,
    layers: normalizeLayers(parsed.layers),
    global: normalizeGlobal(parsed.global)
  };
}

/**
 * Apply an override to base rules
 */
export function applyRulesOverride(base: RulesConfig, override: RulesOverride): RulesConfig {
  let rules = override.replace ? {} : { ...base.rules };

  for (const id of override.disable ?? []) {
    rules[id] = 'off';
  }
  if (override.rules) {
    rules = { ...rules, ...override.rules };
  }

  return {
    ...base,
    rules,
    layers: override.layers ?? base.layers,
    global: {
      ...base.global,
      ...(override.global || {})
    }
  };
}

/**
 * Find all override files from the config root down to the target directory
 */
function findOverrideFiles(configRoot: string, targetDir: string): string[] {
  const normalizedRoot = path.resolve(configRoot);
  const relative = path.relative(normalizedRoot, path.resolve(targetDir));
  if (relative.startsWith('..') || path.isAbsolute(relative)) {
    return [];
  }

  const directories = [normalizedRoot];
  let current = normalizedRoot;
  for (const segment of relative.split(path.sep).filter(part => part.length > 0)) {
    current = path.join(current, segment);
    directories.push(current);
  }

  return directories
    .map(dir => path.join(dir, OVERRIDE_FILE_NAME))
    .filter(overridePath => fs.existsSync(overridePath));
}

/**
 * Load configuration with per-directory overrides for a specific file
 */
export function loadRulesForFile(filePath: string, configRoot: string, base?: RulesConfig): RulesConfig {
  let config = base ?? loadRulesFromPath(path.join(configRoot, CONFIG_FILE_NAME));

  for (const overridePath of findOverrideFiles(configRoot, path.dirname(filePath))) {
    config = applyRulesOverride(config, loadOverride(overridePath));
  }

  return config;
}

/**
 * Find the configuration file starting from a directory
 */
export function findConfigFile(startDir: string): string | undefined {
  let currentDir = path.resolve(startDir);

  for (;;) {
    const configPath = path.join(currentDir, CONFIG_FILE_NAME);
    if (fs.existsSync(configPath)) {
      return configPath;
    }
    const parent = path.dirname(currentDir);
    if (parent === currentDir) {
      return undefined;
    }
    currentDir = parent;
  }
}

/**
 * Resolve the effective severity and options of one rule
 */
export function resolveRuleSetting(config: RulesConfig, ruleId: string): ResolvedRuleSetting {
  const rule = getRule(ruleId);
  const defaults: ResolvedRuleSetting = {
    severity: rule?.defaultSeverity ?? 'off',
    options: { ...(rule?.defaultOptions ?? {}) }
  };
  const setting = config.rules[ruleId];

  if (setting === undefined) {
    return defaults;
  }
  if (typeof setting === 'string') {
    return { ...defaults, severity: setting };
  }

  const { severity, ...options } = setting;
  return {
    severity: severity ?? defaults.severity,
    options: { ...defaults.options, ...options }
  };
}
