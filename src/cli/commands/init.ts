/**
 * init command - write a swiftstyle.yaml in the current directory
 */

import * as fs from 'fs';
import * as path from 'path';
import { CONFIG_FILE_NAME } from '../../core/rules-loader';

export type TemplateName = 'minimal' | 'standard' | 'strict';

export interface InitOptions {
  template?: string;
  force?: boolean;
  cwd?: string;
}

export const TEMPLATES: Record<TemplateName, string> = {
  minimal: `# swiftstyle - minimal configuration
# Rules not listed run at their default severity.
rules:
  line-length:
    max: 160
  identifier-name: off
  prefer-let: off

global:
  max_warnings: -1
  log_runs: false
`,

  standard: `# swiftstyle - standard configuration
rules:
  indentation:
    width: 4
  line-length:
    max: 120
    ignore_urls: true
  vertical-whitespace:
    max_empty_lines: 1
  identifier-name:
    min_length: 2
    allowed: [i, j, k, x, y, z, id]

include:
  - "**/*.swift"
exclude:
  - "**/Pods/**"
  - "**/.build/**"
  - "**/Carthage/**"
  - "**/DerivedData/**"

layers:
  - name: Domain
    paths: ["**/Domain/**"]
    modules: [Domain]
    may_depend_on: []
    forbidden_imports: [UIKit, SwiftUI]
  - name: Data
    paths: ["**/Data/**"]
    modules: [Data]
    may_depend_on: [Domain]
  - name: Presentation
    paths: ["**/Presentation/**"]
    modules: [Presentation]
    may_depend_on: [Domain]

global:
  max_warnings: -1
  log_runs: false
  history_path: .swiftstyle/history.json
`,

  strict: `# swiftstyle - strict configuration
rules:
  indentation:
    width: 4
  line-length:
    max: 100
    ignore_urls: false
  identifier-name:
    severity: error
    min_length: 3
    allowed: [i, id, x, y]
  no-implicitly-unwrapped-optional:
    severity: error
    allow_iboutlets: false
  trailing-whitespace: error
  no-semicolons: error
  prefer-let: error
  shorthand-type: error

layers:
  - name: Domain
    paths: ["**/Domain/**"]
    modules: [Domain]
    may_depend_on: []
    forbidden_imports: [UIKit, SwiftUI, Combine]
  - name: Data
    paths: ["**/Data/**"]
    modules: [Data]
    may_depend_on: [Domain]
  - name: Presentation
    paths: ["**/Presentation/**"]
    modules: [Presentation]
    may_depend_on: [Domain]

global:
  max_warnings: 0
  log_runs: true
  history_path: .swiftstyle/history.json
`
};

function isTemplateName(value: string): value is TemplateName {
  return value === 'minimal' || value === 'standard' || value === 'strict';
}

export async function init(options: InitOptions): Promise<number> {
  const configPath = path.join(options.cwd ?? process.cwd(), CONFIG_FILE_NAME);

  if (fs.existsSync(configPath) && !options.force) {
    console.error(`Error: ${CONFIG_FILE_NAME} already exists. Use --force to overwrite.`);
    return 1;
  }

  const template = options.template || 'standard';
  if (!isTemplateName(template)) {
    console.error(`Error: Unknown template "${template}". Use: minimal, standard, or strict`);
    return 1;
  }

  try {
    fs.writeFileSync(configPath, TEMPLATES[template], 'utf8');
    console.log(`✓ Created ${CONFIG_FILE_NAME} with "${template}" template`);
    console.log('');
    console.log('Next steps:');
    console.log(`  1. Edit ${CONFIG_FILE_NAME} to tune rule severities and options`);
    console.log('  2. Run "swiftstyle lint" to check the project');
    console.log('  3. Run "swiftstyle check --staged" before committing');
    console.log('');
    return 0;
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown error';
    console.error(`Error: Failed to create ${CONFIG_FILE_NAME}: ${message}`);
    return 2;
  }
}
