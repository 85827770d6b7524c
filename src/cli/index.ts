#!/usr/bin/env node

/**
 * swiftstyle CLI
 * Check Swift sources against a style guide
 */

import { Command, Option } from 'commander';
import { lint } from './commands/lint';
import { check } from './commands/check';
import { init } from './commands/init';
import { listRules } from './commands/rules';
import { stats } from './commands/stats';
import { OUTPUT_FORMATS, OutputFormat } from './formatters';
import { parseInteger } from './shared';

interface OutputCliOptions {
  config?: string;
  format: OutputFormat;
  output?: string;
  quiet?: boolean;
  maxWarnings?: number;
  verbose?: boolean;
  colors: boolean;
  log?: boolean;
}

function addOutputOptions(command: Command): Command {
  return command
    .option('-c, --config <file>', 'Path to swiftstyle.yaml (auto-detected if not specified)')
    .addOption(new Option('-f, --format <format>', 'Output format').choices(OUTPUT_FORMATS).default('text'))
    .option('-o, --output <file>', 'Write output to file')
    .option('-q, --quiet', 'Report errors only')
    .option('--max-warnings <n>', 'Fail when there are more warnings than this', parseInteger)
    .option('--log', 'Append this run to the history file')
    .option('-v, --verbose', 'Show progress and the resolved configuration')
    .option('--no-colors', 'Disable colored output');
}

function toReportOptions(options: OutputCliOptions) {
  return {
    config: options.config,
    format: options.format,
    output: options.output,
    quiet: options.quiet,
    maxWarnings: options.maxWarnings,
    verbose: options.verbose,
    noColors: !options.colors,
    log: options.log
  };
}

const program = new Command();

program
  .name('swiftstyle')
  .description('swiftstyle - Check Swift code against a style guide')
  .version('0.3.0');

// lint command
addOutputOptions(
  program
    .command('lint')
    .description('Lint Swift files and directories')
    .argument('[paths...]', 'Files or directories to lint', ['.'])
    .option('--fix', 'Apply automatic fixes')
).action(async (paths: string[], options: OutputCliOptions & { fix?: boolean }) => {
  const exitCode = await lint(paths, { ...toReportOptions(options), fix: options.fix });
  process.exit(exitCode);
});

// check command
addOutputOptions(
  program
    .command('check')
    .description('Lint git staged or committed changes, reporting only added lines')
    .option('-s, --staged', 'Check staged changes (default)')
    .option('--commit <sha>', 'Check a specific commit')
).action(async (options: OutputCliOptions & { staged?: boolean; commit?: string }) => {
  const exitCode = await check({
    ...toReportOptions(options),
    staged: options.staged || !options.commit,
    commit: options.commit
  });
  process.exit(exitCode);
});

// init command
program
  .command('init')
  .description('Create a swiftstyle.yaml in the current directory')
  .option('-t, --template <name>', 'Template to use: minimal, standard, strict', 'standard')
  .option('--force', 'Overwrite an existing swiftstyle.yaml')
  .action(async (options: { template: string; force?: boolean }) => {
    const exitCode = await init({
      template: options.template,
      force: options.force
    });
    process.exit(exitCode);
  });

// rules command
program
  .command('rules')
  .description('List available rules')
  .option('--category <name>', 'Only list rules of this category')
  .addOption(new Option('-f, --format <format>', 'Output format').choices(['text', 'json']).default('text'))
  .option('--no-colors', 'Disable colored output')
  .action(async (options: { category?: string; format: string; colors: boolean }) => {
    const exitCode = await listRules({
      category: options.category,
      format: options.format,
      noColors: !options.colors
    });
    process.exit(exitCode);
  });

// stats command
program
  .command('stats')
  .description('Summarize logged lint runs')
  .option('-d, --days <n>', 'Number of days to include', parseInteger, 30)
  .addOption(new Option('-f, --format <format>', 'Output format').choices(['text', 'json', 'csv']).default('text'))
  .option('-c, --config <file>', 'Path to swiftstyle.yaml (auto-detected if not specified)')
  .option('--no-colors', 'Disable colored output')
  .action(async (options: { days: number; format: string; config?: string; colors: boolean }) => {
    const exitCode = await stats({
      days: options.days,
      format: options.format,
      config: options.config,
      noColors: !options.colors
    });
    process.exit(exitCode);
  });

program.parseAsync().catch((error: unknown) => {
  const message = error instanceof Error ? error.message : 'Unknown error';
  console.error(`Error: ${message}`);
  process.exit(2);
});
