/**
 * stats command - summarize logged lint runs
 */

import * as path from 'path';
import { readHistory } from '../../core/history';
import { MetricsCalculator, MetricsSummary } from '../../core/metrics';
import { colorize } from '../formatters';
import { resolveConfig } from '../shared';

export interface StatsOptions {
  days?: number;
  format?: string;
  config?: string;
  noColors?: boolean;
}

export function formatStatsText(metrics: MetricsSummary, useColors: boolean): string {
  const lines = [
    colorize(`Lint runs from ${metrics.period.start.split('T')[0]} to ${metrics.period.end.split('T')[0]}`, 'bold', useColors),
    `Runs:              ${metrics.totalRuns}`,
    `Files checked:     ${metrics.totalFilesChecked}`,
    `Violations:        ${metrics.totalViolations} (${metrics.violationsBySeverity.error} errors, ${metrics.violationsBySeverity.warning} warnings)`,
    `Average per run:   ${metrics.averageViolationsPerRun.toFixed(2)}`
  ];

  if (metrics.topRules.length > 0) {
    lines.push('');
    lines.push(colorize('Top rules:', 'bold', useColors));
    for (const rule of metrics.topRules) {
      lines.push(`  ${rule.ruleId.padEnd(42)}${String(rule.count).padStart(6)}  ${(rule.percentage * 100).toFixed(1)}%`);
    }
  }

  return lines.join('\n');
}

export async function stats(options: StatsOptions): Promise<number> {
  try {
    const resolved = resolveConfig(options.config);
    const historyPath = path.resolve(
      resolved.configRoot,
      resolved.config.global?.history_path ?? '.swiftstyle/history.json'
    );
    const entries = readHistory(historyPath);

    if (entries.length === 0) {
      console.log(`No runs logged yet. Enable "global.log_runs" or pass --log to record runs in ${historyPath}`);
      return 0;
    }

    const calculator = new MetricsCalculator();
    const metrics = calculator.calculate(entries, options.days ?? 30);

    switch (options.format) {
      case 'json':
        console.log(JSON.stringify(metrics, null, 2));
        break;
      case 'csv':
        console.log(calculator.exportAsCsv(metrics));
        break;
      default:
        console.log(formatStatsText(metrics, !options.noColors));
    }
    return 0;
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown error';
    console.error(`Error: ${message}`);
    return 2;
  }
}
