import { RunEntry } from './history';

export interface TrendDataPoint {
  date: string; // YYYY-MM-DD
  runs: number;
  violations: number;
}

export interface RuleViolationCount {
  ruleId: string;
  count: number;
  percentage: number;
}

export interface MetricsSummary {
  period: { start: string; end: string };
  totalRuns: number;
  totalFilesChecked: number;
  totalViolations: number;
  violationsByRule: Record<string, number>;
  violationsBySeverity: { error: number; warning: number };
  trendsOverTime: TrendDataPoint[];
  topRules: RuleViolationCount[];
  averageViolationsPerRun: number;
}

const TOP_RULES_LIMIT = 10;

function toDay(date: Date): string {
  return date.toISOString().split('T')[0];
}

export class MetricsCalculator {
  /**
   * Summarize the runs of the last `periodDays` days
   */
  public calculate(entries: RunEntry[], periodDays: number = 30, now: Date = new Date()): MetricsSummary {
    const cutoff = new Date(now);
    cutoff.setUTCDate(cutoff.getUTCDate() - periodDays);

    const runs = entries.filter(entry => {
      const timestamp = new Date(entry.timestamp);
      return timestamp >= cutoff && timestamp <= now;
    });
    const totalViolations = this.countTotalViolations(runs);

    return {
      period: {
        start: cutoff.toISOString(),
        end: now.toISOString()
      },
      totalRuns: runs.length,
      totalFilesChecked: runs.reduce((sum, run) => sum + run.filesChecked, 0),
      totalViolations,
      violationsByRule: this.countByRule(runs),
      violationsBySeverity: this.countBySeverity(runs),
      trendsOverTime: this.calculateTrends(runs, periodDays, now),
      topRules: this.getTopRules(runs, totalViolations),
      averageViolationsPerRun: runs.length > 0 ? totalViolations / runs.length : 0
    };
  }

  private countTotalViolations(runs: RunEntry[]): number {
    return runs.reduce((sum, run) => sum + run.violations.length, 0);
  }

  private countByRule(runs: RunEntry[]): Record<string, number> {
    const counts: Record<string, number> = {};
    for (const run of runs) {
      for (const violation of run.violations) {
        counts[violation.ruleId] = (counts[violation.ruleId] || 0) + 1;
      }
    }
    return counts;
  }

  private countBySeverity(runs: RunEntry[]): { error: number; warning: number } {
    let error = 0;
    let warning = 0;
    for (const run of runs) {
      for (const violation of run.violations) {
        if (violation.severity === 'error') {
          error++;
        } else {
          warning++;
        }
      }
    }
    return { error, warning };
  }

  private calculateTrends(runs: RunEntry[], days: number, now: Date): TrendDataPoint[] {
    const dailyData = new Map<string, TrendDataPoint>();

    for (const run of runs) {
      const date = run.timestamp.split('T')[0];
      const existing = dailyData.get(date) || { date, runs: 0, violations: 0 };
      existing.runs++;
      existing.violations += run.violations.length;
      dailyData.set(date, existing);
    }

    // Fill in missing dates
    const result: TrendDataPoint[] = [];
    for (let i = days - 1; i >= 0; i--) {
      const day = new Date(now);
      day.setUTCDate(day.getUTCDate() - i);
      const date = toDay(day);
      result.push(dailyData.get(date) || { date, runs: 0, violations: 0 });
    }

    return result;
  }

  private getTopRules(runs: RunEntry[], total: number): RuleViolationCount[] {
    return Object.entries(this.countByRule(runs))
      .sort((a, b) => b[1] - a[1] || a[0].localeCompare(b[0]))
      .slice(0, TOP_RULES_LIMIT)
      .map(([ruleId, count]) => ({
        ruleId,
        count,
        percentage: total > 0 ? count / total : 0
      }));
  }

  /**
   * Export metrics as CSV string
   */
  public exportAsCsv(metrics: MetricsSummary): string {
    const lines: string[] = [];

    lines.push('Metric,Value');
    lines.push(`Total Runs,${metrics.totalRuns}`);
    lines.push(`Files Checked,${metrics.totalFilesChecked}`);
    lines.push(`Total Violations,${metrics.totalViolations}`);
    lines.push(`Avg Violations Per Run,${metrics.averageViolationsPerRun.toFixed(2)}`);
    lines.push('');

    lines.push('Rule,Count');
    for (const [ruleId, count] of Object.entries(metrics.violationsByRule)) {
      lines.push(`${ruleId},${count}`);
    }
    lines.push('');

    lines.push('Severity,Count');
    lines.push(`Error,${metrics.violationsBySeverity.error}`);
    lines.push(`Warning,${metrics.violationsBySeverity.warning}`);
    lines.push('');

    lines.push('Date,Runs,Violations');
    for (const point of metrics.trendsOverTime) {
      lines.push(`${point.date},${point.runs},${point.violations}`);
    }

    return lines.join('\n');
  }
}
