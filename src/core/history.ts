import * as fs from 'fs';
import * as path from 'path';
import { LintResult, Severity } from './types';

export interface HistoryViolation {
  ruleId: string;
  severity: Severity;
  fileName: string;
  line: number;
}

export interface RunEntry {
  id: string;
  timestamp: string;
  command: 'lint' | 'check';
  filesChecked: number;
  violations: HistoryViolation[];
}

interface HistoryFile {
  version: string;
  entries: RunEntry[];
}

const HISTORY_VERSION = '1.0';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isHistoryViolation(value: unknown): value is HistoryViolation {
  return isRecord(value)
    && typeof value.ruleId === 'string'
    && (value.severity === 'error' || value.severity === 'warning')
    && typeof value.fileName === 'string'
    && typeof value.line === 'number';
}

function isRunEntry(value: unknown): value is RunEntry {
  return isRecord(value)
    && typeof value.id === 'string'
    && typeof value.timestamp === 'string'
    && (value.command === 'lint' || value.command === 'check')
    && typeof value.filesChecked === 'number'
    && Array.isArray(value.violations)
    && value.violations.every(isHistoryViolation);
}

function readHistoryFile(historyPath: string): HistoryFile {
  if (!fs.existsSync(historyPath)) {
    return { version: HISTORY_VERSION, entries: [] };
  }

  const content = fs.readFileSync(historyPath, 'utf8');
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : 'Unknown error';
    throw new Error(`Failed to read history file ${historyPath}: ${errorMessage}`);
  }

  if (!isRecord(parsed) || !Array.isArray(parsed.entries)) {
    throw new Error(`Failed to read history file ${historyPath}: expected an "entries" list`);
  }
  return {
    version: typeof parsed.version === 'string' ? parsed.version : HISTORY_VERSION,
    entries: parsed.entries.filter(isRunEntry)
  };
}

function writeHistoryFile(historyPath: string, historyFile: HistoryFile): void {
  fs.mkdirSync(path.dirname(historyPath), { recursive: true });
  fs.writeFileSync(historyPath, JSON.stringify(historyFile, null, 2), 'utf8');
}

export function generateId(): string {
  return `${Date.now()}-${Math.random().toString(36).slice(2, 11)}`;
}

export function toRunEntry(
  command: RunEntry['command'],
  results: LintResult[],
  timestamp: Date = new Date()
): RunEntry {
  return {
    id: generateId(),
    timestamp: timestamp.toISOString(),
    command,
    filesChecked: results.length,
    violations: results.flatMap(result => result.violations.map(violation => ({
      ruleId: violation.ruleId,
      severity: violation.severity,
      fileName: result.fileName,
      line: violation.line
    })))
  };
}

export function appendRun(historyPath: string, entry: RunEntry): void {
  const historyFile = readHistoryFile(historyPath);
  historyFile.entries.push(entry);
  writeHistoryFile(historyPath, historyFile);
}

export function readHistory(historyPath: string): RunEntry[] {
  return readHistoryFile(historyPath).entries;
}
