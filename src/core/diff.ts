import * as Diff from 'diff';

export interface DiffChange {
  type: 'added' | 'removed' | 'unchanged';
  value: string;
  lineNumber: number;
  count: number;
}

export interface DiffResult {
  changes: DiffChange[];
  linesAdded: number;
  linesRemoved: number;
  totalLinesChanged: number;
}

function countLines(value: string): number {
  if (value.length === 0) {
    return 0;
  }
  return (value.match(/\n/g) || []).length + (value.endsWith('\n') ? 0 : 1);
}

/**
 * Line diff between two versions of a file. Line numbers refer to `after`.
 */
export function computeDiff(before: string, after: string): DiffResult {
  const changes: DiffChange[] = [];
  let linesAdded = 0;
  let linesRemoved = 0;
  let currentLine = 1;

  for (const change of Diff.diffLines(before, after)) {
    const count = countLines(change.value);

    if (change.added) {
      changes.push({ type: 'added', value: change.value, lineNumber: currentLine, count });
      linesAdded += count;
      currentLine += count;
    } else if (change.removed) {
      changes.push({ type: 'removed', value: change.value, lineNumber: currentLine, count });
      linesRemoved += count;
    } else {
      changes.push({ type: 'unchanged', value: change.value, lineNumber: currentLine, count });
      currentLine += count;
    }
  }

  return {
    changes,
    linesAdded,
    linesRemoved,
    totalLinesChanged: linesAdded + linesRemoved
  };
}

export function getAddedLineNumbers(diff: DiffResult): Set<number> {
  const lineNumbers = new Set<number>();
  for (const change of diff.changes) {
    if (change.type !== 'added') {
      continue;
    }
    for (let i = 0; i < change.count; i++) {
      lineNumbers.add(change.lineNumber + i);
    }
  }
  return lineNumbers;
}
