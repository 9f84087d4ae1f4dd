/**
 * @fileoverview Unified line diffs between two texts
 *
 * Edits come from a longest-common-subsequence table, which is fine for
 * documents of a few thousand lines. Output follows `diff -u`: `---`/`+++`
 * headers, then `@@ -start,count +start,count @@` hunks with context.
 */

export const DEV_NULL = '/dev/null';

interface LineEdit {
  kind: ' ' | '-' | '+';
  line: string;
}

interface Hunk {
  oldStart: number;
  oldCount: number;
  newStart: number;
  newCount: number;
  lines: string[];
}

/** Lines of a text; a trailing newline does not start another line. */
export function splitLines(text: string): string[] {
  if (text === '') return [];
  const lines = text.split('\n');
  if (lines[lines.length - 1] === '') lines.pop();
  return lines;
}

function lineEdits(oldLines: readonly string[], newLines: readonly string[]): LineEdit[] {
  const n = oldLines.length;
  const m = newLines.length;
  // common[i][j]: LCS length of oldLines[i..] and newLines[j..]
  const common: number[][] = Array.from({ length: n + 1 }, () => new Array<number>(m + 1).fill(0));
  for (let i = n - 1; i >= 0; i--) {
    const row = common[i] ?? [];
    const below = common[i + 1] ?? [];
    for (let j = m - 1; j >= 0; j--) {
      row[j] = oldLines[i] === newLines[j] ? (below[j + 1] ?? 0) + 1 : Math.max(below[j] ?? 0, row[j + 1] ?? 0);
    }
  }

  const edits: LineEdit[] = [];
  let i = 0;
  let j = 0;
  while (i < n || j < m) {
    const oldLine = oldLines[i];
    const newLine = newLines[j];
    if (oldLine !== undefined && oldLine === newLine) {
      edits.push({ kind: ' ', line: oldLine });
      i++;
      j++;
    } else if (oldLine !== undefined && (newLine === undefined || (common[i + 1]?.[j] ?? 0) >= (common[i]?.[j + 1] ?? 0))) {
      edits.push({ kind: '-', line: oldLine });
      i++;
    } else if (newLine !== undefined) {
      edits.push({ kind: '+', line: newLine });
      j++;
    }
  }
  return edits;
}

function hunks(edits: readonly LineEdit[], context: number): Hunk[] {
  const changed = edits.flatMap((edit, index) => (edit.kind === ' ' ? [] : [index]));
  const result: Hunk[] = [];

  let g = 0;
  while (g < changed.length) {
    const first = changed[g] ?? 0;
    let last = first;
    // Changes closer than two contexts apart share a hunk.
    while (g + 1 < changed.length && (changed[g + 1] ?? 0) - last <= 2 * context + 1) {
      g++;
      last = changed[g] ?? last;
    }
    g++;

    const start = Math.max(0, first - context);
    const end = Math.min(edits.length, last + context + 1);
    let oldBefore = 0;
    let newBefore = 0;
    for (const edit of edits.slice(0, start)) {
      if (edit.kind !== '+') oldBefore++;
      if (edit.kind !== '-') newBefore++;
    }

    const hunk: Hunk = { oldStart: 0, oldCount: 0, newStart: 0, newCount: 0, lines: [] };
    for (const edit of edits.slice(start, end)) {
      if (edit.kind !== '+') hunk.oldCount++;
      if (edit.kind !== '-') hunk.newCount++;
      hunk.lines.push(`${edit.kind}${edit.line}`);
    }
    // An empty side is numbered by the line before it, as `diff -u` does.
    hunk.oldStart = hunk.oldCount === 0 ? oldBefore : oldBefore + 1;
    hunk.newStart = hunk.newCount === 0 ? newBefore : newBefore + 1;
    result.push(hunk);
  }
  return result;
}

/** Unified diff lines from `oldText` to `newText`; empty when they are equal. */
export function unifiedDiff(
  oldLabel: string,
  oldText: string,
  newLabel: string,
  newText: string,
  context = 3,
): string[] {
  const found = hunks(lineEdits(splitLines(oldText), splitLines(newText)), context);
  if (found.length === 0) return [];

  const lines = [`--- ${oldLabel}`, `+++ ${newLabel}`];
  for (const hunk of found) {
    lines.push(`@@ -${hunk.oldStart},${hunk.oldCount} +${hunk.newStart},${hunk.newCount} @@`, ...hunk.lines);
  }
  return lines;
}
