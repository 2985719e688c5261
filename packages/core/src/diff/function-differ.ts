import { structuredPatch } from 'diff';
import { FunctionDiff } from '../types.js';

const CONTEXT_LINES = 3;

/**
 * Split on any line terminator, dropping the empty entry a trailing
 * terminator leaves behind.
 */
export function splitLines(text: string): string[] {
  const lines = text.split(/\r\n|\r|\n/);
  if (lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines;
}

/**
 * Terminate every line so that neither side is reported as missing a final
 * newline; function bodies never carry one.
 */
function normalize(text: string): string {
  return splitLines(text)
    .map((line) => line + '\n')
    .join('');
}

/**
 * Unified line diff of two function bodies, plus the raw added and deleted
 * lines (without their `+`/`-` marker). Identical bodies produce an empty
 * diff.
 */
export function diffFunctionBodies(before: string, after: string): FunctionDiff {
  const patch = structuredPatch(
    'before',
    'after',
    normalize(before),
    normalize(after),
    undefined,
    undefined,
    { context: CONTEXT_LINES },
  );

  const addedLines: string[] = [];
  const deletedLines: string[] = [];

  if (patch.hunks.length === 0) {
    return { diffText: '', diffStat: { addedLines, deletedLines } };
  }

  const out: string[] = ['--- before', '+++ after'];

  for (const hunk of patch.hunks) {
    out.push(`@@ -${hunk.oldStart},${hunk.oldLines} +${hunk.newStart},${hunk.newLines} @@`);

    for (const line of hunk.lines) {
      out.push(line);
      if (line.startsWith('+')) {
        addedLines.push(line.slice(1));
      } else if (line.startsWith('-')) {
        deletedLines.push(line.slice(1));
      }
    }
  }

  return { diffText: out.join('\n'), diffStat: { addedLines, deletedLines } };
}
