import { DiffStat } from '../types.js';
import { splitLines } from '../diff/function-differ.js';

export const DEFAULT_MAX_FUNCTION_LINES = 800;
export const DEFAULT_MAX_CHANGED_LINES = 200;

/** Any path mentioning "test", in any case, counts as test code. */
export function isTestFile(filePath: string): boolean {
  return filePath.toLowerCase().includes('test');
}

export function isLargeFunction(code: string, maxLines: number = DEFAULT_MAX_FUNCTION_LINES): boolean {
  return splitLines(code).length > maxLines;
}

export function isLargeChange(diffStat: DiffStat, maxChanged: number = DEFAULT_MAX_CHANGED_LINES): boolean {
  return diffStat.addedLines.length + diffStat.deletedLines.length > maxChanged;
}
