import {
  ExtractionOptions,
  FileChange,
  FunctionChangeResult,
  FunctionDefinition,
  FunctionSnapshot,
} from '../types.js';
import { GrammarRegistry } from '../parsing/grammar-registry.js';
import { parseFunctions } from '../parsing/source-parser.js';
import { diffFunctionBodies } from '../diff/function-differ.js';
import { GitRepository } from '../git/git-repository.js';
import { loadFileChanges } from '../snapshot/snapshot-loader.js';
import { analyzeCommitCalls } from '../calls/call-analysis.js';
import {
  DEFAULT_MAX_CHANGED_LINES,
  DEFAULT_MAX_FUNCTION_LINES,
  isLargeChange,
  isLargeFunction,
  isTestFile,
} from './filters.js';

export const DEFAULT_EXTRACTION_OPTIONS = {
  repoUrl: '',
  callAnalysis: true,
  skipTests: true,
  maxFunctionLines: DEFAULT_MAX_FUNCTION_LINES,
  maxChangedLines: DEFAULT_MAX_CHANGED_LINES,
} satisfies Partial<ExtractionOptions>;

type ResolvedOptions = Required<Omit<ExtractionOptions, 'onProgress'>>;

export type ChangedFunctionOptions = Pick<ResolvedOptions, 'repoUrl' | 'maxFunctionLines' | 'maxChangedLines'>;

/** Functions keyed by name; a later definition of the same name wins. */
function byName(functions: FunctionDefinition[]): Map<string, FunctionDefinition> {
  return new Map(functions.map((fn): [string, FunctionDefinition] => [fn.name, fn]));
}

function toSnapshot(fn: FunctionDefinition): FunctionSnapshot {
  return {
    name: fn.name,
    signature: fn.signature,
    returnType: fn.returnType,
    code: fn.code,
    startLine: fn.startLine,
    endLine: fn.endLine,
  };
}

/**
 * Pair up the functions of one changed file by name and diff every pair
 * whose code differs. Functions that only exist on one side are skipped, as
 * are pairs that exceed the size limits.
 */
export function extractChangedFunctions(
  registry: GrammarRegistry,
  change: FileChange,
  options: ChangedFunctionOptions,
  commitHash: string,
): FunctionChangeResult[] {
  const before = byName(parseFunctions(registry, change.contentBefore, change.language, change.filePath));
  const after = byName(parseFunctions(registry, change.contentAfter, change.language, change.filePath));

  const results: FunctionChangeResult[] = [];

  for (const [name, afterFn] of after) {
    const beforeFn = before.get(name);
    if (!beforeFn || beforeFn.code === afterFn.code) continue;

    if (
      isLargeFunction(beforeFn.code, options.maxFunctionLines) ||
      isLargeFunction(afterFn.code, options.maxFunctionLines)
    ) {
      continue;
    }

    const { diffText, diffStat } = diffFunctionBodies(beforeFn.code, afterFn.code);
    if (isLargeChange(diffStat, options.maxChangedLines)) continue;

    results.push({
      repoUrl: options.repoUrl,
      commitHash,
      filePath: change.filePath,
      language: change.language,
      functionName: name,
      before: toSnapshot(beforeFn),
      after: toSnapshot(afterFn),
      diffText,
      diffStat,
    });
  }

  return results;
}

/**
 * Extract every function whose body changed in `options.commit`, with its
 * before/after text and diff, and optionally its call graph in both trees.
 *
 * Steps:
 *   1. Resolve the commit and its parent (a root commit is an error)
 *   2. Read the before/after contents of the changed source files
 *   3. Parse both sides of each file and diff the functions that changed
 *   4. Build a call-graph index for each tree and attach the comparison
 */
export async function extractCommitFunctions(
  options: ExtractionOptions,
  registry: GrammarRegistry,
): Promise<FunctionChangeResult[]> {
  const { onProgress } = options;
  const resolved: ResolvedOptions = {
    repoPath: options.repoPath,
    commit: options.commit,
    repoUrl: options.repoUrl ?? DEFAULT_EXTRACTION_OPTIONS.repoUrl,
    callAnalysis: options.callAnalysis ?? DEFAULT_EXTRACTION_OPTIONS.callAnalysis,
    skipTests: options.skipTests ?? DEFAULT_EXTRACTION_OPTIONS.skipTests,
    maxFunctionLines: options.maxFunctionLines ?? DEFAULT_EXTRACTION_OPTIONS.maxFunctionLines,
    maxChangedLines: options.maxChangedLines ?? DEFAULT_EXTRACTION_OPTIONS.maxChangedLines,
  };

  // --- 1. Resolve commit ----------------------------------------------------
  const repo = new GitRepository(resolved.repoPath);
  const commit = await repo.resolveCommit(resolved.commit);

  // --- 2. Collect changed files ---------------------------------------------
  onProgress?.('Collecting changed files...');
  const fileChanges = await loadFileChanges(repo, commit);

  // --- 3. Diff changed functions ----------------------------------------------
  const results: FunctionChangeResult[] = [];
  for (const change of fileChanges) {
    if (resolved.skipTests && isTestFile(change.filePath)) continue;

    onProgress?.(`Parsing ${change.filePath}...`);
    results.push(...extractChangedFunctions(registry, change, resolved, resolved.commit));
  }

  if (!resolved.callAnalysis || results.length === 0) {
    return results;
  }

  // --- 4. Call analysis -------------------------------------------------------
  const names = [...new Set(results.map((r) => r.functionName))];
  const callAnalysis = await analyzeCommitCalls(repo, registry, names, commit, onProgress);

  for (const result of results) {
    const analysis = callAnalysis.get(result.functionName);
    if (analysis) {
      result.callAnalysis = analysis;
    }
  }

  return results;
}
