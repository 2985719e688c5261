import {
  CallAnalysisResult,
  CommitRef,
  FunctionCallAnalysis,
  SnapshotProvider,
} from '../types.js';
import { GrammarRegistry } from '../parsing/grammar-registry.js';
import { buildDefinitionIndex } from '../graph/definition-index.js';
import { resolveCallGraph } from '../graph/call-graph-resolver.js';
import { compareCallAnalysis } from '../diff/call-graph-differ.js';
import { loadSnapshot } from '../snapshot/snapshot-loader.js';

/**
 * Index the tree at `ref` and resolve callees and callers for `names`.
 * Names with no definition in that tree are absent from the result.
 */
export async function analyzeSnapshotCalls(
  provider: SnapshotProvider,
  registry: GrammarRegistry,
  names: Iterable<string>,
  ref: string,
): Promise<Map<string, FunctionCallAnalysis>> {
  const files = await loadSnapshot(provider, ref);
  const index = buildDefinitionIndex(files, registry);
  return resolveCallGraph(names, index);
}

/** Placeholder for the side of a pair where the function does not exist. */
export function emptyCallAnalysis(functionName: string): FunctionCallAnalysis {
  return {
    functionName,
    filePath: '',
    signature: '',
    returnType: '',
    callees: [],
    callers: [],
  };
}

/**
 * Join per-snapshot analyses into before/after pairs and compare them.
 * A name missing from both sides is dropped; a name missing from one side
 * is compared against an empty analysis.
 */
export function pairCallAnalyses(
  names: Iterable<string>,
  before: Map<string, FunctionCallAnalysis>,
  after: Map<string, FunctionCallAnalysis>,
): Map<string, CallAnalysisResult> {
  const results = new Map<string, CallAnalysisResult>();

  for (const name of names) {
    const beforeAnalysis = before.get(name);
    const afterAnalysis = after.get(name);
    if (!beforeAnalysis && !afterAnalysis) continue;

    const pair = {
      functionName: name,
      before: beforeAnalysis ?? emptyCallAnalysis(name),
      after: afterAnalysis ?? emptyCallAnalysis(name),
    };

    results.set(name, {
      pair,
      changes: compareCallAnalysis(pair.before, pair.after),
    });
  }

  return results;
}

/**
 * Call analysis for `names` against the parent of `commit` ("before") and
 * the commit itself ("after"). The two indexes are built independently.
 */
export async function analyzeCommitCalls(
  provider: SnapshotProvider,
  registry: GrammarRegistry,
  names: string[],
  commit: CommitRef,
  onProgress?: (message: string) => void,
): Promise<Map<string, CallAnalysisResult>> {
  onProgress?.(`Analyzing function calls before ${commit.hash.slice(0, 12)}...`);
  const before = await analyzeSnapshotCalls(provider, registry, names, commit.parentHash);

  onProgress?.(`Analyzing function calls at ${commit.hash.slice(0, 12)}...`);
  const after = await analyzeSnapshotCalls(provider, registry, names, commit.hash);

  return pairCallAnalyses(names, before, after);
}
