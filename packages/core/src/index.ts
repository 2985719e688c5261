export type {
  LanguageTag,
  FunctionDefinition,
  ScannedFunction,
  DefinitionIndex,
  CallInfo,
  FunctionCallAnalysis,
  FunctionCallAnalysisPair,
  CallAnalysisComparison,
  CallAnalysisResult,
  DiffStat,
  FunctionDiff,
  FileContent,
  SnapshotProvider,
  SourceFile,
  CommitRef,
  FileChange,
  ExtractionOptions,
  FunctionSnapshot,
  FunctionChangeResult,
} from './types.js';

export { NoParentCommitError } from './errors.js';
export { GrammarRegistry } from './parsing/grammar-registry.js';
export { LANGUAGE_SYNTAX, SUPPORTED_LANGUAGES, languageOf } from './parsing/languages.js';
export type { LanguageSyntax } from './parsing/languages.js';
export { parseFunctions, scanFunctions } from './parsing/source-parser.js';
export { extractCalls } from './parsing/call-extractor.js';
export { buildDefinitionIndex } from './graph/definition-index.js';
export { resolveCallGraph } from './graph/call-graph-resolver.js';
export { diffFunctionBodies } from './diff/function-differ.js';
export { compareCallAnalysis } from './diff/call-graph-differ.js';
export { GitRepository } from './git/git-repository.js';
export { loadSnapshot, loadFileChanges } from './snapshot/snapshot-loader.js';
export { analyzeSnapshotCalls, analyzeCommitCalls, pairCallAnalyses, emptyCallAnalysis } from './calls/call-analysis.js';
export { extractCommitFunctions, extractChangedFunctions, DEFAULT_EXTRACTION_OPTIONS } from './extract/commit-extractor.js';
export { isTestFile, isLargeFunction, isLargeChange } from './extract/filters.js';
export {
  toExtractionRecord,
  toCallAnalysisRecord,
  toSnapshotCallRecord,
  toPairCallRecord,
  formatJSONL,
  writeJSONL,
  readFunctionNames,
} from './output/jsonl-reporter.js';
export type {
  ExtractionRecord,
  CallAnalysisRecord,
  SnapshotCallRecord,
  PairCallRecord,
  DefinitionRecord,
  CallerRecord,
} from './output/jsonl-reporter.js';
