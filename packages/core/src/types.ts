// ── Languages ──
export type LanguageTag = 'c' | 'cpp' | 'java';

// ── Parsed definitions ──
export interface FunctionDefinition {
  /** Empty when no identifier could be found in the declarator. */
  name: string;
  filePath: string;
  language: LanguageTag;
  /** Parameter list text, verbatim, including the parentheses. */
  signature: string;
  returnType: string;
  /** Full source text of the definition. */
  code: string;
  /** 1-based, inclusive. */
  startLine: number;
  /** 1-based, inclusive. */
  endLine: number;
}

/**
 * A definition together with the distinct names invoked in its body,
 * produced from a single parse of the enclosing file.
 */
export interface ScannedFunction {
  definition: FunctionDefinition;
  calls: Set<string>;
}

export interface DefinitionIndex {
  /** name -> authoritative definition (last one scanned wins). */
  definitions: Map<string, FunctionDefinition>;
  /** Every function found during the scan, in file enumeration order. */
  scanned: ScannedFunction[];
}

// ── Call graph ──
export interface CallInfo extends FunctionDefinition {
  /** Name of the target function this caller invokes. */
  callee: string;
  /** The caller's own start line, not the line of the call expression. */
  callLine: number;
}

export interface FunctionCallAnalysis {
  functionName: string;
  filePath: string;
  signature: string;
  returnType: string;
  callees: FunctionDefinition[];
  callers: CallInfo[];
}

export interface FunctionCallAnalysisPair {
  functionName: string;
  before: FunctionCallAnalysis;
  after: FunctionCallAnalysis;
}

export interface CallAnalysisComparison {
  addedCallees: FunctionDefinition[];
  removedCallees: FunctionDefinition[];
  unchangedCallees: FunctionDefinition[];
  addedCallers: CallInfo[];
  removedCallers: CallInfo[];
  unchangedCallers: CallInfo[];
}

export interface CallAnalysisResult {
  pair: FunctionCallAnalysisPair;
  changes: CallAnalysisComparison;
}

// ── Text diff ──
export interface DiffStat {
  addedLines: string[];
  deletedLines: string[];
}

export interface FunctionDiff {
  diffText: string;
  diffStat: DiffStat;
}

// ── Snapshots ──
export type FileContent =
  | { kind: 'text'; content: string }
  | { kind: 'binary' };

/**
 * Read access to the files of one tree (a commit, or its parent).
 * `ref` is anything the backing store can resolve to a tree.
 */
export interface SnapshotProvider {
  listFiles(ref: string): Promise<string[]>;
  readFile(ref: string, filePath: string): Promise<FileContent>;
}

export interface SourceFile {
  path: string;
  language: LanguageTag;
  content: string;
}

export interface CommitRef {
  hash: string;
  parentHash: string;
}

export interface FileChange {
  filePath: string;
  status: 'added' | 'modified' | 'deleted';
  language: LanguageTag;
  /** Empty when the file does not exist in the parent. */
  contentBefore: string;
  /** Empty when the file does not exist in the commit. */
  contentAfter: string;
}

// ── Extraction ──
export interface ExtractionOptions {
  repoPath: string;
  commit: string;
  repoUrl?: string;
  callAnalysis?: boolean;
  skipTests?: boolean;
  maxFunctionLines?: number;
  maxChangedLines?: number;
  onProgress?: (message: string) => void;
}

export type FunctionSnapshot = Omit<FunctionDefinition, 'filePath' | 'language'>;

export interface FunctionChangeResult {
  repoUrl: string;
  commitHash: string;
  filePath: string;
  language: LanguageTag;
  functionName: string;
  before: FunctionSnapshot;
  after: FunctionSnapshot;
  diffText: string;
  diffStat: DiffStat;
  callAnalysis?: CallAnalysisResult;
}
