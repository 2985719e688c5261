import { mkdir, rename, writeFile } from 'fs/promises';
import { dirname } from 'path';
import {
  CallAnalysisResult,
  CallInfo,
  FunctionCallAnalysis,
  FunctionChangeResult,
  FunctionDefinition,
} from '../types.js';

// ── Wire records (snake_case, one JSON object per line) ──

export interface DefinitionRecord {
  name: string;
  file_path: string;
  signature: string;
  return_type: string;
  start_line: number;
  end_line: number;
  code: string;
}

export interface CallerRecord extends DefinitionRecord {
  call_line: number;
}

export interface AnalysisSideRecord {
  file_path: string;
  signature: string;
  return_type: string;
  callees: DefinitionRecord[];
  callers: CallerRecord[];
}

export interface CallChangesRecord {
  added_callees: DefinitionRecord[];
  removed_callees: DefinitionRecord[];
  unchanged_callees: DefinitionRecord[];
  added_callers: CallerRecord[];
  removed_callers: CallerRecord[];
  unchanged_callers: CallerRecord[];
}

export interface CallAnalysisRecord {
  function_name: string;
  before_fix: AnalysisSideRecord;
  after_fix: AnalysisSideRecord;
  changes: CallChangesRecord;
}

export interface ExtractionRecord {
  repo_url: string;
  commit: string;
  file_path: string;
  language: string;
  function: string;
  before: string;
  after: string;
  diff: string;
  diff_stat: { added_lines: string[]; deleted_lines: string[] };
  start_line_before: number;
  end_line_before: number;
  start_line_after: number;
  end_line_after: number;
  call_analysis?: CallAnalysisRecord;
}

export interface CallSummary {
  num_callees: number;
  num_callers: number;
  unique_caller_files: number;
}

export interface SnapshotCallRecord extends AnalysisSideRecord {
  function_name: string;
  summary: CallSummary;
}

export interface PairCallRecord extends CallAnalysisRecord {
  summary: {
    before_fix: CallSummary;
    after_fix: CallSummary;
    changes: Record<keyof CallChangesRecord, number>;
  };
}

// ── Conversion ──

export function toDefinitionRecord(fn: FunctionDefinition): DefinitionRecord {
  return {
    name: fn.name,
    file_path: fn.filePath,
    signature: fn.signature,
    return_type: fn.returnType,
    start_line: fn.startLine,
    end_line: fn.endLine,
    code: fn.code,
  };
}

export function toCallerRecord(caller: CallInfo): CallerRecord {
  return { ...toDefinitionRecord(caller), call_line: caller.callLine };
}

function toSideRecord(analysis: FunctionCallAnalysis): AnalysisSideRecord {
  return {
    file_path: analysis.filePath,
    signature: analysis.signature,
    return_type: analysis.returnType,
    callees: analysis.callees.map(toDefinitionRecord),
    callers: analysis.callers.map(toCallerRecord),
  };
}

function summarize(analysis: FunctionCallAnalysis): CallSummary {
  return {
    num_callees: analysis.callees.length,
    num_callers: analysis.callers.length,
    unique_caller_files: new Set(analysis.callers.map((c) => c.filePath)).size,
  };
}

export function toCallAnalysisRecord({ pair, changes }: CallAnalysisResult): CallAnalysisRecord {
  return {
    function_name: pair.functionName,
    before_fix: toSideRecord(pair.before),
    after_fix: toSideRecord(pair.after),
    changes: {
      added_callees: changes.addedCallees.map(toDefinitionRecord),
      removed_callees: changes.removedCallees.map(toDefinitionRecord),
      unchanged_callees: changes.unchangedCallees.map(toDefinitionRecord),
      added_callers: changes.addedCallers.map(toCallerRecord),
      removed_callers: changes.removedCallers.map(toCallerRecord),
      unchanged_callers: changes.unchangedCallers.map(toCallerRecord),
    },
  };
}

export function toExtractionRecord(result: FunctionChangeResult): ExtractionRecord {
  const record: ExtractionRecord = {
    repo_url: result.repoUrl,
    commit: result.commitHash,
    file_path: result.filePath,
    language: result.language,
    function: result.functionName,
    before: result.before.code,
    after: result.after.code,
    diff: result.diffText,
    diff_stat: {
      added_lines: result.diffStat.addedLines,
      deleted_lines: result.diffStat.deletedLines,
    },
    start_line_before: result.before.startLine,
    end_line_before: result.before.endLine,
    start_line_after: result.after.startLine,
    end_line_after: result.after.endLine,
  };

  if (result.callAnalysis) {
    record.call_analysis = toCallAnalysisRecord(result.callAnalysis);
  }

  return record;
}

export function toSnapshotCallRecord(analysis: FunctionCallAnalysis): SnapshotCallRecord {
  return {
    function_name: analysis.functionName,
    ...toSideRecord(analysis),
    summary: summarize(analysis),
  };
}

export function toPairCallRecord(result: CallAnalysisResult): PairCallRecord {
  const record = toCallAnalysisRecord(result);
  return {
    ...record,
    summary: {
      before_fix: summarize(result.pair.before),
      after_fix: summarize(result.pair.after),
      changes: {
        added_callees: record.changes.added_callees.length,
        removed_callees: record.changes.removed_callees.length,
        unchanged_callees: record.changes.unchanged_callees.length,
        added_callers: record.changes.added_callers.length,
        removed_callers: record.changes.removed_callers.length,
        unchanged_callers: record.changes.unchanged_callers.length,
      },
    },
  };
}

// ── Serialization ──

/** One JSON document per line, each terminated by a newline. */
export function formatJSONL(records: readonly object[]): string {
  return records.map((record) => JSON.stringify(record) + '\n').join('');
}

/**
 * Write records to `filePath` as JSONL. The content goes to a temporary
 * sibling first and is renamed into place, so readers never see a partial
 * file.
 */
export async function writeJSONL(filePath: string, records: readonly object[]): Promise<void> {
  await mkdir(dirname(filePath), { recursive: true });

  const tmpPath = `${filePath}.${process.pid}.tmp`;
  await writeFile(tmpPath, formatJSONL(records), 'utf-8');
  await rename(tmpPath, filePath);
}

/**
 * Collect the `function` field of every record in extraction JSONL text.
 * Blank lines and records without the field are ignored.
 */
export function readFunctionNames(jsonl: string): string[] {
  const names: string[] = [];

  for (const line of jsonl.split('\n')) {
    if (line.trim() === '') continue;

    const record: unknown = JSON.parse(line);
    if (
      typeof record === 'object' &&
      record !== null &&
      'function' in record &&
      typeof record.function === 'string'
    ) {
      names.push(record.function);
    }
  }

  return names;
}
